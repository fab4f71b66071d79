#!/usr/bin/env node
// src/cli.ts - CLI entrypoint for mddocx
import * as fs from 'fs/promises';
import { createProgram } from './program.js';
import { formatCliError, getErrorDetails } from './errorHelpers.js';

interface PackageJson {
  version: string;
  name?: string;
  description?: string;
}

// Version from package.json
const packageJsonPath = new URL('../package.json', import.meta.url);
const packageJson = JSON.parse(await fs.readFile(packageJsonPath, 'utf8')) as PackageJson;

const program = createProgram(packageJson.version);

try {
  await program.parseAsync();
} catch (error: unknown) {
  console.error(formatCliError(error));
  if (program.opts<{ debug?: boolean }>().debug) {
    console.error(JSON.stringify(getErrorDetails(error), null, 2));
  }
  process.exit(1);
}
