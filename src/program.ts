// src/program.ts - Command definitions for the mddocx CLI
import { Command } from 'commander';
import * as path from 'path';
import { type ConverterConfig, DEFAULT_CONFIG, loadConfigFile } from './config.js';
import { type ConvertFileOptions, type ConvertFileResult, convertDocxFile, convertFile, convertMarkdownFile } from './converter.js';
import { loadDocument } from './docxReader.js';
import { CompatibilityChecker } from './markdown/CompatibilityChecker.js';
import { validateInputPath } from './pathHelpers.js';

interface ConvertCommandOptions {
  output?: string;
  config?: string;
  force?: boolean;
}

async function resolveOptions(options: ConvertCommandOptions): Promise<ConvertFileOptions> {
  const config: ConverterConfig = options.config ? await loadConfigFile(options.config) : DEFAULT_CONFIG;
  return { output: options.output, force: options.force, config };
}

function report(result: ConvertFileResult): void {
  for (const warning of result.warnings) {
    console.warn(`Warning: ${warning}`);
  }
  console.log(`Converted: ${path.basename(result.inputPath)} -> ${path.basename(result.outputPath)}`);
}

function addConvertOptions(command: Command): Command {
  return command
    .option('-o, --output <path>', 'Output file path (default: input path with the other extension)')
    .option('-c, --config <path>', 'JSON configuration file')
    .option('--force', 'Convert even if the file extension does not match');
}

/**
 * Build the CLI. Command actions throw on failure; the caller decides how to exit.
 */
export function createProgram(version = '0.0.0'): Command {
  const program = new Command();

  program
    .name('mddocx')
    .description('Convert Markdown files to Word documents (.docx) and back')
    .version(version)
    .option('--debug', 'Print error details on failure');

  // === Markdown -> Word ===
  addConvertOptions(
    program.command('md2docx <file>').description('Convert a Markdown file to a Word document')
  ).action(async (file: string, options: ConvertCommandOptions) => {
    report(await convertMarkdownFile(file, await resolveOptions(options)));
  });

  // === Word -> Markdown ===
  addConvertOptions(
    program.command('docx2md <file>').description('Convert a Word document to a Markdown file')
  ).action(async (file: string, options: ConvertCommandOptions) => {
    report(await convertDocxFile(file, await resolveOptions(options)));
  });

  // === Either direction, by extension ===
  addConvertOptions(
    program.command('convert <file>').description('Convert a .md file to .docx, or a .docx file to .md')
  ).action(async (file: string, options: ConvertCommandOptions) => {
    report(await convertFile(file, await resolveOptions(options)));
  });

  // === Compatibility report ===
  program
    .command('check <file>')
    .description('Report what converting a Word document to Markdown would lose')
    .action(async (file: string) => {
      const input = await validateInputPath(file, 'docx');
      const result = new CompatibilityChecker().check(await loadDocument(input.resolvedPath));
      console.log(CompatibilityChecker.formatIssues(result.issues));
    });

  return program;
}
