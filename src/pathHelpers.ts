// src/pathHelpers.ts - Input validation and output path resolution for file conversions

import * as path from 'path';
import * as fs from 'fs/promises';
import mime from 'mime-types';
import { FileNotFoundError, UnsupportedInputError, toFileError } from './errorHelpers.js';
import { DOCX_MIME_TYPE } from './docxWriter.js';

export const MARKDOWN_MIME_TYPE = 'text/markdown';

export type InputFormat = 'markdown' | 'docx';

const FORMAT_MIME_TYPES: Record<InputFormat, string> = {
  markdown: MARKDOWN_MIME_TYPE,
  docx: DOCX_MIME_TYPE,
};

const OUTPUT_EXTENSIONS: Record<InputFormat, string> = {
  markdown: '.docx',
  docx: '.md',
};

export interface PathValidationResult {
  resolvedPath: string;
  /** Set when the extension does not match the expected format */
  warning?: string;
}

/**
 * Detect the format of a file from its extension
 */
export function detectFormat(filePath: string): InputFormat | null {
  const mimeType = mime.lookup(filePath);
  if (mimeType === MARKDOWN_MIME_TYPE) return 'markdown';
  if (mimeType === DOCX_MIME_TYPE) return 'docx';
  return null;
}

/**
 * Default output path: same directory and base name, with the other format's extension
 */
export function defaultOutputPath(inputPath: string, format: InputFormat): string {
  const parsed = path.parse(path.resolve(inputPath));
  return path.join(parsed.dir, parsed.name + OUTPUT_EXTENSIONS[format]);
}

/**
 * Validates an input path for a conversion: it must exist, be a readable
 * file and, unless `force` is set, carry the expected extension.
 *
 * @throws FileNotFoundError, IOError or UnsupportedInputError
 */
export async function validateInputPath(
  filePath: string,
  format: InputFormat,
  force = false
): Promise<PathValidationResult> {
  const resolvedPath = path.resolve(filePath);

  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- resolvedPath is chosen by the invoking user
    const stats = await fs.stat(resolvedPath);
    if (!stats.isFile()) {
      throw new FileNotFoundError(resolvedPath);
    }
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- resolvedPath is chosen by the invoking user
    await fs.access(resolvedPath, fs.constants.R_OK);
  } catch (err: unknown) {
    throw toFileError(err, resolvedPath, 'read');
  }

  if (detectFormat(resolvedPath) !== format) {
    const expected = format === 'markdown' ? '.md' : '.docx';
    const message = `File doesn't have ${expected} extension: ${resolvedPath}`;
    if (!force) {
      throw new UnsupportedInputError(`${message} (use --force to convert it anyway)`);
    }
    return { resolvedPath, warning: message };
  }

  return { resolvedPath };
}

/**
 * Rejects an output path that is the input itself
 */
export function validateOutputPath(outputPath: string, inputPath: string): PathValidationResult {
  const resolvedPath = path.resolve(outputPath);
  if (resolvedPath === path.resolve(inputPath)) {
    throw new UnsupportedInputError(`Output path is the same as the input: ${resolvedPath}`);
  }
  return { resolvedPath };
}
