// src/converter.ts - File and in-memory conversions between Markdown and Word documents

import * as fs from 'fs/promises';
import * as path from 'path';
import { type ConverterConfig, DEFAULT_CONFIG } from './config.js';
import { save, toBuffer } from './docxWriter.js';
import { listBlocks, loadDocument, loadDocumentFromBuffer } from './docxReader.js';
import { toFileError, UnsupportedInputError } from './errorHelpers.js';
import { MarkdownToDoc } from './markdown/MarkdownToDoc.js';
import { DocToMarkdown } from './markdown/DocToMarkdown.js';
import {
  type InputFormat,
  defaultOutputPath,
  detectFormat,
  validateInputPath,
  validateOutputPath,
} from './pathHelpers.js';

export interface ConvertFileOptions {
  /** Output path; defaults to the input path with the other format's extension */
  output?: string;
  config?: ConverterConfig;
  /** Convert even when the input extension does not match */
  force?: boolean;
}

export interface ConvertFileResult {
  format: InputFormat;
  inputPath: string;
  outputPath: string;
  /** Non-fatal problems, such as a forced extension mismatch */
  warnings: string[];
}

/**
 * Convert Markdown text to a .docx package in memory
 */
export async function markdownToDocx(markdown: string, config: ConverterConfig = DEFAULT_CONFIG): Promise<Buffer> {
  return toBuffer(new MarkdownToDoc(config).convert(markdown));
}

/**
 * Convert a .docx package held in memory to Markdown text
 */
export async function docxToMarkdown(
  buffer: Buffer | Uint8Array,
  config: ConverterConfig = DEFAULT_CONFIG
): Promise<string> {
  const document = await loadDocumentFromBuffer(buffer);
  return new DocToMarkdown(config).convert(listBlocks(document));
}

/**
 * Convert a Markdown file to a .docx file, overwriting the output.
 * Nothing is written unless the input was read and converted.
 */
export async function convertMarkdownFile(inputPath: string, options: ConvertFileOptions = {}): Promise<ConvertFileResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const input = await validateInputPath(inputPath, 'markdown', options.force);
  const output = validateOutputPath(options.output ?? defaultOutputPath(input.resolvedPath, 'markdown'), input.resolvedPath);

  let markdown: string;
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- path validated above
    markdown = await fs.readFile(input.resolvedPath, 'utf8');
  } catch (err: unknown) {
    throw toFileError(err, input.resolvedPath, 'read');
  }

  await save(new MarkdownToDoc(config).convert(markdown), output.resolvedPath);

  return {
    format: 'markdown',
    inputPath: input.resolvedPath,
    outputPath: output.resolvedPath,
    warnings: input.warning ? [input.warning] : [],
  };
}

/**
 * Convert a .docx file to a Markdown file, overwriting the output.
 * A package that cannot be read fails before anything is written.
 */
export async function convertDocxFile(inputPath: string, options: ConvertFileOptions = {}): Promise<ConvertFileResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const input = await validateInputPath(inputPath, 'docx', options.force);
  const output = validateOutputPath(options.output ?? defaultOutputPath(input.resolvedPath, 'docx'), input.resolvedPath);

  const document = await loadDocument(input.resolvedPath);
  const markdown = new DocToMarkdown(config).convert(listBlocks(document));

  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- output path validated above
    await fs.writeFile(output.resolvedPath, markdown, 'utf8');
  } catch (err: unknown) {
    throw toFileError(err, output.resolvedPath, 'write');
  }

  return {
    format: 'docx',
    inputPath: input.resolvedPath,
    outputPath: output.resolvedPath,
    warnings: input.warning ? [input.warning] : [],
  };
}

/**
 * Convert a file in whichever direction its extension calls for
 * @throws UnsupportedInputError when the extension is neither Markdown nor .docx
 */
export async function convertFile(inputPath: string, options: ConvertFileOptions = {}): Promise<ConvertFileResult> {
  const format = detectFormat(inputPath);
  if (format === 'markdown') {
    return convertMarkdownFile(inputPath, options);
  }
  if (format === 'docx') {
    return convertDocxFile(inputPath, options);
  }
  throw new UnsupportedInputError(
    `Cannot tell the conversion direction for ${path.basename(inputPath)}: expected a .md or .docx file`
  );
}
