// src/index.ts - Library entrypoint for mddocx

export {
  markdownToDocx,
  docxToMarkdown,
  convertMarkdownFile,
  convertDocxFile,
  convertFile,
  type ConvertFileOptions,
  type ConvertFileResult,
} from './converter.js';
export {
  ConverterConfigSchema,
  DEFAULT_CONFIG,
  resolveConfig,
  loadConfigFile,
  type ConverterConfig,
  type ConverterConfigInput,
} from './config.js';
export {
  ConversionError,
  FileNotFoundError,
  IOError,
  UnsupportedInputError,
  CorruptFileError,
  ConfigError,
  type ConversionErrorKind,
} from './errorHelpers.js';
export {
  createDocument,
  addParagraph,
  addRun,
  addTable,
  cellParagraph,
  setCellText,
  toBuffer,
  save,
  type DocumentHandle,
  type ParagraphHandle,
  type TableHandle,
  type RunFormat,
} from './docxWriter.js';
export {
  loadDocument,
  loadDocumentFromBuffer,
  listBlocks,
  type LoadedDocument,
  type DocBlock,
  type DocParagraph,
  type DocTable,
  type DocRun,
} from './docxReader.js';
export * from './markdown/index.js';
