// docxWriter.ts - Builds Word (.docx) documents through a narrow paragraph/run/table interface
// Collects paragraphs and tables in order, then hands them to the docx package when packed
import * as fs from 'fs/promises';
import {
  AlignmentType,
  BorderStyle,
  Document,
  LevelFormat,
  Packer,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  UnderlineType,
  type IParagraphOptions,
  type IParagraphStyleOptions,
} from 'docx';
import { type ConverterConfig, DEFAULT_CONFIG } from './config.js';
import { STYLE_NAMES, normalizeStyleName } from './markdown/types.js';
import { toFileError } from './errorHelpers.js';

export const DOCX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

const BULLET_NUMBERING_REFERENCE = 'markdown-bullets';
const NUMBER_NUMBERING_REFERENCE = 'markdown-numbers';

// One list level step, in twips
const LIST_INDENT_TWIPS = 720;

// --- Handles ---

export interface RunFormat {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
}

export interface RunSpec extends RunFormat {
  text: string;
}

export interface ParagraphOptions {
  /** Start a new numbered list instead of continuing the previous one */
  restartNumbering?: boolean;
  /** Direct left indent in twips */
  indentLeft?: number;
  /** Draw a bottom border (horizontal rule) */
  bottomBorder?: boolean;
}

export interface ParagraphHandle {
  readonly kind: 'paragraph';
  readonly styleName: string;
  readonly options: ParagraphOptions;
  readonly runs: RunSpec[];
  /** Numbered-list instance this paragraph continues, if it is a `List Number` paragraph */
  numberingInstance?: number;
}

export interface TableHandle {
  readonly kind: 'table';
  readonly rowCount: number;
  readonly columnCount: number;
  readonly cells: ParagraphHandle[][];
}

export interface DocumentHandle {
  readonly config: ConverterConfig;
  readonly blocks: (ParagraphHandle | TableHandle)[];
  numberingInstance: number;
}

// --- Building ---

export function createDocument(config: ConverterConfig = DEFAULT_CONFIG): DocumentHandle {
  return { config, blocks: [], numberingInstance: 0 };
}

function newParagraph(styleName: string, options: ParagraphOptions = {}): ParagraphHandle {
  return { kind: 'paragraph', styleName, options, runs: [] };
}

/**
 * Append a paragraph with the given style name (e.g. "Heading 1", "List Bullet")
 */
export function addParagraph(
  doc: DocumentHandle,
  styleName: string,
  options: ParagraphOptions = {}
): ParagraphHandle {
  const paragraph = newParagraph(styleName, options);

  if (normalizeStyleName(styleName) === normalizeStyleName(STYLE_NAMES.listNumber)) {
    if (options.restartNumbering || doc.numberingInstance === 0) {
      doc.numberingInstance++;
    }
    paragraph.numberingInstance = doc.numberingInstance;
  }

  doc.blocks.push(paragraph);
  return paragraph;
}

export function addRun(paragraph: ParagraphHandle, text: string, format: RunFormat = {}): void {
  paragraph.runs.push({ text, ...format });
}

/**
 * Append a `rows` × `cols` table of empty cells
 */
export function addTable(doc: DocumentHandle, rows: number, cols: number): TableHandle {
  if (rows < 1 || cols < 1) {
    throw new RangeError(`Table must have at least one row and one column (got ${rows}x${cols})`);
  }
  const cells = Array.from({ length: rows }, () =>
    Array.from({ length: cols }, () => newParagraph(STYLE_NAMES.normal))
  );
  const table: TableHandle = { kind: 'table', rowCount: rows, columnCount: cols, cells };
  doc.blocks.push(table);
  return table;
}

/**
 * The single paragraph held by a table cell
 */
export function cellParagraph(table: TableHandle, row: number, col: number): ParagraphHandle {
  const paragraph = table.cells[row]?.[col];
  if (!paragraph) {
    throw new RangeError(`Cell (${row}, ${col}) is outside a ${table.rowCount}x${table.columnCount} table`);
  }
  return paragraph;
}

/**
 * Replace a cell's content with a single run
 */
export function setCellText(table: TableHandle, row: number, col: number, text: string, bold = false): void {
  const paragraph = cellParagraph(table, row, col);
  paragraph.runs.length = 0;
  if (text) {
    addRun(paragraph, text, bold ? { bold: true } : {});
  }
}

// --- Packing ---

/** Custom paragraph styles the renderer refers to by name */
function paragraphStyles(): IParagraphStyleOptions[] {
  const listStyle = (name: string, level: number): IParagraphStyleOptions => ({
    id: name.replace(/\s+/g, ''),
    name,
    basedOn: 'Normal',
    next: 'Normal',
    quickFormat: true,
    paragraph: {
      indent: { left: LIST_INDENT_TWIPS * (level + 1), hanging: 360 },
    },
  });

  return [
    listStyle(STYLE_NAMES.listBullet, 0),
    listStyle(STYLE_NAMES.listBullet2, 1),
    listStyle(STYLE_NAMES.listNumber, 0),
    {
      id: 'Quote',
      name: STYLE_NAMES.quote,
      basedOn: 'Normal',
      next: 'Normal',
      quickFormat: true,
      run: { italics: true, color: '404040' },
      paragraph: { indent: { left: LIST_INDENT_TWIPS, right: LIST_INDENT_TWIPS } },
    },
  ];
}

function numberingLevel(level: number, format: (typeof LevelFormat)[keyof typeof LevelFormat], text: string) {
  return {
    level,
    format,
    text,
    alignment: AlignmentType.LEFT,
    style: {
      paragraph: {
        indent: { left: LIST_INDENT_TWIPS * (level + 1), hanging: 360 },
      },
    },
  };
}

function toDocxRun(run: RunSpec): TextRun {
  return new TextRun({
    text: run.text,
    bold: run.bold || undefined,
    italics: run.italic || undefined,
    underline: run.underline ? { type: UnderlineType.SINGLE } : undefined,
  });
}

function numberingFor(paragraph: ParagraphHandle): IParagraphOptions['numbering'] {
  const styleKey = normalizeStyleName(paragraph.styleName);
  if (styleKey === normalizeStyleName(STYLE_NAMES.listBullet)) {
    return { reference: BULLET_NUMBERING_REFERENCE, level: 0 };
  }
  if (styleKey === normalizeStyleName(STYLE_NAMES.listBullet2)) {
    return { reference: BULLET_NUMBERING_REFERENCE, level: 1 };
  }
  if (paragraph.numberingInstance !== undefined) {
    return { reference: NUMBER_NUMBERING_REFERENCE, level: 0, instance: paragraph.numberingInstance };
  }
  return undefined;
}

function toDocxParagraph(paragraph: ParagraphHandle): Paragraph {
  const isNormal = normalizeStyleName(paragraph.styleName) === normalizeStyleName(STYLE_NAMES.normal);
  const { indentLeft, bottomBorder } = paragraph.options;

  return new Paragraph({
    children: paragraph.runs.map(toDocxRun),
    style: isNormal ? undefined : paragraph.styleName.replace(/\s+/g, ''),
    numbering: numberingFor(paragraph),
    indent: indentLeft === undefined ? undefined : { left: indentLeft },
    border: bottomBorder
      ? { bottom: { color: 'auto', space: 1, style: BorderStyle.SINGLE, size: 6 } }
      : undefined,
  });
}

function toDocxTable(table: TableHandle): Table {
  return new Table({
    rows: table.cells.map(
      (row) =>
        new TableRow({
          children: row.map((cell) => new TableCell({ children: [toDocxParagraph(cell)] })),
        })
    ),
  });
}

/**
 * Convert the collected blocks into a docx `Document`
 */
export function buildDocxDocument(doc: DocumentHandle): Document {
  const { font, fontSize } = doc.config;

  return new Document({
    styles: {
      default: {
        document: {
          // docx sizes are in half-points
          run: { font, size: Math.round(fontSize * 2) },
        },
      },
      paragraphStyles: paragraphStyles(),
    },
    numbering: {
      config: [
        {
          reference: BULLET_NUMBERING_REFERENCE,
          levels: [numberingLevel(0, LevelFormat.BULLET, '•'), numberingLevel(1, LevelFormat.BULLET, '◦')],
        },
        {
          reference: NUMBER_NUMBERING_REFERENCE,
          levels: [numberingLevel(0, LevelFormat.DECIMAL, '%1.')],
        },
      ],
    },
    sections: [
      {
        children: doc.blocks.map((block) =>
          block.kind === 'table' ? toDocxTable(block) : toDocxParagraph(block)
        ),
      },
    ],
  });
}

/**
 * Pack the document into a .docx buffer
 */
export async function toBuffer(doc: DocumentHandle): Promise<Buffer> {
  return Packer.toBuffer(buildDocxDocument(doc));
}

/**
 * Pack the document and write it to `outputPath`, overwriting any existing file.
 * The package is built in memory first, so a packing failure writes nothing.
 */
export async function save(doc: DocumentHandle, outputPath: string): Promise<void> {
  const buffer = await toBuffer(doc);
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- outputPath is chosen by the invoking user
    await fs.writeFile(outputPath, buffer);
  } catch (err: unknown) {
    throw toFileError(err, outputPath, 'write');
  }
}
