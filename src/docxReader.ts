// docxReader.ts - Reads Word (.docx) packages into an ordered list of paragraphs and tables
// Opens the package with jszip and walks word/document.xml with fast-xml-parser in order-preserving mode
import * as fs from 'fs/promises';
import JSZip from 'jszip';
import { XMLParser } from 'fast-xml-parser';
import { CorruptFileError, getErrorMessage, toFileError } from './errorHelpers.js';
import { STYLE_NAMES } from './markdown/types.js';

// --- Reader output ---

export interface DocRun {
  text: string;
  bold: boolean;
  italic: boolean;
  underline: boolean;
}

export interface DocListInfo {
  /** Zero-based list level (`w:ilvl`) */
  level: number;
  ordered: boolean;
}

export interface DocParagraph {
  kind: 'paragraph';
  /** Style name as shown in Word ("Heading 1"), or the style id when the name is unknown */
  styleName: string;
  runs: DocRun[];
  /** Direct left indent in twips */
  indentLeft?: number;
  bottomBorder: boolean;
  /** Present when the paragraph carries direct list numbering */
  list?: DocListInfo;
  imageCount: number;
  footnoteCount: number;
  /** Hyperlinks around runs: `w:hyperlink` elements and HYPERLINK fields */
  hyperlinkCount: number;
}

export interface DocTableRow {
  cells: string[];
}

export interface DocTable {
  kind: 'table';
  rows: DocTableRow[];
  nestedTableCount: number;
}

export type DocBlock = DocParagraph | DocTable;

export interface StyleTable {
  names: Map<string, string>;
  defaultParagraphStyle: string;
}

/** numId → ilvl → numFmt */
export type NumberingTable = Map<string, Map<number, string>>;

export interface LoadedDocument {
  body: XmlNode;
  styles: StyleTable;
  numbering: NumberingTable;
  headerCount: number;
  footerCount: number;
}

// --- XML helpers ---

export type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
});

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nodeName(node: XmlNode): string | undefined {
  return Object.keys(node).find((key) => key !== ':@');
}

function childNodes(node: XmlNode): XmlNode[] {
  const name = nodeName(node);
  if (!name) return [];
  const value = node[name];
  return Array.isArray(value) ? value.filter(isXmlNode) : [];
}

function findChild(node: XmlNode | undefined, name: string): XmlNode | undefined {
  if (!node) return undefined;
  return childNodes(node).find((child) => nodeName(child) === name);
}

function findChildren(node: XmlNode, name: string): XmlNode[] {
  return childNodes(node).filter((child) => nodeName(child) === name);
}

function attr(node: XmlNode | undefined, name: string): string | undefined {
  if (!node) return undefined;
  const attributes = node[':@'];
  if (!isXmlNode(attributes)) return undefined;
  const value = attributes[name];
  return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;
}

function textContent(node: XmlNode): string {
  return childNodes(node)
    .map((child) => {
      const text = child['#text'];
      return typeof text === 'string' || typeof text === 'number' ? String(text) : '';
    })
    .join('');
}

function parseXml(xml: string, partName: string): XmlNode[] {
  let tree: unknown;
  try {
    tree = parser.parse(xml);
  } catch (err: unknown) {
    throw new CorruptFileError(`Malformed XML in ${partName}: ${getErrorMessage(err)}`, { cause: err });
  }
  return Array.isArray(tree) ? tree.filter(isXmlNode) : [];
}

/** `<w:b/>` is on; `<w:b w:val="false"/>` is off */
function isOn(node: XmlNode | undefined): boolean {
  if (!node) return false;
  const val = attr(node, 'val');
  return val === undefined || !['false', '0', 'off', 'none'].includes(val);
}

// --- Package loading ---

async function readPart(zip: JSZip, partName: string): Promise<string | undefined> {
  const file = zip.file(partName);
  return file ? file.async('string') : undefined;
}

function readStyles(roots: XmlNode[]): StyleTable {
  const names = new Map<string, string>();
  let defaultParagraphStyle: string = STYLE_NAMES.normal;

  const stylesRoot = roots.find((node) => nodeName(node) === 'styles');
  if (!stylesRoot) return { names, defaultParagraphStyle };

  for (const style of findChildren(stylesRoot, 'style')) {
    const id = attr(style, 'styleId');
    const name = attr(findChild(style, 'name'), 'val');
    if (!id || !name) continue;
    names.set(id, name);
    const isDefault = ['1', 'true', 'on'].includes(attr(style, 'default') ?? '');
    if (attr(style, 'type') === 'paragraph' && isDefault) {
      defaultParagraphStyle = name;
    }
  }

  return { names, defaultParagraphStyle };
}

function readNumbering(roots: XmlNode[]): NumberingTable {
  const table: NumberingTable = new Map();
  const numberingRoot = roots.find((node) => nodeName(node) === 'numbering');
  if (!numberingRoot) return table;

  const abstractFormats = new Map<string, Map<number, string>>();
  for (const abstract of findChildren(numberingRoot, 'abstractNum')) {
    const abstractId = attr(abstract, 'abstractNumId');
    if (abstractId === undefined) continue;
    const levels = new Map<number, string>();
    for (const lvl of findChildren(abstract, 'lvl')) {
      const ilvl = Number.parseInt(attr(lvl, 'ilvl') ?? '', 10);
      const format = attr(findChild(lvl, 'numFmt'), 'val');
      if (!Number.isNaN(ilvl) && format) levels.set(ilvl, format);
    }
    abstractFormats.set(abstractId, levels);
  }

  for (const num of findChildren(numberingRoot, 'num')) {
    const numId = attr(num, 'numId');
    const abstractId = attr(findChild(num, 'abstractNumId'), 'val');
    const levels = abstractId === undefined ? undefined : abstractFormats.get(abstractId);
    if (numId !== undefined && levels) table.set(numId, levels);
  }

  return table;
}

/**
 * Open a .docx package held in memory
 * @throws CorruptFileError when the buffer is not a readable Word package
 */
export async function loadDocumentFromBuffer(buffer: Buffer | Uint8Array): Promise<LoadedDocument> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (err: unknown) {
    throw new CorruptFileError(`Not a valid .docx package: ${getErrorMessage(err)}`, { cause: err });
  }

  const documentXml = await readPart(zip, 'word/document.xml');
  if (documentXml === undefined) {
    throw new CorruptFileError('Not a valid .docx package: word/document.xml is missing');
  }

  const documentRoot = parseXml(documentXml, 'word/document.xml').find((node) => nodeName(node) === 'document');
  const body = findChild(documentRoot, 'body');
  if (!body) {
    throw new CorruptFileError('Not a valid .docx package: the document has no body');
  }

  const stylesXml = await readPart(zip, 'word/styles.xml');
  const numberingXml = await readPart(zip, 'word/numbering.xml');

  return {
    body,
    styles: readStyles(stylesXml === undefined ? [] : parseXml(stylesXml, 'word/styles.xml')),
    numbering: readNumbering(numberingXml === undefined ? [] : parseXml(numberingXml, 'word/numbering.xml')),
    headerCount: zip.file(/^word\/header\d*\.xml$/).length,
    footerCount: zip.file(/^word\/footer\d*\.xml$/).length,
  };
}

/**
 * Read and open a .docx file
 * @throws FileNotFoundError, IOError or CorruptFileError
 */
export async function loadDocument(inputPath: string): Promise<LoadedDocument> {
  let buffer: Buffer;
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- inputPath is chosen by the invoking user
    buffer = await fs.readFile(inputPath);
  } catch (err: unknown) {
    throw toFileError(err, inputPath, 'read');
  }
  return loadDocumentFromBuffer(buffer);
}

// --- Block listing ---

interface RunCollector {
  runs: DocRun[];
  imageCount: number;
  footnoteCount: number;
  hyperlinkCount: number;
}

function isHyperlinkField(instruction: string | undefined): boolean {
  return instruction !== undefined && /^\s*HYPERLINK\b/.test(instruction);
}

function readRun(run: XmlNode, into: RunCollector): void {
  const rPr = findChild(run, 'rPr');
  const underline = findChild(rPr, 'u');
  let text = '';

  for (const child of childNodes(run)) {
    switch (nodeName(child)) {
      case 't':
        text += textContent(child);
        break;
      case 'tab':
        text += '\t';
        break;
      case 'br':
      case 'cr':
        text += ' ';
        break;
      case 'drawing':
      case 'pict':
        into.imageCount++;
        break;
      case 'footnoteReference':
      case 'endnoteReference':
        into.footnoteCount++;
        break;
      case 'instrText':
        if (isHyperlinkField(textContent(child))) into.hyperlinkCount++;
        break;
      default:
        break;
    }
  }

  if (!text) return;

  into.runs.push({
    text,
    bold: isOn(findChild(rPr, 'b')),
    italic: isOn(findChild(rPr, 'i')),
    underline: underline !== undefined && attr(underline, 'val') !== 'none',
  });
}

/** Runs may sit directly in the paragraph or inside hyperlinks, revisions and content controls */
function collectRuns(container: XmlNode, into: RunCollector): void {
  for (const child of childNodes(container)) {
    switch (nodeName(child)) {
      case 'r':
        readRun(child, into);
        break;
      case 'hyperlink':
        into.hyperlinkCount++;
        collectRuns(child, into);
        break;
      case 'fldSimple':
        if (isHyperlinkField(attr(child, 'instr'))) into.hyperlinkCount++;
        collectRuns(child, into);
        break;
      case 'ins':
      case 'smartTag':
        collectRuns(child, into);
        break;
      case 'sdt': {
        const content = findChild(child, 'sdtContent');
        if (content) collectRuns(content, into);
        break;
      }
      default:
        break;
    }
  }
}

function readListInfo(pPr: XmlNode | undefined, doc: LoadedDocument): DocListInfo | undefined {
  const numPr = findChild(pPr, 'numPr');
  if (!numPr) return undefined;
  const numId = attr(findChild(numPr, 'numId'), 'val');
  // numId 0 removes numbering inherited from the style
  if (numId === undefined || numId === '0') return undefined;
  const level = Number.parseInt(attr(findChild(numPr, 'ilvl'), 'val') ?? '0', 10) || 0;
  const format = doc.numbering.get(numId)?.get(level);
  return { level, ordered: format !== undefined && format !== 'bullet' && format !== 'none' };
}

function readIndent(pPr: XmlNode | undefined): number | undefined {
  const ind = findChild(pPr, 'ind');
  const raw = attr(ind, 'left') ?? attr(ind, 'start');
  if (raw === undefined) return undefined;
  const value = Number.parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

function readParagraph(p: XmlNode, doc: LoadedDocument): DocParagraph {
  const pPr = findChild(p, 'pPr');
  const styleId = attr(findChild(pPr, 'pStyle'), 'val');
  const styleName = styleId === undefined ? doc.styles.defaultParagraphStyle : doc.styles.names.get(styleId) ?? styleId;
  const bottom = findChild(findChild(pPr, 'pBdr'), 'bottom');
  const bottomStyle = attr(bottom, 'val');

  const collector: RunCollector = { runs: [], imageCount: 0, footnoteCount: 0, hyperlinkCount: 0 };
  collectRuns(p, collector);

  const paragraph: DocParagraph = {
    kind: 'paragraph',
    styleName,
    runs: collector.runs,
    bottomBorder: bottom !== undefined && bottomStyle !== 'none' && bottomStyle !== 'nil',
    imageCount: collector.imageCount,
    footnoteCount: collector.footnoteCount,
    hyperlinkCount: collector.hyperlinkCount,
  };

  const indentLeft = readIndent(pPr);
  if (indentLeft !== undefined) paragraph.indentLeft = indentLeft;
  const list = readListInfo(pPr, doc);
  if (list) paragraph.list = list;

  return paragraph;
}

/** Plain text of a paragraph: its runs joined without separators */
export function paragraphText(paragraph: DocParagraph): string {
  return paragraph.runs.map((run) => run.text).join('');
}

function readTable(tbl: XmlNode, doc: LoadedDocument): DocTable {
  let nestedTableCount = 0;

  const rows = findChildren(tbl, 'tr').map((tr) => ({
    cells: findChildren(tr, 'tc').map((tc) => {
      const texts: string[] = [];
      for (const child of childNodes(tc)) {
        const name = nodeName(child);
        if (name === 'p') {
          const text = paragraphText(readParagraph(child, doc)).trim();
          if (text) texts.push(text);
        } else if (name === 'tbl') {
          nestedTableCount++;
        }
      }
      return texts.join(' ');
    }),
  }));

  return { kind: 'table', rows, nestedTableCount };
}

function collectBlocks(container: XmlNode, doc: LoadedDocument, blocks: DocBlock[]): void {
  for (const child of childNodes(container)) {
    switch (nodeName(child)) {
      case 'p':
        blocks.push(readParagraph(child, doc));
        break;
      case 'tbl':
        blocks.push(readTable(child, doc));
        break;
      case 'sdt': {
        const content = findChild(child, 'sdtContent');
        if (content) collectBlocks(content, doc, blocks);
        break;
      }
      default:
        break;
    }
  }
}

/**
 * Top-level paragraphs and tables in document order
 */
export function listBlocks(doc: LoadedDocument): DocBlock[] {
  const blocks: DocBlock[] = [];
  collectBlocks(doc.body, doc, blocks);
  return blocks;
}
