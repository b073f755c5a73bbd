import JSZip from "jszip";
import {
  Body,
  Break,
  DeletedRun,
  DeletedText,
  Footnote,
  Hyperlink,
  InsertedRun,
  Run,
  SdtBlock,
  SdtCell,
  SdtRow,
  SdtRun,
  SmartTagRun,
  TabChar,
  Table,
  TableCell,
  TableRow,
  Text,
  iterateParagraphs,
  type BlockNode,
  type ContentControlOptions,
  type ParagraphChild,
  type RevisionInfo,
  type RunContent,
} from "./documentTree";
import { DocxFormatError } from "./errors";
import { NumberingDefinitionsPart, parseNumbering } from "./numbering";
import { Paragraph } from "./paragraph";
import { StyleDefinitionsPart, parseStyles } from "./styles";
import type { Container, ParagraphProperties, RunProperties } from "./types";
import {
  findChild,
  findChildren,
  getAttribute,
  getChildValue,
  isToggleOn,
  parseXml,
  type XmlElement,
} from "./xmlElements";

const DOCUMENT_PATH = "word/document.xml";
const STYLES_PATH = "word/styles.xml";
const NUMBERING_PATH = "word/numbering.xml";
const FOOTNOTES_PATH = "word/footnotes.xml";

const SEPARATOR_FOOTNOTE_TYPES = new Set(["separator", "continuationSeparator", "continuationNotice"]);

export interface LoadOptions {
  /** Log part and block counts while loading. */
  debug?: boolean;
}

/** The main document part: the body's container, holding the shared tables. */
export class MainDocumentPart implements Container {
  readonly styleDefinitionsPart: StyleDefinitionsPart | null;
  readonly numberingDefinitionsPart: NumberingDefinitionsPart | null;

  constructor(
    styleDefinitionsPart: StyleDefinitionsPart | null = null,
    numberingDefinitionsPart: NumberingDefinitionsPart | null = null,
  ) {
    this.styleDefinitionsPart = styleDefinitionsPart;
    this.numberingDefinitionsPart = numberingDefinitionsPart;
  }
}

/** Container of footnote paragraphs. It reaches neither the style nor the numbering table. */
export class FootnotesPart implements Container {
  readonly styleDefinitionsPart = null;
  readonly numberingDefinitionsPart = null;
}

export class WordDocument {
  readonly mainDocumentPart: MainDocumentPart;
  readonly body: Body;
  readonly footnotesPart: FootnotesPart | null;
  readonly footnotes: Footnote[];

  constructor(mainDocumentPart: MainDocumentPart, body: Body, footnotesPart: FootnotesPart | null = null, footnotes: Footnote[] = []) {
    this.mainDocumentPart = mainDocumentPart;
    this.body = body;
    this.footnotesPart = footnotesPart;
    this.footnotes = footnotes;
  }

  /** Body paragraphs in document order. */
  paragraphs(): Generator<Paragraph, void, undefined> {
    return iterateParagraphs(this.body.children);
  }
}

function buildRunProperties(rPr: XmlElement): RunProperties {
  let fontSize: number | undefined;
  const szVal = getChildValue(rPr, "w:sz");
  if (szVal !== null) {
    // w:sz is in half-points
    const halfPoints = parseInt(szVal, 10);
    if (!Number.isNaN(halfPoints)) {
      fontSize = halfPoints / 2;
    }
  }
  return {
    isBold: isToggleOn(findChild(rPr, "w:b")),
    isItalic: isToggleOn(findChild(rPr, "w:i")),
    fontSize,
  };
}

function buildRun(rNode: XmlElement): Run {
  const contents: RunContent[] = [];
  for (const child of rNode.children) {
    switch (child.name) {
      case "w:t":
        contents.push(new Text(child.text));
        break;
      case "w:tab":
        contents.push(new TabChar());
        break;
      case "w:br":
        contents.push(new Break(getAttribute(child, "w:type")));
        break;
      case "w:cr":
        contents.push(new Break());
        break;
      case "w:delText":
        contents.push(new DeletedText(child.text));
        break;
    }
  }
  const rPr = findChild(rNode, "w:rPr");
  return new Run(contents, rPr ? buildRunProperties(rPr) : null);
}

function buildRuns(parent: XmlElement): Run[] {
  return findChildren(parent, "w:r").map(buildRun);
}

function revisionInfo(node: XmlElement): RevisionInfo {
  return {
    author: getAttribute(node, "w:author"),
    date: getAttribute(node, "w:date"),
  };
}

function sdtTag(sdtNode: XmlElement): string | null {
  const sdtPr = findChild(sdtNode, "w:sdtPr");
  return sdtPr ? getChildValue(sdtPr, "w:tag") : null;
}

function buildParagraphChild(node: XmlElement): ParagraphChild | null {
  switch (node.name) {
    case "w:r":
      return buildRun(node);
    case "w:hyperlink":
      return new Hyperlink(buildRuns(node), {
        relationshipId: getAttribute(node, "r:id"),
        anchor: getAttribute(node, "w:anchor"),
      });
    case "w:smartTag":
      return new SmartTagRun(buildRuns(node), getAttribute(node, "w:element"));
    case "w:ins":
      return new InsertedRun(buildRuns(node), revisionInfo(node));
    case "w:del":
      return new DeletedRun(buildRuns(node), revisionInfo(node));
    case "w:sdt": {
      const content = findChild(node, "w:sdtContent");
      return new SdtRun(content ? buildRuns(content) : [], sdtTag(node));
    }
    default:
      // w:pPr, bookmarks, proofing marks
      return null;
  }
}

function buildParagraphProperties(pPr: XmlElement): ParagraphProperties {
  const numPr = findChild(pPr, "w:numPr");
  return {
    parentStyle: getChildValue(pPr, "w:pStyle"),
    justification: getChildValue(pPr, "w:jc"),
    numberingProperties: numPr
      ? {
          numId: getChildValue(numPr, "w:numId"),
          levelId: getChildValue(numPr, "w:ilvl"),
        }
      : null,
  };
}

function buildParagraph(pNode: XmlElement): Paragraph {
  const pPr = findChild(pNode, "w:pPr");
  const paragraph = new Paragraph(pPr ? buildParagraphProperties(pPr) : null);
  for (const child of pNode.children) {
    const inline = buildParagraphChild(child);
    if (inline) {
      paragraph.append(inline);
    }
  }
  return paragraph;
}

function contentControlOptions(sdtNode: XmlElement): ContentControlOptions {
  const sdtPr = findChild(sdtNode, "w:sdtPr");
  return {
    tag: sdtTag(sdtNode),
    alias: sdtPr ? getChildValue(sdtPr, "w:alias") : null,
  };
}

function sdtContent(sdtNode: XmlElement): XmlElement[] {
  return findChild(sdtNode, "w:sdtContent")?.children ?? [];
}

function buildCells(nodes: XmlElement[]): Array<TableCell | SdtCell> {
  const cells: Array<TableCell | SdtCell> = [];
  for (const node of nodes) {
    switch (node.name) {
      case "w:tc":
        cells.push(new TableCell(buildBlocks(node.children)));
        break;
      case "w:sdt":
        cells.push(new SdtCell(buildCells(sdtContent(node)), contentControlOptions(node)));
        break;
    }
  }
  return cells;
}

function buildRows(nodes: XmlElement[]): Array<TableRow | SdtRow> {
  const rows: Array<TableRow | SdtRow> = [];
  for (const node of nodes) {
    switch (node.name) {
      case "w:tr":
        rows.push(new TableRow(buildCells(node.children)));
        break;
      case "w:sdt":
        rows.push(new SdtRow(buildRows(sdtContent(node)), contentControlOptions(node)));
        break;
    }
  }
  return rows;
}

function buildTable(tblNode: XmlElement): Table {
  return new Table(buildRows(tblNode.children));
}

function buildSdtBlock(sdtNode: XmlElement): SdtBlock {
  return new SdtBlock(buildBlocks(sdtContent(sdtNode)), contentControlOptions(sdtNode));
}

function buildBlocks(nodes: XmlElement[]): BlockNode[] {
  const blocks: BlockNode[] = [];
  for (const node of nodes) {
    switch (node.name) {
      case "w:p":
        blocks.push(buildParagraph(node));
        break;
      case "w:tbl":
        blocks.push(buildTable(node));
        break;
      case "w:sdt":
        blocks.push(buildSdtBlock(node));
        break;
      // Ignore other elements like w:sectPr
    }
  }
  return blocks;
}

function findBody(xml: string): XmlElement {
  const document = parseXml(xml).find((element) => element.name === "w:document");
  if (!document) {
    throw new DocxFormatError("Could not find document element");
  }
  const body = findChild(document, "w:body");
  if (!body) {
    throw new DocxFormatError("Could not find document body");
  }
  return body;
}

function buildFootnotes(xml: string, container: FootnotesPart): Footnote[] {
  const root = parseXml(xml).find((element) => element.name === "w:footnotes");
  if (!root) {
    return [];
  }
  const footnotes: Footnote[] = [];
  for (const footnoteNode of findChildren(root, "w:footnote")) {
    const footnoteType = getAttribute(footnoteNode, "w:type");
    if (footnoteType && SEPARATOR_FOOTNOTE_TYPES.has(footnoteType)) continue;
    const footnoteId = getAttribute(footnoteNode, "w:id") ?? String(footnotes.length);
    footnotes.push(new Footnote(footnoteId, container, buildBlocks(footnoteNode.children)));
  }
  return footnotes;
}

async function readPart(zip: JSZip, path: string): Promise<string | null> {
  const file = zip.file(path);
  return file ? file.async("string") : null;
}

/**
 * Reads a .docx archive into a node tree. The body is attached to the main
 * document part; footnotes get their own part without style or numbering
 * tables.
 */
export async function loadDocx(buffer: Buffer | Uint8Array, options: LoadOptions = {}): Promise<WordDocument> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (error) {
    throw new DocxFormatError("Could not open document archive", { cause: error });
  }

  const documentXml = await readPart(zip, DOCUMENT_PATH);
  if (documentXml === null) {
    throw new DocxFormatError(`Could not find ${DOCUMENT_PATH}`);
  }
  const stylesXml = await readPart(zip, STYLES_PATH);
  const numberingXml = await readPart(zip, NUMBERING_PATH);
  const footnotesXml = await readPart(zip, FOOTNOTES_PATH);

  const styleDefinitionsPart = stylesXml === null ? null : parseStyles(stylesXml);
  const numberingDefinitionsPart = numberingXml === null ? null : parseNumbering(numberingXml);
  const mainDocumentPart = new MainDocumentPart(styleDefinitionsPart, numberingDefinitionsPart);

  const body = new Body(mainDocumentPart, buildBlocks(findBody(documentXml).children));

  let footnotesPart: FootnotesPart | null = null;
  let footnotes: Footnote[] = [];
  if (footnotesXml !== null) {
    footnotesPart = new FootnotesPart();
    footnotes = buildFootnotes(footnotesXml, footnotesPart);
  }

  if (options.debug) {
    console.log(
      `[docxExtractor] Loaded document: ${body.children.length} blocks, ` +
        `${styleDefinitionsPart?.size ?? 0} styles, ` +
        `numbering ${numberingDefinitionsPart ? "present" : "absent"}, ` +
        `${footnotes.length} footnotes`,
    );
  }

  return new WordDocument(mainDocumentPart, body, footnotesPart, footnotes);
}
