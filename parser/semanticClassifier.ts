import { TableCell, iterateParagraphs, type ParagraphChild, type Run } from "./documentTree";
import type { WordDocument } from "./docxExtractor";
import type { Paragraph } from "./paragraph";
import type { SemanticBlock } from "./types";

// Typed-in list markers: "1.", "2)", bullets, dashes, asterisks
const MANUAL_LIST_MARKER = /^(\d+[.)]|[•\-*])\s+/;

function unhandledChild(child: never): never {
  throw new Error(`Unhandled paragraph child: ${String(child)}`);
}

function runText(run: Run): string {
  let text = "";
  for (const content of run.children) {
    switch (content.kind) {
      case "text":
        text += content.value;
        break;
      case "tab":
        text += "\t";
        break;
      case "break":
        // Page breaks don't split lines of text
        if (content.breakType !== "page") {
          text += "\n";
        }
        break;
      case "deletedText":
        break;
    }
  }
  return text;
}

function childText(child: ParagraphChild): string {
  switch (child.kind) {
    case "run":
      return runText(child);
    case "hyperlink":
    case "smartTag":
    case "insertedRun":
    case "sdtRun":
      return child.children.map(runText).join("");
    case "deletedRun":
      return "";
    default:
      return unhandledChild(child);
  }
}

/**
 * Text as a reader sees it: every inline variant except deleted revisions,
 * with tabs as "\t" and line breaks as "\n".
 */
export function getFullText(paragraph: Paragraph): string {
  return paragraph.children.map(childText).join("");
}

function isInTable(paragraph: Paragraph): boolean {
  return paragraph.nearestAncestors(TableCell).next().done !== true;
}

/**
 * Classifies one paragraph. List items have their leading tabs removed, and a
 * typed-in list marker is stripped from the runs, so this edits the paragraph.
 * Returns null for paragraphs without visible text.
 */
export function classifyParagraph(paragraph: Paragraph, paragraphIndex: number, footnoteId?: string): SemanticBlock | null {
  if (!getFullText(paragraph).trim()) {
    return null;
  }

  const block: SemanticBlock = {
    type: "PARAGRAPH",
    text: "",
    paragraphIndex,
    inStructuredBlock: paragraph.hasStructuredDocumentParent(),
  };
  const styleId = paragraph.properties?.parentStyle;
  if (styleId) {
    block.styleId = styleId;
  }

  const finish = (): SemanticBlock => {
    block.text = getFullText(paragraph).trim();
    return block;
  };

  if (footnoteId !== undefined) {
    block.type = "FOOTNOTE";
    block.footnoteId = footnoteId;
    return finish();
  }

  if (isInTable(paragraph)) {
    block.type = "TABLE_TEXT";
    return finish();
  }

  const headingStyle = paragraph.headingStyle;
  if (headingStyle) {
    const headingLevel = headingStyle.headingLevel ?? 1;
    block.type = headingLevel === 1 ? "HEADING" : "SUBHEADING";
    block.headingLevel = headingLevel;
    return finish();
  }

  const level = paragraph.getNumberingLevel();
  const definition = paragraph.getNumberingDefinition();
  if (level && definition) {
    paragraph.removeInitialTabs();
    block.type = "LIST_ITEM";
    block.listLevel = parseInt(level.levelId, 10) || 0;
    block.numId = definition.numId;
    block.numberFormat = level.numberFormat;
    return finish();
  }

  const markerMatch = paragraph.getText().match(MANUAL_LIST_MARKER);
  if (markerMatch && getFullText(paragraph).trimStart().startsWith(markerMatch[1])) {
    paragraph.stripTextFromLeft(markerMatch[0]);
    paragraph.removeInitialTabs();
    block.type = "LIST_ITEM";
    block.listLevel = 0;
    block.listMarker = markerMatch[1];
    return finish();
  }

  return finish();
}

/** Body paragraphs in document order, then footnote paragraphs. */
export function classifyDocument(document: WordDocument): SemanticBlock[] {
  const result: SemanticBlock[] = [];
  let paragraphIndex = 0;

  for (const paragraph of document.paragraphs()) {
    const block = classifyParagraph(paragraph, paragraphIndex++);
    if (block) {
      result.push(block);
    }
  }

  for (const footnote of document.footnotes) {
    for (const paragraph of iterateParagraphs(footnote.children)) {
      const block = classifyParagraph(paragraph, paragraphIndex++, footnote.footnoteId);
      if (block) {
        result.push(block);
      }
    }
  }

  return result;
}
