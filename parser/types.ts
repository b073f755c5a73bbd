import type { Style } from "./styles";
import type { NumberingDefinition } from "./numbering";

export type StyleType = "paragraph" | "character" | "table" | "numbering";

export interface NumberingProperties {
  numId: string | null;
  levelId: string | null;
}

export interface ParagraphProperties {
  /** Style id from `w:pStyle`. */
  parentStyle?: string | null;
  numberingProperties?: NumberingProperties | null;
  justification?: string | null;
}

export interface RunProperties {
  isBold?: boolean;
  isItalic?: boolean;
  fontSize?: number;
}

export interface StyleChainSource {
  getStyleChainStack(styleType: StyleType, styleId: string): Iterable<Style>;
}

export interface NumberingTable {
  getNumberingDefinition(numId: string): NumberingDefinition | null;
}

export interface NumberingSource {
  readonly numbering: NumberingTable;
}

/**
 * The part a node tree belongs to. Footnotes are loaded into a container
 * that has neither table.
 */
export interface Container {
  readonly styleDefinitionsPart?: StyleChainSource | null;
  readonly numberingDefinitionsPart?: NumberingSource | null;
}

export type SemanticBlockType =
  | "HEADING"
  | "SUBHEADING"
  | "PARAGRAPH"
  | "LIST_ITEM"
  | "TABLE_TEXT"
  | "FOOTNOTE";

export interface SemanticBlock {
  type: SemanticBlockType;
  text: string;
  paragraphIndex: number;
  inStructuredBlock: boolean;
  styleId?: string;
  headingLevel?: number;
  listLevel?: number;
  numId?: string;
  numberFormat?: string;
  listMarker?: string; // manual marker stripped from the text, e.g. "1."
  footnoteId?: string;
}
