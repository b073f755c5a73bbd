import { StyleChainCycleError } from "./errors";
import type { StyleChainSource, StyleType } from "./types";
import { findChildren, getAttribute, getChildValue, parseXml } from "./xmlElements";

const STYLE_TYPES: readonly StyleType[] = ["paragraph", "character", "table", "numbering"];

export interface StyleInit {
  styleId: string;
  styleType?: StyleType;
  name?: string | null;
  parentStyle?: string | null;
}

export class Style {
  readonly styleId: string;
  readonly styleType: StyleType;
  readonly name: string | null;
  /** Id of the `w:basedOn` style. */
  readonly parentStyle: string | null;

  constructor(init: StyleInit) {
    this.styleId = init.styleId;
    this.styleType = init.styleType ?? "paragraph";
    this.name = init.name ?? null;
    this.parentStyle = init.parentStyle ?? null;
  }

  isAHeading(): boolean {
    if (!this.name) {
      return false;
    }
    return this.name.toLowerCase().startsWith("heading");
  }

  /** Outline level taken from the style name ("heading 2" is 2); null for other styles. */
  get headingLevel(): number | null {
    if (!this.isAHeading()) {
      return null;
    }
    const levelMatch = this.name?.match(/(\d+)/);
    return levelMatch ? parseInt(levelMatch[1], 10) : 1;
  }
}

export class StyleDefinitionsPart implements StyleChainSource {
  private readonly stylesByType = new Map<StyleType, Map<string, Style>>();

  constructor(styles: Iterable<Style> = []) {
    for (const style of styles) {
      this.addStyle(style);
    }
  }

  addStyle(style: Style): void {
    let styles = this.stylesByType.get(style.styleType);
    if (!styles) {
      styles = new Map();
      this.stylesByType.set(style.styleType, styles);
    }
    styles.set(style.styleId, style);
  }

  getStyle(styleType: StyleType, styleId: string): Style | null {
    return this.stylesByType.get(styleType)?.get(styleId) ?? null;
  }

  /**
   * Walks from `styleId` through its `basedOn` parents, nearest first. Styles
   * are looked up only as the sequence is pulled. Stops at a style with no
   * parent or an unknown parent id.
   */
  *getStyleChainStack(styleType: StyleType, styleId: string): Generator<Style, void, undefined> {
    const visited: string[] = [];
    let style = this.getStyle(styleType, styleId);
    while (style) {
      if (visited.includes(style.styleId)) {
        throw new StyleChainCycleError(styleType, [...visited, style.styleId]);
      }
      visited.push(style.styleId);
      yield style;
      style = style.parentStyle ? this.getStyle(styleType, style.parentStyle) : null;
    }
  }

  get size(): number {
    let count = 0;
    for (const styles of this.stylesByType.values()) {
      count += styles.size;
    }
    return count;
  }
}

function toStyleType(value: string | null): StyleType | null {
  if (value === null) {
    return "paragraph";
  }
  return STYLE_TYPES.find((type) => type === value) ?? null;
}

/** Builds the style table from `word/styles.xml`. */
export function parseStyles(xml: string): StyleDefinitionsPart {
  const part = new StyleDefinitionsPart();
  const root = parseXml(xml).find((element) => element.name === "w:styles");
  if (!root) {
    return part;
  }

  for (const styleNode of findChildren(root, "w:style")) {
    const styleId = getAttribute(styleNode, "w:styleId");
    const styleType = toStyleType(getAttribute(styleNode, "w:type"));
    if (!styleId || !styleType) continue;

    part.addStyle(
      new Style({
        styleId,
        styleType,
        name: getChildValue(styleNode, "w:name"),
        parentStyle: getChildValue(styleNode, "w:basedOn"),
      }),
    );
  }

  return part;
}
