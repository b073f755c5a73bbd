import { ContentControl, ParentNode, type ParagraphChild } from "./documentTree";
import type { NumberingDefinition, NumberingLevel } from "./numbering";
import { getNumberOfInitialTabs, getText, removeInitialTabs, stripTextFromLeft } from "./paragraphText";
import type { Style } from "./styles";
import type { NumberingTable, ParagraphProperties } from "./types";

interface DefinitionCacheEntry {
  table: NumberingTable;
  numId: string;
  definition: NumberingDefinition | null;
}

interface LevelCacheEntry {
  definition: NumberingDefinition;
  levelId: string;
  level: NumberingLevel | null;
}

export class Paragraph extends ParentNode<ParagraphChild> {
  readonly kind = "paragraph";
  properties: ParagraphProperties | null;

  // undefined means "not computed yet"; null is a computed absence
  private effectivePropertiesCache: ParagraphProperties | null | undefined = undefined;
  private headingStyleCache: Style | null | undefined = undefined;
  private definitionCache: DefinitionCacheEntry | null = null;
  private levelCache: LevelCacheEntry | null = null;

  constructor(properties: ParagraphProperties | null = null, children: Iterable<ParagraphChild> = []) {
    super(children);
    this.properties = properties;
  }

  /**
   * The paragraph's own properties, memoized on first read. Style properties
   * are not merged in yet.
   *
   * Later changes to `properties` are not picked up; assign this property to
   * force a value.
   */
  get effectiveProperties(): ParagraphProperties | null {
    if (this.effectivePropertiesCache === undefined) {
      // TODO merge the properties of the style chain, the way run properties are resolved
      this.effectivePropertiesCache = this.properties;
    }
    return this.effectivePropertiesCache;
  }

  set effectiveProperties(properties: ParagraphProperties | null) {
    this.effectivePropertiesCache = properties;
  }

  /**
   * The paragraph's style followed by the styles it is based on, nearest
   * first. Empty when the paragraph has no style or its container has no style
   * table, as in footnotes.
   */
  *getStyleChainStack(): Generator<Style, void, undefined> {
    const parentStyle = this.properties?.parentStyle;
    if (!parentStyle) {
      return;
    }
    const part = this.container?.styleDefinitionsPart;
    if (!part) {
      return;
    }
    yield* part.getStyleChainStack("paragraph", parentStyle);
  }

  /**
   * First heading style of the style chain, read once. Assigning it replaces
   * the cached value and it is never recomputed after that.
   */
  get headingStyle(): Style | null {
    if (this.headingStyleCache === undefined) {
      let headingStyle: Style | null = null;
      for (const style of this.getStyleChainStack()) {
        if (style.isAHeading()) {
          headingStyle = style;
          break;
        }
      }
      this.headingStyleCache = headingStyle;
    }
    return this.headingStyleCache;
  }

  set headingStyle(style: Style | null) {
    this.headingStyleCache = style;
  }

  getNumberingDefinition(): NumberingDefinition | null {
    const table = this.container?.numberingDefinitionsPart?.numbering;
    if (!table) {
      return null;
    }
    const numId = this.effectiveProperties?.numberingProperties?.numId;
    if (numId === null || numId === undefined) {
      return null;
    }

    const cached = this.definitionCache;
    if (cached && cached.table === table && cached.numId === numId) {
      return cached.definition;
    }
    const definition = table.getNumberingDefinition(numId);
    this.definitionCache = { table, numId, definition };
    return definition;
  }

  getNumberingLevel(): NumberingLevel | null {
    const definition = this.getNumberingDefinition();
    if (!definition) {
      return null;
    }
    const levelId = this.effectiveProperties?.numberingProperties?.levelId;
    if (levelId === null || levelId === undefined) {
      return null;
    }

    const cached = this.levelCache;
    if (cached && cached.definition === definition && cached.levelId === levelId) {
      return cached.level;
    }
    const level = definition.getLevel(levelId);
    this.levelCache = { definition, levelId, level };
    return level;
  }

  /** True inside a content control, whether it wraps blocks, table rows or table cells. */
  hasStructuredDocumentParent(): boolean {
    return this.nearestAncestors(ContentControl).next().done !== true;
  }

  getText(): string {
    return getText(this.children);
  }

  stripTextFromLeft(prefix: string): void {
    stripTextFromLeft(this.children, prefix);
  }

  removeInitialTabs(): number {
    return removeInitialTabs(this.children);
  }

  getNumberOfInitialTabs(): number {
    return getNumberOfInitialTabs(this.children);
  }
}
