import type { Paragraph } from "./paragraph";
import type { Container, RunProperties } from "./types";

export type NodeType<T extends DocxNode> = abstract new (...args: never[]) => T;

export abstract class DocxNode {
  abstract readonly kind: string;
  parent: DocxNode | null = null;
  private ownContainer: Container | null = null;

  /** The part this node was loaded from, found on the root of its tree. */
  get container(): Container | null {
    for (let node: DocxNode | null = this; node; node = node.parent) {
      if (node.ownContainer) {
        return node.ownContainer;
      }
    }
    return null;
  }

  protected setContainer(container: Container | null): void {
    this.ownContainer = container;
  }

  /** Ancestors that are instances of `type`, nearest first, produced as they are pulled. */
  *nearestAncestors<T extends DocxNode>(type: NodeType<T>): Generator<T, void, undefined> {
    for (let node = this.parent; node; node = node.parent) {
      if (node instanceof type) {
        yield node;
      }
    }
  }
}

export abstract class ParentNode<C extends DocxNode> extends DocxNode {
  readonly children: C[] = [];

  constructor(children: Iterable<C> = []) {
    super();
    // Snapshot first: appending takes each child out of its previous parent's array
    for (const child of [...children]) {
      this.append(child);
    }
  }

  /** Adds `child` at the end, taking it out of the node that held it before. */
  append(child: C): this {
    const previous = child.parent;
    if (previous instanceof ParentNode) {
      const index = previous.children.indexOf(child);
      if (index !== -1) {
        previous.removeChildren(index, 1);
      }
    }
    child.parent = this;
    this.children.push(child);
    return this;
  }

  removeChildren(start: number, count: number): C[] {
    const removed = this.children.splice(start, count);
    for (const child of removed) {
      child.parent = null;
    }
    return removed;
  }
}

// Run content

export class Text extends DocxNode {
  readonly kind = "text";
  value: string;

  constructor(value = "") {
    super();
    this.value = value;
  }
}

export class TabChar extends DocxNode {
  readonly kind = "tab";
}

export class Break extends DocxNode {
  readonly kind = "break";
  /** `page`, `column` or `textWrapping`; null for a plain line break. */
  readonly breakType: string | null;

  constructor(breakType: string | null = null) {
    super();
    this.breakType = breakType;
  }
}

export class DeletedText extends DocxNode {
  readonly kind = "deletedText";
  value: string;

  constructor(value = "") {
    super();
    this.value = value;
  }
}

export type RunContent = Text | TabChar | Break | DeletedText;

export class Run extends ParentNode<RunContent> {
  readonly kind = "run";
  properties: RunProperties | null;

  constructor(children: Iterable<RunContent> = [], properties: RunProperties | null = null) {
    super(children);
    this.properties = properties;
  }
}

// Inline containers of runs

export interface RevisionInfo {
  author?: string | null;
  date?: string | null;
}

export class Hyperlink extends ParentNode<Run> {
  readonly kind = "hyperlink";
  readonly relationshipId: string | null;
  readonly anchor: string | null;

  constructor(children: Iterable<Run> = [], options: { relationshipId?: string | null; anchor?: string | null } = {}) {
    super(children);
    this.relationshipId = options.relationshipId ?? null;
    this.anchor = options.anchor ?? null;
  }
}

export class SmartTagRun extends ParentNode<Run> {
  readonly kind = "smartTag";
  readonly element: string | null;

  constructor(children: Iterable<Run> = [], element: string | null = null) {
    super(children);
    this.element = element;
  }
}

export class InsertedRun extends ParentNode<Run> {
  readonly kind = "insertedRun";
  readonly revision: RevisionInfo;

  constructor(children: Iterable<Run> = [], revision: RevisionInfo = {}) {
    super(children);
    this.revision = revision;
  }
}

export class DeletedRun extends ParentNode<Run> {
  readonly kind = "deletedRun";
  readonly revision: RevisionInfo;

  constructor(children: Iterable<Run> = [], revision: RevisionInfo = {}) {
    super(children);
    this.revision = revision;
  }
}

/** Inline content control (`w:sdt` inside a paragraph). */
export class SdtRun extends ParentNode<Run> {
  readonly kind = "sdtRun";
  readonly tag: string | null;

  constructor(children: Iterable<Run> = [], tag: string | null = null) {
    super(children);
    this.tag = tag;
  }
}

export type ParagraphChild = Run | Hyperlink | SmartTagRun | InsertedRun | DeletedRun | SdtRun;

// Blocks

export type BlockNode = Paragraph | Table | SdtBlock;

export interface ContentControlOptions {
  tag?: string | null;
  alias?: string | null;
}

/** A `w:sdt` content control wrapping blocks, table rows or table cells. */
export abstract class ContentControl<C extends DocxNode> extends ParentNode<C> {
  readonly tag: string | null;
  readonly alias: string | null;

  constructor(children: Iterable<C> = [], options: ContentControlOptions = {}) {
    super(children);
    this.tag = options.tag ?? null;
    this.alias = options.alias ?? null;
  }
}

export class TableCell extends ParentNode<BlockNode> {
  readonly kind = "tableCell";
}

/** Content control around one or more cells of a row. */
export class SdtCell extends ContentControl<TableCell | SdtCell> {
  readonly kind = "sdtCell";
}

export class TableRow extends ParentNode<TableCell | SdtCell> {
  readonly kind = "tableRow";
}

/** Content control around one or more rows of a table. */
export class SdtRow extends ContentControl<TableRow | SdtRow> {
  readonly kind = "sdtRow";
}

export class Table extends ParentNode<TableRow | SdtRow> {
  readonly kind = "table";
}

/** Block-level content control (`w:sdt` between paragraphs). */
export class SdtBlock extends ContentControl<BlockNode> {
  readonly kind = "sdtBlock";
}

export class Body extends ParentNode<BlockNode> {
  readonly kind = "body";

  constructor(container: Container | null, children: Iterable<BlockNode> = []) {
    super(children);
    this.setContainer(container);
  }
}

export class Footnote extends ParentNode<BlockNode> {
  readonly kind = "footnote";
  readonly footnoteId: string;

  constructor(footnoteId: string, container: Container | null, children: Iterable<BlockNode> = []) {
    super(children);
    this.footnoteId = footnoteId;
    this.setContainer(container);
  }
}

function* rowParagraphs(rows: Iterable<TableRow | SdtRow>): Generator<Paragraph, void, undefined> {
  for (const row of rows) {
    if (row.kind === "sdtRow") {
      yield* rowParagraphs(row.children);
      continue;
    }
    yield* cellParagraphs(row.children);
  }
}

function* cellParagraphs(cells: Iterable<TableCell | SdtCell>): Generator<Paragraph, void, undefined> {
  for (const cell of cells) {
    if (cell.kind === "sdtCell") {
      yield* cellParagraphs(cell.children);
      continue;
    }
    yield* iterateParagraphs(cell.children);
  }
}

/** Paragraphs in document order, including those nested in tables and content controls. */
export function* iterateParagraphs(blocks: Iterable<BlockNode>): Generator<Paragraph, void, undefined> {
  for (const block of blocks) {
    switch (block.kind) {
      case "paragraph":
        yield block;
        break;
      case "table":
        yield* rowParagraphs(block.children);
        break;
      case "sdtBlock":
        yield* iterateParagraphs(block.children);
        break;
    }
  }
}
