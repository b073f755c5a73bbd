import type { NumberingSource, NumberingTable } from "./types";
import { findChild, findChildren, getAttribute, getChildValue, parseXml, type XmlElement } from "./xmlElements";

export interface NumberingLevelInit {
  levelId: string;
  start?: number;
  numberFormat?: string;
  levelText?: string;
  paragraphStyle?: string | null;
}

export class NumberingLevel {
  readonly levelId: string;
  readonly start: number;
  readonly numberFormat: string;
  readonly levelText: string;
  /** Paragraph style linked to this level through `w:pStyle`. */
  readonly paragraphStyle: string | null;

  constructor(init: NumberingLevelInit) {
    this.levelId = init.levelId;
    this.start = init.start ?? 0;
    this.numberFormat = init.numberFormat ?? "decimal";
    this.levelText = init.levelText ?? "";
    this.paragraphStyle = init.paragraphStyle ?? null;
  }

  isBullet(): boolean {
    return this.numberFormat === "bullet";
  }

  withStart(start: number): NumberingLevel {
    return new NumberingLevel({
      levelId: this.levelId,
      start,
      numberFormat: this.numberFormat,
      levelText: this.levelText,
      paragraphStyle: this.paragraphStyle,
    });
  }
}

export class NumberingDefinition {
  readonly numId: string;
  readonly abstractNumId: string | null;
  private readonly levels = new Map<string, NumberingLevel>();

  constructor(numId: string, levels: Iterable<NumberingLevel> = [], abstractNumId: string | null = null) {
    this.numId = numId;
    this.abstractNumId = abstractNumId;
    for (const level of levels) {
      this.levels.set(level.levelId, level);
    }
  }

  getLevel(levelId: string): NumberingLevel | null {
    return this.levels.get(levelId) ?? null;
  }

  get levelIds(): string[] {
    return [...this.levels.keys()];
  }
}

export interface LevelOverride {
  levelId: string;
  startOverride: number | null;
  level: NumberingLevel | null;
}

interface NumberingInstance {
  abstractNumId: string;
  overrides: LevelOverride[];
}

/**
 * The `w:num` / `w:abstractNum` table of a document. A definition id names a
 * `w:num`, which points at an abstract definition and may override some of
 * its levels; definitions are assembled the first time they are asked for.
 */
export class Numbering implements NumberingTable {
  private readonly abstractLevels = new Map<string, NumberingLevel[]>();
  private readonly instances = new Map<string, NumberingInstance>();
  private readonly definitions = new Map<string, NumberingDefinition | null>();

  addAbstractDefinition(abstractNumId: string, levels: NumberingLevel[]): void {
    this.abstractLevels.set(abstractNumId, levels);
    this.definitions.clear();
  }

  addInstance(numId: string, abstractNumId: string, overrides: LevelOverride[] = []): void {
    this.instances.set(numId, { abstractNumId, overrides });
    this.definitions.delete(numId);
  }

  getNumberingDefinition(numId: string): NumberingDefinition | null {
    const cached = this.definitions.get(numId);
    if (cached !== undefined) {
      return cached;
    }
    const definition = this.buildDefinition(numId);
    this.definitions.set(numId, definition);
    return definition;
  }

  private buildDefinition(numId: string): NumberingDefinition | null {
    const instance = this.instances.get(numId);
    if (!instance) {
      return null;
    }
    const abstractLevels = this.abstractLevels.get(instance.abstractNumId);
    if (!abstractLevels) {
      return null;
    }

    const levels = new Map<string, NumberingLevel>();
    for (const level of abstractLevels) {
      levels.set(level.levelId, level);
    }
    for (const override of instance.overrides) {
      if (override.level) {
        levels.set(override.levelId, override.level);
        continue;
      }
      const base = levels.get(override.levelId);
      if (base && override.startOverride !== null) {
        levels.set(override.levelId, base.withStart(override.startOverride));
      }
    }
    return new NumberingDefinition(numId, levels.values(), instance.abstractNumId);
  }
}

export class NumberingDefinitionsPart implements NumberingSource {
  readonly numbering: Numbering;

  constructor(numbering: Numbering = new Numbering()) {
    this.numbering = numbering;
  }
}

function parseInteger(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

function parseLevel(lvlNode: XmlElement, fallbackLevelId?: string): NumberingLevel | null {
  const levelId = getAttribute(lvlNode, "w:ilvl") ?? fallbackLevelId;
  if (levelId === undefined) {
    return null;
  }
  return new NumberingLevel({
    levelId,
    start: parseInteger(getChildValue(lvlNode, "w:start")) ?? undefined,
    numberFormat: getChildValue(lvlNode, "w:numFmt") ?? undefined,
    levelText: getChildValue(lvlNode, "w:lvlText") ?? undefined,
    paragraphStyle: getChildValue(lvlNode, "w:pStyle"),
  });
}

/** Builds the numbering table from `word/numbering.xml`. */
export function parseNumbering(xml: string): NumberingDefinitionsPart {
  const numbering = new Numbering();
  const root = parseXml(xml).find((element) => element.name === "w:numbering");
  if (!root) {
    return new NumberingDefinitionsPart(numbering);
  }

  for (const abstractNode of findChildren(root, "w:abstractNum")) {
    const abstractNumId = getAttribute(abstractNode, "w:abstractNumId");
    if (abstractNumId === null) continue;
    const levels: NumberingLevel[] = [];
    for (const lvlNode of findChildren(abstractNode, "w:lvl")) {
      const level = parseLevel(lvlNode);
      if (level) {
        levels.push(level);
      }
    }
    numbering.addAbstractDefinition(abstractNumId, levels);
  }

  for (const numNode of findChildren(root, "w:num")) {
    const numId = getAttribute(numNode, "w:numId");
    const abstractNumId = getChildValue(numNode, "w:abstractNumId");
    if (numId === null || abstractNumId === null) continue;

    const overrides: LevelOverride[] = [];
    for (const overrideNode of findChildren(numNode, "w:lvlOverride")) {
      const levelId = getAttribute(overrideNode, "w:ilvl");
      if (levelId === null) continue;
      const lvlNode = findChild(overrideNode, "w:lvl");
      overrides.push({
        levelId,
        startOverride: parseInteger(getChildValue(overrideNode, "w:startOverride")),
        level: lvlNode ? parseLevel(lvlNode, levelId) : null,
      });
    }
    numbering.addInstance(numId, abstractNumId, overrides);
  }

  return new NumberingDefinitionsPart(numbering);
}
