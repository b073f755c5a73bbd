import { describe, it, expect } from "vitest";
import { NumberingLevel, parseNumbering } from "../numbering";
import { numberingXml } from "./fixtures";

const xml = numberingXml(
  '<w:abstractNum w:abstractNumId="0">' +
    '<w:multiLevelType w:val="hybridMultilevel"/>' +
    '<w:lvl w:ilvl="0"><w:start w:val="1"/><w:numFmt w:val="decimal"/><w:lvlText w:val="%1."/></w:lvl>' +
    '<w:lvl w:ilvl="1"><w:start w:val="1"/><w:numFmt w:val="lowerLetter"/><w:lvlText w:val="%2)"/></w:lvl>' +
    "</w:abstractNum>" +
    '<w:abstractNum w:abstractNumId="1">' +
    '<w:lvl w:ilvl="0"><w:numFmt w:val="bullet"/><w:lvlText w:val="•"/><w:pStyle w:val="ListBullet"/></w:lvl>' +
    "</w:abstractNum>" +
    '<w:num w:numId="1"><w:abstractNumId w:val="0"/></w:num>' +
    '<w:num w:numId="2"><w:abstractNumId w:val="0"/>' +
    '<w:lvlOverride w:ilvl="0"><w:startOverride w:val="5"/></w:lvlOverride>' +
    '<w:lvlOverride w:ilvl="1"><w:lvl w:ilvl="1"><w:numFmt w:val="upperRoman"/><w:lvlText w:val="%2."/></w:lvl></w:lvlOverride>' +
    "</w:num>" +
    '<w:num w:numId="3"><w:abstractNumId w:val="1"/></w:num>' +
    '<w:num w:numId="4"><w:abstractNumId w:val="9"/></w:num>',
);

describe("parseNumbering", () => {
  const { numbering } = parseNumbering(xml);

  it("resolves a definition through its abstract numbering", () => {
    const definition = numbering.getNumberingDefinition("1");

    expect(definition?.numId).toBe("1");
    expect(definition?.abstractNumId).toBe("0");
    expect(definition?.levelIds).toEqual(["0", "1"]);
    expect(definition?.getLevel("0")).toEqual(
      expect.objectContaining({ levelId: "0", start: 1, numberFormat: "decimal", levelText: "%1." }),
    );
  });

  it("applies start overrides", () => {
    const level = numbering.getNumberingDefinition("2")?.getLevel("0");

    expect(level?.start).toBe(5);
    expect(level?.numberFormat).toBe("decimal");
  });

  it("replaces overridden levels", () => {
    const level = numbering.getNumberingDefinition("2")?.getLevel("1");

    expect(level?.numberFormat).toBe("upperRoman");
    expect(level?.levelText).toBe("%2.");
    expect(level?.start).toBe(0);
  });

  it("does not leak overrides into other instances", () => {
    expect(numbering.getNumberingDefinition("1")?.getLevel("0")?.start).toBe(1);
  });

  it("reads bullet levels and their paragraph style", () => {
    const level = numbering.getNumberingDefinition("3")?.getLevel("0");

    expect(level?.isBullet()).toBe(true);
    expect(level?.paragraphStyle).toBe("ListBullet");
  });

  it("is null for a missing abstract definition", () => {
    expect(numbering.getNumberingDefinition("4")).toBeNull();
  });

  it("is null for an unknown id", () => {
    expect(numbering.getNumberingDefinition("0")).toBeNull();
  });

  it("is null for an unknown level", () => {
    expect(numbering.getNumberingDefinition("1")?.getLevel("8")).toBeNull();
  });

  it("returns the same definition on repeated lookups", () => {
    expect(numbering.getNumberingDefinition("1")).toBe(numbering.getNumberingDefinition("1"));
  });
});

describe("NumberingLevel", () => {
  it("defaults to a decimal level starting at zero", () => {
    const level = new NumberingLevel({ levelId: "2" });

    expect(level.start).toBe(0);
    expect(level.numberFormat).toBe("decimal");
    expect(level.levelText).toBe("");
    expect(level.isBullet()).toBe(false);
  });
});
