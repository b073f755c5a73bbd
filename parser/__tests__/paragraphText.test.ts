import { describe, it, expect } from "vitest";
import { Break, Hyperlink, InsertedRun, Run, TabChar, Text, type RunContent } from "../documentTree";
import { Paragraph } from "../paragraph";

const run = (...contents: RunContent[]) => new Run(contents);
const text = (value: string) => new Text(value);
const tab = () => new TabChar();

function fragmentValues(paragraph: Paragraph): string[] {
  const values: string[] = [];
  for (const child of paragraph.children) {
    if (child.kind !== "run") continue;
    for (const content of child.children) {
      if (content.kind === "text") {
        values.push(content.value);
      }
    }
  }
  return values;
}

describe("getText", () => {
  it("joins text fragments of runs in document order", () => {
    const paragraph = new Paragraph(null, [run(text("Hello"), tab(), text(" ")), run(new Break(), text("world"))]);

    expect(paragraph.getText()).toBe("Hello world");
  });

  it("skips empty fragments and runs without text", () => {
    const paragraph = new Paragraph(null, [run(text("")), run(tab()), run(text("a"), text(""), text("b"))]);

    expect(paragraph.getText()).toBe("ab");
  });

  it("ignores text inside hyperlinks and revisions", () => {
    const paragraph = new Paragraph(null, [
      run(text("See ")),
      new Hyperlink([run(text("the docs"))]),
      new InsertedRun([run(text(" now"))]),
      run(text(".")),
    ]);

    expect(paragraph.getText()).toBe("See .");
  });

  it("is empty for a paragraph without children", () => {
    expect(new Paragraph().getText()).toBe("");
  });
});

describe("stripTextFromLeft", () => {
  it("strips across a fragment boundary", () => {
    const paragraph = new Paragraph(null, [run(text("abc")), run(text("def"))]);

    paragraph.stripTextFromLeft("abcd");

    expect(fragmentValues(paragraph)).toEqual(["", "ef"]);
    expect(paragraph.getText()).toBe("ef");
  });

  it("leaves nothing when stripping the whole text", () => {
    const paragraph = new Paragraph(null, [
      run(text("One"), tab(), text(" two")),
      new Hyperlink([run(text("link"))]),
      run(text(""), text(" three")),
    ]);
    const fullText = paragraph.getText();

    paragraph.stripTextFromLeft(fullText);

    expect(paragraph.getText()).toBe("");
    expect(fragmentValues(paragraph)).toEqual(["", "", "", ""]);
  });

  it("keeps tabs, breaks and non-run children in place", () => {
    const link = new Hyperlink([run(text("link"))]);
    const first = run(tab(), text("1. "), new Break());
    const paragraph = new Paragraph(null, [first, link, run(text("Item"))]);

    paragraph.stripTextFromLeft("1. ");

    expect(first.children.map((content) => content.kind)).toEqual(["tab", "text", "break"]);
    expect(paragraph.children[1]).toBe(link);
    expect(link.children[0].children[0]).toEqual(expect.objectContaining({ value: "link" }));
    expect(paragraph.getText()).toBe("Item");
  });

  it("does nothing for an empty prefix", () => {
    const paragraph = new Paragraph(null, [run(text("abc"))]);

    paragraph.stripTextFromLeft("");

    expect(paragraph.getText()).toBe("abc");
  });

  it("stops at the first fragment that does not match", () => {
    const paragraph = new Paragraph(null, [run(text("ab")), run(text("cd")), run(text("ef"))]);

    paragraph.stripTextFromLeft("abX");

    expect(fragmentValues(paragraph)).toEqual(["", "cd", "ef"]);
  });

  it("does not raise when the prefix does not match at all", () => {
    const paragraph = new Paragraph(null, [run(text("abc")), run(text("xyz"))]);

    expect(() => paragraph.stripTextFromLeft("abq")).not.toThrow();
    expect(fragmentValues(paragraph)).toEqual(["abc", "xyz"]);
  });
});

describe("initial tabs", () => {
  it("counts and removes tabs at the front of the first run", () => {
    const first = run(tab(), tab(), text("a"), tab());
    const second = run(tab());
    const paragraph = new Paragraph(null, [first, second]);

    expect(paragraph.getNumberOfInitialTabs()).toBe(2);
    expect(paragraph.removeInitialTabs()).toBe(2);
    expect(first.children.map((content) => content.kind)).toEqual(["text", "tab"]);
    expect(second.children).toHaveLength(1);
  });

  it("carries on into the next run when a run holds only tabs", () => {
    const paragraph = new Paragraph(null, [run(tab()), run(tab(), text("x")), run(tab())]);

    expect(paragraph.getNumberOfInitialTabs()).toBe(2);
    expect(paragraph.removeInitialTabs()).toBe(2);
    expect(paragraph.getText()).toBe("x");
  });

  it("ends the leading region at a non-run child", () => {
    const paragraph = new Paragraph(null, [new Hyperlink([run(tab())]), run(tab())]);

    expect(paragraph.getNumberOfInitialTabs()).toBe(0);
    expect(paragraph.removeInitialTabs()).toBe(0);
  });

  it("ends the leading region at a run that starts with text", () => {
    const paragraph = new Paragraph(null, [run(text("a")), run(tab(), tab())]);

    expect(paragraph.getNumberOfInitialTabs()).toBe(0);
  });

  it("removes nothing the second time", () => {
    const paragraph = new Paragraph(null, [run(tab(), tab(), tab(), text("Body"))]);

    expect(paragraph.removeInitialTabs()).toBe(3);
    expect(paragraph.getNumberOfInitialTabs()).toBe(0);
    expect(paragraph.removeInitialTabs()).toBe(0);
  });

  it("detaches removed tabs from their run", () => {
    const leading = tab();
    const paragraph = new Paragraph(null, [run(leading, text("a"))]);

    paragraph.removeInitialTabs();

    expect(leading.parent).toBeNull();
  });

  it("reports exactly what removal deletes", () => {
    const layouts: RunContent[][][] = [
      [],
      [[tab()]],
      [[tab(), tab()], [tab(), text("a")], [tab()]],
      [[text("a"), tab()]],
      [[new Break(), tab()]],
      [[tab(), new Break(), tab()]],
    ];

    for (const layout of layouts) {
      const paragraph = new Paragraph(null, layout.map((contents) => run(...contents)));
      const expected = paragraph.getNumberOfInitialTabs();

      expect(paragraph.removeInitialTabs()).toBe(expected);
    }
  });
});
