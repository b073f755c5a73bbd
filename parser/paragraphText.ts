import type { ParagraphChild, Run, Text } from "./documentTree";

/*
 * Text accessors over the direct Run children of a paragraph. Hyperlinks,
 * smart tags, revisions and inline content controls are not looked into.
 */

function* textFragments(children: readonly ParagraphChild[]): Generator<Text, void, undefined> {
  for (const child of children) {
    if (child.kind !== "run") continue;
    for (const content of child.children) {
      if (content.kind === "text") {
        yield content;
      }
    }
  }
}

export function getText(children: readonly ParagraphChild[]): string {
  let text = "";
  for (const fragment of textFragments(children)) {
    text += fragment.value;
  }
  return text;
}

/**
 * Removes `prefix` from the start of `getText(children)` by editing the text
 * nodes themselves, so runs, tabs and breaks keep their place. `prefix` has to
 * be an exact prefix of the text: at the first fragment that disagrees with it
 * the walk stops and leaves the rest untouched.
 */
export function stripTextFromLeft(children: readonly ParagraphChild[], prefix: string): void {
  let remaining = prefix;
  for (const fragment of textFragments(children)) {
    const value = fragment.value;
    if (value.length >= remaining.length && value.startsWith(remaining)) {
      fragment.value = value.slice(remaining.length);
      return;
    }
    if (!remaining.startsWith(value)) {
      return;
    }
    fragment.value = "";
    remaining = remaining.slice(value.length);
  }
}

/**
 * Counts the tabs at the front of each leading run. The leading region ends at
 * the first child that is not a Run, or at the first non-tab node inside a run.
 * A run holding only tabs is counted whole and the region carries on.
 */
function leadingTabCounts(children: readonly ParagraphChild[]): Array<[Run, number]> {
  const counts: Array<[Run, number]> = [];
  for (const child of children) {
    if (child.kind !== "run") break;
    let tabCount = 0;
    while (tabCount < child.children.length && child.children[tabCount].kind === "tab") {
      tabCount++;
    }
    if (tabCount > 0) {
      counts.push([child, tabCount]);
    }
    if (tabCount < child.children.length) break;
  }
  return counts;
}

export function getNumberOfInitialTabs(children: readonly ParagraphChild[]): number {
  return leadingTabCounts(children).reduce((total, [, tabCount]) => total + tabCount, 0);
}

/** Returns the number of tabs removed. */
export function removeInitialTabs(children: readonly ParagraphChild[]): number {
  let removed = 0;
  for (const [run, tabCount] of leadingTabCounts(children)) {
    removed += run.removeChildren(0, tabCount).length;
  }
  return removed;
}
