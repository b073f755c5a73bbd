import { XMLParser } from "fast-xml-parser";

/**
 * Ordered view of a parsed XML element. With `preserveOrder` fast-xml-parser
 * returns arrays of single-key objects; this flattens them into a tree that
 * keeps document order, which WordprocessingML depends on.
 */
export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  /** Direct text content, concatenated. */
  text: string;
}

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";
const ATTRIBUTE_PREFIX = "@_";

const OFF_VALUES = new Set(["false", "0", "off"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toElement(name: string, content: unknown, rawAttributes: unknown): XmlElement {
  const attributes: Record<string, string> = {};
  if (isRecord(rawAttributes)) {
    for (const [key, value] of Object.entries(rawAttributes)) {
      if (key.startsWith(ATTRIBUTE_PREFIX)) {
        attributes[key.slice(ATTRIBUTE_PREFIX.length)] = String(value);
      }
    }
  }

  let text = "";
  if (Array.isArray(content)) {
    for (const item of content) {
      if (isRecord(item) && item[TEXT_KEY] !== undefined) {
        text += String(item[TEXT_KEY]);
      }
    }
  }

  return { name, attributes, children: toElements(content), text };
}

function toElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes)) {
    return [];
  }
  const elements: XmlElement[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    for (const key of Object.keys(node)) {
      // Whitespace between elements shows up as text nodes; only elements matter here
      if (key === ATTRIBUTES_KEY || key === TEXT_KEY) continue;
      elements.push(toElement(key, node[key], node[ATTRIBUTES_KEY]));
    }
  }
  return elements;
}

export function parseXml(xml: string): XmlElement[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    preserveOrder: true,
    parseAttributeValue: false,
    parseTagValue: false,
    trimValues: false,
    ignoreDeclaration: true,
  });
  const parsed: unknown = parser.parse(xml);
  return toElements(parsed);
}

export function findChild(element: XmlElement, name: string): XmlElement | undefined {
  return element.children.find((child) => child.name === name);
}

export function findChildren(element: XmlElement, name: string): XmlElement[] {
  return element.children.filter((child) => child.name === name);
}

export function getAttribute(element: XmlElement | undefined, name: string): string | null {
  return element?.attributes[name] ?? null;
}

/** Reads `<parent><childName w:val="..."/></parent>`. */
export function getChildValue(element: XmlElement, childName: string): string | null {
  return getAttribute(findChild(element, childName), "w:val");
}

/** On/off properties like `w:b` are on when present, unless `w:val` turns them off. */
export function isToggleOn(element: XmlElement | undefined): boolean {
  if (!element) {
    return false;
  }
  const value = getAttribute(element, "w:val");
  return value === null || !OFF_VALUES.has(value.toLowerCase());
}
