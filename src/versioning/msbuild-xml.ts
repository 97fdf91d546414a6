import { XMLParser, XMLValidator } from "fast-xml-parser";

export type XmlElement = {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  text: string;
};

export type MsBuildDocument = {
  root: XmlElement;
  defaultNamespace: string | null;
  prefixes: string[];
};

export type MsBuildParseResult = { ok: true; document: MsBuildDocument } | { ok: false; error: string };

export type TextReplacement = {
  content: string;
  count: number;
};

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    attributes[key] = String(value);
  }
  return attributes;
}

function collectText(raw: unknown[]): string {
  return raw
    .filter(isRecord)
    .map((entry) => entry["#text"])
    .filter((value) => typeof value === "string" || typeof value === "number")
    .map((value) => String(value))
    .join("");
}

function toElements(raw: unknown): XmlElement[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const elements: XmlElement[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) {
      continue;
    }
    for (const [key, value] of Object.entries(entry)) {
      if (key === ":@" || key === "#text") {
        continue;
      }
      const children: unknown[] = Array.isArray(value) ? value : [];
      elements.push({
        name: key,
        attributes: toAttributes(entry[":@"]),
        children: toElements(children),
        text: collectText(children)
      });
    }
  }
  return elements;
}

export function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

export function parseMsBuild(content: string): MsBuildParseResult {
  const xml = stripBom(content);
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    return { ok: false, error: `Malformed XML: ${validation.err.msg} (line ${validation.err.line})` };
  }
  const root = toElements(parser.parse(xml))[0];
  if (!root) {
    return { ok: false, error: "Malformed XML: no root element" };
  }
  const prefixes: string[] = [];
  let defaultNamespace: string | null = null;
  for (const [name, value] of Object.entries(root.attributes)) {
    if (name === "xmlns") {
      defaultNamespace = value;
    } else if (name.startsWith("xmlns:")) {
      prefixes.push(name.slice("xmlns:".length));
    }
  }
  return { ok: true, document: { root, defaultNamespace, prefixes } };
}

// Files in the wild mix bare and prefixed tags, so every lookup tries both.
export function candidateNames(document: MsBuildDocument, localName: string): string[] {
  return [localName, ...document.prefixes.map((prefix) => `${prefix}:${localName}`)];
}

export function propertyGroups(document: MsBuildDocument): XmlElement[] {
  const names = new Set(candidateNames(document, "PropertyGroup"));
  const groups: XmlElement[] = [];
  const walk = (element: XmlElement): void => {
    if (names.has(element.name)) {
      groups.push(element);
    }
    element.children.forEach(walk);
  };
  walk(document.root);
  return groups;
}

export function findProperty(document: MsBuildDocument, group: XmlElement, tag: string): XmlElement | null {
  for (const name of candidateNames(document, tag)) {
    const match = group.children.find((child) => child.name === name);
    if (match) {
      return match;
    }
  }
  return null;
}

export function hasProperty(document: MsBuildDocument, tag: string): boolean {
  return propertyGroups(document).some((group) => findProperty(document, group, tag) !== null);
}

/**
 * First non-empty value among `tags`, scanning PropertyGroups in document order
 * and, within one group, the tags in the given order.
 */
export function firstPropertyValue(document: MsBuildDocument, tags: string[]): string | null {
  for (const group of propertyGroups(document)) {
    for (const tag of tags) {
      const value = findProperty(document, group, tag)?.text.trim();
      if (value) {
        return value;
      }
    }
  }
  return null;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function escapeXmlText(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function protectedRanges(content: string): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  for (const match of content.matchAll(/<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>/g)) {
    const start = match.index ?? 0;
    ranges.push([start, start + match[0].length]);
  }
  return ranges;
}

/**
 * Rewrites the text of every `<tag>` element (any namespace prefix) in raw
 * file content. Everything outside the replaced text stays byte-for-byte.
 * Self-closing elements are expanded; comments and CDATA are left alone.
 */
export function replaceElementText(
  content: string,
  tag: string,
  value: string | ((current: string) => string)
): TextReplacement {
  const pattern = new RegExp(
    `<((?:[A-Za-z_][\\w.-]*:)?${escapeRegExp(tag)})(\\s[^<>]*?)?(?:\\/>|>([^<]*)<\\/\\1\\s*>)`,
    "g"
  );
  const ranges = protectedRanges(content);
  let count = 0;
  const next = content.replace(
    pattern,
    (match: string, qualifiedName: string, attributes: string | undefined, text: string | undefined, offset: number) => {
      if (ranges.some(([start, end]) => offset >= start && offset < end)) {
        return match;
      }
      count += 1;
      const current = text ?? "";
      const replacement = escapeXmlText(typeof value === "function" ? value(current.trim()) : value);
      if (text === undefined) {
        const attrs = (attributes ?? "").replace(/\s+$/, "");
        return `<${qualifiedName}${attrs}>${replacement}</${qualifiedName}>`;
      }
      const openTag = match.slice(0, match.indexOf(">") + 1);
      const closeTag = match.slice(openTag.length + text.length);
      return `${openTag}${replacement}${closeTag}`;
    }
  );
  return { content: next, count };
}
