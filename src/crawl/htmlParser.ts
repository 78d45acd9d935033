import { load, type Cheerio, type CheerioAPI } from "cheerio";
import { isText, type AnyNode, type Element } from "domhandler";
import { AttributeFilter, PageStructureError } from "../core/errors";
import { Located } from "../types";

export function parseHtml(html: string): CheerioAPI {
  return load(html);
}

function matchesAttribute(name: string, actual: string | undefined, expected: string | RegExp): boolean {
  if (actual === undefined) {
    return false;
  }
  if (typeof expected !== "string") {
    return expected.test(actual);
  }
  if (actual === expected) {
    return true;
  }
  return name === "class" && actual.split(/\s+/).includes(expected);
}

export function matchesAttributes(element: Element, attrs: AttributeFilter): boolean {
  return Object.entries(attrs).every(([name, expected]) => matchesAttribute(name, element.attribs[name], expected));
}

export function findAllTags<T extends AnyNode>(root: Cheerio<T>, name: string, attrs: AttributeFilter = {}): Cheerio<Element> {
  return root.find(name).filter((_, element) => matchesAttributes(element, attrs));
}

/**
 * String filters match exactly; a `class` string also matches a single class
 * token. An element without a filtered attribute never matches.
 */
export function findTag<T extends AnyNode>(root: Cheerio<T>, name: string, attrs: AttributeFilter = {}): Located<Cheerio<Element>> {
  const match = findAllTags(root, name, attrs).first();
  if (match.length === 0) {
    return { ok: false, error: new PageStructureError(name, attrs) };
  }
  return { ok: true, value: match };
}

export function ownText(element: Element): string {
  return element.children
    .map((node) => (isText(node) ? node.data : ""))
    .join("")
    .trim();
}

export function readDefinition(list: Cheerio<Element>, label: string): string | undefined {
  const term = list
    .find("*")
    .filter((_, element) => ownText(element) === label)
    .first();
  if (term.length === 0) {
    return undefined;
  }

  const value = term.nextAll("dd").first();
  return value.length > 0 ? value.text().trim() : undefined;
}

export function resolveUrl(baseUrl: string, href: string): string {
  return new URL(href, baseUrl).toString();
}
