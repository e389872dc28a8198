import { parse, type HTMLElement } from 'node-html-parser';

/**
 * The slice of an HTML document tree the store parsers need.
 * Backed by node-html-parser; tests use in-memory trees.
 */
export interface DocumentNode {
  /** Descendants carrying the class, in document order */
  findByClass(className: string): DocumentNode[];

  /** Descendants with the tag name, in document order */
  findByTag(tagName: string): DocumentNode[];

  /** Text content; raw (undecoded) for script and style elements */
  readonly text: string;
}

export type DocumentParser = (html: string) => DocumentNode;

export function firstMatching<T>(nodes: readonly T[], predicate: (node: T) => boolean): T | undefined {
  return nodes.find(predicate);
}

/** First descendant carrying the class */
export function firstByClass(node: DocumentNode, className: string): DocumentNode | undefined {
  return firstMatching(node.findByClass(className), () => true);
}

const RAW_TEXT_TAGS = new Set(['script', 'style']);

class HtmlDocumentNode implements DocumentNode {
  constructor(private readonly _element: HTMLElement) {}

  findByClass(className: string): DocumentNode[] {
    return this._element.querySelectorAll(`.${className}`).map((element) => new HtmlDocumentNode(element));
  }

  findByTag(tagName: string): DocumentNode[] {
    return this._element.getElementsByTagName(tagName).map((element) => new HtmlDocumentNode(element));
  }

  get text(): string {
    const tagName = (this._element.rawTagName || '').toLowerCase();
    return RAW_TEXT_TAGS.has(tagName) ? this._element.rawText : this._element.text;
  }
}

export const parseHtmlDocument: DocumentParser = (html) => new HtmlDocumentNode(parse(html));
