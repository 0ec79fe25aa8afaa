// ─── DocBook Parser ─────────────────────────────────────────────────────────
//
// Reads DocBook XML with fast-xml-parser (order-preserving mode) and maps
// the common elements onto the document model. Program listings that name a
// language become nested `#!highlight` placeholders; elements without a
// mapping contribute their content only.

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { ChildNode, DocumentNode } from '../types.js';
import { DocbookParseError } from '../errors.js';
import { buildTable, type CellContent } from '../table.js';
import { appendText, createPlaceholder, element } from '../tree.js';
import type { TextParser } from './types.js';

// ─── XML Model ──────────────────────────────────────────────────────────────

interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlChild[];
}

type XmlChild = XmlElement | string;

const ATTRIBUTE_PREFIX = '@_';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith(ATTRIBUTE_PREFIX)) {
      attributes[key.slice(ATTRIBUTE_PREFIX.length)] = String(value);
    }
  }
  return attributes;
}

/**
 * fast-xml-parser's ordered output is an array of single-key objects
 * (`{ para: [...], ':@': {...} }` or `{ '#text': '...' }`).
 */
function toXmlChildren(raw: unknown): XmlChild[] {
  if (!Array.isArray(raw)) return [];
  const entries: unknown[] = raw;
  const out: XmlChild[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const attributes = readAttributes(entry[':@']);
    for (const [key, value] of Object.entries(entry)) {
      if (key === ':@') continue;
      if (key === '#text') {
        out.push(String(value));
      } else if (!key.startsWith('?') && !key.startsWith('!')) {
        out.push({ name: key, attributes, children: toXmlChildren(value) });
      }
    }
  }
  return out;
}

function xmlText(children: XmlChild[]): string {
  return children.map((c) => (typeof c === 'string' ? c : xmlText(c.children))).join('');
}

function descendants(node: XmlElement, name: string): XmlElement[] {
  const found: XmlElement[] = [];
  for (const child of node.children) {
    if (typeof child === 'string') continue;
    if (child.name === name) found.push(child);
    else found.push(...descendants(child, name));
  }
  return found;
}

// ─── Element Classes ────────────────────────────────────────────────────────

const SECTION_TAGS: ReadonlySet<string> = new Set([
  'article', 'book', 'chapter', 'part', 'preface', 'appendix', 'section',
  'sect1', 'sect2', 'sect3', 'sect4', 'sect5', 'simplesect', 'refsection',
]);
const PARA_TAGS: ReadonlySet<string> = new Set(['para', 'simpara', 'formalpara']);
const CODE_TAGS: ReadonlySet<string> = new Set([
  'literal', 'code', 'command', 'filename', 'varname', 'function', 'option',
  'userinput', 'computeroutput', 'classname', 'parameter', 'envar',
]);
const VERBATIM_TAGS: ReadonlySet<string> = new Set(['programlisting', 'screen', 'literallayout', 'synopsis']);
const ADMONITION_TAGS: ReadonlySet<string> = new Set(['note', 'tip', 'warning', 'caution', 'important']);
const INFO_TAGS: ReadonlySet<string> = new Set(['info', 'articleinfo', 'bookinfo', 'chapterinfo', 'sectioninfo']);
const DROPPED_TAGS: ReadonlySet<string> = new Set(['indexterm', 'remark']);

// ─── Parser ─────────────────────────────────────────────────────────────────

export class DocbookParser implements TextParser {
  private readonly xml = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    removeNSPrefix: true,
    trimValues: false,
    parseTagValue: false,
    parseAttributeValue: false,
  });

  parse(text: string, contentType: string): DocumentNode {
    const validation = XMLValidator.validate(text);
    if (validation !== true) {
      throw new DocbookParseError(validation.err.msg, validation.err.line, validation.err.col);
    }
    const roots = toXmlChildren(this.xml.parse(text));
    return element('body', { 'content-type': contentType }, this.blocks(roots, 0));
  }

  private blocks(children: XmlChild[], depth: number): ChildNode[] {
    const out: ChildNode[] = [];
    for (const child of children) {
      if (typeof child === 'string') {
        const text = collapse(child).trim();
        if (text) out.push(text);
      } else {
        out.push(...this.block(child, depth));
      }
    }
    return out;
  }

  private block(node: XmlElement, depth: number): ChildNode[] {
    const { name } = node;

    if (SECTION_TAGS.has(name)) return [this.section(node, depth)];
    if (PARA_TAGS.has(name)) return [this.paragraph(node.children)];
    if (VERBATIM_TAGS.has(name)) return [this.verbatim(node)];
    if (ADMONITION_TAGS.has(name)) {
      return [element('admonition', { type: name }, this.blocks(node.children, depth))];
    }
    if (INFO_TAGS.has(name) || DROPPED_TAGS.has(name)) return [];

    switch (name) {
      case 'title':
        return [element('p', {}, [element('strong', {}, this.inline(node.children))])];
      case 'itemizedlist':
      case 'orderedlist':
        return [this.list(node, depth)];
      case 'blockquote':
        return [element('blockquote', {}, this.blocks(node.children, depth))];
      case 'table':
      case 'informaltable':
        return [this.table(node)];
      default:
        if (CODE_TAGS.has(name) || name === 'emphasis' || name === 'link' || name === 'ulink') {
          return [this.paragraph([node])];
        }
        return this.blocks(node.children, depth);
    }
  }

  private section(node: XmlElement, depth: number): DocumentNode {
    const section = element('div');
    const info = node.children.find(
      (c): c is XmlElement => typeof c !== 'string' && INFO_TAGS.has(c.name),
    );
    const title =
      node.children.find((c): c is XmlElement => typeof c !== 'string' && c.name === 'title') ??
      info?.children.find((c): c is XmlElement => typeof c !== 'string' && c.name === 'title');

    if (title) {
      section.children.push(
        element('h', { 'outline-level': String(depth + 1) }, trimEdges(this.inline(title.children))),
      );
    }
    const rest = node.children.filter((c) => c !== title);
    section.children.push(...this.blocks(rest, depth + 1));
    return section;
  }

  private paragraph(children: XmlChild[]): DocumentNode {
    return element('p', {}, trimEdges(this.inline(children)));
  }

  private verbatim(node: XmlElement): DocumentNode {
    const text = xmlText(node.children).replace(/^\n/, '').replace(/\s+$/, '');
    const language = node.attributes.language;
    return language
      ? createPlaceholder(text, `#!highlight ${language}`)
      : element('blockcode', {}, [text]);
  }

  private list(node: XmlElement, depth: number): DocumentNode {
    const ordered = node.name === 'orderedlist';
    const items = node.children
      .filter((c): c is XmlElement => typeof c !== 'string' && c.name === 'listitem')
      .map((item) =>
        element('list-item', {}, [element('list-item-body', {}, this.blocks(item.children, depth))]),
      );
    return element('list', { 'item-label-generate': ordered ? 'ordered' : 'unordered' }, items);
  }

  private table(node: XmlElement): DocumentNode {
    const cells = (row: XmlElement): CellContent[] =>
      descendants(row, 'entry').map((entry) => trimEdges(this.inline(entry.children)));

    const headRow = descendants(node, 'thead').flatMap((thead) => descendants(thead, 'row'))[0];
    const bodyRows = descendants(node, 'tbody').flatMap((tbody) => descendants(tbody, 'row'));
    return buildTable(bodyRows.map(cells), headRow ? { head: cells(headRow) } : {});
  }

  private inline(children: XmlChild[]): ChildNode[] {
    const out = element('span');
    for (const child of children) {
      if (typeof child === 'string') {
        appendText(out, collapse(child));
        continue;
      }
      for (const node of this.inlineElement(child)) {
        if (typeof node === 'string') appendText(out, node);
        else out.children.push(node);
      }
    }
    return out.children;
  }

  private inlineElement(node: XmlElement): ChildNode[] {
    const { name, attributes } = node;

    if (CODE_TAGS.has(name)) return [element('code', {}, [xmlText(node.children)])];
    if (DROPPED_TAGS.has(name)) return [];

    switch (name) {
      case 'emphasis': {
        const strong = attributes.role === 'bold' || attributes.role === 'strong';
        return [element(strong ? 'strong' : 'emphasis', {}, this.inline(node.children))];
      }
      case 'link':
      case 'ulink': {
        const href =
          attributes.href ?? attributes.url ?? (attributes.linkend ? `#${attributes.linkend}` : '');
        const label = this.inline(node.children);
        return [element('a', { href }, label.length > 0 ? label : [href])];
      }
      default:
        return this.inline(node.children);
    }
  }
}

// ─── Whitespace ─────────────────────────────────────────────────────────────

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ');
}

/** Trim the leading and trailing whitespace of a run of inline content. */
function trimEdges(children: ChildNode[]): ChildNode[] {
  const out = [...children];
  const first = out[0];
  if (typeof first === 'string') {
    const trimmed = first.trimStart();
    if (trimmed) out[0] = trimmed;
    else out.shift();
  }
  const last = out[out.length - 1];
  if (typeof last === 'string') {
    const trimmed = last.trimEnd();
    if (trimmed) out[out.length - 1] = trimmed;
    else out.pop();
  }
  return out;
}
