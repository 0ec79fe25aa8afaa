// ─── Creole Parser ──────────────────────────────────────────────────────────
//
// Creole 1.0 block markup, read line by line. `{{{` blocks whose opening
// line carries a `#!` directive become nested placeholders, like in moin
// wiki markup. Block arguments may set `class` and `style` on the body.

import type { ChildNode, DocumentNode } from '../types.js';
import { element } from '../tree.js';
import { buildTable, type CellContent } from '../table.js';
import type { Arguments } from './arguments.js';
import { matchRawBlockOpen, readNestedList, readParagraph, readRawBlock, type ListItemMatch } from './blocks.js';
import { createInlineParser, lineBreak, link, literal, wrap } from './inline.js';
import type { LineCursor } from './line-cursor.js';
import type { LineParser } from './types.js';

const HEADING_RE = /^\s*(={1,6})\s*(.+?)\s*=*\s*$/;
const SEPARATOR_RE = /^\s*-{4,}\s*$/;
const LIST_RE = /^\s*([*#]+)\s+(.*)$/;
const TABLE_RE = /^\s*\|/;

/** Body attributes block arguments may set */
const BODY_KEYWORDS = ['class', 'style'] as const;

const inline = createInlineParser([
  wrap(/\*\*(.+?)\*\*/, 'strong'),
  // not the // of a URL scheme
  wrap(/(?<!:)\/\/(.+?)(?<!:)\/\//, 'emphasis'),
  literal(/\{\{\{(.+?)\}\}\}/, 'code'),
  link(/\[\[([^|\]]+)(?:\|([^\]]*))?\]\]/),
  lineBreak(/\\\\/),
]);

function matchListItem(line: string): ListItemMatch | null {
  const m = LIST_RE.exec(line);
  if (!m) return null;
  const marker = m[1] ?? '';
  return { level: marker.length, ordered: marker.endsWith('#'), text: m[2] ?? '' };
}

function isBlockStart(line: string): boolean {
  return (
    HEADING_RE.test(line) ||
    SEPARATOR_RE.test(line) ||
    TABLE_RE.test(line) ||
    LIST_RE.test(line) ||
    matchRawBlockOpen(line) !== null
  );
}

interface TableCell {
  header: boolean;
  content: ChildNode[];
}

function splitTableRow(line: string): TableCell[] {
  const inner = line.trim().replace(/^\|/, '').replace(/\|$/, '');
  // a | inside [[target|label]] is not a cell boundary
  return inner.split(/\|(?![^[]*\]\])/).map((raw) => {
    const header = raw.startsWith('=');
    return { header, content: inline((header ? raw.slice(1) : raw).trim()) };
  });
}

export class CreoleParser implements LineParser {
  parseBlock(lines: LineCursor, args: Arguments): DocumentNode {
    const attributes: Record<string, string> = {};
    for (const key of BODY_KEYWORDS) {
      const value = args.keyword[key];
      if (value) attributes[key] = value;
    }
    const body = element('body', attributes);

    let line = lines.next();
    while (line !== undefined) {
      if (line.trim() !== '') {
        body.children.push(this.parseBlockAt(line, lines));
      }
      line = lines.next();
    }
    return body;
  }

  private parseBlockAt(line: string, lines: LineCursor): DocumentNode {
    if (SEPARATOR_RE.test(line)) return element('separator');

    const heading = HEADING_RE.exec(line);
    if (heading) {
      const level = (heading[1] ?? '').length;
      return element('h', { 'outline-level': String(level) }, inline(heading[2] ?? ''));
    }

    const raw = matchRawBlockOpen(line);
    if (raw) return readRawBlock(lines, raw.markerLength, raw.rest);

    if (TABLE_RE.test(line)) return this.parseTable(line, lines);

    lines.push(line);
    if (LIST_RE.test(line)) return readNestedList(lines, matchListItem, inline);
    return element('p', {}, inline(readParagraph(lines, isBlockStart).join(' ')));
  }

  private parseTable(first: string, lines: LineCursor): DocumentNode {
    const rows: TableCell[][] = [splitTableRow(first)];
    let next = lines.next();
    while (next !== undefined && TABLE_RE.test(next)) {
      rows.push(splitTableRow(next));
      next = lines.next();
    }
    if (next !== undefined) lines.push(next);

    const toCells = (row: TableCell[]): CellContent[] => row.map((cell) => cell.content);
    const [head, ...rest] = rows;
    if (head && head.every((cell) => cell.header)) {
      return buildTable(rest.map(toCells), { head: toCells(head) });
    }
    return buildTable(rows.map(toCells));
  }
}
