// ─── Moin Wiki Parser ───────────────────────────────────────────────────────
//
// Block-level moin wiki markup, read line by line:
//
//   = Heading =            … ====== Heading ======
//   ----                   separator
//   {{{#!format args       raw block (nested placeholder)
//   }}}
//    * item / 1. item      indented lists, nesting by indentation
//   ||a||b||               table rows
//
// Inline: '''strong''', ''emphasis'', `code`, {{{code}}}, --(strike)--,
// [[target|label]], <<BR>>.

import type { DocumentNode } from '../types.js';
import { element } from '../tree.js';
import { buildTable } from '../table.js';
import type { Arguments } from './arguments.js';
import { matchRawBlockOpen, readNestedList, readParagraph, readRawBlock, type ListItemMatch } from './blocks.js';
import { createInlineParser, lineBreak, link, literal, wrap } from './inline.js';
import type { LineCursor } from './line-cursor.js';
import type { LineParser } from './types.js';

const HEADING_RE = /^(={1,6})\s+(.*?)\s+\1\s*$/;
const SEPARATOR_RE = /^-{4,}\s*$/;
const LIST_RE = /^(\s+)(\*|\d+\.|[a-zA-Z]\.)\s+(.*)$/;
const TABLE_RE = /^\s*\|\|/;

const inline = createInlineParser([
  wrap(/'''(.+?)'''/, 'strong'),
  wrap(/''(.+?)''/, 'emphasis'),
  literal(/`([^`]+)`/, 'code'),
  literal(/\{\{\{(.+?)\}\}\}/, 'code'),
  wrap(/--\((.+?)\)--/, 'del'),
  link(/\[\[([^|\]]+)(?:\|([^\]]*))?\]\]/),
  lineBreak(/<<BR>>/),
]);

function matchListItem(line: string): ListItemMatch | null {
  const m = LIST_RE.exec(line);
  if (!m) return null;
  return { level: (m[1] ?? '').length, ordered: m[2] !== '*', text: m[3] ?? '' };
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

function splitTableRow(line: string): string[] {
  const inner = line.trim().replace(/^\|\|/, '').replace(/\|\|$/, '');
  return inner.split('||').map((cell) => cell.trim());
}

export class WikiParser implements LineParser {
  parseBlock(lines: LineCursor, args: Arguments): DocumentNode {
    const cls = args.keyword.class;
    const body = element('body', cls ? { class: cls } : {});

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
    const heading = HEADING_RE.exec(line);
    if (heading) {
      const level = (heading[1] ?? '').length;
      return element('h', { 'outline-level': String(level) }, inline(heading[2] ?? ''));
    }

    if (SEPARATOR_RE.test(line)) return element('separator');

    const raw = matchRawBlockOpen(line);
    if (raw) return readRawBlock(lines, raw.markerLength, raw.rest);

    if (TABLE_RE.test(line)) {
      const rows = [splitTableRow(line).map(inline)];
      let next = lines.next();
      while (next !== undefined && TABLE_RE.test(next)) {
        rows.push(splitTableRow(next).map(inline));
        next = lines.next();
      }
      if (next !== undefined) lines.push(next);
      return buildTable(rows);
    }

    lines.push(line);
    if (LIST_RE.test(line)) return readNestedList(lines, matchListItem, inline);
    return element('p', {}, inline(readParagraph(lines, isBlockStart).join(' ')));
  }
}
