// ─── MediaWiki Parser ───────────────────────────────────────────────────────
//
// The block structure of MediaWiki markup:
//
//   == Heading ==                       outline level = number of '='
//   ----                                separator
//   * / # / : / ;                       lists, nesting by marker count
//   {| … |- … | cell || cell … |}      tables ('!' cells are headers)
//   <syntaxhighlight lang="x"> … </syntaxhighlight>
//                                       nested `#!highlight x` placeholder
//   <pre> … </pre>, leading space       preformatted text
//
// Inline: '''''bold italic''''', '''bold''', ''italic'', [[Page|label]],
// [http://url label], <code>, <br>.

import type { ChildNode, DocumentNode } from '../types.js';
import { buildTable, type CellContent } from '../table.js';
import { createPlaceholder, element } from '../tree.js';
import { readNestedList, readParagraph, type ListItemMatch } from './blocks.js';
import { createInlineParser, lineBreak, link, literal, wrap } from './inline.js';
import { LineCursor } from './line-cursor.js';
import type { TextParser } from './types.js';

const HEADING_RE = /^(={1,6})\s*(.+?)\s*\1\s*$/;
const SEPARATOR_RE = /^-{4,}\s*$/;
const LIST_RE = /^([*#:;]+)\s*(.*)$/;
const TABLE_OPEN_RE = /^\s*\{\|/;
const TABLE_CLOSE_RE = /^\s*\|\}/;
const CODE_OPEN_RE = /^\s*<(syntaxhighlight|source)\b([^>]*)>(.*)$/i;
const PRE_OPEN_RE = /^\s*<pre>(.*)$/i;
const LANG_ATTR_RE = /\blang\s*=\s*["']?([\w+#.-]+)/i;

const inline = createInlineParser([
  {
    pattern: /'''''(.+?)'''''/,
    build: (m, nested) => element('strong', {}, [element('emphasis', {}, nested(m[1] ?? ''))]),
  },
  wrap(/'''(.+?)'''/, 'strong'),
  wrap(/''(.+?)''/, 'emphasis'),
  literal(/<code>(.+?)<\/code>/i, 'code'),
  link(/\[\[([^|\]]+)(?:\|([^\]]*))?\]\]/),
  link(/\[(\w+:\/\/[^\s\]]+)(?:\s+([^\]]*))?\]/),
  lineBreak(/<br\s*\/?>/i),
]);

interface TableRow {
  /** Every cell so far was a `!` cell */
  header: boolean;
  cells: ChildNode[][];
}

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
    LIST_RE.test(line) ||
    TABLE_OPEN_RE.test(line) ||
    CODE_OPEN_RE.test(line) ||
    PRE_OPEN_RE.test(line) ||
    line.startsWith(' ')
  );
}

export class MediawikiParser implements TextParser {
  parse(text: string, contentType: string): DocumentNode {
    const lines = LineCursor.fromText(text);
    const body = element('body', { 'content-type': contentType });

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

    const code = CODE_OPEN_RE.exec(line);
    if (code) {
      const tag = code[1] ?? '';
      const body = readUntilClosingTag(lines, code[3] ?? '', tag);
      const lang = LANG_ATTR_RE.exec(code[2] ?? '')?.[1];
      return lang
        ? createPlaceholder(body, `#!highlight ${lang}`)
        : element('blockcode', {}, [body]);
    }

    const pre = PRE_OPEN_RE.exec(line);
    if (pre) return element('blockcode', {}, [readUntilClosingTag(lines, pre[1] ?? '', 'pre')]);

    if (TABLE_OPEN_RE.test(line)) return this.parseTable(lines);

    if (line.startsWith(' ')) {
      const block = [line.slice(1)];
      let next = lines.next();
      while (next !== undefined && next.startsWith(' ') && next.trim() !== '') {
        block.push(next.slice(1));
        next = lines.next();
      }
      if (next !== undefined) lines.push(next);
      return element('blockcode', {}, [block.join('\n')]);
    }

    lines.push(line);
    if (LIST_RE.test(line)) return readNestedList(lines, matchListItem, inline);
    return element('p', {}, inline(readParagraph(lines, isBlockStart).join(' ')));
  }

  /** Rows start at `|-`; `|` and `!` lines hold cells, `||`/`!!` split them. Captions are skipped. */
  private parseTable(lines: LineCursor): DocumentNode {
    const rows: TableRow[] = [];
    let current: TableRow | null = null;

    const startRow = (): TableRow => {
      const row: TableRow = { header: true, cells: [] };
      rows.push(row);
      return row;
    };

    let line = lines.next();
    while (line !== undefined && !TABLE_CLOSE_RE.test(line)) {
      const trimmed = line.trim();
      if (trimmed.startsWith('|-')) {
        current = startRow();
      } else if (!trimmed.startsWith('|+') && (trimmed.startsWith('!') || trimmed.startsWith('|'))) {
        const header = trimmed.startsWith('!');
        const row: TableRow = current ?? startRow();
        current = row;
        if (!header) row.header = false;
        for (const cell of trimmed.slice(1).split(header ? /!!|\|\|/ : /\|\|/)) {
          row.cells.push(inline(stripCellAttributes(cell).trim()));
        }
      }
      line = lines.next();
    }

    const filled = rows.filter((row) => row.cells.length > 0);
    const toCells = (row: TableRow): CellContent[] => row.cells;
    const [first, ...rest] = filled;
    if (first?.header) return buildTable(rest.map(toCells), { head: toCells(first) });
    return buildTable(filled.map(toCells));
  }
}

/** `style="x" | content` → `content` */
function stripCellAttributes(cell: string): string {
  const m = /^[^|[]*=[^|[]*\|(?!\|)(.*)$/.exec(cell);
  return m ? (m[1] ?? '') : cell;
}

/**
 * Collect text up to `</tag>`. The opening line's remainder and the closing
 * line's prefix are part of the content when non-empty.
 */
function readUntilClosingTag(lines: LineCursor, firstRest: string, tag: string): string {
  const close = new RegExp(`</${tag}\\s*>`, 'i');
  const body: string[] = [];

  const sameLine = close.exec(firstRest);
  if (sameLine) return firstRest.slice(0, sameLine.index);
  if (firstRest.trim() !== '') body.push(firstRest);

  let line = lines.next();
  while (line !== undefined) {
    const end = close.exec(line);
    if (end) {
      const before = line.slice(0, end.index);
      if (before.trim() !== '') body.push(before);
      break;
    }
    body.push(line);
    line = lines.next();
  }
  return body.join('\n');
}
