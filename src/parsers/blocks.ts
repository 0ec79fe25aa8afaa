// ─── Shared Block Readers ───────────────────────────────────────────────────
//
// Pieces of block structure the wiki-style parsers have in common: runs of
// paragraph lines, `{{{ ... }}}` raw blocks and marker-nested lists.

import type { ChildNode, DocumentNode } from '../types.js';
import { DIRECTIVE_SENTINEL } from '../types.js';
import { createPlaceholder, element } from '../tree.js';
import type { LineCursor } from './line-cursor.js';

/**
 * Collect lines up to a blank line or the start of another block. The
 * stopping line is handed back to the cursor.
 */
export function readParagraph(
  lines: LineCursor,
  isBlockStart: (line: string) => boolean,
): string[] {
  const out: string[] = [];
  let line = lines.next();
  while (line !== undefined) {
    if (line.trim() === '' || (out.length > 0 && isBlockStart(line))) {
      lines.push(line);
      break;
    }
    out.push(line.trim());
    line = lines.next();
  }
  return out;
}

/**
 * Read the body of a `{{{` block whose opening line has been consumed.
 * The block ends at a line holding exactly as many `}` as the opener had
 * `{`, so a longer outer marker can enclose shorter inner blocks.
 *
 * With a `#!` directive the result is a placeholder for the expander;
 * otherwise the body is preformatted text.
 */
export function readRawBlock(lines: LineCursor, markerLength: number, rest: string): DocumentNode {
  const closer = '}'.repeat(markerLength);
  const body: string[] = [];

  let line = lines.next();
  while (line !== undefined && line.trim() !== closer) {
    body.push(line);
    line = lines.next();
  }

  const directive = rest.trim();
  if (directive.startsWith(DIRECTIVE_SENTINEL)) {
    return createPlaceholder(body.join('\n'), directive, markerLength);
  }
  return element('blockcode', {}, [(directive ? [directive, ...body] : body).join('\n')]);
}

/**
 * The opener of a multi-line raw block: `{{{`, `{{{{#!wiki`, … A line that
 * also closes the block is inline markup, not a block.
 */
export function matchRawBlockOpen(line: string): { markerLength: number; rest: string } | null {
  const m = /^\s*(\{{3,})(.*)$/.exec(line);
  if (!m) return null;
  const marker = m[1] ?? '';
  const rest = m[2] ?? '';
  if (rest.trimEnd().endsWith('}'.repeat(marker.length))) return null;
  return { markerLength: marker.length, rest };
}

// ─── Lists ──────────────────────────────────────────────────────────────────

export interface ListItemMatch {
  /** Nesting key: indentation width or marker count */
  level: number;
  ordered: boolean;
  text: string;
}

/**
 * Build a list from consecutive item lines. Items at a deeper level nest
 * under the previous item; a shallower item or any non-item line ends the
 * list and is handed back to the cursor.
 */
export function readNestedList(
  lines: LineCursor,
  matchItem: (line: string) => ListItemMatch | null,
  inline: (text: string) => ChildNode[],
): DocumentNode {
  const first = lines.peek();
  const firstMatch = first === undefined ? null : matchItem(first);
  return readListLevel(lines, firstMatch?.level ?? 0, matchItem, inline);
}

function readListLevel(
  lines: LineCursor,
  level: number,
  matchItem: (line: string) => ListItemMatch | null,
  inline: (text: string) => ChildNode[],
): DocumentNode {
  let list: DocumentNode | null = null;
  let lastBody: DocumentNode | null = null;

  let line = lines.next();
  while (line !== undefined) {
    const item = matchItem(line);
    if (!item || item.level < level) {
      lines.push(line);
      break;
    }

    if (item.level > level && lastBody) {
      lines.push(line);
      lastBody.children.push(readListLevel(lines, item.level, matchItem, inline));
    } else {
      list ??= element('list', { 'item-label-generate': item.ordered ? 'ordered' : 'unordered' });
      lastBody = element('list-item-body', {}, inline(item.text));
      list.children.push(element('list-item', {}, [lastBody]));
    }
    line = lines.next();
  }

  return list ?? element('list', { 'item-label-generate': 'unordered' });
}
