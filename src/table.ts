// ─── Table Builder ──────────────────────────────────────────────────────────
//
// Shared by the `#!csv` handler and by the wiki-ish parsers' own table
// syntaxes. Produces:
//
//   table [class]
//     table-header
//       table-row → table-cell*
//     table-body
//       table-row → table-cell*   (one per body row)
//
// Rows keep whatever number of cells they came with. Nothing is padded or
// truncated, so consumers must cope with ragged rows.

import type { ChildNode, DocumentNode } from './types.js';
import { CSV_TABLE_CLASS, DEFAULT_SEPARATOR } from './types.js';
import { element } from './tree.js';

/** A cell is either plain text or already-built inline content. */
export type CellContent = string | ChildNode[];

export interface TableOptions {
  head?: CellContent[];
  cls?: string;
}

export function buildTable(rows: CellContent[][], options: TableOptions = {}): DocumentNode {
  const table = element('table', options.cls ? { class: options.cls } : {});

  if (options.head) {
    table.children.push(element('table-header', {}, [buildRow(options.head)]));
  }
  table.children.push(element('table-body', {}, rows.map(buildRow)));
  return table;
}

function buildRow(cells: CellContent[]): DocumentNode {
  return element(
    'table-row',
    {},
    cells.map((cell) => element('table-cell', {}, typeof cell === 'string' ? [cell] : cell)),
  );
}

/**
 * Turn separated text into a table: first line is the header, every other
 * line a body row.
 */
export function buildSeparatedTable(
  text: string,
  separator: string = DEFAULT_SEPARATOR,
): DocumentNode {
  const [headLine = '', ...bodyLines] = text.split('\n');
  const head = headLine.split(separator);
  const rows = bodyLines.map((line) => line.split(separator));
  return buildTable(rows, { head, cls: CSV_TABLE_CLASS });
}
