// ─── Sub-Parser Contracts ───────────────────────────────────────────────────
//
// Embedded-language parsers come in two shapes. Line parsers read from a
// cursor and take parsed block arguments; text parsers take the whole body
// plus a content type and split it themselves. Both return a `body` node.

import type { DocumentNode } from '../types.js';
import type { LineParserId, TextParserId } from '../formats.js';
import type { Arguments } from './arguments.js';
import type { LineCursor } from './line-cursor.js';

export interface LineParser {
  parseBlock(lines: LineCursor, args: Arguments): DocumentNode;
}

export interface TextParser {
  parse(text: string, contentType: string): DocumentNode;
}

/** One handle per embedded format, built once and shared. */
export type SubParserTable = { readonly [K in LineParserId]: LineParser } & {
  readonly [K in TextParserId]: TextParser;
};
