// ─── Parser Table ───────────────────────────────────────────────────────────

import { CreoleParser } from './creole.js';
import { DocbookParser } from './docbook.js';
import { MarkdownParser } from './markdown.js';
import { MediawikiParser } from './mediawiki.js';
import { RstParser } from './rst.js';
import type { SubParserTable } from './types.js';
import { WikiParser } from './wiki.js';

export function createDefaultParsers(): SubParserTable {
  return {
    wiki: new WikiParser(),
    creole: new CreoleParser(),
    rst: new RstParser(),
    docbook: new DocbookParser(),
    markdown: new MarkdownParser(),
    mediawiki: new MediawikiParser(),
  };
}

export { SubParserAdapter, SUB_PARSERS } from './adapter.js';
export { parseArguments, emptyArguments, type Arguments } from './arguments.js';
export { LineCursor, normalizeSplitText } from './line-cursor.js';
export type { LineParser, TextParser, SubParserTable } from './types.js';
export { CreoleParser, DocbookParser, MarkdownParser, MediawikiParser, RstParser, WikiParser };
