// ─── Sub-Parser Adapter ─────────────────────────────────────────────────────
//
// One call shape over the six embedded parsers. A per-format descriptor says
// whether the body goes through a line cursor or as whole text, and how the
// block's residual arguments are handed over.

import type { DocumentNode } from '../types.js';
import { CONTENT_TYPE } from '../types.js';
import type { LineParserId, ParserId, TextParserId } from '../formats.js';
import { element } from '../tree.js';
import { type Arguments, emptyArguments, parseArguments } from './arguments.js';
import { LineCursor, normalizeSplitText } from './line-cursor.js';
import type { SubParserTable } from './types.js';

type SubParserDescriptor =
  | { strategy: 'lines'; parser: LineParserId; toArguments: (args: string | undefined) => Arguments }
  | { strategy: 'text'; parser: TextParserId; contentType: (args: string | undefined) => string };

export const SUB_PARSERS: { readonly [K in ParserId]: SubParserDescriptor } = {
  wiki: {
    strategy: 'lines',
    parser: 'wiki',
    // {{{#!wiki red/solid → class "red solid" on the body
    toArguments: (args) => {
      const parsed = emptyArguments();
      if (args) parsed.keyword.class = args.replaceAll('/', ' ');
      return parsed;
    },
  },
  creole: { strategy: 'lines', parser: 'creole', toArguments: parseArguments },
  rst: { strategy: 'text', parser: 'rst', contentType: () => CONTENT_TYPE.RST },
  docbook: { strategy: 'text', parser: 'docbook', contentType: () => CONTENT_TYPE.DOCBOOK },
  markdown: { strategy: 'text', parser: 'markdown', contentType: () => CONTENT_TYPE.MARKDOWN },
  mediawiki: {
    strategy: 'text',
    parser: 'mediawiki',
    contentType: (args) => args || CONTENT_TYPE.MEDIAWIKI,
  },
};

export class SubParserAdapter {
  constructor(private readonly parsers: SubParserTable) {}

  /**
   * Parse `text` with the embedded parser `id` and wrap its body in a page.
   * Parser errors propagate unchanged.
   */
  invoke(id: ParserId, text: string, args: string | undefined): DocumentNode {
    const descriptor = SUB_PARSERS[id];
    let body: DocumentNode;

    if (descriptor.strategy === 'lines') {
      const lines = new LineCursor(normalizeSplitText(text));
      body = this.parsers[descriptor.parser].parseBlock(lines, descriptor.toArguments(args));
    } else {
      body = this.parsers[descriptor.parser].parse(text, descriptor.contentType(args));
    }

    return element('page', {}, [body]);
  }
}
