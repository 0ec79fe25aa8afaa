// ─── Format Dispatch Table ──────────────────────────────────────────────────
//
// Maps a directive's format name onto a closed set of format ids, then onto
// the handler that expands the block. Anything not in the table resolves to
// `unknown`, which the expander renders as a diagnostic plus plain text.

import { type Directive, DEFAULT_SEPARATOR } from './types.js';

export type FormatId =
  | 'highlight'
  | 'csv'
  | 'wiki'
  | 'creole'
  | 'rst'
  | 'docbook'
  | 'markdown'
  | 'mediawiki';

/** Formats consumed line by line through a cursor */
export type LineParserId = 'wiki' | 'creole';
/** Formats handed over as one string */
export type TextParserId = 'rst' | 'docbook' | 'markdown' | 'mediawiki';
export type ParserId = LineParserId | TextParserId;

export type FormatResolution =
  | { kind: 'highlight'; lexerHint: string | undefined }
  | { kind: 'table'; separator: string }
  | { kind: 'subparser'; parser: ParserId; args: string | undefined }
  | { kind: 'unknown' };

/** Every accepted format name (short name and mimetype) → format id */
export const FORMAT_NAMES: ReadonlyMap<string, FormatId> = new Map<string, FormatId>([
  ['highlight', 'highlight'],
  ['csv', 'csv'],
  ['text/csv', 'csv'],
  ['wiki', 'wiki'],
  ['text/x.moin.wiki', 'wiki'],
  ['creole', 'creole'],
  ['text/x.moin.creole', 'creole'],
  ['rst', 'rst'],
  ['text/x-rst', 'rst'],
  ['docbook', 'docbook'],
  ['application/docbook+xml', 'docbook'],
  ['markdown', 'markdown'],
  ['text/x-markdown', 'markdown'],
  ['mediawiki', 'mediawiki'],
  ['text/x-mediawiki', 'mediawiki'],
]);

/** Exact, case-sensitive lookup. */
export function lookupFormat(name: string | undefined): FormatId | undefined {
  return name === undefined ? undefined : FORMAT_NAMES.get(name);
}

export function resolveFormat(
  directive: Directive,
  defaultSeparator: string = DEFAULT_SEPARATOR,
): FormatResolution {
  const id = lookupFormat(directive.formatName);
  if (id === undefined) return { kind: 'unknown' };

  switch (id) {
    case 'highlight':
      return { kind: 'highlight', lexerHint: directive.formatArgs };
    case 'csv':
      // an empty argument string also means "use the default"
      return { kind: 'table', separator: directive.formatArgs || defaultSeparator };
    case 'wiki':
    case 'creole':
    case 'rst':
    case 'docbook':
    case 'markdown':
    case 'mediawiki':
      return { kind: 'subparser', parser: id, args: directive.formatArgs };
    default: {
      const unreachable: never = id;
      return unreachable;
    }
  }
}
