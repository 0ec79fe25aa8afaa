// ─── Directive Parser ───────────────────────────────────────────────────────
//
// Splits the `#!name args` line of a raw block into its format name and
// residual arguments. A line without the sentinel yields neither, which the
// dispatcher treats as an unknown format.

import { type Directive, DIRECTIVE_SENTINEL, LEGACY_HIGHLIGHT_NAMES } from './types.js';

export function parseDirective(line: string): Directive {
  const raw = line.trimEnd();
  let formatName: string | undefined;
  let formatArgs: string | undefined;

  if (raw.startsWith(DIRECTIVE_SENTINEL) && raw.length > DIRECTIVE_SENTINEL.length) {
    const rest = raw.slice(DIRECTIVE_SENTINEL.length);
    const space = rest.indexOf(' ');
    if (space === -1) {
      formatName = rest;
    } else {
      formatName = rest.slice(0, space);
      formatArgs = rest.slice(space + 1);
    }
  }

  // {{{#!python is shorthand for {{{#!highlight python
  if (formatName !== undefined && LEGACY_HIGHLIGHT_NAMES.has(formatName)) {
    formatArgs = formatName;
    formatName = 'highlight';
  }

  return { raw, formatName, formatArgs };
}
