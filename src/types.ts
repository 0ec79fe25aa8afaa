// ─── Core Document Model ────────────────────────────────────────────────────

/**
 * Element kinds a document tree may contain.
 *
 * `nowiki` is the raw-block placeholder built upstream for every
 * `{{{#!format ...}}}` block; `nowiki-args` holds its directive line.
 */
export type NodeTag =
  | 'page'
  | 'body'
  | 'div'
  | 'p'
  | 'h'
  | 'blockcode'
  | 'code'
  | 'span'
  | 'emphasis'
  | 'strong'
  | 'del'
  | 'a'
  | 'line-break'
  | 'separator'
  | 'blockquote'
  | 'admonition'
  | 'list'
  | 'list-item'
  | 'list-item-body'
  | 'table'
  | 'table-header'
  | 'table-body'
  | 'table-row'
  | 'table-cell'
  | 'nowiki'
  | 'nowiki-args';

/**
 * A tagged tree node. Children are owned exclusively by their parent.
 */
export interface DocumentNode {
  tag: NodeTag;
  /** Attribute key → value (e.g. `class`, `outline-level`, `href`) */
  attributes: Record<string, string>;
  children: ChildNode[];
}

/** A child is either an element or a run of text. */
export type ChildNode = DocumentNode | string;

// ─── Directives ─────────────────────────────────────────────────────────────

/**
 * The `#!name args` line of a raw block, split into its parts.
 * Both parts are absent when the line has no `#!` sentinel.
 */
export interface Directive {
  /** The directive line, right-trimmed */
  raw: string;
  formatName: string | undefined;
  formatArgs: string | undefined;
}

// ─── Constants ──────────────────────────────────────────────────────────────

export const PLACEHOLDER_TAG = 'nowiki' satisfies NodeTag;
export const PLACEHOLDER_ARGS_TAG = 'nowiki-args' satisfies NodeTag;

/** Tag a placeholder takes once its content has been replaced */
export const EXPANDED_TAG = 'div' satisfies NodeTag;

export const DIRECTIVE_SENTINEL = '#!';

/** Old `{{{#!python` style names that mean `{{{#!highlight python` */
export const LEGACY_HIGHLIGHT_NAMES: ReadonlySet<string> = new Set([
  'diff',
  'cplusplus',
  'python',
  'java',
  'pascal',
  'irc',
]);

export const DEFAULT_SEPARATOR = ';';
export const DEFAULT_MAX_NESTING = 16;
export const DEFAULT_MARKER_LENGTH = 3;

export const CSV_TABLE_CLASS = 'moin-csv-table moin-sortable';
export const HIGHLIGHT_CLASS = 'highlight';
export const ERROR_CLASS = 'error';

/** Lexer name that always resolves */
export const PLAIN_TEXT_LEXER = 'text';

/** Content types handed to the whole-text parsers */
export const CONTENT_TYPE = {
  RST: 'text/x-rst;charset=utf-8',
  DOCBOOK: 'application/docbook+xml;charset=utf-8',
  MARKDOWN: 'text/x-markdown;charset=utf-8',
  MEDIAWIKI: 'text/x-mediawiki;charset=utf-8',
} as const;
