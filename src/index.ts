// ─── Public API ─────────────────────────────────────────────────────────────

export { Expander, expand, type ExpanderOptions } from './engine.js';
export { parseDirective } from './directive.js';
export {
  resolveFormat,
  lookupFormat,
  FORMAT_NAMES,
  type FormatId,
  type FormatResolution,
  type ParserId,
  type LineParserId,
  type TextParserId,
} from './formats.js';
export { buildTable, buildSeparatedTable, type CellContent, type TableOptions } from './table.js';
export {
  element,
  isElement,
  appendText,
  createPlaceholder,
  textContent,
  findAll,
  findFirst,
  countPlaceholders,
  formatTree,
} from './tree.js';
export { resolveConfig, configFromEnv, EngineConfigSchema, type EngineConfig, type EngineConfigInput } from './config.js';
export {
  ExpansionError,
  ErrorSeverity,
  MalformedPlaceholderError,
  SubParserError,
  DocbookParseError,
  ConfigError,
} from './errors.js';
export { createTranslator, formatMessage, MESSAGES, LOCALES, type Locale, type MessageKey, type Translator } from './messages.js';
export { HighlightJsRegistry, type Lexer, type LexerRegistry } from './highlight/registry.js';
export { NodeTreeEmitter } from './highlight/emitter.js';
export * from './parsers/index.js';
export * from './types.js';
