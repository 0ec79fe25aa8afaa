// ─── Expander ───────────────────────────────────────────────────────────────
//
// Walks a document tree and replaces every raw-block placeholder with its
// expansion:
//
//   1. Find placeholders pre-order, left to right (explicit worklist)
//   2. Parse the directive line, resolve the format
//   3. Highlight / build a table / run a sub-parser / report and fall back
//   4. Queue the new children, so placeholders a sub-parser emitted are
//      expanded in the same call
//
// Format-resolution problems never throw: they become an inline diagnostic
// followed by the body as plain text.

import type { ChildNode, DocumentNode, Directive } from './types.js';
import { EXPANDED_TAG, ERROR_CLASS, HIGHLIGHT_CLASS, PLACEHOLDER_ARGS_TAG, PLACEHOLDER_TAG } from './types.js';
import { parseDirective } from './directive.js';
import { resolveFormat } from './formats.js';
import { type EngineConfig, type EngineConfigInput, resolveConfig } from './config.js';
import { MalformedPlaceholderError } from './errors.js';
import { type LexerRegistry, type Lexer, HighlightJsRegistry } from './highlight/registry.js';
import { createServiceLogger } from './logger.js';
import { type MessageKey, type Translator, createTranslator } from './messages.js';
import { createDefaultParsers } from './parsers/index.js';
import { SubParserAdapter } from './parsers/adapter.js';
import type { SubParserTable } from './parsers/types.js';
import { buildSeparatedTable } from './table.js';
import { element } from './tree.js';

const log = createServiceLogger('expander');

export interface ExpanderOptions {
  /** Defaults to the shared highlight.js registry */
  lexers?: LexerRegistry;
  parsers?: SubParserTable;
  config?: EngineConfigInput;
  /** Overrides the catalog for the configured locale */
  translate?: Translator;
}

interface PlaceholderParts {
  directiveLine: string;
  body: string;
}

interface WorkItem {
  node: DocumentNode;
  /** Placeholders enclosing this node */
  nesting: number;
}

let sharedLexers: LexerRegistry | undefined;

function defaultLexers(): LexerRegistry {
  sharedLexers ??= new HighlightJsRegistry();
  return sharedLexers;
}

export class Expander {
  readonly config: EngineConfig;
  private readonly lexers: LexerRegistry;
  private readonly adapter: SubParserAdapter;
  private readonly translate: Translator;

  constructor(options: ExpanderOptions = {}) {
    this.config = resolveConfig(options.config);
    this.lexers = options.lexers ?? defaultLexers();
    this.adapter = new SubParserAdapter(options.parsers ?? createDefaultParsers());
    this.translate = options.translate ?? createTranslator(this.config.locale);
  }

  /**
   * Expand every placeholder below `root`, in place. Returns `root`.
   *
   * @throws MalformedPlaceholderError if a placeholder lacks its marker,
   *   directive and body children
   * @throws SubParserError (or any other error) a sub-parser raises
   */
  expand(root: DocumentNode): DocumentNode {
    const stack: WorkItem[] = [{ node: root, nesting: 0 }];
    let expanded = 0;

    while (stack.length > 0) {
      const item = stack.pop();
      if (item === undefined) break;
      const { node } = item;
      let { nesting } = item;

      if (node.tag === PLACEHOLDER_TAG) {
        nesting += 1;
        this.expandPlaceholder(node, nesting);
        expanded++;
      }

      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        if (child !== undefined && typeof child !== 'string') {
          stack.push({ node: child, nesting });
        }
      }
    }

    log.debug('expansion finished', { placeholders: expanded });
    return root;
  }

  private expandPlaceholder(node: DocumentNode, nesting: number): void {
    const { directiveLine, body } = readPlaceholder(node);
    const directive = parseDirective(directiveLine);
    node.children = [];
    node.tag = EXPANDED_TAG;

    log.debug('expanding placeholder', { format: directive.formatName, nesting });

    if (nesting > this.config.maxNesting) {
      this.report(node, 'nestingTooDeep', directive, { limit: String(this.config.maxNesting) });
      node.children.push(this.highlight(body, this.lexers.plainText()));
      return;
    }

    const resolution = resolveFormat(directive, this.config.defaultSeparator);
    switch (resolution.kind) {
      case 'highlight': {
        const hint = resolution.lexerHint;
        let lexer = this.lexers.resolveByName(hint) ?? this.lexers.resolveByMimetype(hint);
        if (!lexer) {
          this.report(node, 'invalidArguments', directive);
          lexer = this.lexers.plainText();
        }
        node.children.push(this.highlight(body, lexer));
        break;
      }
      case 'table':
        node.children.push(buildSeparatedTable(body, resolution.separator));
        break;
      case 'subparser':
        node.children.push(this.adapter.invoke(resolution.parser, body, resolution.args));
        break;
      case 'unknown':
        this.report(node, 'invalidArguments', directive);
        node.children.push(this.highlight(body, this.lexers.plainText()));
        break;
      default: {
        const unreachable: never = resolution;
        return unreachable;
      }
    }
  }

  private highlight(text: string, lexer: Lexer): DocumentNode {
    return element('blockcode', { class: HIGHLIGHT_CLASS }, this.lexers.render(text, lexer));
  }

  /** Append a `div.error > p > message` diagnostic to `parent`. */
  private report(
    parent: DocumentNode,
    key: MessageKey,
    directive: Directive,
    params: Record<string, string> = {},
  ): void {
    const message = this.translate(key, { ...params, arguments: directive.raw });
    log.warn(message, { format: directive.formatName, args: directive.formatArgs });
    parent.children.push(element('div', { class: ERROR_CLASS }, [element('p', {}, [message])]));
  }
}

/**
 * Check the placeholder's shape (marker, `nowiki-args` node, body text) and
 * pull out the directive line and body.
 */
function readPlaceholder(node: DocumentNode): PlaceholderParts {
  if (node.children.length !== 3) {
    throw new MalformedPlaceholderError(`expected 3 children, found ${node.children.length}`, {
      children: node.children.length,
    });
  }
  const [marker, args, body] = node.children;

  if (typeof marker !== 'string') {
    throw new MalformedPlaceholderError('first child must be the opening marker text');
  }
  if (!isArgsNode(args)) {
    throw new MalformedPlaceholderError(`second child must be a ${PLACEHOLDER_ARGS_TAG} node`);
  }
  if (typeof body !== 'string') {
    throw new MalformedPlaceholderError('third child must be the raw body text');
  }

  const directiveLine = args.children.filter((c): c is string => typeof c === 'string').join('');
  return { directiveLine, body };
}

function isArgsNode(child: ChildNode | undefined): child is DocumentNode {
  return child !== undefined && typeof child !== 'string' && child.tag === PLACEHOLDER_ARGS_TAG;
}

/** Expand `root` in place with a one-off expander. */
export function expand(root: DocumentNode, options?: ExpanderOptions): DocumentNode {
  return new Expander(options).expand(root);
}
