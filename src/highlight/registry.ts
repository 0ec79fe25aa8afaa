// ─── Lexer Registry ─────────────────────────────────────────────────────────
//
// Resolves a language name or mimetype to a highlight.js grammar and renders
// highlighted text into document nodes. It works on the default highlight.js
// instance, which is shared by the whole process.

import hljs from 'highlight.js';
import { extension } from 'mime-types';
import type { ChildNode } from '../types.js';
import { PLAIN_TEXT_LEXER } from '../types.js';
import { createServiceLogger } from '../logger.js';
import { NodeTreeEmitter } from './emitter.js';

const log = createServiceLogger('highlight');

export interface Lexer {
  /** Name highlight.js knows the grammar by */
  id: string;
  /** Human-readable grammar name */
  label: string;
}

export interface LexerRegistry {
  resolveByName(name: string | undefined): Lexer | undefined;
  resolveByMimetype(mimetype: string | undefined): Lexer | undefined;
  /** The plain-text lexer; never fails */
  plainText(): Lexer;
  render(text: string, lexer: Lexer): ChildNode[];
}

/**
 * Names used by old wiki content that highlight.js spells differently.
 */
const LEXER_ALIASES: ReadonlyMap<string, string> = new Map([
  ['cplusplus', 'cpp'],
  ['irc', 'plaintext'],
  ['text', 'plaintext'],
]);

function configureHighlightJs(): void {
  hljs.configure({ __emitter: NodeTreeEmitter });
}

/**
 * Lexer registry backed by the default highlight.js instance.
 *
 * highlight.js has no per-call emitter option, so constructing a registry sets
 * `__emitter` on that shared instance for the whole process. Other callers
 * of the instance still get HTML in `result.value`, built by
 * `NodeTreeEmitter.toHTML`. If something else replaces the emitter later,
 * `render` sets it back and highlights again.
 */
export class HighlightJsRegistry implements LexerRegistry {
  constructor() {
    configureHighlightJs();
  }

  resolveByName(name: string | undefined): Lexer | undefined {
    if (!name) return undefined;
    const id = LEXER_ALIASES.get(name) ?? name;
    const language = hljs.getLanguage(id);
    if (!language) return undefined;
    return { id, label: language.name ?? id };
  }

  resolveByMimetype(mimetype: string | undefined): Lexer | undefined {
    if (!mimetype) return undefined;
    const essence = (mimetype.split(';')[0] ?? '').trim().toLowerCase();
    if (!essence.includes('/')) return undefined;

    // text/x-python → py → python
    const ext = extension(essence);
    if (ext) {
      const lexer = this.resolveByName(ext);
      if (lexer) return lexer;
    }

    // text/x-python → python, application/json → json
    const subtype = essence.slice(essence.indexOf('/') + 1).replace(/^x-/, '');
    return this.resolveByName(subtype);
  }

  plainText(): Lexer {
    return this.resolveByName(PLAIN_TEXT_LEXER) ?? { id: 'plaintext', label: 'Plain text' };
  }

  render(text: string, lexer: Lexer): ChildNode[] {
    let result = hljs.highlight(text, { language: lexer.id, ignoreIllegals: true });
    if (!(result._emitter instanceof NodeTreeEmitter)) {
      log.debug('highlight.js emitter was replaced, configuring it again');
      configureHighlightJs();
      result = hljs.highlight(text, { language: lexer.id, ignoreIllegals: true });
    }
    const emitter = result._emitter;
    if (result.errorRaised || !(emitter instanceof NodeTreeEmitter)) {
      log.warn('highlighting failed, using unstyled text', {
        lexer: lexer.id,
        error: result.errorRaised?.message,
      });
      return text === '' ? [] : [text];
    }
    return emitter.root.children;
  }
}
