// ─── highlight.js → DocumentNode Emitter ────────────────────────────────────
//
// highlight.js drives an emitter while it tokenizes: scopes open and close
// around runs of text. This emitter builds `span` nodes for scopes and text
// runs for text, so a highlight result can be spliced into a document tree
// as is. `toHTML` still renders the equivalent markup.

import type { Emitter } from 'highlight.js';
import type { ChildNode, DocumentNode } from '../types.js';
import { appendText, element } from '../tree.js';

interface EmitterOptions {
  classPrefix?: string;
}

export class NodeTreeEmitter implements Emitter {
  readonly root: DocumentNode;
  private readonly stack: DocumentNode[];
  private readonly classPrefix: string;

  constructor(options: EmitterOptions = {}) {
    this.classPrefix = options.classPrefix ?? 'hljs-';
    this.root = element('span');
    this.stack = [this.root];
  }

  private get top(): DocumentNode {
    return this.stack[this.stack.length - 1] ?? this.root;
  }

  addText(text: string): void {
    appendText(this.top, text);
  }

  startScope(scope: string): void {
    const node = element('span', { class: scopeToClass(scope, this.classPrefix) });
    this.top.children.push(node);
    this.stack.push(node);
  }

  endScope(): void {
    if (this.stack.length > 1) this.stack.pop();
  }

  // Older name still used on the continuation path
  openNode(scope: string): void {
    this.startScope(scope);
  }

  closeNode(): void {
    this.endScope();
  }

  __addSublanguage(emitter: Emitter, subLanguageName: string | undefined): void {
    // every emitter of the shared instance is a NodeTreeEmitter
    if (!(emitter instanceof NodeTreeEmitter)) return;
    if (subLanguageName) {
      this.top.children.push(
        element('span', { class: `language-${subLanguageName}` }, emitter.root.children),
      );
    } else {
      for (const child of emitter.root.children) {
        if (typeof child === 'string') appendText(this.top, child);
        else this.top.children.push(child);
      }
    }
  }

  finalize(): void {
    this.stack.length = 1;
  }

  toHTML(): string {
    return renderHtml(this.root.children);
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * `title.function` → `hljs-title function_`, matching the classes
 * highlight.js itself emits.
 */
export function scopeToClass(scope: string, prefix: string = 'hljs-'): string {
  if (scope.startsWith('language:')) {
    return scope.replace('language:', 'language-');
  }
  const [head = '', ...rest] = scope.split('.');
  return [`${prefix}${head}`, ...rest.map((part, i) => `${part}${'_'.repeat(i + 1)}`)].join(' ');
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

function renderHtml(children: ChildNode[]): string {
  return children
    .map((child) => {
      if (typeof child === 'string') return escapeHtml(child);
      const cls = child.attributes.class;
      const inner = renderHtml(child.children);
      return cls ? `<span class="${cls}">${inner}</span>` : inner;
    })
    .join('');
}
