// ─── Markdown → Document Parser ─────────────────────────────────────────────
//
// Converts a markdown string into the document model.
//
// Pipeline:
//   1. marked.lexer(md) → Token[]
//   2. Walk block tokens, mapping each onto a document node
//   3. Walk inline tokens into text runs and inline elements
//
// Fenced code with an info string becomes a nested `#!highlight` placeholder
// so the expander highlights it like any other raw block.

import { marked, type Token, type Tokens } from 'marked';
import type { ChildNode, DocumentNode } from '../types.js';
import { buildTable } from '../table.js';
import { appendText, createPlaceholder, element } from '../tree.js';
import type { TextParser } from './types.js';

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

/** marked escapes inline text for HTML output; the document model wants it plain. */
export function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity);
}

function stripTags(html: string): string {
  return html.replace(/<[^>]*>/g, '').trim();
}

export class MarkdownParser implements TextParser {
  parse(text: string, contentType: string): DocumentNode {
    const tokens = marked.lexer(text);
    return element('body', { 'content-type': contentType }, walkBlocks(tokens));
  }
}

// ─── Block tokens ───────────────────────────────────────────────────────────

function walkBlocks(tokens: Token[]): ChildNode[] {
  const out: ChildNode[] = [];

  for (const token of tokens) {
    switch (token.type) {
      case 'heading': {
        const t = token as Tokens.Heading;
        out.push(element('h', { 'outline-level': String(t.depth) }, walkInline(t.tokens)));
        break;
      }

      case 'paragraph': {
        const t = token as Tokens.Paragraph;
        out.push(element('p', {}, walkInline(t.tokens)));
        break;
      }

      case 'text': {
        // Tight list items hold bare text tokens instead of paragraphs
        const t = token as Tokens.Text;
        const content = t.tokens ? walkInline(t.tokens) : [decodeEntities(t.text)];
        out.push(element('p', {}, content));
        break;
      }

      case 'code': {
        const t = token as Tokens.Code;
        const lang = t.lang?.trim().split(/\s+/)[0];
        out.push(
          lang
            ? createPlaceholder(t.text, `#!highlight ${lang}`)
            : element('blockcode', {}, [t.text]),
        );
        break;
      }

      case 'list': {
        const t = token as Tokens.List;
        const items = t.items.map((item) =>
          element('list-item', {}, [element('list-item-body', {}, walkBlocks(item.tokens))]),
        );
        out.push(element('list', { 'item-label-generate': t.ordered ? 'ordered' : 'unordered' }, items));
        break;
      }

      case 'blockquote': {
        const t = token as Tokens.Blockquote;
        out.push(element('blockquote', {}, walkBlocks(t.tokens)));
        break;
      }

      case 'hr':
        out.push(element('separator'));
        break;

      case 'table': {
        const t = token as Tokens.Table;
        const head = t.header.map((cell) => walkInline(cell.tokens));
        const rows = t.rows.map((row) => row.map((cell) => walkInline(cell.tokens)));
        out.push(buildTable(rows, { head }));
        break;
      }

      case 'html': {
        const t = token as Tokens.HTML;
        const stripped = stripTags(t.text);
        if (stripped) out.push(element('p', {}, [stripped]));
        break;
      }

      case 'space':
      case 'def':
        break;

      default:
        if ('text' in token && typeof token.text === 'string' && token.text.trim()) {
          out.push(element('p', {}, [decodeEntities(token.text)]));
        }
    }
  }
  return out;
}

// ─── Inline tokens (recursive) ──────────────────────────────────────────────

function walkInline(tokens: Token[] | undefined): ChildNode[] {
  const out = element('span');
  if (!tokens) return out.children;

  const push = (child: ChildNode): void => {
    if (typeof child === 'string') appendText(out, child);
    else out.children.push(child);
  };

  for (const token of tokens) {
    switch (token.type) {
      case 'text': {
        const t = token as Tokens.Text;
        // marked sometimes nests em/strong inside text
        if (t.tokens && t.tokens.length > 0) walkInline(t.tokens).forEach(push);
        else push(decodeEntities(t.text));
        break;
      }

      case 'escape': {
        const t = token as Tokens.Escape;
        push(decodeEntities(t.text));
        break;
      }

      case 'strong': {
        const t = token as Tokens.Strong;
        push(element('strong', {}, walkInline(t.tokens)));
        break;
      }

      case 'em': {
        const t = token as Tokens.Em;
        push(element('emphasis', {}, walkInline(t.tokens)));
        break;
      }

      case 'del': {
        const t = token as Tokens.Del;
        push(element('del', {}, walkInline(t.tokens)));
        break;
      }

      case 'codespan': {
        const t = token as Tokens.Codespan;
        push(element('code', {}, [decodeEntities(t.text)]));
        break;
      }

      case 'link': {
        const t = token as Tokens.Link;
        const label = walkInline(t.tokens);
        push(element('a', { href: t.href }, label.length > 0 ? label : [t.href]));
        break;
      }

      case 'image': {
        // Images have no counterpart in the model; keep the alt text
        const t = token as Tokens.Image;
        push(decodeEntities(t.text));
        break;
      }

      case 'br':
        push(element('line-break'));
        break;

      case 'html':
        break;

      default:
        if ('text' in token && typeof token.text === 'string') push(token.text);
    }
  }
  return out.children;
}
