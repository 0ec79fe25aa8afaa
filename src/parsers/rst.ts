// ─── reStructuredText Parser ────────────────────────────────────────────────
//
// The commonly used subset of reStructuredText:
//
//   Title            section titles, underlined (optionally overlined);
//   =====            levels follow the order adornment styles first appear
//
//   .. code-block:: python     → nested `#!highlight python` placeholder
//   .. note:: / warning:: …    → admonition
//   .. anything else            → comment, dropped
//   - item / 1. item           → lists
//   Paragraph::                → literal block follows
//   (indented text)            → block quote
//
// Inline: **strong**, *emphasis*, ``literal``, `label <url>`_, `interpreted`.

import type { ChildNode, DocumentNode } from '../types.js';
import { createPlaceholder, element } from '../tree.js';
import { createInlineParser, literal, wrap } from './inline.js';
import { normalizeSplitText } from './line-cursor.js';
import type { TextParser } from './types.js';

const ADORNMENT_RE = /^([=\-`:'"~^_*+#<>])\1{2,}\s*$/;
const BULLET_RE = /^([-*+])\s+(.*)$/;
const ENUMERATED_RE = /^(\d+|#)[.)]\s+(.*)$/;
const DIRECTIVE_RE = /^\.\.\s+([\w-]+)::\s*(.*)$/;
const COMMENT_RE = /^\.\.(\s|$)/;
const OPTION_RE = /^:[\w-]+:/;

const CODE_DIRECTIVES: ReadonlySet<string> = new Set(['code', 'code-block', 'sourcecode']);
const ADMONITIONS: ReadonlySet<string> = new Set([
  'attention',
  'caution',
  'danger',
  'error',
  'hint',
  'important',
  'note',
  'tip',
  'warning',
]);

const inline = createInlineParser([
  wrap(/\*\*(.+?)\*\*/, 'strong'),
  wrap(/\*([^*\s](?:[^*]*[^*\s])?)\*/, 'emphasis'),
  literal(/``(.+?)``/, 'code'),
  {
    pattern: /`([^`<]+?)\s*<([^>`]+)>`__?/,
    build: (m, nested) => element('a', { href: m[2] ?? '' }, nested(m[1] ?? '')),
  },
  wrap(/`([^`]+)`/, 'emphasis'),
]);

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

function isBlank(line: string | undefined): boolean {
  return line === undefined || line.trim() === '';
}

/**
 * Read the indented block starting at `start` (blank lines allowed inside)
 * and strip the common indentation.
 */
function readIndented(lines: string[], start: number): { block: string[]; next: number } {
  let next = start;
  const raw: string[] = [];
  while (next < lines.length) {
    const line = lines[next] ?? '';
    if (line.trim() !== '' && indentOf(line) === 0) break;
    raw.push(line);
    next++;
  }

  while (raw.length > 0 && isBlank(raw[0])) raw.shift();
  while (raw.length > 0 && isBlank(raw[raw.length - 1])) raw.pop();

  const indent = Math.min(...raw.filter((l) => l.trim() !== '').map(indentOf));
  const block = raw.map((l) => (l.trim() === '' ? '' : l.slice(indent)));
  return { block, next };
}

/** Tracks title adornment styles in order of first appearance. */
class TitleStyles {
  private readonly seen: string[] = [];

  levelOf(style: string): number {
    let index = this.seen.indexOf(style);
    if (index === -1) {
      this.seen.push(style);
      index = this.seen.length - 1;
    }
    return index + 1;
  }
}

export class RstParser implements TextParser {
  parse(text: string, contentType: string): DocumentNode {
    const lines = normalizeSplitText(text);
    return element('body', { 'content-type': contentType }, this.parseLines(lines, new TitleStyles()));
  }

  private parseLines(lines: string[], styles: TitleStyles): DocumentNode[] {
    const out: DocumentNode[] = [];
    let i = 0;

    while (i < lines.length) {
      const line = lines[i] ?? '';
      const next = lines[i + 1];
      const afterNext = lines[i + 2];

      if (line.trim() === '') {
        i++;
        continue;
      }

      // Overlined title: ===== / Title / =====
      if (
        ADORNMENT_RE.test(line) &&
        next !== undefined && next.trim() !== '' &&
        afterNext !== undefined && afterNext.trim() === line.trim()
      ) {
        const level = styles.levelOf(`${line.trim()[0]}/over`);
        out.push(element('h', { 'outline-level': String(level) }, inline(next.trim())));
        i += 3;
        continue;
      }

      // Underlined title: Title / =====
      if (
        indentOf(line) === 0 &&
        next !== undefined && ADORNMENT_RE.test(next) &&
        next.trim().length >= line.trim().length
      ) {
        const level = styles.levelOf(`${next.trim()[0]}`);
        out.push(element('h', { 'outline-level': String(level) }, inline(line.trim())));
        i += 2;
        continue;
      }

      const directive = DIRECTIVE_RE.exec(line);
      if (directive) {
        const { block, next: after } = readIndented(lines, i + 1);
        const node = this.directive(directive[1] ?? '', (directive[2] ?? '').trim(), block, styles);
        if (node) out.push(node);
        i = after;
        continue;
      }

      if (COMMENT_RE.test(line)) {
        i = readIndented(lines, i + 1).next;
        continue;
      }

      if (BULLET_RE.test(line) || ENUMERATED_RE.test(line)) {
        const ordered = !BULLET_RE.test(line);
        const { list, next: after } = this.list(lines, i, ordered ? ENUMERATED_RE : BULLET_RE, ordered, styles);
        out.push(list);
        i = after;
        continue;
      }

      if (indentOf(line) > 0) {
        const { block, next: after } = readIndented(lines, i);
        out.push(element('blockquote', {}, this.parseLines(block, styles)));
        i = after;
        continue;
      }

      i = this.paragraph(lines, i, out);
    }

    return out;
  }

  private paragraph(lines: string[], start: number, out: DocumentNode[]): number {
    const collected: string[] = [];
    let i = start;
    while (i < lines.length && !isBlank(lines[i]) && (collected.length === 0 || indentOf(lines[i] ?? '') === 0)) {
      collected.push((lines[i] ?? '').trim());
      i++;
    }

    let text = collected.join(' ');
    if (!text.endsWith('::')) {
      out.push(element('p', {}, inline(text)));
      return i;
    }

    // "Paragraph::" keeps one colon, " ::" keeps none, a lone "::" vanishes
    text = text === '::' ? '' : text.endsWith(' ::') ? text.slice(0, -3) : text.slice(0, -1);
    if (text) out.push(element('p', {}, inline(text)));

    const { block, next } = readIndented(lines, i);
    if (block.length > 0) out.push(element('blockcode', {}, [block.join('\n')]));
    return next;
  }

  private directive(
    name: string,
    argument: string,
    block: string[],
    styles: TitleStyles,
  ): DocumentNode | null {
    // leading :option: lines belong to the directive, not its content
    let start = 0;
    while (start < block.length && OPTION_RE.test(block[start] ?? '')) start++;
    const content = block.slice(start);
    while (content.length > 0 && isBlank(content[0])) content.shift();

    if (CODE_DIRECTIVES.has(name)) {
      const body = content.join('\n');
      return argument
        ? createPlaceholder(body, `#!highlight ${argument}`)
        : element('blockcode', {}, [body]);
    }

    if (ADMONITIONS.has(name)) {
      const lines = argument ? [argument, ...content] : content;
      return element('admonition', { type: name }, this.parseLines(lines, styles));
    }

    // Unsupported directives are dropped like comments
    return null;
  }

  private list(
    lines: string[],
    start: number,
    marker: RegExp,
    ordered: boolean,
    styles: TitleStyles,
  ): { list: DocumentNode; next: number } {
    const list = element('list', { 'item-label-generate': ordered ? 'ordered' : 'unordered' });
    let i = start;

    while (i < lines.length) {
      const m = marker.exec(lines[i] ?? '');
      if (!m) break;
      i++;

      // continuation lines of the item's first paragraph
      const textLines = [m[2] ?? ''];
      while (i < lines.length && !isBlank(lines[i]) && indentOf(lines[i] ?? '') > 0) {
        textLines.push((lines[i] ?? '').trim());
        i++;
      }
      const itemBody: ChildNode[] = inline(textLines.join(' '));

      // further indented blocks after a blank line belong to the item
      let j = i;
      while (j < lines.length && isBlank(lines[j])) j++;
      if (j < lines.length && j > i && indentOf(lines[j] ?? '') > 0) {
        const { block, next } = readIndented(lines, j);
        itemBody.push(...this.parseLines(block, styles));
        i = next;
        j = i;
        while (j < lines.length && isBlank(lines[j])) j++;
      }

      list.children.push(element('list-item', {}, [element('list-item-body', {}, itemBody)]));

      // blank lines between items
      if (j < lines.length && marker.test(lines[j] ?? '')) i = j;
      else break;
    }

    return { list, next: i };
  }
}
