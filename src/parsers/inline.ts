// ─── Inline Markup ──────────────────────────────────────────────────────────
//
// A small rule-driven scanner shared by the wiki-style parsers. At each
// position the earliest-matching rule wins; on a tie, the rule listed first
// wins, so longer delimiters (''' before '') must come first.

import type { ChildNode, DocumentNode } from '../types.js';
import { appendText, element } from '../tree.js';

export interface InlineRule {
  /** Pattern without flags; compiled with `g` internally */
  pattern: RegExp;
  /**
   * Build the node(s) for a match. `inline` parses nested markup with the
   * same rule set.
   */
  build(match: RegExpExecArray, inline: (text: string) => ChildNode[]): ChildNode | ChildNode[];
}

export type InlineParser = (text: string) => ChildNode[];

export function createInlineParser(rules: InlineRule[]): InlineParser {
  const compiled = rules.map((rule) => ({
    rule,
    re: new RegExp(rule.pattern.source, 'g'),
  }));

  const parse = (text: string): ChildNode[] => {
    const out = element('span');
    let pos = 0;

    while (pos < text.length) {
      let best: { match: RegExpExecArray; rule: InlineRule } | null = null;

      for (const { rule, re } of compiled) {
        re.lastIndex = pos;
        const match = re.exec(text);
        if (match && match[0].length > 0 && (!best || match.index < best.match.index)) {
          best = { match, rule };
        }
      }

      if (!best) break;

      appendText(out, text.slice(pos, best.match.index));
      const built = best.rule.build(best.match, parse);
      for (const child of Array.isArray(built) ? built : [built]) {
        if (typeof child === 'string') appendText(out, child);
        else out.children.push(child);
      }
      pos = best.match.index + best.match[0].length;
    }

    appendText(out, text.slice(pos));
    return out.children;
  };

  return parse;
}

// ─── Rule Helpers ───────────────────────────────────────────────────────────

/** Wrap the first capture group (parsed recursively) in `tag`. */
export function wrap(pattern: RegExp, tag: DocumentNode['tag']): InlineRule {
  return {
    pattern,
    build: (m, inline) => element(tag, {}, inline(m[1] ?? '')),
  };
}

/** Put the first capture group in `tag` verbatim. */
export function literal(pattern: RegExp, tag: DocumentNode['tag']): InlineRule {
  return {
    pattern,
    build: (m) => element(tag, {}, [m[1] ?? '']),
  };
}

/** A link: first group is the target, optional second group the label. */
export function link(pattern: RegExp): InlineRule {
  return {
    pattern,
    build: (m, inline) => {
      const target = (m[1] ?? '').trim();
      const label = m[2]?.trim();
      return element('a', { href: target }, label ? inline(label) : [target]);
    },
  };
}

export function lineBreak(pattern: RegExp): InlineRule {
  return { pattern, build: () => element('line-break') };
}
