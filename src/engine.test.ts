import { describe, it, expect } from 'vitest';
import { Expander, expand } from './engine.js';
import { DocbookParseError, MalformedPlaceholderError } from './errors.js';
import { countPlaceholders, createPlaceholder, element, findAll, findFirst, textContent } from './tree.js';
import { CSV_TABLE_CLASS, type ChildNode, type DocumentNode } from './types.js';

function page(...children: ChildNode[]): DocumentNode {
  return element('page', {}, children);
}

/** The expanded placeholder sitting at `root.children[0]`. */
function firstBlock(root: DocumentNode): DocumentNode {
  const [first] = root.children;
  if (first === undefined || typeof first === 'string') throw new Error('expected an element');
  return first;
}

const errors = (root: DocumentNode) => findAll(root, (n) => n.tag === 'div' && n.attributes.class === 'error');

const row = (...cells: string[]) =>
  element('table-row', {}, cells.map((cell) => element('table-cell', {}, [cell])));

describe('Expander', () => {
  const expander = new Expander();

  it('should replace every placeholder and return the same root', () => {
    const root = page(
      createPlaceholder('x = 1', '#!highlight python'),
      element('p', {}, ['between']),
      createPlaceholder('a;b', '#!csv'),
      createPlaceholder('*hi*', '#!markdown'),
    );

    expect(expander.expand(root)).toBe(root);
    expect(countPlaceholders(root)).toBe(0);
    expect(root.children.map((c) => (typeof c === 'string' ? c : c.tag))).toEqual(['div', 'p', 'div', 'div']);
  });

  it('should leave an expanded tree unchanged on a second pass', () => {
    const root = page(
      createPlaceholder('= T =\n{{{#!csv\na;b\n}}}', '#!wiki'),
      createPlaceholder('hello', '#!bogus-format'),
    );
    expander.expand(root);
    const once = structuredClone(root);

    expander.expand(root);
    expect(root).toEqual(once);
  });

  it('should highlight legacy names exactly like highlight', () => {
    const legacy = expander.expand(page(createPlaceholder('def f():\n    pass', '#!python')));
    const canonical = expander.expand(page(createPlaceholder('def f():\n    pass', '#!highlight python')));
    expect(legacy).toEqual(canonical);
  });

  it('should render highlighted code in one highlight block', () => {
    const block = firstBlock(expander.expand(page(createPlaceholder('x = 1', '#!highlight python'))));
    expect(block.children).toHaveLength(1);
    const [code] = block.children;
    expect(code).toMatchObject({ tag: 'blockcode', attributes: { class: 'highlight' } });
    expect(textContent(block)).toBe('x = 1');
  });

  it('should resolve lexers by mimetype', () => {
    const root = expander.expand(page(createPlaceholder('x = 1', '#!highlight text/x-python')));
    expect(errors(root)).toHaveLength(0);
  });

  it('should build a table from separated values', () => {
    const root = expander.expand(page(createPlaceholder('a;b\n1;2\n3;4', '#!csv')));
    expect(firstBlock(root)).toEqual(
      element('div', {}, [
        element('table', { class: CSV_TABLE_CLASS }, [
          element('table-header', {}, [row('a', 'b')]),
          element('table-body', {}, [row('1', '2'), row('3', '4')]),
        ]),
      ]),
    );
  });

  it('should keep ragged rows', () => {
    const root = expander.expand(page(createPlaceholder('a;b\n1', '#!csv')));
    expect(findFirst(root, 'table-body')).toEqual(element('table-body', {}, [row('1')]));
  });

  it('should report unknown formats and fall back to plain text', () => {
    const root = expander.expand(page(createPlaceholder('hello', '#!bogus-format')));
    expect(firstBlock(root)).toEqual(
      element('div', {}, [
        element('div', { class: 'error' }, [
          element('p', {}, ['Defaulting to plain text due to invalid arguments: "#!bogus-format"']),
        ]),
        element('blockcode', { class: 'highlight' }, ['hello']),
      ]),
    );
  });

  it('should report an unresolvable lexer without throwing', () => {
    const root = expander.expand(page(createPlaceholder('x', '#!highlight not-a-real-language')));
    const [diagnostic, code] = firstBlock(root).children;
    expect(diagnostic).toMatchObject({ tag: 'div', attributes: { class: 'error' } });
    expect(code).toEqual(element('blockcode', { class: 'highlight' }, ['x']));
    expect(textContent(errors(root)[0] ?? element('p'))).toBe(
      'Defaulting to plain text due to invalid arguments: "#!highlight not-a-real-language"',
    );
  });

  it('should treat Object.prototype names as unknown lexers', () => {
    const root = expander.expand(page(createPlaceholder('x', '#!highlight constructor')));
    expect(firstBlock(root)).toEqual(
      element('div', {}, [
        element('div', { class: 'error' }, [
          element('p', {}, ['Defaulting to plain text due to invalid arguments: "#!highlight constructor"']),
        ]),
        element('blockcode', { class: 'highlight' }, ['x']),
      ]),
    );
  });

  it('should treat an Object.prototype name on a markdown fence as unknown', () => {
    const root = expander.expand(page(createPlaceholder('```toString\nx\n```', '#!markdown')));
    expect(errors(root)).toHaveLength(1);
    expect(findFirst(root, 'blockcode')).toEqual(element('blockcode', { class: 'highlight' }, ['x']));
  });

  it('should route a directive line without the sentinel to the fallback', () => {
    const root = expander.expand(page(createPlaceholder('body', 'just words')));
    expect(textContent(errors(root)[0] ?? element('p'))).toBe(
      'Defaulting to plain text due to invalid arguments: "just words"',
    );
  });

  it('should expand placeholders emitted by a sub-parser', () => {
    const root = expander.expand(page(createPlaceholder('= Title =\n{{{#!csv\nx;y\n1;2\n}}}', '#!wiki')));
    expect(countPlaceholders(root)).toBe(0);
    expect(findFirst(root, 'table')?.attributes).toEqual({ class: CSV_TABLE_CLASS });
    expect(findFirst(root, 'body')?.children[0]).toEqual(element('h', { 'outline-level': '1' }, ['Title']));
  });

  it('should expand code blocks from every whole-text parser', () => {
    const root = expander.expand(
      page(
        createPlaceholder('```python\nx = 1\n```', '#!markdown'),
        createPlaceholder('.. code-block:: python\n\n   x = 1', '#!rst'),
        createPlaceholder('<programlisting language="python">x = 1</programlisting>', '#!docbook'),
        createPlaceholder('<source lang="python">x = 1</source>', '#!mediawiki'),
      ),
    );
    const blocks = findAll(root, (n) => n.tag === 'blockcode');
    expect(blocks.map((b) => b.attributes.class)).toEqual(['highlight', 'highlight', 'highlight', 'highlight']);
    expect(blocks.map((b) => textContent(b))).toEqual(['x = 1', 'x = 1', 'x = 1', 'x = 1']);
  });

  it('should throw on a malformed placeholder', () => {
    expect(() => expander.expand(page(element('nowiki', {}, ['{{{'])))).toThrow(MalformedPlaceholderError);
    expect(() =>
      expander.expand(page(element('nowiki', {}, ['{{{', element('p', {}, ['#!csv']), 'a;b']))),
    ).toThrow(MalformedPlaceholderError);
  });

  it('should let sub-parser errors propagate', () => {
    expect(() => expander.expand(page(createPlaceholder('<para>', '#!docbook')))).toThrow(DocbookParseError);
  });
});

describe('Expander configuration', () => {
  it('should stop dispatching past the nesting limit', () => {
    const root = new Expander({ config: { maxNesting: 1 } }).expand(
      page(createPlaceholder('{{{#!csv\na;b\n}}}', '#!wiki')),
    );

    expect(countPlaceholders(root)).toBe(0);
    expect(findFirst(root, 'table')).toBeNull();
    expect(errors(root).map((n) => textContent(n))).toEqual([
      'Blocks nested more than 1 levels deep are shown as plain text: "#!csv"',
    ]);
    expect(findFirst(root, 'blockcode')).toEqual(element('blockcode', { class: 'highlight' }, ['a;b']));
  });

  it('should use the configured default separator', () => {
    const root = new Expander({ config: { defaultSeparator: ',' } }).expand(
      page(createPlaceholder('a,b', '#!csv')),
    );
    expect(findFirst(root, 'table-header')).toEqual(element('table-header', {}, [row('a', 'b')]));
  });

  it('should localize diagnostics', () => {
    const root = new Expander({ config: { locale: 'de' } }).expand(page(createPlaceholder('x', '#!nope')));
    expect(textContent(errors(root)[0] ?? element('p'))).toBe(
      'Ungültige Argumente, Anzeige als einfacher Text: "#!nope"',
    );
  });

  it('should use an injected translator', () => {
    const root = expand(page(createPlaceholder('x', '#!nope')), {
      translate: (key, params) => `${key}:${params.arguments ?? ''}`,
    });
    expect(textContent(errors(root)[0] ?? element('p'))).toBe('invalidArguments:#!nope');
  });
});
