import { describe, it, expect } from 'vitest';
import {
  appendText,
  countPlaceholders,
  createPlaceholder,
  element,
  findAll,
  findFirst,
  formatTree,
  textContent,
} from './tree.js';

describe('createPlaceholder', () => {
  it('should build marker, directive and body children', () => {
    expect(createPlaceholder('a;b', '#!csv')).toEqual({
      tag: 'nowiki',
      attributes: {},
      children: ['{{{', { tag: 'nowiki-args', attributes: {}, children: ['#!csv'] }, 'a;b'],
    });
  });

  it('should repeat the marker to the given length', () => {
    expect(createPlaceholder('', '#!wiki', 4).children[0]).toBe('{{{{');
  });
});

describe('appendText', () => {
  it('should merge with a trailing text run', () => {
    const node = element('p', {}, ['a']);
    appendText(node, 'b');
    appendText(node, '');
    expect(node.children).toEqual(['ab']);
  });

  it('should start a new run after an element', () => {
    const node = element('p', {}, [element('strong', {}, ['a'])]);
    appendText(node, 'b');
    expect(node.children).toHaveLength(2);
    expect(node.children[1]).toBe('b');
  });
});

describe('queries', () => {
  const tree = element('page', {}, [
    element('p', {}, ['one ', element('strong', {}, ['two'])]),
    createPlaceholder('body', '#!csv'),
    element('p', {}, [' three']),
  ]);

  it('should concatenate text in document order', () => {
    expect(textContent(element('p', {}, ['one ', element('strong', {}, ['two']), '!']))).toBe('one two!');
  });

  it('should find elements pre-order', () => {
    expect(findAll(tree, (n) => n.tag === 'p' || n.tag === 'strong').map((n) => n.tag)).toEqual([
      'p',
      'strong',
      'p',
    ]);
    expect(findFirst(tree, 'strong')?.children).toEqual(['two']);
    expect(findFirst(tree, 'table')).toBeNull();
  });

  it('should count placeholders', () => {
    expect(countPlaceholders(tree)).toBe(1);
  });
});

describe('formatTree', () => {
  it('should print one indented line per node with sorted attributes', () => {
    const tree = element('page', {}, [element('p', { class: 'x', a: '1' }, ['hi'])]);
    expect(formatTree(tree)).toEqual(['page', '  p a="1" class="x"', '    "hi"']);
  });
});
