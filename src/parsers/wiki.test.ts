import { describe, it, expect } from 'vitest';
import { createPlaceholder, element } from '../tree.js';
import { type Arguments, emptyArguments } from './arguments.js';
import { LineCursor } from './line-cursor.js';
import { WikiParser } from './wiki.js';

function parse(text: string, args: Arguments = emptyArguments()) {
  return new WikiParser().parseBlock(LineCursor.fromText(text), args);
}

const cell = (text: string) => element('table-cell', {}, [text]);

describe('WikiParser', () => {
  it('should parse headings and paragraphs', () => {
    expect(parse('== Title ==\none\ntwo\n\nthree').children).toEqual([
      element('h', { 'outline-level': '2' }, ['Title']),
      element('p', {}, ['one two']),
      element('p', {}, ['three']),
    ]);
  });

  it('should parse inline markup', () => {
    expect(parse("a '''b''' and ''c'' --(gone)--").children).toEqual([
      element('p', {}, [
        'a ',
        element('strong', {}, ['b']),
        ' and ',
        element('emphasis', {}, ['c']),
        ' ',
        element('del', {}, ['gone']),
      ]),
    ]);
  });

  it('should nest list items by indentation', () => {
    expect(parse(' * one\n * two\n   * deep').children).toEqual([
      element('list', { 'item-label-generate': 'unordered' }, [
        element('list-item', {}, [element('list-item-body', {}, ['one'])]),
        element('list-item', {}, [
          element('list-item-body', {}, [
            'two',
            element('list', { 'item-label-generate': 'unordered' }, [
              element('list-item', {}, [element('list-item-body', {}, ['deep'])]),
            ]),
          ]),
        ]),
      ]),
    ]);
  });

  it('should mark numbered lists as ordered', () => {
    const [list] = parse(' 1. first\n 1. second').children;
    expect(list).toMatchObject({ tag: 'list', attributes: { 'item-label-generate': 'ordered' } });
  });

  it('should parse table rows', () => {
    expect(parse('||a||b||\n||1||2||').children).toEqual([
      element('table', {}, [
        element('table-body', {}, [
          element('table-row', {}, [cell('a'), cell('b')]),
          element('table-row', {}, [cell('1'), cell('2')]),
        ]),
      ]),
    ]);
  });

  it('should turn raw blocks with a directive into placeholders', () => {
    expect(parse('{{{#!csv\na;b\n}}}').children).toEqual([createPlaceholder('a;b', '#!csv')]);
  });

  it('should let a longer marker enclose shorter blocks', () => {
    expect(parse('{{{{#!wiki\n{{{#!csv\nx\n}}}\n}}}}').children).toEqual([
      createPlaceholder('{{{#!csv\nx\n}}}', '#!wiki', 4),
    ]);
  });

  it('should keep raw blocks without a directive as preformatted text', () => {
    expect(parse('{{{\ncode here\n}}}').children).toEqual([element('blockcode', {}, ['code here'])]);
  });

  it('should put the class argument on the body', () => {
    const args = emptyArguments();
    args.keyword.class = 'red solid';
    expect(parse('----', args)).toEqual(element('body', { class: 'red solid' }, [element('separator')]));
  });
});
