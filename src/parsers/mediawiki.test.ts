import { describe, it, expect } from 'vitest';
import { CONTENT_TYPE } from '../types.js';
import { createPlaceholder, element } from '../tree.js';
import { MediawikiParser } from './mediawiki.js';

const parse = (text: string, contentType: string = CONTENT_TYPE.MEDIAWIKI) =>
  new MediawikiParser().parse(text, contentType);

describe('MediawikiParser', () => {
  it('should stamp the given content type on the body', () => {
    expect(parse('x', 'text/x-mediawiki;variant=test').attributes).toEqual({
      'content-type': 'text/x-mediawiki;variant=test',
    });
  });

  it('should parse headings and paragraphs', () => {
    expect(parse('== Heading ==\nText').children).toEqual([
      element('h', { 'outline-level': '2' }, ['Heading']),
      element('p', {}, ['Text']),
    ]);
  });

  it('should parse quote markup', () => {
    expect(parse("'''bold''' and ''it'' and '''''both'''''").children).toEqual([
      element('p', {}, [
        element('strong', {}, ['bold']),
        ' and ',
        element('emphasis', {}, ['it']),
        ' and ',
        element('strong', {}, [element('emphasis', {}, ['both'])]),
      ]),
    ]);
  });

  it('should parse internal and external links', () => {
    expect(parse('[[Main Page|home]] or [http://a.example site]').children).toEqual([
      element('p', {}, [
        element('a', { href: 'Main Page' }, ['home']),
        ' or ',
        element('a', { href: 'http://a.example' }, ['site']),
      ]),
    ]);
  });

  it('should turn syntaxhighlight blocks into placeholders', () => {
    expect(parse('<syntaxhighlight lang="python">\nprint(1)\n</syntaxhighlight>').children).toEqual([
      createPlaceholder('print(1)', '#!highlight python'),
    ]);
  });

  it('should read pre blocks and leading-space lines as preformatted text', () => {
    expect(parse('<pre>\na\nb\n</pre>\n\n indented').children).toEqual([
      element('blockcode', {}, ['a\nb']),
      element('blockcode', {}, ['indented']),
    ]);
  });

  it('should parse lists', () => {
    expect(parse('# one\n# two').children).toEqual([
      element('list', { 'item-label-generate': 'ordered' }, [
        element('list-item', {}, [element('list-item-body', {}, ['one'])]),
        element('list-item', {}, [element('list-item-body', {}, ['two'])]),
      ]),
    ]);
  });

  it('should parse tables with a header row', () => {
    const cell = (text: string) => element('table-cell', {}, [text]);
    expect(parse('{|\n! A !! B\n|-\n| 1 || 2\n|}').children).toEqual([
      element('table', {}, [
        element('table-header', {}, [element('table-row', {}, [cell('A'), cell('B')])]),
        element('table-body', {}, [element('table-row', {}, [cell('1'), cell('2')])]),
      ]),
    ]);
  });
});
