import { describe, it, expect } from 'vitest';
import { DocbookParseError } from '../errors.js';
import { CONTENT_TYPE } from '../types.js';
import { createPlaceholder, element } from '../tree.js';
import { DocbookParser } from './docbook.js';

const parse = (xml: string) => new DocbookParser().parse(xml, CONTENT_TYPE.DOCBOOK);

describe('DocbookParser', () => {
  it('should map sections, titles and paragraphs', () => {
    expect(
      parse('<article><title>Doc</title><para>Hello <emphasis>world</emphasis></para></article>'),
    ).toEqual(
      element('body', { 'content-type': 'application/docbook+xml;charset=utf-8' }, [
        element('div', {}, [
          element('h', { 'outline-level': '1' }, ['Doc']),
          element('p', {}, ['Hello ', element('emphasis', {}, ['world'])]),
        ]),
      ]),
    );
  });

  it('should number nested section titles by depth', () => {
    const body = parse('<article><section><title>Inner</title></section></article>');
    expect(body.children).toEqual([
      element('div', {}, [element('div', {}, [element('h', { 'outline-level': '2' }, ['Inner'])])]),
    ]);
  });

  it('should ignore layout whitespace between block elements', () => {
    expect(parse('<article>\n  <para>a</para>\n</article>').children).toEqual([
      element('div', {}, [element('p', {}, ['a'])]),
    ]);
  });

  it('should collapse whitespace inside paragraphs', () => {
    expect(parse('<para>one\n   two</para>').children).toEqual([element('p', {}, ['one two'])]);
  });

  it('should turn program listings with a language into placeholders', () => {
    expect(parse('<programlisting language="python">print(1)</programlisting>').children).toEqual([
      createPlaceholder('print(1)', '#!highlight python'),
    ]);
    expect(parse('<screen>$ ls</screen>').children).toEqual([element('blockcode', {}, ['$ ls'])]);
  });

  it('should render bold emphasis as strong', () => {
    expect(parse('<para><emphasis role="bold">b</emphasis></para>').children).toEqual([
      element('p', {}, [element('strong', {}, ['b'])]),
    ]);
  });

  it('should map lists and links', () => {
    expect(
      parse(
        '<itemizedlist><listitem><para><link xlink:href="http://a.example">site</link></para></listitem></itemizedlist>',
      ).children,
    ).toEqual([
      element('list', { 'item-label-generate': 'unordered' }, [
        element('list-item', {}, [
          element('list-item-body', {}, [
            element('p', {}, [element('a', { href: 'http://a.example' }, ['site'])]),
          ]),
        ]),
      ]),
    ]);
  });

  it('should map CALS tables', () => {
    const xml =
      '<informaltable><tgroup cols="2">' +
      '<thead><row><entry>k</entry><entry>v</entry></row></thead>' +
      '<tbody><row><entry>a</entry><entry>1</entry></row></tbody>' +
      '</tgroup></informaltable>';
    const cell = (text: string) => element('table-cell', {}, [text]);
    expect(parse(xml).children).toEqual([
      element('table', {}, [
        element('table-header', {}, [element('table-row', {}, [cell('k'), cell('v')])]),
        element('table-body', {}, [element('table-row', {}, [cell('a'), cell('1')])]),
      ]),
    ]);
  });

  it('should throw DocbookParseError on ill-formed XML', () => {
    expect(() => parse('<article><para>x</article>')).toThrow(DocbookParseError);
  });
});
