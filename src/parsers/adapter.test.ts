import { describe, it, expect } from 'vitest';
import { DocbookParseError } from '../errors.js';
import { element } from '../tree.js';
import type { DocumentNode } from '../types.js';
import { SubParserAdapter } from './adapter.js';
import type { Arguments } from './arguments.js';
import { createDefaultParsers } from './index.js';
import type { LineCursor } from './line-cursor.js';
import type { LineParser, SubParserTable } from './types.js';

const adapter = new SubParserAdapter(createDefaultParsers());

/** Records what a line parser was handed. */
class RecordingLineParser implements LineParser {
  lines: string[] = [];
  args: Arguments | undefined;

  parseBlock(lines: LineCursor, args: Arguments): DocumentNode {
    this.lines = [...lines];
    this.args = args;
    return element('body');
  }
}

describe('SubParserAdapter', () => {
  it('should wrap the parser output in a page', () => {
    expect(adapter.invoke('wiki', '= T =', undefined)).toEqual(
      element('page', {}, [element('body', {}, [element('h', { 'outline-level': '1' }, ['T'])])]),
    );
  });

  it('should turn wiki arguments into a body class', () => {
    const page = adapter.invoke('wiki', 'x', 'red/solid');
    expect(page.children[0]).toMatchObject({ tag: 'body', attributes: { class: 'red solid' } });
  });

  it('should hand line parsers normalized lines and parsed arguments', () => {
    const creole = new RecordingLineParser();
    const parsers: SubParserTable = { ...createDefaultParsers(), creole };
    new SubParserAdapter(parsers).invoke('creole', 'a\r\nb\n\n', 'class=x');

    expect(creole.lines).toEqual(['a', 'b']);
    expect(creole.args).toEqual({ positional: [], keyword: { class: 'x' } });
  });

  it('should pass fixed content types to whole-text parsers', () => {
    expect(adapter.invoke('markdown', 'x', 'ignored').children[0]).toMatchObject({
      attributes: { 'content-type': 'text/x-markdown;charset=utf-8' },
    });
  });

  it('should pass mediawiki arguments through as the content type', () => {
    expect(adapter.invoke('mediawiki', 'x', undefined).children[0]).toMatchObject({
      attributes: { 'content-type': 'text/x-mediawiki;charset=utf-8' },
    });
    expect(adapter.invoke('mediawiki', 'x', 'text/x-mediawiki;variant=test').children[0]).toMatchObject({
      attributes: { 'content-type': 'text/x-mediawiki;variant=test' },
    });
  });

  it('should let parser errors propagate', () => {
    expect(() => adapter.invoke('docbook', '<para>', undefined)).toThrow(DocbookParseError);
  });
});
