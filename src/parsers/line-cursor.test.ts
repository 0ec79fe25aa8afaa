import { describe, it, expect } from 'vitest';
import { LineCursor, normalizeSplitText } from './line-cursor.js';

describe('normalizeSplitText', () => {
  it('should normalize line endings and drop trailing blank lines', () => {
    expect(normalizeSplitText('a\r\nb\rc\n\n  \n')).toEqual(['a', 'b', 'c']);
  });

  it('should keep inner blank lines', () => {
    expect(normalizeSplitText('a\n\nb')).toEqual(['a', '', 'b']);
  });
});

describe('LineCursor', () => {
  it('should hand back pushed lines first', () => {
    const lines = LineCursor.fromText('one\ntwo');
    expect(lines.next()).toBe('one');
    lines.push('one');
    expect(lines.peek()).toBe('one');
    expect(lines.next()).toBe('one');
    expect(lines.next()).toBe('two');
    expect(lines.next()).toBeUndefined();
    expect(lines.done).toBe(true);
  });

  it('should restart from the top', () => {
    const lines = new LineCursor(['a', 'b']);
    expect([...lines]).toEqual(['a', 'b']);
    lines.restart();
    expect(lines.done).toBe(false);
    expect(lines.next()).toBe('a');
  });
});
