import { describe, it, expect } from 'vitest';
import { createTranslator, formatMessage } from './messages.js';

describe('createTranslator', () => {
  it('should fill the raw arguments into the English template', () => {
    const t = createTranslator();
    expect(t('invalidArguments', { arguments: '#!nope' })).toBe(
      'Defaulting to plain text due to invalid arguments: "#!nope"',
    );
  });

  it('should use the German catalog', () => {
    const t = createTranslator('de');
    expect(t('invalidArguments', { arguments: '#!nope' })).toBe(
      'Ungültige Argumente, Anzeige als einfacher Text: "#!nope"',
    );
  });
});

describe('formatMessage', () => {
  it('should leave unknown placeholders in place', () => {
    expect(formatMessage('{a} and {b}', { a: '1' })).toBe('1 and {b}');
  });
});
