// ─── Message Catalog ────────────────────────────────────────────────────────
//
// Templates use `{name}` placeholders, filled from the params object.

export const LOCALES = ['en', 'de'] as const;
export type Locale = (typeof LOCALES)[number];

export type MessageKey = 'invalidArguments' | 'nestingTooDeep';

export const MESSAGES: Record<Locale, Record<MessageKey, string>> = {
  en: {
    invalidArguments: 'Defaulting to plain text due to invalid arguments: "{arguments}"',
    nestingTooDeep: 'Blocks nested more than {limit} levels deep are shown as plain text: "{arguments}"',
  },
  de: {
    invalidArguments: 'Ungültige Argumente, Anzeige als einfacher Text: "{arguments}"',
    nestingTooDeep: 'Blöcke mit mehr als {limit} Verschachtelungsebenen werden als einfacher Text angezeigt: "{arguments}"',
  },
};

export type Translator = (key: MessageKey, params: Record<string, string>) => string;

export function formatMessage(template: string, params: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => params[name] ?? match);
}

export function createTranslator(locale: Locale = 'en'): Translator {
  const catalog = MESSAGES[locale];
  return (key, params) => formatMessage(catalog[key], params);
}
