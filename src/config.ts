// ─── Engine Configuration ───────────────────────────────────────────────────
//
// Validated with zod. Values come from explicit options, falling back to
// NOWIKI_* environment variables, falling back to defaults.

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOCALES } from './messages.js';
import { DEFAULT_MAX_NESTING, DEFAULT_SEPARATOR } from './types.js';

export const EngineConfigSchema = z.object({
  maxNesting: z.number().int().min(1).max(256).default(DEFAULT_MAX_NESTING)
    .describe('Deepest placeholder nesting that is still dispatched'),
  defaultSeparator: z.string().min(1).default(DEFAULT_SEPARATOR)
    .describe('Cell separator for #!csv blocks without an argument'),
  locale: z.enum(LOCALES).default('en')
    .describe('Language of inline diagnostics'),
}).strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

// An empty variable (`NOWIKI_MAX_NESTING=`) counts as unset
const unsetWhenEmpty = (value: unknown): unknown => (value === '' ? undefined : value);

const EnvSchema = z.object({
  NOWIKI_MAX_NESTING: z.preprocess(unsetWhenEmpty, z.coerce.number().int().optional()),
  NOWIKI_CSV_SEPARATOR: z.preprocess(unsetWhenEmpty, z.string().min(1).optional()),
  NOWIKI_LOCALE: z.preprocess(unsetWhenEmpty, z.enum(LOCALES).optional()),
});

export function resolveConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid engine configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Read configuration overrides from the environment. Unset variables are
 * left out so that defaults still apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfigInput {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, issues);
  }

  const { NOWIKI_MAX_NESTING, NOWIKI_CSV_SEPARATOR, NOWIKI_LOCALE } = result.data;
  const input: EngineConfigInput = {};
  if (NOWIKI_MAX_NESTING !== undefined) input.maxNesting = NOWIKI_MAX_NESTING;
  if (NOWIKI_CSV_SEPARATOR !== undefined) input.defaultSeparator = NOWIKI_CSV_SEPARATOR;
  if (NOWIKI_LOCALE !== undefined) input.locale = NOWIKI_LOCALE;
  return input;
}
