// ─── Argument Parsing ───────────────────────────────────────────────────────
//
// Lightweight CLI arg parser. Problems with individual options are collected
// as warnings and the option keeps its default.

import { LOCALES, type Locale } from './messages.js';

export const DEFAULT_DIRECTIVE = '#!wiki';

export interface CliArgs {
  filePath: string | null;
  directive: string;
  json: boolean;
  maxNesting: number | undefined;
  locale: Locale | undefined;
  showHelp: boolean;
  showVersion: boolean;
  warnings: string[];
}

function toLocale(value: string): Locale | undefined {
  return LOCALES.find((locale) => locale === value);
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    filePath: null,
    directive: DEFAULT_DIRECTIVE,
    json: false,
    maxNesting: undefined,
    locale: undefined,
    showHelp: false,
    showVersion: false,
    warnings: [],
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? '';
    const next = argv[i + 1];

    if (arg === '--help' || arg === '-h') {
      args.showHelp = true;
      i++;
      continue;
    }

    if (arg === '--version' || arg === '-v') {
      args.showVersion = true;
      i++;
      continue;
    }

    if (arg === '--json') {
      args.json = true;
      i++;
      continue;
    }

    if (arg === '--directive' || arg === '-d') {
      if (next != null) {
        // "-d csv" is short for "-d '#!csv'"
        args.directive = next.startsWith('#!') ? next : `#!${next}`;
        i += 2;
      } else {
        args.warnings.push('--directive requires an argument.');
        i++;
      }
      continue;
    }

    if (arg === '--max-nesting') {
      const parsed = next != null ? parseInt(next, 10) : NaN;
      if (!isNaN(parsed)) {
        args.maxNesting = parsed;
      } else {
        args.warnings.push(`Invalid --max-nesting value "${next ?? ''}". Using the default.`);
      }
      i += next != null ? 2 : 1;
      continue;
    }

    if (arg === '--locale') {
      const locale = next != null ? toLocale(next) : undefined;
      if (locale) {
        args.locale = locale;
      } else {
        args.warnings.push(`Unknown locale "${next ?? ''}". Expected one of: ${LOCALES.join(', ')}.`);
      }
      i += next != null ? 2 : 1;
      continue;
    }

    // Anything else without a leading '-' is the file path
    if (!arg.startsWith('-')) {
      args.filePath = arg;
      i++;
      continue;
    }

    args.warnings.push(`Unknown option: ${arg}`);
    i++;
  }

  return args;
}

// ─── Usage Text ─────────────────────────────────────────────────────────────

export const USAGE = `
\x1b[1m\x1b[36mnowiki-expand\x1b[0m: expand {{{#!format}}} blocks into a document tree

\x1b[1mUSAGE\x1b[0m
  nowiki-expand [file] [options]
  cat page.wiki | nowiki-expand

\x1b[1mOPTIONS\x1b[0m
  -d, --directive <d>   Directive for the whole input (default: ${DEFAULT_DIRECTIVE})
      --json            Print the tree as JSON instead of an outline
      --max-nesting <n> Deepest nesting still expanded (default: 16)
      --locale <l>      Language of inline diagnostics (${LOCALES.join(', ')})
  -h, --help            Show this help message
  -v, --version         Show version

\x1b[1mEXAMPLES\x1b[0m
  nowiki-expand examples/sample.wiki
  nowiki-expand data.csv -d csv
  nowiki-expand notes.md -d markdown --json

\x1b[1mENVIRONMENT\x1b[0m
  NOWIKI_MAX_NESTING, NOWIKI_CSV_SEPARATOR, NOWIKI_LOCALE   engine defaults
  LOG_LEVEL, NOWIKI_DEBUG=true                             log verbosity
`;
