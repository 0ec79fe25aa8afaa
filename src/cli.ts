#!/usr/bin/env node
// ─── CLI Entry Point ────────────────────────────────────────────────────────
//
// Usage:
//   npx tsx src/cli.ts <file> [options]
//   npm run demo                          (runs with examples/sample.wiki)
//
// Reads the input, wraps it in a single raw-block placeholder (directive
// `#!wiki` unless -d says otherwise), expands it and prints the resulting
// tree to stdout. Diagnostics and errors go to stderr.

import * as fs from 'node:fs';
import * as path from 'node:path';
import { highlight } from 'cli-highlight';
import { parseArgs, USAGE } from './args.js';
import { configFromEnv, type EngineConfigInput } from './config.js';
import { Expander } from './engine.js';
import { createServiceLogger } from './logger.js';
import { createPlaceholder, element, formatTree } from './tree.js';

const log = createServiceLogger('cli');

// ─── Input ──────────────────────────────────────────────────────────────────

function readInputFile(filePath: string): string | null {
  const resolved = path.resolve(process.cwd(), filePath);

  if (!fs.existsSync(resolved)) {
    log.error(`File not found: ${resolved}`);
    return null;
  }
  if (fs.statSync(resolved).isDirectory()) {
    log.error(`"${filePath}" is a directory`);
    return null;
  }
  return fs.readFileSync(resolved, 'utf-8');
}

async function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk) => {
      data += chunk;
    });
    process.stdin.on('end', () => {
      resolve(data);
    });
    process.stdin.on('error', reject);

    // If stdin is a TTY (no piped input), don't wait
    if (process.stdin.isTTY) {
      resolve('');
    }
  });
}

function readVersion(): string {
  const pkgPath = new URL('../package.json', import.meta.url);
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    log.debug('could not read package.json', { error: err instanceof Error ? err.message : String(err) });
  }
  return '0.0.0';
}

// ─── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  for (const warning of args.warnings) log.warn(warning);

  if (args.showVersion) {
    console.log(`nowiki-expand v${readVersion()}`);
    return;
  }

  if (args.showHelp) {
    console.log(USAGE);
    return;
  }

  // ── Read input ─────────────────────────────────────────────
  let text: string | null;
  if (args.filePath) {
    text = readInputFile(args.filePath);
  } else if (!process.stdin.isTTY) {
    text = await readStdin();
  } else {
    console.log(USAGE);
    log.error('No input file specified. Pass a file path or pipe content via stdin.');
    text = null;
  }

  if (text === null) {
    process.exitCode = 1;
    return;
  }
  if (!text.trim()) {
    log.error('Input is empty.');
    process.exitCode = 1;
    return;
  }

  // ── Expand ─────────────────────────────────────────────────
  const config: EngineConfigInput = { ...configFromEnv() };
  if (args.maxNesting !== undefined) config.maxNesting = args.maxNesting;
  if (args.locale !== undefined) config.locale = args.locale;

  const root = element('page', {}, [createPlaceholder(text.replace(/\n$/, ''), args.directive)]);
  new Expander({ config }).expand(root);
  log.info(`expanded ${args.filePath ?? 'stdin'} as ${args.directive}`);

  // ── Print ──────────────────────────────────────────────────
  if (args.json) {
    const json = JSON.stringify(root, null, 2);
    console.log(process.stdout.isTTY ? highlight(json, { language: 'json', ignoreIllegals: true }) : json);
  } else {
    console.log(formatTree(root).join('\n'));
  }
}

// ── Run ──────────────────────────────────────────────────────────────────────

main().catch((err: unknown) => {
  log.error(err instanceof Error ? err.message : String(err), {
    code: err instanceof Error && 'code' in err ? err.code : undefined,
  });
  process.exit(1);
});
