#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { astToString } from './frontend/astPrint.js';
import { formatLocation } from './frontend/source.js';
import { tokenToString } from './frontend/token.js';
import type { StopAfter } from './pipeline.js';

type CliExit = { code: number };

type CliOptions = {
  sourceFile: string;
  outputPath?: string;
  includeDirs: string[];
  verbose: boolean;
  lexOnly: boolean;
  parseOnly: boolean;
};

function usage(): string {
  return [
    'Usage: g10asm [options]',
    '',
    'Options:',
    '  -s, --source <file>     Source file to assemble (required)',
    '  -o, --output <file>     Output file for the preprocessed source (required)',
    '  -I, --include <dir>     Add include search path (repeatable)',
    '  -h, --help              Show help',
    '  -v, --version           Print version',
    '      --verbose           Report pipeline stages on stderr',
    '      --lex-only          Print the tokens of the source file and exit',
    '      --parse-only        Print the AST and exit (ignored with --lex-only)',
    '',
  ].join('\n');
}

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const here = dirname(fileURLToPath(import.meta.url));
  // src/ when run from sources, dist/src/ when built.
  for (const candidate of [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')]) {
    if (!existsSync(candidate)) continue;
    const pkg: unknown = require(candidate);
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.0.0';
}

function banner(): string {
  return `g10asm - G10 CPU Assembler v${readVersion()}\n`;
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function optionValue(argv: string[], i: number, a: string, what: string): string {
  const v = argv[i];
  if (!v) fail(`Missing ${what} after '${a}'.`);
  return v;
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let sourceFile: string | undefined;
  let outputPath: string | undefined;
  let verbose = false;
  let lexOnly = false;
  let parseOnly = false;
  let help = false;
  let version = false;
  const includeDirs: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-s' || a === '--source') {
      sourceFile = optionValue(argv, ++i, a, 'source file');
      continue;
    }
    if (a.startsWith('--source=')) {
      const v = a.slice('--source='.length);
      if (!v) fail(`Missing source file after '--source='.`);
      sourceFile = v;
      continue;
    }
    if (a === '-o' || a === '--output') {
      outputPath = optionValue(argv, ++i, a, 'output file');
      continue;
    }
    if (a.startsWith('--output=')) {
      const v = a.slice('--output='.length);
      if (!v) fail(`Missing output file after '--output='.`);
      outputPath = v;
      continue;
    }
    if (a === '-I' || a === '--include') {
      includeDirs.push(optionValue(argv, ++i, a, 'include directory'));
      continue;
    }
    if (a.startsWith('--include=')) {
      const v = a.slice('--include='.length);
      if (!v) fail(`Missing include directory after '--include='.`);
      includeDirs.push(v);
      continue;
    }
    if (a === '-h' || a === '--help') {
      help = true;
      continue;
    }
    if (a === '-v' || a === '--version') {
      version = true;
      continue;
    }
    if (a === '--verbose') {
      verbose = true;
      continue;
    }
    if (a === '--lex-only') {
      lexOnly = true;
      continue;
    }
    if (a === '--parse-only') {
      parseOnly = true;
      continue;
    }
    fail(`Unknown argument '${a}'.`);
  }

  if (help) {
    process.stdout.write(`${banner()}\n${usage()}`);
    return { code: 0 };
  }
  if (version) {
    process.stdout.write(banner());
    return { code: 0 };
  }

  if (!sourceFile) fail(`Source file is required. Use '-s <file>' or '--source <file>'.`);
  if (!outputPath && !lexOnly && !parseOnly) {
    fail(`Output file is required. Use '-o <file>' or '--output <file>'.`);
  }

  return {
    sourceFile,
    ...(outputPath ? { outputPath } : {}),
    includeDirs,
    verbose,
    lexOnly,
    parseOnly: parseOnly && !lexOnly,
  };
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

/**
 * Render a diagnostic the way the CLI prints it: `file:line:col: severity: [ID] message`.
 */
export function formatDiagnostic(d: Diagnostic): string {
  return `${formatLocation(d.file, d.line, d.column)}: ${d.severity}: [${d.id}] ${d.message}`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const log = (line: string): void => {
      if (parsed.verbose) process.stderr.write(`g10asm: ${line}\n`);
    };

    log(`assembling '${parsed.sourceFile}'`);
    let stopAfter: StopAfter | undefined;
    if (parsed.lexOnly) stopAfter = 'lex';
    else if (parsed.parseOnly) stopAfter = 'parse';
    const res = compile(parsed.sourceFile, { includeDirs: parsed.includeDirs, stopAfter });

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }
    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    if (parsed.lexOnly) {
      const tokens = res.tokens ?? [];
      process.stdout.write(`Lexer output for file '${parsed.sourceFile}':\n`);
      tokens.forEach((token, i) => {
        process.stdout.write(`${String(i + 1).padStart(4, '0')} | ${tokenToString(token)}\n`);
      });
      return 0;
    }

    if (res.preprocessed) {
      log(`preprocessed into ${res.preprocessed.lineMap.length} line(s)`);
    }
    if (!res.module) return 1;
    log(`parsed ${res.module.children.length} statement(s)`);

    if (parsed.parseOnly) {
      process.stdout.write(`AST output for file '${parsed.sourceFile}':\n`);
      process.stdout.write(astToString(res.module));
      return 0;
    }

    if (parsed.outputPath && res.preprocessed) {
      const outputPath = resolve(parsed.outputPath);
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, res.preprocessed.text, 'utf8');
      log(`wrote '${outputPath}'`);
    }
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Error: ${msg}\n`);
    return 1;
  }
}

function stripExtendedWindowsPrefix(path: string): string {
  if (path.startsWith('\\\\?\\UNC\\')) return `\\\\${path.slice(8)}`;
  if (path.startsWith('\\\\?\\')) return path.slice(4);
  return path;
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const stripped = stripExtendedWindowsPrefix(real);
  const normalized = stripped.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;

  // Symlinked bin shims can resolve to a different spelling of the same file.
  const invoked = normalizePathForCompare(invokedAs);
  return invoked.endsWith('/dist/src/cli.js') && normalizePathForCompare(self).endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
