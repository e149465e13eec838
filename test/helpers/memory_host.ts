import { resolve } from 'node:path';

import type { Diagnostic } from '../../src/diagnostics/types.js';
import { lex } from '../../src/frontend/lexer.js';
import type { ReadResult, SourceHost } from '../../src/preprocessor/host.js';
import type { PreprocessorOptions, PreprocessorOutput } from '../../src/preprocessor/preprocessor.js';
import { Preprocessor } from '../../src/preprocessor/preprocessor.js';

/**
 * In-memory {@link SourceHost}. Paths are resolved against `/work`.
 */
export class MemoryHost implements SourceHost {
  readonly reads: string[] = [];
  private readonly files = new Map<string, string>();

  constructor(files: Record<string, string> = {}) {
    for (const [path, text] of Object.entries(files)) this.add(path, text);
  }

  add(path: string, text: string): this {
    this.files.set(resolve('/work', path), text);
    return this;
  }

  fileExists(path: string): boolean {
    return this.files.has(path);
  }

  readFile(path: string): ReadResult {
    this.reads.push(path);
    const text = this.files.get(path);
    return text === undefined ? { ok: false, error: 'no such file' } : { ok: true, text };
  }

  cwd(): string {
    return '/work';
  }
}

export type PreprocessRun = {
  ok: boolean;
  output: PreprocessorOutput;
  diagnostics: Diagnostic[];
  /** Output lines without the push/pop markers of the entry file. */
  body: string[];
};

/**
 * Preprocess `/work/main.asm` (or the given entry) and return the flattened output.
 */
export function preprocessSource(
  text: string,
  files: Record<string, string> = {},
  options: PreprocessorOptions = {},
): PreprocessRun {
  const host = new MemoryHost(files).add('main.asm', text);
  const diagnostics: Diagnostic[] = [];
  const lexer = lex('/work/main.asm', text, diagnostics);
  const pp = new Preprocessor(options, host, diagnostics);
  const ok = lexer.isGood() && pp.run(lexer);
  const output = pp.getOutput();
  const lines = output.text.split('\n').filter((l) => l.length > 0);
  return { ok, output, diagnostics, body: lines.slice(1, -1) };
}

export function messages(diagnostics: readonly Diagnostic[]): string[] {
  return diagnostics.map((d) => d.message);
}
