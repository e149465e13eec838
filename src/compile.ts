import { isAbsolute, resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';

import type { ModuleNode } from './frontend/ast.js';

import { Lexer, lex } from './frontend/lexer.js';
import { parse } from './frontend/parser.js';
import { nodeSourceHost } from './preprocessor/host.js';
import { Preprocessor, relocateTokens } from './preprocessor/preprocessor.js';
import { buildEnvironment } from './semantics/env.js';

/**
 * Tokenize preprocessed text and point every token back at the source line it was emitted
 * for.
 */
export function relexPreprocessed(
  file: string,
  text: string,
  lineMap: Parameters<typeof relocateTokens>[1],
  diagnostics: Diagnostic[],
): Lexer {
  const raw = lex(file, text, diagnostics);
  return new Lexer(raw.source, relocateTokens(raw.tokens, lineMap), raw.isGood());
}

function internalError(stage: string, file: string, err: unknown): Diagnostic {
  return {
    id: DiagnosticIds.InternalError,
    severity: 'error',
    message: `Internal error during ${stage}: ${String(err)}`,
    file,
  };
}

/**
 * Compile an entry file: lex, preprocess, lex again, parse, then run the environment pass.
 *
 * Each stage runs only if the previous one reported no errors.
 */
export const compile: CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps = { host: nodeSourceHost },
): CompileResult => {
  const diagnostics: Diagnostic[] = [];
  const { host } = deps;
  const entryPath = isAbsolute(entryFile) ? entryFile : resolve(host.cwd(), entryFile);

  const read = host.readFile(entryPath);
  if (!read.ok) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read entry file '${entryFile}': ${read.error}`,
      file: entryPath,
    });
    return { diagnostics };
  }

  const lexer = lex(entryPath, read.text, diagnostics);
  if (!lexer.isGood()) return { diagnostics };
  if (options.stopAfter === 'lex') return { diagnostics, tokens: lexer.tokens };

  const preprocessor = new Preprocessor(
    {
      includeDirs: options.includeDirs,
      maxRecursionDepth: options.maxRecursionDepth,
      maxIncludeDepth: options.maxIncludeDepth,
    },
    host,
    diagnostics,
  );
  let ran: boolean;
  try {
    ran = preprocessor.run(lexer);
  } catch (err) {
    diagnostics.push(internalError('preprocessing', entryPath, err));
    return { diagnostics };
  }
  if (!ran) return { diagnostics };
  const preprocessed = preprocessor.getOutput();

  const relexed = relexPreprocessed(entryPath, preprocessed.text, preprocessed.lineMap, diagnostics);
  if (!relexed.isGood()) return { diagnostics, preprocessed };

  let module: ModuleNode | undefined;
  try {
    module = parse(relexed, diagnostics);
  } catch (err) {
    diagnostics.push(internalError('parse', entryPath, err));
    return { diagnostics, preprocessed };
  }
  if (!module) return { diagnostics, preprocessed };
  if (options.stopAfter === 'parse') return { diagnostics, preprocessed, module };

  const environment = buildEnvironment(module, diagnostics);
  if (hasErrors(diagnostics)) return { diagnostics, preprocessed, module };
  return { diagnostics, preprocessed, module, environment };
};
