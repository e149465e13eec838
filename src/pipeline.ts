import type { Diagnostic } from './diagnostics/types.js';
import type { ModuleNode } from './frontend/ast.js';
import type { Token } from './frontend/token.js';
import type { SourceHost } from './preprocessor/host.js';
import type { PreprocessorOutput } from './preprocessor/preprocessor.js';
import type { Environment } from './semantics/env.js';

/**
 * Where to stop the pipeline early.
 *
 * - `lex`: after tokenizing the entry file (no preprocessing).
 * - `parse`: after building the AST (no environment pass).
 */
export type StopAfter = 'lex' | 'parse';

/**
 * Options that influence compilation behavior.
 */
export interface CompilerOptions {
  /**
   * Additional include/search directories used by `.include`.
   *
   * These directories are consulted after the including file's directory and the working
   * directory.
   */
  includeDirs?: string[];
  /** Initial macro/loop recursion limit (`.pragma max_recursion_depth` overrides it). */
  maxRecursionDepth?: number;
  /** Initial include nesting limit (`.pragma max_include_depth` overrides it). */
  maxIncludeDepth?: number;
  stopAfter?: StopAfter;
}

/**
 * Result of a compilation run: diagnostics plus whatever each completed stage produced.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  /** Entry-file tokens, set when stopping after `lex`. */
  tokens?: Token[];
  preprocessed?: PreprocessorOutput;
  module?: ModuleNode;
  environment?: Environment;
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide the source host so the core pipeline can run against the filesystem or
 * entirely in memory.
 */
export interface PipelineDeps {
  host: SourceHost;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps?: PipelineDeps,
) => CompileResult;
