export { compile, relexPreprocessed } from './compile.js';
export type { CompileFn, CompileResult, CompilerOptions, PipelineDeps, StopAfter } from './pipeline.js';

export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { DiagnosticIds, hasErrors } from './diagnostics/types.js';

export type * from './frontend/ast.js';
export { astToString } from './frontend/astPrint.js';
export { lookupKeyword, isKeyword, keywordsOfKind, operandRange } from './frontend/keywords.js';
export type { LexOrigin } from './frontend/lexer.js';
export { Lexer, TokenCursor, lex, lexSnippet } from './frontend/lexer.js';
export { Parser, parse } from './frontend/parser.js';
export type { Token, TokenKind } from './frontend/token.js';
export { tokenToString } from './frontend/token.js';

export { evaluate } from './preprocessor/evaluator.js';
export type { EvalContext } from './preprocessor/evaluator.js';
export type { ReadResult, SourceHost } from './preprocessor/host.js';
export { nodeSourceHost } from './preprocessor/host.js';
export type { BlockMacro, Macro, TextMacro } from './preprocessor/macros.js';
export { MacroTable } from './preprocessor/macros.js';
export type { PreprocessorOptions, PreprocessorOutput, SourceLocation } from './preprocessor/preprocessor.js';
export { Preprocessor, preprocess } from './preprocessor/preprocessor.js';
export type { PpValue } from './preprocessor/values.js';
export { Fixed } from './preprocessor/values.js';

export { Environment, buildEnvironment } from './semantics/env.js';
