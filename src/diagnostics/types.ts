/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * An assembler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `G10100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs, grouped by pipeline stage.
 */
export const DiagnosticIds = {
  /** Failed to read a source file. */
  IoReadFailed: 'G10001',

  /** Internal error (a broken invariant inside the assembler itself). */
  InternalError: 'G10002',

  /** Invalid character, malformed or unterminated literal. */
  LexError: 'G10100',

  /** Token cursor was asked for a token outside the token vector. */
  TokenOutOfRange: 'G10101',

  /** Invalid macro name, redefinition, or undefined reference. */
  MacroError: 'G10200',

  /** Macro/loop expansion nested deeper than `max_recursion_depth`. */
  RecursionDepthExceeded: 'G10201',

  /** Bad placeholder or argument binding in a macro expansion. */
  MacroArgumentError: 'G10202',

  /** `.include` target not found on any search path. */
  IncludeNotFound: 'G10250',

  /** Include nesting deeper than `max_include_depth`. */
  IncludeDepthExceeded: 'G10251',

  /** Generic preprocessor expression error (syntax, unknown identifier/function, types). */
  ExprError: 'G10300',

  /** Divide by zero in a preprocessor expression. */
  ExprDivideByZero: 'G10301',

  /** Modulo by zero in a preprocessor expression. */
  ExprModuloByZero: 'G10302',

  /** Builtin function called with the wrong number of arguments. */
  ExprArityMismatch: 'G10303',

  /** Malformed or misplaced preprocessor directive (unterminated block, stray `.endif`...). */
  DirectiveError: 'G10400',

  /** `.info` */
  UserInfo: 'G10410',

  /** `.warning` / `.warn` */
  UserWarning: 'G10411',

  /** `.error` / `.err` */
  UserError: 'G10412',

  /** `.fatal` / `.fail` / `.critical` */
  UserFatal: 'G10413',

  /** `.assert` whose condition was falsy. */
  AssertFailed: 'G10414',

  /** Generic parse error (unexpected token, malformed statement). */
  ParseError: 'G10500',

  /** Instruction operand count outside the mnemonic's recorded range. */
  OperandCountMismatch: 'G10501',

  /** Variable/constant store error (redefinition, undefined, constant mutation). */
  SemanticsError: 'G10600',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
