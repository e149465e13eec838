import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { isKeyword } from '../frontend/keywords.js';
import type { Token } from '../frontend/token.js';

interface MacroBase {
  name: string;
  /** File and line of the `.define` / `.macro` directive. */
  file: string;
  line: number;
}

/** `.define NAME tokens...`: the name is replaced by `tokens` wherever it appears. */
export interface TextMacro extends MacroBase {
  kind: 'text';
  tokens: Token[];
}

/** `.macro NAME [@p...]` ... `.endm`: invoked at the start of a line with arguments. */
export interface BlockMacro extends MacroBase {
  kind: 'block';
  /** Named placeholders, without the `@`, in declaration order. */
  params: string[];
  /** Body lines (no newline tokens), unsubstituted. */
  body: Token[][];
}

export type Macro = TextMacro | BlockMacro;

/**
 * Why `name` cannot name a macro, or `undefined` if it can.
 */
export function validateMacroName(name: string): string | undefined {
  if (!/^[A-Za-z_]/.test(name)) {
    return `Macro name '${name}' must start with a letter or underscore.`;
  }
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
    return `Macro name '${name}' may only contain letters, digits and underscores.`;
  }
  if (name.startsWith('__')) {
    return `Macro name '${name}' uses the reserved '__' prefix.`;
  }
  if (isKeyword(name)) {
    return `Macro name '${name}' collides with a reserved keyword.`;
  }
  return undefined;
}

function macroDiag(diagnostics: Diagnostic[], message: string, at?: Token): void {
  diagnostics.push({
    id: DiagnosticIds.MacroError,
    severity: 'error',
    message,
    file: at?.file ?? '<macro>',
    ...(at ? { line: at.line, column: at.column } : {}),
  });
}

/**
 * Name-keyed store of text and block macros. Names are case-sensitive.
 */
export class MacroTable {
  private readonly macros = new Map<string, Macro>();

  /**
   * Add a new macro. Fails on an invalid name or when the name is already defined.
   */
  define(macro: Macro, diagnostics: Diagnostic[], at?: Token): boolean {
    const invalid = validateMacroName(macro.name);
    if (invalid) {
      macroDiag(diagnostics, invalid, at);
      return false;
    }
    const existing = this.macros.get(macro.name);
    if (existing) {
      macroDiag(
        diagnostics,
        `Macro '${macro.name}' is already defined at '${existing.file}:${existing.line}'.`,
        at,
      );
      return false;
    }
    this.macros.set(macro.name, macro);
    return true;
  }

  /**
   * Add or replace a macro. Only the name is validated.
   */
  redefine(macro: Macro, diagnostics: Diagnostic[], at?: Token): boolean {
    const invalid = validateMacroName(macro.name);
    if (invalid) {
      macroDiag(diagnostics, invalid, at);
      return false;
    }
    this.macros.set(macro.name, macro);
    return true;
  }

  lookup(name: string, diagnostics: Diagnostic[], at?: Token): Macro | undefined {
    const macro = this.macros.get(name);
    if (!macro) macroDiag(diagnostics, `Macro '${name}' is not defined.`, at);
    return macro;
  }

  /** Silent lookup. */
  get(name: string): Macro | undefined {
    return this.macros.get(name);
  }

  undefine(name: string, diagnostics: Diagnostic[], at?: Token): boolean {
    if (!this.macros.delete(name)) {
      macroDiag(diagnostics, `Cannot undefine '${name}': macro is not defined.`, at);
      return false;
    }
    return true;
  }

  isDefined(name: string): boolean {
    return this.macros.has(name);
  }

  /** Remove without reporting; used to restore loop variables. */
  remove(name: string): void {
    this.macros.delete(name);
  }

  get size(): number {
    return this.macros.size;
  }
}
