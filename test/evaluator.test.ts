import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { lexSnippet } from '../src/frontend/lexer.js';
import { evaluate } from '../src/preprocessor/evaluator.js';
import { MacroTable } from '../src/preprocessor/macros.js';
import type { PpValue } from '../src/preprocessor/values.js';
import { valueToString } from '../src/preprocessor/values.js';

const origin = { file: 'expr.asm', line: 1, column: 1 };

function defineText(macros: MacroTable, name: string, body: string): void {
  const diagnostics: Diagnostic[] = [];
  const tokens = lexSnippet(body, origin, diagnostics) ?? [];
  macros.define({ kind: 'text', name, tokens, file: 'expr.asm', line: 1 }, diagnostics);
  expect(diagnostics).toEqual([]);
}

function run(
  text: string,
  macros = new MacroTable(),
  maxDepth = 256,
): { value: PpValue | undefined; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const tokens = lexSnippet(text, origin, diagnostics);
  expect(tokens).toBeDefined();
  const value = evaluate(tokens ?? [], { macros, maxDepth, depth: 0 }, diagnostics);
  return { value, diagnostics };
}

function ok(text: string, macros?: MacroTable): PpValue | undefined {
  const { value, diagnostics } = run(text, macros);
  expect(diagnostics).toEqual([]);
  return value;
}

function text(source: string): string {
  const value = ok(source);
  return value ? valueToString(value) : '<error>';
}

function error(source: string, macros?: MacroTable): Diagnostic | undefined {
  const { value, diagnostics } = run(source, macros);
  expect(value).toBeUndefined();
  return diagnostics[0];
}

describe('preprocessor expressions: operators', () => {
  it('follows C-style precedence', () => {
    expect(ok('1 + 2 * 3')).toEqual({ type: 'integer', value: 7n });
    expect(ok('(1 + 2) * 3')).toEqual({ type: 'integer', value: 9n });
    expect(ok('1 << 4 | 1')).toEqual({ type: 'integer', value: 17n });
    expect(ok('1 == 1 && 2 > 3')).toEqual({ type: 'boolean', value: false });
    expect(ok('true && false || true')).toEqual({ type: 'boolean', value: true });
  });

  it('truncates integer division toward zero', () => {
    expect(ok('-7 / 2')).toEqual({ type: 'integer', value: -3n });
    expect(ok('-7 % 3')).toEqual({ type: 'integer', value: -1n });
  });

  it('promotes mixed arithmetic to fixed point', () => {
    expect(text('1.5 + 1')).toBe('2.5');
    expect(text('10 / 4.0')).toBe('2.5');
    expect(ok('1 < 1.5')).toEqual({ type: 'boolean', value: true });
  });

  it('applies unary operators', () => {
    expect(ok('!0')).toEqual({ type: 'boolean', value: true });
    expect(ok('~0')).toEqual({ type: 'integer', value: -1n });
    expect(ok('-(3)')).toEqual({ type: 'integer', value: -3n });
  });

  it('concatenates and orders strings', () => {
    expect(ok('"ab" + "cd"')).toEqual({ type: 'string', value: 'abcd' });
    expect(ok('"abc" < "abd"')).toEqual({ type: 'boolean', value: true });
  });

  it('clamps shift counts to the word width', () => {
    expect(ok('1 << 70')).toEqual({ type: 'integer', value: 0n });
    expect(error('1 << -1')?.message).toBe('Shift count -1 must not be negative.');
  });

  it('short-circuits logical operators', () => {
    expect(ok('0 && (1 / 0)')).toEqual({ type: 'boolean', value: false });
    expect(ok('1 || (1 / 0)')).toEqual({ type: 'boolean', value: true });
  });

  it('treats an empty expression as void', () => {
    const diagnostics: Diagnostic[] = [];
    const macros = new MacroTable();
    expect(evaluate([], { macros, maxDepth: 8, depth: 0 }, diagnostics)).toEqual({ type: 'void' });
  });
});

describe('preprocessor expressions: errors', () => {
  it('reports division and modulo by zero with their own ids', () => {
    const div = error('1 / 0');
    expect(div?.message).toBe('Division by zero.');
    expect(div?.id).toBe(DiagnosticIds.ExprDivideByZero);
    expect(error('5 % 0')?.id).toBe(DiagnosticIds.ExprModuloByZero);
  });

  it('rejects operands of the wrong type', () => {
    expect(error('"a" + 1')?.message).toBe(
      "Operator '+' cannot be applied to string and integer.",
    );
    expect(error('1.5 & 1')?.message).toBe(
      "Operator '&' cannot be applied to fixed-point and integer.",
    );
  });

  it('rejects the exponent operator', () => {
    expect(error('2 ** 3')?.message).toBe(
      "Operator '**' is not supported in preprocessor expressions; use pow().",
    );
  });

  it('rejects names it cannot resolve', () => {
    expect(error('NOPE + 1')?.message).toBe("Unknown identifier 'NOPE'.");
    expect(error('$x')?.message).toBe("Variable '$x' cannot be used in a preprocessor expression.");
    expect(error('1 2')?.message).toBe("Unexpected token '2' in expression.");
  });

  it('rejects number literals outside the fixed-point range', () => {
    expect(error('3000000000.0')?.message).toBe(
      "Number literal '3000000000.0' is outside the fixed-point range.",
    );
  });

  it('checks builtin arity', () => {
    const min = error('min(1)');
    expect(min?.message).toBe("Function 'min' expects 2 argument(s), got 1.");
    expect(min?.id).toBe(DiagnosticIds.ExprArityMismatch);
    expect(error('substr("a")')?.message).toBe(
      "Function 'substr' expects 2 to 3 argument(s), got 1.",
    );
  });
});

describe('preprocessor expressions: macros', () => {
  it('expands text macros by evaluating their tokens', () => {
    const macros = new MacroTable();
    defineText(macros, 'WIDTH', '8');
    defineText(macros, 'AREA', 'WIDTH * WIDTH');
    expect(ok('AREA + 1', macros)).toEqual({ type: 'integer', value: 65n });
    expect(ok('defined(WIDTH) && !defined(HEIGHT)', macros)).toEqual({
      type: 'boolean',
      value: true,
    });
  });

  it('stops self-referencing macros at the recursion limit', () => {
    const macros = new MacroTable();
    defineText(macros, 'LOOP', 'LOOP');
    const { value, diagnostics } = run('LOOP', macros, 4);
    expect(value).toBeUndefined();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.message).toBe(
      "Maximum recursion depth (4) exceeded while expanding 'LOOP'.",
    );
    expect(diagnostics[0]?.id).toBe(DiagnosticIds.RecursionDepthExceeded);
  });
});

describe('preprocessor expressions: builtins', () => {
  it('computes integer helpers', () => {
    expect(ok('high(0x1234)')).toEqual({ type: 'integer', value: 0x12n });
    expect(ok('low(0x1234)')).toEqual({ type: 'integer', value: 0x34n });
    expect(ok('bitwidth(255)')).toEqual({ type: 'integer', value: 8n });
    expect(ok('abs(-5)')).toEqual({ type: 'integer', value: 5n });
    expect(ok('pow(2, 10)')).toEqual({ type: 'integer', value: 1024n });
  });

  it('picks and clamps', () => {
    expect(ok('min(3, 1)')).toEqual({ type: 'integer', value: 1n });
    expect(text('max(2, 2.5)')).toBe('2.5');
    expect(ok('clamp(15, 0, 10)')).toEqual({ type: 'integer', value: 10n });
    expect(error('clamp(1, 5, 2)')?.message).toBe(
      "Lower bound of 'clamp' is greater than its upper bound.",
    );
  });

  it('rounds fixed-point values to integers', () => {
    expect(ok('round(2.5)')).toEqual({ type: 'integer', value: 3n });
    expect(ok('floor(-1.5)')).toEqual({ type: 'integer', value: -2n });
    expect(ok('ceil(1.25)')).toEqual({ type: 'integer', value: 2n });
    expect(ok('trunc(-1.75)')).toEqual({ type: 'integer', value: -1n });
    expect(ok('fint(2.75)')).toEqual({ type: 'integer', value: 2n });
    expect(text('ffrac(2.75)')).toBe('0.75');
  });

  it('does fixed-point arithmetic', () => {
    expect(text('fmul(1.5, 2)')).toBe('3.0');
    expect(text('fdiv(1, 4)')).toBe('0.25');
    expect(text('fmod(5.5, 2)')).toBe('1.5');
    expect(text('sqrt(16)')).toBe('4.0');
  });

  it('refuses to promote integers outside the fixed-point range', () => {
    const sum = run('2147483648 + 0.5');
    expect(sum.value).toBeUndefined();
    expect(sum.diagnostics).toEqual([
      {
        id: DiagnosticIds.ExprError,
        severity: 'error',
        message: 'Integer 2147483648 is outside the fixed-point range.',
        file: 'expr.asm',
        line: 1,
        column: 12,
      },
    ]);
    expect(text('-2147483648 + 0.5')).toBe('-2147483647.5');

    expect(error('fmul(5000000000, 1.0)')?.message).toBe(
      'Integer 5000000000 is outside the fixed-point range.',
    );
    expect(error('5000000000 == 705032704.0')?.message).toBe(
      'Integer 5000000000 is outside the fixed-point range.',
    );
    expect(error('5000000000 > 1.5')?.column).toBe(12);
    expect(error('max(5000000000, 1.5)')?.column).toBe(1);
    expect(error('clamp(0.5, 0, 4294967296)')?.id).toBe(DiagnosticIds.ExprError);
    expect(ok('max(5000000000, 7)')).toEqual({ type: 'integer', value: 5000000000n });
  });

  it('measures angles in turns', () => {
    expect(text('sin(0.25)')).toBe('1.0');
    expect(text('cos(0)')).toBe('1.0');
  });

  it('manipulates strings', () => {
    expect(ok('strlen("hello")')).toEqual({ type: 'integer', value: 5n });
    expect(ok('strcmp("a", "b")')).toEqual({ type: 'integer', value: -1n });
    expect(ok('substr("hello", 1, 3)')).toEqual({ type: 'string', value: 'ell' });
    expect(ok('substr("hello", 2)')).toEqual({ type: 'string', value: 'llo' });
    expect(ok('indexof("hello", "l")')).toEqual({ type: 'integer', value: 2n });
    expect(ok('toupper("abc")')).toEqual({ type: 'string', value: 'ABC' });
    expect(ok('concat("a", "b", "c")')).toEqual({ type: 'string', value: 'abc' });
    expect(error('substr("hello", 9)')?.message).toBe(
      "Start index 9 is out of range for 'substr'.",
    );
    expect(error('strlen(1)')?.message).toBe("Argument 1 of 'strlen' must be a string.");
  });

  it('reports value types', () => {
    expect(ok('typeof(1.5)')).toEqual({ type: 'string', value: 'fixed-point' });
    expect(ok('typeof(true)')).toEqual({ type: 'string', value: 'boolean' });
    expect(ok('typeof("x")')).toEqual({ type: 'string', value: 'string' });
  });
});
