import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { lex } from '../src/frontend/lexer.js';
import { parse } from '../src/frontend/parser.js';
import { Environment, buildEnvironment } from '../src/semantics/env.js';

function run(text: string): { env: Environment; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const module = parse(lex('env.asm', text, diagnostics), diagnostics);
  expect(diagnostics).toEqual([]);
  if (!module) throw new Error('parse failed');
  return { env: buildEnvironment(module, diagnostics), diagnostics };
}

function valueOf(text: string, name: string): bigint | undefined {
  const { env, diagnostics } = run(text);
  expect(diagnostics).toEqual([]);
  const got = env.getValue(name);
  return got.ok ? got.value : undefined;
}

function errorOf(text: string): string | undefined {
  const { diagnostics } = run(text);
  expect(diagnostics).toHaveLength(1);
  return diagnostics[0]?.message;
}

describe('Environment', () => {
  it('stores variables and constants', () => {
    const env = new Environment();
    expect(env.defineVariable('a', 1n, 'x.asm', 1)).toEqual({ ok: true, value: undefined });
    expect(env.defineConstant('K', 2n, 'x.asm', 2)).toEqual({ ok: true, value: undefined });
    expect(env.exists('a')).toBe(true);
    expect(env.isConstant('K')).toBe(true);
    expect(env.isConstant('a')).toBe(false);
    expect(env.setValue('a', 5n)).toEqual({ ok: true, value: undefined });
    expect([...env.values()]).toEqual([
      ['a', 5n],
      ['K', 2n],
    ]);
    env.clear();
    expect(env.exists('a')).toBe(false);
  });

  it('refuses to redefine a name or modify a constant', () => {
    const env = new Environment();
    env.defineConstant('K', 2n, 'x.asm', 4);
    expect(env.defineVariable('K', 1n, 'y.asm', 9)).toEqual({
      ok: false,
      message: "'$K' is already defined as a constant at 'x.asm:4'.",
    });
    expect(env.setValue('K', 3n)).toEqual({
      ok: false,
      message: "Cannot modify constant '$K' (defined at 'x.asm:4').",
    });
    expect(env.getValue('nope')).toEqual({
      ok: false,
      message: "Undefined variable or constant '$nope'.",
    });
  });

  it('wraps stored values to 64 bits', () => {
    const env = new Environment();
    env.defineVariable('big', 1n << 64n, 'x.asm', 1);
    expect(env.getValue('big')).toEqual({ ok: true, value: 0n });
  });
});

describe('buildEnvironment', () => {
  it('applies declarations and assignments in order', () => {
    const { env, diagnostics } = run('.let $a = 2\n.const $B = $a * 3\n$a += $B\n$a **= 2\n');
    expect(diagnostics).toEqual([]);
    expect([...env.values()]).toEqual([
      ['a', 64n],
      ['B', 6n],
    ]);
  });

  it('raises powers right to left', () => {
    expect(valueOf('.let $p = 2 ** 3 ** 2\n', 'p')).toBe(512n);
    expect(valueOf('.let $p = (2 ** 3) ** 2\n', 'p')).toBe(64n);
  });

  it('evaluates comparisons and logic as 1 or 0', () => {
    expect(valueOf('.let $t = (3 > 2) + (1 == 2) + !0\n', 't')).toBe(2n);
    expect(valueOf('.let $t = 2 && 0 || 5\n', 't')).toBe(1n);
  });

  it('uses 64-bit integer arithmetic', () => {
    expect(valueOf('.let $w = 0x7FFFFFFFFFFFFFFF + 1\n', 'w')).toBe(-9223372036854775808n);
    expect(valueOf('.let $s = 1 << 100\n', 's')).toBe(0n);
    expect(valueOf('.let $n = -8 >> 1\n', 'n')).toBe(-4n);
    expect(valueOf('.let $d = -7 / 2\n', 'd')).toBe(-3n);
    expect(valueOf(".let $c = 'A'\n", 'c')).toBe(65n);
  });

  it('reports arithmetic errors at the expression', () => {
    const { diagnostics } = run('nop\n.let $a = 1 / 0\n');
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.SemanticsError,
        severity: 'error',
        message: 'Divide by zero in variable expression.',
        file: 'env.asm',
        line: 2,
        column: 11,
      },
    ]);
    expect(errorOf('.let $a = 1 % 0\n')).toBe('Modulo by zero in variable expression.');
    expect(errorOf('.let $p = 2 ** -1\n')).toBe('Negative exponent -1 in variable expression.');
    expect(errorOf('.let $p = 1 << -1\n')).toBe('Negative shift count -1 in variable expression.');
  });

  it('rejects operands it cannot evaluate', () => {
    expect(errorOf('.let $a = foo\n')).toBe("Cannot use identifier 'foo' in a variable expression.");
    expect(errorOf('.let $a = 1.5\n')).toBe("Cannot use number '1.5' in a variable expression.");
  });

  it('reports undefined names, redefinitions and constant writes', () => {
    expect(errorOf('$z = 1\n')).toBe("Undefined variable '$z'.");
    expect(errorOf('$z += 1\n')).toBe("Undefined variable or constant '$z'.");
    expect(errorOf('.let $a = 1\n.const $a = 2\n')).toBe(
      "'$a' is already defined as a variable at 'env.asm:1'.",
    );
    expect(errorOf('.const $C = 1\n$C = 2\n')).toBe(
      "Cannot modify constant '$C' (defined at 'env.asm:1').",
    );
  });

  it('keeps going after an error', () => {
    const { env, diagnostics } = run('.let $a = $missing\n.let $b = 4\n');
    expect(diagnostics.map((d) => d.message)).toEqual([
      "Undefined variable or constant '$missing'.",
    ]);
    expect(env.exists('a')).toBe(false);
    expect(env.getValue('b')).toEqual({ ok: true, value: 4n });
  });
});
