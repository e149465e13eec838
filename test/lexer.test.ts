import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { decodeEscapes, encodeStringLiteral, lex, lexSnippet } from '../src/frontend/lexer.js';
import { isAdjacent, tokenToString } from '../src/frontend/token.js';

function kinds(text: string): string[] {
  const diagnostics: Diagnostic[] = [];
  const lexer = lex('test.asm', text, diagnostics);
  expect(diagnostics).toEqual([]);
  return lexer.tokens.map((t) => t.kind);
}

describe('lexer', () => {
  it('tokenizes an instruction line and skips comments', () => {
    const diagnostics: Diagnostic[] = [];
    const lexer = lex('test.asm', 'ld d0, 0x1F ; load\n', diagnostics);
    expect(lexer.isGood()).toBe(true);
    expect(lexer.tokens.map(tokenToString)).toEqual([
      "instructionMnemonic ('ld')",
      "registerName ('d0')",
      "comma (',')",
      "integerLiteral ('0x1F', value = 31)",
      "newLine ('\\n')",
      "endOfFile ('')",
    ]);
    expect(lexer.tokens.map((t) => t.column)).toEqual([1, 4, 6, 8, 19, 1]);
    expect(lexer.tokens[5]?.line).toBe(2);
  });

  it('reads integers in every radix', () => {
    const diagnostics: Diagnostic[] = [];
    const lexer = lex('test.asm', '42 0b101 0o17 0xff', diagnostics);
    expect(lexer.tokens.slice(0, 4).map((t) => t.intValue)).toEqual([42n, 5n, 15n, 255n]);
  });

  it('wraps 64-bit unsigned literals to signed values and rejects wider ones', () => {
    const ok: Diagnostic[] = [];
    expect(lex('test.asm', '0xFFFFFFFFFFFFFFFF', ok).tokens[0]?.intValue).toBe(-1n);

    const diagnostics: Diagnostic[] = [];
    const lexer = lex('test.asm', '0x1FFFFFFFFFFFFFFFF', diagnostics);
    expect(lexer.isGood()).toBe(false);
    expect(diagnostics[0]?.message).toBe("Integer literal '0x1FFFFFFFFFFFFFFFF' is out of range.");
  });

  it('reads number literals with both float and truncated integer values', () => {
    const diagnostics: Diagnostic[] = [];
    const [token] = lex('test.asm', '3.25', diagnostics).tokens;
    expect(token?.kind).toBe('numberLiteral');
    expect(token?.numberValue).toBe(3.25);
    expect(token?.intValue).toBe(3n);
    expect(token && tokenToString(token)).toBe("numberLiteral ('3.25', value = 3.25)");
  });

  it('rejects number literals too large for a float', () => {
    const literal = `${'9'.repeat(400)}.5`;
    const diagnostics: Diagnostic[] = [];
    const lexer = lex('test.asm', `.byte ${literal}`, diagnostics);
    expect(lexer.isGood()).toBe(false);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.LexError,
        severity: 'error',
        message: `Number literal '${literal}' is out of range.`,
        file: 'test.asm',
        line: 1,
        column: 7,
      },
    ]);
  });

  it('decodes string and character literals', () => {
    const diagnostics: Diagnostic[] = [];
    const tokens = lex('test.asm', `"a\\tb\\x41" 'Z' '\\n'`, diagnostics).tokens;
    expect(tokens[0]?.kind).toBe('stringLiteral');
    expect(tokens[0]?.lexeme).toBe('"a\\tb\\x41"');
    expect(tokens[0]?.stringValue).toBe('a\tbA');
    expect(tokens[1]?.intValue).toBe(90n);
    expect(tokens[2]?.intValue).toBe(10n);
  });

  it('classifies variables, placeholders and keyword placeholders', () => {
    const diagnostics: Diagnostic[] = [];
    const tokens = lex('test.asm', '$count @1 @value @ld', diagnostics).tokens;
    expect(tokens.slice(0, 4).map((t) => t.kind)).toEqual([
      'variable',
      'placeholder',
      'placeholder',
      'placeholderKeyword',
    ]);
    expect(tokens[3]?.keyword?.canonical).toBe('ld');
  });

  it('matches keywords case-insensitively and resolves aliases', () => {
    const diagnostics: Diagnostic[] = [];
    const tokens = lex('test.asm', 'LD .elif .db my.label', diagnostics).tokens;
    expect(tokens[0]?.keyword?.canonical).toBe('ld');
    expect(tokens[1]?.keyword?.canonical).toBe('.elseif');
    expect(tokens[2]?.keyword?.canonical).toBe('.byte');
    expect(tokens[3]?.kind).toBe('identifier');
  });

  it('takes the longest operator spelling', () => {
    expect(kinds('**= ** <<= ## # != !')).toEqual([
      'assignExponent',
      'exponent',
      'assignShiftLeft',
      'doubleHash',
      'hash',
      'compareNotEqual',
      'logicalNot',
      'endOfFile',
    ]);
  });

  it('reports an unrecognized character with its location', () => {
    const diagnostics: Diagnostic[] = [];
    const lexer = lex('test.asm', 'nop\nnop §', diagnostics);
    expect(lexer.isGood()).toBe(false);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.LexError,
        severity: 'error',
        message: "Unrecognized character: '§'.",
        file: 'test.asm',
        line: 2,
        column: 5,
      },
    ]);
  });

  it('reports unterminated literals and bad escapes', () => {
    const unterminated: Diagnostic[] = [];
    lex('test.asm', '"abc', unterminated);
    expect(unterminated[0]?.message).toBe('Unterminated string literal.');

    const escape: Diagnostic[] = [];
    lex('test.asm', '"\\q"', escape);
    expect(escape[0]?.message).toBe("Unknown escape sequence '\\q'.");

    const sigil: Diagnostic[] = [];
    lex('test.asm', '$ 1', sigil);
    expect(sigil[0]?.message).toBe("Expected a name after '$'.");
  });

  it('lexes snippets at a given origin without an end-of-file token', () => {
    const diagnostics: Diagnostic[] = [];
    const tokens = lexSnippet('a + 1', { file: 'src.asm', line: 7, column: 5 }, diagnostics);
    expect(tokens?.map((t) => [t.kind, t.file, t.line, t.column])).toEqual([
      ['identifier', 'src.asm', 7, 5],
      ['plus', 'src.asm', 7, 7],
      ['integerLiteral', 'src.asm', 7, 9],
    ]);
  });

  it('tracks adjacency between tokens of the same buffer', () => {
    const diagnostics: Diagnostic[] = [];
    const [a, b, c] = lex('test.asm', 'foo( x', diagnostics).tokens;
    expect(a && b && isAdjacent(a, b)).toBe(true);
    expect(b && c && isAdjacent(b, c)).toBe(false);
  });

  it('escapes strings so they lex back to the same value', () => {
    const value = 'say "hi"\n\\';
    const literal = encodeStringLiteral(value);
    expect(literal).toBe('"say \\"hi\\"\\n\\\\"');
    expect(decodeEscapes(literal.slice(1, -1))).toEqual({ ok: true, value });
  });
});

describe('token cursor', () => {
  it('peeks, consumes and reports out-of-range reads', () => {
    const diagnostics: Diagnostic[] = [];
    const lexer = lex('test.asm', 'nop', diagnostics);
    const cursor = lexer.cursor(diagnostics);
    expect(cursor.peek()?.lexeme).toBe('nop');
    expect(cursor.peek(5)).toBeUndefined();
    expect(diagnostics[0]?.id).toBe(DiagnosticIds.TokenOutOfRange);

    expect(cursor.consume().lexeme).toBe('nop');
    expect(cursor.isAtEnd()).toBe(true);
    cursor.consume();
    expect(cursor.current().kind).toBe('endOfFile');
  });

  it('expects kinds and edits the shared vector in place', () => {
    const diagnostics: Diagnostic[] = [];
    const lexer = lex('test.asm', 'nop halt', diagnostics);
    const cursor = lexer.cursor(diagnostics);
    expect(cursor.expect('comma', "Expected ','.")).toBeUndefined();
    expect(diagnostics[0]?.message).toBe("Expected ','.");

    const [halt] = lexer.tokens.slice(1, 2);
    cursor.erase(1);
    expect(cursor.current().lexeme).toBe('halt');
    if (halt) cursor.inject([halt], true);
    expect(lexer.tokens.map((t) => t.lexeme)).toEqual(['halt', 'halt', '']);
    expect(cursor.position).toBe(1);
  });

  it('stands an end-of-file token in for an empty vector', () => {
    const diagnostics: Diagnostic[] = [];
    const cursor = lex('test.asm', '§', diagnostics).cursor(diagnostics);
    expect(cursor.length).toBe(0);
    expect(cursor.current()).toMatchObject({ kind: 'endOfFile', file: 'test.asm', line: 1, column: 1 });
    expect(cursor.isAtEnd()).toBe(true);
  });

  it('skips, rewinds and matches keyword kinds', () => {
    const diagnostics: Diagnostic[] = [];
    const lexer = lex('test.asm', '\n\nld d0, 1', diagnostics);
    const cursor = lexer.cursor(diagnostics);
    expect(cursor.length).toBe(7);
    expect(cursor.skipWhile('newLine')).toBe(2);
    expect(cursor.expectKeyword('instructionMnemonic', 'Expected a mnemonic.')?.lexeme).toBe('ld');
    expect(cursor.kindAt(1)).toBe('comma');
    expect(cursor.expectKeyword('branchingCondition', 'Expected a condition.')).toBeUndefined();
    expect(diagnostics.map((d) => [d.message, d.line, d.column])).toEqual([
      ['Expected a condition.', 3, 4],
    ]);

    cursor.skip(100);
    expect(cursor.position).toBe(7);
    expect(cursor.kindAt()).toBeUndefined();
    cursor.reset();
    expect(cursor.current().kind).toBe('newLine');
    cursor.reset(3);
    expect(cursor.current().lexeme).toBe('d0');
  });
});
