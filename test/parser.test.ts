import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type {
  BinaryExpressionNode,
  DataDirectiveNode,
  InstructionNode,
  ModuleNode,
  StatementNode,
} from '../src/frontend/ast.js';
import { lex } from '../src/frontend/lexer.js';
import { Parser, parse } from '../src/frontend/parser.js';

function parseText(text: string): { module: ModuleNode | undefined; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const lexer = lex('prog.asm', text, diagnostics);
  expect(diagnostics).toEqual([]);
  return { module: parse(lexer, diagnostics), diagnostics };
}

function statements(text: string): StatementNode[] {
  const { module, diagnostics } = parseText(text);
  expect(diagnostics).toEqual([]);
  return module?.children ?? [];
}

function firstError(text: string): Diagnostic | undefined {
  const { module, diagnostics } = parseText(text);
  expect(module).toBeUndefined();
  expect(diagnostics).toHaveLength(1);
  return diagnostics[0];
}

describe('parser: statements', () => {
  it('parses labels before an instruction on the same line', () => {
    const children = statements('start: loop: ld d0, [d1]\n');
    expect(children.map((c) => c.kind)).toEqual(['LabelDefinition', 'LabelDefinition', 'Instruction']);
    expect(children[0]).toEqual({
      kind: 'LabelDefinition',
      name: 'start',
      span: {
        file: 'prog.asm',
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 6, offset: 5 },
      },
    });

    const ld = children[2] as InstructionNode;
    expect(ld.mnemonic).toBe('ld');
    expect(ld.keyword.canonical).toBe('ld');
    expect(ld.operands.map((o) => o.kind)).toEqual(['RegisterOperand', 'IndirectOperand']);
    expect(ld.operands[0]).toMatchObject({ name: 'd0', code: 0, size: 4 });
    expect(ld.operands[1]).toMatchObject({ register: { name: 'd1', code: 1, size: 4 } });
  });

  it('keeps aliases as written and resolves their keyword', () => {
    const [jp] = statements('jp nc, target\n') as InstructionNode[];
    expect(jp?.mnemonic).toBe('jp');
    expect(jp?.keyword.canonical).toBe('jmp');
    expect(jp?.operands[0]).toMatchObject({ kind: 'ConditionOperand', name: 'nc', code: 0 });
    expect(jp?.operands[1]).toMatchObject({
      kind: 'ImmediateOperand',
      value: { kind: 'PrimaryExpression', primary: { type: 'identifier', name: 'target' } },
    });
  });

  it('distinguishes direct from indirect memory operands', () => {
    const [st] = statements('st [0x8000 + 4], d2\n') as InstructionNode[];
    const direct = st?.operands[0];
    expect(direct?.kind).toBe('DirectOperand');
    if (direct?.kind !== 'DirectOperand') return;
    expect(direct.address).toMatchObject({ kind: 'BinaryExpression', operator: '+' });
    expect(direct.span.start.column).toBe(4);
    expect(direct.span.end.column).toBe(15);
  });

  it('keeps data values in source order', () => {
    const [data] = statements('.byte 1, 2, 3\n') as DataDirectiveNode[];
    expect(data?.width).toBe(1);
    expect(data?.values).toHaveLength(3);
    expect(data?.values.map((v) => v.kind)).toEqual([
      'PrimaryExpression',
      'PrimaryExpression',
      'PrimaryExpression',
    ]);
    expect(data?.values).toMatchObject([
      { primary: { type: 'integer', value: 1n } },
      { primary: { type: 'integer', value: 2n } },
      { primary: { type: 'integer', value: 3n } },
    ]);
  });

  it('parses assembler directives', () => {
    const children = statements(
      '.org 0x100\n.rom\n.ram\n.interrupt 3\n.db 1, "hi"\n.dw 2\n.dd 3\n.global a, b\n.extern c\n',
    );
    expect(children.map((c) => c.kind)).toEqual([
      'OrgDirective',
      'SectionDirective',
      'SectionDirective',
      'SectionDirective',
      'DataDirective',
      'DataDirective',
      'DataDirective',
      'GlobalDirective',
      'ExternDirective',
    ]);
    expect(children[1]).toMatchObject({ section: 'rom' });
    expect(children[2]).toMatchObject({ section: 'ram' });
    expect(children[3]).toMatchObject({ section: 'int', vector: { primary: { value: 3n } } });
    expect((children.slice(4, 7) as DataDirectiveNode[]).map((d) => d.width)).toEqual([1, 2, 4]);
    expect((children[4] as DataDirectiveNode).values[1]).toMatchObject({
      primary: { type: 'string', value: 'hi' },
    });
    expect(children[7]).toMatchObject({ symbols: ['a', 'b'] });
    expect(children[8]).toMatchObject({ symbols: ['c'] });
  });

  it('parses declarations and assignments', () => {
    const children = statements('.let $x = 1\n.const $Y = 2\n$x += $Y * 3\n');
    expect(children[0]).toMatchObject({ kind: 'VariableDeclaration', constant: false, name: 'x' });
    expect(children[1]).toMatchObject({ kind: 'VariableDeclaration', constant: true, name: 'Y' });
    expect(children[2]).toMatchObject({
      kind: 'VariableAssignment',
      name: 'x',
      operator: '+=',
      value: { kind: 'BinaryExpression', operator: '*', left: { primary: { type: 'variable', name: 'Y' } } },
    });
  });

  it('skips the file markers written by the preprocessor', () => {
    const diagnostics: Diagnostic[] = [];
    const lexer = lex('prog.asm', '.pragma push_file "a.asm"\nnop\n.pragma pop_file\n', diagnostics);
    const parser = new Parser(lexer, diagnostics);
    const module = parser.parse();
    expect(diagnostics).toEqual([]);
    expect(module?.children.map((c) => c.kind)).toEqual(['Instruction']);
    expect(parser.currentFile).toBeUndefined();
    expect(parser.isGood()).toBe(true);
  });

  it('accepts an empty module', () => {
    expect(statements('\n\n')).toEqual([]);
  });
});

describe('parser: expressions', () => {
  function value(text: string): BinaryExpressionNode {
    const [data] = statements(`.byte ${text}\n`) as DataDirectiveNode[];
    const [expr] = data?.values ?? [];
    if (expr?.kind !== 'BinaryExpression') throw new Error(`not a binary expression: ${text}`);
    return expr;
  }

  it('binds multiplication tighter than addition', () => {
    const expr = value('1 + 2 * 3');
    expect(expr.operator).toBe('+');
    expect(expr.right).toMatchObject({ kind: 'BinaryExpression', operator: '*' });
  });

  it('associates subtraction to the left', () => {
    const expr = value('8 - 4 - 2');
    expect(expr.left).toMatchObject({ kind: 'BinaryExpression', operator: '-' });
    expect(expr.right).toMatchObject({ primary: { value: 2n } });
  });

  it('associates exponentiation to the right', () => {
    const expr = value('2 ** 3 ** 2');
    expect(expr.operator).toBe('**');
    expect(expr.left).toMatchObject({ primary: { value: 2n } });
    expect(expr.right).toMatchObject({ kind: 'BinaryExpression', operator: '**' });
  });

  it('orders comparison, logical and bitwise levels', () => {
    expect(value('a || b && c').operator).toBe('||');
    expect(value('a == b | c').operator).toBe('|');
    expect(value('1 << 2 < 3').operator).toBe('<');
  });

  it('parses unary operators, grouping and literals', () => {
    const [data] = statements(".byte -(1), ~$m, !0, 'A', 1.5, @x\n") as DataDirectiveNode[];
    expect(data?.values.map((v) => v.kind)).toEqual([
      'UnaryExpression',
      'UnaryExpression',
      'UnaryExpression',
      'PrimaryExpression',
      'PrimaryExpression',
      'PrimaryExpression',
    ]);
    expect(data?.values[0]).toMatchObject({ operator: '-', operand: { kind: 'GroupingExpression' } });
    expect(data?.values[3]).toMatchObject({ primary: { type: 'char', value: 'A' } });
    expect(data?.values[4]).toMatchObject({ primary: { type: 'number', value: 1.5 } });
    expect(data?.values[5]).toMatchObject({ primary: { type: 'placeholder', name: 'x' } });
  });
});

describe('parser: errors', () => {
  it('checks operand counts', () => {
    const few = firstError('ld d0\n');
    expect(few).toEqual({
      id: DiagnosticIds.OperandCountMismatch,
      severity: 'error',
      message: "Instruction 'ld' expects at least 2 operand(s), got 1.",
      file: 'prog.asm',
      line: 1,
      column: 1,
    });
    expect(firstError('nop 1\n')?.message).toBe(
      "Instruction 'nop' has too many operands (1); at most 0 allowed.",
    );
  });

  it('rejects keywords that cannot be operands', () => {
    expect(firstError('nop nop\n')?.message).toBe(
      "Unsupported keyword type 'instructionMnemonic' ('nop') for operand.",
    );
  });

  it('reports unclosed brackets and parentheses', () => {
    expect(firstError('ld d0, [d1\n')?.message).toBe(
      "Expected ']' after indirect memory operand register.",
    );
    expect(firstError('ld d0, [4\n')?.message).toBe(
      "Expected ']' after direct memory operand expression.",
    );
    expect(firstError('.byte (1\n')?.message).toBe("Expected ')' to close grouped expression.");
  });

  it('reports missing and malformed expressions', () => {
    expect(firstError('.byte 1 +\n')?.message).toBe('Expected an expression before end of line.');
    expect(firstError('.byte ,\n')?.message).toBe(
      "Unsupported token type 'comma' (',') for primary expression.",
    );
    expect(firstError('.byte\n')?.message).toBe("'.byte' directive requires at least one value.");
  });

  it('reports trailing tokens', () => {
    const diag = firstError('ld d0, 1 2\n');
    expect(diag?.message).toBe("Unexpected token '2' at end of statement.");
    expect(diag?.column).toBe(10);
  });

  it('validates symbol lists and declarations', () => {
    expect(firstError('.global 1\n')?.message).toBe(
      "Expected identifier for symbol in '.global' directive.",
    );
    expect(firstError('.let x = 1\n')?.message).toBe(
      "Expected variable name (starting with '$') after '.let'.",
    );
    expect(firstError('.const $x 1\n')?.message).toBe(
      "Expected '=' after constant name in '.const' directive.",
    );
    expect(firstError('$x\n')?.message).toBe(
      "Expected assignment operator (=, +=, -=, *=, etc.) after variable '$x'. Found 'end of line'.",
    );
  });

  it('rejects statements it does not know', () => {
    expect(firstError('foo bar\n')?.message).toBe(
      "Unsupported statement type starting with token 'foo'.",
    );
  });

  it('rejects preprocessor directives left in its input', () => {
    expect(firstError('.define X 1\n')?.message).toBe(
      "Preprocessor directive '.define' cannot appear in preprocessed source.",
    );
    expect(firstError('.pragma once\n')?.message).toBe(
      "Pragma 'once' cannot appear in preprocessed source.",
    );
    expect(firstError('.pragma pop_file\n')?.message).toBe(
      "Unbalanced '.pragma pop_file' without a matching 'push_file'.",
    );
  });

  it('stops at the first error', () => {
    const { module, diagnostics } = parseText('ld d0\nnop 1\n');
    expect(module).toBeUndefined();
    expect(diagnostics.map((d) => d.line)).toEqual([1]);
  });

  it('refuses tokens from a lexer that failed', () => {
    const diagnostics: Diagnostic[] = [];
    const lexer = lex('prog.asm', '§', diagnostics);
    expect(lexer.tokens).toEqual([]);
    expect(parse(lexer, diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.message, d.line, d.column])).toEqual([
      [DiagnosticIds.LexError, "Unrecognized character: '§'.", 1, 1],
      [DiagnosticIds.ParseError, "Cannot parse 'prog.asm': its tokens are incomplete.", 1, 1],
    ]);
  });
});
