import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { KeywordEntry } from '../frontend/keywords.js';
import { operandRange } from '../frontend/keywords.js';
import type { Token, TokenKind } from '../frontend/token.js';
import type { MacroTable } from './macros.js';
import type { NumericValue, PpValue } from './values.js';
import {
  FIXED_LIMIT,
  Fixed,
  VOID,
  booleanValue,
  fitsFixed,
  integerValue,
  isNumeric,
  isTruthy,
  numberValue,
  stringValue,
  toFloat,
  typeOf,
} from './values.js';

/**
 * What an expression may see: the macro table (read only), the recursion limit and the depth
 * the expression is being evaluated at.
 */
export interface EvalContext {
  macros: MacroTable;
  maxDepth: number;
  depth: number;
}

type BinaryOperator =
  | 'logicalOr'
  | 'logicalAnd'
  | 'bitwiseOr'
  | 'bitwiseXor'
  | 'bitwiseAnd'
  | 'compareEqual'
  | 'compareNotEqual'
  | 'compareLess'
  | 'compareLessEqual'
  | 'compareGreater'
  | 'compareGreaterEqual'
  | 'shiftLeft'
  | 'shiftRight'
  | 'plus'
  | 'minus'
  | 'times'
  | 'divide'
  | 'modulo';

type UnaryOperator = 'logicalNot' | 'bitwiseNot' | 'plus' | 'minus';

type ExprNode =
  | { kind: 'Literal'; value: PpValue; token: Token }
  | { kind: 'Name'; name: string; token: Token }
  | { kind: 'Unary'; op: UnaryOperator; operand: ExprNode; token: Token }
  | { kind: 'Binary'; op: BinaryOperator; left: ExprNode; right: ExprNode; token: Token }
  | { kind: 'Call'; entry: KeywordEntry; args: ExprNode[]; token: Token }
  | { kind: 'Defined'; name: string; token: Token };

/** Lowest precedence first. */
const BINARY_LEVELS: ReadonlyArray<readonly BinaryOperator[]> = [
  ['logicalOr'],
  ['logicalAnd'],
  ['bitwiseOr'],
  ['bitwiseXor'],
  ['bitwiseAnd'],
  ['compareEqual', 'compareNotEqual'],
  ['compareLess', 'compareLessEqual', 'compareGreater', 'compareGreaterEqual'],
  ['shiftLeft', 'shiftRight'],
  ['plus', 'minus'],
  ['times', 'divide', 'modulo'],
];

const OPERATOR_TEXT: Record<BinaryOperator, string> = {
  logicalOr: '||',
  logicalAnd: '&&',
  bitwiseOr: '|',
  bitwiseXor: '^',
  bitwiseAnd: '&',
  compareEqual: '==',
  compareNotEqual: '!=',
  compareLess: '<',
  compareLessEqual: '<=',
  compareGreater: '>',
  compareGreaterEqual: '>=',
  shiftLeft: '<<',
  shiftRight: '>>',
  plus: '+',
  minus: '-',
  times: '*',
  divide: '/',
  modulo: '%',
};

function isBinaryOperator(kind: TokenKind, level: readonly BinaryOperator[]): kind is BinaryOperator {
  return level.some((op) => op === kind);
}

function isUnaryOperator(kind: TokenKind): kind is UnaryOperator {
  return kind === 'logicalNot' || kind === 'bitwiseNot' || kind === 'plus' || kind === 'minus';
}

function exprDiag(
  diagnostics: Diagnostic[],
  at: Token,
  message: string,
  id: DiagnosticId = DiagnosticIds.ExprError,
): undefined {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file: at.file,
    line: at.line,
    column: at.column,
  });
  return undefined;
}

/**
 * Recursive-descent parser from a token slice to an {@link ExprNode} tree.
 */
class ExprParser {
  private pos = 0;

  constructor(
    private readonly tokens: readonly [Token, ...Token[]],
    private readonly diagnostics: Diagnostic[],
  ) {}

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private last(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1] ?? this.tokens[0];
  }

  parse(): ExprNode | undefined {
    const node = this.parseLevel(0);
    if (!node) return undefined;
    const extra = this.peek();
    if (extra) {
      return exprDiag(this.diagnostics, extra, `Unexpected token '${extra.lexeme}' in expression.`);
    }
    return node;
  }

  private parseLevel(level: number): ExprNode | undefined {
    const operators = BINARY_LEVELS[level];
    if (!operators) return this.parseUnary();
    let left = this.parseLevel(level + 1);
    if (!left) return undefined;
    for (;;) {
      const token = this.peek();
      if (!token || !isBinaryOperator(token.kind, operators)) return left;
      this.pos++;
      const right = this.parseLevel(level + 1);
      if (!right) return undefined;
      left = { kind: 'Binary', op: token.kind, left, right, token };
    }
  }

  private parseUnary(): ExprNode | undefined {
    const token = this.peek();
    if (token && isUnaryOperator(token.kind)) {
      this.pos++;
      const operand = this.parseUnary();
      if (!operand) return undefined;
      return { kind: 'Unary', op: token.kind, operand, token };
    }
    const primary = this.parsePrimary();
    const next = this.peek();
    if (primary && next?.kind === 'exponent') {
      return exprDiag(
        this.diagnostics,
        next,
        "Operator '**' is not supported in preprocessor expressions; use pow().",
      );
    }
    return primary;
  }

  private parsePrimary(): ExprNode | undefined {
    const token = this.peek();
    if (!token) {
      return exprDiag(this.diagnostics, this.last(), 'Unexpected end of expression.');
    }
    this.pos++;
    switch (token.kind) {
      case 'integerLiteral':
      case 'characterLiteral':
        return { kind: 'Literal', value: integerValue(token.intValue ?? 0n), token };
      case 'numberLiteral': {
        const value = token.numberValue ?? Number.NaN;
        if (!Number.isFinite(value) || Math.abs(value) >= FIXED_LIMIT) {
          return exprDiag(
            this.diagnostics,
            token,
            `Number literal '${token.lexeme}' is outside the fixed-point range.`,
          );
        }
        return { kind: 'Literal', value: numberValue(Fixed.fromFloat(value)), token };
      }
      case 'stringLiteral':
        return { kind: 'Literal', value: stringValue(token.stringValue ?? ''), token };
      case 'identifier':
        if (token.lexeme === 'true' || token.lexeme === 'false') {
          return { kind: 'Literal', value: booleanValue(token.lexeme === 'true'), token };
        }
        return { kind: 'Name', name: token.lexeme, token };
      case 'leftParenthesis': {
        const inner = this.parseLevel(0);
        if (!inner) return undefined;
        if (this.peek()?.kind !== 'rightParenthesis') {
          return exprDiag(this.diagnostics, this.last(), "Expected ')' to close '('.");
        }
        this.pos++;
        return inner;
      }
      case 'keyword':
        if (token.keyword?.kind === 'preprocessorFunction') {
          return this.parseCall(token, token.keyword);
        }
        return exprDiag(
          this.diagnostics,
          token,
          `Keyword '${token.lexeme}' cannot be used in a preprocessor expression.`,
        );
      case 'variable':
        return exprDiag(
          this.diagnostics,
          token,
          `Variable '${token.lexeme}' cannot be used in a preprocessor expression.`,
        );
      case 'placeholder':
      case 'placeholderKeyword':
        return exprDiag(
          this.diagnostics,
          token,
          `Placeholder '${token.lexeme}' used outside of a macro expansion.`,
        );
      default:
        return exprDiag(this.diagnostics, token, `Unexpected token '${token.lexeme}' in expression.`);
    }
  }

  private parseCall(name: Token, entry: KeywordEntry): ExprNode | undefined {
    if (this.peek()?.kind !== 'leftParenthesis') {
      return exprDiag(this.diagnostics, name, `Expected '(' after function name '${name.lexeme}'.`);
    }
    this.pos++;

    if (entry.canonical === 'defined') {
      const target = this.peek();
      if (!target || (target.kind !== 'identifier' && target.kind !== 'keyword')) {
        return exprDiag(this.diagnostics, target ?? name, "Function 'defined' expects a name.");
      }
      this.pos++;
      if (this.peek()?.kind !== 'rightParenthesis') {
        return exprDiag(this.diagnostics, this.last(), "Expected ')' after argument to 'defined'.");
      }
      this.pos++;
      return { kind: 'Defined', name: target.lexeme, token: name };
    }

    const args: ExprNode[] = [];
    if (this.peek()?.kind === 'rightParenthesis') {
      this.pos++;
    } else {
      for (;;) {
        const arg = this.parseLevel(0);
        if (!arg) return undefined;
        args.push(arg);
        const sep = this.peek();
        if (sep?.kind === 'comma') {
          this.pos++;
          continue;
        }
        if (sep?.kind === 'rightParenthesis') {
          this.pos++;
          break;
        }
        return exprDiag(
          this.diagnostics,
          sep ?? this.last(),
          `Expected ',' or ')' in call to '${name.lexeme}'.`,
        );
      }
    }

    const { min, max } = operandRange(entry);
    if (args.length < min || args.length > max) {
      const expected = min === max ? `${min}` : `${min} to ${max}`;
      return exprDiag(
        this.diagnostics,
        name,
        `Function '${entry.canonical}' expects ${expected} argument(s), got ${args.length}.`,
        DiagnosticIds.ExprArityMismatch,
      );
    }
    return { kind: 'Call', entry, args, token: name };
  }
}

/**
 * Evaluates a parsed expression tree. Never writes to the macro table.
 */
class ExprEvaluator {
  constructor(
    private readonly ctx: EvalContext,
    private readonly diagnostics: Diagnostic[],
  ) {}

  eval(node: ExprNode): PpValue | undefined {
    switch (node.kind) {
      case 'Literal':
        return node.value;
      case 'Name':
        return this.evalName(node.name, node.token);
      case 'Defined':
        return booleanValue(this.ctx.macros.isDefined(node.name));
      case 'Unary': {
        const operand = this.eval(node.operand);
        if (!operand) return undefined;
        return this.applyUnary(node.op, operand, node.token);
      }
      case 'Binary': {
        const left = this.eval(node.left);
        if (!left) return undefined;
        if (node.op === 'logicalAnd' && !isTruthy(left)) return booleanValue(false);
        if (node.op === 'logicalOr' && isTruthy(left)) return booleanValue(true);
        const right = this.eval(node.right);
        if (!right) return undefined;
        if (node.op === 'logicalAnd' || node.op === 'logicalOr') {
          return booleanValue(isTruthy(right));
        }
        return this.applyBinary(node.op, left, right, node.token);
      }
      case 'Call': {
        const args: PpValue[] = [];
        for (const argNode of node.args) {
          const value = this.eval(argNode);
          if (!value) return undefined;
          args.push(value);
        }
        return new Builtins(this.diagnostics, node.token, node.entry.canonical).call(args);
      }
    }
  }

  private evalName(name: string, at: Token): PpValue | undefined {
    const macro = this.ctx.macros.get(name);
    if (!macro) return exprDiag(this.diagnostics, at, `Unknown identifier '${name}'.`);
    if (macro.kind === 'block') {
      return exprDiag(
        this.diagnostics,
        at,
        `Block macro '${name}' cannot be used in an expression.`,
      );
    }
    const depth = this.ctx.depth + 1;
    if (depth > this.ctx.maxDepth) {
      return exprDiag(
        this.diagnostics,
        at,
        `Maximum recursion depth (${this.ctx.maxDepth}) exceeded while expanding '${name}'.`,
        DiagnosticIds.RecursionDepthExceeded,
      );
    }
    return evaluate(macro.tokens, { ...this.ctx, depth }, this.diagnostics);
  }

  private applyUnary(op: UnaryOperator, value: PpValue, at: Token): PpValue | undefined {
    if (op === 'logicalNot') return booleanValue(!isTruthy(value));
    if (op === 'bitwiseNot') {
      if (value.type !== 'integer') return this.typeError(`~`, value, at);
      return integerValue(~value.value);
    }
    if (!isNumeric(value)) return this.typeError(op === 'plus' ? '+' : '-', value, at);
    if (op === 'plus') return value;
    return value.type === 'integer' ? integerValue(-value.value) : numberValue(value.value.neg());
  }

  private applyBinary(
    op: BinaryOperator,
    left: PpValue,
    right: PpValue,
    at: Token,
  ): PpValue | undefined {
    const text = OPERATOR_TEXT[op];
    switch (op) {
      case 'plus':
        if (left.type === 'string' && right.type === 'string') {
          return stringValue(left.value + right.value);
        }
        return this.arithmetic(op, left, right, at);
      case 'minus':
      case 'times':
      case 'divide':
      case 'modulo':
        return this.arithmetic(op, left, right, at);
      case 'bitwiseAnd':
      case 'bitwiseOr':
      case 'bitwiseXor':
      case 'shiftLeft':
      case 'shiftRight': {
        if (left.type !== 'integer' || right.type !== 'integer') {
          return this.typeError(text, left, at, right);
        }
        return this.bitwise(op, left.value, right.value, at);
      }
      case 'compareEqual':
      case 'compareNotEqual': {
        const equal = this.equals(left, right, at, text);
        if (equal === undefined) return undefined;
        return booleanValue(op === 'compareEqual' ? equal : !equal);
      }
      case 'compareLess':
      case 'compareLessEqual':
      case 'compareGreater':
      case 'compareGreaterEqual': {
        const order = this.order(left, right, at, text);
        if (order === undefined) return undefined;
        if (op === 'compareLess') return booleanValue(order < 0);
        if (op === 'compareLessEqual') return booleanValue(order <= 0);
        if (op === 'compareGreater') return booleanValue(order > 0);
        return booleanValue(order >= 0);
      }
      case 'logicalAnd':
      case 'logicalOr':
        return booleanValue(isTruthy(right));
    }
  }

  private arithmetic(
    op: 'plus' | 'minus' | 'times' | 'divide' | 'modulo',
    left: PpValue,
    right: PpValue,
    at: Token,
  ): PpValue | undefined {
    if (!isNumeric(left) || !isNumeric(right)) {
      return this.typeError(OPERATOR_TEXT[op], left, at, right);
    }
    if (left.type === 'integer' && right.type === 'integer') {
      const l = left.value;
      const r = right.value;
      switch (op) {
        case 'plus':
          return integerValue(l + r);
        case 'minus':
          return integerValue(l - r);
        case 'times':
          return integerValue(l * r);
        case 'divide':
          if (r === 0n) return divideByZero(this.diagnostics, at);
          return integerValue(l / r);
        case 'modulo':
          if (r === 0n) return moduloByZero(this.diagnostics, at);
          return integerValue(l % r);
      }
    }
    const l = promote(left, this.diagnostics, at);
    const r = l && promote(right, this.diagnostics, at);
    if (!l || !r) return undefined;
    switch (op) {
      case 'plus':
        return numberValue(l.add(r));
      case 'minus':
        return numberValue(l.sub(r));
      case 'times':
        return numberValue(l.mul(r));
      case 'divide': {
        const q = l.div(r);
        return q ? numberValue(q) : divideByZero(this.diagnostics, at);
      }
      case 'modulo': {
        const m = l.mod(r);
        return m ? numberValue(m) : moduloByZero(this.diagnostics, at);
      }
    }
  }

  private bitwise(
    op: 'bitwiseAnd' | 'bitwiseOr' | 'bitwiseXor' | 'shiftLeft' | 'shiftRight',
    l: bigint,
    r: bigint,
    at: Token,
  ): PpValue | undefined {
    switch (op) {
      case 'bitwiseAnd':
        return integerValue(l & r);
      case 'bitwiseOr':
        return integerValue(l | r);
      case 'bitwiseXor':
        return integerValue(l ^ r);
      case 'shiftLeft':
      case 'shiftRight': {
        if (r < 0n) {
          return exprDiag(this.diagnostics, at, `Shift count ${r} must not be negative.`);
        }
        const count = r > 64n ? 64n : r;
        return integerValue(op === 'shiftLeft' ? l << count : l >> count);
      }
    }
  }

  private equals(left: PpValue, right: PpValue, at: Token, text: string): boolean | undefined {
    if (isNumeric(left) && isNumeric(right)) {
      if (left.type === 'integer' && right.type === 'integer') return left.value === right.value;
      const l = promote(left, this.diagnostics, at);
      const r = l && promote(right, this.diagnostics, at);
      return l && r ? l.equals(r) : undefined;
    }
    if (left.type === 'string' && right.type === 'string') return left.value === right.value;
    if (left.type === 'boolean' && right.type === 'boolean') return left.value === right.value;
    if (left.type === 'void' && right.type === 'void') return true;
    this.typeError(text, left, at, right);
    return undefined;
  }

  private order(left: PpValue, right: PpValue, at: Token, text: string): number | undefined {
    if (isNumeric(left) && isNumeric(right)) return compareNumeric(left, right, this.diagnostics, at);
    if (left.type === 'string' && right.type === 'string') {
      return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
    }
    this.typeError(text, left, at, right);
    return undefined;
  }

  private typeError(op: string, left: PpValue, at: Token, right?: PpValue): undefined {
    const operands = right ? `${typeOf(left)} and ${typeOf(right)}` : typeOf(left);
    return exprDiag(this.diagnostics, at, `Operator '${op}' cannot be applied to ${operands}.`);
  }
}

function divideByZero(diagnostics: Diagnostic[], at: Token): undefined {
  return exprDiag(diagnostics, at, 'Division by zero.', DiagnosticIds.ExprDivideByZero);
}

function moduloByZero(diagnostics: Diagnostic[], at: Token): undefined {
  return exprDiag(diagnostics, at, 'Modulo by zero.', DiagnosticIds.ExprModuloByZero);
}

const TURN = 2 * Math.PI;

function compareBigInt(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Promote an integer or number to fixed point. Integers outside the Q32.32 range fail rather
 * than wrap.
 */
function promote(value: NumericValue, diagnostics: Diagnostic[], at: Token): Fixed | undefined {
  if (value.type === 'number') return value.value;
  if (fitsFixed(value.value)) return Fixed.fromInteger(value.value);
  return exprDiag(diagnostics, at, `Integer ${value.value} is outside the fixed-point range.`);
}

function compareNumeric(
  a: NumericValue,
  b: NumericValue,
  diagnostics: Diagnostic[],
  at: Token,
): number | undefined {
  if (a.type === 'integer' && b.type === 'integer') return compareBigInt(a.value, b.value);
  const fa = promote(a, diagnostics, at);
  const fb = fa && promote(b, diagnostics, at);
  return fa && fb ? fa.compare(fb) : undefined;
}

/**
 * One builtin call. Argument counts have already been checked against the keyword table.
 */
class Builtins {
  constructor(
    private readonly diagnostics: Diagnostic[],
    private readonly at: Token,
    private readonly name: string,
  ) {}

  private fail(message: string): undefined {
    return exprDiag(this.diagnostics, this.at, message);
  }

  private integer(args: PpValue[], index: number): bigint | undefined {
    const value = args[index];
    if (value?.type !== 'integer') {
      return this.fail(`Argument ${index + 1} of '${this.name}' must be an integer.`);
    }
    return value.value;
  }

  private numeric(args: PpValue[], index: number): NumericValue | undefined {
    const value = args[index];
    if (!value || !isNumeric(value)) {
      return this.fail(`Argument ${index + 1} of '${this.name}' must be numeric.`);
    }
    return value;
  }

  private string(args: PpValue[], index: number): string | undefined {
    const value = args[index];
    if (value?.type !== 'string') {
      return this.fail(`Argument ${index + 1} of '${this.name}' must be a string.`);
    }
    return value.value;
  }

  private numerics(args: PpValue[]): NumericValue[] | undefined {
    const out: NumericValue[] = [];
    for (let i = 0; i < args.length; i++) {
      const value = this.numeric(args, i);
      if (!value) return undefined;
      out.push(value);
    }
    return out;
  }

  /** A float result converted back to fixed point; non-finite or out-of-range results fail. */
  private real(value: number): PpValue | undefined {
    if (!Number.isFinite(value)) {
      return this.fail(`Result of '${this.name}' is not a finite number.`);
    }
    if (Math.abs(value) >= FIXED_LIMIT) {
      return this.fail(`Result of '${this.name}' is outside the fixed-point range.`);
    }
    return numberValue(Fixed.fromFloat(value));
  }

  private unaryReal(args: PpValue[], fn: (x: number) => number): PpValue | undefined {
    const x = this.numeric(args, 0);
    return x ? this.real(fn(toFloat(x))) : undefined;
  }

  private pick(args: PpValue[], wins: (order: number) => boolean): PpValue | undefined {
    const values = this.numerics(args);
    if (!values) return undefined;
    const [first, ...rest] = values;
    if (!first) return undefined;
    let best = first;
    for (const v of rest) {
      const order = compareNumeric(v, best, this.diagnostics, this.at);
      if (order === undefined) return undefined;
      if (wins(order)) best = v;
    }
    if (values.every((v) => v.type === 'integer')) return best;
    const fixed = promote(best, this.diagnostics, this.at);
    return fixed && numberValue(fixed);
  }

  private rounding(args: PpValue[], fn: (x: Fixed) => bigint): PpValue | undefined {
    const x = this.numeric(args, 0);
    if (!x) return undefined;
    return x.type === 'integer' ? x : integerValue(fn(x.value));
  }

  call(args: PpValue[]): PpValue | undefined {
    switch (this.name) {
      case 'high': {
        const x = this.integer(args, 0);
        return x === undefined ? undefined : integerValue((x >> 8n) & 0xffn);
      }
      case 'low': {
        const x = this.integer(args, 0);
        return x === undefined ? undefined : integerValue(x & 0xffn);
      }
      case 'bitwidth': {
        const x = this.integer(args, 0);
        if (x === undefined) return undefined;
        return integerValue(x === 0n ? 0n : BigInt((x < 0n ? -x : x).toString(2).length));
      }
      case 'abs': {
        const x = this.numeric(args, 0);
        if (!x) return undefined;
        if (x.type === 'integer') return integerValue(x.value < 0n ? -x.value : x.value);
        return numberValue(x.value.abs());
      }
      case 'min':
        return this.pick(args, (order) => order < 0);
      case 'max':
        return this.pick(args, (order) => order > 0);
      case 'clamp': {
        const values = this.numerics(args);
        if (!values) return undefined;
        const [x, lo, hi] = values;
        if (!x || !lo || !hi) return undefined;
        if (x.type === 'integer' && lo.type === 'integer' && hi.type === 'integer') {
          if (compareBigInt(lo.value, hi.value) > 0) {
            return this.fail("Lower bound of 'clamp' is greater than its upper bound.");
          }
          const low = compareBigInt(x.value, lo.value) < 0 ? lo.value : x.value;
          return integerValue(compareBigInt(low, hi.value) > 0 ? hi.value : low);
        }
        const fx = promote(x, this.diagnostics, this.at);
        const flo = fx && promote(lo, this.diagnostics, this.at);
        const fhi = flo && promote(hi, this.diagnostics, this.at);
        if (!fx || !flo || !fhi) return undefined;
        if (flo.compare(fhi) > 0) {
          return this.fail("Lower bound of 'clamp' is greater than its upper bound.");
        }
        const low = fx.compare(flo) < 0 ? flo : fx;
        return numberValue(low.compare(fhi) > 0 ? fhi : low);
      }
      case 'fmul':
      case 'fdiv':
      case 'fmod': {
        const a = this.numeric(args, 0);
        const b = this.numeric(args, 1);
        if (!a || !b) return undefined;
        const fa = promote(a, this.diagnostics, this.at);
        const fb = fa && promote(b, this.diagnostics, this.at);
        if (!fa || !fb) return undefined;
        if (this.name === 'fmul') return numberValue(fa.mul(fb));
        const result = this.name === 'fdiv' ? fa.div(fb) : fa.mod(fb);
        if (result) return numberValue(result);
        return this.name === 'fdiv'
          ? divideByZero(this.diagnostics, this.at)
          : moduloByZero(this.diagnostics, this.at);
      }
      case 'fint':
      case 'trunc':
        return this.rounding(args, (x) => x.trunc());
      case 'round':
        return this.rounding(args, (x) => x.round());
      case 'ceil':
        return this.rounding(args, (x) => x.ceil());
      case 'floor':
        return this.rounding(args, (x) => x.floor());
      case 'ffrac': {
        const x = this.numeric(args, 0);
        if (!x) return undefined;
        if (x.type === 'integer') return numberValue(Fixed.fromInteger(0n));
        return numberValue(x.value.sub(Fixed.fromInteger(x.value.trunc())));
      }
      case 'pow': {
        const base = this.numeric(args, 0);
        const exponent = this.numeric(args, 1);
        if (!base || !exponent) return undefined;
        if (base.type === 'integer' && exponent.type === 'integer' && exponent.value >= 0n) {
          return integerValue(integerPow(base.value, exponent.value));
        }
        return this.real(Math.pow(toFloat(base), toFloat(exponent)));
      }
      case 'sqrt':
        return this.unaryReal(args, Math.sqrt);
      case 'exp':
        return this.unaryReal(args, Math.exp);
      case 'ln':
        return this.unaryReal(args, Math.log);
      case 'log2':
        return this.unaryReal(args, Math.log2);
      case 'log10':
        return this.unaryReal(args, Math.log10);
      case 'log': {
        const x = this.numeric(args, 0);
        const base = this.numeric(args, 1);
        if (!x || !base) return undefined;
        return this.real(Math.log(toFloat(x)) / Math.log(toFloat(base)));
      }
      case 'sin':
        return this.unaryReal(args, (x) => Math.sin(x * TURN));
      case 'cos':
        return this.unaryReal(args, (x) => Math.cos(x * TURN));
      case 'tan':
        return this.unaryReal(args, (x) => Math.tan(x * TURN));
      case 'asin':
        return this.unaryReal(args, (x) => Math.asin(x) / TURN);
      case 'acos':
        return this.unaryReal(args, (x) => Math.acos(x) / TURN);
      case 'atan':
        return this.unaryReal(args, (x) => Math.atan(x) / TURN);
      case 'atan2': {
        const y = this.numeric(args, 0);
        const x = this.numeric(args, 1);
        if (!y || !x) return undefined;
        return this.real(Math.atan2(toFloat(y), toFloat(x)) / TURN);
      }
      case 'strlen': {
        const s = this.string(args, 0);
        return s === undefined ? undefined : integerValue(BigInt(s.length));
      }
      case 'strcmp': {
        const a = this.string(args, 0);
        const b = this.string(args, 1);
        if (a === undefined || b === undefined) return undefined;
        return integerValue(a < b ? -1n : a > b ? 1n : 0n);
      }
      case 'substr':
        return this.substr(args);
      case 'indexof': {
        const s = this.string(args, 0);
        const needle = this.string(args, 1);
        if (s === undefined || needle === undefined) return undefined;
        return integerValue(BigInt(s.indexOf(needle)));
      }
      case 'toupper': {
        const s = this.string(args, 0);
        return s === undefined ? undefined : stringValue(s.toUpperCase());
      }
      case 'tolower': {
        const s = this.string(args, 0);
        return s === undefined ? undefined : stringValue(s.toLowerCase());
      }
      case 'concat': {
        let out = '';
        for (let i = 0; i < args.length; i++) {
          const s = this.string(args, i);
          if (s === undefined) return undefined;
          out += s;
        }
        return stringValue(out);
      }
      case 'typeof': {
        const [value] = args;
        return value ? stringValue(typeOf(value)) : undefined;
      }
      default:
        return this.fail(`Function '${this.name}' is not implemented.`);
    }
  }

  private substr(args: PpValue[]): PpValue | undefined {
    const s = this.string(args, 0);
    const start = this.integer(args, 1);
    if (s === undefined || start === undefined) return undefined;
    if (start < 0n || start > BigInt(s.length)) {
      return this.fail(`Start index ${start} is out of range for 'substr'.`);
    }
    if (args.length < 3) return stringValue(s.slice(Number(start)));
    const length = this.integer(args, 2);
    if (length === undefined) return undefined;
    if (length < 0n) return this.fail(`Length ${length} of 'substr' must not be negative.`);
    const end = start + length > BigInt(s.length) ? BigInt(s.length) : start + length;
    return stringValue(s.slice(Number(start), Number(end)));
  }
}

/**
 * `base ** exponent` wrapped to 64 bits, by repeated squaring.
 */
function integerPow(base: bigint, exponent: bigint): bigint {
  let result = 1n;
  let b = BigInt.asIntN(64, base);
  let e = exponent;
  while (e > 0n) {
    if ((e & 1n) === 1n) result = BigInt.asIntN(64, result * b);
    b = BigInt.asIntN(64, b * b);
    e >>= 1n;
  }
  return result;
}

/**
 * Evaluate a preprocessor expression.
 *
 * An empty token list is `void`. Errors are appended to `diagnostics` and yield `undefined`.
 */
export function evaluate(
  tokens: readonly Token[],
  ctx: EvalContext,
  diagnostics: Diagnostic[],
): PpValue | undefined {
  const [first, ...rest] = tokens;
  if (!first) return VOID;
  const tree = new ExprParser([first, ...rest], diagnostics).parse();
  if (!tree) return undefined;
  return new ExprEvaluator(ctx, diagnostics).eval(tree);
}
