import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  AssignmentOperator,
  BinaryOperator,
  ExpressionNode,
  ModuleNode,
  SourceSpan,
  UnaryOperator,
} from '../frontend/ast.js';

/**
 * One `$name` entry in the variable/constant store.
 */
export interface EnvEntry {
  value: bigint;
  constant: boolean;
  file: string;
  line: number;
}

export type EnvResult<T> = { ok: true; value: T } | { ok: false; message: string };

/**
 * Store for `.let` variables and `.const` constants. Names are kept without the `$`.
 */
export class Environment {
  private readonly entries = new Map<string, EnvEntry>();

  clear(): void {
    this.entries.clear();
  }

  defineVariable(name: string, value: bigint, file: string, line: number): EnvResult<void> {
    return this.define(name, value, false, file, line);
  }

  defineConstant(name: string, value: bigint, file: string, line: number): EnvResult<void> {
    return this.define(name, value, true, file, line);
  }

  private define(
    name: string,
    value: bigint,
    constant: boolean,
    file: string,
    line: number,
  ): EnvResult<void> {
    const existing = this.entries.get(name);
    if (existing) {
      return {
        ok: false,
        message: `'$${name}' is already defined as a ${existing.constant ? 'constant' : 'variable'} at '${existing.file}:${existing.line}'.`,
      };
    }
    this.entries.set(name, { value: BigInt.asIntN(64, value), constant, file, line });
    return { ok: true, value: undefined };
  }

  getValue(name: string): EnvResult<bigint> {
    const entry = this.entries.get(name);
    if (!entry) return { ok: false, message: `Undefined variable or constant '$${name}'.` };
    return { ok: true, value: entry.value };
  }

  setValue(name: string, value: bigint): EnvResult<void> {
    const entry = this.entries.get(name);
    if (!entry) return { ok: false, message: `Undefined variable '$${name}'.` };
    if (entry.constant) {
      return {
        ok: false,
        message: `Cannot modify constant '$${name}' (defined at '${entry.file}:${entry.line}').`,
      };
    }
    entry.value = BigInt.asIntN(64, value);
    return { ok: true, value: undefined };
  }

  exists(name: string): boolean {
    return this.entries.has(name);
  }

  isConstant(name: string): boolean {
    return this.entries.get(name)?.constant ?? false;
  }

  /** Snapshot of current values, in definition order. */
  values(): Map<string, bigint> {
    return new Map([...this.entries].map(([name, entry]) => [name, entry.value]));
  }
}

function diag(diagnostics: Diagnostic[], span: SourceSpan, message: string): undefined {
  diagnostics.push({
    id: DiagnosticIds.SemanticsError,
    severity: 'error',
    message,
    file: span.file,
    line: span.start.line,
    column: span.start.column,
  });
  return undefined;
}

function wrap(value: bigint): bigint {
  return BigInt.asIntN(64, value);
}

function flag(value: boolean): bigint {
  return value ? 1n : 0n;
}

function power(base: bigint, exponent: bigint): bigint {
  let result = 1n;
  let b = wrap(base);
  let e = exponent;
  while (e > 0n) {
    if ((e & 1n) === 1n) result = wrap(result * b);
    b = wrap(b * b);
    e >>= 1n;
  }
  return result;
}

/**
 * Apply a binary operator with 64-bit integer semantics. Comparisons and logical operators
 * yield 1 or 0.
 */
function applyBinary(
  op: BinaryOperator,
  l: bigint,
  r: bigint,
  span: SourceSpan,
  diagnostics: Diagnostic[],
): bigint | undefined {
  switch (op) {
    case '+':
      return wrap(l + r);
    case '-':
      return wrap(l - r);
    case '*':
      return wrap(l * r);
    case '/':
      if (r === 0n) return diag(diagnostics, span, 'Divide by zero in variable expression.');
      return wrap(l / r);
    case '%':
      if (r === 0n) return diag(diagnostics, span, 'Modulo by zero in variable expression.');
      return wrap(l % r);
    case '**':
      if (r < 0n) return diag(diagnostics, span, `Negative exponent ${r} in variable expression.`);
      return power(l, r);
    case '&':
      return l & r;
    case '|':
      return l | r;
    case '^':
      return l ^ r;
    case '<<':
    case '>>': {
      if (r < 0n) return diag(diagnostics, span, `Negative shift count ${r} in variable expression.`);
      const count = r > 64n ? 64n : r;
      return wrap(op === '<<' ? l << count : l >> count);
    }
    case '==':
      return flag(l === r);
    case '!=':
      return flag(l !== r);
    case '<':
      return flag(l < r);
    case '<=':
      return flag(l <= r);
    case '>':
      return flag(l > r);
    case '>=':
      return flag(l >= r);
    case '&&':
      return flag(l !== 0n && r !== 0n);
    case '||':
      return flag(l !== 0n || r !== 0n);
  }
}

function applyUnary(op: UnaryOperator, v: bigint): bigint {
  switch (op) {
    case '+':
      return v;
    case '-':
      return wrap(-v);
    case '~':
      return ~v;
    case '!':
      return flag(v === 0n);
  }
}

/**
 * Evaluate an initializer or assignment value against the store.
 */
export function evalEnvExpr(
  expr: ExpressionNode,
  env: Environment,
  diagnostics: Diagnostic[],
): bigint | undefined {
  switch (expr.kind) {
    case 'GroupingExpression':
      return evalEnvExpr(expr.inner, env, diagnostics);
    case 'UnaryExpression': {
      const v = evalEnvExpr(expr.operand, env, diagnostics);
      if (v === undefined) return undefined;
      return applyUnary(expr.operator, v);
    }
    case 'BinaryExpression': {
      const l = evalEnvExpr(expr.left, env, diagnostics);
      if (l === undefined) return undefined;
      const r = evalEnvExpr(expr.right, env, diagnostics);
      if (r === undefined) return undefined;
      return applyBinary(expr.operator, l, r, expr.span, diagnostics);
    }
    case 'PrimaryExpression': {
      const p = expr.primary;
      switch (p.type) {
        case 'integer':
          return p.value;
        case 'char':
          return BigInt(p.value.charCodeAt(0));
        case 'variable': {
          const got = env.getValue(p.name);
          return got.ok ? got.value : diag(diagnostics, expr.span, got.message);
        }
        default:
          return diag(
            diagnostics,
            expr.span,
            `Cannot use ${p.type} '${expr.lexeme}' in a variable expression.`,
          );
      }
    }
  }
}

const COMPOUND: Record<Exclude<AssignmentOperator, '='>, BinaryOperator> = {
  '+=': '+',
  '-=': '-',
  '*=': '*',
  '**=': '**',
  '/=': '/',
  '%=': '%',
  '&=': '&',
  '|=': '|',
  '^=': '^',
  '<<=': '<<',
  '>>=': '>>',
};

/**
 * Walk a parsed module in order and apply every `.let`, `.const` and assignment to a fresh
 * {@link Environment}.
 */
export function buildEnvironment(module: ModuleNode, diagnostics: Diagnostic[]): Environment {
  const env = new Environment();
  for (const node of module.children) {
    if (node.kind === 'VariableDeclaration') {
      const value = evalEnvExpr(node.value, env, diagnostics);
      if (value === undefined) continue;
      const { file, start } = node.span;
      const defined = node.constant
        ? env.defineConstant(node.name, value, file, start.line)
        : env.defineVariable(node.name, value, file, start.line);
      if (!defined.ok) diag(diagnostics, node.span, defined.message);
      continue;
    }
    if (node.kind !== 'VariableAssignment') continue;

    const rhs = evalEnvExpr(node.value, env, diagnostics);
    if (rhs === undefined) continue;
    let value = rhs;
    if (node.operator !== '=') {
      const current = env.getValue(node.name);
      if (!current.ok) {
        diag(diagnostics, node.span, current.message);
        continue;
      }
      const combined = applyBinary(COMPOUND[node.operator], current.value, rhs, node.span, diagnostics);
      if (combined === undefined) continue;
      value = combined;
    }
    const set = env.setValue(node.name, value);
    if (!set.ok) diag(diagnostics, node.span, set.message);
  }
  return env;
}
