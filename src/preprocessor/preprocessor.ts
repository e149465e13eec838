import { dirname, isAbsolute, resolve } from 'node:path';

import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { Lexer, LexOrigin } from '../frontend/lexer.js';
import { encodeStringLiteral, lex, lexSnippet } from '../frontend/lexer.js';
import type { Token } from '../frontend/token.js';
import { isAdjacent } from '../frontend/token.js';
import type { EvalContext } from './evaluator.js';
import { evaluate } from './evaluator.js';
import type { SourceHost } from './host.js';
import type { BlockMacro, Macro } from './macros.js';
import { MacroTable, validateMacroName } from './macros.js';
import type { PpValue } from './values.js';
import { formatFloat, isTruthy, valueToString } from './values.js';

export interface PreprocessorOptions {
  /** Limit for nested macro expansion and `.while` iterations. Default 256. */
  maxRecursionDepth?: number;
  /** Limit for nested `.include`. Default 16. */
  maxIncludeDepth?: number;
  /** Searched, in order, after the including file's directory and the working directory. */
  includeDirs?: string[];
}

export const DEFAULT_MAX_RECURSION_DEPTH = 256;
export const DEFAULT_MAX_INCLUDE_DEPTH = 16;

/** Highest limits accepted from options or `.pragma`; expansion and includes recurse on the call stack. */
export const RECURSION_DEPTH_CEILING = 1024;
export const INCLUDE_DEPTH_CEILING = 64;

function clampLimit(value: number | undefined, fallback: number, ceiling: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(Math.max(Math.trunc(value), 1), ceiling);
}

/**
 * Where an output line came from.
 */
export interface SourceLocation {
  file: string;
  line: number;
}

export interface PreprocessorOutput {
  text: string;
  /** `lineMap[i]` is the source of output line `i + 1`. */
  lineMap: SourceLocation[];
}

type Line = Token[];

type Flow = 'next' | 'break' | 'continue' | 'abort';

/** Arguments of the block-macro expansion currently being processed. */
interface Frame {
  macro: BlockMacro;
  args: Token[][];
}

interface Scope {
  /** File whose lines are being processed. */
  file: string;
  /** Macro-expansion nesting depth. */
  depth: number;
  includeDepth: number;
  frame?: Frame;
  /** Number of enclosing loops in the current file or macro body. */
  loopDepth: number;
}

interface BlockFamily {
  openers: readonly string[];
  middles: readonly string[];
  closer: string;
}

const CONDITIONAL: BlockFamily = {
  openers: ['.if', '.ifdef', '.ifndef'],
  middles: ['.elseif', '.else'],
  closer: '.endif',
};

const BLOCK_FAMILIES: Record<string, BlockFamily> = {
  '.if': CONDITIONAL,
  '.ifdef': CONDITIONAL,
  '.ifndef': CONDITIONAL,
  '.repeat': { openers: ['.repeat'], middles: [], closer: '.endrepeat' },
  '.for': { openers: ['.for'], middles: [], closer: '.endfor' },
  '.while': { openers: ['.while'], middles: [], closer: '.endwhile' },
  '.macro': { openers: ['.macro'], middles: [], closer: '.endm' },
};

const STRAY: Record<string, string> = {
  '.elseif': '.if',
  '.else': '.if',
  '.endif': '.if',
  '.endrepeat': '.repeat',
  '.endfor': '.for',
  '.endwhile': '.while',
  '.endm': '.macro',
};

interface BlockSegment {
  head: Line;
  body: Line[];
}

interface Block {
  segments: BlockSegment[];
  /** Index of the closing line. */
  end: number;
}

function directiveName(line: Line): string | undefined {
  const first = line[0];
  if (first?.kind !== 'keyword' || first.keyword?.kind !== 'preprocessorDirective') return undefined;
  return first.keyword.canonical;
}

function originOf(token: Token): LexOrigin {
  return { file: token.file, line: token.line, column: token.column };
}

/**
 * Break a token vector into logical lines: newline tokens are removed, a trailing `\` joins the
 * next line, blank lines and the end-of-file token are dropped.
 */
export function splitLines(tokens: readonly Token[]): Line[] {
  const lines: Line[] = [];
  let current: Line = [];
  for (const token of tokens) {
    if (token.kind === 'endOfFile') break;
    if (token.kind !== 'newLine') {
      current.push(token);
      continue;
    }
    if (current[current.length - 1]?.kind === 'backslash') {
      current.pop();
      continue;
    }
    if (current.length > 0) lines.push(current);
    current = [];
  }
  if (current[current.length - 1]?.kind === 'backslash') current.pop();
  if (current.length > 0) lines.push(current);
  return lines;
}

/**
 * Split macro or directive arguments on commas outside any bracket pair.
 */
export function splitArguments(tokens: readonly Token[]): Token[][] {
  if (tokens.length === 0) return [];
  const args: Token[][] = [[]];
  let nesting = 0;
  for (const token of tokens) {
    if (
      token.kind === 'leftParenthesis' ||
      token.kind === 'leftBracket' ||
      token.kind === 'leftBrace'
    ) {
      nesting++;
    } else if (
      token.kind === 'rightParenthesis' ||
      token.kind === 'rightBracket' ||
      token.kind === 'rightBrace'
    ) {
      nesting = Math.max(0, nesting - 1);
    } else if (token.kind === 'comma' && nesting === 0) {
      args.push([]);
      continue;
    }
    args[args.length - 1]?.push(token);
  }
  return args;
}

/**
 * Point tokens lexed from preprocessor output back at the source lines they came from.
 */
export function relocateTokens(tokens: readonly Token[], lineMap: readonly SourceLocation[]): Token[] {
  return tokens.map((token) => {
    const loc = lineMap[token.line - 1];
    return loc ? { ...token, file: loc.file, line: loc.line } : token;
  });
}

/**
 * Text-level preprocessor: runs over one lexer's tokens and produces flat assembly text.
 */
export class Preprocessor {
  private readonly macros = new MacroTable();
  private readonly output: string[] = [];
  private readonly lineMap: SourceLocation[] = [];
  private readonly onceFiles = new Set<string>();
  private readonly lexers = new Map<string, Lexer>();
  private readonly includeDirs: string[];
  private maxRecursionDepth: number;
  private maxIncludeDepth: number;
  private aborted = false;
  private mark = 0;

  constructor(
    options: PreprocessorOptions,
    private readonly host: SourceHost,
    private readonly diagnostics: Diagnostic[],
  ) {
    this.maxRecursionDepth = clampLimit(
      options.maxRecursionDepth,
      DEFAULT_MAX_RECURSION_DEPTH,
      RECURSION_DEPTH_CEILING,
    );
    this.maxIncludeDepth = clampLimit(options.maxIncludeDepth, DEFAULT_MAX_INCLUDE_DEPTH, INCLUDE_DEPTH_CEILING);
    this.includeDirs = options.includeDirs ?? [];
  }

  run(lexer: Lexer): boolean {
    this.mark = this.diagnostics.length;
    const file = lexer.file;
    const origin = { file, line: 1 };
    this.lexers.set(file, lexer);
    this.emitText(`.pragma push_file ${encodeStringLiteral(file)}`, origin);
    this.processLines(splitLines(lexer.tokens), { file, depth: 0, includeDepth: 0, loopDepth: 0 });
    this.emitText('.pragma pop_file', origin);
    return this.isGood();
  }

  getOutput(): PreprocessorOutput {
    const text = this.output.length > 0 ? `${this.output.join('\n')}\n` : '';
    return { text, lineMap: [...this.lineMap] };
  }

  isGood(): boolean {
    return (
      !this.aborted &&
      !this.diagnostics.slice(this.mark).some((d) => d.severity === 'error')
    );
  }

  /** Read-only view of the macros defined so far. */
  get macroTable(): MacroTable {
    return this.macros;
  }

  private error(at: Token, message: string, id: DiagnosticId = DiagnosticIds.DirectiveError): void {
    this.diagnostics.push({
      id,
      severity: 'error',
      message,
      file: at.file,
      line: at.line,
      column: at.column,
    });
  }

  private fatal(at: Token, message: string, id: DiagnosticId): Flow {
    this.error(at, message, id);
    this.aborted = true;
    return 'abort';
  }

  private context(scope: Scope): EvalContext {
    return { macros: this.macros, maxDepth: this.maxRecursionDepth, depth: scope.depth };
  }

  /** Evaluate, turning a recursion-depth failure into an abort. */
  private eval(tokens: readonly Token[], scope: Scope): PpValue | undefined {
    const before = this.diagnostics.length;
    const value = evaluate(tokens, this.context(scope), this.diagnostics);
    const failures = this.diagnostics.slice(before);
    if (failures.some((d) => d.id === DiagnosticIds.RecursionDepthExceeded)) this.aborted = true;
    return value;
  }

  private evalInteger(tokens: readonly Token[], scope: Scope, at: Token, what: string): bigint | undefined {
    if (tokens.length === 0) {
      this.error(at, `Expected ${what}.`);
      return undefined;
    }
    const value = this.eval(tokens, scope);
    if (!value) return undefined;
    if (value.type !== 'integer') {
      this.error(tokens[0] ?? at, `Expected ${what} to be an integer, got ${value.type}.`);
      return undefined;
    }
    return value.value;
  }

  private emitText(text: string, loc: SourceLocation): void {
    this.output.push(text);
    this.lineMap.push(loc);
  }

  private emit(line: Line): void {
    const [first] = line;
    if (!first) return;
    let text = '';
    let prev: Token | undefined;
    for (const token of line) {
      if (prev && !isAdjacent(prev, token) && token.kind !== 'comma') text += ' ';
      text += token.lexeme;
      prev = token;
    }
    this.emitText(text, { file: first.file, line: first.line });
  }

  private processLines(lines: readonly Line[], scope: Scope): Flow {
    let i = 0;
    while (i < lines.length) {
      const line = lines[i] ?? [];
      const head = line[0];
      const name = directiveName(line);
      let flow: Flow = 'next';

      if (head && name !== undefined && BLOCK_FAMILIES[name]) {
        const block = this.collectBlock(lines, i, name);
        if (!block) return this.aborted ? 'abort' : 'next';
        i = block.end + 1;
        flow = this.processBlock(name, block, scope);
      } else if (head && name !== undefined) {
        i++;
        const opener = STRAY[name];
        if (opener !== undefined) {
          this.error(head, `Unexpected '${head.lexeme}' without a matching '${opener}'.`);
        } else if (name === '.break' || name === '.continue') {
          if (scope.loopDepth === 0) {
            this.error(head, `'${head.lexeme}' used outside of a loop.`);
          } else {
            return name === '.break' ? 'break' : 'continue';
          }
        } else {
          flow = this.processDirective(name, line, scope);
        }
      } else {
        i++;
        const macro = head?.kind === 'identifier' ? this.macros.get(head.lexeme) : undefined;
        flow = macro?.kind === 'block' ? this.invoke(macro, line, scope) : this.processText(line, scope);
      }

      if (this.aborted) return 'abort';
      if (flow !== 'next') return flow;
    }
    return 'next';
  }

  private collectBlock(lines: readonly Line[], start: number, opener: string): Block | undefined {
    const family = BLOCK_FAMILIES[opener];
    const head = lines[start];
    const headToken = head?.[0];
    if (!family || !head || !headToken) return undefined;

    const segments: BlockSegment[] = [{ head, body: [] }];
    let nesting = 0;
    for (let j = start + 1; j < lines.length; j++) {
      const line = lines[j] ?? [];
      const name = directiveName(line);
      const segment = segments[segments.length - 1];
      if (name !== undefined && family.openers.includes(name)) {
        nesting++;
      } else if (name === family.closer) {
        if (nesting === 0) return { segments, end: j };
        nesting--;
      } else if (name !== undefined && nesting === 0 && family.middles.includes(name)) {
        segments.push({ head: line, body: [] });
        continue;
      }
      segment?.body.push(line);
    }
    this.error(
      headToken,
      `Unterminated '${headToken.lexeme}' block (missing '${family.closer}').`,
    );
    return undefined;
  }

  private processBlock(name: string, block: Block, scope: Scope): Flow {
    switch (name) {
      case '.if':
      case '.ifdef':
      case '.ifndef':
        return this.processConditional(block, scope);
      case '.repeat':
        return this.processRepeat(block, scope);
      case '.for':
        return this.processFor(block, scope);
      case '.while':
        return this.processWhile(block, scope);
      case '.macro':
        this.defineBlockMacro(block, scope);
        return 'next';
      default:
        return 'next';
    }
  }

  /** Placeholder substitution for directive arguments inside a macro expansion. */
  private argumentsOf(line: Line, scope: Scope): Token[] | undefined {
    const args = line.slice(1);
    return scope.frame ? this.substitute(args, scope.frame) : args;
  }

  private processConditional(block: Block, scope: Scope): Flow {
    const elseAt = block.segments.findIndex((s) => directiveName(s.head) === '.else');
    const misplaced = elseAt >= 0 ? block.segments[elseAt + 1]?.head[0] : undefined;
    if (misplaced) {
      this.error(misplaced, `'${misplaced.lexeme}' cannot follow '.else'.`);
      return 'next';
    }
    for (const segment of block.segments) {
      const name = directiveName(segment.head);
      if (name === undefined) continue;
      const taken = this.branchTaken(name, segment.head, scope);
      if (taken === undefined) return 'next';
      if (taken) return this.processLines(segment.body, scope);
    }
    return 'next';
  }

  private branchTaken(name: string, head: Line, scope: Scope): boolean | undefined {
    const at = head[0];
    const args = this.argumentsOf(head, scope);
    if (!at || !args) return undefined;
    if (name === '.else') {
      if (args.length > 0) this.error(at, "'.else' takes no arguments.");
      return true;
    }
    if (name === '.ifdef' || name === '.ifndef') {
      const [target, extra] = args;
      if (!target || target.kind !== 'identifier' || extra) {
        this.error(at, `'${at.lexeme}' expects a single macro name.`);
        return undefined;
      }
      const defined = this.macros.isDefined(target.lexeme);
      return name === '.ifdef' ? defined : !defined;
    }
    if (args.length === 0) {
      this.error(at, `'${at.lexeme}' expects a condition.`);
      return undefined;
    }
    const value = this.eval(args, scope);
    return value ? isTruthy(value) : undefined;
  }

  private loopVariable(tokens: readonly Token[] | undefined, at: Token): string | null | undefined {
    if (!tokens || tokens.length === 0) return null;
    const [name, extra] = tokens;
    if (!name || name.kind !== 'identifier' || extra) {
      this.error(at, `'${at.lexeme}' expects a loop variable name.`);
      return undefined;
    }
    const invalid = validateMacroName(name.lexeme);
    if (invalid) {
      this.error(name, invalid, DiagnosticIds.MacroError);
      return undefined;
    }
    return name.lexeme;
  }

  /**
   * Run `body` once per value, with `variable` bound to it. The previous binding of the name is
   * restored afterwards.
   */
  private runLoop(
    at: Token,
    variable: string | null,
    body: readonly Line[],
    scope: Scope,
    next: (iteration: number) => bigint | 'done' | undefined,
  ): Flow {
    const saved: Macro | undefined = variable ? this.macros.get(variable) : undefined;
    const inner: Scope = { ...scope, loopDepth: scope.loopDepth + 1 };
    let flow: Flow = 'next';
    for (let iteration = 0; ; iteration++) {
      const value = next(iteration);
      if (value === undefined) {
        flow = this.aborted ? 'abort' : 'next';
        break;
      }
      if (value === 'done') break;
      if (variable && !this.bind(variable, value, at)) break;
      const result = this.processLines(body, inner);
      if (result === 'abort') {
        flow = 'abort';
        break;
      }
      if (result === 'break') break;
    }
    if (variable) {
      if (saved) this.macros.redefine(saved, this.diagnostics);
      else this.macros.remove(variable);
    }
    return flow;
  }

  private bind(variable: string, value: bigint, at: Token): boolean {
    const tokens = lexSnippet(value.toString(), originOf(at), this.diagnostics);
    if (!tokens) return false;
    return this.macros.redefine(
      { kind: 'text', name: variable, tokens, file: at.file, line: at.line },
      this.diagnostics,
      at,
    );
  }

  private processRepeat(block: Block, scope: Scope): Flow {
    const head = block.segments[0]?.head ?? [];
    const at = head[0];
    const args = this.argumentsOf(head, scope);
    if (!at || !args) return 'next';
    const [countTokens, varTokens, extra] = splitArguments(args);
    if (extra) {
      this.error(at, `'${at.lexeme}' expects a count and an optional variable name.`);
      return 'next';
    }
    const count = this.evalInteger(countTokens ?? [], scope, at, 'a repeat count');
    if (count === undefined) return this.aborted ? 'abort' : 'next';
    if (count < 0n) {
      this.error(at, `Repeat count ${count} must not be negative.`);
      return 'next';
    }
    const variable = this.loopVariable(varTokens, at);
    if (variable === undefined) return 'next';
    const body = block.segments[0]?.body ?? [];
    return this.runLoop(at, variable, body, scope, (iteration) =>
      BigInt(iteration) < count ? BigInt(iteration) : 'done',
    );
  }

  private processFor(block: Block, scope: Scope): Flow {
    const head = block.segments[0]?.head ?? [];
    const at = head[0];
    const args = this.argumentsOf(head, scope);
    if (!at || !args) return 'next';
    const parts = splitArguments(args);
    if (parts.length < 3 || parts.length > 4) {
      this.error(at, "'.for' expects a variable, a start, an end and an optional step.");
      return 'next';
    }
    const [varTokens, startTokens, endTokens, stepTokens] = parts;
    const variable = this.loopVariable(varTokens, at);
    if (variable === undefined) return 'next';
    if (variable === null) {
      this.error(at, "'.for' expects a loop variable name.");
      return 'next';
    }
    const start = this.evalInteger(startTokens ?? [], scope, at, 'a start value');
    const end = this.evalInteger(endTokens ?? [], scope, at, 'an end value');
    const step = stepTokens ? this.evalInteger(stepTokens, scope, at, 'a step value') : 1n;
    if (start === undefined || end === undefined || step === undefined) {
      return this.aborted ? 'abort' : 'next';
    }
    if (step === 0n) {
      this.error(at, "'.for' step must not be zero.");
      return 'next';
    }
    const body = block.segments[0]?.body ?? [];
    return this.runLoop(at, variable, body, scope, (iteration) => {
      const value = start + BigInt(iteration) * step;
      const inRange = step > 0n ? value < end : value > end;
      return inRange ? value : 'done';
    });
  }

  private processWhile(block: Block, scope: Scope): Flow {
    const head = block.segments[0]?.head ?? [];
    const at = head[0];
    const args = this.argumentsOf(head, scope);
    if (!at || !args) return 'next';
    const parts = splitArguments(args);
    const [condition, varTokens, extra] = parts;
    if (!condition || condition.length === 0 || extra) {
      this.error(at, "'.while' expects a condition and an optional variable name.");
      return 'next';
    }
    const variable = this.loopVariable(varTokens, at);
    if (variable === undefined) return 'next';
    const body = block.segments[0]?.body ?? [];
    return this.runLoop(at, variable, body, scope, (iteration) => {
      if (scope.depth + iteration + 1 > this.maxRecursionDepth) {
        this.fatal(
          at,
          `Maximum recursion depth (${this.maxRecursionDepth}) exceeded in '.while' loop.`,
          DiagnosticIds.RecursionDepthExceeded,
        );
        return undefined;
      }
      if (variable && !this.bind(variable, BigInt(iteration), at)) return undefined;
      const value = this.eval(condition, { ...scope, depth: scope.depth + iteration });
      if (!value) return undefined;
      return isTruthy(value) ? BigInt(iteration) : 'done';
    });
  }

  private defineBlockMacro(block: Block, scope: Scope): void {
    const segment = block.segments[0];
    const at = segment?.head[0];
    if (!segment || !at) return;
    const [nameToken, ...rest] = segment.head.slice(1);
    if (!nameToken) {
      this.error(at, "Expected a macro name after '.macro'.");
      return;
    }
    const params: string[] = [];
    let expectParam = true;
    for (const token of rest) {
      if (token.kind === 'comma' && !expectParam) {
        expectParam = true;
        continue;
      }
      const body = token.lexeme.slice(1);
      if (
        (token.kind === 'placeholder' || token.kind === 'placeholderKeyword') &&
        /^[A-Za-z_]/.test(body)
      ) {
        if (params.includes(body)) {
          this.error(token, `Duplicate macro parameter '${token.lexeme}'.`, DiagnosticIds.MacroError);
          return;
        }
        params.push(body);
        expectParam = false;
        continue;
      }
      this.error(token, `Invalid macro parameter '${token.lexeme}'.`, DiagnosticIds.MacroError);
      return;
    }
    this.macros.define(
      {
        kind: 'block',
        name: nameToken.lexeme,
        params,
        body: segment.body,
        file: scope.file,
        line: at.line,
      },
      this.diagnostics,
      nameToken,
    );
  }

  private invoke(macro: BlockMacro, line: Line, scope: Scope): Flow {
    const head = line[0];
    if (!head) return 'next';
    const argTokens = scope.frame ? this.substitute(line.slice(1), scope.frame) : line.slice(1);
    if (!argTokens) return 'next';
    const args = splitArguments(argTokens);
    if (args.length < macro.params.length) {
      this.error(
        head,
        `Macro '${macro.name}' expects at least ${macro.params.length} argument(s), got ${args.length}.`,
        DiagnosticIds.MacroArgumentError,
      );
      return 'next';
    }
    if (scope.depth + 1 > this.maxRecursionDepth) {
      return this.fatal(
        head,
        `Maximum recursion depth (${this.maxRecursionDepth}) exceeded while expanding '${macro.name}'.`,
        DiagnosticIds.RecursionDepthExceeded,
      );
    }
    const flow = this.processLines(macro.body, {
      file: scope.file,
      depth: scope.depth + 1,
      includeDepth: scope.includeDepth,
      frame: { macro, args },
      loopDepth: 0,
    });
    return flow === 'abort' ? 'abort' : 'next';
  }

  /**
   * Replace `@n`, `@narg` and named placeholders with the frame's arguments. An unbound
   * placeholder spelled like a keyword stands for that keyword.
   */
  private substitute(tokens: readonly Token[], frame: Frame): Token[] | undefined {
    const out: Token[] = [];
    const { macro, args } = frame;
    for (const token of tokens) {
      if (token.kind !== 'placeholder' && token.kind !== 'placeholderKeyword') {
        out.push(token);
        continue;
      }
      const name = token.lexeme.slice(1);
      const named = macro.params.indexOf(name);
      if (named >= 0) {
        out.push(...(args[named] ?? []));
        continue;
      }
      if (token.kind === 'placeholderKeyword') {
        out.push({
          ...token,
          kind: 'keyword',
          lexeme: name,
          offset: token.offset + 1,
          column: token.column + 1,
        });
        continue;
      }
      if (name === 'narg') {
        const count = lexSnippet(String(args.length), originOf(token), this.diagnostics);
        if (!count) return undefined;
        out.push(...count);
        continue;
      }
      if (/^\d+$/.test(name)) {
        const arg = args[Number(name) - 1];
        if (Number(name) < 1 || !arg) {
          this.error(
            token,
            `Placeholder '${token.lexeme}' has no matching argument in macro '${macro.name}' (${args.length} given).`,
            DiagnosticIds.MacroArgumentError,
          );
          return undefined;
        }
        out.push(...arg);
        continue;
      }
      this.error(
        token,
        `Unknown placeholder '${token.lexeme}' in macro '${macro.name}'.`,
        DiagnosticIds.MacroArgumentError,
      );
      return undefined;
    }
    return out;
  }

  private processText(line: Line, scope: Scope): Flow {
    const substituted = scope.frame ? this.substitute(line, scope.frame) : line;
    if (!substituted) return 'next';
    const braced = this.evaluateBraces(substituted, scope);
    if (!braced) return 'next';
    const expanded = this.expand(braced, scope.depth);
    if (!expanded) return this.aborted ? 'abort' : 'next';
    const pasted = this.paste(expanded);
    if (pasted) this.emit(pasted);
    return 'next';
  }

  private render(value: PpValue, glued: boolean): string {
    switch (value.type) {
      case 'void':
        return '';
      case 'boolean':
        return value.value ? '1' : '0';
      case 'integer':
        return value.value.toString();
      case 'number':
        return formatFloat(value.value.toFloat());
      case 'string':
        return glued ? value.value : encodeStringLiteral(value.value);
    }
  }

  private interpolate(token: Token, scope: Scope): string | undefined {
    const raw = token.stringValue ?? '';
    let out = '';
    let last = 0;
    for (const match of raw.matchAll(/\{([^{}]+)\}/g)) {
      const expr = match[1] ?? '';
      const index = match.index ?? 0;
      const tokens = lexSnippet(expr, originOf(token), this.diagnostics);
      if (!tokens) return undefined;
      const value = this.eval(tokens, scope);
      if (!value) return undefined;
      out += raw.slice(last, index) + (value.type === 'void' ? '' : valueToString(value));
      last = index + match[0].length;
    }
    return encodeStringLiteral(out + raw.slice(last));
  }

  /**
   * Replace every `{expr}` with its value and re-lex the line. A string value is quoted unless
   * it is glued to a neighbouring token, where it becomes part of that token.
   */
  private evaluateBraces(line: Line, scope: Scope): Line | undefined {
    const needsWork = line.some(
      (t) =>
        t.kind === 'leftBrace' ||
        (t.kind === 'stringLiteral' && /\{[^{}]+\}/.test(t.stringValue ?? '')),
    );
    const first = line[0];
    if (!needsWork || !first) return line;

    let text = '';
    let prev: Token | undefined;
    for (let i = 0; i < line.length; i++) {
      const token = line[i];
      if (!token) continue;
      const separator = prev && !isAdjacent(prev, token) ? ' ' : '';

      if (token.kind === 'stringLiteral') {
        const literal = this.interpolate(token, scope);
        if (literal === undefined) return undefined;
        text += separator + literal;
        prev = token;
        continue;
      }
      if (token.kind !== 'leftBrace') {
        text += separator + token.lexeme;
        prev = token;
        continue;
      }

      let nesting = 0;
      let close = -1;
      for (let j = i + 1; j < line.length; j++) {
        const kind = line[j]?.kind;
        if (kind === 'leftBrace') nesting++;
        if (kind === 'rightBrace') {
          if (nesting === 0) {
            close = j;
            break;
          }
          nesting--;
        }
      }
      const closing = line[close];
      if (!closing) {
        this.error(token, "Unmatched '{' in line.", DiagnosticIds.ExprError);
        return undefined;
      }
      const value = this.eval(line.slice(i + 1, close), scope);
      if (!value) return undefined;
      const after = line[close + 1];
      const glued =
        (prev !== undefined && isAdjacent(prev, token)) ||
        (after !== undefined && isAdjacent(closing, after));
      text += separator + this.render(value, glued);
      prev = closing;
      i = close;
    }
    return lexSnippet(text, originOf(first), this.diagnostics);
  }

  /**
   * Recursively replace text macros. Each nested replacement counts one level toward the
   * recursion limit.
   */
  private expand(tokens: readonly Token[], depth: number): Token[] | undefined {
    const out: Token[] = [];
    for (const token of tokens) {
      const macro = token.kind === 'identifier' ? this.macros.get(token.lexeme) : undefined;
      if (macro?.kind !== 'text') {
        out.push(token);
        continue;
      }
      if (depth + 1 > this.maxRecursionDepth) {
        this.fatal(
          token,
          `Maximum recursion depth (${this.maxRecursionDepth}) exceeded while expanding '${macro.name}'.`,
          DiagnosticIds.RecursionDepthExceeded,
        );
        return undefined;
      }
      const replacement = this.expand(macro.tokens, depth + 1);
      if (!replacement) return undefined;
      out.push(...replacement);
    }
    return out;
  }

  /**
   * Join the tokens either side of each `##` into one token.
   */
  private paste(tokens: readonly Token[]): Token[] | undefined {
    const out: Token[] = [];
    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      if (!token) continue;
      if (token.kind !== 'doubleHash') {
        out.push(token);
        continue;
      }
      const left = out.pop();
      const right = tokens[i + 1];
      if (!left || !right) {
        this.error(token, "'##' cannot appear at the start or end of a line.");
        return undefined;
      }
      const joined = left.lexeme + right.lexeme;
      const pasted = lexSnippet(joined, originOf(left), []);
      const [single] = pasted ?? [];
      if (!pasted || pasted.length !== 1 || !single) {
        this.error(token, `Pasting '${left.lexeme}' and '${right.lexeme}' does not form a valid token.`);
        return undefined;
      }
      out.push(single);
      i++;
    }
    return out;
  }

  private processDirective(name: string, line: Line, scope: Scope): Flow {
    const at = line[0];
    const args = this.argumentsOf(line, scope);
    if (!at || !args) return 'next';
    switch (name) {
      case '.define':
        this.define(at, args, scope);
        return 'next';
      case '.undef':
        this.undefine(at, args);
        return 'next';
      case '.shift':
        this.shift(at, args, scope);
        return 'next';
      case '.include':
        return this.include(at, args, scope);
      case '.pragma':
        this.pragma(at, args, scope);
        return 'next';
      case '.info':
      case '.warning':
      case '.error':
      case '.fatal':
        return this.report(name, at, args, scope);
      case '.assert':
        this.assert(at, args, scope);
        return 'next';
      default:
        this.error(at, `Unexpected directive '${at.lexeme}'.`);
        return 'next';
    }
  }

  private define(at: Token, args: Token[], scope: Scope): void {
    const [nameToken, ...body] = args;
    if (!nameToken) {
      this.error(at, "Expected a macro name after '.define'.");
      return;
    }
    const tokens = body.length > 0 ? this.evaluateBraces(body, scope) : [];
    if (!tokens) return;
    const macro: Macro = {
      kind: 'text',
      name: nameToken.lexeme,
      tokens,
      file: at.file,
      line: at.line,
    };
    const existing = this.macros.get(macro.name);
    if (existing?.kind === 'block') {
      this.error(
        nameToken,
        `Cannot redefine block macro '${macro.name}' as a text macro.`,
        DiagnosticIds.MacroError,
      );
      return;
    }
    if (existing) this.macros.redefine(macro, this.diagnostics, nameToken);
    else this.macros.define(macro, this.diagnostics, nameToken);
  }

  private undefine(at: Token, args: Token[]): void {
    const names = splitArguments(args);
    if (names.length === 0) {
      this.error(at, `Expected a macro name after '${at.lexeme}'.`);
      return;
    }
    for (const group of names) {
      const [target, extra] = group;
      if (!target || extra) {
        this.error(target ?? at, `'${at.lexeme}' expects a comma-separated list of macro names.`);
        return;
      }
      this.macros.undefine(target.lexeme, this.diagnostics, target);
    }
  }

  private shift(at: Token, args: Token[], scope: Scope): void {
    const frame = scope.frame;
    if (!frame) {
      this.error(at, "'.shift' used outside of a macro expansion.");
      return;
    }
    const count = args.length > 0 ? this.evalInteger(args, scope, at, 'a shift count') : 1n;
    if (count === undefined) return;
    if (count < 0n || count > BigInt(frame.args.length)) {
      this.error(
        at,
        `Cannot shift ${count} argument(s); ${frame.args.length} remain.`,
        DiagnosticIds.MacroArgumentError,
      );
      return;
    }
    frame.args = frame.args.slice(Number(count));
  }

  private searchPaths(target: string, scope: Scope): string[] {
    if (isAbsolute(target)) return [target];
    const candidates = [
      resolve(dirname(scope.file), target),
      resolve(this.host.cwd(), target),
      ...this.includeDirs.map((dir) => resolve(dir, target)),
    ];
    return [...new Set(candidates)];
  }

  private include(at: Token, args: Token[], scope: Scope): Flow {
    const [pathToken, extra] = args;
    if (!pathToken || pathToken.kind !== 'stringLiteral' || extra) {
      this.error(at, "'.include' expects a single string literal path.");
      return 'next';
    }
    const target = pathToken.stringValue ?? '';
    if (scope.includeDepth + 1 > this.maxIncludeDepth) {
      return this.fatal(
        pathToken,
        `Maximum include depth (${this.maxIncludeDepth}) exceeded including '${target}'.`,
        DiagnosticIds.IncludeDepthExceeded,
      );
    }

    const candidates = this.searchPaths(target, scope);
    const path = candidates.find((c) => this.host.fileExists(c));
    if (path === undefined) {
      this.error(
        pathToken,
        `Included file '${target}' not found (searched: ${candidates.join(', ')}).`,
        DiagnosticIds.IncludeNotFound,
      );
      return 'next';
    }
    if (this.onceFiles.has(path)) return 'next';

    let lexer = this.lexers.get(path);
    if (!lexer) {
      const read = this.host.readFile(path);
      if (!read.ok) {
        this.error(
          pathToken,
          `Failed to read included file '${path}': ${read.error}`,
          DiagnosticIds.IoReadFailed,
        );
        return 'next';
      }
      lexer = lex(path, read.text, this.diagnostics);
      this.lexers.set(path, lexer);
    }
    if (!lexer.isGood()) {
      this.error(pathToken, `Failed to tokenize included file '${path}'.`, DiagnosticIds.LexError);
      return 'next';
    }

    const origin = { file: at.file, line: at.line };
    this.emitText(`.pragma push_file ${encodeStringLiteral(path)}`, origin);
    const flow = this.processLines(splitLines(lexer.tokens), {
      file: path,
      depth: scope.depth,
      includeDepth: scope.includeDepth + 1,
      loopDepth: 0,
    });
    this.emitText('.pragma pop_file', origin);
    return flow === 'abort' ? 'abort' : 'next';
  }

  private pragma(at: Token, args: Token[], scope: Scope): void {
    const [kind, ...rest] = args;
    if (!kind || kind.kind !== 'keyword' || kind.keyword?.kind !== 'pragma') {
      this.error(kind ?? at, `Unknown pragma '${kind?.lexeme ?? ''}'.`);
      return;
    }
    switch (kind.keyword.canonical) {
      case 'once':
        if (rest.length > 0) this.error(at, "'.pragma once' takes no arguments.");
        else this.onceFiles.add(scope.file);
        return;
      case 'max_recursion_depth':
      case 'max_include_depth': {
        const limit = this.evalInteger(rest, scope, kind, `a value for '${kind.lexeme}'`);
        if (limit === undefined) return;
        if (limit < 1n) {
          this.error(kind, `'${kind.lexeme}' must be at least 1, got ${limit}.`);
          return;
        }
        const recursion = kind.keyword.canonical === 'max_recursion_depth';
        const ceiling = recursion ? RECURSION_DEPTH_CEILING : INCLUDE_DEPTH_CEILING;
        if (limit > BigInt(ceiling)) {
          this.error(kind, `'${kind.lexeme}' must be at most ${ceiling}, got ${limit}.`);
          return;
        }
        if (recursion) this.maxRecursionDepth = Number(limit);
        else this.maxIncludeDepth = Number(limit);
        return;
      }
      default:
        this.error(kind, `'.pragma ${kind.lexeme}' is reserved for preprocessor output.`);
    }
  }

  private report(name: string, at: Token, args: Token[], scope: Scope): Flow {
    const value = this.eval(args, scope);
    if (!value) return this.aborted ? 'abort' : 'next';
    const message = value.type === 'void' ? '' : valueToString(value);
    const loc = { file: at.file, line: at.line, column: at.column };
    switch (name) {
      case '.info':
        this.diagnostics.push({ id: DiagnosticIds.UserInfo, severity: 'info', message, ...loc });
        return 'next';
      case '.warning':
        this.diagnostics.push({ id: DiagnosticIds.UserWarning, severity: 'warning', message, ...loc });
        return 'next';
      case '.error':
        this.diagnostics.push({ id: DiagnosticIds.UserError, severity: 'error', message, ...loc });
        return 'next';
      default:
        return this.fatal(at, message, DiagnosticIds.UserFatal);
    }
  }

  private assert(at: Token, args: Token[], scope: Scope): void {
    const [condition, messageTokens, extra] = splitArguments(args);
    if (!condition || condition.length === 0 || extra) {
      this.error(at, "'.assert' expects a condition and an optional message.");
      return;
    }
    const value = this.eval(condition, scope);
    if (!value || isTruthy(value)) return;
    let message = 'Assertion failed.';
    if (messageTokens && messageTokens.length > 0) {
      const detail = this.eval(messageTokens, scope);
      if (!detail) return;
      message = `Assertion failed: ${valueToString(detail)}`;
    }
    this.error(at, message, DiagnosticIds.AssertFailed);
  }
}

/**
 * Preprocess one lexed buffer. `undefined` when any error was reported.
 */
export function preprocess(
  lexer: Lexer,
  host: SourceHost,
  diagnostics: Diagnostic[],
  options: PreprocessorOptions = {},
): PreprocessorOutput | undefined {
  const pp = new Preprocessor(options, host, diagnostics);
  return pp.run(lexer) ? pp.getOutput() : undefined;
}
