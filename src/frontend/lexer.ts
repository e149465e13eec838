import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { KeywordKind } from './keywords.js';
import { lookupKeyword } from './keywords.js';
import { makeSourceFile } from './source.js';
import type { SourceFile } from './source.js';
import type { Token, TokenKind } from './token.js';
import { SYMBOLS } from './token.js';

/**
 * Where a lexed snippet lives in user source. Tokens scanned from the snippet are reported at
 * `file`, starting at `line`/`column`.
 */
export interface LexOrigin {
  file: string;
  line: number;
  column: number;
}

const INT64_UNSIGNED_MAX = (1n << 64n) - 1n;

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

function isAlpha(c: string): boolean {
  return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z');
}

function isIdentStart(c: string): boolean {
  return isAlpha(c) || c === '_' || c === '.';
}

function isIdentPart(c: string): boolean {
  return isAlpha(c) || isDigit(c) || c === '_' || c === '.';
}

function isNameBody(c: string): boolean {
  return isAlpha(c) || isDigit(c) || c === '_';
}

type Decoded = { ok: true; value: string } | { ok: false; message: string };

/**
 * Decode the escape sequences in the body of a character or string literal.
 */
export function decodeEscapes(raw: string): Decoded {
  let out = '';
  for (let i = 0; i < raw.length; i++) {
    const c = raw[i] ?? '';
    if (c !== '\\') {
      out += c;
      continue;
    }
    const n = raw[i + 1];
    if (n === undefined) return { ok: false, message: 'Incomplete escape sequence at end of literal.' };
    i++;
    switch (n) {
      case 'n':
        out += '\n';
        break;
      case 't':
        out += '\t';
        break;
      case 'r':
        out += '\r';
        break;
      case '\\':
      case "'":
      case '"':
        out += n;
        break;
      case '0':
        out += '\0';
        break;
      case 'x': {
        const hex = raw.slice(i + 1, i + 3);
        if (!/^[0-9A-Fa-f]{2}$/.test(hex)) {
          return { ok: false, message: `Invalid hexadecimal escape sequence '\\x${hex}'.` };
        }
        out += String.fromCharCode(Number.parseInt(hex, 16));
        i += 2;
        break;
      }
      default:
        return { ok: false, message: `Unknown escape sequence '\\${n}'.` };
    }
  }
  return { ok: true, value: out };
}

/**
 * Escape a decoded string so that it lexes back to the same value inside double quotes.
 */
export function encodeStringLiteral(value: string): string {
  let out = '"';
  for (const c of value) {
    switch (c) {
      case '\n':
        out += '\\n';
        break;
      case '\t':
        out += '\\t';
        break;
      case '\r':
        out += '\\r';
        break;
      case '\\':
        out += '\\\\';
        break;
      case '"':
        out += '\\"';
        break;
      case '\0':
        out += '\\0';
        break;
      default:
        out += c;
    }
  }
  return `${out}"`;
}

const RADIX_PREFIXES: Record<string, { radix: 2 | 8 | 16; name: string; digit: RegExp }> = {
  b: { radix: 2, name: 'binary', digit: /[01]/ },
  o: { radix: 8, name: 'octal', digit: /[0-7]/ },
  x: { radix: 16, name: 'hexadecimal', digit: /[0-9A-Fa-f]/ },
};

/**
 * Character-by-character scanner. Stops at the first lexical error.
 */
class Scanner {
  private i = 0;
  private line = 1;
  private column = 1;
  readonly tokens: Token[] = [];

  constructor(
    private readonly source: SourceFile,
    private readonly diagnostics: Diagnostic[],
    private readonly origin: LexOrigin,
  ) {}

  private get text(): string {
    return this.source.text;
  }

  private char(at = this.i): string {
    return this.text[at] ?? '';
  }

  private location(line: number, column: number): { file: string; line: number; column: number } {
    return {
      file: this.origin.file,
      line: this.origin.line + line - 1,
      column: line === 1 ? this.origin.column + column - 1 : column,
    };
  }

  private push(kind: TokenKind, start: number, line: number, column: number): Token {
    const token: Token = {
      kind,
      lexeme: this.text.slice(start, this.i),
      source: this.source,
      offset: start,
      ...this.location(line, column),
    };
    this.tokens.push(token);
    return token;
  }

  private advance(count = 1): void {
    for (let k = 0; k < count && this.i < this.text.length; k++) {
      if (this.text[this.i] === '\n') {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.i++;
    }
  }

  private error(message: string, line: number, column: number): false {
    const at = this.location(line, column);
    this.diagnostics.push({
      id: DiagnosticIds.LexError,
      severity: 'error',
      message,
      file: at.file,
      line: at.line,
      column: at.column,
    });
    return false;
  }

  run(): boolean {
    while (this.i < this.text.length) {
      const c = this.char();
      const line = this.line;
      const column = this.column;
      const start = this.i;

      if (c === '\n') {
        this.advance();
        this.push('newLine', start, line, column);
        continue;
      }
      if (c === ' ' || c === '\t' || c === '\r' || c === '\f' || c === '\v') {
        this.advance();
        continue;
      }
      if (c === ';') {
        while (this.i < this.text.length && this.char() !== '\n') this.advance();
        continue;
      }
      if (isIdentStart(c)) {
        while (isIdentPart(this.char())) this.advance();
        const tok = this.push('identifier', start, line, column);
        const keyword = lookupKeyword(tok.lexeme);
        if (keyword) {
          tok.kind = 'keyword';
          tok.keyword = keyword;
        }
        continue;
      }
      if (c === '$' || c === '@') {
        this.advance();
        while (isNameBody(this.char())) this.advance();
        if (this.i - start === 1) {
          return this.error(`Expected a name after '${c}'.`, line, column);
        }
        const tok = this.push(c === '$' ? 'variable' : 'placeholder', start, line, column);
        if (c === '@') {
          const keyword = lookupKeyword(tok.lexeme.slice(1));
          if (keyword) {
            tok.kind = 'placeholderKeyword';
            tok.keyword = keyword;
          }
        }
        continue;
      }
      if (isDigit(c)) {
        if (!this.scanNumber(start, line, column)) return false;
        continue;
      }
      if (c === "'" || c === '"') {
        if (!this.scanQuoted(c, start, line, column)) return false;
        continue;
      }

      const symbol = SYMBOLS.find(([spelling]) => this.text.startsWith(spelling, this.i));
      if (symbol) {
        this.advance(symbol[0].length);
        this.push(symbol[1], start, line, column);
        continue;
      }
      return this.error(`Unrecognized character: '${c}'.`, line, column);
    }

    const at = this.location(this.line, this.column);
    this.tokens.push({
      kind: 'endOfFile',
      lexeme: '',
      source: this.source,
      offset: this.text.length,
      ...at,
    });
    return true;
  }

  private scanNumber(start: number, line: number, column: number): boolean {
    const prefix = this.char(start + 1).toLowerCase();
    const radix = this.char(start) === '0' ? RADIX_PREFIXES[prefix] : undefined;
    let digitsText: string;

    if (radix) {
      this.advance(2);
      const digitsStart = this.i;
      while (radix.digit.test(this.char())) this.advance();
      digitsText = this.text.slice(digitsStart, this.i);
      if (digitsText.length === 0) {
        return this.error(
          `Expected ${radix.name} digits after '0${prefix}' prefix.`,
          line,
          column,
        );
      }
    } else {
      while (isDigit(this.char())) this.advance();
      if (this.char() === '.' && isDigit(this.char(this.i + 1))) {
        this.advance();
        while (isDigit(this.char())) this.advance();
        if (isIdentPart(this.char())) {
          return this.error(
            `Invalid character '${this.char()}' in numeric literal.`,
            this.line,
            this.column,
          );
        }
        const tok = this.push('numberLiteral', start, line, column);
        const value = Number.parseFloat(tok.lexeme);
        if (!Number.isFinite(value)) {
          this.tokens.pop();
          return this.error(`Number literal '${tok.lexeme}' is out of range.`, line, column);
        }
        tok.numberValue = value;
        tok.intValue = BigInt.asIntN(64, BigInt(Math.trunc(value)));
        return true;
      }
      digitsText = this.text.slice(start, this.i);
    }

    if (isIdentPart(this.char())) {
      return this.error(
        `Invalid character '${this.char()}' in numeric literal.`,
        this.line,
        this.column,
      );
    }

    const tok = this.push('integerLiteral', start, line, column);
    const unsigned = BigInt(radix ? `0${prefix}${digitsText}` : digitsText);
    if (unsigned > INT64_UNSIGNED_MAX) {
      this.tokens.pop();
      return this.error(`Integer literal '${tok.lexeme}' is out of range.`, line, column);
    }
    tok.intValue = BigInt.asIntN(64, unsigned);
    tok.numberValue = Number(tok.intValue);
    return true;
  }

  private scanQuoted(quote: string, start: number, line: number, column: number): boolean {
    const what = quote === '"' ? 'string' : 'character';
    this.advance();
    while (this.i < this.text.length && this.char() !== quote && this.char() !== '\n') {
      this.advance(this.char() === '\\' ? 2 : 1);
    }
    if (this.char() !== quote) {
      return this.error(`Unterminated ${what} literal.`, line, column);
    }
    this.advance();

    const raw = this.text.slice(start + 1, this.i - 1);
    const decoded = decodeEscapes(raw);
    if (!decoded.ok) return this.error(decoded.message, line, column);

    if (quote === '"') {
      const tok = this.push('stringLiteral', start, line, column);
      tok.stringValue = decoded.value;
      return true;
    }
    const value = decoded.value.length === 0 ? '\0' : decoded.value;
    if (value.length !== 1) {
      return this.error(`Invalid character literal '${raw}'.`, line, column);
    }
    const tok = this.push('characterLiteral', start, line, column);
    tok.intValue = BigInt(value.charCodeAt(0));
    tok.numberValue = value.charCodeAt(0);
    return true;
  }
}

/**
 * Stateful read/write cursor over a token vector.
 *
 * The vector is shared with the owning {@link Lexer}: `erase` and `inject` edit it in place so
 * substitutions are visible to every later reader.
 */
export class TokenCursor {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly diagnostics: Diagnostic[],
    /** Read by `current()` when the vector is empty. */
    private readonly end: Token,
  ) {}

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.tokens.length;
  }

  reset(position = 0): void {
    this.pos = Math.max(0, Math.min(position, this.tokens.length));
  }

  /**
   * Token at `position + offset`; reports an error outside the vector.
   */
  peek(offset = 0): Token | undefined {
    const index = this.pos + offset;
    const token = this.tokens[index];
    if (token === undefined) {
      const at = this.current();
      this.diagnostics.push({
        id: DiagnosticIds.TokenOutOfRange,
        severity: 'error',
        message: `Token peek offset ${offset} from position ${this.pos} is out of range.`,
        file: at.file,
        line: at.line,
        column: at.column,
      });
    }
    return token;
  }

  /**
   * Token under the cursor, or the final token once the cursor has run off the end.
   */
  current(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1] ?? this.end;
  }

  /** Kind of the token `offset` ahead, without reporting out-of-range reads. */
  kindAt(offset = 0): TokenKind | undefined {
    return this.tokens[this.pos + offset]?.kind;
  }

  consume(): Token {
    const token = this.current();
    if (this.pos < this.tokens.length) this.pos++;
    return token;
  }

  skip(count = 1): void {
    this.pos = Math.max(0, Math.min(this.pos + count, this.tokens.length));
  }

  skipWhile(kind: TokenKind): number {
    let skipped = 0;
    while (this.pos < this.tokens.length && this.tokens[this.pos]?.kind === kind) {
      this.pos++;
      skipped++;
    }
    return skipped;
  }

  /**
   * Consume a token of `kind`, or report `message` at the current token.
   */
  expect(kind: TokenKind, message: string): Token | undefined {
    const token = this.current();
    if (token.kind !== kind) {
      this.report(token, message);
      return undefined;
    }
    return this.consume();
  }

  /**
   * Consume a keyword of `kind`, or report `message` at the current token.
   */
  expectKeyword(kind: KeywordKind, message: string): Token | undefined {
    const token = this.current();
    if (token.kind !== 'keyword' || token.keyword?.kind !== kind) {
      this.report(token, message);
      return undefined;
    }
    return this.consume();
  }

  /**
   * Remove `count` tokens at the cursor. The cursor stays put; later tokens shift into place.
   */
  erase(count = 1): void {
    this.tokens.splice(this.pos, Math.max(0, count));
  }

  /**
   * Insert `tokens` at the cursor, optionally moving past them.
   */
  inject(tokens: readonly Token[], advance = false): void {
    this.tokens.splice(this.pos, 0, ...tokens);
    if (advance) this.pos += tokens.length;
  }

  isAtEnd(): boolean {
    const token = this.tokens[this.pos];
    return token === undefined || token.kind === 'endOfFile';
  }

  private report(token: Token, message: string): void {
    this.diagnostics.push({
      id: DiagnosticIds.ParseError,
      severity: 'error',
      message,
      file: token.file,
      line: token.line,
      column: token.column,
    });
  }
}

/**
 * The result of tokenizing one buffer: the retained source, its token vector (always ending
 * in `endOfFile` when lexing succeeded) and a good/bad flag.
 */
export class Lexer {
  constructor(
    readonly source: SourceFile,
    readonly tokens: Token[],
    private readonly good: boolean,
  ) {}

  get file(): string {
    return this.source.path;
  }

  isGood(): boolean {
    return this.good;
  }

  cursor(diagnostics: Diagnostic[]): TokenCursor {
    const end: Token = {
      kind: 'endOfFile',
      lexeme: '',
      source: this.source,
      offset: 0,
      file: this.file,
      line: 1,
      column: 1,
    };
    return new TokenCursor(this.tokens, diagnostics, end);
  }
}

/**
 * Tokenize `text`. Lexical errors are appended to `diagnostics` and stop the scan.
 */
export function lex(
  file: string,
  text: string,
  diagnostics: Diagnostic[],
  origin?: LexOrigin,
): Lexer {
  const source = makeSourceFile(file, text);
  const scanner = new Scanner(source, diagnostics, origin ?? { file, line: 1, column: 1 });
  const good = scanner.run();
  return new Lexer(source, scanner.tokens, good);
}

/**
 * Tokenize a single-line snippet as if it appeared at `origin`, without the trailing
 * `endOfFile` token. Returns `undefined` if the snippet does not lex.
 */
export function lexSnippet(
  text: string,
  origin: LexOrigin,
  diagnostics: Diagnostic[],
): Token[] | undefined {
  const lexer = lex(origin.file, text, diagnostics, origin);
  if (!lexer.isGood()) return undefined;
  return lexer.tokens.filter((t) => t.kind !== 'endOfFile');
}
