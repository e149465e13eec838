import type { KeywordEntry } from './keywords.js';
import type { SourceFile } from './source.js';

/**
 * Every token kind the lexer can produce.
 */
export type TokenKind =
  | 'unknown'
  | 'keyword'
  | 'identifier'
  | 'variable'
  | 'placeholder'
  | 'placeholderKeyword'
  | 'integerLiteral'
  | 'numberLiteral'
  | 'characterLiteral'
  | 'stringLiteral'
  | 'plus'
  | 'minus'
  | 'times'
  | 'exponent'
  | 'divide'
  | 'modulo'
  | 'bitwiseAnd'
  | 'bitwiseOr'
  | 'bitwiseXor'
  | 'bitwiseNot'
  | 'shiftLeft'
  | 'shiftRight'
  | 'assignEqual'
  | 'assignPlus'
  | 'assignMinus'
  | 'assignTimes'
  | 'assignExponent'
  | 'assignDivide'
  | 'assignModulo'
  | 'assignAnd'
  | 'assignOr'
  | 'assignXor'
  | 'assignShiftLeft'
  | 'assignShiftRight'
  | 'compareEqual'
  | 'compareNotEqual'
  | 'compareLess'
  | 'compareLessEqual'
  | 'compareGreater'
  | 'compareGreaterEqual'
  | 'logicalAnd'
  | 'logicalOr'
  | 'logicalNot'
  | 'leftParenthesis'
  | 'rightParenthesis'
  | 'leftBracket'
  | 'rightBracket'
  | 'leftBrace'
  | 'rightBrace'
  | 'comma'
  | 'colon'
  | 'questionMark'
  | 'backtick'
  | 'backslash'
  | 'hash'
  | 'doubleHash'
  | 'newLine'
  | 'endOfFile';

/**
 * A single lexical token.
 *
 * `lexeme` is the exact text the token was scanned from inside `source` (string and character
 * literals keep their quotes). `file`/`line`/`column` are the user-facing location; for tokens
 * re-lexed from preprocessor output they point back at the original source line.
 */
export interface Token {
  kind: TokenKind;
  lexeme: string;
  /** Buffer the lexeme was scanned from. */
  source: SourceFile;
  /** 0-based offset of the lexeme inside `source.text`. */
  offset: number;
  file: string;
  /** 1-based. */
  line: number;
  /** 1-based. */
  column: number;
  /** Decoded value of integer, number (truncated) and character literals. */
  intValue?: bigint;
  /** Decoded value of number and integer literals. */
  numberValue?: number;
  /** Escape-decoded body of a string literal. */
  stringValue?: string;
  /** Keyword table entry for `keyword` and `placeholderKeyword` tokens. */
  keyword?: KeywordEntry;
}

/**
 * Operator and punctuation spellings, longest first so a scan can take the first match.
 */
export const SYMBOLS: ReadonlyArray<readonly [string, TokenKind]> = [
  ['**=', 'assignExponent'],
  ['<<=', 'assignShiftLeft'],
  ['>>=', 'assignShiftRight'],
  ['**', 'exponent'],
  ['<<', 'shiftLeft'],
  ['>>', 'shiftRight'],
  ['==', 'compareEqual'],
  ['!=', 'compareNotEqual'],
  ['<=', 'compareLessEqual'],
  ['>=', 'compareGreaterEqual'],
  ['&&', 'logicalAnd'],
  ['||', 'logicalOr'],
  ['+=', 'assignPlus'],
  ['-=', 'assignMinus'],
  ['*=', 'assignTimes'],
  ['/=', 'assignDivide'],
  ['%=', 'assignModulo'],
  ['&=', 'assignAnd'],
  ['|=', 'assignOr'],
  ['^=', 'assignXor'],
  ['##', 'doubleHash'],
  ['+', 'plus'],
  ['-', 'minus'],
  ['*', 'times'],
  ['/', 'divide'],
  ['%', 'modulo'],
  ['&', 'bitwiseAnd'],
  ['|', 'bitwiseOr'],
  ['^', 'bitwiseXor'],
  ['~', 'bitwiseNot'],
  ['=', 'assignEqual'],
  ['<', 'compareLess'],
  ['>', 'compareGreater'],
  ['!', 'logicalNot'],
  ['(', 'leftParenthesis'],
  [')', 'rightParenthesis'],
  ['[', 'leftBracket'],
  [']', 'rightBracket'],
  ['{', 'leftBrace'],
  ['}', 'rightBrace'],
  [',', 'comma'],
  [':', 'colon'],
  ['?', 'questionMark'],
  ['`', 'backtick'],
  ['\\', 'backslash'],
  ['#', 'hash'],
];

/**
 * Display name of a token's kind; keyword tokens show their keyword kind instead.
 */
export function tokenKindName(token: Token): string {
  if (token.kind === 'keyword' && token.keyword) return token.keyword.kind;
  return token.kind;
}

/**
 * Human-readable token rendering, e.g. `identifier ('foo')` or
 * `integerLiteral ('0x1F', value = 31)`.
 */
export function tokenToString(token: Token): string {
  const lexeme = token.kind === 'newLine' ? '\\n' : token.lexeme;
  if (token.kind === 'integerLiteral' && token.intValue !== undefined) {
    return `${tokenKindName(token)} ('${lexeme}', value = ${token.intValue})`;
  }
  if (token.kind === 'numberLiteral' && token.numberValue !== undefined) {
    return `${tokenKindName(token)} ('${lexeme}', value = ${token.numberValue})`;
  }
  return `${tokenKindName(token)} ('${lexeme}')`;
}

/**
 * True when `b` starts exactly where `a` ends in the same buffer (no whitespace between).
 */
export function isAdjacent(a: Token, b: Token): boolean {
  return a.source === b.source && a.offset + a.lexeme.length === b.offset;
}

/**
 * True for the tokens that end a statement.
 */
export function isLineEnd(token: Token): boolean {
  return token.kind === 'newLine' || token.kind === 'endOfFile';
}
