import type {
  AssignmentOperator,
  BinaryOperator,
  DataDirectiveNode,
  DirectiveNode,
  ExpressionNode,
  InstructionNode,
  ModuleNode,
  OperandNode,
  PrimaryValue,
  RegisterOperandNode,
  SourcePosition,
  SourceSpan,
  StatementNode,
  UnaryOperator,
  VariableAssignmentNode,
  VariableDeclarationNode,
} from './ast.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { KeywordEntry } from './keywords.js';
import { operandRange } from './keywords.js';
import type { Lexer, TokenCursor } from './lexer.js';
import type { Token, TokenKind } from './token.js';
import { isLineEnd, tokenKindName } from './token.js';

/** Lowest precedence first; `**` and unary operators sit below the last level. */
const BINARY_LEVELS: ReadonlyArray<Partial<Record<TokenKind, BinaryOperator>>> = [
  { logicalOr: '||' },
  { logicalAnd: '&&' },
  { bitwiseOr: '|' },
  { bitwiseXor: '^' },
  { bitwiseAnd: '&' },
  { compareEqual: '==', compareNotEqual: '!=' },
  { compareLess: '<', compareLessEqual: '<=', compareGreater: '>', compareGreaterEqual: '>=' },
  { shiftLeft: '<<', shiftRight: '>>' },
  { plus: '+', minus: '-' },
  { times: '*', divide: '/', modulo: '%' },
];

const UNARY_OPERATORS: Partial<Record<TokenKind, UnaryOperator>> = {
  minus: '-',
  bitwiseNot: '~',
  logicalNot: '!',
  plus: '+',
};

const ASSIGNMENT_OPERATORS: Partial<Record<TokenKind, AssignmentOperator>> = {
  assignEqual: '=',
  assignPlus: '+=',
  assignMinus: '-=',
  assignTimes: '*=',
  assignExponent: '**=',
  assignDivide: '/=',
  assignModulo: '%=',
  assignAnd: '&=',
  assignOr: '|=',
  assignXor: '^=',
  assignShiftLeft: '<<=',
  assignShiftRight: '>>=',
};

const DATA_WIDTHS: Record<string, DataDirectiveNode['width']> = {
  '.byte': 1,
  '.word': 2,
  '.dword': 4,
};

function startOf(token: Token): SourcePosition {
  return { line: token.line, column: token.column, offset: token.offset };
}

function endOf(token: Token): SourcePosition {
  const width = Math.max(token.lexeme.length - 1, 0);
  return { line: token.line, column: token.column + width, offset: token.offset + width };
}

function spanOf(first: Token, last: Token): SourceSpan {
  return { file: first.file, start: startOf(first), end: endOf(last) };
}

/**
 * Recursive-descent parser over preprocessed tokens. The first error ends the parse.
 */
export class Parser {
  private readonly cursor: TokenCursor;
  private good = true;
  private previous: Token | undefined;
  private readonly fileStack: string[] = [];

  constructor(
    private readonly lexer: Lexer,
    private readonly diagnostics: Diagnostic[],
  ) {
    this.cursor = lexer.cursor(diagnostics);
  }

  isGood(): boolean {
    return this.good;
  }

  /** File named by the innermost open `.pragma push_file` marker. */
  get currentFile(): string | undefined {
    return this.fileStack[this.fileStack.length - 1];
  }

  parse(): ModuleNode | undefined {
    const first = this.cursor.current();
    if (!this.lexer.isGood()) {
      return this.fail(first, `Cannot parse '${this.lexer.file}': its tokens are incomplete.`);
    }
    const children: StatementNode[] = [];
    for (;;) {
      this.cursor.skipWhile('newLine');
      if (this.cursor.isAtEnd()) break;
      if (!this.parseLine(children)) {
        this.good = false;
        return undefined;
      }
    }
    const last = this.previous ?? first;
    return { kind: 'Module', span: spanOf(first, last), children };
  }

  private fail(at: Token, message: string, id: DiagnosticId = DiagnosticIds.ParseError): undefined {
    this.good = false;
    this.diagnostics.push({
      id,
      severity: 'error',
      message,
      file: at.file,
      line: at.line,
      column: at.column,
    });
    return undefined;
  }

  private consume(): Token {
    const token = this.cursor.consume();
    this.previous = token;
    return token;
  }

  private peekKind(offset: number): TokenKind | undefined {
    return this.cursor.kindAt(offset);
  }

  /**
   * One source line: any number of labels, then at most one statement, then the line end.
   */
  private parseLine(children: StatementNode[]): boolean {
    while (this.cursor.current().kind === 'identifier' && this.peekKind(1) === 'colon') {
      const name = this.consume();
      const colon = this.consume();
      children.push({ kind: 'LabelDefinition', span: spanOf(name, colon), name: name.lexeme });
    }
    if (isLineEnd(this.cursor.current())) return this.endLine();

    const token = this.cursor.current();
    let statement: StatementNode | undefined;
    let handled = false;
    if (token.kind === 'keyword' && token.keyword) {
      switch (token.keyword.kind) {
        case 'assemblerDirective':
          statement = this.parseDirective(token.keyword);
          break;
        case 'instructionMnemonic':
          statement = this.parseInstruction(token.keyword);
          break;
        case 'preprocessorDirective':
          handled = this.parseMarker();
          if (!handled) return false;
          break;
        default:
          break;
      }
    } else if (token.kind === 'variable') {
      statement = this.parseAssignment();
    }

    if (!statement && !handled) {
      if (this.good) {
        this.fail(token, `Unsupported statement type starting with token '${token.lexeme}'.`);
      }
      return false;
    }
    if (statement) children.push(statement);
    return this.endLine();
  }

  private endLine(): boolean {
    const token = this.cursor.current();
    if (!isLineEnd(token)) {
      this.fail(token, `Unexpected token '${token.lexeme}' at end of statement.`);
      return false;
    }
    if (token.kind === 'newLine') this.consume();
    return true;
  }

  /**
   * `.pragma push_file "path"` / `.pragma pop_file`, written by the preprocessor around every
   * file it reads.
   */
  private parseMarker(): boolean {
    const directive = this.consume();
    const pragma = this.cursor.current();
    if (directive.keyword?.canonical !== '.pragma' || pragma.keyword?.kind !== 'pragma') {
      this.fail(
        directive,
        `Preprocessor directive '${directive.lexeme}' cannot appear in preprocessed source.`,
      );
      return false;
    }
    if (pragma.keyword.canonical === 'push_file') {
      this.consume();
      const path = this.cursor.expect('stringLiteral', "Expected a file path after 'push_file'.");
      if (!path) {
        this.good = false;
        return false;
      }
      this.previous = path;
      this.fileStack.push(path.stringValue ?? '');
      return true;
    }
    if (pragma.keyword.canonical === 'pop_file') {
      this.consume();
      if (this.fileStack.pop() === undefined) {
        this.fail(pragma, "Unbalanced '.pragma pop_file' without a matching 'push_file'.");
        return false;
      }
      return true;
    }
    this.fail(pragma, `Pragma '${pragma.lexeme}' cannot appear in preprocessed source.`);
    return false;
  }

  private parseInstruction(keyword: KeywordEntry): InstructionNode | undefined {
    const mnemonic = this.consume();
    const operands: OperandNode[] = [];
    if (!isLineEnd(this.cursor.current())) {
      for (;;) {
        const operand = this.parseOperand();
        if (!operand) return undefined;
        operands.push(operand);
        if (this.cursor.current().kind !== 'comma') break;
        this.consume();
      }
    }

    const { min, max } = operandRange(keyword);
    if (operands.length < min) {
      return this.fail(
        mnemonic,
        `Instruction '${mnemonic.lexeme}' expects at least ${min} operand(s), got ${operands.length}.`,
        DiagnosticIds.OperandCountMismatch,
      );
    }
    if (operands.length > max) {
      return this.fail(
        mnemonic,
        `Instruction '${mnemonic.lexeme}' has too many operands (${operands.length}); at most ${max} allowed.`,
        DiagnosticIds.OperandCountMismatch,
      );
    }
    return {
      kind: 'Instruction',
      span: spanOf(mnemonic, this.previous ?? mnemonic),
      mnemonic: mnemonic.lexeme,
      keyword,
      operands,
    };
  }

  private registerOperand(token: Token, keyword: KeywordEntry): RegisterOperandNode {
    return {
      kind: 'RegisterOperand',
      span: spanOf(token, token),
      name: token.lexeme,
      code: keyword.params[0],
      size: keyword.params[1],
    };
  }

  private parseOperand(): OperandNode | undefined {
    const token = this.cursor.current();
    const keyword = token.kind === 'keyword' ? token.keyword : undefined;

    if (keyword?.kind === 'registerName') {
      this.consume();
      return this.registerOperand(token, keyword);
    }
    if (keyword?.kind === 'branchingCondition') {
      this.consume();
      return {
        kind: 'ConditionOperand',
        span: spanOf(token, token),
        name: token.lexeme,
        code: keyword.params[0],
      };
    }
    if (keyword) {
      return this.fail(
        token,
        `Unsupported keyword type '${keyword.kind}' ('${token.lexeme}') for operand.`,
      );
    }

    if (token.kind === 'leftBracket') {
      this.consume();
      const inner = this.cursor.current();
      if (inner.keyword?.kind === 'registerName' && inner.kind === 'keyword') {
        this.consume();
        const close = this.cursor.current();
        if (close.kind !== 'rightBracket') {
          return this.fail(close, "Expected ']' after indirect memory operand register.");
        }
        this.consume();
        return {
          kind: 'IndirectOperand',
          span: spanOf(token, close),
          register: this.registerOperand(inner, inner.keyword),
        };
      }
      const address = this.parseExpression();
      if (!address) return undefined;
      const close = this.cursor.current();
      if (close.kind !== 'rightBracket') {
        return this.fail(close, "Expected ']' after direct memory operand expression.");
      }
      this.consume();
      return { kind: 'DirectOperand', span: spanOf(token, close), address };
    }

    const value = this.parseExpression();
    if (!value) return undefined;
    return { kind: 'ImmediateOperand', span: value.span, value };
  }

  private parseDirective(keyword: KeywordEntry): DirectiveNode | undefined {
    const directive = this.consume();
    const name = keyword.canonical;
    const finish = (): SourceSpan => spanOf(directive, this.previous ?? directive);

    switch (name) {
      case '.org': {
        const address = this.parseExpression();
        if (!address) return undefined;
        return { kind: 'OrgDirective', span: finish(), address };
      }
      case '.rom':
      case '.ram':
        return { kind: 'SectionDirective', span: finish(), section: name === '.rom' ? 'rom' : 'ram' };
      case '.int': {
        const vector = this.parseExpression();
        if (!vector) return undefined;
        return { kind: 'SectionDirective', span: finish(), section: 'int', vector };
      }
      case '.byte':
      case '.word':
      case '.dword': {
        if (isLineEnd(this.cursor.current())) {
          return this.fail(directive, `'${name}' directive requires at least one value.`);
        }
        const values: ExpressionNode[] = [];
        for (;;) {
          const value = this.parseExpression();
          if (!value) return undefined;
          values.push(value);
          if (this.cursor.current().kind !== 'comma') break;
          this.consume();
        }
        return { kind: 'DataDirective', span: finish(), width: DATA_WIDTHS[name] ?? 1, values };
      }
      case '.global':
      case '.extern': {
        if (isLineEnd(this.cursor.current())) {
          return this.fail(directive, `'${name}' directive requires at least one symbol.`);
        }
        const symbols: string[] = [];
        for (;;) {
          const symbol = this.cursor.current();
          if (symbol.kind !== 'identifier') {
            return this.fail(symbol, `Expected identifier for symbol in '${name}' directive.`);
          }
          symbols.push(this.consume().lexeme);
          if (this.cursor.current().kind !== 'comma') break;
          this.consume();
        }
        return name === '.global'
          ? { kind: 'GlobalDirective', span: finish(), symbols }
          : { kind: 'ExternDirective', span: finish(), symbols };
      }
      case '.let':
      case '.const':
        return this.parseDeclaration(directive, name === '.const');
      default:
        return this.fail(directive, `Unsupported directive '${directive.lexeme}'.`);
    }
  }

  private parseDeclaration(directive: Token, constant: boolean): VariableDeclarationNode | undefined {
    const what = constant ? 'constant' : 'variable';
    const name = this.cursor.current();
    if (name.kind !== 'variable') {
      return this.fail(
        name,
        `Expected ${what} name (starting with '$') after '${directive.lexeme}'.`,
      );
    }
    this.consume();
    const equals = this.cursor.current();
    if (equals.kind !== 'assignEqual') {
      return this.fail(
        equals,
        `Expected '=' after ${what} name in '${directive.lexeme}' directive.`,
      );
    }
    this.consume();
    const value = this.parseExpression();
    if (!value) return undefined;
    return {
      kind: 'VariableDeclaration',
      span: spanOf(directive, this.previous ?? directive),
      constant,
      name: name.lexeme.slice(1),
      value,
    };
  }

  private parseAssignment(): VariableAssignmentNode | undefined {
    const variable = this.consume();
    const opToken = this.cursor.current();
    const operator = ASSIGNMENT_OPERATORS[opToken.kind];
    if (!operator) {
      const found = opToken.kind === 'newLine' ? 'end of line' : opToken.lexeme;
      return this.fail(
        opToken,
        `Expected assignment operator (=, +=, -=, *=, etc.) after variable '${variable.lexeme}'. Found '${found}'.`,
      );
    }
    this.consume();
    const value = this.parseExpression();
    if (!value) return undefined;
    return {
      kind: 'VariableAssignment',
      span: spanOf(variable, this.previous ?? variable),
      name: variable.lexeme.slice(1),
      operator,
      value,
    };
  }

  parseExpression(): ExpressionNode | undefined {
    return this.parseBinary(0);
  }

  private parseBinary(level: number): ExpressionNode | undefined {
    const operators = BINARY_LEVELS[level];
    if (!operators) return this.parseExponent();
    let left = this.parseBinary(level + 1);
    if (!left) return undefined;
    for (;;) {
      const operator = operators[this.cursor.current().kind];
      if (!operator) return left;
      this.consume();
      const right = this.parseBinary(level + 1);
      if (!right) return undefined;
      left = {
        kind: 'BinaryExpression',
        span: { file: left.span.file, start: left.span.start, end: right.span.end },
        operator,
        left,
        right,
      };
    }
  }

  /** `unary ('**' exponent)?`, right-associative. */
  private parseExponent(): ExpressionNode | undefined {
    const base = this.parseUnary();
    if (!base) return undefined;
    if (this.cursor.current().kind !== 'exponent') return base;
    this.consume();
    const exponent = this.parseExponent();
    if (!exponent) return undefined;
    return {
      kind: 'BinaryExpression',
      span: { file: base.span.file, start: base.span.start, end: exponent.span.end },
      operator: '**',
      left: base,
      right: exponent,
    };
  }

  private parseUnary(): ExpressionNode | undefined {
    const token = this.cursor.current();
    const operator = UNARY_OPERATORS[token.kind];
    if (!operator) return this.parsePrimary();
    this.consume();
    const operand = this.parseUnary();
    if (!operand) return undefined;
    return {
      kind: 'UnaryExpression',
      span: { file: token.file, start: startOf(token), end: operand.span.end },
      operator,
      operand,
    };
  }

  private parsePrimary(): ExpressionNode | undefined {
    const token = this.cursor.current();
    let primary: PrimaryValue;
    switch (token.kind) {
      case 'integerLiteral':
        primary = { type: 'integer', value: token.intValue ?? 0n };
        break;
      case 'numberLiteral':
        primary = { type: 'number', value: token.numberValue ?? 0 };
        break;
      case 'characterLiteral':
        primary = { type: 'char', value: String.fromCharCode(Number(token.intValue ?? 0n)) };
        break;
      case 'stringLiteral':
        primary = { type: 'string', value: token.stringValue ?? '' };
        break;
      case 'identifier':
        primary = { type: 'identifier', name: token.lexeme };
        break;
      case 'variable':
        primary = { type: 'variable', name: token.lexeme.slice(1) };
        break;
      case 'placeholder':
      case 'placeholderKeyword':
        primary = { type: 'placeholder', name: token.lexeme.slice(1) };
        break;
      case 'leftParenthesis': {
        this.consume();
        const inner = this.parseExpression();
        if (!inner) return undefined;
        const close = this.cursor.current();
        if (close.kind !== 'rightParenthesis') {
          return this.fail(close, "Expected ')' to close grouped expression.");
        }
        this.consume();
        return { kind: 'GroupingExpression', span: spanOf(token, close), inner };
      }
      default:
        if (isLineEnd(token)) {
          return this.fail(token, 'Expected an expression before end of line.');
        }
        return this.fail(
          token,
          `Unsupported token type '${tokenKindName(token)}' ('${token.lexeme}') for primary expression.`,
        );
    }
    this.consume();
    return { kind: 'PrimaryExpression', span: spanOf(token, token), lexeme: token.lexeme, primary };
  }
}

/**
 * Parse a preprocessed token stream into a module. `undefined` on the first syntax error.
 */
export function parse(lexer: Lexer, diagnostics: Diagnostic[]): ModuleNode | undefined {
  return new Parser(lexer, diagnostics).parse();
}
