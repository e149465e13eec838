/**
 * Frontend AST contracts for G10 assembly.
 *
 * This module defines types/interfaces only (no parsing/semantics).
 */
import type { KeywordEntry } from './keywords.js';

export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the buffer the position was taken from. */
  offset: number;
}

/**
 * Source span with inclusive start and end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

/**
 * One preprocessed translation unit.
 */
export interface ModuleNode extends BaseNode {
  kind: 'Module';
  children: StatementNode[];
}

/**
 * Statements permitted at module level.
 */
export type StatementNode =
  | LabelDefinitionNode
  | InstructionNode
  | DirectiveNode
  | VariableAssignmentNode;

export type DirectiveNode =
  | OrgDirectiveNode
  | SectionDirectiveNode
  | DataDirectiveNode
  | GlobalDirectiveNode
  | ExternDirectiveNode
  | VariableDeclarationNode;

/**
 * `name:`
 */
export interface LabelDefinitionNode extends BaseNode {
  kind: 'LabelDefinition';
  name: string;
}

export interface InstructionNode extends BaseNode {
  kind: 'Instruction';
  /** Mnemonic as written (aliases are kept). */
  mnemonic: string;
  keyword: KeywordEntry;
  operands: OperandNode[];
}

/**
 * `.org <address>`
 */
export interface OrgDirectiveNode extends BaseNode {
  kind: 'OrgDirective';
  address: ExpressionNode;
}

/**
 * `.rom`, `.ram`, or `.int <vector>` (alias `.interrupt`).
 */
export interface SectionDirectiveNode extends BaseNode {
  kind: 'SectionDirective';
  section: 'rom' | 'ram' | 'int';
  /** Present for `.int` only. */
  vector?: ExpressionNode;
}

/**
 * `.byte` / `.word` / `.dword` (and `.db` / `.dw` / `.dd`).
 */
export interface DataDirectiveNode extends BaseNode {
  kind: 'DataDirective';
  /** Element width in bytes. */
  width: 1 | 2 | 4;
  values: ExpressionNode[];
}

export interface GlobalDirectiveNode extends BaseNode {
  kind: 'GlobalDirective';
  symbols: string[];
}

export interface ExternDirectiveNode extends BaseNode {
  kind: 'ExternDirective';
  symbols: string[];
}

/**
 * `.let $name = expr` or `.const $name = expr`.
 */
export interface VariableDeclarationNode extends BaseNode {
  kind: 'VariableDeclaration';
  constant: boolean;
  /** Name without the `$`. */
  name: string;
  value: ExpressionNode;
}

export type AssignmentOperator =
  | '='
  | '+='
  | '-='
  | '*='
  | '**='
  | '/='
  | '%='
  | '&='
  | '|='
  | '^='
  | '<<='
  | '>>=';

/**
 * `$name op expr`.
 */
export interface VariableAssignmentNode extends BaseNode {
  kind: 'VariableAssignment';
  /** Name without the `$`. */
  name: string;
  operator: AssignmentOperator;
  value: ExpressionNode;
}

export type OperandNode =
  | ImmediateOperandNode
  | RegisterOperandNode
  | ConditionOperandNode
  | DirectOperandNode
  | IndirectOperandNode;

export interface ImmediateOperandNode extends BaseNode {
  kind: 'ImmediateOperand';
  value: ExpressionNode;
}

export interface RegisterOperandNode extends BaseNode {
  kind: 'RegisterOperand';
  /** Register name as written. */
  name: string;
  code: number;
  /** Register width in bytes (1, 2 or 4). */
  size: number;
}

export interface ConditionOperandNode extends BaseNode {
  kind: 'ConditionOperand';
  name: string;
  code: number;
}

/**
 * `[expr]`: memory at an address computed from an expression.
 */
export interface DirectOperandNode extends BaseNode {
  kind: 'DirectOperand';
  address: ExpressionNode;
}

/**
 * `[reg]`: memory at the address held in a register.
 */
export interface IndirectOperandNode extends BaseNode {
  kind: 'IndirectOperand';
  register: RegisterOperandNode;
}

export type BinaryOperator =
  | '||'
  | '&&'
  | '|'
  | '^'
  | '&'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '<<'
  | '>>'
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '**';

export type UnaryOperator = '-' | '~' | '!' | '+';

export type ExpressionNode =
  | BinaryExpressionNode
  | UnaryExpressionNode
  | GroupingExpressionNode
  | PrimaryExpressionNode;

export interface BinaryExpressionNode extends BaseNode {
  kind: 'BinaryExpression';
  operator: BinaryOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

export interface UnaryExpressionNode extends BaseNode {
  kind: 'UnaryExpression';
  operator: UnaryOperator;
  operand: ExpressionNode;
}

export interface GroupingExpressionNode extends BaseNode {
  kind: 'GroupingExpression';
  inner: ExpressionNode;
}

/**
 * Primary expression variants. `lexeme` is the source spelling.
 */
export type PrimaryValue =
  | { type: 'integer'; value: bigint }
  | { type: 'number'; value: number }
  | { type: 'char'; value: string }
  | { type: 'string'; value: string }
  | { type: 'identifier'; name: string }
  | { type: 'variable'; name: string }
  | { type: 'placeholder'; name: string };

export interface PrimaryExpressionNode extends BaseNode {
  kind: 'PrimaryExpression';
  lexeme: string;
  primary: PrimaryValue;
}

/**
 * Union of all AST node types.
 */
export type Node = ModuleNode | StatementNode | OperandNode | ExpressionNode;
