import type { ExpressionNode, Node, OperandNode, StatementNode } from './ast.js';

function pad(indent: number): string {
  return ' '.repeat(indent * 4);
}

function expressionToString(node: ExpressionNode, indent: number): string {
  switch (node.kind) {
    case 'BinaryExpression':
      return (
        `${pad(indent)}binary expression:\n` +
        `${pad(indent + 1)}operator: ${node.operator}\n` +
        `${pad(indent + 1)}left_operand:\n` +
        expressionToString(node.left, indent + 2) +
        `${pad(indent + 1)}right_operand:\n` +
        expressionToString(node.right, indent + 2)
      );
    case 'UnaryExpression':
      return (
        `${pad(indent)}unary expression:\n` +
        `${pad(indent + 1)}operator: ${node.operator}\n` +
        `${pad(indent + 1)}operand:\n` +
        expressionToString(node.operand, indent + 2)
      );
    case 'GroupingExpression':
      return `${pad(indent)}grouping expression:\n${expressionToString(node.inner, indent + 2)}`;
    case 'PrimaryExpression': {
      const p = node.primary;
      switch (p.type) {
        case 'integer':
          return `${pad(indent)}integer: ${p.value}\n`;
        case 'number':
          return `${pad(indent)}number: ${p.value}\n`;
        case 'char':
          return `${pad(indent)}char: '${p.value}'\n`;
        case 'string':
          return `${pad(indent)}string: "${p.value}"\n`;
        case 'identifier':
          return `${pad(indent)}identifier: ${p.name}\n`;
        case 'variable':
          return `${pad(indent)}variable: $${p.name}\n`;
        case 'placeholder':
          return `${pad(indent)}placeholder: @${p.name}\n`;
      }
    }
  }
}

function operandToString(node: OperandNode, indent: number): string {
  switch (node.kind) {
    case 'ImmediateOperand':
      return `${pad(indent)}immediate operand:\n${expressionToString(node.value, indent + 1)}`;
    case 'RegisterOperand':
      return `${pad(indent)}register operand: ${node.name}\n`;
    case 'ConditionOperand':
      return `${pad(indent)}condition operand: ${node.name}\n`;
    case 'DirectOperand':
      return `${pad(indent)}direct operand:\n${expressionToString(node.address, indent + 1)}`;
    case 'IndirectOperand':
      return `${pad(indent)}indirect operand: [${node.register.name}]\n`;
  }
}

const DATA_NAMES = { 1: '.byte', 2: '.word', 4: '.dword' } as const;

function statementToString(node: StatementNode, indent: number): string {
  switch (node.kind) {
    case 'LabelDefinition':
      return `${pad(indent)}label_definition: '${node.name}'\n`;
    case 'Instruction':
      return (
        `${pad(indent)}instruction: ${node.mnemonic}\n` +
        node.operands.map((o) => operandToString(o, indent + 1)).join('')
      );
    case 'OrgDirective':
      return `${pad(indent)}.org directive:\n${expressionToString(node.address, indent + 1)}`;
    case 'SectionDirective':
      if (node.vector) {
        return `${pad(indent)}.${node.section} directive:\n${expressionToString(node.vector, indent + 1)}`;
      }
      return `${pad(indent)}.${node.section} directive\n`;
    case 'DataDirective':
      return (
        `${pad(indent)}${DATA_NAMES[node.width]} directive:\n` +
        node.values.map((v) => expressionToString(v, indent + 1)).join('')
      );
    case 'GlobalDirective':
    case 'ExternDirective':
      return (
        `${pad(indent)}${node.kind === 'GlobalDirective' ? '.global' : '.extern'} directive:\n` +
        node.symbols.map((s) => `${pad(indent + 1)}${s}\n`).join('')
      );
    case 'VariableDeclaration':
      return (
        `${pad(indent)}${node.constant ? '.const' : '.let'} directive: $${node.name}\n` +
        expressionToString(node.value, indent + 1)
      );
    case 'VariableAssignment':
      return (
        `${pad(indent)}assignment: $${node.name} ${node.operator}\n` +
        expressionToString(node.value, indent + 1)
      );
  }
}

/**
 * Indented, line-per-node rendering of an AST (4 spaces per level).
 */
export function astToString(node: Node, indent = 0): string {
  switch (node.kind) {
    case 'Module':
      return `${pad(indent)}module\n${node.children.map((c) => statementToString(c, indent + 1)).join('')}`;
    case 'ImmediateOperand':
    case 'RegisterOperand':
    case 'ConditionOperand':
    case 'DirectOperand':
    case 'IndirectOperand':
      return operandToString(node, indent);
    case 'BinaryExpression':
    case 'UnaryExpression':
    case 'GroupingExpression':
    case 'PrimaryExpression':
      return expressionToString(node, indent);
    default:
      return statementToString(node, indent);
  }
}
