/**
 * @module ast/printer
 *
 * Indented outline of a syntax tree, one node per line, two spaces per level:
 *
 * ```text
 * Program Hello
 *   Block
 *     ProcedureCall writeln
 *       Literal string 'hi'
 * ```
 */

import type { LiteralValue, SyntaxNode } from '../types.js';

function quote(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

function formatLiteral(literal: LiteralValue): string {
  switch (literal.type) {
    case 'string':
    case 'char':
      return `${literal.type} ${quote(literal.value)}`;
    case 'integer':
    case 'real':
    case 'boolean':
      return `${literal.type} ${String(literal.value)}`;
  }
}

export function nodeLabel(node: SyntaxNode): string {
  switch (node.kind) {
    case 'Program':
      return node.params.length > 0 ? `Program ${node.name}(${node.params.join(', ')})` : `Program ${node.name}`;
    case 'VarDecl':
      return `VarDecl ${node.names.join(', ')}`;
    case 'ParamGroup':
      return `ParamGroup ${node.byRef ? 'var ' : ''}${node.names.join(', ')}`;
    case 'ConstDecl':
    case 'TypeDecl':
    case 'ProcedureDecl':
    case 'FunctionDecl':
    case 'SimpleType':
    case 'NamedType':
    case 'ProcedureCall':
    case 'VarRef':
    case 'FunctionCall':
      return `${node.kind} ${node.name}`;
    case 'ForStmt':
      return `ForStmt ${node.variable} ${node.descending ? 'downto' : 'to'}`;
    case 'BinaryOp':
    case 'UnaryOp':
      return `${node.kind} ${node.op}`;
    case 'Literal':
      return `Literal ${formatLiteral(node.literal)}`;
    default:
      return node.kind;
  }
}

export function childrenOf(node: SyntaxNode): SyntaxNode[] {
  switch (node.kind) {
    case 'Program':
      return [...node.decls, node.body];
    case 'VarDecl':
    case 'TypeDecl':
    case 'ParamGroup':
      return [node.type];
    case 'ConstDecl':
      return [node.value];
    case 'ProcedureDecl':
      return [...node.params, ...node.decls, node.body];
    case 'FunctionDecl':
      return [...node.params, node.returnType, ...node.decls, node.body];
    case 'SubrangeType':
      return [node.lo, node.hi];
    case 'ArrayType':
      return [node.range, node.element];
    case 'Block':
    case 'CompoundStmt':
      return [...node.statements];
    case 'Assignment':
      return [node.target, node.value];
    case 'IfStmt':
      return node.else ? [node.condition, node.then, node.else] : [node.condition, node.then];
    case 'WhileStmt':
      return [node.condition, node.body];
    case 'ForStmt':
      return [node.from, node.to, node.body];
    case 'ProcedureCall':
    case 'FunctionCall':
      return [...node.args];
    case 'BinaryOp':
      return [node.left, node.right];
    case 'UnaryOp':
      return [node.operand];
    case 'VarRef':
      return node.index ? [node.index] : [];
    case 'SimpleType':
    case 'NamedType':
    case 'EmptyStmt':
    case 'Literal':
    case 'InvalidExpr':
      return [];
  }
}

export function formatTree(node: SyntaxNode): string {
  const lines: string[] = [];
  const walk = (current: SyntaxNode, depth: number): void => {
    lines.push(`${'  '.repeat(depth)}${nodeLabel(current)}`);
    for (const child of childrenOf(current)) walk(child, depth + 1);
  };
  walk(node, 0);
  return lines.join('\n');
}
