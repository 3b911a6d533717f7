// Simple AST node constructors
import type * as AST from '../types.js';

// Placeholder span; the parser replaces it once the node's tokens are known.
function createEmptySpan(): AST.Span {
  return {
    start: { line: 1, col: 1, offset: 0 },
    end: { line: 1, col: 1, offset: 0 },
  };
}

export const Node = {
  Program: (
    name: string,
    params: readonly string[],
    decls: readonly AST.Declaration[],
    body: AST.Block
  ): AST.Program => ({
    kind: 'Program',
    name,
    params,
    decls,
    body,
    span: createEmptySpan(),
  }),
  VarDecl: (names: readonly string[], type: AST.TypeNode): AST.VarDecl => ({
    kind: 'VarDecl',
    names,
    type,
    span: createEmptySpan(),
  }),
  ConstDecl: (name: string, value: AST.Expression): AST.ConstDecl => ({
    kind: 'ConstDecl',
    name,
    value,
    span: createEmptySpan(),
  }),
  TypeDecl: (name: string, type: AST.TypeNode): AST.TypeDecl => ({
    kind: 'TypeDecl',
    name,
    type,
    span: createEmptySpan(),
  }),
  ParamGroup: (names: readonly string[], type: AST.TypeNode, byRef: boolean): AST.ParamGroup => ({
    kind: 'ParamGroup',
    names,
    type,
    byRef,
    span: createEmptySpan(),
  }),
  ProcedureDecl: (
    name: string,
    params: readonly AST.ParamGroup[],
    decls: readonly AST.Declaration[],
    body: AST.Block
  ): AST.ProcedureDecl => ({
    kind: 'ProcedureDecl',
    name,
    params,
    decls,
    body,
    span: createEmptySpan(),
  }),
  FunctionDecl: (
    name: string,
    params: readonly AST.ParamGroup[],
    returnType: AST.TypeNode,
    decls: readonly AST.Declaration[],
    body: AST.Block
  ): AST.FunctionDecl => ({
    kind: 'FunctionDecl',
    name,
    params,
    returnType,
    decls,
    body,
    span: createEmptySpan(),
  }),

  SimpleType: (name: AST.SimpleTypeName): AST.SimpleType => ({
    kind: 'SimpleType',
    name,
    span: createEmptySpan(),
  }),
  NamedType: (name: string): AST.NamedType => ({
    kind: 'NamedType',
    name,
    span: createEmptySpan(),
  }),
  SubrangeType: (lo: AST.Expression, hi: AST.Expression): AST.SubrangeType => ({
    kind: 'SubrangeType',
    lo,
    hi,
    span: createEmptySpan(),
  }),
  ArrayType: (range: AST.SubrangeType, element: AST.TypeNode): AST.ArrayType => ({
    kind: 'ArrayType',
    range,
    element,
    span: createEmptySpan(),
  }),

  Block: (statements: readonly AST.Statement[]): AST.Block => ({
    kind: 'Block',
    statements,
    span: createEmptySpan(),
  }),
  CompoundStmt: (statements: readonly AST.Statement[]): AST.CompoundStmt => ({
    kind: 'CompoundStmt',
    statements,
    span: createEmptySpan(),
  }),
  Assignment: (target: AST.VarRef, value: AST.Expression): AST.Assignment => ({
    kind: 'Assignment',
    target,
    value,
    span: createEmptySpan(),
  }),
  IfStmt: (condition: AST.Expression, then: AST.Statement, elseBranch: AST.Statement | null): AST.IfStmt => ({
    kind: 'IfStmt',
    condition,
    then,
    else: elseBranch,
    span: createEmptySpan(),
  }),
  WhileStmt: (condition: AST.Expression, body: AST.Statement): AST.WhileStmt => ({
    kind: 'WhileStmt',
    condition,
    body,
    span: createEmptySpan(),
  }),
  ForStmt: (
    variable: string,
    from: AST.Expression,
    to: AST.Expression,
    descending: boolean,
    body: AST.Statement
  ): AST.ForStmt => ({
    kind: 'ForStmt',
    variable,
    from,
    to,
    descending,
    body,
    span: createEmptySpan(),
  }),
  ProcedureCall: (name: string, args: readonly AST.Expression[]): AST.ProcedureCall => ({
    kind: 'ProcedureCall',
    name,
    args,
    span: createEmptySpan(),
  }),
  EmptyStmt: (): AST.EmptyStmt => ({
    kind: 'EmptyStmt',
    span: createEmptySpan(),
  }),

  BinaryOp: (op: AST.BinaryOperator, left: AST.Expression, right: AST.Expression): AST.BinaryOp => ({
    kind: 'BinaryOp',
    op,
    left,
    right,
    span: createEmptySpan(),
  }),
  UnaryOp: (op: AST.UnaryOperator, operand: AST.Expression): AST.UnaryOp => ({
    kind: 'UnaryOp',
    op,
    operand,
    span: createEmptySpan(),
  }),
  Literal: (literal: AST.LiteralValue): AST.Literal => ({
    kind: 'Literal',
    literal,
    span: createEmptySpan(),
  }),
  VarRef: (name: string, index: AST.Expression | null = null): AST.VarRef => ({
    kind: 'VarRef',
    name,
    index,
    span: createEmptySpan(),
  }),
  FunctionCall: (name: string, args: readonly AST.Expression[]): AST.FunctionCall => ({
    kind: 'FunctionCall',
    name,
    args,
    span: createEmptySpan(),
  }),
  InvalidExpr: (): AST.InvalidExpr => ({
    kind: 'InvalidExpr',
    span: createEmptySpan(),
  }),
};
