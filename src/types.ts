// Core type definitions for the Pascal-S frontend

import type { SemanticTokenKind } from './config/token-kind.js';

export interface Position {
  readonly line: number;
  readonly col: number;
  readonly offset: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

export enum TokenKind {
  IDENTIFIER = 'IDENTIFIER',
  INTEGER = 'INTEGER',
  REAL = 'REAL',
  STRING = 'STRING',
  CHAR = 'CHAR',
  KEYWORD = 'KEYWORD',
  OPERATOR = 'OPERATOR',
  DELIMITER = 'DELIMITER',
  EOF = 'EOF',
  INVALID = 'INVALID',
}

export const OPERATORS = [':=', '<=', '>=', '<>', '..', '+', '-', '*', '/', '<', '>', '='] as const;
export type Operator = (typeof OPERATORS)[number];

export const DELIMITERS = [';', ',', ':', '(', ')', '[', ']', '.'] as const;
export type Delimiter = (typeof DELIMITERS)[number];

export type LexErrorKind = 'UnterminatedString' | 'UnterminatedComment' | 'InvalidCharacter';

interface TokenBase {
  readonly lexeme: string;
  readonly start: Position;
  readonly end: Position;
}

export interface IdentifierToken extends TokenBase {
  readonly kind: TokenKind.IDENTIFIER;
}

/** Integer literals keep every digit; they are not limited to 2^53 */
export interface IntegerToken extends TokenBase {
  readonly kind: TokenKind.INTEGER;
  readonly value: bigint;
}

export interface RealToken extends TokenBase {
  readonly kind: TokenKind.REAL;
  readonly value: number;
}

export type NumberToken = IntegerToken | RealToken;

export interface TextToken extends TokenBase {
  readonly kind: TokenKind.STRING | TokenKind.CHAR;
  /** Literal contents with the quotes removed and doubled quotes collapsed */
  readonly value: string;
}

export interface KeywordToken extends TokenBase {
  readonly kind: TokenKind.KEYWORD;
  readonly keyword: SemanticTokenKind;
}

export interface OperatorToken extends TokenBase {
  readonly kind: TokenKind.OPERATOR;
  readonly operator: Operator;
}

export interface DelimiterToken extends TokenBase {
  readonly kind: TokenKind.DELIMITER;
  readonly delimiter: Delimiter;
}

export interface EofToken extends TokenBase {
  readonly kind: TokenKind.EOF;
}

export interface InvalidToken extends TokenBase {
  readonly kind: TokenKind.INVALID;
  readonly reason: LexErrorKind;
  readonly message: string;
}

export type Token =
  | IdentifierToken
  | NumberToken
  | TextToken
  | KeywordToken
  | OperatorToken
  | DelimiterToken
  | EofToken
  | InvalidToken;

// ============================================================
// Syntax tree
// ============================================================

interface NodeBase {
  span: Span;
}

export interface Program extends NodeBase {
  readonly kind: 'Program';
  readonly name: string;
  /** Program parameters such as `(input, output)` */
  readonly params: readonly string[];
  readonly decls: readonly Declaration[];
  readonly body: Block;
}

export interface VarDecl extends NodeBase {
  readonly kind: 'VarDecl';
  readonly names: readonly string[];
  readonly type: TypeNode;
}

export interface ConstDecl extends NodeBase {
  readonly kind: 'ConstDecl';
  readonly name: string;
  readonly value: Expression;
}

export interface TypeDecl extends NodeBase {
  readonly kind: 'TypeDecl';
  readonly name: string;
  readonly type: TypeNode;
}

export interface ParamGroup extends NodeBase {
  readonly kind: 'ParamGroup';
  readonly names: readonly string[];
  readonly type: TypeNode;
  /** Declared with `var` / `variabel` (pass by reference) */
  readonly byRef: boolean;
}

export interface ProcedureDecl extends NodeBase {
  readonly kind: 'ProcedureDecl';
  readonly name: string;
  readonly params: readonly ParamGroup[];
  readonly decls: readonly Declaration[];
  readonly body: Block;
}

export interface FunctionDecl extends NodeBase {
  readonly kind: 'FunctionDecl';
  readonly name: string;
  readonly params: readonly ParamGroup[];
  readonly returnType: TypeNode;
  readonly decls: readonly Declaration[];
  readonly body: Block;
}

export type Declaration = VarDecl | ConstDecl | TypeDecl | ProcedureDecl | FunctionDecl;

export type SimpleTypeName = 'integer' | 'real' | 'boolean' | 'char';

export interface SimpleType extends NodeBase {
  readonly kind: 'SimpleType';
  readonly name: SimpleTypeName;
}

export interface NamedType extends NodeBase {
  readonly kind: 'NamedType';
  readonly name: string;
}

export interface SubrangeType extends NodeBase {
  readonly kind: 'SubrangeType';
  readonly lo: Expression;
  readonly hi: Expression;
}

export interface ArrayType extends NodeBase {
  readonly kind: 'ArrayType';
  readonly range: SubrangeType;
  readonly element: TypeNode;
}

export type TypeNode = SimpleType | NamedType | SubrangeType | ArrayType;

export interface Block extends NodeBase {
  readonly kind: 'Block';
  readonly statements: readonly Statement[];
}

export interface CompoundStmt extends NodeBase {
  readonly kind: 'CompoundStmt';
  readonly statements: readonly Statement[];
}

export interface Assignment extends NodeBase {
  readonly kind: 'Assignment';
  readonly target: VarRef;
  readonly value: Expression;
}

export interface IfStmt extends NodeBase {
  readonly kind: 'IfStmt';
  readonly condition: Expression;
  readonly then: Statement;
  readonly else: Statement | null;
}

export interface WhileStmt extends NodeBase {
  readonly kind: 'WhileStmt';
  readonly condition: Expression;
  readonly body: Statement;
}

export interface ForStmt extends NodeBase {
  readonly kind: 'ForStmt';
  readonly variable: string;
  readonly from: Expression;
  readonly to: Expression;
  readonly descending: boolean;
  readonly body: Statement;
}

export interface ProcedureCall extends NodeBase {
  readonly kind: 'ProcedureCall';
  readonly name: string;
  readonly args: readonly Expression[];
}

export interface EmptyStmt extends NodeBase {
  readonly kind: 'EmptyStmt';
}

export type Statement =
  | CompoundStmt
  | Assignment
  | IfStmt
  | WhileStmt
  | ForStmt
  | ProcedureCall
  | EmptyStmt;

export type BinaryOperator =
  | 'or'
  | 'and'
  | '='
  | '<>'
  | '<'
  | '<='
  | '>'
  | '>='
  | '+'
  | '-'
  | '*'
  | '/'
  | 'div'
  | 'mod';

export type UnaryOperator = '-' | '+' | 'not';

export interface BinaryOp extends NodeBase {
  readonly kind: 'BinaryOp';
  readonly op: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface UnaryOp extends NodeBase {
  readonly kind: 'UnaryOp';
  readonly op: UnaryOperator;
  readonly operand: Expression;
}

export type LiteralValue =
  | { readonly type: 'integer'; readonly value: bigint }
  | { readonly type: 'real'; readonly value: number }
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'char'; readonly value: string }
  | { readonly type: 'boolean'; readonly value: boolean };

export interface Literal extends NodeBase {
  readonly kind: 'Literal';
  readonly literal: LiteralValue;
}

export interface VarRef extends NodeBase {
  readonly kind: 'VarRef';
  readonly name: string;
  readonly index: Expression | null;
}

export interface FunctionCall extends NodeBase {
  readonly kind: 'FunctionCall';
  readonly name: string;
  readonly args: readonly Expression[];
}

/** Stands in for an expression that failed to parse */
export interface InvalidExpr extends NodeBase {
  readonly kind: 'InvalidExpr';
}

export type Expression = BinaryOp | UnaryOp | Literal | VarRef | FunctionCall | InvalidExpr;

export type SyntaxNode =
  | Program
  | Declaration
  | ParamGroup
  | TypeNode
  | Block
  | Statement
  | Expression;
