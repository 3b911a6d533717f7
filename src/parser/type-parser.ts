/**
 * Type parsing: built-in types, type names, subranges and arrays.
 *
 * Subrange bounds are an optionally signed integer or character literal, or
 * a constant name. `lo <= hi` is left to later phases.
 */

import { Node } from '../ast/ast.js';
import { TokenKind, isOperator } from '../frontend/tokens.js';
import { SemanticTokenKind } from '../config/token-kind.js';
import type { Expression, SimpleTypeName, SubrangeType, Token, TypeNode } from '../types.js';
import type { ParserContext } from './context.js';
import { finishNode } from './span-utils.js';

const SIMPLE_TYPES: ReadonlyMap<SemanticTokenKind, SimpleTypeName> = new Map<SemanticTokenKind, SimpleTypeName>([
  [SemanticTokenKind.INTEGER_TYPE, 'integer'],
  [SemanticTokenKind.REAL_TYPE, 'real'],
  [SemanticTokenKind.BOOLEAN_TYPE, 'boolean'],
  [SemanticTokenKind.CHAR_TYPE, 'char'],
]);

function startsBound(tok: Token): boolean {
  return (
    tok.kind === TokenKind.INTEGER ||
    tok.kind === TokenKind.CHAR ||
    tok.kind === TokenKind.IDENTIFIER ||
    isOperator(tok, '-') ||
    isOperator(tok, '+')
  );
}

export function parseType(ctx: ParserContext): TypeNode | null {
  const tok = ctx.peek();

  if (tok.kind === TokenKind.KEYWORD) {
    const simple = SIMPLE_TYPES.get(tok.keyword);
    if (simple !== undefined) {
      ctx.next();
      return finishNode(ctx, Node.SimpleType(simple), tok);
    }
    if (tok.keyword === SemanticTokenKind.ARRAY) {
      return ctx.nested(() => parseArrayType(ctx), () => null);
    }
  }

  if (tok.kind === TokenKind.IDENTIFIER && !isOperator(ctx.peek(1), '..')) {
    ctx.next();
    return finishNode(ctx, Node.NamedType(tok.lexeme), tok);
  }

  if (startsBound(tok)) {
    return parseSubrange(ctx);
  }

  ctx.fail('type');
  return null;
}

function parseArrayType(ctx: ParserContext): TypeNode | null {
  const start = ctx.next();
  if (!ctx.expectDelimiter('[', "'['")) return null;
  const range = parseSubrange(ctx);
  if (!range) return null;
  if (!ctx.expectDelimiter(']', "']'")) return null;
  if (!ctx.expectKeyword(SemanticTokenKind.OF, "'of'")) return null;
  const element = parseType(ctx);
  if (!element) return null;
  return finishNode(ctx, Node.ArrayType(range, element), start);
}

export function parseSubrange(ctx: ParserContext): SubrangeType | null {
  const start = ctx.peek();
  const lo = parseBound(ctx);
  if (!lo) return null;
  if (!ctx.expectOperator('..', "'..'")) return null;
  const hi = parseBound(ctx);
  if (!hi) return null;
  return finishNode(ctx, Node.SubrangeType(lo, hi), start);
}

function parseBound(ctx: ParserContext): Expression | null {
  const start = ctx.peek();
  const sign = isOperator(start, '-') ? '-' : isOperator(start, '+') ? '+' : null;
  if (sign !== null) ctx.next();

  const tok = ctx.peek();
  let bound: Expression;
  switch (tok.kind) {
    case TokenKind.INTEGER:
      ctx.next();
      bound = finishNode(ctx, Node.Literal({ type: 'integer', value: tok.value }), tok);
      break;
    case TokenKind.CHAR:
      ctx.next();
      bound = finishNode(ctx, Node.Literal({ type: 'char', value: tok.value }), tok);
      break;
    case TokenKind.IDENTIFIER:
      ctx.next();
      bound = finishNode(ctx, Node.VarRef(tok.lexeme), tok);
      break;
    default:
      ctx.fail('subrange bound');
      return null;
  }

  return sign === null ? bound : finishNode(ctx, Node.UnaryOp(sign, bound), start);
}
