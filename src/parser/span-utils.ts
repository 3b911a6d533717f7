import type { ParserContext } from './context.js';
import type { Span, SyntaxNode, Token } from '../types.js';

export function spanFromTokens(start: Token, end: Token): Span {
  return { start: start.start, end: end.end };
}

/** Zero-width span at the start of a token */
export function pointSpan(at: Token): Span {
  return { start: at.start, end: at.start };
}

export function assignSpan<T extends SyntaxNode>(node: T, span: Span): T {
  node.span = span;
  return node;
}

/**
 * Span a node from `start` to the last consumed token. When nothing has been
 * consumed since `start`, the span is empty at `start`.
 */
export function finishNode<T extends SyntaxNode>(ctx: ParserContext, node: T, start: Token): T {
  const last = ctx.previous();
  const span = last.end.offset > start.start.offset ? spanFromTokens(start, last) : pointSpan(start);
  return assignSpan(node, span);
}
