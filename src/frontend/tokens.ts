/**
 * @module tokens
 *
 * Token predicates and display helpers.
 */

import { DELIMITERS, OPERATORS, TokenKind } from '../types.js';
import type {
  Delimiter,
  DelimiterToken,
  KeywordToken,
  Operator,
  OperatorToken,
  Token,
} from '../types.js';
import type { SemanticTokenKind } from '../config/token-kind.js';

export { TokenKind };

export function isOperatorText(text: string): text is Operator {
  return OPERATORS.some(op => op === text);
}

export function isDelimiterText(text: string): text is Delimiter {
  return DELIMITERS.some(d => d === text);
}

export function isKeyword(token: Token, keyword?: SemanticTokenKind): token is KeywordToken {
  return token.kind === TokenKind.KEYWORD && (keyword === undefined || token.keyword === keyword);
}

export function isOperator(token: Token, operator?: Operator): token is OperatorToken {
  return token.kind === TokenKind.OPERATOR && (operator === undefined || token.operator === operator);
}

export function isDelimiter(token: Token, delimiter?: Delimiter): token is DelimiterToken {
  return token.kind === TokenKind.DELIMITER && (delimiter === undefined || token.delimiter === delimiter);
}

/**
 * Kind label used in token listings: `KEYWORD(BEGIN)`, `OPERATOR(:=)`,
 * `INVALID(UnterminatedString)`, or the bare kind.
 */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case TokenKind.KEYWORD:
      return `KEYWORD(${token.keyword})`;
    case TokenKind.OPERATOR:
      return `OPERATOR(${token.operator})`;
    case TokenKind.DELIMITER:
      return `DELIMITER(${token.delimiter})`;
    case TokenKind.INVALID:
      return `INVALID(${token.reason})`;
    default:
      return token.kind;
  }
}
