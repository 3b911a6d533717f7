/**
 * Parser helpers shared by the declaration, type and statement parsers.
 */

import { TokenKind } from '../frontend/tokens.js';
import type { Token } from '../types.js';
import { SemanticTokenKind } from '../config/token-kind.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { ParserContext } from './context.js';
import { SYNC_KEYWORDS } from './context.js';

export interface ParserTools {
  /**
   * Identifier list `a, b, c`. Returns the names that parsed; an empty list
   * means not even the first identifier was there.
   */
  parseIdentList: (expected: string) => string[];

  /**
   * Consume `;`. When it is missing but the next token plainly starts
   * something new, the error is recorded as an insertion and parsing goes on.
   */
  expectSemicolon: () => void;

  /**
   * Consume the `end` that closes the block opened by `opener`. Hitting the
   * end of the program first is an unclosed block.
   */
  expectEnd: (opener: Token) => void;

  /** Whether the current token can begin a non-empty statement */
  atStatementStart: () => boolean;
}

const STATEMENT_KEYWORDS: ReadonlySet<SemanticTokenKind> = new Set([
  SemanticTokenKind.BEGIN,
  SemanticTokenKind.IF,
  SemanticTokenKind.WHILE,
  SemanticTokenKind.FOR,
]);

export function createParserTools(ctx: ParserContext): ParserTools {
  const atStatementStart = (): boolean => {
    const tok = ctx.peek();
    return (
      tok.kind === TokenKind.IDENTIFIER ||
      (tok.kind === TokenKind.KEYWORD && STATEMENT_KEYWORDS.has(tok.keyword))
    );
  };

  return {
    parseIdentList(expected: string): string[] {
      const first = ctx.expectIdentifier(expected);
      if (!first) return [];
      const names = [first.lexeme];
      while (ctx.acceptDelimiter(',')) {
        const tok = ctx.expectIdentifier('identifier');
        if (!tok) break;
        names.push(tok.lexeme);
      }
      return names;
    },

    expectSemicolon(): void {
      if (ctx.acceptDelimiter(';')) return;
      const tok = ctx.peek();
      const startsSomething =
        tok.kind === TokenKind.IDENTIFIER || (tok.kind === TokenKind.KEYWORD && SYNC_KEYWORDS.has(tok.keyword));
      if (startsSomething) ctx.missing("';'");
      else ctx.fail("';'");
    },

    expectEnd(opener: Token): void {
      if (ctx.acceptKeyword(SemanticTokenKind.END)) return;
      const found = ctx.peek();
      if (found.kind === TokenKind.EOF || ctx.atDelimiter('.')) {
        ctx.report(Diagnostics.unclosedBlock(opener.lexeme, found));
      } else {
        ctx.fail("'end'");
      }
    },

    atStatementStart,
  };
}
