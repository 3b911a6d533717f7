/**
 * Pascal-S parser entry point.
 *
 * Recursive descent over the token sequence with panic-mode recovery: each
 * independent error is reported once and parsing continues, so the result
 * holds a best-effort tree together with every diagnostic found.
 */

import { Node } from './ast/ast.js';
import type { Program, Token } from './types.js';
import { isKeyword } from './frontend/tokens.js';
import { SemanticTokenKind } from './config/token-kind.js';
import { Diagnostics } from './diagnostics/diagnostics.js';
import type { SyntaxError } from './diagnostics/diagnostics.js';
import { createParserContext } from './parser/context.js';
import type { ParserContext } from './parser/context.js';
import { createParserTools } from './parser/parser-tools.js';
import type { ParserTools } from './parser/parser-tools.js';
import { parseDeclarationPart } from './parser/decl-parser.js';
import { parseBlock } from './parser/expr-stmt-parser.js';
import { finishNode } from './parser/span-utils.js';

/**
 * Parse result
 *
 * `ast` is null only when the input has neither a `program` header nor a
 * `begin` anywhere; `diagnostics` then holds a single MalformedProgram error.
 */
export interface ParseResult {
  ast: Program | null;
  diagnostics: SyntaxError[];
}

/**
 * Parse a token sequence (as produced by `lex`) into a program tree.
 * INVALID tokens are skipped; the lexer has already reported them.
 *
 * @example
 * ```typescript
 * const { ast, diagnostics } = parse(lex('program p; mulai selesai.'));
 * ```
 */
export function parse(tokens: readonly Token[]): ParseResult {
  const ctx = createParserContext(tokens);
  const tools = createParserTools(ctx);

  const hasStructure = ctx.tokens.some(
    t => isKeyword(t, SemanticTokenKind.PROGRAM) || isKeyword(t, SemanticTokenKind.BEGIN)
  );
  if (!hasStructure) {
    return { ast: null, diagnostics: [Diagnostics.malformedProgram(ctx.peek())] };
  }

  const ast = parseProgram(ctx, tools);
  ctx.debug.log('parse finished', { diagnostics: ctx.diagnostics.length });
  return { ast, diagnostics: ctx.diagnostics };
}

function parseProgram(ctx: ParserContext, tools: ParserTools): Program {
  const start = ctx.peek();
  let name = '';
  let params: string[] = [];

  if (ctx.acceptKeyword(SemanticTokenKind.PROGRAM)) {
    ({ name, params } = ctx.withDeclaration('program header', () => {
      const ident = ctx.expectIdentifier('program name');
      const names = ident && ctx.acceptDelimiter('(') ? tools.parseIdentList('identifier') : [];
      if (names.length > 0) ctx.expectDelimiter(')', "')'");
      tools.expectSemicolon();
      return { name: ident?.lexeme ?? '', params: names };
    }));
  } else {
    ctx.fail("'program'");
  }
  if (ctx.panicking) {
    ctx.synchronize();
    ctx.acceptDelimiter(';');
  }

  const decls = parseDeclarationPart(ctx, tools);
  const body = parseBlock(ctx, tools);
  const dot = ctx.acceptDelimiter('.');
  if (!dot) ctx.fail("'.'");
  const program = finishNode(ctx, Node.Program(name, params, decls, body), start);

  if (dot && !ctx.atEof()) {
    ctx.report(Diagnostics.trailingInput(ctx.peek()));
  }
  return program;
}
