/**
 * Declaration parsing: `const`, `type` and `var` sections, procedures and
 * functions, in any order and any number of times.
 *
 * Errors inside a declaration header are reported as MalformedDeclaration.
 * A failed entry is dropped and the section carries on after the next `;`.
 */

import { Node } from '../ast/ast.js';
import { TokenKind } from '../frontend/tokens.js';
import { SemanticTokenKind } from '../config/token-kind.js';
import type {
  ConstDecl,
  Declaration,
  FunctionDecl,
  ParamGroup,
  ProcedureDecl,
  TypeDecl,
  TypeNode,
  VarDecl,
} from '../types.js';
import type { ParserContext } from './context.js';
import type { ParserTools } from './parser-tools.js';
import { parseBlock, parseExpression } from './expr-stmt-parser.js';
import { parseType } from './type-parser.js';
import { assignSpan, finishNode, pointSpan } from './span-utils.js';

export function parseDeclarationPart(ctx: ParserContext, tools: ParserTools): Declaration[] {
  return ctx.nested(() => parseDeclarations(ctx, tools), () => []);
}

function parseDeclarations(ctx: ParserContext, tools: ParserTools): Declaration[] {
  const decls: Declaration[] = [];
  for (;;) {
    if (ctx.panicking) ctx.synchronize();
    const tok = ctx.peek();
    if (tok.kind !== TokenKind.KEYWORD) return decls;

    switch (tok.keyword) {
      case SemanticTokenKind.CONST:
        decls.push(...parseSection(ctx, 'constant declaration', () => parseConstEntry(ctx, tools)));
        break;
      case SemanticTokenKind.TYPE:
        decls.push(...parseSection(ctx, 'type declaration', () => parseTypeEntry(ctx, tools)));
        break;
      case SemanticTokenKind.VAR:
        decls.push(...parseSection(ctx, 'variable declaration', () => parseVarEntry(ctx, tools)));
        break;
      case SemanticTokenKind.PROCEDURE:
        decls.push(parseProcedure(ctx, tools));
        break;
      case SemanticTokenKind.FUNCTION:
        decls.push(parseFunction(ctx, tools));
        break;
      default:
        return decls;
    }
  }
}

/**
 * Section keyword followed by one or more entries, each starting with an
 * identifier.
 */
function parseSection<T extends Declaration>(ctx: ParserContext, what: string, parseEntry: () => T | null): T[] {
  ctx.next();
  const entries: T[] = [];
  if (ctx.peek().kind !== TokenKind.IDENTIFIER) {
    ctx.withDeclaration(what, () => ctx.fail('identifier'));
    return entries;
  }

  while (ctx.peek().kind === TokenKind.IDENTIFIER) {
    const entry = ctx.withDeclaration(what, parseEntry);
    if (entry) entries.push(entry);
    if (ctx.panicking) {
      ctx.synchronize();
      ctx.acceptDelimiter(';');
    }
  }
  return entries;
}

function parseConstEntry(ctx: ParserContext, tools: ParserTools): ConstDecl | null {
  const name = ctx.next();
  if (!ctx.expectOperator('=', "'='")) return null;
  const value = parseExpression(ctx);
  if (ctx.panicking) return null;
  const node = finishNode(ctx, Node.ConstDecl(name.lexeme, value), name);
  tools.expectSemicolon();
  return node;
}

function parseTypeEntry(ctx: ParserContext, tools: ParserTools): TypeDecl | null {
  const name = ctx.next();
  if (!ctx.expectOperator('=', "'='")) return null;
  const type = parseType(ctx);
  if (!type) return null;
  const node = finishNode(ctx, Node.TypeDecl(name.lexeme, type), name);
  tools.expectSemicolon();
  return node;
}

function parseVarEntry(ctx: ParserContext, tools: ParserTools): VarDecl | null {
  const start = ctx.peek();
  const names = tools.parseIdentList('identifier');
  if (!ctx.expectDelimiter(':', "':'")) return null;
  const type = parseType(ctx);
  if (!type) return null;
  const node = finishNode(ctx, Node.VarDecl(names, type), start);
  tools.expectSemicolon();
  return node;
}

/**
 * `( [var] a, b : T ; ... )`; the opening parenthesis is current.
 */
function parseParams(ctx: ParserContext, tools: ParserTools): ParamGroup[] {
  ctx.next();
  const groups: ParamGroup[] = [];
  do {
    const start = ctx.peek();
    const byRef = ctx.acceptKeyword(SemanticTokenKind.VAR) !== null;
    const names = tools.parseIdentList('parameter name');
    if (names.length === 0) break;
    if (!ctx.expectDelimiter(':', "':'")) break;
    const type = parseType(ctx);
    if (!type) break;
    groups.push(finishNode(ctx, Node.ParamGroup(names, type, byRef), start));
  } while (ctx.acceptDelimiter(';'));
  ctx.expectDelimiter(')', "')'");
  return groups;
}

interface SubprogramHeader {
  name: string;
  params: ParamGroup[];
  returnType: TypeNode | null;
}

function parseHeader(ctx: ParserContext, tools: ParserTools, isFunction: boolean): SubprogramHeader {
  const what = isFunction ? 'function declaration' : 'procedure declaration';
  const header = ctx.withDeclaration(what, (): SubprogramHeader => {
    const name = ctx.expectIdentifier(isFunction ? 'function name' : 'procedure name');
    const params = name && ctx.atDelimiter('(') ? parseParams(ctx, tools) : [];
    let returnType: TypeNode | null = null;
    if (isFunction && ctx.expectDelimiter(':', "':'")) {
      returnType = parseType(ctx);
    }
    tools.expectSemicolon();
    return { name: name?.lexeme ?? '', params, returnType };
  });

  if (ctx.panicking) {
    ctx.synchronize();
    ctx.acceptDelimiter(';');
  }
  return header;
}

function parseProcedure(ctx: ParserContext, tools: ParserTools): ProcedureDecl {
  const start = ctx.next();
  const { name, params } = parseHeader(ctx, tools, false);
  const decls = parseDeclarationPart(ctx, tools);
  const body = parseBlock(ctx, tools);
  const node = finishNode(ctx, Node.ProcedureDecl(name, params, decls, body), start);
  tools.expectSemicolon();
  return node;
}

function parseFunction(ctx: ParserContext, tools: ParserTools): FunctionDecl {
  const start = ctx.next();
  const header = parseHeader(ctx, tools, true);
  // Placeholder when the result type did not parse; the error is already recorded
  const returnType = header.returnType ?? assignSpan(Node.NamedType(''), pointSpan(start));
  const decls = parseDeclarationPart(ctx, tools);
  const body = parseBlock(ctx, tools);
  const node = finishNode(ctx, Node.FunctionDecl(header.name, header.params, returnType, decls, body), start);
  tools.expectSemicolon();
  return node;
}
