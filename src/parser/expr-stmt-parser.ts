/**
 * Statement and expression parsing.
 *
 * Expressions use precedence climbing over five binary levels, loosest
 * first: `or`, `and`, comparisons, additive, multiplicative. Comparisons do
 * not chain; `a < b < c` is reported and then read as `(a < b) < c`.
 */

import { Node } from '../ast/ast.js';
import { TokenKind, isDelimiter, isOperator } from '../frontend/tokens.js';
import { SemanticTokenKind } from '../config/token-kind.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type {
  Assignment,
  BinaryOperator,
  Block,
  CompoundStmt,
  Expression,
  ForStmt,
  IfStmt,
  ProcedureCall,
  Statement,
  Token,
  UnaryOperator,
  VarRef,
  WhileStmt,
} from '../types.js';
import type { ParserContext } from './context.js';
import type { ParserTools } from './parser-tools.js';
import { assignSpan, finishNode, pointSpan } from './span-utils.js';

export enum Precedence {
  Or = 1,
  And = 2,
  Relational = 3,
  Additive = 4,
  Multiplicative = 5,
}

interface BinaryOperatorInfo {
  readonly op: BinaryOperator;
  readonly prec: Precedence;
}

export function binaryOperatorAt(tok: Token): BinaryOperatorInfo | null {
  if (tok.kind === TokenKind.OPERATOR) {
    switch (tok.operator) {
      case '=':
      case '<>':
      case '<':
      case '<=':
      case '>':
      case '>=':
        return { op: tok.operator, prec: Precedence.Relational };
      case '+':
      case '-':
        return { op: tok.operator, prec: Precedence.Additive };
      case '*':
      case '/':
        return { op: tok.operator, prec: Precedence.Multiplicative };
      default:
        return null;
    }
  }
  if (tok.kind === TokenKind.KEYWORD) {
    switch (tok.keyword) {
      case SemanticTokenKind.OR:
        return { op: 'or', prec: Precedence.Or };
      case SemanticTokenKind.AND:
        return { op: 'and', prec: Precedence.And };
      case SemanticTokenKind.DIV:
        return { op: 'div', prec: Precedence.Multiplicative };
      case SemanticTokenKind.MOD:
        return { op: 'mod', prec: Precedence.Multiplicative };
      default:
        return null;
    }
  }
  return null;
}

function unaryOperatorAt(tok: Token): UnaryOperator | null {
  if (isOperator(tok, '-')) return '-';
  if (isOperator(tok, '+')) return '+';
  if (tok.kind === TokenKind.KEYWORD && tok.keyword === SemanticTokenKind.NOT) return 'not';
  return null;
}

function invalidExpr(at: Token): Expression {
  return assignSpan(Node.InvalidExpr(), pointSpan(at));
}

export function parseExpression(ctx: ParserContext, minPrec: Precedence = Precedence.Or): Expression {
  const start = ctx.peek();
  let left = parseUnary(ctx);
  let comparisons = 0;

  for (;;) {
    const info = binaryOperatorAt(ctx.peek());
    if (!info || info.prec < minPrec) break;
    const opTok = ctx.next();
    if (info.prec === Precedence.Relational && comparisons++ > 0) {
      ctx.report(Diagnostics.chainedComparison(opTok), false);
    }
    // Left-associative: the right operand binds only tighter operators
    const right = parseExpression(ctx, info.prec + 1);
    left = finishNode(ctx, Node.BinaryOp(info.op, left, right), start);
  }
  return left;
}

// Every expression level recurses through here, so the nesting guard sits here
function parseUnary(ctx: ParserContext): Expression {
  const start = ctx.peek();
  return ctx.nested(
    () => {
      const op = unaryOperatorAt(start);
      if (op === null) return parsePrimary(ctx);
      ctx.next();
      const operand = parseUnary(ctx);
      return finishNode(ctx, Node.UnaryOp(op, operand), start);
    },
    () => invalidExpr(start)
  );
}

function parsePrimary(ctx: ParserContext): Expression {
  const tok = ctx.peek();
  switch (tok.kind) {
    case TokenKind.INTEGER:
      ctx.next();
      return finishNode(ctx, Node.Literal({ type: 'integer', value: tok.value }), tok);
    case TokenKind.REAL:
      ctx.next();
      return finishNode(ctx, Node.Literal({ type: 'real', value: tok.value }), tok);
    case TokenKind.STRING:
      ctx.next();
      return finishNode(ctx, Node.Literal({ type: 'string', value: tok.value }), tok);
    case TokenKind.CHAR:
      ctx.next();
      return finishNode(ctx, Node.Literal({ type: 'char', value: tok.value }), tok);
    case TokenKind.KEYWORD:
      if (tok.keyword === SemanticTokenKind.TRUE || tok.keyword === SemanticTokenKind.FALSE) {
        ctx.next();
        return finishNode(ctx, Node.Literal({ type: 'boolean', value: tok.keyword === SemanticTokenKind.TRUE }), tok);
      }
      break;
    case TokenKind.IDENTIFIER: {
      ctx.next();
      if (ctx.acceptDelimiter('(')) {
        const args = parseArguments(ctx);
        return finishNode(ctx, Node.FunctionCall(tok.lexeme, args), tok);
      }
      return parseVarRef(ctx, tok);
    }
    case TokenKind.DELIMITER:
      if (tok.delimiter === '(') {
        ctx.next();
        const inner = parseExpression(ctx);
        ctx.expectDelimiter(')', "')'");
        return inner;
      }
      break;
    default:
      break;
  }
  ctx.fail('expression');
  return invalidExpr(tok);
}

/**
 * Rest of a variable reference after its name: an optional `[index]`.
 */
export function parseVarRef(ctx: ParserContext, name: Token): VarRef {
  let index: Expression | null = null;
  if (ctx.acceptDelimiter('[')) {
    index = parseExpression(ctx);
    ctx.expectDelimiter(']', "']'");
  }
  return finishNode(ctx, Node.VarRef(name.lexeme, index), name);
}

// Argument list after the opening parenthesis, through the closing one.
function parseArguments(ctx: ParserContext): Expression[] {
  const args: Expression[] = [];
  if (!ctx.atDelimiter(')')) {
    do {
      args.push(parseExpression(ctx));
    } while (ctx.acceptDelimiter(','));
  }
  ctx.expectDelimiter(')', "')'");
  return args;
}

export function parseStatement(ctx: ParserContext, tools: ParserTools): Statement {
  const tok = ctx.peek();
  return ctx.nested(
    () => parseStatementAt(ctx, tools, tok),
    () => assignSpan(Node.EmptyStmt(), pointSpan(tok))
  );
}

function parseStatementAt(ctx: ParserContext, tools: ParserTools, tok: Token): Statement {
  if (tok.kind === TokenKind.IDENTIFIER) {
    // One extra token decides between `x := ...` / `a[i] := ...` and a call
    const after = ctx.peek(1);
    return isOperator(after, ':=') || isDelimiter(after, '[') ? parseAssignment(ctx) : parseProcedureCall(ctx);
  }
  if (tok.kind === TokenKind.KEYWORD) {
    switch (tok.keyword) {
      case SemanticTokenKind.BEGIN:
        return parseCompound(ctx, tools);
      case SemanticTokenKind.IF:
        return parseIf(ctx, tools);
      case SemanticTokenKind.WHILE:
        return parseWhile(ctx, tools);
      case SemanticTokenKind.FOR:
        return parseFor(ctx, tools);
      default:
        break;
    }
  }
  return assignSpan(Node.EmptyStmt(), pointSpan(tok));
}

/**
 * Statements separated by `;` up to `end`, `.` or end of file. Empty
 * statements are dropped. Each malformed statement is reported once and the
 * parser skips to the next sync point.
 */
export function parseStatementList(ctx: ParserContext, tools: ParserTools): Statement[] {
  const statements: Statement[] = [];
  for (;;) {
    if (ctx.panicking) ctx.synchronize();

    const stmt = parseStatement(ctx, tools);
    if (stmt.kind !== 'EmptyStmt') statements.push(stmt);
    if (ctx.panicking) ctx.synchronize();

    if (ctx.acceptDelimiter(';')) continue;
    if (ctx.atKeyword(SemanticTokenKind.END) || ctx.atDelimiter('.') || ctx.atEof()) break;
    if (tools.atStatementStart()) {
      ctx.missing("';'");
      continue;
    }

    // The offending token may itself be a sync point, such as a stray `type`
    ctx.fail("';' or 'end'");
    ctx.next();
    ctx.synchronize();
  }
  return statements;
}

function parseCompound(ctx: ParserContext, tools: ParserTools): CompoundStmt {
  const begin = ctx.next();
  const statements = parseStatementList(ctx, tools);
  tools.expectEnd(begin);
  return finishNode(ctx, Node.CompoundStmt(statements), begin);
}

/**
 * `begin ... end` body of a program or subprogram.
 */
export function parseBlock(ctx: ParserContext, tools: ParserTools): Block {
  const start = ctx.peek();
  const begin = ctx.expectKeyword(SemanticTokenKind.BEGIN, "'begin'");
  const statements = parseStatementList(ctx, tools);
  tools.expectEnd(begin ?? start);
  return finishNode(ctx, Node.Block(statements), start);
}

function parseAssignment(ctx: ParserContext): Assignment {
  const name = ctx.next();
  const target = parseVarRef(ctx, name);
  const value = ctx.expectOperator(':=', "':='") ? parseExpression(ctx) : invalidExpr(ctx.peek());
  return finishNode(ctx, Node.Assignment(target, value), name);
}

function parseProcedureCall(ctx: ParserContext): ProcedureCall {
  const name = ctx.next();
  const args = ctx.acceptDelimiter('(') ? parseArguments(ctx) : [];
  return finishNode(ctx, Node.ProcedureCall(name.lexeme, args), name);
}

function parseIf(ctx: ParserContext, tools: ParserTools): IfStmt {
  const start = ctx.next();
  const condition = parseExpression(ctx);
  ctx.expectKeyword(SemanticTokenKind.THEN, "'then'");
  const thenBranch = parseStatement(ctx, tools);
  // The nearest `if` takes the `else`
  const elseBranch = ctx.acceptKeyword(SemanticTokenKind.ELSE) ? parseStatement(ctx, tools) : null;
  return finishNode(ctx, Node.IfStmt(condition, thenBranch, elseBranch), start);
}

function parseWhile(ctx: ParserContext, tools: ParserTools): WhileStmt {
  const start = ctx.next();
  const condition = parseExpression(ctx);
  ctx.expectKeyword(SemanticTokenKind.DO, "'do'");
  const body = parseStatement(ctx, tools);
  return finishNode(ctx, Node.WhileStmt(condition, body), start);
}

function parseFor(ctx: ParserContext, tools: ParserTools): ForStmt {
  const start = ctx.next();
  const variable = ctx.expectIdentifier('loop variable');
  ctx.expectOperator(':=', "':='");
  const from = parseExpression(ctx);

  let descending = false;
  if (ctx.acceptKeyword(SemanticTokenKind.DOWNTO)) {
    descending = true;
  } else if (!ctx.acceptKeyword(SemanticTokenKind.TO)) {
    ctx.fail("'to' or 'downto'");
  }

  const to = parseExpression(ctx);
  ctx.expectKeyword(SemanticTokenKind.DO, "'do'");
  const body = parseStatement(ctx, tools);
  return finishNode(ctx, Node.ForStmt(variable?.lexeme ?? '', from, to, descending, body), start);
}
