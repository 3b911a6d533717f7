import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parse } from '../../../src/parser.js';
import { lex } from '../../../src/frontend/lexer.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import type { SyntaxError } from '../../../src/diagnostics/diagnostics.js';
import type { Expression } from '../../../src/types.js';

/** Fully parenthesised rendering of an expression tree */
function show(expr: Expression): string {
  switch (expr.kind) {
    case 'BinaryOp':
      return `(${show(expr.left)} ${expr.op} ${show(expr.right)})`;
    case 'UnaryOp':
      return `(${expr.op} ${show(expr.operand)})`;
    case 'Literal':
      return expr.literal.type === 'string' || expr.literal.type === 'char'
        ? `'${expr.literal.value}'`
        : String(expr.literal.value);
    case 'VarRef':
      return expr.index ? `${expr.name}[${show(expr.index)}]` : expr.name;
    case 'FunctionCall':
      return `${expr.name}(${expr.args.map(show).join(', ')})`;
    case 'InvalidExpr':
      return '?';
  }
}

function parseExpr(text: string): { expr: Expression; diagnostics: SyntaxError[] } {
  const { ast, diagnostics } = parse(lex(`program e; begin x := ${text} end.`));
  assert.ok(ast);
  const [stmt] = ast.body.statements;
  assert.equal(stmt.kind, 'Assignment');
  assert.ok(stmt.kind === 'Assignment');
  return { expr: stmt.value, diagnostics };
}

function shape(text: string): string {
  const { expr, diagnostics } = parseExpr(text);
  assert.deepEqual(diagnostics.map(d => d.message), []);
  return show(expr);
}

describe('expressions: literals', () => {
  it('keeps integer literals exact', () => {
    assert.equal(shape('99999999999999999999'), '99999999999999999999');
    assert.equal(shape('9007199254740993 + 1'), '(9007199254740993 + 1)');
  });
});

describe('expressions: precedence', () => {
  it('binds multiplication tighter than addition', () => {
    assert.equal(shape('1 + 2 * 3'), '(1 + (2 * 3))');
    assert.equal(shape('1 * 2 + 3'), '((1 * 2) + 3)');
  });

  it('associates each level to the left', () => {
    assert.equal(shape('1 - 2 - 3'), '((1 - 2) - 3)');
    assert.equal(shape('a div b mod c'), '((a div b) mod c)');
    assert.equal(shape('a / b * c'), '((a / b) * c)');
  });

  it('orders or below and below comparisons', () => {
    assert.equal(shape('a or b and c'), '(a or (b and c))');
    assert.equal(shape('a = b and c <> d'), '((a = b) and (c <> d))');
    assert.equal(shape('a + b >= c * d'), '((a + b) >= (c * d))');
  });

  it('applies prefix operators to the nearest operand', () => {
    assert.equal(shape('not a and b'), '((not a) and b)');
    assert.equal(shape('-x * y'), '((- x) * y)');
    assert.equal(shape('- - 1'), '(- (- 1))');
    assert.equal(shape('tidak benar'), '(not true)');
  });

  it('lets parentheses override precedence', () => {
    assert.equal(shape('(1 + 2) * 3'), '((1 + 2) * 3)');
    assert.equal(shape('a and (b or c)'), '(a and (b or c))');
  });

  it('parses calls, indexing and literals as operands', () => {
    assert.equal(shape('f(1, g(y)) + a[i]'), '(f(1, g(y)) + a[i])');
    assert.equal(shape("'ok' = s"), "('ok' = s)");
    assert.equal(shape('2.5 * r'), '(2.5 * r)');
    assert.equal(shape('f()'), 'f()');
  });

  it('spans a binary expression from its first to its last operand', () => {
    const { expr } = parseExpr('1 + 22');
    // `program e; begin x := ` is 22 characters
    assert.equal(expr.span.start.offset, 22);
    assert.equal(expr.span.end.offset, 28);
  });
});

describe('expressions: comparison chains', () => {
  it('reports a chained comparison and keeps a left-leaning tree', () => {
    const { expr, diagnostics } = parseExpr('a < b < c');
    assert.equal(show(expr), '((a < b) < c)');
    assert.equal(diagnostics.length, 1);
    assert.equal(diagnostics[0].code, DiagnosticCode.P004_ChainedComparison);
    assert.equal(diagnostics[0].message, "Comparison operators do not chain; parenthesise before '<'");
    assert.equal(diagnostics[0].span.start.col, 29);
  });

  it('reports every extra comparison in the chain', () => {
    const { diagnostics } = parseExpr('a = b = c = d');
    assert.deepEqual(
      diagnostics.map(d => d.code),
      [DiagnosticCode.P004_ChainedComparison, DiagnosticCode.P004_ChainedComparison]
    );
  });

  it('allows parenthesised comparisons on either side', () => {
    assert.equal(shape('(a < b) = (c < d)'), '((a < b) = (c < d))');
  });
});

describe('expressions: errors', () => {
  it('stands in an invalid node for a missing operand', () => {
    const { expr, diagnostics } = parseExpr('1 <');
    assert.equal(show(expr), '(1 < ?)');
    assert.deepEqual(diagnostics.map(d => d.message), ["Expected expression, found 'end'"]);
  });

  it('reports a missing closing parenthesis', () => {
    const { expr, diagnostics } = parseExpr('(1 + 2');
    assert.equal(show(expr), '(1 + 2)');
    assert.deepEqual(diagnostics.map(d => d.message), ["Expected ')', found 'end'"]);
  });
});
