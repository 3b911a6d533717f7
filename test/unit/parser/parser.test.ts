import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parse } from '../../../src/parser.js';
import type { ParseResult } from '../../../src/parser.js';
import { lex } from '../../../src/frontend/lexer.js';
import { formatTree } from '../../../src/ast/printer.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import type { Program } from '../../../src/types.js';

function parseSource(source: string): ParseResult {
  return parse(lex(source));
}

function parseClean(source: string): Program {
  const { ast, diagnostics } = parseSource(source);
  assert.deepEqual(
    diagnostics.map(d => d.message),
    [],
    'expected no syntax errors'
  );
  assert.ok(ast);
  return ast;
}

function outline(source: string): string[] {
  return formatTree(parseClean(source)).split('\n');
}

describe('parser: program structure', () => {
  it('parses a header, a variable section and a body', () => {
    const source = [
      'program hello(input, output);',
      'var x, y: integer;',
      'begin',
      '  x := 1;',
      "  writeln('hi')",
      'end.',
    ].join('\n');
    assert.deepEqual(outline(source), [
      'Program hello(input, output)',
      '  VarDecl x, y',
      '    SimpleType integer',
      '  Block',
      '    Assignment',
      '      VarRef x',
      '      Literal integer 1',
      '    ProcedureCall writeln',
      "      Literal string 'hi'",
    ]);
  });

  it('builds the same tree from Indonesian keywords', () => {
    const english = 'program p; var n: integer; begin if n > 0 then n := 0 else n := 1 end.';
    const indonesian = 'program p; variabel n: integer; mulai jika n > 0 maka n := 0 selain_itu n := 1 selesai.';
    assert.deepEqual(outline(indonesian), outline(english));
  });

  it('accepts mixed-language keywords in one program', () => {
    assert.deepEqual(outline('program p; begin x := 1 selesai.'), [
      'Program p',
      '  Block',
      '    Assignment',
      '      VarRef x',
      '      Literal integer 1',
    ]);
  });

  it('spans the program through the final dot', () => {
    const ast = parseClean('program p; begin end.');
    assert.deepEqual(ast.span.start, { line: 1, col: 1, offset: 0 });
    assert.deepEqual(ast.span.end, { line: 1, col: 22, offset: 21 });
    assert.equal(ast.body.span.start.offset, 11);
    assert.equal(ast.body.span.end.offset, 20);
  });

  it('parses constants, types and arrays', () => {
    const source = [
      'program shapes;',
      'const max = 10; low = -5;',
      "type idx = 1..max; letters = 'a'..'z';",
      '  row = array [1..max] of real; alias = idx;',
      'begin end.',
    ].join('\n');
    assert.deepEqual(outline(source), [
      'Program shapes',
      '  ConstDecl max',
      '    Literal integer 10',
      '  ConstDecl low',
      '    UnaryOp -',
      '      Literal integer 5',
      '  TypeDecl idx',
      '    SubrangeType',
      '      Literal integer 1',
      '      VarRef max',
      '  TypeDecl letters',
      '    SubrangeType',
      "      Literal char 'a'",
      "      Literal char 'z'",
      '  TypeDecl row',
      '    ArrayType',
      '      SubrangeType',
      '        Literal integer 1',
      '        VarRef max',
      '      SimpleType real',
      '  TypeDecl alias',
      '    NamedType idx',
      '  Block',
    ]);
  });

  it('parses procedures and functions with their own declarations', () => {
    const source = [
      'program subs;',
      'procedure swap(var a, b: integer; c: char);',
      'var t: integer;',
      'begin t := a; a := b; b := t end;',
      'function square(n: integer): integer;',
      'begin square := n * n end;',
      'begin end.',
    ].join('\n');
    assert.deepEqual(outline(source), [
      'Program subs',
      '  ProcedureDecl swap',
      '    ParamGroup var a, b',
      '      SimpleType integer',
      '    ParamGroup c',
      '      SimpleType char',
      '    VarDecl t',
      '      SimpleType integer',
      '    Block',
      '      Assignment',
      '        VarRef t',
      '        VarRef a',
      '      Assignment',
      '        VarRef a',
      '        VarRef b',
      '      Assignment',
      '        VarRef b',
      '        VarRef t',
      '  FunctionDecl square',
      '    ParamGroup n',
      '      SimpleType integer',
      '    SimpleType integer',
      '    Block',
      '      Assignment',
      '        VarRef square',
      '        BinaryOp *',
      '          VarRef n',
      '          VarRef n',
      '  Block',
    ]);
  });

  it('reads a body without a header as an unnamed program after one error', () => {
    const { ast, diagnostics } = parseSource('begin end.');
    assert.ok(ast);
    assert.equal(ast.name, '');
    assert.deepEqual(
      diagnostics.map(d => [d.code, d.message]),
      [[DiagnosticCode.P001_UnexpectedToken, "Expected 'program', found 'begin'"]]
    );
  });

  it('gives up without a program header or begin', () => {
    const { ast, diagnostics } = parseSource('x := 1');
    assert.equal(ast, null);
    assert.equal(diagnostics.length, 1);
    assert.equal(diagnostics[0].code, DiagnosticCode.P005_MalformedProgram);
    assert.equal(diagnostics[0].message, "No program header or 'begin' block found");
    assert.equal(diagnostics[0].found.lexeme, 'x');
  });

  it('reports input after the final dot', () => {
    const { diagnostics } = parseSource('program p; begin end. x');
    assert.deepEqual(
      diagnostics.map(d => [d.code, d.message]),
      [[DiagnosticCode.P006_TrailingInput, "Unexpected 'x' after end of program"]]
    );
  });

  it('reports a missing final dot', () => {
    const { ast, diagnostics } = parseSource('program p; begin end');
    assert.ok(ast);
    assert.deepEqual(
      diagnostics.map(d => d.message),
      ["Expected '.', found end of file"]
    );
  });

  it('skips tokens the lexer marked invalid', () => {
    const { diagnostics } = parseSource('program p; begin x := 1 $ end.');
    assert.deepEqual(diagnostics, []);
  });
});

describe('parser: statements', () => {
  it('gives a dangling else to the nearest if', () => {
    assert.deepEqual(outline('program p; begin if a then if b then x := 1 else x := 2 end.').slice(1), [
      '  Block',
      '    IfStmt',
      '      VarRef a',
      '      IfStmt',
      '        VarRef b',
      '        Assignment',
      '          VarRef x',
      '          Literal integer 1',
      '        Assignment',
      '          VarRef x',
      '          Literal integer 2',
    ]);
  });

  it('parses while and both kinds of for loop', () => {
    const source = 'program p; begin while i < 10 do i := i + 1; for i := 10 downto 1 do writeln(i); for j := 1 to n do end.';
    assert.deepEqual(outline(source).slice(1), [
      '  Block',
      '    WhileStmt',
      '      BinaryOp <',
      '        VarRef i',
      '        Literal integer 10',
      '      Assignment',
      '        VarRef i',
      '        BinaryOp +',
      '          VarRef i',
      '          Literal integer 1',
      '    ForStmt i downto',
      '      Literal integer 10',
      '      Literal integer 1',
      '      ProcedureCall writeln',
      '        VarRef i',
      '    ForStmt j to',
      '      Literal integer 1',
      '      VarRef n',
      '      EmptyStmt',
    ]);
  });

  it('drops empty statements from lists', () => {
    assert.deepEqual(outline('program p; begin begin x := 1 end; ; end.').slice(1), [
      '  Block',
      '    CompoundStmt',
      '      Assignment',
      '        VarRef x',
      '        Literal integer 1',
    ]);
  });

  it('parses indexed targets, calls and calls without arguments', () => {
    assert.deepEqual(outline('program p; begin a[i + 1] := f(x, 2); clrscr end.').slice(1), [
      '  Block',
      '    Assignment',
      '      VarRef a',
      '        BinaryOp +',
      '          VarRef i',
      '          Literal integer 1',
      '      FunctionCall f',
      '        VarRef x',
      '        Literal integer 2',
      '    ProcedureCall clrscr',
    ]);
  });
});
