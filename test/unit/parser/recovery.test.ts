import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { parse } from '../../../src/parser.js';
import type { ParseResult } from '../../../src/parser.js';
import { lex } from '../../../src/frontend/lexer.js';
import { ConfigService } from '../../../src/config/config-service.js';
import { MAX_NESTING_DEPTH } from '../../../src/parser/context.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import type { Block } from '../../../src/types.js';

function parseSource(source: string): ParseResult {
  return parse(lex(source));
}

function errors(result: ParseResult): Array<[string, string]> {
  return result.diagnostics.map(d => [d.code, d.message]);
}

function statementKinds(body: Block): string[] {
  return body.statements.map(s => s.kind);
}

describe('recovery inside statement lists', () => {
  it('reports each broken statement once and keeps the rest', () => {
    const result = parseSource('program p; begin x := ; y := ; z := 3 end.');
    assert.deepEqual(errors(result), [
      [DiagnosticCode.P001_UnexpectedToken, "Expected expression, found ';'"],
      [DiagnosticCode.P001_UnexpectedToken, "Expected expression, found ';'"],
    ]);
    assert.ok(result.ast);
    assert.deepEqual(statementKinds(result.ast.body), ['Assignment', 'Assignment', 'Assignment']);
  });

  it('carries on after a missing semicolon between statements', () => {
    const result = parseSource('program p; begin x := 1 y := 2 end.');
    assert.deepEqual(errors(result), [[DiagnosticCode.P001_UnexpectedToken, "Expected ';', found 'y'"]]);
    assert.ok(result.ast);
    assert.equal(result.ast.body.statements.length, 2);
  });

  it('skips a declaration misplaced in a body', () => {
    const result = parseSource('program p; begin x := 1; type t = integer; y := 2 end.');
    assert.deepEqual(errors(result), [[DiagnosticCode.P001_UnexpectedToken, "Expected ';' or 'end', found 'type'"]]);
    assert.ok(result.ast);
    assert.deepEqual(statementKinds(result.ast.body), ['Assignment', 'Assignment']);
  });

  it('blames a token only once', () => {
    const result = parseSource('program p; begin x := type t = integer; y := 1 end.');
    assert.deepEqual(errors(result), [[DiagnosticCode.P001_UnexpectedToken, "Expected expression, found 'type'"]]);
    assert.ok(result.ast);
    assert.deepEqual(statementKinds(result.ast.body), ['Assignment', 'Assignment']);
  });

  it('suppresses follow-on errors until the next sync point', () => {
    const result = parseSource('program p; begin if a x := ) ( end.');
    assert.deepEqual(errors(result), [[DiagnosticCode.P001_UnexpectedToken, "Expected 'then', found 'x'"]]);
  });

  it('reports a missing loop direction', () => {
    const result = parseSource('program p; begin for i := 1 10 do x := i end.');
    assert.deepEqual(errors(result), [[DiagnosticCode.P001_UnexpectedToken, "Expected 'to' or 'downto', found '10'"]]);
  });
});

describe('unclosed blocks', () => {
  it('names the opening keyword as written', () => {
    assert.deepEqual(errors(parseSource('program p; mulai x := 1')), [
      [DiagnosticCode.P002_UnclosedBlock, "Block opened by 'mulai' is never closed"],
    ]);
  });

  it('stops at the final dot', () => {
    const result = parseSource('program p; begin x := 1.');
    assert.deepEqual(errors(result), [[DiagnosticCode.P002_UnclosedBlock, "Block opened by 'begin' is never closed"]]);
    assert.equal(result.diagnostics[0].span.start.offset, 23);
  });

  it('reports every block left open', () => {
    const result = parseSource('program p; begin begin x := 1 .');
    assert.deepEqual(
      result.diagnostics.map(d => d.code),
      [DiagnosticCode.P002_UnclosedBlock, DiagnosticCode.P002_UnclosedBlock]
    );
  });
});

describe('malformed declarations', () => {
  it('drops a bad variable entry and keeps the next one', () => {
    const result = parseSource('program p; var x integer; y: real; begin end.');
    assert.deepEqual(errors(result), [
      [DiagnosticCode.P003_MalformedDeclaration, "Malformed variable declaration: expected ':', found 'integer'"],
    ]);
    assert.ok(result.ast);
    assert.deepEqual(
      result.ast.decls.map(d => (d.kind === 'VarDecl' ? d.names.join(',') : d.kind)),
      ['y']
    );
  });

  it('reports a missing type', () => {
    const result = parseSource('program p; var x: ; y: integer; begin end.');
    assert.deepEqual(errors(result), [
      [DiagnosticCode.P003_MalformedDeclaration, "Malformed variable declaration: expected type, found ';'"],
    ]);
  });

  it('treats a missing semicolon before begin as an insertion', () => {
    const result = parseSource('program p; var x: integer begin end.');
    assert.deepEqual(errors(result), [
      [DiagnosticCode.P003_MalformedDeclaration, "Malformed variable declaration: expected ';', found 'begin'"],
    ]);
    assert.ok(result.ast);
    assert.equal(result.ast.decls.length, 1);
  });

  it('requires at least one entry in a section', () => {
    const result = parseSource('program p; const begin end.');
    assert.deepEqual(errors(result), [
      [DiagnosticCode.P003_MalformedDeclaration, "Malformed constant declaration: expected identifier, found 'begin'"],
    ]);
  });

  it('reports a nameless program', () => {
    const result = parseSource('program ; begin end.');
    assert.deepEqual(errors(result), [
      [DiagnosticCode.P003_MalformedDeclaration, "Malformed program header: expected program name, found ';'"],
    ]);
    assert.equal(result.ast?.name, '');
  });

  it('reports a nameless procedure and still parses its body', () => {
    const result = parseSource('program p; procedure ; begin end; begin end.');
    assert.deepEqual(errors(result), [
      [DiagnosticCode.P003_MalformedDeclaration, "Malformed procedure declaration: expected procedure name, found ';'"],
    ]);
    assert.equal(result.ast?.decls[0]?.kind, 'ProcedureDecl');
  });

  it('gives a function without a result type a placeholder', () => {
    const result = parseSource('program p; function f: ; begin end; begin end.');
    assert.deepEqual(errors(result), [
      [DiagnosticCode.P003_MalformedDeclaration, "Malformed function declaration: expected type, found ';'"],
    ]);
    const decl = result.ast?.decls[0];
    assert.equal(decl?.kind, 'FunctionDecl');
    assert.ok(decl?.kind === 'FunctionDecl');
    const returnType = decl.returnType;
    assert.ok(returnType.kind === 'NamedType');
    assert.equal(returnType.name, '');
  });
});

describe('error limit', () => {
  afterEach(() => {
    delete process.env.PASCALS_MAX_ERRORS;
    ConfigService.resetForTesting();
  });

  it('stops after PASCALS_MAX_ERRORS errors', () => {
    process.env.PASCALS_MAX_ERRORS = '2';
    ConfigService.resetForTesting();

    const result = parseSource('program p; begin a := ; b := ; c := ; d := ; end.');
    assert.deepEqual(errors(result), [
      [DiagnosticCode.P001_UnexpectedToken, "Expected expression, found ';'"],
      [DiagnosticCode.P001_UnexpectedToken, "Expected expression, found ';'"],
      [DiagnosticCode.P007_TooManyErrors, 'Too many errors (2); parsing stopped'],
    ]);
    assert.ok(result.ast);
  });
});

describe('nesting limit', () => {
  const stopped = `Nesting deeper than ${MAX_NESTING_DEPTH} levels; parsing stopped`;

  it('follows nesting below the limit', () => {
    const depth = 200;
    const result = parseSource(`program p; begin x := ${'('.repeat(depth)}1${')'.repeat(depth)} end.`);
    assert.deepEqual(result.diagnostics, []);
  });

  it('stops at the parenthesis that goes too deep', () => {
    const depth = 20000;
    const result = parseSource(`program p; begin x := ${'('.repeat(depth)}1${')'.repeat(depth)} end.`);
    assert.deepEqual(errors(result), [[DiagnosticCode.P008_NestingTooDeep, stopped]]);
    const [error] = result.diagnostics;
    assert.equal(error.found.lexeme, '(');
    // Statement level plus 255 parentheses
    assert.equal(error.span.start.offset, 'program p; begin x := '.length + 255);
    assert.ok(result.ast);
  });

  it('stops on long runs of unary operators', () => {
    const result = parseSource(`program p; begin x := ${'- '.repeat(20000)}1 end.`);
    assert.deepEqual(errors(result), [[DiagnosticCode.P008_NestingTooDeep, stopped]]);
  });

  it('stops on deeply nested blocks', () => {
    const depth = 300;
    const result = parseSource(`program p; ${'begin '.repeat(depth)}x := 1${' end'.repeat(depth)}.`);
    assert.deepEqual(errors(result), [[DiagnosticCode.P008_NestingTooDeep, stopped]]);
    // The program block is not counted, so the 258th begin is the first too deep
    assert.equal(result.diagnostics[0].span.start.offset, 'program p; '.length + 'begin '.length * 257);
  });

  it('stops on deeply nested routines and array types', () => {
    const depth = 300;
    const routines = parseSource(`program p; ${'procedure q; '.repeat(depth)}${'begin end; '.repeat(depth)}begin end.`);
    assert.deepEqual(errors(routines), [[DiagnosticCode.P008_NestingTooDeep, stopped]]);

    const arrays = parseSource(`program p; var a: ${'array [1..2] of '.repeat(depth)}integer; begin end.`);
    assert.deepEqual(errors(arrays), [[DiagnosticCode.P008_NestingTooDeep, stopped]]);
  });
});
