/**
 * End-to-end pipeline tests over the sample programs in test/fixtures:
 * source → lex → parse → tree and diagnostics, plus the CLI commands that
 * wrap them.
 */

import { describe, it, mock, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { allDiagnostics, compile } from '../../../src/frontend/pipeline.js';
import { describeToken } from '../../../src/frontend/tokens.js';
import { DefaultAstVisitor } from '../../../src/ast/ast_visitor.js';
import { formatTree } from '../../../src/ast/printer.js';
import { tokensCommand } from '../../../src/cli/commands/tokens.js';
import { parseCommand } from '../../../src/cli/commands/parse.js';
import type { Program, Statement } from '../../../src/types.js';

function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));
}

function fixture(name: string): string {
  return readFileSync(fixturePath(name), 'utf8');
}

function compileClean(name: string): Program {
  const result = compile(fixture(name));
  assert.deepEqual(allDiagnostics(result).map(d => d.message), []);
  assert.ok(result.ast);
  return result.ast;
}

class AssignmentTargets extends DefaultAstVisitor<string[]> {
  override visitStatement(s: Statement, names: string[]): void {
    if (s.kind === 'Assignment') names.push(s.target.name);
    super.visitStatement(s, names);
  }
}

describe('pipeline: sample programs', () => {
  it('parses the English sample without diagnostics', () => {
    const ast = compileClean('squares.en.pas');
    assert.equal(ast.name, 'squares');
    assert.deepEqual(ast.params, ['input', 'output']);
    assert.deepEqual(
      ast.decls.map(d => d.kind),
      ['ConstDecl', 'TypeDecl', 'TypeDecl', 'VarDecl', 'VarDecl', 'VarDecl', 'FunctionDecl', 'ProcedureDecl']
    );
    assert.deepEqual(
      ast.body.statements.map(s => s.kind),
      ['Assignment', 'Assignment', 'ForStmt', 'ForStmt', 'WhileStmt', 'ProcedureCall']
    );
  });

  it('parses the Indonesian sample to the same tree', () => {
    const english = compileClean('squares.en.pas');
    const indonesian = compileClean('squares.id.pas');
    assert.equal(formatTree(indonesian), formatTree(english));
  });

  it('gives both samples the same token kinds', () => {
    const english = compile(fixture('squares.en.pas')).tokens.map(describeToken);
    const indonesian = compile(fixture('squares.id.pas')).tokens.map(describeToken);
    assert.deepEqual(indonesian, english);
  });

  it('visits every assignment in source order', () => {
    const names: string[] = [];
    new AssignmentTargets().visitProgram(compileClean('squares.en.pas'), names);
    assert.deepEqual(names, ['square', 'total', 'done', 'values', 'total', 'total', 'total', 'done']);
  });

  it('reports every independent error in the malformed sample', () => {
    const result = compile(fixture('broken.pas'));
    assert.deepEqual(
      allDiagnostics(result).map(d => `${d.code} ${d.span.start.line}:${d.span.start.col} ${d.message}`),
      [
        "L001 10:19 Invalid character '#'",
        "P003 3:9 Malformed variable declaration: expected ':', found 'integer'",
        "P001 6:12 Expected expression, found ';'",
        "P001 9:3 Expected ';' or 'end', found 'type'",
        "P004 10:15 Comparison operators do not chain; parenthesise before '<'",
        "P001 10:21 Expected ';' or 'end', found '4'",
      ]
    );
    assert.ok(result.ast);
    assert.deepEqual(
      result.ast.decls.map(d => (d.kind === 'VarDecl' ? d.names : [])),
      [['ok']]
    );
    assert.deepEqual(
      result.ast.body.statements.map(s => s.kind),
      ['Assignment', 'IfStmt', 'Assignment']
    );
  });
});

describe('pipeline: CLI commands', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  function captureOutput(): { stdout: string[]; stderr: string[] } {
    const stdout: string[] = [];
    const stderr: string[] = [];
    mock.method(console, 'log', (line: string) => {
      stdout.push(line);
    });
    mock.method(console, 'error', (line: string) => {
      stderr.push(line);
    });
    return { stdout, stderr };
  }

  it('lists the tokens of a clean file and exits 0', () => {
    const out = captureOutput();
    const code = tokensCommand(fixturePath('squares.id.pas'));
    assert.equal(code, 0);
    assert.equal(out.stdout[0], '---TOKENS---');
    assert.equal(out.stdout[1], '0\tKEYWORD(PROGRAM)\t"program"\t2\t1');
    assert.equal(out.stdout[out.stdout.length - 1], '------------');
  });

  it('exits 1 when a file has lexical errors', () => {
    const out = captureOutput();
    assert.equal(tokensCommand(fixturePath('broken.pas')), 1);
    const first = out.stderr.find(line => line.startsWith('error '));
    assert.equal(first?.split('\n')[0], "error L001: Invalid character '#' at 10:19");
  });

  it('prints the tree of a clean file and exits 0', () => {
    const out = captureOutput();
    assert.equal(parseCommand(fixturePath('squares.en.pas'), {}), 0);
    assert.equal(out.stdout[0], 'Program squares(input, output)');
  });

  it('exits 1 and prints every diagnostic for a broken file', () => {
    const out = captureOutput();
    assert.equal(parseCommand(fixturePath('broken.pas'), { json: true }), 1);
    assert.equal(out.stdout.length, 1);
    assert.equal(out.stderr.filter(line => line.startsWith('error ')).length, 6);
  });
});
