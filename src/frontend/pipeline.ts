/**
 * @module frontend/pipeline
 *
 * Lex and parse a whole source text in one call.
 */

import type { Program, Token } from '../types.js';
import type { Diagnostic, SyntaxError } from '../diagnostics/diagnostics.js';
import { parse } from '../parser.js';
import { lex, lexDiagnostics } from './lexer.js';
import type { LexerOptions } from './lexer.js';

export interface CompileResult {
  readonly tokens: readonly Token[];
  /** One diagnostic per INVALID token */
  readonly lexDiagnostics: readonly Diagnostic[];
  readonly ast: Program | null;
  readonly diagnostics: readonly SyntaxError[];
}

export function compile(source: string, options?: LexerOptions): CompileResult {
  const tokens = lex(source, options);
  const { ast, diagnostics } = parse(tokens);
  return { tokens, lexDiagnostics: lexDiagnostics(tokens), ast, diagnostics };
}

/** Lexical diagnostics first, then syntax diagnostics */
export function allDiagnostics(result: CompileResult): Diagnostic[] {
  return [...result.lexDiagnostics, ...result.diagnostics];
}
