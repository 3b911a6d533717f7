/**
 * Listings printed by the `pascals` command. Pure functions of the source
 * text so the output can be checked without touching the file system.
 */

import type { Token } from '../types.js';
import type { Diagnostic } from '../diagnostics/diagnostics.js';
import { formatDiagnostic, hasErrors } from '../diagnostics/diagnostics.js';
import { describeToken } from '../frontend/tokens.js';
import { lex, lexDiagnostics } from '../frontend/lexer.js';
import { compile, allDiagnostics } from '../frontend/pipeline.js';
import { formatTree } from '../ast/printer.js';

export const TOKENS_HEADER = '---TOKENS---';
export const TOKENS_FOOTER = '------------';

export interface Report {
  /** Lines for stdout */
  readonly output: readonly string[];
  /** Rendered diagnostics, for stderr */
  readonly diagnostics: readonly string[];
  readonly failed: boolean;
}

/**
 * One token per line, tab separated: index, kind, lexeme (JSON-quoted),
 * line, column.
 */
export function formatToken(token: Token, index: number): string {
  return [String(index), describeToken(token), JSON.stringify(token.lexeme), String(token.start.line), String(token.start.col)].join('\t');
}

export function formatTokenListing(tokens: readonly Token[]): string[] {
  return [TOKENS_HEADER, ...tokens.map(formatToken), TOKENS_FOOTER];
}

function renderDiagnostics(diagnostics: readonly Diagnostic[], source: string): string[] {
  return diagnostics.map(d => formatDiagnostic(d, source));
}

export function tokensReport(source: string): Report {
  const tokens = lex(source);
  const diagnostics = lexDiagnostics(tokens);
  return {
    output: formatTokenListing(tokens),
    diagnostics: renderDiagnostics(diagnostics, source),
    failed: hasErrors(diagnostics),
  };
}

/** Integer literal values are bigints; JSON carries them as decimal strings */
function jsonValue(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function parseReport(source: string, options: { json?: boolean } = {}): Report {
  const result = compile(source);
  const diagnostics = allDiagnostics(result);

  let output: string[];
  if (options.json) {
    output = [JSON.stringify({ ast: result.ast, diagnostics }, jsonValue, 2)];
  } else {
    output = result.ast ? formatTree(result.ast).split('\n') : [];
  }

  return {
    output,
    diagnostics: renderDiagnostics(diagnostics, source),
    failed: hasErrors(diagnostics),
  };
}
