// Structured diagnostics with error codes and spans

import type { Position, Span, Token } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
}

export enum DiagnosticCode {
  // Lexer errors (L001-L099)
  L001_InvalidCharacter = 'L001',
  L002_UnterminatedString = 'L002',
  L003_UnterminatedComment = 'L003',

  // Parser errors (P001-P099)
  P001_UnexpectedToken = 'P001',
  P002_UnclosedBlock = 'P002',
  P003_MalformedDeclaration = 'P003',
  P004_ChainedComparison = 'P004',
  P005_MalformedProgram = 'P005',
  P006_TrailingInput = 'P006',
  P007_TooManyErrors = 'P007',
  P008_NestingTooDeep = 'P008',

  // Configuration errors (C001-C099)
  C001_InvalidDfaRules = 'C001',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
}

export type SyntaxErrorKind =
  | 'UnexpectedToken'
  | 'UnclosedBlock'
  | 'MalformedDeclaration'
  | 'ChainedComparison'
  | 'MalformedProgram'
  | 'TrailingInput'
  | 'TooManyErrors'
  | 'NestingTooDeep';

/**
 * A parser diagnostic that remembers what was expected and which token was
 * found instead.
 */
export interface SyntaxError extends Diagnostic {
  readonly kind: SyntaxErrorKind;
  readonly expected: string;
  readonly found: Token;
}

const SYNTAX_CODES: Record<SyntaxErrorKind, DiagnosticCode> = {
  UnexpectedToken: DiagnosticCode.P001_UnexpectedToken,
  UnclosedBlock: DiagnosticCode.P002_UnclosedBlock,
  MalformedDeclaration: DiagnosticCode.P003_MalformedDeclaration,
  ChainedComparison: DiagnosticCode.P004_ChainedComparison,
  MalformedProgram: DiagnosticCode.P005_MalformedProgram,
  TrailingInput: DiagnosticCode.P006_TrailingInput,
  TooManyErrors: DiagnosticCode.P007_TooManyErrors,
  NestingTooDeep: DiagnosticCode.P008_NestingTooDeep,
};

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  static warning(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withSpan(span: Span): DiagnosticBuilder {
    this.span = span;
    return this;
  }

  withPosition(pos: Position): DiagnosticBuilder {
    this.span = { start: pos, end: pos };
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
    };
  }

  /**
   * Build a parser diagnostic for `found`, which also fixes the span.
   */
  buildSyntaxError(kind: SyntaxErrorKind, expected: string, found: Token): SyntaxError {
    this.withCode(SYNTAX_CODES[kind]).withSpan({ start: found.start, end: found.end });
    return { ...this.build(), kind, expected, found };
  }
}

/**
 * Human-readable description of a token for messages: `'begin'`, `end of file`.
 */
export function describeFound(token: Token): string {
  return token.lexeme === '' ? 'end of file' : `'${token.lexeme}'`;
}

// Common diagnostic patterns
export const Diagnostics = {
  invalidCharacter: (char: string, span: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L001_InvalidCharacter)
      .withMessage(`Invalid character '${char}'`)
      .withSpan(span),

  unterminatedString: (span: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L002_UnterminatedString)
      .withMessage('Unterminated string literal')
      .withSpan(span),

  unterminatedComment: (span: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L003_UnterminatedComment)
      .withMessage('Unterminated comment')
      .withSpan(span),

  unexpectedToken: (expected: string, found: Token): SyntaxError =>
    new DiagnosticBuilder()
      .withMessage(`Expected ${expected}, found ${describeFound(found)}`)
      .buildSyntaxError('UnexpectedToken', expected, found),

  unclosedBlock: (opener: string, found: Token): SyntaxError =>
    new DiagnosticBuilder()
      .withMessage(`Block opened by '${opener}' is never closed`)
      .buildSyntaxError('UnclosedBlock', "'end'", found),

  malformedDeclaration: (what: string, expected: string, found: Token): SyntaxError =>
    new DiagnosticBuilder()
      .withMessage(`Malformed ${what}: expected ${expected}, found ${describeFound(found)}`)
      .buildSyntaxError('MalformedDeclaration', expected, found),

  chainedComparison: (found: Token): SyntaxError =>
    new DiagnosticBuilder()
      .withMessage(`Comparison operators do not chain; parenthesise before ${describeFound(found)}`)
      .buildSyntaxError('ChainedComparison', 'a single comparison', found),

  malformedProgram: (found: Token): SyntaxError =>
    new DiagnosticBuilder()
      .withMessage("No program header or 'begin' block found")
      .buildSyntaxError('MalformedProgram', "'program' header", found),

  trailingInput: (found: Token): SyntaxError =>
    new DiagnosticBuilder()
      .withMessage(`Unexpected ${describeFound(found)} after end of program`)
      .buildSyntaxError('TrailingInput', 'end of file', found),

  tooManyErrors: (limit: number, found: Token): SyntaxError =>
    new DiagnosticBuilder()
      .withMessage(`Too many errors (${limit}); parsing stopped`)
      .buildSyntaxError('TooManyErrors', 'fewer errors', found),

  nestingTooDeep: (limit: number, found: Token): SyntaxError =>
    new DiagnosticBuilder()
      .withMessage(`Nesting deeper than ${limit} levels; parsing stopped`)
      .buildSyntaxError('NestingTooDeep', 'shallower nesting', found),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, code, message, span } = diagnostic;
  const pos = `${span.start.line}:${span.start.col}`;

  let result = `${severity} ${code}: ${message} at ${pos}`;

  if (source) {
    const lines = source.split(/\r\n|\r|\n/);
    const line = lines[span.start.line - 1];
    if (line !== undefined) {
      result += `\n> ${span.start.line}| ${line}`;
      result += `\n> ${' '.repeat(String(span.start.line).length)}  ${' '.repeat(span.start.col - 1)}^`;
    }
  }

  return result;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === DiagnosticSeverity.Error);
}
