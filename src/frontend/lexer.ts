/**
 * @module lexer
 *
 * Lexer: drives the DFA engine over a {@link CharStream} and turns accepted
 * lexemes into tokens.
 *
 * - Whitespace and comments are consumed but never emitted.
 * - Identifier lexemes found in the keyword index become KEYWORD tokens, so
 *   `begin`, `BEGIN` and `mulai` all carry {@link SemanticTokenKind.BEGIN}.
 * - A quoted literal of exactly one character is a CHAR token.
 * - Lexical errors become one INVALID token each and scanning carries on
 *   after the offending text.
 * - Every stream ends with exactly one EOF token.
 *
 * The stream is lazy and single-pass. To scan again, create a new one.
 */

import { TokenKind } from '../types.js';
import type { InvalidToken, LexErrorKind, Position, Span, Token } from '../types.js';
import type { Diagnostic } from '../diagnostics/diagnostics.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { defaultKeywordIndex } from '../config/lexicons/index.js';
import type { KeywordIndex } from '../config/lexicons/index.js';
import { createLogger } from '../utils/logger.js';
import { CharStream } from './char-stream.js';
import { runDfa } from './dfa/engine.js';
import type { DfaMatch } from './dfa/engine.js';
import { defaultDfaTable } from './dfa/rules.js';
import type { DfaTable } from './dfa/rules.js';
import { isDelimiterText, isOperatorText } from './tokens.js';

export interface LexerOptions {
  /** Keyword spellings to recognise; defaults to every built-in lexicon */
  readonly keywordIndex?: KeywordIndex;
  /** Automaton to run; defaults to the process-wide rule table */
  readonly table?: DfaTable;
}

const logger = createLogger('lexer');

function lexErrorDiagnostic(reason: LexErrorKind, lexeme: string, span: Span): Diagnostic {
  switch (reason) {
    case 'InvalidCharacter':
      return Diagnostics.invalidCharacter(lexeme, span).build();
    case 'UnterminatedString':
      return Diagnostics.unterminatedString(span).build();
    case 'UnterminatedComment':
      return Diagnostics.unterminatedComment(span).build();
  }
}

/**
 * Collapse a quoted lexeme to its contents: strip the outer quotes and turn
 * each doubled quote into one.
 */
export function unquote(lexeme: string): string {
  return lexeme.slice(1, -1).replace(/''/g, "'");
}

export class TokenStream implements IterableIterator<Token> {
  private readonly stream: CharStream;
  private readonly keywordIndex: KeywordIndex;
  private readonly table: DfaTable;
  private finished = false;
  private emitted = 0;

  constructor(source: string, options: LexerOptions = {}) {
    this.stream = new CharStream(source);
    this.keywordIndex = options.keywordIndex ?? defaultKeywordIndex();
    this.table = options.table ?? defaultDfaTable();
  }

  [Symbol.iterator](): IterableIterator<Token> {
    return this;
  }

  next(): IteratorResult<Token> {
    if (this.finished) {
      return { done: true, value: undefined };
    }
    return { done: false, value: this.scan() };
  }

  private scan(): Token {
    for (;;) {
      if (this.stream.atEnd) {
        this.finished = true;
        const end = this.stream.position;
        logger.debug('Lexing finished', { tokens: this.emitted + 1, length: this.stream.text.length });
        return this.emit({ kind: TokenKind.EOF, lexeme: '', start: end, end });
      }

      const result = runDfa(this.table, this.stream);
      if (!result.ok) {
        this.stream.reset(result.end);
        return this.emit(this.invalid(result.error, result.lexeme, result.start, result.end));
      }

      if (result.accept === 'Whitespace' || result.accept === 'Comment') continue;
      return this.emit(this.fromMatch(result));
    }
  }

  private emit(token: Token): Token {
    this.emitted++;
    return Object.freeze(token);
  }

  private invalid(reason: LexErrorKind, lexeme: string, start: Position, end: Position): InvalidToken {
    const message = lexErrorDiagnostic(reason, lexeme, { start, end }).message;
    return { kind: TokenKind.INVALID, lexeme, start, end, reason, message };
  }

  private fromMatch(match: DfaMatch): Token {
    const { lexeme, start, end } = match;
    switch (match.accept) {
      case 'Identifier': {
        const keyword = this.keywordIndex.get(lexeme.toLowerCase());
        return keyword === undefined
          ? { kind: TokenKind.IDENTIFIER, lexeme, start, end }
          : { kind: TokenKind.KEYWORD, keyword, lexeme, start, end };
      }
      case 'IntegerLiteral':
        return { kind: TokenKind.INTEGER, value: BigInt(lexeme), lexeme, start, end };
      case 'RealLiteral':
        return { kind: TokenKind.REAL, value: Number(lexeme), lexeme, start, end };
      case 'StringLiteral': {
        const value = unquote(lexeme);
        const kind = Array.from(value).length === 1 ? TokenKind.CHAR : TokenKind.STRING;
        return { kind, value, lexeme, start, end };
      }
      case 'Operator':
        if (isOperatorText(lexeme)) {
          return { kind: TokenKind.OPERATOR, operator: lexeme, lexeme, start, end };
        }
        return this.invalid('InvalidCharacter', lexeme, start, end);
      case 'Delimiter':
        if (isDelimiterText(lexeme)) {
          return { kind: TokenKind.DELIMITER, delimiter: lexeme, lexeme, start, end };
        }
        return this.invalid('InvalidCharacter', lexeme, start, end);
      case 'Whitespace':
      case 'Comment':
        throw new Error(`${match.accept} lexemes are never emitted`);
    }
  }
}

/**
 * Lazily tokenize source text.
 *
 * @example
 * ```typescript
 * for (const token of tokenize('mulai x := 1 selesai.')) {
 *   console.log(token.kind, token.lexeme);
 * }
 * ```
 */
export function tokenize(source: string, options?: LexerOptions): TokenStream {
  return new TokenStream(source, options);
}

/**
 * Tokenize the whole input at once.
 */
export function lex(source: string, options?: LexerOptions): Token[] {
  return Array.from(tokenize(source, options));
}

/**
 * Diagnostics (L001-L003) for the INVALID tokens of a token sequence.
 */
export function lexDiagnostics(tokens: Iterable<Token>): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const token of tokens) {
    if (token.kind === TokenKind.INVALID) {
      diagnostics.push(lexErrorDiagnostic(token.reason, token.lexeme, { start: token.start, end: token.end }));
    }
  }
  return diagnostics;
}
