import type { Delimiter, EofToken, IdentifierToken, Operator, Token } from '../types.js';
import { TokenKind, isDelimiter, isKeyword, isOperator } from '../frontend/tokens.js';
import { ConfigService } from '../config/config-service.js';
import { SEMANTIC_TOKEN_CATEGORIES, SemanticTokenKind } from '../config/token-kind.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { SyntaxError } from '../diagnostics/diagnostics.js';
import { LogLevel, createLogger } from '../utils/logger.js';

/**
 * Keywords that end a skip-forward: anything that opens a declaration or a
 * statement, plus `end`.
 */
export const SYNC_KEYWORDS: ReadonlySet<SemanticTokenKind> = new Set<SemanticTokenKind>([
  ...SEMANTIC_TOKEN_CATEGORIES.declaration,
  SemanticTokenKind.BEGIN,
  SemanticTokenKind.END,
  SemanticTokenKind.IF,
  SemanticTokenKind.WHILE,
  SemanticTokenKind.FOR,
]);

/** Deepest nesting of statements, expressions, routines or array types the parser follows */
export const MAX_NESTING_DEPTH = 256;

/**
 * Parser state: the significant tokens, the cursor and the error log.
 *
 * Errors follow panic mode. The first error after a resynchronisation is
 * recorded and the parser panics; further errors are dropped until
 * {@link ParserContext.synchronize} runs. A token is blamed at most once.
 * Once the error limit is hit the context reports end of file forever, so
 * every loop winds down. The same happens when nesting passes
 * {@link MAX_NESTING_DEPTH}.
 */
export interface ParserContext {
  /** Tokens without INVALID entries, always ending in EOF */
  readonly tokens: readonly Token[];
  index: number;
  readonly diagnostics: SyntaxError[];
  panicking: boolean;
  aborted: boolean;
  readonly maxErrors: number;
  /** Open {@link ParserContext.nested} calls */
  depth: number;
  /** Set while parsing a declaration header; errors are then MalformedDeclaration */
  declaring: string | null;
  /** Parser trace, on with PASCALS_DEBUG_PARSER=1 and LOG_LEVEL=DEBUG */
  debug: { enabled: boolean; log(message: string, meta?: Record<string, unknown>): void };

  peek(offset?: number): Token;
  /** Last consumed token, or the first token when nothing was consumed yet */
  previous(): Token;
  next(): Token;
  atEof(): boolean;
  atKeyword(kind: SemanticTokenKind): boolean;
  atOperator(op: Operator): boolean;
  atDelimiter(d: Delimiter): boolean;
  acceptKeyword(kind: SemanticTokenKind): Token | null;
  acceptOperator(op: Operator): Token | null;
  acceptDelimiter(d: Delimiter): Token | null;
  expectKeyword(kind: SemanticTokenKind, expected: string): Token | null;
  expectOperator(op: Operator, expected: string): Token | null;
  expectDelimiter(d: Delimiter, expected: string): Token | null;
  expectIdentifier(expected: string): IdentifierToken | null;
  /** Record "expected X, found <current>" and panic */
  fail(expected: string): void;
  /** Record "expected X, found <current>" without panicking, as if X had been inserted */
  missing(expected: string): void;
  report(error: SyntaxError, panic?: boolean): void;
  atSyncPoint(): boolean;
  /** Skip to the next sync point and leave panic mode */
  synchronize(): void;
  withDeclaration<T>(what: string, body: () => T): T;
  /** Run a recursive rule one level deeper, or stop parsing and return `fallback()` past the limit */
  nested<T>(body: () => T, fallback: () => T): T;
}

function significantTokens(tokens: readonly Token[]): Token[] {
  const kept = tokens.filter(t => t.kind !== TokenKind.INVALID);
  const last = kept[kept.length - 1];
  if (last === undefined || last.kind !== TokenKind.EOF) {
    const at = last?.end ?? tokens[tokens.length - 1]?.end ?? { line: 1, col: 1, offset: 0 };
    const eof: EofToken = { kind: TokenKind.EOF, lexeme: '', start: at, end: at };
    kept.push(eof);
  }
  return kept;
}

export function createParserContext(tokens: readonly Token[]): ParserContext {
  const config = ConfigService.getInstance();
  const logger = createLogger('parser');
  const significant = significantTokens(tokens);
  const eof = significant[significant.length - 1];

  const ctx: ParserContext = {
    tokens: significant,
    index: 0,
    diagnostics: [],
    panicking: false,
    aborted: false,
    maxErrors: config.maxErrors,
    depth: 0,
    declaring: null,
    debug: {
      // Tracing needs both the flag and a DEBUG log level
      enabled: config.debugParser && logger.isEnabled(LogLevel.DEBUG),
      log: (message, meta): void => {
        if (!ctx.debug.enabled) return;
        logger.debug(`[parse] ${message}`, { index: ctx.index, ...meta });
      },
    },

    peek: (offset = 0): Token => {
      if (ctx.aborted) return eof;
      return ctx.tokens[Math.min(ctx.index + offset, ctx.tokens.length - 1)];
    },
    previous: (): Token => ctx.tokens[Math.max(ctx.index - 1, 0)],
    next: (): Token => {
      const tok = ctx.peek();
      if (tok.kind !== TokenKind.EOF) ctx.index++;
      return tok;
    },
    atEof: (): boolean => ctx.peek().kind === TokenKind.EOF,
    atKeyword: (kind): boolean => isKeyword(ctx.peek(), kind),
    atOperator: (op): boolean => isOperator(ctx.peek(), op),
    atDelimiter: (d): boolean => isDelimiter(ctx.peek(), d),
    acceptKeyword: (kind): Token | null => (ctx.atKeyword(kind) ? ctx.next() : null),
    acceptOperator: (op): Token | null => (ctx.atOperator(op) ? ctx.next() : null),
    acceptDelimiter: (d): Token | null => (ctx.atDelimiter(d) ? ctx.next() : null),
    expectKeyword: (kind, expected): Token | null => {
      const tok = ctx.acceptKeyword(kind);
      if (!tok) ctx.fail(expected);
      return tok;
    },
    expectOperator: (op, expected): Token | null => {
      const tok = ctx.acceptOperator(op);
      if (!tok) ctx.fail(expected);
      return tok;
    },
    expectDelimiter: (d, expected): Token | null => {
      const tok = ctx.acceptDelimiter(d);
      if (!tok) ctx.fail(expected);
      return tok;
    },
    expectIdentifier: (expected): IdentifierToken | null => {
      const tok = ctx.peek();
      if (tok.kind === TokenKind.IDENTIFIER) {
        ctx.next();
        return tok;
      }
      ctx.fail(expected);
      return null;
    },

    fail: (expected): void => {
      ctx.report(syntaxError(ctx, expected), true);
    },
    missing: (expected): void => {
      ctx.report(syntaxError(ctx, expected), false);
    },
    report: (error, panic = true): void => {
      if (ctx.aborted) return;
      if (ctx.panicking) {
        ctx.debug.log('suppressed', { code: error.code, message: error.message });
        return;
      }
      // One error per token; each open block still gets its own UnclosedBlock
      const last = ctx.diagnostics[ctx.diagnostics.length - 1];
      if (last !== undefined && last.found === error.found && error.kind !== 'UnclosedBlock') {
        ctx.debug.log('already reported', { code: error.code, at: error.found.lexeme });
        if (panic) ctx.panicking = true;
        return;
      }
      if (ctx.diagnostics.length >= ctx.maxErrors) {
        ctx.diagnostics.push(Diagnostics.tooManyErrors(ctx.maxErrors, error.found));
        ctx.aborted = true;
        ctx.debug.log('error limit reached', { limit: ctx.maxErrors });
        return;
      }
      ctx.diagnostics.push(error);
      if (panic) ctx.panicking = true;
    },

    atSyncPoint: (): boolean => {
      const tok = ctx.peek();
      switch (tok.kind) {
        case TokenKind.EOF:
          return true;
        case TokenKind.DELIMITER:
          return tok.delimiter === ';' || tok.delimiter === '.';
        case TokenKind.KEYWORD:
          return SYNC_KEYWORDS.has(tok.keyword);
        default:
          return false;
      }
    },
    synchronize: (): void => {
      const from = ctx.index;
      while (!ctx.atSyncPoint()) ctx.next();
      if (ctx.panicking || ctx.index > from) {
        ctx.debug.log('resynchronised', { skipped: ctx.index - from, at: ctx.peek().lexeme });
      }
      ctx.panicking = false;
    },
    withDeclaration: <T>(what: string, body: () => T): T => {
      const saved = ctx.declaring;
      ctx.declaring = what;
      try {
        return body();
      } finally {
        ctx.declaring = saved;
      }
    },
    nested: <T>(body: () => T, fallback: () => T): T => {
      if (ctx.depth >= MAX_NESTING_DEPTH) {
        if (!ctx.aborted) {
          ctx.diagnostics.push(Diagnostics.nestingTooDeep(MAX_NESTING_DEPTH, ctx.peek()));
          ctx.aborted = true;
          ctx.debug.log('nesting limit reached', { limit: MAX_NESTING_DEPTH });
        }
        return fallback();
      }
      ctx.depth++;
      try {
        return body();
      } finally {
        ctx.depth--;
      }
    },
  };
  return ctx;
}

function syntaxError(ctx: ParserContext, expected: string): SyntaxError {
  const found = ctx.peek();
  return ctx.declaring === null
    ? Diagnostics.unexpectedToken(expected, found)
    : Diagnostics.malformedDeclaration(ctx.declaring, expected, found);
}
