/**
 * @module frontend/dfa/engine
 *
 * Maximal-munch simulation of a {@link DfaTable}: follow edges while one
 * exists, remember the last accepting state, and fall back to it when a
 * longer path dies.
 */

import type { LexErrorKind, Position } from '../../types.js';
import type { CharStream } from '../char-stream.js';
import { classify, isNewline } from './char-class.js';
import type { AcceptKind, CommitError, DfaState, DfaTable } from './rules.js';

export interface DfaMatch {
  readonly ok: true;
  readonly accept: AcceptKind;
  readonly lexeme: string;
  readonly start: Position;
  readonly end: Position;
}

export interface DfaFailure {
  readonly ok: false;
  readonly error: LexErrorKind;
  /** The text the failed attempt consumed; never empty unless input was */
  readonly lexeme: string;
  readonly start: Position;
  readonly end: Position;
}

export type DfaResult = DfaMatch | DfaFailure;

export function step(table: DfaTable, state: DfaState, ch: string): DfaState | null {
  const target =
    state.edges.get(classify(ch)) ?? (isNewline(ch) ? null : state.anyExceptNewline) ?? state.any;
  return target === null ? null : table.states[target];
}

function isHighSurrogate(ch: string | null): boolean {
  return ch !== null && ch >= '\uD800' && ch <= '\uDBFF';
}

function isLowSurrogate(ch: string | null): boolean {
  return ch !== null && ch >= '\uDC00' && ch <= '\uDFFF';
}

/**
 * Run the automaton from the stream's cursor.
 *
 * On a match the stream is left just after the lexeme. On a failure it is
 * left at the start; `end` says how far the attempt got, so a caller can skip
 * the bad text.
 */
export function runDfa(table: DfaTable, stream: CharStream): DfaResult {
  const start = stream.mark();
  let state = table.states[table.start];
  let lastAccept: { kind: AcceptKind; end: Position } | null = null;
  let committed: CommitError | null = state.commit;

  for (;;) {
    const ch = stream.peek();
    const next = ch === null ? null : step(table, state, ch);
    if (next === null) break;
    stream.advance();
    state = next;
    if (state.accept !== null) {
      lastAccept = { kind: state.accept, end: stream.mark() };
      committed = null;
    }
    if (state.commit !== null) {
      committed = state.commit;
    }
  }

  if (committed !== null) {
    return fail(stream, start, committed);
  }

  if (lastAccept === null) {
    if (stream.mark().offset === start.offset) {
      // Nothing consumed: the character cannot begin a token. Skip it whole.
      const first = stream.advance();
      if (isHighSurrogate(first) && isLowSurrogate(stream.peek())) stream.advance();
    }
    return fail(stream, start, 'InvalidCharacter');
  }

  stream.reset(lastAccept.end);
  return {
    ok: true,
    accept: lastAccept.kind,
    lexeme: stream.slice(start.offset, lastAccept.end.offset),
    start,
    end: lastAccept.end,
  };
}

function fail(stream: CharStream, start: Position, error: LexErrorKind): DfaFailure {
  const end = stream.mark();
  stream.reset(start);
  return { ok: false, error, lexeme: stream.slice(start.offset, end.offset), start, end };
}
