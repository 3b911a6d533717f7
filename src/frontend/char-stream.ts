/**
 * @module frontend/char-stream
 *
 * Cursor over source text. CR, LF and CRLF each end one line.
 */

import type { Position } from '../types.js';

export class CharStream {
  private offset = 0;
  private line = 1;
  private col = 1;

  constructor(readonly text: string) {}

  get atEnd(): boolean {
    return this.offset >= this.text.length;
  }

  get position(): Position {
    return { line: this.line, col: this.col, offset: this.offset };
  }

  /** Code unit `k` places ahead, or null past the end */
  peek(k = 0): string | null {
    const at = this.offset + k;
    return at < this.text.length ? this.text.charAt(at) : null;
  }

  advance(): string | null {
    if (this.atEnd) return null;
    const ch = this.text.charAt(this.offset++);
    if (ch === '\n' || (ch === '\r' && this.text.charAt(this.offset) !== '\n')) {
      this.line++;
      this.col = 1;
    } else {
      this.col++;
    }
    return ch;
  }

  mark(): Position {
    return this.position;
  }

  reset(mark: Position): void {
    this.offset = mark.offset;
    this.line = mark.line;
    this.col = mark.col;
  }

  slice(from: number, to: number): string {
    return this.text.slice(from, to);
  }
}
