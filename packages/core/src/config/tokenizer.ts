/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CharSource } from '../encoding/charStreams.js';

/** Sentinel for the end of the input. */
export const END_OF_STREAM = null;

export type StreamChar = string | typeof END_OF_STREAM;

export function isWhite(c: StreamChar): boolean {
  return c === ' ' || c === '\t' || c === '\r' || c === '\n' || c === '\f';
}

export function isNewline(c: StreamChar): boolean {
  return c === '\r' || c === '\n' || c === '\f';
}

export function isDigit(c: StreamChar): c is string {
  return c !== null && c >= '0' && c <= '9';
}

const LOOKAHEAD_DEPTH = 2;

/**
 * Character scanner for configuration input. Holds the current character and
 * up to two characters of lookahead, which is enough to decide whether a line
 * break (`\r\n` included) starts a continuation line.
 */
export class ConfigTokenizer {
  private readonly lookahead: StreamChar[] = [];
  private _current: StreamChar = END_OF_STREAM;

  constructor(private readonly source: CharSource) {}

  get current(): StreamChar {
    return this._current;
  }

  get atEnd(): boolean {
    return this._current === END_OF_STREAM;
  }

  /** Loads the first character of the input. */
  first(): StreamChar {
    this._current = this.read();
    return this._current;
  }

  /** Moves to the next character; stays put at end of stream. */
  advance(): StreamChar {
    if (this._current !== END_OF_STREAM) {
      this._current = this.read();
    }
    return this._current;
  }

  skipWhiteExceptNewline(): StreamChar {
    while (isWhite(this._current) && !isNewline(this._current)) {
      this._current = this.read();
    }
    return this._current;
  }

  /**
   * Skips the rest of the current property: to the end of the physical line,
   * then over every following line that starts with whitespace, since those
   * continue the same property.
   */
  nextPropertyBoundary(): StreamChar {
    do {
      while (
        this._current !== '\n' &&
        this._current !== '\r' &&
        this._current !== END_OF_STREAM
      ) {
        this._current = this.read();
      }

      if (this._current === '\r') {
        this._current = this.read();
      }

      if (this._current === '\n') {
        this._current = this.read();
      }
    } while (isWhite(this._current));

    return this._current;
  }

  /**
   * Called on a line break. When the next line is indented the break is
   * consumed and the tokenizer sits on the indentation; otherwise nothing is
   * consumed, so the caller's outer loop sees the line break itself.
   */
  continueOnNextLine(): boolean {
    if (this._current !== '\r' && this._current !== '\n') {
      return false;
    }

    const breakLength = this._current === '\r' && this.peek(1) === '\n' ? 2 : 1;
    if (!isWhite(this.peek(breakLength))) {
      return false;
    }

    for (let i = 0; i < breakLength; i++) {
      this._current = this.read();
    }
    return true;
  }

  /**
   * Collects characters from the current one up to (not including) the first
   * stop character or the end of the stream.
   *
   * @returns the collected text, or null when it would exceed `maxLength`
   */
  readUntil(maxLength: number, isStop: (c: string) => boolean): string | null {
    let text = '';
    let length = 0;
    let c = this._current;
    while (c !== END_OF_STREAM && !isStop(c)) {
      if (length === maxLength) {
        return null;
      }
      text += c;
      length++;
      c = this.advance();
    }
    return text;
  }

  private peek(depth: number): StreamChar {
    while (this.lookahead.length < Math.min(depth, LOOKAHEAD_DEPTH)) {
      this.lookahead.push(this.source.next());
    }
    return this.lookahead[depth - 1] ?? END_OF_STREAM;
  }

  private read(): StreamChar {
    if (this.lookahead.length > 0) {
      return this.lookahead.shift() ?? END_OF_STREAM;
    }
    return this.source.next();
  }
}
