/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** Backslash plus at most four digits. */
const MAX_ESCAPE_LENGTH = 5;

function isAsciiLetter(c: string): boolean {
  return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z');
}

function isAsciiDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

/**
 * Checks that `text` is usable as a CSS1 class name prefix.
 *
 * A backslash starts an escape of up to four digits (`ab\555\444` is four
 * characters). Outside an escape a digit or `-` may not come first; letters
 * and characters from U+00A1 up are allowed anywhere.
 */
export function isCss1Selector(text: string): boolean {
  let escapeLength = 0;
  let position = 0;

  for (const c of text) {
    if (c === '\\') {
      escapeLength = 1;
    } else if (isAsciiDigit(c)) {
      if (escapeLength > 0) {
        escapeLength++;
        if (escapeLength > MAX_ESCAPE_LENGTH) {
          return false;
        }
      } else if (position === 0) {
        return false;
      }
    } else {
      const valid =
        escapeLength > 0 ||
        (position > 0 && c === '-') ||
        isAsciiLetter(c) ||
        (c.codePointAt(0) ?? 0) >= 161;
      if (!valid) {
        return false;
      }
      escapeLength = 0;
    }
    position++;
  }

  return true;
}
