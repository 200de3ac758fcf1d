/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CharEncoding, isUtf16Encoding } from './charEncodings.js';
import { NewlineStyle } from '../config/optionIds.js';

/** A source of characters; `null` marks the end of the stream. */
export interface CharSource {
  next(): string | null;
}

/** Receives encoded output one byte at a time. */
export interface ByteSink {
  putByte(byte: number): void;
}

/**
 * Character source over an in-memory string, yielding one code point per call.
 */
export class StringCharSource implements CharSource {
  private position = 0;

  constructor(private readonly text: string) {}

  next(): string | null {
    if (this.position >= this.text.length) {
      return null;
    }
    const codePoint = this.text.codePointAt(this.position);
    if (codePoint === undefined) {
      return null;
    }
    const char = String.fromCodePoint(codePoint);
    this.position += char.length;
    return char;
  }
}

const CodePageFileSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  high: z.array(z.number().int().min(0).max(0x10ffff)).length(128),
});

/** Single-byte code pages read from bundled tables instead of `TextDecoder`. */
const CODE_PAGE_FILES: Partial<Record<CharEncoding, string>> = {
  [CharEncoding.Win1252]: 'win1252.json',
  [CharEncoding.Ibm858]: 'ibm858.json',
};

const codePages = new Map<CharEncoding, readonly number[]>();

/** Code points of bytes 0x80-0xFF, or undefined for encodings without a table. */
function loadCodePage(encoding: CharEncoding): readonly number[] | undefined {
  const fileName = CODE_PAGE_FILES[encoding];
  if (fileName === undefined) {
    return undefined;
  }
  let high = codePages.get(encoding);
  if (!high) {
    const raw = readFileSync(
      new URL(`./data/${fileName}`, import.meta.url),
      'utf8',
    );
    high = CodePageFileSchema.parse(JSON.parse(raw)).high;
    codePages.set(encoding, high);
  }
  return high;
}

const WHATWG_LABELS: Partial<Record<CharEncoding, string>> = {
  [CharEncoding.Latin0]: 'iso-8859-15',
  [CharEncoding.Utf8]: 'utf-8',
  [CharEncoding.Iso2022]: 'iso-2022-jp',
  [CharEncoding.MacRoman]: 'macintosh',
  [CharEncoding.Utf16le]: 'utf-16le',
  [CharEncoding.Utf16be]: 'utf-16be',
  [CharEncoding.Big5]: 'big5',
  [CharEncoding.ShiftJis]: 'shift_jis',
};

/**
 * Decodes raw file bytes in the given encoding. A byte order mark at the start
 * of UTF-8 or UTF-16 input is dropped; `utf16` without a mark is read
 * big-endian.
 */
export function decodeBytes(bytes: Uint8Array, encoding: CharEncoding): string {
  const codePage = loadCodePage(encoding);
  if (codePage) {
    let text = '';
    for (const byte of bytes) {
      text += String.fromCodePoint(byte < 0x80 ? byte : codePage[byte - 0x80]);
    }
    return text;
  }

  switch (encoding) {
    case CharEncoding.Raw:
    case CharEncoding.Ascii:
    case CharEncoding.Latin1:
      return Buffer.from(bytes).toString('latin1');
    case CharEncoding.Utf16: {
      const littleEndian = bytes[0] === 0xff && bytes[1] === 0xfe;
      return new TextDecoder(littleEndian ? 'utf-16le' : 'utf-16be').decode(
        bytes,
      );
    }
    default: {
      const label = WHATWG_LABELS[encoding] ?? 'utf-8';
      return new TextDecoder(label).decode(bytes);
    }
  }
}

const reverseTables = new Map<CharEncoding, Map<number, number>>();

function reverseTableFor(encoding: CharEncoding): Map<number, number> {
  const cached = reverseTables.get(encoding);
  if (cached) {
    return cached;
  }

  const table = new Map<number, number>();
  const codePage = loadCodePage(encoding);
  if (codePage) {
    codePage.forEach((codePoint, index) => table.set(codePoint, index + 0x80));
  } else {
    const label = WHATWG_LABELS[encoding];
    if (label) {
      const high = new Uint8Array(128).map((_, index) => index + 0x80);
      const decoded = new TextDecoder(label).decode(high);
      Array.from(decoded).forEach((char, index) => {
        const codePoint = char.codePointAt(0);
        if (codePoint !== undefined && codePoint !== 0xfffd) {
          table.set(codePoint, index + 0x80);
        }
      });
    }
  }
  reverseTables.set(encoding, table);
  return table;
}

const REPLACEMENT_BYTE = 0x3f; // '?'

/**
 * Encodes text for output. Characters the encoding cannot represent are
 * written as `?`.
 */
export function encodeText(text: string, encoding: CharEncoding): Uint8Array {
  if (encoding === CharEncoding.Utf8) {
    return new Uint8Array(Buffer.from(text, 'utf8'));
  }

  if (isUtf16Encoding(encoding)) {
    const bytes = Buffer.from(text, 'utf16le');
    if (encoding !== CharEncoding.Utf16le) {
      bytes.swap16();
    }
    return new Uint8Array(bytes);
  }

  const out: number[] = [];
  for (const char of text) {
    const codePoint = char.codePointAt(0) ?? REPLACEMENT_BYTE;
    if (codePoint < 0x80) {
      out.push(codePoint);
      continue;
    }
    switch (encoding) {
      case CharEncoding.Raw:
      case CharEncoding.Latin1:
        out.push(codePoint <= 0xff ? codePoint : REPLACEMENT_BYTE);
        break;
      case CharEncoding.Latin0:
      case CharEncoding.MacRoman:
      case CharEncoding.Win1252:
      case CharEncoding.Ibm858:
        out.push(reverseTableFor(encoding).get(codePoint) ?? REPLACEMENT_BYTE);
        break;
      default:
        out.push(REPLACEMENT_BYTE);
        break;
    }
  }
  return Uint8Array.from(out);
}

export function newlineSequence(style: number): string {
  switch (style) {
    case NewlineStyle.CRLF:
      return '\r\n';
    case NewlineStyle.CR:
      return '\r';
    default:
      return '\n';
  }
}

/**
 * Text output bound to an encoding and newline style. Every `\n` written is
 * replaced by the configured line break before encoding.
 */
export class EncodedOutput {
  constructor(
    private readonly sink: ByteSink,
    private readonly encoding: CharEncoding,
    private readonly newline: number,
  ) {}

  write(text: string): void {
    const translated = text.replace(/\n/g, newlineSequence(this.newline));
    for (const byte of encodeText(translated, this.encoding)) {
      this.sink.putByte(byte);
    }
  }
}

/** Sink collecting bytes into memory. */
export class BufferSink implements ByteSink {
  private readonly bytes: number[] = [];

  putByte(byte: number): void {
    this.bytes.push(byte & 0xff);
  }

  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}
