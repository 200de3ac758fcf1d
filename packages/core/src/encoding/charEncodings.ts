/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Character encodings known to the configuration engine. The numeric value of
 * each member is also its ordinal in the encoding pick list.
 */
export enum CharEncoding {
  Raw = 0,
  Ascii,
  Latin0,
  Latin1,
  Utf8,
  Iso2022,
  MacRoman,
  Win1252,
  Ibm858,
  Utf16le,
  Utf16be,
  Utf16,
  Big5,
  ShiftJis,
}

interface EncodingEntry {
  id: CharEncoding;
  /** Spelling accepted in option values. */
  optName: string;
  /** IANA name, absent for `raw`. */
  ianaName?: string;
}

const ENCODING_TABLE: readonly EncodingEntry[] = [
  { id: CharEncoding.Raw, optName: 'raw' },
  { id: CharEncoding.Ascii, optName: 'ascii', ianaName: 'us-ascii' },
  { id: CharEncoding.Latin0, optName: 'latin0', ianaName: 'iso-8859-15' },
  { id: CharEncoding.Latin1, optName: 'latin1', ianaName: 'iso-8859-1' },
  { id: CharEncoding.Utf8, optName: 'utf8', ianaName: 'utf-8' },
  { id: CharEncoding.Iso2022, optName: 'iso2022', ianaName: 'iso-2022' },
  { id: CharEncoding.MacRoman, optName: 'mac', ianaName: 'macintosh' },
  { id: CharEncoding.Win1252, optName: 'win1252', ianaName: 'windows-1252' },
  { id: CharEncoding.Ibm858, optName: 'ibm858', ianaName: 'ibm00858' },
  { id: CharEncoding.Utf16le, optName: 'utf16le', ianaName: 'utf-16' },
  { id: CharEncoding.Utf16be, optName: 'utf16be', ianaName: 'utf-16' },
  { id: CharEncoding.Utf16, optName: 'utf16', ianaName: 'utf-16' },
  { id: CharEncoding.Big5, optName: 'big5', ianaName: 'big5' },
  { id: CharEncoding.ShiftJis, optName: 'shiftjis', ianaName: 'shift_jis' },
];

/**
 * Resolves an encoding option spelling (case-insensitive) to its id.
 * Returns undefined for unknown names.
 */
export function charEncodingId(name: string): CharEncoding | undefined {
  const wanted = name.toLowerCase();
  return ENCODING_TABLE.find((entry) => entry.optName === wanted)?.id;
}

export function charEncodingName(id: number): string {
  return ENCODING_TABLE.find((entry) => entry.id === id)?.ianaName ?? 'unknown';
}

export function charEncodingOptName(id: number): string {
  return ENCODING_TABLE.find((entry) => entry.id === id)?.optName ?? 'unknown';
}

export function isUtf16Encoding(id: number): boolean {
  return (
    id === CharEncoding.Utf16 ||
    id === CharEncoding.Utf16le ||
    id === CharEncoding.Utf16be
  );
}

export function allCharEncodings(): readonly CharEncoding[] {
  return ENCODING_TABLE.map((entry) => entry.id);
}
