/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { charEncodingId } from '../encoding/charEncodings.js';
import type { TagCategory } from '../tags/tagDictionary.js';
import { isCss1Selector } from './css1Selector.js';
import { DoctypeMode, MAX_OPTION_INTEGER, OptionId } from './optionIds.js';
import { resolvePick } from './pickLists.js';
import {
  END_OF_STREAM,
  isDigit,
  isWhite,
  type ConfigTokenizer,
} from './tokenizer.js';
import type { OptionParser, ParserHost, OptionDescriptor } from './types.js';
import { customTagCategory, userTagCategoryFor } from './userTags.js';

/**
 * Longest accepted text, in characters, for each kind of value. Input past
 * the bound is rejected rather than cut short.
 */
export const VALUE_LIMITS = {
  name: 64,
  pickToken: 16,
  encodingName: 64,
  cssSelector: 256,
  tagName: 1024,
  string: 8192,
} as const;

function isTagSeparator(c: string): boolean {
  return isWhite(c) || c === ',';
}

/**
 * Reads a run of non-whitespace characters after skipping leading blanks.
 * Returns null when the run is longer than `maxLength`.
 */
export function readBareToken(
  input: ConfigTokenizer,
  maxLength: number,
): string | null {
  input.skipWhiteExceptNewline();
  return input.readUntil(maxLength, isWhite);
}

/**
 * Reads the rest of the line as a string. A leading `"` or `'` makes the
 * matching quote end the value early. Leading whitespace is dropped and every
 * later whitespace run becomes a single space.
 *
 * @returns the text, or null when it is longer than `maxLength`
 */
export function readDelimitedString(
  input: ConfigTokenizer,
  maxLength: number,
): string | null {
  let c = input.skipWhiteExceptNewline();
  let delimiter: string | null = null;
  if (c === '"' || c === "'") {
    delimiter = c;
    c = input.advance();
  }

  let text = '';
  let length = 0;
  let wasWhite = true;
  while (c !== END_OF_STREAM && c !== '\r' && c !== '\n') {
    if (c === delimiter) {
      break;
    }

    if (isWhite(c)) {
      if (wasWhite) {
        c = input.advance();
        continue;
      }
      wasWhite = true;
      c = ' ';
    } else {
      wasWhite = false;
    }

    if (length === maxLength) {
      return null;
    }
    text += c;
    length++;
    c = input.advance();
  }
  return text;
}

/** Unsigned decimal integer; characters after the digits are ignored. */
export const parseInteger: OptionParser = (host, option) => {
  const input = host.input;
  let c = input.skipWhiteExceptNewline();
  let value = 0;
  let digits = 0;

  while (isDigit(c)) {
    value = value * 10 + Number(c);
    if (value > MAX_OPTION_INTEGER) {
      host.reportBadArgument(option.name);
      return false;
    }
    digits++;
    c = input.advance();
  }

  if (digits === 0) {
    host.reportBadArgument(option.name);
    return false;
  }
  return host.setInt(option.id, value);
};

/** A string without whitespace. */
export const parseName: OptionParser = (host, option) => {
  const name = readBareToken(host.input, VALUE_LIMITS.tagName);
  if (name === null || name === '') {
    host.reportBadArgument(option.name);
    return false;
  }
  return host.setString(option.id, name);
};

/**
 * Class name prefix for generated styles. A `-` is appended so that digits
 * added after the prefix cannot extend an escape.
 */
export const parseCss1Selector: OptionParser = (host, option) => {
  const selector = readBareToken(host.input, VALUE_LIMITS.cssSelector - 1);
  if (selector === '') {
    return false;
  }
  if (selector === null || !isCss1Selector(selector)) {
    host.reportBadArgument(option.name);
    return false;
  }
  return host.setString(option.id, `${selector}-`);
};

export const parseDelimitedString: OptionParser = (host, option) => {
  const text = readDelimitedString(host.input, VALUE_LIMITS.string);
  if (text === null) {
    host.reportBadArgument(option.name);
    return false;
  }
  return host.setString(option.id, text);
};

function tagCategoryForOption(
  host: ParserHost,
  optionId: OptionId,
): TagCategory | null | undefined {
  if (optionId === OptionId.CustomTags) {
    return customTagCategory(host.getInt(OptionId.UseCustomTags));
  }
  return userTagCategoryFor(optionId);
}

/**
 * Space or comma separated tag names. The list may carry on over following
 * lines as long as they are indented. The previous list and its declarations
 * are replaced only once at least one name has been read.
 */
export const parseTagNames: OptionParser = (host, option) => {
  const category = tagCategoryForOption(host, option.id);
  if (category === undefined) {
    host.reportUnknownOption(option.name);
    return false;
  }

  const input = host.input;
  const names: string[] = [];
  let c = input.skipWhiteExceptNewline();

  while (c !== END_OF_STREAM) {
    if (c === '\r' || c === '\n') {
      if (!input.continueOnNextLine()) {
        break;
      }
      c = input.current;
      continue;
    }

    if (isTagSeparator(c)) {
      c = input.advance();
      continue;
    }

    const name = input.readUntil(VALUE_LIMITS.tagName, isTagSeparator);
    if (name === null) {
      host.reportBadArgument(option.name);
      return false;
    }
    names.push(name);
    c = input.current;
  }

  if (names.length === 0) {
    host.reportBadArgument(option.name);
    return false;
  }

  host.beginTagDeclarations(option.id, category);
  for (const name of names) {
    host.declareUserTag(option.id, category, name);
  }
  return true;
};

/**
 * Reads a token and resolves it against the option's pick list.
 *
 * @returns the matching ordinal, or undefined after reporting the option
 */
export function getPickListValue(
  host: ParserHost,
  option: OptionDescriptor,
): number | undefined {
  const token = readBareToken(host.input, VALUE_LIMITS.pickToken);
  const ordinal =
    token === null || option.pickList === undefined
      ? undefined
      : resolvePick(option.pickList, token);

  if (ordinal === undefined) {
    host.reportBadArgument(option.name);
  }
  return ordinal;
}

export const parsePickList: OptionParser = (host, option) => {
  const ordinal = getPickListValue(host, option);
  if (ordinal === undefined) {
    return false;
  }
  return option.type === 'boolean'
    ? host.setBool(option.id, ordinal !== 0)
    : host.setInt(option.id, ordinal);
};

/**
 * Encoding name. Setting `char-encoding` also derives the input and output
 * encodings from it.
 */
export const parseCharEncoding: OptionParser = (host, option) => {
  const token = readBareToken(host.input, VALUE_LIMITS.encodingName);
  const encoding =
    token === null ? undefined : charEncodingId(token.toLowerCase());

  if (encoding === undefined) {
    host.reportBadArgument(option.name);
    return false;
  }

  host.setInt(option.id, encoding);
  if (option.id === OptionId.CharEncoding) {
    host.adjustCharEncoding(encoding);
  }
  return true;
};

/**
 * A quoted value is a user-supplied public identifier; anything else names a
 * doctype mode.
 */
export const parseDoctype: OptionParser = (host, option) => {
  const c = host.input.skipWhiteExceptNewline();

  if (c === '"' || c === "'") {
    const stored = parseDelimitedString(host, option);
    if (stored) {
      host.setInt(OptionId.DoctypeMode, DoctypeMode.User);
    }
    return stored;
  }

  const mode = getPickListValue(host, option);
  if (mode === undefined) {
    return false;
  }
  return host.setInt(OptionId.DoctypeMode, mode);
};

/** Indenting with tabs implies one tab per level. */
export const parseTabs: OptionParser = (host, option) => {
  const ordinal = getPickListValue(host, option);
  if (ordinal === undefined) {
    return false;
  }

  const tabs = ordinal !== 0;
  host.setBool(option.id, tabs);
  if (tabs) {
    host.setInt(OptionId.IndentSpaces, 1);
  }
  return true;
};
