/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { charEncodingId } from '../encoding/charEncodings.js';
import { decodeBytes } from '../encoding/charStreams.js';
import { ConfigFileError, getErrorMessage } from './errors.js';
import { lookupOptionByName } from './optionRegistry.js';
import { END_OF_STREAM } from './tokenizer.js';
import type { ParserHost } from './types.js';
import { readDelimitedString, VALUE_LIMITS } from './valueParsers.js';

export type ParseFileStatus = 'clean' | 'warnings' | 'fatal';

export interface ParseFileResult {
  status: ParseFileStatus;
  /** Option errors reported during this parse. */
  errorCount: number;
  error?: ConfigFileError;
}

export type ReadConfigFileResult =
  | { success: true; path: string; text: string }
  | { success: false; error: ConfigFileError };

/** A parser host that can also hand unknown names to the caller. */
export interface PropertyHost extends ParserHost {
  /** Returns false when nobody accepted the option. */
  offerUnknownOption(name: string, value: string): boolean;
}

/** Expands a leading `~/` (or a bare `~`) to the home directory. */
export function expandTilde(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

export function fileExists(path: string): boolean {
  return existsSync(expandTilde(path));
}

/**
 * Reads and decodes a configuration file. An unknown encoding name or an
 * unreadable file is returned as a `ConfigFileError`.
 */
export function readConfigFile(
  path: string,
  encodingName: string,
): ReadConfigFileResult {
  const expanded = expandTilde(path);
  const encoding = charEncodingId(encodingName);
  if (encoding === undefined) {
    return {
      success: false,
      error: new ConfigFileError(
        `Cannot open configuration file "${expanded}": unknown encoding "${encodingName}"`,
        expanded,
      ),
    };
  }

  try {
    const bytes = readFileSync(expanded);
    return { success: true, path: expanded, text: decodeBytes(bytes, encoding) };
  } catch (error) {
    return {
      success: false,
      error: new ConfigFileError(
        `Cannot open configuration file "${expanded}": ${getErrorMessage(error)}`,
        expanded,
        { cause: error },
      ),
    };
  }
}

function isNameStop(c: string): boolean {
  return c === ':' || c === '\n';
}

/**
 * Reads `name: value` properties from `host.input` until the end of the
 * stream. Lines starting with `#` or `/` are comments and a line without a
 * colon is skipped. A bad property is reported and reading carries on with
 * the next one.
 */
export function parseProperties(host: PropertyHost): void {
  const input = host.input;
  input.first();

  for (
    let c = input.skipWhiteExceptNewline();
    c !== END_OF_STREAM;
    c = input.nextPropertyBoundary()
  ) {
    if (c === '#' || c === '/') {
      continue;
    }

    const name = input.readUntil(Number.MAX_SAFE_INTEGER, isNameStop) ?? '';
    if (input.current !== ':') {
      continue;
    }
    input.advance();

    if (name.length > VALUE_LIMITS.name) {
      host.reportUnknownOption(name);
      continue;
    }

    const option = lookupOptionByName(name);
    if (option?.parser) {
      option.parser(host, option);
    } else if (option) {
      host.reportBadArgument(option.name);
    } else {
      const value = readDelimitedString(input, VALUE_LIMITS.string);
      if (value === null || !host.offerUnknownOption(name, value)) {
        host.reportUnknownOption(name);
      }
    }
  }
}
