/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { OptionId } from './optionIds.js';
import type { PickList } from './pickLists.js';
import type { ConfigTokenizer } from './tokenizer.js';
import type { TagCategory } from '../tags/tagDictionary.js';

export type OptionCategory =
  | 'markup'
  | 'diagnostics'
  | 'pretty-print'
  | 'encoding'
  | 'miscellaneous'
  | 'internal';

export type OptionKind = 'integer' | 'boolean' | 'string';

/**
 * Reads an option's value from `host.input` and stores it. Returns false
 * when the value was rejected; the option then keeps its previous value.
 */
export type OptionParser = (
  host: ParserHost,
  option: OptionDescriptor,
) => boolean;

interface DescriptorBase {
  readonly id: OptionId;
  readonly category: OptionCategory;
  readonly name: string;
  /** Absent for options that cannot be set on their own. */
  readonly parser?: OptionParser;
  readonly pickList?: PickList;
}

export interface NumericOptionDescriptor extends DescriptorBase {
  readonly type: 'integer' | 'boolean';
  readonly default: number;
}

export interface StringOptionDescriptor extends DescriptorBase {
  readonly type: 'string';
  readonly default: null;
}

export type OptionDescriptor = NumericOptionDescriptor | StringOptionDescriptor;

/** Typed reads and writes of current option values. */
export interface OptionAccess {
  getInt(id: OptionId): number;
  getBool(id: OptionId): boolean;
  getString(id: OptionId): string | null;
  setInt(id: OptionId, value: number): boolean;
  setBool(id: OptionId, value: boolean): boolean;
  /** An empty string or null stores the option's default. */
  setString(id: OptionId, value: string | null): boolean;
}

/** What a value parser may touch while it runs. */
export interface ParserHost extends OptionAccess {
  readonly input: ConfigTokenizer;
  reportBadArgument(optionName: string): void;
  reportUnknownOption(optionName: string): void;
  /**
   * Resets the tag list held by `optionId` and frees the category's
   * declared tags before a fresh list is read.
   */
  beginTagDeclarations(optionId: OptionId, category: TagCategory | null): void;
  /** Registers a tag and appends it to the list held by `optionId`. */
  declareUserTag(
    optionId: OptionId,
    category: TagCategory | null,
    name: string,
  ): void;
  /** Derives input and output encodings from the primary encoding. */
  adjustCharEncoding(encoding: number): boolean;
}
