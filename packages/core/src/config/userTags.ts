/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CustomTagsMode, OptionId } from './optionIds.js';
import type { TagCategory } from '../tags/tagDictionary.js';

export interface UserTagOption {
  readonly optionId: OptionId;
  readonly category: TagCategory;
}

/**
 * Options whose value is a list of declared tags. Snapshot restore and config
 * copies compare these and rebuild the matching dictionary category.
 */
export const USER_TAG_OPTIONS: readonly UserTagOption[] = [
  { optionId: OptionId.InlineTags, category: 'inline' },
  { optionId: OptionId.BlockTags, category: 'block' },
  { optionId: OptionId.EmptyTags, category: 'empty' },
  { optionId: OptionId.PreTags, category: 'pre' },
];

export function userTagCategoryFor(optionId: OptionId): TagCategory | undefined {
  return USER_TAG_OPTIONS.find((entry) => entry.optionId === optionId)?.category;
}

/** Category used for `new-custom-tags` under the given `custom-tags` mode. */
export function customTagCategory(mode: number): TagCategory | null {
  switch (mode) {
    case CustomTagsMode.Blocklevel:
      return 'block';
    case CustomTagsMode.Empty:
      return 'empty';
    case CustomTagsMode.Inline:
      return 'inline';
    case CustomTagsMode.Pre:
      return 'pre';
    default:
      return null;
  }
}
