/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TagCategory } from '../tags/tagDictionary.js';
import type { OptionId } from './optionIds.js';
import { OPTION_REGISTRY } from './optionRegistry.js';
import type { OptionDescriptor } from './types.js';

/**
 * Value held by one option. Booleans and tri-states are integers
 * (0 no, 1 yes, 2 auto). Every string option starts out as `default-string`.
 */
export type OptionValue =
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'default-string' };

export const DEFAULT_STRING: OptionValue = Object.freeze({
  kind: 'default-string',
});

export function integerValue(value: number): OptionValue {
  return { kind: 'integer', value };
}

/** An empty string is stored as the default. */
export function stringValue(value: string | null): OptionValue {
  return value === null || value === ''
    ? DEFAULT_STRING
    : { kind: 'string', value };
}

export function defaultValueOf(option: OptionDescriptor): OptionValue {
  return option.type === 'string'
    ? DEFAULT_STRING
    : integerValue(option.default);
}

export function optionValuesIdentical(a: OptionValue, b: OptionValue): boolean {
  switch (a.kind) {
    case 'integer':
      return b.kind === 'integer' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'default-string':
      return b.kind === 'default-string';
    default:
      return false;
  }
}

export function equalsDefault(
  option: OptionDescriptor,
  value: OptionValue,
): boolean {
  return optionValuesIdentical(defaultValueOf(option), value);
}

/**
 * Current and snapshot values of every option, indexed by id, plus the tag
 * categories that configuration has populated.
 *
 * Values are immutable, so copying between the two arrays copies references.
 */
export class OptionValueStore {
  private readonly current: OptionValue[];
  private readonly snapshot: OptionValue[];
  private readonly definedTagCategories = new Set<TagCategory>();

  constructor(
    readonly registry: readonly OptionDescriptor[] = OPTION_REGISTRY,
  ) {
    this.current = registry.map(defaultValueOf);
    this.snapshot = [...this.current];
  }

  get size(): number {
    return this.current.length;
  }

  get(id: OptionId): OptionValue {
    return this.current[id] ?? DEFAULT_STRING;
  }

  set(id: OptionId, value: OptionValue): void {
    this.current[id] = value;
  }

  getSnapshot(id: OptionId): OptionValue {
    return this.snapshot[id] ?? DEFAULT_STRING;
  }

  values(): readonly OptionValue[] {
    return this.current;
  }

  snapshotValues(): readonly OptionValue[] {
    return this.snapshot;
  }

  resetToDefaults(): void {
    this.registry.forEach((option, id) => {
      this.current[id] = defaultValueOf(option);
    });
  }

  resetOption(id: OptionId): void {
    const option = this.registry[id];
    if (option) {
      this.current[id] = defaultValueOf(option);
    }
  }

  saveSnapshot(): void {
    this.snapshot.splice(0, this.snapshot.length, ...this.current);
  }

  restoreSnapshot(): void {
    this.current.splice(0, this.current.length, ...this.snapshot);
  }

  copyValuesFrom(other: OptionValueStore): void {
    this.current.splice(0, this.current.length, ...other.values());
  }

  markTagCategoryDefined(category: TagCategory): void {
    this.definedTagCategories.add(category);
  }

  isTagCategoryDefined(category: TagCategory): boolean {
    return this.definedTagCategories.has(category);
  }

  clearTagCategories(): void {
    this.definedTagCategories.clear();
  }
}
