/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { OptionId } from './optionIds.js';
import {
  equalsDefault,
  optionValuesIdentical,
  type OptionValue,
  type OptionValueStore,
} from './optionValues.js';
import { USER_TAG_OPTIONS, type UserTagOption } from './userTags.js';

/** A configuration whose values can be snapshotted, restored and copied. */
export interface SnapshotHost {
  readonly store: OptionValueStore;
  applyConsistencyRules(): void;
  /**
   * Frees the declared tags of each changed category and declares them again
   * from the restored option value.
   */
  reparseTagDeclarations(changed: readonly UserTagOption[]): void;
}

/** Tag list options whose value differs between the two value arrays. */
export function changedUserTagOptions(
  current: readonly OptionValue[],
  incoming: readonly OptionValue[],
): UserTagOption[] {
  return USER_TAG_OPTIONS.filter((entry) => {
    const before = current[entry.optionId];
    const after = incoming[entry.optionId];
    return (
      before === undefined ||
      after === undefined ||
      !optionValuesIdentical(before, after)
    );
  });
}

export function takeSnapshot(host: SnapshotHost): void {
  host.applyConsistencyRules();
  host.store.saveSnapshot();
}

export function restoreSnapshot(host: SnapshotHost): void {
  const { store } = host;
  const changed = changedUserTagOptions(store.values(), store.snapshotValues());
  store.restoreSnapshot();
  if (changed.length > 0) {
    host.reparseTagDeclarations(changed);
  }
}

/**
 * Copies every value of `from` into `to`. The target's previous state is
 * snapshotted first so that it can be restored afterwards.
 */
export function copyConfig(to: SnapshotHost, from: SnapshotHost): void {
  if (to === from) {
    return;
  }

  const changed = changedUserTagOptions(to.store.values(), from.store.values());
  takeSnapshot(to);
  to.store.copyValuesFrom(from.store);
  if (changed.length > 0) {
    to.reparseTagDeclarations(changed);
  }
  to.applyConsistencyRules();
}

export function diffFromSnapshot(store: OptionValueStore): boolean {
  const snapshot = store.snapshotValues();
  return store.values().some((value, id) => {
    const saved = snapshot[id];
    return saved === undefined || !optionValuesIdentical(value, saved);
  });
}

export function diffFromDefault(store: OptionValueStore): boolean {
  return store.registry.some(
    (option, id) =>
      id !== OptionId.Unknown && !equalsDefault(option, store.get(id)),
  );
}
