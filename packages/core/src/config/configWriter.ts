/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DoctypeMode, OptionId } from './optionIds.js';
import {
  equalsDefault,
  type OptionValue,
  type OptionValueStore,
} from './optionValues.js';
import { pickLabel } from './pickLists.js';
import type { OptionDescriptor } from './types.js';

export type RenderConfigResult =
  | { success: true; text: string }
  | { success: false; message: string };

function numberOf(value: OptionValue): number {
  return value.kind === 'integer' ? value.value : 0;
}

function formatLine(option: OptionDescriptor, text: string): string {
  return `${option.name}: ${text}\n`;
}

function formatDoctype(
  store: OptionValueStore,
  option: OptionDescriptor,
): string | null | undefined {
  const mode = numberOf(store.get(OptionId.DoctypeMode));
  if (mode === DoctypeMode.User) {
    const value = store.get(option.id);
    return `"${value.kind === 'string' ? value.value : ''}"`;
  }
  if (mode === store.registry[OptionId.DoctypeMode]?.default) {
    return null;
  }
  return option.pickList && pickLabel(option.pickList, mode);
}

/**
 * Text of one option's line, null when the option is not written, or
 * undefined when its value has no label in the option's pick list.
 */
function formatValue(
  store: OptionValueStore,
  option: OptionDescriptor,
): string | null | undefined {
  if (option.id === OptionId.Doctype) {
    return formatDoctype(store, option);
  }

  const value = store.get(option.id);
  if (equalsDefault(option, value)) {
    return null;
  }

  if (option.pickList) {
    return pickLabel(option.pickList, numberOf(value));
  }
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'integer':
      if (option.type === 'boolean') {
        return value.value !== 0 ? 'yes' : 'no';
      }
      return String(value.value);
    default:
      return null;
  }
}

/**
 * Renders every settable option that differs from its default as
 * `name: value` lines, in id order. Lines end in `\n`; the output layer
 * translates them to the configured newline.
 */
export function renderConfig(store: OptionValueStore): RenderConfigResult {
  let text = '';
  for (const option of store.registry) {
    if (option.id === OptionId.Unknown || !option.parser) {
      continue;
    }
    const formatted = formatValue(store, option);
    if (formatted === undefined) {
      return {
        success: false,
        message: `Option "${option.name}" holds a value outside its pick list`,
      };
    }
    if (formatted !== null) {
      text += formatLine(option, formatted);
    }
  }
  return { success: true, text };
}
