/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Pick lists: the enumerated values an option accepts. A choice's ordinal is
 * its position in the list and is the value stored for the option, so a stored
 * integer indexes back to its label.
 */

export interface PickChoice {
  readonly label: string;
  readonly ordinal: number;
  /** Accepted spellings, compared case-insensitively. */
  readonly inputs: readonly string[];
}

export type PickList = readonly PickChoice[];

function definePickList(
  choices: ReadonlyArray<{ label: string; inputs: readonly string[] }>,
): PickList {
  return Object.freeze(
    choices.map((choice, ordinal) =>
      Object.freeze({
        label: choice.label,
        ordinal,
        inputs: Object.freeze([...choice.inputs]),
      }),
    ),
  );
}

const NO_INPUTS = ['0', 'n', 'f', 'no', 'false'] as const;
const YES_INPUTS = ['1', 'y', 't', 'yes', 'true'] as const;

export const BOOL_PICKS = definePickList([
  { label: 'no', inputs: NO_INPUTS },
  { label: 'yes', inputs: YES_INPUTS },
]);

export const AUTO_BOOL_PICKS = definePickList([
  { label: 'no', inputs: NO_INPUTS },
  { label: 'yes', inputs: YES_INPUTS },
  { label: 'auto', inputs: ['auto'] },
]);

export const REPEAT_ATTR_PICKS = definePickList([
  { label: 'keep-first', inputs: ['keep-first'] },
  { label: 'keep-last', inputs: ['keep-last'] },
]);

export const ACCESS_PICKS = definePickList([
  { label: '0 (Classic)', inputs: ['0', '0 (Classic)'] },
  { label: '1 (Priority 1 Checks)', inputs: ['1', '1 (Priority 1 Checks)'] },
  { label: '2 (Priority 2 Checks)', inputs: ['2', '2 (Priority 2 Checks)'] },
  { label: '3 (Priority 3 Checks)', inputs: ['3', '3 (Priority 3 Checks)'] },
]);

/** Ordinals line up with `CharEncoding`. */
export const CHAR_ENC_PICKS = definePickList(
  [
    'raw',
    'ascii',
    'latin0',
    'latin1',
    'utf8',
    'iso2022',
    'mac',
    'win1252',
    'ibm858',
    'utf16le',
    'utf16be',
    'utf16',
    'big5',
    'shiftjis',
  ].map((name) => ({ label: name, inputs: [name] })),
);

export const NEWLINE_PICKS = definePickList([
  { label: 'LF', inputs: ['lf'] },
  { label: 'CRLF', inputs: ['crlf'] },
  { label: 'CR', inputs: ['cr'] },
]);

export const DOCTYPE_PICKS = definePickList([
  { label: 'html5', inputs: ['html5'] },
  { label: 'omit', inputs: ['omit'] },
  { label: 'auto', inputs: ['auto'] },
  { label: 'strict', inputs: ['strict'] },
  { label: 'transitional', inputs: ['loose', 'transitional'] },
  { label: 'user', inputs: ['user'] },
]);

export const SORTER_PICKS = definePickList([
  { label: 'none', inputs: ['none'] },
  { label: 'alpha', inputs: ['alpha'] },
]);

export const CUSTOM_TAGS_PICKS = definePickList([
  { label: 'no', inputs: ['no', 'n'] },
  { label: 'blocklevel', inputs: ['blocklevel'] },
  { label: 'empty', inputs: ['empty'] },
  { label: 'inline', inputs: ['inline', 'y', 'yes'] },
  { label: 'pre', inputs: ['pre'] },
]);

export const ATTRIBUTE_CASE_PICKS = definePickList([
  { label: 'no', inputs: NO_INPUTS },
  { label: 'yes', inputs: YES_INPUTS },
  { label: 'preserve', inputs: ['preserve'] },
]);

/**
 * Finds the choice accepting `token`. Choices are scanned in order and the
 * first spelling that matches wins.
 *
 * @returns the choice's ordinal, or undefined when nothing matches
 */
export function resolvePick(list: PickList, token: string): number | undefined {
  const wanted = token.toLowerCase();
  for (const choice of list) {
    if (choice.inputs.some((input) => input.toLowerCase() === wanted)) {
      return choice.ordinal;
    }
  }
  return undefined;
}

export function pickLabel(list: PickList, ordinal: number): string | undefined {
  return list[ordinal]?.label;
}
