/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CharEncoding, isUtf16Encoding } from '../encoding/charEncodings.js';
import type { TagCategory } from '../tags/tagDictionary.js';
import {
  OptionId,
  TriState,
  UNLIMITED_WRAP,
  UppercaseMode,
} from './optionIds.js';
import type { OptionAccess } from './types.js';

/** What the consistency rules read and write. */
export interface ConsistencyTarget extends OptionAccess {
  getAutoBool(id: OptionId): TriState;
  /** Declares a tag that configuration needs regardless of the tag options. */
  declareBuiltinTag(category: TagCategory, name: string): void;
}

export interface ConsistencyRule {
  readonly name: string;
  apply(target: ConsistencyTarget): void;
}

/** Output encodings that never need an XML declaration. */
const ENCODINGS_WITHOUT_XML_DECL: ReadonlySet<number> = new Set([
  CharEncoding.Ascii,
  CharEncoding.Utf8,
  CharEncoding.Utf16,
  CharEncoding.Utf16be,
  CharEncoding.Utf16le,
  CharEncoding.Raw,
]);

/**
 * Implications between options, applied in order. Later rules see the
 * effects of earlier ones.
 */
export const CONSISTENCY_RULES: readonly ConsistencyRule[] = [
  {
    name: 'enclose-block-text-implies-enclose-text',
    apply(target) {
      if (target.getBool(OptionId.EncloseBlockText)) {
        target.setBool(OptionId.EncloseText, true);
      }
    },
  },
  {
    name: 'no-indent-zeroes-indent-spaces',
    apply(target) {
      if (target.getAutoBool(OptionId.Indent) === TriState.No) {
        target.setInt(OptionId.IndentSpaces, 0);
      }
    },
  },
  {
    name: 'zero-wrap-means-unlimited',
    apply(target) {
      if (target.getInt(OptionId.Wrap) === 0) {
        target.setInt(OptionId.Wrap, UNLIMITED_WRAP);
      }
    },
  },
  {
    name: 'word-2000-declares-o-p-inline',
    apply(target) {
      if (target.getBool(OptionId.Word2000)) {
        target.declareBuiltinTag('inline', 'o:p');
      }
    },
  },
  {
    name: 'xml-input-disables-xhtml-output',
    apply(target) {
      if (target.getBool(OptionId.InputXml)) {
        target.setBool(OptionId.OutputXhtml, false);
      }
    },
  },
  {
    // XHTML is written in lower case.
    name: 'xhtml-output-implies-xml-output',
    apply(target) {
      if (target.getBool(OptionId.OutputXhtml)) {
        target.setBool(OptionId.OutputXml, true);
        target.setBool(OptionId.UppercaseTags, false);
        target.setInt(OptionId.UppercaseAttributes, UppercaseMode.No);
      }
    },
  },
  {
    name: 'xml-input-implies-xml-output',
    apply(target) {
      if (target.getBool(OptionId.InputXml)) {
        target.setBool(OptionId.OutputXml, true);
        target.setBool(OptionId.AssumeXmlProcins, true);
      }
    },
  },
  {
    name: 'xml-output-declares-legacy-encoding',
    apply(target) {
      const output = target.getInt(OptionId.OutputEncoding);
      if (
        !ENCODINGS_WITHOUT_XML_DECL.has(output) &&
        target.getBool(OptionId.OutputXml)
      ) {
        target.setBool(OptionId.AddXmlDecl, true);
      }
    },
  },
  {
    name: 'xml-output-requirements',
    apply(target) {
      if (!target.getBool(OptionId.OutputXml)) {
        return;
      }
      if (isUtf16Encoding(target.getInt(OptionId.OutputEncoding))) {
        target.setInt(OptionId.OutputBom, TriState.Yes);
      }
      target.setBool(OptionId.QuoteAmpersand, true);
      target.setBool(OptionId.OmitOptionalTags, false);
    },
  },
];

export function applyConsistencyRules(target: ConsistencyTarget): void {
  for (const rule of CONSISTENCY_RULES) {
    rule.apply(target);
  }
}

export interface StreamEncodings {
  readonly input: CharEncoding;
  readonly output: CharEncoding;
}

/**
 * Input and output encodings implied by a primary encoding, or undefined
 * when the encoding has no pairing.
 */
export function deriveStreamEncodings(
  encoding: number,
): StreamEncodings | undefined {
  switch (encoding) {
    case CharEncoding.MacRoman:
    case CharEncoding.Win1252:
    case CharEncoding.Ibm858:
    case CharEncoding.Latin0:
      return { input: encoding, output: CharEncoding.Ascii };
    case CharEncoding.Ascii:
      return { input: CharEncoding.Latin1, output: CharEncoding.Ascii };
    case CharEncoding.Raw:
    case CharEncoding.Latin1:
    case CharEncoding.Utf8:
    case CharEncoding.Iso2022:
    case CharEncoding.Utf16le:
    case CharEncoding.Utf16be:
    case CharEncoding.Utf16:
    case CharEncoding.Big5:
    case CharEncoding.ShiftJis:
      return { input: encoding, output: encoding };
    default:
      return undefined;
  }
}

/**
 * Sets `char-encoding` and the input and output encodings it implies.
 * Leaves everything alone and returns false for an unpaired encoding.
 */
export function adjustCharEncoding(
  target: OptionAccess,
  encoding: number,
): boolean {
  const derived = deriveStreamEncodings(encoding);
  if (derived === undefined) {
    return false;
  }
  target.setInt(OptionId.CharEncoding, encoding);
  target.setInt(OptionId.InputEncoding, derived.input);
  target.setInt(OptionId.OutputEncoding, derived.output);
  return true;
}
