/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CharEncoding } from '../encoding/charEncodings.js';
import {
  AttributeSortMode,
  CustomTagsMode,
  DEFAULT_NEWLINE,
  DoctypeMode,
  OPTION_COUNT,
  OptionId,
  RepeatedAttributeMode,
  TriState,
  UppercaseMode,
} from './optionIds.js';
import {
  ACCESS_PICKS,
  ATTRIBUTE_CASE_PICKS,
  AUTO_BOOL_PICKS,
  BOOL_PICKS,
  CHAR_ENC_PICKS,
  CUSTOM_TAGS_PICKS,
  DOCTYPE_PICKS,
  NEWLINE_PICKS,
  REPEAT_ATTR_PICKS,
  SORTER_PICKS,
  type PickList,
} from './pickLists.js';
import type {
  NumericOptionDescriptor,
  OptionCategory,
  OptionDescriptor,
  OptionParser,
  StringOptionDescriptor,
} from './types.js';
import {
  parseCharEncoding,
  parseCss1Selector,
  parseDelimitedString,
  parseDoctype,
  parseInteger,
  parsePickList,
  parseTabs,
  parseTagNames,
} from './valueParsers.js';

function booleanOption(
  id: OptionId,
  category: OptionCategory,
  name: string,
  defaultValue: boolean,
): NumericOptionDescriptor {
  return {
    id,
    category,
    name,
    type: 'boolean',
    default: defaultValue ? 1 : 0,
    parser: parsePickList,
    pickList: BOOL_PICKS,
  };
}

function pickOption(
  id: OptionId,
  category: OptionCategory,
  name: string,
  defaultValue: number,
  pickList: PickList,
): NumericOptionDescriptor {
  return {
    id,
    category,
    name,
    type: 'integer',
    default: defaultValue,
    parser: parsePickList,
    pickList,
  };
}

function integerOption(
  id: OptionId,
  category: OptionCategory,
  name: string,
  defaultValue: number,
): NumericOptionDescriptor {
  return {
    id,
    category,
    name,
    type: 'integer',
    default: defaultValue,
    parser: parseInteger,
  };
}

function stringOption(
  id: OptionId,
  category: OptionCategory,
  name: string,
  parser: OptionParser,
): StringOptionDescriptor {
  return { id, category, name, type: 'string', default: null, parser };
}

/**
 * Every option the engine knows, indexed by `OptionId`. Row 0 is reserved
 * and never matches a lookup; rows without a parser are set only as a side
 * effect of other options.
 */
export const OPTION_REGISTRY: readonly OptionDescriptor[] = [
  {
    id: OptionId.Unknown,
    category: 'miscellaneous',
    name: 'unknown!',
    type: 'integer',
    default: 0,
  },
  pickOption(
    OptionId.AccessibilityCheck,
    'diagnostics',
    'accessibility-check',
    0,
    ACCESS_PICKS,
  ),
  stringOption(OptionId.AltText, 'markup', 'alt-text', parseDelimitedString),
  booleanOption(OptionId.AnchorAsName, 'markup', 'anchor-as-name', true),
  booleanOption(OptionId.AsciiChars, 'encoding', 'ascii-chars', false),
  stringOption(
    OptionId.BlockTags,
    'markup',
    'new-blocklevel-tags',
    parseTagNames,
  ),
  pickOption(OptionId.BodyOnly, 'markup', 'show-body-only', 0, AUTO_BOOL_PICKS),
  booleanOption(
    OptionId.BreakBeforeBr,
    'pretty-print',
    'break-before-br',
    false,
  ),
  {
    id: OptionId.CharEncoding,
    category: 'encoding',
    name: 'char-encoding',
    type: 'integer',
    default: CharEncoding.Utf8,
    parser: parseCharEncoding,
    pickList: CHAR_ENC_PICKS,
  },
  booleanOption(OptionId.CoerceEndTags, 'markup', 'coerce-endtags', true),
  stringOption(OptionId.CssPrefix, 'markup', 'css-prefix', parseCss1Selector),
  stringOption(
    OptionId.CustomTags,
    'internal',
    'new-custom-tags',
    parseTagNames,
  ),
  booleanOption(
    OptionId.DecorateInferredUl,
    'markup',
    'decorate-inferred-ul',
    false,
  ),
  {
    id: OptionId.Doctype,
    category: 'markup',
    name: 'doctype',
    type: 'string',
    default: null,
    parser: parseDoctype,
    pickList: DOCTYPE_PICKS,
  },
  {
    id: OptionId.DoctypeMode,
    category: 'internal',
    name: 'doctype-mode',
    type: 'integer',
    default: DoctypeMode.Auto,
    pickList: DOCTYPE_PICKS,
  },
  booleanOption(
    OptionId.DropEmptyElements,
    'markup',
    'drop-empty-elements',
    true,
  ),
  booleanOption(OptionId.DropEmptyParas, 'markup', 'drop-empty-paras', true),
  booleanOption(
    OptionId.DropProprietaryAttributes,
    'markup',
    'drop-proprietary-attributes',
    false,
  ),
  pickOption(
    OptionId.RepeatedAttributes,
    'markup',
    'repeated-attributes',
    RepeatedAttributeMode.KeepLast,
    REPEAT_ATTR_PICKS,
  ),
  booleanOption(OptionId.GnuEmacs, 'miscellaneous', 'gnu-emacs', false),
  stringOption(
    OptionId.GnuEmacsFile,
    'internal',
    'gnu-emacs-file',
    parseDelimitedString,
  ),
  stringOption(OptionId.EmptyTags, 'markup', 'new-empty-tags', parseTagNames),
  booleanOption(
    OptionId.EncloseBlockText,
    'markup',
    'enclose-block-text',
    false,
  ),
  booleanOption(OptionId.EncloseText, 'markup', 'enclose-text', false),
  stringOption(
    OptionId.ErrorFile,
    'miscellaneous',
    'error-file',
    parseDelimitedString,
  ),
  booleanOption(OptionId.EscapeCdata, 'markup', 'escape-cdata', false),
  booleanOption(OptionId.EscapeScripts, 'pretty-print', 'escape-scripts', true),
  booleanOption(OptionId.FixBackslash, 'markup', 'fix-backslash', true),
  booleanOption(OptionId.FixBadComments, 'markup', 'fix-bad-comments', true),
  booleanOption(OptionId.FixUri, 'markup', 'fix-uri', true),
  booleanOption(OptionId.ForceOutput, 'miscellaneous', 'force-output', false),
  booleanOption(OptionId.GDoc, 'markup', 'gdoc', false),
  booleanOption(OptionId.HideComments, 'markup', 'hide-comments', false),
  booleanOption(OptionId.OutputHtml, 'markup', 'output-html', false),
  {
    id: OptionId.InputEncoding,
    category: 'encoding',
    name: 'input-encoding',
    type: 'integer',
    default: CharEncoding.Utf8,
    parser: parseCharEncoding,
    pickList: CHAR_ENC_PICKS,
  },
  booleanOption(
    OptionId.IndentAttributes,
    'pretty-print',
    'indent-attributes',
    false,
  ),
  booleanOption(OptionId.IndentCdata, 'markup', 'indent-cdata', false),
  pickOption(
    OptionId.Indent,
    'pretty-print',
    'indent',
    TriState.No,
    AUTO_BOOL_PICKS,
  ),
  integerOption(OptionId.IndentSpaces, 'pretty-print', 'indent-spaces', 2),
  stringOption(OptionId.InlineTags, 'markup', 'new-inline-tags', parseTagNames),
  booleanOption(OptionId.JoinClasses, 'markup', 'join-classes', false),
  booleanOption(OptionId.JoinStyles, 'markup', 'join-styles', true),
  booleanOption(OptionId.KeepTime, 'miscellaneous', 'keep-time', false),
  booleanOption(
    OptionId.LiteralAttributes,
    'markup',
    'literal-attributes',
    false,
  ),
  booleanOption(OptionId.LogicalEmphasis, 'markup', 'logical-emphasis', false),
  booleanOption(OptionId.LowerLiterals, 'markup', 'lower-literals', true),
  booleanOption(OptionId.Bare, 'markup', 'bare', false),
  booleanOption(OptionId.Clean, 'markup', 'clean', false),
  booleanOption(OptionId.Mark, 'miscellaneous', 'generator-mark', true),
  pickOption(
    OptionId.MergeDivs,
    'markup',
    'merge-divs',
    TriState.Auto,
    AUTO_BOOL_PICKS,
  ),
  booleanOption(OptionId.MergeEmphasis, 'markup', 'merge-emphasis', true),
  pickOption(
    OptionId.MergeSpans,
    'markup',
    'merge-spans',
    TriState.Auto,
    AUTO_BOOL_PICKS,
  ),
  booleanOption(
    OptionId.AddMetaCharset,
    'miscellaneous',
    'add-meta-charset',
    false,
  ),
  booleanOption(OptionId.Ncr, 'markup', 'ncr', true),
  pickOption(
    OptionId.Newline,
    'encoding',
    'newline',
    DEFAULT_NEWLINE,
    NEWLINE_PICKS,
  ),
  booleanOption(OptionId.NumericEntities, 'markup', 'numeric-entities', false),
  booleanOption(
    OptionId.OmitOptionalTags,
    'markup',
    'omit-optional-tags',
    false,
  ),
  {
    id: OptionId.OutputEncoding,
    category: 'encoding',
    name: 'output-encoding',
    type: 'integer',
    default: CharEncoding.Utf8,
    parser: parseCharEncoding,
    pickList: CHAR_ENC_PICKS,
  },
  stringOption(
    OptionId.OutputFile,
    'miscellaneous',
    'output-file',
    parseDelimitedString,
  ),
  pickOption(
    OptionId.OutputBom,
    'encoding',
    'output-bom',
    TriState.Auto,
    AUTO_BOOL_PICKS,
  ),
  {
    id: OptionId.IndentWithTabs,
    category: 'pretty-print',
    name: 'indent-with-tabs',
    type: 'boolean',
    default: 0,
    parser: parseTabs,
    pickList: BOOL_PICKS,
  },
  booleanOption(
    OptionId.PreserveEntities,
    'markup',
    'preserve-entities',
    false,
  ),
  stringOption(OptionId.PreTags, 'markup', 'new-pre-tags', parseTagNames),
  booleanOption(
    OptionId.PunctuationWrap,
    'pretty-print',
    'punctuation-wrap',
    false,
  ),
  booleanOption(OptionId.Quiet, 'miscellaneous', 'quiet', false),
  booleanOption(OptionId.QuoteAmpersand, 'markup', 'quote-ampersand', true),
  booleanOption(OptionId.QuoteMarks, 'markup', 'quote-marks', false),
  booleanOption(OptionId.QuoteNbsp, 'markup', 'quote-nbsp', true),
  booleanOption(OptionId.ReplaceColor, 'markup', 'replace-color', false),
  integerOption(OptionId.ShowErrors, 'diagnostics', 'show-errors', 6),
  booleanOption(OptionId.ShowInfo, 'diagnostics', 'show-info', true),
  booleanOption(OptionId.Markup, 'pretty-print', 'markup', true),
  booleanOption(
    OptionId.ShowMetaChange,
    'miscellaneous',
    'show-meta-change',
    false,
  ),
  booleanOption(OptionId.ShowWarnings, 'diagnostics', 'show-warnings', true),
  booleanOption(OptionId.SkipNested, 'markup', 'skip-nested', true),
  pickOption(
    OptionId.SortAttributes,
    'pretty-print',
    'sort-attributes',
    AttributeSortMode.None,
    SORTER_PICKS,
  ),
  booleanOption(
    OptionId.StrictTagsAttributes,
    'markup',
    'strict-tags-attributes',
    false,
  ),
  booleanOption(OptionId.FixStyleTags, 'markup', 'fix-style-tags', true),
  integerOption(OptionId.TabSize, 'pretty-print', 'tab-size', 8),
  pickOption(
    OptionId.UppercaseAttributes,
    'markup',
    'uppercase-attributes',
    UppercaseMode.No,
    ATTRIBUTE_CASE_PICKS,
  ),
  booleanOption(OptionId.UppercaseTags, 'markup', 'uppercase-tags', false),
  pickOption(
    OptionId.UseCustomTags,
    'markup',
    'custom-tags',
    CustomTagsMode.No,
    CUSTOM_TAGS_PICKS,
  ),
  pickOption(
    OptionId.VerticalSpace,
    'pretty-print',
    'vertical-space',
    0,
    AUTO_BOOL_PICKS,
  ),
  booleanOption(
    OptionId.WarnProprietaryAttributes,
    'markup',
    'warn-proprietary-attributes',
    true,
  ),
  booleanOption(OptionId.Word2000, 'markup', 'word-2000', false),
  booleanOption(OptionId.WrapAsp, 'pretty-print', 'wrap-asp', true),
  booleanOption(
    OptionId.WrapAttributes,
    'pretty-print',
    'wrap-attributes',
    false,
  ),
  booleanOption(OptionId.WrapJste, 'pretty-print', 'wrap-jste', true),
  integerOption(OptionId.Wrap, 'pretty-print', 'wrap', 68),
  booleanOption(OptionId.WrapPhp, 'pretty-print', 'wrap-php', true),
  booleanOption(
    OptionId.WrapScriptLiterals,
    'pretty-print',
    'wrap-script-literals',
    false,
  ),
  booleanOption(OptionId.WrapSections, 'pretty-print', 'wrap-sections', true),
  booleanOption(OptionId.WriteBack, 'miscellaneous', 'write-back', false),
  booleanOption(OptionId.OutputXhtml, 'markup', 'output-xhtml', false),
  booleanOption(OptionId.AddXmlDecl, 'markup', 'add-xml-decl', false),
  booleanOption(OptionId.OutputXml, 'markup', 'output-xml', false),
  booleanOption(
    OptionId.AssumeXmlProcins,
    'markup',
    'assume-xml-procins',
    false,
  ),
  booleanOption(OptionId.AddXmlSpace, 'markup', 'add-xml-space', false),
  booleanOption(OptionId.InputXml, 'markup', 'input-xml', false),
];

/**
 * Finds an option by its canonical name, ignoring case. Aliases are not
 * accepted here.
 */
export function lookupOptionByName(name: string): OptionDescriptor | undefined {
  const wanted = name.toLowerCase();
  for (let id = OptionId.Unknown + 1; id < OPTION_COUNT; id++) {
    const option = OPTION_REGISTRY[id];
    if (option?.name === wanted) {
      return option;
    }
  }
  return undefined;
}

export function getOptionById(id: number): OptionDescriptor | undefined {
  if (!Number.isInteger(id) || id < 0 || id >= OPTION_COUNT) {
    return undefined;
  }
  return OPTION_REGISTRY[id];
}

/** Every option after the reserved row, in id order. */
export function listOptions(): OptionDescriptor[] {
  return OPTION_REGISTRY.slice(OptionId.Unknown + 1);
}

export function getPickListLabels(option: OptionDescriptor): string[] {
  return option.pickList?.map((choice) => choice.label) ?? [];
}
