/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Dense option ids. The registry table is stored in this order, so an id is
 * also the index of the option's slot in every value array.
 */
export enum OptionId {
  Unknown = 0,
  AccessibilityCheck,
  AltText,
  AnchorAsName,
  AsciiChars,
  BlockTags,
  BodyOnly,
  BreakBeforeBr,
  CharEncoding,
  CoerceEndTags,
  CssPrefix,
  CustomTags,
  DecorateInferredUl,
  Doctype,
  DoctypeMode,
  DropEmptyElements,
  DropEmptyParas,
  DropProprietaryAttributes,
  RepeatedAttributes,
  GnuEmacs,
  GnuEmacsFile,
  EmptyTags,
  EncloseBlockText,
  EncloseText,
  ErrorFile,
  EscapeCdata,
  EscapeScripts,
  FixBackslash,
  FixBadComments,
  FixUri,
  ForceOutput,
  GDoc,
  HideComments,
  OutputHtml,
  InputEncoding,
  IndentAttributes,
  IndentCdata,
  Indent,
  IndentSpaces,
  InlineTags,
  JoinClasses,
  JoinStyles,
  KeepTime,
  LiteralAttributes,
  LogicalEmphasis,
  LowerLiterals,
  Bare,
  Clean,
  Mark,
  MergeDivs,
  MergeEmphasis,
  MergeSpans,
  AddMetaCharset,
  Ncr,
  Newline,
  NumericEntities,
  OmitOptionalTags,
  OutputEncoding,
  OutputFile,
  OutputBom,
  IndentWithTabs,
  PreserveEntities,
  PreTags,
  PunctuationWrap,
  Quiet,
  QuoteAmpersand,
  QuoteMarks,
  QuoteNbsp,
  ReplaceColor,
  ShowErrors,
  ShowInfo,
  Markup,
  ShowMetaChange,
  ShowWarnings,
  SkipNested,
  SortAttributes,
  StrictTagsAttributes,
  FixStyleTags,
  TabSize,
  UppercaseAttributes,
  UppercaseTags,
  UseCustomTags,
  VerticalSpace,
  WarnProprietaryAttributes,
  Word2000,
  WrapAsp,
  WrapAttributes,
  WrapJste,
  Wrap,
  WrapPhp,
  WrapScriptLiterals,
  WrapSections,
  WriteBack,
  OutputXhtml,
  AddXmlDecl,
  OutputXml,
  AssumeXmlProcins,
  AddXmlSpace,
  InputXml,
}

/** Number of rows in the registry, including the reserved `unknown!` row. */
export const OPTION_COUNT = OptionId.InputXml + 1;

/** Values of boolean and auto-boolean options. */
export enum TriState {
  No = 0,
  Yes = 1,
  Auto = 2,
}

export enum DoctypeMode {
  Html5 = 0,
  Omit,
  Auto,
  Strict,
  Loose,
  User,
}

export enum NewlineStyle {
  LF = 0,
  CRLF,
  CR,
}

export enum RepeatedAttributeMode {
  KeepFirst = 0,
  KeepLast,
}

export enum AttributeSortMode {
  None = 0,
  Alpha,
}

export enum UppercaseMode {
  No = 0,
  Yes,
  Preserve,
}

export enum CustomTagsMode {
  No = 0,
  Blocklevel,
  Empty,
  Inline,
  Pre,
}

/** Wrap width used when `wrap` is 0. */
export const UNLIMITED_WRAP = 0x7fffffff;

/** Largest value the integer parser accepts. */
export const MAX_OPTION_INTEGER = Number.MAX_SAFE_INTEGER;

export const DEFAULT_NEWLINE: NewlineStyle =
  process.platform === 'win32' ? NewlineStyle.CRLF : NewlineStyle.LF;
