/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { writeFileSync } from 'node:fs';
import { DebugLogger } from '../debug/DebugLogger.js';
import {
  BufferSink,
  EncodedOutput,
  StringCharSource,
  type ByteSink,
  type CharSource,
} from '../encoding/charStreams.js';
import {
  DeclaredTagDictionary,
  type TagCategory,
  type TagDictionary,
} from '../tags/tagDictionary.js';
import {
  expandTilde,
  parseProperties,
  readConfigFile,
  type ParseFileResult,
  type PropertyHost,
} from './configFile.js';
import { renderConfig, type RenderConfigResult } from './configWriter.js';
import {
  adjustCharEncoding,
  applyConsistencyRules,
  type ConsistencyTarget,
} from './consistency.js';
import {
  badArgument,
  fileOpenFailure,
  getErrorMessage,
  LoggingReporter,
  unknownOption,
  type ConfigDiagnostic,
  type ConfigReporter,
} from './errors.js';
import { OptionId, TriState } from './optionIds.js';
import { getOptionById, lookupOptionByName } from './optionRegistry.js';
import {
  DEFAULT_STRING,
  integerValue,
  OptionValueStore,
  stringValue,
} from './optionValues.js';
import { pickLabel } from './pickLists.js';
import {
  copyConfig,
  diffFromDefault,
  diffFromSnapshot,
  restoreSnapshot,
  takeSnapshot,
  type SnapshotHost,
} from './snapshot.js';
import { ConfigTokenizer } from './tokenizer.js';
import type { OptionKind } from './types.js';
import type { UserTagOption } from './userTags.js';

/**
 * Receives options the registry does not know. Returning false reports the
 * option as unknown.
 */
export type UnknownOptionHandler = (
  name: string,
  value: string,
  config: MarkupConfig,
) => boolean;

export interface MarkupConfigOptions {
  /** Dictionary that declared tags are written to. Defaults to a fresh one. */
  tagDictionary?: TagDictionary;
  /** Defaults to a reporter writing to the debug log. */
  reporter?: ConfigReporter;
  unknownOptionHandler?: UnknownOptionHandler;
}

export type SaveConfigResult =
  | { success: true }
  | { success: false; message: string };

/**
 * Configuration of one document: option values, their snapshot, and the tags
 * declared through the tag list options.
 *
 * Value problems are reported as diagnostics and never thrown. Only a
 * configuration file that cannot be opened makes a parse fail outright.
 */
export class MarkupConfig
  implements PropertyHost, SnapshotHost, ConsistencyTarget
{
  readonly store = new OptionValueStore();
  readonly tagDictionary: TagDictionary;

  private readonly reporter: ConfigReporter;
  private readonly unknownOptionHandler?: UnknownOptionHandler;
  private readonly logger = DebugLogger.getLogger('markup-config:config');
  private readonly _diagnostics: ConfigDiagnostic[] = [];
  private activeInput: ConfigTokenizer | undefined;
  private _optionErrors = 0;

  constructor(options: MarkupConfigOptions = {}) {
    this.tagDictionary = options.tagDictionary ?? new DeclaredTagDictionary();
    this.reporter = options.reporter ?? new LoggingReporter();
    this.unknownOptionHandler = options.unknownOptionHandler;
  }

  /** Tokenizer over the value being parsed. */
  get input(): ConfigTokenizer {
    if (!this.activeInput) {
      throw new Error('No configuration input is being parsed');
    }
    return this.activeInput;
  }

  /** Option errors reported since construction. */
  get optionErrors(): number {
    return this._optionErrors;
  }

  get diagnostics(): readonly ConfigDiagnostic[] {
    return this._diagnostics;
  }

  /**
   * Reads a configuration file. `~/` expands to the home directory.
   *
   * @param encodingName - encoding of the file, as an option value spelling
   */
  parseFile(path: string, encodingName = 'ascii'): ParseFileResult {
    const read = readConfigFile(path, encodingName);
    if (!read.success) {
      this.record(fileOpenFailure(read.error));
      return { status: 'fatal', errorCount: 0, error: read.error };
    }

    const errorsBefore = this._optionErrors;
    this.logger.debug(() => `Parsing configuration file ${read.path}`);
    this.withInput(new StringCharSource(read.text), () =>
      parseProperties(this),
    );
    this.applyConsistencyRules();

    const errorCount = this._optionErrors - errorsBefore;
    this.logger.debug(
      () => `Parsed ${read.path} with ${errorCount} option error(s)`,
    );
    return { status: errorCount > 0 ? 'warnings' : 'clean', errorCount };
  }

  /**
   * Sets one option by name. Unknown names go to the unknown option handler
   * and are reported when it declines them.
   */
  parseOption(name: string, value: string): boolean {
    const option = lookupOptionByName(name);
    if (!option) {
      const accepted = this.offerUnknownOption(name, value);
      if (!accepted) {
        this.reportUnknownOption(name);
      }
      return accepted;
    }
    return this.parseValueById(option.id, value);
  }

  parseValueById(id: number, value: string): boolean {
    const option = getOptionById(id);
    if (!option) {
      this.reportUnknownOption(String(id));
      return false;
    }
    const parser = option.parser;
    if (!parser) {
      this.reportBadArgument(option.name);
      return false;
    }

    return this.withInput(new StringCharSource(value), () => {
      this.input.first();
      return parser(this, option);
    });
  }

  getInt(id: OptionId): number {
    const value = this.store.get(id);
    return value.kind === 'integer' ? value.value : 0;
  }

  getBool(id: OptionId): boolean {
    return this.getInt(id) !== 0;
  }

  getAutoBool(id: OptionId): TriState {
    switch (this.getInt(id)) {
      case TriState.No:
        return TriState.No;
      case TriState.Yes:
        return TriState.Yes;
      default:
        return TriState.Auto;
    }
  }

  /** Null while the option holds its default. */
  getString(id: OptionId): string | null {
    const value = this.store.get(id);
    return value.kind === 'string' ? value.value : null;
  }

  /** Label of the pick list choice an option currently holds. */
  getPickLabel(id: OptionId): string | undefined {
    const pickList = getOptionById(id)?.pickList;
    return pickList && pickLabel(pickList, this.getInt(id));
  }

  setInt(id: OptionId, value: number): boolean {
    if (!this.hasKind(id, 'integer') || !isOptionInteger(value)) {
      return false;
    }
    this.store.set(id, integerValue(value));
    return true;
  }

  setBool(id: OptionId, value: boolean): boolean {
    if (!this.hasKind(id, 'boolean')) {
      return false;
    }
    this.store.set(id, integerValue(value ? 1 : 0));
    return true;
  }

  setString(id: OptionId, value: string | null): boolean {
    if (!this.hasKind(id, 'string')) {
      return false;
    }
    this.store.set(id, stringValue(value));
    return true;
  }

  resetOptionToDefault(id: OptionId): boolean {
    if (id <= OptionId.Unknown || !getOptionById(id)) {
      return false;
    }
    this.store.resetOption(id);
    return true;
  }

  /** Restores every default and frees every declared tag. */
  resetToDefault(): void {
    this.store.resetToDefaults();
    this.tagDictionary.freeDeclaredTags();
    this.store.clearTagCategories();
  }

  takeSnapshot(): void {
    takeSnapshot(this);
  }

  restoreSnapshot(): void {
    restoreSnapshot(this);
  }

  /** Copies another configuration's values into this one. */
  copyFrom(source: MarkupConfig): void {
    copyConfig(this, source);
  }

  diffFromSnapshot(): boolean {
    return diffFromSnapshot(this.store);
  }

  diffFromDefault(): boolean {
    return diffFromDefault(this.store);
  }

  /**
   * Text the configuration saves as, before encoding; line breaks are `\n`.
   */
  saveToString(): RenderConfigResult {
    return renderConfig(this.store);
  }

  /**
   * Writes the options that differ from their defaults, encoded with
   * `output-encoding` and ending lines as `newline` says.
   */
  saveToSink(sink: ByteSink): SaveConfigResult {
    const rendered = this.saveToString();
    if (!rendered.success) {
      this.logger.warn(() => rendered.message);
      return rendered;
    }
    new EncodedOutput(
      sink,
      this.getInt(OptionId.OutputEncoding),
      this.getInt(OptionId.Newline),
    ).write(rendered.text);
    return { success: true };
  }

  saveToFile(path: string): SaveConfigResult {
    const sink = new BufferSink();
    const saved = this.saveToSink(sink);
    if (!saved.success) {
      return saved;
    }

    const target = expandTilde(path);
    try {
      writeFileSync(target, sink.toUint8Array());
    } catch (error) {
      const message = `Cannot write configuration file "${target}": ${getErrorMessage(error)}`;
      this.logger.error(() => message);
      return { success: false, message };
    }
    this.logger.debug(() => `Saved configuration to ${target}`);
    return { success: true };
  }

  /** Drops every setting; the instance can be reused afterwards. */
  dispose(): void {
    this.resetToDefault();
    this.takeSnapshot();
  }

  isTagCategoryDefined(category: TagCategory): boolean {
    return this.store.isTagCategoryDefined(category);
  }

  reportBadArgument(optionName: string): void {
    this.record(badArgument(optionName));
  }

  reportUnknownOption(optionName: string): void {
    this.record(unknownOption(optionName));
  }

  beginTagDeclarations(optionId: OptionId, category: TagCategory | null): void {
    this.store.set(optionId, DEFAULT_STRING);
    if (category !== null) {
      this.tagDictionary.freeDeclaredTags(category);
      this.store.markTagCategoryDefined(category);
    }
  }

  declareUserTag(
    optionId: OptionId,
    category: TagCategory | null,
    name: string,
  ): void {
    const previous = this.getString(optionId);
    if (category !== null) {
      this.tagDictionary.defineTag(category, name);
    }
    this.store.set(
      optionId,
      stringValue(previous ? `${previous}, ${name}` : name),
    );
  }

  declareBuiltinTag(category: TagCategory, name: string): void {
    this.store.markTagCategoryDefined(category);
    this.tagDictionary.defineTag(category, name);
  }

  adjustCharEncoding(encoding: number): boolean {
    return adjustCharEncoding(this, encoding);
  }

  offerUnknownOption(name: string, value: string): boolean {
    return this.unknownOptionHandler?.(name, value, this) ?? false;
  }

  applyConsistencyRules(): void {
    applyConsistencyRules(this);
  }

  reparseTagDeclarations(changed: readonly UserTagOption[]): void {
    for (const { optionId, category } of changed) {
      this.tagDictionary.freeDeclaredTags(category);
      const value = this.store.get(optionId);
      if (value.kind === 'string') {
        this.parseValueById(optionId, value.value);
      }
    }
  }

  private hasKind(id: OptionId, kind: OptionKind): boolean {
    return getOptionById(id)?.type === kind;
  }

  private record(diagnostic: ConfigDiagnostic): void {
    if (diagnostic.kind !== 'file-open-failure') {
      this._optionErrors++;
    }
    this._diagnostics.push(diagnostic);
    this.reporter.report(diagnostic);
  }

  private withInput<T>(source: CharSource, run: () => T): T {
    const previous = this.activeInput;
    this.activeInput = new ConfigTokenizer(source);
    try {
      return run();
    } finally {
      this.activeInput = previous;
    }
  }
}

function isOptionInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}
