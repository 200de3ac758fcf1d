/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './config/MarkupConfig.js';
export * from './config/optionIds.js';
export * from './config/optionRegistry.js';
export * from './config/optionValues.js';
export * from './config/pickLists.js';
export * from './config/types.js';
export * from './config/errors.js';
export * from './config/consistency.js';
export * from './config/snapshot.js';
export * from './config/tokenizer.js';
export * from './config/valueParsers.js';
export * from './config/css1Selector.js';
export * from './config/userTags.js';
export {
  expandTilde,
  fileExists,
  readConfigFile,
  type ParseFileResult,
  type ParseFileStatus,
  type PropertyHost,
  type ReadConfigFileResult,
} from './config/configFile.js';
export { renderConfig, type RenderConfigResult } from './config/configWriter.js';
export * from './encoding/charEncodings.js';
export * from './encoding/charStreams.js';
export * from './tags/tagDictionary.js';
export { DebugLogger, DEBUG_ENV_VAR, ROOT_NAMESPACE } from './debug/DebugLogger.js';
export type { LogEntry, LogLevel } from './debug/types.js';
