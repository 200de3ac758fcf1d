/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/DebugLogger.js';

export type ConfigErrorKind =
  | 'bad-argument'
  | 'unknown-option'
  | 'file-open-failure';

export interface ConfigDiagnostic {
  kind: ConfigErrorKind;
  /** Option name, or the file path for `file-open-failure`. */
  subject: string;
  message: string;
}

/** Receives every problem found while reading configuration. */
export interface ConfigReporter {
  report(diagnostic: ConfigDiagnostic): void;
}

/**
 * A configuration file that could not be opened, or whose encoding name is
 * unknown. Reading stops before any option is parsed.
 */
export class ConfigFileError extends Error {
  readonly kind = 'file-open-failure';
  readonly path: string;
  readonly cause?: unknown;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'ConfigFileError';
    this.path = path;
    this.cause = options?.cause;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

export function badArgument(optionName: string): ConfigDiagnostic {
  return {
    kind: 'bad-argument',
    subject: optionName,
    message: `Invalid value for option "${optionName}"`,
  };
}

export function unknownOption(optionName: string): ConfigDiagnostic {
  return {
    kind: 'unknown-option',
    subject: optionName,
    message: `Unknown option "${optionName}"`,
  };
}

export function fileOpenFailure(error: ConfigFileError): ConfigDiagnostic {
  return {
    kind: 'file-open-failure',
    subject: error.path,
    message: error.message,
  };
}

/** Reporter that writes diagnostics to the `markup-config:diagnostics` log. */
export class LoggingReporter implements ConfigReporter {
  private readonly logger = DebugLogger.getLogger(
    'markup-config:diagnostics',
  );

  report(diagnostic: ConfigDiagnostic): void {
    if (diagnostic.kind === 'file-open-failure') {
      this.logger.error(() => diagnostic.message);
    } else {
      this.logger.warn(() => diagnostic.message);
    }
  }
}
