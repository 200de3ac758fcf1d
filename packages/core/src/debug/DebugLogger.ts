/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import type { LogEntry, LogLevel } from './types.js';

export const DEBUG_ENV_VAR = 'MARKUP_CONFIG_DEBUG';
export const ROOT_NAMESPACE = 'markup-config';

type MessageSource = string | (() => string);

/**
 * Namespaced logger over the `debug` package.
 *
 * A logger is enabled when `debug` has the namespace enabled (through
 * `DEBUG`) or when `MARKUP_CONFIG_DEBUG` names it. Message functions are only
 * evaluated for enabled loggers.
 */
export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private debugInstance: Debugger;
  private _namespace: string;
  private _enabled: boolean;
  private _level: LogLevel = 'debug';
  private _lastEntry: LogEntry | undefined;

  /**
   * Returns the cached logger for a namespace, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  /**
   * Reset for testing - drops cached instances
   */
  static resetForTesting(): void {
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    this._enabled = this.checkEnabled();
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
  }

  get level(): LogLevel {
    return this._level;
  }

  set level(value: LogLevel) {
    this._level = value;
  }

  /** The most recent entry written, mostly useful to tests. */
  get lastEntry(): LogEntry | undefined {
    return this._lastEntry;
  }

  log(messageOrFn: MessageSource, ...args: unknown[]): void {
    this.write('log', messageOrFn, args);
  }

  debug(messageOrFn: MessageSource, ...args: unknown[]): void {
    // debug output is suppressed once the level is raised to error
    if (this._level === 'error') {
      return;
    }
    this.write('debug', messageOrFn, args);
  }

  warn(messageOrFn: MessageSource, ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: MessageSource, ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  checkEnabled(): boolean {
    if (this.debugInstance.enabled) {
      return true;
    }
    const configured = process.env[DEBUG_ENV_VAR];
    if (!configured) {
      return false;
    }
    return configured
      .split(/[\s,]+/)
      .filter((pattern) => pattern.length > 0)
      .some((pattern) => this.matchesPattern(this._namespace, pattern));
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace || pattern === '1' || pattern === 'true') {
      return true;
    }

    if (pattern.includes('*')) {
      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');
      return new RegExp(`^${regexPattern}$`).test(namespace);
    }

    return false;
  }

  private write(
    level: LogLevel,
    messageOrFn: MessageSource,
    args: unknown[],
  ): void {
    if (!this._enabled) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    this._lastEntry = {
      timestamp: new Date().toISOString(),
      namespace: this._namespace,
      level,
      message,
      args: args.length > 0 ? args : undefined,
      pid: process.pid,
    };

    this.debugInstance('[%s] %s', level, message, ...args);
  }
}
