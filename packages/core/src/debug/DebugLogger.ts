/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';

export type LogLevel = 'debug' | 'error';

/**
 * Namespaced diagnostic logger on top of the `debug` package.
 *
 * Output is switched on with the standard `DEBUG` environment variable
 * (for example `DEBUG=devmux:*`) and goes to stderr. A message may be passed
 * as a function so that building it costs nothing while the namespace is
 * disabled.
 */
export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly debugInstance: Debugger;
  private readonly _namespace: string;

  /**
   * Returns the cached logger for `namespace`, creating it on first use.
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
   * Clears the logger cache. Tests only.
   * @internal
   */
  static resetForTesting(): void {
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this.debugInstance.enabled;
  }

  debug(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  error(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  private write(
    level: LogLevel,
    messageOrFn: string | (() => string),
    args: unknown[],
  ): void {
    if (!this.enabled) {
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

    const prefix = level === 'error' ? '[error] ' : '';
    this.debugInstance(`${prefix}${message}`, ...args);
  }
}
