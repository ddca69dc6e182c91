/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * An error that ends the process. The entry point prints `message` and exits
 * with `exitCode`.
 */
export class FatalError extends Error {
  constructor(
    message: string,
    readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'FatalError';
  }
}

/** The environment does not allow devmux to start. */
export class StartupError extends FatalError {
  constructor(message: string) {
    super(message, 1);
    this.name = 'StartupError';
  }
}

/** The interactive browser could not run or render. */
export class BrowserError extends FatalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 1);
    this.name = 'BrowserError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}
