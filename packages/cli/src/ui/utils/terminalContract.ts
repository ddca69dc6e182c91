/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Terminal mode management for the project browser.
 *
 * While the browser runs it owns the terminal: alternate screen, hidden
 * cursor, raw input. {@link withTerminalContract} takes that state and gives
 * it back on every exit path, before anything else may write to the
 * terminal.
 */

import { DebugLogger } from '@devmux/core';
import {
  CLEAR_SCREEN,
  ENTER_ALTERNATE_SCREEN,
  EXIT_ALTERNATE_SCREEN,
  HIDE_CURSOR,
  SHOW_CURSOR,
} from './terminalSequences.js';

const logger = DebugLogger.getLogger('devmux:terminal');

/** Sequences written when the browser takes the terminal. */
export const TERMINAL_CONTRACT_SEQUENCES =
  ENTER_ALTERNATE_SCREEN + HIDE_CURSOR + CLEAR_SCREEN;

/** Sequences written when the browser hands the terminal back. */
export const TERMINAL_RESTORE_SEQUENCES = SHOW_CURSOR + EXIT_ALTERNATE_SCREEN;

export interface TerminalOutput {
  write(data: string): boolean;
}

export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalStreams {
  stdout: TerminalOutput;
  stdin: TerminalInput;
}

export function applyTerminalContract(stdout: TerminalOutput): void {
  stdout.write(TERMINAL_CONTRACT_SEQUENCES);
}

/**
 * Turns raw input off and returns to the main screen with a visible cursor.
 */
export function restoreTerminal({ stdout, stdin }: TerminalStreams): void {
  if (stdin.isTTY && stdin.setRawMode) {
    stdin.setRawMode(false);
  }
  stdout.write(TERMINAL_RESTORE_SEQUENCES);
}

/**
 * Runs `body` with the terminal contract applied and restores the terminal
 * afterwards, whether `body` resolves or rejects.
 */
export async function withTerminalContract<T>(
  streams: TerminalStreams,
  body: () => Promise<T>,
): Promise<T> {
  applyTerminalContract(streams.stdout);
  logger.debug('Terminal contract applied');
  try {
    return await body();
  } finally {
    restoreTerminal(streams);
    logger.debug('Terminal restored');
  }
}
