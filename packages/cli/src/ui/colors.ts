/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import chalk from 'chalk';

export interface ColorsTheme {
  AccentCyan: string;
  AccentGreen: string;
  Gray: string;
}

/** Named terminal colours, so the palette follows the user's terminal theme. */
export const Colors: ColorsTheme = {
  AccentCyan: 'cyan',
  AccentGreen: 'green',
  Gray: 'gray',
};

/**
 * ANSI-styled text for console output outside of Ink.
 * Plain text when `NO_COLOR` is set.
 */
export const ansi = {
  accent: (text: string) => (colorEnabled() ? chalk.cyan(text) : text),
  error: (text: string) => (colorEnabled() ? chalk.red(text) : text),
  muted: (text: string) => (colorEnabled() ? chalk.gray(text) : text),
};

function colorEnabled(): boolean {
  return !process.env['NO_COLOR'];
}
