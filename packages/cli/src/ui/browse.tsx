/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import {
  BrowserError,
  DebugLogger,
  type DirectoryLister,
  type NavigationOutcome,
  type NavigationState,
} from '@devmux/core';
import { ProjectBrowser } from './components/ProjectBrowser.js';
import { withTerminalContract } from './utils/terminalContract.js';

const logger = DebugLogger.getLogger('devmux:browse');

export interface BrowseOptions {
  homeDir: string;
  lister?: DirectoryLister;
  stdin?: NodeJS.ReadStream;
  stdout?: NodeJS.WriteStream;
}

/**
 * Runs the interactive browser until the user selects a directory or
 * cancels. The terminal is restored before this resolves or rejects.
 *
 * @throws {BrowserError} when stdin is not a terminal.
 */
export async function browseProjects(
  initialState: NavigationState,
  options: BrowseOptions,
): Promise<NavigationOutcome> {
  const stdin = options.stdin ?? process.stdin;
  const stdout = options.stdout ?? process.stdout;

  if (!stdin.isTTY) {
    throw new BrowserError('The project browser needs an interactive terminal');
  }

  let outcome: NavigationOutcome = { type: 'cancelled' };

  await withTerminalContract({ stdin, stdout }, async () => {
    const instance = render(
      <ProjectBrowser
        initialState={initialState}
        homeDir={options.homeDir}
        lister={options.lister}
        onOutcome={(result) => {
          outcome = result;
        }}
      />,
      { stdin, stdout, exitOnCtrlC: false, patchConsole: false },
    );
    try {
      await instance.waitUntilExit();
    } catch (error) {
      throw new BrowserError('The project browser stopped unexpectedly', {
        cause: error,
      });
    } finally {
      instance.unmount();
    }
  });

  logger.debug(() => `Browser finished: ${outcome.type}`);
  return outcome;
}
