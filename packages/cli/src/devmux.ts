/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as os from 'node:os';
import { statSync } from 'node:fs';
import {
  DebugLogger,
  SessionLauncher,
  StartupError,
  createNavigationState,
  deriveSessionName,
  resolveProjectRoot,
  tildeifyPath,
} from '@devmux/core';
import { parseArguments } from './config/config.js';
import { browseProjects } from './ui/browse.js';
import { ansi } from './ui/colors.js';

const logger = DebugLogger.getLogger('devmux:cli');

function resolveHomeDir(): string {
  let home = '';
  try {
    home = os.homedir();
  } catch (error) {
    logger.debug(() => `os.homedir() failed: ${String(error)}`);
  }
  if (!home) {
    throw new StartupError('Could not determine the home directory');
  }
  return home;
}

function isDirectory(dirPath: string): boolean {
  try {
    return statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Checks the environment, runs the browser and opens the selection in tmux.
 * Resolves once tmux detaches or the user cancels.
 */
export async function main(argv?: string[]): Promise<void> {
  const args = parseArguments(argv);
  const home = resolveHomeDir();
  const root = resolveProjectRoot(home);
  const displayRoot = tildeifyPath(root, home);

  if (!isDirectory(root)) {
    throw new StartupError(`${displayRoot} does not exist`);
  }

  const initialState = createNavigationState(root, {
    mode: args.flat ? 'flat' : 'tree',
  });
  if (initialState.mode === 'flat' && initialState.listing.length === 0) {
    throw new StartupError(`No projects found in ${displayRoot}`);
  }
  logger.debug(
    () =>
      `Browsing ${root} (${initialState.mode}, ${initialState.listing.length} entries)`,
  );

  const outcome = await browseProjects(initialState, { homeDir: home });
  if (outcome.type === 'cancelled') {
    console.log(ansi.muted('Cancelled.'));
    return;
  }

  const displayPath = tildeifyPath(outcome.path, home);
  console.log(`Selected: ${ansi.accent(displayPath)} -> starting tmux...`);
  const launcher = new SessionLauncher({
    onAttachExisting: (name) => {
      console.log(`Session '${name}' already exists. Attaching...`);
    },
  });
  launcher.launch(deriveSessionName(outcome.path), outcome.path);
}
