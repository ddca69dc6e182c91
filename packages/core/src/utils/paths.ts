/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import path from 'node:path';

/** Directory under the home directory that holds the projects. */
export const PROJECTS_DIR_NAME = 'Developer';

export function resolveProjectRoot(homeDir: string): string {
  return path.join(homeDir, PROJECTS_DIR_NAME);
}

/**
 * Replaces a leading home directory with `~`. Paths outside the home
 * directory are returned unchanged.
 */
export function tildeifyPath(filePath: string, homeDir: string): string {
  if (!homeDir) {
    return filePath;
  }
  const home = homeDir.endsWith(path.sep) ? homeDir.slice(0, -1) : homeDir;
  if (filePath === home) {
    return '~';
  }
  if (filePath.startsWith(home + path.sep)) {
    return `~${filePath.slice(home.length)}`;
  }
  return filePath;
}
