/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { DebugLogger } from '../debug/DebugLogger.js';
import { getErrorMessage, isNodeError } from '../utils/errors.js';

const logger = DebugLogger.getLogger('devmux:projects');

/** Lists the visible subdirectory names of a directory. */
export type DirectoryLister = (dirPath: string) => string[];

function resolveIsDirectory(dirPath: string, entry: fs.Dirent): boolean {
  if (entry.isDirectory()) return true;
  if (entry.isSymbolicLink()) {
    try {
      return fs.statSync(path.join(dirPath, entry.name)).isDirectory();
    } catch {
      return false;
    }
  }
  return false;
}

/**
 * Orders names by code point. Comparing the UTF-8 bytes gives the same order
 * and, unlike `localeCompare`, puts `Beta` before `alpha`.
 */
export function compareNames(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/**
 * Returns the immediate subdirectories of `dirPath` whose names do not start
 * with `.`, sorted by {@link compareNames}. An unreadable path yields `[]`.
 */
export const listDirectories: DirectoryLister = (dirPath) => {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    logger.debug(() => {
      const reason =
        isNodeError(error) && error.code
          ? error.code
          : getErrorMessage(error);
      return `Cannot list ${dirPath}: ${reason}`;
    });
    return [];
  }

  return entries
    .filter(
      (entry) =>
        !entry.name.startsWith('.') && resolveIsDirectory(dirPath, entry),
    )
    .map((entry) => entry.name)
    .sort(compareNames);
};
