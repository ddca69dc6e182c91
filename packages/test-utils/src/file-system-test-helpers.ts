/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Describes a directory tree: a string value is a file with that content,
 * an object value is a subdirectory.
 */
export type FileSystemStructure = {
  [name: string]: string | FileSystemStructure;
};

async function writeStructure(
  dir: string,
  structure: FileSystemStructure,
): Promise<void> {
  for (const [name, content] of Object.entries(structure)) {
    const target = path.join(dir, name);
    if (typeof content === 'string') {
      await fs.writeFile(target, content);
    } else {
      await fs.mkdir(target, { recursive: true });
      await writeStructure(target, content);
    }
  }
}

/**
 * Creates a fresh temporary directory populated with `structure` and
 * returns its absolute path.
 */
export async function createTmpDir(
  structure: FileSystemStructure = {},
): Promise<string> {
  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'devmux-test-'));
  await writeStructure(tmpDir, structure);
  return tmpDir;
}

export async function cleanupTmpDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
