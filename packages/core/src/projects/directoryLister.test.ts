/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  createTmpDir,
  cleanupTmpDir,
  type FileSystemStructure,
} from '@devmux/test-utils';
import { compareNames, listDirectories } from './directoryLister.js';

describe('listDirectories', () => {
  let testRootDir: string;

  beforeEach(async () => {
    const structure: FileSystemStructure = {
      alpha: { src: {} },
      Beta: {},
      '.hidden': {},
      '.config': '',
      'README.md': '',
      zeta: {},
      '_scratch': {},
    };
    testRootDir = await createTmpDir(structure);
  });

  afterEach(async () => {
    if (testRootDir) {
      await cleanupTmpDir(testRootDir);
    }
  });

  it('should list visible directories in code point order', () => {
    expect(listDirectories(testRootDir)).toEqual([
      'Beta',
      '_scratch',
      'alpha',
      'zeta',
    ]);
  });

  it('should put capitals before lower case rather than sort by locale', async () => {
    const root = await createTmpDir({ alpha: {}, Beta: {}, '.hidden': {} });
    try {
      expect(listDirectories(root)).toEqual(['Beta', 'alpha']);
    } finally {
      await cleanupTmpDir(root);
    }
  });

  it('should include symbolic links that point at directories', async () => {
    await fs.symlink(
      path.join(testRootDir, 'alpha'),
      path.join(testRootDir, 'linked'),
    );
    await fs.symlink(
      path.join(testRootDir, 'README.md'),
      path.join(testRootDir, 'linked-file'),
    );
    await fs.symlink(
      path.join(testRootDir, 'gone'),
      path.join(testRootDir, 'dangling'),
    );

    expect(listDirectories(testRootDir)).toEqual([
      'Beta',
      '_scratch',
      'alpha',
      'linked',
      'zeta',
    ]);
  });

  it('should only look one level deep', () => {
    expect(listDirectories(path.join(testRootDir, 'alpha'))).toEqual(['src']);
  });

  it('should return an empty list for a directory without subdirectories', () => {
    expect(listDirectories(path.join(testRootDir, 'Beta'))).toEqual([]);
  });

  it('should return an empty list for a missing path', () => {
    expect(listDirectories(path.join(testRootDir, 'missing'))).toEqual([]);
  });

  it('should return an empty list for a file', () => {
    expect(listDirectories(path.join(testRootDir, 'README.md'))).toEqual([]);
  });
});

describe('compareNames', () => {
  it('orders by code point', () => {
    expect(['b', 'B', 'a', 'A', '1'].sort(compareNames)).toEqual([
      '1',
      'A',
      'B',
      'a',
      'b',
    ]);
  });

  it('treats equal names as equal', () => {
    expect(compareNames('same', 'same')).toBe(0);
  });
});
