/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { resolveProjectRoot, tildeifyPath } from './paths.js';

describe('resolveProjectRoot', () => {
  it('places the project root under the home directory', () => {
    expect(resolveProjectRoot('/home/dev')).toBe('/home/dev/Developer');
  });
});

describe('tildeifyPath', () => {
  it('abbreviates paths below the home directory', () => {
    expect(tildeifyPath('/home/dev/Developer/alpha', '/home/dev')).toBe(
      '~/Developer/alpha',
    );
  });

  it('abbreviates the home directory itself', () => {
    expect(tildeifyPath('/home/dev', '/home/dev')).toBe('~');
  });

  it('accepts a home directory with a trailing separator', () => {
    expect(tildeifyPath('/home/dev/Developer', '/home/dev/')).toBe(
      '~/Developer',
    );
  });

  it('leaves sibling directories sharing the prefix alone', () => {
    expect(tildeifyPath('/home/developer/x', '/home/dev')).toBe(
      '/home/developer/x',
    );
  });

  it('leaves paths outside the home directory alone', () => {
    expect(tildeifyPath('/srv/projects', '/home/dev')).toBe('/srv/projects');
  });

  it('returns the path unchanged without a home directory', () => {
    expect(tildeifyPath('/srv/projects', '')).toBe('/srv/projects');
  });
});
