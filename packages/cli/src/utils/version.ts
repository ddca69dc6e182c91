/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const PACKAGE_NAME = '@devmux/cli';
const UNKNOWN_VERSION = 'unknown';

function readManifest(file: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
  if (typeof parsed !== 'object' || parsed === null) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Version from the CLI package's own package.json, found by walking up from
 * this module. Works from the sources and from dist/.
 */
export function getCliVersion(
  startDir: string = path.dirname(fileURLToPath(import.meta.url)),
): string {
  let dir = startDir;
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (existsSync(candidate)) {
      const manifest = readManifest(candidate);
      const version = manifest['version'];
      if (manifest['name'] === PACKAGE_NAME && typeof version === 'string') {
        return version;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return UNKNOWN_VERSION;
    }
    dir = parent;
  }
}
