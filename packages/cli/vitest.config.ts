/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromHere = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@devmux/core': fromHere('../core/index.ts'),
      '@devmux/test-utils': fromHere('../test-utils/index.ts'),
    },
  },
  test: {
    name: 'cli',
    include: ['src/**/*.test.{ts,tsx}'],
    environment: 'jsdom',
    testTransformMode: { ssr: ['**/*'] },
    setupFiles: ['./test-setup.ts'],
    testTimeout: 30000,
  },
});
