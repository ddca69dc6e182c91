#!/usr/bin/env node

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { main } from './src/devmux.js';
import { FatalError } from '@devmux/core';
import { ansi } from './src/ui/colors.js';

// --- Global Entry Point ---
main()
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    if (error instanceof FatalError) {
      console.error(ansi.error(error.message));
      process.exit(error.exitCode);
    }
    console.error('An unexpected critical error occurred:');
    if (error instanceof Error) {
      console.error(error.stack);
    } else {
      console.error(String(error));
    }
    process.exit(1);
  });
