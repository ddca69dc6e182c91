/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Set NODE_ENV to test if not already set
process.env.NODE_ENV = process.env.NODE_ENV || 'test';

// Frames are asserted as plain text, so keep chalk from emitting colour codes
// no matter where the tests run.
process.env.FORCE_COLOR = '0';
if (process.env.NO_COLOR !== undefined) {
  delete process.env.NO_COLOR;
}

// Ink only writes the final frame when it thinks it runs in CI, which would
// leave ink-testing-library with nothing to read in between.
process.env.CI = 'false';
delete process.env.CONTINUOUS_INTEGRATION;
