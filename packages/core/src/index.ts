/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Debug logging
export * from './debug/DebugLogger.js';

// Errors and paths
export * from './utils/errors.js';
export * from './utils/paths.js';

// Project listing and navigation
export * from './projects/directoryLister.js';
export * from './navigation/navigationState.js';

// tmux
export * from './tmux/sessionLauncher.js';
