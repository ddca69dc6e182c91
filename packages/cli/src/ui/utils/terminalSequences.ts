/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Terminal control sequences for switching screen buffers and cursor state
 * around the project browser.
 */

/** Switch to the alternate screen buffer, leaving scrollback untouched */
export const ENTER_ALTERNATE_SCREEN = '\x1b[?1049h';

/** Return to the main screen buffer */
export const EXIT_ALTERNATE_SCREEN = '\x1b[?1049l';

/** Clear the whole screen and move the cursor to the top-left corner */
export const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/** Show cursor */
export const SHOW_CURSOR = '\x1b[?25h';

/** Hide cursor */
export const HIDE_CURSOR = '\x1b[?25l';
