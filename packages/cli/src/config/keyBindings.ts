/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { NavigationAction, NavigationActionType } from '@devmux/core';

/**
 * A key press normalised away from Ink's `Key` flags.
 */
export interface KeyEvent {
  /** Key name ('up', 'return', 'escape', 'space', ...) or the typed character */
  name: string;
  ctrl: boolean;
  /** Terminals with extended keyboard reporting also send releases */
  kind: 'press' | 'release';
}

/**
 * Data-driven key binding structure
 */
export interface KeyBinding {
  /** The key name (e.g., 'j', 'return', 'escape') */
  key: string;
  /** Control key requirement: true=must be pressed, false=must not be pressed, undefined=ignore */
  ctrl?: boolean;
}

/**
 * Configuration type mapping navigation actions to their key bindings
 */
export type KeyBindingConfig = {
  readonly [A in NavigationActionType]: readonly KeyBinding[];
};

export const defaultKeyBindings: KeyBindingConfig = {
  MOVE_UP: [{ key: 'up' }, { key: 'k', ctrl: false }],
  MOVE_DOWN: [{ key: 'down' }, { key: 'j', ctrl: false }],
  ENTER: [{ key: 'space' }, { key: 'right' }],
  // Ink reports the DEL byte most terminals send for Backspace as 'delete'.
  BACK: [{ key: 'backspace' }, { key: 'delete' }, { key: 'left' }],
  CONFIRM: [{ key: 'return' }],
  // Raw mode delivers Ctrl+C as a key instead of SIGINT.
  CANCEL: [{ key: 'q', ctrl: false }, { key: 'escape' }, { key: 'c', ctrl: true }],
};

const ACTIONS: readonly NavigationActionType[] = [
  'MOVE_UP',
  'MOVE_DOWN',
  'ENTER',
  'BACK',
  'CONFIRM',
  'CANCEL',
];

export function keyMatches(binding: KeyBinding, event: KeyEvent): boolean {
  if (binding.key !== event.name) {
    return false;
  }
  return binding.ctrl === undefined || binding.ctrl === event.ctrl;
}

/**
 * Maps a key event to the navigation action bound to it. Releases and
 * unbound keys map to `undefined`.
 */
export function resolveKeyAction(
  event: KeyEvent,
  bindings: KeyBindingConfig = defaultKeyBindings,
): NavigationAction | undefined {
  if (event.kind !== 'press') {
    return undefined;
  }
  for (const type of ACTIONS) {
    if (bindings[type].some((binding) => keyMatches(binding, event))) {
      return { type };
    }
  }
  return undefined;
}
