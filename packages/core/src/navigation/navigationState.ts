/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import {
  listDirectories,
  type DirectoryLister,
} from '../projects/directoryLister.js';
import { DebugLogger } from '../debug/DebugLogger.js';

const logger = DebugLogger.getLogger('devmux:navigation');

/**
 * `tree` browses the project root level by level; `flat` is a single-level
 * picklist whose history stays empty.
 */
export type BrowseMode = 'tree' | 'flat';

export interface NavigationState {
  readonly mode: BrowseMode;
  readonly currentPath: string;
  /** Absolute paths of the ancestors of `currentPath`, innermost last. */
  readonly history: readonly string[];
  readonly listing: readonly string[];
  /** Meaningful only while `listing` is non-empty. */
  readonly selectedIndex: number;
}

export type NavigationAction =
  | { type: 'MOVE_UP' }
  | { type: 'MOVE_DOWN' }
  | { type: 'ENTER' }
  | { type: 'BACK' }
  | { type: 'CONFIRM' }
  | { type: 'CANCEL' };

export type NavigationActionType = NavigationAction['type'];

export type NavigationOutcome =
  | { type: 'selected'; path: string }
  | { type: 'cancelled' };

export interface TransitionResult {
  state: NavigationState;
  /** Set when the action ends the browsing session. */
  outcome?: NavigationOutcome;
}

export interface NavigationOptions {
  mode?: BrowseMode;
  lister?: DirectoryLister;
}

export function createNavigationState(
  rootPath: string,
  options: NavigationOptions = {},
): NavigationState {
  const { mode = 'tree', lister = listDirectories } = options;
  return {
    mode,
    currentPath: rootPath,
    history: [],
    listing: lister(rootPath),
    selectedIndex: 0,
  };
}

/** Absolute path of the highlighted entry, if there is one. */
export function selectedPath(state: NavigationState): string | undefined {
  const name = state.listing[state.selectedIndex];
  return name === undefined ? undefined : path.join(state.currentPath, name);
}

function enter(state: NavigationState, lister: DirectoryLister): NavigationState {
  if (state.mode === 'flat') {
    return state;
  }
  const candidate = selectedPath(state);
  if (candidate === undefined) {
    return state;
  }
  const childListing = lister(candidate);
  if (childListing.length === 0) {
    logger.debug(() => `Not entering ${candidate}: no subdirectories`);
    return state;
  }
  return {
    ...state,
    currentPath: candidate,
    history: [...state.history, state.currentPath],
    listing: childListing,
    selectedIndex: 0,
  };
}

function back(state: NavigationState, lister: DirectoryLister): NavigationState {
  if (state.history.length === 0) {
    return state;
  }
  const parentPath = state.history[state.history.length - 1];
  return {
    ...state,
    currentPath: parentPath,
    history: state.history.slice(0, -1),
    listing: lister(parentPath),
    selectedIndex: 0,
  };
}

/**
 * Applies one action. Actions that cannot take effect return the given state
 * object unchanged. `CONFIRM` and `CANCEL` produce an outcome that ends the
 * browsing session.
 */
export function navigationReducer(
  state: NavigationState,
  action: NavigationAction,
  lister: DirectoryLister = listDirectories,
): TransitionResult {
  switch (action.type) {
    case 'MOVE_UP':
      if (state.listing.length === 0 || state.selectedIndex === 0) {
        return { state };
      }
      return { state: { ...state, selectedIndex: state.selectedIndex - 1 } };

    case 'MOVE_DOWN':
      if (
        state.listing.length === 0 ||
        state.selectedIndex >= state.listing.length - 1
      ) {
        return { state };
      }
      return { state: { ...state, selectedIndex: state.selectedIndex + 1 } };

    case 'ENTER':
      return { state: enter(state, lister) };

    case 'BACK':
      return { state: back(state, lister) };

    case 'CONFIRM': {
      const chosen = selectedPath(state);
      if (chosen === undefined) {
        return { state };
      }
      return { state, outcome: { type: 'selected', path: chosen } };
    }

    case 'CANCEL':
      return { state, outcome: { type: 'cancelled' } };

    default: {
      const exhaustive: never = action;
      return exhaustive;
    }
  }
}
