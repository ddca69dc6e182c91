/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { useRef, useState } from 'react';
import { Box, Text, useApp, useInput, type Key } from 'ink';
import {
  getErrorMessage,
  listDirectories,
  navigationReducer,
  tildeifyPath,
  type BrowseMode,
  type DirectoryLister,
  type NavigationOutcome,
  type NavigationState,
  type TransitionResult,
} from '@devmux/core';
import { Colors } from '../colors.js';
import { useTerminalSize } from '../hooks/useTerminalSize.js';
import {
  resolveKeyAction,
  type KeyBindingConfig,
  type KeyEvent,
} from '../../config/keyBindings.js';

export const SEPARATOR = '─'.repeat(37);
export const EMPTY_LISTING_TEXT = '(no subdirectories)';
export const SELECTED_MARKER = '❯';

const LEGENDS: Record<BrowseMode, string> = {
  tree: '[↑↓/jk] move  [Space/→] open  [Enter] tmux  [←/BS] back  [q] quit',
  flat: '[↑↓/jk] move  [Enter] tmux  [q] quit',
};

/** Rows taken by the header, separator, legend and spacing. */
const CHROME_ROWS = 5;

/** The subset of Ink's key flags that navigation listens to. */
export type KeyFlags = Pick<
  Key,
  | 'upArrow'
  | 'downArrow'
  | 'leftArrow'
  | 'rightArrow'
  | 'return'
  | 'escape'
  | 'backspace'
  | 'delete'
  | 'ctrl'
>;

export function toKeyEvent(input: string, key: KeyFlags): KeyEvent {
  let name: string;
  if (key.upArrow) name = 'up';
  else if (key.downArrow) name = 'down';
  else if (key.leftArrow) name = 'left';
  else if (key.rightArrow) name = 'right';
  else if (key.return) name = 'return';
  else if (key.escape) name = 'escape';
  else if (key.backspace) name = 'backspace';
  else if (key.delete) name = 'delete';
  else if (input === ' ') name = 'space';
  else name = input;
  // Ink's useInput only reports presses.
  return { name, ctrl: key.ctrl, kind: 'press' };
}

/**
 * First and one-past-last index of the entries to draw so that the selected
 * entry stays on screen, roughly centred, in a viewport of `maxRows`.
 */
export function visibleRange(
  total: number,
  selectedIndex: number,
  maxRows: number,
): { start: number; end: number } {
  if (total <= maxRows) {
    return { start: 0, end: total };
  }
  const centred = selectedIndex - Math.floor(maxRows / 2);
  const start = Math.min(Math.max(centred, 0), total - maxRows);
  return { start, end: start + maxRows };
}

interface ProjectListProps {
  listing: readonly string[];
  selectedIndex: number;
  maxRows: number;
}

const ProjectList: React.FC<ProjectListProps> = ({
  listing,
  selectedIndex,
  maxRows,
}) => {
  if (listing.length === 0) {
    return <Text color={Colors.Gray}>{`   ${EMPTY_LISTING_TEXT}`}</Text>;
  }

  const { start, end } = visibleRange(listing.length, selectedIndex, maxRows);
  return (
    <Box flexDirection="column">
      {listing.slice(start, end).map((name, offset) => {
        const index = start + offset;
        return index === selectedIndex ? (
          <Text key={name} color={Colors.AccentGreen}>
            {` ${SELECTED_MARKER} ${name}/`}
          </Text>
        ) : (
          <Text key={name}>{`   ${name}/`}</Text>
        );
      })}
    </Box>
  );
};

interface ProjectBrowserProps {
  initialState: NavigationState;
  homeDir: string;
  onOutcome: (outcome: NavigationOutcome) => void;
  lister?: DirectoryLister;
  keyBindings?: KeyBindingConfig;
}

/**
 * Full-screen directory browser. Each key press is turned into a navigation
 * action; the first action that produces an outcome reports it and exits the
 * Ink app. A failing transition exits the app with that error.
 */
export const ProjectBrowser: React.FC<ProjectBrowserProps> = ({
  initialState,
  homeDir,
  onOutcome,
  lister = listDirectories,
  keyBindings,
}) => {
  const { exit } = useApp();
  const { rows } = useTerminalSize();
  const [state, setState] = useState(initialState);
  // Key presses can arrive faster than React re-renders.
  const stateRef = useRef(initialState);
  const finishedRef = useRef(false);

  useInput((input, key) => {
    if (finishedRef.current) {
      return;
    }
    const action = resolveKeyAction(toKeyEvent(input, key), keyBindings);
    if (!action) {
      return;
    }
    let result: TransitionResult;
    try {
      result = navigationReducer(stateRef.current, action, lister);
    } catch (error) {
      finishedRef.current = true;
      exit(error instanceof Error ? error : new Error(getErrorMessage(error)));
      return;
    }
    if (result.outcome) {
      finishedRef.current = true;
      onOutcome(result.outcome);
      exit();
      return;
    }
    if (result.state !== stateRef.current) {
      stateRef.current = result.state;
      setState(result.state);
    }
  });

  return (
    <Box flexDirection="column">
      <Text color={Colors.AccentCyan}>
        {` ${tildeifyPath(state.currentPath, homeDir)}`}
      </Text>
      <Text>{` ${SEPARATOR}`}</Text>
      <Text color={Colors.Gray}>{` ${LEGENDS[state.mode]}`}</Text>
      <Box marginTop={1}>
        <ProjectList
          listing={state.listing}
          selectedIndex={state.selectedIndex}
          maxRows={Math.max(rows - CHROME_ROWS, 1)}
        />
      </Box>
    </Box>
  );
};
