/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { spawnSync } from 'node:child_process';
import * as path from 'node:path';
import { DebugLogger } from '../debug/DebugLogger.js';
import { FatalError } from '../utils/errors.js';

const logger = DebugLogger.getLogger('devmux:tmux');

export const DEFAULT_TMUX_BINARY = 'tmux';
export const DEFAULT_SESSION_NAME = 'default';

export interface CommandResult {
  status: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the command could not be run at all. */
  error?: Error;
}

export interface CommandOptions {
  /**
   * Interactive commands share the terminal with devmux; the others have
   * their output captured and discarded.
   */
  interactive: boolean;
}

/** Runs a command to completion. */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions,
) => CommandResult;

export const spawnCommand: CommandRunner = (command, args, options) => {
  const { status, signal, error } = spawnSync(command, [...args], {
    stdio: options.interactive ? 'inherit' : 'pipe',
  });
  return { status, signal, error };
};

export type LaunchStep = 'check' | 'attach' | 'create' | 'split';

const TMUX_SUBCOMMANDS: Record<LaunchStep, string> = {
  check: 'has-session',
  attach: 'attach-session',
  create: 'new-session',
  split: 'split-window',
};

/** A tmux invocation failed; `step` names which one. */
export class LaunchError extends FatalError {
  constructor(
    readonly step: LaunchStep,
    readonly reason: string,
  ) {
    super(`tmux ${TMUX_SUBCOMMANDS[step]} failed: ${reason}`, 1);
    this.name = 'LaunchError';
  }

  get kind(): `${LaunchStep}-failed` {
    return `${this.step}-failed`;
  }
}

/**
 * Session name for a project: its directory name, lower-cased.
 */
export function deriveSessionName(projectPath: string): string {
  const name = path.basename(projectPath);
  return (name || DEFAULT_SESSION_NAME).toLowerCase();
}

function describeFailure(result: CommandResult): string | undefined {
  if (result.error) {
    return result.error.message;
  }
  if (result.signal) {
    return `terminated by ${result.signal}`;
  }
  if (result.status !== 0) {
    return `exited with status ${result.status}`;
  }
  return undefined;
}

export interface SessionLauncherOptions {
  tmuxBinary?: string;
  runner?: CommandRunner;
  /** Called before attaching to a session that is already running. */
  onAttachExisting?: (sessionName: string) => void;
}

/**
 * Opens a project in tmux: attaches to the session of that name when it is
 * running, otherwise creates it detached in the project directory, splits it
 * into two side-by-side panes and attaches.
 */
export class SessionLauncher {
  private readonly tmuxBinary: string;
  private readonly runner: CommandRunner;
  private readonly onAttachExisting?: (sessionName: string) => void;

  constructor(options: SessionLauncherOptions = {}) {
    this.tmuxBinary = options.tmuxBinary ?? DEFAULT_TMUX_BINARY;
    this.runner = options.runner ?? spawnCommand;
    this.onAttachExisting = options.onAttachExisting;
  }

  /**
   * @throws {LaunchError} for the first tmux command that fails; later
   * commands are not run.
   */
  launch(identifier: string, projectPath: string): void {
    const name = identifier.toLowerCase();

    if (this.hasSession(name)) {
      logger.debug(() => `Session ${name} exists, attaching`);
      this.onAttachExisting?.(name);
      this.run('attach', ['-t', name]);
      return;
    }

    logger.debug(() => `Creating session ${name} in ${projectPath}`);
    const steps: Array<[LaunchStep, string[]]> = [
      ['create', ['-d', '-s', name, '-c', projectPath]],
      ['split', ['-h', '-t', name, '-c', projectPath]],
      ['attach', ['-t', name]],
    ];
    for (const [step, args] of steps) {
      this.run(step, args);
    }
  }

  /**
   * A non-zero exit status means there is no such session; only failing to
   * run tmux at all is an error.
   */
  private hasSession(name: string): boolean {
    const result = this.runner(
      this.tmuxBinary,
      [TMUX_SUBCOMMANDS.check, '-t', name],
      { interactive: false },
    );
    if (result.error) {
      throw new LaunchError('check', result.error.message);
    }
    return result.status === 0;
  }

  private run(step: LaunchStep, args: string[]): void {
    const result = this.runner(
      this.tmuxBinary,
      [TMUX_SUBCOMMANDS[step], ...args],
      { interactive: true },
    );
    const failure = describeFailure(result);
    if (failure !== undefined) {
      logger.error(() => `tmux ${TMUX_SUBCOMMANDS[step]} failed: ${failure}`);
      throw new LaunchError(step, failure);
    }
  }
}
