/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import { FatalError, getErrorMessage } from '@devmux/core';
import { getCliVersion } from '../utils/version.js';

export interface CliArgs {
  /** Single-level picklist of the project root instead of the tree browser */
  flat: boolean;
}

/**
 * Parses the command line. `--help` and `--version` print and exit;
 * unknown options and arguments raise a {@link FatalError}.
 */
export function parseArguments(argv: string[] = hideBin(process.argv)): CliArgs {
  const parsed = yargs(argv)
    .locale('en')
    .scriptName('devmux')
    .usage(
      'Usage: $0 [options]\n\nPick a project under ~/Developer and open it in a two-pane tmux session.',
    )
    .option('flat', {
      alias: 'f',
      type: 'boolean',
      description: 'List only the top-level projects, without descending',
      default: false,
    })
    .version(getCliVersion())
    .alias('v', 'version')
    .help()
    .alias('h', 'help')
    .strict()
    .fail((message, error) => {
      const reason = message ? message : getErrorMessage(error);
      throw new FatalError(`${reason}\nRun 'devmux --help' for usage.`);
    })
    .parseSync();

  return { flat: parsed.flat };
}
