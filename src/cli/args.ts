/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';

export interface RunnerOptions {
  logPaths: string[];
  jsonOutputPath?: string;
  verbose?: boolean;
  interactive?: boolean;
  help?: boolean;
}

export const USAGE = `Usage: election-history MESSAGES_LOG_LOCATION [MESSAGES_LOG_LOCATION ..]

Your shell lets you use patterns to match multiple logs, for instance:
election-history mylogs*/messages.log

Options:
  -j, --json <path>   also write the history as JSON
  -v, --verbose       print scan diagnostics to stderr
      --interactive   ask for log paths and show the report in a terminal view
  -h, --help          show this message`;

const requireValue = (argv: string[], index: number, flag: string): string => {
  const value = argv[index];
  if (value === undefined || value.startsWith('-')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
};

export const parseArgs = (argv: string[]): RunnerOptions => {
  const options: RunnerOptions = { logPaths: [] };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--json':
      case '-j':
        options.jsonOutputPath = resolve(requireValue(argv, ++i, arg));
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--interactive':
        options.interactive = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new Error(`Unknown argument: ${arg}`);
        }
        options.logPaths.push(arg);
    }
  }

  return options;
};
