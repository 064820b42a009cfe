/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import { resolveHistoryConfigFromEnv } from '../config/history-config.js';
import { logConsole } from '../core/index.js';
import { createLoggingObserver, runElectionHistory } from '../runner/index.js';
import { ElectionHistoryApp } from '../ui/election-history-app.js';
import { parseArgs, USAGE } from './args.js';
import { runInteractiveSetup } from './interactive.js';

export const main = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  const options = parseArgs(argv);
  const envConfig = resolveHistoryConfigFromEnv();
  const verbose = options.verbose ?? envConfig.verbose;

  if (options.help) {
    console.log(USAGE);
    return;
  }

  if (options.interactive) {
    await runInteractiveSetup(options);
    const jsonOutputPath = options.jsonOutputPath ?? envConfig.jsonOutputPath;
    const { waitUntilExit } = render(
      <ElectionHistoryApp options={{ logPaths: options.logPaths, jsonOutputPath }} verbose={verbose} />,
    );
    await waitUntilExit();
    return;
  }

  // No log paths is not an error: print usage and report an empty history.
  if (options.logPaths.length === 0) {
    console.log(USAGE);
  }

  const result = await runElectionHistory({
    logPaths: options.logPaths,
    jsonOutputPath: options.jsonOutputPath ?? envConfig.jsonOutputPath,
    observer: verbose ? createLoggingObserver() : undefined,
  });

  process.stdout.write(`${result.report}\n`);

  if (verbose && result.jsonReportPath) {
    logConsole('info', 'json-report', [['path', result.jsonReportPath]]);
  }
};
