/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ElectionHistory, type HistorySnapshot } from '../core/index.js';
import type { HistoryObserver } from '../types/index.js';
import { readLogLines, writeHistoryReport } from '../tools/index.js';

export interface ElectionHistoryOptions {
  logPaths: string[];
  jsonOutputPath?: string;
  observer?: HistoryObserver;
}

export interface ElectionHistoryResult {
  report: string;
  snapshot: HistorySnapshot;
  jsonReportPath?: string;
}

/**
 * Main entry point for election history reconstruction.
 *
 * Every file is read once per pass: first all files for election markers
 * and standalone events, then all files again for role transitions. The
 * first read or parse failure aborts the run.
 */
export async function runElectionHistory(
  options: ElectionHistoryOptions,
): Promise<ElectionHistoryResult> {
  const { observer } = options;
  const history = new ElectionHistory(observer);

  for (const logPath of options.logPaths) {
    observer?.onStage?.({ stage: 'markers', message: 'scanning for election markers', source: logPath });
    history.addElectionMarkers(logPath, await readLogLines(logPath));
  }

  for (const logPath of options.logPaths) {
    observer?.onStage?.({ stage: 'transitions', message: 'correlating role transitions', source: logPath });
    history.attachTransitions(logPath, await readLogLines(logPath));
  }

  const report = history.buildReport();
  const snapshot = history.snapshot();
  const jsonReportPath = options.jsonOutputPath
    ? await writeHistoryReport(options.jsonOutputPath, snapshot)
    : undefined;

  return {
    report,
    snapshot,
    ...(jsonReportPath ? { jsonReportPath } : {}),
  };
}
