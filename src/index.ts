/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types/index.js';
export * from './core/index.js';
export { runElectionHistory, chainObservers, createLoggingObserver } from './runner/index.js';
export type { ElectionHistoryOptions, ElectionHistoryResult } from './runner/index.js';
export { main as runCli } from './cli/main.js';
