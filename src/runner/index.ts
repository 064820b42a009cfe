/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  runElectionHistory,
  type ElectionHistoryOptions,
  type ElectionHistoryResult,
} from './election-history-runner.js';

export { chainObservers, createLoggingObserver } from './logging-observer.js';
