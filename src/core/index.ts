/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './errors.js';
export * from './timestamp.js';
export * from './extractors.js';
export * from './line-cursor.js';
export * from './event-scanner.js';
export * from './type-switch-correlator.js';
export * from './election-cycles.js';
export * from './report-formatter.js';
export { ElectionHistory, analyzeElectionHistory } from './election-history.js';
export * from './logging.js';
