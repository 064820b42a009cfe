/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export interface HistoryEnvConfig {
  verbose: boolean;
  jsonOutputPath?: string;
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export function resolveHistoryConfigFromEnv(env: NodeJS.ProcessEnv = process.env): HistoryEnvConfig {
  const verboseFlag = env['ELECTION_HISTORY_VERBOSE']?.trim().toLowerCase();
  const jsonOutputPath = env['ELECTION_HISTORY_JSON']?.trim();
  return {
    verbose: verboseFlag !== undefined && TRUTHY.has(verboseFlag),
    ...(jsonOutputPath ? { jsonOutputPath } : {}),
  };
}
