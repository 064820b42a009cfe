/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import type { HistorySnapshot } from '../core/index.js';
import { writeJsonFile } from './files.js';

/**
 * Writes the structured history next to the text report.
 *
 * @returns The absolute path written.
 */
export const writeHistoryReport = async (
  filePath: string,
  snapshot: HistorySnapshot,
): Promise<string> => {
  const target = resolve(filePath);
  await writeJsonFile(target, snapshot);
  return target;
};
