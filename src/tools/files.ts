/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { FileAccessError } from '../core/errors.js';

/**
 * Reads a whole log file as non-empty lines with trailing whitespace removed.
 * Any read failure surfaces as a FileAccessError.
 */
export const readLogLines = async (filePath: string): Promise<string[]> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new FileAccessError(filePath, error);
  }
  return raw
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
};

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

export const writeJsonFile = async (filePath: string, data: unknown): Promise<void> => {
  await ensureDirectory(dirname(filePath));
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
};
