/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import prompts from 'prompts';
import type { RunnerOptions } from './args.js';

const toStringList = (value: unknown): string[] =>
  Array.isArray(value)
    ? value
        .filter((item): item is string => typeof item === 'string')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    : [];

export async function runInteractiveSetup(options: RunnerOptions): Promise<void> {
  const responses = await prompts(
    [
      {
        type: 'list',
        name: 'logPaths',
        message: 'Message logs to read (comma-separated paths)',
        initial: options.logPaths.join(', '),
        separator: ',',
      },
      {
        type: 'text',
        name: 'jsonOutputPath',
        message: 'Also write a JSON history to (leave empty to skip)',
        initial: options.jsonOutputPath ?? '',
      },
    ],
    {
      onCancel: () => {
        console.log('Interactive setup cancelled.');
        process.exit(1);
      },
    },
  );

  const logPaths = toStringList(responses.logPaths);
  if (logPaths.length > 0) {
    options.logPaths = logPaths;
  }
  const jsonOutputPath: unknown = responses.jsonOutputPath;
  if (typeof jsonOutputPath === 'string' && jsonOutputPath.trim()) {
    options.jsonOutputPath = resolve(jsonOutputPath.trim());
  }
}
