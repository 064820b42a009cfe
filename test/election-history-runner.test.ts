/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runElectionHistory } from '../src/runner/index.js';
import { readLogLines } from '../src/tools/files.js';
import { FileAccessError } from '../src/core/errors.js';
import type { HistorySnapshot } from '../src/core/types.js';
import type { StageEvent } from '../src/types/index.js';

describe('runElectionHistory', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'election-history-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads each file once per pass and writes the JSON history', async () => {
    const logPath = join(dir, 'messages.log');
    await writeFile(
      logPath,
      [
        '2012-05-30 09:00:00.000-0700: master-notify set to 1',
        '',
        '2012-05-30 09:00:01.000-0700: Opened logical log [/data/l.1] version=3, lastTx=100   ',
        '2012-05-30 09:00:02.000-0700: Starting[1] as master',
      ].join('\r\n'),
      'utf8',
    );
    const stages: StageEvent[] = [];
    const jsonOutputPath = join(dir, 'out', 'history.json');

    const result = await runElectionHistory({
      logPaths: [logPath],
      jsonOutputPath,
      observer: { onStage: (event) => stages.push(event) },
    });

    expect(result.report).toBe(
      '2012-05-30 09:00:00.000 Election started by 1\n' +
        '2012-05-30 09:00:02.000   1 became master Last TX: 100 (+100)',
    );
    expect(stages.map((s) => s.stage)).toEqual(['markers', 'transitions', 'report']);
    expect(result.jsonReportPath).toBe(jsonOutputPath);

    const written = JSON.parse(await readFile(jsonOutputPath, 'utf8')) as HistorySnapshot;
    expect(written.totals).toEqual({
      files: 1,
      linesScanned: 3,
      cycles: 1,
      transitions: 1,
      unattachedTransitions: 0,
      standaloneEvents: 0,
    });
    expect(written.cycles[0]?.transitions[0]?.txId).toBe('100');
  });

  it('does not write JSON unless asked', async () => {
    const result = await runElectionHistory({ logPaths: [] });

    expect(result.report).toBe('No election cycles found.');
    expect(result.jsonReportPath).toBeUndefined();
  });

  it('fails with FileAccessError for a missing file', async () => {
    const missing = join(dir, 'nope.log');

    await expect(runElectionHistory({ logPaths: [missing] })).rejects.toBeInstanceOf(FileAccessError);
    await expect(runElectionHistory({ logPaths: [missing] })).rejects.toMatchObject({
      code: 'FILE_ACCESS',
      path: missing,
    });
  });
});

describe('readLogLines', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'election-history-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('drops blank lines and trailing whitespace', async () => {
    const logPath = join(dir, 'messages.log');
    await writeFile(logPath, 'first  \r\n\r\n   \nsecond\n', 'utf8');

    expect(await readLogLines(logPath)).toEqual(['first', 'second']);
  });
});
