/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { formatLogBlock, logConsole } from '../src/core/logging.js';
import { chainObservers, createLoggingObserver } from '../src/runner/logging-observer.js';

describe('formatLogBlock', () => {
  it('aligns keys and drops empty fields', () => {
    expect(
      formatLogBlock('scanned', [
        ['source', 'a.log'],
        ['pass', 'markers'],
        ['lines', 3],
        ['skipped', undefined],
        ['note', ''],
      ]),
    ).toBe('[election-history] scanned:\n  source = a.log\n  pass   = markers\n  lines  = 3');
  });
});

describe('logConsole', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps stdout free of diagnostics', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    logConsole('info', 'stage', [['message', 'hello']]);
    logConsole('warn', 'stage', [['message', 'careful']]);

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[election-history] stage:\n  message = hello');
    expect(warn).toHaveBeenCalledWith('[election-history] stage:\n  message = careful');
  });

  it('backs the verbose observer', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLoggingObserver().onFileScanned?.({ source: 'a.log', pass: 'transitions', lines: 4, found: 2 });

    expect(error).toHaveBeenCalledWith(
      '[election-history] scanned:\n  source = a.log\n  pass   = transitions\n  lines  = 4\n  found  = 2',
    );
  });
});

describe('chainObservers', () => {
  it('forwards each callback to every observer in order', () => {
    const calls: string[] = [];
    const chained = chainObservers(
      { onStage: (event) => calls.push(`first ${event.stage}`) },
      {
        onStage: (event) => calls.push(`second ${event.stage}`),
        onFileScanned: (info) => calls.push(`second ${info.pass}`),
      },
    );

    chained.onStage?.({ stage: 'report', message: 'done' });
    chained.onFileScanned?.({ source: 'a.log', pass: 'markers', lines: 1, found: 0 });

    expect(calls).toEqual(['first report', 'second report', 'second markers']);
  });
});
