/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { resolve } from 'node:path';
import { isValidElement } from 'react';
import { render } from 'ink';
import { parseArgs, USAGE } from '../src/cli/args.js';
import { main } from '../src/cli/main.js';
import { resolveHistoryConfigFromEnv } from '../src/config/history-config.js';
import type { ElectionHistoryAppProps } from '../src/ui/election-history-app.js';

vi.mock('ink', async (importOriginal) => ({
  ...(await importOriginal<typeof import('ink')>()),
  render: vi.fn(() => ({ waitUntilExit: () => Promise.resolve() })),
}));

vi.mock('../src/cli/interactive.js', () => ({
  runInteractiveSetup: vi.fn(() => Promise.resolve()),
}));

const renderedAppProps = (): ElectionHistoryAppProps | undefined => {
  const element = vi.mocked(render).mock.calls[0]?.[0];
  return isValidElement<ElectionHistoryAppProps>(element) ? element.props : undefined;
};

describe('parseArgs', () => {
  it('collects positional log paths in order', () => {
    expect(parseArgs(['a/messages.log', 'b/messages.log'])).toEqual({
      logPaths: ['a/messages.log', 'b/messages.log'],
    });
  });

  it('reads flags alongside paths', () => {
    expect(parseArgs(['-v', 'messages.log', '--json', 'out.json'])).toEqual({
      logPaths: ['messages.log'],
      verbose: true,
      jsonOutputPath: resolve('out.json'),
    });
  });

  it('rejects unknown flags', () => {
    expect(() => parseArgs(['--tail'])).toThrow('Unknown argument: --tail');
  });

  it('rejects a flag that is missing its value', () => {
    expect(() => parseArgs(['--json'])).toThrow('Missing value for --json');
  });
});

describe('resolveHistoryConfigFromEnv', () => {
  it('reads verbose and the JSON path', () => {
    expect(
      resolveHistoryConfigFromEnv({ ELECTION_HISTORY_VERBOSE: 'TRUE', ELECTION_HISTORY_JSON: ' out.json ' }),
    ).toEqual({ verbose: true, jsonOutputPath: 'out.json' });
  });

  it('defaults to quiet with no JSON', () => {
    expect(resolveHistoryConfigFromEnv({ ELECTION_HISTORY_VERBOSE: '0' })).toEqual({ verbose: false });
  });
});

describe('main', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.mocked(render).mockClear();
    vi.unstubAllEnvs();
  });

  it('prints usage and an empty history when given no logs', async () => {
    vi.stubEnv('ELECTION_HISTORY_VERBOSE', '');
    vi.stubEnv('ELECTION_HISTORY_JSON', '');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await main([]);

    expect(log).toHaveBeenCalledWith(USAGE);
    expect(write).toHaveBeenCalledWith('No election cycles found.\n');
  });

  it('prints usage only for --help', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await main(['--help']);

    expect(log).toHaveBeenCalledWith(USAGE);
    expect(write).not.toHaveBeenCalled();
  });

  it('passes --verbose through to the interactive view', async () => {
    vi.stubEnv('ELECTION_HISTORY_VERBOSE', '');
    vi.stubEnv('ELECTION_HISTORY_JSON', '');

    await main(['--interactive', '-v', 'messages.log']);

    expect(renderedAppProps()).toEqual({
      options: { logPaths: ['messages.log'], jsonOutputPath: undefined },
      verbose: true,
    });
  });

  it('takes interactive verbosity from the environment', async () => {
    vi.stubEnv('ELECTION_HISTORY_VERBOSE', '1');
    vi.stubEnv('ELECTION_HISTORY_JSON', '');

    await main(['--interactive', 'messages.log']);

    expect(renderedAppProps()?.verbose).toBe(true);
  });
});
