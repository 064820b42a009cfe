/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import type { ElectionHistoryOptions, ElectionHistoryResult } from '../runner/index.js';
import { chainObservers, createLoggingObserver, runElectionHistory } from '../runner/index.js';
import type { HistoryObserver } from '../types/index.js';

interface Progress {
  filesScanned: number;
  totalScans: number;
  linesScanned: number;
  unattached: number;
}

interface AppState {
  progress: Progress;
  lastEvent: string;
}

const initialState: AppState = {
  progress: { filesScanned: 0, totalScans: 0, linesScanned: 0, unattached: 0 },
  lastEvent: 'Initializing...',
};

export interface ElectionHistoryAppProps {
  options: Omit<ElectionHistoryOptions, 'observer'>;
  // Also log each stage to stderr, as the plain CLI does.
  verbose?: boolean;
}

export const ElectionHistoryApp: React.FC<ElectionHistoryAppProps> = ({ options, verbose = false }) => {
  const [state, setState] = useState<AppState>({
    ...initialState,
    progress: { ...initialState.progress, totalScans: options.logPaths.length * 2 },
  });
  const [result, setResult] = useState<ElectionHistoryResult | undefined>();
  const [error, setError] = useState<string | undefined>();
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const uiObserver: HistoryObserver = {
      onStage: (event) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          lastEvent: `[${event.stage}] ${event.message}${event.source ? ` (${event.source})` : ''}`,
        }));
      },

      onFileScanned: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: {
            ...prev.progress,
            filesScanned: prev.progress.filesScanned + 1,
            linesScanned: prev.progress.linesScanned + info.lines,
          },
          lastEvent: `Scanned ${info.source} (${info.pass}): ${info.found} found`,
        }));
      },

      onTransitionUnattached: () => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: { ...prev.progress, unattached: prev.progress.unattached + 1 },
        }));
      },
    };

    const observer = verbose ? chainObservers(uiObserver, createLoggingObserver()) : uiObserver;

    runElectionHistory({ ...options, observer })
      .then((res) => {
        if (cancelled) return;
        setResult(res);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err instanceof Error ? err.message : String(err));
      });

    return () => {
      cancelled = true;
    };
  }, [options, verbose]);

  useEffect(() => {
    if (result || error) {
      const timer = setTimeout(() => exit(error ? new Error(error) : undefined), 200);
      return () => clearTimeout(timer);
    }
    return undefined;
  }, [result, error, exit]);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          ELECTION HISTORY
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" paddingX={1} paddingY={0}>
        <Text dimColor>Scans: </Text>
        <Text>
          {state.progress.filesScanned}/{state.progress.totalScans}
        </Text>
        <Text dimColor> | Lines: </Text>
        <Text>{state.progress.linesScanned}</Text>
        <Text dimColor> | Unattached: </Text>
        <Text color="yellow">{state.progress.unattached}</Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="magenta" paddingX={1} paddingY={0}>
        <Text bold color="magenta">
          Activity:{' '}
        </Text>
        <Text>{state.lastEvent}</Text>
      </Box>

      {result && (
        <Box marginTop={1} flexDirection="column">
          {result.report.split('\n').map((line, index) => (
            <Text key={index} color={lineColor(line)}>
              {line}
            </Text>
          ))}
          {result.jsonReportPath && <Text dimColor>JSON history: {result.jsonReportPath}</Text>}
        </Box>
      )}

      {error && (
        <Box marginTop={1} borderStyle="bold" borderColor="red" paddingX={1} paddingY={0}>
          <Text color="redBright">ERROR: {error}</Text>
        </Box>
      )}
    </Box>
  );
};

export function lineColor(line: string): string | undefined {
  if (line.includes(' WARN: ')) return 'yellow';
  if (line.includes(' [branched-data] ')) return 'red';
  if (line.includes(' Election started by ')) return 'cyan';
  return undefined;
}
