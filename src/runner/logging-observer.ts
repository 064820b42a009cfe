/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { logConsole } from '../core/index.js';
import type { HistoryObserver } from '../types/index.js';

/**
 * Forwards every callback to each observer in turn.
 */
export const chainObservers = (...observers: HistoryObserver[]): HistoryObserver => ({
  onStage: (event) => observers.forEach((observer) => observer.onStage?.(event)),
  onFileScanned: (info) => observers.forEach((observer) => observer.onFileScanned?.(info)),
  onTransitionUnattached: (info) =>
    observers.forEach((observer) => observer.onTransitionUnattached?.(info)),
});

/**
 * Observer that reports each pass through the console logger.
 */
export const createLoggingObserver = (): HistoryObserver => ({
  onStage: (event) => {
    logConsole('info', event.stage, [
      ['source', event.source],
      ['message', event.message],
    ]);
  },
  onFileScanned: (info) => {
    logConsole('info', 'scanned', [
      ['source', info.source],
      ['pass', info.pass],
      ['lines', info.lines],
      ['found', info.found],
    ]);
  },
  onTransitionUnattached: ({ source, transition }) => {
    logConsole('warn', 'unattached-transition', [
      ['source', source],
      ['at', transition.timestamp.text],
      ['server', transition.serverId],
      ['role', transition.role],
    ]);
  },
});
