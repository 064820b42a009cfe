/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ElectionMarker, StandaloneEvent } from '../types/index.js';
import {
  matchBranchedData,
  matchElectionStarted,
  matchMasterRebound,
  matchShutdown,
  matchStartup,
  matchZooClientServerId,
} from './extractors.js';

export interface ScanState {
  readonly currentServerId?: string;
}

export interface ScanStep {
  state: ScanState;
  marker?: ElectionMarker;
  event?: StandaloneEvent;
}

export interface EventScanResult {
  markers: ElectionMarker[];
  events: StandaloneEvent[];
  state: ScanState;
}

export const INITIAL_SCAN_STATE: ScanState = {};

/**
 * Applies one line to the scan state. A ZooClient line updates the current
 * server id before the line is matched, so a startup message on the same
 * line is credited to that server.
 */
export const scanLine = (state: ScanState, line: string): ScanStep => {
  const serverId = matchZooClientServerId(line);
  const next: ScanState = serverId !== undefined ? { currentServerId: serverId } : state;

  const marker = matchElectionStarted(line);
  if (marker) {
    return { state: next, marker };
  }
  const event =
    matchMasterRebound(line) ??
    matchStartup(line, next.currentServerId) ??
    matchShutdown(line) ??
    matchBranchedData(line);
  return event ? { state: next, event } : { state: next };
};

/**
 * Collects election-started markers and standalone events from one pass,
 * in file order.
 */
export const scanLogEvents = (
  lines: Iterable<string>,
  initial: ScanState = INITIAL_SCAN_STATE,
): EventScanResult => {
  const markers: ElectionMarker[] = [];
  const events: StandaloneEvent[] = [];
  let state = initial;
  for (const line of lines) {
    const step = scanLine(state, line);
    state = step.state;
    if (step.marker) {
      markers.push(step.marker);
    }
    if (step.event) {
      events.push(step.event);
    }
  }
  return { markers, events, state };
};
