/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  AnnotatedCycle,
  AnnotatedTransition,
  ElectionCycle,
  ServerRole,
  StandaloneEvent,
} from '../types/index.js';
import { formatLogInstant } from './timestamp.js';

export const NO_ELECTION_CYCLES_MESSAGE = 'No election cycles found.';
export const MISSING_TX_ID_MESSAGE = 'unknown (no tx id found before this switch)';

// "slave" is padded to line up with "master".
const formatRole = (role: ServerRole): string => (role === 'master' ? 'master' : 'slave ');

export const formatDelta = (delta: bigint | undefined): string => {
  if (delta === undefined) {
    return 'n/a';
  }
  return delta >= 0n ? `+${delta}` : String(delta);
};

export const formatTransition = ({ transition, delta, lag }: AnnotatedTransition): string => {
  const txId = transition.txId === undefined ? MISSING_TX_ID_MESSAGE : String(transition.txId);
  const line =
    `${formatLogInstant(transition.timestamp)}   ${transition.serverId} became ` +
    `${formatRole(transition.role)} Last TX: ${txId} (${formatDelta(delta)})`;
  if (!lag) {
    return line;
  }
  return `${line} WARN: this master is ${lag.behindBy} transactions behind server ${lag.aheadServerId}`;
};

export const formatCycleHeader = (cycle: ElectionCycle): string =>
  `${formatLogInstant(cycle.startTimestamp)} Election started by ${cycle.initiatingServerId}`;

export const formatStandaloneEvent = (event: StandaloneEvent): string =>
  `${formatLogInstant(event.timestamp)} [${event.kind}] ${event.payload}`;

/**
 * Renders the report as newline-joined lines.
 *
 * Cycles are emitted newest first with their transitions oldest first, then
 * every line, standalone events included, is sorted by its text. Because
 * each line starts with its timestamp this is close to chronological, but
 * lines sharing a timestamp order by the rest of their text.
 */
export const renderReport = (
  cycles: readonly AnnotatedCycle[],
  events: readonly StandaloneEvent[],
): string => {
  if (cycles.length === 0) {
    return NO_ELECTION_CYCLES_MESSAGE;
  }
  const lines: string[] = [];
  for (const { cycle, transitions } of cycles) {
    lines.push(formatCycleHeader(cycle));
    lines.push(...transitions.map(formatTransition));
  }
  lines.push(...events.map(formatStandaloneEvent));
  return lines.sort().join('\n');
};
