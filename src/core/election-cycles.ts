/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  AnnotatedCycle,
  AnnotatedTransition,
  ElectionCycle,
  ElectionMarker,
  LogInstant,
} from '../types/index.js';
import { compareInstants } from './timestamp.js';

export const createElectionCycle = (marker: ElectionMarker, source?: string): ElectionCycle => ({
  startTimestamp: marker.timestamp,
  initiatingServerId: marker.initiatingServerId,
  transitions: [],
  ...(source !== undefined ? { source } : {}),
});

/**
 * Sorts newest first, in place. The sort is stable, so cycles with equal
 * start times keep their discovery order.
 */
export const sortCyclesDescending = (cycles: ElectionCycle[]): ElectionCycle[] =>
  cycles.sort((a, b) => compareInstants(b.startTimestamp, a.startTimestamp));

/**
 * Picks the cycle a transition belongs to: the first cycle, in descending
 * start order, that started strictly before it. A cycle has no end marker,
 * so it implicitly runs until the next one starts.
 */
export const findOwningCycle = (
  cyclesDescending: readonly ElectionCycle[],
  timestamp: LogInstant,
): ElectionCycle | undefined =>
  cyclesDescending.find((cycle) => compareInstants(cycle.startTimestamp, timestamp) < 0);

/**
 * Computes tx-id deltas and master lag for one cycle.
 *
 * Transitions are walked in ascending time order. For each one with a tx id:
 *   1. the delta is taken against the previous tx id of the cycle (0 at first);
 *   2. the running maximum moves to this transition if it is absent or
 *      strictly lower;
 *   3. a master whose tx id is below the maximum gets a lag warning.
 * Transitions without a tx id are reported as-is and do not move either
 * the previous tx id or the maximum.
 *
 * This is a naive check: a high-tx master going down or a cluster reset
 * still produces warnings.
 */
export const annotateCycle = (cycle: ElectionCycle): AnnotatedCycle => {
  const ordered = [...cycle.transitions].sort((a, b) => compareInstants(a.timestamp, b.timestamp));
  let prevTxId = 0n;
  let maxTxSeen: { txId: bigint; serverId: string } | undefined;
  const transitions: AnnotatedTransition[] = [];

  for (const transition of ordered) {
    const { txId } = transition;
    if (txId === undefined) {
      transitions.push({ transition });
      continue;
    }

    const delta = txId - prevTxId;
    prevTxId = txId;

    if (maxTxSeen === undefined || txId > maxTxSeen.txId) {
      maxTxSeen = { txId, serverId: transition.serverId };
    }

    const annotated: AnnotatedTransition = { transition, delta };
    if (transition.role === 'master' && maxTxSeen.txId > txId) {
      annotated.lag = { behindBy: maxTxSeen.txId - txId, aheadServerId: maxTxSeen.serverId };
    }
    transitions.push(annotated);
  }

  return { cycle, transitions };
};
