/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { RoleTransition } from '../types/index.js';
import { matchLastTxId, matchRoleSwitch, type RoleSwitchMatch } from './extractors.js';
import type { LineCursor } from './line-cursor.js';

type Evidence =
  | { kind: 'tx'; txId: bigint }
  | { kind: 'switch'; match: RoleSwitchMatch };

const matchEvidence = (line: string): Evidence | undefined => {
  const txId = matchLastTxId(line);
  if (txId !== undefined) {
    return { kind: 'tx', txId };
  }
  const match = matchRoleSwitch(line);
  return match ? { kind: 'switch', match } : undefined;
};

/**
 * Pairs each role switch with the last committed tx id logged before it.
 *
 * Repeatedly scans for a tx-id line, then for the next role-switch line.
 * A switch reached before any tx-id line gets no tx id. Tx-id lines between
 * the first one and the switch are skipped, and the cursor is shared by both
 * scans, so no line is looked at twice. When the lines run out while looking
 * for a switch, nothing more is emitted.
 *
 * Assumes the tx-id line precedes its switch in the log. This is not
 * checked.
 */
export function* correlateRoleTransitions(
  cursor: LineCursor,
  source?: string,
): Generator<RoleTransition> {
  while (!cursor.done) {
    const evidence = cursor.scanUntil(matchEvidence);
    if (!evidence) {
      return;
    }
    if (evidence.kind === 'switch') {
      yield toTransition(evidence.match, undefined, source);
      continue;
    }
    const roleSwitch = cursor.scanUntil(matchRoleSwitch);
    if (!roleSwitch) {
      return;
    }
    yield toTransition(roleSwitch, evidence.txId, source);
  }
}

const toTransition = (
  match: RoleSwitchMatch,
  txId: bigint | undefined,
  source: string | undefined,
): RoleTransition =>
  Object.freeze({
    timestamp: match.timestamp,
    serverId: match.serverId,
    role: match.role,
    txId,
    ...(source !== undefined ? { source } : {}),
  });
