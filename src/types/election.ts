/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Election history type definitions.
 * Shared by the scanners, the aggregator and the report writers.
 */

/**
 * A point in time taken from a log line's `YYYY-MM-DD HH:MM:SS.mmm±HHMM`
 * prefix. Only the wall-clock part is kept; the offset is read and dropped,
 * so instants from logs written in different timezones are not comparable.
 */
export interface LogInstant {
  // Wall-clock milliseconds, computed as if the text were UTC.
  readonly epochMillis: number;
  // The 23-character wall-clock text, e.g. `2012-05-30 09:28:56.233`.
  readonly text: string;
}

export type ServerRole = 'master' | 'slave';

export interface RoleTransition {
  readonly timestamp: LogInstant;
  readonly serverId: string;
  readonly role: ServerRole;
  // Last committed tx id seen before the switch; undefined when none was found.
  // Tx ids are 64-bit on the server, so they are kept as bigint.
  readonly txId: bigint | undefined;
  readonly source?: string;
}

export interface ElectionMarker {
  timestamp: LogInstant;
  initiatingServerId: string;
}

export interface ElectionCycle {
  startTimestamp: LogInstant;
  initiatingServerId: string;
  transitions: RoleTransition[];
  source?: string;
}

export type StandaloneEventKind = 'startup' | 'shutdown' | 'master-rebound' | 'branched-data';

export interface StandaloneEvent {
  kind: StandaloneEventKind;
  timestamp: LogInstant;
  payload: string;
  source?: string;
}

export interface MasterLag {
  behindBy: bigint;
  aheadServerId: string;
}

export interface AnnotatedTransition {
  transition: RoleTransition;
  // Undefined when the transition has no tx id to compare.
  delta?: bigint;
  lag?: MasterLag;
}

export interface AnnotatedCycle {
  cycle: ElectionCycle;
  transitions: AnnotatedTransition[];
}
