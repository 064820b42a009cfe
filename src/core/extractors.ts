/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  ElectionMarker,
  LogInstant,
  ServerRole,
  StandaloneEvent,
} from '../types/index.js';
import { parseLogInstant } from './timestamp.js';

/**
 * Line matchers for HA message logs. Each one is stateless and recognizes a
 * single line shape; matching is case-sensitive and unanchored.
 */

// 2012-05-30 09:28:56.233-0700: Starting[103] as slave
const ROLE_SWITCH_RE = /Starting\[(\d+)\] as (master|slave)$/;

// The first pattern that matches wins.
const LAST_TX_ID_RES: readonly RegExp[] = [
  /Opened .+ clean empty log, version=.+, lastTxId=(\d+)/,
  /Internal recovery completed, scanned .+ log entries\. Recovered .+ transactions\. Last tx recovered: (\d+)/,
  /Opened logical log .+ version=.+, lastTx=(\d+)/,
];

const MASTER_NOTIFY_RE = /master-notify set to (\d+)/;
const MASTER_REBOUND_RE = /master-rebound set to (\d+)/;
const SHUTDOWN_RE = /Shutdown\[(\d+)\],/;
const ZOO_CLIENT_RE = /ZooClient\[serverId:(\d+)/;
const STARTUP_MARKER = 'newMaster called Starting up for the first time';
const BRANCHED_DATA_MARKER = 'Branched data occurred';

// Width of `2012-05-30 09:28:56.233-0700: `; the branched-data message follows it.
export const BRANCHED_DATA_PAYLOAD_OFFSET = 30;

export interface RoleSwitchMatch {
  timestamp: LogInstant;
  serverId: string;
  role: ServerRole;
}

/**
 * A role in the log text maps to the same role in the history:
 * `as master` is a MASTER transition.
 */
export const matchRoleSwitch = (line: string): RoleSwitchMatch | undefined => {
  const match = ROLE_SWITCH_RE.exec(line.trimEnd());
  if (!match) {
    return undefined;
  }
  const role: ServerRole = match[2] === 'master' ? 'master' : 'slave';
  return { timestamp: parseLogInstant(line), serverId: match[1], role };
};

export const matchLastTxId = (line: string): bigint | undefined => {
  for (const regex of LAST_TX_ID_RES) {
    const match = regex.exec(line);
    if (match) {
      return BigInt(match[1]);
    }
  }
  return undefined;
};

export const matchElectionStarted = (line: string): ElectionMarker | undefined => {
  const match = MASTER_NOTIFY_RE.exec(line);
  if (!match) {
    return undefined;
  }
  return { timestamp: parseLogInstant(line), initiatingServerId: match[1] };
};

export const matchMasterRebound = (line: string): StandaloneEvent | undefined => {
  const match = MASTER_REBOUND_RE.exec(line);
  return match
    ? { kind: 'master-rebound', timestamp: parseLogInstant(line), payload: match[1] }
    : undefined;
};

export const matchShutdown = (line: string): StandaloneEvent | undefined => {
  const match = SHUTDOWN_RE.exec(line);
  return match
    ? { kind: 'shutdown', timestamp: parseLogInstant(line), payload: match[1] }
    : undefined;
};

export const matchBranchedData = (line: string): StandaloneEvent | undefined => {
  if (!line.includes(BRANCHED_DATA_MARKER)) {
    return undefined;
  }
  return {
    kind: 'branched-data',
    timestamp: parseLogInstant(line),
    payload: line.slice(BRANCHED_DATA_PAYLOAD_OFFSET),
  };
};

/**
 * Startup lines carry no server id of their own; the caller supplies the
 * one from the most recent ZooClient line of the same pass.
 */
export const matchStartup = (
  line: string,
  currentServerId: string | undefined,
): StandaloneEvent | undefined => {
  if (!line.includes(STARTUP_MARKER)) {
    return undefined;
  }
  return { kind: 'startup', timestamp: parseLogInstant(line), payload: currentServerId ?? '?' };
};

export const matchZooClientServerId = (line: string): string | undefined =>
  ZOO_CLIENT_RE.exec(line)?.[1];
