/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ServerRole, StandaloneEventKind } from '../types/index.js';

export interface LogSource {
  name: string;
  lines: readonly string[];
}

export interface HistoryTotals {
  files: number;
  linesScanned: number;
  cycles: number;
  transitions: number;
  unattachedTransitions: number;
  standaloneEvents: number;
}

export interface LagRecord {
  behindBy: string;
  aheadServerId: string;
}

export interface TransitionRecord {
  at: string;
  serverId: string;
  role: ServerRole;
  // Decimal strings: tx ids can exceed the range JSON numbers hold exactly.
  txId: string | null;
  delta: string | null;
  lag: LagRecord | null;
  source?: string;
}

export interface CycleRecord {
  startedAt: string;
  initiatingServerId: string;
  source?: string;
  transitions: TransitionRecord[];
}

export interface EventRecord {
  at: string;
  kind: StandaloneEventKind;
  payload: string;
  source?: string;
}

export interface HistorySnapshot {
  generatedAt: string;
  totals: HistoryTotals;
  cycles: CycleRecord[];
  events: EventRecord[];
}
