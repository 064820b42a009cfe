/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * History observer interface.
 * Lets the CLI, the terminal UI and the verbose logger follow a run.
 */

import type { RoleTransition } from './election.js';

export type ScanPass = 'markers' | 'transitions';

export interface StageEvent {
  stage: ScanPass | 'report';
  message: string;
  source?: string;
}

export interface HistoryObserver {
  onStage?(event: StageEvent): void;
  onFileScanned?(info: { source: string; pass: ScanPass; lines: number; found: number }): void;
  onTransitionUnattached?(info: { source: string; transition: RoleTransition }): void;
}
