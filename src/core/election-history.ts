/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  AnnotatedCycle,
  ElectionCycle,
  HistoryObserver,
  StandaloneEvent,
} from '../types/index.js';
import type { HistorySnapshot, LogSource } from './types.js';
import { annotateCycle, createElectionCycle, findOwningCycle, sortCyclesDescending } from './election-cycles.js';
import { scanLogEvents } from './event-scanner.js';
import { LineCursor } from './line-cursor.js';
import { renderReport } from './report-formatter.js';
import { correlateRoleTransitions } from './type-switch-correlator.js';

/**
 * Accumulates election cycles and standalone events across every input of
 * one run.
 *
 * Each input is scanned twice. The marker pass must run for all inputs
 * before any transition pass, because a transition may belong to a cycle
 * found in another file.
 */
export class ElectionHistory {
  private readonly cycles: ElectionCycle[] = [];
  private readonly events: StandaloneEvent[] = [];
  private readonly sources = new Set<string>();
  private linesScanned = 0;
  private transitionCount = 0;
  private unattachedCount = 0;

  constructor(private readonly observer?: HistoryObserver) {}

  addElectionMarkers(source: string, lines: readonly string[]): void {
    const scan = scanLogEvents(lines);
    this.sources.add(source);
    this.linesScanned += lines.length;
    this.cycles.push(...scan.markers.map((marker) => createElectionCycle(marker, source)));
    this.events.push(...scan.events.map((event) => ({ ...event, source })));
    sortCyclesDescending(this.cycles);

    this.observer?.onFileScanned?.({
      source,
      pass: 'markers',
      lines: lines.length,
      found: scan.markers.length + scan.events.length,
    });
  }

  attachTransitions(source: string, lines: readonly string[]): void {
    let found = 0;
    for (const transition of correlateRoleTransitions(new LineCursor(lines), source)) {
      found += 1;
      const cycle = findOwningCycle(this.cycles, transition.timestamp);
      if (!cycle) {
        this.unattachedCount += 1;
        this.observer?.onTransitionUnattached?.({ source, transition });
        continue;
      }
      cycle.transitions.push(transition);
    }
    this.transitionCount += found;

    this.observer?.onFileScanned?.({ source, pass: 'transitions', lines: lines.length, found });
  }

  /** Cycles newest first, each with deltas and lag warnings computed. */
  annotatedCycles(): AnnotatedCycle[] {
    return this.cycles.map(annotateCycle);
  }

  buildReport(): string {
    const report = renderReport(this.annotatedCycles(), this.events);
    this.observer?.onStage?.({
      stage: 'report',
      message: `rendered ${this.cycles.length} cycle(s) and ${this.events.length} standalone event(s)`,
    });
    return report;
  }

  snapshot(): HistorySnapshot {
    return {
      generatedAt: new Date().toISOString(),
      totals: {
        files: this.sources.size,
        linesScanned: this.linesScanned,
        cycles: this.cycles.length,
        transitions: this.transitionCount,
        unattachedTransitions: this.unattachedCount,
        standaloneEvents: this.events.length,
      },
      cycles: this.annotatedCycles().map(({ cycle, transitions }) => ({
        startedAt: cycle.startTimestamp.text,
        initiatingServerId: cycle.initiatingServerId,
        source: cycle.source,
        transitions: transitions.map(({ transition, delta, lag }) => ({
          at: transition.timestamp.text,
          serverId: transition.serverId,
          role: transition.role,
          txId: transition.txId?.toString() ?? null,
          delta: delta?.toString() ?? null,
          lag: lag ? { behindBy: lag.behindBy.toString(), aheadServerId: lag.aheadServerId } : null,
          source: transition.source,
        })),
      })),
      events: this.events.map((event) => ({
        at: event.timestamp.text,
        kind: event.kind,
        payload: event.payload,
        source: event.source,
      })),
    };
  }
}

/**
 * Runs both passes over in-memory sources and returns the history.
 */
export const analyzeElectionHistory = (
  sources: readonly LogSource[],
  observer?: HistoryObserver,
): ElectionHistory => {
  const history = new ElectionHistory(observer);
  for (const source of sources) {
    history.addElectionMarkers(source.name, source.lines);
  }
  for (const source of sources) {
    history.attachTransitions(source.name, source.lines);
  }
  return history;
};
