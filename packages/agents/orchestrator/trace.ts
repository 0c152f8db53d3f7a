// Trace — append-only log of every cycle a broker has run
// Records hold no wall-clock values, so two replays of the same scenario compare equal.

import type { DecisionOutcome, TraceRecord } from '../types/coordination.js';

export interface TraceSummary {
  cycles: number;
  outcomes: Record<DecisionOutcome, number>;
  failures: number;
  dropped: number;
}

export interface TraceExport {
  records: TraceRecord[];
  summary: TraceSummary;
}

function emptyOutcomes(): Record<DecisionOutcome, number> {
  return { consensus: 0, veto: 0, priority: 0, escalated: 0, unresolved: 0, no_action: 0, aborted: 0 };
}

export class Trace {
  private readonly entries: TraceRecord[];

  constructor(records: readonly TraceRecord[] = []) {
    this.entries = [...records];
  }

  append(record: TraceRecord): void {
    this.entries.push(Object.freeze(record));
  }

  get length(): number {
    return this.entries.length;
  }

  get records(): readonly TraceRecord[] {
    return this.entries;
  }

  get last(): TraceRecord | undefined {
    return this.entries[this.entries.length - 1];
  }

  /** Records appended at or after `index`, as a new Trace. */
  since(index: number): Trace {
    return new Trace(this.entries.slice(index));
  }

  byOutcome(outcome: DecisionOutcome): TraceRecord[] {
    return this.entries.filter(r => r.decision.outcome === outcome);
  }

  unresolved(): TraceRecord[] {
    return this.byOutcome('unresolved');
  }

  summary(): TraceSummary {
    const outcomes = emptyOutcomes();
    let failures = 0;
    let dropped = 0;
    for (const record of this.entries) {
      outcomes[record.decision.outcome]++;
      failures += record.failures.length;
      dropped += record.dropped.length;
    }
    return { cycles: this.entries.length, outcomes, failures, dropped };
  }

  toJSON(): TraceExport {
    return { records: [...this.entries], summary: this.summary() };
  }
}
