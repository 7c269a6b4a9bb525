import { EventEmitter } from 'events';

export type TimelineEvent = 'started' | 'completed' | 'failed' | 'transition' | 'info' | 'warning';

export interface TimelineEntry {
  timestamp: number;
  phase: string;
  event: TimelineEvent;
  node?: string;
  details: Record<string, unknown>;
}

/**
 * Ordered record of everything that happened during a run.
 * Emits 'entry' for every appended record so a log stream can follow along.
 */
export class PhaseTimeline extends EventEmitter {
  private entries: TimelineEntry[] = [];

  constructor(private readonly clock: () => number = Date.now) {
    super();
  }

  record(phase: string, event: TimelineEvent, details: Record<string, unknown> = {}, node?: string): TimelineEntry {
    const entry: TimelineEntry = {
      timestamp: this.clock(),
      phase,
      event,
      details,
      ...(node !== undefined ? { node } : {})
    };
    this.entries.push(entry);
    this.emit('entry', entry);
    return entry;
  }

  getEntries(): TimelineEntry[] {
    return this.entries.slice();
  }

  forPhase(phase: string): TimelineEntry[] {
    return this.entries.filter(entry => entry.phase === phase);
  }

  forNode(node: string): TimelineEntry[] {
    return this.entries.filter(entry => entry.node === node);
  }

  /**
   * Wall-clock duration of each phase that has both a start and an end
   */
  phaseDurations(): Record<string, number> {
    const durations: Record<string, number> = {};
    const starts = new Map<string, number>();
    for (const entry of this.entries) {
      if (entry.node !== undefined) continue;
      if (entry.event === 'started') {
        starts.set(entry.phase, entry.timestamp);
      } else if (entry.event === 'completed' || entry.event === 'failed') {
        const start = starts.get(entry.phase);
        if (start !== undefined) {
          durations[entry.phase] = entry.timestamp - start;
        }
      }
    }
    return durations;
  }

  clear(): void {
    this.entries = [];
  }
}
