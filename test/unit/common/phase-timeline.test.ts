import { PhaseTimeline, TimelineEntry } from '../../../src/common/PhaseTimeline';

describe('PhaseTimeline', () => {
  let now: number;
  let timeline: PhaseTimeline;

  beforeEach(() => {
    now = 1000;
    timeline = new PhaseTimeline(() => now);
  });

  it('emits every entry it records', () => {
    const seen: TimelineEntry[] = [];
    timeline.on('entry', (entry: TimelineEntry) => seen.push(entry));

    timeline.record('boot', 'started');
    timeline.record('state', 'transition', { to: 'Booting' }, 'server-1');

    expect(seen.map(entry => entry.phase)).toEqual(['boot', 'state']);
    expect(seen[1]).toEqual({ timestamp: 1000, phase: 'state', event: 'transition', details: { to: 'Booting' }, node: 'server-1' });
    expect('node' in timeline.getEntries()[0]).toBe(false);
  });

  it('filters by phase and node', () => {
    timeline.record('network', 'info', {}, 'server-1');
    timeline.record('network', 'info', {}, 'agent-1');
    timeline.record('boot', 'completed');

    expect(timeline.forPhase('network')).toHaveLength(2);
    expect(timeline.forNode('agent-1').map(entry => entry.phase)).toEqual(['network']);
  });

  it('measures phases that have both ends and ignores per-node entries', () => {
    timeline.record('boot', 'started');
    now = 1250;
    timeline.record('boot', 'info', {}, 'server-1');
    now = 1400;
    timeline.record('boot', 'completed');
    timeline.record('network', 'started');
    now = 1500;
    timeline.record('network', 'failed', {}, 'server-1');

    expect(timeline.phaseDurations()).toEqual({ boot: 400 });
  });

  it('clears its entries', () => {
    timeline.record('boot', 'started');
    timeline.clear();
    expect(timeline.getEntries()).toEqual([]);
  });
});
