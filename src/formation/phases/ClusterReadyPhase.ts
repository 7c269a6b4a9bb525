import { NodeState } from '../../types';
import { FormationError } from '../../common/errors';
import { isReadyEntry } from '../NodeRegistry';
import { FormationContext, FormationPhase, PhaseResult } from '../types';

/**
 * The registry must report exactly the declared nodes as Ready
 */
export class ClusterReadyPhase implements FormationPhase {
  readonly name = 'cluster-ready' as const;

  async run(context: FormationContext): Promise<PhaseResult> {
    const { primary, registry, nodes, fleet, timeouts, signal } = context;
    const expected = nodes.map(node => node.name);

    const lagging = nodes.find(node => context.stateOf(node.name).state !== NodeState.READY);
    if (lagging) {
      throw new FormationError(lagging.name, `${lagging.name} is ${context.stateOf(lagging.name).state}, not Ready`);
    }

    let readyCount = 0;
    await fleet.waitForCondition(
      primary.name,
      `${expected.length} Ready nodes in the registry`,
      async () => {
        const entries = await registry.snapshot();
        if (!entries) return false;
        const ready = entries.filter(isReadyEntry).map(entry => entry.name);
        readyCount = ready.length;
        return ready.length === expected.length && expected.every(name => ready.includes(name));
      },
      timeouts.clusterReadyMs,
      signal
    );

    return { phase: this.name, nodes: expected, details: { readyCount } };
  }
}
