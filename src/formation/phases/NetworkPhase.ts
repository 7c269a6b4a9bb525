import { NodeState } from '../../types';
import { FormationContext, FormationPhase, PhaseResult } from '../types';

export class NetworkPhase implements FormationPhase {
  readonly name = 'network' as const;

  async run(context: FormationContext): Promise<PhaseResult> {
    let commands = 0;
    for (const node of context.nodes) {
      const transcript = await context.configurator.apply(node.name, context.topology, context.signal);
      commands += transcript.length;
      context.stateOf(node.name).transition(NodeState.NETWORK_CONFIGURED);
    }
    return { phase: this.name, nodes: context.nodes.map(node => node.name), details: { commands } };
  }
}
