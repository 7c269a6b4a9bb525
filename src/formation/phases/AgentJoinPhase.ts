import { NodeState } from '../../types';
import { FormationError } from '../../common/errors';
import { awaitReady, startService, writeServiceEnvironment } from '../steps';
import { FormationContext, FormationPhase, PhaseResult } from '../types';

export class AgentJoinPhase implements FormationPhase {
  readonly name = 'agent-join' as const;

  async run(context: FormationContext): Promise<PhaseResult> {
    const agents = context.nodes.filter(node => node.role === 'agent');
    const url = context.topology.serverEndpoint(context.primary.name, context.service.apiPort);

    const pending = context.nodes.filter(node => node.role === 'server' && context.stateOf(node.name).state !== NodeState.READY);
    if (agents.length > 0 && pending.length > 0) {
      const [first] = pending;
      throw new FormationError(
        first?.name ?? context.primary.name,
        `Agents cannot start before every server is Ready (waiting on ${pending.map(node => node.name).join(', ')})`
      );
    }

    for (const node of agents) {
      if (!context.token) {
        throw new FormationError(node.name, `No cluster token available for ${node.name} to join`);
      }
      context.logger.node(node.name, `joining ${url} as agent`);
      await writeServiceEnvironment(context, node, { kind: 'join', url, token: context.token.reveal() });
      await startService(context, node);
      await awaitReady(context, node);
    }

    return { phase: this.name, nodes: agents.map(node => node.name), details: { url } };
  }
}
