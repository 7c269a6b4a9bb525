import { FormationError } from '../../common/errors';
import { awaitReady, startService, writeServiceEnvironment } from '../steps';
import { FormationContext, FormationPhase, PhaseResult } from '../types';

/**
 * Secondary servers join one at a time, each reaching Ready before the next
 */
export class ServerJoinPhase implements FormationPhase {
  readonly name = 'server-join' as const;

  async run(context: FormationContext): Promise<PhaseResult> {
    const secondaries = context.nodes.filter(node => node.role === 'server' && node.name !== context.primary.name);
    const url = context.topology.serverEndpoint(context.primary.name, context.service.apiPort);

    for (const node of secondaries) {
      if (!context.token) {
        throw new FormationError(node.name, `No cluster token available for ${node.name} to join`);
      }
      context.logger.node(node.name, `joining ${url} as server`);
      await writeServiceEnvironment(context, node, { kind: 'join', url, token: context.token.reveal() });
      await startService(context, node);
      await awaitReady(context, node);
    }

    return { phase: this.name, nodes: secondaries.map(node => node.name), details: { url } };
  }
}
