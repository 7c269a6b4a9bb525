import { CLUSTER_SEMANTIC } from '../../topology/TopologyProfile';
import { awaitReady, startService, writeServiceEnvironment } from '../steps';
import { FormationContext, FormationPhase, PhaseResult } from '../types';

export class PrimaryInitPhase implements FormationPhase {
  readonly name = 'primary-init' as const;

  async run(context: FormationContext): Promise<PhaseResult> {
    const { primary, fleet, service, timeouts, signal } = context;

    await writeServiceEnvironment(context, primary, { kind: 'init' });
    await startService(context, primary);

    await fleet.waitForPort(primary.name, service.apiPort, timeouts.portMs, signal);
    context.logger.node(primary.name, `API port ${service.apiPort} open`);

    await fleet.waitForCondition(
      primary.name,
      'API /readyz',
      async () => (await fleet.exec(primary.name, service.readinessCommand)).exitCode === 0,
      timeouts.apiReadyMs,
      signal
    );

    await awaitReady(context, primary);

    return {
      phase: this.name,
      nodes: [primary.name],
      details: { endpoint: context.topology.serverEndpoint(primary.name, service.apiPort), address: context.topology.addressFor(primary.name, CLUSTER_SEMANTIC) }
    };
  }
}
