import { NodeSpec } from '../../types';
import { lastHostOf } from '../../common/utils';
import { CLUSTER_SEMANTIC } from '../../topology/TopologyProfile';
import { unitFor } from '../ServiceProfile';
import { runStep, writeServiceEnvironment } from '../steps';
import { FormationContext, FormationPhase, PhaseResult } from '../types';

/**
 * Node-local groundwork before any service starts: stop whatever started
 * on boot, give the node its registry name, make sure the service finds a
 * default route on the cluster segment and /dev/kmsg, and write the
 * standalone environment file.
 */
export class PreparePhase implements FormationPhase {
  readonly name = 'prepare' as const;

  async run(context: FormationContext): Promise<PhaseResult> {
    for (const node of context.nodes) {
      await this.prepare(context, node);
    }
    return { phase: this.name, nodes: context.nodes.map(node => node.name) };
  }

  private async prepare(context: FormationContext, node: NodeSpec): Promise<void> {
    const { topology } = context;
    const unit = unitFor(context.service, node.role);
    const clusterIface = topology.interfaceFor(CLUSTER_SEMANTIC);
    const gateway = lastHostOf(topology.subnetFor(CLUSTER_SEMANTIC));

    await runStep(context, node.name, {
      description: `stop ${unit} if it started on boot`,
      command: `systemctl stop ${unit} || true`,
      tolerateFailure: true
    });
    await runStep(context, node.name, {
      description: `set hostname ${node.name}`,
      command: `hostnamectl set-hostname ${node.name}`
    });
    await runStep(context, node.name, {
      description: 'ensure /dev/kmsg exists',
      command: 'test -e /dev/kmsg || ln -s /dev/console /dev/kmsg'
    });
    await runStep(context, node.name, {
      description: `ensure a default route via ${clusterIface}`,
      command: `ip route show default | grep -q default || ip route add default via ${gateway} dev ${clusterIface}`
    });
    await writeServiceEnvironment(context, node, { kind: 'standalone' });
  }
}
