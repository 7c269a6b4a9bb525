import { NodeSpec, NodeState, RemoteCommand } from '../types';
import { FormationError } from '../common/errors';
import { CLUSTER_SEMANTIC } from '../topology/TopologyProfile';
import { ServiceMode, envFileFor, unitFor, writeEnvironmentCommand } from './ServiceProfile';
import { FormationContext } from './types';

/**
 * Run a command, failing the node on a non-tolerated nonzero exit
 */
export async function runStep(context: FormationContext, node: string, command: RemoteCommand): Promise<void> {
  const entry = await context.runner.run(node, command, context.signal);
  if (entry.exitCode !== 0 && !command.tolerateFailure) {
    throw new FormationError(node, `${command.description} failed on ${node} (exit ${entry.exitCode}): ${entry.output.trim()}`);
  }
}

export function writeServiceEnvironment(context: FormationContext, node: NodeSpec, mode: ServiceMode): Promise<void> {
  return runStep(context, node.name, writeEnvironmentCommand(envFileFor(context.service, node.role), {
    role: node.role,
    nodeIp: context.topology.addressFor(node.name, CLUSTER_SEMANTIC),
    flannelIface: context.topology.interfaceFor(CLUSTER_SEMANTIC),
    clusterCidr: context.topology.clusterCidr,
    serviceCidr: context.topology.serviceCidr,
    mode
  }));
}

export async function startService(context: FormationContext, node: NodeSpec): Promise<void> {
  const unit = unitFor(context.service, node.role);
  context.stateOf(node.name).transition(NodeState.SERVICE_STARTING);
  await runStep(context, node.name, { description: `start ${unit}`, command: `systemctl start ${unit}` });
}

async function succeeds(context: FormationContext, node: string, command: string): Promise<boolean> {
  return (await context.fleet.exec(node, command)).exitCode === 0;
}

/**
 * Joined once the primary's registry lists the node; Ready once its service
 * runs, the API answers /readyz and the registry reports it Ready.
 */
export async function awaitReady(context: FormationContext, node: NodeSpec): Promise<void> {
  const { fleet, registry, service, primary, timeouts, signal } = context;
  const unit = unitFor(service, node.role);
  const machine = context.stateOf(node.name);

  await fleet.waitForCondition(
    node.name,
    'registration in the node registry',
    async () => (await registry.entry(node.name)) !== undefined,
    timeouts.nodeReadyMs,
    signal
  );
  machine.transition(NodeState.JOINED);

  await fleet.waitForCondition(
    node.name,
    'Ready in the node registry',
    async () =>
      (await succeeds(context, node.name, `systemctl is-active ${unit}`)) &&
      (await succeeds(context, primary.name, service.readinessCommand)) &&
      (await registry.isReady(node.name)),
    timeouts.nodeReadyMs,
    signal
  );
  machine.transition(NodeState.READY);
  context.logger.node(node.name, 'Ready');
}
