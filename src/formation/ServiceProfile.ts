import { NodeRole, RemoteCommand } from '../types';
import { shellQuote } from '../common/utils';

/**
 * Where the clustered service keeps its units, files and readiness commands. The
 * service is a black box; this is everything the driver needs to know.
 */
export interface ServiceProfile {
  name: string;
  apiPort: number;
  serverUnit: string;
  agentUnit: string;
  serverEnvFile: string;
  agentEnvFile: string;
  tokenPath: string;
  readinessCommand: string;
  registryCommand: string;
}

export const K3S_SERVICE: ServiceProfile = {
  name: 'k3s',
  apiPort: 6443,
  serverUnit: 'k3s-server',
  agentUnit: 'k3s-agent',
  serverEnvFile: '/etc/default/k3s-server',
  agentEnvFile: '/etc/default/k3s-agent',
  tokenPath: '/var/lib/rancher/k3s/server/token',
  readinessCommand: 'k3s kubectl get --raw /readyz',
  registryCommand: 'k3s kubectl get nodes --no-headers'
};

export function unitFor(service: ServiceProfile, role: NodeRole): string {
  return role === 'server' ? service.serverUnit : service.agentUnit;
}

export function envFileFor(service: ServiceProfile, role: NodeRole): string {
  return role === 'server' ? service.serverEnvFile : service.agentEnvFile;
}

export type ServiceMode =
  | { kind: 'standalone' }
  | { kind: 'init' }
  | { kind: 'join'; url: string; token: string };

export interface ServiceEnvironment {
  role: NodeRole;
  nodeIp: string;
  flannelIface: string;
  clusterCidr: string;
  serviceCidr: string;
  mode: ServiceMode;
}

/**
 * Lines of the unit's environment file. Servers advertise and sign their
 * certificate for the cluster-segment address, never the management one.
 */
export function renderEnvironment(env: ServiceEnvironment): string[] {
  const common = [`--node-ip ${env.nodeIp}`, `--flannel-iface ${env.flannelIface}`];

  if (env.role === 'agent') {
    const lines = [`K3S_AGENT_OPTS="${common.join(' ')}"`];
    if (env.mode.kind === 'join') {
      lines.push(`K3S_URL="${env.mode.url}"`, `K3S_TOKEN=${env.mode.token}`);
    }
    return lines;
  }

  const flags = [
    ...(env.mode.kind === 'init' ? ['--cluster-init'] : []),
    ...(env.mode.kind === 'join' ? [`--server ${env.mode.url}`] : []),
    ...common,
    `--advertise-address ${env.nodeIp}`,
    `--tls-san ${env.nodeIp}`,
    `--cluster-cidr ${env.clusterCidr}`,
    `--service-cidr ${env.serviceCidr}`
  ];
  const lines = [`K3S_SERVER_OPTS="${flags.join(' ')}"`];
  if (env.mode.kind === 'join') {
    lines.push(`K3S_TOKEN=${env.mode.token}`);
  }
  return lines;
}

/**
 * Rewrite an environment file in full, then reload unit definitions
 */
export function writeEnvironmentCommand(path: string, env: ServiceEnvironment): RemoteCommand {
  const lines = renderEnvironment(env);
  const writes = lines.map((line, index) => `echo ${shellQuote(line)} ${index === 0 ? '>' : '>>'} ${path}`);
  const command: RemoteCommand = {
    description: `write ${path} (${env.mode.kind})`,
    command: [...writes, 'systemctl daemon-reload'].join(' && ')
  };
  if (env.mode.kind === 'join') {
    command.secret = env.mode.token;
  }
  return command;
}
