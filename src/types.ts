/**
 * Core types shared across the orchestration engine
 */

export type NodeRole = 'server' | 'agent';

export type TopologyKind = 'flat' | 'vlan' | 'bonded-vlan';

export const TOPOLOGY_KINDS: readonly TopologyKind[] = ['flat', 'vlan', 'bonded-vlan'];

export function isTopologyKind(value: string): value is TopologyKind {
  return (TOPOLOGY_KINDS as readonly string[]).includes(value);
}

export interface NodeResources {
  memoryMb: number;
  cpus: number;
}

/**
 * Static description of one cluster node, defined before any VM boots
 */
export interface NodeSpec {
  name: string;
  role: NodeRole;
  resources: NodeResources;
  image: string;
  /** Only meaningful for servers; exactly one server must set it */
  primary: boolean;
}

export enum NodeState {
  BOOTING = 'Booting',
  NETWORK_CONFIGURED = 'NetworkConfigured',
  SERVICE_STARTING = 'ServiceStarting',
  JOINED = 'Joined',
  READY = 'Ready',
  FAILED = 'Failed'
}

/**
 * Result of running one command on a VM through the out-of-band exec channel
 */
export interface ExecResult {
  exitCode: number;
  output: string;
}

/**
 * One shell command to run on a VM, with what it is for
 */
export interface RemoteCommand {
  description: string;
  command: string;
  /** A nonzero exit is recorded but does not abort the phase */
  tolerateFailure?: boolean;
  /** Value redacted from transcripts and logs */
  secret?: string;
}

export interface TranscriptEntry {
  node: string;
  description: string;
  command: string;
  exitCode: number;
  output: string;
  timestamp: number;
}

export const DEFAULT_NODE_RESOURCES: NodeResources = {
  memoryMb: 4096,
  cpus: 4
};

export const DEFAULT_NODE_IMAGE = 'k3s-node.qcow2';
