import { NodeSpec } from '../types';
import { FrameworkLogger } from '../common/logger';
import { PhaseTimeline } from '../common/PhaseTimeline';
import { CommandRunner } from '../fleet/CommandRunner';
import { VmFleetManager } from '../fleet/types';
import { DiagnosticsCollector } from '../diagnostics/DiagnosticsCollector';
import { NetworkConfigurator } from '../network/NetworkConfigurator';
import { TopologyProfile } from '../topology/TopologyProfile';
import { ClusterToken } from './ClusterToken';
import { NodeRegistry } from './NodeRegistry';
import { NodeStateMachine } from './NodeStateMachine';
import { ServiceProfile } from './ServiceProfile';

export interface FormationTimeouts {
  bootMs: number;
  portMs: number;
  apiReadyMs: number;
  nodeReadyMs: number;
  clusterReadyMs: number;
}

export const DEFAULT_FORMATION_TIMEOUTS: FormationTimeouts = {
  bootMs: 120_000,
  portMs: 120_000,
  apiReadyMs: 300_000,
  nodeReadyMs: 300_000,
  clusterReadyMs: 60_000
};

export type PhaseName =
  | 'boot'
  | 'network'
  | 'prepare'
  | 'primary-init'
  | 'token'
  | 'server-join'
  | 'agent-join'
  | 'cluster-ready';

/**
 * Everything a phase may read or act on. The token is set by the token
 * phase and read by the join phases.
 */
export interface FormationContext {
  readonly nodes: readonly NodeSpec[];
  readonly primary: NodeSpec;
  readonly topology: TopologyProfile;
  readonly service: ServiceProfile;
  readonly fleet: VmFleetManager;
  readonly runner: CommandRunner;
  readonly configurator: NetworkConfigurator;
  readonly diagnostics: DiagnosticsCollector;
  readonly registry: NodeRegistry;
  readonly timeline: PhaseTimeline;
  readonly logger: FrameworkLogger;
  readonly timeouts: FormationTimeouts;
  readonly signal: AbortSignal;
  stateOf(node: string): NodeStateMachine;
  token?: ClusterToken;
}

export interface PhaseResult {
  phase: PhaseName;
  nodes: string[];
  details?: Record<string, unknown>;
}

export interface FormationPhase {
  readonly name: PhaseName;
  run(context: FormationContext): Promise<PhaseResult>;
}
