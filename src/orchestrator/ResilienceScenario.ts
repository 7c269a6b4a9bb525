import { ConfigurationError, ResilienceError, errorMessage } from '../common/errors';
import { FrameworkLogger, defaultLogger } from '../common/logger';
import { PhaseTimeline } from '../common/PhaseTimeline';
import { ChaosInjector, ChaosScenario } from '../diagnostics/ChaosInjector';
import { VmFleetManager } from '../fleet/types';
import { NodeRegistry } from '../formation/NodeRegistry';
import { pollUntil } from '../retry/RetryManager';
import { TopologyProfile } from '../topology/TopologyProfile';
import { BondSpec } from '../topology/types';

export interface ResilienceOptions {
  /** Node whose active bond member is taken down */
  node: string;
  /** Nodes that must stay Ready throughout */
  expectedReady: string[];
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
  logger?: FrameworkLogger;
  timeline?: PhaseTimeline;
}

export interface ResilienceReport {
  node: string;
  bond: string;
  activeBefore: string;
  activeAfter: string;
  readyNodes: string[];
}

/**
 * Bond failover check on a formed cluster: take the active member down,
 * expect the bond to move to another member and every node to stay Ready,
 * then bring the member back.
 */
export class ResilienceScenario {
  readonly chaos: ChaosInjector;
  private readonly bond: BondSpec;

  constructor(
    fleet: VmFleetManager,
    private readonly registry: NodeRegistry,
    topology: TopologyProfile
  ) {
    const bond = topology.bondSpec();
    if (!bond) {
      throw new ConfigurationError(`Resilience scenario needs a bonded topology (got '${topology.kind}')`);
    }
    this.bond = bond;
    this.chaos = new ChaosInjector(fleet, { maxConcurrentChaos: 1 });
  }

  async run(options: ResilienceOptions): Promise<ResilienceReport> {
    const logger = options.logger ?? defaultLogger;
    const { node } = options;

    const activeBefore = await this.chaos.activeBondMember(node, this.bond.name);
    if (activeBefore === undefined) {
      throw new ResilienceError(node, `${this.bond.name} on ${node} has no active member`);
    }

    const onStarted = (scenario: ChaosScenario): void => {
      options.timeline?.record('resilience', 'info', { action: scenario.type, iface: scenario.iface }, scenario.node);
    };
    const onStopped = (scenario: ChaosScenario): void => {
      options.timeline?.record('resilience', 'info', { action: 'link-restored', iface: scenario.iface }, scenario.node);
    };
    this.chaos.on('scenario-started', onStarted);
    this.chaos.on('scenario-stopped', onStopped);

    try {
      logger.node(node, `taking ${activeBefore} down (active member of ${this.bond.name})`);
      await this.chaos.injectLinkDown(node, activeBefore);

      const outcome = await pollUntil(async () => {
        const active = await this.chaos.activeBondMember(node, this.bond.name);
        if (active === undefined || active === activeBefore) return undefined;
        const ready = await this.registry.readyNodes();
        return options.expectedReady.every(name => ready.includes(name)) ? { active, ready } : undefined;
      }, { timeoutMs: options.timeoutMs, intervalMs: options.intervalMs, signal: options.signal });

      if (outcome.status !== 'satisfied') {
        const ready = await this.registry.readyNodes();
        const missing = options.expectedReady.filter(name => !ready.includes(name));
        throw new ResilienceError(
          node,
          `Cluster did not survive losing ${activeBefore} on ${node} (${outcome.status}); ` +
          (missing.length > 0 ? `not Ready: ${missing.join(', ')}` : 'bond did not fail over')
        );
      }

      options.timeline?.record('resilience', 'info', { action: 'failover', iface: outcome.value.active }, node);
      logger.node(node, `${this.bond.name} failed over to ${outcome.value.active}; ${outcome.value.ready.length} node(s) Ready`);
      return {
        node,
        bond: this.bond.name,
        activeBefore,
        activeAfter: outcome.value.active,
        readyNodes: outcome.value.ready
      };
    } finally {
      await this.chaos.stopAll().catch(error => logger.warn(`Could not restore links on ${node}: ${errorMessage(error)}`));
      this.chaos.off('scenario-started', onStarted);
      this.chaos.off('scenario-stopped', onStopped);
    }
  }
}
