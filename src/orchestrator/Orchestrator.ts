import { ExecResult, NodeSpec, NodeState } from '../types';
import { ClusterformError, ConfigurationError, HealthCheckError, ScriptAssertionError, errorMessage, failingNodeOf } from '../common/errors';
import { FrameworkLogger, defaultLogger } from '../common/logger';
import { PhaseTimeline, TimelineEntry } from '../common/PhaseTimeline';
import { OrchestratorConfig } from '../config/OrchestratorConfig';
import { DiagnosticsBundle } from '../diagnostics/DiagnosticsCollector';
import { VmFleetManager } from '../fleet/types';
import { ClusterFormationDriver } from '../formation/ClusterFormationDriver';
import { NodeRegistry } from '../formation/NodeRegistry';
import { K3S_SERVICE, ServiceProfile } from '../formation/ServiceProfile';
import { HealthReport, HealthVerifier } from '../health/HealthVerifier';
import { TopologyProfile } from '../topology/TopologyProfile';
import { TopologyProfileDefinition } from '../topology/types';
import { ResilienceReport, ResilienceScenario } from './ResilienceScenario';
import { ALL_NODES, ScenarioScript, ScriptCheck, ScriptCheckResult } from './ScenarioScript';

export interface OrchestratorRunOptions {
  fleet: VmFleetManager;
  profile: TopologyProfileDefinition;
  nodes: NodeSpec[];
  config?: OrchestratorConfig;
  service?: ServiceProfile;
  logger?: FrameworkLogger;
  timeline?: PhaseTimeline;
  /** Extra checks run after the health checks */
  script?: ScriptCheck[];
  /** Node whose bond loses its active member; defaults to the primary */
  resilienceNode?: string;
  /** Cancels the run from outside, e.g. on SIGINT */
  signal?: AbortSignal;
}

export type Verdict = 'pass' | 'fail';

export interface RunReport {
  verdict: Verdict;
  topology: string;
  timeline: TimelineEntry[];
  nodeStates: Record<string, NodeState>;
  health?: HealthReport;
  script?: ScriptCheckResult[];
  resilience?: ResilienceReport;
  diagnostics: DiagnosticsBundle[];
  error?: Error;
  /** The global timeout fired before the run finished */
  timedOut: boolean;
  durationMs: number;
}

/**
 * Fleet wrapper remembering which VMs were booted and not yet shut down
 */
class BootTrackingFleet implements VmFleetManager {
  readonly booted = new Set<string>();

  constructor(private readonly inner: VmFleetManager) {}

  async boot(spec: NodeSpec): Promise<void> {
    this.booted.add(spec.name);
    await this.inner.boot(spec);
  }

  waitForBoot(node: string, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    return this.inner.waitForBoot(node, timeoutMs, signal);
  }

  exec(node: string, command: string): Promise<ExecResult> {
    return this.inner.exec(node, command);
  }

  waitForPort(node: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    return this.inner.waitForPort(node, port, timeoutMs, signal);
  }

  waitForCondition(
    node: string,
    description: string,
    predicate: () => Promise<boolean>,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<void> {
    return this.inner.waitForCondition(node, description, predicate, timeoutMs, signal);
  }

  async shutdown(node: string): Promise<void> {
    this.booted.delete(node);
    await this.inner.shutdown(node);
  }
}

/**
 * One validation run: validate the profile, form the cluster, verify its
 * network, run the optional script and resilience scenario, then tear every
 * VM down. run() never throws; the outcome is the report's verdict.
 */
export class Orchestrator {
  private readonly config: OrchestratorConfig;
  private readonly service: ServiceProfile;
  private readonly logger: FrameworkLogger;
  private readonly timeline: PhaseTimeline;
  private readonly fleet: BootTrackingFleet;

  constructor(private readonly options: OrchestratorRunOptions) {
    this.config = options.config ?? OrchestratorConfig.create();
    this.service = options.service ?? K3S_SERVICE;
    this.logger = options.logger ?? defaultLogger;
    this.timeline = options.timeline ?? new PhaseTimeline();
    this.fleet = new BootTrackingFleet(options.fleet);
  }

  async run(): Promise<RunReport> {
    const startedAt = Date.now();
    const topologyName = this.options.profile.name ?? this.options.profile.kind;
    const report: RunReport = {
      verdict: 'fail',
      topology: topologyName,
      timeline: [],
      nodeStates: {},
      diagnostics: [],
      timedOut: false,
      durationMs: 0
    };
    const finish = (): RunReport => {
      report.durationMs = Date.now() - startedAt;
      this.timeline.record('run', report.verdict === 'pass' ? 'completed' : 'failed', { verdict: report.verdict });
      report.timeline = this.timeline.getEntries();
      return report;
    };

    this.timeline.record('run', 'started', { topology: topologyName, nodes: this.options.nodes.map(n => n.name) });

    let topology: TopologyProfile;
    let resilience: ResilienceScenario | undefined;
    try {
      topology = new TopologyProfile(this.options.profile, this.options.nodes);
      this.validateScript();
      if (this.config.resilience) {
        resilience = this.buildResilience(topology);
      }
    } catch (error) {
      this.logger.error(`Configuration rejected: ${errorMessage(error)}`);
      this.timeline.record('validate', 'failed', { error: errorMessage(error) });
      report.error = toError(error);
      return finish();
    }
    this.timeline.record('validate', 'completed', { kind: topology.kind });

    const controller = new AbortController();
    const timer = setTimeout(() => {
      report.timedOut = true;
      this.logger.error(`Global timeout of ${this.config.globalTimeoutMs}ms reached`);
      this.timeline.record('run', 'warning', { reason: 'global timeout', timeoutMs: this.config.globalTimeoutMs });
      controller.abort();
    }, this.config.globalTimeoutMs);
    const forwardAbort = (): void => controller.abort();
    this.options.signal?.addEventListener('abort', forwardAbort, { once: true });

    const driver = new ClusterFormationDriver({
      fleet: this.fleet,
      topology,
      nodes: this.options.nodes,
      service: this.service,
      logger: this.logger,
      timeline: this.timeline,
      timeouts: this.config.timeouts,
      retry: this.config.retry,
      signal: controller.signal,
      onFailure: failedNode => this.teardown(node => node !== failedNode)
    });

    try {
      await driver.run();
      await this.verifyHealth(topology, report, controller.signal);
      await this.runScript(report, controller.signal);
      if (resilience) {
        report.resilience = await this.runResilience(resilience, controller.signal);
      }
      report.verdict = 'pass';
    } catch (error) {
      report.error = toError(error);
      await this.collectForFailure(driver, error);
    } finally {
      clearTimeout(timer);
      this.options.signal?.removeEventListener('abort', forwardAbort);
      report.nodeStates = driver.states();
      report.diagnostics = driver.diagnostics.getBundles();
      await this.teardown(() => true);
    }

    return finish();
  }

  private validateScript(): void {
    const names = new Set(this.options.nodes.map(node => node.name));
    for (const check of this.options.script ?? []) {
      if (check.node !== ALL_NODES && !names.has(check.node)) {
        throw new ConfigurationError(`Script check '${check.name}' targets unknown node ${check.node}`);
      }
    }
  }

  private buildResilience(topology: TopologyProfile): ResilienceScenario {
    const target = this.resilienceTarget();
    if (!this.options.nodes.some(node => node.name === target)) {
      throw new ConfigurationError(`Resilience target ${target} is not part of the run`);
    }
    return new ResilienceScenario(this.fleet, this.registry(), topology);
  }

  private resilienceTarget(): string {
    return this.options.resilienceNode ?? this.primaryName();
  }

  private primaryName(): string {
    const primary = this.options.nodes.find(node => node.primary);
    if (!primary) {
      throw new ConfigurationError('No primary server');
    }
    return primary.name;
  }

  private registry(): NodeRegistry {
    return new NodeRegistry(this.fleet, this.service, this.primaryName());
  }

  private async verifyHealth(topology: TopologyProfile, report: RunReport, signal: AbortSignal): Promise<void> {
    this.logger.phase('health started');
    this.timeline.record('health', 'started');
    const verifier = new HealthVerifier(this.fleet, topology, { logger: this.logger });
    let health: HealthReport;
    try {
      health = await verifier.verify(this.options.nodes.map(node => node.name), signal);
    } catch (error) {
      this.timeline.record('health', 'failed', { error: errorMessage(error) });
      throw error;
    }
    report.health = health;

    for (const warning of health.warnings) {
      this.timeline.record('health', 'warning', { check: warning.check, message: warning.message }, warning.node);
    }
    if (!health.passed) {
      this.timeline.record('health', 'failed', { failures: health.failures.length });
      throw new HealthCheckError(health.failures);
    }
    this.timeline.record('health', 'completed', { checks: health.checks.length });
    this.logger.phase('health completed');
  }

  private async runScript(report: RunReport, signal: AbortSignal): Promise<void> {
    const checks = this.options.script ?? [];
    if (checks.length === 0) {
      return;
    }
    this.timeline.record('script', 'started', { checks: checks.length });
    const script = new ScenarioScript(checks, { logger: this.logger });
    let results: ScriptCheckResult[];
    try {
      results = await script.run(this.fleet, this.options.nodes.map(node => node.name), signal);
    } catch (error) {
      this.timeline.record('script', 'failed', { error: errorMessage(error) });
      throw error;
    }
    report.script = results;

    const failures = results.filter(result => !result.passed);
    if (failures.length > 0) {
      this.timeline.record('script', 'failed', { failures: failures.length });
      throw new ScriptAssertionError(failures.map(({ check, node, message }) => ({ check, node, message })));
    }
    this.timeline.record('script', 'completed', { checks: results.length });
  }

  private async runResilience(
    scenario: ResilienceScenario,
    signal: AbortSignal
  ): Promise<ResilienceReport> {
    this.timeline.record('resilience', 'started');
    const result = await scenario.run({
      node: this.resilienceTarget(),
      expectedReady: this.options.nodes.map(node => node.name),
      timeoutMs: this.config.timeouts.clusterReadyMs,
      intervalMs: this.config.pollIntervalMs,
      signal,
      logger: this.logger,
      timeline: this.timeline
    });
    this.timeline.record('resilience', 'completed', { activeBefore: result.activeBefore, activeAfter: result.activeAfter });
    return result;
  }

  /**
   * Formation failures were already collected by the driver; later stages
   * collect for every node they name.
   */
  private async collectForFailure(driver: ClusterFormationDriver, error: unknown): Promise<void> {
    const nodes = new Set<string>();
    if (error instanceof HealthCheckError || error instanceof ScriptAssertionError) {
      for (const failure of error.failures) nodes.add(failure.node);
    } else {
      const node = failingNodeOf(error);
      if (node !== undefined) nodes.add(node);
    }

    for (const node of nodes) {
      if (driver.diagnostics.bundleFor(node) || !this.fleet.booted.has(node)) continue;
      await driver.diagnostics.collect(node, { reason: error, transcript: driver.configurator.transcript(node) });
    }
  }

  private async teardown(include: (node: string) => boolean): Promise<void> {
    const nodes = Array.from(this.fleet.booted).filter(include);
    if (nodes.length === 0) {
      return;
    }
    this.logger.phase(`teardown of ${nodes.join(', ')}`);
    const settled = await Promise.allSettled(nodes.map(node => this.fleet.shutdown(node)));
    settled.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        const node = nodes[index];
        this.logger.warn(`Teardown of ${node} failed: ${errorMessage(outcome.reason)}`);
        this.timeline.record('teardown', 'warning', { error: errorMessage(outcome.reason) }, node);
      }
    });
    this.timeline.record('teardown', 'completed', { nodes });
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Exit status for a finished run: 0 pass, 2 configuration error, 1 otherwise
 */
export function exitCodeFor(report: RunReport): number {
  if (report.verdict === 'pass') return 0;
  return report.error instanceof ConfigurationError ? 2 : 1;
}

/** JSON-safe view of the report's error */
export function describeError(error: Error): { name: string; code?: string; message: string; node?: string } {
  const described: { name: string; code?: string; message: string; node?: string } = {
    name: error.name,
    message: error.message
  };
  if (error instanceof ClusterformError) described.code = error.code;
  const node = failingNodeOf(error);
  if (node !== undefined) described.node = node;
  return described;
}
