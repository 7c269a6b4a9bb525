import { EventEmitter } from 'events';
import { NodeSpec, NodeState } from '../types';
import { FormationAbortedError, errorMessage, failingNodeOf } from '../common/errors';
import { FrameworkLogger, defaultLogger } from '../common/logger';
import { PhaseTimeline } from '../common/PhaseTimeline';
import { CommandRunner, CommandRunnerOptions } from '../fleet/CommandRunner';
import { VmFleetManager } from '../fleet/types';
import { DiagnosticsCollector } from '../diagnostics/DiagnosticsCollector';
import { NetworkConfigurator } from '../network/NetworkConfigurator';
import { TopologyProfile, primaryOf } from '../topology/TopologyProfile';
import { ClusterToken } from './ClusterToken';
import { NodeRegistry } from './NodeRegistry';
import { NodeStateMachine, StateTransition } from './NodeStateMachine';
import { K3S_SERVICE, ServiceProfile, envFileFor } from './ServiceProfile';
import { defaultPhases } from './phases';
import { DEFAULT_FORMATION_TIMEOUTS, FormationContext, FormationPhase, FormationTimeouts, PhaseResult } from './types';

export interface FormationDriverOptions {
  fleet: VmFleetManager;
  topology: TopologyProfile;
  nodes: NodeSpec[];
  service?: ServiceProfile;
  logger?: FrameworkLogger;
  timeline?: PhaseTimeline;
  diagnostics?: DiagnosticsCollector;
  timeouts?: Partial<FormationTimeouts>;
  /** Exec attempts and settle delay for every fleet call */
  retry?: { attempts: number; settleDelayMs: number };
  phases?: FormationPhase[];
  /** Aborts the whole formation, e.g. a global run timeout */
  signal?: AbortSignal;
  /** Runs alongside diagnostics once a node has failed */
  onFailure?: (failedNode: string | undefined, error: unknown) => Promise<void>;
}

export interface FormationResult {
  phases: PhaseResult[];
  states: Record<string, NodeState>;
  token?: ClusterToken;
}

/**
 * Drives boot → network → prepare → primary-init → token → server-join →
 * agent-join → cluster-ready. Phases run in order; a failure marks the node
 * Failed, aborts every in-flight wait, collects diagnostics and rethrows.
 *
 * Emits 'phase-started', 'phase-completed', 'phase-failed' and 'transition'.
 */
export class ClusterFormationDriver extends EventEmitter {
  readonly timeline: PhaseTimeline;
  readonly diagnostics: DiagnosticsCollector;
  readonly configurator: NetworkConfigurator;
  readonly runner: CommandRunner;

  private readonly nodes: NodeSpec[];
  private readonly primary: NodeSpec;
  private readonly service: ServiceProfile;
  private readonly logger: FrameworkLogger;
  private readonly timeouts: FormationTimeouts;
  private readonly phases: FormationPhase[];
  private readonly machines = new Map<string, NodeStateMachine>();
  private readonly controller = new AbortController();

  constructor(private readonly options: FormationDriverOptions) {
    super();
    this.nodes = options.nodes;
    this.primary = primaryOf(options.nodes);
    this.service = options.service ?? K3S_SERVICE;
    this.logger = options.logger ?? defaultLogger;
    this.timeline = options.timeline ?? new PhaseTimeline();
    this.timeouts = { ...DEFAULT_FORMATION_TIMEOUTS, ...options.timeouts };
    const retry = options.retry ?? { attempts: 3, settleDelayMs: 1000 };
    this.phases = options.phases ?? defaultPhases(retry);

    this.diagnostics = options.diagnostics ?? new DiagnosticsCollector(options.fleet, {
      serviceUnits: [this.service.serverUnit, this.service.agentUnit],
      environmentFiles: [envFileFor(this.service, 'server'), envFileFor(this.service, 'agent')],
      logger: this.logger
    });
    const onRetry: CommandRunnerOptions['onRetry'] = (node, command, event) => {
      this.timeline.record('exec', 'warning', { command, attempt: event.attempt, delayMs: event.delay, error: event.error.message }, node);
    };
    this.configurator = new NetworkConfigurator(options.fleet, { ...retry, logger: this.logger, diagnostics: this.diagnostics, onRetry });
    this.runner = new CommandRunner(options.fleet, { ...retry, logger: this.logger, onRetry });

    for (const node of this.nodes) {
      const machine = new NodeStateMachine(node.name);
      machine.on('transition', (transition: StateTransition, name: string) => {
        this.timeline.record('state', 'transition', { from: transition.from, to: transition.to }, name);
        this.emit('transition', { node: name, ...transition });
      });
      this.machines.set(node.name, machine);
    }

    if (options.signal) {
      if (options.signal.aborted) {
        this.controller.abort();
      } else {
        options.signal.addEventListener('abort', () => this.controller.abort(), { once: true });
      }
    }
  }

  async run(): Promise<FormationResult> {
    const context: FormationContext = {
      nodes: this.nodes,
      primary: this.primary,
      topology: this.options.topology,
      service: this.service,
      fleet: this.options.fleet,
      runner: this.runner,
      configurator: this.configurator,
      diagnostics: this.diagnostics,
      registry: new NodeRegistry(this.options.fleet, this.service, this.primary.name),
      timeline: this.timeline,
      logger: this.logger,
      timeouts: this.timeouts,
      signal: this.controller.signal,
      stateOf: node => this.stateMachine(node)
    };

    const results: PhaseResult[] = [];
    for (const phase of this.phases) {
      if (this.controller.signal.aborted) {
        const error = new FormationAbortedError(this.primary.name, phase.name);
        await this.handleFailure(phase.name, error);
        throw error;
      }

      this.logger.phase(`${phase.name} started`);
      this.timeline.record(phase.name, 'started');
      this.emit('phase-started', phase.name);

      try {
        const result = await phase.run(context);
        results.push(result);
        this.timeline.record(phase.name, 'completed', { nodes: result.nodes, ...result.details });
        this.emit('phase-completed', result);
        this.logger.phase(`${phase.name} completed`);
      } catch (error) {
        await this.handleFailure(phase.name, error);
        throw error;
      }
    }

    const result: FormationResult = { phases: results, states: this.states() };
    if (context.token) {
      result.token = context.token;
    }
    return result;
  }

  stateMachine(node: string): NodeStateMachine {
    const machine = this.machines.get(node);
    if (!machine) {
      throw new Error(`Unknown node ${node}`);
    }
    return machine;
  }

  states(): Record<string, NodeState> {
    const states: Record<string, NodeState> = {};
    for (const [node, machine] of this.machines) {
      states[node] = machine.state;
    }
    return states;
  }

  abort(): void {
    this.controller.abort();
  }

  private async handleFailure(phase: string, error: unknown): Promise<void> {
    const node = failingNodeOf(error);
    this.logger.error(`${phase} failed${node ? ` on ${node}` : ''}: ${errorMessage(error)}`);
    this.timeline.record(phase, 'failed', { error: errorMessage(error) }, node);
    this.emit('phase-failed', { phase, node, error });

    if (node !== undefined && this.machines.has(node)) {
      this.stateMachine(node).fail(errorMessage(error));
    }
    this.controller.abort();

    const work: Promise<unknown>[] = [];
    if (node !== undefined && this.machines.has(node) && !this.diagnostics.bundleFor(node)) {
      work.push(this.diagnostics.collect(node, { reason: error, transcript: this.configurator.transcript(node) }));
    }
    if (this.options.onFailure) {
      work.push(this.options.onFailure(node, error));
    }

    const settled = await Promise.allSettled(work);
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        this.logger.warn(`Failure handling step did not complete: ${errorMessage(outcome.reason)}`);
      }
    }
  }
}
