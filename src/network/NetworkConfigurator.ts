import { TranscriptEntry } from '../types';
import { NetworkApplyError } from '../common/errors';
import { FrameworkLogger, defaultLogger } from '../common/logger';
import { CommandRunner, CommandRunnerOptions } from '../fleet/CommandRunner';
import { VmFleetManager } from '../fleet/types';
import { DiagnosticsCollector } from '../diagnostics/DiagnosticsCollector';
import { TopologyProfile } from '../topology/TopologyProfile';
import { NetworkCommand } from './commands';

export interface NetworkConfiguratorOptions {
  attempts?: number;
  settleDelayMs?: number;
  logger?: FrameworkLogger;
  /** Invoked with the transcript before NetworkApplyError is thrown */
  diagnostics?: DiagnosticsCollector;
  onRetry?: CommandRunnerOptions['onRetry'];
}

/**
 * Takes a booted node to NetworkConfigured by running the topology's
 * command plan in order.
 */
export class NetworkConfigurator {
  private readonly runner: CommandRunner;
  private readonly logger: FrameworkLogger;

  constructor(fleet: VmFleetManager, private readonly options: NetworkConfiguratorOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.runner = new CommandRunner(fleet, {
      attempts: options.attempts ?? 3,
      settleDelayMs: options.settleDelayMs ?? 1000,
      logger: this.logger,
      ...(options.onRetry ? { onRetry: options.onRetry } : {})
    });
  }

  plan(node: string, topology: TopologyProfile): NetworkCommand[] {
    return topology.configure(node);
  }

  /**
   * Apply the plan. Safe to re-run on a configured node. Stops at the first
   * non-tolerated nonzero exit, collects diagnostics, then throws
   * NetworkApplyError.
   */
  async apply(node: string, topology: TopologyProfile, signal?: AbortSignal): Promise<TranscriptEntry[]> {
    const commands = this.plan(node, topology);
    this.logger.node(node, `applying ${topology.kind} network plan (${commands.length} commands)`);

    for (const command of commands) {
      const entry = await this.runner.run(node, command, signal);
      if (entry.exitCode !== 0 && !command.tolerateFailure) {
        const transcript = this.runner.transcript(node);
        const error = new NetworkApplyError(node, entry.command, entry.exitCode, entry.output, transcript);
        if (this.options.diagnostics) {
          await this.options.diagnostics.collect(node, { reason: error, transcript });
        }
        throw error;
      }
    }

    return this.runner.transcript(node);
  }

  transcript(node: string): TranscriptEntry[] {
    return this.runner.transcript(node);
  }
}
