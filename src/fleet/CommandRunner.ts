import { RemoteCommand, TranscriptEntry } from '../types';
import { FrameworkLogger, defaultLogger } from '../common/logger';
import { RetryScheduledEvent, withRetry } from '../retry/RetryManager';
import { redact } from '../network/commands';
import { VmFleetManager } from './types';

export interface CommandRunnerOptions {
  /** Exec attempts per command when the channel itself fails */
  attempts?: number;
  settleDelayMs?: number;
  logger?: FrameworkLogger;
  /** Told about every exec attempt that failed and will be retried; the command is redacted */
  onRetry?: (node: string, command: string, event: RetryScheduledEvent) => void;
}

/**
 * Runs commands on fleet VMs and keeps a per-node transcript.
 *
 * Only a thrown exec (a broken channel) is retried; a nonzero exit is the
 * command's answer and is returned as is.
 */
export class CommandRunner {
  private readonly transcripts = new Map<string, TranscriptEntry[]>();
  private readonly logger: FrameworkLogger;

  constructor(private readonly fleet: VmFleetManager, private readonly options: CommandRunnerOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  async run(node: string, command: RemoteCommand, signal?: AbortSignal): Promise<TranscriptEntry> {
    const result = await withRetry(() => this.fleet.exec(node, command.command), {
      attempts: this.options.attempts ?? 3,
      settleDelayMs: this.options.settleDelayMs ?? 1000,
      signal,
      onRetry: event => {
        const shown = redact(command.command, command.secret);
        this.logger.warn(`[${node}] exec attempt ${event.attempt} of '${shown}' failed (${event.error.message}); retrying in ${event.delay}ms`);
        this.options.onRetry?.(node, shown, event);
      }
    });

    const entry: TranscriptEntry = {
      node,
      description: command.description,
      command: redact(command.command, command.secret),
      exitCode: result.exitCode,
      output: redact(result.output, command.secret),
      timestamp: Date.now()
    };
    this.transcripts.set(node, [...(this.transcripts.get(node) ?? []), entry]);

    this.logger.node(node, `${command.description} -> exit ${result.exitCode}`);
    return entry;
  }

  transcript(node: string): TranscriptEntry[] {
    return this.transcripts.get(node)?.slice() ?? [];
  }

  allTranscripts(): TranscriptEntry[] {
    return Array.from(this.transcripts.values()).flat().sort((a, b) => a.timestamp - b.timestamp);
  }
}
