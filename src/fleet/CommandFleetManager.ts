import { execFile } from 'child_process';
import { ExecResult, NodeSpec } from '../types';
import { FrameworkLogger, createLogger } from '../common/logger';
import { DEFAULT_FLEET_POLL_INTERVAL_MS, VmFleetManager } from './types';
import { waitUntil } from './wait';

export interface CommandFleetOptions {
  /** Executable implementing `boot|status|exec|shutdown <node> ...` */
  driver: string;
  pollIntervalMs?: number;
  /** Per-invocation limit for the driver process */
  commandTimeoutMs?: number;
  logger?: FrameworkLogger;
}

interface DriverOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Fleet backed by an external driver executable, one process per call:
 *
 *   driver boot <node> --memory <mb> --cpus <n> --image <ref>
 *   driver status <node>          exit 0 once the guest is up
 *   driver exec <node> -- <cmd>   guest exit code, combined output
 *   driver shutdown <node>
 */
export class CommandFleetManager implements VmFleetManager {
  private readonly logger: FrameworkLogger;

  constructor(private readonly options: CommandFleetOptions) {
    this.logger = options.logger ?? createLogger({ enableFleetLogs: true });
  }

  async boot(spec: NodeSpec): Promise<void> {
    this.logger.fleet(`boot ${spec.name} (${spec.resources.memoryMb}MB, ${spec.resources.cpus} vCPU, ${spec.image})`);
    const result = await this.invoke([
      'boot', spec.name,
      '--memory', String(spec.resources.memoryMb),
      '--cpus', String(spec.resources.cpus),
      '--image', spec.image
    ]);
    if (result.exitCode !== 0) {
      throw new Error(`Driver failed to boot ${spec.name} (exit ${result.exitCode}): ${result.stderr.trim()}`);
    }
  }

  async waitForBoot(node: string, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    await waitUntil(node, 'boot', async () => (await this.invoke(['status', node])).exitCode === 0, {
      timeoutMs,
      intervalMs: this.options.pollIntervalMs ?? DEFAULT_FLEET_POLL_INTERVAL_MS,
      signal
    });
  }

  async exec(node: string, command: string): Promise<ExecResult> {
    const result = await this.invoke(['exec', node, '--', command]);
    return { exitCode: result.exitCode, output: result.stdout + result.stderr };
  }

  async waitForPort(node: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    await waitUntil(node, `port ${port}`, async () => {
      const result = await this.exec(node, `ss -ltn | grep -q ':${port} '`);
      return result.exitCode === 0;
    }, {
      timeoutMs,
      intervalMs: this.options.pollIntervalMs ?? DEFAULT_FLEET_POLL_INTERVAL_MS,
      signal
    });
  }

  async waitForCondition(
    node: string,
    description: string,
    predicate: () => Promise<boolean>,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<void> {
    await waitUntil(node, description, predicate, {
      timeoutMs,
      intervalMs: this.options.pollIntervalMs ?? DEFAULT_FLEET_POLL_INTERVAL_MS,
      signal
    });
  }

  async shutdown(node: string): Promise<void> {
    this.logger.fleet(`shutdown ${node}`);
    const result = await this.invoke(['shutdown', node]);
    if (result.exitCode !== 0) {
      throw new Error(`Driver failed to shut down ${node} (exit ${result.exitCode}): ${result.stderr.trim()}`);
    }
  }

  /**
   * Run the driver. A nonzero exit is a result; failing to run it at all
   * (missing executable, killed by the timeout) throws.
   */
  private invoke(args: string[]): Promise<DriverOutput> {
    return new Promise((resolve, reject) => {
      execFile(
        this.options.driver,
        args,
        { timeout: this.options.commandTimeoutMs ?? 120000, maxBuffer: 16 * 1024 * 1024 },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr });
          } else if (typeof error.code === 'number' && !error.killed) {
            resolve({ exitCode: error.code, stdout, stderr });
          } else {
            reject(new Error(`Fleet driver ${this.options.driver} ${args[0] ?? ''} failed: ${error.message}`));
          }
        }
      );
    });
  }
}
