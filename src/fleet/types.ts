import { ExecResult, NodeSpec } from '../types';

/**
 * Boot/exec/wait primitives of the VM runtime. The hypervisor itself is
 * external; implementations only drive it.
 *
 * Waits resolve once the condition holds and reject with
 * FormationTimeoutError or FormationAbortedError otherwise.
 */
export interface VmFleetManager {
  boot(spec: NodeSpec): Promise<void>;
  waitForBoot(node: string, timeoutMs: number, signal?: AbortSignal): Promise<void>;
  /** Out-of-band command channel; a nonzero exit is a result, a broken channel throws */
  exec(node: string, command: string): Promise<ExecResult>;
  waitForPort(node: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<void>;
  waitForCondition(
    node: string,
    description: string,
    predicate: () => Promise<boolean>,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<void>;
  shutdown(node: string): Promise<void>;
}

export const DEFAULT_FLEET_POLL_INTERVAL_MS = 1000;
