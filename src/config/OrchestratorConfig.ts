import { ConfigurationError } from '../common/errors';
import { DEFAULT_FORMATION_TIMEOUTS, FormationTimeouts } from '../formation/types';

export interface RetrySettings {
  attempts: number;
  settleDelayMs: number;
}

export interface OrchestratorOptions {
  timeouts?: Partial<FormationTimeouts>;
  /** Whole-run limit; the run is aborted when it expires */
  globalTimeoutMs?: number;
  retry?: Partial<RetrySettings>;
  /** Interval between polls of boot, port and readiness waits */
  pollIntervalMs?: number;
  /** Take a bond member down after formation and re-check readiness */
  resilience?: boolean;
}

export const DEFAULT_GLOBAL_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_POLL_INTERVAL_MS = 5000;

export class OrchestratorConfig {
  readonly timeouts: FormationTimeouts;
  readonly globalTimeoutMs: number;
  readonly retry: RetrySettings;
  readonly pollIntervalMs: number;
  readonly resilience: boolean;

  constructor(
    timeouts: FormationTimeouts = DEFAULT_FORMATION_TIMEOUTS,
    globalTimeoutMs: number = DEFAULT_GLOBAL_TIMEOUT_MS,
    retry: RetrySettings = { attempts: 3, settleDelayMs: 1000 },
    pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS,
    resilience: boolean = false
  ) {
    this.timeouts = timeouts;
    this.globalTimeoutMs = globalTimeoutMs;
    this.retry = retry;
    this.pollIntervalMs = pollIntervalMs;
    this.resilience = resilience;
  }

  static create(options: OrchestratorOptions = {}): OrchestratorConfig {
    return new OrchestratorConfig(
      { ...DEFAULT_FORMATION_TIMEOUTS, ...options.timeouts },
      options.globalTimeoutMs ?? DEFAULT_GLOBAL_TIMEOUT_MS,
      {
        attempts: options.retry?.attempts ?? 3,
        settleDelayMs: options.retry?.settleDelayMs ?? 1000
      },
      options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      options.resilience ?? false
    );
  }

  /**
   * Later sources win field by field
   */
  static merge(base: OrchestratorOptions, override: OrchestratorOptions): OrchestratorOptions {
    return {
      ...base,
      ...override,
      timeouts: { ...base.timeouts, ...override.timeouts },
      retry: { ...base.retry, ...override.retry }
    };
  }

  /**
   * CLUSTERFORM_TIMEOUT (seconds), CLUSTERFORM_POLL_INTERVAL_MS and
   * CLUSTERFORM_RESILIENCE=1
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): OrchestratorOptions {
    const options: OrchestratorOptions = {};
    if (env.CLUSTERFORM_TIMEOUT !== undefined) {
      options.globalTimeoutMs = positiveNumberFrom(env.CLUSTERFORM_TIMEOUT, 'CLUSTERFORM_TIMEOUT') * 1000;
    }
    if (env.CLUSTERFORM_POLL_INTERVAL_MS !== undefined) {
      options.pollIntervalMs = positiveNumberFrom(env.CLUSTERFORM_POLL_INTERVAL_MS, 'CLUSTERFORM_POLL_INTERVAL_MS');
    }
    if (env.CLUSTERFORM_RESILIENCE !== undefined) {
      options.resilience = env.CLUSTERFORM_RESILIENCE === '1' || env.CLUSTERFORM_RESILIENCE === 'true';
    }
    return options;
  }
}

export function positiveNumberFrom(value: string, source: string): number {
  const parsed = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${source} must be a positive number (got '${value}')`);
  }
  return parsed;
}
