import { TranscriptEntry } from '../types';

/**
 * Error taxonomy for a validation run.
 *
 * ConfigurationError and its subclasses are raised before any VM boots.
 * NetworkApplyError and FormationTimeoutError abort the run after diagnostics
 * have been collected. HealthCheckError carries every accumulated failure.
 * DiagnosticsCollectionError is recorded inside a bundle and never thrown
 * past the collector.
 */
export abstract class ClusterformError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends ClusterformError {
  readonly name: string = 'ConfigurationError';
  readonly code: string = 'CONFIGURATION';
}

export class MissingAddressError extends ConfigurationError {
  readonly name = 'MissingAddressError';

  constructor(readonly node: string, readonly semantic: string) {
    super(`Node ${node} has no address for semantic interface '${semantic}'`);
  }
}

export class DuplicateVlanTagError extends ConfigurationError {
  readonly name = 'DuplicateVlanTagError';

  constructor(readonly tag: number, readonly semantics: string[]) {
    super(`VLAN tag ${tag} is assigned to more than one semantic interface: ${semantics.join(', ')}`);
  }
}

export class InvalidVlanTagError extends ConfigurationError {
  readonly name = 'InvalidVlanTagError';

  constructor(readonly semantic: string, readonly tag: number) {
    super(`VLAN tag ${tag} on '${semantic}' is outside 1-4094`);
  }
}

export class InvalidBondSpecError extends ConfigurationError {
  readonly name = 'InvalidBondSpecError';
}

export class InvalidAddressError extends ConfigurationError {
  readonly name = 'InvalidAddressError';
}

export class PrimaryCountError extends ConfigurationError {
  readonly name = 'PrimaryCountError';
}

export class NetworkApplyError extends ClusterformError {
  readonly name = 'NetworkApplyError';
  readonly code = 'NETWORK_APPLY';

  constructor(
    readonly node: string,
    readonly command: string,
    readonly exitCode: number,
    readonly output: string,
    readonly transcript: TranscriptEntry[]
  ) {
    super(`Network configuration failed on ${node}: '${command}' exited ${exitCode}`);
  }
}

export class FormationTimeoutError extends ClusterformError {
  readonly name = 'FormationTimeoutError';
  readonly code = 'FORMATION_TIMEOUT';

  constructor(readonly node: string, readonly waitingFor: string, readonly timeoutMs: number) {
    super(`${node} did not reach '${waitingFor}' within ${timeoutMs}ms`);
  }
}

/** A wait was cancelled because the run is being aborted */
export class FormationAbortedError extends ClusterformError {
  readonly name = 'FormationAbortedError';
  readonly code = 'FORMATION_ABORTED';

  constructor(readonly node: string, readonly waitingFor: string) {
    super(`Wait for '${waitingFor}' on ${node} was aborted`);
  }
}

/** Service-level failure that is not a timeout, e.g. a start command exiting nonzero */
export class FormationError extends ClusterformError {
  readonly name = 'FormationError';
  readonly code = 'FORMATION';

  constructor(readonly node: string, message: string) {
    super(message);
  }
}

export interface HealthFailure {
  node: string;
  check: string;
  message: string;
}

export class HealthCheckError extends ClusterformError {
  readonly name = 'HealthCheckError';
  readonly code = 'HEALTH_CHECK';

  constructor(readonly failures: HealthFailure[]) {
    super(
      `${failures.length} health check(s) failed:\n` +
      failures.map(f => `  [${f.node}] ${f.check}: ${f.message}`).join('\n')
    );
  }
}

export interface ScriptFailure {
  check: string;
  node: string;
  message: string;
}

export class ScriptAssertionError extends ClusterformError {
  readonly name = 'ScriptAssertionError';
  readonly code = 'SCRIPT_ASSERTION';

  constructor(readonly failures: ScriptFailure[]) {
    super(
      `${failures.length} script check(s) failed:\n` +
      failures.map(f => `  [${f.node}] ${f.check}: ${f.message}`).join('\n')
    );
  }
}

export class ResilienceError extends ClusterformError {
  readonly name = 'ResilienceError';
  readonly code = 'RESILIENCE';

  constructor(readonly node: string, message: string) {
    super(message);
  }
}

export class DiagnosticsCollectionError extends ClusterformError {
  readonly name = 'DiagnosticsCollectionError';
  readonly code = 'DIAGNOSTICS';

  constructor(readonly node: string, readonly probe: string, readonly cause: unknown) {
    super(`Diagnostics probe '${probe}' failed on ${node}: ${errorMessage(cause)}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Node a failure is attributed to, when the error type carries one */
export function failingNodeOf(error: unknown): string | undefined {
  if (
    error instanceof NetworkApplyError ||
    error instanceof FormationTimeoutError ||
    error instanceof FormationAbortedError ||
    error instanceof FormationError ||
    error instanceof ResilienceError
  ) {
    return error.node;
  }
  return undefined;
}
