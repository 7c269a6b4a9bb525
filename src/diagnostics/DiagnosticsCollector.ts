import { EventEmitter } from 'eventemitter3';
import { TranscriptEntry } from '../types';
import { ClusterformError, DiagnosticsCollectionError, errorMessage } from '../common/errors';
import { FrameworkLogger, defaultLogger } from '../common/logger';
import { redact } from '../network/commands';
import { VmFleetManager } from '../fleet/types';

export interface DiagnosticProbe {
  name: string;
  command: string;
}

export interface ProbeResult {
  probe: string;
  command: string;
  exitCode: number;
  output: string;
}

export interface DiagnosticsBundle {
  node: string;
  reason: string;
  errorCode?: string;
  collectedAt: number;
  transcript: TranscriptEntry[];
  probes: ProbeResult[];
  /** Probes that could not run; the bundle is partial when non-empty */
  errors: DiagnosticsCollectionError[];
}

export interface DiagnosticsCollectorConfig {
  /** Service units whose status and log tail are captured */
  serviceUnits?: string[];
  /** Files dumped verbatim (secrets redacted) */
  environmentFiles?: string[];
  logTailLines?: number;
  /** Extra probes run after the defaults */
  probes?: DiagnosticProbe[];
  logger?: FrameworkLogger;
}

export function defaultDiagnosticProbes(units: string[], environmentFiles: string[], logTailLines: number): DiagnosticProbe[] {
  return [
    { name: 'interfaces', command: 'ip -br addr show' },
    { name: 'links', command: 'ip -d link show' },
    { name: 'routes', command: 'ip route show' },
    ...units.flatMap(unit => [
      { name: `${unit} status`, command: `systemctl status ${unit}.service --no-pager` },
      { name: `${unit} log`, command: `journalctl -u ${unit}.service --no-pager -n ${logTailLines}` }
    ]),
    ...environmentFiles.map(file => ({ name: `env ${file}`, command: `cat ${file}` }))
  ];
}

/**
 * Gathers what is needed to debug a failed node. Never throws: a probe that
 * cannot run is recorded in the bundle's errors and the rest still run.
 *
 * Emits 'probe-failed' and 'bundle-collected'.
 */
export class DiagnosticsCollector extends EventEmitter {
  private readonly bundles = new Map<string, DiagnosticsBundle>();
  private readonly secrets = new Set<string>();
  private readonly probes: DiagnosticProbe[];
  private readonly logger: FrameworkLogger;

  constructor(private readonly fleet: VmFleetManager, config: DiagnosticsCollectorConfig = {}) {
    super();
    this.logger = config.logger ?? defaultLogger;
    this.probes = [
      ...defaultDiagnosticProbes(
        config.serviceUnits ?? ['k3s-server', 'k3s-agent'],
        config.environmentFiles ?? ['/etc/default/k3s-server', '/etc/default/k3s-agent'],
        config.logTailLines ?? 100
      ),
      ...(config.probes ?? [])
    ];
  }

  /** Redact this value from everything collected from now on */
  addSecret(secret: string): void {
    if (secret.length > 0) {
      this.secrets.add(secret);
    }
  }

  async collect(node: string, context: { reason: unknown; transcript?: TranscriptEntry[] }): Promise<DiagnosticsBundle> {
    this.logger.warn(`Collecting diagnostics for ${node}: ${errorMessage(context.reason)}`);

    const bundle: DiagnosticsBundle = {
      node,
      reason: this.scrub(errorMessage(context.reason)),
      collectedAt: Date.now(),
      transcript: (context.transcript ?? []).map(entry => ({
        ...entry,
        command: this.scrub(entry.command),
        output: this.scrub(entry.output)
      })),
      probes: [],
      errors: []
    };
    if (context.reason instanceof ClusterformError) {
      bundle.errorCode = context.reason.code;
    }

    for (const probe of this.probes) {
      try {
        const result = await this.fleet.exec(node, probe.command);
        bundle.probes.push({
          probe: probe.name,
          command: probe.command,
          exitCode: result.exitCode,
          output: this.scrub(result.output)
        });
      } catch (error) {
        const failure = new DiagnosticsCollectionError(node, probe.name, error);
        bundle.errors.push(failure);
        this.emit('probe-failed', failure);
      }
    }

    this.bundles.set(node, bundle);
    this.emit('bundle-collected', bundle);
    return bundle;
  }

  bundleFor(node: string): DiagnosticsBundle | undefined {
    return this.bundles.get(node);
  }

  getBundles(): DiagnosticsBundle[] {
    return Array.from(this.bundles.values());
  }

  /**
   * Human-readable dump of one bundle
   */
  static format(bundle: DiagnosticsBundle): string {
    const lines = [`=== diagnostics: ${bundle.node} ===`, `reason: ${bundle.reason}`];
    if (bundle.transcript.length > 0) {
      lines.push('--- network transcript ---');
      for (const entry of bundle.transcript) {
        lines.push(`$ ${entry.command}  [exit ${entry.exitCode}]`);
        if (entry.output.trim()) lines.push(entry.output.trimEnd());
      }
    }
    for (const probe of bundle.probes) {
      lines.push(`--- ${probe.probe} (exit ${probe.exitCode}) ---`, probe.output.trimEnd());
    }
    for (const error of bundle.errors) {
      lines.push(`!!! ${error.message}`);
    }
    return lines.join('\n');
  }

  private scrub(text: string): string {
    let result = text;
    for (const secret of this.secrets) {
      result = redact(result, secret);
    }
    return result;
  }
}
