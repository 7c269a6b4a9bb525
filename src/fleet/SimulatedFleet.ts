import { EventEmitter } from 'events';
import { ExecResult, NodeSpec } from '../types';
import { VmFleetManager } from './types';
import { waitUntil } from './wait';
import { SimulatedHost } from './simulation/SimulatedHost';
import { SimulatedCluster, SimulatedClusterOptions } from './simulation/SimulatedCluster';

export interface CommandFailureRule {
  /** Applies to every node when omitted */
  node?: string;
  /** Substring or expression matched against the full command line */
  pattern: string | RegExp;
  exitCode?: number;
  output?: string;
  /** Number of matching executions to fail; unlimited when omitted */
  times?: number;
}

export interface SimulatedFleetOptions extends SimulatedClusterOptions {
  /** Guest NICs, management first */
  interfaces?: string[];
  managementInterface?: string;
  availableModules?: string[];
  bootDelayMs?: number;
  pollIntervalMs?: number;
  /** Nodes whose boot signal never arrives */
  neverBoot?: string[];
  /** Image ships a bond in this mode, to exercise bond replacement */
  preexistingBond?: { name: string; mode: string; members: string[] };
  /** Guests report fe80::/64 addresses the way a stock kernel does */
  ipv6LinkLocal?: boolean;
  commandFailures?: CommandFailureRule[];
}

/**
 * In-process VM fleet. Each VM is a SimulatedHost sharing one
 * SimulatedCluster, so the whole formation protocol runs without a
 * hypervisor.
 *
 * Emits 'boot', 'exec' and 'shutdown'.
 */
export class SimulatedFleet extends EventEmitter implements VmFleetManager {
  readonly cluster: SimulatedCluster;
  private readonly hosts = new Map<string, SimulatedHost>();
  private readonly bootedAt = new Map<string, number>();
  private readonly failures: CommandFailureRule[];
  private readonly transientErrors = new Map<string, number>();
  private readonly neverBoot: Set<string>;
  private readonly clock: () => number;
  private bootCount = 0;

  constructor(private readonly options: SimulatedFleetOptions = {}) {
    super();
    this.cluster = new SimulatedCluster(options);
    this.failures = (options.commandFailures ?? []).map(rule => ({ ...rule }));
    this.neverBoot = new Set(options.neverBoot ?? []);
    this.clock = options.clock ?? Date.now;
  }

  async boot(spec: NodeSpec): Promise<void> {
    const interfaces = this.options.interfaces ?? ['eth0', 'eth1', 'eth2'];
    const managementInterface = this.options.managementInterface ?? interfaces[0] ?? 'eth0';
    this.bootCount++;

    const host = new SimulatedHost(spec.name, this.cluster, {
      interfaces,
      managementInterface,
      managementAddress: `10.0.2.${14 + this.bootCount}/24`,
      availableModules: this.options.availableModules ?? ['bonding', '8021q'],
      ipv6LinkLocal: this.options.ipv6LinkLocal ?? false,
      peers: () => Array.from(this.hosts.values()),
      ...(this.options.preexistingBond ? { preexistingBond: this.options.preexistingBond } : {})
    });
    this.hosts.set(spec.name, host);
    this.bootedAt.set(spec.name, this.clock());
    this.emit('boot', { node: spec.name, memoryMb: spec.resources.memoryMb, cpus: spec.resources.cpus });
  }

  async waitForBoot(node: string, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    await waitUntil(node, 'boot', async () => {
      const bootedAt = this.bootedAt.get(node);
      return bootedAt !== undefined &&
        !this.neverBoot.has(node) &&
        this.clock() >= bootedAt + (this.options.bootDelayMs ?? 0);
    }, this.waitOptions(timeoutMs, signal));
  }

  async exec(node: string, command: string): Promise<ExecResult> {
    const host = this.hosts.get(node);
    if (!host || !host.poweredOn) {
      throw new Error(`VM ${node} is not running`);
    }

    const transient = this.transientErrors.get(node) ?? 0;
    if (transient > 0) {
      this.transientErrors.set(node, transient - 1);
      throw new Error(`exec channel to ${node} was reset`);
    }

    const rule = this.failures.find(candidate =>
      (candidate.node === undefined || candidate.node === node) &&
      (candidate.times === undefined || candidate.times > 0) &&
      (typeof candidate.pattern === 'string' ? command.includes(candidate.pattern) : candidate.pattern.test(command))
    );
    if (rule) {
      if (rule.times !== undefined) rule.times--;
      const result = { exitCode: rule.exitCode ?? 1, output: rule.output ?? 'injected failure\n' };
      this.emit('exec', { node, command, ...result });
      return result;
    }

    const outcome = host.execute(command);
    const result = { exitCode: outcome.exitCode, output: outcome.stdout + outcome.stderr };
    this.emit('exec', { node, command, ...result });
    return result;
  }

  async waitForPort(node: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    await waitUntil(node, `port ${port}`, async () => {
      const host = this.hosts.get(node);
      return host !== undefined && this.cluster.isListening(host, port);
    }, this.waitOptions(timeoutMs, signal));
  }

  async waitForCondition(
    node: string,
    description: string,
    predicate: () => Promise<boolean>,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<void> {
    await waitUntil(node, description, predicate, this.waitOptions(timeoutMs, signal));
  }

  async shutdown(node: string): Promise<void> {
    const host = this.hosts.get(node);
    if (!host || !host.poweredOn) return;
    host.powerOff();
    this.emit('shutdown', { node });
  }

  failCommand(rule: CommandFailureRule): void {
    this.failures.push({ ...rule });
  }

  /** The next `count` exec calls on the node throw instead of returning */
  injectTransientExecErrors(node: string, count: number): void {
    this.transientErrors.set(node, (this.transientErrors.get(node) ?? 0) + count);
  }

  host(node: string): SimulatedHost {
    const host = this.hosts.get(node);
    if (!host) {
      throw new Error(`VM ${node} was never booted`);
    }
    return host;
  }

  bootedNodes(): string[] {
    return Array.from(this.hosts.keys());
  }

  runningNodes(): string[] {
    return Array.from(this.hosts.values()).filter(host => host.poweredOn).map(host => host.node);
  }

  private waitOptions(timeoutMs: number, signal?: AbortSignal): { timeoutMs: number; intervalMs: number; signal?: AbortSignal } {
    const intervalMs = this.options.pollIntervalMs ?? 10;
    return signal ? { timeoutMs, intervalMs, signal } : { timeoutMs, intervalMs };
  }
}
