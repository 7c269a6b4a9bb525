import { EventEmitter } from 'eventemitter3';
import { VmFleetManager } from '../fleet/types';
import { parseBondStatus } from '../health/parsers';

export interface ChaosInjectorConfig {
  maxConcurrentChaos?: number;
}

export type ChaosScenarioType = 'link-down';

export interface ChaosScenario {
  type: ChaosScenarioType;
  node: string;
  iface: string;
  startTime: Date;
}

/**
 * Forces faults on running VMs for resilience runs. Each scenario is
 * keyed by node and interface so it can be reverted.
 *
 * Emits 'scenario-started' and 'scenario-stopped'.
 */
export class ChaosInjector extends EventEmitter {
  private readonly config: Required<ChaosInjectorConfig>;
  private readonly activeScenarios = new Map<string, ChaosScenario>();

  constructor(private readonly fleet: VmFleetManager, config: ChaosInjectorConfig = {}) {
    super();
    this.config = {
      maxConcurrentChaos: config.maxConcurrentChaos ?? 10
    };
  }

  getActiveScenarios(): ChaosScenario[] {
    return Array.from(this.activeScenarios.values());
  }

  /**
   * Take a link down, e.g. one member of a bond
   */
  async injectLinkDown(node: string, iface: string): Promise<void> {
    const key = `${node}/${iface}`;
    if (this.activeScenarios.has(key)) return;
    if (this.activeScenarios.size >= this.config.maxConcurrentChaos) {
      throw new Error(`Refusing to start more than ${this.config.maxConcurrentChaos} chaos scenarios`);
    }

    await this.run(node, `ip link set ${iface} down`);
    const scenario: ChaosScenario = { type: 'link-down', node, iface, startTime: new Date() };
    this.activeScenarios.set(key, scenario);
    this.emit('scenario-started', scenario);
  }

  async restoreLink(node: string, iface: string): Promise<void> {
    const key = `${node}/${iface}`;
    const scenario = this.activeScenarios.get(key);
    if (!scenario) return;

    await this.run(node, `ip link set ${iface} up`);
    this.activeScenarios.delete(key);
    this.emit('scenario-stopped', { ...scenario, stopTime: new Date() });
  }

  async stopAll(): Promise<void> {
    for (const scenario of this.getActiveScenarios()) {
      await this.restoreLink(scenario.node, scenario.iface);
    }
  }

  /**
   * Member currently carrying the bond's traffic, or undefined when none is
   */
  async activeBondMember(node: string, bond: string): Promise<string | undefined> {
    const output = await this.run(node, `cat /proc/net/bonding/${bond}`);
    return parseBondStatus(output).activeMember;
  }

  private async run(node: string, command: string): Promise<string> {
    const result = await this.fleet.exec(node, command);
    if (result.exitCode !== 0) {
      throw new Error(`Chaos command '${command}' failed on ${node} (exit ${result.exitCode}): ${result.output.trim()}`);
    }
    return result.output;
  }
}
