import { FormationAbortedError, HealthCheckError, HealthFailure, errorMessage } from '../common/errors';
import { FrameworkLogger, defaultLogger } from '../common/logger';
import { inSubnet } from '../common/utils';
import { VmFleetManager } from '../fleet/types';
import { TopologyProfile } from '../topology/TopologyProfile';
import { SemanticInterface } from '../topology/types';
import {
  BriefInterface,
  ipv4Addresses,
  parseBondStatus,
  parseBriefAddresses,
  parseNeighbors,
  parseRoutes,
  parseVlanDetails
} from './parsers';

export type CheckSeverity = 'hard' | 'soft';

type RecordCheck = (check: string, passed: boolean, message: string, severity?: CheckSeverity) => void;

interface Segment extends SemanticInterface {
  subnet: string;
}

export interface HealthCheckResult {
  node: string;
  check: string;
  severity: CheckSeverity;
  passed: boolean;
  message: string;
}

export interface HealthReport {
  passed: boolean;
  checks: HealthCheckResult[];
  failures: HealthFailure[];
  /** Soft checks that did not hold; never affect the verdict */
  warnings: HealthFailure[];
}

/**
 * Checks every node's interfaces against the topology profile.
 *
 * Hard checks: interface present, exactly its assigned IPv4 address,
 * carried on the trunk with the expected VLAN tag, bond mode and active
 * member, and every peer answering on each segment. Soft checks (logged
 * only): the per-segment route and foreign prefixes in the neighbor table,
 * since a shared virtual bridge gives no real L2 isolation.
 */
export class HealthVerifier {
  private readonly logger: FrameworkLogger;

  constructor(
    private readonly fleet: VmFleetManager,
    private readonly topology: TopologyProfile,
    options: { logger?: FrameworkLogger } = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Run every check on every node; failures are accumulated, not thrown
   */
  async verify(nodes: string[], signal?: AbortSignal): Promise<HealthReport> {
    const checks: HealthCheckResult[] = [];
    for (const node of nodes) {
      checks.push(...await this.verifyNode(node, nodes, signal));
    }

    const toFailure = ({ node, check, message }: HealthCheckResult): HealthFailure => ({ node, check, message });
    const failures = checks.filter(c => !c.passed && c.severity === 'hard').map(toFailure);
    const warnings = checks.filter(c => !c.passed && c.severity === 'soft').map(toFailure);
    for (const warning of warnings) {
      this.logger.warn(`[${warning.node}] ${warning.check}: ${warning.message}`);
    }

    return { passed: failures.length === 0, checks, failures, warnings };
  }

  /**
   * Same as verify, but throws a single HealthCheckError carrying every failure
   */
  async assertHealthy(nodes: string[], signal?: AbortSignal): Promise<HealthReport> {
    const report = await this.verify(nodes, signal);
    if (!report.passed) {
      throw new HealthCheckError(report.failures);
    }
    return report;
  }

  private async verifyNode(node: string, nodes: string[], signal?: AbortSignal): Promise<HealthCheckResult[]> {
    const results: HealthCheckResult[] = [];
    const record: RecordCheck = (check, passed, message, severity = 'hard') => {
      results.push({ node, check, severity, passed, message });
    };

    throwIfAborted(node, signal);
    let brief: Map<string, BriefInterface>;
    try {
      const output = await this.query(node, 'ip -br addr show');
      brief = parseBriefAddresses(output);
    } catch (error) {
      record('interfaces', false, `cannot list interfaces: ${errorMessage(error)}`);
      return results;
    }

    const prefix = this.topology.prefixLength;
    const segments: Segment[] = this.topology.interfaces(node).map(iface => ({
      ...iface,
      subnet: this.topology.subnetFor(iface.semantic)
    }));
    const present: Segment[] = [];

    for (const iface of segments) {
      throwIfAborted(node, signal);
      const label = `${iface.semantic} interface ${iface.name}`;
      const found = brief.get(iface.name);
      if (!found) {
        record(`${iface.semantic}:exists`, false, `${label} does not exist`);
        continue;
      }
      record(`${iface.semantic}:exists`, true, `${label} present (${found.state})`);
      present.push(iface);

      const expected = `${this.topology.addressFor(node, iface.semantic)}/${prefix}`;
      const addresses = ipv4Addresses(found);
      const foreign = addresses.filter(address => address !== expected);
      if (!addresses.includes(expected)) {
        record(`${iface.semantic}:address`, false, `${label} lacks ${expected} (has ${addresses.join(', ') || 'none'})`);
      } else if (foreign.length > 0) {
        const owners = foreign.map(address => {
          const owner = segments.find(other => other.semantic !== iface.semantic && inSubnet(address.split('/')[0] ?? '', other.subnet));
          return owner ? `${address} from the ${owner.semantic} segment` : address;
        });
        record(`${iface.semantic}:address`, false, `${label} carries foreign addresses: ${owners.join(', ')}`);
      } else {
        record(`${iface.semantic}:address`, true, `${label} carries exactly ${expected}`);
      }

      if (iface.vlanId !== undefined) {
        const trunk = this.topology.trunk();
        record(
          `${iface.semantic}:trunk`,
          found.parent === trunk,
          found.parent === undefined ? `${label} has no parent link, expected ${trunk}` : `${label} rides on ${found.parent}, expected ${trunk}`
        );
        await this.checkVlanTag(node, iface.semantic, iface.name, iface.vlanId, record);
      }
    }

    const bond = this.topology.bondSpec();
    if (bond) {
      throwIfAborted(node, signal);
      try {
        const status = parseBondStatus(await this.query(node, `cat /proc/net/bonding/${bond.name}`));
        record('bond:mode', status.mode === bond.mode, `${bond.name} mode is ${status.mode}, expected ${bond.mode}`);
        record(
          'bond:active-member',
          status.activeMember !== undefined,
          status.activeMember ? `${bond.name} active member ${status.activeMember}` : `${bond.name} has no active member`
        );
      } catch (error) {
        record('bond:status', false, `cannot read ${bond.name} status: ${errorMessage(error)}`);
      }
    }

    await this.checkReachability(node, nodes, present, record, signal);
    throwIfAborted(node, signal);
    await this.checkSegregation(node, segments, record);
    return results;
  }

  /**
   * One echo request per peer and segment, bound to the segment's device.
   * Also fills the neighbor table the segregation check reads.
   */
  private async checkReachability(
    node: string,
    nodes: string[],
    segments: Segment[],
    record: RecordCheck,
    signal?: AbortSignal
  ): Promise<void> {
    for (const segment of segments) {
      for (const peer of nodes) {
        if (peer === node) continue;
        throwIfAborted(node, signal);
        const address = this.topology.addressFor(peer, segment.semantic);
        try {
          await this.query(node, `ping -c 1 -W 2 -I ${segment.name} ${address}`);
          record(`${segment.semantic}:reach`, true, `${peer} answers at ${address} over ${segment.name}`);
        } catch (error) {
          this.logger.debug(`[${node}] ${errorMessage(error)}`);
          record(`${segment.semantic}:reach`, false, `cannot reach ${peer} at ${address} over ${segment.name}`);
        }
      }
    }
  }

  private async checkVlanTag(
    node: string,
    semantic: string,
    name: string,
    expected: number,
    record: RecordCheck
  ): Promise<void> {
    try {
      const details = parseVlanDetails(await this.query(node, `ip -d link show ${name}`));
      if (!details) {
        record(`${semantic}:vlan`, false, `${name} reports no VLAN tag, expected ${expected}`);
      } else {
        record(`${semantic}:vlan`, details.id === expected, `${name} reports ${details.protocol} id ${details.id}, expected ${expected}`);
      }
    } catch (error) {
      record(`${semantic}:vlan`, false, `cannot read ${name} link details: ${errorMessage(error)}`);
    }
  }

  private async checkSegregation(
    node: string,
    segments: Segment[],
    record: RecordCheck
  ): Promise<void> {
    try {
      const routes = parseRoutes(await this.query(node, 'ip route show'));
      for (const segment of segments) {
        const route = routes.find(candidate => candidate.destination === segment.subnet);
        if (!route) {
          record(`${segment.semantic}:route`, false, `no route for ${segment.subnet}`, 'soft');
        } else {
          record(
            `${segment.semantic}:route`,
            route.dev === segment.name,
            `${segment.subnet} routed via ${route.dev ?? 'unknown'}, expected ${segment.name}`,
            'soft'
          );
        }
      }

      const neighbors = parseNeighbors(await this.query(node, 'ip neigh show'));
      for (const neighbor of neighbors) {
        const segment = segments.find(candidate => candidate.name === neighbor.dev);
        if (segment && !inSubnet(neighbor.address, segment.subnet)) {
          record(`${segment.semantic}:neighbors`, false, `${neighbor.address} seen on ${neighbor.dev} outside ${segment.subnet}`, 'soft');
        }
      }
    } catch (error) {
      record('segregation', false, `cannot inspect routes: ${errorMessage(error)}`, 'soft');
    }
  }

  private async query(node: string, command: string): Promise<string> {
    const result = await this.fleet.exec(node, command);
    if (result.exitCode !== 0) {
      throw new Error(`'${command}' exited ${result.exitCode}: ${result.output.trim()}`);
    }
    return result.output;
  }
}

function throwIfAborted(node: string, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new FormationAbortedError(node, 'health checks');
  }
}
