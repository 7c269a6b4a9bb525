import { NodeSpec, TopologyKind } from '../types';
import {
  ConfigurationError,
  DuplicateVlanTagError,
  InvalidAddressError,
  InvalidVlanTagError,
  MissingAddressError,
  PrimaryCountError
} from '../common/errors';
import { isValidIPv4, networkOf } from '../common/utils';
import { NetworkCommand } from '../network/commands';
import { strategyFor } from '../network/strategies';
import { BondSpec, SemanticInterface, TopologyProfileDefinition, TopologyStrategy, TopologyView } from './types';

export const DEFAULT_PREFIX_LENGTH = 24;
export const DEFAULT_MANAGEMENT_INTERFACE = 'eth0';
export const DEFAULT_CLUSTER_CIDR = '10.42.0.0/16';
export const DEFAULT_SERVICE_CIDR = '10.43.0.0/16';
export const CLUSTER_SEMANTIC = 'cluster';

const MIN_VLAN_TAG = 1;
const MAX_VLAN_TAG = 4094;

/**
 * Declarative network layout shared by every topology variant.
 *
 * The constructor validates eagerly against the node set, so holding an
 * instance means the layout is usable: every node has every address it
 * needs, tags are in range and unique, and the bond is buildable.
 */
export class TopologyProfile implements TopologyView {
  readonly kind: TopologyKind;
  readonly name: string;
  readonly prefixLength: number;
  readonly managementInterface: string;
  readonly clusterCidr: string;
  readonly serviceCidr: string;

  private readonly definition: TopologyProfileDefinition;
  private readonly strategy: TopologyStrategy;

  constructor(definition: TopologyProfileDefinition, nodes: NodeSpec[]) {
    this.definition = definition;
    this.kind = definition.kind;
    this.name = definition.name ?? definition.kind;
    this.prefixLength = definition.prefixLength ?? DEFAULT_PREFIX_LENGTH;
    this.managementInterface = definition.managementInterface ?? DEFAULT_MANAGEMENT_INTERFACE;
    this.clusterCidr = definition.clusterCidr ?? DEFAULT_CLUSTER_CIDR;
    this.serviceCidr = definition.serviceCidr ?? DEFAULT_SERVICE_CIDR;
    this.strategy = strategyFor(definition.kind);

    this.validate(nodes);
  }

  interfaces(node?: string): SemanticInterface[] {
    return Object.entries(this.definition.interfaces).map(([semantic, name]) => {
      const vlanId = this.vlanTag(semantic, node);
      return vlanId === undefined ? { semantic, name } : { semantic, name, vlanId };
    });
  }

  interfaceFor(semantic: string): string {
    const name = this.definition.interfaces[semantic];
    if (name === undefined) {
      throw new ConfigurationError(`Topology ${this.name} has no semantic interface '${semantic}'`);
    }
    return name;
  }

  addressFor(node: string, semantic: string): string {
    const address = this.definition.addresses[node]?.[semantic];
    if (address === undefined) {
      throw new MissingAddressError(node, semantic);
    }
    return address;
  }

  vlanTag(semantic: string, node?: string): number | undefined {
    const override = node === undefined ? undefined : this.definition.nodeVlanIds?.[node]?.[semantic];
    return override ?? this.definition.vlanIds?.[semantic];
  }

  bondSpec(): BondSpec | undefined {
    return this.definition.bondConfig;
  }

  trunk(): string {
    return this.strategy.trunkFor(this.definition);
  }

  requiredSemantics(): string[] {
    return this.strategy.requiredSemantics(this.definition);
  }

  /**
   * Network prefix of a semantic segment, e.g. 192.168.200.0/24
   */
  subnetFor(semantic: string): string {
    this.interfaceFor(semantic);
    for (const perNode of Object.values(this.definition.addresses)) {
      const address = perNode[semantic];
      if (address !== undefined) {
        return networkOf(address, this.prefixLength);
      }
    }
    throw new ConfigurationError(`No node carries an address on '${semantic}'`);
  }

  /**
   * URL joining nodes use to reach the primary. Always the cluster segment,
   * never the management interface.
   */
  serverEndpoint(primary: string, apiPort: number): string {
    return `https://${this.addressFor(primary, CLUSTER_SEMANTIC)}:${apiPort}`;
  }

  /**
   * Ordered, idempotent command plan that takes a booted node to NetworkConfigured
   */
  configure(node: string): NetworkCommand[] {
    return this.strategy.configure(node, this);
  }

  validate(nodes: NodeSpec[]): void {
    validateNodeSet(nodes);

    if (this.definition.interfaces[CLUSTER_SEMANTIC] === undefined) {
      throw new ConfigurationError(`Topology ${this.name} must declare a '${CLUSTER_SEMANTIC}' interface`);
    }
    if (!Number.isInteger(this.prefixLength) || this.prefixLength < 1 || this.prefixLength > 30) {
      throw new ConfigurationError(`Prefix length ${this.prefixLength} is outside 1-30`);
    }

    this.validateVlanTags();
    this.validateNodeVlanTags();
    this.strategy.validate(this.definition, nodes);
    this.validateDevices();

    const management = Object.entries(this.definition.interfaces).find(([, name]) => name === this.managementInterface);
    if (management) {
      throw new ConfigurationError(
        `Semantic interface '${management[0]}' is mapped onto the management interface ${this.managementInterface}`
      );
    }

    this.validateAddresses(nodes);
  }

  private validateVlanTags(): void {
    const bySemantic = this.definition.vlanIds ?? {};
    const semanticsByTag = new Map<number, string[]>();

    for (const [semantic, tag] of Object.entries(bySemantic)) {
      if (this.definition.interfaces[semantic] === undefined) {
        throw new ConfigurationError(`VLAN tag ${tag} refers to unknown semantic interface '${semantic}'`);
      }
      if (!Number.isInteger(tag) || tag < MIN_VLAN_TAG || tag > MAX_VLAN_TAG) {
        throw new InvalidVlanTagError(semantic, tag);
      }
      semanticsByTag.set(tag, [...(semanticsByTag.get(tag) ?? []), semantic]);
    }

    for (const [tag, semantics] of semanticsByTag) {
      if (semantics.length > 1) {
        throw new DuplicateVlanTagError(tag, semantics);
      }
    }
  }

  /**
   * Per-node overrides only retag semantics that are already tagged, and
   * must keep that node's tags distinct. Like addresses, entries for nodes
   * outside the run are allowed.
   */
  private validateNodeVlanTags(): void {
    for (const [node, overrides] of Object.entries(this.definition.nodeVlanIds ?? {})) {
      for (const [semantic, tag] of Object.entries(overrides)) {
        if (this.definition.vlanIds?.[semantic] === undefined) {
          throw new ConfigurationError(`Per-node VLAN tag for ${node}/${semantic} overrides a semantic interface with no VLAN tag`);
        }
        if (!Number.isInteger(tag) || tag < MIN_VLAN_TAG || tag > MAX_VLAN_TAG) {
          throw new InvalidVlanTagError(`${node}/${semantic}`, tag);
        }
      }

      const semanticsByTag = new Map<number, string[]>();
      for (const iface of this.interfaces(node)) {
        if (iface.vlanId === undefined) continue;
        semanticsByTag.set(iface.vlanId, [...(semanticsByTag.get(iface.vlanId) ?? []), iface.semantic]);
      }
      for (const [tag, semantics] of semanticsByTag) {
        if (semantics.length > 1) {
          throw new DuplicateVlanTagError(tag, semantics);
        }
      }
    }
  }

  /**
   * Each semantic interface needs a device of its own, distinct from the
   * trunk, the bond and the bond's members
   */
  private validateDevices(): void {
    const owners = new Map<string, string>();
    for (const [semantic, name] of Object.entries(this.definition.interfaces)) {
      const owner = owners.get(name);
      if (owner !== undefined) {
        throw new ConfigurationError(`Semantic interfaces '${owner}' and '${semantic}' are both mapped onto ${name}`);
      }
      owners.set(name, semantic);
    }

    if (this.kind === 'flat') return;
    const reserved = new Map<string, string>([[this.trunk(), 'the trunk']]);
    const bond = this.definition.bondConfig;
    if (bond) {
      reserved.set(bond.name, 'the bond device');
      for (const member of bond.members) {
        reserved.set(member, `a member of ${bond.name}`);
      }
    }
    for (const [semantic, name] of Object.entries(this.definition.interfaces)) {
      const role = reserved.get(name);
      if (role !== undefined) {
        throw new ConfigurationError(`Semantic interface '${semantic}' is mapped onto ${name}, ${role}`);
      }
    }
  }

  private validateAddresses(nodes: NodeSpec[]): void {
    const owners = new Map<string, string>();
    const subnets = new Map<string, string>();

    for (const node of nodes) {
      for (const semantic of this.requiredSemantics()) {
        const address = this.addressFor(node.name, semantic);
        if (!isValidIPv4(address)) {
          throw new InvalidAddressError(`Address '${address}' of ${node.name}/${semantic} is not a valid IPv4 address`);
        }

        const owner = owners.get(address);
        if (owner !== undefined) {
          throw new InvalidAddressError(`Address ${address} is assigned to both ${owner} and ${node.name}/${semantic}`);
        }
        owners.set(address, `${node.name}/${semantic}`);

        const subnet = networkOf(address, this.prefixLength);
        const expected = subnets.get(semantic);
        if (expected === undefined) {
          subnets.set(semantic, subnet);
        } else if (expected !== subnet) {
          throw new InvalidAddressError(
            `${node.name}/${semantic} address ${address} is outside the ${semantic} segment ${expected}`
          );
        }
      }
    }

    const seen = new Map<string, string>();
    for (const [semantic, subnet] of subnets) {
      const other = seen.get(subnet);
      if (other !== undefined) {
        throw new InvalidAddressError(`Semantic interfaces '${other}' and '${semantic}' share the segment ${subnet}`);
      }
      seen.set(subnet, semantic);
    }
  }
}

/**
 * Node-set invariants that hold for every topology
 */
export function validateNodeSet(nodes: NodeSpec[]): void {
  if (nodes.length === 0) {
    throw new ConfigurationError('At least one node is required');
  }

  const names = new Set<string>();
  for (const node of nodes) {
    if (names.has(node.name)) {
      throw new ConfigurationError(`Node name ${node.name} is used more than once`);
    }
    names.add(node.name);
  }

  const misplaced = nodes.find(node => node.role === 'agent' && node.primary);
  if (misplaced) {
    throw new PrimaryCountError(`Agent ${misplaced.name} cannot be the primary`);
  }

  const primaries = nodes.filter(node => node.role === 'server' && node.primary);
  if (primaries.length !== 1) {
    throw new PrimaryCountError(`Exactly one primary server is required, found ${primaries.length}`);
  }
}

export function primaryOf(nodes: NodeSpec[]): NodeSpec {
  const primary = nodes.find(node => node.role === 'server' && node.primary);
  if (!primary) {
    throw new PrimaryCountError('Exactly one primary server is required, found 0');
  }
  return primary;
}
