import { NodeSpec, TopologyKind } from '../types';
import { NetworkCommand } from '../network/commands';

/**
 * Bonding modes understood by the kernel bonding driver. Only active-backup
 * is accepted: the virtual switch used for test VMs does not negotiate LACP.
 */
export type BondMode = 'active-backup' | '802.3ad' | 'balance-rr' | 'balance-xor' | 'broadcast' | 'balance-tlb' | 'balance-alb';

export const SUPPORTED_BOND_MODES: readonly BondMode[] = ['active-backup'];

export interface BondSpec {
  /** Bond device name, e.g. bond0 */
  name: string;
  mode: BondMode;
  members: string[];
  monitorIntervalMs: number;
  /** Preferred active member for active-backup */
  primary?: string;
}

/**
 * Declarative network layout, as written in YAML or built in code
 */
export interface TopologyProfileDefinition {
  name?: string;
  kind: TopologyKind;
  /** semantic name -> interface device name */
  interfaces: Record<string, string>;
  /** node name -> (semantic name -> IPv4 address) */
  addresses: Record<string, Record<string, string>>;
  /** semantic name -> 802.1Q tag */
  vlanIds?: Record<string, number>;
  /** node name -> (semantic name -> tag) replacing vlanIds on that node */
  nodeVlanIds?: Record<string, Record<string, number>>;
  bondConfig?: BondSpec;
  /** Carrier of tagged sub-interfaces for the vlan kind (defaults to eth1) */
  trunk?: string;
  prefixLength?: number;
  /** The VM's default/NAT interface; never used for cluster traffic */
  managementInterface?: string;
  clusterCidr?: string;
  serviceCidr?: string;
}

export interface SemanticInterface {
  semantic: string;
  name: string;
  vlanId?: number;
}

/**
 * Read-only view of a validated profile handed to strategies
 */
export interface TopologyView {
  readonly kind: TopologyKind;
  readonly prefixLength: number;
  readonly managementInterface: string;
  /** With a node, tags reflect that node's overrides */
  interfaces(node?: string): SemanticInterface[];
  addressFor(node: string, semantic: string): string;
  vlanTag(semantic: string, node?: string): number | undefined;
  bondSpec(): BondSpec | undefined;
  trunk(): string;
}

/**
 * Per-variant behaviour. Keeps topology branching out of the formation driver.
 */
export interface TopologyStrategy {
  readonly kind: TopologyKind;

  /** Kind-specific structural checks; throws a ConfigurationError subclass */
  validate(definition: TopologyProfileDefinition, nodes: NodeSpec[]): void;

  /** Semantic interfaces every node must carry an address for */
  requiredSemantics(definition: TopologyProfileDefinition): string[];

  /** Physical device carrying the semantic interfaces */
  trunkFor(definition: TopologyProfileDefinition): string;

  /** Ordered, idempotent commands that take a booted node to NetworkConfigured */
  configure(node: string, topology: TopologyView): NetworkCommand[];
}
