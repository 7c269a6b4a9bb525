import { DEFAULT_NODE_IMAGE, DEFAULT_NODE_RESOURCES, NodeRole, NodeSpec, isTopologyKind } from '../types';
import { ConfigurationError, InvalidBondSpecError } from '../common/errors';
import { BondMode, BondSpec, TopologyProfileDefinition } from './types';

const BOND_MODES: readonly BondMode[] = [
  'active-backup', '802.3ad', 'balance-rr', 'balance-xor', 'broadcast', 'balance-tlb', 'balance-alb'
];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBondMode(value: unknown): value is BondMode {
  return typeof value === 'string' && (BOND_MODES as readonly string[]).includes(value);
}

function stringMap(value: unknown, field: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${field} must be a mapping`);
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new ConfigurationError(`${field}.${key} must be a string`);
    }
    result[key] = entry;
  }
  return result;
}

function numberMap(value: unknown, field: string): Record<string, number> {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${field} must be a mapping`);
  }
  const result: Record<string, number> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'number') {
      throw new ConfigurationError(`${field}.${key} must be a number`);
    }
    result[key] = entry;
  }
  return result;
}

function optionalString(raw: Record<string, unknown>, field: string): string | undefined {
  const value = raw[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${field} must be a string`);
  }
  return value;
}

function parseBond(value: unknown): BondSpec {
  if (!isRecord(value)) {
    throw new InvalidBondSpecError('bondConfig must be a mapping');
  }
  const { mode, members, monitorIntervalMs, primary, name } = value;
  if (!isBondMode(mode)) {
    throw new InvalidBondSpecError(`bondConfig.mode '${String(mode)}' is not a bonding mode`);
  }
  if (!Array.isArray(members) || !members.every((member): member is string => typeof member === 'string')) {
    throw new InvalidBondSpecError('bondConfig.members must be a list of interface names');
  }
  if (typeof monitorIntervalMs !== 'number') {
    throw new InvalidBondSpecError('bondConfig.monitorIntervalMs must be a number');
  }
  if (primary !== undefined && typeof primary !== 'string') {
    throw new InvalidBondSpecError('bondConfig.primary must be an interface name');
  }
  if (name !== undefined && typeof name !== 'string') {
    throw new InvalidBondSpecError('bondConfig.name must be a string');
  }

  const bond: BondSpec = { name: name ?? 'bond0', mode, members, monitorIntervalMs };
  if (primary !== undefined) {
    bond.primary = primary;
  }
  return bond;
}

/**
 * Turn a parsed YAML/JSON document into a profile definition. Structural
 * checks only; semantic validation happens when the profile is constructed.
 */
export function parseTopologyDefinition(raw: unknown, source = 'topology'): TopologyProfileDefinition {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${source}: expected a mapping`);
  }

  const kind = raw.kind;
  if (typeof kind !== 'string' || !isTopologyKind(kind)) {
    throw new ConfigurationError(`${source}: kind must be one of flat, vlan, bonded-vlan`);
  }

  const addressesRaw = raw.addresses;
  if (!isRecord(addressesRaw)) {
    throw new ConfigurationError(`${source}: addresses must be a mapping of node -> semantic -> address`);
  }
  const addresses: Record<string, Record<string, string>> = {};
  for (const [node, perNode] of Object.entries(addressesRaw)) {
    addresses[node] = stringMap(perNode, `addresses.${node}`);
  }

  const definition: TopologyProfileDefinition = {
    kind,
    interfaces: stringMap(raw.interfaces, 'interfaces'),
    addresses
  };

  const name = optionalString(raw, 'name');
  if (name !== undefined) definition.name = name;
  if (raw.vlanIds !== undefined) definition.vlanIds = numberMap(raw.vlanIds, 'vlanIds');
  if (raw.nodeVlanIds !== undefined) {
    if (!isRecord(raw.nodeVlanIds)) {
      throw new ConfigurationError(`${source}: nodeVlanIds must be a mapping of node -> semantic -> tag`);
    }
    const nodeVlanIds: Record<string, Record<string, number>> = {};
    for (const [node, perNode] of Object.entries(raw.nodeVlanIds)) {
      nodeVlanIds[node] = numberMap(perNode, `nodeVlanIds.${node}`);
    }
    definition.nodeVlanIds = nodeVlanIds;
  }
  if (raw.bondConfig !== undefined) definition.bondConfig = parseBond(raw.bondConfig);
  const trunk = optionalString(raw, 'trunk');
  if (trunk !== undefined) definition.trunk = trunk;
  if (raw.prefixLength !== undefined) {
    if (typeof raw.prefixLength !== 'number') {
      throw new ConfigurationError(`${source}: prefixLength must be a number`);
    }
    definition.prefixLength = raw.prefixLength;
  }
  const managementInterface = optionalString(raw, 'managementInterface');
  if (managementInterface !== undefined) definition.managementInterface = managementInterface;
  const clusterCidr = optionalString(raw, 'clusterCidr');
  if (clusterCidr !== undefined) definition.clusterCidr = clusterCidr;
  const serviceCidr = optionalString(raw, 'serviceCidr');
  if (serviceCidr !== undefined) definition.serviceCidr = serviceCidr;

  return definition;
}

/**
 * Parse a role map such as `server-1=server:primary,server-2=server,agent-1=agent`
 */
export function parseNodeMap(value: string): NodeSpec[] {
  const entries = value.split(',').map(entry => entry.trim()).filter(entry => entry.length > 0);
  if (entries.length === 0) {
    throw new ConfigurationError('Node map is empty');
  }

  return entries.map(entry => {
    const [name, descriptor] = entry.split('=');
    if (!name || !descriptor) {
      throw new ConfigurationError(`Node map entry '${entry}' must look like name=role[:primary]`);
    }
    const [role, flag] = descriptor.split(':');
    if (role !== 'server' && role !== 'agent') {
      throw new ConfigurationError(`Node ${name} has unknown role '${role}'`);
    }
    if (flag !== undefined && flag !== 'primary') {
      throw new ConfigurationError(`Node ${name} has unknown flag '${flag}'`);
    }
    return defineNode(name, role, flag === 'primary');
  });
}

export function defineNode(name: string, role: NodeRole, primary = false): NodeSpec {
  return {
    name,
    role,
    primary,
    resources: { ...DEFAULT_NODE_RESOURCES },
    image: DEFAULT_NODE_IMAGE
  };
}

/**
 * Two servers (the first primary) and one agent, the smallest HA-capable shape
 */
export function defaultNodes(): NodeSpec[] {
  return [
    defineNode('server-1', 'server', true),
    defineNode('server-2', 'server'),
    defineNode('agent-1', 'agent')
  ];
}
