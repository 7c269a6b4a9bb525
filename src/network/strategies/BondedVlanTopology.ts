import { NodeSpec } from '../../types';
import { InvalidBondSpecError } from '../../common/errors';
import { BondSpec, SUPPORTED_BOND_MODES, TopologyProfileDefinition, TopologyStrategy, TopologyView } from '../../topology/types';
import {
  NetworkCommand,
  dropMismatchedBond,
  enslave,
  ensureBond,
  ensureKernelModule,
  linkUp,
  maskNetworkDaemon
} from '../commands';
import { requireTagOnEverySemantic, vlanSubInterfaceCommands } from './VlanTopology';

/**
 * Bond device over several NICs with VLAN sub-interfaces layered on the bond.
 *
 * Production hardware runs 802.3ad; the virtual switch the test VMs share
 * cannot negotiate LACP, so the bond is built in active-backup mode.
 */
export class BondedVlanTopology implements TopologyStrategy {
  readonly kind = 'bonded-vlan' as const;

  validate(definition: TopologyProfileDefinition, _nodes: NodeSpec[]): void {
    const bond = definition.bondConfig;
    if (!bond) {
      throw new InvalidBondSpecError('bonded-vlan topology requires bondConfig');
    }
    validateBondSpec(bond, definition.managementInterface ?? 'eth0');
    requireTagOnEverySemantic(definition);
  }

  requiredSemantics(definition: TopologyProfileDefinition): string[] {
    return Object.keys(definition.interfaces);
  }

  trunkFor(definition: TopologyProfileDefinition): string {
    return definition.bondConfig?.name ?? 'bond0';
  }

  configure(node: string, topology: TopologyView): NetworkCommand[] {
    const bond = topology.bondSpec();
    if (!bond) {
      throw new InvalidBondSpecError('bonded-vlan topology requires bondConfig');
    }

    const commands: NetworkCommand[] = [
      ...maskNetworkDaemon(),
      ensureKernelModule('bonding'),
      ensureKernelModule('8021q'),
      dropMismatchedBond(bond.name, bond.mode),
      ensureBond(bond.name, bond.mode, bond.monitorIntervalMs, bond.primary)
    ];
    for (const member of bond.members) {
      commands.push(...enslave(member, bond.name));
    }
    commands.push(linkUp(bond.name));
    for (const member of bond.members) {
      commands.push(linkUp(member));
    }

    return [...commands, ...vlanSubInterfaceCommands(node, topology)];
  }
}

export function validateBondSpec(bond: BondSpec, managementInterface: string): void {
  if (!bond.name) {
    throw new InvalidBondSpecError('bond name is required');
  }
  if (!SUPPORTED_BOND_MODES.includes(bond.mode)) {
    throw new InvalidBondSpecError(
      `bond mode '${bond.mode}' is not supported: the virtual switch does not negotiate LACP, use active-backup`
    );
  }
  if (bond.members.length === 0) {
    throw new InvalidBondSpecError(`bond ${bond.name} has no members`);
  }
  if (new Set(bond.members).size !== bond.members.length) {
    throw new InvalidBondSpecError(`bond ${bond.name} lists a member more than once`);
  }
  if (bond.members.includes(managementInterface)) {
    throw new InvalidBondSpecError(`bond ${bond.name} must not enslave the management interface ${managementInterface}`);
  }
  if (bond.members.includes(bond.name)) {
    throw new InvalidBondSpecError(`bond ${bond.name} cannot enslave itself`);
  }
  if (!Number.isInteger(bond.monitorIntervalMs) || bond.monitorIntervalMs <= 0) {
    throw new InvalidBondSpecError(`bond ${bond.name} monitor interval must be a positive integer`);
  }
  if (bond.primary !== undefined && !bond.members.includes(bond.primary)) {
    throw new InvalidBondSpecError(`bond primary ${bond.primary} is not a member of ${bond.name}`);
  }
}
