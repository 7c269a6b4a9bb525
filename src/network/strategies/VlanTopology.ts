import { NodeSpec } from '../../types';
import { ConfigurationError, InvalidBondSpecError } from '../../common/errors';
import { TopologyProfileDefinition, TopologyStrategy, TopologyView } from '../../topology/types';
import {
  NetworkCommand,
  assignAddress,
  ensureKernelModule,
  ensureVlanInterface,
  flushAddresses,
  linkUp,
  maskNetworkDaemon
} from '../commands';

export const DEFAULT_TRUNK = 'eth1';

/**
 * Tagged sub-interfaces for every semantic interface, carried on the trunk.
 * Shared with the bonded variant, whose trunk is the bond device.
 */
export function vlanSubInterfaceCommands(node: string, topology: TopologyView): NetworkCommand[] {
  const trunk = topology.trunk();
  const commands: NetworkCommand[] = [];

  for (const iface of topology.interfaces(node)) {
    if (iface.vlanId === undefined) {
      continue;
    }
    commands.push(
      ensureVlanInterface(trunk, iface.name, iface.vlanId),
      linkUp(iface.name),
      flushAddresses(iface.name),
      assignAddress(topology.addressFor(node, iface.semantic), topology.prefixLength, iface.name)
    );
  }
  return commands;
}

export function requireTagOnEverySemantic(definition: TopologyProfileDefinition): void {
  const vlanIds = definition.vlanIds ?? {};
  for (const semantic of Object.keys(definition.interfaces)) {
    if (vlanIds[semantic] === undefined) {
      throw new ConfigurationError(`${definition.kind} topology requires a VLAN tag for '${semantic}'`);
    }
  }
}

export class VlanTopology implements TopologyStrategy {
  readonly kind = 'vlan' as const;

  validate(definition: TopologyProfileDefinition, _nodes: NodeSpec[]): void {
    if (definition.bondConfig) {
      throw new InvalidBondSpecError('vlan topology cannot declare a bond; use bonded-vlan');
    }
    requireTagOnEverySemantic(definition);

    const trunk = this.trunkFor(definition);
    if (trunk === (definition.managementInterface ?? 'eth0')) {
      throw new ConfigurationError(`trunk ${trunk} is the management interface`);
    }
  }

  requiredSemantics(definition: TopologyProfileDefinition): string[] {
    return Object.keys(definition.interfaces);
  }

  trunkFor(definition: TopologyProfileDefinition): string {
    return definition.trunk ?? DEFAULT_TRUNK;
  }

  configure(node: string, topology: TopologyView): NetworkCommand[] {
    return [
      ...maskNetworkDaemon(),
      ensureKernelModule('8021q'),
      linkUp(topology.trunk()),
      ...vlanSubInterfaceCommands(node, topology)
    ];
  }
}
