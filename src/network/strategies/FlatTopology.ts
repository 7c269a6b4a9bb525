import { NodeSpec } from '../../types';
import { ConfigurationError, InvalidBondSpecError } from '../../common/errors';
import { TopologyProfileDefinition, TopologyStrategy, TopologyView } from '../../topology/types';
import { NetworkCommand, assignAddress, flushAddresses, linkUp, maskNetworkDaemon } from '../commands';

/**
 * Single untagged network per semantic interface (usually just cluster on eth1)
 */
export class FlatTopology implements TopologyStrategy {
  readonly kind = 'flat' as const;

  validate(definition: TopologyProfileDefinition, _nodes: NodeSpec[]): void {
    const tagged = Object.keys(definition.vlanIds ?? {});
    if (tagged.length > 0) {
      throw new ConfigurationError(`flat topology cannot declare VLAN tags (found: ${tagged.join(', ')})`);
    }
    if (definition.bondConfig) {
      throw new InvalidBondSpecError('flat topology cannot declare a bond');
    }
  }

  requiredSemantics(definition: TopologyProfileDefinition): string[] {
    return Object.keys(definition.interfaces);
  }

  trunkFor(definition: TopologyProfileDefinition): string {
    return definition.interfaces.cluster ?? 'eth1';
  }

  configure(node: string, topology: TopologyView): NetworkCommand[] {
    const commands: NetworkCommand[] = [...maskNetworkDaemon()];
    for (const iface of topology.interfaces()) {
      commands.push(
        flushAddresses(iface.name),
        linkUp(iface.name),
        assignAddress(topology.addressFor(node, iface.semantic), topology.prefixLength, iface.name)
      );
    }
    return commands;
  }
}
