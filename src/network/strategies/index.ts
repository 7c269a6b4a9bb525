import { TopologyKind } from '../../types';
import { TopologyStrategy } from '../../topology/types';
import { FlatTopology } from './FlatTopology';
import { VlanTopology } from './VlanTopology';
import { BondedVlanTopology } from './BondedVlanTopology';

const strategies: Record<TopologyKind, TopologyStrategy> = {
  'flat': new FlatTopology(),
  'vlan': new VlanTopology(),
  'bonded-vlan': new BondedVlanTopology()
};

export function strategyFor(kind: TopologyKind): TopologyStrategy {
  return strategies[kind];
}

export { FlatTopology } from './FlatTopology';
export { VlanTopology, vlanSubInterfaceCommands } from './VlanTopology';
export { BondedVlanTopology, validateBondSpec } from './BondedVlanTopology';
