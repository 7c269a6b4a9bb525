import {
  ConfigurationError,
  DuplicateVlanTagError,
  InvalidAddressError,
  InvalidVlanTagError,
  MissingAddressError,
  PrimaryCountError
} from '../../../src/common/errors';
import { defaultNodes, defineNode } from '../../../src/topology/parse';
import { TopologyProfile } from '../../../src/topology/TopologyProfile';
import { TopologyProfileDefinition } from '../../../src/topology/types';

const vlanDefinition = (): TopologyProfileDefinition => ({
  name: 'vlan-test',
  kind: 'vlan',
  trunk: 'eth1',
  interfaces: { cluster: 'eth1.200', storage: 'eth1.100' },
  vlanIds: { cluster: 200, storage: 100 },
  addresses: {
    'server-1': { cluster: '192.168.200.1', storage: '192.168.100.1' },
    'server-2': { cluster: '192.168.200.2', storage: '192.168.100.2' },
    'agent-1': { cluster: '192.168.200.3', storage: '192.168.100.3' }
  }
});

describe('TopologyProfile', () => {
  it('exposes interfaces with their tags', () => {
    const topology = new TopologyProfile(vlanDefinition(), defaultNodes());

    expect(topology.interfaces()).toEqual([
      { semantic: 'cluster', name: 'eth1.200', vlanId: 200 },
      { semantic: 'storage', name: 'eth1.100', vlanId: 100 }
    ]);
    expect(topology.trunk()).toBe('eth1');
    expect(topology.subnetFor('storage')).toBe('192.168.100.0/24');
  });

  it('advertises the primary on its cluster-segment address', () => {
    const topology = new TopologyProfile(vlanDefinition(), defaultNodes());
    expect(topology.serverEndpoint('server-1', 6443)).toBe('https://192.168.200.1:6443');
  });

  it('rejects a node without an address on a required semantic', () => {
    const definition = vlanDefinition();
    definition.addresses['agent-1'] = { cluster: '192.168.200.3' };

    let caught: unknown;
    try {
      new TopologyProfile(definition, defaultNodes());
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MissingAddressError);
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ node: 'agent-1', semantic: 'storage' });
  });

  it('rejects the same tag on two semantics', () => {
    const definition = { ...vlanDefinition(), vlanIds: { cluster: 200, storage: 200 } };
    expect(() => new TopologyProfile(definition, defaultNodes())).toThrow(DuplicateVlanTagError);
  });

  it('rejects tags outside 1-4094', () => {
    const definition = { ...vlanDefinition(), vlanIds: { cluster: 4095, storage: 100 } };
    expect(() => new TopologyProfile(definition, defaultNodes())).toThrow(InvalidVlanTagError);
  });

  it('rejects a tag for an undeclared semantic', () => {
    const definition = { ...vlanDefinition(), vlanIds: { cluster: 200, storage: 100, backup: 300 } };
    expect(() => new TopologyProfile(definition, defaultNodes()))
      .toThrow("VLAN tag 300 refers to unknown semantic interface 'backup'");
  });

  it('requires a cluster semantic', () => {
    const definition: TopologyProfileDefinition = {
      kind: 'flat',
      interfaces: { storage: 'eth1' },
      addresses: { 'server-1': { storage: '192.168.1.1' } }
    };
    expect(() => new TopologyProfile(definition, [defineNode('server-1', 'server', true)]))
      .toThrow("Topology flat must declare a 'cluster' interface");
  });

  it('rejects an address outside its segment', () => {
    const definition = vlanDefinition();
    definition.addresses['server-2'] = { cluster: '192.168.201.2', storage: '192.168.100.2' };
    expect(() => new TopologyProfile(definition, defaultNodes())).toThrow(InvalidAddressError);
  });

  it('rejects the same address on two nodes', () => {
    const definition = vlanDefinition();
    definition.addresses['server-2'] = { cluster: '192.168.200.1', storage: '192.168.100.2' };
    expect(() => new TopologyProfile(definition, defaultNodes()))
      .toThrow('Address 192.168.200.1 is assigned to both server-1/cluster and server-2/cluster');
  });

  it('rejects two semantics on one segment', () => {
    const definition = vlanDefinition();
    for (const [node, index] of [['server-1', 1], ['server-2', 2], ['agent-1', 3]] as const) {
      definition.addresses[node] = { cluster: `192.168.200.${index}`, storage: `192.168.200.${index + 10}` };
    }
    expect(() => new TopologyProfile(definition, defaultNodes()))
      .toThrow("Semantic interfaces 'cluster' and 'storage' share the segment 192.168.200.0/24");
  });

  it('rejects a semantic mapped onto the management interface', () => {
    const definition: TopologyProfileDefinition = {
      kind: 'flat',
      interfaces: { cluster: 'eth0' },
      addresses: { 'server-1': { cluster: '192.168.1.1' } }
    };
    expect(() => new TopologyProfile(definition, [defineNode('server-1', 'server', true)]))
      .toThrow("Semantic interface 'cluster' is mapped onto the management interface eth0");
  });

  it('rejects an untagged semantic on a vlan topology', () => {
    const definition = { ...vlanDefinition(), vlanIds: { cluster: 200 } };
    expect(() => new TopologyProfile(definition, defaultNodes()))
      .toThrow("vlan topology requires a VLAN tag for 'storage'");
  });

  describe('devices', () => {
    const bondedDefinition = (interfaces: Record<string, string>): TopologyProfileDefinition => ({
      kind: 'bonded-vlan',
      interfaces,
      vlanIds: { cluster: 200, storage: 100 },
      bondConfig: { name: 'bond0', mode: 'active-backup', members: ['eth1', 'eth2'], monitorIntervalMs: 100 },
      addresses: vlanDefinition().addresses
    });

    it('rejects two semantics on one device', () => {
      const definition = { ...vlanDefinition(), interfaces: { cluster: 'eth1.200', storage: 'eth1.200' } };
      expect(() => new TopologyProfile(definition, defaultNodes()))
        .toThrow("Semantic interfaces 'cluster' and 'storage' are both mapped onto eth1.200");
    });

    it('rejects two semantics on one device of a flat topology', () => {
      const definition: TopologyProfileDefinition = {
        kind: 'flat',
        interfaces: { cluster: 'eth1', storage: 'eth1' },
        addresses: { 'server-1': { cluster: '192.168.1.1', storage: '192.168.2.1' } }
      };
      expect(() => new TopologyProfile(definition, [defineNode('server-1', 'server', true)]))
        .toThrow("Semantic interfaces 'cluster' and 'storage' are both mapped onto eth1");
    });

    it('rejects a semantic mapped onto the trunk', () => {
      const definition = { ...vlanDefinition(), interfaces: { cluster: 'eth1.200', storage: 'eth1' } };
      expect(() => new TopologyProfile(definition, defaultNodes()))
        .toThrow("Semantic interface 'storage' is mapped onto eth1, the trunk");
    });

    it('rejects a semantic mapped onto the bond or one of its members', () => {
      expect(() => new TopologyProfile(bondedDefinition({ cluster: 'bond0.200', storage: 'bond0' }), defaultNodes()))
        .toThrow("Semantic interface 'storage' is mapped onto bond0, the bond device");
      expect(() => new TopologyProfile(bondedDefinition({ cluster: 'bond0.200', storage: 'eth2' }), defaultNodes()))
        .toThrow("Semantic interface 'storage' is mapped onto eth2, a member of bond0");
      expect(() => new TopologyProfile(bondedDefinition({ cluster: 'bond0.200', storage: 'bond0.100' }), defaultNodes()))
        .not.toThrow();
    });
  });

  describe('per-node VLAN tags', () => {
    it('overrides the shared tag on the named node only', () => {
      const definition = { ...vlanDefinition(), nodeVlanIds: { 'server-2': { cluster: 201 }, 'agent-2': { cluster: 203 } } };
      const topology = new TopologyProfile(definition, defaultNodes());

      expect(topology.interfaces('server-2')).toEqual([
        { semantic: 'cluster', name: 'eth1.200', vlanId: 201 },
        { semantic: 'storage', name: 'eth1.100', vlanId: 100 }
      ]);
      expect(topology.vlanTag('cluster', 'server-1')).toBe(200);
      expect(topology.vlanTag('cluster')).toBe(200);
    });

    it('only retags semantics that carry a tag', () => {
      const definition = { ...vlanDefinition(), nodeVlanIds: { 'server-2': { backup: 5 } } };
      expect(() => new TopologyProfile(definition, defaultNodes()))
        .toThrow('Per-node VLAN tag for server-2/backup overrides a semantic interface with no VLAN tag');
    });

    it('range-checks the override', () => {
      const definition = { ...vlanDefinition(), nodeVlanIds: { 'server-2': { cluster: 5000 } } };
      expect(() => new TopologyProfile(definition, defaultNodes()))
        .toThrow("VLAN tag 5000 on 'server-2/cluster' is outside 1-4094");
    });

    it('keeps the tags of one node distinct', () => {
      const definition = { ...vlanDefinition(), nodeVlanIds: { 'server-2': { cluster: 100 } } };
      expect(() => new TopologyProfile(definition, defaultNodes()))
        .toThrow('VLAN tag 100 is assigned to more than one semantic interface: cluster, storage');
    });
  });

  describe('node set', () => {
    it('requires exactly one primary server', () => {
      const nodes = [defineNode('server-1', 'server', true), defineNode('server-2', 'server', true), defineNode('agent-1', 'agent')];
      expect(() => new TopologyProfile(vlanDefinition(), nodes)).toThrow(PrimaryCountError);
    });

    it('refuses an agent as primary', () => {
      const nodes = [defineNode('server-1', 'server'), defineNode('agent-1', 'agent', true)];
      expect(() => new TopologyProfile(vlanDefinition(), nodes)).toThrow('Agent agent-1 cannot be the primary');
    });

    it('refuses duplicate names', () => {
      const nodes = [defineNode('server-1', 'server', true), defineNode('server-1', 'server')];
      expect(() => new TopologyProfile(vlanDefinition(), nodes)).toThrow('Node name server-1 is used more than once');
    });
  });
});
