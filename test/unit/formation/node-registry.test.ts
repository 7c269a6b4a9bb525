import { K3S_SERVICE } from '../../../src/formation/ServiceProfile';
import { NodeRegistry, isReadyEntry, parseRegistry } from '../../../src/formation/NodeRegistry';
import { StubFleet } from '../../helpers/stubFleet';

const LISTING = [
  'server-1   Ready                        control-plane,etcd,master   5m    v1.29.3+k3s1',
  'agent-1    NotReady                     <none>                      1m    v1.29.3+k3s1',
  'server-2   Ready,SchedulingDisabled     control-plane,etcd,master   3m    v1.29.3+k3s1',
  ''
].join('\n');

describe('NodeRegistry', () => {
  it('parses the node listing', () => {
    const entries = parseRegistry(`NAME STATUS ROLES AGE VERSION\n${LISTING}`);
    expect(entries.map(entry => entry.name)).toEqual(['server-1', 'agent-1', 'server-2']);
    expect(entries[1]).toEqual({ name: 'agent-1', status: 'NotReady', roles: '<none>', age: '1m', version: 'v1.29.3+k3s1' });
  });

  it('treats a Ready status with extra conditions as Ready', () => {
    const [server1, agent1, server2] = parseRegistry(LISTING);
    expect([server1, agent1, server2].map(entry => entry !== undefined && isReadyEntry(entry))).toEqual([true, false, true]);
  });

  it('asks the primary and reports unanswered queries as unknown', async () => {
    const fleet = new StubFleet().answer('server-1', K3S_SERVICE.registryCommand, { exitCode: 0, output: LISTING });
    const registry = new NodeRegistry(fleet, K3S_SERVICE, 'server-1');

    expect(await registry.readyNodes()).toEqual(['server-1', 'server-2']);
    expect(await registry.isReady('agent-1')).toBe(false);
    expect(await registry.entry('agent-9')).toBeUndefined();

    const silent = new NodeRegistry(new StubFleet(), K3S_SERVICE, 'server-1');
    expect(await silent.snapshot()).toBeUndefined();
    expect(await silent.readyNodes()).toEqual([]);
  });
});
