import { ChaosInjector, ChaosScenario } from '../../../src/diagnostics/ChaosInjector';
import { StubFleet } from '../../helpers/stubFleet';

const OK = { exitCode: 0, output: '' };

describe('ChaosInjector', () => {
  let fleet: StubFleet;
  let chaosInjector: ChaosInjector;

  beforeEach(() => {
    fleet = new StubFleet()
      .answer('server-1', 'ip link set eth1 down', OK)
      .answer('server-1', 'ip link set eth1 up', OK)
      .answer('server-1', 'ip link set eth2 down', OK);
    chaosInjector = new ChaosInjector(fleet, { maxConcurrentChaos: 1 });
  });

  it('takes a link down and restores it', async () => {
    const started: ChaosScenario[] = [];
    chaosInjector.on('scenario-started', (scenario: ChaosScenario) => started.push(scenario));

    await chaosInjector.injectLinkDown('server-1', 'eth1');
    expect(chaosInjector.getActiveScenarios().map(scenario => scenario.iface)).toEqual(['eth1']);
    expect(started.map(({ type, node, iface }) => ({ type, node, iface }))).toEqual([
      { type: 'link-down', node: 'server-1', iface: 'eth1' }
    ]);

    await chaosInjector.stopAll();
    expect(chaosInjector.getActiveScenarios()).toEqual([]);
    expect(fleet.commandsFor('server-1')).toEqual(['ip link set eth1 down', 'ip link set eth1 up']);
  });

  it('injecting the same fault twice is a no-op', async () => {
    await chaosInjector.injectLinkDown('server-1', 'eth1');
    await chaosInjector.injectLinkDown('server-1', 'eth1');
    expect(fleet.commandsFor('server-1')).toEqual(['ip link set eth1 down']);
  });

  it('refuses more concurrent scenarios than configured', async () => {
    await chaosInjector.injectLinkDown('server-1', 'eth1');
    await expect(chaosInjector.injectLinkDown('server-1', 'eth2'))
      .rejects.toThrow('Refusing to start more than 1 chaos scenarios');
  });

  it('fails when the command fails and records nothing', async () => {
    fleet.answer('agent-1', 'ip link set eth1 down', { exitCode: 1, output: 'Cannot find device "eth1"\n' });
    await expect(chaosInjector.injectLinkDown('agent-1', 'eth1'))
      .rejects.toThrow(`Chaos command 'ip link set eth1 down' failed on agent-1 (exit 1): Cannot find device "eth1"`);
    expect(chaosInjector.getActiveScenarios()).toEqual([]);
  });

  it('reads the active bond member', async () => {
    fleet.answer('server-1', 'cat /proc/net/bonding/bond0', {
      exitCode: 0,
      output: [
        'Bonding Mode: fault-tolerance (active-backup)',
        'Primary Slave: eth1 (primary_reselect always)',
        'Currently Active Slave: eth2',
        'MII Status: up',
        ''
      ].join('\n')
    });
    await expect(chaosInjector.activeBondMember('server-1', 'bond0')).resolves.toBe('eth2');
  });
});
