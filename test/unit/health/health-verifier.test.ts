import * as path from 'path';
import { FormationAbortedError, HealthCheckError } from '../../../src/common/errors';
import { HealthVerifier } from '../../../src/health/HealthVerifier';
import { NetworkConfigurator } from '../../../src/network/NetworkConfigurator';
import { defaultNodes } from '../../../src/topology/parse';
import { loadPreset, loadProfileFile, presetDirectory } from '../../../src/topology/presets';
import { TopologyProfile } from '../../../src/topology/TopologyProfile';
import { TopologyProfileDefinition } from '../../../src/topology/types';
import { TopologyKind } from '../../../src/types';
import { SimulatedFleet, SimulatedFleetOptions } from '../../../src/fleet/SimulatedFleet';
import { createFleet } from '../../harness/simulatedRun';
import { SpyLogger } from '../../helpers/spyLogger';

interface ConfiguredFleet {
  fleet: SimulatedFleet;
  topology: TopologyProfile;
  verifier: HealthVerifier;
  logger: SpyLogger;
}

async function configuredNodes(
  definition: TopologyProfileDefinition,
  names: string[],
  fleetOptions: SimulatedFleetOptions = {}
): Promise<ConfiguredFleet> {
  const nodes = defaultNodes();
  const topology = new TopologyProfile(definition, nodes);
  const fleet = createFleet(fleetOptions);
  const logger = new SpyLogger();
  const configurator = new NetworkConfigurator(fleet, { settleDelayMs: 1, logger });
  for (const node of nodes.filter(candidate => names.includes(candidate.name))) {
    await fleet.boot(node);
    await configurator.apply(node.name, topology);
  }
  return { fleet, topology, verifier: new HealthVerifier(fleet, topology, { logger }), logger };
}

async function configuredNode(kind: TopologyKind, fleetOptions: SimulatedFleetOptions = {}): Promise<ConfiguredFleet> {
  return configuredNodes(await loadPreset(kind), ['server-1'], fleetOptions);
}

describe('HealthVerifier', () => {
  it('passes a freshly configured VLAN node', async () => {
    const { verifier } = await configuredNode('vlan');
    const report = await verifier.verify(['server-1']);

    expect(report.failures).toEqual([]);
    expect(report.passed).toBe(true);
    expect(report.checks.filter(check => check.severity === 'hard').map(check => check.check)).toEqual([
      'cluster:exists',
      'cluster:address',
      'cluster:trunk',
      'cluster:vlan',
      'storage:exists',
      'storage:address',
      'storage:trunk',
      'storage:vlan'
    ]);
  });

  it('ignores the kernel-assigned IPv6 link-local addresses', async () => {
    const { fleet, verifier } = await configuredNode('vlan', { ipv6LinkLocal: true });
    const brief = await fleet.exec('server-1', 'ip -br addr show eth1.200');
    expect(brief.output.trim().split(/\s+/).slice(2)).toEqual(['192.168.200.1/24', 'fe80::5054:ff:fe12:3405/64']);

    const report = await verifier.verify(['server-1']);
    expect(report.failures).toEqual([]);
    expect(report.checks.find(check => check.check === 'cluster:address')?.message)
      .toBe('cluster interface eth1.200 carries exactly 192.168.200.1/24');
  });

  it('fails a sub-interface that rides on the wrong parent', async () => {
    const { fleet, verifier } = await configuredNode('vlan');
    await fleet.exec('server-1', 'ip link del eth1.200');
    await fleet.exec('server-1', 'ip link add link eth2 name eth1.200 type vlan id 200');
    await fleet.exec('server-1', 'ip addr add 192.168.200.1/24 dev eth1.200');

    const report = await verifier.verify(['server-1']);
    expect(report.failures).toEqual([
      { node: 'server-1', check: 'cluster:trunk', message: 'cluster interface eth1.200 rides on eth2, expected eth1' }
    ]);
  });

  it('reaches every peer on every segment and fills the neighbor table', async () => {
    const { fleet, verifier } = await configuredNodes(await loadPreset('vlan'), ['server-1', 'server-2']);

    const report = await verifier.verify(['server-1', 'server-2']);
    expect(report.failures).toEqual([]);
    expect(report.checks.filter(check => check.node === 'server-1' && check.check.endsWith(':reach')).map(check => check.message)).toEqual([
      'server-2 answers at 192.168.200.2 over eth1.200',
      'server-2 answers at 192.168.100.2 over eth1.100'
    ]);

    const neighbors = await fleet.exec('server-1', 'ip neigh show');
    expect(neighbors.output.split('\n').filter(line => line !== '').map(line => line.split(' ').slice(0, 3).join(' '))).toEqual([
      '192.168.200.2 dev eth1.200',
      '192.168.100.2 dev eth1.100'
    ]);
  });

  it('expects each node its own tag and fails reachability across mismatched tags', async () => {
    const definition = await loadProfileFile(path.join(presetDirectory(), 'negative', 'vlan-mismatch.yaml'));
    const { verifier } = await configuredNodes(definition, ['server-1', 'server-2']);

    const report = await verifier.verify(['server-1', 'server-2']);
    expect(report.checks.find(check => check.node === 'server-2' && check.check === 'cluster:vlan')).toMatchObject({
      passed: true,
      message: 'eth1.200 reports 802.1Q id 201, expected 201'
    });
    expect(report.failures).toEqual([
      { node: 'server-1', check: 'cluster:reach', message: 'cannot reach server-2 at 192.168.200.2 over eth1.200' },
      { node: 'server-1', check: 'storage:reach', message: 'cannot reach server-2 at 192.168.100.2 over eth1.100' },
      { node: 'server-2', check: 'cluster:reach', message: 'cannot reach server-1 at 192.168.200.1 over eth1.200' },
      { node: 'server-2', check: 'storage:reach', message: 'cannot reach server-1 at 192.168.100.1 over eth1.100' }
    ]);
  });

  it('stops once the run is aborted', async () => {
    const { fleet, verifier } = await configuredNode('vlan');
    const controller = new AbortController();
    controller.abort();
    const execs: string[] = [];
    fleet.on('exec', (event: { command: string }) => execs.push(event.command));

    const attempt = verifier.verify(['server-1'], controller.signal);
    await expect(attempt).rejects.toThrow(FormationAbortedError);
    await expect(attempt).rejects.toThrow("Wait for 'health checks' on server-1 was aborted");
    expect(execs).toEqual([]);
  });

  it('names the segment a leaked address belongs to', async () => {
    const { fleet, verifier } = await configuredNode('vlan');
    await fleet.exec('server-1', 'ip addr add 192.168.100.9/24 dev eth1.200');

    const report = await verifier.verify(['server-1']);
    expect(report.passed).toBe(false);
    expect(report.failures).toEqual([{
      node: 'server-1',
      check: 'cluster:address',
      message: 'cluster interface eth1.200 carries foreign addresses: 192.168.100.9/24 from the storage segment'
    }]);
  });

  it('reports a missing interface and keeps checking the others', async () => {
    const { fleet, verifier } = await configuredNode('vlan');
    await fleet.exec('server-1', 'ip link del eth1.100');

    await expect(verifier.assertHealthy(['server-1'])).rejects.toThrow(HealthCheckError);
    const report = await verifier.verify(['server-1']);
    expect(report.failures).toEqual([
      { node: 'server-1', check: 'storage:exists', message: 'storage interface eth1.100 does not exist' }
    ]);
  });

  it('checks the bond mode and active member', async () => {
    const { fleet, verifier } = await configuredNode('bonded-vlan');
    const healthy = await verifier.verify(['server-1']);
    expect(healthy.checks.find(check => check.check === 'bond:active-member')?.message).toBe('bond0 active member eth1');
    expect(healthy.passed).toBe(true);

    fleet.host('server-1').setCarrier('eth1', false);
    fleet.host('server-1').setCarrier('eth2', false);
    const degraded = await verifier.verify(['server-1']);
    expect(degraded.failures).toContainEqual({ node: 'server-1', check: 'bond:active-member', message: 'bond0 has no active member' });
  });

  it('fails the node when the exec channel is gone', async () => {
    const { fleet, verifier } = await configuredNode('flat');
    await fleet.shutdown('server-1');

    const report = await verifier.verify(['server-1']);
    expect(report.failures).toEqual([
      { node: 'server-1', check: 'interfaces', message: 'cannot list interfaces: VM server-1 is not running' }
    ]);
  });
});
