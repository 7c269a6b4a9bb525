import { SimulatedCluster } from '../../../src/fleet/simulation/SimulatedCluster';
import { SimulatedHost } from '../../../src/fleet/simulation/SimulatedHost';
import { parseBondStatus, parseBriefAddresses, parseVlanDetails } from '../../../src/health/parsers';

const createHost = (modules: string[] = ['bonding', '8021q']): SimulatedHost =>
  new SimulatedHost('server-1', new SimulatedCluster(), {
    interfaces: ['eth0', 'eth1', 'eth2'],
    managementInterface: 'eth0',
    managementAddress: '10.0.2.15/24',
    availableModules: modules
  });

const run = (host: SimulatedHost, line: string): { exitCode: number; output: string } => {
  const outcome = host.execute(line);
  return { exitCode: outcome.exitCode, output: outcome.stdout + outcome.stderr };
};

describe('SimulatedHost', () => {
  it('boots with only the management interface configured', () => {
    const host = createHost();
    const brief = parseBriefAddresses(run(host, 'ip -br addr show').output);

    expect(brief.get('eth0')).toEqual({ name: 'eth0', state: 'UP', addresses: ['10.0.2.15/24'] });
    expect(brief.get('eth1')).toEqual({ name: 'eth1', state: 'DOWN', addresses: [] });
  });

  it('needs 8021q before creating VLAN sub-interfaces', () => {
    const host = createHost();
    expect(run(host, 'ip link add link eth1 name eth1.200 type vlan id 200')).toEqual({
      exitCode: 2,
      output: 'RTNETLINK answers: Operation not supported\n'
    });

    run(host, 'modprobe 8021q');
    expect(run(host, 'ip link add link eth1 name eth1.200 type vlan id 200').exitCode).toBe(0);
    expect(parseVlanDetails(run(host, 'ip -d link show eth1.200').output)).toEqual({ protocol: '802.1Q', id: 200 });
  });

  it('fails modprobe for modules the image does not ship', () => {
    const host = createHost(['8021q']);
    expect(run(host, 'modprobe bonding').exitCode).toBe(1);
    expect(run(host, "modprobe bonding || lsmod | grep -q '^bonding'").exitCode).toBe(1);
  });

  it('refuses to enslave a link that is up', () => {
    const host = createHost();
    run(host, 'modprobe bonding');
    run(host, 'ip link add bond0 type bond mode active-backup miimon 100');
    run(host, 'ip link set eth1 up');

    expect(run(host, 'ip link set eth1 master bond0')).toEqual({
      exitCode: 2,
      output: 'Error: Device can not be enslaved while up.\n'
    });
  });

  it('fails an active-backup bond over to the other member', () => {
    const host = createHost();
    for (const line of [
      'modprobe bonding',
      'ip link add bond0 type bond mode active-backup miimon 100 primary eth1',
      'ip link set eth1 master bond0',
      'ip link set eth2 master bond0',
      'ip link set bond0 up',
      'ip link set eth1 up',
      'ip link set eth2 up'
    ]) {
      expect(run(host, line).exitCode).toBe(0);
    }

    const before = parseBondStatus(run(host, 'cat /proc/net/bonding/bond0').output);
    expect(before).toMatchObject({ mode: 'active-backup', activeMember: 'eth1', miiStatus: 'up' });

    run(host, 'ip link set eth1 down');
    expect(parseBondStatus(run(host, 'cat /proc/net/bonding/bond0').output).activeMember).toBe('eth2');

    host.setCarrier('eth2', false);
    expect(host.operUp('bond0')).toBe(false);
    expect(parseBondStatus(run(host, 'cat /proc/net/bonding/bond0').output).activeMember).toBeUndefined();
  });

  it('reports an existing address as RTNETLINK File exists', () => {
    const host = createHost();
    run(host, 'ip addr add 192.168.1.1/24 dev eth1');
    expect(run(host, 'ip addr add 192.168.1.1/24 dev eth1')).toEqual({
      exitCode: 2,
      output: 'RTNETLINK answers: File exists\n'
    });
  });

  it('lets an unmasked network daemon wipe data addresses when a unit starts', () => {
    const host = createHost();
    run(host, 'ip addr add 192.168.1.1/24 dev eth1');
    run(host, 'systemctl start k3s-server');
    expect(host.link('eth1')?.addresses).toEqual([]);
    expect(host.link('eth0')?.addresses).toEqual(['10.0.2.15/24']);

    const masked = createHost();
    run(masked, 'systemctl mask systemd-networkd.service');
    run(masked, 'ip addr add 192.168.1.1/24 dev eth1');
    run(masked, 'systemctl start k3s-server');
    expect(masked.link('eth1')?.addresses).toEqual(['192.168.1.1/24']);
  });

  it('logs a failed service start to its journal', () => {
    const host = createHost();
    const result = run(host, 'systemctl start k3s-server');

    expect(result.exitCode).toBe(1);
    expect(host.unitState('k3s-server')).toBe('failed');
    expect(run(host, 'journalctl -u k3s-server.service --no-pager -n 100').output)
      .toBe('k3s-server[1]: level=fatal msg="environment file /etc/default/k3s-server not found"\n');
  });

  it('only adds a default route through a gateway on a connected segment', () => {
    const host = createHost();
    run(host, 'ip addr add 192.168.1.1/24 dev eth1');
    run(host, 'ip link set eth1 up');

    expect(run(host, 'ip route add default via 10.9.9.9 dev eth1').output).toBe('Error: Nexthop has invalid gateway.\n');
    expect(run(host, 'ip route add default via 192.168.1.254 dev eth1').exitCode).toBe(0);
    expect(run(host, 'ip route show default').output).toBe('default via 192.168.1.254 dev eth1\n');
    expect(run(host, 'ip route show default | grep -q default').exitCode).toBe(0);
  });
});
