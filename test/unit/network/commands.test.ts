import {
  assignAddress,
  dropMismatchedBond,
  enslave,
  ensureBond,
  ensureKernelModule,
  ensureVlanInterface,
  maskNetworkDaemon,
  redact
} from '../../../src/network/commands';

describe('network command builders', () => {
  it('masks and stops the network daemon', () => {
    expect(maskNetworkDaemon().map(step => step.command)).toEqual([
      'systemctl mask systemd-networkd.service',
      'systemctl stop systemd-networkd.service || true'
    ]);
  });

  it('falls back to lsmod when modprobe fails', () => {
    expect(ensureKernelModule('8021q').command).toBe("modprobe 8021q || lsmod | grep -q '^8021q'");
  });

  it('guards VLAN creation on the interface already existing', () => {
    expect(ensureVlanInterface('eth1', 'eth1.200', 200).command)
      .toBe('ip link show eth1.200 >/dev/null 2>&1 || ip link add link eth1 name eth1.200 type vlan id 200');
  });

  it('includes the bond primary only when one is set', () => {
    expect(ensureBond('bond0', 'active-backup', 100).command)
      .toBe('ip link show bond0 >/dev/null 2>&1 || ip link add bond0 type bond mode active-backup miimon 100');
    expect(ensureBond('bond0', 'active-backup', 100, 'eth1').command).toMatch(/miimon 100 primary eth1$/);
  });

  it('only takes a member down when it is not already enslaved', () => {
    expect(enslave('eth2', 'bond0').map(step => step.command)).toEqual([
      "ip link show eth2 | grep -q 'master bond0' || ip link set eth2 down",
      'ip link set eth2 master bond0'
    ]);
  });

  it('keeps a bond that already runs the requested mode', () => {
    expect(dropMismatchedBond('bond0', 'active-backup').command)
      .toBe("grep -q 'active-backup' /sys/class/net/bond0/bonding/mode 2>/dev/null || ip link del bond0 2>/dev/null || true");
  });

  it('writes addresses in CIDR notation', () => {
    expect(assignAddress('192.168.1.1', 24, 'eth1').command).toBe('ip addr add 192.168.1.1/24 dev eth1');
  });

  describe('redact', () => {
    it('replaces every occurrence of the secret', () => {
      expect(redact('K3S_TOKEN=test-secret; again test-secret', 'test-secret'))
        .toBe('K3S_TOKEN=<redacted>; again <redacted>');
    });

    it('returns the text unchanged without a secret', () => {
      expect(redact('nothing to hide')).toBe('nothing to hide');
      expect(redact('nothing to hide', '')).toBe('nothing to hide');
    });
  });
});
