import { K3S_SERVICE, envFileFor, renderEnvironment, unitFor, writeEnvironmentCommand } from '../../../src/formation/ServiceProfile';

const base = {
  nodeIp: '192.168.200.2',
  flannelIface: 'eth1.200',
  clusterCidr: '10.42.0.0/16',
  serviceCidr: '10.43.0.0/16'
};

describe('ServiceProfile', () => {
  it('maps roles to units and environment files', () => {
    expect(unitFor(K3S_SERVICE, 'server')).toBe('k3s-server');
    expect(unitFor(K3S_SERVICE, 'agent')).toBe('k3s-agent');
    expect(envFileFor(K3S_SERVICE, 'agent')).toBe('/etc/default/k3s-agent');
  });

  it('initializes the primary with --cluster-init on the cluster address', () => {
    expect(renderEnvironment({ ...base, nodeIp: '192.168.200.1', role: 'server', mode: { kind: 'init' } })).toEqual([
      'K3S_SERVER_OPTS="--cluster-init --node-ip 192.168.200.1 --flannel-iface eth1.200 ' +
      '--advertise-address 192.168.200.1 --tls-san 192.168.200.1 --cluster-cidr 10.42.0.0/16 --service-cidr 10.43.0.0/16"'
    ]);
  });

  it('joins secondary servers through --server and the token', () => {
    const lines = renderEnvironment({
      ...base,
      role: 'server',
      mode: { kind: 'join', url: 'https://192.168.200.1:6443', token: 'test-secret' }
    });
    expect(lines[0]).toMatch(/^K3S_SERVER_OPTS="--server https:\/\/192\.168\.200\.1:6443 --node-ip 192\.168\.200\.2 /);
    expect(lines[1]).toBe('K3S_TOKEN=test-secret');
  });

  it('gives agents K3S_URL and K3S_TOKEN', () => {
    expect(renderEnvironment({
      ...base,
      role: 'agent',
      mode: { kind: 'join', url: 'https://192.168.200.1:6443', token: 'test-secret' }
    })).toEqual([
      'K3S_AGENT_OPTS="--node-ip 192.168.200.2 --flannel-iface eth1.200"',
      'K3S_URL="https://192.168.200.1:6443"',
      'K3S_TOKEN=test-secret'
    ]);
  });

  it('marks the token as the secret of the write command', () => {
    const join = writeEnvironmentCommand('/etc/default/k3s-agent', {
      ...base,
      role: 'agent',
      mode: { kind: 'join', url: 'https://192.168.200.1:6443', token: 'test-secret' }
    });
    expect(join.secret).toBe('test-secret');
    expect(join.command.endsWith(' && systemctl daemon-reload')).toBe(true);

    const standalone = writeEnvironmentCommand('/etc/default/k3s-agent', { ...base, role: 'agent', mode: { kind: 'standalone' } });
    expect(standalone.secret).toBeUndefined();
    expect(standalone.command).toBe(
      `echo 'K3S_AGENT_OPTS="--node-ip 192.168.200.2 --flannel-iface eth1.200"' > /etc/default/k3s-agent && systemctl daemon-reload`
    );
  });
});
