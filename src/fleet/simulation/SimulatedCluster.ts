import { createId } from '../../common/utils';
import { CommandOutcome } from './shell';
import { ServiceRuntime, SimulatedHost, normalizeUnit } from './SimulatedHost';

export const SIMULATED_SERVICE_VERSION = 'v1.28.5+k3s1';
const API_PORT = 6443;
const TOKEN_PATH = '/var/lib/rancher/k3s/server/token';
const CONNECTION_REFUSED = `The connection to the server 127.0.0.1:${API_PORT} was refused - did you specify the right host or port?`;

interface Member {
  host: SimulatedHost;
  name: string;
  role: 'server' | 'agent';
  nodeIp: string;
  flannelIface: string;
  joinedAt: number;
  stopped: boolean;
}

export interface SimulatedClusterOptions {
  apiReadyDelayMs?: number;
  nodeReadyDelayMs?: number;
  /** Registry names that never report Ready */
  neverReady?: string[];
  clock?: () => number;
}

/**
 * Black-box model of the clustered service: one cluster initialized by a
 * primary, joined by servers and agents with the shared token, with a
 * node registry served by every running server.
 */
export class SimulatedCluster implements ServiceRuntime {
  private token: string | undefined;
  private primary: SimulatedHost | undefined;
  private initializedAt = 0;
  private readonly members: Member[] = [];
  private readonly neverReady: Set<string>;
  private readonly clock: () => number;

  constructor(private readonly options: SimulatedClusterOptions = {}) {
    this.neverReady = new Set(options.neverReady ?? []);
    this.clock = options.clock ?? Date.now;
  }

  isListening(host: SimulatedHost, port: number): boolean {
    return port === API_PORT && this.runningServer(host) !== undefined;
  }

  start(host: SimulatedHost, rawUnit: string): string | undefined {
    const unit = normalizeUnit(rawUnit);
    if (unit !== 'k3s-server' && unit !== 'k3s-agent') {
      return undefined;
    }
    const role = unit === 'k3s-server' ? 'server' : 'agent';

    const envFile = host.readFile(`/etc/default/${unit}`);
    if (envFile === undefined) return `environment file /etc/default/${unit} not found`;
    const env = parseEnvironmentFile(envFile);
    const flags = parseFlags(env[role === 'server' ? 'K3S_SERVER_OPTS' : 'K3S_AGENT_OPTS'] ?? '');

    if (!host.fileExists('/dev/kmsg')) return 'failed to open /dev/kmsg: no such file or directory';
    if (!host.defaultRoute()) return 'unable to select an IP from default routes';

    const nodeIp = flags.values.get('node-ip');
    if (nodeIp === undefined || !host.hasAddress(nodeIp)) {
      return `unable to find interface with node-ip ${nodeIp ?? '<unset>'}`;
    }
    const flannelIface = flags.values.get('flannel-iface') ?? host.linkWithAddress(nodeIp)?.name ?? '';
    const flannelLink = host.link(flannelIface);
    if (!flannelLink || !flannelLink.addresses.some(cidr => cidr.startsWith(`${nodeIp}/`))) {
      return `flannel interface ${flannelIface} does not carry ${nodeIp}`;
    }

    const existing = this.members.find(member => member.name === host.hostname);
    if (existing && existing.host !== host) {
      return `node name ${host.hostname} is already registered by another host`;
    }

    if (role === 'server' && flags.switches.has('cluster-init')) {
      if (this.primary && this.primary !== host) {
        return 'cluster-init requested but a cluster is already initialized by another server';
      }
      if (!this.token) {
        this.token = `K10${createId()}::server:${createId()}`;
        this.initializedAt = this.clock();
      }
      this.primary = host;
      host.writeFile(TOKEN_PATH, `${this.token}\n`, false);
    } else {
      const url = role === 'server' ? flags.values.get('server') : env.K3S_URL;
      const failure = this.checkJoin(host, url, env.K3S_TOKEN);
      if (failure !== undefined) return failure;
    }

    if (existing) {
      existing.stopped = false;
      existing.nodeIp = nodeIp;
      existing.flannelIface = flannelIface;
    } else {
      this.members.push({ host, name: host.hostname, role, nodeIp, flannelIface, joinedAt: this.clock(), stopped: false });
    }
    host.log(unit, `${unit}[1]: level=info msg="k3s is up and running" node=${host.hostname} node-ip=${nodeIp}`);
    return undefined;
  }

  stop(host: SimulatedHost, rawUnit: string): void {
    const unit = normalizeUnit(rawUnit);
    if (unit !== 'k3s-server' && unit !== 'k3s-agent') return;
    for (const member of this.members) {
      if (member.host === host) member.stopped = true;
    }
  }

  kubectl(host: SimulatedHost, args: string[]): CommandOutcome {
    if (!this.runningServer(host)) {
      return { stdout: '', stderr: `${CONNECTION_REFUSED}\n`, exitCode: 1 };
    }

    if (args[0] === 'get' && args[1] === '--raw' && args[2] === '/readyz') {
      return this.apiReady()
        ? { stdout: 'ok\n', stderr: '', exitCode: 0 }
        : { stdout: '', stderr: 'Error from server (InternalError): etcd is not ready\n', exitCode: 1 };
    }

    if (args[0] === 'get' && (args[1] === 'nodes' || args[1] === 'node' || args[1] === 'no')) {
      if (!this.apiReady()) {
        return { stdout: '', stderr: 'Error from server (ServiceUnavailable): the server is currently unable to handle the request\n', exitCode: 1 };
      }
      const rows = this.members.map(member => this.renderRow(member));
      const header = args.includes('--no-headers') ? [] : ['NAME       STATUS     ROLES                       AGE   VERSION'];
      return { stdout: [...header, ...rows].map(line => `${line}\n`).join(''), stderr: '', exitCode: 0 };
    }

    return { stdout: '', stderr: `error: unknown command "${args.join(' ')}"\n`, exitCode: 1 };
  }

  private runningServer(host: SimulatedHost): Member | undefined {
    return this.members.find(member =>
      member.host === host &&
      member.role === 'server' &&
      !member.stopped &&
      host.poweredOn &&
      host.unitState('k3s-server') === 'active'
    );
  }

  private apiReady(): boolean {
    return this.primary !== undefined &&
      this.primary.poweredOn &&
      this.clock() >= this.initializedAt + (this.options.apiReadyDelayMs ?? 0);
  }

  private checkJoin(host: SimulatedHost, url: string | undefined, token: string | undefined): string | undefined {
    if (!this.primary || !this.token) {
      return 'no cluster to join: the primary has not been initialized';
    }
    if (url === undefined) {
      return 'join URL is not set';
    }
    const match = /^https:\/\/([^:/]+):(\d+)\/?$/.exec(url);
    if (!match || Number(match[2]) !== API_PORT) {
      return `invalid join URL ${url}`;
    }
    const address = match[1] ?? '';
    if (!this.primary.hasAddress(address) || !host.canReach(address)) {
      return `failed to contact server at ${url}: connection timed out`;
    }
    if (token !== this.token) {
      return 'failed to validate token: token does not match the cluster';
    }
    return undefined;
  }

  private renderRow(member: Member): string {
    const roles = member.role === 'server' ? 'control-plane,etcd,master' : '<none>';
    const ageSeconds = Math.max(0, Math.floor((this.clock() - member.joinedAt) / 1000));
    return `${member.name.padEnd(10)} ${this.statusOf(member).padEnd(10)} ${roles.padEnd(27)} ${ageSeconds}s    ${SIMULATED_SERVICE_VERSION}`;
  }

  private statusOf(member: Member): string {
    const ready = !member.stopped &&
      member.host.poweredOn &&
      !this.neverReady.has(member.name) &&
      this.clock() >= member.joinedAt + (this.options.nodeReadyDelayMs ?? 0) &&
      member.host.operUp(member.flannelIface) &&
      member.host.hasAddress(member.nodeIp);
    return ready ? 'Ready' : 'NotReady';
  }
}

/**
 * KEY=VALUE lines, optionally double-quoted
 */
export function parseEnvironmentFile(content: string): Record<string, string> {
  const env: Record<string, string> = {};
  for (const line of content.split('\n')) {
    const match = /^\s*([A-Za-z_][A-Za-z0-9_]*)=(.*)$/.exec(line);
    if (!match) continue;
    const raw = (match[2] ?? '').trim();
    env[match[1] ?? ''] = raw.startsWith('"') && raw.endsWith('"') && raw.length >= 2 ? raw.slice(1, -1) : raw;
  }
  return env;
}

function parseFlags(options: string): { values: Map<string, string>; switches: Set<string> } {
  const values = new Map<string, string>();
  const switches = new Set<string>();
  const words = options.split(/\s+/).filter(word => word.length > 0);
  for (let i = 0; i < words.length; i++) {
    const word = words[i] ?? '';
    if (!word.startsWith('--')) continue;
    const flag = word.slice(2);
    const eq = flag.indexOf('=');
    if (eq >= 0) {
      values.set(flag.slice(0, eq), flag.slice(eq + 1));
    } else if (i + 1 < words.length && !(words[i + 1] ?? '').startsWith('--')) {
      values.set(flag, words[i + 1] ?? '');
      i++;
    } else {
      switches.add(flag);
    }
  }
  return { values, switches };
}
