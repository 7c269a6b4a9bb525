/**
 * Parsers for the iproute2 and bonding-driver output the health checks read
 */
import { isValidIPv4 } from '../common/utils';

export interface BriefInterface {
  name: string;
  parent?: string;
  state: string;
  addresses: string[];
}

/**
 * `ip -br addr show`: NAME[@PARENT] STATE ADDR...
 */
export function parseBriefAddresses(output: string): Map<string, BriefInterface> {
  const interfaces = new Map<string, BriefInterface>();
  for (const line of output.split('\n')) {
    const [label, state, ...addresses] = line.trim().split(/\s+/);
    if (!label || !state) continue;
    const [name = label, parent] = label.split('@');
    const entry: BriefInterface = { name, state, addresses: addresses.filter(address => address.includes('/')) };
    if (parent) entry.parent = parent;
    interfaces.set(name, entry);
  }
  return interfaces;
}

/**
 * IPv4 entries only; the kernel adds fe80::/64 to every link on its own
 */
export function ipv4Addresses(entry: BriefInterface): string[] {
  return entry.addresses.filter(address => isValidIPv4(address.split('/')[0] ?? ''));
}

export interface VlanDetails {
  protocol: string;
  id: number;
}

/**
 * VLAN line of `ip -d link show <iface>`; undefined for untagged links
 */
export function parseVlanDetails(output: string): VlanDetails | undefined {
  const match = /vlan protocol (802\.1q|802\.1ad) id (\d+)/i.exec(output);
  if (!match) return undefined;
  const protocol = (match[1] ?? '').toLowerCase() === '802.1q' ? '802.1Q' : '802.1ad';
  return { protocol, id: Number(match[2]) };
}

export interface BondStatus {
  mode: string;
  activeMember?: string;
  miiStatus: string;
  members: Array<{ name: string; miiStatus: string }>;
}

/**
 * /proc/net/bonding/<bond>
 */
export function parseBondStatus(content: string): BondStatus {
  const lines = content.split('\n').map(line => line.trim());
  const value = (prefix: string): string | undefined =>
    lines.find(line => line.startsWith(prefix))?.slice(prefix.length).trim();

  const rawMode = value('Bonding Mode:') ?? '';
  const parenthesized = /\(([^)]+)\)/.exec(rawMode);
  const status: BondStatus = {
    mode: parenthesized?.[1] ?? rawMode,
    miiStatus: value('MII Status:') ?? 'unknown',
    members: []
  };

  const active = value('Currently Active Slave:');
  if (active && active !== 'None') {
    status.activeMember = active;
  }

  lines.forEach((line, index) => {
    if (line.startsWith('Slave Interface:')) {
      const mii = lines.slice(index + 1).find(next => next.startsWith('MII Status:'));
      status.members.push({
        name: line.slice('Slave Interface:'.length).trim(),
        miiStatus: mii?.slice('MII Status:'.length).trim() ?? 'unknown'
      });
    }
  });
  return status;
}

export interface RouteEntry {
  destination: string;
  dev?: string;
  via?: string;
}

/**
 * `ip route show`
 */
export function parseRoutes(output: string): RouteEntry[] {
  const routes: RouteEntry[] = [];
  for (const line of output.split('\n')) {
    const words = line.trim().split(/\s+/);
    const [destination] = words;
    if (!destination) continue;
    const route: RouteEntry = { destination };
    const dev = words.indexOf('dev');
    const via = words.indexOf('via');
    if (dev >= 0 && words[dev + 1]) route.dev = words[dev + 1];
    if (via >= 0 && words[via + 1]) route.via = words[via + 1];
    routes.push(route);
  }
  return routes;
}

export interface NeighborEntry {
  address: string;
  dev: string;
  state: string;
}

/**
 * `ip neigh show`
 */
export function parseNeighbors(output: string): NeighborEntry[] {
  const neighbors: NeighborEntry[] = [];
  for (const line of output.split('\n')) {
    const words = line.trim().split(/\s+/);
    const dev = words.indexOf('dev');
    const [address] = words;
    if (!address || dev < 0 || !words[dev + 1]) continue;
    neighbors.push({ address, dev: words[dev + 1] ?? '', state: words[words.length - 1] ?? '' });
  }
  return neighbors;
}
