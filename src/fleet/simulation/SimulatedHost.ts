import { inSubnet, networkOf } from '../../common/utils';
import { CommandOutcome, ShellHost, runShell } from './shell';

export type LinkKind = 'ethernet' | 'vlan' | 'bond';

export interface SimulatedLink {
  name: string;
  index: number;
  kind: LinkKind;
  adminUp: boolean;
  /** Physical carrier, only meaningful for ethernet links */
  carrier: boolean;
  /** CIDR notation, e.g. 192.168.200.1/24 */
  addresses: string[];
  parent?: string;
  vlanId?: number;
  master?: string;
  bond?: { mode: string; miimon: number; primary?: string };
}

export interface StaticRoute {
  destination: string;
  via: string;
  dev: string;
}

export type UnitState = 'active' | 'inactive' | 'failed';

/**
 * Service side of the simulation (the clustered service and its API)
 */
export interface ServiceRuntime {
  /** Returns an error line when the unit fails to start */
  start(host: SimulatedHost, unit: string): string | undefined;
  stop(host: SimulatedHost, unit: string): void;
  kubectl(host: SimulatedHost, args: string[]): CommandOutcome;
}

export interface SimulatedHostOptions {
  interfaces: string[];
  managementInterface: string;
  managementAddress: string;
  availableModules: string[];
  preexistingBond?: { name: string; mode: string; members: string[] };
  /** Kernel-assigned fe80::/64 address on every operational link */
  ipv6LinkLocal?: boolean;
  /** Other VMs sharing the virtual switch */
  peers?: () => SimulatedHost[];
}

interface PeerPath {
  link: SimulatedLink;
  peer: SimulatedHost;
  peerLink: SimulatedLink;
}

const NETWORK_DAEMON = 'systemd-networkd';

const BOND_MODE_NUMBERS: Record<string, number> = {
  'balance-rr': 0,
  'active-backup': 1,
  'balance-xor': 2,
  'broadcast': 3,
  '802.3ad': 4,
  'balance-tlb': 5,
  'balance-alb': 6
};

const ok = (stdout = ''): CommandOutcome => ({ stdout, stderr: '', exitCode: 0 });
const fail = (stderr: string, exitCode = 1): CommandOutcome => ({ stdout: '', stderr: `${stderr}\n`, exitCode });

/**
 * Linux networking and systemd model of one VM, enough to run the commands
 * the configurator and the formation driver issue and to answer the
 * commands the health verifier and diagnostics collector read back.
 */
export class SimulatedHost implements ShellHost {
  hostname = 'localhost';
  poweredOn = true;

  private readonly linkTable = new Map<string, SimulatedLink>();
  private readonly routes: StaticRoute[] = [];
  private readonly modules = new Set<string>();
  private readonly files = new Map<string, string>();
  private readonly units = new Map<string, UnitState>();
  private readonly masked = new Set<string>();
  private readonly journals = new Map<string, string[]>();
  private readonly executed: string[] = [];
  private readonly neighbors = new Map<string, string>();
  private nextIndex = 1;

  constructor(
    readonly node: string,
    private readonly runtime: ServiceRuntime,
    private readonly options: SimulatedHostOptions
  ) {
    this.addLink({ name: 'lo', kind: 'ethernet', adminUp: true, carrier: true, addresses: ['127.0.0.1/8'] });
    for (const name of options.interfaces) {
      this.addLink({ name, kind: 'ethernet', adminUp: name === options.managementInterface, carrier: true, addresses: [] });
    }
    const management = this.linkTable.get(options.managementInterface);
    if (management) {
      management.addresses.push(options.managementAddress);
    }

    const bond = options.preexistingBond;
    if (bond) {
      this.modules.add('bonding');
      this.addLink({ name: bond.name, kind: 'bond', adminUp: false, carrier: true, addresses: [], bond: { mode: bond.mode, miimon: 100 } });
      for (const member of bond.members) {
        const link = this.linkTable.get(member);
        if (link) link.master = bond.name;
      }
    }

    this.units.set(NETWORK_DAEMON, 'active');
    this.files.set('/etc/hostname', 'localhost\n');
  }

  /**
   * Run one command line through the shell front end
   */
  execute(line: string): CommandOutcome {
    this.executed.push(line);
    return runShell(this, line);
  }

  history(): string[] {
    return this.executed.slice();
  }

  link(name: string): SimulatedLink | undefined {
    return this.linkTable.get(name);
  }

  links(): SimulatedLink[] {
    return Array.from(this.linkTable.values());
  }

  /**
   * Operational state: admin up and, through the stack, a physical carrier
   */
  operUp(name: string): boolean {
    const link = this.linkTable.get(name);
    if (!link || !link.adminUp || !this.poweredOn) return false;
    switch (link.kind) {
      case 'ethernet':
        return link.carrier;
      case 'vlan':
        return link.parent !== undefined && this.operUp(link.parent);
      case 'bond':
        return this.bondMembers(name).some(member => this.operUp(member));
    }
  }

  hasAddress(address: string): boolean {
    return this.links().some(link => link.addresses.some(cidr => cidr.split('/')[0] === address));
  }

  linkWithAddress(address: string): SimulatedLink | undefined {
    return this.links().find(link => link.addresses.some(cidr => cidr.split('/')[0] === address));
  }

  /**
   * Whether an address answers from a connected subnet. The peer must sit
   * in the same broadcast domain: matching VLAN tag, or untagged on the
   * shared switch. Each management NIC is its own NAT segment.
   */
  canReach(address: string): boolean {
    return this.hasAddress(address) || this.pathTo(address) !== undefined;
  }

  defaultRoute(): StaticRoute | undefined {
    return this.routes.find(route => route.destination === 'default');
  }

  fileExists(path: string): boolean {
    return this.readFile(path) !== undefined;
  }

  readFile(path: string): string | undefined {
    const bondingMode = /^\/sys\/class\/net\/([^/]+)\/bonding\/mode$/.exec(path);
    if (bondingMode) {
      const bond = this.linkTable.get(bondingMode[1] ?? '')?.bond;
      return bond ? `${bond.mode} ${BOND_MODE_NUMBERS[bond.mode] ?? 0}\n` : undefined;
    }
    const procBonding = /^\/proc\/net\/bonding\/(.+)$/.exec(path);
    if (procBonding) {
      return this.renderBondStatus(procBonding[1] ?? '');
    }
    return this.files.get(path);
  }

  writeFile(path: string, content: string, append: boolean): void {
    this.files.set(path, append ? (this.files.get(path) ?? '') + content : content);
  }

  unitState(unit: string): UnitState {
    return this.units.get(normalizeUnit(unit)) ?? 'inactive';
  }

  isMasked(unit: string): boolean {
    return this.masked.has(normalizeUnit(unit));
  }

  journal(unit: string): string[] {
    return this.journals.get(normalizeUnit(unit))?.slice() ?? [];
  }

  log(unit: string, line: string): void {
    const key = normalizeUnit(unit);
    this.journals.set(key, [...(this.journals.get(key) ?? []), line]);
  }

  /** Pull the cable on an ethernet link (the admin state stays as it is) */
  setCarrier(name: string, carrier: boolean): void {
    const link = this.linkTable.get(name);
    if (link) link.carrier = carrier;
  }

  /** Member currently carrying an active-backup bond's traffic */
  activeBondMember(bond: string): string | undefined {
    const spec = this.linkTable.get(bond)?.bond;
    if (!spec || !this.operUp(bond)) return undefined;
    const members = this.bondMembers(bond).filter(member => this.operUp(member));
    if (spec.primary !== undefined && members.includes(spec.primary)) {
      return spec.primary;
    }
    return members[0];
  }

  bondMembers(bond: string): string[] {
    return this.links().filter(link => link.master === bond).map(link => link.name);
  }

  private learnNeighbor(address: string, dev: string, lladdr: string): void {
    this.neighbors.set(`${address} ${dev}`, `${address} dev ${dev} lladdr ${lladdr} REACHABLE`);
  }

  private segmentOf(link: SimulatedLink): string {
    if (link.name === this.options.managementInterface) return `nat:${this.node}`;
    if (link.kind === 'vlan') return `vlan:${link.vlanId ?? 0}`;
    return 'untagged';
  }

  private pathTo(address: string, dev?: string): PeerPath | undefined {
    const peers = this.options.peers?.() ?? [];
    for (const link of this.links()) {
      if (link.name === 'lo' || !this.operUp(link.name)) continue;
      if (dev !== undefined && link.name !== dev) continue;
      if (!link.addresses.some(cidr => onSubnetOf(address, cidr))) continue;
      for (const peer of peers) {
        if (peer === this || !peer.poweredOn) continue;
        const peerLink = peer.linkWithAddress(address);
        if (peerLink && peer.operUp(peerLink.name) && peer.segmentOf(peerLink) === this.segmentOf(link)) {
          return { link, peer, peerLink };
        }
      }
    }
    return undefined;
  }

  private ping(args: string[]): CommandOutcome {
    let count = 1;
    let dev: string | undefined;
    let target: string | undefined;
    for (let i = 0; i < args.length; i++) {
      const arg = args[i] ?? '';
      if (arg === '-c') count = Number(args[++i] ?? '1');
      else if (arg === '-I') dev = args[++i];
      else if (arg === '-W' || arg === '-w') i++;
      else if (!arg.startsWith('-')) target = arg;
    }
    if (target === undefined) return fail('ping: usage error: Destination address required', 2);
    if (!Number.isInteger(count) || count < 1) return fail(`ping: invalid argument: '${count}'`, 2);

    let source: SimulatedLink | undefined;
    if (dev !== undefined) {
      source = this.linkTable.get(dev);
      if (!source) return fail(`ping: SO_BINDTODEVICE ${dev}: No such device`, 2);
    } else {
      source = this.links().find(link =>
        link.name !== 'lo' && this.operUp(link.name) && link.addresses.some(cidr => onSubnetOf(target ?? '', cidr))
      );
      if (!source) return fail('ping: connect: Network is unreachable', 2);
    }

    const sourceAddress = source.addresses[0]?.split('/')[0];
    const header = dev !== undefined && sourceAddress !== undefined
      ? `PING ${target} (${target}) from ${sourceAddress} ${dev}: 56(84) bytes of data.\n`
      : `PING ${target} (${target}) 56(84) bytes of data.\n`;
    const summary = (received: number): string =>
      `\n--- ${target} ping statistics ---\n` +
      `${count} packets transmitted, ${received} received, ${received === count ? 0 : 100}% packet loss, time ${(count - 1) * 1000}ms\n`;

    const path = this.pathTo(target, source.name);
    if (!path || sourceAddress === undefined) {
      return { stdout: header + summary(0), stderr: '', exitCode: 1 };
    }
    this.learnNeighbor(target, path.link.name, macOf(path.peerLink));
    path.peer.learnNeighbor(sourceAddress, path.peerLink.name, macOf(path.link));
    let replies = '';
    for (let seq = 1; seq <= count; seq++) {
      replies += `64 bytes from ${target}: icmp_seq=${seq} ttl=64 time=0.412 ms\n`;
    }
    return ok(header + replies + summary(count));
  }

  powerOff(): void {
    this.poweredOn = false;
    for (const unit of this.units.keys()) {
      this.units.set(unit, 'inactive');
    }
  }

  run(argv: string[], stdin: string): CommandOutcome {
    const [command, ...args] = argv;
    switch (command) {
      case 'true':
      case 'mkdir':
      case 'sleep':
        return ok();
      case 'false':
        return { stdout: '', stderr: '', exitCode: 1 };
      case 'echo':
        return ok(`${args.join(' ')}\n`);
      case 'cat':
        return this.cat(args, stdin);
      case 'grep':
        return grep(args, stdin, path => this.readFile(path));
      case 'test':
        return this.test(args);
      case 'ln':
        return this.ln(args);
      case 'rm':
        args.filter(arg => !arg.startsWith('-')).forEach(path => this.files.delete(path));
        return ok();
      case 'modprobe':
        return this.modprobe(args);
      case 'lsmod':
        return ok(['Module                  Size  Used by', ...Array.from(this.modules).map(m => `${m.padEnd(24)}65536  0`)].join('\n') + '\n');
      case 'ip':
        return this.ip(args);
      case 'ping':
        return this.ping(args);
      case 'systemctl':
        return this.systemctl(args);
      case 'hostnamectl':
        if (args[0] === 'set-hostname' && args[1]) {
          return this.setHostname(args[1]);
        }
        return ok(`Static hostname: ${this.hostname}\n`);
      case 'hostname':
        return args[0] ? this.setHostname(args[0]) : ok(`${this.hostname}\n`);
      case 'journalctl':
        return this.journalctl(args);
      case 'k3s':
        if (args[0] === 'kubectl') {
          return this.runtime.kubectl(this, args.slice(1));
        }
        return fail(`k3s: unknown command "${args[0] ?? ''}"`);
      case 'kubectl':
        return this.runtime.kubectl(this, args);
      default:
        return fail(`sh: ${command ?? ''}: not found`, 127);
    }
  }

  private addLink(link: Omit<SimulatedLink, 'index'>): SimulatedLink {
    const created: SimulatedLink = { ...link, index: this.nextIndex++ };
    this.linkTable.set(created.name, created);
    return created;
  }

  private setHostname(name: string): CommandOutcome {
    this.hostname = name;
    this.files.set('/etc/hostname', `${name}\n`);
    return ok();
  }

  private cat(args: string[], stdin: string): CommandOutcome {
    if (args.length === 0) return ok(stdin);
    let stdout = '';
    for (const path of args) {
      const content = this.readFile(path);
      if (content === undefined) {
        return { stdout, stderr: `cat: ${path}: No such file or directory\n`, exitCode: 1 };
      }
      stdout += content;
    }
    return ok(stdout);
  }

  private test(args: string[]): CommandOutcome {
    const [flag, path] = args;
    if ((flag === '-e' || flag === '-f') && path !== undefined) {
      return { stdout: '', stderr: '', exitCode: this.fileExists(path) ? 0 : 1 };
    }
    return fail('test: unsupported expression', 2);
  }

  private ln(args: string[]): CommandOutcome {
    const operands = args.filter(arg => !arg.startsWith('-'));
    const [target, link] = operands;
    if (target === undefined || link === undefined) {
      return fail('ln: missing file operand');
    }
    if (this.files.has(link) && !args.some(arg => arg.startsWith('-') && arg.includes('f'))) {
      return fail(`ln: failed to create symbolic link '${link}': File exists`);
    }
    this.files.set(link, this.files.get(target) ?? '');
    return ok();
  }

  private modprobe(args: string[]): CommandOutcome {
    const module = args.find(arg => !arg.startsWith('-'));
    if (module === undefined) return fail('modprobe: missing module name');
    if (!this.options.availableModules.includes(module)) {
      return fail(`modprobe: FATAL: Module ${module} not found in directory /lib/modules/6.1.0-sim`);
    }
    this.modules.add(module);
    return ok();
  }

  private journalctl(args: string[]): CommandOutcome {
    const unitIndex = args.indexOf('-u');
    const countIndex = args.indexOf('-n');
    const unit = unitIndex >= 0 ? args[unitIndex + 1] : undefined;
    const count = countIndex >= 0 ? Number(args[countIndex + 1]) : Number.POSITIVE_INFINITY;
    const lines = unit === undefined
      ? Array.from(this.journals.values()).flat()
      : this.journal(unit);
    if (lines.length === 0) return ok('-- No entries --\n');
    return ok(lines.slice(-count).join('\n') + '\n');
  }

  private systemctl(args: string[]): CommandOutcome {
    const operands = args.filter(arg => !arg.startsWith('-'));
    const [verb, rawUnit] = operands;
    if (verb === 'daemon-reload') return ok();
    if (verb === undefined || rawUnit === undefined) return fail('systemctl: too few arguments');
    const unit = normalizeUnit(rawUnit);

    switch (verb) {
      case 'mask':
        this.masked.add(unit);
        return ok(`Created symlink /etc/systemd/system/${unit}.service → /dev/null.\n`);
      case 'unmask':
        this.masked.delete(unit);
        return ok();
      case 'enable':
      case 'disable':
        return ok();
      case 'stop':
        this.units.set(unit, 'inactive');
        this.runtime.stop(this, unit);
        return ok();
      case 'start':
      case 'restart':
        return this.startUnit(unit);
      case 'is-active': {
        const state = this.unitState(unit);
        return { stdout: `${state}\n`, stderr: '', exitCode: state === 'active' ? 0 : 3 };
      }
      case 'status': {
        const state = this.unitState(unit);
        const detail = state === 'active' ? 'active (running)' : state === 'failed' ? 'failed (Result: exit-code)' : 'inactive (dead)';
        const body = [`● ${unit}.service`, `     Loaded: ${this.masked.has(unit) ? 'masked' : 'loaded'}`, `     Active: ${detail}`, ...this.journal(unit).slice(-10)];
        return { stdout: body.join('\n') + '\n', stderr: '', exitCode: state === 'active' ? 0 : 3 };
      }
      default:
        return fail(`Unknown command verb ${verb}.`);
    }
  }

  private startUnit(unit: string): CommandOutcome {
    if (this.masked.has(unit)) {
      return fail(`Failed to start ${unit}.service: Unit ${unit}.service is masked.`);
    }

    // An unmasked networkd re-applies its own config whenever units change
    if (unit !== NETWORK_DAEMON && !this.masked.has(NETWORK_DAEMON)) {
      this.units.set(NETWORK_DAEMON, 'active');
      for (const link of this.links()) {
        if (link.name !== 'lo' && link.name !== this.options.managementInterface) {
          link.addresses = [];
        }
      }
    }

    const failure = this.runtime.start(this, unit);
    if (failure !== undefined) {
      this.units.set(unit, 'failed');
      this.log(unit, `${unit}[1]: level=fatal msg="${failure}"`);
      return fail(
        `Job for ${unit}.service failed because the control process exited with error code.\n` +
        `See "systemctl status ${unit}.service" and "journalctl -xeu ${unit}.service" for details.`
      );
    }
    this.units.set(unit, 'active');
    return ok();
  }

  private ip(args: string[]): CommandOutcome {
    let details = false;
    let brief = false;
    let i = 0;
    for (; i < args.length && (args[i] ?? '').startsWith('-'); i++) {
      const flag = args[i];
      if (flag === '-d' || flag === '-details') details = true;
      if (flag === '-br' || flag === '-brief') brief = true;
    }
    const object = args[i];
    const rest = args.slice(i + 1);

    switch (object) {
      case 'link':
      case 'l':
        return this.ipLink(rest, details);
      case 'addr':
      case 'address':
      case 'a':
        return this.ipAddr(rest, brief);
      case 'route':
      case 'r':
        return this.ipRoute(rest);
      case 'neigh':
      case 'neighbor':
      case 'n':
        return ok(Array.from(this.neighbors.values()).map(line => `${line}\n`).join(''));
      default:
        return fail(`Object "${object ?? ''}" is unknown, try "ip help".`, 255);
    }
  }

  private ipLink(args: string[], details: boolean): CommandOutcome {
    const [verb = 'show', ...rest] = args;
    switch (verb) {
      case 'show': {
        const name = rest[0] === 'dev' ? rest[1] : rest[0];
        if (name === undefined) {
          return ok(this.links().map(link => this.renderLink(link, details)).join(''));
        }
        const link = this.linkTable.get(name);
        return link ? ok(this.renderLink(link, details)) : fail(`Device "${name}" does not exist.`);
      }
      case 'add':
        return this.ipLinkAdd(rest);
      case 'set':
        return this.ipLinkSet(rest);
      case 'del':
      case 'delete':
        return this.ipLinkDel(rest[0] === 'dev' ? rest[1] : rest[0]);
      default:
        return fail(`Command "${verb}" is unknown, try "ip link help".`, 255);
    }
  }

  private ipLinkAdd(args: string[]): CommandOutcome {
    const keywords: Record<string, string> = {};
    let name: string | undefined;
    for (let i = 0; i < args.length; i++) {
      const word = args[i] ?? '';
      if (['link', 'name', 'type', 'id', 'mode', 'miimon', 'primary'].includes(word)) {
        keywords[word] = args[i + 1] ?? '';
        i++;
      } else if (name === undefined) {
        name = word;
      }
    }
    name = keywords.name ?? name;
    if (name === undefined) return fail('Not enough information: "dev" argument is required.');
    if (this.linkTable.has(name)) return fail('RTNETLINK answers: File exists', 2);

    if (keywords.type === 'vlan') {
      const parent = keywords.link;
      const id = Number(keywords.id);
      if (parent === undefined || !this.linkTable.has(parent)) {
        return fail(`Cannot find device "${parent ?? ''}"`);
      }
      if (!Number.isInteger(id) || id < 1 || id > 4094) return fail('Error: argument is wrong: id', 255);
      if (!this.modules.has('8021q')) return fail('RTNETLINK answers: Operation not supported', 2);
      this.addLink({ name, kind: 'vlan', adminUp: false, carrier: true, addresses: [], parent, vlanId: id });
      return ok();
    }

    if (keywords.type === 'bond') {
      if (!this.modules.has('bonding')) return fail('RTNETLINK answers: Operation not supported', 2);
      const mode = keywords.mode ?? 'balance-rr';
      if (BOND_MODE_NUMBERS[mode] === undefined) return fail(`Error: invalid mode "${mode}"`, 255);
      const bond: { mode: string; miimon: number; primary?: string } = { mode, miimon: Number(keywords.miimon ?? 0) };
      if (keywords.primary !== undefined) bond.primary = keywords.primary;
      this.addLink({ name, kind: 'bond', adminUp: false, carrier: true, addresses: [], bond });
      return ok();
    }

    return fail(`Error: unknown link type "${keywords.type ?? ''}"`, 2);
  }

  private ipLinkSet(args: string[]): CommandOutcome {
    const name = args[0] === 'dev' ? args[1] : args[0];
    const rest = args.slice(args[0] === 'dev' ? 2 : 1);
    const link = name === undefined ? undefined : this.linkTable.get(name);
    if (!link) return fail(`Cannot find device "${name ?? ''}"`);

    for (let i = 0; i < rest.length; i++) {
      const word = rest[i];
      if (word === 'up') {
        link.adminUp = true;
      } else if (word === 'down') {
        link.adminUp = false;
      } else if (word === 'master') {
        const masterName = rest[i + 1] ?? '';
        i++;
        const master = this.linkTable.get(masterName);
        if (!master || master.kind !== 'bond') return fail(`Cannot find device "${masterName}"`);
        if (link.master === masterName) continue;
        if (link.adminUp) return fail('Error: Device can not be enslaved while up.', 2);
        link.master = masterName;
      } else if (word === 'nomaster') {
        delete link.master;
      }
    }
    return ok();
  }

  private ipLinkDel(name: string | undefined): CommandOutcome {
    if (name === undefined || !this.linkTable.has(name)) {
      return fail(`Cannot find device "${name ?? ''}"`);
    }
    this.linkTable.delete(name);
    for (const link of this.links()) {
      if (link.parent === name) this.linkTable.delete(link.name);
      if (link.master === name) delete link.master;
    }
    for (let i = this.routes.length - 1; i >= 0; i--) {
      const route = this.routes[i];
      if (route && !this.linkTable.has(route.dev)) this.routes.splice(i, 1);
    }
    return ok();
  }

  private ipAddr(args: string[], brief: boolean): CommandOutcome {
    const [verb = 'show', ...rest] = args;
    const devIndex = rest.indexOf('dev');
    const dev = devIndex >= 0 ? rest[devIndex + 1] : undefined;

    switch (verb) {
      case 'show':
      case 'list': {
        const name = dev ?? rest[0];
        const links = name === undefined ? this.links() : [this.linkTable.get(name)];
        let output = '';
        for (const link of links) {
          if (!link) return fail(`Device "${name ?? ''}" does not exist.`);
          output += brief ? this.renderBrief(link) : this.renderAddresses(link);
        }
        return ok(output);
      }
      case 'flush': {
        const link = dev === undefined ? undefined : this.linkTable.get(dev);
        if (!link) return fail(`Device "${dev ?? ''}" does not exist.`);
        link.addresses = [];
        return ok();
      }
      case 'add': {
        const address = rest[0];
        const link = dev === undefined ? undefined : this.linkTable.get(dev);
        if (!link) return fail(`Cannot find device "${dev ?? ''}"`);
        if (address === undefined || !address.includes('/')) return fail(`Error: any valid prefix is expected rather than "${address ?? ''}".`);
        if (link.addresses.includes(address)) return fail('RTNETLINK answers: File exists', 2);
        link.addresses.push(address);
        return ok();
      }
      default:
        return fail(`Command "${verb}" is unknown, try "ip addr help".`, 255);
    }
  }

  private ipRoute(args: string[]): CommandOutcome {
    const [verb = 'show', ...rest] = args;
    switch (verb) {
      case 'show':
      case 'list': {
        const onlyDefault = rest[0] === 'default';
        const lines: string[] = [];
        for (const route of this.routes) {
          lines.push(`${route.destination} via ${route.via} dev ${route.dev}`);
        }
        if (!onlyDefault) {
          for (const link of this.links()) {
            if (link.name === 'lo' || !this.operUp(link.name)) continue;
            for (const cidr of link.addresses) {
              const [address = '', prefix] = cidr.split('/');
              lines.push(`${networkOf(address, Number(prefix))} dev ${link.name} proto kernel scope link src ${address}`);
            }
          }
        }
        return ok(lines.map(line => `${line}\n`).join(''));
      }
      case 'add': {
        const destination = rest[0];
        const viaIndex = rest.indexOf('via');
        const devIndex = rest.indexOf('dev');
        const via = viaIndex >= 0 ? rest[viaIndex + 1] : undefined;
        const dev = devIndex >= 0 ? rest[devIndex + 1] : undefined;
        const link = dev === undefined ? undefined : this.linkTable.get(dev);
        if (destination === undefined || via === undefined || !link) {
          return fail(`Cannot find device "${dev ?? ''}"`);
        }
        const onLink = link.addresses.some(cidr => {
          const [address = '', prefix] = cidr.split('/');
          return inSubnet(via, networkOf(address, Number(prefix)));
        });
        if (!onLink) return fail('Error: Nexthop has invalid gateway.', 2);
        if (this.routes.some(route => route.destination === destination)) {
          return fail('RTNETLINK answers: File exists', 2);
        }
        this.routes.push({ destination, via, dev: link.name });
        return ok();
      }
      default:
        return fail(`Command "${verb}" is unknown, try "ip route help".`, 255);
    }
  }

  private displayName(link: SimulatedLink): string {
    return link.kind === 'vlan' && link.parent ? `${link.name}@${link.parent}` : link.name;
  }

  private operState(link: SimulatedLink): string {
    if (this.operUp(link.name)) return 'UP';
    if (link.adminUp) return 'LOWER_LAYER_DOWN';
    return 'DOWN';
  }

  private renderLink(link: SimulatedLink, details: boolean): string {
    const flags = ['BROADCAST', 'MULTICAST'];
    if (link.kind === 'bond') flags.push('MASTER');
    if (link.master) flags.push('SLAVE');
    if (link.adminUp) flags.push('UP');
    if (this.operUp(link.name)) flags.push('LOWER_UP');

    const master = link.master ? ` master ${link.master}` : '';
    let out = `${link.index}: ${this.displayName(link)}: <${flags.join(',')}> mtu 1500 qdisc noqueue${master} state ${this.operState(link)} mode DEFAULT group default qlen 1000\n`;
    out += `    link/ether ${macOf(link)} brd ff:ff:ff:ff:ff:ff\n`;

    if (details) {
      if (link.kind === 'vlan' && link.vlanId !== undefined) {
        out += `    vlan protocol 802.1Q id ${link.vlanId} <REORDER_HDR>\n`;
      }
      if (link.kind === 'bond' && link.bond) {
        const active = this.activeBondMember(link.name);
        out += `    bond mode ${link.bond.mode}${active ? ` active_slave ${active}` : ''} miimon ${link.bond.miimon}\n`;
      }
      if (link.master) {
        const active = this.activeBondMember(link.master);
        out += `    bond_slave state ${active === link.name ? 'ACTIVE' : 'BACKUP'}\n`;
      }
    }
    return out;
  }

  private renderBrief(link: SimulatedLink): string {
    const linkLocal = this.linkLocalOf(link);
    const addresses = linkLocal === undefined ? link.addresses : [...link.addresses, linkLocal];
    return `${this.displayName(link).padEnd(16)} ${this.operState(link).padEnd(14)} ${addresses.join(' ')} \n`;
  }

  private renderAddresses(link: SimulatedLink): string {
    let out = this.renderLink(link, false);
    for (const cidr of link.addresses) {
      out += `    inet ${cidr} scope global ${link.name}\n`;
    }
    const linkLocal = this.linkLocalOf(link);
    if (linkLocal !== undefined) {
      out += `    inet6 ${linkLocal} scope link\n`;
    }
    return out;
  }

  /** EUI-64 address derived from the link's MAC */
  private linkLocalOf(link: SimulatedLink): string | undefined {
    if (!this.options.ipv6LinkLocal || link.name === 'lo' || !this.operUp(link.name)) return undefined;
    return `fe80::5054:ff:fe12:34${hexByte(link.index)}/64`;
  }

  private renderBondStatus(bond: string): string | undefined {
    const spec = this.linkTable.get(bond)?.bond;
    if (!spec) return undefined;
    const modeLabel = spec.mode === 'active-backup' ? 'fault-tolerance (active-backup)' : spec.mode;
    const lines = [
      'Ethernet Channel Bonding Driver: v6.1.0',
      '',
      `Bonding Mode: ${modeLabel}`
    ];
    if (spec.primary) lines.push(`Primary Slave: ${spec.primary} (primary_reselect always)`);
    lines.push(
      `Currently Active Slave: ${this.activeBondMember(bond) ?? 'None'}`,
      `MII Status: ${this.operUp(bond) ? 'up' : 'down'}`,
      `MII Polling Interval (ms): ${spec.miimon}`
    );
    for (const member of this.bondMembers(bond)) {
      lines.push('', `Slave Interface: ${member}`, `MII Status: ${this.operUp(member) ? 'up' : 'down'}`);
    }
    return lines.join('\n') + '\n';
  }
}

export function normalizeUnit(unit: string): string {
  return unit.endsWith('.service') ? unit.slice(0, -'.service'.length) : unit;
}

function grep(args: string[], stdin: string, readFile: (path: string) => string | undefined): CommandOutcome {
  let quiet = false;
  let word = false;
  let ignoreCase = false;
  const operands: string[] = [];
  for (const arg of args) {
    if (arg.startsWith('-') && arg.length > 1 && operands.length === 0) {
      quiet = quiet || arg.includes('q');
      word = word || arg.includes('w');
      ignoreCase = ignoreCase || arg.includes('i');
    } else {
      operands.push(arg);
    }
  }

  const [pattern, file] = operands;
  if (pattern === undefined) return fail('Usage: grep [OPTION]... PATTERNS [FILE]...', 2);
  let input = stdin;
  if (file !== undefined) {
    const content = readFile(file);
    if (content === undefined) return fail(`grep: ${file}: No such file or directory`, 2);
    input = content;
  }

  let regex: RegExp;
  try {
    regex = new RegExp(word ? `(^|[^A-Za-z0-9_])(${pattern})([^A-Za-z0-9_]|$)` : pattern, ignoreCase ? 'i' : '');
  } catch {
    return fail(`grep: Invalid regular expression '${pattern}'`, 2);
  }

  const matches = input.split('\n').filter((line, index, lines) => !(index === lines.length - 1 && line === '')).filter(line => regex.test(line));
  return {
    stdout: quiet ? '' : matches.map(line => `${line}\n`).join(''),
    stderr: '',
    exitCode: matches.length > 0 ? 0 : 1
  };
}

function hexByte(value: number): string {
  return value.toString(16).padStart(2, '0');
}

function macOf(link: SimulatedLink): string {
  return `52:54:00:12:34:${hexByte(link.index)}`;
}

function onSubnetOf(address: string, cidr: string): boolean {
  const [local = '', prefix] = cidr.split('/');
  return inSubnet(address, networkOf(local, Number(prefix)));
}
