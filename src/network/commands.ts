/**
 * Typed builders for the shell commands run on cluster VMs. Every builder
 * returns a command that can be re-run against an already-configured node
 * without changing the outcome.
 */

import { RemoteCommand } from '../types';

export type NetworkCommand = RemoteCommand;

export const NETWORK_DAEMON_UNIT = 'systemd-networkd.service';

export function maskNetworkDaemon(unit: string = NETWORK_DAEMON_UNIT): NetworkCommand[] {
  return [
    {
      description: `mask ${unit} so service restarts cannot re-trigger it`,
      command: `systemctl mask ${unit}`
    },
    {
      description: `stop ${unit}`,
      command: `systemctl stop ${unit} || true`
    }
  ];
}

export function ensureKernelModule(module: string): NetworkCommand {
  return {
    description: `ensure kernel module ${module}`,
    command: `modprobe ${module} || lsmod | grep -q '^${module}'`
  };
}

export function linkUp(iface: string): NetworkCommand {
  return { description: `bring ${iface} up`, command: `ip link set ${iface} up` };
}

export function linkDown(iface: string): NetworkCommand {
  return { description: `bring ${iface} down`, command: `ip link set ${iface} down` };
}

export function flushAddresses(iface: string): NetworkCommand {
  return { description: `flush addresses on ${iface}`, command: `ip addr flush dev ${iface}` };
}

export function assignAddress(address: string, prefixLength: number, iface: string): NetworkCommand {
  return {
    description: `assign ${address}/${prefixLength} to ${iface}`,
    command: `ip addr add ${address}/${prefixLength} dev ${iface}`
  };
}

export function ensureVlanInterface(parent: string, name: string, vlanId: number): NetworkCommand {
  return {
    description: `create VLAN ${vlanId} sub-interface ${name} on ${parent}`,
    command: `ip link show ${name} >/dev/null 2>&1 || ip link add link ${parent} name ${name} type vlan id ${vlanId}`
  };
}

/**
 * Drops a pre-existing bond whose mode is not the requested one (images may
 * ship an 802.3ad bond that the virtual switch cannot negotiate).
 */
export function dropMismatchedBond(bond: string, mode: string): NetworkCommand {
  return {
    description: `remove ${bond} if it exists in a mode other than ${mode}`,
    command: `grep -q '${mode}' /sys/class/net/${bond}/bonding/mode 2>/dev/null || ip link del ${bond} 2>/dev/null || true`
  };
}

export function ensureBond(bond: string, mode: string, monitorIntervalMs: number, primary?: string): NetworkCommand {
  const primaryArg = primary ? ` primary ${primary}` : '';
  return {
    description: `create ${bond} (${mode}, miimon ${monitorIntervalMs})`,
    command: `ip link show ${bond} >/dev/null 2>&1 || ip link add ${bond} type bond mode ${mode} miimon ${monitorIntervalMs}${primaryArg}`
  };
}

export function enslave(member: string, bond: string): NetworkCommand[] {
  return [
    {
      description: `take ${member} down unless already enslaved to ${bond}`,
      command: `ip link show ${member} | grep -q 'master ${bond}' || ip link set ${member} down`
    },
    {
      description: `enslave ${member} to ${bond}`,
      command: `ip link set ${member} master ${bond}`
    }
  ];
}

/**
 * Replace every occurrence of a secret with a fixed marker
 */
export function redact(text: string, secret?: string): string {
  if (!secret) {
    return text;
  }
  return text.split(secret).join('<redacted>');
}
