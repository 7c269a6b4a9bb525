import { randomBytes } from 'crypto';

/**
 * Generate a random ID using crypto random bytes
 */
export function createId(): string {
  return randomBytes(16).toString('hex');
}

/**
 * Delay utility for async operations. Resolves early (without throwing) when
 * the signal aborts so pollers can re-check their abort state.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    timer.unref(); // Prevent Jest hanging
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Validate a dotted-quad IPv4 address
 */
export function isValidIPv4(address: string): boolean {
  const ipv4Pattern = /^(\d{1,3}\.){3}\d{1,3}$/;
  if (!ipv4Pattern.test(address)) {
    return false;
  }
  return address.split('.').map(Number).every(part => part >= 0 && part <= 255);
}

/**
 * Network prefix of an address, e.g. ('192.168.200.1', 24) -> '192.168.200.0/24'
 */
export function networkOf(address: string, prefixLength: number): string {
  const value = address.split('.').map(Number).reduce((acc, octet) => (acc * 256) + octet, 0);
  const size = 2 ** (32 - prefixLength);
  const base = Math.floor(value / size) * size;
  const octets = [24, 16, 8, 0].map(shift => Math.floor(base / 2 ** shift) % 256);
  return `${octets.join('.')}/${prefixLength}`;
}

/**
 * Highest usable host of a block, the conventional gateway slot
 * ('192.168.200.0/24' -> '192.168.200.254')
 */
export function lastHostOf(cidr: string): string {
  const [network, prefix] = cidr.split('/');
  const prefixLength = Number(prefix);
  const value = (network ?? '').split('.').map(Number).reduce((acc, octet) => (acc * 256) + octet, 0);
  const last = value + (2 ** (32 - prefixLength)) - 2;
  return [24, 16, 8, 0].map(shift => Math.floor(last / 2 ** shift) % 256).join('.');
}

/**
 * Whether an address falls inside a CIDR block
 */
export function inSubnet(address: string, cidr: string): boolean {
  const [network, prefix] = cidr.split('/');
  const prefixLength = Number(prefix);
  if (!isValidIPv4(address) || !network || !Number.isInteger(prefixLength)) {
    return false;
  }
  return networkOf(address, prefixLength) === `${network}/${prefixLength}`;
}

/**
 * Quote a value for a POSIX shell command line
 */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./:=@%+,-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
