import { VmFleetManager } from '../fleet/types';
import { ServiceProfile } from './ServiceProfile';

export interface RegistryEntry {
  name: string;
  status: string;
  roles: string;
  age: string;
  version: string;
}

/**
 * Parse `kubectl get nodes --no-headers` output
 */
export function parseRegistry(output: string): RegistryEntry[] {
  return output
    .split('\n')
    .map(line => line.trim().split(/\s+/))
    .filter(columns => columns.length >= 2 && columns[0] !== '' && columns[0] !== 'NAME')
    .map(([name = '', status = '', roles = '', age = '', version = '']) => ({ name, status, roles, age, version }));
}

/** Status may carry conditions, e.g. Ready,SchedulingDisabled */
export function isReadyEntry(entry: RegistryEntry): boolean {
  return entry.status.split(',').includes('Ready');
}

/**
 * Membership as reported by the primary, the authoritative view
 */
export class NodeRegistry {
  constructor(
    private readonly fleet: VmFleetManager,
    private readonly service: ServiceProfile,
    private readonly primary: string
  ) {}

  /** undefined while the API cannot answer */
  async snapshot(): Promise<RegistryEntry[] | undefined> {
    const result = await this.fleet.exec(this.primary, this.service.registryCommand);
    return result.exitCode === 0 ? parseRegistry(result.output) : undefined;
  }

  async entry(node: string): Promise<RegistryEntry | undefined> {
    return (await this.snapshot())?.find(entry => entry.name === node);
  }

  async isReady(node: string): Promise<boolean> {
    const entry = await this.entry(node);
    return entry !== undefined && isReadyEntry(entry);
  }

  async readyNodes(): Promise<string[]> {
    return ((await this.snapshot()) ?? []).filter(isReadyEntry).map(entry => entry.name);
  }
}
