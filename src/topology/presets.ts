import * as yaml from 'js-yaml';
import * as path from 'path';
import { existsSync, promises as fs } from 'fs';
import { TopologyKind, TOPOLOGY_KINDS } from '../types';
import { ConfigurationError, errorMessage } from '../common/errors';
import { TopologyProfileDefinition } from './types';
import { parseTopologyDefinition } from './parse';

/**
 * profiles/ sits at the package root: two levels above this file when run
 * from sources, three when run from dist/.
 */
export function presetDirectory(): string {
  const candidates = [
    path.resolve(__dirname, '..', '..', 'profiles'),
    path.resolve(__dirname, '..', '..', '..', 'profiles')
  ];
  const found = candidates.find(candidate => existsSync(candidate));
  if (!found) {
    throw new ConfigurationError(`Preset directory not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

export async function loadProfileFile(filePath: string): Promise<TopologyProfileDefinition> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read topology profile ${filePath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse topology profile ${filePath}: ${errorMessage(error)}`);
  }
  return parseTopologyDefinition(parsed, filePath);
}

export function loadPreset(kind: TopologyKind): Promise<TopologyProfileDefinition> {
  return loadProfileFile(path.join(presetDirectory(), `${kind}.yaml`));
}

export async function listPresets(): Promise<TopologyProfileDefinition[]> {
  return Promise.all(TOPOLOGY_KINDS.map(kind => loadPreset(kind)));
}
