import * as yaml from 'js-yaml';
import * as path from 'path';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { NodeSpec, TopologyKind, isTopologyKind, DEFAULT_NODE_IMAGE, DEFAULT_NODE_RESOURCES } from '../types';
import { ConfigurationError, errorMessage } from '../common/errors';
import { FormationTimeouts } from '../formation/types';
import { TopologyProfileDefinition } from '../topology/types';
import { isRecord, parseTopologyDefinition } from '../topology/parse';
import { OrchestratorConfig, OrchestratorOptions } from './OrchestratorConfig';

/**
 * Run configuration file, e.g.
 *
 * ```yaml
 * cluster:
 *   name: vlan-ha
 * topology: vlan                  # preset name, or
 * profile: ./profiles/custom.yaml # profile file (relative to this file), or inline mapping
 * nodes:
 *   - { name: server-1, role: server, primary: true }
 *   - { name: server-2, role: server }
 *   - { name: agent-1, role: agent, memory_mb: 2048 }
 * timeouts: { boot: 120, port: 120, api_ready: 300, node_ready: 300, cluster_ready: 60, global: 1800 }
 * retry: { attempts: 3, settle_delay_ms: 1000 }
 * fleet: { driver: simulate, poll_interval_ms: 5000 }
 * resilience: true
 * script: ./checks.yaml
 * environments:
 *   ci: { timeouts: { node_ready: 600 } }
 * ```
 *
 * Timeouts are in seconds.
 */
export interface ClusterConfigFile {
  cluster?: { name?: string };
  topology?: string;
  profile?: string | Record<string, unknown>;
  nodes?: Array<Record<string, unknown>>;
  timeouts?: Record<string, unknown>;
  retry?: Record<string, unknown>;
  fleet?: Record<string, unknown>;
  resilience?: boolean;
  script?: string;
  environments?: Record<string, Omit<ClusterConfigFile, 'environments'>>;
}

export interface ResolvedRunConfig {
  name?: string;
  topology?: TopologyKind;
  profile?: TopologyProfileDefinition;
  profilePath?: string;
  nodes?: NodeSpec[];
  orchestrator: OrchestratorOptions;
  driver?: string;
  scriptPath?: string;
}

const TIMEOUT_KEYS: Record<string, keyof FormationTimeouts> = {
  boot: 'bootMs',
  port: 'portMs',
  api_ready: 'apiReadyMs',
  node_ready: 'nodeReadyMs',
  cluster_ready: 'clusterReadyMs'
};

/**
 * YAML run configuration loader with per-environment overrides
 *
 * Emits 'config-loaded' and 'config-error'.
 */
export class YamlClusterConfiguration extends EventEmitter {
  private config: ClusterConfigFile | null = null;
  private configPath: string | null = null;
  private currentEnvironment: string;

  constructor(environment: string = process.env.CLUSTERFORM_ENV ?? 'default') {
    super();
    this.currentEnvironment = environment;
  }

  async loadFromFile(filePath: string): Promise<void> {
    try {
      const content = await fs.readFile(filePath, 'utf8');
      this.config = this.parseFromYaml(content);
      this.configPath = filePath;
      this.applyEnvironmentOverrides();
      this.emit('config-loaded', { filePath, config: this.config });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      throw new ConfigurationError(`Failed to load configuration from ${filePath}: ${errorMessage(error)}`);
    }
  }

  parseFromYaml(content: string): ClusterConfigFile {
    let parsed: unknown;
    try {
      parsed = yaml.load(content);
    } catch (error) {
      throw new ConfigurationError(`Failed to parse YAML configuration: ${errorMessage(error)}`);
    }
    return this.validateConfiguration(parsed);
  }

  /** Load from an already-parsed object (tests, embedding) */
  loadFromObject(raw: unknown): void {
    this.config = this.validateConfiguration(raw);
    this.configPath = null;
    this.applyEnvironmentOverrides();
  }

  getConfig(): ClusterConfigFile | null {
    return this.config;
  }

  setEnvironment(environment: string): void {
    this.currentEnvironment = environment;
    this.applyEnvironmentOverrides();
  }

  /**
   * Resolve into typed settings. File references are resolved relative to
   * the configuration file.
   */
  async resolve(): Promise<ResolvedRunConfig> {
    if (!this.config) {
      throw new ConfigurationError('No configuration loaded');
    }
    const config = this.config;
    const resolved: ResolvedRunConfig = { orchestrator: this.toOrchestratorOptions(config) };

    if (config.cluster?.name !== undefined) resolved.name = config.cluster.name;
    if (config.topology !== undefined) {
      if (!isTopologyKind(config.topology)) {
        throw new ConfigurationError(`topology must be one of flat, vlan, bonded-vlan (got '${config.topology}')`);
      }
      resolved.topology = config.topology;
    }
    if (typeof config.profile === 'string') {
      resolved.profilePath = this.relative(config.profile);
    } else if (config.profile !== undefined) {
      resolved.profile = parseTopologyDefinition(config.profile, 'profile');
    }
    if (config.nodes !== undefined) resolved.nodes = config.nodes.map(parseNodeEntry);
    if (typeof config.fleet?.driver === 'string') resolved.driver = config.fleet.driver;
    if (config.script !== undefined) resolved.scriptPath = this.relative(config.script);

    return resolved;
  }

  static mergeConfigurations(base: ClusterConfigFile, override: Omit<ClusterConfigFile, 'environments'>): ClusterConfigFile {
    const merged: ClusterConfigFile = { ...base, ...override };
    if (base.cluster || override.cluster) merged.cluster = { ...base.cluster, ...override.cluster };
    if (base.timeouts || override.timeouts) merged.timeouts = { ...base.timeouts, ...override.timeouts };
    if (base.retry || override.retry) merged.retry = { ...base.retry, ...override.retry };
    if (base.fleet || override.fleet) merged.fleet = { ...base.fleet, ...override.fleet };
    return merged;
  }

  private toOrchestratorOptions(config: ClusterConfigFile): OrchestratorOptions {
    const options: OrchestratorOptions = {};

    const timeouts: Partial<FormationTimeouts> = {};
    for (const [key, value] of Object.entries(config.timeouts ?? {})) {
      const seconds = positiveNumber(value, `timeouts.${key}`);
      const field = TIMEOUT_KEYS[key];
      if (field) {
        timeouts[field] = seconds * 1000;
      } else if (key === 'global') {
        options.globalTimeoutMs = seconds * 1000;
      } else {
        throw new ConfigurationError(`Unknown timeout '${key}'`);
      }
    }
    if (Object.keys(timeouts).length > 0) options.timeouts = timeouts;

    if (config.retry) {
      options.retry = {};
      if (config.retry.attempts !== undefined) options.retry.attempts = positiveNumber(config.retry.attempts, 'retry.attempts');
      if (config.retry.settle_delay_ms !== undefined) {
        options.retry.settleDelayMs = positiveNumber(config.retry.settle_delay_ms, 'retry.settle_delay_ms');
      }
    }
    if (config.fleet?.poll_interval_ms !== undefined) {
      options.pollIntervalMs = positiveNumber(config.fleet.poll_interval_ms, 'fleet.poll_interval_ms');
    }
    if (config.resilience !== undefined) options.resilience = config.resilience;

    return OrchestratorConfig.merge({}, options);
  }

  private validateConfiguration(raw: unknown): ClusterConfigFile {
    if (!isRecord(raw)) {
      throw new ConfigurationError('Configuration must be a YAML mapping');
    }
    const config: ClusterConfigFile = {};

    if (raw.cluster !== undefined) {
      if (!isRecord(raw.cluster)) throw new ConfigurationError('cluster must be a mapping');
      const name = raw.cluster.name;
      if (name !== undefined && typeof name !== 'string') throw new ConfigurationError('cluster.name must be a string');
      config.cluster = name === undefined ? {} : { name };
    }
    if (raw.topology !== undefined) {
      if (typeof raw.topology !== 'string') throw new ConfigurationError('topology must be a string');
      config.topology = raw.topology;
    }
    if (raw.profile !== undefined) {
      if (typeof raw.profile !== 'string' && !isRecord(raw.profile)) {
        throw new ConfigurationError('profile must be a file path or a mapping');
      }
      config.profile = raw.profile;
    }
    if (raw.topology !== undefined && raw.profile !== undefined) {
      throw new ConfigurationError('topology and profile are mutually exclusive');
    }
    if (raw.nodes !== undefined) {
      if (!Array.isArray(raw.nodes) || !raw.nodes.every(isRecord)) {
        throw new ConfigurationError('nodes must be a list of mappings');
      }
      config.nodes = raw.nodes;
    }
    for (const section of ['timeouts', 'retry', 'fleet'] as const) {
      const value = raw[section];
      if (value === undefined) continue;
      if (!isRecord(value)) throw new ConfigurationError(`${section} must be a mapping`);
      config[section] = value;
    }
    if (raw.resilience !== undefined) {
      if (typeof raw.resilience !== 'boolean') throw new ConfigurationError('resilience must be true or false');
      config.resilience = raw.resilience;
    }
    if (raw.script !== undefined) {
      if (typeof raw.script !== 'string') throw new ConfigurationError('script must be a file path');
      config.script = raw.script;
    }
    if (raw.environments !== undefined) {
      if (!isRecord(raw.environments)) throw new ConfigurationError('environments must be a mapping');
      const environments: Record<string, Omit<ClusterConfigFile, 'environments'>> = {};
      for (const [name, overrides] of Object.entries(raw.environments)) {
        const { environments: nested, ...rest } = this.validateConfiguration(overrides);
        if (nested !== undefined) {
          throw new ConfigurationError(`environments.${name} cannot declare nested environments`);
        }
        environments[name] = rest;
      }
      config.environments = environments;
    }
    return config;
  }

  private applyEnvironmentOverrides(): void {
    const overrides = this.config?.environments?.[this.currentEnvironment];
    if (!this.config || !overrides) {
      return;
    }
    this.config = YamlClusterConfiguration.mergeConfigurations(this.config, overrides);
  }

  private relative(file: string): string {
    return this.configPath ? path.resolve(path.dirname(this.configPath), file) : path.resolve(file);
  }
}

function positiveNumber(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${field} must be a positive number`);
  }
  return value;
}

function parseNodeEntry(entry: Record<string, unknown>, index: number): NodeSpec {
  const { name, role, primary, memory_mb: memoryMb, cpus, image } = entry;
  if (typeof name !== 'string' || name.length === 0) {
    throw new ConfigurationError(`nodes[${index}].name is required`);
  }
  if (role !== 'server' && role !== 'agent') {
    throw new ConfigurationError(`nodes[${index}].role must be server or agent`);
  }
  if (primary !== undefined && typeof primary !== 'boolean') {
    throw new ConfigurationError(`nodes[${index}].primary must be true or false`);
  }
  if (image !== undefined && typeof image !== 'string') {
    throw new ConfigurationError(`nodes[${index}].image must be a string`);
  }
  return {
    name,
    role,
    primary: primary ?? false,
    resources: {
      memoryMb: memoryMb === undefined ? DEFAULT_NODE_RESOURCES.memoryMb : positiveNumber(memoryMb, `nodes[${index}].memory_mb`),
      cpus: cpus === undefined ? DEFAULT_NODE_RESOURCES.cpus : positiveNumber(cpus, `nodes[${index}].cpus`)
    },
    image: image ?? DEFAULT_NODE_IMAGE
  };
}
