import chalk from 'chalk';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { NodeState } from '../../../src/types';
import { ConfigurationError, MissingAddressError } from '../../../src/common/errors';
import { CommandFleetManager } from '../../../src/fleet/CommandFleetManager';
import { SimulatedFleet } from '../../../src/fleet/SimulatedFleet';
import { RunReport } from '../../../src/orchestrator/Orchestrator';
import { formatReport, presetKind, reportToJson, resolveRunPlan } from '../../../src/cli/run';
import { SpyLogger } from '../../helpers/spyLogger';

describe('resolveRunPlan', () => {
  let tempDir: string;
  const logger = new SpyLogger();

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'clusterform-cli-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('defaults to the flat preset and the three-node cluster', async () => {
    const plan = await resolveRunPlan({ simulate: true }, logger, {});

    expect(plan.profile.kind).toBe('flat');
    expect(plan.nodes.map(node => `${node.name}:${node.role}${node.primary ? ':primary' : ''}`)).toEqual([
      'server-1:server:primary', 'server-2:server', 'agent-1:agent'
    ]);
    expect(plan.script).toEqual([]);
    expect(plan.fleet).toBeInstanceOf(SimulatedFleet);
    expect(plan.config.resilience).toBe(false);
  });

  it('lets flags beat the config file and the file beat the environment', async () => {
    const file = path.join(tempDir, 'run.yaml');
    await fs.writeFile(file, 'topology: bonded-vlan\ntimeouts: { global: 200 }\nfleet: { poll_interval_ms: 50 }\n');
    const env = { CLUSTERFORM_TIMEOUT: '100', CLUSTERFORM_POLL_INTERVAL_MS: '25' };

    const fromFile = await resolveRunPlan({ simulate: true, config: file }, logger, env);
    expect(fromFile.profile.kind).toBe('bonded-vlan');
    expect(fromFile.config.globalTimeoutMs).toBe(200_000);
    expect(fromFile.config.pollIntervalMs).toBe(50);

    const fromFlags = await resolveRunPlan({ simulate: true, config: file, timeout: '300', topology: 'vlan', resilience: true }, logger, env);
    expect(fromFlags.profile.kind).toBe('vlan');
    expect(fromFlags.config.globalTimeoutMs).toBe(300_000);
    expect(fromFlags.config.resilience).toBe(true);
  });

  it('reads the node map and script from flags', async () => {
    const script = path.join(tempDir, 'checks.yaml');
    await fs.writeFile(script, '- node: "*"\n  command: hostname\n');

    const plan = await resolveRunPlan({ simulate: true, nodes: 'a=server:primary,b=agent', script }, logger, {});

    expect(plan.nodes.map(node => node.name)).toEqual(['a', 'b']);
    expect(plan.script).toEqual([{ name: 'hostname', node: '*', command: 'hostname', expectExitCode: 0 }]);
  });

  it('uses an external driver when one is named', async () => {
    const plan = await resolveRunPlan({ driver: '/usr/local/bin/vmctl' }, logger, {});
    expect(plan.fleet).toBeInstanceOf(CommandFleetManager);

    const fromEnv = await resolveRunPlan({}, logger, { CLUSTERFORM_DRIVER: '/usr/local/bin/vmctl' });
    expect(fromEnv.fleet).toBeInstanceOf(CommandFleetManager);
  });

  it('refuses to guess a fleet driver', async () => {
    await expect(resolveRunPlan({}, logger, {})).rejects.toThrow('No fleet driver: pass --simulate or --driver <executable>');
    await expect(resolveRunPlan({ simulate: true, driver: 'vmctl' }, logger, {}))
      .rejects.toThrow('--simulate and --driver are mutually exclusive');
  });

  it('rejects unknown presets and conflicting profile sources', async () => {
    expect(() => presetKind('mesh')).toThrow("--topology must be one of flat, vlan, bonded-vlan (got 'mesh')");
    await expect(resolveRunPlan({ simulate: true, topology: 'vlan', profile: 'x.yaml' }, logger, {}))
      .rejects.toThrow(ConfigurationError);
    await expect(resolveRunPlan({ simulate: true, timeout: 'later' }, logger, {}))
      .rejects.toThrow("--timeout must be a positive number (got 'later')");
  });
});

describe('report output', () => {
  const failed: RunReport = {
    verdict: 'fail',
    topology: 'vlan',
    timeline: [],
    nodeStates: { 'server-1': NodeState.READY, 'agent-1': NodeState.FAILED },
    diagnostics: [],
    error: new MissingAddressError('agent-1', 'cluster'),
    timedOut: false,
    durationMs: 1500
  };

  beforeAll(() => {
    chalk.level = 0;
  });

  it('prints the verdict, node states and error', () => {
    expect(formatReport(failed).split('\n')).toEqual([
      'FAIL vlan in 1.5s',
      '',
      'Nodes',
      '  server-1     Ready',
      '  agent-1      Failed',
      '',
      "MissingAddressError: Node agent-1 has no address for semantic interface 'cluster'"
    ]);
  });

  it('flattens the error for JSON output', () => {
    expect(reportToJson(failed).error).toEqual({
      name: 'MissingAddressError',
      code: 'CONFIGURATION',
      message: "Node agent-1 has no address for semantic interface 'cluster'"
    });
  });
});
