import chalk from 'chalk';
import { NodeSpec, NodeState, TOPOLOGY_KINDS, TopologyKind, isTopologyKind } from '../types';
import { ConfigurationError } from '../common/errors';
import { FrameworkLogger } from '../common/logger';
import { OrchestratorConfig, OrchestratorOptions, positiveNumberFrom } from '../config/OrchestratorConfig';
import { ResolvedRunConfig, YamlClusterConfiguration } from '../config/YamlClusterConfiguration';
import { DiagnosticsCollector } from '../diagnostics/DiagnosticsCollector';
import { CommandFleetManager } from '../fleet/CommandFleetManager';
import { SimulatedFleet } from '../fleet/SimulatedFleet';
import { VmFleetManager } from '../fleet/types';
import { RunReport, describeError } from '../orchestrator/Orchestrator';
import { ScriptCheck, loadScenarioScript } from '../orchestrator/ScenarioScript';
import { defaultNodes, parseNodeMap } from '../topology/parse';
import { loadPreset, loadProfileFile } from '../topology/presets';
import { TopologyProfileDefinition } from '../topology/types';

export interface RunCommandOptions {
  topology?: string;
  nodes?: string;
  config?: string;
  profile?: string;
  script?: string;
  timeout?: string;
  simulate?: boolean;
  driver?: string;
  resilience?: boolean;
  json?: boolean;
  env?: string;
}

export interface RunPlan {
  profile: TopologyProfileDefinition;
  nodes: NodeSpec[];
  config: OrchestratorConfig;
  script: ScriptCheck[];
  fleet: VmFleetManager;
}

export const DRIVER_SIMULATE = 'simulate';

/**
 * Merge defaults, environment, the config file and flags (in that order of
 * precedence, lowest first) into everything a run needs
 */
export async function resolveRunPlan(
  options: RunCommandOptions,
  logger: FrameworkLogger,
  env: NodeJS.ProcessEnv = process.env
): Promise<RunPlan> {
  let file: ResolvedRunConfig = { orchestrator: {} };
  if (options.config) {
    const loader = new YamlClusterConfiguration(options.env ?? env.CLUSTERFORM_ENV ?? 'default');
    await loader.loadFromFile(options.config);
    file = await loader.resolve();
  }

  const flags: OrchestratorOptions = {};
  if (options.timeout !== undefined) flags.globalTimeoutMs = positiveNumberFrom(options.timeout, '--timeout') * 1000;
  if (options.resilience) flags.resilience = true;

  const merged = [OrchestratorConfig.fromEnvironment(env), file.orchestrator, flags]
    .reduce((base, override) => OrchestratorConfig.merge(base, override), {});
  const config = OrchestratorConfig.create(merged);

  return {
    profile: await resolveProfile(options, file),
    nodes: options.nodes ? parseNodeMap(options.nodes) : file.nodes ?? defaultNodes(),
    config,
    script: options.script
      ? await loadScenarioScript(options.script)
      : file.scriptPath ? await loadScenarioScript(file.scriptPath) : [],
    fleet: createFleet(options, file, config, logger, env)
  };
}

export function presetKind(value: string): TopologyKind {
  if (!isTopologyKind(value)) {
    throw new ConfigurationError(`--topology must be one of ${TOPOLOGY_KINDS.join(', ')} (got '${value}')`);
  }
  return value;
}

async function resolveProfile(options: RunCommandOptions, file: ResolvedRunConfig): Promise<TopologyProfileDefinition> {
  if (options.profile && options.topology) {
    throw new ConfigurationError('--profile and --topology are mutually exclusive');
  }
  if (options.profile) return loadProfileFile(options.profile);
  if (options.topology !== undefined) return loadPreset(presetKind(options.topology));
  if (file.profile) return file.profile;
  if (file.profilePath) return loadProfileFile(file.profilePath);
  return loadPreset(file.topology ?? 'flat');
}

function createFleet(
  options: RunCommandOptions,
  file: ResolvedRunConfig,
  config: OrchestratorConfig,
  logger: FrameworkLogger,
  env: NodeJS.ProcessEnv
): VmFleetManager {
  if (options.simulate && options.driver) {
    throw new ConfigurationError('--simulate and --driver are mutually exclusive');
  }
  const driver = options.simulate ? DRIVER_SIMULATE : options.driver ?? file.driver ?? env.CLUSTERFORM_DRIVER;
  if (driver === undefined) {
    throw new ConfigurationError('No fleet driver: pass --simulate or --driver <executable>');
  }
  if (driver === DRIVER_SIMULATE) {
    return new SimulatedFleet({ pollIntervalMs: 10 });
  }
  return new CommandFleetManager({ driver, pollIntervalMs: config.pollIntervalMs, logger });
}

/**
 * JSON-safe report: errors flattened to name, code and message
 */
export function reportToJson(report: RunReport): Record<string, unknown> {
  return {
    ...report,
    diagnostics: report.diagnostics.map(bundle => ({
      ...bundle,
      errors: bundle.errors.map(error => describeError(error))
    })),
    error: report.error ? describeError(report.error) : undefined
  };
}

export function formatReport(report: RunReport): string {
  const lines: string[] = [];
  const verdict = report.verdict === 'pass' ? chalk.green.bold('PASS') : chalk.red.bold('FAIL');
  lines.push(`${verdict} ${chalk.cyan(report.topology)} in ${(report.durationMs / 1000).toFixed(1)}s`);

  const states = Object.entries(report.nodeStates);
  if (states.length > 0) {
    lines.push('', chalk.bold('Nodes'));
    for (const [node, state] of states) {
      const colour = state === NodeState.READY ? chalk.green : state === NodeState.FAILED ? chalk.red : chalk.yellow;
      lines.push(`  ${node.padEnd(12)} ${colour(state)}`);
    }
  }

  if (report.health) {
    const { checks, failures, warnings } = report.health;
    lines.push('', chalk.bold(`Health: ${checks.length - failures.length - warnings.length}/${checks.length} checks passed`));
    for (const failure of failures) lines.push(chalk.red(`  ✗ [${failure.node}] ${failure.check}: ${failure.message}`));
    for (const warning of warnings) lines.push(chalk.yellow(`  ! [${warning.node}] ${warning.check}: ${warning.message}`));
  }

  if (report.script) {
    lines.push('', chalk.bold('Script'));
    for (const result of report.script) {
      const mark = result.passed ? chalk.green('✓') : chalk.red('✗');
      lines.push(`  ${mark} [${result.node}] ${result.check}${result.passed ? '' : `: ${result.message}`}`);
    }
  }

  if (report.resilience) {
    const { node, bond, activeBefore, activeAfter } = report.resilience;
    lines.push('', chalk.bold('Resilience'), `  ${node} ${bond}: ${activeBefore} → ${activeAfter}`);
  }

  if (report.error) {
    const { name, message } = describeError(report.error);
    lines.push('', chalk.red(`${name}: ${message}`));
    if (report.timedOut) lines.push(chalk.red('  (global timeout reached)'));
  }

  for (const bundle of report.diagnostics) {
    lines.push('', chalk.gray(DiagnosticsCollector.format(bundle)));
  }
  return lines.join('\n');
}
