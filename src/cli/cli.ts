#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import * as yaml from 'js-yaml';
import { ConfigurationError, errorMessage } from '../common/errors';
import { createLogger } from '../common/logger';
import { PhaseTimeline } from '../common/PhaseTimeline';
import { Orchestrator, exitCodeFor } from '../orchestrator/Orchestrator';
import { TopologyProfile } from '../topology/TopologyProfile';
import { defaultNodes, parseNodeMap } from '../topology/parse';
import { listPresets, loadPreset, loadProfileFile } from '../topology/presets';
import { RunCommandOptions, RunPlan, formatReport, presetKind, reportToJson, resolveRunPlan } from './run';

const program = new Command();

program
  .name('clusterform')
  .description('Validate k3s cluster formation over flat, VLAN and bonded VLAN topologies')
  .version('0.1.0');

program
  .command('run')
  .description('Boot a fleet, form the cluster, verify it and tear it down')
  .option('-t, --topology <kind>', 'Preset topology (flat|vlan|bonded-vlan)')
  .option('-n, --nodes <map>', 'Role map, e.g. server-1=server:primary,server-2=server,agent-1=agent')
  .option('-c, --config <file>', 'YAML run configuration')
  .option('-p, --profile <file>', 'Topology profile file instead of a preset')
  .option('-s, --script <file>', 'YAML list of extra checks run after the health checks')
  .option('--timeout <seconds>', 'Global timeout for the whole run')
  .option('--simulate', 'Use the in-process simulated fleet')
  .option('--driver <executable>', 'External fleet driver')
  .option('--resilience', 'Take down the active bond member after formation')
  .option('--env <name>', 'Configuration environment to apply')
  .option('--json', 'Print the report as JSON')
  .action(async (options: RunCommandOptions) => {
    const logger = createLogger({
      enablePhaseLogs: !options.json,
      enableNodeLogs: !options.json,
      enableFleetLogs: false,
      enableTestMode: false
    });

    let plan: RunPlan;
    try {
      plan = await resolveRunPlan(options, logger);
    } catch (error) {
      console.error(chalk.red(`Configuration error: ${errorMessage(error)}`));
      process.exit(error instanceof ConfigurationError ? 2 : 1);
    }

    const controller = new AbortController();
    process.once('SIGINT', () => {
      console.error(chalk.yellow('Interrupted, tearing down...'));
      controller.abort();
    });

    const timeline = new PhaseTimeline();
    const orchestrator = new Orchestrator({ ...plan, logger, timeline, signal: controller.signal });
    const report = await orchestrator.run();

    console.log(options.json ? JSON.stringify(reportToJson(report), null, 2) : formatReport(report));
    process.exit(exitCodeFor(report));
  });

program
  .command('profiles')
  .description('List the preset topology profiles')
  .action(async () => {
    try {
      for (const preset of await listPresets()) {
        console.log(chalk.cyan(`# ${preset.kind}`));
        console.log(yaml.dump(preset));
      }
    } catch (error) {
      console.error(chalk.red(errorMessage(error)));
      process.exit(2);
    }
  });

program
  .command('validate')
  .description('Validate a topology profile against a node set without booting anything')
  .option('-t, --topology <kind>', 'Preset topology (flat|vlan|bonded-vlan)')
  .option('-p, --profile <file>', 'Topology profile file')
  .option('-n, --nodes <map>', 'Role map')
  .action(async (options: Pick<RunCommandOptions, 'topology' | 'profile' | 'nodes'>) => {
    try {
      const definition = options.profile
        ? await loadProfileFile(options.profile)
        : await loadPreset(presetKind(options.topology ?? 'flat'));
      const nodes = options.nodes ? parseNodeMap(options.nodes) : defaultNodes();
      const topology = new TopologyProfile(definition, nodes);

      console.log(chalk.green(`✓ ${topology.name} is valid for ${nodes.map(node => node.name).join(', ')}`));
      for (const node of nodes) {
        console.log(chalk.bold(`\n${node.name}`));
        for (const step of topology.configure(node.name)) {
          console.log(`  ${chalk.gray(step.description.padEnd(40))} ${step.command}`);
        }
      }
    } catch (error) {
      console.error(chalk.red(`✗ ${errorMessage(error)}`));
      process.exit(error instanceof ConfigurationError ? 2 : 1);
    }
  });

program.parseAsync(process.argv).catch(error => {
  console.error(chalk.red(errorMessage(error)));
  process.exit(1);
});
