import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { ConfigurationError, FormationAbortedError, errorMessage } from '../common/errors';
import { FrameworkLogger, defaultLogger } from '../common/logger';
import { VmFleetManager } from '../fleet/types';
import { isRecord } from '../topology/parse';

/**
 * One extra assertion run after the health checks, e.g.
 *
 * ```yaml
 * - name: coredns running
 *   node: server-1         # or '*' for every node
 *   command: k3s kubectl -n kube-system get pods
 *   expect:
 *     exit_code: 0
 *     contains: coredns
 * ```
 */
export interface ScriptCheck {
  name: string;
  node: string;
  command: string;
  expectExitCode: number;
  expectContains?: string;
}

export interface ScriptCheckResult {
  check: string;
  node: string;
  passed: boolean;
  exitCode: number;
  message: string;
}

export const ALL_NODES = '*';

export function parseScenarioScript(raw: unknown, source = 'script'): ScriptCheck[] {
  const list = isRecord(raw) ? raw.checks : raw;
  if (!Array.isArray(list)) {
    throw new ConfigurationError(`${source}: expected a list of checks`);
  }
  return list.map((item: unknown, index) => {
    const where = `${source}[${index}]`;
    if (!isRecord(item)) {
      throw new ConfigurationError(`${where}: each check must be a mapping`);
    }
    const { name, node, command, expect } = item;
    if (typeof node !== 'string' || node.length === 0) {
      throw new ConfigurationError(`${where}: node is required`);
    }
    if (typeof command !== 'string' || command.length === 0) {
      throw new ConfigurationError(`${where}: command is required`);
    }
    if (name !== undefined && typeof name !== 'string') {
      throw new ConfigurationError(`${where}: name must be a string`);
    }

    const check: ScriptCheck = { name: name ?? command, node, command, expectExitCode: 0 };
    if (expect !== undefined) {
      if (!isRecord(expect)) {
        throw new ConfigurationError(`${where}: expect must be a mapping`);
      }
      if (expect.exit_code !== undefined) {
        if (typeof expect.exit_code !== 'number' || !Number.isInteger(expect.exit_code)) {
          throw new ConfigurationError(`${where}: expect.exit_code must be an integer`);
        }
        check.expectExitCode = expect.exit_code;
      }
      if (expect.contains !== undefined) {
        if (typeof expect.contains !== 'string') {
          throw new ConfigurationError(`${where}: expect.contains must be a string`);
        }
        check.expectContains = expect.contains;
      }
    }
    return check;
  });
}

export async function loadScenarioScript(filePath: string): Promise<ScriptCheck[]> {
  let content: string;
  let raw: unknown;
  try {
    content = await fs.readFile(filePath, 'utf8');
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to load script ${filePath}: ${errorMessage(error)}`);
  }
  return parseScenarioScript(raw, filePath);
}

/**
 * Runs user-supplied checks against the formed cluster. Every check runs,
 * whatever the outcome of the ones before it.
 */
export class ScenarioScript {
  private readonly logger: FrameworkLogger;

  constructor(
    private readonly checks: ScriptCheck[],
    options: { logger?: FrameworkLogger } = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Throws FormationAbortedError once the signal fires; checks already run are dropped
   */
  async run(fleet: VmFleetManager, nodes: string[], signal?: AbortSignal): Promise<ScriptCheckResult[]> {
    const results: ScriptCheckResult[] = [];
    for (const check of this.checks) {
      const targets = check.node === ALL_NODES ? nodes : [check.node];
      for (const node of targets) {
        if (signal?.aborted) {
          throw new FormationAbortedError(node, `script check ${check.name}`);
        }
        results.push(await this.runOne(fleet, nodes, check, node));
      }
    }
    return results;
  }

  private async runOne(fleet: VmFleetManager, nodes: string[], check: ScriptCheck, node: string): Promise<ScriptCheckResult> {
    const fail = (exitCode: number, message: string): ScriptCheckResult =>
      ({ check: check.name, node, passed: false, exitCode, message });

    if (!nodes.includes(node)) {
      return fail(-1, `unknown node ${node}`);
    }

    let exitCode: number;
    let output: string;
    try {
      ({ exitCode, output } = await fleet.exec(node, check.command));
    } catch (error) {
      return fail(-1, `exec failed: ${errorMessage(error)}`);
    }

    if (exitCode !== check.expectExitCode) {
      return fail(exitCode, `expected exit ${check.expectExitCode}, got ${exitCode}`);
    }
    if (check.expectContains !== undefined && !output.includes(check.expectContains)) {
      return fail(exitCode, `output does not contain '${check.expectContains}'`);
    }
    this.logger.node(node, `check passed: ${check.name}`);
    return { check: check.name, node, passed: true, exitCode, message: 'ok' };
  }
}
