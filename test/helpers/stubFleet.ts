import { ExecResult } from '../../src/types';
import { VmFleetManager } from '../../src/fleet/types';

export type StubAnswer = ExecResult | Error;

/**
 * Fleet whose exec answers from a table keyed by node and command.
 * Unlisted commands exit 127; an Error answer simulates a broken channel.
 */
export class StubFleet implements VmFleetManager {
  public execCalls: Array<{ node: string; command: string }> = [];
  private readonly answers = new Map<string, StubAnswer>();

  answer(node: string, command: string, answer: StubAnswer): this {
    this.answers.set(`${node}\n${command}`, answer);
    return this;
  }

  async boot(): Promise<void> {
    // Stub implementation
  }

  async waitForBoot(): Promise<void> {
    // Stub implementation
  }

  async exec(node: string, command: string): Promise<ExecResult> {
    this.execCalls.push({ node, command });
    const answer = this.answers.get(`${node}\n${command}`);
    if (answer instanceof Error) {
      throw answer;
    }
    return answer ?? { exitCode: 127, output: `${command.split(' ')[0] ?? ''}: command not found\n` };
  }

  async waitForPort(): Promise<void> {
    // Stub implementation
  }

  async waitForCondition(): Promise<void> {
    // Stub implementation
  }

  async shutdown(): Promise<void> {
    // Stub implementation
  }

  commandsFor(node: string): string[] {
    return this.execCalls.filter(call => call.node === node).map(call => call.command);
  }
}
