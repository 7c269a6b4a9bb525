import { FormationError, errorMessage } from '../../common/errors';
import { FormationContext, FormationPhase, PhaseResult } from '../types';

/**
 * The one parallel step: every VM boots at once. The first failure rejects
 * the phase; the driver's abort then cancels the remaining waits.
 */
export class BootPhase implements FormationPhase {
  readonly name = 'boot' as const;

  async run(context: FormationContext): Promise<PhaseResult> {
    await Promise.all(context.nodes.map(async node => {
      try {
        await context.fleet.boot(node);
      } catch (error) {
        throw new FormationError(node.name, `Failed to boot ${node.name}: ${errorMessage(error)}`);
      }
      await context.fleet.waitForBoot(node.name, context.timeouts.bootMs, context.signal);
      context.logger.node(node.name, 'booted');
    }));

    return { phase: this.name, nodes: context.nodes.map(node => node.name) };
  }
}
