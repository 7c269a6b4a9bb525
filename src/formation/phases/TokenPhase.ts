import { FormationError } from '../../common/errors';
import { withRetry } from '../../retry/RetryManager';
import { ClusterToken } from '../ClusterToken';
import { FormationContext, FormationPhase, PhaseResult } from '../types';

/**
 * Read the join token over the exec channel. The value goes into the
 * context and the diagnostics redaction list; only its length is logged.
 */
export class TokenPhase implements FormationPhase {
  readonly name = 'token' as const;

  constructor(private readonly retry: { attempts: number; settleDelayMs: number } = { attempts: 3, settleDelayMs: 1000 }) {}

  async run(context: FormationContext): Promise<PhaseResult> {
    const { primary, service, fleet, signal } = context;

    const result = await withRetry(() => fleet.exec(primary.name, `cat ${service.tokenPath}`), { ...this.retry, signal });
    if (result.exitCode !== 0) {
      throw new FormationError(primary.name, `Cannot read cluster token from ${service.tokenPath} (exit ${result.exitCode})`);
    }

    const token = ClusterToken.fromFileContent(primary.name, result.output);
    context.token = token;
    context.diagnostics.addSecret(token.reveal());
    context.logger.node(primary.name, `cluster token acquired (length ${token.length})`);

    return { phase: this.name, nodes: [primary.name], details: { tokenLength: token.length } };
  }
}
