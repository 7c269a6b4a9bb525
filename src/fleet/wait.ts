import { FormationAbortedError, FormationTimeoutError } from '../common/errors';
import { pollUntil } from '../retry/RetryManager';

/**
 * Poll a boolean check until it holds, translating the poll outcome into the
 * formation error taxonomy.
 */
export async function waitUntil(
  node: string,
  waitingFor: string,
  check: () => Promise<boolean>,
  options: { timeoutMs: number; intervalMs: number; signal?: AbortSignal }
): Promise<void> {
  const outcome = await pollUntil(async () => ((await check()) ? true : undefined), options);
  switch (outcome.status) {
    case 'satisfied':
      return;
    case 'aborted':
      throw new FormationAbortedError(node, waitingFor);
    case 'timeout':
      throw new FormationTimeoutError(node, waitingFor, options.timeoutMs);
  }
}
