import { errorMessage, ProviderError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { nowIso } from '../../utils/time';
import { FetchAttempt, FetchOutcome, ProviderFailure, WalletResource } from './types';

const logger = createLogger('WalletFetch');

function describeCount(data: unknown): string {
  return Array.isArray(data) ? `${data.length} item(s)` : 'payload';
}

function toFailure(provider: string, error: unknown): ProviderFailure {
  if (!(error instanceof ProviderError)) {
    return { provider, kind: 'unexpected', message: errorMessage(error) };
  }
  const failure: ProviderFailure = {
    provider: error.provider,
    kind: error.kind,
    message: error.message,
  };
  if (error.status !== undefined) {
    failure.status = error.status;
  }
  return failure;
}

/**
 * Tries each attempt once, in order, moving on after any rejection.
 * Never rejects: when every attempt throws the outcome is `degraded`
 * and carries one failure per attempt.
 */
export async function fetchWithFallback<T>(
  resource: WalletResource,
  attempts: FetchAttempt<T>[]
): Promise<FetchOutcome<T>> {
  const failures: ProviderFailure[] = [];

  for (const attempt of attempts) {
    try {
      const data = await attempt.run();
      logger.info(`✓ ${resource} from ${attempt.provider}: ${describeCount(data)}`);
      return { kind: 'success', provider: attempt.provider, data, fetchedAt: nowIso() };
    } catch (error) {
      const failure = toFailure(attempt.provider, error);
      failures.push(failure);
      if (failure.kind === 'unexpected') {
        logger.error(`Unexpected error fetching ${resource} from ${attempt.provider}:`, error);
      } else if (failure.kind === 'rate-limited') {
        logger.warn(`${resource}: ${attempt.provider} rate limited`);
      } else {
        logger.warn(`${resource}: ${failure.message}`);
      }
    }
  }

  logger.warn(`${resource} unavailable after ${failures.length} provider attempt(s)`);
  return { kind: 'degraded', failures, fetchedAt: nowIso() };
}
