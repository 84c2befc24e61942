/**
 * Degradation Controller
 *
 * Every external call made while handling a turn (media download, vision,
 * retrieval, generation, order lookup, catalog, session and analytics I/O)
 * goes through `invoke()`:
 * - per-attempt timeout
 * - one retry after a failure or timeout
 * - circuit-breaker short-circuit via DependencyHealthManager
 * - a typed Degraded outcome instead of a thrown error
 *
 * A started attempt is never cancelled; when it loses the race against the
 * timer its eventual result is ignored.
 */

import { DependencyName, DegradedReason, Outcome, RetryPolicy } from './types';
import { TimeoutError, describeError } from './errors';
import { DependencyHealthManager } from './dependency-health';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { dependencyCalls } from '../observability/metrics';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  timeoutMs: env.degradation.timeoutMs,
  retries: env.degradation.retries,
  retryDelayMs: env.degradation.retryDelayMs,
};

export type Operation<T> = (attempt: number) => Promise<T>;

export class DegradationController {
  private readonly log = logger.child({ component: 'degradation-controller' });

  constructor(
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly health?: DependencyHealthManager,
  ) {}

  async invoke<T>(
    dependency: DependencyName,
    operation: Operation<T>,
    overrides?: Partial<RetryPolicy>,
  ): Promise<Outcome<T>> {
    const policy = { ...this.policy, ...overrides };

    if (this.health && !this.health.isAvailable(dependency)) {
      dependencyCalls.inc({ dependency, outcome: 'circuit_open' });
      this.log.warn({ dependency }, 'Circuit open; skipping call');
      return { ok: false, reason: 'circuit_open', attempts: 0 };
    }

    const maxAttempts = policy.retries + 1;
    let lastReason: DegradedReason = 'upstream_error';
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const value = await this.withTimeout(dependency, operation(attempt), policy.timeoutMs);
        this.health?.recordSuccess(dependency);
        dependencyCalls.inc({ dependency, outcome: attempt > 1 ? 'retry_success' : 'success' });
        return { ok: true, value, attempts: attempt };
      } catch (err) {
        lastReason = err instanceof TimeoutError ? 'timeout' : 'upstream_error';
        lastError = describeError(err);
        this.log.warn(
          { dependency, attempt, maxAttempts, reason: lastReason, err },
          'Dependency call attempt failed',
        );
      }

      if (attempt < maxAttempts && policy.retryDelayMs > 0) {
        await delay(policy.retryDelayMs);
      }
    }

    this.health?.recordFailure(dependency, lastError);
    dependencyCalls.inc({ dependency, outcome: 'degraded' });
    this.log.error({ dependency, reason: lastReason, attempts: maxAttempts }, 'Dependency degraded; using fallback');
    return { ok: false, reason: lastReason, attempts: maxAttempts, error: lastError };
  }

  private withTimeout<T>(dependency: DependencyName, pending: Promise<T>, timeoutMs: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => reject(new TimeoutError(dependency, timeoutMs)), timeoutMs);
      pending.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
