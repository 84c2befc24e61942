/**
 * Degradation Types
 */

export type DependencyName =
  | 'session'
  | 'media'
  | 'vision'
  | 'retrieval'
  | 'generation'
  | 'orders'
  | 'catalog'
  | 'analytics';

export const DEPENDENCY_NAMES: readonly DependencyName[] = [
  'session', 'media', 'vision', 'retrieval', 'generation', 'orders', 'catalog', 'analytics',
];

export type DependencyStatus = 'healthy' | 'degraded' | 'down';

export type DegradationLevel = 'none' | 'partial' | 'full';

export interface DependencyHealth {
  name: DependencyName;
  status: DependencyStatus;
  lastCheck: number;
  consecutiveFailures: number;
  lastError?: string;
  /** Circuit breaker: open = requests blocked */
  circuitOpen: boolean;
  circuitOpenUntil?: number;
}

export type DegradedReason = 'timeout' | 'upstream_error' | 'circuit_open';

/** Result of a controller-wrapped call. Degraded is a normal branch, never an exception. */
export type Outcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; reason: DegradedReason; attempts: number; error?: string };

export interface RetryPolicy {
  /** Per-attempt budget */
  timeoutMs: number;
  /** Additional attempts after the first */
  retries: number;
  retryDelayMs: number;
}
