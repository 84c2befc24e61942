/**
 * Dependency Health Manager
 *
 * Per-dependency circuit breakers, fed by the degradation controller.
 */

import { DEPENDENCY_NAMES, DependencyName, DependencyHealth, DependencyStatus, DegradationLevel } from './types';
import { logger } from '../observability/logger';

const DEFAULT_FAILURE_THRESHOLD = 5;
const DEFAULT_CIRCUIT_RESET_MS = 30_000;

export class DependencyHealthManager {
  private readonly deps = new Map<DependencyName, DependencyHealth>();
  private readonly log = logger.child({ component: 'dep-health' });

  constructor(
    private readonly failureThreshold = DEFAULT_FAILURE_THRESHOLD,
    private readonly circuitResetMs = DEFAULT_CIRCUIT_RESET_MS,
    private readonly now: () => number = Date.now,
  ) {
    for (const name of DEPENDENCY_NAMES) {
      this.deps.set(name, {
        name,
        status: 'healthy',
        lastCheck: this.now(),
        consecutiveFailures: 0,
        circuitOpen: false,
      });
    }
  }

  recordSuccess(name: DependencyName): void {
    const dep = this.deps.get(name);
    if (!dep) return;
    dep.consecutiveFailures = 0;
    dep.status = 'healthy';
    dep.lastCheck = this.now();
    dep.circuitOpen = false;
    dep.circuitOpenUntil = undefined;
    dep.lastError = undefined;
  }

  /** Record an invocation that degraded after all attempts */
  recordFailure(name: DependencyName, error: string): void {
    const dep = this.deps.get(name);
    if (!dep) return;
    dep.consecutiveFailures++;
    dep.lastCheck = this.now();
    dep.lastError = error;

    if (dep.consecutiveFailures >= this.failureThreshold) {
      dep.status = 'down';
      dep.circuitOpen = true;
      dep.circuitOpenUntil = this.now() + this.circuitResetMs;
      this.log.warn({ dependency: name, failures: dep.consecutiveFailures }, 'Circuit opened');
    } else if (dep.consecutiveFailures >= Math.floor(this.failureThreshold / 2)) {
      dep.status = 'degraded';
    }
  }

  /** Closed or half-open circuit */
  isAvailable(name: DependencyName): boolean {
    const dep = this.deps.get(name);
    if (!dep || !dep.circuitOpen) return true;

    if (dep.circuitOpenUntil !== undefined && this.now() > dep.circuitOpenUntil) {
      // Half-open: allow one probe; a further failure re-opens immediately
      dep.circuitOpen = false;
      dep.status = 'degraded';
      dep.consecutiveFailures = this.failureThreshold - 1;
      return true;
    }

    return false;
  }

  getStatus(name: DependencyName): DependencyHealth | undefined {
    return this.deps.get(name);
  }

  getAllStatuses(): DependencyHealth[] {
    return Array.from(this.deps.values());
  }

  getDegradationLevel(): DegradationLevel {
    const statuses = this.getAllStatuses();
    const downCount = statuses.filter((d) => d.status === 'down').length;
    const degradedCount = statuses.filter((d) => d.status === 'degraded').length;

    if (downCount >= 3) return 'full';
    if (downCount > 0 || degradedCount >= 2) return 'partial';
    return 'none';
  }

  /** Summary for the /ready endpoint */
  getHealthSummary(): Record<string, { status: DependencyStatus; circuitOpen: boolean; failures: number }> {
    const summary: Record<string, { status: DependencyStatus; circuitOpen: boolean; failures: number }> = {};
    for (const dep of this.deps.values()) {
      summary[dep.name] = {
        status: dep.status,
        circuitOpen: dep.circuitOpen,
        failures: dep.consecutiveFailures,
      };
    }
    return summary;
  }
}
