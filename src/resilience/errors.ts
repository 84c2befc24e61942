import { DependencyName } from './types';

/** Anything we call out to; only DependencyName calls go through the controller */
export type ServiceName = DependencyName | 'transport' | 'escalation';

/** Operation exceeded its per-attempt budget */
export class TimeoutError extends Error {
  constructor(
    readonly dependency: DependencyName,
    readonly timeoutMs: number,
  ) {
    super(`${dependency} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** An oracle or collaborator returned a fault */
export class UpstreamError extends Error {
  constructor(
    message: string,
    readonly dependency: ServiceName,
    readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
