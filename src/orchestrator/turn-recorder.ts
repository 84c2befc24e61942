import { Turn } from '../config/types';
import { AnalyticsSink, TurnRecord } from '../analytics/types';
import { ContextPatch, SessionStore } from '../session/types';
import { DegradationController } from '../resilience/degradation-controller';
import { logger } from '../observability/logger';

export interface RecordMeta {
  requestId: string;
  messageId?: string;
  escalationReason?: string;
  fallback?: boolean;
}

/**
 * Turn Recorder
 *
 * Persists a finished turn: inbound then outbound into session history, then
 * the context slot. Analytics records are emitted in the background and never
 * awaited by the turn. Every write goes through the degradation controller;
 * failures are logged.
 */
export class TurnRecorder {
  private readonly log = logger.child({ component: 'turn-recorder' });
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly sessions: SessionStore,
    private readonly analytics: AnalyticsSink,
    private readonly controller: DegradationController,
  ) {}

  async record(customerId: string, inbound: Turn, outbound: Turn, context: ContextPatch, meta: RecordMeta): Promise<void> {
    this.emitInBackground([
      { customerId, requestId: meta.requestId, messageId: meta.messageId, turn: inbound },
      {
        customerId,
        requestId: meta.requestId,
        messageId: meta.messageId,
        turn: outbound,
        escalationReason: meta.escalationReason,
        fallback: meta.fallback,
      },
    ]);

    const sessions = this.sessions;
    for (const turn of [inbound, outbound]) {
      const appended = await this.controller.invoke('session', () => sessions.appendTurn(customerId, turn));
      if (!appended.ok) {
        this.log.warn({ customerId, requestId: meta.requestId, reason: appended.reason }, 'Turn not persisted to session');
      }
    }

    const updated = await this.controller.invoke('session', () => sessions.updateContext(customerId, context));
    if (!updated.ok) {
      this.log.warn({ customerId, requestId: meta.requestId, reason: updated.reason }, 'Session context not persisted');
    }
  }

  /** Superseded image: analytics only, session history untouched */
  recordSuperseded(customerId: string, inbound: Turn, meta: RecordMeta): void {
    this.emitInBackground([
      { customerId, requestId: meta.requestId, messageId: meta.messageId, turn: inbound, superseded: true },
    ]);
  }

  /** Resolves once every analytics record emitted so far has been written or dropped */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /** Records of one turn are written in order; the caller never waits on them */
  private emitInBackground(records: TurnRecord[]): void {
    const task = (async () => {
      for (const record of records) {
        await this.emit(record);
      }
    })()
      .catch((err: unknown) => {
        this.log.error({ err }, 'Analytics emit failed');
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  private async emit(record: TurnRecord): Promise<void> {
    const analytics = this.analytics;
    const outcome = await this.controller.invoke('analytics', () => analytics.emit(record));
    if (!outcome.ok) {
      this.log.warn({ customerId: record.customerId, requestId: record.requestId, reason: outcome.reason }, 'Analytics record dropped');
    }
  }
}
