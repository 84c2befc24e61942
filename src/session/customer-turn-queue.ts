import { MessageKind } from '../config/types';
import { logger } from '../observability/logger';

export type QueuedTurnResult<T> =
  | { status: 'completed'; value: T }
  | { status: 'superseded' };

interface PendingTurn {
  kind: MessageKind;
  run(): Promise<void>;
  supersede(): void;
}

interface Lane {
  running: boolean;
  pending: PendingTurn[];
}

/**
 * Customer Turn Queue
 *
 * Per-customer mutual exclusion: turns for one customer run one at a time in
 * submission order, different customers never wait on each other.
 * A newer image supersedes older images that have not started yet.
 * A started turn always runs to completion.
 */
export class CustomerTurnQueue {
  private readonly lanes = new Map<string, Lane>();
  private readonly log = logger.child({ component: 'customer-turn-queue' });

  submit<T>(customerId: string, kind: MessageKind, task: () => Promise<T>): Promise<QueuedTurnResult<T>> {
    const lane = this.lanes.get(customerId) ?? { running: false, pending: [] };
    this.lanes.set(customerId, lane);

    if (kind === 'image') {
      const kept: PendingTurn[] = [];
      for (const turn of lane.pending) {
        if (turn.kind === 'image') turn.supersede();
        else kept.push(turn);
      }
      lane.pending = kept;
    }

    const result = new Promise<QueuedTurnResult<T>>((resolve, reject) => {
      lane.pending.push({
        kind,
        run: async () => {
          try {
            resolve({ status: 'completed', value: await task() });
          } catch (err) {
            reject(err);
          }
        },
        supersede: () => resolve({ status: 'superseded' }),
      });
    });

    if (!lane.running) {
      this.drain(customerId, lane).catch((err: unknown) => {
        this.log.error({ err, customerId }, 'Turn queue drain failed');
      });
    }

    return result;
  }

  /** Customers with a running or waiting turn */
  get activeCustomers(): number {
    return this.lanes.size;
  }

  /** Turns waiting (not started) for one customer */
  pendingCount(customerId: string): number {
    return this.lanes.get(customerId)?.pending.length ?? 0;
  }

  private async drain(customerId: string, lane: Lane): Promise<void> {
    lane.running = true;
    try {
      let next = lane.pending.shift();
      while (next) {
        await next.run();
        next = lane.pending.shift();
      }
    } finally {
      lane.running = false;
      if (lane.pending.length === 0 && this.lanes.get(customerId) === lane) {
        this.lanes.delete(customerId);
      }
    }
  }
}
