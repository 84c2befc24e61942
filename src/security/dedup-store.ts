/**
 * Webhook Deduplication Store
 *
 * WhatsApp retries deliveries it did not see acknowledged in time;
 * each message id is processed once.
 * Redis SET NX with TTL, or an in-memory map with oldest-first eviction.
 */

import Redis from 'ioredis';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const DEFAULT_TTL_SECONDS = 3600;

export interface DedupStore {
  /** True if this message id has not been seen within the TTL */
  isNew(messageId: string): Promise<boolean>;
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisDedupStore implements DedupStore {
  private readonly prefix = `${env.redis.keyPrefix}dedup:`;

  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number = DEFAULT_TTL_SECONDS,
  ) {}

  async isNew(messageId: string): Promise<boolean> {
    try {
      // 'OK' when the key was set (new), null when it already existed
      const result = await this.redis.set(`${this.prefix}${messageId}`, '1', 'EX', this.ttlSeconds, 'NX');
      return result === 'OK';
    } catch (err) {
      logger.warn({ err }, 'Dedup check failed; allowing message');
      return true; // Fail open
    }
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryDedupStore implements DedupStore {
  private readonly seen = new Map<string, number>();

  constructor(
    private readonly ttlSeconds: number = DEFAULT_TTL_SECONDS,
    private readonly maxSize: number = 50_000,
    private readonly now: () => number = Date.now,
  ) {}

  async isNew(messageId: string): Promise<boolean> {
    const now = this.now();
    const existing = this.seen.get(messageId);

    if (existing !== undefined && now - existing < this.ttlSeconds * 1000) {
      return false;
    }

    this.seen.delete(messageId);
    if (this.seen.size >= this.maxSize) {
      const oldest = this.seen.keys().next().value;
      if (oldest !== undefined) this.seen.delete(oldest);
    }

    this.seen.set(messageId, now);
    return true;
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createDedupStore(redis?: Redis): DedupStore {
  if (redis) {
    logger.info('Dedup store: Redis-backed (SET NX)');
    return new RedisDedupStore(redis);
  }
  logger.info('Dedup store: In-memory');
  return new InMemoryDedupStore();
}
