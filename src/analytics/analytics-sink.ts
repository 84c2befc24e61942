/**
 * Analytics Sink
 *
 * Append-only stream of recorded turns, capped to the most recent entries.
 * Redis list with in-memory fallback. Errors propagate; the Turn Recorder
 * calls this through the degradation controller and logs failures.
 */

import Redis from 'ioredis';
import { AnalyticsSink, TurnRecord } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const DEFAULT_MAX_RECORDS = 10_000;

// ───── Redis Implementation ─────────────────────────────────────

export class RedisAnalyticsSink implements AnalyticsSink {
  private readonly key = `${env.redis.keyPrefix}analytics:turns`;

  constructor(
    private readonly redis: Redis,
    private readonly maxRecords: number = DEFAULT_MAX_RECORDS,
  ) {}

  async emit(record: TurnRecord): Promise<void> {
    await this.redis
      .multi()
      .rpush(this.key, JSON.stringify(record))
      .ltrim(this.key, -this.maxRecords, -1)
      .exec();
  }

  async recent(limit: number): Promise<TurnRecord[]> {
    const raw = await this.redis.lrange(this.key, -limit, -1);
    return raw.map((r) => JSON.parse(r) as TurnRecord);
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryAnalyticsSink implements AnalyticsSink {
  private records: TurnRecord[] = [];

  constructor(private readonly maxRecords: number = DEFAULT_MAX_RECORDS) {}

  async emit(record: TurnRecord): Promise<void> {
    this.records.push(record);
    if (this.records.length > this.maxRecords) {
      this.records = this.records.slice(-this.maxRecords);
    }
  }

  async recent(limit: number): Promise<TurnRecord[]> {
    return this.records.slice(-limit);
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createAnalyticsSink(redis?: Redis): AnalyticsSink {
  if (redis) {
    return new RedisAnalyticsSink(redis);
  }
  logger.warn('Using in-memory analytics sink (no Redis)');
  return new InMemoryAnalyticsSink();
}
