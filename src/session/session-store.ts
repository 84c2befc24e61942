import Redis from 'ioredis';
import { ContextReference, Intent, INTENTS, Session, SessionContext, Turn } from '../config/types';
import { ContextPatch, SessionStore, SessionStoreOptions } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const DEFAULT_OPTIONS: SessionStoreOptions = {
  capacity: env.session.historyCapacity,
  ttlSeconds: env.session.ttlSeconds,
};

export function emptySession(customerId: string, now: number = Date.now()): Session {
  return {
    customerId,
    history: [],
    context: { language: 'en', awaitingOrderId: false },
    lastActivityAt: now,
    isNew: true,
  };
}

function toStringRecord(value: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (typeof value !== 'object' || value === null) return record;
  for (const [key, field] of Object.entries(value)) {
    if (typeof field === 'string') record[key] = field;
  }
  return record;
}

/** Append with FIFO eviction; returns a new array */
export function appendBounded<T>(items: readonly T[], item: T, capacity: number): T[] {
  const next = [...items, item];
  return next.length > capacity ? next.slice(next.length - capacity) : next;
}

function applyPatch(context: SessionContext, patch: ContextPatch): SessionContext {
  const next: SessionContext = { ...context };
  if (patch.reference === null) delete next.reference;
  else if (patch.reference) next.reference = patch.reference;
  if (patch.language) next.language = patch.language;
  if (patch.lastIntent) next.lastIntent = patch.lastIntent;
  if (patch.awaitingOrderId !== undefined) next.awaitingOrderId = patch.awaitingOrderId;
  return next;
}

function isIntent(value: string | undefined): value is Intent {
  return value !== undefined && (INTENTS as readonly string[]).includes(value);
}

/**
 * Redis-backed session store.
 * One list of serialized turns and one hash holding the context slot per customer;
 * both carry the inactivity TTL, so expiry is Redis's job.
 */
export class RedisSessionStore implements SessionStore {
  private readonly prefix: string;
  private readonly log = logger.child({ component: 'session-redis' });

  constructor(
    private readonly redis: Redis,
    private readonly options: SessionStoreOptions = DEFAULT_OPTIONS,
  ) {
    this.prefix = `${env.redis.keyPrefix}session:`;
  }

  private turnsKey(customerId: string): string {
    return `${this.prefix}${customerId}:turns`;
  }

  private contextKey(customerId: string): string {
    return `${this.prefix}${customerId}:ctx`;
  }

  async load(customerId: string): Promise<Session> {
    try {
      const results = await this.redis
        .pipeline()
        .lrange(this.turnsKey(customerId), 0, -1)
        .hgetall(this.contextKey(customerId))
        .exec();

      if (!results) return emptySession(customerId);
      const [turnsResult, ctxResult] = results;
      const rawTurns = !turnsResult[0] && Array.isArray(turnsResult[1]) ? turnsResult[1] : [];
      const ctx: Record<string, string> = !ctxResult[0] ? toStringRecord(ctxResult[1]) : {};

      if (rawTurns.length === 0 && Object.keys(ctx).length === 0) {
        return emptySession(customerId);
      }

      const history: Turn[] = [];
      for (const raw of rawTurns) {
        if (typeof raw !== 'string') continue;
        try {
          history.push(JSON.parse(raw) as Turn);
        } catch {
          this.log.warn({ customerId }, 'Skipping malformed turn in session history');
        }
      }

      return {
        customerId,
        history: history.slice(-this.options.capacity),
        context: this.parseContext(ctx),
        lastActivityAt: ctx.lastActivityAt ? Number(ctx.lastActivityAt) : Date.now(),
        isNew: false,
      };
    } catch (err) {
      this.log.error({ err, customerId }, 'Failed to load session from Redis; continuing stateless');
      return emptySession(customerId);
    }
  }

  async appendTurn(customerId: string, turn: Turn): Promise<void> {
    try {
      await this.redis
        .multi()
        .rpush(this.turnsKey(customerId), JSON.stringify(turn))
        .ltrim(this.turnsKey(customerId), -this.options.capacity, -1)
        .hset(this.contextKey(customerId), 'lastActivityAt', String(Date.now()))
        .expire(this.turnsKey(customerId), this.options.ttlSeconds)
        .expire(this.contextKey(customerId), this.options.ttlSeconds)
        .exec();
    } catch (err) {
      this.log.error({ err, customerId }, 'Failed to append turn in Redis');
    }
  }

  async setContext(customerId: string, reference: ContextReference | null, language: string): Promise<void> {
    await this.updateContext(customerId, { reference, language });
  }

  async updateContext(customerId: string, patch: ContextPatch): Promise<void> {
    const fields: Record<string, string> = { lastActivityAt: String(Date.now()) };
    if (patch.reference) fields.reference = JSON.stringify(patch.reference);
    if (patch.language) fields.language = patch.language;
    if (patch.lastIntent) fields.lastIntent = patch.lastIntent;
    if (patch.awaitingOrderId !== undefined) fields.awaitingOrderId = patch.awaitingOrderId ? '1' : '0';

    try {
      const tx = this.redis.multi();
      if (patch.reference === null) tx.hdel(this.contextKey(customerId), 'reference');
      await tx
        .hset(this.contextKey(customerId), fields)
        .expire(this.contextKey(customerId), this.options.ttlSeconds)
        .expire(this.turnsKey(customerId), this.options.ttlSeconds)
        .exec();
    } catch (err) {
      this.log.error({ err, customerId }, 'Failed to update session context in Redis');
    }
  }

  async clear(customerId: string): Promise<void> {
    try {
      await this.redis.del(this.turnsKey(customerId), this.contextKey(customerId));
    } catch (err) {
      this.log.error({ err, customerId }, 'Failed to clear session in Redis');
    }
  }

  private parseContext(raw: Record<string, string>): SessionContext {
    const context: SessionContext = {
      language: raw.language || 'en',
      awaitingOrderId: raw.awaitingOrderId === '1',
    };
    if (isIntent(raw.lastIntent)) context.lastIntent = raw.lastIntent;
    if (raw.reference) {
      try {
        context.reference = JSON.parse(raw.reference) as ContextReference;
      } catch {
        this.log.warn('Dropping malformed context reference');
      }
    }
    return context;
  }
}

interface MemoryEntry {
  history: Turn[];
  context: SessionContext;
  lastActivityAt: number;
}

/**
 * In-memory session store (dev/test fallback).
 * Expiry is checked on access against an injectable clock.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(
    private readonly options: SessionStoreOptions = DEFAULT_OPTIONS,
    private readonly now: () => number = Date.now,
  ) {}

  async load(customerId: string): Promise<Session> {
    const entry = this.live(customerId);
    if (!entry) return emptySession(customerId, this.now());
    return {
      customerId,
      history: [...entry.history],
      context: { ...entry.context },
      lastActivityAt: entry.lastActivityAt,
      isNew: false,
    };
  }

  async appendTurn(customerId: string, turn: Turn): Promise<void> {
    const entry = this.touch(customerId);
    entry.history = appendBounded(entry.history, turn, this.options.capacity);
  }

  async setContext(customerId: string, reference: ContextReference | null, language: string): Promise<void> {
    await this.updateContext(customerId, { reference, language });
  }

  async updateContext(customerId: string, patch: ContextPatch): Promise<void> {
    const entry = this.touch(customerId);
    entry.context = applyPatch(entry.context, patch);
  }

  async clear(customerId: string): Promise<void> {
    this.entries.delete(customerId);
  }

  /** Number of live sessions */
  get size(): number {
    return this.entries.size;
  }

  private live(customerId: string): MemoryEntry | undefined {
    const entry = this.entries.get(customerId);
    if (!entry) return undefined;
    if (this.now() - entry.lastActivityAt > this.options.ttlSeconds * 1000) {
      this.entries.delete(customerId);
      return undefined;
    }
    return entry;
  }

  private touch(customerId: string): MemoryEntry {
    let entry = this.live(customerId);
    if (!entry) {
      const fresh = emptySession(customerId, this.now());
      entry = { history: fresh.history, context: fresh.context, lastActivityAt: fresh.lastActivityAt };
      this.entries.set(customerId, entry);
    }
    entry.lastActivityAt = this.now();
    return entry;
  }
}

/**
 * Factory: create the appropriate session store based on environment.
 */
export function createSessionStore(redis?: Redis, options: SessionStoreOptions = DEFAULT_OPTIONS): SessionStore {
  if (redis) {
    return new RedisSessionStore(redis, options);
  }
  logger.warn('Using in-memory session store (no Redis)');
  return new InMemorySessionStore(options);
}
