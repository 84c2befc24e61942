import { ContextReference, Intent, Session, Turn } from '../config/types';

/** Partial context write; `reference: null` clears the stored reference */
export interface ContextPatch {
  reference?: ContextReference | null;
  language?: string;
  lastIntent?: Intent;
  awaitingOrderId?: boolean;
}

/**
 * Per-customer short-term conversational state.
 *
 * `load` never fails: a missing, expired or unreachable session reads as an
 * empty one. Write failures are logged and swallowed.
 */
export interface SessionStore {
  load(customerId: string): Promise<Session>;
  /** Push, evict the oldest turn beyond capacity, refresh the inactivity timer */
  appendTurn(customerId: string, turn: Turn): Promise<void>;
  setContext(customerId: string, reference: ContextReference | null, language: string): Promise<void>;
  updateContext(customerId: string, patch: ContextPatch): Promise<void>;
  /** Drop history and context (admin reset) */
  clear(customerId: string): Promise<void>;
}

export interface SessionStoreOptions {
  /** History capacity N */
  capacity: number;
  /** Inactivity window W */
  ttlSeconds: number;
}
