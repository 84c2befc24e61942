import { Turn } from '../config/types';

/** One recorded turn as seen by analytics */
export interface TurnRecord {
  customerId: string;
  requestId: string;
  messageId?: string;
  turn: Turn;
  /** Inbound image that was replaced by a newer one before processing */
  superseded?: boolean;
  escalationReason?: string;
  /** Outbound reply was a static fallback (its confidence is not a handoff signal) */
  fallback?: boolean;
}

export interface AnalyticsSink {
  emit(record: TurnRecord): Promise<void>;
  /** Most recent records, oldest first */
  recent(limit: number): Promise<TurnRecord[]>;
}
