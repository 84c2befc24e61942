import { Intent, ReplyContent, Turn } from '../config/types';

export type EscalationReason = 'low_confidence' | 'repeated_unclear' | 'human_requested' | 'forced';

/** What the human team receives when a turn is handed off */
export interface EscalationSummary {
  customerId: string;
  reason: EscalationReason;
  intent: Intent;
  confidence: number;
  lastMessage: string;
  /** Recent turns, oldest first */
  history: Turn[];
  requestId?: string;
  timestamp: string;
}

export interface EscalationNotifier {
  notify(summary: EscalationSummary): Promise<void>;
}

export type GateDecision =
  | { escalate: false; content: ReplyContent }
  | { escalate: true; content: ReplyContent; reason: EscalationReason };
