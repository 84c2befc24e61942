/**
 * Escalation Gate
 *
 * Per-turn decision: pass the composed reply through, or replace it with the
 * handoff notice and notify the human team. Nothing is remembered between turns.
 */

import { InboundMessage, Intent, ReplyContent, Turn } from '../config/types';
import { HANDOFF_NOTICE } from '../composer/messages';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { escalationsTotal } from '../observability/metrics';
import { EscalationNotifier, EscalationReason, EscalationSummary, GateDecision } from './types';

const HUMAN_REQUEST_PHRASES = [
  'talk to human', 'talk to a human', 'speak to human', 'speak to a human',
  'human agent', 'real person', 'customer service', 'support agent',
  'talk to someone', 'speak to someone', 'representative', 'agent please',
];

export function isHumanRequest(text: string | undefined): boolean {
  if (!text) return false;
  const lower = text.toLowerCase();
  return HUMAN_REQUEST_PHRASES.some((p) => lower.includes(p));
}

function previousInboundIntent(history: Turn[]): Intent | undefined {
  for (let i = history.length - 1; i >= 0; i--) {
    if (history[i].direction === 'inbound') return history[i].intent;
  }
  return undefined;
}

/** Explicit escalation trigger for this turn, independent of confidence */
export function detectExplicitTrigger(message: InboundMessage, intent: Intent, history: Turn[]): EscalationReason | undefined {
  if (message.forceEscalation) return 'forced';
  if (isHumanRequest(message.text)) return 'human_requested';
  if (intent === 'unclear' && previousInboundIntent(history) === 'unclear') return 'repeated_unclear';
  return undefined;
}

export interface GateInput {
  reply: ReplyContent;
  confidence: number;
  /** Static fallback replies are exempt from the confidence threshold */
  fallback?: boolean;
  trigger?: EscalationReason;
  summary: Omit<EscalationSummary, 'reason' | 'confidence' | 'timestamp'>;
}

export class EscalationGate {
  private readonly log = logger.child({ component: 'escalation-gate' });

  constructor(
    private readonly notifier: EscalationNotifier,
    private readonly threshold: number = env.escalation.confidenceThreshold,
  ) {}

  decide(input: GateInput): GateDecision {
    const reason: EscalationReason | undefined =
      input.trigger ?? (!input.fallback && input.confidence < this.threshold ? 'low_confidence' : undefined);

    if (!reason) {
      return { escalate: false, content: input.reply };
    }

    escalationsTotal.inc({ reason });
    this.log.info(
      { customerId: input.summary.customerId, reason, confidence: input.confidence },
      'Escalating turn to a human agent',
    );

    const summary: EscalationSummary = {
      ...input.summary,
      reason,
      confidence: input.confidence,
      timestamp: new Date().toISOString(),
    };

    // Fire and forget: the reply never waits on the notifier
    this.notifier.notify(summary).catch((err: unknown) => {
      this.log.error({ err, customerId: summary.customerId }, 'Escalation notification failed');
    });

    return { escalate: true, content: { type: 'text', text: HANDOFF_NOTICE }, reason };
  }
}
