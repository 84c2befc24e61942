import { EscalationNotifier, EscalationSummary } from './types';
import { UpstreamError } from '../resilience/errors';
import { env } from '../config/env';
import { logger } from '../observability/logger';

/**
 * POSTs escalation summaries to an automation webhook (helpdesk, n8n, Zapier…).
 * Best effort: one attempt with a timeout; failures surface as rejections
 * the gate logs.
 */
export class WebhookEscalationNotifier implements EscalationNotifier {
  private readonly log = logger.child({ component: 'escalation-notifier' });

  constructor(
    private readonly url: string,
    private readonly secret: string = env.escalation.webhookSecret,
    private readonly timeoutMs: number = env.escalation.webhookTimeoutMs,
  ) {}

  async notify(summary: EscalationSummary): Promise<void> {
    const response = await fetch(this.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(this.secret ? { 'X-Webhook-Secret': this.secret } : {}),
      },
      body: JSON.stringify({
        customer_phone: summary.customerId,
        reason: summary.reason,
        intent: summary.intent,
        confidence_score: summary.confidence,
        last_message: summary.lastMessage,
        conversation_history: summary.history.map((t) => ({
          direction: t.direction,
          content: t.content,
          intent: t.intent,
          timestamp: t.timestamp,
        })),
        request_id: summary.requestId,
        timestamp: summary.timestamp,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new UpstreamError(`Escalation webhook returned ${response.status}`, 'escalation', response.status);
    }
    this.log.info({ customerId: summary.customerId, reason: summary.reason }, 'Escalation delivered');
  }
}

/** Used when no webhook is configured: the log line is the handoff record */
export class LoggingEscalationNotifier implements EscalationNotifier {
  private readonly log = logger.child({ component: 'escalation-notifier' });

  async notify(summary: EscalationSummary): Promise<void> {
    this.log.warn(
      { customerId: summary.customerId, reason: summary.reason, confidence: summary.confidence, requestId: summary.requestId },
      'Escalation requested (no webhook configured)',
    );
  }
}

export function createEscalationNotifier(url: string = env.escalation.webhookUrl): EscalationNotifier {
  return url ? new WebhookEscalationNotifier(url) : new LoggingEscalationNotifier();
}
