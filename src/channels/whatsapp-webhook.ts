import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { parseWhatsAppWebhook } from './whatsapp-adapter';
import { verifySubscription, verifyWebhookSignature } from '../security/webhook-verifier';
import { DedupStore } from '../security/dedup-store';
import { logger } from '../observability/logger';
import { messagesReceived, webhookDuplicatesTotal } from '../observability/metrics';
import { createTraceContext } from '../observability/trace';
import { Orchestrator } from '../orchestrator/orchestrator';

export interface WhatsAppWebhookDeps {
  orchestrator: Orchestrator;
  dedup: DedupStore;
  appSecret?: string;
  verifyToken?: string;
}

interface SubscriptionQuery {
  'hub.mode'?: string;
  'hub.verify_token'?: string;
  'hub.challenge'?: string;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function registerWhatsAppWebhook(app: FastifyInstance, deps: WhatsAppWebhookDeps): void {
  /** Subscription handshake from the Meta dashboard */
  app.get<{ Querystring: SubscriptionQuery }>('/webhooks/whatsapp', async (req, reply) => {
    const challenge = verifySubscription(
      req.query['hub.mode'],
      req.query['hub.verify_token'],
      req.query['hub.challenge'],
      deps.verifyToken,
    );
    if (challenge === undefined) {
      logger.warn('Webhook subscription verification failed');
      return reply.status(403).send({ error: 'Verification failed' });
    }
    return reply.status(200).type('text/plain').send(challenge);
  });

  app.post('/webhooks/whatsapp', async (req: FastifyRequest, reply: FastifyReply) => {
    const trace = createTraceContext();
    const log = logger.child({ requestId: trace.requestId });

    try {
      // 1. Signature verification
      const signature = headerValue(req.headers['x-hub-signature-256']);
      const rawBody = req.rawBody ?? JSON.stringify(req.body);

      if (!verifyWebhookSignature(rawBody, signature, deps.appSecret)) {
        return reply.status(401).send({ error: 'Invalid signature' });
      }

      // 2. Parse payload
      const parseResult = parseWhatsAppWebhook(req.body);
      if (!parseResult.ok) {
        log.warn({ reason: parseResult.reason }, 'Failed to parse webhook');
        return reply.status(400).send({ error: parseResult.reason });
      }

      // 3. De-duplicate by transport message id, then hand each message off
      let accepted = 0;
      let duplicates = 0;
      for (const inbound of parseResult.messages) {
        if (!(await deps.dedup.isNew(inbound.messageId))) {
          log.info({ messageId: inbound.messageId }, 'Duplicate webhook delivery; skipping');
          webhookDuplicatesTotal.inc();
          duplicates++;
          continue;
        }

        messagesReceived.inc({ kind: inbound.kind });
        accepted++;

        // Respond 200 immediately; WhatsApp retries deliveries it doesn't see acknowledged
        const turnTrace = createTraceContext({ messageId: inbound.messageId });
        deps.orchestrator.handleMessage(inbound, turnTrace).catch((err: unknown) => {
          log.error({ err, messageId: inbound.messageId, customerId: inbound.customerId }, 'Orchestrator error');
        });
      }

      return reply.status(200).send({
        status: 'accepted',
        requestId: trace.requestId,
        accepted,
        duplicates,
        skipped: parseResult.skipped,
      });
    } catch (err) {
      log.error({ err }, 'Webhook handler error');
      return reply.status(500).send({ error: 'Internal server error' });
    }
  });
}
