import client from 'prom-client';

export const registry = new client.Registry();

client.collectDefaultMetrics({ register: registry, prefix: 'threadline_' });

export const messagesReceived = new client.Counter({
  name: 'threadline_messages_received_total',
  help: 'Inbound messages accepted by the webhook',
  labelNames: ['kind'] as const,
  registers: [registry],
});

export const intentsRouted = new client.Counter({
  name: 'threadline_intents_total',
  help: 'Turns by routed intent',
  labelNames: ['intent'] as const,
  registers: [registry],
});

export const turnDuration = new client.Histogram({
  name: 'threadline_turn_duration_seconds',
  help: 'End-to-end turn processing time',
  labelNames: ['intent', 'escalated'] as const,
  buckets: [0.25, 0.5, 1, 2, 3, 5, 8, 12, 20],
  registers: [registry],
});

export const dependencyCalls = new client.Counter({
  name: 'threadline_dependency_calls_total',
  help: 'Degradation-controller invocations by dependency and outcome',
  labelNames: ['dependency', 'outcome'] as const,
  registers: [registry],
});

export const escalationsTotal = new client.Counter({
  name: 'threadline_escalations_total',
  help: 'Turns replaced by the human handoff notice',
  labelNames: ['reason'] as const,
  registers: [registry],
});

export const supersededTurns = new client.Counter({
  name: 'threadline_superseded_turns_total',
  help: 'Queued image turns replaced by a newer image before processing',
  registers: [registry],
});

export const webhookDuplicatesTotal = new client.Counter({
  name: 'threadline_webhook_duplicates_total',
  help: 'Webhook deliveries dropped as duplicates',
  registers: [registry],
});

export const httpRequestDuration = new client.Histogram({
  name: 'threadline_http_request_duration_seconds',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
