import { v4 as uuidv4 } from 'uuid';

export interface TraceContext {
  requestId: string;
  customerId?: string;
  messageId?: string;
  spans: SpanRecord[];
}

export interface SpanRecord {
  name: string;
  startTime: number;
  endTime?: number;
  attributes: Record<string, string | number | boolean>;
  status: 'ok' | 'error';
}

export function createTraceContext(overrides?: Partial<TraceContext>): TraceContext {
  return {
    requestId: overrides?.requestId ?? uuidv4(),
    customerId: overrides?.customerId,
    messageId: overrides?.messageId,
    spans: [],
  };
}

export function startSpan(ctx: TraceContext, name: string, attrs?: Record<string, string | number | boolean>): SpanRecord {
  const span: SpanRecord = {
    name,
    startTime: Date.now(),
    attributes: attrs ?? {},
    status: 'ok',
  };
  ctx.spans.push(span);
  return span;
}

export function endSpan(span: SpanRecord, status: 'ok' | 'error' = 'ok'): void {
  span.endTime = Date.now();
  span.status = status;
}

/** Span name → duration in ms, for the end-of-turn log line */
export function summarizeSpans(ctx: TraceContext): Record<string, number> {
  const out: Record<string, number> = {};
  for (const span of ctx.spans) {
    if (span.endTime !== undefined) out[span.name] = span.endTime - span.startTime;
  }
  return out;
}
