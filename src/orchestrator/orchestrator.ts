import pino from 'pino';
import { InboundMessage, Intent, ReplyContent, Session, Turn } from '../config/types';
import { SessionStore } from '../session/types';
import { emptySession } from '../session/session-store';
import { CustomerTurnQueue } from '../session/customer-turn-queue';
import { DegradationController } from '../resilience/degradation-controller';
import { buildFallbackMenu } from '../resilience/static-fallbacks';
import { Outcome } from '../resilience/types';
import { ProductMatch } from '../knowledge/types';
import { VisualAttributeExtractor } from '../vision/visual-attribute-extractor';
import { KnowledgeRetriever, buildAttributeQuery } from '../knowledge/knowledge-retriever';
import { ProductCatalog } from '../catalog/product-catalog';
import { routeIntent } from '../routing/intent-router';
import { detectLanguage } from '../routing/language';
import { ResponseComposer, answerFromRecord, resolveSubject } from '../composer/response-composer';
import { ComposedReply, TurnEvidence, VisualSearchEvidence } from '../composer/types';
import { SUPERSEDED_IMAGE_ACK, replyText } from '../composer/messages';
import { EscalationGate, detectExplicitTrigger } from '../escalation/escalation-gate';
import { EscalationReason } from '../escalation/types';
import { TurnRecorder } from './turn-recorder';
import { ChannelOutbound, MediaSource } from '../channels/types';
import { turnLogger } from '../observability/logger';
import { TraceContext, startSpan, endSpan, summarizeSpans } from '../observability/trace';
import { intentsRouted, supersededTurns, turnDuration } from '../observability/metrics';

export interface OrchestratorDeps {
  sessions: SessionStore;
  queue: CustomerTurnQueue;
  controller: DegradationController;
  composer: ResponseComposer;
  gate: EscalationGate;
  recorder: TurnRecorder;
  outbound: ChannelOutbound;
  catalog: ProductCatalog;
  media?: MediaSource;
  extractor?: VisualAttributeExtractor;
  retriever?: KnowledgeRetriever;
}

export type TurnResult =
  | { status: 'replied'; intent: Intent; content: ReplyContent; confidence: number; escalated: boolean; escalationReason?: EscalationReason }
  | { status: 'superseded'; content: ReplyContent };

/** Fewer words than this in plain English keep the language already in context */
const MIN_WORDS_TO_SWITCH_TO_ENGLISH = 3;

function inboundContent(message: InboundMessage): string {
  if (message.kind === 'image') return message.image?.caption || message.image?.mediaId || '';
  if (message.kind === 'interactive') return message.interactive?.id ?? '';
  return message.text ?? '';
}

export function resolveLanguage(message: InboundMessage, current: string): string {
  const text = message.kind === 'text' ? message.text : message.image?.caption;
  if (!text) return current;
  const detected = detectLanguage(text);
  if (detected !== 'en') return detected;
  return text.trim().split(/\s+/).length >= MIN_WORDS_TO_SWITCH_TO_ENGLISH ? 'en' : current;
}

/**
 * Orchestrator
 *
 * One inbound message in, exactly one reply out:
 * queue → session → language + intent → evidence → compose → gate → send → record.
 * Recording stays inside the customer's queue slot so the next turn sees this one.
 * Every collaborator call is degradation-wrapped, so even a total outage ends
 * in a fallback reply rather than silence.
 */
export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async handleMessage(inbound: InboundMessage, trace: TraceContext): Promise<TurnResult> {
    const log = turnLogger(trace.requestId, inbound.customerId);
    trace.customerId = inbound.customerId;
    trace.messageId = inbound.messageId;

    const queued = await this.deps.queue.submit(inbound.customerId, inbound.kind, () =>
      this.processTurn(inbound, trace, log),
    );

    if (queued.status === 'superseded') {
      return this.acknowledgeSuperseded(inbound, trace, log);
    }
    return queued.value;
  }

  private async processTurn(inbound: InboundMessage, trace: TraceContext, log: pino.Logger): Promise<TurnResult> {
    const start = Date.now();
    const spanTurn = startSpan(trace, 'turn');

    let intent: Intent = 'unclear';
    let session: Session = emptySession(inbound.customerId);
    let composed: ComposedReply;
    let content: ReplyContent;
    let escalationReason: EscalationReason | undefined;

    try {
      // 1. Load session (degraded → stateless turn)
      const spanLoad = startSpan(trace, 'session.load');
      const sessions = this.deps.sessions;
      const loaded = await this.deps.controller.invoke('session', () => sessions.load(inbound.customerId));
      if (loaded.ok) session = loaded.value;
      else log.warn({ reason: loaded.reason }, 'Session unavailable; handling turn statelessly');
      endSpan(spanLoad, loaded.ok ? 'ok' : 'error');

      // 2. Language + intent
      const language = resolveLanguage(inbound, session.context.language);
      session = { ...session, context: { ...session.context, language } };
      intent = routeIntent(inbound, session.context);
      intentsRouted.inc({ intent });
      log.info({ intent, language, kind: inbound.kind }, 'Intent routed');

      // 3. Evidence
      const spanEvidence = startSpan(trace, 'evidence', { intent });
      const evidence = await this.gatherEvidence(intent, inbound, session);
      endSpan(spanEvidence);

      // 4. Compose
      const spanCompose = startSpan(trace, 'compose');
      composed = await this.deps.composer.compose(intent, evidence, session, inbound);
      endSpan(spanCompose);

      // 5. Gate
      const decision = this.deps.gate.decide({
        reply: composed.content,
        confidence: composed.confidence,
        fallback: composed.fallback,
        trigger: detectExplicitTrigger(inbound, intent, session.history),
        summary: {
          customerId: inbound.customerId,
          intent,
          lastMessage: inboundContent(inbound),
          history: session.history,
          requestId: trace.requestId,
        },
      });
      content = decision.content;
      if (decision.escalate) escalationReason = decision.reason;
    } catch (err) {
      log.error({ err, intent }, 'Turn pipeline failed; replying with the fallback menu');
      composed = { content: buildFallbackMenu(), confidence: 0, context: {}, fallback: true };
      content = composed.content;
    }

    const escalated = escalationReason !== undefined;
    const now = Date.now();
    const inboundTurn: Turn = {
      direction: 'inbound',
      kind: inbound.kind,
      content: inboundContent(inbound),
      intent,
      confidence: 1.0,
      latencyMs: 0,
      escalated,
      timestamp: inbound.timestamp,
    };
    const outboundTurn: Turn = {
      direction: 'outbound',
      kind: content.type === 'text' ? 'text' : 'interactive',
      content: replyText(content),
      intent,
      confidence: composed.confidence,
      latencyMs: now - start,
      escalated,
      timestamp: now,
    };

    // 6. Send exactly one reply, then record it
    await this.send(inbound.customerId, content, trace, log);

    const spanRecord = startSpan(trace, 'record');
    try {
      await this.deps.recorder.record(
        inbound.customerId,
        inboundTurn,
        outboundTurn,
        { ...composed.context, language: session.context.language, lastIntent: intent },
        { requestId: trace.requestId, messageId: inbound.messageId, escalationReason, fallback: composed.fallback },
      );
    } catch (err) {
      log.error({ err }, 'Turn recording failed');
    }
    endSpan(spanRecord);

    endSpan(spanTurn);
    turnDuration.observe({ intent, escalated: String(escalated) }, (Date.now() - start) / 1000);
    log.info(
      { intent, confidence: composed.confidence, escalated, escalationReason, spans: summarizeSpans(trace) },
      'Turn completed',
    );

    return { status: 'replied', intent, content, confidence: composed.confidence, escalated, escalationReason };
  }

  private async gatherEvidence(intent: Intent, inbound: InboundMessage, session: Session): Promise<TurnEvidence> {
    if (intent === 'visual_search') {
      return { visual: await this.gatherVisualEvidence(inbound) };
    }
    if (intent !== 'qa') return {};

    const { controller, catalog, retriever } = this.deps;
    const subject = resolveSubject(inbound, session);
    const evidence: TurnEvidence = { subject };

    if (subject?.type === 'product') {
      const product = await controller.invoke('catalog', () => catalog.getById(subject.id));
      if (product.ok && product.value) evidence.subjectProduct = product.value;
    }

    // Record-backed answers (product detail, size/color/stock) need no retrieval
    const question = inbound.text ?? '';
    if (evidence.subjectProduct && (inbound.kind === 'interactive' || answerFromRecord(question, evidence.subjectProduct))) {
      return evidence;
    }

    if (retriever) {
      const query = [question, subject?.label].filter(Boolean).join(' ');
      evidence.knowledge = await controller.invoke('retrieval', () => retriever.searchKnowledge(query));
    }
    return evidence;
  }

  private async gatherVisualEvidence(inbound: InboundMessage): Promise<VisualSearchEvidence> {
    const { controller, media, extractor, retriever } = this.deps;
    const image = inbound.image;
    if (!image || !media) return { stage: 'media', degraded: true };

    const downloaded = await controller.invoke('media', () => media.downloadMedia(image.mediaId));
    if (!downloaded.ok) return { stage: 'media', degraded: true };
    if (!extractor) return { stage: 'vision', degraded: true };

    const { data, mimeType } = downloaded.value;
    const analyzed = await controller.invoke('vision', () => extractor.extract(data, image.mimeType ?? mimeType));
    if (!analyzed.ok) return { stage: 'vision', degraded: true };

    const visual = analyzed.value;
    if (visual.kind !== 'attributes') return { stage: 'classified', visual };

    const matches: Outcome<ProductMatch[]> = retriever
      ? await controller.invoke('retrieval', () => retriever.searchProducts(buildAttributeQuery(visual)))
      : { ok: false, reason: 'upstream_error', attempts: 0 };
    return { stage: 'matched', visual, matches };
  }

  private async acknowledgeSuperseded(inbound: InboundMessage, trace: TraceContext, log: pino.Logger): Promise<TurnResult> {
    supersededTurns.inc();
    log.info({ messageId: inbound.messageId }, 'Image superseded by a newer one; acknowledging receipt');

    const content: ReplyContent = { type: 'text', text: SUPERSEDED_IMAGE_ACK };
    const inboundTurn: Turn = {
      direction: 'inbound',
      kind: inbound.kind,
      content: inboundContent(inbound),
      intent: 'visual_search',
      confidence: 1.0,
      latencyMs: 0,
      escalated: false,
      timestamp: inbound.timestamp,
    };

    await this.send(inbound.customerId, content, trace, log);
    this.deps.recorder.recordSuperseded(inbound.customerId, inboundTurn, {
      requestId: trace.requestId,
      messageId: inbound.messageId,
    });
    return { status: 'superseded', content };
  }

  private async send(customerId: string, content: ReplyContent, trace: TraceContext, log: pino.Logger): Promise<void> {
    const span = startSpan(trace, 'send', { type: content.type });
    try {
      await this.deps.outbound.sendReply(customerId, content);
      endSpan(span);
    } catch (err) {
      endSpan(span, 'error');
      log.error({ err, type: content.type }, 'Failed to deliver reply');
    }
  }
}
