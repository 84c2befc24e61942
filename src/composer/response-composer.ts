/**
 * Response Composer
 *
 * Builds the single reply for a turn from its intent and gathered evidence,
 * with a confidence score and a proposed context update.
 * Deterministic replies score 1.0; generated answers carry the generation
 * confidence. When generation degraded the reply is the rule-based menu,
 * scored 0.0 and flagged as a fallback.
 */

import {
  ContextReference,
  InboundMessage,
  Intent,
  Product,
  ReplyContent,
  Session,
  Turn,
} from '../config/types';
import { GenerationOracle, LLMMessage } from '../llm/types';
import { OrderLookup } from '../orders/order-lookup';
import { ProductCatalog, listCategory } from '../catalog/product-catalog';
import { DegradationController } from '../resilience/degradation-controller';
import { buildFallbackMenu, getStaticFallback } from '../resilience/static-fallbacks';
import { detectBrowseCategory, extractOrderId, hasOrderIdShape, isOrderPhrase } from '../routing/intent-router';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { ComposedReply, TurnEvidence, VisualSearchEvidence } from './types';
import * as messages from './messages';

const MAX_VISUAL_MATCHES = 5;

const PRONOUN_PATTERN = /\b(it|this|that|this one|that one|these|those|them)\b/i;

const GARMENT_NOUNS = /\b(dress(es)?|shirts?|t-shirts?|tops?|blouses?|jeans|pants|trousers|skirts?|jackets?|coats?|sweaters?|hoodies?|shorts|shoes|sneakers|boots|bags?)\b/i;

// Numeric sizes only after "size": "in 2 days" is not a size question
const SIZE_PATTERN = /\b(?:size\s+(xxs|xs|s|m|l|xl|xxl|\d{1,2})|in\s+(?:an?\s+)?(xxs|xs|s|m|l|xl|xxl))\b/i;

const COLOR_WORDS = [
  'black', 'white', 'red', 'blue', 'navy', 'green', 'olive', 'yellow', 'pink', 'purple',
  'orange', 'brown', 'beige', 'cream', 'grey', 'gray', 'gold', 'silver', 'burgundy',
];

const COLOR_PATTERN = new RegExp(`\\b(${COLOR_WORDS.join('|')})\\b`, 'i');

const STOCK_PATTERN = /\b(in stock|available|availability|sold out)\b/i;

/** Intents after which a stored product reference may be carried into the next question */
const REFERENCE_CARRYING_INTENTS: ReadonlySet<Intent> = new Set(['qa', 'visual_search']);

function deterministic(content: ReplyContent, context: ComposedReply['context'] = {}): ComposedReply {
  return { content, confidence: 1.0, context: { awaitingOrderId: false, ...context } };
}

function fallbackMenu(context: ComposedReply['context']): ComposedReply {
  return { content: buildFallbackMenu(), confidence: 0.0, context, fallback: true };
}

function text(value: string): ReplyContent {
  return { type: 'text', text: value };
}

function productReference(product: Product): ContextReference {
  return { type: 'product', id: product.id, label: product.name };
}

/**
 * Subject a question is about: a product picked from a list, or the stored
 * reference when the question leans on it ("do you have it in M?").
 */
export function resolveSubject(message: InboundMessage, session: Session): ContextReference | undefined {
  if (message.kind === 'interactive' && message.interactive?.type === 'list_reply') {
    const { id, title } = message.interactive;
    return { type: 'product', id, label: title ?? id };
  }

  const { reference, lastIntent } = session.context;
  if (!reference || !lastIntent || !REFERENCE_CARRYING_INTENTS.has(lastIntent)) return undefined;

  const question = message.text ?? '';
  const usesPronoun = PRONOUN_PATTERN.test(question);
  const namesGarment = GARMENT_NOUNS.test(question);
  const asksAttribute = SIZE_PATTERN.test(question) || COLOR_PATTERN.test(question) || STOCK_PATTERN.test(question);

  if (usesPronoun || (asksAttribute && !namesGarment)) return reference;
  return undefined;
}

/** Answer size, color or stock questions straight from the catalog record */
export function answerFromRecord(question: string, product: Product): string | undefined {
  const size = question.match(SIZE_PATTERN);
  const label = size?.[1] ?? size?.[2];
  if (label) return messages.sizeAvailability(product, label);

  const color = question.match(COLOR_PATTERN);
  if (color) return messages.colorAvailability(product, color[1]);

  if (STOCK_PATTERN.test(question)) return messages.stockSummary(product);
  return undefined;
}

function historyMessages(history: Turn[], limit: number): LLMMessage[] {
  return history
    .filter((turn) => turn.content)
    .slice(-limit)
    .map((turn): LLMMessage => ({
      role: turn.direction === 'inbound' ? 'user' : 'assistant',
      content: turn.content,
    }));
}

export interface ResponseComposerDeps {
  controller: DegradationController;
  orders: OrderLookup;
  catalog: ProductCatalog;
  /** Absent when no generation provider is configured */
  generation?: GenerationOracle;
  historyTurns?: number;
  browseLimit?: number;
}

export class ResponseComposer {
  private readonly log = logger.child({ component: 'response-composer' });
  private readonly historyTurns: number;
  private readonly browseLimit: number;

  constructor(private readonly deps: ResponseComposerDeps) {
    this.historyTurns = deps.historyTurns ?? env.generation.historyTurns;
    this.browseLimit = deps.browseLimit ?? env.catalog.browseLimit;
  }

  async compose(intent: Intent, evidence: TurnEvidence, session: Session, message: InboundMessage): Promise<ComposedReply> {
    switch (intent) {
      case 'visual_search':
        return this.composeVisualSearch(evidence.visual);
      case 'qa':
        return this.composeQuestion(evidence, session, message);
      case 'order_tracking':
        return this.composeOrderTracking(session, message);
      case 'catalog_browse':
        return this.composeBrowse(message);
      case 'greeting':
        return deterministic(text(messages.GREETING));
      case 'unclear':
        return deterministic(text(messages.unclearRedirect(session.context.language)));
    }
  }

  private composeVisualSearch(visual: VisualSearchEvidence | undefined): ComposedReply {
    if (!visual || visual.stage === 'media') {
      return deterministic(getStaticFallback('media'));
    }
    if (visual.stage === 'vision') {
      return deterministic(getStaticFallback('vision'));
    }
    if (visual.stage === 'classified') {
      if (visual.visual.kind === 'not_clothing') {
        return deterministic(text(messages.CLOTHING_ONLY_REDIRECT));
      }
      return {
        content: text(messages.CLEARER_PHOTO_REQUEST),
        confidence: visual.visual.confidence,
        context: { awaitingOrderId: false },
      };
    }

    if (!visual.matches.ok) {
      return deterministic(getStaticFallback('product_retrieval'));
    }

    // Stable sort: equal scores keep catalog order from the retriever
    const ranked = [...visual.matches.value]
      .sort((a, b) => b.score - a.score)
      .slice(0, MAX_VISUAL_MATCHES);

    if (ranked.length === 0) {
      return deterministic(text(messages.NOTHING_SIMILAR));
    }

    return deterministic(
      {
        type: 'product_list',
        intro: messages.VISUAL_MATCHES_INTRO,
        products: ranked.map((m) => messages.productCard(m.product)),
      },
      { reference: productReference(ranked[0].product) },
    );
  }

  private async composeQuestion(evidence: TurnEvidence, session: Session, message: InboundMessage): Promise<ComposedReply> {
    const product = evidence.subjectProduct;
    const question = message.text ?? '';

    if (product) {
      const reference = productReference(product);
      if (message.kind === 'interactive') {
        return deterministic(
          {
            type: 'product_detail',
            productId: product.id,
            imageUrl: product.imageUrls[0],
            text: messages.formatProductDetail(product),
          },
          { reference },
        );
      }
      const answer = answerFromRecord(question, product);
      if (answer) {
        return deterministic(text(answer), { reference });
      }
    }

    const snippets = evidence.knowledge?.ok ? evidence.knowledge.value : [];
    const subject = evidence.subject;
    const context = subject ? { reference: subject, awaitingOrderId: false } : { awaitingOrderId: false };

    const generation = this.deps.generation;
    if (!generation) {
      return fallbackMenu(context);
    }

    const outcome = await this.deps.controller.invoke('generation', () =>
      generation.generate({
        message: question || subject?.label || '',
        history: historyMessages(session.history, this.historyTurns),
        snippets: snippets.map((s) => ({ source: `${s.entry.category}/${s.entry.id}`, content: `${s.entry.title}\n${s.entry.content}` })),
        subject: subject?.label,
        language: session.context.language,
      }),
    );

    if (!outcome.ok) {
      this.log.warn({ reason: outcome.reason }, 'Generation degraded; serving rule-based menu');
      return fallbackMenu(context);
    }

    const answer = outcome.value.text.trim();
    if (!answer) {
      return fallbackMenu(context);
    }
    return { content: text(answer), confidence: outcome.value.confidence, context };
  }

  private async composeOrderTracking(session: Session, message: InboundMessage): Promise<ComposedReply> {
    const body = message.text ?? '';
    const orderId = extractOrderId(body);

    if (orderId) {
      const orders = this.deps.orders;
      const outcome = await this.deps.controller.invoke('orders', () => orders.findById(orderId));
      if (!outcome.ok) return deterministic(getStaticFallback('orders'));
      if (!outcome.value.found) return deterministic(text(messages.orderNotFound(outcome.value.orderId)));
      return deterministic(text(messages.formatOrderStatus(outcome.value.order)));
    }

    if (hasOrderIdShape(body)) {
      return deterministic(text(messages.ORDER_ID_FORMAT_GUIDANCE));
    }

    // We asked for an id last turn and got something else: explain the format, close the sub-dialog
    if (session.context.awaitingOrderId && message.kind === 'text' && body.trim() && !isOrderPhrase(body)) {
      return deterministic(text(messages.ORDER_ID_FORMAT_GUIDANCE));
    }

    return deterministic(text(messages.ORDER_ID_PROMPT), { awaitingOrderId: true });
  }

  private async composeBrowse(message: InboundMessage): Promise<ComposedReply> {
    const category = detectBrowseCategory(message.text) ?? 'new_arrivals';
    const catalog = this.deps.catalog;
    const limit = this.browseLimit;

    const outcome = await this.deps.controller.invoke('catalog', () => listCategory(catalog, category, limit));
    if (!outcome.ok) return deterministic(getStaticFallback('catalog'));

    const products = outcome.value.slice(0, limit);
    if (products.length === 0) {
      return deterministic(text(messages.emptyCategory(category)));
    }

    return deterministic({
      type: 'catalog_list',
      category,
      title: messages.categoryTitle(category),
      products: products.map(messages.productCard),
    });
  }
}
