import { createHarness, FAST_POLICY } from '../helpers/harness';
import {
  FailingGeneration,
  NOW,
  DAY_MS,
  RED_DRESS_ANSWER,
  ScriptedImageOracle,
  StubGeneration,
  buttonReply,
  imageMessage,
  listReply,
  makeProduct,
  textMessage,
} from '../helpers/fakes';
import { createTraceContext } from '../../src/observability/trace';
import { MediaSource, DownloadedMedia } from '../../src/channels/types';
import { loadOrders } from '../../src/knowledge/seed-loader';
import * as messages from '../../src/composer/messages';
import { buildFallbackMenu } from '../../src/resilience/static-fallbacks';
import { AnalyticsSink, TurnRecord } from '../../src/analytics/types';
import { EscalationNotifier, EscalationSummary } from '../../src/escalation/types';

const trace = () => createTraceContext();

/** Media source that holds every download until released */
class GatedMedia implements MediaSource {
  requested: string[] = [];
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  async downloadMedia(mediaId: string): Promise<DownloadedMedia> {
    this.requested.push(mediaId);
    await this.gate;
    return { data: Buffer.alloc(4096, 1), mimeType: 'image/jpeg' };
  }

  open(): void {
    this.release();
  }
}

class HangingAnalytics implements AnalyticsSink {
  attempts = 0;

  emit(_record: TurnRecord): Promise<void> {
    this.attempts++;
    return new Promise<void>(() => undefined);
  }

  async recent(): Promise<TurnRecord[]> {
    return [];
  }
}

/** Notifier that throws before returning a promise, breaking the gate mid-turn */
class BrokenNotifier implements EscalationNotifier {
  notify(_summary: EscalationSummary): Promise<void> {
    throw new Error('notifier misconfigured');
  }
}

class HangingMedia implements MediaSource {
  calls = 0;

  downloadMedia(): Promise<DownloadedMedia> {
    this.calls++;
    return new Promise<DownloadedMedia>(() => undefined);
  }
}

describe('Orchestrator', () => {
  describe('visual search', () => {
    it('should answer a red dress photo with matching products and remember the top match', async () => {
      const h = await createHarness();

      const result = await h.orchestrator.handleMessage(imageMessage('cust-1', 'media-red-dress'), trace());

      expect(result.status).toBe('replied');
      const [reply] = h.outbound.to('cust-1');
      expect(reply.type).toBe('product_list');
      if (reply.type !== 'product_list') return;
      expect(reply.intro).toBe(messages.VISUAL_MATCHES_INTRO);
      expect(reply.products.map((p) => p.id)).toEqual(['prod_001', 'prod_002']);

      const session = await h.sessions.load('cust-1');
      expect(session.context.reference).toEqual({ type: 'product', id: 'prod_001', label: 'Scarlet Wrap Midi Dress' });
      expect(session.context.lastIntent).toBe('visual_search');
    });

    it('should resolve "it" against the photo match and answer size availability from the record', async () => {
      const h = await createHarness();
      await h.orchestrator.handleMessage(imageMessage('cust-2', 'media-red-dress'), trace());

      const result = await h.orchestrator.handleMessage(textMessage('cust-2', 'Do you have it in size M?'), trace());

      expect(result).toEqual({
        status: 'replied',
        intent: 'qa',
        content: { type: 'text', text: 'Yes! The *Scarlet Wrap Midi Dress* is available in size M (4 in stock) for USD 79.00.' },
        confidence: 1.0,
        escalated: false,
        escalationReason: undefined,
      });
    });

    it('should redirect a non-clothing photo without searching the catalog', async () => {
      const oracle = new ScriptedImageOracle([JSON.stringify({ status: 'not_clothing', reason: 'a bowl of soup' })]);
      const h = await createHarness({ imageOracle: oracle });

      const result = await h.orchestrator.handleMessage(imageMessage('cust-3', 'media-soup'), trace());

      expect(h.outbound.to('cust-3')).toEqual([{ type: 'text', text: messages.CLOTHING_ONLY_REDIRECT }]);
      expect(result.status === 'replied' && result.escalated).toBe(false);
      const session = await h.sessions.load('cust-3');
      expect(session.context.reference).toBeUndefined();
    });

    it('should fall back within the time budget when media download hangs twice', async () => {
      const media = new HangingMedia();
      const h = await createHarness({ media });

      const started = Date.now();
      await h.orchestrator.handleMessage(imageMessage('cust-4', 'media-stuck'), trace());

      expect(Date.now() - started).toBeLessThan(1000);
      expect(media.calls).toBe(FAST_POLICY.retries + 1);
      const [reply] = h.outbound.to('cust-4');
      expect(reply).toEqual({
        type: 'text',
        text: "I couldn't open that photo. Could you send it again? A clear, well-lit picture of a single item works best.",
      });
    });

    it('should acknowledge a superseded image and process only the newest pending one', async () => {
      const media = new GatedMedia();
      const oracle = new ScriptedImageOracle([RED_DRESS_ANSWER]);
      const h = await createHarness({ media, imageOracle: oracle, policy: { timeoutMs: 1000, retries: 1, retryDelayMs: 0 } });

      const first = h.orchestrator.handleMessage(imageMessage('cust-5', 'media-A'), trace());
      const second = h.orchestrator.handleMessage(imageMessage('cust-5', 'media-B'), trace());
      const third = h.orchestrator.handleMessage(imageMessage('cust-5', 'media-C'), trace());
      media.open();

      const results = await Promise.all([first, second, third]);

      expect(results.map((r) => r.status)).toEqual(['replied', 'superseded', 'replied']);
      expect(media.requested).toEqual(['media-A', 'media-C']);
      expect(h.outbound.to('cust-5').filter((c) => c.type === 'text' && c.text === messages.SUPERSEDED_IMAGE_ACK)).toHaveLength(1);

      const session = await h.sessions.load('cust-5');
      expect(session.history.filter((t) => t.direction === 'inbound').map((t) => t.content)).toEqual(['media-A', 'media-C']);

      await h.recorder.drain();
      const records = await h.analytics.recent(10);
      expect(records.filter((r) => r.superseded).map((r) => r.turn.content)).toEqual(['media-B']);
    });
  });

  describe('order tracking', () => {
    it('should report an unknown order id with format guidance', async () => {
      const h = await createHarness();

      await h.orchestrator.handleMessage(textMessage('cust-6', 'Where is my order ORD-2024-999999?'), trace());

      expect(h.outbound.to('cust-6')).toEqual([{ type: 'text', text: messages.orderNotFound('ORD-2024-999999') }]);
      expect(messages.orderNotFound('ORD-2024-999999')).toContain('ORD-YYYY-NNNNNN');
    });

    it('should format the status of a known order', async () => {
      const h = await createHarness();

      await h.orchestrator.handleMessage(textMessage('cust-7', 'ord-2026-000101'), trace());

      expect(h.outbound.to('cust-7')).toEqual([
        {
          type: 'text',
          text: [
            '🚚 *Order Status*',
            'Order: ORD-2026-000101',
            'Status: Shipped',
            'Tracking: 1Z999AA10123456784',
            'Carrier: UPS',
            'Est. Delivery: 2026-10-22',
            '',
            '*Items:*',
            '• Scarlet Wrap Midi Dress x1',
            '• Crimson Satin Slip Dress x1',
            '',
            'Total: USD 174.00',
          ].join('\n'),
        },
      ]);
    });

    it('should ask for an order id, then explain the format when the follow-up has none', async () => {
      const h = await createHarness();

      await h.orchestrator.handleMessage(buttonReply('cust-8', 'track'), trace());
      expect((await h.sessions.load('cust-8')).context.awaitingOrderId).toBe(true);

      await h.orchestrator.handleMessage(textMessage('cust-8', "I don't have it"), trace());

      expect(h.outbound.to('cust-8')).toEqual([
        { type: 'text', text: messages.ORDER_ID_PROMPT },
        { type: 'text', text: messages.ORDER_ID_FORMAT_GUIDANCE },
      ]);
      expect((await h.sessions.load('cust-8')).context.awaitingOrderId).toBe(false);
    });

    it('should give identical replies to identical deterministic turns', async () => {
      const h = await createHarness();

      const a = await h.orchestrator.handleMessage(textMessage('cust-9', 'ORD-2026-000103'), trace());
      const b = await h.orchestrator.handleMessage(textMessage('cust-10', 'ORD-2026-000103'), trace());

      expect(a).toEqual(b);
      expect(a.status === 'replied' && a.confidence).toBe(1.0);
    });
  });

  describe('catalog browse', () => {
    it('should explain an empty New Arrivals list and suggest alternatives', async () => {
      const products = [
        makeProduct({ id: 'old-1', createdAt: NOW - 90 * DAY_MS }),
        makeProduct({ id: 'old-2', createdAt: NOW - 45 * DAY_MS }),
      ];
      const h = await createHarness({ products, knowledge: [] });

      await h.orchestrator.handleMessage(textMessage('cust-11', 'Show me new arrivals'), trace());

      const [reply] = h.outbound.to('cust-11');
      expect(reply).toEqual({ type: 'text', text: messages.emptyCategory('new_arrivals') });
      expect(reply.type === 'text' && reply.text.startsWith("😅 We don't have any New Arrivals right now.")).toBe(true);
    });

    it('should list new arrivals newest first', async () => {
      const h = await createHarness();

      await h.orchestrator.handleMessage(textMessage('cust-12', 'new arrivals'), trace());

      const [reply] = h.outbound.to('cust-12');
      expect(reply.type).toBe('catalog_list');
      if (reply.type !== 'catalog_list') return;
      expect(reply.title).toBe('New Arrivals');
      expect(reply.products.map((p) => p.id)).toEqual(['prod_014', 'prod_011', 'prod_004', 'prod_007', 'prod_001', 'prod_009', 'prod_002']);
    });
  });

  describe('questions and escalation', () => {
    it('should show product details for a list selection', async () => {
      const h = await createHarness();

      await h.orchestrator.handleMessage(listReply('cust-13', 'prod_004', 'Ivory Cable Knit Sweater'), trace());

      const [reply] = h.outbound.to('cust-13');
      expect(reply.type).toBe('product_detail');
      if (reply.type !== 'product_detail') return;
      expect(reply.productId).toBe('prod_004');
      expect(reply.imageUrl).toBe('https://cdn.threadline.example/products/prod_004.jpg');
      expect(reply.text.startsWith('👗 *Ivory Cable Knit Sweater*')).toBe(true);
    });

    it('should hand off a low-confidence generated answer', async () => {
      const generation = new StubGeneration({ text: 'Maybe polyester?', confidence: 0.4 });
      const h = await createHarness({ generation });

      const result = await h.orchestrator.handleMessage(textMessage('cust-14', 'What fabric is the lining made of?'), trace());

      expect(h.outbound.to('cust-14')).toEqual([{ type: 'text', text: messages.HANDOFF_NOTICE }]);
      expect(result.status === 'replied' && result.escalationReason).toBe('low_confidence');
      expect(h.notifier.summaries).toHaveLength(1);
      expect(h.notifier.summaries[0]).toMatchObject({ customerId: 'cust-14', reason: 'low_confidence', confidence: 0.4, intent: 'qa' });

      const session = await h.sessions.load('cust-14');
      expect(session.history.map((t) => t.escalated)).toEqual([true, true]);
    });

    it('should pass a confident generated answer through', async () => {
      const generation = new StubGeneration({ text: 'Standard shipping takes 3 to 5 business days.', confidence: 0.85 });
      const h = await createHarness({ generation });

      await h.orchestrator.handleMessage(textMessage('cust-15', 'How long does shipping take?'), trace());

      expect(h.outbound.to('cust-15')).toEqual([{ type: 'text', text: 'Standard shipping takes 3 to 5 business days.' }]);
      expect(generation.requests[0].snippets.map((s) => s.source)).toContain('shipping/kb_shipping_domestic');
    });

    it('should serve the rule-based menu, not a handoff, after generation fails on both attempts', async () => {
      const generation = new FailingGeneration();
      const h = await createHarness({ generation });

      const result = await h.orchestrator.handleMessage(textMessage('cust-16', 'Is the lining breathable?'), trace());
      await h.recorder.drain();

      expect(generation.calls).toBe(2);
      expect(h.outbound.to('cust-16')).toEqual([buildFallbackMenu()]);
      expect(result).toMatchObject({ status: 'replied', confidence: 0, escalated: false });
      expect(h.notifier.summaries).toEqual([]);

      const [, outboundRecord] = await h.analytics.recent(10);
      expect(outboundRecord).toMatchObject({ fallback: true, turn: { direction: 'outbound', confidence: 0, escalated: false } });
    });

    it('should still escalate an explicit request for a person when generation is down', async () => {
      const h = await createHarness({ generation: new FailingGeneration() });

      await h.orchestrator.handleMessage(textMessage('cust-16b', 'I want a real person'), trace());

      expect(h.outbound.to('cust-16b')).toEqual([{ type: 'text', text: messages.HANDOFF_NOTICE }]);
      expect(h.notifier.summaries[0]).toMatchObject({ reason: 'human_requested', confidence: 0 });
    });

    it('should flag the menu served after an internal pipeline error as a fallback', async () => {
      const h = await createHarness({ notifier: new BrokenNotifier() });

      const result = await h.orchestrator.handleMessage(textMessage('cust-16c', 'Can I talk to a human?'), trace());
      await h.recorder.drain();

      expect(result).toMatchObject({ status: 'replied', escalated: false });
      expect(h.outbound.to('cust-16c')).toEqual([buildFallbackMenu()]);
      const [, outboundRecord] = await h.analytics.recent(10);
      expect(outboundRecord.fallback).toBe(true);
    });

    it('should escalate when the customer asks for a person', async () => {
      const h = await createHarness();

      const result = await h.orchestrator.handleMessage(textMessage('cust-17', 'Can I talk to a human please'), trace());

      expect(result.status === 'replied' && result.escalationReason).toBe('human_requested');
      expect(h.outbound.to('cust-17')).toEqual([{ type: 'text', text: messages.HANDOFF_NOTICE }]);
    });

    it('should escalate the second unclear message in a row', async () => {
      const h = await createHarness();

      const first = await h.orchestrator.handleMessage(textMessage('cust-18', "what's the weather like"), trace());
      const second = await h.orchestrator.handleMessage(textMessage('cust-18', 'any sports score news?'), trace());

      expect(first.status === 'replied' && first.escalated).toBe(false);
      expect(second.status === 'replied' && second.escalationReason).toBe('repeated_unclear');
      expect(h.outbound.to('cust-18')).toEqual([
        { type: 'text', text: messages.unclearRedirect('en') },
        { type: 'text', text: messages.HANDOFF_NOTICE },
      ]);
    });

    it('should redirect off-topic messages in the customer language', async () => {
      const h = await createHarness();

      await h.orchestrator.handleMessage(textMessage('cust-19', '¿Puedes ayudarme con un recipe?'), trace());

      expect(h.outbound.to('cust-19')).toEqual([{ type: 'text', text: messages.unclearRedirect('es') }]);
      expect((await h.sessions.load('cust-19')).context.language).toBe('es');
    });
  });

  describe('session bookkeeping', () => {
    it('should keep at most ten turns, dropping the oldest first', async () => {
      const h = await createHarness();

      for (let i = 0; i < 6; i++) {
        await h.orchestrator.handleMessage(textMessage('cust-20', i % 2 === 0 ? 'hello' : 'new arrivals'), trace());
      }

      const session = await h.sessions.load('cust-20');
      expect(session.history).toHaveLength(10);
      expect(session.history.map((t) => t.intent)).toEqual([
        'catalog_browse', 'catalog_browse',
        'greeting', 'greeting',
        'catalog_browse', 'catalog_browse',
        'greeting', 'greeting',
        'catalog_browse', 'catalog_browse',
      ]);
      expect(session.history[0].direction).toBe('inbound');
    });

    it('should process one customer\'s messages in arrival order', async () => {
      const h = await createHarness();

      await Promise.all([
        h.orchestrator.handleMessage(textMessage('cust-21', 'hello'), trace()),
        h.orchestrator.handleMessage(textMessage('cust-21', 'ORD-2026-000102'), trace()),
        h.orchestrator.handleMessage(textMessage('cust-21', 'trending'), trace()),
      ]);

      const session = await h.sessions.load('cust-21');
      expect(session.history.map((t) => `${t.direction}:${t.intent}`)).toEqual([
        'inbound:greeting', 'outbound:greeting',
        'inbound:order_tracking', 'outbound:order_tracking',
        'inbound:catalog_browse', 'outbound:catalog_browse',
      ]);
      expect(h.outbound.to('cust-21').map((c) => c.type)).toEqual(['text', 'text', 'catalog_list']);
    });

    it('should send the reply without waiting on a hanging analytics sink', async () => {
      const analytics = new HangingAnalytics();
      const h = await createHarness({ analytics, policy: { timeoutMs: 300, retries: 1, retryDelayMs: 0 } });
      const started = Date.now();

      const result = await h.orchestrator.handleMessage(textMessage('cust-23', 'hello'), trace());

      expect(Date.now() - started).toBeLessThan(250);
      expect(result.status).toBe('replied');
      expect(h.outbound.to('cust-23')).toEqual([{ type: 'text', text: messages.GREETING }]);
      expect((await h.sessions.load('cust-23')).history).toHaveLength(2);

      await h.recorder.drain();
      expect(analytics.attempts).toBe(4);
    });

    it('should emit both turns of every reply to analytics', async () => {
      const h = await createHarness();
      const orders = loadOrders();

      await h.orchestrator.handleMessage(textMessage('cust-22', orders[1].id), trace());
      await h.recorder.drain();

      const records = await h.analytics.recent(10);
      expect(records.map((r) => r.turn.direction)).toEqual(['inbound', 'outbound']);
      expect(records[0].turn.content).toBe('ORD-2026-000102');
    });
  });
});
