import { EscalationGate, detectExplicitTrigger, isHumanRequest } from '../../src/escalation/escalation-gate';
import { WebhookEscalationNotifier } from '../../src/escalation/escalation-notifier';
import { EscalationNotifier, EscalationSummary } from '../../src/escalation/types';
import { HANDOFF_NOTICE } from '../../src/composer/messages';
import { Turn } from '../../src/config/types';
import { UpstreamError } from '../../src/resilience/errors';
import { buildFallbackMenu } from '../../src/resilience/static-fallbacks';
import { RecordingNotifier, textMessage } from '../helpers/fakes';

const summary = { customerId: 'cust', intent: 'qa' as const, lastMessage: 'hello', history: [] };
const reply = { type: 'text' as const, text: 'Here you go' };

function inboundTurn(intent: Turn['intent']): Turn {
  return { direction: 'inbound', kind: 'text', content: 'x', intent, confidence: 1, latencyMs: 0, escalated: false, timestamp: 0 };
}

describe('EscalationGate', () => {
  it('should pass a confident reply through untouched', () => {
    const notifier = new RecordingNotifier();
    const gate = new EscalationGate(notifier, 0.7);

    expect(gate.decide({ reply, confidence: 0.7, summary })).toEqual({ escalate: false, content: reply });
    expect(notifier.summaries).toEqual([]);
  });

  it('should replace a low-confidence reply with the handoff notice and notify', () => {
    const notifier = new RecordingNotifier();
    const gate = new EscalationGate(notifier, 0.7);

    const decision = gate.decide({ reply, confidence: 0.69, summary });

    expect(decision).toEqual({ escalate: true, content: { type: 'text', text: HANDOFF_NOTICE }, reason: 'low_confidence' });
    expect(notifier.summaries).toHaveLength(1);
    expect(notifier.summaries[0]).toMatchObject({ ...summary, reason: 'low_confidence', confidence: 0.69 });
  });

  it('should deliver a static fallback reply as is despite its zero confidence', () => {
    const notifier = new RecordingNotifier();
    const gate = new EscalationGate(notifier, 0.7);
    const menu = buildFallbackMenu();

    expect(gate.decide({ reply: menu, confidence: 0, fallback: true, summary })).toEqual({ escalate: false, content: menu });
    expect(notifier.summaries).toEqual([]);

    const forced = gate.decide({ reply: menu, confidence: 0, fallback: true, trigger: 'human_requested', summary });
    expect(forced).toEqual({ escalate: true, content: { type: 'text', text: HANDOFF_NOTICE }, reason: 'human_requested' });
  });

  it('should escalate an explicit trigger regardless of confidence', () => {
    const gate = new EscalationGate(new RecordingNotifier(), 0.7);
    const decision = gate.decide({ reply, confidence: 1, trigger: 'forced', summary });
    expect(decision.escalate && decision.reason).toBe('forced');
  });

  it('should not wait for or fail on a broken notifier', async () => {
    const broken: EscalationNotifier = {
      notify: async (_summary: EscalationSummary) => {
        throw new Error('webhook down');
      },
    };
    const gate = new EscalationGate(broken, 0.7);

    expect(gate.decide({ reply, confidence: 0, summary }).escalate).toBe(true);
    await new Promise((resolve) => setImmediate(resolve));
  });
});

describe('explicit triggers', () => {
  it('should spot requests for a person', () => {
    expect(isHumanRequest('Can I speak to a human?')).toBe(true);
    expect(isHumanRequest('I need a REAL PERSON')).toBe(true);
    expect(isHumanRequest('human hair wig')).toBe(false);
  });

  it('should rank forced over human request over repeated unclear', () => {
    expect(detectExplicitTrigger(textMessage('c', 'talk to a human', { forceEscalation: true }), 'qa', [])).toBe('forced');
    expect(detectExplicitTrigger(textMessage('c', 'talk to a human'), 'unclear', [inboundTurn('unclear')])).toBe('human_requested');
    expect(detectExplicitTrigger(textMessage('c', '???'), 'unclear', [inboundTurn('unclear')])).toBe('repeated_unclear');
    expect(detectExplicitTrigger(textMessage('c', '???'), 'unclear', [inboundTurn('greeting')])).toBeUndefined();
  });
});

describe('WebhookEscalationNotifier', () => {
  const fullSummary: EscalationSummary = { ...summary, reason: 'low_confidence', confidence: 0.2, timestamp: '2026-10-19T12:00:00.000Z' };
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should post the summary with the shared secret', async () => {
    const calls: Array<{ url: string; init?: RequestInit }> = [];
    jest.spyOn(global, 'fetch').mockImplementation(async (input, init) => {
      calls.push({ url: String(input), init });
      return new Response(null, { status: 204 });
    });

    await new WebhookEscalationNotifier('https://handoff.test/hook', 'test-secret', 1000).notify(fullSummary);

    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://handoff.test/hook');
    expect(calls[0].init?.method).toBe('POST');
    expect(new Headers(calls[0].init?.headers).get('X-Webhook-Secret')).toBe('test-secret');
  });

  it('should throw an upstream error on a non-2xx response', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('nope', { status: 500 }));

    await expect(new WebhookEscalationNotifier('https://handoff.test/hook', 'test-secret', 1000).notify(fullSummary))
      .rejects.toBeInstanceOf(UpstreamError);
  });
});
