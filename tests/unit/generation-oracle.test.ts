import { LLMGenerationOracle, buildGenerationMessages, scoreGeneration } from '../../src/llm/generation-oracle';
import { buildContents } from '../../src/llm/providers/gemini-provider';
import { parseProviderName } from '../../src/llm/provider-factory';
import { LLMCompletionRequest, LLMCompletionResponse, LLMProvider } from '../../src/llm/types';

class EchoProvider implements LLMProvider {
  readonly name = 'openai' as const;
  readonly model = 'test-model';
  readonly requests: LLMCompletionRequest[] = [];

  constructor(private readonly content: string) {}

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    this.requests.push(request);
    return {
      content: this.content,
      model: this.model,
      provider: this.name,
      usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
      latencyMs: 1,
    };
  }
}

describe('scoreGeneration', () => {
  it('should score grounded answers higher and penalize hedging', () => {
    expect(scoreGeneration('We ship in 3-5 days.', true)).toBeCloseTo(0.85);
    expect(scoreGeneration('We ship in 3-5 days.', false)).toBeCloseTo(0.65);
    expect(scoreGeneration("I'm not sure about that.", true)).toBeCloseTo(0.65);
    expect(scoreGeneration('Unfortunately I cannot say.', false)).toBeCloseTo(0.45);
  });
});

describe('buildGenerationMessages', () => {
  it('should put notes, subject and language ahead of the history and the question', () => {
    const messages = buildGenerationMessages({
      message: 'est-ce lavable ?',
      history: [{ role: 'assistant', content: 'Bonjour !' }],
      snippets: [{ source: 'care/kb_care_wool', content: 'Hand wash cold.' }],
      subject: 'Ivory Cable Knit Sweater',
      language: 'fr',
    });

    expect(messages.map((m) => m.role)).toEqual(['system', 'system', 'system', 'system', 'assistant', 'user']);
    expect(messages[1].content).toBe('Reference notes:\n[care/kb_care_wool]\nHand wash cold.');
    expect(messages[2].content).toBe('The customer is asking about: Ivory Cable Knit Sweater. Words like "it" or "this" refer to it.');
    expect(messages[3].content).toBe('Reply in French.');
    expect(messages[5]).toEqual({ role: 'user', content: 'est-ce lavable ?' });
  });

  it('should send only the base prompt for an English question without notes', () => {
    const messages = buildGenerationMessages({ message: 'hi', history: [], snippets: [], language: 'en' });
    expect(messages.map((m) => m.role)).toEqual(['system', 'user']);
  });
});

describe('LLMGenerationOracle', () => {
  it('should trim the completion and score it', async () => {
    const provider = new EchoProvider('  Returns are free within 30 days.  ');
    const oracle = new LLMGenerationOracle(provider, { temperature: 0.2, maxTokens: 100 });

    const result = await oracle.generate({
      message: 'how do returns work',
      history: [],
      snippets: [{ source: 'returns/kb_returns', content: '30 days' }],
      language: 'en',
    });

    expect(result.text).toBe('Returns are free within 30 days.');
    expect(result.confidence).toBeCloseTo(0.85);
    expect(provider.requests[0]).toMatchObject({ temperature: 0.2, maxTokens: 100 });
  });
});

describe('gemini buildContents', () => {
  it('should map roles, merge consecutive turns and start with the user', () => {
    expect(buildContents([
      { role: 'assistant', content: 'Hello!' },
      { role: 'user', content: 'a' },
      { role: 'user', content: 'b' },
    ])).toEqual([
      { role: 'user', parts: [{ text: '(conversation start)' }] },
      { role: 'model', parts: [{ text: 'Hello!' }] },
      { role: 'user', parts: [{ text: 'a' }, { text: 'b' }] },
    ]);
  });
});

describe('parseProviderName', () => {
  it('should accept known providers only', () => {
    expect(parseProviderName('gemini')).toBe('gemini');
    expect(() => parseProviderName('anthropic')).toThrow('Unknown LLM provider: anthropic');
  });
});
