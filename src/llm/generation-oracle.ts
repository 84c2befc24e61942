import {
  GenerationOracle,
  GenerationRequest,
  GenerationResult,
  LLMMessage,
  LLMProvider,
} from './types';
import { env } from '../config/env';
import { languageName } from '../routing/language';

const SYSTEM_PROMPT = [
  'You are the shopping assistant of an online fashion boutique, chatting with customers on WhatsApp.',
  'You help with clothing: products, sizes, colors, fabrics, care, shipping, returns and exchanges.',
  '',
  'Rules:',
  '- Answer only from the reference notes and the conversation. If the notes do not cover it, say you are not sure.',
  '- Never invent prices, stock levels, order details or policies.',
  '- Stay on fashion and shopping topics.',
  '- Keep replies under 80 words; WhatsApp formatting (*bold*) is fine, no headings.',
  '- Sizes come as XS, S, M, L, XL, XXL or numeric (US 2-16, EU 34-48).',
].join('\n');

const HEDGE_PHRASES = [
  "i'm not sure",
  'i am not sure',
  "i don't know",
  'i cannot',
  "i can't",
  'unfortunately',
  'i apologize',
];

/**
 * Confidence heuristic for a generated answer:
 * 0.85 when grounded in retrieved notes, 0.65 otherwise, minus 0.2 if it hedges.
 */
export function scoreGeneration(text: string, grounded: boolean): number {
  let confidence = grounded ? 0.85 : 0.65;
  const lower = text.toLowerCase();
  if (HEDGE_PHRASES.some((p) => lower.includes(p))) {
    confidence -= 0.2;
  }
  return Math.max(0, Math.min(1, confidence));
}

export function buildGenerationMessages(request: GenerationRequest): LLMMessage[] {
  const messages: LLMMessage[] = [{ role: 'system', content: SYSTEM_PROMPT }];

  if (request.snippets.length > 0) {
    const notes = request.snippets
      .map((s) => `[${s.source}]\n${s.content}`)
      .join('\n\n---\n\n');
    messages.push({ role: 'system', content: `Reference notes:\n${notes}` });
  }

  if (request.subject) {
    messages.push({
      role: 'system',
      content: `The customer is asking about: ${request.subject}. Words like "it" or "this" refer to it.`,
    });
  }

  if (request.language !== 'en') {
    messages.push({ role: 'system', content: `Reply in ${languageName(request.language)}.` });
  }

  messages.push(...request.history);
  messages.push({ role: 'user', content: request.message });
  return messages;
}

/** Generation oracle backed by any configured LLM provider */
export class LLMGenerationOracle implements GenerationOracle {
  constructor(
    private readonly provider: LLMProvider,
    private readonly settings: { temperature: number; maxTokens: number } = {
      temperature: env.openai.temperature,
      maxTokens: env.openai.maxTokens,
    },
  ) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const response = await this.provider.complete({
      messages: buildGenerationMessages(request),
      temperature: this.settings.temperature,
      maxTokens: this.settings.maxTokens,
    });

    const text = response.content.trim();
    return { text, confidence: scoreGeneration(text, request.snippets.length > 0) };
  }
}
