import { GoogleGenerativeAI, GoogleGenerativeAIFetchError, Content } from '@google/generative-ai';
import {
  LLMProvider,
  LLMProviderConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMMessage,
} from '../types';
import { UpstreamError } from '../../resilience/errors';

/**
 * Google Gemini provider adapter.
 *
 * Differences from OpenAI:
 * 1. System instruction is a separate parameter, not in the messages array.
 * 2. Role mapping: 'assistant' → 'model', 'user' stays 'user'.
 * 3. Messages use `parts: [{ text }]` instead of a `content` string.
 */
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  private genAI: GoogleGenerativeAI;

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.genAI = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    let systemInstruction = '';
    const nonSystemMessages: LLMMessage[] = [];

    for (const msg of request.messages) {
      if (msg.role === 'system') {
        systemInstruction += (systemInstruction ? '\n\n' : '') + msg.content;
      } else {
        nonSystemMessages.push(msg);
      }
    }

    const model = this.genAI.getGenerativeModel({
      model: this.model,
      systemInstruction: systemInstruction || undefined,
      generationConfig: {
        temperature: request.temperature,
        maxOutputTokens: request.maxTokens,
      },
    });

    const result = await model
      .generateContent({ contents: buildContents(nonSystemMessages) })
      .catch((err: unknown) => {
        if (err instanceof GoogleGenerativeAIFetchError) {
          throw new UpstreamError(`Gemini ${err.status ?? 'error'}: ${err.message}`, 'generation', err.status);
        }
        throw err;
      });
    const response = result.response;
    const content = response.text();

    if (!content) {
      throw new UpstreamError('Gemini returned empty response', 'generation');
    }

    const usageMetadata = response.usageMetadata;

    return {
      content,
      model: this.model,
      provider: 'gemini',
      usage: {
        promptTokens: usageMetadata?.promptTokenCount ?? 0,
        completionTokens: usageMetadata?.candidatesTokenCount ?? 0,
        totalTokens: usageMetadata?.totalTokenCount ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }
}

/**
 * Convert LLMMessage[] to Gemini Content[].
 * Consecutive same-role messages are merged; the first entry must be 'user'.
 */
export function buildContents(messages: LLMMessage[]): Content[] {
  const contents: Content[] = [];

  for (const msg of messages) {
    const role = msg.role === 'assistant' ? 'model' : 'user';
    const last = contents[contents.length - 1];
    if (last && last.role === role) {
      last.parts.push({ text: msg.content });
    } else {
      contents.push({ role, parts: [{ text: msg.content }] });
    }
  }

  if (contents.length > 0 && contents[0].role !== 'user') {
    contents.unshift({ role: 'user', parts: [{ text: '(conversation start)' }] });
  }

  return contents;
}
