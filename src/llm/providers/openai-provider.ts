import OpenAI from 'openai';
import {
  LLMProvider,
  LLMProviderConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
} from '../types';
import { UpstreamError } from '../../resilience/errors';

/**
 * OpenAI provider adapter.
 *
 * Wraps the `openai` SDK and maps the generic request/response format to the
 * chat completions API. SDK-level retries are off: the Degradation Controller
 * owns the retry budget.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai' as const;
  readonly model: string;
  private client: OpenAI;

  constructor(config: LLMProviderConfig, client?: OpenAI) {
    this.model = config.model;
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    const completion = await this.client.chat.completions
      .create({
        model: this.model,
        messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      })
      .catch((err: unknown) => {
        if (err instanceof OpenAI.APIError) {
          throw new UpstreamError(`OpenAI ${err.status ?? 'error'}: ${err.message}`, 'generation', err.status);
        }
        throw err;
      });

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new UpstreamError('OpenAI returned empty response content', 'generation');
    }

    const usage = completion.usage;

    return {
      content,
      model: completion.model ?? this.model,
      provider: 'openai',
      usage: {
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }
}
