/**
 * Embedding Service: abstraction for text embedding providers.
 *
 * Uses OpenAI text-embedding-3-small by default. Batch embedding seeds the
 * index at startup; single-query embedding serves each search.
 */

import { env } from '../config/env';
import { logger } from '../observability/logger';
import { UpstreamError } from '../resilience/errors';

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

interface EmbeddingResponse {
  data: Array<{ embedding: number[]; index: number }>;
}

function isEmbeddingResponse(value: unknown): value is EmbeddingResponse {
  if (typeof value !== 'object' || value === null || !('data' in value)) return false;
  return Array.isArray(value.data);
}

/**
 * OpenAI-compatible embedding provider.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly log = logger.child({ component: 'embedding-service' });

  constructor(
    private readonly apiKey: string = env.openai.apiKey,
    private readonly model: string = env.openai.embeddingModel,
    private readonly baseUrl: string = 'https://api.openai.com/v1',
  ) {}

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    if (!embedding) {
      throw new UpstreamError('Embedding API returned no vectors', 'retrieval');
    }
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (!this.apiKey) {
      throw new UpstreamError('OpenAI API key not configured for embeddings', 'retrieval');
    }

    const batchSize = 100;
    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);

      const response = await fetch(`${this.baseUrl}/embeddings`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ model: this.model, input: batch }),
      });

      if (!response.ok) {
        const errorBody = await response.text();
        this.log.error({ status: response.status, body: errorBody }, 'OpenAI embedding API error');
        throw new UpstreamError(`Embedding API error: ${response.status}`, 'retrieval', response.status);
      }

      const data: unknown = await response.json();
      if (!isEmbeddingResponse(data)) {
        throw new UpstreamError('Embedding API returned an unexpected body', 'retrieval');
      }

      const sorted = [...data.data].sort((a, b) => a.index - b.index);
      for (const item of sorted) {
        allEmbeddings.push(item.embedding);
      }
    }

    return allEmbeddings;
  }
}
