/**
 * In-Memory Vector Store: cosine similarity over two corpora.
 *
 * Brute force; sized for a boutique catalog and a small knowledge base.
 */

import { Corpus, SimilarityHit, SimilarityIndex } from './types';

interface VectorEntry {
  id: string;
  embedding: number[];
}

export class VectorStore implements SimilarityIndex {
  private readonly corpora = new Map<Corpus, VectorEntry[]>();

  add(corpus: Corpus, id: string, embedding: number[]): void {
    const entries = this.corpora.get(corpus) ?? [];
    entries.push({ id, embedding });
    this.corpora.set(corpus, entries);
  }

  clear(corpus?: Corpus): void {
    if (corpus) this.corpora.delete(corpus);
    else this.corpora.clear();
  }

  size(corpus: Corpus): number {
    return this.corpora.get(corpus)?.length ?? 0;
  }

  search(corpus: Corpus, query: number[]): SimilarityHit[] {
    const entries = this.corpora.get(corpus) ?? [];

    return entries
      .map((entry, position) => ({
        id: entry.id,
        score: cosineSimilarity(query, entry.embedding),
        position,
      }))
      .sort((a, b) => b.score - a.score || a.position - b.position);
  }
}

/** Cosine similarity; 0 for mismatched or zero vectors */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}
