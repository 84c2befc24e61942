import { Product } from '../config/types';
import { ClothingAttributes } from '../vision/types';
import { EmbeddingProvider } from './embedding-service';
import { Corpus, KnowledgeEntry, KnowledgeSnippet, ProductMatch, SimilarityIndex } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

/** Text embedded for a product: what it is, what it looks like, how it is tagged */
export function productEmbeddingText(product: Product): string {
  return [product.name, product.description, product.category, ...product.colors, ...product.tags]
    .filter(Boolean)
    .join(' ');
}

function knowledgeEmbeddingText(entry: KnowledgeEntry): string {
  return [entry.title, entry.content, ...entry.tags].join(' ');
}

/** Retrieval query for an image: garment type, colors, patterns, style keywords */
export function buildAttributeQuery(attributes: ClothingAttributes): string {
  return [
    attributes.garmentType,
    ...attributes.colors,
    ...attributes.patterns,
    ...attributes.styleKeywords,
  ]
    .filter(Boolean)
    .join(' ');
}

/**
 * Knowledge Retriever
 *
 * Ranked similarity search over the product catalog and the knowledge base.
 * Candidates under the similarity threshold are dropped here, not by the index.
 */
export class KnowledgeRetriever {
  private readonly log = logger.child({ component: 'knowledge-retriever' });
  private readonly products = new Map<string, Product>();
  private readonly entries = new Map<string, KnowledgeEntry>();

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly index: SimilarityIndex,
    private readonly threshold: number = env.retrieval.similarityThreshold,
  ) {}

  /**
   * Embed and index both corpora. Insertion order is the order given,
   * which is what ranks equal scores.
   */
  async initialize(products: Product[], entries: KnowledgeEntry[]): Promise<void> {
    const startTime = Date.now();

    if (products.length > 0) {
      const vectors = await this.embeddings.embedBatch(products.map(productEmbeddingText));
      products.forEach((product, i) => {
        this.products.set(product.id, product);
        this.index.add('products', product.id, vectors[i]);
      });
    }

    if (entries.length > 0) {
      const vectors = await this.embeddings.embedBatch(entries.map(knowledgeEmbeddingText));
      entries.forEach((entry, i) => {
        this.entries.set(entry.id, entry);
        this.index.add('knowledge', entry.id, vectors[i]);
      });
    }

    this.log.info(
      { productCount: products.length, knowledgeCount: entries.length, durationMs: Date.now() - startTime },
      'Similarity index initialized',
    );
  }

  async searchProducts(query: string, limit: number = env.retrieval.productLimit): Promise<ProductMatch[]> {
    const hits = await this.search('products', query, limit);
    const matches: ProductMatch[] = [];
    for (const hit of hits) {
      const product = this.products.get(hit.id);
      if (product?.isActive) matches.push({ product, score: hit.score });
    }
    return matches;
  }

  async searchKnowledge(query: string, limit: number = env.retrieval.knowledgeLimit): Promise<KnowledgeSnippet[]> {
    const hits = await this.search('knowledge', query, limit);
    const snippets: KnowledgeSnippet[] = [];
    for (const hit of hits) {
      const entry = this.entries.get(hit.id);
      if (entry) snippets.push({ entry, score: hit.score });
    }
    return snippets;
  }

  private async search(corpus: Corpus, query: string, limit: number) {
    if (!query.trim() || this.index.size(corpus) === 0) return [];
    const vector = await this.embeddings.embed(query);
    return this.index
      .search(corpus, vector)
      .filter((hit) => hit.score >= this.threshold)
      .slice(0, limit);
  }
}
