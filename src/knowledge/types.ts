import { Product } from '../config/types';

/** The two independently addressable corpora of the similarity index */
export type Corpus = 'products' | 'knowledge';

export interface KnowledgeEntry {
  id: string;
  title: string;
  content: string;
  category: string;
  tags: string[];
}

export interface ProductMatch {
  product: Product;
  score: number;
}

export interface KnowledgeSnippet {
  entry: KnowledgeEntry;
  score: number;
}

/** Raw hit from the similarity index, before thresholding */
export interface SimilarityHit {
  id: string;
  score: number;
  /** Insertion position within its corpus; ranks ties */
  position: number;
}

/** Similarity-search oracle over both corpora */
export interface SimilarityIndex {
  add(corpus: Corpus, id: string, embedding: number[]): void;
  /** All entries of a corpus, score desc, ties by insertion order */
  search(corpus: Corpus, query: number[]): SimilarityHit[];
  size(corpus: Corpus): number;
}

// ───── YAML seed shapes ────────────────────────────────────────

export interface ProductSeed {
  id: string;
  name: string;
  description?: string;
  price: number;
  currency?: string;
  image_urls: string[];
  sizes: string[];
  colors: string[];
  stock_by_size?: Record<string, number>;
  category: string;
  tags?: string[];
  is_active?: boolean;
  /** ISO date, quoted in YAML */
  created_at: string;
  view_count?: number;
  discount_percent?: number;
}

export interface KnowledgeSeed {
  id: string;
  title: string;
  content: string;
  category: string;
  tags?: string[];
}
