import { BrowseCategory, Product } from '../config/types';
import { env } from '../config/env';

/** Product catalog collaborator. Every list holds active products only. */
export interface ProductCatalog {
  getById(id: string): Promise<Product | undefined>;
  /** Created within the new-arrival window, newest first */
  listNewArrivals(limit: number): Promise<Product[]>;
  /** Most viewed first */
  listTrending(limit: number): Promise<Product[]>;
  /** Discounted items, highest discount first */
  listOnSale(limit: number): Promise<Product[]>;
  /** Every active product in catalog insertion order */
  all(): Promise<Product[]>;
}

export function listCategory(catalog: ProductCatalog, category: BrowseCategory, limit: number): Promise<Product[]> {
  switch (category) {
    case 'new_arrivals':
      return catalog.listNewArrivals(limit);
    case 'trending':
      return catalog.listTrending(limit);
    case 'sale':
      return catalog.listOnSale(limit);
  }
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * In-memory catalog seeded from knowledge/products.yaml.
 * Sorts are stable, so equal keys keep insertion order.
 */
export class InMemoryProductCatalog implements ProductCatalog {
  private readonly products: Product[];
  private readonly byId: Map<string, Product>;

  constructor(
    products: Product[],
    private readonly newArrivalWindowDays: number = env.catalog.newArrivalWindowDays,
    private readonly now: () => number = Date.now,
  ) {
    this.products = [...products];
    this.byId = new Map(products.map((p) => [p.id, p]));
  }

  async getById(id: string): Promise<Product | undefined> {
    return this.byId.get(id);
  }

  async listNewArrivals(limit: number): Promise<Product[]> {
    const cutoff = this.now() - this.newArrivalWindowDays * DAY_MS;
    return this.active()
      .filter((p) => p.createdAt >= cutoff)
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, limit);
  }

  async listTrending(limit: number): Promise<Product[]> {
    return this.active()
      .sort((a, b) => b.viewCount - a.viewCount)
      .slice(0, limit);
  }

  async listOnSale(limit: number): Promise<Product[]> {
    return this.active()
      .filter((p) => p.discountPercent > 0)
      .sort((a, b) => b.discountPercent - a.discountPercent)
      .slice(0, limit);
  }

  async all(): Promise<Product[]> {
    return this.active();
  }

  private active(): Product[] {
    return this.products.filter((p) => p.isActive);
  }
}
