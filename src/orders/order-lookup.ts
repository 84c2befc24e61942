import { Order } from '../config/types';

/** Lookup result; an unknown id is a value, not an error */
export type OrderLookupResult =
  | { found: true; order: Order }
  | { found: false; orderId: string };

export interface OrderLookup {
  findById(orderId: string): Promise<OrderLookupResult>;
}

/** Order lookup over a fixed set of orders (seeded from knowledge/orders.yaml) */
export class InMemoryOrderLookup implements OrderLookup {
  private readonly orders = new Map<string, Order>();

  constructor(orders: Order[]) {
    for (const order of orders) {
      this.orders.set(order.id.toUpperCase(), order);
    }
  }

  async findById(orderId: string): Promise<OrderLookupResult> {
    const normalized = orderId.toUpperCase();
    const order = this.orders.get(normalized);
    return order ? { found: true, order } : { found: false, orderId: normalized };
  }

  get size(): number {
    return this.orders.size;
  }
}
