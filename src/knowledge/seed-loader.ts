import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { Order, Product } from '../config/types';
import { KnowledgeEntry, KnowledgeSeed, ProductSeed } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const ajv = new Ajv({ allErrors: true });

const stringArray = { type: 'array', items: { type: 'string' } };

const validateProducts = ajv.compile<ProductSeed[]>({
  type: 'array',
  items: {
    type: 'object',
    required: ['id', 'name', 'price', 'image_urls', 'sizes', 'colors', 'category', 'created_at'],
    properties: {
      id: { type: 'string' },
      name: { type: 'string' },
      description: { type: 'string' },
      price: { type: 'number', minimum: 0 },
      currency: { type: 'string' },
      image_urls: stringArray,
      sizes: stringArray,
      colors: stringArray,
      stock_by_size: { type: 'object', additionalProperties: { type: 'integer', minimum: 0 } },
      category: { type: 'string' },
      tags: stringArray,
      is_active: { type: 'boolean' },
      created_at: { type: 'string' },
      view_count: { type: 'integer', minimum: 0 },
      discount_percent: { type: 'number', minimum: 0, maximum: 100 },
    },
  },
});

const validateKnowledge = ajv.compile<KnowledgeSeed[]>({
  type: 'array',
  items: {
    type: 'object',
    required: ['id', 'title', 'content', 'category'],
    properties: {
      id: { type: 'string' },
      title: { type: 'string' },
      content: { type: 'string' },
      category: { type: 'string' },
      tags: stringArray,
    },
  },
});

interface OrderSeed {
  id: string;
  customer_phone: string;
  status: Order['status'];
  total_amount: number;
  currency?: string;
  items: Array<{ product_id: string; name: string; quantity: number; price: number; size?: string; color?: string }>;
  tracking_number?: string;
  carrier?: string;
  estimated_delivery?: string;
  delivered_at?: string;
}

const validateOrders = ajv.compile<OrderSeed[]>({
  type: 'array',
  items: {
    type: 'object',
    required: ['id', 'customer_phone', 'status', 'total_amount', 'items'],
    properties: {
      id: { type: 'string', pattern: '^ORD-\\d{4}-\\d{6}$' },
      customer_phone: { type: 'string' },
      status: { enum: ['pending', 'processing', 'shipped', 'delivered', 'cancelled'] },
      total_amount: { type: 'number' },
      currency: { type: 'string' },
      items: {
        type: 'array',
        items: {
          type: 'object',
          required: ['product_id', 'name', 'quantity', 'price'],
          properties: {
            product_id: { type: 'string' },
            name: { type: 'string' },
            quantity: { type: 'integer', minimum: 1 },
            price: { type: 'number' },
            size: { type: 'string' },
            color: { type: 'string' },
          },
        },
      },
      tracking_number: { type: 'string' },
      carrier: { type: 'string' },
      estimated_delivery: { type: 'string' },
      delivered_at: { type: 'string' },
    },
  },
});

function readYaml(filename: string, dir: string): unknown {
  const filepath = path.join(dir, filename);
  if (!fs.existsSync(filepath)) {
    logger.warn({ filepath }, 'Seed file not found');
    return [];
  }
  return yaml.load(fs.readFileSync(filepath, 'utf-8'));
}

function fail(filename: string, errors: string): never {
  throw new Error(`Invalid seed file ${filename}: ${errors}`);
}

export function toProduct(seed: ProductSeed): Product {
  return {
    id: seed.id,
    name: seed.name,
    description: seed.description,
    price: seed.price,
    currency: seed.currency ?? 'USD',
    imageUrls: seed.image_urls,
    sizes: seed.sizes,
    colors: seed.colors,
    stockBySize: seed.stock_by_size ?? {},
    category: seed.category,
    tags: seed.tags ?? [],
    isActive: seed.is_active ?? true,
    createdAt: Date.parse(seed.created_at),
    viewCount: seed.view_count ?? 0,
    discountPercent: seed.discount_percent ?? 0,
  };
}

/** Catalog seed, in file order (file order is catalog insertion order) */
export function loadProducts(dir: string = env.retrieval.knowledgeDir, filename = 'products.yaml'): Product[] {
  const data = readYaml(filename, dir);
  if (!validateProducts(data)) fail(filename, ajv.errorsText(validateProducts.errors));
  return data.map(toProduct);
}

export function loadKnowledgeEntries(dir: string = env.retrieval.knowledgeDir, filename = 'knowledge-base.yaml'): KnowledgeEntry[] {
  const data = readYaml(filename, dir);
  if (!validateKnowledge(data)) fail(filename, ajv.errorsText(validateKnowledge.errors));
  return data.map((seed) => ({ ...seed, tags: seed.tags ?? [] }));
}

export function loadOrders(dir: string = env.retrieval.knowledgeDir, filename = 'orders.yaml'): Order[] {
  const data = readYaml(filename, dir);
  if (!validateOrders(data)) fail(filename, ajv.errorsText(validateOrders.errors));
  return data.map((seed) => ({
    id: seed.id,
    customerPhone: seed.customer_phone,
    status: seed.status,
    totalAmount: seed.total_amount,
    currency: seed.currency ?? 'USD',
    items: seed.items.map((item) => ({
      productId: item.product_id,
      name: item.name,
      quantity: item.quantity,
      price: item.price,
      size: item.size,
      color: item.color,
    })),
    trackingNumber: seed.tracking_number,
    carrier: seed.carrier,
    estimatedDelivery: seed.estimated_delivery,
    deliveredAt: seed.delivered_at,
  }));
}
