/** Closed set of intents; exactly one per turn */
export type Intent =
  | 'visual_search'
  | 'qa'
  | 'order_tracking'
  | 'catalog_browse'
  | 'greeting'
  | 'unclear';

export const INTENTS: readonly Intent[] = [
  'visual_search',
  'qa',
  'order_tracking',
  'catalog_browse',
  'greeting',
  'unclear',
];

export type MessageKind = 'text' | 'image' | 'interactive';

export type Direction = 'inbound' | 'outbound';

/** Interactive reply (list row or button) */
export interface InteractiveReply {
  type: 'list_reply' | 'button_reply';
  id: string;
  title?: string;
}

/** Normalized inbound message, transport-agnostic */
export interface InboundMessage {
  /** Transport message id (used for de-duplication) */
  messageId: string;
  /** Stable external handle, e.g. a phone number */
  customerId: string;
  kind: MessageKind;
  text?: string;
  image?: { mediaId: string; mimeType?: string; caption?: string };
  interactive?: InteractiveReply;
  timestamp: number;
  /** Caller-specified escalation override */
  forceEscalation?: boolean;
}

/** One recorded message in a session. Immutable once recorded. */
export interface Turn {
  readonly direction: Direction;
  readonly kind: MessageKind;
  /** Raw text, or a content reference (media id, interactive id) */
  readonly content: string;
  readonly intent: Intent;
  /** 0..1 */
  readonly confidence: number;
  readonly latencyMs: number;
  readonly escalated: boolean;
  readonly timestamp: number;
}

export interface ContextReference {
  type: 'product' | 'topic';
  id: string;
  label: string;
}

export interface SessionContext {
  reference?: ContextReference;
  /** ISO 639-1 */
  language: string;
  lastIntent?: Intent;
  /** Open order-tracking sub-dialog: we asked for an order id last turn */
  awaitingOrderId: boolean;
}

export interface Session {
  customerId: string;
  /** Insertion-ordered, oldest first, bounded by the store capacity */
  history: Turn[];
  context: SessionContext;
  lastActivityAt: number;
  /** True when no live session existed (first contact, expired, or store unavailable) */
  isNew: boolean;
}

// ───── Catalog ──────────────────────────────────────────────────

export interface Product {
  id: string;
  name: string;
  description?: string;
  price: number;
  currency: string;
  imageUrls: string[];
  sizes: string[];
  colors: string[];
  /** Units in stock per size; absent sizes are treated as out of stock */
  stockBySize: Record<string, number>;
  category: string;
  tags: string[];
  isActive: boolean;
  /** Epoch ms */
  createdAt: number;
  viewCount: number;
  /** 0..100; 0 = not on sale */
  discountPercent: number;
}

export type BrowseCategory = 'new_arrivals' | 'trending' | 'sale';

// ───── Orders ───────────────────────────────────────────────────

export type OrderStatus = 'pending' | 'processing' | 'shipped' | 'delivered' | 'cancelled';

export interface OrderItem {
  productId: string;
  name: string;
  quantity: number;
  price: number;
  size?: string;
  color?: string;
}

export interface Order {
  id: string;
  customerPhone: string;
  status: OrderStatus;
  totalAmount: number;
  currency: string;
  items: OrderItem[];
  trackingNumber?: string;
  carrier?: string;
  estimatedDelivery?: string;
  deliveredAt?: string;
}

// ───── Outbound content ─────────────────────────────────────────

export interface ProductCard {
  id: string;
  name: string;
  price: number;
  currency: string;
  imageUrl?: string;
  sizes: string[];
  colors: string[];
}

export interface MenuOption {
  id: 'browse' | 'track' | 'help';
  title: string;
}

export type ReplyContent =
  | { type: 'text'; text: string }
  | { type: 'product_list'; intro: string; products: ProductCard[] }
  | { type: 'catalog_list'; category: BrowseCategory; title: string; products: ProductCard[] }
  | { type: 'product_detail'; productId: string; imageUrl?: string; text: string }
  | { type: 'menu'; header: string; body: string; options: MenuOption[] };
