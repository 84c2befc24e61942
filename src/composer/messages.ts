/**
 * Fixed customer-facing copy. Everything here is deterministic;
 * replies built only from this module carry confidence 1.0.
 */

import { BrowseCategory, Order, OrderStatus, Product, ProductCard, ReplyContent } from '../config/types';
import { LanguageCode, isSupportedLanguage } from '../routing/language';

export const GREETING =
  '👋 Hi! Welcome to our boutique.\n\n' +
  'Here is what I can do for you:\n' +
  '• Send me a *photo* of an outfit and I will find similar pieces\n' +
  '• Ask about sizes, shipping, returns or any product\n' +
  '• Type *New Arrivals*, *Trending* or *Sale* to browse\n' +
  '• Send your order ID (e.g. ORD-2024-001234) to track an order';

const UNCLEAR_REDIRECTS: Record<LanguageCode, string> = {
  en: "I'm here to help with fashion and clothing! Ask me about our products, sizes, shipping or returns, or send a photo of something you'd like to find.",
  es: '¡Estoy aquí para ayudarte con moda y ropa! Pregúntame por productos, tallas, envíos o devoluciones, o envíame una foto de lo que buscas.',
  fr: 'Je suis là pour vous aider avec la mode ! Posez-moi vos questions sur nos produits, tailles, livraisons ou retours, ou envoyez une photo de ce que vous cherchez.',
  pt: 'Estou aqui para ajudar com moda e roupas! Pergunte sobre produtos, tamanhos, envios ou devoluções, ou envie uma foto do que procura.',
  de: 'Ich helfe Ihnen gern rund um Mode! Fragen Sie nach Produkten, Größen, Versand oder Rücksendungen, oder schicken Sie ein Foto von dem, was Sie suchen.',
  it: 'Sono qui per aiutarti con moda e abbigliamento! Chiedimi di prodotti, taglie, spedizioni o resi, oppure inviami una foto di ciò che cerchi.',
};

export function unclearRedirect(language: string): string {
  return isSupportedLanguage(language) ? UNCLEAR_REDIRECTS[language] : UNCLEAR_REDIRECTS.en;
}

export const CLOTHING_ONLY_REDIRECT =
  "That doesn't look like clothing 🙂 I can only search for fashion items. " +
  "Send me a photo of a dress, top, jacket or any outfit and I'll find similar pieces in our store.";

export const CLEARER_PHOTO_REQUEST =
  "I couldn't quite make out the item in that photo. " +
  'Could you send a clearer picture, ideally well lit and showing the whole garment?';

export const NOTHING_SIMILAR =
  "I couldn't find anything similar in our catalog right now. " +
  'Try another photo, or type *New Arrivals* to see our latest pieces.';

export const VISUAL_MATCHES_INTRO = 'Here are the closest matches from our store:';

export const ORDER_ID_PROMPT =
  '📦 Happy to help you track your order!\n\n' +
  'Please send your order ID. It looks like this: *ORD-2024-001234*\n' +
  'You can find it in your confirmation email.';

export const ORDER_ID_FORMAT_GUIDANCE =
  '📝 Order IDs follow this format: *ORD-YYYY-NNNNNN*\n\n' +
  'Example: ORD-2024-001234\n\n' +
  'You can find your order ID in your confirmation email. ' +
  'Please send the complete ID to track your order.';

export function orderNotFound(orderId: string): string {
  return (
    `❓ I couldn't find order *${orderId}*.\n\n` +
    'Please double-check the ID. Order IDs follow this format: *ORD-YYYY-NNNNNN* ' +
    '(for example ORD-2024-001234) and appear in your confirmation email.'
  );
}

const STATUS_ICONS: Record<OrderStatus, string> = {
  pending: '⏳',
  processing: '📦',
  shipped: '🚚',
  delivered: '✅',
  cancelled: '❌',
};

function titleCase(value: string): string {
  return value
    .split(/[_\s]+/)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');
}

export function formatMoney(amount: number, currency: string): string {
  return `${currency} ${amount.toFixed(2)}`;
}

export function formatOrderStatus(order: Order): string {
  const lines = [
    `${STATUS_ICONS[order.status]} *Order Status*`,
    `Order: ${order.id}`,
    `Status: ${titleCase(order.status)}`,
  ];

  if (order.status === 'shipped') {
    if (order.trackingNumber) lines.push(`Tracking: ${order.trackingNumber}`);
    if (order.carrier) lines.push(`Carrier: ${order.carrier}`);
    if (order.estimatedDelivery) lines.push(`Est. Delivery: ${order.estimatedDelivery}`);
  }

  if (order.status === 'delivered' && order.deliveredAt) {
    lines.push(`Delivered: ${order.deliveredAt}`);
  }

  if (order.items.length > 0) {
    lines.push('', '*Items:*');
    for (const item of order.items) {
      lines.push(`• ${item.name} x${item.quantity}`);
    }
  }

  lines.push('', `Total: ${formatMoney(order.totalAmount, order.currency)}`);
  return lines.join('\n');
}

export function categoryTitle(category: BrowseCategory): string {
  return titleCase(category);
}

export function emptyCategory(category: BrowseCategory): string {
  return (
    `😅 We don't have any ${categoryTitle(category)} right now.\n\n` +
    'Try browsing:\n' +
    '• *New Arrivals* - our latest products\n' +
    '• *Trending* - popular items\n' +
    '• *Sale* - discounted items\n\n' +
    "Or send a photo of what you're looking for!"
  );
}

export function productCard(product: Product): ProductCard {
  return {
    id: product.id,
    name: product.name,
    price: product.price,
    currency: product.currency,
    imageUrl: product.imageUrls[0],
    sizes: product.sizes,
    colors: product.colors,
  };
}

export function formatProductDetail(product: Product): string {
  const lines = [`👗 *${product.name}*`, ''];
  if (product.description) lines.push(product.description, '');
  lines.push(`💰 Price: ${formatMoney(product.price, product.currency)}`);
  if (product.discountPercent > 0) lines.push(`🏷️ ${product.discountPercent}% off`);
  if (product.sizes.length > 0) lines.push(`📏 Sizes: ${product.sizes.join(', ')}`);
  if (product.colors.length > 0) lines.push(`🎨 Colors: ${product.colors.join(', ')}`);
  lines.push('', 'Ask me about sizes or colors, or reply with the size you want!');
  return lines.join('\n');
}

export function sizeAvailability(product: Product, size: string): string {
  const label = size.toUpperCase();
  if (!product.sizes.some((s) => s.toUpperCase() === label)) {
    return `The *${product.name}* doesn't come in size ${label}. Available sizes: ${product.sizes.join(', ')}.`;
  }
  const units = product.stockBySize[label] ?? product.stockBySize[size] ?? 0;
  if (units <= 0) {
    return `Sorry, the *${product.name}* is currently out of stock in size ${label}. Other sizes: ${product.sizes.join(', ')}.`;
  }
  return `Yes! The *${product.name}* is available in size ${label} (${units} in stock) for ${formatMoney(product.price, product.currency)}.`;
}

export function colorAvailability(product: Product, color: string): string {
  const wanted = color.toLowerCase();
  if (product.colors.some((c) => c.toLowerCase() === wanted)) {
    return `Yes! The *${product.name}* comes in ${wanted}.`;
  }
  return `The *${product.name}* doesn't come in ${wanted}. Available colors: ${product.colors.join(', ')}.`;
}

export function stockSummary(product: Product): string {
  const inStock = product.sizes.filter((s) => (product.stockBySize[s] ?? 0) > 0);
  if (inStock.length === 0) return `Sorry, the *${product.name}* is currently sold out.`;
  return `The *${product.name}* is in stock in sizes ${inStock.join(', ')}.`;
}

export const HANDOFF_NOTICE =
  "🙋 I'm connecting you with a human agent who can help you better.\n\n" +
  'A team member will reply shortly during business hours (Mon-Fri 9AM-6PM EST).\n\n' +
  "You can keep sending messages in the meantime; they'll see the whole conversation.";

export const SUPERSEDED_IMAGE_ACK =
  '📸 Got your earlier photo! I am looking at the newest one you sent.';

/** Plain-text rendering of any reply; used for history, analytics and text-only channels */
export function replyText(content: ReplyContent): string {
  switch (content.type) {
    case 'text':
      return content.text;
    case 'product_list':
      return [
        content.intro,
        ...content.products.map((p, i) => `${i + 1}. *${p.name}* - ${formatMoney(p.price, p.currency)}`),
      ].join('\n');
    case 'catalog_list':
      return [
        `🛍️ ${content.title}`,
        ...content.products.map((p) => `• ${p.name} - ${formatMoney(p.price, p.currency)}`),
      ].join('\n');
    case 'product_detail':
      return content.text;
    case 'menu':
      return [`*${content.header}*`, content.body, ...content.options.map((o) => `• ${o.title}`)].join('\n');
  }
}
