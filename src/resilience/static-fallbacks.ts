/**
 * Static Fallback Responses
 *
 * Pre-defined content for every controller-wrapped operation whose result
 * reaches the customer. Used when the operation degrades.
 */

import { ReplyContent } from '../config/types';

export type FallbackOperation = 'media' | 'vision' | 'product_retrieval' | 'orders' | 'catalog';

const STATIC_RESPONSES = new Map<FallbackOperation, string>([
  ['media', 'I couldn\'t open that photo. Could you send it again? A clear, well-lit picture of a single item works best.'],

  ['vision', 'I couldn\'t get a good look at that photo. Could you send a clearer picture of the item, ideally on a plain background?'],

  ['product_retrieval', 'Our catalog search is taking a break right now. Type *New Arrivals* to see our latest pieces, or try your photo again in a few minutes.'],

  ['orders', 'I can\'t reach our order system at the moment. Please try your order ID again in a few minutes.'],

  ['catalog', 'I can\'t load that collection right now. Please try again in a few minutes, or send a photo of what you\'re looking for.'],
]);

export function getStaticFallback(operation: FallbackOperation): ReplyContent {
  const text = STATIC_RESPONSES.get(operation) ?? getDefaultFallbackText();
  return { type: 'text', text };
}

export function getDefaultFallbackText(): string {
  return 'I\'m having trouble understanding. Please choose an option or try rephrasing your question.';
}

/** Rule-based menu: the generation fallback and the last resort for any turn */
export function buildFallbackMenu(): ReplyContent {
  return {
    type: 'menu',
    header: 'How can I help?',
    body: getDefaultFallbackText(),
    options: [
      { id: 'browse', title: 'Browse Products' },
      { id: 'track', title: 'Track Order' },
      { id: 'help', title: 'Get Help' },
    ],
  };
}
