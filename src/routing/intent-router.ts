/**
 * Intent Router
 *
 * Pure classification of one inbound message into exactly one intent.
 * Priority: image > browse trigger > order tracking > greeting / unclear / qa.
 * Resolving "it" against a stored product is the composer's job, not the router's.
 */

import { BrowseCategory, InboundMessage, Intent, SessionContext } from '../config/types';

const BROWSE_TRIGGERS: ReadonlyArray<[BrowseCategory, string[]]> = [
  ['new_arrivals', ['new arrivals', 'newest', 'just in', 'latest']],
  ['trending', ['trending', 'popular', 'best seller', 'top rated']],
  ['sale', ['sale', 'discount', 'clearance', 'deal']],
];

const ORDER_PHRASES = ['track my order', 'track order', 'order status', 'where is my order', 'where is my package'];

const GREETINGS = new Set([
  'hi', 'hello', 'hey', 'hiya', 'hi there', 'hello there', 'hey there',
  'good morning', 'good afternoon', 'good evening',
  'hola', 'buenos dias', 'buenas', 'bonjour', 'salut', 'ola', 'olá', 'bom dia',
  'hallo', 'guten tag', 'ciao', 'buongiorno',
  'start', 'menu', 'help',
]);

const NON_CLOTHING_KEYWORDS = [
  'weather', 'news', 'politics', 'sports score', 'recipe',
  'math', 'calculate', 'code', 'programming', 'translate',
];

const NON_CLOTHING_PATTERN = new RegExp(`\\b(${NON_CLOTHING_KEYWORDS.join('|')})\\b`, 'i');

/** Canonical order id: ORD-YYYY-NNNNNN */
const ORDER_ID_PATTERN = /\bORD-\d{4}-\d{6}\b/i;

/** Anything that starts like an order id, well-formed or not */
const ORDER_ID_SHAPE = /\bORD-[\w-]*/i;

/** Menu buttons map straight onto intents */
const BUTTON_INTENTS: Record<string, Intent> = {
  browse: 'catalog_browse',
  track: 'order_tracking',
  help: 'greeting',
};

export function detectBrowseCategory(text: string | undefined): BrowseCategory | undefined {
  if (!text) return undefined;
  const lower = text.toLowerCase();
  for (const [category, phrases] of BROWSE_TRIGGERS) {
    if (phrases.some((p) => lower.includes(p))) return category;
  }
  return undefined;
}

/** Upper-cased canonical order id, if the text contains one */
export function extractOrderId(text: string | undefined): string | undefined {
  const match = text?.match(ORDER_ID_PATTERN);
  return match ? match[0].toUpperCase() : undefined;
}

export function hasOrderIdShape(text: string | undefined): boolean {
  return !!text && ORDER_ID_SHAPE.test(text);
}

export function isOrderPhrase(text: string | undefined): boolean {
  if (!text) return false;
  const lower = text.toLowerCase();
  return ORDER_PHRASES.some((p) => lower.includes(p));
}

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function isGreeting(text: string | undefined): boolean {
  return !!text && GREETINGS.has(normalize(text));
}

export function isOffTopic(text: string | undefined): boolean {
  return !!text && NON_CLOTHING_PATTERN.test(text);
}

export function routeIntent(message: InboundMessage, context: SessionContext): Intent {
  if (message.kind === 'image') return 'visual_search';

  if (message.kind === 'interactive' && message.interactive) {
    const { type, id } = message.interactive;
    if (type === 'button_reply') return BUTTON_INTENTS[id] ?? 'unclear';
    return 'qa';
  }

  const text = message.text?.trim() ?? '';

  if (detectBrowseCategory(text)) return 'catalog_browse';

  if (hasOrderIdShape(text) || isOrderPhrase(text) || context.awaitingOrderId) {
    return 'order_tracking';
  }

  if (!text || isOffTopic(text)) return 'unclear';
  if (isGreeting(text)) return 'greeting';
  return 'qa';
}
