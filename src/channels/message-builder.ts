/**
 * WhatsApp message builders.
 *
 * Every ReplyContent variant renders to exactly one outbound message, clipped
 * to the Cloud API field limits.
 */

import { ProductCard, ReplyContent } from '../config/types';
import { formatMoney } from '../composer/messages';
import { ListRow, ListSection, WhatsAppOutboundPayload } from './types';

export const LIMITS = {
  textBody: 4096,
  caption: 1024,
  interactiveBody: 1024,
  header: 60,
  listButton: 20,
  rowTitle: 24,
  rowDescription: 72,
  sectionTitle: 24,
  listRows: 10,
  buttonTitle: 20,
  buttons: 3,
} as const;

export function clip(value: string, max: number): string {
  return value.length <= max ? value : `${value.slice(0, max - 1)}…`;
}

function base(to: string) {
  return { messaging_product: 'whatsapp' as const, recipient_type: 'individual' as const, to };
}

export function buildTextMessage(to: string, text: string): WhatsAppOutboundPayload {
  return { ...base(to), type: 'text', text: { body: clip(text, LIMITS.textBody) } };
}

export function buildImageMessage(to: string, imageUrl: string, caption?: string): WhatsAppOutboundPayload {
  return {
    ...base(to),
    type: 'image',
    image: caption ? { link: imageUrl, caption: clip(caption, LIMITS.caption) } : { link: imageUrl },
  };
}

export function buildInteractiveList(
  to: string,
  bodyText: string,
  buttonText: string,
  sections: ListSection[],
  headerText?: string,
): WhatsAppOutboundPayload {
  return {
    ...base(to),
    type: 'interactive',
    interactive: {
      type: 'list',
      ...(headerText ? { header: { type: 'text' as const, text: clip(headerText, LIMITS.header) } } : {}),
      body: { text: clip(bodyText, LIMITS.interactiveBody) },
      action: {
        button: clip(buttonText, LIMITS.listButton),
        sections: sections.map((s) => ({
          title: clip(s.title, LIMITS.sectionTitle),
          rows: s.rows.slice(0, LIMITS.listRows),
        })),
      },
    },
  };
}

export function buildInteractiveButtons(
  to: string,
  bodyText: string,
  buttons: Array<{ id: string; title: string }>,
  headerText?: string,
): WhatsAppOutboundPayload {
  return {
    ...base(to),
    type: 'interactive',
    interactive: {
      type: 'button',
      ...(headerText ? { header: { type: 'text' as const, text: clip(headerText, LIMITS.header) } } : {}),
      body: { text: clip(bodyText, LIMITS.interactiveBody) },
      action: {
        buttons: buttons.slice(0, LIMITS.buttons).map((b) => ({
          type: 'reply' as const,
          reply: { id: b.id, title: clip(b.title, LIMITS.buttonTitle) },
        })),
      },
    },
  };
}

export function productRow(product: ProductCard): ListRow {
  const sizes = product.sizes.slice(0, 3).join(', ');
  const price = formatMoney(product.price, product.currency);
  return {
    id: product.id,
    title: clip(product.name, LIMITS.rowTitle),
    description: clip(sizes ? `${price} · ${sizes}` : price, LIMITS.rowDescription),
  };
}

/** Render one reply as one WhatsApp message */
export function buildReplyPayload(to: string, content: ReplyContent): WhatsAppOutboundPayload {
  switch (content.type) {
    case 'text':
      return buildTextMessage(to, content.text);

    case 'product_detail':
      return content.imageUrl
        ? buildImageMessage(to, content.imageUrl, content.text)
        : buildTextMessage(to, content.text);

    case 'product_list': {
      const lines = content.products.map((p, i) => `${i + 1}. ${p.name} - ${formatMoney(p.price, p.currency)}`);
      return buildInteractiveList(
        to,
        [content.intro, '', ...lines, '', 'Tap a product for photos and sizes.'].join('\n'),
        'View Matches',
        [{ title: 'Matches', rows: content.products.map(productRow) }],
      );
    }

    case 'catalog_list':
      return buildInteractiveList(
        to,
        `Found ${content.products.length} items. Tap to see details:`,
        'View Products',
        [{ title: content.title, rows: content.products.map(productRow) }],
        `🛍️ ${content.title}`,
      );

    case 'menu':
      return buildInteractiveButtons(to, content.body, content.options, content.header);
  }
}
