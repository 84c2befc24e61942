import { InboundMessage, ReplyContent } from '../config/types';

// ───── WhatsApp Cloud API webhook payload ───────────────────────

export interface WhatsAppInteractiveReply {
  id: string;
  title?: string;
  description?: string;
}

export interface WhatsAppInboundMessage {
  id: string;
  from: string;
  /** Unix seconds, as a string */
  timestamp: string;
  type: string;
  text?: { body: string };
  image?: { id: string; mime_type?: string; caption?: string; sha256?: string };
  interactive?: {
    type: string;
    list_reply?: WhatsAppInteractiveReply;
    button_reply?: WhatsAppInteractiveReply;
  };
  /** Quick-reply button on a template message */
  button?: { payload?: string; text?: string };
}

export interface WhatsAppWebhookPayload {
  object: string;
  entry: Array<{
    id: string;
    changes: Array<{
      field: string;
      value: {
        messaging_product?: string;
        metadata?: { display_phone_number?: string; phone_number_id?: string };
        messages?: WhatsAppInboundMessage[];
        /** Delivery/read receipts; ignored */
        statuses?: unknown[];
      };
    }>;
  }>;
}

/** Webhook parse result; a payload may carry zero or more customer messages */
export type WebhookParseResult =
  | { ok: true; messages: InboundMessage[]; skipped: number }
  | { ok: false; reason: string };

// ───── Outbound payloads ────────────────────────────────────────

interface OutboundBase {
  messaging_product: 'whatsapp';
  recipient_type: 'individual';
  to: string;
}

export interface ListRow {
  id: string;
  title: string;
  description?: string;
}

export interface ListSection {
  title: string;
  rows: ListRow[];
}

export type WhatsAppOutboundPayload =
  | (OutboundBase & { type: 'text'; text: { body: string; preview_url?: boolean } })
  | (OutboundBase & { type: 'image'; image: { link: string; caption?: string } })
  | (OutboundBase & {
      type: 'interactive';
      interactive:
        | {
            type: 'list';
            header?: { type: 'text'; text: string };
            body: { text: string };
            action: { button: string; sections: ListSection[] };
          }
        | {
            type: 'button';
            header?: { type: 'text'; text: string };
            body: { text: string };
            action: { buttons: Array<{ type: 'reply'; reply: { id: string; title: string } }> };
          };
    });

// ───── Channel ports ────────────────────────────────────────────

/** Outbound side of the transport */
export interface ChannelOutbound {
  sendReply(customerId: string, content: ReplyContent): Promise<void>;
}

export interface DownloadedMedia {
  data: Buffer;
  mimeType: string;
}

/** Media retrieval by transport media id */
export interface MediaSource {
  downloadMedia(mediaId: string): Promise<DownloadedMedia>;
}
