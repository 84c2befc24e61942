import Ajv from 'ajv';
import { InboundMessage, ReplyContent } from '../config/types';
import {
  ChannelOutbound,
  DownloadedMedia,
  MediaSource,
  WhatsAppInboundMessage,
  WhatsAppOutboundPayload,
  WhatsAppWebhookPayload,
  WebhookParseResult,
} from './types';
import { buildReplyPayload } from './message-builder';
import { ServiceName, UpstreamError } from '../resilience/errors';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const ajv = new Ajv({ allErrors: true });

const validatePayload = ajv.compile<WhatsAppWebhookPayload>({
  type: 'object',
  required: ['object', 'entry'],
  properties: {
    object: { type: 'string' },
    entry: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'changes'],
        properties: {
          id: { type: 'string' },
          changes: {
            type: 'array',
            items: {
              type: 'object',
              required: ['field', 'value'],
              properties: {
                field: { type: 'string' },
                value: {
                  type: 'object',
                  properties: {
                    messages: {
                      type: 'array',
                      items: {
                        type: 'object',
                        required: ['id', 'from', 'timestamp', 'type'],
                        properties: {
                          id: { type: 'string' },
                          from: { type: 'string' },
                          timestamp: { type: 'string' },
                          type: { type: 'string' },
                        },
                      },
                    },
                  },
                },
              },
            },
          },
        },
      },
    },
  },
});

function toTimestamp(unixSeconds: string): number {
  const seconds = Number(unixSeconds);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : Date.now();
}

/** Map one Cloud API message to an InboundMessage; unsupported types yield undefined */
export function normalizeMessage(msg: WhatsAppInboundMessage): InboundMessage | undefined {
  const common = { messageId: msg.id, customerId: msg.from, timestamp: toTimestamp(msg.timestamp) };

  switch (msg.type) {
    case 'text':
      return msg.text ? { ...common, kind: 'text', text: msg.text.body } : undefined;

    case 'image':
      return msg.image
        ? {
            ...common,
            kind: 'image',
            text: msg.image.caption,
            image: { mediaId: msg.image.id, mimeType: msg.image.mime_type, caption: msg.image.caption },
          }
        : undefined;

    case 'interactive': {
      const list = msg.interactive?.list_reply;
      const button = msg.interactive?.button_reply;
      if (list) return { ...common, kind: 'interactive', interactive: { type: 'list_reply', id: list.id, title: list.title } };
      if (button) return { ...common, kind: 'interactive', interactive: { type: 'button_reply', id: button.id, title: button.title } };
      return undefined;
    }

    case 'button':
      // Template quick replies carry free text, route them like typed text
      return msg.button?.text ? { ...common, kind: 'text', text: msg.button.text } : undefined;

    default:
      return undefined;
  }
}

/**
 * Parse a raw WhatsApp Cloud API webhook payload into normalized messages.
 * Status callbacks and unsupported message types are counted as skipped.
 */
export function parseWhatsAppWebhook(payload: unknown): WebhookParseResult {
  if (!validatePayload(payload)) {
    return { ok: false, reason: `Invalid webhook payload: ${ajv.errorsText(validatePayload.errors)}` };
  }
  if (payload.object !== 'whatsapp_business_account') {
    return { ok: false, reason: `Unexpected webhook object: ${payload.object}` };
  }

  const messages: InboundMessage[] = [];
  let skipped = 0;

  for (const entry of payload.entry) {
    for (const change of entry.changes) {
      if (change.field !== 'messages') continue;
      for (const raw of change.value.messages ?? []) {
        const message = normalizeMessage(raw);
        if (message) messages.push(message);
        else skipped++;
      }
    }
  }

  return { ok: true, messages, skipped };
}

interface MediaInfo {
  url: string;
  mime_type?: string;
}

function isMediaInfo(value: unknown): value is MediaInfo {
  return typeof value === 'object' && value !== null && 'url' in value && typeof value.url === 'string';
}

function isAbort(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err
    && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * WhatsApp Cloud API adapter: sends replies and downloads customer media.
 */
export class WhatsAppCloudAdapter implements ChannelOutbound, MediaSource {
  private readonly log = logger.child({ adapter: 'whatsapp' });

  constructor(
    private readonly accessToken: string = env.whatsapp.accessToken,
    private readonly phoneNumberId: string = env.whatsapp.phoneNumberId,
    private readonly baseUrl: string = env.whatsapp.baseUrl,
    private readonly timeoutMs: number = env.whatsapp.requestTimeoutMs,
  ) {}

  async sendReply(customerId: string, content: ReplyContent): Promise<void> {
    await this.sendPayload(buildReplyPayload(customerId, content));
  }

  async sendPayload(payload: WhatsAppOutboundPayload): Promise<void> {
    const res = await this.request('transport', `${this.baseUrl}/${this.phoneNumberId}/messages`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.accessToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
    });

    if (!res.ok) {
      const errBody = await res.text();
      this.log.error({ status: res.status, errBody, type: payload.type }, 'WhatsApp send failed');
      throw new UpstreamError(`WhatsApp API ${res.status}`, 'transport', res.status);
    }
  }

  /** Two hops: resolve the media id to a short-lived URL, then fetch the bytes */
  async downloadMedia(mediaId: string): Promise<DownloadedMedia> {
    const headers = { Authorization: `Bearer ${this.accessToken}` };

    const infoRes = await this.request('media', `${this.baseUrl}/${mediaId}`, { headers });
    if (!infoRes.ok) {
      throw new UpstreamError(`Failed to resolve media ${mediaId}: ${infoRes.status}`, 'media', infoRes.status);
    }
    const info: unknown = await infoRes.json();
    if (!isMediaInfo(info)) {
      throw new UpstreamError('No URL in media response', 'media');
    }

    const mediaRes = await this.request('media', info.url, { headers });
    if (!mediaRes.ok) {
      throw new UpstreamError(`Failed to download media: ${mediaRes.status}`, 'media', mediaRes.status);
    }

    return {
      data: Buffer.from(await mediaRes.arrayBuffer()),
      mimeType: info.mime_type ?? mediaRes.headers.get('content-type') ?? 'image/jpeg',
    };
  }

  /** Every Cloud API call is bounded by the request timeout */
  private async request(service: ServiceName, url: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      if (isAbort(err)) {
        throw new UpstreamError(`WhatsApp API request timed out after ${this.timeoutMs}ms`, service);
      }
      throw err;
    }
  }
}
