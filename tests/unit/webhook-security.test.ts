import crypto from 'crypto';
import { verifySubscription, verifyWebhookSignature } from '../../src/security/webhook-verifier';
import { InMemoryDedupStore } from '../../src/security/dedup-store';

const SECRET = 'test-secret';

function sign(body: string, secret = SECRET): string {
  return `sha256=${crypto.createHmac('sha256', secret).update(body).digest('hex')}`;
}

describe('verifyWebhookSignature', () => {
  const body = JSON.stringify({ object: 'whatsapp_business_account', entry: [] });

  it('should accept a body signed with the app secret', () => {
    expect(verifyWebhookSignature(body, sign(body), SECRET)).toBe(true);
  });

  it('should reject a wrong, missing or malformed signature', () => {
    expect(verifyWebhookSignature(body, sign(body, 'other-secret'), SECRET)).toBe(false);
    expect(verifyWebhookSignature(`${body} `, sign(body), SECRET)).toBe(false);
    expect(verifyWebhookSignature(body, undefined, SECRET)).toBe(false);
    expect(verifyWebhookSignature(body, 'md5=abc', SECRET)).toBe(false);
    expect(verifyWebhookSignature(body, 'sha256=short', SECRET)).toBe(false);
  });

  it('should skip verification without a secret outside production', () => {
    expect(verifyWebhookSignature(body, undefined, '')).toBe(true);
  });
});

describe('verifySubscription', () => {
  it('should echo the challenge for the configured token only', () => {
    expect(verifySubscription('subscribe', 'test-verify-token', '12345', 'test-verify-token')).toBe('12345');
    expect(verifySubscription('subscribe', 'wrong', '12345', 'test-verify-token')).toBeUndefined();
    expect(verifySubscription('unsubscribe', 'test-verify-token', '12345', 'test-verify-token')).toBeUndefined();
    expect(verifySubscription('subscribe', '', '12345', '')).toBeUndefined();
  });
});

describe('InMemoryDedupStore', () => {
  it('should see each message id once within the TTL', async () => {
    let clock = 0;
    const store = new InMemoryDedupStore(60, 100, () => clock);

    expect(await store.isNew('wamid.1')).toBe(true);
    expect(await store.isNew('wamid.1')).toBe(false);

    clock = 60_000;
    expect(await store.isNew('wamid.1')).toBe(true);
  });

  it('should evict the oldest id when full', async () => {
    const store = new InMemoryDedupStore(60, 2, () => 0);

    await store.isNew('a');
    await store.isNew('b');
    await store.isNew('c');

    expect(await store.isNew('b')).toBe(false);
    expect(await store.isNew('a')).toBe(true);
  });
});
