import { InMemorySessionStore, appendBounded, emptySession } from '../../src/session/session-store';
import { Turn } from '../../src/config/types';

function turn(content: string, direction: Turn['direction'] = 'inbound'): Turn {
  return {
    direction,
    kind: 'text',
    content,
    intent: 'qa',
    confidence: 1,
    latencyMs: 0,
    escalated: false,
    timestamp: 0,
  };
}

describe('appendBounded', () => {
  it('should evict the oldest items beyond capacity', () => {
    expect(appendBounded([1, 2, 3], 4, 3)).toEqual([2, 3, 4]);
    expect(appendBounded([1], 2, 3)).toEqual([1, 2]);
  });

  it('should not mutate the input', () => {
    const items = [1, 2];
    appendBounded(items, 3, 2);
    expect(items).toEqual([1, 2]);
  });
});

describe('InMemorySessionStore', () => {
  let clock: number;
  let store: InMemorySessionStore;

  beforeEach(() => {
    clock = 1_000_000;
    store = new InMemorySessionStore({ capacity: 10, ttlSeconds: 60 }, () => clock);
  });

  it('should return an empty session for an unknown customer', async () => {
    const session = await store.load('cust-a');
    expect(session).toEqual(emptySession('cust-a', clock));
    expect(session.isNew).toBe(true);
  });

  it('should keep the ten most recent turns in insertion order', async () => {
    for (let i = 1; i <= 12; i++) {
      await store.appendTurn('cust-a', turn(`m${i}`));
    }

    const session = await store.load('cust-a');
    expect(session.history.map((t) => t.content)).toEqual(['m3', 'm4', 'm5', 'm6', 'm7', 'm8', 'm9', 'm10', 'm11', 'm12']);
    expect(session.isNew).toBe(false);
  });

  it('should expire a session after the inactivity window', async () => {
    await store.appendTurn('cust-a', turn('hello'));
    clock += 60_001;

    const session = await store.load('cust-a');
    expect(session.history).toEqual([]);
    expect(session.isNew).toBe(true);
    expect(store.size).toBe(0);
  });

  it('should refresh the inactivity window on every write', async () => {
    await store.appendTurn('cust-a', turn('one'));
    clock += 50_000;
    await store.appendTurn('cust-a', turn('two'));
    clock += 50_000;

    const session = await store.load('cust-a');
    expect(session.history.map((t) => t.content)).toEqual(['one', 'two']);
  });

  it('should apply context patches and clear the reference with null', async () => {
    const reference = { type: 'product' as const, id: 'prod_001', label: 'Scarlet Wrap Midi Dress' };
    await store.setContext('cust-a', reference, 'es');
    await store.updateContext('cust-a', { lastIntent: 'visual_search', awaitingOrderId: true });

    let session = await store.load('cust-a');
    expect(session.context).toEqual({ reference, language: 'es', lastIntent: 'visual_search', awaitingOrderId: true });

    await store.updateContext('cust-a', { reference: null });
    session = await store.load('cust-a');
    expect(session.context.reference).toBeUndefined();
    expect(session.context.language).toBe('es');
  });

  it('should keep customers isolated', async () => {
    await store.appendTurn('cust-a', turn('for a'));
    await store.appendTurn('cust-b', turn('for b'));

    expect((await store.load('cust-a')).history.map((t) => t.content)).toEqual(['for a']);
    expect((await store.load('cust-b')).history.map((t) => t.content)).toEqual(['for b']);
  });

  it('should drop everything on clear', async () => {
    await store.appendTurn('cust-a', turn('hello'));
    await store.clear('cust-a');

    expect((await store.load('cust-a')).isNew).toBe(true);
  });

  it('should hand out copies that callers cannot mutate', async () => {
    await store.appendTurn('cust-a', turn('hello'));
    const session = await store.load('cust-a');
    session.history.push(turn('injected'));

    expect((await store.load('cust-a')).history).toHaveLength(1);
  });
});
