import { Order, Product } from '../../src/config/types';
import { InMemorySessionStore } from '../../src/session/session-store';
import { CustomerTurnQueue } from '../../src/session/customer-turn-queue';
import { DegradationController } from '../../src/resilience/degradation-controller';
import { DependencyHealthManager } from '../../src/resilience/dependency-health';
import { RetryPolicy } from '../../src/resilience/types';
import { InMemoryProductCatalog } from '../../src/catalog/product-catalog';
import { InMemoryOrderLookup } from '../../src/orders/order-lookup';
import { KnowledgeRetriever } from '../../src/knowledge/knowledge-retriever';
import { VectorStore } from '../../src/knowledge/vector-store';
import { KnowledgeEntry } from '../../src/knowledge/types';
import { loadKnowledgeEntries, loadOrders, loadProducts } from '../../src/knowledge/seed-loader';
import { VisualAttributeExtractor } from '../../src/vision/visual-attribute-extractor';
import { ImageOracle } from '../../src/vision/types';
import { GenerationOracle } from '../../src/llm/types';
import { ResponseComposer } from '../../src/composer/response-composer';
import { EscalationGate } from '../../src/escalation/escalation-gate';
import { EscalationNotifier } from '../../src/escalation/types';
import { InMemoryAnalyticsSink } from '../../src/analytics/analytics-sink';
import { AnalyticsSink } from '../../src/analytics/types';
import { TurnRecorder } from '../../src/orchestrator/turn-recorder';
import { Orchestrator } from '../../src/orchestrator/orchestrator';
import { MediaSource } from '../../src/channels/types';
import { KeywordEmbeddings, NOW, RED_DRESS_ANSWER, RecordingNotifier, RecordingOutbound, ScriptedImageOracle, StaticMedia, StubGeneration } from './fakes';

export const FAST_POLICY: RetryPolicy = { timeoutMs: 50, retries: 1, retryDelayMs: 0 };

export interface HarnessOptions {
  products?: Product[];
  knowledge?: KnowledgeEntry[];
  orders?: Order[];
  imageOracle?: ImageOracle;
  media?: MediaSource;
  generation?: GenerationOracle;
  analytics?: AnalyticsSink;
  notifier?: EscalationNotifier;
  now?: () => number;
  policy?: RetryPolicy;
}

/** Fully in-process turn pipeline over the seed data in knowledge/ */
export async function createHarness(options: HarnessOptions = {}) {
  const now = options.now ?? (() => NOW);
  const products = options.products ?? loadProducts();
  const knowledge = options.knowledge ?? loadKnowledgeEntries();
  const orders = options.orders ?? loadOrders();

  const health = new DependencyHealthManager(5, 30_000, now);
  const controller = new DegradationController(options.policy ?? FAST_POLICY, health);
  const sessions = new InMemorySessionStore({ capacity: 10, ttlSeconds: 24 * 60 * 60 }, now);
  const analytics = new InMemoryAnalyticsSink();
  const recorder = new TurnRecorder(sessions, options.analytics ?? analytics, controller);
  const catalog = new InMemoryProductCatalog(products, 30, now);
  const orderLookup = new InMemoryOrderLookup(orders);

  const embeddings = new KeywordEmbeddings();
  const retriever = new KnowledgeRetriever(embeddings, new VectorStore(), 0.7);
  await retriever.initialize(products, knowledge);

  const imageOracle = options.imageOracle ?? new ScriptedImageOracle([RED_DRESS_ANSWER]);
  const media = options.media ?? new StaticMedia();
  const generation = options.generation ?? new StubGeneration();
  const notifier = new RecordingNotifier();
  const outbound = new RecordingOutbound();
  const queue = new CustomerTurnQueue();

  const orchestrator = new Orchestrator({
    sessions,
    queue,
    controller,
    composer: new ResponseComposer({ controller, orders: orderLookup, catalog, generation }),
    gate: new EscalationGate(options.notifier ?? notifier, 0.7),
    recorder,
    outbound,
    catalog,
    media,
    extractor: new VisualAttributeExtractor(imageOracle, 1024),
    retriever,
  });

  return { orchestrator, sessions, analytics, recorder, outbound, notifier, queue, health, controller, generation, imageOracle, media };
}
