import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { Order, Product } from './config/types';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { createSessionStore } from './session/session-store';
import { CustomerTurnQueue } from './session/customer-turn-queue';
import { SessionStore } from './session/types';
import { DegradationController, DEFAULT_RETRY_POLICY } from './resilience/degradation-controller';
import { DependencyHealthManager } from './resilience/dependency-health';
import { RetryPolicy } from './resilience/types';
import { createDedupStore, DedupStore } from './security/dedup-store';
import { WhatsAppCloudAdapter } from './channels/whatsapp-adapter';
import { ChannelOutbound, MediaSource } from './channels/types';
import { registerWhatsAppWebhook } from './channels/whatsapp-webhook';
import { registerHealthRoutes } from './health/health-routes';
import { ImageOracle } from './vision/types';
import { GeminiImageOracle } from './vision/gemini-image-oracle';
import { VisualAttributeExtractor } from './vision/visual-attribute-extractor';
import { EmbeddingProvider, OpenAIEmbeddingProvider } from './knowledge/embedding-service';
import { KnowledgeRetriever } from './knowledge/knowledge-retriever';
import { VectorStore } from './knowledge/vector-store';
import { KnowledgeEntry } from './knowledge/types';
import { loadKnowledgeEntries, loadOrders, loadProducts } from './knowledge/seed-loader';
import { InMemoryProductCatalog } from './catalog/product-catalog';
import { InMemoryOrderLookup } from './orders/order-lookup';
import { GenerationOracle } from './llm/types';
import { LLMGenerationOracle } from './llm/generation-oracle';
import { buildGenerationProvider } from './llm/provider-factory';
import { ResponseComposer } from './composer/response-composer';
import { EscalationGate } from './escalation/escalation-gate';
import { createEscalationNotifier } from './escalation/escalation-notifier';
import { EscalationNotifier } from './escalation/types';
import { AnalyticsSink } from './analytics/types';
import { createAnalyticsSink } from './analytics/analytics-sink';
import { TurnRecorder } from './orchestrator/turn-recorder';
import { Orchestrator } from './orchestrator/orchestrator';

declare module 'fastify' {
  interface FastifyRequest {
    /** Exact request body, kept for webhook signature verification */
    rawBody?: string;
  }
}

/**
 * Collaborators that can be swapped out; anything left undefined is built
 * from the environment. `null` means "explicitly none" where absence is a
 * valid configuration.
 */
export interface AppOptions {
  /** `null` skips Redis entirely; undefined connects when REDIS_ENABLED */
  redis?: Redis | null;
  outbound?: ChannelOutbound;
  media?: MediaSource | null;
  imageOracle?: ImageOracle | null;
  embeddings?: EmbeddingProvider | null;
  generation?: GenerationOracle | null;
  notifier?: EscalationNotifier;
  sessions?: SessionStore;
  analytics?: AnalyticsSink;
  dedup?: DedupStore;
  products?: Product[];
  knowledge?: KnowledgeEntry[];
  orders?: Order[];
  retryPolicy?: RetryPolicy;
  appSecret?: string;
  verifyToken?: string;
  now?: () => number;
}

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  orchestrator: Orchestrator;
  health: DependencyHealthManager;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.enabled) {
    logger.info('Redis disabled; using in-memory stores');
    return undefined;
  }
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

function defaultImageOracle(): ImageOracle | undefined {
  if (!env.gemini.apiKey) {
    logger.warn('GEMINI_API_KEY not set; photos get the vision fallback reply');
    return undefined;
  }
  return new GeminiImageOracle(env.gemini.apiKey, env.gemini.visionModel);
}

function defaultEmbeddings(): EmbeddingProvider | undefined {
  if (!env.openai.apiKey) {
    logger.warn('OPENAI_API_KEY not set; similarity search disabled');
    return undefined;
  }
  return new OpenAIEmbeddingProvider();
}

function defaultGeneration(): GenerationOracle | undefined {
  const provider = buildGenerationProvider();
  return provider ? new LLMGenerationOracle(provider) : undefined;
}

/** `null` → none, undefined → build the default */
function resolve<T>(value: T | null | undefined, build: () => T | undefined): T | undefined {
  if (value === null) return undefined;
  return value ?? build();
}

export async function buildApp(options: AppOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  // Keep the raw body: the webhook signature covers the exact bytes sent
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (req, body, done) => {
    const text = typeof body === 'string' ? body : body.toString('utf8');
    try {
      const json: unknown = JSON.parse(text);
      req.rawBody = text;
      done(null, json);
    } catch (err) {
      done(err instanceof Error ? err : new Error(String(err)), undefined);
    }
  });

  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  // ───── Infrastructure ─────
  const redis = options.redis === null ? undefined : options.redis ?? (await connectRedis());
  const now = options.now ?? Date.now;

  const health = new DependencyHealthManager(
    env.degradation.circuitFailureThreshold,
    env.degradation.circuitResetMs,
    now,
  );
  const controller = new DegradationController(options.retryPolicy ?? DEFAULT_RETRY_POLICY, health);

  const sessions = options.sessions ?? createSessionStore(redis, {
    capacity: env.session.historyCapacity,
    ttlSeconds: env.session.ttlSeconds,
  });
  const analytics = options.analytics ?? createAnalyticsSink(redis);
  const dedup = options.dedup ?? createDedupStore(redis);

  // ───── Seed data ─────
  const products = options.products ?? loadProducts();
  const knowledge = options.knowledge ?? loadKnowledgeEntries();
  const orders = options.orders ?? loadOrders();
  const catalog = new InMemoryProductCatalog(products, env.catalog.newArrivalWindowDays, now);
  const orderLookup = new InMemoryOrderLookup(orders);
  logger.info(
    { products: products.length, knowledgeEntries: knowledge.length, orders: orderLookup.size },
    'Seed data loaded',
  );

  // ───── Retrieval ─────
  const index = new VectorStore();
  let retriever: KnowledgeRetriever | undefined;
  const embeddings = resolve(options.embeddings, defaultEmbeddings);
  if (embeddings) {
    const candidate = new KnowledgeRetriever(embeddings, index);
    try {
      await candidate.initialize(products, knowledge);
      retriever = candidate;
    } catch (err) {
      logger.error({ err }, 'Similarity index initialization failed; photo matching and grounded answers disabled');
    }
  }

  // ───── Oracles and transport ─────
  const adapter = new WhatsAppCloudAdapter();
  const outbound = options.outbound ?? adapter;
  const media = resolve<MediaSource>(options.media, () => adapter);
  const imageOracle = resolve(options.imageOracle, defaultImageOracle);
  const extractor = imageOracle ? new VisualAttributeExtractor(imageOracle) : undefined;
  const generation = resolve(options.generation, defaultGeneration);

  // ───── Turn pipeline ─────
  const composer = new ResponseComposer({ controller, orders: orderLookup, catalog, generation });
  const gate = new EscalationGate(options.notifier ?? createEscalationNotifier());
  const recorder = new TurnRecorder(sessions, analytics, controller);
  const orchestrator = new Orchestrator({
    sessions,
    queue: new CustomerTurnQueue(),
    controller,
    composer,
    gate,
    recorder,
    outbound,
    catalog,
    media,
    extractor,
    retriever,
  });

  logger.info(
    { vision: Boolean(extractor), retrieval: Boolean(retriever), generation: Boolean(generation), redis: Boolean(redis) },
    'Turn pipeline initialized',
  );

  // ───── Routes ─────
  registerHealthRoutes(app, {
    redis,
    health,
    indexedDocuments: () => index.size('products') + index.size('knowledge'),
  });
  registerWhatsAppWebhook(app, {
    orchestrator,
    dedup,
    appSecret: options.appSecret ?? env.whatsapp.appSecret,
    verifyToken: options.verifyToken ?? env.whatsapp.verifyToken,
  });

  return { app, redis, orchestrator, health };
}
