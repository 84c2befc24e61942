import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseFloat(val) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),
  projectRoot,

  redis: {
    enabled: optionalBool('REDIS_ENABLED', true),
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'threadline:'),
  },

  // ───── WhatsApp Cloud API (transport) ─────
  whatsapp: {
    accessToken: optional('WHATSAPP_ACCESS_TOKEN', ''),
    phoneNumberId: optional('WHATSAPP_PHONE_NUMBER_ID', ''),
    verifyToken: optional('WHATSAPP_VERIFY_TOKEN', ''),
    appSecret: optional('WHATSAPP_APP_SECRET', ''),
    apiVersion: optional('WHATSAPP_API_VERSION', 'v18.0'),
    /** Per-request budget for Cloud API calls (send, media lookup, media download) */
    requestTimeoutMs: optionalInt('WHATSAPP_REQUEST_TIMEOUT_MS', 10_000),
    get baseUrl(): string {
      return `https://graph.facebook.com/${this.apiVersion}`;
    },
  },

  // ───── Oracles ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o'),
    embeddingModel: optional('OPENAI_EMBEDDING_MODEL', 'text-embedding-3-small'),
    maxTokens: optionalInt('OPENAI_MAX_TOKENS', 500),
    temperature: optionalFloat('OPENAI_TEMPERATURE', 0.7),
  },

  gemini: {
    apiKey: optional('GEMINI_API_KEY', ''),
    model: optional('GEMINI_MODEL', 'gemini-1.5-flash'),
    visionModel: optional('GEMINI_VISION_MODEL', 'gemini-1.5-flash'),
  },

  /** Which provider answers product and policy questions: openai | gemini */
  generation: {
    provider: optional('GENERATION_PROVIDER', 'openai'),
    historyTurns: optionalInt('GENERATION_HISTORY_TURNS', 6),
  },

  // ───── Session ─────
  session: {
    historyCapacity: optionalInt('SESSION_HISTORY_CAPACITY', 10),
    ttlSeconds: optionalInt('SESSION_TTL_SECONDS', 24 * 60 * 60),
  },

  // ───── Degradation policy ─────
  degradation: {
    timeoutMs: optionalInt('DEGRADATION_TIMEOUT_MS', 3000),
    retries: optionalInt('DEGRADATION_RETRIES', 1),
    retryDelayMs: optionalInt('DEGRADATION_RETRY_DELAY_MS', 100),
    circuitFailureThreshold: optionalInt('CIRCUIT_FAILURE_THRESHOLD', 5),
    circuitResetMs: optionalInt('CIRCUIT_RESET_MS', 30_000),
  },

  // ───── Retrieval ─────
  retrieval: {
    similarityThreshold: optionalFloat('RETRIEVAL_SIMILARITY_THRESHOLD', 0.7),
    productLimit: optionalInt('RETRIEVAL_PRODUCT_LIMIT', 5),
    knowledgeLimit: optionalInt('RETRIEVAL_KNOWLEDGE_LIMIT', 3),
    knowledgeDir: optional('KNOWLEDGE_DIR', path.join(projectRoot, 'knowledge')),
  },

  catalog: {
    newArrivalWindowDays: optionalInt('CATALOG_NEW_ARRIVAL_DAYS', 30),
    browseLimit: optionalInt('CATALOG_BROWSE_LIMIT', 10),
  },

  vision: {
    minImageBytes: optionalInt('VISION_MIN_IMAGE_BYTES', 1024),
  },

  // ───── Escalation ─────
  escalation: {
    confidenceThreshold: optionalFloat('ESCALATION_CONFIDENCE_THRESHOLD', 0.7),
    webhookUrl: optional('ESCALATION_WEBHOOK_URL', ''),
    webhookSecret: optional('ESCALATION_WEBHOOK_SECRET', ''),
    webhookTimeoutMs: optionalInt('ESCALATION_WEBHOOK_TIMEOUT_MS', 5000),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },

  get isProd(): boolean {
    return this.nodeEnv === 'production';
  },
};
