// ─── Provider Names ───────────────────────────────────────────────
export type LLMProviderName = 'openai' | 'gemini';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// ─── Provider Configuration ───────────────────────────────────────
export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
}

// ─── Completion Request / Response ────────────────────────────────
export interface LLMCompletionRequest {
  messages: LLMMessage[];
  temperature: number;
  maxTokens: number;
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  content: string;
  /** Actual model identifier returned by the provider */
  model: string;
  provider: LLMProviderName;
  usage: LLMTokenUsage;
  latencyMs: number;
}

// ─── Provider Interface ───────────────────────────────────────────
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  /**
   * Send a completion request and return the response.
   * Implementations map the generic message format to provider-specific APIs.
   * Timeouts and retries belong to the caller (Degradation Controller).
   */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
}

// ─── Generation Oracle ────────────────────────────────────────────

export interface GroundingSnippet {
  source: string;
  content: string;
}

export interface GenerationRequest {
  message: string;
  /** Recent turns rendered as role-tagged messages, oldest first */
  history: LLMMessage[];
  snippets: GroundingSnippet[];
  /** Resolved subject of the question (e.g. the referenced product), if any */
  subject?: string;
  /** ISO 639-1 reply language */
  language: string;
}

export interface GenerationResult {
  text: string;
  /** 0..1 */
  confidence: number;
}

export interface GenerationOracle {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}
