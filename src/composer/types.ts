import { ContextReference, Product, ReplyContent } from '../config/types';
import { Outcome } from '../resilience/types';
import { ContextPatch } from '../session/types';
import { KnowledgeSnippet, ProductMatch } from '../knowledge/types';
import { VisualEvidence } from '../vision/types';

/** Where the image pipeline stopped, and what it produced */
export type VisualSearchEvidence =
  | { stage: 'media'; degraded: true }
  | { stage: 'vision'; degraded: true }
  | { stage: 'classified'; visual: Exclude<VisualEvidence, { kind: 'attributes' }> }
  | { stage: 'matched'; visual: Extract<VisualEvidence, { kind: 'attributes' }>; matches: Outcome<ProductMatch[]> };

/** Evidence gathered by the orchestrator before composing */
export interface TurnEvidence {
  visual?: VisualSearchEvidence;
  knowledge?: Outcome<KnowledgeSnippet[]>;
  /** Subject the question is about, resolved from a list selection or the stored reference */
  subject?: ContextReference;
  /** Catalog record for a product subject, when it could be loaded */
  subjectProduct?: Product;
}

export interface ComposedReply {
  content: ReplyContent;
  /** 0..1; 1.0 for deterministic replies */
  confidence: number;
  /** Proposed context update; persisted by the Turn Recorder only */
  context: ContextPatch;
  /** Statically defined fallback (the rule-based menu): delivered as is, never swapped for the handoff notice */
  fallback?: boolean;
}
