import Ajv from 'ajv';
import { ImageOracle, VisionAnswer, VisualEvidence } from './types';
import { UpstreamError } from '../resilience/errors';
import { env } from '../config/env';
import { logger } from '../observability/logger';

export const VISION_PROMPT = `Look at this image and decide whether it shows a clothing or fashion item a shopper could buy.

If it does, answer:
{"status": "clothing", "garment_type": "dress | shirt | jeans | jacket | ...", "colors": ["..."], "patterns": ["solid | floral | striped | ..."], "style_keywords": ["casual | elegant | summer | ..."]}

If it clearly does not (food, landscape, pets, documents, a person where the clothes are not the focus), answer:
{"status": "not_clothing", "reason": "short explanation"}

If the image is too blurry, dark, cropped or small to tell, answer:
{"status": "ambiguous", "reason": "short explanation", "confidence": 0.0-1.0}

Reply with JSON only.`;

/** Confidence used when the oracle calls an image ambiguous without scoring it */
const DEFAULT_AMBIGUOUS_CONFIDENCE = 0.5;

const ajv = new Ajv({ allErrors: true });

const validateAnswer = ajv.compile<VisionAnswer>({
  type: 'object',
  required: ['status'],
  properties: {
    status: { enum: ['clothing', 'not_clothing', 'ambiguous'] },
    garment_type: { type: 'string' },
    colors: { type: 'array', items: { type: 'string' } },
    patterns: { type: 'array', items: { type: 'string' } },
    style_keywords: { type: 'array', items: { type: 'string' } },
    reason: { type: 'string' },
    confidence: { type: 'number', minimum: 0, maximum: 1 },
  },
  if: { properties: { status: { const: 'clothing' } } },
  then: { required: ['garment_type'] },
});

/** Strip an optional Markdown code fence around the model's JSON */
export function unwrapJson(raw: string): string {
  const text = raw.trim();
  const fenced = text.match(/^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```\s*$/);
  return fenced ? fenced[1].trim() : text;
}

function normalizeSet(values: string[] | undefined): Set<string> {
  return new Set((values ?? []).map((v) => v.trim().toLowerCase()).filter(Boolean));
}

/**
 * Parse the oracle's answer into VisualEvidence.
 * Throws UpstreamError on malformed output so the controller retries it.
 */
export function parseVisionAnswer(raw: string): VisualEvidence {
  let data: unknown;
  try {
    data = JSON.parse(unwrapJson(raw));
  } catch {
    throw new UpstreamError('Vision answer is not valid JSON', 'vision');
  }

  if (!validateAnswer(data)) {
    throw new UpstreamError(`Vision answer failed validation: ${ajv.errorsText(validateAnswer.errors)}`, 'vision');
  }

  switch (data.status) {
    case 'clothing': {
      const garmentType = data.garment_type.trim().toLowerCase();
      if (!garmentType) {
        return { kind: 'ambiguous', reason: 'No garment type identified', confidence: DEFAULT_AMBIGUOUS_CONFIDENCE };
      }
      return {
        kind: 'attributes',
        garmentType,
        colors: normalizeSet(data.colors),
        patterns: normalizeSet(data.patterns),
        styleKeywords: normalizeSet(data.style_keywords),
      };
    }
    case 'not_clothing':
      return { kind: 'not_clothing', reason: data.reason || 'Not a clothing item' };
    case 'ambiguous':
      return {
        kind: 'ambiguous',
        reason: data.reason || 'Image unclear',
        confidence: data.confidence ?? DEFAULT_AMBIGUOUS_CONFIDENCE,
      };
  }
}

/**
 * Visual Attribute Extractor
 *
 * Turns image bytes into clothing attributes. Images under the minimum size
 * are called ambiguous without asking the oracle; that check is rule-based,
 * so it carries full confidence.
 */
export class VisualAttributeExtractor {
  private readonly log = logger.child({ component: 'visual-attribute-extractor' });

  constructor(
    private readonly oracle: ImageOracle,
    private readonly minImageBytes: number = env.vision.minImageBytes,
  ) {}

  async extract(image: Buffer, mimeType: string = 'image/jpeg'): Promise<VisualEvidence> {
    if (image.length < this.minImageBytes) {
      this.log.info({ bytes: image.length }, 'Image below minimum size; asking for a clearer photo');
      return { kind: 'ambiguous', reason: 'Image too small to analyze', confidence: 1.0 };
    }

    const raw = await this.oracle.analyze(image, mimeType, VISION_PROMPT);
    const evidence = parseVisionAnswer(raw);
    this.log.debug({ kind: evidence.kind }, 'Image analyzed');
    return evidence;
  }
}
