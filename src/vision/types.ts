export interface ClothingAttributes {
  garmentType: string;
  colors: Set<string>;
  patterns: Set<string>;
  styleKeywords: Set<string>;
}

/** What the image tells us: usable attributes, a clean non-clothing verdict, or too unclear to say */
export type VisualEvidence =
  | ({ kind: 'attributes' } & ClothingAttributes)
  | { kind: 'not_clothing'; reason: string }
  | { kind: 'ambiguous'; reason: string; confidence: number };

/** Image-understanding oracle: image bytes + instruction → raw model text */
export interface ImageOracle {
  analyze(image: Buffer, mimeType: string, prompt: string): Promise<string>;
}

/** JSON answer shape requested from the oracle */
export type VisionAnswer =
  | {
      status: 'clothing';
      garment_type: string;
      colors?: string[];
      patterns?: string[];
      style_keywords?: string[];
    }
  | { status: 'not_clothing'; reason?: string }
  | { status: 'ambiguous'; reason?: string; confidence?: number };
