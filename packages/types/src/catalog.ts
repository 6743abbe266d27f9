export const ATTRIBUTE_NAMES = [
  'category',
  'dimensions',
  'material',
  'room_type',
  'style',
] as const;

export type AttributeName = (typeof ATTRIBUTE_NAMES)[number];

export type CandidateSource = 'text' | 'vision';

export type ExtractedBy = 'text_stub' | 'llm_stub' | 'vision' | 'merged' | 'fusion';

export interface ProductRecord {
  productId: string;
  title: string;
  description: string;
  imageUrl?: string | null;
  brand?: string | null;
  sku?: string | null;
  price?: number | null;
  currency?: string | null;
}

/** Optional catalog fields every output carries through untouched. */
export type ProductMetadata = Pick<ProductRecord, 'brand' | 'sku' | 'price' | 'currency'>;

export interface IngestedRecord extends ProductRecord {
  imageLocalPath: string | null;
}

export type AttributeCandidate = Readonly<{
  attributeName: AttributeName;
  value: string;
  confidence: number;
  source: CandidateSource;
  evidence: readonly string[];
}>;

export interface EnrichedRecord extends IngestedRecord {
  predictions: Partial<Record<AttributeName, AttributeCandidate>>;
}

export type FusedAttribute = Readonly<{
  value: string;
  confidence: number;
  extractedBy: ExtractedBy;
  evidence: readonly string[];
}>;

export type ConflictEntry = Readonly<{
  source: CandidateSource;
  value: string;
  confidence: number;
}>;

export type DecisionLogEntry = Readonly<{
  attributeName: AttributeName;
  sourcesConsidered: readonly CandidateSource[];
  chosenSource: string;
  reason: string;
  conflicts: readonly ConflictEntry[];
}>;

export type PredictionRecord = Readonly<
  ProductMetadata & {
    productId: string;
    title: string;
    finalPredictions: Partial<Record<AttributeName, FusedAttribute>>;
    decisionLog: Partial<Record<AttributeName, DecisionLogEntry>>;
  }
>;
