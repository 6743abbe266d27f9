import { ATTRIBUTE_NAMES } from '@app/types';
import type {
  AttributeCandidate,
  AttributeName,
  BatchError,
  BatchResult,
  DecisionLogEntry,
  EnrichedRecord,
  FusedAttribute,
  IndexedItem,
  IngestedRecord,
  PredictionRecord,
} from '@app/types';

/** snake_case shapes shared by the HTTP API, CLI output, events and warehouse payloads. */

export type FusedAttributeWire = {
  value: string;
  confidence: number;
  extracted_by: string;
  evidence: string[];
};

export type DecisionLogEntryWire = {
  attribute_name: string;
  sources_considered: string[];
  chosen_source: string;
  reason: string;
  conflicts: { source: string; value: string; confidence: number }[];
};

export type PredictionRecordWire = {
  product_id: string;
  title: string;
  brand: string | null;
  sku: string | null;
  price: number | null;
  currency: string | null;
  final_predictions: Partial<Record<AttributeName, FusedAttributeWire>>;
  decision_log: Partial<Record<AttributeName, DecisionLogEntryWire>>;
};

export type AttributeCandidateWire = {
  attribute_name: string;
  value: string;
  confidence: number;
  source: string;
  evidence: string[];
};

export type IngestedRecordWire = {
  product_id: string;
  title: string;
  description: string;
  image_url: string | null;
  image_local_path: string | null;
  brand: string | null;
  sku: string | null;
  price: number | null;
  currency: string | null;
};

export type EnrichedRecordWire = IngestedRecordWire & {
  predictions: Partial<Record<AttributeName, AttributeCandidateWire>>;
};

export type BatchErrorWire = {
  index: number;
  product_id: string;
  stage: string;
  error_type: string;
  message: string;
};

export type BatchResultWire<TWire extends object> = {
  items: (TWire & { index: number })[];
  errors: BatchErrorWire[];
};

function mapEntries<V, W>(
  record: Partial<Record<AttributeName, V>>,
  fn: (value: V) => W
): Partial<Record<AttributeName, W>> {
  const out: Partial<Record<AttributeName, W>> = {};
  for (const key of ATTRIBUTE_NAMES) {
    const value = record[key];
    if (value !== undefined) out[key] = fn(value);
  }
  return out;
}

export function toFusedAttributeWire(attribute: FusedAttribute): FusedAttributeWire {
  return {
    value: attribute.value,
    confidence: attribute.confidence,
    extracted_by: attribute.extractedBy,
    evidence: [...attribute.evidence],
  };
}

export function toDecisionLogEntryWire(entry: DecisionLogEntry): DecisionLogEntryWire {
  return {
    attribute_name: entry.attributeName,
    sources_considered: [...entry.sourcesConsidered],
    chosen_source: entry.chosenSource,
    reason: entry.reason,
    conflicts: entry.conflicts.map((conflict) => ({ ...conflict })),
  };
}

export function toPredictionWire(record: PredictionRecord): PredictionRecordWire {
  return {
    product_id: record.productId,
    title: record.title,
    brand: record.brand ?? null,
    sku: record.sku ?? null,
    price: record.price ?? null,
    currency: record.currency ?? null,
    final_predictions: mapEntries(record.finalPredictions, toFusedAttributeWire),
    decision_log: mapEntries(record.decisionLog, toDecisionLogEntryWire),
  };
}

export function toCandidateWire(candidate: AttributeCandidate): AttributeCandidateWire {
  return {
    attribute_name: candidate.attributeName,
    value: candidate.value,
    confidence: candidate.confidence,
    source: candidate.source,
    evidence: [...candidate.evidence],
  };
}

export function toIngestedWire(record: IngestedRecord): IngestedRecordWire {
  return {
    product_id: record.productId,
    title: record.title,
    description: record.description,
    image_url: record.imageUrl ?? null,
    image_local_path: record.imageLocalPath,
    brand: record.brand ?? null,
    sku: record.sku ?? null,
    price: record.price ?? null,
    currency: record.currency ?? null,
  };
}

export function toEnrichedWire(record: EnrichedRecord): EnrichedRecordWire {
  return {
    ...toIngestedWire(record),
    predictions: mapEntries(record.predictions, toCandidateWire),
  };
}

export function toBatchErrorWire(error: BatchError): BatchErrorWire {
  return {
    index: error.index,
    product_id: error.productId,
    stage: error.stage,
    error_type: error.errorType,
    message: error.message,
  };
}

export function toBatchResultWire<T, TWire extends object>(
  result: BatchResult<T>,
  serialize: (item: T) => TWire
): BatchResultWire<TWire> {
  return {
    items: result.items.map((entry: IndexedItem<T>) => ({
      index: entry.index,
      ...serialize(entry.item),
    })),
    errors: result.errors.map(toBatchErrorWire),
  };
}
