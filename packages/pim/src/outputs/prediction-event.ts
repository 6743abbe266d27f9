import { ATTRIBUTE_NAMES, type PredictionRecord } from '@app/types';

import { EVENT_SOURCE, EVENT_VERSION, type PredictionEvent } from '../schemas/prediction-event.js';

export function buildPredictionEvent(
  record: PredictionRecord,
  eventId: string,
  eventTs: Date
): PredictionEvent {
  const predictions: PredictionEvent['predictions'] = {};
  const decisionLog: PredictionEvent['decision_log'] = {};

  for (const name of ATTRIBUTE_NAMES) {
    const prediction = record.finalPredictions[name];
    if (prediction) {
      predictions[name] = {
        value: prediction.value,
        confidence: prediction.confidence,
        extracted_by: prediction.extractedBy,
      };
    }
    const entry = record.decisionLog[name];
    if (entry) {
      decisionLog[name] = {
        attribute_name: entry.attributeName,
        sources_considered: [...entry.sourcesConsidered],
        chosen_source: entry.chosenSource,
        reason: entry.reason,
        conflicts: entry.conflicts.map((conflict) => ({ ...conflict })),
      };
    }
  }

  return {
    event_id: eventId,
    event_ts: eventTs.toISOString(),
    source: EVENT_SOURCE,
    version: EVENT_VERSION,
    product_id: record.productId,
    predictions,
    decision_log: decisionLog,
  };
}
