import type {
  AttributeCandidate,
  AttributeName,
  CandidateSource,
  DecisionLogEntry,
  FusedAttribute,
  PredictionRecord,
} from '@app/types';

import { FUSION_CONFIG } from './fusion-config.js';

type Fused = Readonly<{ prediction: FusedAttribute; decision: DecisionLogEntry }>;

function valueKey(value: string): string {
  return value.trim().toLowerCase();
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Boundary clean-up before fusion: confidences are clamped to [0, 1]; candidates with an
 * empty value or a non-numeric confidence are dropped.
 */
export function sanitizeCandidates(
  candidates: readonly AttributeCandidate[]
): AttributeCandidate[] {
  const sanitized: AttributeCandidate[] = [];
  for (const candidate of candidates) {
    if (!candidate.value.trim()) continue;
    if (Number.isNaN(candidate.confidence)) continue;
    sanitized.push({ ...candidate, confidence: clamp01(candidate.confidence) });
  }
  return sanitized;
}

/** Best candidate per source and attribute; first seen wins a confidence tie. */
export function groupCandidates(
  candidates: readonly AttributeCandidate[]
): Map<AttributeName, Map<CandidateSource, AttributeCandidate>> {
  const grouped = new Map<AttributeName, Map<CandidateSource, AttributeCandidate>>();
  for (const candidate of candidates) {
    const bySource =
      grouped.get(candidate.attributeName) ?? new Map<CandidateSource, AttributeCandidate>();
    const current = bySource.get(candidate.source);
    if (!current || candidate.confidence > current.confidence) {
      bySource.set(candidate.source, candidate);
    }
    grouped.set(candidate.attributeName, bySource);
  }
  return grouped;
}

function fuseSingle(attributeName: AttributeName, candidate: AttributeCandidate): Fused {
  return {
    prediction: {
      value: candidate.value,
      confidence: candidate.confidence,
      extractedBy: FUSION_CONFIG.extractedBy[candidate.source],
      evidence: [...candidate.evidence],
    },
    decision: {
      attributeName,
      sourcesConsidered: [candidate.source],
      chosenSource: candidate.source,
      reason: FUSION_CONFIG.reasons.single,
      conflicts: [],
    },
  };
}

function fusePair(
  attributeName: AttributeName,
  text: AttributeCandidate,
  vision: AttributeCandidate
): Fused {
  const sourcesConsidered: CandidateSource[] = ['text', 'vision'];

  if (valueKey(text.value) === valueKey(vision.value)) {
    return {
      prediction: {
        value: text.value,
        confidence: clamp01(1 - (1 - text.confidence) * (1 - vision.confidence)),
        extractedBy: 'merged',
        evidence: [...text.evidence, ...vision.evidence],
      },
      decision: {
        attributeName,
        sourcesConsidered,
        chosenSource: 'merged',
        reason: FUSION_CONFIG.reasons.agreement,
        conflicts: [],
      },
    };
  }

  // Ties go to text.
  const visionWins = vision.confidence > text.confidence;
  const winner = visionWins ? vision : text;
  const loser = visionWins ? text : vision;
  const extractedBy = FUSION_CONFIG.extractedBy[winner.source];

  return {
    prediction: {
      value: winner.value,
      confidence: winner.confidence,
      extractedBy,
      evidence: [...winner.evidence],
    },
    decision: {
      attributeName,
      sourcesConsidered,
      chosenSource: extractedBy,
      reason: FUSION_CONFIG.reasons.disagreement,
      conflicts: [{ source: loser.source, value: loser.value, confidence: loser.confidence }],
    },
  };
}

/**
 * Reconciles text and vision candidates into final predictions plus a decision log entry for
 * every predicted attribute. Pure; attributes with no candidate are omitted from both maps.
 */
export function fuse(
  productId: string,
  title: string,
  candidates: readonly AttributeCandidate[]
): PredictionRecord {
  const grouped = groupCandidates(candidates);
  const finalPredictions: Partial<Record<AttributeName, FusedAttribute>> = {};
  const decisionLog: Partial<Record<AttributeName, DecisionLogEntry>> = {};

  const names = [...grouped.keys()].sort();
  for (const attributeName of names) {
    const bySource = grouped.get(attributeName);
    const text = bySource?.get('text');
    const vision = bySource?.get('vision');

    let fused: Fused | null = null;
    if (text && vision) fused = fusePair(attributeName, text, vision);
    else if (text) fused = fuseSingle(attributeName, text);
    else if (vision) fused = fuseSingle(attributeName, vision);
    if (!fused) continue;

    finalPredictions[attributeName] = fused.prediction;
    decisionLog[attributeName] = fused.decision;
  }

  return { productId, title, finalPredictions, decisionLog };
}
