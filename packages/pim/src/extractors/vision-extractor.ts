import { access } from 'node:fs/promises';

import type { AttributeCandidate, AttributeName, IngestedRecord } from '@app/types';

import { CollaboratorError } from '../services/errors.js';
import type { AttributeExtractor } from './types.js';
import {
  HashVisionProvider,
  type VisionProvider,
  type VisionQualityFlags,
} from './vision-provider.js';

export const QUALITY_PENALTY = 0.15;

const CATEGORY_BY_LABEL: Readonly<Record<string, string>> = {
  sofa: 'Sofa',
  sectional: 'Sectional',
  bed: 'Bed',
  table: 'Table',
  chair: 'Chair',
  lamp: 'Lighting',
  dresser: 'Dresser',
  rug: 'Rug',
  desk: 'Desk',
  bench: 'Bench',
};

const ROOM_BY_LABEL: Readonly<Record<string, string>> = {
  sofa: 'Living Room',
  sectional: 'Living Room',
  bed: 'Bedroom',
  table: 'Dining Room',
  lamp: 'Living Room',
  rug: 'Living Room',
  desk: 'Home Office',
  bench: 'Entryway',
};

export function describeQualityIssues(flags: VisionQualityFlags): string[] {
  const issues: string[] = [];
  if (flags.blurry) issues.push('blurry');
  if (flags.lowRes) issues.push('low resolution');
  if (flags.dark) issues.push('dark');
  return issues;
}

/** Maps the provider's top label onto category and room_type candidates. */
export class VisionAttributeExtractor implements AttributeExtractor {
  readonly source = 'vision' as const;

  constructor(private readonly provider: VisionProvider = new HashVisionProvider()) {}

  async extract(record: IngestedRecord, signal: AbortSignal): Promise<AttributeCandidate[]> {
    const imagePath = record.imageLocalPath;
    if (!imagePath) return [];

    try {
      await access(imagePath);
    } catch {
      throw new CollaboratorError(
        'unreachable_resource',
        `Image file is not readable: ${imagePath}`
      );
    }

    const prediction = await this.provider.predict(imagePath, signal);
    const top = prediction.labels[0];
    if (!top) return [];

    const label = top.name.toLowerCase();
    const issues = describeQualityIssues(prediction.qualityFlags);
    const confidence = Math.max(0, top.confidence - (issues.length > 0 ? QUALITY_PENALTY : 0));
    const qualityNote = issues.length > 0 ? [`image quality: ${issues.join(', ')}`] : [];

    const candidates: AttributeCandidate[] = [];
    const mappings: ReadonlyArray<[AttributeName, Readonly<Record<string, string>>]> = [
      ['category', CATEGORY_BY_LABEL],
      ['room_type', ROOM_BY_LABEL],
    ];
    for (const [attributeName, mapping] of mappings) {
      const value = mapping[label];
      if (!value) continue;
      candidates.push({
        attributeName,
        value,
        confidence,
        source: 'vision',
        evidence: [`vision label: ${value} (${top.name})`, ...qualityNote],
      });
    }
    return candidates;
  }
}
