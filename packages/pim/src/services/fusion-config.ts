import type { CandidateSource, ExtractedBy } from '@app/types';

export const FUSION_CONFIG = {
  extractedBy: {
    text: 'text_stub',
    vision: 'vision',
  },
  reasons: {
    single: 'only modality produced a value',
    agreement: 'Text and vision agreed on the attribute value.',
    disagreement: 'Confidence comparison resolved a disagreement between modalities.',
  },
} as const satisfies {
  extractedBy: Record<CandidateSource, ExtractedBy>;
  reasons: Record<'single' | 'agreement' | 'disagreement', string>;
};
