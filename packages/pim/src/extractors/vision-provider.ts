import { createHash } from 'node:crypto';

export type VisionLabel = Readonly<{ name: string; confidence: number }>;

export type VisionQualityFlags = Readonly<{
  blurry: boolean;
  lowRes: boolean;
  dark: boolean;
}>;

export type VisionPrediction = Readonly<{
  labels: readonly VisionLabel[];
  qualityFlags: VisionQualityFlags;
  traceId: string;
}>;

/** Image model seam. Labels are ordered by relevance; the first one drives attribute mapping. */
export interface VisionProvider {
  predict(imageLocalPath: string, signal: AbortSignal): Promise<VisionPrediction>;
}

export const VISION_LABELS = [
  'sofa',
  'sectional',
  'bed',
  'table',
  'chair',
  'lamp',
  'dresser',
  'rug',
  'desk',
  'bench',
] as const;

/**
 * Offline stand-in for an image model: labels, confidences and quality flags are derived
 * from the SHA-1 of the image path, so the same path always yields the same prediction.
 */
export class HashVisionProvider implements VisionProvider {
  async predict(imageLocalPath: string, signal: AbortSignal): Promise<VisionPrediction> {
    signal.throwIfAborted();
    const digest = createHash('sha1').update(imageLocalPath, 'utf8').digest('hex');
    const base = Number.parseInt(digest.slice(0, 8), 16);
    const seed = Number.parseInt(digest.slice(8, 16), 16);

    const labels: VisionLabel[] = [];
    for (let index = 0; index < 3; index += 1) {
      const name = VISION_LABELS[(base + index * 5) % VISION_LABELS.length] ?? 'sofa';
      const raw = (seed >>> (index * 5)) & 0xff;
      const confidence = Math.min(0.55 + (raw % 40) / 100, 0.92);
      labels.push({ name, confidence });
    }

    return {
      labels,
      qualityFlags: {
        blurry: (base & 0x1) !== 0,
        lowRes: (base & 0x2) !== 0,
        dark: (base & 0x4) !== 0,
      },
      traceId: digest.slice(0, 12),
    };
  }
}
