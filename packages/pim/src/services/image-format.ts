import { open } from 'node:fs/promises';

export type ImageFormat = 'jpeg' | 'png' | 'webp' | 'bmp';

export const SUPPORTED_IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.webp',
  '.bmp',
]);

const HEADER_BYTES = 12;

export function detectImageFormat(header: Uint8Array): ImageFormat | null {
  const at = (offset: number): number => header[offset] ?? -1;
  const ascii = (offset: number, text: string): boolean =>
    [...text].every((char, i) => at(offset + i) === char.charCodeAt(0));

  if (at(0) === 0xff && at(1) === 0xd8 && at(2) === 0xff) return 'jpeg';
  if (at(0) === 0x89 && ascii(1, 'PNG') && at(4) === 0x0d && at(5) === 0x0a) return 'png';
  if (ascii(0, 'RIFF') && ascii(8, 'WEBP')) return 'webp';
  if (ascii(0, 'BM')) return 'bmp';
  return null;
}

/** Reads the file header; null when it does not carry a supported image signature. */
export async function readImageFormat(path: string): Promise<ImageFormat | null> {
  const handle = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(HEADER_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, HEADER_BYTES, 0);
    return detectImageFormat(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}
