import { createHash } from 'node:crypto';
import { mkdir, rm, stat, writeFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { IngestedRecord, ProductRecord } from '@app/types';

import type { ImageIngestor } from '../extractors/types.js';
import { CollaboratorError } from './errors.js';
import { readImageFormat, SUPPORTED_IMAGE_EXTENSIONS } from './image-format.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type CachingImageIngestorOptions = Readonly<{
  cacheDir: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}>;

export function cachedImageFilename(productId: string, imageUrl: string, ext: string): string {
  const slug =
    productId
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '') || 'product';
  const digest = createHash('sha1').update(imageUrl, 'utf8').digest('hex').slice(0, 10);
  return `${slug}_${digest}${ext}`;
}

function isRemote(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

function extensionOf(pathLike: string): string {
  return extname(pathLike).toLowerCase();
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolves each record's image to a verified local file. Local paths are checked in place;
 * remote URLs are downloaded once into a content-addressed cache.
 */
export class CachingImageIngestor implements ImageIngestor {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: CachingImageIngestorOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async ingest(record: ProductRecord, signal: AbortSignal): Promise<IngestedRecord> {
    const location = record.imageUrl?.trim();
    if (!location) return { ...record, imageLocalPath: null };

    const imageLocalPath = isRemote(location)
      ? await this.download(record.productId, location, signal)
      : await this.validateLocal(location.startsWith('file:') ? fileURLToPath(location) : location);

    return { ...record, imageLocalPath };
  }

  private async validateLocal(path: string): Promise<string> {
    if (!(await fileExists(path))) {
      throw new CollaboratorError('fetch_failed', `Local image not found: ${path}`);
    }
    const ext = extensionOf(path);
    if (!SUPPORTED_IMAGE_EXTENSIONS.has(ext)) {
      throw new CollaboratorError('unsupported_format', `Unsupported image type '${ext}'`);
    }
    await this.verify(path);
    return path;
  }

  private async download(productId: string, url: string, signal: AbortSignal): Promise<string> {
    const ext = extensionOf(new URL(url).pathname) || '.jpg';
    if (!SUPPORTED_IMAGE_EXTENSIONS.has(ext)) {
      throw new CollaboratorError('unsupported_format', `Unsupported image type '${ext}'`);
    }

    await mkdir(this.options.cacheDir, { recursive: true });
    const destination = join(this.options.cacheDir, cachedImageFilename(productId, url, ext));
    if (await fileExists(destination)) {
      await this.verify(destination);
      return destination;
    }

    const signals = [signal];
    if (this.options.timeoutMs > 0) signals.push(AbortSignal.timeout(this.options.timeoutMs));

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.any(signals) });
    } catch (error) {
      const aborted =
        error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
      if (aborted) {
        throw new CollaboratorError('timeout', `Download timed out: ${url}`);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new CollaboratorError('fetch_failed', `Failed to download ${url}: ${message}`);
    }
    if (!response.ok) {
      throw new CollaboratorError(
        'fetch_failed',
        `Failed to download ${url}: HTTP ${response.status}`
      );
    }

    await writeFile(destination, Buffer.from(await response.arrayBuffer()));
    try {
      await this.verify(destination);
    } catch (error) {
      await rm(destination, { force: true });
      throw error;
    }
    return destination;
  }

  private async verify(path: string): Promise<void> {
    const format = await readImageFormat(path);
    if (!format) {
      throw new CollaboratorError('unsupported_format', `Unable to decode image at ${path}`);
    }
  }
}
