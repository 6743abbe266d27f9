import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { ProductRecord } from '@app/types';

import { detectImageFormat } from '../services/image-format.js';
import { CachingImageIngestor, cachedImageFilename } from '../services/image-ingest.js';

const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0, 0, 0]);
const JPEG = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0, 0, 0, 0]);
const signal = new AbortController().signal;

function record(imageUrl: string | null): ProductRecord {
  return { productId: 'SKU 1/A', title: 'Chair', description: '', imageUrl };
}

describe('image-ingest', () => {
  let dir = '';
  let cacheDir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ingest-'));
    cacheDir = join(dir, 'cache');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('passes records without an image through', async () => {
    const ingestor = new CachingImageIngestor({ cacheDir, timeoutMs: 1_000 });
    const result = await ingestor.ingest(record(null), signal);
    expect(result.imageLocalPath).toBeNull();
    expect(result.productId).toBe('SKU 1/A');
  });

  it('accepts a local image with a valid signature', async () => {
    const path = join(dir, 'chair.png');
    await writeFile(path, PNG);
    const ingestor = new CachingImageIngestor({ cacheDir, timeoutMs: 1_000 });
    expect((await ingestor.ingest(record(path), signal)).imageLocalPath).toBe(path);
  });

  it('reports a missing local file as fetch_failed', async () => {
    const ingestor = new CachingImageIngestor({ cacheDir, timeoutMs: 1_000 });
    await expect(ingestor.ingest(record(join(dir, 'nope.jpg')), signal)).rejects.toMatchObject({
      errorType: 'fetch_failed',
    });
  });

  it('rejects unsupported extensions and undecodable files', async () => {
    const gif = join(dir, 'chair.gif');
    const fakeJpeg = join(dir, 'chair.jpg');
    await writeFile(gif, PNG);
    await writeFile(fakeJpeg, 'not an image');
    const ingestor = new CachingImageIngestor({ cacheDir, timeoutMs: 1_000 });

    await expect(ingestor.ingest(record(gif), signal)).rejects.toMatchObject({
      errorType: 'unsupported_format',
      message: "Unsupported image type '.gif'",
    });
    await expect(ingestor.ingest(record(fakeJpeg), signal)).rejects.toMatchObject({
      errorType: 'unsupported_format',
    });
  });

  it('downloads remote images once into the content-addressed cache', async () => {
    const url = 'https://cdn.example.test/images/chair.jpg?w=800';
    const fetchImpl = vi.fn(async () => new Response(JPEG));
    const ingestor = new CachingImageIngestor({ cacheDir, timeoutMs: 1_000, fetchImpl });

    const first = await ingestor.ingest(record(url), signal);
    const second = await ingestor.ingest(record(url), signal);

    const expected = join(cacheDir, cachedImageFilename('SKU 1/A', url, '.jpg'));
    expect(first.imageLocalPath).toBe(expected);
    expect(second.imageLocalPath).toBe(expected);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('maps HTTP errors to fetch_failed', async () => {
    const fetchImpl = vi.fn(async () => new Response(null, { status: 404 }));
    const ingestor = new CachingImageIngestor({ cacheDir, timeoutMs: 1_000, fetchImpl });
    await expect(
      ingestor.ingest(record('https://cdn.example.test/missing.png'), signal)
    ).rejects.toMatchObject({
      errorType: 'fetch_failed',
      message: 'Failed to download https://cdn.example.test/missing.png: HTTP 404',
    });
  });

  it('maps aborted downloads to timeout', async () => {
    const fetchImpl = vi.fn(async () => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), {
        name: 'TimeoutError',
      });
    });
    const ingestor = new CachingImageIngestor({ cacheDir, timeoutMs: 1_000, fetchImpl });
    await expect(
      ingestor.ingest(record('https://cdn.example.test/slow.webp'), signal)
    ).rejects.toMatchObject({ errorType: 'timeout' });
  });

  it('discards downloads that are not images', async () => {
    const fetchImpl = vi.fn(async () => new Response('<html>blocked</html>'));
    const ingestor = new CachingImageIngestor({ cacheDir, timeoutMs: 1_000, fetchImpl });

    await expect(
      ingestor.ingest(record('https://cdn.example.test/chair.png'), signal)
    ).rejects.toMatchObject({ errorType: 'unsupported_format' });
    expect(await readdir(cacheDir)).toEqual([]);
  });

  it('builds slugged cache names', () => {
    expect(cachedImageFilename('SKU 1/A', 'https://x.test/a.png', '.png')).toMatch(
      /^sku-1-a_[0-9a-f]{10}\.png$/
    );
    expect(cachedImageFilename('***', 'https://x.test/a.png', '.png')).toMatch(/^product_/);
  });

  it('recognises supported signatures', () => {
    expect(detectImageFormat(PNG)).toBe('png');
    expect(detectImageFormat(JPEG)).toBe('jpeg');
    expect(detectImageFormat(Buffer.from('RIFF\0\0\0\0WEBP', 'latin1'))).toBe('webp');
    expect(detectImageFormat(Buffer.from('BM\0\0', 'latin1'))).toBe('bmp');
    expect(detectImageFormat(Buffer.from('GIF89a', 'latin1'))).toBeNull();
  });
});
