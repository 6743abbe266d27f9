import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ProductRecord } from '@app/types';

const ITEMS = ['Sofa', 'Dining Chair', 'Coffee Table', 'Desk Lamp', 'Bed', 'Bookshelf'];
const STYLES = ['Modern', 'Mid-Century', 'Minimalist', 'Scandinavian', 'Industrial'];
const MATERIALS = ['Walnut', 'Oak', 'Velvet', 'Leather', 'Brass'];
const FINISHES = ['walnut', 'slate', 'ivory', 'teal', 'charcoal'];
const BRANDS = ['Acme Living', 'Studio Loft', 'UrbanCraft'];

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** mulberry32: the same seed always yields the same sequence in [0, 1). */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  };
}

function pick(random: () => number, items: readonly string[]): string {
  return items[Math.floor(random() * items.length)] ?? '';
}

// Header-only files: the ingestor sniffs the signature and vision labels hash the path.
async function writeFixtureImages(imageDir: string, count: number): Promise<string[]> {
  await mkdir(imageDir, { recursive: true });
  const paths: string[] = [];
  for (let index = 0; index < count; index += 1) {
    const path = join(imageDir, `fixture_${index}.png`);
    await writeFile(path, Uint8Array.from([...PNG_SIGNATURE, index]));
    paths.push(path);
  }
  return paths;
}

/**
 * Deterministic demo catalog: `count` records cycling over a handful of local fixture images,
 * roughly one in five without a description.
 */
export async function generateSyntheticRecords(
  count: number,
  imageDir: string,
  seed = 42
): Promise<ProductRecord[]> {
  const random = seededRandom(seed);
  const fixtures = await writeFixtureImages(imageDir, Math.max(3, Math.min(10, count)));

  const records: ProductRecord[] = [];
  for (let index = 0; index < count; index += 1) {
    const style = pick(random, STYLES);
    const item = pick(random, ITEMS);
    const material = pick(random, MATERIALS);
    const finish = pick(random, FINISHES);
    const withDescription = random() > 0.2;
    const brand = pick(random, BRANDS);
    const price = Math.round((49 + random() * 950) * 100) / 100;

    records.push({
      productId: `demo-${String(index).padStart(4, '0')}`,
      title: `${style} ${material} ${item}`,
      description: withDescription
        ? `${style} ${item.toLowerCase()} crafted with ${material.toLowerCase()} accents ` +
          `and ${finish} finish.`
        : '',
      imageUrl: fixtures[index % fixtures.length] ?? null,
      brand,
      sku: `SKU-${String(index).padStart(5, '0')}`,
      price,
      currency: 'USD',
    });
  }
  return records;
}
