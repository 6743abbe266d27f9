import type { ProductRecordPayload } from '@app/validation';
import type { ProductRecord } from '@app/types';

/**
 * Maps a validated wire payload onto the domain record. An explicit local path wins over
 * a previously ingested path, which wins over the remote URL.
 */
export function toProductRecord(payload: ProductRecordPayload): ProductRecord {
  return {
    productId: payload.product_id,
    title: payload.title,
    description: payload.description ?? '',
    imageUrl: payload.image_path ?? payload.image_local_path ?? payload.image_url ?? null,
    brand: payload.brand ?? null,
    sku: payload.sku ?? null,
    price: payload.price ?? null,
    currency: payload.currency ?? null,
  };
}
