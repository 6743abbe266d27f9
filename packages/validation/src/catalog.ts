import { z } from 'zod';

export const ProductRecordPayloadSchema = z
  .object({
    product_id: z.string().trim().min(1),
    title: z.string(),
    description: z.string().nullish(),
    image_url: z.string().trim().min(1).nullish(),
    image_path: z.string().trim().min(1).nullish(),
    image_local_path: z.string().trim().min(1).nullish(),
    brand: z.string().nullish(),
    sku: z.string().nullish(),
    price: z.number().finite().nullish(),
    currency: z.string().nullish(),
  })
  .passthrough();

function rejectDuplicateIds(
  items: readonly { product_id: string }[],
  ctx: z.RefinementCtx,
  path: string
): void {
  const seen = new Map<string, number>();
  items.forEach((item, index) => {
    const first = seen.get(item.product_id);
    if (first !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [path, index, 'product_id'],
        message: `Duplicate product_id '${item.product_id}' (first seen at index ${first})`,
      });
      return;
    }
    seen.set(item.product_id, index);
  });
}

export const BatchRequestSchema = z
  .object({
    items: z.array(ProductRecordPayloadSchema),
  })
  .superRefine((value, ctx) => rejectDuplicateIds(value.items, ctx, 'items'));

/** Body of the deprecated `/predict` endpoint. */
export const LegacyPredictRequestSchema = z
  .object({
    records: z.array(ProductRecordPayloadSchema),
  })
  .superRefine((value, ctx) => rejectDuplicateIds(value.records, ctx, 'records'));

export type ProductRecordPayload = z.infer<typeof ProductRecordPayloadSchema>;
export type BatchRequest = z.infer<typeof BatchRequestSchema>;
export type LegacyPredictRequest = z.infer<typeof LegacyPredictRequestSchema>;

/** Flatten zod issues into `path: message` strings for API error details. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
