import type { PredictionRecord } from '@app/types';

import { toPredictionWire } from './wire.js';

export const WAREHOUSE_COLUMNS = [
  'event_id',
  'event_ts',
  'product_id',
  'category_value',
  'category_confidence',
  'room_type_value',
  'room_type_confidence',
  'style_value',
  'style_confidence',
  'material_value',
  'material_confidence',
  'raw_payload',
] as const;

export type WarehouseRow = {
  event_id: string;
  event_ts: string;
  product_id: string;
  category_value: string | null;
  category_confidence: number | null;
  room_type_value: string | null;
  room_type_confidence: number | null;
  style_value: string | null;
  style_confidence: number | null;
  material_value: string | null;
  material_confidence: number | null;
  raw_payload: string;
};

export function flattenPredictionToRow(
  record: PredictionRecord,
  eventId: string,
  eventTs: Date
): WarehouseRow {
  const { category, room_type: roomType, style, material } = record.finalPredictions;
  return {
    event_id: eventId,
    event_ts: eventTs.toISOString(),
    product_id: record.productId,
    category_value: category?.value ?? null,
    category_confidence: category?.confidence ?? null,
    room_type_value: roomType?.value ?? null,
    room_type_confidence: roomType?.confidence ?? null,
    style_value: style?.value ?? null,
    style_confidence: style?.confidence ?? null,
    material_value: material?.value ?? null,
    material_confidence: material?.confidence ?? null,
    raw_payload: JSON.stringify(toPredictionWire(record)),
  };
}
