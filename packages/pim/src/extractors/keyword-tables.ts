import { readFileSync } from 'node:fs';

import { z } from 'zod';

const KeywordTableSchema = z
  .object({
    phrases: z.record(z.string(), z.string()),
    keywords: z.record(z.string(), z.string()),
  })
  .strict();

const KeywordTablesSchema = z
  .object({
    category: KeywordTableSchema,
    room_type: KeywordTableSchema,
    style: KeywordTableSchema,
    material: KeywordTableSchema,
  })
  .strict();

export type KeywordTable = z.infer<typeof KeywordTableSchema>;
export type KeywordTables = z.infer<typeof KeywordTablesSchema>;

const DEFAULT_TABLES_URL = new URL('./data/text-keywords.json', import.meta.url);

let cached: KeywordTables | null = null;

/** Loads and validates a keyword table file; the bundled file is cached after the first read. */
export function loadKeywordTables(path: URL | string = DEFAULT_TABLES_URL): KeywordTables {
  const isDefault = path === DEFAULT_TABLES_URL;
  if (isDefault && cached) return cached;

  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const parsed = KeywordTablesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid keyword tables: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  if (isDefault) cached = parsed.data;
  return parsed.data;
}
