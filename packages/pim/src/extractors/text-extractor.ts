import type { AttributeCandidate, AttributeName, IngestedRecord } from '@app/types';

import { CollaboratorError } from '../services/errors.js';
import { extractDimensions } from './dimensions-parser.js';
import { loadKeywordTables, type KeywordTable, type KeywordTables } from './keyword-tables.js';
import type { AttributeExtractor } from './types.js';

const PHRASE_CONFIDENCE = 0.9;
const KEYWORD_CONFIDENCE = 0.75;
const SNIPPET_RADIUS = 35;

const KEYWORD_ATTRIBUTES = [
  'category',
  'room_type',
  'style',
  'material',
] as const satisfies readonly AttributeName[];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function boundaryPattern(keyword: string): RegExp {
  return new RegExp(`\\b${escapeRegExp(keyword)}\\b`);
}

/** Context around the first occurrence of `needle`, taken from the original-case source text. */
function snippetAround(sources: readonly string[], needle: RegExp | string): string | null {
  for (const source of sources) {
    const lowered = source.toLowerCase();
    const index = typeof needle === 'string' ? lowered.indexOf(needle) : lowered.search(needle);
    if (index === -1) continue;
    const length =
      typeof needle === 'string' ? needle.length : (lowered.match(needle)?.[0]?.length ?? 0);
    const start = Math.max(0, index - SNIPPET_RADIUS);
    const end = Math.min(source.length, index + length + SNIPPET_RADIUS);
    const snippet = source.slice(start, end).trim();
    if (snippet) return snippet;
  }
  return null;
}

export function matchKeywordTable(
  attributeName: AttributeName,
  sources: readonly string[],
  table: KeywordTable
): AttributeCandidate | null {
  const combined = sources.map((source) => source.toLowerCase()).join(' \n ');

  for (const [phrase, value] of Object.entries(table.phrases)) {
    const needle = phrase.toLowerCase();
    if (!combined.includes(needle)) continue;
    return {
      attributeName,
      value,
      confidence: PHRASE_CONFIDENCE,
      source: 'text',
      evidence: [snippetAround(sources, needle) ?? phrase],
    };
  }

  for (const [keyword, value] of Object.entries(table.keywords)) {
    const pattern = boundaryPattern(keyword.toLowerCase());
    if (!pattern.test(combined)) continue;
    return {
      attributeName,
      value,
      confidence: KEYWORD_CONFIDENCE,
      source: 'text',
      evidence: [snippetAround(sources, pattern) ?? keyword],
    };
  }

  return null;
}

/** Rule-based extraction from title and description. */
export class TextAttributeExtractor implements AttributeExtractor {
  readonly source = 'text' as const;
  private readonly tables: KeywordTables;

  constructor(tables: KeywordTables = loadKeywordTables()) {
    this.tables = tables;
  }

  async extract(record: IngestedRecord, _signal: AbortSignal): Promise<AttributeCandidate[]> {
    const sources = [record.title, record.description].filter((text) => text.trim().length > 0);
    if (sources.length === 0) {
      throw new CollaboratorError(
        'malformed_input',
        'Record has neither title nor description text'
      );
    }

    const candidates: AttributeCandidate[] = [];
    for (const attributeName of KEYWORD_ATTRIBUTES) {
      const candidate = matchKeywordTable(attributeName, sources, this.tables[attributeName]);
      if (candidate) candidates.push(candidate);
    }

    const dimensions = extractDimensions(record.title, record.description);
    if (dimensions) candidates.push(dimensions);

    return candidates;
  }
}
