import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, extname } from 'node:path';

const JSON_SUFFIXES = new Set(['.json', '.jsonl']);

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reads a JSON array or JSONL file of raw records. Blank JSONL lines are skipped. */
export async function readRecordsFile(path: string): Promise<unknown[]> {
  const suffix = extname(path).toLowerCase();
  if (!JSON_SUFFIXES.has(suffix)) {
    throw new Error(`Unsupported file format for ${path}. Use .json or .jsonl inputs.`);
  }

  const content = await readFile(path, 'utf8');
  if (suffix === '.json') {
    const payload: unknown = JSON.parse(content);
    if (!Array.isArray(payload)) {
      throw new Error('JSON file must contain a list of records.');
    }
    return payload;
  }

  const rows: unknown[] = [];
  for (const [lineIndex, line] of content.split(/\r?\n/).entries()) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const row: unknown = JSON.parse(trimmed);
    if (!isObject(row)) {
      throw new Error(`Each JSONL line must decode to an object (line ${lineIndex + 1}).`);
    }
    rows.push(row);
  }
  return rows;
}

export async function writeJsonl(path: string, items: readonly unknown[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const body = items.map((item) => `${JSON.stringify(item)}\n`).join('');
  await writeFile(path, body, 'utf8');
}
