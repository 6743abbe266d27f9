import { appendFile, mkdir, stat } from 'node:fs/promises';
import { join } from 'node:path';

import { stringify } from 'csv-stringify/sync';
import pg from 'pg';

import { WAREHOUSE_COLUMNS, type WarehouseRow } from './flatten.js';

/** Append-only tabular sink for flattened prediction rows. */
export interface WarehouseSink {
  readonly kind: string;
  writeRows(dataset: string, table: string, rows: readonly WarehouseRow[]): Promise<number>;
  close?(): Promise<void>;
}

async function isEmptyOrMissing(path: string): Promise<boolean> {
  try {
    return (await stat(path)).size === 0;
  } catch {
    return true;
  }
}

/** Appends rows to `<baseDir>/<dataset>.<table>.csv`, writing the header on first write. */
export class CsvWarehouseSink implements WarehouseSink {
  readonly kind = 'csv';
  private pending: Promise<unknown> = Promise.resolve();

  constructor(private readonly baseDir: string) {}

  writeRows(dataset: string, table: string, rows: readonly WarehouseRow[]): Promise<number> {
    // Serialized: one call's header check and append never interleave with another's.
    const write = this.pending.then(() => this.append(dataset, table, rows));
    this.pending = write.catch(() => undefined);
    return write;
  }

  private async append(
    dataset: string,
    table: string,
    rows: readonly WarehouseRow[]
  ): Promise<number> {
    if (rows.length === 0) return 0;
    await mkdir(this.baseDir, { recursive: true });
    const destination = join(this.baseDir, `${dataset}.${table}.csv`);
    const header = await isEmptyOrMissing(destination);
    const csv = stringify([...rows], { header, columns: [...WAREHOUSE_COLUMNS] });
    await appendFile(destination, csv, 'utf8');
    return rows.length;
  }
}

export type DbClient = Readonly<{
  query: (sql: string, values?: unknown[]) => Promise<{ rowCount: number | null }>;
  end?: () => Promise<void>;
}>;

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

export function warehouseTableName(dataset: string, table: string): string {
  const name = `${dataset}_${table}`.toLowerCase();
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Invalid warehouse table name: ${name}`);
  }
  return name;
}

export function warehouseTableDdl(tableName: string): string {
  return `CREATE TABLE IF NOT EXISTS ${tableName} (
  event_id TEXT NOT NULL,
  event_ts TIMESTAMPTZ NOT NULL,
  product_id TEXT NOT NULL,
  category_value TEXT,
  category_confidence DOUBLE PRECISION,
  room_type_value TEXT,
  room_type_confidence DOUBLE PRECISION,
  style_value TEXT,
  style_confidence DOUBLE PRECISION,
  material_value TEXT,
  material_confidence DOUBLE PRECISION,
  raw_payload JSONB
)`;
}

/** Inserts rows into `<dataset>_<table>`, creating the table on first use. */
export class PostgresWarehouseSink implements WarehouseSink {
  readonly kind = 'postgres';
  private readonly ensured = new Set<string>();

  constructor(private readonly client: DbClient) {}

  async writeRows(dataset: string, table: string, rows: readonly WarehouseRow[]): Promise<number> {
    if (rows.length === 0) return 0;
    const tableName = warehouseTableName(dataset, table);
    if (!this.ensured.has(tableName)) {
      await this.client.query(warehouseTableDdl(tableName));
      this.ensured.add(tableName);
    }

    const values: unknown[] = [];
    const tuples = rows.map((row) => {
      const placeholders = WAREHOUSE_COLUMNS.map((column) => {
        values.push(row[column]);
        const position = `$${values.length}`;
        return column === 'raw_payload' ? `${position}::jsonb` : position;
      });
      return `(${placeholders.join(', ')})`;
    });

    const result = await this.client.query(
      `INSERT INTO ${tableName} (${WAREHOUSE_COLUMNS.join(', ')}) VALUES ${tuples.join(', ')}`,
      values
    );
    return result.rowCount ?? rows.length;
  }

  async close(): Promise<void> {
    await this.client.end?.();
  }
}

export function createPostgresWarehouseSink(connectionString: string): PostgresWarehouseSink {
  const pool = new pg.Pool({
    connectionString,
    max: 2,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });
  return new PostgresWarehouseSink({
    query: (sql, values) => pool.query(sql, values),
    end: () => pool.end(),
  });
}
