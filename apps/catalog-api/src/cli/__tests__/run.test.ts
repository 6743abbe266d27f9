import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { loadEnv, type AppEnv } from '@app/config';
import { createSilentLogger } from '@app/logger';
import { WAREHOUSE_COLUMNS } from '@app/pim';

import { createTestCatalog, testEnv } from '../../__tests__/helpers.js';
import { readRecordsFile } from '../io.js';
import { runCli, USAGE } from '../run.js';

async function readJsonl(path: string): Promise<Record<string, unknown>[]> {
  const content = await readFile(path, 'utf8');
  return content
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line): Record<string, unknown> => JSON.parse(line));
}

void describe('catalog-cli', () => {
  let dir = '';
  let stdout: string[] = [];
  let stderr: string[] = [];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'catalog-cli-'));
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function run(argv: string[], env: AppEnv = testEnv): Promise<number> {
    return runCli(argv, {
      env,
      logger: createSilentLogger(),
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
      createCatalog: () => createTestCatalog(),
    });
  }

  void it('writes predictions and errors as JSONL', async () => {
    const input = join(dir, 'records.json');
    const out = join(dir, 'predicted.jsonl');
    const errorsOut = join(dir, 'errors.jsonl');
    await writeFile(
      input,
      JSON.stringify([
        { product_id: 'a', title: 'Desk' },
        { product_id: 'b', title: 'broken' },
        { product_id: 'c', title: 'Table' },
      ])
    );

    const code = await run(['predict', input, '--out', out, '--errors-out', errorsOut]);

    assert.equal(code, 0);
    const predictions = await readJsonl(out);
    assert.deepEqual(
      predictions.map((row) => row['product_id']),
      ['a', 'c']
    );
    assert.deepEqual(await readJsonl(errorsOut), [
      {
        index: 1,
        product_id: 'b',
        stage: 'enrich',
        error_type: 'unreachable_resource',
        message: 'Keyword service is unreachable',
      },
    ]);
    assert.deepEqual(stdout, [
      `Wrote 2 prediction record(s) -> ${out}`,
      `Captured 1 error(s) -> ${errorsOut}`,
    ]);
  });

  void it('reads JSONL input and keeps global indexes across chunks', async () => {
    const input = join(dir, 'records.jsonl');
    const out = join(dir, 'enriched.jsonl');
    const errorsOut = join(dir, 'errors.jsonl');
    const lines = ['a', 'b', 'c', 'broken', 'e'].map((title, index) =>
      JSON.stringify({ product_id: `p-${index}`, title })
    );
    await writeFile(input, `${lines.slice(0, 2).join('\n')}\n\n${lines.slice(2).join('\n')}\n`);

    const env = loadEnv({ NODE_ENV: 'test', CIP_MAX_BATCH_ITEMS: '2' });
    const code = await run(['enrich', input, '-o', out, '--errors-out', errorsOut], env);

    assert.equal(code, 0);
    assert.deepEqual(
      (await readJsonl(out)).map((row) => row['product_id']),
      ['p-0', 'p-1', 'p-2', 'p-4']
    );
    const errors = await readJsonl(errorsOut);
    assert.deepEqual(
      errors.map((row) => [row['index'], row['product_id']]),
      [[3, 'p-3']]
    );
  });

  void it('ingests records without an image as null local paths', async () => {
    const input = join(dir, 'records.json');
    const out = join(dir, 'ingested.jsonl');
    await writeFile(input, JSON.stringify([{ product_id: 'a', title: 'Desk', brand: 'Acme' }]));

    const code = await run(['ingest', input, '--out', out]);

    assert.equal(code, 0);
    assert.deepEqual(await readJsonl(out), [
      {
        product_id: 'a',
        title: 'Desk',
        description: '',
        image_url: null,
        image_local_path: null,
        brand: 'Acme',
        sku: null,
        price: null,
        currency: null,
      },
    ]);
  });

  void it('stops after the first failing chunk with --fail-fast', async () => {
    const input = join(dir, 'records.json');
    const out = join(dir, 'predicted.jsonl');
    await writeFile(
      input,
      JSON.stringify([
        { product_id: 'a', title: 'Desk' },
        { product_id: 'b', title: 'broken' },
        { product_id: 'c', title: 'Bench' },
      ])
    );

    const env = loadEnv({ NODE_ENV: 'test', CIP_MAX_BATCH_ITEMS: '1' });
    const code = await run(
      ['predict', input, '--out', out, '--errors-out', join(dir, 'e.jsonl'), '--fail-fast'],
      env
    );

    assert.equal(code, 1);
    assert.deepEqual(
      (await readJsonl(out)).map((row) => row['product_id']),
      ['a']
    );
    assert.deepEqual(stderr, ['Stopped at the first failed record (--fail-fast).']);
  });

  void it('reports invalid records without running the pipeline', async () => {
    const input = join(dir, 'records.json');
    await writeFile(input, JSON.stringify([{ product_id: 'a' }]));

    const code = await run(['predict', input, '--out', join(dir, 'out.jsonl')]);

    assert.equal(code, 1);
    assert.deepEqual(stderr, ['items.0.title: Required']);
  });

  void it('rejects unknown commands with usage', async () => {
    const code = await run(['score', 'records.json']);

    assert.equal(code, 2);
    assert.deepEqual(stderr, ['Unknown command: score', USAGE]);
  });

  void it('fails on unsupported input formats', async () => {
    const input = join(dir, 'records.csv');
    await writeFile(input, 'product_id,title\n');

    assert.equal(await run(['predict', input]), 1);
    await assert.rejects(readRecordsFile(input), {
      message: `Unsupported file format for ${input}. Use .json or .jsonl inputs.`,
    });
  });

  void it('requires a JSON array', async () => {
    const input = join(dir, 'records.json');
    await writeFile(input, JSON.stringify({ product_id: 'a' }));

    await assert.rejects(readRecordsFile(input), {
      message: 'JSON file must contain a list of records.',
    });
  });

  void it('runs the demo end to end into local events and a CSV warehouse', async () => {
    const outputDir = join(dir, 'demo');
    const code = await runCli(['demo', '--n', '3', '--output-dir', outputDir], {
      env: testEnv,
      logger: createSilentLogger(),
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
    });

    assert.equal(code, 0);
    const ids = ['demo-0000', 'demo-0001', 'demo-0002'];
    const predicted = await readJsonl(join(outputDir, 'predicted.jsonl'));
    assert.deepEqual(
      predicted.map((row) => row['product_id']),
      ids
    );
    assert.deepEqual(
      predicted.map((row) => [row['sku'], row['currency']]),
      [
        ['SKU-00000', 'USD'],
        ['SKU-00001', 'USD'],
        ['SKU-00002', 'USD'],
      ]
    );
    assert.equal((await readJsonl(join(outputDir, 'enriched.jsonl'))).length, 3);

    const events = await readJsonl(join(outputDir, 'events', 'catalog_predictions.jsonl'));
    assert.deepEqual(
      events.map((event) => event['product_id']),
      ids
    );
    const csvPath = join(outputDir, 'warehouse', 'catalog.predictions.csv');
    const csvLines = (await readFile(csvPath, 'utf8')).trim().split('\n');
    assert.equal(csvLines[0], WAREHOUSE_COLUMNS.join(','));
    assert.equal(csvLines.length, 4);

    assert.deepEqual(stdout, [
      `Wrote 3 enriched record(s) -> ${join(outputDir, 'enriched.jsonl')}`,
      `Wrote 3 prediction record(s) -> ${join(outputDir, 'predicted.jsonl')}`,
      `Events -> ${join(outputDir, 'events', 'catalog_predictions.jsonl')}`,
      `Warehouse -> ${csvPath}`,
    ]);
  });

  void it('skips the demo sinks when publishing and warehouse writes are off', async () => {
    const outputDir = join(dir, 'demo');
    const code = await runCli(
      ['demo', '--n', '1', '--output-dir', outputDir, '--no-publish', '--no-warehouse'],
      {
        env: testEnv,
        logger: createSilentLogger(),
        stdout: (line) => stdout.push(line),
        stderr: (line) => stderr.push(line),
      }
    );

    assert.equal(code, 0);
    assert.equal((await readJsonl(join(outputDir, 'predicted.jsonl'))).length, 1);
    await assert.rejects(access(join(outputDir, 'events')));
    await assert.rejects(access(join(outputDir, 'warehouse')));
  });

  void it('rejects a non-positive demo size', async () => {
    const code = await run(['demo', '--n', '0']);

    assert.equal(code, 2);
    assert.deepEqual(stderr, ['Invalid --n: 0', USAGE]);
  });
});
