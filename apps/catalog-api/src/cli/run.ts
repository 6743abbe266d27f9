import { join } from 'node:path';
import { parseArgs } from 'node:util';

import type { AppEnv } from '@app/config';
import type { Logger } from '@app/logger';
import {
  createCatalogService,
  PREDICTIONS_TOPIC,
  sumTimings,
  toBatchErrorWire,
  toEnrichedWire,
  toIngestedWire,
  toPredictionWire,
  WAREHOUSE_DATASET,
  WAREHOUSE_TABLE,
  type BatchErrorWire,
  type BatchRunResult,
  type CatalogService,
} from '@app/pim';
import type { ProductRecord, StageTimings } from '@app/types';
import { BatchRequestSchema, formatIssues } from '@app/validation';

import { toProductRecord } from '../records.js';
import { generateSyntheticRecords } from './demo.js';
import { readRecordsFile, writeJsonl } from './io.js';

export const USAGE =
  'Usage: catalog-cli <ingest|enrich|predict> <input.json|.jsonl> ' +
  '[--out <path>] [--errors-out <path>] [--fail-fast]\n' +
  '       catalog-cli demo [--n <count>] [--output-dir <dir>] [--no-publish] [--no-warehouse]';

const DEFAULT_DEMO_COUNT = 25;
const DEFAULT_DEMO_DIR = 'outputs/demo';

const COMMAND_NAMES = ['ingest', 'enrich', 'predict'] as const;
type CommandName = (typeof COMMAND_NAMES)[number];

const DEFAULT_OUT: Record<CommandName, string> = {
  ingest: 'outputs/ingested.jsonl',
  enrich: 'outputs/enriched.jsonl',
  predict: 'outputs/predicted.jsonl',
};

export type CliCatalog = Pick<
  CatalogService,
  'ingestBatch' | 'enrichBatch' | 'predictBatch' | 'close'
>;

export type CliDeps = Readonly<{
  env: AppEnv;
  logger: Logger;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  createCatalog?: (env: AppEnv, logger: Logger) => CliCatalog;
}>;

type RunTarget = Readonly<{
  command: string;
  outPath: string;
  errorsOutPath: string;
  failFast: boolean;
}>;

type RecordsCommand = RunTarget &
  Readonly<{
    command: CommandName;
    inputPath: string;
  }>;

type DemoCommand = Readonly<{
  command: 'demo';
  count: number;
  outputDir: string;
  publish: boolean;
  warehouse: boolean;
}>;

type ParsedCommand = RecordsCommand | DemoCommand;

type CliIo = CliDeps & Required<Pick<CliDeps, 'stdout' | 'stderr'>>;

type CommandPlan<T, W> = Readonly<{
  label: string;
  run: (records: readonly ProductRecord[]) => Promise<BatchRunResult<T>>;
  serialize: (item: T) => W;
}>;

function isCommand(value: string | undefined): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

function parseCommandLine(argv: readonly string[]): ParsedCommand | string {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }

  const { values } = parsed;
  const [command, ...rest] = parsed.positionals;
  const usesRecordOptions =
    values.out !== undefined || values['errors-out'] !== undefined || values['fail-fast'] === true;
  const usesDemoOptions =
    values.n !== undefined ||
    values['output-dir'] !== undefined ||
    values['no-publish'] === true ||
    values['no-warehouse'] === true;

  if (command === 'demo') {
    if (rest.length > 0) return `Unexpected arguments: ${rest.join(' ')}`;
    if (usesRecordOptions) return '--out, --errors-out and --fail-fast do not apply to demo';
    const count = values.n === undefined ? DEFAULT_DEMO_COUNT : Number(values.n);
    if (!Number.isInteger(count) || count < 1) return `Invalid --n: ${values.n ?? ''}`;
    return {
      command,
      count,
      outputDir: values['output-dir'] ?? DEFAULT_DEMO_DIR,
      publish: values['no-publish'] !== true,
      warehouse: values['no-warehouse'] !== true,
    };
  }

  if (!isCommand(command)) return `Unknown command: ${command ?? '(none)'}`;
  const [inputPath, ...extra] = rest;
  if (!inputPath) return `Missing input path for ${command}`;
  if (extra.length > 0) return `Unexpected arguments: ${extra.join(' ')}`;
  if (usesDemoOptions) return `Demo options do not apply to ${command}`;

  return {
    command,
    inputPath,
    outPath: values.out ?? DEFAULT_OUT[command],
    errorsOutPath: values['errors-out'] ?? `outputs/${command}_errors.jsonl`,
    failFast: values['fail-fast'] === true,
  };
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      'errors-out': { type: 'string' },
      'fail-fast': { type: 'boolean' },
      n: { type: 'string' },
      'output-dir': { type: 'string' },
      'no-publish': { type: 'boolean' },
      'no-warehouse': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/** Runs one CLI invocation and resolves with the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));
  const { logger } = deps;

  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    stdout(USAGE);
    return argv.length === 0 ? 2 : 0;
  }

  const parsed = parseCommandLine(argv);
  if (typeof parsed === 'string') {
    stderr(parsed);
    stderr(USAGE);
    return 2;
  }
  if (parsed.command === 'demo') return runDemo(parsed, { ...deps, stdout, stderr });

  let rows: unknown[];
  try {
    rows = await readRecordsFile(parsed.inputPath);
  } catch (error) {
    logger.error({ inputPath: parsed.inputPath, error }, 'Failed to read input records');
    return 1;
  }

  const validated = BatchRequestSchema.safeParse({ items: rows });
  if (!validated.success) {
    for (const issue of formatIssues(validated.error)) stderr(issue);
    return 1;
  }
  const records = validated.data.items.map(toProductRecord);

  // Local runs are not rate limited; batches are chunked to the admission limit instead.
  const createCatalog = deps.createCatalog ?? createCatalogService;
  const catalog = createCatalog({ ...deps.env, rpmLimit: 0 }, logger);
  const io = { ...deps, stdout, stderr };
  try {
    switch (parsed.command) {
      case 'ingest':
        return await execute(
          {
            label: 'ingested',
            run: (chunk) => catalog.ingestBatch(chunk),
            serialize: toIngestedWire,
          },
          records,
          parsed,
          io
        );
      case 'enrich':
        return await execute(
          {
            label: 'enriched',
            run: (chunk) => catalog.enrichBatch(chunk),
            serialize: toEnrichedWire,
          },
          records,
          parsed,
          io
        );
      case 'predict':
        return await execute(
          {
            label: 'prediction',
            run: (chunk) => catalog.predictBatch(chunk),
            serialize: toPredictionWire,
          },
          records,
          parsed,
          io
        );
    }
  } catch (error) {
    logger.error({ command: parsed.command, error }, 'CLI run failed');
    return 1;
  } finally {
    await catalog.close();
  }
}

/**
 * Generates synthetic records and runs them through enrich and predict, with predictions
 * published to local JSONL events and appended to a CSV warehouse under the output directory.
 */
async function runDemo(parsed: DemoCommand, deps: CliIo): Promise<number> {
  const { logger } = deps;
  const eventsDir = join(parsed.outputDir, 'events');
  const warehousePath = join(parsed.outputDir, 'warehouse');
  const env: AppEnv = {
    ...deps.env,
    rpmLimit: 0,
    enablePublish: parsed.publish,
    publishMode: 'local',
    eventsDir,
    enableWarehouse: parsed.warehouse,
    warehouseMode: 'csv',
    warehousePath,
  };

  const catalog = (deps.createCatalog ?? createCatalogService)(env, logger);
  const target = (name: string): RunTarget => ({
    command: 'demo',
    outPath: join(parsed.outputDir, `${name}.jsonl`),
    errorsOutPath: join(parsed.outputDir, `${name}_errors.jsonl`),
    failFast: false,
  });

  try {
    const records = await generateSyntheticRecords(
      parsed.count,
      join(parsed.outputDir, 'images')
    );
    const enriched = await execute(
      { label: 'enriched', run: (chunk) => catalog.enrichBatch(chunk), serialize: toEnrichedWire },
      records,
      target('enriched'),
      { ...deps, env }
    );
    if (enriched !== 0) return enriched;

    const predicted = await execute(
      {
        label: 'prediction',
        run: (chunk) => catalog.predictBatch(chunk),
        serialize: toPredictionWire,
      },
      records,
      target('predicted'),
      { ...deps, env }
    );
    if (predicted !== 0) return predicted;

    if (parsed.publish) deps.stdout(`Events -> ${join(eventsDir, `${PREDICTIONS_TOPIC}.jsonl`)}`);
    if (parsed.warehouse) {
      deps.stdout(
        `Warehouse -> ${join(warehousePath, `${WAREHOUSE_DATASET}.${WAREHOUSE_TABLE}.csv`)}`
      );
    }
    return 0;
  } catch (error) {
    logger.error({ command: 'demo', error }, 'CLI run failed');
    return 1;
  } finally {
    await catalog.close();
  }
}

async function execute<T, W>(
  plan: CommandPlan<T, W>,
  records: readonly ProductRecord[],
  parsed: RunTarget,
  deps: CliIo
): Promise<number> {
  const chunkSize = Math.max(1, deps.env.maxBatchItems);
  const items: W[] = [];
  const errors: BatchErrorWire[] = [];
  const timings: StageTimings[] = [];
  let stopped = false;

  for (let offset = 0; offset < records.length; offset += chunkSize) {
    const { result, timings: chunkTimings } = await plan.run(
      records.slice(offset, offset + chunkSize)
    );
    timings.push(chunkTimings);
    for (const entry of result.items) items.push(plan.serialize(entry.item));
    for (const error of result.errors) {
      errors.push(toBatchErrorWire({ ...error, index: error.index + offset }));
    }
    if (parsed.failFast && result.errors.length > 0) {
      stopped = true;
      break;
    }
  }

  await writeJsonl(parsed.outPath, items);
  deps.stdout(`Wrote ${items.length} ${plan.label} record(s) -> ${parsed.outPath}`);
  if (errors.length > 0) {
    await writeJsonl(parsed.errorsOutPath, errors);
    deps.stdout(`Captured ${errors.length} error(s) -> ${parsed.errorsOutPath}`);
  }

  deps.logger.info(
    {
      command: parsed.command,
      records: records.length,
      succeeded: items.length,
      failed: errors.length,
      timings: sumTimings(timings),
    },
    'CLI run complete'
  );

  if (stopped) {
    deps.stderr('Stopped at the first failed record (--fail-fast).');
    return 1;
  }
  if (records.length > 0 && items.length === 0) {
    deps.stderr(`No ${plan.label} records were produced.`);
    return 1;
  }
  return 0;
}
