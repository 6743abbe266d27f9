export type NodeEnv = 'development' | 'staging' | 'production' | 'test';

export type PublishMode = 'local' | 'webhook';
export type WarehouseMode = 'csv' | 'postgres';

export type AppEnv = Readonly<{
  nodeEnv: NodeEnv;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  port: number;

  maxBatchItems: number;
  maxTextChars: number;
  rpmLimit: number;
  rateLimitCapacity: number;
  recordTimeoutMs: number;
  batchConcurrency: number;

  cacheDir: string;
  ingestTimeoutMs: number;

  enablePublish: boolean;
  publishMode: PublishMode;
  eventsDir: string;
  publishWebhookUrl: string | undefined;
  publishWebhookSecret: string | undefined;
  validateEvents: boolean;

  enableWarehouse: boolean;
  warehouseMode: WarehouseMode;
  warehousePath: string;
  warehouseDatabaseUrl: string | undefined;
}>;

type EnvSource = Record<string, string | undefined>;

const DEFAULT_MAX_BATCH_ITEMS = 50;
const DEFAULT_MAX_TEXT_CHARS = 10_000;
const DEFAULT_RPM_LIMIT = 120;
const DEFAULT_RECORD_TIMEOUT_S = 8;
const DEFAULT_INGEST_TIMEOUT_S = 10;
const DEFAULT_BATCH_CONCURRENCY = 4;

function optionalString(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (value == null) return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  const normalized = (value ?? 'development').trim();
  if (
    normalized === 'development' ||
    normalized === 'staging' ||
    normalized === 'production' ||
    normalized === 'test'
  ) {
    return normalized;
  }
  throw new Error(`Invalid NODE_ENV: ${normalized}`);
}

function parseLogLevel(value: string | undefined): AppEnv['logLevel'] {
  const normalized = (value ?? 'info').trim();
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error' ||
    normalized === 'fatal'
  ) {
    return normalized;
  }
  throw new Error(`Invalid LOG_LEVEL: ${normalized}`);
}

function parsePort(value: string | undefined): number {
  const raw = (value ?? '8080').trim();
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${raw}`);
  }
  return port;
}

function parseInteger(env: EnvSource, key: string, fallback: number, minimum: number): number {
  const raw = optionalString(env, key);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < minimum) {
    throw new Error(`Invalid ${key}: ${raw}`);
  }
  return parsed;
}

function parseSecondsAsMs(env: EnvSource, key: string, fallbackSeconds: number): number {
  const raw = optionalString(env, key);
  if (raw === undefined) return Math.round(fallbackSeconds * 1000);
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new Error(`Invalid ${key}: ${raw}`);
  }
  return Math.round(seconds * 1000);
}

function parseBoolean(env: EnvSource, key: string, fallback: boolean): boolean {
  const raw = optionalString(env, key);
  if (raw === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

function parsePublishMode(value: string | undefined): PublishMode {
  const normalized = (value ?? 'local').trim().toLowerCase();
  if (normalized === 'local' || normalized === 'webhook') return normalized;
  throw new Error(`Invalid CIP_PUBLISH_MODE: ${normalized}`);
}

function parseWarehouseMode(value: string | undefined): WarehouseMode {
  const normalized = (value ?? 'csv').trim().toLowerCase();
  if (normalized === 'csv' || normalized === 'postgres') return normalized;
  throw new Error(`Invalid CIP_WAREHOUSE_MODE: ${normalized}`);
}

function parseWebhookUrl(env: EnvSource): string | undefined {
  const raw = optionalString(env, 'CIP_PUBLISH_WEBHOOK_URL');
  if (!raw) return undefined;
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new Error(`Invalid URL in CIP_PUBLISH_WEBHOOK_URL: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Invalid CIP_PUBLISH_WEBHOOK_URL protocol: ${url.protocol}`);
  }
  return raw;
}

export function loadEnv(env: EnvSource = process.env): AppEnv {
  const nodeEnv = parseNodeEnv(env['NODE_ENV']);
  const logLevel = parseLogLevel(env['LOG_LEVEL']);
  const port = parsePort(env['PORT']);

  const maxBatchItems = parseInteger(env, 'CIP_MAX_BATCH_ITEMS', DEFAULT_MAX_BATCH_ITEMS, 1);
  const maxTextChars = parseInteger(env, 'CIP_MAX_TEXT_CHARS', DEFAULT_MAX_TEXT_CHARS, 1);
  const rpmLimit = parseInteger(env, 'CIP_RPM_LIMIT', DEFAULT_RPM_LIMIT, 0);
  const rateLimitCapacity = parseInteger(env, 'CIP_RATE_LIMIT_CAPACITY', rpmLimit, 0);
  const recordTimeoutMs = parseSecondsAsMs(env, 'CIP_RECORD_TIMEOUT_S', DEFAULT_RECORD_TIMEOUT_S);
  const batchConcurrency = parseInteger(
    env,
    'CIP_BATCH_CONCURRENCY',
    DEFAULT_BATCH_CONCURRENCY,
    1
  );

  const cacheDir = optionalString(env, 'CIP_CACHE_DIR') ?? '.cache/images';
  const ingestTimeoutMs = parseSecondsAsMs(env, 'CIP_INGEST_TIMEOUT_S', DEFAULT_INGEST_TIMEOUT_S);

  const enablePublish = parseBoolean(env, 'CIP_ENABLE_PUBLISH', false);
  const publishMode = parsePublishMode(env['CIP_PUBLISH_MODE']);
  const eventsDir = optionalString(env, 'CIP_EVENTS_DIR') ?? 'outputs/events';
  const publishWebhookUrl = parseWebhookUrl(env);
  const publishWebhookSecret = optionalString(env, 'CIP_PUBLISH_WEBHOOK_SECRET');
  const validateEvents = parseBoolean(env, 'CIP_VALIDATE_EVENTS', false);
  if (enablePublish && publishMode === 'webhook' && !publishWebhookUrl) {
    throw new Error('CIP_PUBLISH_WEBHOOK_URL is required when CIP_PUBLISH_MODE=webhook');
  }

  const enableWarehouse = parseBoolean(env, 'CIP_ENABLE_WAREHOUSE', false);
  const warehouseMode = parseWarehouseMode(env['CIP_WAREHOUSE_MODE']);
  const warehousePath = optionalString(env, 'CIP_WAREHOUSE_PATH') ?? 'outputs/warehouse';
  const warehouseDatabaseUrl = optionalString(env, 'CIP_WAREHOUSE_DATABASE_URL');
  if (enableWarehouse && warehouseMode === 'postgres' && !warehouseDatabaseUrl) {
    throw new Error('CIP_WAREHOUSE_DATABASE_URL is required when CIP_WAREHOUSE_MODE=postgres');
  }

  return {
    nodeEnv,
    logLevel,
    port,
    maxBatchItems,
    maxTextChars,
    rpmLimit,
    rateLimitCapacity,
    recordTimeoutMs,
    batchConcurrency,
    cacheDir,
    ingestTimeoutMs,
    enablePublish,
    publishMode,
    eventsDir,
    publishWebhookUrl,
    publishWebhookSecret,
    validateEvents,
    enableWarehouse,
    warehouseMode,
    warehousePath,
    warehouseDatabaseUrl,
  };
}
