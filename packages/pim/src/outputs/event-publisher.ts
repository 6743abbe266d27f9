import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { computeHmacSignature } from '../utils/hmac.js';
import type { FetchLike } from '../services/image-ingest.js';
import { messageIdFor, stableStringify } from './stable-json.js';

/** Publishes one message to a topic and resolves with its message id. */
export interface EventPublisher {
  readonly kind: string;
  publish(topic: string, message: object): Promise<string>;
}

/** Appends each message as a sorted-key JSON line to `<baseDir>/<topic>.jsonl`. */
export class LocalFilePublisher implements EventPublisher {
  readonly kind = 'local';

  constructor(private readonly baseDir: string) {}

  async publish(topic: string, message: object): Promise<string> {
    const payload = stableStringify(message);
    await mkdir(this.baseDir, { recursive: true });
    await appendFile(join(this.baseDir, `${topic}.jsonl`), `${payload}\n`, 'utf8');
    return messageIdFor(payload);
  }
}

export type WebhookPublisherOptions = Readonly<{
  url: string;
  secret?: string | undefined;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  now?: () => number;
}>;

export const WEBHOOK_HEADERS = {
  topic: 'X-Catalog-Topic',
  timestamp: 'X-Catalog-Timestamp',
  signature: 'X-Catalog-Signature',
} as const;

/** POSTs each message as JSON, signing `${timestamp}.${body}` with HMAC-SHA256 given a secret. */
export class WebhookPublisher implements EventPublisher {
  readonly kind = 'webhook';
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;

  constructor(private readonly options: WebhookPublisherOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async publish(topic: string, message: object): Promise<string> {
    const body = stableStringify(message);
    const timestamp = String(this.now());
    const secret = this.options.secret;
    const signature = secret ? computeHmacSignature(secret, timestamp, body) : null;
    const timeoutMs = Math.max(1, this.options.timeoutMs ?? 10_000);

    const response = await this.fetchImpl(this.options.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        [WEBHOOK_HEADERS.topic]: topic,
        [WEBHOOK_HEADERS.timestamp]: timestamp,
        ...(signature ? { [WEBHOOK_HEADERS.signature]: signature } : {}),
      },
      body,
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Webhook responded with HTTP ${response.status}`);
    }
    return messageIdFor(body);
  }
}
