import { randomUUID } from 'node:crypto';

import type { AppEnv } from '@app/config';
import type { Logger } from '@app/logger';
import type { PredictionRecord } from '@app/types';

import { PredictionEventSchema } from '../schemas/prediction-event.js';
import { LocalFilePublisher, WebhookPublisher, type EventPublisher } from './event-publisher.js';
import { flattenPredictionToRow, type WarehouseRow } from './flatten.js';
import { buildPredictionEvent } from './prediction-event.js';
import {
  createPostgresWarehouseSink,
  CsvWarehouseSink,
  type WarehouseSink,
} from './warehouse-sink.js';

export const PREDICTIONS_TOPIC = 'catalog_predictions';
export const WAREHOUSE_DATASET = 'catalog';
export const WAREHOUSE_TABLE = 'predictions';

export type DispatchReport = Readonly<{
  published: number;
  skipped: number;
  failed: number;
  rowsWritten: number;
}>;

export type OutputDispatcherOptions = Readonly<{
  publisher: EventPublisher | null;
  sink: WarehouseSink | null;
  validateEvents: boolean;
  logger: Logger;
  idFactory?: () => string;
  now?: () => Date;
}>;

/**
 * Sends successful predictions to the configured publisher and warehouse sink. `dispatch`
 * never rejects: every sink failure is logged and counted.
 */
export class OutputDispatcher {
  private readonly idFactory: () => string;
  private readonly now: () => Date;

  constructor(private readonly options: OutputDispatcherOptions) {
    this.idFactory = options.idFactory ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  get enabled(): boolean {
    return this.options.publisher !== null || this.options.sink !== null;
  }

  async dispatch(records: readonly PredictionRecord[]): Promise<DispatchReport> {
    const { publisher, sink, logger } = this.options;
    let published = 0;
    let skipped = 0;
    let failed = 0;
    let rowsWritten = 0;
    if (records.length === 0 || !this.enabled) {
      return { published, skipped, failed, rowsWritten };
    }

    const rows: WarehouseRow[] = [];
    for (const record of records) {
      const eventId = this.idFactory();
      const eventTs = this.now();

      if (publisher) {
        const event = buildPredictionEvent(record, eventId, eventTs);
        const valid = this.options.validateEvents ? PredictionEventSchema.safeParse(event) : null;
        if (valid && !valid.success) {
          skipped++;
          logger.warn(
            {
              productId: record.productId,
              eventId,
              issues: valid.error.issues.map((issue) => issue.message),
            },
            'Prediction event failed validation; not published'
          );
        } else {
          try {
            const messageId = await publisher.publish(PREDICTIONS_TOPIC, event);
            published++;
            logger.debug(
              { productId: record.productId, eventId, messageId, publisher: publisher.kind },
              'Prediction event published'
            );
          } catch (error) {
            failed++;
            logger.error(
              { productId: record.productId, eventId, publisher: publisher.kind, error },
              'Prediction event publish failed'
            );
          }
        }
      }

      if (sink) rows.push(flattenPredictionToRow(record, eventId, eventTs));
    }

    if (sink && rows.length > 0) {
      try {
        rowsWritten = await sink.writeRows(WAREHOUSE_DATASET, WAREHOUSE_TABLE, rows);
      } catch (error) {
        failed += rows.length;
        logger.error({ sink: sink.kind, rows: rows.length, error }, 'Warehouse write failed');
      }
    }

    return { published, skipped, failed, rowsWritten };
  }

  async close(): Promise<void> {
    await this.options.sink?.close?.();
  }
}

export function createOutputDispatcher(env: AppEnv, logger: Logger): OutputDispatcher {
  let publisher: EventPublisher | null = null;
  if (env.enablePublish) {
    publisher =
      env.publishMode === 'webhook' && env.publishWebhookUrl
        ? new WebhookPublisher({
            url: env.publishWebhookUrl,
            secret: env.publishWebhookSecret,
          })
        : new LocalFilePublisher(env.eventsDir);
  }

  let sink: WarehouseSink | null = null;
  if (env.enableWarehouse) {
    sink =
      env.warehouseMode === 'postgres' && env.warehouseDatabaseUrl
        ? createPostgresWarehouseSink(env.warehouseDatabaseUrl)
        : new CsvWarehouseSink(env.warehousePath);
  }

  return new OutputDispatcher({
    publisher,
    sink,
    validateEvents: env.validateEvents,
    logger,
  });
}
