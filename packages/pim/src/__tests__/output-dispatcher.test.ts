import { describe, expect, it, vi } from 'vitest';

import type { Logger } from '@app/logger';
import type { PredictionRecord } from '@app/types';

import type { EventPublisher } from '../outputs/event-publisher.js';
import { OutputDispatcher } from '../outputs/output-dispatcher.js';
import type { WarehouseSink } from '../outputs/warehouse-sink.js';

function fakeLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn((): Logger => logger),
  };
  return logger;
}

function record(productId: string, confidence = 0.8): PredictionRecord {
  return {
    productId,
    title: 'Chair',
    finalPredictions: {
      category: { value: 'Chair', confidence, extractedBy: 'text_stub', evidence: [] },
    },
    decisionLog: {
      category: {
        attributeName: 'category',
        sourcesConsidered: ['text'],
        chosenSource: 'text',
        reason: 'only modality produced a value',
        conflicts: [],
      },
    },
  };
}

let ids = 0;
const options = {
  idFactory: () => `00000000-0000-4000-8000-${String(++ids).padStart(12, '0')}`,
  now: () => new Date('2026-03-01T00:00:00.000Z'),
};

describe('output-dispatcher', () => {
  it('publishes events and writes rows for every record', async () => {
    const publish = vi.fn(async () => 'message-id');
    const writeRows = vi.fn(
      async (_dataset: string, _table: string, rows: readonly unknown[]) => rows.length
    );
    const publisher: EventPublisher = { kind: 'fake', publish };
    const sink: WarehouseSink = { kind: 'fake', writeRows };
    const dispatcher = new OutputDispatcher({
      publisher,
      sink,
      validateEvents: true,
      logger: fakeLogger(),
      ...options,
    });

    const report = await dispatcher.dispatch([record('p-1'), record('p-2')]);

    expect(report).toEqual({ published: 2, skipped: 0, failed: 0, rowsWritten: 2 });
    expect(publish).toHaveBeenCalledWith(
      'catalog_predictions',
      expect.objectContaining({ product_id: 'p-1', source: 'catalog-intel.api' })
    );
    expect(writeRows).toHaveBeenCalledWith('catalog', 'predictions', expect.any(Array));
  });

  it('logs sink failures and never rejects', async () => {
    const logger = fakeLogger();
    const dispatcher = new OutputDispatcher({
      publisher: {
        kind: 'fake',
        publish: async () => {
          throw new Error('broker down');
        },
      },
      sink: {
        kind: 'fake',
        writeRows: async () => {
          throw new Error('disk full');
        },
      },
      validateEvents: false,
      logger,
      ...options,
    });

    const report = await dispatcher.dispatch([record('p-1')]);

    expect(report).toEqual({ published: 0, skipped: 0, failed: 2, rowsWritten: 0 });
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ productId: 'p-1', publisher: 'fake' }),
      'Prediction event publish failed'
    );
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ sink: 'fake', rows: 1 }),
      'Warehouse write failed'
    );
  });

  it('skips events that fail validation when validation is on', async () => {
    const publish = vi.fn(async () => 'message-id');
    const logger = fakeLogger();
    const dispatcher = new OutputDispatcher({
      publisher: { kind: 'fake', publish },
      sink: null,
      validateEvents: true,
      logger,
      ...options,
    });

    const report = await dispatcher.dispatch([record('p-1', 1.5)]);

    expect(report).toEqual({ published: 0, skipped: 1, failed: 0, rowsWritten: 0 });
    expect(publish).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('does nothing when no output is configured', async () => {
    const dispatcher = new OutputDispatcher({
      publisher: null,
      sink: null,
      validateEvents: false,
      logger: fakeLogger(),
    });
    expect(dispatcher.enabled).toBe(false);
    expect(await dispatcher.dispatch([record('p-1')])).toEqual({
      published: 0,
      skipped: 0,
      failed: 0,
      rowsWritten: 0,
    });
  });
});
