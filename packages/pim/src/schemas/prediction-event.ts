import { z } from 'zod';

export const EVENT_SOURCE = 'catalog-intel.api';
export const EVENT_VERSION = 'v1';

const EventPredictionSchema = z
  .object({
    value: z.string().min(1),
    confidence: z.number().min(0).max(1),
    extracted_by: z.enum(['text_stub', 'llm_stub', 'vision', 'merged', 'fusion']),
  })
  .strict();

const DecisionLogEntrySchema = z
  .object({
    attribute_name: z.string().min(1),
    sources_considered: z.array(z.enum(['text', 'vision'])).min(1),
    chosen_source: z.string().min(1),
    reason: z.string().min(1),
    conflicts: z.array(
      z
        .object({
          source: z.enum(['text', 'vision']),
          value: z.string(),
          confidence: z.number().min(0).max(1),
        })
        .strict()
    ),
  })
  .strict();

export const PredictionEventSchema = z
  .object({
    event_id: z.string().uuid(),
    event_ts: z.string().datetime({ offset: true }),
    source: z.literal(EVENT_SOURCE),
    version: z.literal(EVENT_VERSION),
    product_id: z.string().min(1),
    predictions: z.record(z.string(), EventPredictionSchema),
    decision_log: z.record(z.string(), DecisionLogEntrySchema),
  })
  .strict()
  .superRefine((event, ctx) => {
    const predicted = Object.keys(event.predictions).sort().join(',');
    const logged = Object.keys(event.decision_log).sort().join(',');
    if (predicted !== logged) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['decision_log'],
        message: 'decision_log keys must match predictions keys',
      });
    }
  });

export type PredictionEvent = z.infer<typeof PredictionEventSchema>;
