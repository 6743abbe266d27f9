import { context as otelContext, SpanStatusCode, trace } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';

import { OTEL_ATTR, type OtelAttrKey } from './otel-attributes.js';

const TRACER_NAME = 'catalog-intelligence';

/**
 * Run a function within a new span context. Errors are recorded on the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  const span = tracer.startSpan(name, { attributes });

  try {
    const result = await otelContext.with(trace.setSpan(otelContext.active(), span), () =>
      fn(span)
    );
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    span.setStatus({ code: SpanStatusCode.ERROR, message });
    span.recordException(error instanceof Error ? error : message);
    throw error;
  } finally {
    span.end();
  }
}

export function setSpanAttribute(key: OtelAttrKey, value: string | number | boolean): void {
  trace.getActiveSpan()?.setAttribute(key, value);
}

export function setRequestIdAttribute(requestId: string): void {
  setSpanAttribute(OTEL_ATTR.REQUEST_ID, requestId);
}
