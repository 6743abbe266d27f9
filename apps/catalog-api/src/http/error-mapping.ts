import type { AppEnv } from '@app/config';
import { AdmissionError, StageError } from '@app/pim';
import type { AdmissionErrorType } from '@app/types';
import { formatIssues } from '@app/validation';
import { ZodError } from 'zod';

export type MappedError = Readonly<{
  statusCode: number;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}>;

const ADMISSION_STATUS = {
  rate_limited: 429,
  batch_limit_exceeded: 413,
  text_limit_exceeded: 413,
} as const satisfies Record<AdmissionErrorType, number>;

function genericCode(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'BAD_REQUEST';
    case 404:
      return 'NOT_FOUND';
    case 405:
      return 'METHOD_NOT_ALLOWED';
    case 413:
      return 'PAYLOAD_TOO_LARGE';
    case 415:
      return 'UNSUPPORTED_MEDIA_TYPE';
    case 429:
      return 'TOO_MANY_REQUESTS';
    default:
      return statusCode >= 500 ? 'INTERNAL_SERVER_ERROR' : 'BAD_REQUEST';
  }
}

function statusCodeOf(error: unknown): number {
  if (!(error instanceof Error)) return 500;
  const raw: unknown = Reflect.get(error, 'statusCode');
  return typeof raw === 'number' && raw >= 400 && raw < 600 ? raw : 500;
}

/** Translates domain, validation and framework errors into status, code and message. */
export function mapError(error: unknown, nodeEnv: AppEnv['nodeEnv']): MappedError {
  if (error instanceof AdmissionError) {
    return {
      statusCode: ADMISSION_STATUS[error.errorType],
      code: error.errorType,
      message: error.message,
      ...(error.productId ? { details: { product_id: error.productId } } : {}),
    };
  }

  if (error instanceof StageError) {
    return {
      statusCode: 422,
      code: error.errorType,
      message: error.message,
      details: { stage: error.stage, product_id: error.productId },
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'invalid_payload',
      message: 'Request payload failed validation',
      details: { issues: formatIssues(error) },
    };
  }

  const statusCode = statusCodeOf(error);
  const errorMessage = error instanceof Error ? error.message : 'Unknown error';
  const message =
    nodeEnv === 'production' && statusCode >= 500 ? 'Internal Server Error' : errorMessage;
  return { statusCode, code: genericCode(statusCode), message };
}
