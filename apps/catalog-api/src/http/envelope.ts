import type { ApiErrorResponse, ApiSuccessResponse } from '@app/types';

function nowIso(): string {
  return new Date().toISOString();
}

export function successEnvelope<T>(requestId: string, data: T): ApiSuccessResponse<T> {
  return {
    success: true,
    data,
    meta: {
      request_id: requestId,
      timestamp: nowIso(),
    },
  };
}

export function errorEnvelope(
  requestId: string,
  code: string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details ? { details } : {}),
    },
    meta: {
      request_id: requestId,
      timestamp: nowIso(),
    },
  };
}
