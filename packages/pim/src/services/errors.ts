import type { AdmissionErrorType, PipelineStage, StagedErrorType } from '@app/types';

/** Request rejected before any IO. */
export class AdmissionError extends Error {
  readonly errorType: AdmissionErrorType;
  readonly productId: string | null;

  constructor(errorType: AdmissionErrorType, message: string, productId: string | null = null) {
    super(message);
    this.name = 'AdmissionError';
    this.errorType = errorType;
    this.productId = productId;
    Object.setPrototypeOf(this, AdmissionError.prototype);
  }
}

/** A record failed while running one pipeline stage. */
export class StageError extends Error {
  readonly stage: Exclude<PipelineStage, 'admission'>;
  readonly errorType: StagedErrorType;
  readonly productId: string;

  constructor(params: {
    stage: Exclude<PipelineStage, 'admission'>;
    errorType: StagedErrorType;
    message: string;
    productId: string;
  }) {
    super(params.message);
    this.name = 'StageError';
    this.stage = params.stage;
    this.errorType = params.errorType;
    this.productId = params.productId;
    Object.setPrototypeOf(this, StageError.prototype);
  }
}

/**
 * Thrown by ingestors and extractors. They do not know which stage runs them;
 * the pipeline attaches the stage when it converts this into a StageError.
 */
export class CollaboratorError extends Error {
  readonly errorType: StagedErrorType;

  constructor(errorType: StagedErrorType, message: string) {
    super(message);
    this.name = 'CollaboratorError';
    this.errorType = errorType;
    Object.setPrototypeOf(this, CollaboratorError.prototype);
  }
}

type ExecutionStage = StageError['stage'];

const TIMEOUT_PATTERNS = [/timed? ?out/i, /\babort/i, /deadline/i];
const NETWORK_PATTERNS = [
  /ECONNREFUSED/i,
  /ECONNRESET/i,
  /ENOTFOUND/i,
  /EAI_AGAIN/i,
  /fetch failed/i,
  /network/i,
];
const MISSING_PATTERNS = [/ENOENT/i, /no such file/i, /not found/i, /EACCES/i];
const FORMAT_PATTERNS = [/unsupported/i, /invalid image/i, /magic bytes/i];

function matchesAny(message: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(message));
}

function classifyMessage(stage: ExecutionStage, message: string): StagedErrorType {
  if (matchesAny(message, TIMEOUT_PATTERNS)) return 'timeout';

  if (stage === 'ingest') {
    if (matchesAny(message, FORMAT_PATTERNS)) return 'unsupported_format';
    return 'fetch_failed';
  }

  if (matchesAny(message, NETWORK_PATTERNS) || matchesAny(message, MISSING_PATTERNS)) {
    return 'unreachable_resource';
  }
  return 'malformed_input';
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function classifyStageFailure(
  stage: ExecutionStage,
  error: unknown,
  productId: string
): StageError {
  if (error instanceof StageError) return error;

  if (error instanceof CollaboratorError) {
    return new StageError({ stage, errorType: error.errorType, message: error.message, productId });
  }

  const message = error instanceof Error ? error.message : String(error);
  const errorType = isAbortError(error) ? 'timeout' : classifyMessage(stage, message);
  return new StageError({ stage, errorType, message, productId });
}
