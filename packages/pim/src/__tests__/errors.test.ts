import { describe, expect, it } from 'vitest';

import {
  AdmissionError,
  classifyStageFailure,
  CollaboratorError,
  StageError,
} from '../services/errors.js';

describe('errors', () => {
  it('keeps subclass identity', () => {
    const admission = new AdmissionError('rate_limited', 'slow down');
    expect(admission).toBeInstanceOf(AdmissionError);
    expect(admission).toBeInstanceOf(Error);
    expect(admission.name).toBe('AdmissionError');
    expect(admission.productId).toBeNull();
  });

  it('attaches the running stage to collaborator errors', () => {
    const error = classifyStageFailure(
      'vision',
      new CollaboratorError('unreachable_resource', 'Image file is not readable: /x.png'),
      'p-1'
    );
    expect(error).toBeInstanceOf(StageError);
    expect(error).toMatchObject({
      stage: 'vision',
      errorType: 'unreachable_resource',
      productId: 'p-1',
      message: 'Image file is not readable: /x.png',
    });
  });

  it('passes stage errors through untouched', () => {
    const original = new StageError({
      stage: 'ingest',
      errorType: 'timeout',
      message: 'Record deadline exceeded during ingest stage',
      productId: 'p-1',
    });
    expect(classifyStageFailure('fuse', original, 'p-1')).toBe(original);
  });

  it.each([
    ['ingest', new Error('getaddrinfo ENOTFOUND cdn.example.test'), 'fetch_failed'],
    ['ingest', new Error('Unsupported image type'), 'unsupported_format'],
    ['enrich', new Error('Request timed out'), 'timeout'],
    ['enrich', new Error('connect ECONNREFUSED 127.0.0.1:443'), 'unreachable_resource'],
    ['vision', new Error('unexpected token in payload'), 'malformed_input'],
    ['vision', Object.assign(new Error('stop'), { name: 'AbortError' }), 'timeout'],
  ] as const)('classifies %s failure "%s" as %s', (stage, error, expected) => {
    expect(classifyStageFailure(stage, error, 'p-1').errorType).toBe(expected);
  });
});
