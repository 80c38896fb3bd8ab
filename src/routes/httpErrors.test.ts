import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  AllModelsExhaustedError,
  InvalidTransitionError,
  RateLimitedError,
  SessionBusyError,
  SessionNotFoundError,
  ValidationFailureError
} from '../errors.js';
import { BadRequestError, toHttpError } from './httpErrors.js';

describe('toHttpError', () => {
  it('maps session errors to client statuses', () => {
    expect(toHttpError(new SessionNotFoundError('s1'))).toEqual({
      status: 404,
      body: { error: 'SESSION_NOT_FOUND', message: 'Session s1 not found' }
    });
    expect(toHttpError(new SessionBusyError('s1')).status).toBe(409);
    expect(toHttpError(new InvalidTransitionError('completed', 'continue')).body).toEqual({
      error: 'INVALID_TRANSITION',
      message: 'Cannot continue a session in status completed'
    });
  });

  it('carries the attempt log when every model failed', () => {
    const attempts = [{ model: 'model-a', attempt: 1, outcome: 'timeout' as const, durationMs: 10, error: 'slow' }];
    const http = toHttpError(new AllModelsExhaustedError(attempts));
    expect(http.status).toBe(503);
    expect(http.body.details).toEqual({ attempts });
  });

  it('lists missing analysis fields', () => {
    const http = toHttpError(new ValidationFailureError(['recommendations: Required']));
    expect(http.status).toBe(502);
    expect(http.body.details).toEqual({ issues: ['recommendations: Required'] });
  });

  it('rounds the retry hint up to whole seconds', () => {
    const http = toHttpError(new RateLimitedError('model-a', 1500));
    expect(http.status).toBe(429);
    expect(http.headers).toEqual({ 'Retry-After': '2' });
    expect(toHttpError(new RateLimitedError('model-a', null)).headers).toBeUndefined();
  });

  it('reports invalid bodies field by field', () => {
    const parsed = z.object({ answer: z.string() }).safeParse({});
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(toHttpError(parsed.error)).toEqual({
        status: 400,
        body: { error: 'BAD_REQUEST', message: 'Request body is invalid', details: [{ path: 'answer', message: 'Required' }] }
      });
    }
    expect(toHttpError(new BadRequestError('sessionId is required')).status).toBe(400);
  });

  it('maps unexpected errors to 500', () => {
    expect(toHttpError(new Error('boom'))).toEqual({ status: 500, body: { error: 'INTERNAL', message: 'boom' } });
  });
});
