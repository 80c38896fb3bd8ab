import { ZodError } from 'zod';
import { AllModelsExhaustedError, InterviewError, RateLimitedError, ValidationFailureError, type ErrorCode } from '../errors.js';

export interface HttpError {
  status: number;
  body: { error: string; message: string; details?: unknown };
  headers?: Record<string, string>;
}

const STATUS: Record<ErrorCode, number> = {
  SESSION_NOT_FOUND: 404,
  SESSION_BUSY: 409,
  INVALID_TRANSITION: 409,
  VALIDATION_FAILURE: 502,
  EXTRACTION_FAILURE: 502,
  FAILED_TO_GENERATE_QUESTION: 502,
  RATE_LIMITED: 429,
  ALL_MODELS_EXHAUSTED: 503,
  REASONER_TIMEOUT: 504,
  REASONER_TRANSPORT: 502,
  REASONER_REQUEST: 502
};

/** Transport-level input problems not covered by a body schema. */
export class BadRequestError extends Error {}

export function toHttpError(err: unknown): HttpError {
  if (err instanceof BadRequestError) {
    return { status: 400, body: { error: 'BAD_REQUEST', message: err.message } };
  }
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: 'BAD_REQUEST',
        message: 'Request body is invalid',
        details: err.issues.map(i => ({ path: i.path.join('.'), message: i.message }))
      }
    };
  }
  if (err instanceof InterviewError) {
    const out: HttpError = { status: STATUS[err.code], body: { error: err.code, message: err.message } };
    if (err instanceof AllModelsExhaustedError) out.body.details = { attempts: err.attempts };
    if (err instanceof ValidationFailureError) out.body.details = { issues: err.issues };
    if (err instanceof RateLimitedError && err.retryAfterMs !== null) {
      out.headers = { 'Retry-After': String(Math.ceil(err.retryAfterMs / 1000)) };
    }
    return out;
  }
  return {
    status: 500,
    body: { error: 'INTERNAL', message: err instanceof Error ? err.message : String(err) }
  };
}
