import type { SessionStatus } from './types.js';

export type ErrorCode =
  | 'SESSION_NOT_FOUND'
  | 'SESSION_BUSY'
  | 'INVALID_TRANSITION'
  | 'EXTRACTION_FAILURE'
  | 'RATE_LIMITED'
  | 'ALL_MODELS_EXHAUSTED'
  | 'VALIDATION_FAILURE'
  | 'FAILED_TO_GENERATE_QUESTION'
  | 'REASONER_TIMEOUT'
  | 'REASONER_TRANSPORT'
  | 'REASONER_REQUEST';

export abstract class InterviewError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SessionNotFoundError extends InterviewError {
  readonly code = 'SESSION_NOT_FOUND';
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
  }
}

export class SessionBusyError extends InterviewError {
  readonly code = 'SESSION_BUSY';
  constructor(readonly sessionId: string, readonly reason: 'in_flight' | 'version_conflict' = 'in_flight') {
    super(
      reason === 'in_flight'
        ? `Session ${sessionId} already has a mutation in flight`
        : `Session ${sessionId} was modified concurrently`
    );
  }
}

export class InvalidTransitionError extends InterviewError {
  readonly code = 'INVALID_TRANSITION';
  constructor(readonly from: SessionStatus, readonly operation: string, detail?: string) {
    super(`Cannot ${operation} a session in status ${from}${detail ? `: ${detail}` : ''}`);
  }
}

export type ExtractionStage = 'empty' | 'parse' | 'repair' | 'shape';

export class ExtractionError extends InterviewError {
  readonly code = 'EXTRACTION_FAILURE';
  constructor(readonly stage: ExtractionStage, readonly rawSnippet: string, detail?: string) {
    super(`Could not extract a structured reply (${stage})${detail ? `: ${detail}` : ''}`);
  }
}

export class RateLimitedError extends InterviewError {
  readonly code = 'RATE_LIMITED';
  constructor(readonly model: string, readonly retryAfterMs: number | null) {
    super(`Model ${model} is rate limited`);
  }
}

export class ReasonerTimeoutError extends InterviewError {
  readonly code = 'REASONER_TIMEOUT';
  constructor(readonly model: string, readonly timeoutMs: number) {
    super(`Model ${model} did not answer within ${timeoutMs}ms`);
  }
}

export class ReasonerTransportError extends InterviewError {
  readonly code = 'REASONER_TRANSPORT';
  constructor(readonly model: string, message: string, options?: { cause?: unknown }) {
    super(`Model ${model}: ${message}`, options);
  }
}

/** A 4xx from the backend other than 408/429: retrying the same request cannot help. */
export class ReasonerRequestError extends InterviewError {
  readonly code = 'REASONER_REQUEST';
  constructor(readonly model: string, readonly status: number, message: string) {
    super(`Model ${model} rejected the request (${status}): ${message}`);
  }
}

export interface AttemptRecord {
  model: string;
  attempt: number;
  outcome: 'success' | 'timeout' | 'rate_limited' | 'transport' | 'extraction' | 'validation' | 'request' | 'error';
  durationMs: number;
  error?: string;
}

export class AllModelsExhaustedError extends InterviewError {
  readonly code = 'ALL_MODELS_EXHAUSTED';
  constructor(readonly attempts: AttemptRecord[]) {
    const models = [...new Set(attempts.map(a => a.model))];
    super(`All models exhausted after ${attempts.length} attempts (${models.join(', ') || 'no models available'})`);
  }

  /** Message of the final failed attempt. */
  get lastError(): string | undefined {
    return this.attempts[this.attempts.length - 1]?.error;
  }
}

export class ValidationFailureError extends InterviewError {
  readonly code = 'VALIDATION_FAILURE';
  constructor(readonly issues: string[]) {
    super(`Final analysis is missing required fields: ${issues.join('; ')}`);
  }
}

export class FailedToGenerateQuestionError extends InterviewError {
  readonly code = 'FAILED_TO_GENERATE_QUESTION';
  constructor(readonly sessionId: string, readonly rejected: string[]) {
    super(`Could not obtain a non-duplicate question for session ${sessionId} after ${rejected.length} tries`);
  }
}
