import { setTimeout as delay } from 'timers/promises';
import {
  AllModelsExhaustedError,
  ExtractionError,
  RateLimitedError,
  ReasonerRequestError,
  ReasonerTimeoutError,
  ReasonerTransportError,
  ValidationFailureError,
  type AttemptRecord
} from '../errors.js';
import type { ChatMessage, TokenUsage } from '../types.js';
import type { ModelCatalog, ModelPurpose } from './modelCatalog.js';

export interface ReasonerRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  signal: AbortSignal;
}

export interface ReasonerReply {
  text: string;
  usage?: TokenUsage;
}

/** The external text-generation backend: a prompt in, raw text out. */
export interface Reasoner {
  complete(request: ReasonerRequest): Promise<ReasonerReply>;
}

export interface GatewayOptions {
  maxAttemptsPerModel: number;
  timeoutMs: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  backoffJitterMs: number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  random: () => number;
}

export interface AskRequest<T> {
  purpose: ModelPurpose;
  messages: ChatMessage[];
  /** Caller preference, tried ahead of the catalog's defaults for the purpose. */
  models?: readonly string[];
  /** Turns raw text into the expected shape; throwing ExtractionError makes the attempt retryable. */
  parse: (text: string) => T;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface AskResult<T> {
  value: T;
  rawText: string;
  model: string;
  attempts: AttemptRecord[];
  usage: TokenUsage;
}

const DEFAULTS: GatewayOptions = {
  maxAttemptsPerModel: 3,
  timeoutMs: 45_000,
  backoffBaseMs: 500,
  backoffCapMs: 8_000,
  backoffJitterMs: 250,
  sleep: async (ms, signal) => {
    await delay(ms, undefined, { signal });
  },
  random: Math.random
};

interface Failure {
  outcome: AttemptRecord['outcome'];
  retryable: boolean;
  retryAfterMs: number | null;
}

function classify(err: unknown): Failure {
  if (err instanceof ReasonerTimeoutError) return { outcome: 'timeout', retryable: true, retryAfterMs: null };
  if (err instanceof RateLimitedError) return { outcome: 'rate_limited', retryable: true, retryAfterMs: err.retryAfterMs };
  if (err instanceof ReasonerTransportError) return { outcome: 'transport', retryable: true, retryAfterMs: null };
  if (err instanceof ExtractionError) return { outcome: 'extraction', retryable: true, retryAfterMs: null };
  if (err instanceof ValidationFailureError) return { outcome: 'validation', retryable: false, retryAfterMs: null };
  if (err instanceof ReasonerRequestError) return { outcome: 'request', retryable: false, retryAfterMs: null };
  return { outcome: 'error', retryable: false, retryAfterMs: null };
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Sequential retry-then-fallback client of the reasoning backend. Each model
 * gets up to `maxAttemptsPerModel` tries with capped exponential backoff before
 * the next model is tried; only one call is ever in flight.
 */
export class ReasonerGateway {
  private readonly options: GatewayOptions;

  constructor(
    private readonly reasoner: Reasoner,
    private readonly catalog: ModelCatalog,
    options: Partial<GatewayOptions> = {}
  ) {
    this.options = { ...DEFAULTS, ...options };
  }

  async ask<T>(request: AskRequest<T>): Promise<AskResult<T>> {
    const models = this.catalog.preferences(request.purpose, request.models ?? []);
    const attempts: AttemptRecord[] = [];
    const usage: TokenUsage = { promptTokens: 0, completionTokens: 0 };
    const max = this.options.maxAttemptsPerModel;

    for (const [i, model] of models.entries()) {
      for (let attempt = 1; attempt <= max; attempt++) {
        request.signal?.throwIfAborted();
        const started = Date.now();
        try {
          const reply = await this.attemptOnce(model, request);
          if (reply.usage) {
            usage.promptTokens += reply.usage.promptTokens;
            usage.completionTokens += reply.usage.completionTokens;
          }
          const value = request.parse(reply.text);
          attempts.push({ model, attempt, outcome: 'success', durationMs: Date.now() - started });
          return { value, rawText: reply.text, model, attempts, usage };
        } catch (err) {
          if (request.signal?.aborted) throw err;
          const failure = classify(err);
          attempts.push({ model, attempt, outcome: failure.outcome, durationMs: Date.now() - started, error: message(err) });
          if (!failure.retryable) {
            console.error(`[ReasonerGateway] model=${model} attempt=${attempt} failed (${failure.outcome}), not retrying: ${message(err)}`);
            throw err;
          }
          if (attempt < max) {
            const wait = this.backoff(attempt, failure.retryAfterMs);
            console.warn(`[ReasonerGateway] model=${model} attempt=${attempt}/${max} failed (${failure.outcome}): ${message(err)}; retrying in ${wait}ms`);
            await this.options.sleep(wait, request.signal);
          } else {
            console.warn(`[ReasonerGateway] model=${model} attempt=${attempt}/${max} failed (${failure.outcome}): ${message(err)}`);
          }
        }
      }
      const next = models[i + 1];
      if (next) console.warn(`[ReasonerGateway] giving up on ${model}, falling back to ${next}`);
    }

    throw new AllModelsExhaustedError(attempts);
  }

  backoff(attempt: number, retryAfterMs: number | null): number {
    const { backoffBaseMs: base, backoffCapMs: cap, backoffJitterMs: jitter } = this.options;
    let wait = Math.min(cap, base * 2 ** (attempt - 1));
    if (retryAfterMs !== null) wait = Math.min(cap, Math.max(wait, retryAfterMs));
    return wait + Math.floor(this.options.random() * (jitter + 1));
  }

  private async attemptOnce<T>(model: string, request: AskRequest<T>): Promise<ReasonerReply> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(request.signal?.reason);
    request.signal?.addEventListener('abort', forwardAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // reject before aborting so the race settles as a timeout, not as the backend's abort error
        reject(new ReasonerTimeoutError(model, timeoutMs));
        controller.abort();
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.reasoner.complete({
          model,
          messages: request.messages,
          temperature: request.temperature ?? 0.3,
          maxTokens: request.maxTokens ?? 1024,
          signal: controller.signal
        }),
        timeout
      ]);
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
