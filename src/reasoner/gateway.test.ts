import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AllModelsExhaustedError,
  RateLimitedError,
  ReasonerRequestError,
  ReasonerTimeoutError,
  ValidationFailureError
} from '../errors.js';
import { extractObject } from './extractor.js';
import { ReasonerGateway, type Reasoner, type ReasonerReply } from './gateway.js';
import { ModelCatalog } from './modelCatalog.js';

type Step = ReasonerReply | Error;

function scripted(script: Record<string, Step[]>) {
  const calls: string[] = [];
  const reasoner: Reasoner = {
    async complete({ model }) {
      calls.push(model);
      const step = script[model]?.shift();
      if (!step) throw new Error(`no scripted reply for ${model}`);
      if (step instanceof Error) throw step;
      return step;
    }
  };
  return { reasoner, calls };
}

const catalog = () =>
  new ModelCatalog([
    { id: 'model-a', purposes: ['interview'], healthy: true },
    { id: 'model-b', purposes: ['interview'], healthy: true }
  ]);

describe('ReasonerGateway', () => {
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const options = { sleep, random: () => 0, backoffBaseMs: 500, backoffCapMs: 8000, backoffJitterMs: 250 };

  beforeEach(() => {
    sleep.mockClear();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('retries, then falls back to the next model', async () => {
    const { reasoner, calls } = scripted({
      'model-a': [
        new ReasonerTimeoutError('model-a', 45000),
        new ReasonerTimeoutError('model-a', 45000),
        new ReasonerTimeoutError('model-a', 45000)
      ],
      'model-b': [
        { text: 'I cannot answer in JSON today', usage: { promptTokens: 10, completionTokens: 5 } },
        { text: '{"question":"Is the pain sharp or dull?"}', usage: { promptTokens: 20, completionTokens: 7 } }
      ]
    });
    const gateway = new ReasonerGateway(reasoner, catalog(), options);

    const result = await gateway.ask({ purpose: 'interview', messages: [], parse: text => extractObject(text) });

    expect(result.model).toBe('model-b');
    expect(result.value).toEqual({ question: 'Is the pain sharp or dull?' });
    expect(calls).toEqual(['model-a', 'model-a', 'model-a', 'model-b', 'model-b']);
    expect(result.attempts.map(a => `${a.model}#${a.attempt}:${a.outcome}`)).toEqual([
      'model-a#1:timeout',
      'model-a#2:timeout',
      'model-a#3:timeout',
      'model-b#1:extraction',
      'model-b#2:success'
    ]);
    expect(result.usage).toEqual({ promptTokens: 30, completionTokens: 12 });
    // no wait after a model's last attempt
    expect(sleep.mock.calls.map(c => c[0])).toEqual([500, 1000, 500]);
  });

  it('tries caller-preferred models first', async () => {
    const { reasoner, calls } = scripted({ 'model-b': [{ text: '{"ok":true}' }] });
    const gateway = new ReasonerGateway(reasoner, catalog(), options);
    const result = await gateway.ask({ purpose: 'interview', models: ['model-b'], messages: [], parse: text => extractObject(text) });
    expect(result.model).toBe('model-b');
    expect(calls).toEqual(['model-b']);
  });

  it('waits at least the suggested delay after a rate limit, within the cap', async () => {
    const { reasoner } = scripted({
      'model-a': [new RateLimitedError('model-a', 3000), new RateLimitedError('model-a', 20000), { text: '{"ok":true}' }]
    });
    const gateway = new ReasonerGateway(reasoner, catalog(), options);
    await gateway.ask({ purpose: 'interview', messages: [], parse: text => extractObject(text) });
    expect(sleep.mock.calls.map(c => c[0])).toEqual([3000, 8000]);
  });

  it('adds jitter on top of the backoff', () => {
    const gateway = new ReasonerGateway(scripted({}).reasoner, catalog(), { ...options, random: () => 0.5 });
    expect(gateway.backoff(1, null)).toBe(500 + 125);
    expect(gateway.backoff(6, null)).toBe(8000 + 125);
  });

  it('does not retry a rejected request', async () => {
    const { reasoner, calls } = scripted({ 'model-a': [new ReasonerRequestError('model-a', 400, 'bad request')] });
    const gateway = new ReasonerGateway(reasoner, catalog(), options);
    await expect(gateway.ask({ purpose: 'interview', messages: [], parse: text => extractObject(text) })).rejects.toBeInstanceOf(
      ReasonerRequestError
    );
    expect(calls).toEqual(['model-a']);
  });

  it('does not retry a validation failure raised by the parser', async () => {
    const { reasoner, calls } = scripted({ 'model-a': [{ text: '{}' }] });
    const gateway = new ReasonerGateway(reasoner, catalog(), options);
    const parse = () => {
      throw new ValidationFailureError(['recommendations: Required']);
    };
    await expect(gateway.ask({ purpose: 'interview', messages: [], parse })).rejects.toBeInstanceOf(ValidationFailureError);
    expect(calls).toEqual(['model-a']);
  });

  it('raises AllModelsExhausted when no model is available', async () => {
    const gateway = new ReasonerGateway(scripted({}).reasoner, new ModelCatalog([]), options);
    const err = await gateway.ask({ purpose: 'interview', messages: [], parse: text => text }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AllModelsExhaustedError);
    if (err instanceof AllModelsExhaustedError) {
      expect(err.attempts).toEqual([]);
      expect(err.message).toBe('All models exhausted after 0 attempts (no models available)');
    }
  });

  it('times out a backend that never answers', async () => {
    const reasoner: Reasoner = {
      complete: ({ signal }) =>
        new Promise((_, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        })
    };
    const gateway = new ReasonerGateway(reasoner, new ModelCatalog([{ id: 'slow', purposes: ['interview'], healthy: true }]), {
      ...options,
      timeoutMs: 5,
      maxAttemptsPerModel: 1
    });
    const err = await gateway.ask({ purpose: 'interview', messages: [], parse: text => text }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AllModelsExhaustedError);
    if (err instanceof AllModelsExhaustedError) {
      expect(err.attempts.map(a => a.outcome)).toEqual(['timeout']);
      expect(err.lastError).toBe('Model slow did not answer within 5ms');
    }
  });

  it('stops when the caller aborts', async () => {
    const { reasoner, calls } = scripted({ 'model-a': [{ text: '{}' }] });
    const gateway = new ReasonerGateway(reasoner, catalog(), options);
    const controller = new AbortController();
    controller.abort();
    await expect(
      gateway.ask({ purpose: 'interview', messages: [], parse: text => text, signal: controller.signal })
    ).rejects.toMatchObject({ name: 'AbortError' });
    expect(calls).toEqual([]);
  });
});
