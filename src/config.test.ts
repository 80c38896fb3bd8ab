import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    const config = loadConfig({});
    expect(config.port).toBe(3000);
    expect(config.redis).toEqual({ enabled: false, url: undefined });
    expect(config.openRouter).toEqual({ apiKey: undefined, baseURL: 'https://openrouter.ai/api/v1' });
    expect(config.interview).toEqual({
      targetConfidence: 90,
      minQuestions: 2,
      maxQuestions: 6,
      extensionMaxQuestions: 5,
      dedupThreshold: 0.8,
      dedupRetries: 2,
      autoComplete: true
    });
    expect(config.reasoner.maxAttemptsPerModel).toBe(3);
  });

  it('coerces values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      OPENROUTER_API_KEY: 'test-secret',
      REDIS_ENABLED: 'true',
      REDIS_URL: 'redis://localhost:6379',
      INTERVIEW_AUTO_COMPLETE: 'false',
      REASONER_TIMEOUT_MS: '1000'
    });
    expect(config.port).toBe(8080);
    expect(config.openRouter.apiKey).toBe('test-secret');
    expect(config.redis).toEqual({ enabled: true, url: 'redis://localhost:6379' });
    expect(config.interview.autoComplete).toBe(false);
    expect(config.reasoner.timeoutMs).toBe(1000);
  });

  it('rejects a minimum above the maximum', () => {
    expect(() => loadConfig({ INTERVIEW_MIN_QUESTIONS: '7', INTERVIEW_MAX_QUESTIONS: '6' })).toThrow(
      'INTERVIEW_MIN_QUESTIONS exceeds INTERVIEW_MAX_QUESTIONS'
    );
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/Invalid environment configuration: PORT/);
  });
});
