import { z } from 'zod';

const boolFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform(v => v === 'true' || v === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  REDIS_ENABLED: boolFlag,
  REDIS_URL: z.string().optional(),
  MODEL_CATALOG_PATH: z.string().default('config/models.json'),
  REASONER_TIMEOUT_MS: z.coerce.number().int().positive().default(45_000),
  REASONER_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  REASONER_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(500),
  REASONER_BACKOFF_CAP_MS: z.coerce.number().int().min(0).default(8_000),
  REASONER_BACKOFF_JITTER_MS: z.coerce.number().int().min(0).default(250),
  INTERVIEW_TARGET_CONFIDENCE: z.coerce.number().min(0).max(100).default(90),
  INTERVIEW_MIN_QUESTIONS: z.coerce.number().int().min(0).default(2),
  INTERVIEW_MAX_QUESTIONS: z.coerce.number().int().min(1).default(6),
  INTERVIEW_EXTENSION_MAX_QUESTIONS: z.coerce.number().int().min(0).default(5),
  INTERVIEW_DEDUP_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  INTERVIEW_DEDUP_RETRIES: z.coerce.number().int().min(0).default(2),
  INTERVIEW_AUTO_COMPLETE: z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform(v => v === 'true' || v === '1')
});

export interface AppConfig {
  port: number;
  openRouter: { apiKey: string | undefined; baseURL: string };
  redis: { enabled: boolean; url: string | undefined };
  modelCatalogPath: string;
  reasoner: {
    timeoutMs: number;
    maxAttemptsPerModel: number;
    backoffBaseMs: number;
    backoffCapMs: number;
    backoffJitterMs: number;
  };
  interview: {
    targetConfidence: number;
    minQuestions: number;
    maxQuestions: number;
    extensionMaxQuestions: number;
    dedupThreshold: number;
    dedupRetries: number;
    autoComplete: boolean;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${keys}`);
  }
  const e = parsed.data;
  if (e.INTERVIEW_MIN_QUESTIONS > e.INTERVIEW_MAX_QUESTIONS) {
    throw new Error('Invalid environment configuration: INTERVIEW_MIN_QUESTIONS exceeds INTERVIEW_MAX_QUESTIONS');
  }
  return {
    port: e.PORT,
    openRouter: { apiKey: e.OPENROUTER_API_KEY || undefined, baseURL: e.OPENROUTER_BASE_URL },
    redis: { enabled: e.REDIS_ENABLED, url: e.REDIS_URL || undefined },
    modelCatalogPath: e.MODEL_CATALOG_PATH,
    reasoner: {
      timeoutMs: e.REASONER_TIMEOUT_MS,
      maxAttemptsPerModel: e.REASONER_MAX_ATTEMPTS,
      backoffBaseMs: e.REASONER_BACKOFF_BASE_MS,
      backoffCapMs: e.REASONER_BACKOFF_CAP_MS,
      backoffJitterMs: e.REASONER_BACKOFF_JITTER_MS
    },
    interview: {
      targetConfidence: e.INTERVIEW_TARGET_CONFIDENCE,
      minQuestions: e.INTERVIEW_MIN_QUESTIONS,
      maxQuestions: e.INTERVIEW_MAX_QUESTIONS,
      extensionMaxQuestions: e.INTERVIEW_EXTENSION_MAX_QUESTIONS,
      dedupThreshold: e.INTERVIEW_DEDUP_THRESHOLD,
      dedupRetries: e.INTERVIEW_DEDUP_RETRIES,
      autoComplete: e.INTERVIEW_AUTO_COMPLETE
    }
  };
}
