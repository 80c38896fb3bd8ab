import { Redis } from 'ioredis';
import { z } from 'zod';
import { SessionBusyError } from './errors.js';
import { JsonObjectSchema, StoredAnalysisSchema, StoredEnhancementSchema } from './schemas.js';
import type { InterviewSession, InterviewSettings } from './types.js';

export interface SessionStore {
  getSession(id: string): Promise<InterviewSession | null>;
  /** Fails with SessionBusyError if the id is already taken. */
  createSession(session: InterviewSession): Promise<InterviewSession>;
  /**
   * Compare-and-set on `revision`: writes only if the stored revision still
   * equals `expectedRevision`, and returns the session with the bumped revision.
   */
  saveSession(session: InterviewSession, expectedRevision: number): Promise<InterviewSession>;
}

// -- Normalization -------------------------------------------------------

const list = <T extends z.ZodTypeAny>(item: T) =>
  z
    .array(item)
    .nullish()
    .transform(v => v ?? []);

const QuestionTurnSchema = z.object({
  text: z.string(),
  index: z.number().int().optional(),
  category: z.string().nullish(),
  phase: z.enum(['base', 'extension']).nullish(),
  askedAt: z.string().nullish()
});

const AnswerTurnSchema = z.object({
  text: z.string(),
  answeredAt: z.string().nullish()
});

const StoredSessionSchema = z.object({
  revision: z.number().int().nonnegative().nullish(),
  status: z.enum(['awaiting_first_question', 'awaiting_answer', 'ready_for_analysis', 'completed', 'abandoned']),
  subjectContext: JsonObjectSchema.nullish(),
  questionLog: list(QuestionTurnSchema),
  answerLog: list(AnswerTurnSchema),
  currentConfidence: z.number().nullish(),
  targetConfidence: z.number().nullish(),
  minQuestions: z.number().int().nullish(),
  maxQuestions: z.number().int().nullish(),
  extensionMaxQuestions: z.number().int().nullish(),
  extension: z
    .object({ targetConfidence: z.number(), maxQuestions: z.number().int(), startIndex: z.number().int() })
    .nullish(),
  modelPreference: list(z.string()),
  activeModel: z.string().nullish(),
  workingAnalysis: JsonObjectSchema.nullish(),
  finalAnalysis: StoredAnalysisSchema.nullish(),
  extensionAnalyses: list(StoredAnalysisSchema),
  enhancedAnalysis: StoredEnhancementSchema.nullish(),
  usage: z.object({ promptTokens: z.number(), completionTokens: z.number() }).nullish(),
  createdAt: z.string(),
  updatedAt: z.string().nullish(),
  completedAt: z.string().nullish()
});

/**
 * Read-time normalization: older or partial records (null or missing
 * collections, missing settings) load as a complete, current-version session.
 * Returns null when the record cannot be a session at all.
 */
export function normalizeSession(id: string, raw: unknown, defaults: InterviewSettings): InterviewSession | null {
  const parsed = StoredSessionSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[sessionStore] record ${id} is not a valid session: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    return null;
  }
  const r = parsed.data;
  const maxQuestions = r.maxQuestions ?? defaults.maxQuestions;
  const extensionMaxQuestions = r.extensionMaxQuestions ?? defaults.extensionMaxQuestions;
  return {
    schemaVersion: 1,
    revision: r.revision ?? 0,
    id,
    status: r.status,
    subjectContext: r.subjectContext ?? {},
    questionLog: r.questionLog.map((q, i) => ({
      text: q.text,
      index: q.index ?? i,
      category: q.category ?? 'general',
      phase: q.phase ?? 'base',
      askedAt: q.askedAt ?? r.createdAt
    })),
    answerLog: r.answerLog.map(a => ({ text: a.text, answeredAt: a.answeredAt ?? r.updatedAt ?? r.createdAt })),
    currentConfidence: r.currentConfidence ?? 0,
    targetConfidence: r.targetConfidence ?? defaults.targetConfidence,
    minQuestions: r.minQuestions ?? defaults.minQuestions,
    maxQuestions,
    extensionMaxQuestions,
    lifetimeCeiling: maxQuestions + extensionMaxQuestions,
    extension: r.extension ?? null,
    modelPreference: r.modelPreference,
    activeModel: r.activeModel ?? null,
    workingAnalysis: r.workingAnalysis ?? {},
    finalAnalysis: r.finalAnalysis ?? null,
    extensionAnalyses: r.extensionAnalyses,
    enhancedAnalysis: r.enhancedAnalysis ?? null,
    usage: r.usage ?? { promptTokens: 0, completionTokens: 0 },
    createdAt: r.createdAt,
    updatedAt: r.updatedAt ?? r.createdAt,
    completedAt: r.completedAt ?? null
  };
}

function decode(id: string, data: string, defaults: InterviewSettings): InterviewSession | null {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (err) {
    throw new Error(`Stored session ${id} is not valid JSON`, { cause: err });
  }
  return normalizeSession(id, raw, defaults);
}

function brief(s: InterviewSession): string {
  return `status=${s.status}, q=${s.questionLog.length}, a=${s.answerLog.length}, rev=${s.revision}`;
}

// -- In-memory store -----------------------------------------------------

/** Keeps serialized records so callers never share references with the store. */
export function createMemorySessionStore(defaults: InterviewSettings): SessionStore & { size(): number } {
  const mem = new Map<string, string>();

  return {
    size: () => mem.size,

    async getSession(id) {
      const data = mem.get(id);
      return data === undefined ? null : decode(id, data, defaults);
    },

    async createSession(session) {
      if (mem.has(session.id)) throw new SessionBusyError(session.id, 'version_conflict');
      const stored = { ...session, revision: 1 };
      mem.set(session.id, JSON.stringify(stored));
      console.log(`[sessionStore] NEW session ${session.id}: ${brief(stored)}`);
      return stored;
    },

    async saveSession(session, expectedRevision) {
      const data = mem.get(session.id);
      const current = data === undefined ? null : decode(session.id, data, defaults);
      if (!current || current.revision !== expectedRevision) {
        throw new SessionBusyError(session.id, 'version_conflict');
      }
      const stored = { ...session, revision: expectedRevision + 1 };
      mem.set(session.id, JSON.stringify(stored));
      console.log(`[sessionStore] SAVE ${session.id}: ${brief(stored)}`);
      return stored;
    }
  };
}

// -- Redis store ---------------------------------------------------------

// 1 = written, 0 = revision moved on, -1 = no such record
const COMPARE_AND_SET = `
local current = redis.call('GET', KEYS[1])
if not current then return -1 end
local rev = cjson.decode(current)['revision']
if rev == nil or rev == cjson.null then rev = 0 end
if tonumber(rev) ~= tonumber(ARGV[1]) then return 0 end
redis.call('SET', KEYS[1], ARGV[2])
return 1
`;

export function createRedisSessionStore(redis: Redis, defaults: InterviewSettings): SessionStore {
  const keyOf = (id: string) => `session:${id}`;

  return {
    async getSession(id) {
      const data = await redis.get(keyOf(id));
      if (data === null) return null;
      const session = decode(id, data, defaults);
      if (session) console.log(`[sessionStore] LOAD session ${id}: ${brief(session)}`);
      return session;
    },

    async createSession(session) {
      const stored = { ...session, revision: 1 };
      const ok = await redis.set(keyOf(session.id), JSON.stringify(stored), 'NX');
      if (ok === null) throw new SessionBusyError(session.id, 'version_conflict');
      console.log(`[sessionStore] NEW session ${session.id}: ${brief(stored)}`);
      return stored;
    },

    async saveSession(session, expectedRevision) {
      const stored = { ...session, revision: expectedRevision + 1 };
      const result = await redis.eval(COMPARE_AND_SET, 1, keyOf(session.id), expectedRevision, JSON.stringify(stored));
      if (result !== 1) throw new SessionBusyError(session.id, 'version_conflict');
      console.log(`[sessionStore] SAVE ${session.id}: ${brief(stored)}`);
      return stored;
    }
  };
}

export function createSessionStore(
  redisConfig: { enabled: boolean; url: string | undefined },
  defaults: InterviewSettings
): SessionStore {
  if (!redisConfig.enabled) {
    console.log('[sessionStore] Redis disabled, keeping sessions in memory');
    return createMemorySessionStore(defaults);
  }
  const redis = redisConfig.url ? new Redis(redisConfig.url) : new Redis();
  redis.on('error', e => console.error('[Redis]', e));
  return createRedisSessionStore(redis, defaults);
}
