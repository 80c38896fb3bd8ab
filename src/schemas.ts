import { z } from 'zod';
import type { JsonObject, JsonValue } from './types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

/** 0-100 as a number, or a numeric string such as "85" or "85%". */
export const ConfidenceSchema = z.union([
  z.number(),
  z
    .string()
    .regex(/^\s*\d+(\.\d+)?\s*%?\s*$/)
    .transform(s => parseFloat(s))
]);

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Copies snake_case (or legacy) keys onto their canonical names when the canonical key is absent. */
function aliasKeys(aliases: Record<string, string>) {
  return (v: unknown): unknown => {
    if (!isRecord(v)) return v;
    const out: Record<string, unknown> = { ...v };
    for (const [from, to] of Object.entries(aliases)) {
      if (out[to] === undefined && out[from] !== undefined) out[to] = out[from];
    }
    return out;
  };
}

// ---- reasoner reply shapes

const QuestionReplyShape = z.object({
  question: z.string().trim().min(1),
  questionType: z.string().optional().catch(undefined),
  confidence: ConfidenceSchema.optional().catch(undefined),
  workingAnalysis: JsonObjectSchema.optional().catch(undefined),
  confidenceProjection: z.string().optional().catch(undefined)
});

const QUESTION_ALIASES = {
  question_type: 'questionType',
  current_confidence: 'confidence',
  internal_analysis: 'workingAnalysis',
  updated_analysis: 'workingAnalysis',
  confidence_projection: 'confidenceProjection'
};

export const QuestionReplySchema = z.preprocess(aliasKeys(QUESTION_ALIASES), QuestionReplyShape);
export type QuestionReply = z.infer<typeof QuestionReplyShape>;

/** Keys a truncated question reply may be repaired from. */
export const QUESTION_REPLY_KEYS: readonly string[] = [...Object.keys(QuestionReplyShape.shape), ...Object.keys(QUESTION_ALIASES)];

const stringList = z.array(z.string()).default([]).catch([]);

const AnalysisShape = z.object({
  primaryAssessment: z.string().trim().min(1),
  confidence: ConfidenceSchema,
  recommendations: z.array(z.string().trim().min(1)).min(1),
  likelihood: z.string().optional().catch(undefined),
  urgency: z.enum(['low', 'medium', 'high', 'emergency']).optional().catch(undefined),
  differentials: z
    .array(z.object({ condition: z.string(), likelihood: z.string().default('possible') }))
    .default([])
    .catch([]),
  redFlags: stringList,
  selfCare: stringList,
  reasoningSnippets: stringList
});

export const AnalysisReplySchema = z.preprocess(
  aliasKeys({
    primaryCondition: 'primaryAssessment',
    primary_assessment: 'primaryAssessment',
    red_flags: 'redFlags',
    self_care: 'selfCare',
    reasoning_snippets: 'reasoningSnippets'
  }),
  AnalysisShape
);
export type AnalysisReply = z.infer<typeof AnalysisShape>;

// ---- persisted shapes

export const StoredAnalysisSchema = AnalysisShape.extend({
  confidence: z.number(),
  model: z.string(),
  generatedAt: z.string(),
  completionReason: z.enum(['complete_satisfied', 'complete_at_cap', 'complete_good_enough', 'requested']),
  confidenceShortfall: z.object({ target: z.number(), reached: z.number() }).nullish().transform(v => v ?? null)
});

export const StoredEnhancementSchema = z.object({
  analysis: StoredAnalysisSchema,
  model: z.string(),
  confidenceImprovement: z.number(),
  generatedAt: z.string()
});
