import { Mutex } from 'async-mutex';
import { v4 as uuid } from 'uuid';
import {
  FailedToGenerateQuestionError,
  InvalidTransitionError,
  SessionBusyError,
  SessionNotFoundError,
  ValidationFailureError
} from '../errors.js';
import { extractObject, extractWith } from '../reasoner/extractor.js';
import type { AskResult, ReasonerGateway } from '../reasoner/gateway.js';
import { findDuplicate } from '../reasoner/similarity.js';
import { clampConfidence, isComplete, shouldContinue } from '../reasoner/termination.js';
import { AnalysisReplySchema, QUESTION_REPLY_KEYS, QuestionReplySchema, type AnalysisReply, type QuestionReply } from '../schemas.js';
import {
  countPhase,
  hasPendingQuestion,
  latestAnalysis,
  newSession,
  phaseWindow,
  transition
} from '../session.js';
import type { SessionStore } from '../sessionStore.js';
import type {
  ChatMessage,
  Decision,
  EnhancedAnalysis,
  FinalAnalysis,
  InterviewSession,
  InterviewSettings,
  JsonObject,
  QuestionPhase,
  TokenUsage
} from '../types.js';
import { analysisMessages, firstQuestionMessages, followUpQuestionMessages, nextQuestionMessages } from './prompts.js';

export interface InterviewEngineOptions {
  settings: InterviewSettings;
  dedupThreshold: number;
  dedupRetries: number;
  /** On a Complete* decision, run the final analysis inside `continue` instead of stopping at ready_for_analysis. */
  autoComplete: boolean;
  now?: () => Date;
  newId?: () => string;
}

export interface QuestionPayload {
  text: string;
  number: number;
  category: string;
  isFinalQuestion: boolean;
}

export type TurnResult =
  | {
      kind: 'question';
      session: InterviewSession;
      question: QuestionPayload;
      confidence: number;
      targetConfidence: number;
      confidenceProjection?: string;
    }
  | { kind: 'ready'; session: InterviewSession; confidence: number; decision: Exclude<Decision, 'continue'> }
  | { kind: 'analysis'; session: InterviewSession; analysis: FinalAnalysis };

export type AskMoreResult =
  | TurnResult
  | { kind: 'message'; session: InterviewSession; reason: 'target_already_met' | 'ceiling_reached' };

export interface StartResult {
  session: InterviewSession;
  question: QuestionPayload;
  estimatedQuestions: string;
}

export interface CompleteResult {
  session: InterviewSession;
  analysis: FinalAnalysis;
  questionsAsked: number;
  modelUsed: string;
}

export interface EnhanceResult {
  session: InterviewSession;
  enhanced: EnhancedAnalysis;
}

function parseQuestion(text: string): QuestionReply {
  return extractWith(text, QuestionReplySchema, { repairKeys: QUESTION_REPLY_KEYS, allowQuestionSentence: true });
}

/** Analysis replies get no question fallback or repair; a well-formed reply missing required fields is terminal. */
function parseAnalysis(text: string): AnalysisReply {
  const obj = extractObject(text);
  const result = AnalysisReplySchema.safeParse(obj);
  if (!result.success) {
    throw new ValidationFailureError(result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`));
  }
  return result.data;
}

function addUsage(session: InterviewSession, usage: TokenUsage) {
  session.usage = {
    promptTokens: session.usage.promptTokens + usage.promptTokens,
    completionTokens: session.usage.completionTokens + usage.completionTokens
  };
}

export class InterviewEngine {
  private readonly locks = new Map<string, Mutex>();
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly store: SessionStore,
    private readonly gateway: ReasonerGateway,
    private readonly options: InterviewEngineOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? uuid;
  }

  // ---- operations

  async start(
    subjectContext: JsonObject,
    opts: { modelPreference?: string[]; targetConfidence?: number; signal?: AbortSignal } = {}
  ): Promise<StartResult> {
    const settings: InterviewSettings = {
      ...this.options.settings,
      targetConfidence: opts.targetConfidence ?? this.options.settings.targetConfidence
    };
    const session = newSession(this.newId(), subjectContext, settings, opts.modelPreference ?? [], this.timestamp());

    const turn = await this.acceptQuestion(session, rejected => firstQuestionMessages(session, rejected), opts.signal);
    this.recordTurn(session, turn);
    this.appendQuestion(session, turn.value, 'base');
    transition(session, 'awaiting_answer', 'start');

    const saved = await this.store.createSession(session);
    console.log(`[InterviewEngine] session=${saved.id} started model=${turn.model}`);
    return {
      session: saved,
      question: this.questionPayload(saved),
      estimatedQuestions: `${saved.minQuestions}-${saved.maxQuestions}`
    };
  }

  async continue(
    sessionId: string,
    answer: string,
    opts: { questionNumber: number; signal?: AbortSignal }
  ): Promise<TurnResult> {
    return this.exclusive(sessionId, async () => {
      const loaded = await this.load(sessionId);
      const n = opts.questionNumber;
      if (n < 1 || n > loaded.questionLog.length) {
        throw new InvalidTransitionError(loaded.status, 'continue', `question ${n} was never asked`);
      }
      if (n <= loaded.answerLog.length) {
        if (loaded.answerLog[n - 1].text === answer.trim()) {
          console.log(`[InterviewEngine] session=${sessionId} replayed answer to question ${n}, returning current state`);
          return this.currentState(loaded);
        }
        throw new InvalidTransitionError(loaded.status, 'continue', `question ${n} already has an answer`);
      }
      if (loaded.status !== 'awaiting_answer' || !hasPendingQuestion(loaded)) {
        throw new InvalidTransitionError(loaded.status, 'continue');
      }

      const session = structuredClone(loaded);
      session.answerLog.push({ text: answer.trim(), answeredAt: this.timestamp() });
      return this.advance(session, loaded.revision, opts.signal);
    });
  }

  async complete(sessionId: string, opts: { finalAnswer?: string; signal?: AbortSignal } = {}): Promise<CompleteResult> {
    return this.exclusive(sessionId, async () => {
      const loaded = await this.load(sessionId);
      const existing = latestAnalysis(loaded);
      if (loaded.status === 'completed' && existing && !opts.finalAnswer) {
        return { session: loaded, analysis: existing, questionsAsked: loaded.questionLog.length, modelUsed: existing.model };
      }
      if (loaded.status !== 'awaiting_answer' && loaded.status !== 'ready_for_analysis') {
        throw new InvalidTransitionError(loaded.status, 'complete');
      }

      const session = structuredClone(loaded);
      if (opts.finalAnswer) {
        if (!hasPendingQuestion(session)) {
          throw new InvalidTransitionError(session.status, 'complete', 'there is no pending question to answer');
        }
        session.answerLog.push({ text: opts.finalAnswer.trim(), answeredAt: this.timestamp() });
      }

      const w = phaseWindow(session);
      const decision = shouldContinue({ current: session.currentConfidence, target: w.target, asked: w.asked, min: w.min, max: w.max });
      if (session.status === 'awaiting_answer') transition(session, 'ready_for_analysis', 'complete');
      const saved = await this.finalize(session, loaded.revision, isComplete(decision) ? decision : 'requested', opts.signal);
      const analysis = latestAnalysis(saved);
      if (!analysis) throw new Error(`Session ${sessionId} completed without an analysis`);
      return { session: saved, analysis, questionsAsked: saved.questionLog.length, modelUsed: analysis.model };
    });
  }

  async askMore(
    sessionId: string,
    opts: { targetConfidence: number; maxExtraQuestions: number; currentConfidence?: number; signal?: AbortSignal }
  ): Promise<AskMoreResult> {
    return this.exclusive(sessionId, async () => {
      const loaded = await this.load(sessionId);
      if (loaded.status !== 'ready_for_analysis' && loaded.status !== 'completed') {
        throw new InvalidTransitionError(loaded.status, 'ask more questions on');
      }
      if (hasPendingQuestion(loaded)) {
        throw new InvalidTransitionError(
          loaded.status,
          'ask more questions on',
          `question ${loaded.questionLog.length} was never answered`
        );
      }

      const session = structuredClone(loaded);
      if (opts.currentConfidence !== undefined) session.currentConfidence = clampConfidence(opts.currentConfidence);
      const target = clampConfidence(opts.targetConfidence);

      if (session.currentConfidence >= target) {
        return { kind: 'message', session: loaded, reason: 'target_already_met' };
      }
      const budget = Math.min(
        opts.maxExtraQuestions,
        session.extensionMaxQuestions - countPhase(session, 'extension'),
        session.lifetimeCeiling - session.questionLog.length
      );
      if (budget <= 0) {
        return { kind: 'message', session: loaded, reason: 'ceiling_reached' };
      }

      session.extension = { targetConfidence: target, maxQuestions: budget, startIndex: session.questionLog.length };
      const turn = await this.acceptQuestion(session, rejected => followUpQuestionMessages(session, rejected), opts.signal);
      this.recordTurn(session, turn);
      this.appendQuestion(session, turn.value, 'extension');
      transition(session, 'awaiting_answer', 'ask more questions on');

      const saved = await this.store.saveSession(this.touch(session), loaded.revision);
      console.log(`[InterviewEngine] session=${sessionId} reopened: target=${target} budget=${budget}`);
      return {
        kind: 'question',
        session: saved,
        question: this.questionPayload(saved),
        confidence: saved.currentConfidence,
        targetConfidence: target,
        confidenceProjection: turn.value.confidenceProjection
      };
    });
  }

  async enhance(sessionId: string, opts: { strongerModel: string; signal?: AbortSignal }): Promise<EnhanceResult> {
    return this.exclusive(sessionId, async () => {
      const loaded = await this.load(sessionId);
      const base = latestAnalysis(loaded);
      if (loaded.status !== 'completed' || !base) throw new InvalidTransitionError(loaded.status, 'enhance');

      const session = structuredClone(loaded);
      const result = await this.gateway.ask({
        purpose: 'enhance',
        models: [opts.strongerModel],
        messages: analysisMessages(session),
        parse: parseAnalysis,
        maxTokens: 2048,
        signal: opts.signal
      });
      addUsage(session, result.usage);
      session.activeModel = result.model;
      const analysis = this.toFinalAnalysis(result.value, result.model, base.completionReason, session);
      const enhanced: EnhancedAnalysis = {
        analysis,
        model: result.model,
        confidenceImprovement: analysis.confidence - base.confidence,
        generatedAt: this.timestamp()
      };
      session.enhancedAnalysis = enhanced;

      const saved = await this.store.saveSession(this.touch(session), loaded.revision);
      console.log(`[InterviewEngine] session=${sessionId} enhanced by ${result.model}: ${base.confidence} -> ${analysis.confidence}`);
      return { session: saved, enhanced };
    });
  }

  async abandon(sessionId: string): Promise<InterviewSession> {
    return this.exclusive(sessionId, async () => {
      const loaded = await this.load(sessionId);
      const session = structuredClone(loaded);
      transition(session, 'abandoned', 'abandon');
      return this.store.saveSession(this.touch(session), loaded.revision);
    });
  }

  async getSession(sessionId: string): Promise<InterviewSession> {
    return this.load(sessionId);
  }

  /** Plain-text digest of a completed session for downstream context stores. */
  summarize(session: InterviewSession): string {
    const analysis = latestAnalysis(session);
    if (!analysis) return `Interview ${session.id}: not completed (${session.status})`;
    const subject = Object.entries(session.subjectContext)
      .filter(([, v]) => typeof v === 'string' || typeof v === 'number')
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(', ');
    const lines = [
      `Interview Analysis - ${analysis.generatedAt.slice(0, 10)}`,
      `Subject: ${subject || 'n/a'}`,
      `Primary Assessment: ${analysis.primaryAssessment}`,
      `Confidence: ${analysis.confidence}%`,
      `Questions Asked: ${session.questionLog.length}`
    ];
    if (analysis.reasoningSnippets.length) lines.push(`Key Findings: ${analysis.reasoningSnippets.slice(0, 3).join(', ')}`);
    return lines.join('\n');
  }

  // ---- turn mechanics

  private async advance(session: InterviewSession, expectedRevision: number, signal?: AbortSignal): Promise<TurnResult> {
    const phase: QuestionPhase = session.extension ? 'extension' : 'base';
    const build = (rejected: readonly string[]) => nextQuestionMessages(session, rejected);
    const turn = await this.askForQuestion(session, build([]), signal);
    this.recordTurn(session, turn);

    const w = phaseWindow(session);
    let decision = shouldContinue({ current: session.currentConfidence, target: w.target, asked: w.asked, min: w.min, max: w.max });
    if (decision === 'continue' && session.questionLog.length >= session.lifetimeCeiling) decision = 'complete_at_cap';
    console.log(
      `[InterviewEngine] session=${session.id} phase=${phase} asked=${w.asked}/${w.max} confidence=${session.currentConfidence}/${w.target} decision=${decision}`
    );

    if (isComplete(decision)) {
      transition(session, 'ready_for_analysis', 'continue');
      if (!this.options.autoComplete) {
        const saved = await this.store.saveSession(this.touch(session), expectedRevision);
        return { kind: 'ready', session: saved, confidence: saved.currentConfidence, decision };
      }
      const saved = await this.finalize(session, expectedRevision, decision, signal);
      const analysis = latestAnalysis(saved);
      if (!analysis) throw new Error(`Session ${session.id} completed without an analysis`);
      return { kind: 'analysis', session: saved, analysis };
    }

    const accepted = await this.acceptQuestion(session, build, signal, turn);
    if (accepted !== turn) this.recordTurn(session, accepted);
    this.appendQuestion(session, accepted.value, phase);
    transition(session, 'awaiting_answer', 'continue');

    const saved = await this.store.saveSession(this.touch(session), expectedRevision);
    return {
      kind: 'question',
      session: saved,
      question: this.questionPayload(saved),
      confidence: saved.currentConfidence,
      targetConfidence: w.target,
      confidenceProjection: accepted.value.confidenceProjection
    };
  }

  private askForQuestion(session: InterviewSession, messages: ChatMessage[], signal?: AbortSignal) {
    return this.gateway.ask({ purpose: 'interview', models: session.modelPreference, messages, parse: parseQuestion, signal });
  }

  /**
   * Returns a reply whose question is not a near-duplicate of any asked so far,
   * re-prompting with the rejected text up to `dedupRetries` times.
   */
  private async acceptQuestion(
    session: InterviewSession,
    build: (rejected: readonly string[]) => ChatMessage[],
    signal?: AbortSignal,
    first?: AskResult<QuestionReply>
  ): Promise<AskResult<QuestionReply>> {
    const history = session.questionLog.map(q => q.text);
    const rejected: string[] = [];
    let result = first ?? (await this.askForQuestion(session, build(rejected), signal));
    for (let retry = 0; ; retry++) {
      const dup = findDuplicate(result.value.question, history, this.options.dedupThreshold);
      if (!dup) return result;
      rejected.push(result.value.question);
      console.warn(`[InterviewEngine] session=${session.id} rejected duplicate "${result.value.question}" (matches "${dup}")`);
      if (retry >= this.options.dedupRetries) throw new FailedToGenerateQuestionError(session.id, rejected);
      // the caller already recorded `first`
      if (result !== first) addUsage(session, result.usage);
      result = await this.askForQuestion(session, build(rejected), signal);
    }
  }

  private recordTurn(session: InterviewSession, turn: AskResult<QuestionReply>) {
    addUsage(session, turn.usage);
    session.activeModel = turn.model;
    if (turn.value.confidence !== undefined) session.currentConfidence = clampConfidence(turn.value.confidence);
    if (turn.value.workingAnalysis) session.workingAnalysis = turn.value.workingAnalysis;
  }

  private appendQuestion(session: InterviewSession, reply: QuestionReply, phase: QuestionPhase) {
    session.questionLog.push({
      text: reply.question,
      index: session.questionLog.length,
      category: reply.questionType ?? 'general',
      phase,
      askedAt: this.timestamp()
    });
  }

  private async finalize(
    session: InterviewSession,
    expectedRevision: number,
    reason: FinalAnalysis['completionReason'],
    signal?: AbortSignal
  ): Promise<InterviewSession> {
    const result = await this.gateway.ask({
      purpose: 'analysis',
      models: session.modelPreference,
      messages: analysisMessages(session),
      parse: parseAnalysis,
      maxTokens: 2048,
      signal
    });
    addUsage(session, result.usage);
    session.activeModel = result.model;

    const analysis = this.toFinalAnalysis(result.value, result.model, reason, session);
    if (session.finalAnalysis) session.extensionAnalyses.push(analysis);
    else session.finalAnalysis = analysis;
    session.currentConfidence = analysis.confidence;
    session.extension = null;
    session.completedAt = this.timestamp();
    transition(session, 'completed', 'complete');

    const saved = await this.store.saveSession(this.touch(session), expectedRevision);
    console.log(`[InterviewEngine] session=${session.id} completed (${reason}) confidence=${analysis.confidence} model=${result.model}`);
    return saved;
  }

  private toFinalAnalysis(
    reply: AnalysisReply,
    model: string,
    reason: FinalAnalysis['completionReason'],
    session: InterviewSession
  ): FinalAnalysis {
    const target = session.extension ? session.extension.targetConfidence : session.targetConfidence;
    const confidence = clampConfidence(reply.confidence);
    return {
      ...reply,
      confidence,
      model,
      generatedAt: this.timestamp(),
      completionReason: reason,
      confidenceShortfall: confidence < target ? { target, reached: confidence } : null
    };
  }

  // ---- helpers

  private currentState(session: InterviewSession): TurnResult {
    const analysis = latestAnalysis(session);
    if (session.status === 'completed' && analysis) return { kind: 'analysis', session, analysis };
    const w = phaseWindow(session);
    if (session.status === 'awaiting_answer' && hasPendingQuestion(session)) {
      return {
        kind: 'question',
        session,
        question: this.questionPayload(session),
        confidence: session.currentConfidence,
        targetConfidence: w.target
      };
    }
    if (session.status === 'ready_for_analysis') {
      const decision = shouldContinue({ current: session.currentConfidence, target: w.target, asked: w.asked, min: w.min, max: w.max });
      return { kind: 'ready', session, confidence: session.currentConfidence, decision: isComplete(decision) ? decision : 'complete_at_cap' };
    }
    throw new InvalidTransitionError(session.status, 'continue');
  }

  private questionPayload(session: InterviewSession): QuestionPayload {
    const last = session.questionLog[session.questionLog.length - 1];
    const w = phaseWindow(session);
    return {
      text: last.text,
      number: session.questionLog.length,
      category: last.category,
      isFinalQuestion: w.asked >= w.max || session.questionLog.length >= session.lifetimeCeiling
    };
  }

  private async load(sessionId: string): Promise<InterviewSession> {
    const session = await this.store.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  private touch(session: InterviewSession): InterviewSession {
    session.updatedAt = this.timestamp();
    return session;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  /** At most one mutation per session in flight; a second caller is turned away rather than queued. */
  private async exclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.locks.get(sessionId);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(sessionId, mutex);
    }
    if (mutex.isLocked()) throw new SessionBusyError(sessionId);
    try {
      return await mutex.runExclusive(fn);
    } finally {
      if (!mutex.isLocked()) this.locks.delete(sessionId);
    }
  }
}
