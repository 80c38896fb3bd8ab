import { InvalidTransitionError } from './errors.js';
import type { FinalAnalysis, InterviewSession, InterviewSettings, JsonObject, QuestionPhase, SessionStatus } from './types.js';

const TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  awaiting_first_question: ['awaiting_answer'],
  awaiting_answer: ['awaiting_answer', 'ready_for_analysis', 'abandoned'],
  ready_for_analysis: ['completed', 'awaiting_answer'],
  completed: ['awaiting_answer'],
  abandoned: []
};

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function transition(session: InterviewSession, to: SessionStatus, operation: string) {
  if (!canTransition(session.status, to)) throw new InvalidTransitionError(session.status, operation);
  session.status = to;
}

export function newSession(
  id: string,
  subjectContext: JsonObject,
  settings: InterviewSettings,
  modelPreference: string[],
  now: string
): InterviewSession {
  return {
    schemaVersion: 1,
    revision: 0,
    id,
    status: 'awaiting_first_question',
    subjectContext,
    questionLog: [],
    answerLog: [],
    currentConfidence: 0,
    targetConfidence: settings.targetConfidence,
    minQuestions: settings.minQuestions,
    maxQuestions: settings.maxQuestions,
    extensionMaxQuestions: settings.extensionMaxQuestions,
    lifetimeCeiling: settings.maxQuestions + settings.extensionMaxQuestions,
    extension: null,
    modelPreference,
    activeModel: null,
    workingAnalysis: {},
    finalAnalysis: null,
    extensionAnalyses: [],
    enhancedAnalysis: null,
    usage: { promptTokens: 0, completionTokens: 0 },
    createdAt: now,
    updatedAt: now,
    completedAt: null
  };
}

export function countPhase(session: InterviewSession, phase: QuestionPhase): number {
  return session.questionLog.filter(q => q.phase === phase).length;
}

export function hasPendingQuestion(session: InterviewSession): boolean {
  return session.answerLog.length < session.questionLog.length;
}

export interface PhaseWindow {
  phase: QuestionPhase;
  asked: number;
  min: number;
  max: number;
  target: number;
}

/** The (asked, min, max, target) the termination policy sees for the open phase. */
export function phaseWindow(session: InterviewSession): PhaseWindow {
  const ext = session.extension;
  if (ext) {
    return {
      phase: 'extension',
      asked: session.questionLog.length - ext.startIndex,
      min: 1,
      max: ext.maxQuestions,
      target: ext.targetConfidence
    };
  }
  return {
    phase: 'base',
    asked: countPhase(session, 'base'),
    min: session.minQuestions,
    max: session.maxQuestions,
    target: session.targetConfidence
  };
}

export function latestAnalysis(session: InterviewSession): FinalAnalysis | null {
  return session.extensionAnalyses[session.extensionAnalyses.length - 1] ?? session.finalAnalysis;
}
