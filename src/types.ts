export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type SessionStatus =
  | 'awaiting_first_question'
  | 'awaiting_answer'
  | 'ready_for_analysis'
  | 'completed'
  | 'abandoned';

export type QuestionPhase = 'base' | 'extension';

export interface QuestionTurn {
  text: string;
  index: number;
  category: string;
  phase: QuestionPhase;
  askedAt: string;
}

export interface AnswerTurn {
  text: string;
  answeredAt: string;
}

export type Decision = 'continue' | 'complete_satisfied' | 'complete_at_cap' | 'complete_good_enough';

export interface Differential {
  condition: string;
  likelihood: string;
}

export interface FinalAnalysis {
  primaryAssessment: string;
  confidence: number;
  recommendations: string[];
  likelihood?: string;
  urgency?: 'low' | 'medium' | 'high' | 'emergency';
  differentials: Differential[];
  redFlags: string[];
  selfCare: string[];
  reasoningSnippets: string[];

  // filled by the engine, not the reasoner
  model: string;
  generatedAt: string;
  completionReason: Exclude<Decision, 'continue'> | 'requested';
  confidenceShortfall: { target: number; reached: number } | null;
}

export interface EnhancedAnalysis {
  analysis: FinalAnalysis;
  model: string;
  confidenceImprovement: number;
  generatedAt: string;
}

export interface ExtensionWindow {
  targetConfidence: number;
  maxQuestions: number;
  startIndex: number; // questionLog index of the extension's first question
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface InterviewSession {
  schemaVersion: 1;
  revision: number;
  id: string;
  status: SessionStatus;
  subjectContext: JsonObject;

  questionLog: QuestionTurn[];
  answerLog: AnswerTurn[];

  currentConfidence: number;
  targetConfidence: number;
  minQuestions: number;
  maxQuestions: number;
  extensionMaxQuestions: number;
  lifetimeCeiling: number;
  extension: ExtensionWindow | null;

  modelPreference: string[];
  activeModel: string | null;
  workingAnalysis: JsonObject;

  finalAnalysis: FinalAnalysis | null;
  extensionAnalyses: FinalAnalysis[];
  enhancedAnalysis: EnhancedAnalysis | null;

  usage: TokenUsage;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export interface InterviewSettings {
  targetConfidence: number;
  minQuestions: number;
  maxQuestions: number;
  extensionMaxQuestions: number;
}
