import { phaseWindow } from '../session.js';
import type { ChatMessage, InterviewSession, JsonObject } from '../types.js';

const QUESTION_REPLY_FORMAT = `Return ONLY strict minified JSON with this schema (no markdown, no extra text):
{"question": string, "questionType": string, "confidence": number, "workingAnalysis": object, "confidenceProjection": string}
- "question": exactly one question, answerable in a sentence or two.
- "questionType": one of onset, location, character, severity, timing, triggers, associated_symptoms, history, differential.
- "confidence": 0-100, how certain you are of your current leading assessment.
- "workingAnalysis": your private notes (leading hypotheses and what would separate them); it is handed back to you next turn.`;

const ANALYSIS_REPLY_FORMAT = `Return ONLY strict minified JSON with this schema (no markdown, no extra text):
{
  "primaryAssessment": string,
  "confidence": number,
  "likelihood": string,
  "urgency": "low" | "medium" | "high" | "emergency",
  "differentials": [{"condition": string, "likelihood": string}],
  "recommendations": string[],
  "redFlags": string[],
  "selfCare": string[],
  "reasoningSnippets": string[]
}
Rules:
- "primaryAssessment", "confidence" and a non-empty "recommendations" list are required.
- "confidence" is 0-100 and must reflect the evidence actually gathered.
- Do not invent findings the transcript does not support.`;

function formatContext(context: JsonObject): string {
  return JSON.stringify(context, null, 2);
}

export function formatTranscript(session: InterviewSession): string {
  if (session.questionLog.length === 0) return 'No questions asked yet.';
  return session.questionLog
    .map((q, i) => {
      const a = session.answerLog[i];
      return `Q${i + 1}: ${q.text}\nA${i + 1}: ${a ? a.text : '(not answered yet)'}`;
    })
    .join('\n');
}

function avoidList(session: InterviewSession, rejected: readonly string[]): string {
  const prior = [...session.questionLog.map(q => q.text), ...rejected];
  if (prior.length === 0) return '';
  return `\nDo NOT repeat or rephrase any of these questions:\n${prior.map(p => `- ${p}`).join('\n')}`;
}

function rejectionNote(rejected: readonly string[]): string {
  const last = rejected[rejected.length - 1];
  return last ? `\nYour previous suggestion "${last}" repeats an earlier question. Ask about something not yet covered.` : '';
}

export function firstQuestionMessages(session: InterviewSession, rejected: readonly string[] = []): ChatMessage[] {
  const system = `You are conducting an adaptive diagnostic interview. Ask one targeted question at a time, choosing the question that best separates the plausible explanations for the case.
${QUESTION_REPLY_FORMAT}`;
  const user = `Case intake:
${formatContext(session.subjectContext)}
${rejectionNote(rejected)}
Generate the first diagnostic question.`.trim();
  return [
    { role: 'system', content: system },
    { role: 'user', content: user }
  ];
}

export function nextQuestionMessages(session: InterviewSession, rejected: readonly string[] = []): ChatMessage[] {
  const w = phaseWindow(session);
  const system = `You are conducting an adaptive diagnostic interview. After each answer, re-assess your confidence and ask the single most informative next question.
The interview stops once confidence reaches ${w.target}%; at most ${w.max - w.asked} more question(s) may be asked${w.phase === 'extension' ? ' in this follow-up round' : ''}.
${QUESTION_REPLY_FORMAT}`;
  const user = `Case intake:
${formatContext(session.subjectContext)}

Transcript so far:
${formatTranscript(session)}

Your notes from the previous turn:
${JSON.stringify(session.workingAnalysis)}
${avoidList(session, rejected)}${rejectionNote(rejected)}
Process the latest answer and decide the next question.`.trim();
  return [
    { role: 'system', content: system },
    { role: 'user', content: user }
  ];
}

export function followUpQuestionMessages(session: InterviewSession, rejected: readonly string[] = []): ChatMessage[] {
  const ext = session.extension;
  const target = ext ? ext.targetConfidence : session.targetConfidence;
  const system = `You previously completed a diagnostic interview at ${session.currentConfidence}% confidence. The user agreed to answer a few more questions to reach ${target}%.
Ask the single question that would raise your confidence the most.
${QUESTION_REPLY_FORMAT}`;
  const user = `Case intake:
${formatContext(session.subjectContext)}

Transcript so far:
${formatTranscript(session)}
${avoidList(session, rejected)}${rejectionNote(rejected)}
Generate the first follow-up question.`.trim();
  return [
    { role: 'system', content: system },
    { role: 'user', content: user }
  ];
}

export function analysisMessages(session: InterviewSession): ChatMessage[] {
  const system = `You are completing an adaptive diagnostic interview. Produce the final structured assessment from everything gathered.
${ANALYSIS_REPLY_FORMAT}`;
  const user = `Case intake:
${formatContext(session.subjectContext)}

Full transcript:
${formatTranscript(session)}

Your working notes:
${JSON.stringify(session.workingAnalysis)}

Generate the comprehensive final analysis based on all questions and answers.`;
  return [
    { role: 'system', content: system },
    { role: 'user', content: user }
  ];
}
