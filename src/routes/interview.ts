import express, { type Request, type Response } from 'express';
import { z } from 'zod';
import type { AskMoreResult, InterviewEngine, TurnResult } from '../agents/InterviewEngine.js';
import { JsonObjectSchema } from '../schemas.js';
import type { InterviewSession } from '../types.js';
import { BadRequestError, toHttpError } from './httpErrors.js';

const SessionRef = z.object({ sessionId: z.string().min(1).optional() });

const StartBody = z.object({
  subjectContext: JsonObjectSchema,
  modelPreference: z.union([z.string().min(1), z.array(z.string().min(1))]).optional(),
  targetConfidence: z.number().min(0).max(100).optional()
});

const ContinueBody = SessionRef.extend({
  answer: z.string().trim().min(1),
  questionNumber: z.number().int().positive()
});

const CompleteBody = SessionRef.extend({ finalAnswer: z.string().trim().min(1).optional() });

const AskMoreBody = SessionRef.extend({
  currentConfidence: z.number().min(0).max(100).optional(),
  targetConfidence: z.number().min(0).max(100).default(95),
  maxExtraQuestions: z.number().int().positive().default(5)
});

const EnhanceBody = SessionRef.extend({ strongerModel: z.string().min(1) });

/** Body first, then the cookie `start` set. */
function sessionIdOf(req: Request, body: { sessionId?: string }): string {
  const fromCookie: unknown = req.cookies?.sessionId;
  const id = body.sessionId ?? (typeof fromCookie === 'string' ? fromCookie : undefined);
  if (!id) throw new BadRequestError('sessionId is required');
  return id;
}

function turnBody(result: TurnResult | AskMoreResult) {
  const s = result.session;
  switch (result.kind) {
    case 'question':
      return {
        sessionId: s.id,
        question: result.question.text,
        questionNumber: result.question.number,
        questionType: result.question.category,
        isFinalQuestion: result.question.isFinalQuestion,
        currentConfidence: result.confidence,
        confidenceThreshold: result.targetConfidence,
        confidenceProjection: result.confidenceProjection ?? null
      };
    case 'ready':
      return { sessionId: s.id, readyForAnalysis: true, questionsCompleted: s.answerLog.length, currentConfidence: result.confidence };
    case 'analysis':
      return {
        sessionId: s.id,
        readyForAnalysis: true,
        finalAnalysis: result.analysis,
        confidence: result.analysis.confidence,
        questionsAsked: s.questionLog.length,
        modelUsed: result.analysis.model
      };
    case 'message':
      return {
        sessionId: s.id,
        message: result.reason === 'target_already_met' ? 'target-already-met' : 'ceiling-reached',
        currentConfidence: s.currentConfidence,
        questionsAsked: s.questionLog.length,
        lifetimeCeiling: s.lifetimeCeiling
      };
  }
}

function sessionView(s: InterviewSession) {
  return {
    sessionId: s.id,
    status: s.status,
    questions: s.questionLog.map((q, i) => ({ ...q, answer: s.answerLog[i]?.text ?? null })),
    currentConfidence: s.currentConfidence,
    targetConfidence: s.targetConfidence,
    lifetimeCeiling: s.lifetimeCeiling,
    activeModel: s.activeModel,
    finalAnalysis: s.finalAnalysis,
    extensionAnalyses: s.extensionAnalyses,
    enhancedAnalysis: s.enhancedAnalysis,
    createdAt: s.createdAt,
    updatedAt: s.updatedAt
  };
}

function fail(res: Response, route: string, err: unknown) {
  const http = toHttpError(err);
  if (http.status >= 500) console.error(`[Route] ${route} error:`, err);
  else console.warn(`[Route] ${route} ${http.status} ${http.body.error}: ${http.body.message}`);
  if (http.headers) res.set(http.headers);
  res.status(http.status).json(http.body);
}

export function createInterviewRouter(engine: InterviewEngine) {
  const router = express.Router();

  router.post('/start', async (req, res) => {
    try {
      const body = StartBody.parse(req.body);
      const pref = body.modelPreference;
      const { session, question, estimatedQuestions } = await engine.start(body.subjectContext, {
        modelPreference: pref === undefined ? undefined : Array.isArray(pref) ? pref : [pref],
        targetConfidence: body.targetConfidence
      });
      res.cookie('sessionId', session.id, { httpOnly: true });
      res.json({
        sessionId: session.id,
        question: question.text,
        questionNumber: question.number,
        questionType: question.category,
        estimatedQuestions
      });
    } catch (err) {
      fail(res, 'start', err);
    }
  });

  router.post('/continue', async (req, res) => {
    try {
      const body = ContinueBody.parse(req.body);
      const result = await engine.continue(sessionIdOf(req, body), body.answer, { questionNumber: body.questionNumber });
      res.json(turnBody(result));
    } catch (err) {
      fail(res, 'continue', err);
    }
  });

  router.post('/complete', async (req, res) => {
    try {
      const body = CompleteBody.parse(req.body);
      const { session, analysis, questionsAsked, modelUsed } = await engine.complete(sessionIdOf(req, body), {
        finalAnswer: body.finalAnswer
      });
      res.json({
        sessionId: session.id,
        finalAnalysis: analysis,
        confidence: analysis.confidence,
        questionsAsked,
        modelUsed,
        summary: engine.summarize(session)
      });
    } catch (err) {
      fail(res, 'complete', err);
    }
  });

  router.post('/ask-more', async (req, res) => {
    try {
      const body = AskMoreBody.parse(req.body);
      const result = await engine.askMore(sessionIdOf(req, body), {
        currentConfidence: body.currentConfidence,
        targetConfidence: body.targetConfidence,
        maxExtraQuestions: body.maxExtraQuestions
      });
      res.json(turnBody(result));
    } catch (err) {
      fail(res, 'ask-more', err);
    }
  });

  router.post('/enhance', async (req, res) => {
    try {
      const body = EnhanceBody.parse(req.body);
      const { enhanced } = await engine.enhance(sessionIdOf(req, body), { strongerModel: body.strongerModel });
      res.json({
        enhancedAnalysis: enhanced.analysis,
        enhancedConfidence: enhanced.analysis.confidence,
        confidenceImprovement: enhanced.confidenceImprovement,
        modelUsed: enhanced.model
      });
    } catch (err) {
      fail(res, 'enhance', err);
    }
  });

  router.post('/abandon', async (req, res) => {
    try {
      const body = SessionRef.parse(req.body);
      const session = await engine.abandon(sessionIdOf(req, body));
      res.json({ sessionId: session.id, status: session.status });
    } catch (err) {
      fail(res, 'abandon', err);
    }
  });

  router.get('/:sessionId', async (req, res) => {
    try {
      const session = await engine.getSession(req.params.sessionId);
      res.json(sessionView(session));
    } catch (err) {
      fail(res, 'get', err);
    }
  });

  return router;
}
