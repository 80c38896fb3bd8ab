import type { Decision } from '../types.js';

export interface TerminationInput {
  current: number;
  target: number;
  asked: number;
  min: number;
  max: number;
}

// within this many questions of the cap, a near-miss on confidence is accepted
const GOOD_ENOUGH_QUESTION_MARGIN = 2;
const GOOD_ENOUGH_CONFIDENCE_MARGIN = 5;

export function shouldContinue({ current, target, asked, min, max }: TerminationInput): Decision {
  if (asked < min) return 'continue';
  if (current >= target) return 'complete_satisfied';
  if (asked >= max) return 'complete_at_cap';
  if (asked >= max - GOOD_ENOUGH_QUESTION_MARGIN && current >= target - GOOD_ENOUGH_CONFIDENCE_MARGIN) {
    return 'complete_good_enough';
  }
  return 'continue';
}

export function isComplete(decision: Decision): decision is Exclude<Decision, 'continue'> {
  return decision !== 'continue';
}

/** Reasoner-reported confidence, clamped to 0..100 and rounded. */
export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.round(Math.min(100, Math.max(0, value)));
}
