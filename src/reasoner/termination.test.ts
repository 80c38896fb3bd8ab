import { describe, expect, it } from 'vitest';
import { clampConfidence, isComplete, shouldContinue } from './termination.js';

const base = { target: 90, min: 2, max: 6 };

describe('termination', () => {
  describe('shouldContinue', () => {
    it('continues below the minimum even when confident', () => {
      expect(shouldContinue({ ...base, current: 99, asked: 1 })).toBe('continue');
    });

    it('decides the reference cases', () => {
      expect(shouldContinue({ current: 92, target: 90, asked: 3, min: 2, max: 6 })).toBe('complete_satisfied');
      expect(shouldContinue({ current: 60, target: 90, asked: 6, min: 2, max: 6 })).toBe('complete_at_cap');
      expect(shouldContinue({ current: 70, target: 90, asked: 1, min: 2, max: 6 })).toBe('continue');
    });

    it('completes once the target is reached', () => {
      expect(shouldContinue({ ...base, current: 90, asked: 2 })).toBe('complete_satisfied');
      expect(shouldContinue({ ...base, current: 91, asked: 4 })).toBe('complete_satisfied');
    });

    it('completes at the cap below target', () => {
      expect(shouldContinue({ ...base, current: 40, asked: 6 })).toBe('complete_at_cap');
    });

    it('accepts a near miss close to the cap', () => {
      expect(shouldContinue({ ...base, current: 85, asked: 4 })).toBe('complete_good_enough');
      expect(shouldContinue({ ...base, current: 86, asked: 5 })).toBe('complete_good_enough');
    });

    it('keeps going when the near miss is too early or too far off', () => {
      expect(shouldContinue({ ...base, current: 88, asked: 3 })).toBe('continue');
      expect(shouldContinue({ ...base, current: 84, asked: 5 })).toBe('continue');
    });

    it('lets min = max force exactly that many questions', () => {
      expect(shouldContinue({ current: 99, target: 90, asked: 2, min: 3, max: 3 })).toBe('continue');
      expect(shouldContinue({ current: 10, target: 90, asked: 3, min: 3, max: 3 })).toBe('complete_at_cap');
    });
  });

  describe('isComplete', () => {
    it('is false only for continue', () => {
      expect(isComplete('continue')).toBe(false);
      expect(isComplete('complete_at_cap')).toBe(true);
    });
  });

  describe('clampConfidence', () => {
    it('clamps and rounds', () => {
      expect(clampConfidence(120)).toBe(100);
      expect(clampConfidence(-3)).toBe(0);
      expect(clampConfidence(72.6)).toBe(73);
      expect(clampConfidence(Number.NaN)).toBe(0);
    });
  });
});
