import { describe, expect, it } from 'vitest';
import { findDuplicate, isDuplicate, normalizeQuestion, similarityRatio } from './similarity.js';

describe('similarity', () => {
  describe('normalizeQuestion', () => {
    it('lowercases, strips punctuation and drops function words', () => {
      expect(normalizeQuestion('Does the pain get WORSE at night?')).toBe('pain worse night');
    });

    it('keeps question words', () => {
      expect(normalizeQuestion('When did the pain start?')).toBe('when pain start');
    });

    it('keeps the stripped words when only function words remain', () => {
      expect(normalizeQuestion('Is it?')).toBe('is it');
    });

    it('keeps letters outside the Latin alphabet', () => {
      expect(normalizeQuestion('Есть ли у вас температура?')).toBe('есть ли у вас температура');
    });
  });

  describe('similarityRatio', () => {
    it('is 1 for identical texts', () => {
      expect(similarityRatio('Where does it hurt?', 'Where does it hurt?')).toBe(1);
      expect(similarityRatio('?', '?')).toBe(1);
    });

    it('does not treat two different texts without words as equal', () => {
      expect(similarityRatio('?', '!')).toBe(0);
    });

    it('ignores word order only as far as the common subsequence allows', () => {
      expect(similarityRatio('How long has the pain lasted?', 'How long have you had the pain?')).toBeCloseTo(6 / 7, 5);
      expect(similarityRatio('Is the pain sharp or dull?', 'Is the pain dull or sharp?')).toBeCloseTo(2 / 3, 5);
    });

    it('tells apart questions that differ in what they ask', () => {
      expect(similarityRatio('When did the pain start?', 'Where did the pain start?')).toBeCloseTo(2 / 3, 5);
    });
  });

  describe('isDuplicate', () => {
    it('is reflexive', () => {
      const q = 'Is the pain sharp or dull?';
      expect(isDuplicate(q, [q], 0.8)).toBe(true);
    });

    it('catches a rephrased question', () => {
      expect(isDuplicate('Do you have fever?', ['Have you had a fever?'], 0.8)).toBe(true);
      expect(isDuplicate('Does the pain get worse at night?', ['Is the pain worse at night?'], 0.8)).toBe(true);
    });

    it('lets a different question through', () => {
      expect(isDuplicate('Do you have fever?', ['Any joint pain?'], 0.8)).toBe(false);
      expect(isDuplicate('When did the pain start?', ['Where is the pain?'], 0.8)).toBe(false);
      expect(isDuplicate('When did the pain start?', ['Where did the pain start?'], 0.8)).toBe(false);
    });

    it('compares questions in other scripts by their words', () => {
      expect(isDuplicate('Есть ли у вас температура?', ['Болит ли колено при ходьбе?'], 0.8)).toBe(false);
      expect(isDuplicate('Есть ли у вас ТЕМПЕРАТУРА', ['Есть ли у вас температура?'], 0.8)).toBe(true);
    });

    it('compares strictly against the threshold', () => {
      // 'how long pain lasted' vs 'how long pain' scores exactly 6/7
      expect(isDuplicate('How long has the pain lasted?', ['How long have you had the pain?'], 6 / 7)).toBe(false);
      expect(isDuplicate('How long has the pain lasted?', ['How long have you had the pain?'], 0.85)).toBe(true);
    });

    it('is false against an empty history', () => {
      expect(isDuplicate('Any fever?', [])).toBe(false);
    });
  });

  describe('findDuplicate', () => {
    it('returns the colliding prior question', () => {
      const history = ['Where exactly is the pain located?', 'Is there swelling around the knee?'];
      expect(findDuplicate('Have you noticed swelling around the knee?', history)).toBe('Is there swelling around the knee?');
      expect(findDuplicate('Does the knee lock or give way?', history)).toBeNull();
    });
  });
});
