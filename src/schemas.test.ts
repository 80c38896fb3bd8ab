import { describe, expect, it } from 'vitest';
import { AnalysisReplySchema, QuestionReplySchema } from './schemas.js';

describe('schemas', () => {
  describe('QuestionReplySchema', () => {
    it('drops malformed optional fields instead of failing', () => {
      const parsed = QuestionReplySchema.parse({ question: ' Any fever? ', confidence: 'high', workingAnalysis: 'notes' });
      expect(parsed).toEqual({ question: 'Any fever?' });
    });

    it('prefers the canonical key over its alias', () => {
      const parsed = QuestionReplySchema.parse({ question: 'Any fever?', confidence: 40, current_confidence: 70 });
      expect(parsed.confidence).toBe(40);
    });
  });

  describe('AnalysisReplySchema', () => {
    it('accepts legacy key names and fills empty lists', () => {
      const parsed = AnalysisReplySchema.parse({
        primaryCondition: 'Patellar tendinopathy',
        confidence: '85%',
        recommendations: ['Load management'],
        red_flags: ['Sudden inability to bear weight'],
        differentials: [{ condition: 'Meniscal tear' }]
      });
      expect(parsed).toEqual({
        primaryAssessment: 'Patellar tendinopathy',
        confidence: 85,
        recommendations: ['Load management'],
        differentials: [{ condition: 'Meniscal tear', likelihood: 'possible' }],
        redFlags: ['Sudden inability to bear weight'],
        selfCare: [],
        reasoningSnippets: []
      });
    });

    it('requires a non-empty recommendation list', () => {
      const parsed = AnalysisReplySchema.safeParse({ primaryAssessment: 'x', confidence: 50, recommendations: [] });
      expect(parsed.success).toBe(false);
    });
  });
});
