import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  ContextSelector, scoreDomainRelevance, scorePayloadQuality, scoreCompleteness, estimateTokens,
} from '../src/services/context-selector.js';
import type { ContextCandidate, ExtractionPayload } from '../src/models/index.js';
import { samplePayload } from './setup.js';

const candidate = (recordId: string, text: string, similarityScore: number, extra: Partial<ContextCandidate> = {}): ContextCandidate =>
  ({ recordId, text, similarityScore, ownerId: 'owner-1', recordType: 'transcript', ...extra });

// no keywords, no structure marks, no action words: relevance is 0.4 × similarity
const plain = (recordId: string, similarity: number) => candidate(recordId, 'plain words', similarity);

describe('context sub-scores', () => {
  it('scores shared domain keywords and core-term overlap', () => {
    const score = scoreDomainRelevance(
      'Schedule a blood work appointment and check blood pressure',
      'Blood work ordered; appointment next week. Blood pressure stable.',
    );
    // follow-up 1/5, tests 1/6, vitals 1/5 of 0.2 each, plus 0.3 × |{appointment}| / |{schedule, appointment}|
    expect(score).toBeCloseTo(0.04 + 0.2 / 6 + 0.04 + 0.15, 10);
  });

  it('caps domain relevance at 1', () => {
    const text = 'prescribe medication drug dosage frequency duration schedule follow-up appointment return monitor blood work lab test x-ray mri ct scan ultrasound pain symptom condition diagnosis treatment blood pressure heart rate temperature weight height';
    expect(scoreDomainRelevance(text, text)).toBe(1);
  });

  it('scores payload quality per category', () => {
    // follow-up 2/1 × 0.25, medication 0, reminders 0, to-dos 1/1 × 0.25
    expect(scorePayloadQuality(samplePayload())).toBe(0.75);
    expect(scorePayloadQuality(undefined)).toBe(0);
  });

  it('gives medication instructions no quality credit', () => {
    const withInstructions = {
      ...samplePayload(),
      medicationInstructions: [{ medicationName: 'Carprofen', specialInstructions: 'Monitor appetite and schedule a recheck' }],
    };
    expect(scorePayloadQuality(withInstructions)).toBe(0.75);
  });

  it('scores completeness from length, terms, structure and action words', () => {
    expect(scoreCompleteness('')).toBe(0);
    expect(scoreCompleteness('Order x-ray')).toBeCloseTo(0.3, 10);
    expect(scoreCompleteness('a'.repeat(2100))).toBe(0.2);
    const full = 'Plan: schedule recheck, monitor appetite, test urine, medication unchanged, dosage same as before. Continue treatment for two weeks.';
    expect(scoreCompleteness(full)).toBeCloseTo(1, 10);
  });

  it('estimates tokens as a quarter of the length', () => {
    expect(estimateTokens('abcdefg')).toBe(1);
    expect(estimateTokens('a'.repeat(400))).toBe(100);
  });
});

describe('ContextSelector', () => {
  it('combines sub-scores with fixed weights', () => {
    const scored = new ContextSelector().score('plain query', plain('c1', 0.5));
    expect(scored.relevanceScore).toBeCloseTo(0.2, 10);
    expect(scored.subscores).toEqual({ similarity: 0.5, domainRelevance: 0, payloadQuality: 0, completeness: 0 });
    expect(scored.estimatedTokens).toBe(2);
    expect(scored.reasoning).toBe('Similarity: 0.500, Domain: 0.000, Quality: 0.000, Completeness: 0.000');
  });

  it('selects nothing below the minimum relevance', () => {
    const selector = new ContextSelector();
    const selected = selector.select('plain query', [plain('c1', 1), plain('c2', 0.9)]);
    expect(selected).toEqual([]);
    expect(selector.buildContext(selected)).toBe('');
  });

  it('stops at five accepted candidates', () => {
    const selector = new ContextSelector({ minRelevanceThreshold: 0.1, softCapRelevance: 0.35 });
    const sims = [1, 0.95, 0.9, 0.89, 0.88, 0.87, 0.86];
    const selected = selector.select('plain query', sims.map((s, i) => plain(`c${i}`, s)));
    expect(selected.map(s => s.candidate.recordId)).toEqual(['c0', 'c1', 'c2', 'c3', 'c4']);
  });

  it('requires near-certain relevance past the third candidate', () => {
    const selector = new ContextSelector({ minRelevanceThreshold: 0.1, softCapRelevance: 0.355 });
    const selected = selector.select('plain query', [1, 0.95, 0.9, 0.89, 0.88].map((s, i) => plain(`c${i}`, s)));
    // 4th: 0.4 × 0.89 = 0.356 passes, 5th: 0.352 ends the selection
    expect(selected.map(s => s.candidate.recordId)).toEqual(['c0', 'c1', 'c2', 'c3']);
  });

  it('stops at the first candidate that would exceed the token budget', () => {
    const selected = new ContextSelector({ minRelevanceThreshold: 0.1, tokenBudget: 5 }).select('plain query', [
      candidate('first', 'plain words.', 1),
      candidate('second', 'plain words.', 0.95),
      candidate('third', 'ok', 0.9),
    ]);
    // 3 + 3 tokens breaks the budget; 'third' would fit but selection has ended
    expect(selected.map(s => s.candidate.recordId)).toEqual(['first']);
  });

  it('never exceeds five candidates or the token budget', () => {
    fc.assert(fc.property(
      fc.array(fc.record({ length: fc.integer({ min: 0, max: 400 }), similarity: fc.double({ min: 0, max: 1, noNaN: true }) }), { maxLength: 12 }),
      fc.integer({ min: 1, max: 300 }),
      (specs, tokenBudget) => {
        const selector = new ContextSelector({ minRelevanceThreshold: 0, tokenBudget });
        const selected = selector.select('plain query', specs.map((s, i) => candidate(`c${i}`, 'p'.repeat(s.length), s.similarity)));
        expect(selected.length).toBeLessThanOrEqual(5);
        expect(selected.reduce((sum, s) => sum + s.estimatedTokens, 0)).toBeLessThanOrEqual(tokenBudget);
      },
    ));
  });

  it('renders reference cases and previous visits', () => {
    const payload: ExtractionPayload = {
      followUpTasks: [{ description: 'Task one', priority: 'high' }, { description: 'Task two' }, { description: 'Task three' }],
      medicationInstructions: [{ medicationName: 'Otomax', frequency: 'twice daily' }],
      clientReminders: [],
      clinicianTodos: [],
    };
    const selector = new ContextSelector();
    const longText = 'x'.repeat(505);
    const context = selector.buildContext([
      selector.score('q', candidate('ref-1', 'Reference text', 0.9, { ownerId: 'reference-pool', extractionPayload: payload })),
      selector.score('q', candidate('t-42', longText, 0.8)),
    ]);

    expect(context).toBe([
      'RELEVANT EXAMPLE CASES:',
      'Example Case 1:',
      'TRANSCRIPT:',
      'Reference text',
      'EXTRACTIONS:',
      'Follow-up Tasks:',
      '  - Task one (Priority: high)',
      '  - Task two (Priority: N/A)',
      'Medication Instructions:',
      '  - Otomax N/A twice daily',
      '',
      'PREVIOUS VISITS:',
      'Previous Visit 1 (Transcript ID: t-42):',
      'TRANSCRIPT:',
      'x'.repeat(500) + '...',
      '',
    ].join('\n'));
  });
});
