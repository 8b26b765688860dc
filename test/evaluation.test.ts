import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import pLimit from 'p-limit';
import type Database from 'better-sqlite3';
import {
  EvaluationService, selectStrategy, aggregateScores, aggregateConfidenceLevels, type EvaluationServiceOptions,
} from '../src/services/evaluation.js';
import { RerankerService } from '../src/services/reranker.js';
import type { ISimilarityStore, EmbedRecordOutcome } from '../src/services/similarity-store.js';
import { ExtractionRepository } from '../src/repository/extraction-repository.js';
import type { ContextCandidate, EvaluationClient, EvaluationStrategy, RecordType, SingleEvaluation } from '../src/models/index.js';
import { ok, type Result } from '../src/utils/result.js';
import {
  createTestDatabase, cleanupTestDatabase, testPipelineConfig, samplePayload, evaluation,
  ScriptedEvaluationClient, BatchingEvaluationClient, ScriptedReranker,
} from './setup.js';

const REFERENCE = 'reference-pool';

// answers from fixed candidate lists per owner, honouring threshold and limit
class FakeStore implements ISimilarityStore {
  queries: { ownerId: string; threshold: number; limit: number }[] = [];
  constructor(private byOwner: Record<string, ContextCandidate[]>) {}

  async query(_text: string, ownerId: string, limit: number, threshold: number): Promise<Result<ContextCandidate[]>> {
    this.queries.push({ ownerId, threshold, limit });
    return ok((this.byOwner[ownerId] ?? []).filter(c => c.similarityScore >= threshold).slice(0, limit));
  }
  async embedRecord(): Promise<Result<EmbedRecordOutcome>> { return ok('created'); }
  hasRecord(_ownerId: string, _recordType: RecordType, _recordId: string): boolean { return false; }
  async purgeOwner(): Promise<number> { return 0; }
  countRecords(): number { return 0; }
}

const candidate = (recordId: string, ownerId: string, similarityScore: number): ContextCandidate =>
  ({ recordId, ownerId, similarityScore, text: `transcript ${recordId}`, recordType: 'transcript' });

describe('selectStrategy', () => {
  const cases: [number, number, EvaluationStrategy, number][] = [
    [0.85, 4, 'single', 1],
    [0.8, 4, 'single', 1],
    [0.65, 7, 'few', 3],
    [0.65, 2, 'few', 2],
    [0.6, 4, 'few', 3],
    [0.2, 7, 'multiple', 5],
    [0.2, 3, 'multiple', 3],
    [0.95, 0, 'none', 0],
  ];

  it.each(cases)('best %f with %i available → %s/%i', (best, available, strategy, standardsUsed) => {
    expect(selectStrategy(best, available)).toEqual({ strategy, standardsUsed });
  });
});

describe('aggregateScores', () => {
  const samples = [{ score: 0.9, similarity: 1 }, { score: 0.5, similarity: 0.5 }];

  it('weights by similarity', () => {
    expect(aggregateScores(samples, 'weighted')).toBeCloseTo(1.15 / 1.5, 10);
    expect(aggregateScores([{ score: 0.9, similarity: 0 }], 'weighted')).toBe(0);
  });

  it('averages', () => {
    expect(aggregateScores(samples, 'average')).toBeCloseTo(0.7, 10);
  });

  it('drops min and max only from five or more samples', () => {
    const five = [1.0, 0.1, 0.7, 0.6, 0.8].map(score => ({ score, similarity: 1 }));
    expect(aggregateScores(five, 'robust')).toBeCloseTo(0.7, 10);
    expect(aggregateScores(five.slice(0, 4), 'robust')).toBeCloseTo(0.6, 10);
  });

  it('returns 0 without samples', () => {
    expect(aggregateScores([], 'robust')).toBe(0);
  });
});

describe('aggregateConfidenceLevels', () => {
  it('takes the most frequent level, ties going to the conservative side', () => {
    expect(aggregateConfidenceLevels(['high', 'high', 'low'])).toBe('high');
    expect(aggregateConfidenceLevels(['high', 'low'])).toBe('low');
    expect(aggregateConfidenceLevels(['high', 'medium'])).toBe('medium');
    expect(aggregateConfidenceLevels([])).toBe('low');
  });
});

describe('EvaluationService', () => {
  let db: Database.Database, extractions: ExtractionRepository;

  const options = (overrides: Partial<EvaluationServiceOptions> = {}): EvaluationServiceOptions =>
    ({ ...testPipelineConfig().evaluation, referenceOwnerId: REFERENCE, ...overrides });

  const seed = (...candidates: ContextCandidate[]) => {
    for (const c of candidates) {
      extractions.saveTranscriptWithExtraction(
        { id: c.recordId, ownerId: c.ownerId, transcriptText: c.text, createdAt: new Date() },
        { id: `x-${c.recordId}`, transcriptId: c.recordId, ownerId: c.ownerId, transcriptText: c.text, extraction: samplePayload(), evaluation: null, confidenceLevel: 'reference', flagged: false, createdAt: new Date() },
      );
    }
  };

  const service = (store: ISimilarityStore, client: EvaluationClient, overrides: Partial<EvaluationServiceOptions> = {}) =>
    new EvaluationService(store, new RerankerService(undefined, pLimit(1)), extractions, client, options(overrides));

  beforeEach(() => { db = createTestDatabase(); extractions = new ExtractionRepository(db); });
  afterEach(() => cleanupTestDatabase(db));

  it('runs a single comparison against a close known case', async () => {
    const ref = candidate('ref-a', REFERENCE, 0.85);
    seed(ref);
    const client = new ScriptedEvaluationClient({ 'ref-a': evaluation(0.93, 'high', 'matches the gold standard') });

    const summary = await service(new FakeStore({ [REFERENCE]: [ref] }), client).evaluate(samplePayload(), 'transcript', 'owner-1');

    expect(summary).toMatchObject({
      strategy: 'single', standardsUsed: 1, bestSimilarity: 0.85, aggregatedScore: 0.93, confidenceLevelHint: 'high',
      searchThreshold: 0.3, reasoning: 'matches the gold standard',
      standards: [{ caseId: 'ref-a', similarityScore: 0.85, provenance: 'knownCase' }],
    });
    expect(client.singleCalls.map(s => s.caseId)).toEqual(['ref-a']);
    expect(client.singleCalls[0]?.goldStandardPayload).toEqual(samplePayload());
  });

  it('picks the strategy from retrieval similarity after reranking', async () => {
    const refA = candidate('ref-a', REFERENCE, 0.85), refB = candidate('ref-b', REFERENCE, 0.7);
    seed(refA, refB);
    const client = new ScriptedEvaluationClient({ 'ref-a': evaluation(0.9, 'high') });
    // ref-b: 0.3 × 0.7 + 0.7 × 1 = 0.91, ref-a: 0.3 × 0.85 + 0.7 × 0.2 = 0.395
    const reranker = new RerankerService(new ScriptedReranker([{ needle: 'ref-b', score: 1 }], 0.2), pLimit(1));
    const evaluator = new EvaluationService(new FakeStore({ [REFERENCE]: [refA, refB] }), reranker, extractions, client, options());

    const { standards } = await evaluator.retrieveStandards('transcript', 'owner-1');
    const summary = await evaluator.evaluate(samplePayload(), 'transcript', 'owner-1');

    expect(standards.map(s => [s.caseId, s.similarityScore])).toEqual([['ref-a', 0.85], ['ref-b', 0.7]]);
    expect(summary).toMatchObject({
      strategy: 'single', bestSimilarity: 0.85, aggregatedScore: 0.9,
      standards: [{ caseId: 'ref-a', similarityScore: 0.85, provenance: 'knownCase' }],
    });
    expect(client.singleCalls.map(s => s.caseId)).toEqual(['ref-a']);
  });

  it('aggregates a few comparisons and skips the failed one', async () => {
    const refA = candidate('ref-a', REFERENCE, 0.7), refB = candidate('ref-b', REFERENCE, 0.65), own = candidate('own-1', 'owner-1', 0.62);
    seed(refA, refB, own);
    const client = new ScriptedEvaluationClient({
      'ref-a': evaluation(0.8, 'high'), 'ref-b': new Error('rate limited'), 'own-1': evaluation(0.6, 'medium'),
    });

    const summary = await service(new FakeStore({ [REFERENCE]: [refA, refB], 'owner-1': [own] }), client).evaluate(samplePayload(), 'transcript', 'owner-1');

    expect(summary).toMatchObject({ strategy: 'few', standardsUsed: 2, bestSimilarity: 0.7, aggregationMethod: 'weighted', confidenceLevelHint: 'medium' });
    expect(summary.aggregatedScore).toBeCloseTo((0.8 * 0.7 + 0.6 * 0.62) / (0.7 + 0.62), 10);
    expect(summary.categoryScores?.['followUpTasks']?.score).toBeCloseTo(0.7, 10);
    expect(summary.standards?.map(s => s.provenance)).toEqual(['knownCase', 'knownCase', 'ownerHistory']);
  });

  it('uses one batched call when the client offers it', async () => {
    const refs = [0.5, 0.45, 0.4, 0.38, 0.35, 0.33].map((s, i) => candidate(`ref-${i}`, REFERENCE, s));
    seed(...refs);
    const client = new BatchingEvaluationClient({ aggregatedScore: 0.66, confidenceLevel: 'medium' });

    const summary = await service(new FakeStore({ [REFERENCE]: refs }), client).evaluate(samplePayload(), 'transcript', 'owner-1');

    expect(summary).toMatchObject({ strategy: 'multiple', standardsUsed: 5, aggregatedScore: 0.66, confidenceLevelHint: 'medium', aggregationMethod: 'weighted' });
    expect(client.batches).toHaveLength(1);
    expect(client.batches[0]?.standards.map(s => s.caseId)).toEqual(['ref-0', 'ref-1', 'ref-2', 'ref-3', 'ref-4']);
    expect(client.singleCalls).toEqual([]);
  });

  it('relaxes the threshold until standards are found', async () => {
    const weak = candidate('ref-weak', REFERENCE, 0.2);
    seed(weak);
    const store = new FakeStore({ [REFERENCE]: [weak] });

    const { standards, searchThreshold } = await service(store, new ScriptedEvaluationClient()).retrieveStandards('transcript', 'owner-1');

    expect(standards.map(s => s.caseId)).toEqual(['ref-weak']);
    expect(searchThreshold).toBe(0.1);
    expect(store.queries).toEqual([
      { ownerId: REFERENCE, threshold: 0.3, limit: 10 }, { ownerId: 'owner-1', threshold: 0.3, limit: 10 },
      { ownerId: REFERENCE, threshold: 0.1, limit: 15 }, { ownerId: 'owner-1', threshold: 0.1, limit: 15 },
    ]);
  });

  it('queries only the reference pool for the reference owner', async () => {
    const store = new FakeStore({});
    await service(store, new ScriptedEvaluationClient()).retrieveStandards('transcript', REFERENCE);
    expect(store.queries.map(q => q.ownerId)).toEqual([REFERENCE, REFERENCE, REFERENCE]);
  });

  it('ignores candidates without an extraction record', async () => {
    const store = new FakeStore({ [REFERENCE]: [candidate('orphan', REFERENCE, 0.9)] });
    const client = new ScriptedEvaluationClient();

    const summary = await service(store, client).evaluate(samplePayload(), 'transcript', 'owner-1');

    expect(summary).toMatchObject({ strategy: 'none', standardsUsed: 0, aggregatedScore: 0 });
    expect(client.singleCalls).toEqual([]);
  });

  it('reports an error strategy when every comparison fails', async () => {
    const refs = [candidate('ref-a', REFERENCE, 0.7), candidate('ref-b', REFERENCE, 0.65)];
    seed(...refs);
    const client = new ScriptedEvaluationClient({}, new Error('model overloaded'));

    const summary = await service(new FakeStore({ [REFERENCE]: refs }), client).evaluate(samplePayload(), 'transcript', 'owner-1');

    expect(summary).toMatchObject({ strategy: 'error', bestSimilarity: 0.7, confidenceLevelHint: 'low', error: 'all 2 evaluation calls failed' });
  });

  it('bounds evaluation calls by the timeout', async () => {
    const ref = candidate('ref-a', REFERENCE, 0.9);
    seed(ref);
    const hanging: EvaluationClient = { evaluateSingle: () => new Promise<SingleEvaluation>(() => {}) };

    const summary = await service(new FakeStore({ [REFERENCE]: [ref] }), hanging, { llmTimeoutMs: 20 }).evaluate(samplePayload(), 'transcript', 'owner-1');

    expect(summary).toMatchObject({ strategy: 'error', error: 'all 1 evaluation calls failed' });
  });
});
