//adaptive evaluation: retrieve gold standards, pick how many to compare against, aggregate the comparisons
import type {
  AggregationMethod, CategoryScore, ContextCandidate, EvaluationClient, EvaluationStandard, EvaluationStrategy,
  EvaluationSummary, ExtractionPayload, LlmConfidenceLevel, SingleEvaluation,
} from '../models/index.js';
import type { SearchStep } from '../config/index.js';
import type { IExtractionRepository } from '../repository/index.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { clamp01 } from '../utils/math.js';
import { withTimeout } from '../utils/timeout.js';
import type { IRerankerService } from './reranker.js';
import type { ISimilarityStore } from './similarity-store.js';

const log = createLogger('evaluation');

export interface StrategyOptions {
  singleThreshold: number;
  fewThreshold: number;
  fewCount: number;
  multipleCount: number;
}

export const DEFAULT_STRATEGY_OPTIONS: StrategyOptions = { singleThreshold: 0.8, fewThreshold: 0.6, fewCount: 3, multipleCount: 5 };

export interface StrategyChoice { strategy: EvaluationStrategy; standardsUsed: number; }

//closer known cases need fewer comparisons
export function selectStrategy(bestSimilarity: number, available: number, options: StrategyOptions = DEFAULT_STRATEGY_OPTIONS): StrategyChoice {
  if (available <= 0) return { strategy: 'none', standardsUsed: 0 };
  if (bestSimilarity >= options.singleThreshold) return { strategy: 'single', standardsUsed: 1 };
  if (bestSimilarity >= options.fewThreshold) return { strategy: 'few', standardsUsed: Math.min(options.fewCount, available) };
  return { strategy: 'multiple', standardsUsed: Math.min(options.multipleCount, available) };
}

export interface ScoreSample { score: number; similarity: number; }

export function aggregateScores(samples: ScoreSample[], method: AggregationMethod): number {
  if (samples.length === 0) return 0;
  switch (method) {
    case 'weighted': {
      const totalWeight = samples.reduce((sum, s) => sum + s.similarity, 0);
      return totalWeight > 0 ? samples.reduce((sum, s) => sum + s.score * s.similarity, 0) / totalWeight : 0;
    }
    case 'average':
      return samples.reduce((sum, s) => sum + s.score, 0) / samples.length;
    case 'robust': {
      //min and max only count as outliers once there are enough samples
      const sorted = samples.map(s => s.score).sort((a, b) => a - b);
      const trimmed = sorted.length >= 5 ? sorted.slice(1, -1) : sorted;
      return trimmed.reduce((sum, s) => sum + s, 0) / trimmed.length;
    }
  }
}

//most conservative first: wins ties
const LEVEL_PRECEDENCE: LlmConfidenceLevel[] = ['low', 'medium', 'high'];

//most frequent level; ties go to the more conservative one
export function aggregateConfidenceLevels(levels: LlmConfidenceLevel[]): LlmConfidenceLevel {
  let best: LlmConfidenceLevel = 'low', bestCount = 0;
  for (const level of LEVEL_PRECEDENCE) {
    const count = levels.filter(l => l === level).length;
    if (count > bestCount) { best = level; bestCount = count; }
  }
  return best;
}

//per-category mean over the evaluations that scored it
export function mergeCategoryScores(all: Record<string, CategoryScore>[]): Record<string, CategoryScore> {
  const sums = new Map<string, { total: number; n: number }>();
  for (const scores of all) {
    for (const [category, s] of Object.entries(scores)) {
      const acc = sums.get(category) ?? { total: 0, n: 0 };
      acc.total += s.score;
      acc.n++;
      sums.set(category, acc);
    }
  }
  return Object.fromEntries([...sums].map(([category, { total, n }]) => [category, { score: total / n }]));
}

export interface StandardsLookup {
  standards: EvaluationStandard[];
  searchThreshold?: number;
}

export interface IEvaluationService {
  retrieveStandards(transcript: string, ownerId: string): Promise<StandardsLookup>;
  evaluate(predicted: ExtractionPayload, transcript: string, ownerId: string): Promise<EvaluationSummary>;
}

export interface EvaluationServiceOptions extends StrategyOptions {
  searchPolicy: SearchStep[];
  aggregationMethod: AggregationMethod;
  llmTimeoutMs: number;
  referenceOwnerId: string;
}

export class EvaluationService implements IEvaluationService {
  constructor(
    private store: ISimilarityStore,
    private reranker: IRerankerService,
    private extractions: IExtractionRepository,
    private client: EvaluationClient,
    private options: EvaluationServiceOptions
  ) {}

  //reference pool first, then the owner's own history; first search step with any standard wins
  async retrieveStandards(transcript: string, ownerId: string): Promise<StandardsLookup> {
    const { referenceOwnerId, searchPolicy } = this.options;
    const owners = ownerId === referenceOwnerId ? [referenceOwnerId] : [referenceOwnerId, ownerId];

    for (const step of searchPolicy) {
      const found: ContextCandidate[] = [];
      for (const owner of owners) {
        const result = await this.store.query(transcript, owner, step.limit, step.threshold, 'transcript');
        if (result.ok) found.push(...result.value);
        else log.warn(`Standards search in ${owner} unavailable: ${result.error.reason}`);
      }
      if (found.length === 0) continue;

      found.sort((a, b) => b.similarityScore - a.similarityScore);
      const ranked = step.rerank ? await this.reranker.rerank(transcript, found, step.limit) : found;
      const standards = this.toStandards(ranked);
      if (standards.length > 0) {
        log.debug(`Found ${standards.length} standards at threshold ${step.threshold}`);
        return { standards, searchThreshold: step.threshold };
      }
    }
    return { standards: [] };
  }

  async evaluate(predicted: ExtractionPayload, transcript: string, ownerId: string): Promise<EvaluationSummary> {
    let bestSimilarity = 0;
    try {
      const { standards, searchThreshold } = await this.retrieveStandards(transcript, ownerId);
      bestSimilarity = standards[0]?.similarityScore ?? 0;
      const choice = selectStrategy(bestSimilarity, standards.length, this.options);

      if (choice.strategy === 'none') {
        return {
          strategy: 'none', standardsUsed: 0, bestSimilarity: 0, aggregatedScore: 0, confidenceLevelHint: 'low',
          reasoning: 'No evaluation standards found at any search threshold',
        };
      }

      const used = standards.slice(0, choice.standardsUsed);
      const base = {
        strategy: choice.strategy, standardsUsed: used.length, bestSimilarity,
        ...(searchThreshold !== undefined && { searchThreshold }),
        standards: used.map(s => ({ caseId: s.caseId, similarityScore: s.similarityScore, provenance: s.provenance })),
      };

      if (choice.strategy === 'single') {
        const top = used.slice(0, 1);
        const [evaluation] = await this.evaluateEach(predicted, top, transcript);
        if (!evaluation) throw new Error('single-standard evaluation returned nothing');
        return {
          ...base, aggregatedScore: clamp01(evaluation.result.overallScore), confidenceLevelHint: evaluation.result.confidenceLevel,
          categoryScores: evaluation.result.categoryScores,
          reasoning: evaluation.result.reasoning ?? `Compared against ${evaluation.standard.caseId} (similarity ${bestSimilarity.toFixed(3)})`,
        };
      }

      const method = this.options.aggregationMethod;
      if (this.client.evaluateMultiple) {
        const evaluateMultiple = this.client.evaluateMultiple.bind(this.client);
        const batched = await withTimeout('evaluation', this.options.llmTimeoutMs, () => evaluateMultiple(predicted, used, transcript, method));
        return {
          ...base, aggregationMethod: method, aggregatedScore: clamp01(batched.aggregatedScore), confidenceLevelHint: batched.confidenceLevel,
          ...(batched.categoryScores && { categoryScores: batched.categoryScores }),
          reasoning: batched.reasoning ?? `Batched comparison against ${used.length} standards`,
        };
      }

      const evaluations = await this.evaluateEach(predicted, used, transcript);
      return {
        ...base, standardsUsed: evaluations.length, aggregationMethod: method,
        aggregatedScore: clamp01(aggregateScores(evaluations.map(e => ({ score: e.result.overallScore, similarity: e.standard.similarityScore })), method)),
        confidenceLevelHint: aggregateConfidenceLevels(evaluations.map(e => e.result.confidenceLevel)),
        categoryScores: mergeCategoryScores(evaluations.map(e => e.result.categoryScores)),
        reasoning: `${method} aggregate of ${evaluations.length} of ${used.length} standards`,
      };
    } catch (err) {
      log.error(`Evaluation failed: ${errorMessage(err)}`);
      return {
        strategy: 'error', standardsUsed: 0, bestSimilarity, aggregatedScore: 0, confidenceLevelHint: 'low',
        reasoning: 'Evaluation failed', error: errorMessage(err),
      };
    }
  }

  //failed comparisons are skipped; it is an error only when every one fails
  private async evaluateEach(predicted: ExtractionPayload, standards: EvaluationStandard[], transcript: string): Promise<{ standard: EvaluationStandard; result: SingleEvaluation }[]> {
    const settled = await Promise.allSettled(standards.map(standard =>
      withTimeout('evaluation', this.options.llmTimeoutMs, () => this.client.evaluateSingle(predicted, standard, transcript))));

    const evaluations: { standard: EvaluationStandard; result: SingleEvaluation }[] = [];
    settled.forEach((outcome, i) => {
      const standard = standards[i];
      if (!standard) return;
      if (outcome.status === 'fulfilled') evaluations.push({ standard, result: outcome.value });
      else log.warn(`Evaluation against ${standard.caseId} failed: ${errorMessage(outcome.reason)}`);
    });
    if (evaluations.length === 0) throw new Error(`all ${standards.length} evaluation calls failed`);
    return evaluations;
  }

  //standards carry the retrieval similarity, not the reranked blend
  private toStandards(candidates: ContextCandidate[]): EvaluationStandard[] {
    const standards: EvaluationStandard[] = [];
    for (const c of candidates) {
      const record = this.extractions.findExtractionByTranscriptId(c.recordId);
      if (!record) continue;
      standards.push({
        caseId: c.recordId, recordId: record.id, goldStandardPayload: record.extraction, sourceText: c.text,
        similarityScore: c.originalSimilarity ?? c.similarityScore,
        provenance: c.ownerId === this.options.referenceOwnerId ? 'knownCase' : 'ownerHistory',
      });
    }
    return standards.sort((a, b) => b.similarityScore - a.similarityScore);
  }
}
