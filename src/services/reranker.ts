//second-stage relevance: fuse retrieval similarity with a cross-encoder score
import type { LimitFunction } from 'p-limit';
import type { ContextCandidate, RerankerModel } from '../models/index.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { clamp01 } from '../utils/math.js';

const log = createLogger('reranker');

export interface RerankerWeights { originalWeight: number; rerankerWeight: number; }

export interface RerankerInfo {
  modelName: string | null;
  available: boolean;
  modelType: 'cross_encoder';
  weights: RerankerWeights;
}

export interface IRerankerService {
  rerank(query: string, candidates: ContextCandidate[], topK: number): Promise<ContextCandidate[]>;
  getInfo(): RerankerInfo;
}

export class RerankerService implements IRerankerService {
  constructor(
    private model: RerankerModel | undefined,
    private limit: LimitFunction,
    private weights: RerankerWeights = { originalWeight: 0.3, rerankerWeight: 0.7 }
  ) {}

  //without a model, or when any scoring call fails, the input order is kept untouched
  async rerank(query: string, candidates: ContextCandidate[], topK: number): Promise<ContextCandidate[]> {
    const model = this.model;
    if (!model || candidates.length === 0) return candidates.slice(0, topK);

    let scores: number[];
    try {
      scores = await Promise.all(candidates.map(c => this.limit(() => model.score(query, c.text))));
    } catch (err) {
      log.warn(`Reranking failed, keeping retrieval order: ${errorMessage(err)}`);
      return candidates.slice(0, topK);
    }

    const { originalWeight, rerankerWeight } = this.weights;
    const reranked = candidates.map((c, i) => {
      const rerankerScore = clamp01(scores[i] ?? 0);
      const combined = clamp01(originalWeight * c.similarityScore + rerankerWeight * rerankerScore);
      return { ...c, similarityScore: combined, originalSimilarity: c.similarityScore, rerankerScore };
    });
    reranked.sort((a, b) => b.similarityScore - a.similarityScore);

    log.debug(`Reranked ${reranked.length} candidates with ${model.name}`);
    return reranked.slice(0, topK);
  }

  getInfo(): RerankerInfo {
    return { modelName: this.model?.name ?? null, available: this.model !== undefined, modelType: 'cross_encoder', weights: { ...this.weights } };
  }
}
