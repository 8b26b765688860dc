//public API of the retrieval, evaluation and confidence-gating services

export { normalizeText, enrichText, prepareText, extractMedicalHints, MEDICAL_CONTEXT_HEADER } from './normalizer.js';
export { EmbeddingCache, type IEmbeddingCache, type EmbeddingCacheOptions, type CacheStats, type SimilarEmbedding } from './embedding-cache.js';
export { EmbeddingService, type IEmbeddingService, type EmbeddingServiceOptions } from './embedder.js';
export { SimilarityStore, OVERFETCH_FACTOR, type ISimilarityStore, type EmbedRecordOutcome } from './similarity-store.js';
export { RerankerService, type IRerankerService, type RerankerInfo, type RerankerWeights } from './reranker.js';
export {
  ContextSelector, DEFAULT_CONTEXT_OPTIONS, SCORE_WEIGHTS, estimateTokens, scoreDomainRelevance, scorePayloadQuality, scoreCompleteness,
  type IContextSelector, type ContextSelectorOptions,
} from './context-selector.js';
export {
  EvaluationService, selectStrategy, aggregateScores, aggregateConfidenceLevels, mergeCategoryScores, DEFAULT_STRATEGY_OPTIONS,
  type IEvaluationService, type EvaluationServiceOptions, type StrategyOptions, type StrategyChoice, type ScoreSample, type StandardsLookup,
} from './evaluation.js';
export {
  resolveTier, resolveConfidence, decide, shouldPersist, reviewRequired, initialRefinementConfidence, DEFAULT_CONFIDENCE_THRESHOLDS,
} from './confidence.js';
export { PersistenceGate, type IPersistenceGate, type CommitRequest } from './persistence-gate.js';
export { PerformanceMonitor, type PhaseTiming } from './performance-monitor.js';
export {
  ExtractionPipeline, type IExtractionPipeline, type PipelineDependencies, type ReviewSaveResult, type SeedResult, type RetrievalStats,
} from './pipeline.js';
