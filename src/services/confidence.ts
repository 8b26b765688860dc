//confidence math: combine the LLM's own level with numeric scores into a tier
//given how much the evaluation trusts this extraction, what is the pipeline allowed to do?
import type { ConfidenceThresholds } from '../config/index.js';
import type { ConfidenceDecision, ConfidenceTier, EvaluationSummary, ExtractionPayload, LlmConfidenceLevel } from '../models/index.js';
import { countExtractedItems } from '../models/extraction.js';

export const DEFAULT_CONFIDENCE_THRESHOLDS: ConfidenceThresholds = {
  strongOverall: 0.9, strongBest: 0.9,
  llmHighOverall: 0.8, llmHighBest: 0.7,
  llmMediumOverall: 0.6, llmMediumBest: 0.5,
  llmHighBestOnly: 0.8,
  highOverall: 0.85, highBest: 0.8,
  mediumOverall: 0.7, mediumBest: 0.6,
};

//first matching rule wins
export function resolveTier(overall: number, best: number, llm: LlmConfidenceLevel, t: ConfidenceThresholds = DEFAULT_CONFIDENCE_THRESHOLDS): ConfidenceTier {
  //numbers strong enough to override a conservative model
  if (overall >= t.strongOverall && best >= t.strongBest) return 'high';
  //model level, checked against the numbers
  if (llm === 'high' && overall >= t.llmHighOverall && best >= t.llmHighBest) return 'high';
  if (llm === 'medium' && overall >= t.llmMediumOverall && best >= t.llmMediumBest) return 'medium';
  //confident model, close known case, weak score (typically an empty gold standard)
  if (llm === 'high' && best >= t.llmHighBestOnly) return 'high';
  //numeric fallback
  if (overall >= t.highOverall && best >= t.highBest) return 'high';
  if (overall >= t.mediumOverall && best >= t.mediumBest) return 'medium';
  return 'low';
}

export function resolveConfidence(summary: EvaluationSummary, t: ConfidenceThresholds = DEFAULT_CONFIDENCE_THRESHOLDS): ConfidenceTier {
  if (summary.strategy === 'none') return 'no_evaluation';
  if (summary.strategy === 'error') return 'low';
  return resolveTier(summary.aggregatedScore, summary.bestSimilarity, summary.confidenceLevelHint, t);
}

//only high tiers are written without a human
export const shouldPersist = (tier: ConfidenceTier): boolean => tier === 'high';
export const reviewRequired = (tier: ConfidenceTier): boolean => tier !== 'high';

export function decide(summary: EvaluationSummary, t: ConfidenceThresholds = DEFAULT_CONFIDENCE_THRESHOLDS): ConfidenceDecision {
  const tier = resolveConfidence(summary, t);
  return { tier, shouldPersist: shouldPersist(tier), reviewRequired: reviewRequired(tier) };
}

//confidence handed to the refinement step, from how much was extracted
export function initialRefinementConfidence(payload: ExtractionPayload, highItemCount: number = 5, mediumItemCount: number = 2): LlmConfidenceLevel {
  const items = countExtractedItems(payload);
  if (items >= highItemCount) return 'high';
  if (items >= mediumItemCount) return 'medium';
  return 'low';
}
