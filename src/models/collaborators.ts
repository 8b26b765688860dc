//external models and LLM functions the pipeline consumes; every one of them may be missing or failing
import type { ExtractionPayload } from './extraction.js';
import type { AggregationMethod, CategoryScore, EvaluationStandard, LlmConfidenceLevel } from './index.js';

export interface EmbeddingModel {
  readonly name: string;
  embed(text: string): Promise<number[]>;
}

//cross-encoder: relevance of a document to a query, nominally in [0,1]
export interface RerankerModel {
  readonly name: string;
  score(query: string, text: string): Promise<number>;
}

//user-defined extraction category
export interface CustomCategory {
  name: string;
  description?: string;
  fieldType?: string;
  required?: boolean;
}

export interface ExtractionRequest {
  transcript: string;
  context: string;
  customCategories: CustomCategory[];
  sopContext?: string;
}

export interface RefinementRequest {
  transcript: string;
  extraction: ExtractionPayload;
  initialConfidence: LlmConfidenceLevel;
  context: string;
}

export interface ExtractionClient {
  extract(request: ExtractionRequest): Promise<ExtractionPayload>;
  refine?(request: RefinementRequest): Promise<ExtractionPayload>;
}

export interface SingleEvaluation {
  overallScore: number;
  categoryScores: Record<string, CategoryScore>;
  confidenceLevel: LlmConfidenceLevel;
  reasoning?: string;
}

export interface MultipleEvaluation {
  aggregatedScore: number;
  confidenceLevel: LlmConfidenceLevel;
  categoryScores?: Record<string, CategoryScore>;
  reasoning?: string;
}

export interface EvaluationClient {
  evaluateSingle(predicted: ExtractionPayload, standard: EvaluationStandard, transcript: string): Promise<SingleEvaluation>;
  evaluateMultiple?(predicted: ExtractionPayload, standards: EvaluationStandard[], transcript: string, method: AggregationMethod): Promise<MultipleEvaluation>;
}
