//data contracts for the retrieval, evaluation and confidence-gating pipeline
//every stage reads and writes these shapes, nothing else crosses a service boundary

export type {
  FollowUpTask, MedicationInstruction, ClientReminder, ClinicianTodo, CustomExtraction, ExtractionPayload, ExtractionRecordColumns,
} from './extraction.js';
import type { ExtractionPayload } from './extraction.js';

export type RecordType = 'transcript' | 'extraction';

//text prepared for embedding
export interface NormalizedText {
  normalized: string;
  enriched: string;
}

//one memoized embedding, owned by a single cache instance
export interface CachedEmbedding {
  vector: number[];
  contentHash: string;
  normalizedText: string;
  createdAt: Date;
  accessCount: number;
  lastAccessedAt: Date;
}

//a row of the similarity index, immutable once written
export interface CandidateRecord {
  id: string;
  ownerId: string;
  recordId: string;
  rawText: string;
  vector: number[];
  recordType: RecordType;
  createdAt: Date;
}

//retrieved record proposed as context or as an evaluation standard
export interface ContextCandidate {
  recordId: string;
  text: string;
  similarityScore: number;
  ownerId: string;
  recordType: RecordType;
  extractionPayload?: ExtractionPayload;
  originalSimilarity?: number;
  rerankerScore?: number;
  metadata?: Record<string, unknown>;
}

export interface ContextSubscores {
  similarity: number;
  domainRelevance: number;
  payloadQuality: number;
  completeness: number;
}

export interface ScoredContext {
  candidate: ContextCandidate;
  relevanceScore: number;
  subscores: ContextSubscores;
  estimatedTokens: number;
  reasoning: string;
}

export type StandardProvenance = 'knownCase' | 'ownerHistory';

//gold standard retrieved for a single request
export interface EvaluationStandard {
  caseId: string;
  recordId: string;
  goldStandardPayload: ExtractionPayload;
  sourceText: string;
  similarityScore: number;
  provenance: StandardProvenance;
}

export type EvaluationStrategy = 'single' | 'few' | 'multiple' | 'none' | 'error';
export type AggregationMethod = 'weighted' | 'average' | 'robust';
export type LlmConfidenceLevel = 'high' | 'medium' | 'low';

export interface CategoryScore {
  score: number;
  reasoning?: string;
  precision?: number;
  recall?: number;
  f1Score?: number;
}

//attached to the extraction record before persistence
export interface EvaluationSummary {
  strategy: EvaluationStrategy;
  standardsUsed: number;
  bestSimilarity: number;
  aggregatedScore: number;
  confidenceLevelHint: LlmConfidenceLevel;
  reasoning: string;
  aggregationMethod?: AggregationMethod;
  searchThreshold?: number;
  categoryScores?: Record<string, CategoryScore>;
  standards?: { caseId: string; similarityScore: number; provenance: StandardProvenance }[];
  error?: string;
}

export type ConfidenceTier = 'high' | 'medium' | 'low' | 'no_evaluation';

//what the persisted record says about its own trust level
export type StoredConfidenceLevel = ConfidenceTier | 'reviewed' | 'reference';

export interface ConfidenceDecision {
  tier: ConfidenceTier;
  shouldPersist: boolean;
  reviewRequired: boolean;
}

//persisted transcript + extraction pair
export interface ExtractionRecord {
  id: string;
  transcriptId: string;
  ownerId: string;
  transcriptText: string;
  extraction: ExtractionPayload;
  evaluation: EvaluationSummary | null;
  confidenceLevel: StoredConfidenceLevel;
  flagged: boolean;
  reviewedBy?: string;
  reviewNotes?: string;
  reviewedAt?: Date;
  createdAt: Date;
}

export interface AuditEntry {
  step: 'retrieve' | 'extract' | 'refine' | 'evaluate' | 'decide' | 'persist' | 'review';
  timestamp: string;
  details: string;
}

//outcome of the two post-persist embedding side effects
export interface EmbeddingOutcome {
  transcript: 'created' | 'failed';
  extraction: 'created' | 'failed';
  verified: boolean;
  errors: string[];
}

//final output for every transcript
export interface PipelineResult {
  transcriptId: string;
  extraction: ExtractionPayload;
  confidenceTier: ConfidenceTier;
  flagged: boolean;
  reviewRequired: boolean;
  persisted: boolean;
  evaluation: EvaluationSummary;
  embeddings?: EmbeddingOutcome;
  auditTrail: AuditEntry[];
}

//curated case with a known-correct extraction, seeded into the reference pool
export interface ReferenceCase {
  caseId: string;
  transcript: string;
  goldStandard: ExtractionPayload;
}

//human-review save request
export interface ReviewedExtraction {
  transcriptId: string;
  ownerId: string;
  transcriptText: string;
  extraction: ExtractionPayload;
  reviewedBy: string;
  reviewNotes?: string;
}

export type {
  EmbeddingModel, RerankerModel, CustomCategory, ExtractionRequest, RefinementRequest, ExtractionClient,
  SingleEvaluation, MultipleEvaluation, EvaluationClient,
} from './collaborators.js';
