//workflow orchestrator: Retrieve → Extract → (Refine) → Evaluate → Decide → Persist
import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import { loadPipelineConfig, type PipelineConfig } from '../config/index.js';
import { ExtractionError, PipelineError, PipelineErrorCode } from '../errors.js';
import type {
  AuditEntry, ContextCandidate, CustomCategory, EmbeddingModel, EmbeddingOutcome, EvaluationClient, ExtractionClient,
  ExtractionPayload, PipelineResult, RecordType, ReferenceCase, RerankerModel, ReviewedExtraction,
} from '../models/index.js';
import { countExtractedItems, parseExtractionPayload } from '../models/extraction.js';
import type { ICandidateRepository, IExtractionRepository } from '../repository/index.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import type { Result } from '../utils/result.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import { decide, initialRefinementConfidence } from './confidence.js';
import { ContextSelector, type IContextSelector } from './context-selector.js';
import { EmbeddingCache, type CacheStats, type IEmbeddingCache } from './embedding-cache.js';
import { EmbeddingService, type IEmbeddingService } from './embedder.js';
import { EvaluationService, type IEvaluationService } from './evaluation.js';
import { PerformanceMonitor } from './performance-monitor.js';
import { PersistenceGate, type IPersistenceGate } from './persistence-gate.js';
import { RerankerService, type IRerankerService, type RerankerInfo } from './reranker.js';
import { SimilarityStore, type EmbedRecordOutcome, type ISimilarityStore } from './similarity-store.js';

const log = createLogger('pipeline');

export interface PipelineDependencies {
  candidates: ICandidateRepository;
  extractions: IExtractionRepository;
  extractionClient: ExtractionClient;
  evaluationClient: EvaluationClient;
  embeddingModel?: EmbeddingModel;
  rerankerModel?: RerankerModel;
  config?: PipelineConfig;
  //injected when several pipelines share one cache
  cache?: IEmbeddingCache;
}

export interface ReviewSaveResult { transcriptId: string; embeddings: EmbeddingOutcome; }
export interface SeedResult { seeded: number; embedded: number; failed: string[]; }

export interface RetrievalStats {
  cache: CacheStats;
  reranker: RerankerInfo;
  embeddingModel: string | null;
  referenceOwnerId: string;
}

//public pipeline interface
export interface IExtractionPipeline {
  runExtractionPipeline(transcriptText: string, ownerId: string, customCategories?: CustomCategory[], sopContext?: string): Promise<PipelineResult>;
  embedRecord(recordType: RecordType, text: string, ownerId: string, recordId: string): Promise<Result<EmbedRecordOutcome>>;
  saveReviewedExtraction(review: ReviewedExtraction): Promise<ReviewSaveResult>;
  seedReferenceCases(cases: ReferenceCase[]): Promise<SeedResult>;
  purgeOwner(ownerId: string): Promise<number>;
  getRetrievalStats(): RetrievalStats;
}

const audit = (step: AuditEntry['step'], details: string): AuditEntry => ({ step, timestamp: new Date().toISOString(), details });

export class ExtractionPipeline implements IExtractionPipeline {
  readonly config: PipelineConfig;
  private cache: IEmbeddingCache;
  private embedder: IEmbeddingService;
  private store: ISimilarityStore;
  private reranker: IRerankerService;
  private selector: IContextSelector;
  private evaluation: IEvaluationService;
  private gate: IPersistenceGate;
  private extractions: IExtractionRepository;
  private extractionClient: ExtractionClient;

  constructor(deps: PipelineDependencies) {
    const config = deps.config ?? loadPipelineConfig();
    this.config = config;
    this.extractions = deps.extractions;
    this.extractionClient = deps.extractionClient;

    const workerPool = pLimit(config.workerPool.concurrency);
    this.cache = deps.cache ?? new EmbeddingCache({ ...config.cache });
    this.embedder = new EmbeddingService(deps.embeddingModel, this.cache, workerPool, { nearDuplicateThreshold: config.cache.nearDuplicateThreshold });
    this.store = new SimilarityStore(deps.candidates, this.embedder);
    this.reranker = new RerankerService(deps.rerankerModel, workerPool, config.reranker);
    this.selector = new ContextSelector({ ...config.context, referenceOwnerId: config.referenceOwnerId });
    this.evaluation = new EvaluationService(this.store, this.reranker, deps.extractions, deps.evaluationClient, {
      ...config.evaluation, referenceOwnerId: config.referenceOwnerId,
    });
    this.gate = new PersistenceGate(deps.extractions, this.store);
  }

  //process a single transcript through the full pipeline
  async runExtractionPipeline(transcriptText: string, ownerId: string, customCategories: CustomCategory[] = [], sopContext?: string): Promise<PipelineResult> {
    if (!transcriptText.trim()) throw new PipelineError('Transcript text is empty', PipelineErrorCode.INVALID_INPUT);
    if (!ownerId) throw new PipelineError('Owner id is required', PipelineErrorCode.INVALID_INPUT);

    const transcriptId = uuidv4();
    const monitor = new PerformanceMonitor(`transcript ${transcriptId}`);
    const auditTrail: AuditEntry[] = [];
    const record = (entry: AuditEntry) => {
      auditTrail.push(entry);
      this.extractions.saveAuditEntry({ ...entry, transcriptId });
    };

    try {
      //Step 1: retrieve prior cases and build the few-shot context
      const { context, retrieved, selected } = await monitor.time('retrieve', () => this.buildContext(transcriptText, ownerId));
      record(audit('retrieve', `Retrieved ${retrieved} candidates, selected ${selected} for context (${context.length} chars)`));

      //Step 2: extraction
      let extraction = await monitor.time('extract', () => this.extract(transcriptText, context, customCategories, sopContext));
      record(audit('extract', `Extracted ${countExtractedItems(extraction)} items${extraction.customExtractions?.length ? ` and ${extraction.customExtractions.length} custom extractions` : ''}`));

      //Step 3: optional refinement
      if (this.extractionClient.refine) {
        const refined = await monitor.time('refine', () => this.refine(transcriptText, extraction, context));
        if (refined) extraction = refined;
        record(audit('refine', refined ? `Refined to ${countExtractedItems(extraction)} items` : 'Refinement failed, keeping initial extraction'));
      }

      //Step 4: evaluation against gold standards
      const current = extraction;
      const evaluation = await monitor.time('evaluate', () => this.evaluation.evaluate(current, transcriptText, ownerId));
      record(audit('evaluate', `Strategy ${evaluation.strategy}: ${evaluation.standardsUsed} standards, best similarity ${evaluation.bestSimilarity.toFixed(3)}, score ${evaluation.aggregatedScore.toFixed(3)}${evaluation.error ? ` (error: ${evaluation.error})` : ''}`));

      //Step 5: confidence decision
      const decision = decide(evaluation, this.config.confidence);
      record(audit('decide', `Tier ${decision.tier}: ${decision.shouldPersist ? 'auto-save' : 'flagged for human review'}`));

      //Step 6: conditional persistence
      let embeddings: EmbeddingOutcome | undefined;
      if (decision.shouldPersist) {
        embeddings = await monitor.time('persist', () => this.gate.commit({
          transcriptId, ownerId, transcriptText, extraction: current, evaluation, confidenceLevel: decision.tier,
        }));
        record(audit('persist', `Saved; embeddings transcript=${embeddings.transcript} extraction=${embeddings.extraction} verified=${embeddings.verified}`));
      } else {
        record(audit('persist', `Not saved (tier ${decision.tier})`));
      }

      return {
        transcriptId, extraction: current, confidenceTier: decision.tier, flagged: !decision.shouldPersist,
        reviewRequired: decision.reviewRequired, persisted: decision.shouldPersist, evaluation,
        ...(embeddings && { embeddings }), auditTrail,
      };
    } finally {
      monitor.report();
    }
  }

  embedRecord(recordType: RecordType, text: string, ownerId: string, recordId: string): Promise<Result<EmbedRecordOutcome>> {
    return this.store.embedRecord(recordType, text, ownerId, recordId);
  }

  //human-approved extraction: always written, marked reviewed
  async saveReviewedExtraction(review: ReviewedExtraction): Promise<ReviewSaveResult> {
    const extraction = parseExtractionPayload(review.extraction);
    const previous = this.extractions.findExtractionByTranscriptId(review.transcriptId);
    const embeddings = await this.gate.commit({
      transcriptId: review.transcriptId, ownerId: review.ownerId, transcriptText: review.transcriptText, extraction,
      evaluation: previous?.evaluation ?? null, confidenceLevel: 'reviewed', flagged: false,
      reviewedBy: review.reviewedBy, ...(review.reviewNotes !== undefined && { reviewNotes: review.reviewNotes }),
    });
    this.extractions.saveAuditEntry({ ...audit('review', `Saved after review by ${review.reviewedBy}`), transcriptId: review.transcriptId });
    return { transcriptId: review.transcriptId, embeddings };
  }

  //curated cases land in the reference pool with their gold-standard extraction
  async seedReferenceCases(cases: ReferenceCase[]): Promise<SeedResult> {
    const result: SeedResult = { seeded: 0, embedded: 0, failed: [] };
    for (const c of cases) {
      const goldStandard = parseExtractionPayload(c.goldStandard);
      const embeddings = await this.gate.commit({
        transcriptId: c.caseId, ownerId: this.config.referenceOwnerId, transcriptText: c.transcript, extraction: goldStandard,
        evaluation: null, confidenceLevel: 'reference',
      });
      result.seeded++;
      if (embeddings.errors.length === 0) result.embedded++;
      else result.failed.push(c.caseId);
    }
    log.info(`Seeded ${result.seeded} reference cases (${result.embedded} embedded)`);
    return result;
  }

  purgeOwner(ownerId: string): Promise<number> {
    return this.store.purgeOwner(ownerId);
  }

  getRetrievalStats(): RetrievalStats {
    return {
      cache: this.cache.getStats(), reranker: this.reranker.getInfo(),
      embeddingModel: this.embedder.modelName ?? null, referenceOwnerId: this.config.referenceOwnerId,
    };
  }

  //owner history and reference pool, reranked, then budgeted into a prompt block
  private async buildContext(transcriptText: string, ownerId: string): Promise<{ context: string; retrieved: number; selected: number }> {
    const { contextLimit, contextThreshold, rerankTopK } = this.config.retrieval;
    const owners = ownerId === this.config.referenceOwnerId ? [ownerId] : [ownerId, this.config.referenceOwnerId];

    const found: ContextCandidate[] = [];
    for (const owner of owners) {
      const result = await this.store.query(transcriptText, owner, contextLimit, contextThreshold, 'transcript');
      if (result.ok) found.push(...result.value);
      else log.warn(`Context retrieval in ${owner} unavailable: ${result.error.reason}`);
    }
    found.sort((a, b) => b.similarityScore - a.similarityScore);

    const ranked = await this.reranker.rerank(transcriptText, found, rerankTopK);
    const withPayloads = ranked.map(c => {
      const stored = this.extractions.findExtractionByTranscriptId(c.recordId);
      return stored ? { ...c, extractionPayload: stored.extraction } : c;
    });

    const selected = this.selector.select(transcriptText, withPayloads);
    return { context: this.selector.buildContext(selected), retrieved: found.length, selected: selected.length };
  }

  private async extract(transcript: string, context: string, customCategories: CustomCategory[], sopContext?: string): Promise<ExtractionPayload> {
    try {
      const raw = await withTimeout('extraction', this.config.evaluation.llmTimeoutMs, () =>
        this.extractionClient.extract({ transcript, context, customCategories, ...(sopContext !== undefined && { sopContext }) }));
      return parseExtractionPayload(raw);
    } catch (err) {
      const code = err instanceof TimeoutError ? PipelineErrorCode.EXTRACTION_TIMEOUT : PipelineErrorCode.EXTRACTION_FAILED;
      throw new ExtractionError(`Extraction failed: ${errorMessage(err)}`, code, { cause: err });
    }
  }

  //refinement is best-effort: a failure keeps the first extraction
  private async refine(transcript: string, extraction: ExtractionPayload, context: string): Promise<ExtractionPayload | undefined> {
    const client = this.extractionClient;
    if (!client.refine) return undefined;
    const refine = client.refine.bind(client);
    const { highItemCount, mediumItemCount } = this.config.refinement;
    const initialConfidence = initialRefinementConfidence(extraction, highItemCount, mediumItemCount);
    try {
      const refined = await withTimeout('refinement', this.config.evaluation.llmTimeoutMs, () => refine({ transcript, extraction, initialConfidence, context }));
      return parseExtractionPayload(refined);
    } catch (err) {
      log.warn(`Refinement failed: ${errorMessage(err)}`);
      return undefined;
    }
  }
}
