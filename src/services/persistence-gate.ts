//side effects conditioned on the confidence tier: the record write, then both embeddings
import { v4 as uuidv4 } from 'uuid';
import type { EmbeddingOutcome, EvaluationSummary, ExtractionPayload, StoredConfidenceLevel } from '../models/index.js';
import { extractionToText } from '../models/extraction.js';
import { PersistenceError } from '../errors.js';
import type { IExtractionRepository } from '../repository/index.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import type { Result } from '../utils/result.js';
import type { EmbedRecordOutcome, ISimilarityStore } from './similarity-store.js';

const log = createLogger('persistence-gate');

export interface CommitRequest {
  transcriptId: string;
  ownerId: string;
  transcriptText: string;
  extraction: ExtractionPayload;
  evaluation: EvaluationSummary | null;
  confidenceLevel: StoredConfidenceLevel;
  flagged?: boolean;
  reviewedBy?: string;
  reviewNotes?: string;
}

export interface IPersistenceGate {
  //record write failures throw PersistenceError; embedding failures are only reported
  commit(request: CommitRequest): Promise<EmbeddingOutcome>;
  embedPair(ownerId: string, transcriptId: string, transcriptText: string, extraction: ExtractionPayload): Promise<EmbeddingOutcome>;
}

export class PersistenceGate implements IPersistenceGate {
  constructor(private extractions: IExtractionRepository, private store: ISimilarityStore) {}

  async commit(req: CommitRequest): Promise<EmbeddingOutcome> {
    const now = new Date();
    try {
      const existing = this.extractions.findExtractionByTranscriptId(req.transcriptId);
      this.extractions.saveTranscriptWithExtraction(
        { id: req.transcriptId, ownerId: req.ownerId, transcriptText: req.transcriptText, createdAt: now },
        {
          id: existing?.id ?? uuidv4(), transcriptId: req.transcriptId, ownerId: req.ownerId, transcriptText: req.transcriptText,
          extraction: req.extraction, evaluation: req.evaluation, confidenceLevel: req.confidenceLevel, flagged: req.flagged ?? false,
          ...(req.reviewedBy !== undefined && { reviewedBy: req.reviewedBy, reviewedAt: now }),
          ...(req.reviewNotes !== undefined && { reviewNotes: req.reviewNotes }),
          createdAt: existing?.createdAt ?? now,
        },
      );
    } catch (err) {
      throw new PersistenceError(`Failed to save extraction for transcript ${req.transcriptId}: ${errorMessage(err)}`, { transcriptId: req.transcriptId, cause: err });
    }
    log.info(`Saved extraction for transcript ${req.transcriptId} (${req.confidenceLevel})`);

    return this.embedPair(req.ownerId, req.transcriptId, req.transcriptText, req.extraction);
  }

  //both embeddings run concurrently and are awaited; neither failure affects the other
  async embedPair(ownerId: string, transcriptId: string, transcriptText: string, extraction: ExtractionPayload): Promise<EmbeddingOutcome> {
    const [transcript, payload] = await Promise.allSettled([
      this.store.embedRecord('transcript', transcriptText, ownerId, transcriptId),
      this.store.embedRecord('extraction', extractionToText(extraction), ownerId, transcriptId),
    ]);

    const errors: string[] = [];
    const outcome = (kind: string, settled: PromiseSettledResult<Result<EmbedRecordOutcome>>): 'created' | 'failed' => {
      if (settled.status === 'rejected') {
        errors.push(`${kind}: ${errorMessage(settled.reason)}`);
        return 'failed';
      }
      if (!settled.value.ok) {
        errors.push(`${kind}: ${settled.value.error.reason}`);
        return 'failed';
      }
      return 'created';
    };

    const result: EmbeddingOutcome = {
      transcript: outcome('transcript', transcript),
      extraction: outcome('extraction', payload),
      verified: this.verify(ownerId, transcriptId, errors),
      errors,
    };

    if (errors.length) log.warn(`Embedding side effects for transcript ${transcriptId} failed: ${errors.join('; ')}`);
    else if (!result.verified) log.warn(`Embeddings for transcript ${transcriptId} could not be verified`);
    return result;
  }

  private verify(ownerId: string, transcriptId: string, errors: string[]): boolean {
    try {
      return this.store.hasRecord(ownerId, 'transcript', transcriptId) && this.store.hasRecord(ownerId, 'extraction', transcriptId);
    } catch (err) {
      errors.push(`verify: ${errorMessage(err)}`);
      return false;
    }
  }
}
