//per-owner vector index: nearest-neighbour queries with a similarity floor
//writes queue per owner partition, reads never wait
import { v4 as uuidv4 } from 'uuid';
import type { ContextCandidate, RecordType } from '../models/index.js';
import type { ICandidateRepository } from '../repository/index.js';
import { createLogger } from '../utils/logger.js';
import { boundedCosineDistance } from '../utils/math.js';
import { PartitionLock } from '../utils/partition-lock.js';
import { ok, type Result } from '../utils/result.js';
import type { IEmbeddingService } from './embedder.js';
import { enrichText } from './normalizer.js';

const log = createLogger('similarity-store');

//nearest candidates considered before the threshold filter, per requested result
export const OVERFETCH_FACTOR = 3;

export type EmbedRecordOutcome = 'created' | 'exists';

export interface ISimilarityStore {
  query(text: string, ownerId: string, limit: number, similarityThreshold: number, recordType?: RecordType): Promise<Result<ContextCandidate[]>>;
  embedRecord(recordType: RecordType, text: string, ownerId: string, recordId: string): Promise<Result<EmbedRecordOutcome>>;
  hasRecord(ownerId: string, recordType: RecordType, recordId: string): boolean;
  purgeOwner(ownerId: string): Promise<number>;
  countRecords(ownerId: string): number;
}

export class SimilarityStore implements ISimilarityStore {
  private locks = new PartitionLock();

  constructor(private repository: ICandidateRepository, private embedder: IEmbeddingService) {}

  async query(text: string, ownerId: string, limit: number, similarityThreshold: number, recordType: RecordType = 'transcript'): Promise<Result<ContextCandidate[]>> {
    if (limit <= 0) return ok([]);
    const embedded = await this.embedder.embed(enrichText(text));
    if (!embedded.ok) return embedded;
    const queryVector = embedded.value;

    //records come back in creation order and both sorts are stable, so ties keep that order
    const nearest = this.repository.findByOwner(ownerId, recordType)
      .filter(r => {
        if (r.vector.length === queryVector.length) return true;
        log.debug(`Skipping ${r.recordType} ${r.recordId}: ${r.vector.length} dimensions, query has ${queryVector.length}`);
        return false;
      })
      .map(r => ({ record: r, similarity: 1 - boundedCosineDistance(queryVector, r.vector) }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, limit * OVERFETCH_FACTOR);

    const candidates: ContextCandidate[] = nearest
      .filter(n => n.similarity >= similarityThreshold)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, limit)
      .map(({ record, similarity }) => ({
        recordId: record.recordId, text: record.rawText, similarityScore: similarity, ownerId: record.ownerId, recordType: record.recordType,
        metadata: { candidateId: record.id, createdAt: record.createdAt.toISOString() },
      }));

    log.debug(`Query in ${ownerId}/${recordType}: ${candidates.length} of ${nearest.length} nearest at >= ${similarityThreshold}`);
    return ok(candidates);
  }

  //immutable once written: a repeat for the same (owner, type, record) is a no-op
  async embedRecord(recordType: RecordType, text: string, ownerId: string, recordId: string): Promise<Result<EmbedRecordOutcome>> {
    return this.locks.run(ownerId, async (): Promise<Result<EmbedRecordOutcome>> => {
      if (this.repository.exists(ownerId, recordType, recordId)) return ok('exists');

      const embedded = await this.embedder.embed(enrichText(text));
      if (!embedded.ok) return embedded;

      const created = this.repository.insert({ id: uuidv4(), ownerId, recordId, rawText: text, vector: embedded.value, recordType, createdAt: new Date() });
      return ok(created ? 'created' : 'exists');
    });
  }

  hasRecord(ownerId: string, recordType: RecordType, recordId: string): boolean {
    return this.repository.exists(ownerId, recordType, recordId);
  }

  async purgeOwner(ownerId: string): Promise<number> {
    return this.locks.run(ownerId, async () => {
      const removed = this.repository.deleteByOwner(ownerId);
      log.info(`Purged ${removed} records for owner ${ownerId}`);
      return removed;
    });
  }

  countRecords(ownerId: string): number {
    return this.repository.countByOwner(ownerId);
  }
}
