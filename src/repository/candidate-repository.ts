//storage for the similarity index: one row per embedded transcript or extraction
import Database from 'better-sqlite3';
import type { CandidateRecord, RecordType } from '../models/index.js';

export interface ICandidateRepository {
  //false when (ownerId, recordType, recordId) is already indexed
  insert(record: CandidateRecord): boolean;
  exists(ownerId: string, recordType: RecordType, recordId: string): boolean;
  //creation order
  findByOwner(ownerId: string, recordType: RecordType): CandidateRecord[];
  deleteByOwner(ownerId: string): number;
  countByOwner(ownerId: string): number;
}

//vectors are stored as raw float64 bytes
export function encodeVector(vector: number[]): Buffer {
  return Buffer.from(new Float64Array(vector).buffer);
}

export function decodeVector(blob: Buffer): number[] {
  //copy first: the blob's byte offset is not guaranteed to be 8-aligned
  return Array.from(new Float64Array(Uint8Array.from(blob).buffer));
}

export class CandidateRepository implements ICandidateRepository {
  constructor(private db: Database.Database) {}

  insert(r: CandidateRecord): boolean {
    const info = this.db.prepare(`INSERT OR IGNORE INTO candidate_records (id, owner_id, record_id, record_type, raw_text, vector, dimensions, created_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`)
      .run(r.id, r.ownerId, r.recordId, r.recordType, r.rawText, encodeVector(r.vector), r.vector.length, r.createdAt.toISOString());
    return info.changes > 0;
  }

  exists(ownerId: string, recordType: RecordType, recordId: string): boolean {
    return this.db.prepare(`SELECT 1 FROM candidate_records WHERE owner_id = ? AND record_type = ? AND record_id = ?`).get(ownerId, recordType, recordId) !== undefined;
  }

  findByOwner(ownerId: string, recordType: RecordType): CandidateRecord[] {
    return (this.db.prepare(`SELECT * FROM candidate_records WHERE owner_id = ? AND record_type = ? ORDER BY seq ASC`).all(ownerId, recordType) as CandidateRow[]).map(r => this.toCandidate(r));
  }

  deleteByOwner(ownerId: string): number {
    return this.db.prepare(`DELETE FROM candidate_records WHERE owner_id = ?`).run(ownerId).changes;
  }

  countByOwner(ownerId: string): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS n FROM candidate_records WHERE owner_id = ?`).get(ownerId) as { n: number };
    return row.n;
  }

  private toCandidate(r: CandidateRow): CandidateRecord {
    return { id: r.id, ownerId: r.owner_id, recordId: r.record_id, rawText: r.raw_text, vector: decodeVector(r.vector), recordType: r.record_type, createdAt: new Date(r.created_at) };
  }
}

interface CandidateRow { id: string; owner_id: string; record_id: string; record_type: RecordType; raw_text: string; vector: Buffer; dimensions: number; created_at: string; }
