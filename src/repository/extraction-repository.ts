//persistence for transcripts, extraction records and their audit trail
//payload columns are written and read through the record-column codec
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { AuditEntry, EvaluationSummary, ExtractionRecord, StoredConfidenceLevel } from '../models/index.js';
import { fromRecordColumns, toRecordColumns } from '../models/extraction.js';

export interface StoredTranscript { id: string; ownerId: string; transcriptText: string; createdAt: Date; }

//it keeps the audit entries linked to transcripts
export interface StoredAuditEntry extends AuditEntry { transcriptId: string; }

export interface IExtractionRepository {
  saveTranscript(transcript: StoredTranscript): void;
  findTranscript(id: string): StoredTranscript | undefined;
  //insert or replace the record for record.transcriptId
  saveExtraction(record: ExtractionRecord): void;
  //both rows in one transaction
  saveTranscriptWithExtraction(transcript: StoredTranscript, record: ExtractionRecord): void;
  findExtractionByTranscriptId(transcriptId: string): ExtractionRecord | undefined;
  findExtractionsByOwner(ownerId: string): ExtractionRecord[];
  saveAuditEntry(entry: StoredAuditEntry): void;
  getAuditTrail(transcriptId: string): AuditEntry[];
}

export class ExtractionRepository implements IExtractionRepository {
  constructor(private db: Database.Database) {}

  //transcripts
  saveTranscript(t: StoredTranscript): void {
    this.db.prepare(`INSERT INTO transcripts (id, owner_id, transcript_text, created_at) VALUES (?, ?, ?, ?) ON CONFLICT(id) DO UPDATE SET transcript_text = excluded.transcript_text`)
      .run(t.id, t.ownerId, t.transcriptText, t.createdAt.toISOString());
  }

  findTranscript(id: string): StoredTranscript | undefined {
    const row = this.db.prepare(`SELECT * FROM transcripts WHERE id = ?`).get(id) as TranscriptRow | undefined;
    return row ? { id: row.id, ownerId: row.owner_id, transcriptText: row.transcript_text, createdAt: new Date(row.created_at) } : undefined;
  }

  //extraction records
  saveExtraction(r: ExtractionRecord): void {
    const cols = toRecordColumns(r.extraction);
    this.db.prepare(`INSERT INTO extraction_results (id, transcript_id, owner_id, follow_up_tasks, medication_instructions, client_reminders, clinician_todos, custom_extractions, evaluation_results, confidence_level, flagged, reviewed_by, review_notes, reviewed_at, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(transcript_id) DO UPDATE SET
        follow_up_tasks = excluded.follow_up_tasks, medication_instructions = excluded.medication_instructions,
        client_reminders = excluded.client_reminders, clinician_todos = excluded.clinician_todos,
        custom_extractions = excluded.custom_extractions, evaluation_results = excluded.evaluation_results,
        confidence_level = excluded.confidence_level, flagged = excluded.flagged,
        reviewed_by = excluded.reviewed_by, review_notes = excluded.review_notes, reviewed_at = excluded.reviewed_at`)
      .run(
        r.id, r.transcriptId, r.ownerId,
        JSON.stringify(cols.follow_up_tasks), JSON.stringify(cols.medication_instructions), JSON.stringify(cols.client_reminders),
        JSON.stringify(cols.clinician_todos), JSON.stringify(cols.custom_extractions),
        r.evaluation ? JSON.stringify(r.evaluation) : null, r.confidenceLevel, r.flagged ? 1 : 0,
        r.reviewedBy ?? null, r.reviewNotes ?? null, r.reviewedAt?.toISOString() ?? null, r.createdAt.toISOString(),
      );
  }

  saveTranscriptWithExtraction(transcript: StoredTranscript, record: ExtractionRecord): void {
    this.db.transaction(() => {
      this.saveTranscript(transcript);
      this.saveExtraction(record);
    })();
  }

  findExtractionByTranscriptId(transcriptId: string): ExtractionRecord | undefined {
    const row = this.db.prepare(`SELECT e.*, t.transcript_text FROM extraction_results e JOIN transcripts t ON t.id = e.transcript_id WHERE e.transcript_id = ?`).get(transcriptId) as ExtractionRow | undefined;
    return row ? this.toExtractionRecord(row) : undefined;
  }

  findExtractionsByOwner(ownerId: string): ExtractionRecord[] {
    return (this.db.prepare(`SELECT e.*, t.transcript_text FROM extraction_results e JOIN transcripts t ON t.id = e.transcript_id WHERE e.owner_id = ? ORDER BY e.created_at ASC`).all(ownerId) as ExtractionRow[])
      .map(r => this.toExtractionRecord(r));
  }

  private toExtractionRecord(r: ExtractionRow): ExtractionRecord {
    const extraction = fromRecordColumns({
      follow_up_tasks: JSON.parse(r.follow_up_tasks), medication_instructions: JSON.parse(r.medication_instructions),
      client_reminders: JSON.parse(r.client_reminders), clinician_todos: JSON.parse(r.clinician_todos),
      custom_extractions: JSON.parse(r.custom_extractions),
    });
    return {
      id: r.id, transcriptId: r.transcript_id, ownerId: r.owner_id, transcriptText: r.transcript_text, extraction,
      evaluation: r.evaluation_results ? JSON.parse(r.evaluation_results) as EvaluationSummary : null,
      confidenceLevel: r.confidence_level, flagged: r.flagged === 1,
      ...(r.reviewed_by !== null && { reviewedBy: r.reviewed_by }),
      ...(r.review_notes !== null && { reviewNotes: r.review_notes }),
      ...(r.reviewed_at !== null && { reviewedAt: new Date(r.reviewed_at) }),
      createdAt: new Date(r.created_at),
    };
  }

  //audit trail
  saveAuditEntry(entry: StoredAuditEntry): void {
    this.db.prepare(`INSERT INTO audit_trail (id, transcript_id, step, timestamp, details) VALUES (?, ?, ?, ?, ?)`).run(uuidv4(), entry.transcriptId, entry.step, entry.timestamp, entry.details);
  }

  getAuditTrail(transcriptId: string): AuditEntry[] {
    return (this.db.prepare(`SELECT step, timestamp, details FROM audit_trail WHERE transcript_id = ? ORDER BY seq ASC`).all(transcriptId) as AuditEntryRow[])
      .map(r => ({ step: r.step, timestamp: r.timestamp, details: r.details }));
  }
}

//row types (DB → App mapping)
interface TranscriptRow { id: string; owner_id: string; transcript_text: string; created_at: string; }
interface ExtractionRow {
  id: string; transcript_id: string; owner_id: string; transcript_text: string;
  follow_up_tasks: string; medication_instructions: string; client_reminders: string; clinician_todos: string; custom_extractions: string;
  evaluation_results: string | null; confidence_level: StoredConfidenceLevel; flagged: number;
  reviewed_by: string | null; review_notes: string | null; reviewed_at: string | null; created_at: string;
}
interface AuditEntryRow { step: AuditEntry['step']; timestamp: string; details: string; }
