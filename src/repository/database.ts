//database schema and initialization for transcripts, extraction records, the similarity index and the audit trail

import Database from 'better-sqlite3';

//SQL SCHEMA DEFINITION
const SCHEMA = `
-- Similarity index, partitioned by owner
CREATE TABLE IF NOT EXISTS candidate_records (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  owner_id TEXT NOT NULL,
  record_id TEXT NOT NULL,
  record_type TEXT NOT NULL CHECK (record_type IN ('transcript', 'extraction')),
  raw_text TEXT NOT NULL,
  vector BLOB NOT NULL,
  dimensions INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  UNIQUE(owner_id, record_type, record_id)
);

CREATE INDEX IF NOT EXISTS idx_candidate_records_owner ON candidate_records(owner_id, record_type);

-- Transcripts
CREATE TABLE IF NOT EXISTS transcripts (
  id TEXT PRIMARY KEY,
  owner_id TEXT NOT NULL,
  transcript_text TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_transcripts_owner ON transcripts(owner_id);

-- Extraction results, one per transcript
CREATE TABLE IF NOT EXISTS extraction_results (
  id TEXT PRIMARY KEY,
  transcript_id TEXT NOT NULL UNIQUE REFERENCES transcripts(id) ON DELETE CASCADE,
  owner_id TEXT NOT NULL,
  follow_up_tasks TEXT NOT NULL DEFAULT '[]',
  medication_instructions TEXT NOT NULL DEFAULT '[]',
  client_reminders TEXT NOT NULL DEFAULT '[]',
  clinician_todos TEXT NOT NULL DEFAULT '[]',
  custom_extractions TEXT NOT NULL DEFAULT '{}',
  evaluation_results TEXT,
  confidence_level TEXT NOT NULL,
  flagged INTEGER NOT NULL DEFAULT 0,
  reviewed_by TEXT,
  review_notes TEXT,
  reviewed_at TEXT,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_extraction_results_owner ON extraction_results(owner_id);
CREATE INDEX IF NOT EXISTS idx_extraction_results_confidence ON extraction_results(confidence_level);

-- Audit Trail Table
CREATE TABLE IF NOT EXISTS audit_trail (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  transcript_id TEXT NOT NULL,
  step TEXT NOT NULL,
  timestamp TEXT NOT NULL,
  details TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_audit_trail_transcript_id ON audit_trail(transcript_id);
`;

//initializing the database
//WAL: concurrent readers while a single writer commits
export function initializeDatabase(dbPath: string = ':memory:'): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(SCHEMA);

  return db;
}

export function closeDatabase(db: Database.Database): void {
  db.close();
}
