export { initializeDatabase, closeDatabase } from './database.js';
export { CandidateRepository, encodeVector, decodeVector, type ICandidateRepository } from './candidate-repository.js';
export { ExtractionRepository, type IExtractionRepository, type StoredAuditEntry, type StoredTranscript } from './extraction-repository.js';
