/**
 * Visit action memory
 *
 * Retrieval-augmented extraction of action items from medical-visit transcripts:
 * similar prior cases become few-shot context, gold-standard comparisons become a
 * confidence tier, and only high-confidence extractions are saved without review.
 */

export * from './models/index.js';
export {
  parseExtractionPayload, emptyExtractionPayload, countExtractedItems, fromRecordColumns, toRecordColumns, extractionToText,
  ExtractionPayloadSchema,
} from './models/extraction.js';
export * from './services/index.js';
export * from './repository/index.js';
export * from './errors.js';
export { loadPipelineConfig, loadEnvFile, PipelineConfigSchema, type PipelineConfig, type PipelineConfigInput, type ConfidenceThresholds, type SearchStep } from './config/index.js';
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './utils/logger.js';
export { ok, unavailable, unwrapOr, attempt, type Result, type Unavailable } from './utils/result.js';
