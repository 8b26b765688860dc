//pipeline configuration: every threshold and limit in one zod schema, overridable from EXTRACTION_* env vars
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { setLogLevel } from '../utils/logger.js';

const unit = z.number().min(0).max(1);

const SearchStepSchema = z.object({
  threshold: unit,
  limit: z.number().int().positive(),
  rerank: z.boolean().default(false),
});

export const PipelineConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  //shared partition holding curated cases with gold-standard extractions
  referenceOwnerId: z.string().min(1).default('reference-pool'),

  cache: z.object({
    capacity: z.number().int().positive().default(1000),
    storagePath: z.string().optional(),
    saveEvery: z.number().int().positive().default(10),
    nearDuplicateThreshold: unit.default(0.95),
  }).default({}),

  //bounded pool for embedding and reranker inference
  workerPool: z.object({
    concurrency: z.number().int().positive().default(4),
  }).default({}),

  retrieval: z.object({
    contextLimit: z.number().int().positive().default(10),
    contextThreshold: unit.default(0.3),
    rerankTopK: z.number().int().positive().default(5),
  }).default({}),

  reranker: z.object({
    originalWeight: unit.default(0.3),
    rerankerWeight: unit.default(0.7),
  }).default({}),

  context: z.object({
    tokenBudget: z.number().int().positive().default(2000),
    minRelevanceThreshold: unit.default(0.6),
    maxContexts: z.number().int().positive().default(5),
    //past this many accepted, only near-certain candidates get in
    softCap: z.number().int().positive().default(3),
    softCapRelevance: unit.default(0.9),
    previewChars: z.number().int().positive().default(500),
    itemsPerCategory: z.number().int().positive().default(2),
  }).default({}),

  evaluation: z.object({
    searchPolicy: z.array(SearchStepSchema).min(1).default([
      { threshold: 0.3, limit: 10, rerank: true },
      { threshold: 0.1, limit: 15, rerank: false },
      { threshold: 0.05, limit: 20, rerank: false },
    ]),
    singleThreshold: unit.default(0.8),
    fewThreshold: unit.default(0.6),
    fewCount: z.number().int().positive().default(3),
    multipleCount: z.number().int().positive().default(5),
    aggregationMethod: z.enum(['weighted', 'average', 'robust']).default('weighted'),
    llmTimeoutMs: z.number().int().nonnegative().default(60000),
  }).default({}),

  //confidence resolver cascade, checked top to bottom
  confidence: z.object({
    strongOverall: unit.default(0.9),
    strongBest: unit.default(0.9),
    llmHighOverall: unit.default(0.8),
    llmHighBest: unit.default(0.7),
    llmMediumOverall: unit.default(0.6),
    llmMediumBest: unit.default(0.5),
    llmHighBestOnly: unit.default(0.8),
    highOverall: unit.default(0.85),
    highBest: unit.default(0.8),
    mediumOverall: unit.default(0.7),
    mediumBest: unit.default(0.6),
  }).default({}),

  refinement: z.object({
    highItemCount: z.number().int().nonnegative().default(5),
    mediumItemCount: z.number().int().nonnegative().default(2),
  }).default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
export type ConfidenceThresholds = PipelineConfig['confidence'];
export type SearchStep = z.infer<typeof SearchStepSchema>;

//first existing candidate wins: EXTRACTION_ENV_FILE, then ./.env
export function loadEnvFile(cwd: string = process.cwd()): string | undefined {
  const candidates = [process.env.EXTRACTION_ENV_FILE, path.resolve(cwd, '.env')];
  for (const envPath of candidates) {
    if (envPath && fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      return envPath;
    }
  }
  return undefined;
}

function numberEnv(name: string, env: NodeJS.ProcessEnv): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  return parsed;
}

function textEnv(name: string, env: NodeJS.ProcessEnv): string | undefined {
  const raw = env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

/**
 * Build the pipeline configuration.
 *
 * Environment variables:
 *   EXTRACTION_LOG_LEVEL        debug | info | warn | error | silent (default: info)
 *   EXTRACTION_REFERENCE_OWNER  owner id of the reference pool (default: reference-pool)
 *   EXTRACTION_CACHE_CAPACITY   embedding cache entries (default: 1000)
 *   EXTRACTION_CACHE_PATH       JSON snapshot of the embedding cache (default: none)
 *   EXTRACTION_POOL_SIZE        concurrent embedding/reranker calls (default: 4)
 *   EXTRACTION_TOKEN_BUDGET     context window budget in tokens (default: 2000)
 *   EXTRACTION_MIN_RELEVANCE    minimum context relevance (default: 0.6)
 *   EXTRACTION_AGGREGATION      weighted | average | robust (default: weighted)
 *   EXTRACTION_LLM_TIMEOUT_MS   deadline for extraction and evaluation calls (default: 60000)
 *
 * Explicit overrides win over the environment, group by group.
 */
export function loadPipelineConfig(overrides?: PipelineConfigInput, env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const fromEnv = {
    logLevel: textEnv('EXTRACTION_LOG_LEVEL', env),
    referenceOwnerId: textEnv('EXTRACTION_REFERENCE_OWNER', env),
    cache: { capacity: numberEnv('EXTRACTION_CACHE_CAPACITY', env), storagePath: textEnv('EXTRACTION_CACHE_PATH', env) },
    workerPool: { concurrency: numberEnv('EXTRACTION_POOL_SIZE', env) },
    context: {
      tokenBudget: numberEnv('EXTRACTION_TOKEN_BUDGET', env),
      minRelevanceThreshold: numberEnv('EXTRACTION_MIN_RELEVANCE', env),
    },
    evaluation: {
      aggregationMethod: textEnv('EXTRACTION_AGGREGATION', env),
      llmTimeoutMs: numberEnv('EXTRACTION_LLM_TIMEOUT_MS', env),
    },
  };

  const config = PipelineConfigSchema.parse({
    ...overrides,
    logLevel: overrides?.logLevel ?? fromEnv.logLevel,
    referenceOwnerId: overrides?.referenceOwnerId ?? fromEnv.referenceOwnerId,
    cache: { ...fromEnv.cache, ...overrides?.cache },
    workerPool: { ...fromEnv.workerPool, ...overrides?.workerPool },
    context: { ...fromEnv.context, ...overrides?.context },
    evaluation: { ...fromEnv.evaluation, ...overrides?.evaluation },
  });

  setLogLevel(config.logLevel);
  return config;
}
