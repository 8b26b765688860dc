//cache-first embedding through the bounded worker pool
import type { LimitFunction } from 'p-limit';
import type { EmbeddingModel } from '../models/index.js';
import { attempt, ok, unavailable, type Result } from '../utils/result.js';
import { createLogger } from '../utils/logger.js';
import type { IEmbeddingCache } from './embedding-cache.js';

const log = createLogger('embedder');

export interface IEmbeddingService {
  readonly available: boolean;
  readonly modelName: string | undefined;
  embed(text: string): Promise<Result<number[]>>;
}

export interface EmbeddingServiceOptions {
  //token-overlap share at which a cached near-duplicate is reused
  nearDuplicateThreshold?: number;
}

export class EmbeddingService implements IEmbeddingService {
  private readonly nearDuplicateThreshold: number;

  constructor(
    private model: EmbeddingModel | undefined,
    private cache: IEmbeddingCache,
    private limit: LimitFunction,
    options: EmbeddingServiceOptions = {}
  ) {
    this.nearDuplicateThreshold = options.nearDuplicateThreshold ?? 0.95;
  }

  get available(): boolean {
    return this.model !== undefined;
  }

  get modelName(): string | undefined {
    return this.model?.name;
  }

  async embed(text: string): Promise<Result<number[]>> {
    //getSimilar checks the exact hash first, so one call is one counted lookup
    const cached = this.cache.getSimilar(text, this.nearDuplicateThreshold)?.vector;
    if (cached) return ok(cached);

    const model = this.model;
    if (!model) return unavailable('embedding-model', 'no embedding model configured');

    const result = await attempt('embedding-model', () => this.limit(() => model.embed(text)));
    if (!result.ok) {
      log.warn(`Embedding failed: ${result.error.reason}`);
      return result;
    }
    if (result.value.length === 0 || result.value.some(v => !Number.isFinite(v))) {
      log.warn('Embedding model returned an empty or non-finite vector');
      return unavailable('embedding-model', 'invalid vector');
    }
    this.cache.put(text, result.value);
    return result;
  }
}
