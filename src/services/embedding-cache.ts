//memoized embeddings keyed by the hash of normalized text, with LRU-style eviction and an optional JSON snapshot
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { CachedEmbedding } from '../models/index.js';
import { computeHash } from '../utils/hash.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { jaccard } from '../utils/math.js';
import { normalizeText } from './normalizer.js';

const log = createLogger('embedding-cache');

//an eviction pass trims down to this share of capacity
const EVICTION_TARGET = 0.8;

const SnapshotSchema = z.object({
  version: z.literal(1),
  entries: z.array(z.object({
    contentHash: z.string(),
    vector: z.array(z.number()),
    normalizedText: z.string(),
    createdAt: z.string(),
    accessCount: z.number().int().nonnegative(),
    lastAccessedAt: z.string(),
  })),
});

export interface EmbeddingCacheOptions {
  capacity?: number;
  storagePath?: string;
  saveEvery?: number;
  clock?: () => Date;
}

export interface CacheStats {
  totalEntries: number;
  capacity: number;
  utilization: number;
  totalAccesses: number;
  avgAccessCount: number;
  hits: number;
  misses: number;
  hitRate: number;
  oldestEntry?: Date;
  newestEntry?: Date;
}

export interface SimilarEmbedding { vector: number[]; similarity: number; }

export interface IEmbeddingCache {
  get(text: string): number[] | undefined;
  getSimilar(text: string, threshold?: number): SimilarEmbedding | undefined;
  put(text: string, vector: number[]): void;
  getStats(): CacheStats;
  clear(): void;
  flush(): void;
}

const cacheKeyText = (text: string) => normalizeText(text).toLowerCase();
const tokens = (text: string) => new Set(text.split(' ').filter(Boolean));

export class EmbeddingCache implements IEmbeddingCache {
  private entries = new Map<string, CachedEmbedding>();
  private readonly capacity: number;
  private readonly saveEvery: number;
  private readonly storagePath?: string;
  private readonly clock: () => Date;
  private unsavedEntries = 0;
  private hits = 0;
  private misses = 0;

  constructor(options: EmbeddingCacheOptions = {}) {
    this.capacity = options.capacity ?? 1000;
    this.saveEvery = options.saveEvery ?? 10;
    this.clock = options.clock ?? (() => new Date());
    if (options.storagePath) {
      this.storagePath = options.storagePath;
      this.load(options.storagePath);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(text: string): number[] | undefined {
    const entry = this.entries.get(computeHash(cacheKeyText(text)));
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    this.touch(entry);
    return entry.vector;
  }

  //exact hash hit first, then the best token overlap at or above the threshold; one hit or miss per call
  getSimilar(text: string, threshold: number = 0.95): SimilarEmbedding | undefined {
    const keyText = cacheKeyText(text);
    const exact = this.entries.get(computeHash(keyText));
    if (exact) {
      this.hits++;
      this.touch(exact);
      return { vector: exact.vector, similarity: 1 };
    }

    const wanted = tokens(keyText);
    let best: { entry: CachedEmbedding; similarity: number } | undefined;
    for (const entry of this.entries.values()) {
      const similarity = jaccard(wanted, tokens(entry.normalizedText));
      if (similarity >= threshold && (!best || similarity > best.similarity)) best = { entry, similarity };
    }
    if (!best) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    this.touch(best.entry);
    return { vector: best.entry.vector, similarity: best.similarity };
  }

  put(text: string, vector: number[]): void {
    const normalized = cacheKeyText(text);
    const contentHash = computeHash(normalized);
    const existing = this.entries.get(contentHash);
    if (existing) {
      this.touch(existing);
      return;
    }

    const now = this.clock();
    this.entries.set(contentHash, { vector: [...vector], contentHash, normalizedText: normalized, createdAt: now, accessCount: 1, lastAccessedAt: now });
    this.evict();

    if (++this.unsavedEntries >= this.saveEvery) this.flush();
  }

  getStats(): CacheStats {
    const all = [...this.entries.values()];
    const totalAccesses = all.reduce((sum, e) => sum + e.accessCount, 0);
    const lookups = this.hits + this.misses;
    const created = all.map(e => e.createdAt.getTime());
    return {
      totalEntries: all.length,
      capacity: this.capacity,
      utilization: all.length / this.capacity,
      totalAccesses,
      avgAccessCount: all.length ? totalAccesses / all.length : 0,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups ? this.hits / lookups : 0,
      ...(all.length > 0 && { oldestEntry: new Date(Math.min(...created)), newestEntry: new Date(Math.max(...created)) }),
    };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.flush();
  }

  //write the snapshot now; a no-op without a storage path
  flush(): void {
    this.unsavedEntries = 0;
    if (!this.storagePath) return;
    const snapshot: z.input<typeof SnapshotSchema> = {
      version: 1,
      entries: [...this.entries.values()].map(e => ({
        contentHash: e.contentHash, vector: e.vector, normalizedText: e.normalizedText,
        createdAt: e.createdAt.toISOString(), accessCount: e.accessCount, lastAccessedAt: e.lastAccessedAt.toISOString(),
      })),
    };
    try {
      fs.mkdirSync(path.dirname(this.storagePath), { recursive: true });
      fs.writeFileSync(this.storagePath, JSON.stringify(snapshot));
    } catch (err) {
      log.warn(`Failed to save cache snapshot to ${this.storagePath}: ${errorMessage(err)}`);
    }
  }

  private touch(entry: CachedEmbedding): void {
    entry.accessCount++;
    entry.lastAccessedAt = this.clock();
  }

  //oldest-accessed first; ties keep insertion order
  private evict(): void {
    if (this.entries.size <= this.capacity) return;
    const removeCount = this.entries.size - Math.floor(this.capacity * EVICTION_TARGET);
    const oldest = [...this.entries.values()]
      .sort((a, b) => a.lastAccessedAt.getTime() - b.lastAccessedAt.getTime())
      .slice(0, removeCount);
    for (const entry of oldest) this.entries.delete(entry.contentHash);
    log.debug(`Evicted ${oldest.length} entries, ${this.entries.size} remain`);
  }

  private load(storagePath: string): void {
    if (!fs.existsSync(storagePath)) return;
    try {
      const snapshot = SnapshotSchema.parse(JSON.parse(fs.readFileSync(storagePath, 'utf8')));
      for (const e of snapshot.entries) {
        this.entries.set(e.contentHash, {
          vector: e.vector, contentHash: e.contentHash, normalizedText: e.normalizedText,
          createdAt: new Date(e.createdAt), accessCount: e.accessCount, lastAccessedAt: new Date(e.lastAccessedAt),
        });
      }
      this.evict();
      log.info(`Loaded ${this.entries.size} cached embeddings`);
    } catch (err) {
      this.entries.clear();
      log.warn(`Ignoring unreadable cache snapshot ${storagePath}: ${errorMessage(err)}`);
    }
  }
}
