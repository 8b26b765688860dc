import { describe, it, expect } from 'vitest';
import pLimit from 'p-limit';
import { EmbeddingService } from '../src/services/embedder.js';
import { EmbeddingCache } from '../src/services/embedding-cache.js';
import { KeywordEmbedder } from './setup.js';

describe('EmbeddingService', () => {
  it('counts one miss for a cold lookup and one hit for a repeat', async () => {
    const cache = new EmbeddingCache();
    const model = new KeywordEmbedder();
    const embedder = new EmbeddingService(model, cache, pLimit(1));

    await embedder.embed('ear infection, ear drops');
    await embedder.embed('  Ear infection,   ear drops ');

    expect(model.calls).toHaveLength(1);
    expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1, hitRate: 0.5 });
  });

  it('counts a near-duplicate reuse as a single hit', async () => {
    const cache = new EmbeddingCache();
    const model = new KeywordEmbedder();
    const embedder = new EmbeddingService(model, cache, pLimit(1), { nearDuplicateThreshold: 0.8 });

    const first = await embedder.embed('ear infection left ear drops');
    const second = await embedder.embed('ear infection left ear drops today');

    expect(model.calls).toEqual(['ear infection left ear drops']);
    expect(second).toEqual(first);
    expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1, hitRate: 0.5 });
  });
});
