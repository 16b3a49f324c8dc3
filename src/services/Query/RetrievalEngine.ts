// src/services/Query/RetrievalEngine.ts

import type { EmbeddingProvider, RetrievalContext, ScoredIndexEntry } from '../../Types/model';
import { IndexNotFoundError, QueryFailedError } from '../../utils/errors';
import DebugLogger from '../../utils/DebugLogger';
import type { VectorIndexHandle } from '../Index/VectorIndexer';

/**
 * Numbered context blocks in ranked order.
 */
export function formatContext(entries: ScoredIndexEntry[]): string {
  return entries
    .map((entry, i) => `\n--- Email ${i + 1} ---\n${entry.text}\n`)
    .join('');
}

export class RetrievalEngine {
  constructor(
    private embeddings: EmbeddingProvider,
    private defaultK: number
  ) {}

  /**
   * Top-k most similar emails for the query. Ties follow the store's insertion order.
   */
  async retrieve(handle: VectorIndexHandle, query: string, k: number = this.defaultK): Promise<RetrievalContext> {
    if (!Number.isInteger(k) || k < 0) {
      throw new QueryFailedError(`Result count must be a non-negative integer, got ${k}`);
    }
    if (!(await handle.store.exists(handle.collection))) {
      throw new IndexNotFoundError(
        `Vector store not found at '${handle.store.directory}' (collection '${handle.collection}').`
      );
    }
    if (k === 0) {
      return { entries: [], text: '' };
    }

    const queryEmbedding = await this.embeddings.embedQuery(query);
    const entries = await handle.store.search(handle.collection, queryEmbedding, k);

    DebugLogger.log('[RetrievalEngine] Retrieved emails', {
      query,
      k,
      results: entries.map(entry => ({ id: entry.id, score: entry.score, subject: entry.metadata.subject }))
    });

    return { entries, text: formatContext(entries) };
  }
}
