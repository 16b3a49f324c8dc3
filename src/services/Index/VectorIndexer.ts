// src/services/Index/VectorIndexer.ts

import { randomUUID } from 'crypto';
import type { EmbeddingProvider, IndexEntry } from '../../Types/model';
import { LocalVectorStore, type VectorStore } from '../../repositories/VectorStoreRepository';
import { EmptyInputError, IndexNotFoundError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import DebugLogger from '../../utils/DebugLogger';
import type { IEmailRecordBuilder } from '../Email/interfaces';

export interface VectorIndexHandle {
  store: VectorStore;
  collection: string;
}

export interface IndexLocation {
  collection?: string;
  persistDirectory?: string;
}

export interface IndexResult {
  handle: VectorIndexHandle;
  ids: string[];
}

export type VectorStoreFactory = (directory: string) => VectorStore;

export class VectorIndexer {
  private logger = createLogger('VectorIndexer');

  constructor(
    private embeddings: EmbeddingProvider,
    private recordBuilder: IEmailRecordBuilder,
    private defaults: { collection: string; persistDirectory: string },
    private storeFactory: VectorStoreFactory = directory => new LocalVectorStore(directory)
  ) {}

  /**
   * Embeds and appends every record. Re-indexing the same records adds new entries.
   */
  async index(records: readonly unknown[], location: IndexLocation = {}): Promise<IndexResult> {
    if (records.length === 0) {
      throw new EmptyInputError('Email list cannot be empty');
    }

    // Validate the whole batch before any embedding work
    const valid = this.recordBuilder.validate(records);

    const texts = valid.map(record => this.recordBuilder.toCanonicalText(record));
    const vectors = await this.embeddings.embedDocuments(texts);

    const entries: IndexEntry[] = valid.map((record, i) => {
      const id = randomUUID();
      return {
        id,
        text: texts[i],
        embedding: vectors[i],
        metadata: {
          sender: record.sender,
          subject: record.subject,
          date: record.date,
          id,
        },
      };
    });

    const handle = this.handleFor(location);
    await handle.store.append(handle.collection, entries);

    this.logger.info(`Indexed ${entries.length} emails into '${handle.collection}' at ${handle.store.directory}`);
    DebugLogger.log('[VectorIndexer] Indexed batch', { collection: handle.collection, ids: entries.map(e => e.id) });

    return { handle, ids: entries.map(entry => entry.id) };
  }

  /**
   * Opens an existing collection for similarity search.
   */
  async open(location: IndexLocation = {}): Promise<VectorIndexHandle> {
    const handle = this.handleFor(location);
    if (!(await handle.store.exists(handle.collection))) {
      throw new IndexNotFoundError(
        `Vector store not found at '${handle.store.directory}' (collection '${handle.collection}'). ` +
        'Please run the ingestion workflow to fetch and index emails first.'
      );
    }
    return handle;
  }

  private handleFor(location: IndexLocation): VectorIndexHandle {
    return {
      store: this.storeFactory(location.persistDirectory ?? this.defaults.persistDirectory),
      collection: location.collection ?? this.defaults.collection,
    };
  }
}
