// src/repositories/VectorStoreRepository.ts
import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { IndexEntry, ScoredIndexEntry } from '../Types/model';
import { IndexNotFoundError } from '../utils/errors';

const indexEntrySchema = z.object({
  id: z.string(),
  text: z.string(),
  embedding: z.array(z.number()),
  metadata: z.object({
    sender: z.string(),
    subject: z.string(),
    date: z.string(),
    id: z.string(),
  }),
});

const collectionFileSchema = z.object({
  name: z.string(),
  dimension: z.number().int().nonnegative().nullable(),
  entries: z.array(indexEntrySchema),
});

type CollectionFile = z.infer<typeof collectionFileSchema>;

// Tail of the pending appends per collection file, shared by every store in the process
const pendingAppends = new Map<string, Promise<void>>();

export interface VectorStore {
  readonly directory: string;
  exists(collection: string): Promise<boolean>;
  append(collection: string, entries: IndexEntry[]): Promise<void>;
  search(collection: string, embedding: number[], k: number): Promise<ScoredIndexEntry[]>;
  count(collection: string): Promise<number>;
  ids(collection: string): Promise<string[]>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Directory-backed vector store: one JSON document per collection.
 * Appends never replace existing entries.
 */
export class LocalVectorStore implements VectorStore {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  private collectionPath(collection: string): string {
    if (!/^[A-Za-z0-9._-]+$/.test(collection)) {
      throw new Error(`Invalid collection name '${collection}'`);
    }
    return path.join(this.directory, `${collection}.json`);
  }

  async exists(collection: string): Promise<boolean> {
    try {
      await fs.promises.access(this.collectionPath(collection));
      return true;
    } catch {
      return false;
    }
  }

  private async read(collection: string): Promise<CollectionFile> {
    if (!(await this.exists(collection))) {
      throw new IndexNotFoundError(
        `Vector store not found at '${this.directory}' (collection '${collection}'). ` +
        'Please run the ingestion workflow to fetch and index emails first.'
      );
    }
    const raw = await fs.promises.readFile(this.collectionPath(collection), 'utf8');
    return collectionFileSchema.parse(JSON.parse(raw));
  }

  private async write(file: CollectionFile): Promise<void> {
    const target = this.collectionPath(file.name);
    const temp = `${target}.${randomUUID()}.tmp`;
    await fs.promises.mkdir(this.directory, { recursive: true });
    await fs.promises.writeFile(temp, JSON.stringify(file), 'utf8');
    await fs.promises.rename(temp, target);
  }

  /**
   * Appends run one at a time per collection, so concurrent batches are never lost.
   */
  async append(collection: string, entries: IndexEntry[]): Promise<void> {
    const key = this.collectionPath(collection);
    const previous = pendingAppends.get(key) ?? Promise.resolve();
    const run = previous.then(() => this.appendNow(collection, entries));
    // The queue only orders writes; `run` carries any failure to this caller
    const tail = run.then(() => undefined, () => undefined);
    pendingAppends.set(key, tail);

    try {
      await run;
    } finally {
      if (pendingAppends.get(key) === tail) {
        pendingAppends.delete(key);
      }
    }
  }

  private async appendNow(collection: string, entries: IndexEntry[]): Promise<void> {
    const file: CollectionFile = (await this.exists(collection))
      ? await this.read(collection)
      : { name: collection, dimension: null, entries: [] };

    for (const entry of entries) {
      if (file.dimension === null) {
        file.dimension = entry.embedding.length;
      } else if (entry.embedding.length !== file.dimension) {
        throw new Error(
          `Embedding dimension mismatch in collection '${collection}': expected ${file.dimension}, got ${entry.embedding.length}`
        );
      }
      file.entries.push(entry);
    }

    await this.write(file);
  }

  /**
   * Ranks by cosine similarity, highest first. Equal scores keep insertion order.
   */
  async search(collection: string, embedding: number[], k: number): Promise<ScoredIndexEntry[]> {
    const file = await this.read(collection);
    if (k <= 0) return [];

    return file.entries
      .map((entry, position) => ({ entry, position, score: cosineSimilarity(entry.embedding, embedding) }))
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, k)
      .map(({ entry, score }) => ({ ...entry, score }));
  }

  async count(collection: string): Promise<number> {
    return (await this.read(collection)).entries.length;
  }

  async ids(collection: string): Promise<string[]> {
    return (await this.read(collection)).entries.map(entry => entry.id);
  }
}
