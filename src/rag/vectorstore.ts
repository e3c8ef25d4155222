// Vector store
/**
 * Vector Store Module
 *
 * Stores one entry per indexed question variant: the embedding, the variant
 * text, and the answer/metadata of the record it belongs to. Several entries
 * (the original question and its rewordings) share one `recordId`.
 *
 * DATA MODEL:
 * -----------
 * - id:        "<recordId>:<variant>", unique per entry
 * - recordId:  logical id of the question-answer record
 * - variant:   0 for the canonical question, 1..N for rewordings
 * - text:      the question text that was embedded
 * - answer:    shared by every variant of the record (null = unanswered)
 * - metadata:  scalar key/values, used for filtering only
 * - indexedAt: ISO timestamp of the add that created the record
 * - seq:       insertion sequence assigned by the index; kept when an entry is
 *              overwritten, so it orders records by when they were first added
 *
 * `SimpleVectorStore` keeps everything in memory and, when given a path,
 * rewrites a JSON file after every mutation. It is a brute-force index: fine
 * for a personal knowledge base, not for millions of entries.
 */

import { z } from 'zod';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { createModuleLogger } from '../utils/logger.js';
import { VectorIndexError, errorMessage } from '../utils/errors.js';
import { cosineSimilarity, euclideanDistance } from './embeddings.js';

const logger = createModuleLogger('vectorstore');

export type MetadataValue = string | number | boolean;
export type Metadata = Record<string, MetadataValue>;

/**
 * Exact-match filter: every key given must be present with an equal value.
 */
export type MetadataFilter = Metadata;

/**
 * `cosine`: distance = 1 - cosine similarity (0..2).
 * `l2`: Euclidean distance (0..∞).
 */
export type DistanceMetric = 'cosine' | 'l2';

export interface IndexEntry {
  id: string;
  recordId: string;
  variant: number;
  text: string;
  answer: string | null;
  metadata: Metadata;
  embedding: number[];
  indexedAt: string;
  seq: number;
}

/**
 * What callers hand to `upsert`. The index owns `seq`.
 */
export type IndexEntryInput = Omit<IndexEntry, 'seq'>;

/**
 * Nearest-neighbour hit. Lower distance means more similar.
 */
export type IndexMatch = Omit<IndexEntry, 'embedding'> & { distance: number };

export interface IndexQueryOptions {
  k: number;
  filter?: MetadataFilter;
}

export interface IndexListOptions {
  recordId?: string;
  filter?: MetadataFilter;
}

/**
 * Persistent store of question-variant vectors.
 */
export interface VectorIndex {
  readonly metric: DistanceMetric;
  upsert(entry: IndexEntryInput): Promise<void>;
  query(vector: number[], options: IndexQueryOptions): Promise<IndexMatch[]>;
  get(ids: string[]): Promise<IndexEntry[]>;
  list(options?: IndexListOptions): Promise<IndexEntry[]>;
  delete(ids: string[]): Promise<void>;
  count(): Promise<number>;
  clear(): Promise<void>;
}

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const IndexEntrySchema = z.object({
  id: z.string(),
  recordId: z.string(),
  variant: z.number().int().min(0),
  text: z.string(),
  answer: z.string().nullable(),
  metadata: MetadataSchema,
  embedding: z.array(z.number()),
  indexedAt: z.string(),
  seq: z.number().int().min(0),
});

const StoreFileSchema = z.object({
  version: z.literal(1),
  metric: z.enum(['cosine', 'l2']),
  entries: z.array(IndexEntrySchema),
});

type StoreFile = z.infer<typeof StoreFileSchema>;

/**
 * Whether `metadata` satisfies every key of `filter`.
 */
export function matchesFilter(metadata: Metadata, filter: MetadataFilter | undefined): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(
    ([key, value]) => Object.prototype.hasOwnProperty.call(metadata, key) && metadata[key] === value
  );
}

function withoutEmbedding(entry: IndexEntry): Omit<IndexEntry, 'embedding'> {
  const { embedding: _embedding, ...rest } = entry;
  return { ...rest, metadata: { ...rest.metadata } };
}

export interface SimpleVectorStoreOptions {
  // JSON file to load from and persist to; omit for a purely in-memory store
  persistPath?: string;
  metric?: DistanceMetric;
}

/**
 * In-memory vector store with optional file persistence.
 */
export class SimpleVectorStore implements VectorIndex {
  readonly metric: DistanceMetric;
  private entries: Map<string, IndexEntry> = new Map();
  private nextSeq = 0;
  private readonly persistPath: string | undefined;
  private initialized = false;

  constructor(options: SimpleVectorStoreOptions = {}) {
    this.persistPath = options.persistPath;
    this.metric = options.metric ?? 'cosine';
  }

  /**
   * Load persisted entries. Called lazily by every operation; safe to call
   * more than once.
   *
   * @throws VectorIndexError when the file is unreadable, malformed, or was
   *   written with a different distance metric
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    if (this.persistPath) {
      const dir = dirname(this.persistPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }

      if (existsSync(this.persistPath)) {
        let parsed: StoreFile;
        try {
          parsed = StoreFileSchema.parse(JSON.parse(readFileSync(this.persistPath, 'utf-8')));
        } catch (error) {
          throw new VectorIndexError(
            `Could not load vector store at ${this.persistPath}: ${errorMessage(error)}`,
            { cause: error }
          );
        }

        if (parsed.metric !== this.metric) {
          throw new VectorIndexError(
            `Vector store at ${this.persistPath} uses the ${parsed.metric} metric, not ${this.metric}`
          );
        }

        this.entries = new Map(parsed.entries.map((entry) => [entry.id, entry]));
        this.nextSeq = parsed.entries.reduce((max, entry) => Math.max(max, entry.seq + 1), 0);
        logger.info(`Loaded ${this.entries.size} entries from disk`);
      }
    }

    this.initialized = true;
  }

  private persist(): void {
    if (!this.persistPath) return;

    const data: StoreFile = {
      version: 1,
      metric: this.metric,
      entries: [...this.entries.values()],
    };

    try {
      writeFileSync(this.persistPath, JSON.stringify(data));
    } catch (error) {
      logger.error(`Failed to persist data: ${errorMessage(error)}`);
      throw new VectorIndexError(`Failed to persist vector store: ${errorMessage(error)}`, { cause: error });
    }
  }

  private distance(a: number[], b: number[]): number {
    try {
      return this.metric === 'cosine' ? 1 - cosineSimilarity(a, b) : euclideanDistance(a, b);
    } catch (error) {
      throw new VectorIndexError(`Distance computation failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async upsert(entry: IndexEntryInput): Promise<void> {
    await this.initialize();

    const existing = this.entries.get(entry.id);
    this.entries.set(entry.id, {
      ...entry,
      metadata: { ...entry.metadata },
      embedding: [...entry.embedding],
      seq: existing ? existing.seq : this.nextSeq++,
    });
    this.persist();
    logger.debug(`Upserted entry ${entry.id}`);
  }

  async query(vector: number[], options: IndexQueryOptions): Promise<IndexMatch[]> {
    await this.initialize();

    const { k, filter } = options;
    if (k <= 0) return [];

    const matches: IndexMatch[] = [];

    for (const entry of this.entries.values()) {
      if (!matchesFilter(entry.metadata, filter)) continue;

      matches.push({
        ...withoutEmbedding(entry),
        distance: this.distance(vector, entry.embedding),
      });
    }

    // Sort by distance ascending; equal distances keep insertion order
    matches.sort((a, b) => a.distance - b.distance);
    logger.debug(`Query returned ${Math.min(k, matches.length)} of ${matches.length} candidates`);
    return matches.slice(0, k);
  }

  async get(ids: string[]): Promise<IndexEntry[]> {
    await this.initialize();

    const results: IndexEntry[] = [];
    for (const id of ids) {
      const entry = this.entries.get(id);
      if (entry) results.push({ ...entry, metadata: { ...entry.metadata }, embedding: [...entry.embedding] });
    }
    return results;
  }

  async list(options: IndexListOptions = {}): Promise<IndexEntry[]> {
    await this.initialize();

    const { recordId, filter } = options;
    const results: IndexEntry[] = [];
    for (const entry of this.entries.values()) {
      if (recordId !== undefined && entry.recordId !== recordId) continue;
      if (!matchesFilter(entry.metadata, filter)) continue;
      results.push({ ...entry, metadata: { ...entry.metadata }, embedding: [...entry.embedding] });
    }
    return results;
  }

  async delete(ids: string[]): Promise<void> {
    await this.initialize();

    if (ids.length === 0) return;

    for (const id of ids) {
      this.entries.delete(id);
    }
    this.persist();
    logger.info(`Deleted ${ids.length} entries`);
  }

  async count(): Promise<number> {
    await this.initialize();
    return this.entries.size;
  }

  async clear(): Promise<void> {
    await this.initialize();

    this.entries.clear();
    this.nextSeq = 0;
    this.persist();
    logger.warn('Cleared all entries from vector store');
  }
}
