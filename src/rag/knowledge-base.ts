/**
 * Knowledge Base
 *
 * Stores question-answer records and answers new questions by semantic
 * similarity. Each record is indexed once per question variant (the original
 * plus any rewordings); every variant carries the record's id, answer and
 * metadata, so a query that hits several variants still returns the record
 * once.
 *
 * Collaborators are passed in at construction. Nothing here is a module-level
 * singleton, so several knowledge bases can live in one process and tests can
 * run against in-memory fakes.
 *
 * WRITES:
 * -------
 * addQA issues one embed + one upsert per variant, in order. There is no
 * transaction across them: a failure halfway leaves the earlier variants
 * indexed. Callers adding the same id concurrently must serialize themselves.
 */

import { randomUUID } from 'crypto';
import { createModuleLogger } from '../utils/logger.js';
import {
  AmbiguousQuestionError,
  ConfigError,
  DuplicateRecordError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';
import type { EmbeddingGateway } from './embeddings.js';
import type { QAPair, QAPairGenerator } from './qa-pairs.js';
import type { RewordingGenerator } from './rewording.js';
import { expandQuestion, mergeCandidates, rankResults, type QueryResult } from './retriever.js';
import type { IndexEntry, IndexMatch, Metadata, MetadataFilter, VectorIndex } from './vectorstore.js';

const logger = createModuleLogger('knowledge-base');

// Candidates first requested per variant query, as a multiple of nResults.
// The request doubles while the hits cover fewer than nResults records.
const CANDIDATE_MULTIPLIER = 2;

export type AnswerValue = string | number | boolean | null;

/**
 * A stored question-answer unit, reassembled from its index entries.
 */
export interface QARecord {
  id: string;
  question: string;
  answer: string | null;
  metadata: Metadata;

  // Every indexed question text, canonical first
  variants: string[];

  indexedAt: string;
}

export interface RetrievalDefaults {
  nResults: number;
  numRewordings: number;
  minSimilarity: number;
}

export const DEFAULT_RETRIEVAL: RetrievalDefaults = {
  nResults: 5,
  numRewordings: 0,
  minSimilarity: 0.3,
};

export interface AddQAOptions {
  metadata?: Metadata;
  numRewordings?: number;

  // Logical id to use instead of a generated one
  id?: string;
}

export interface AddQAResult {
  id: string;

  // Indexed question texts, original first
  questions: string[];
}

export interface QueryOptions {
  nResults?: number;
  metadataFilter?: MetadataFilter;
  numRewordings?: number;
  minSimilarity?: number;
}

export type RecordRef = { id: string } | { question: string };

export interface UpdateAnswerOptions {
  // Replaces the record's metadata wholesale when given
  metadata?: Metadata;
}

export interface IngestTextOptions {
  metadata?: Metadata;
  numRewordings?: number;
}

export interface KnowledgeBaseOptions {
  embeddings: EmbeddingGateway;
  index: VectorIndex;
  reworder?: RewordingGenerator;
  qaPairs?: QAPairGenerator;
  defaults?: Partial<RetrievalDefaults>;
  clock?: () => Date;
  generateId?: () => string;
}

/**
 * Rewording generator for knowledge bases that never expand questions.
 */
export const noRewordings: RewordingGenerator = {
  reword: async () => [],
};

function normalizeAnswer(answer: AnswerValue): string | null {
  return answer === null ? null : String(answer);
}

function toRecord(entries: IndexEntry[]): QARecord | null {
  const sorted = [...entries].sort((a, b) => a.variant - b.variant);
  const canonical = sorted[0];
  if (!canonical) return null;

  return {
    id: canonical.recordId,
    question: canonical.text,
    answer: canonical.answer,
    metadata: { ...canonical.metadata },
    variants: sorted.map((e) => e.text),
    indexedAt: canonical.indexedAt,
  };
}

function countRecords(matches: IndexMatch[]): number {
  return new Set(matches.map((m) => m.recordId)).size;
}

function groupByRecord(entries: IndexEntry[]): Map<string, IndexEntry[]> {
  const groups = new Map<string, IndexEntry[]>();
  for (const entry of entries) {
    const group = groups.get(entry.recordId);
    if (group) {
      group.push(entry);
    } else {
      groups.set(entry.recordId, [entry]);
    }
  }
  return groups;
}

export class KnowledgeBase {
  private readonly embeddings: EmbeddingGateway;
  private readonly index: VectorIndex;
  private readonly reworder: RewordingGenerator;
  private readonly qaPairs: QAPairGenerator | undefined;
  private readonly defaults: RetrievalDefaults;
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(options: KnowledgeBaseOptions) {
    this.embeddings = options.embeddings;
    this.index = options.index;
    this.reworder = options.reworder ?? noRewordings;
    this.qaPairs = options.qaPairs;
    this.defaults = { ...DEFAULT_RETRIEVAL, ...options.defaults };
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? (() => randomUUID());
  }

  /**
   * Add a question-answer pair, indexing the question and its rewordings.
   *
   * @param question - question text, or ready-made variants (first is canonical)
   * @param answer - stored as a string; null leaves the record unanswered
   * @returns the record id and every indexed question text, original first
   *
   * @example
   * const { id, questions } = await kb.addQA("What is the capital of France?", "Paris", {
   *   metadata: { source: "atlas" },
   *   numRewordings: 2,
   * });
   */
  async addQA(question: string | string[], answer: AnswerValue, options: AddQAOptions = {}): Promise<AddQAResult> {
    const id = options.id ?? this.generateId();
    const metadata = { ...options.metadata };
    const numRewordings = options.numRewordings ?? this.defaults.numRewordings;

    if ((await this.index.list({ recordId: id })).length > 0) {
      throw new DuplicateRecordError(id);
    }

    const questions = await expandQuestion(question, numRewordings, this.reworder, logger);
    if (questions.length === 0) {
      throw new ValidationError('Question text must not be empty');
    }

    const answerText = normalizeAnswer(answer);
    const indexedAt = this.clock().toISOString();

    for (const [variant, text] of questions.entries()) {
      logger.debug(`Adding question variant ${variant}: ${text}`);
      const embedding = await this.embeddings.embed(text);
      await this.index.upsert({
        id: `${id}:${variant}`,
        recordId: id,
        variant,
        text,
        answer: answerText,
        metadata,
        embedding,
        indexedAt,
      });
    }

    logger.info(`Indexed record ${id} with ${questions.length} question variant(s)`);
    return { id, questions };
  }

  /**
   * Find the records that best answer a question.
   *
   * Every variant of the question is searched separately; a record found by
   * several variants appears once, with the best similarity any of them
   * reached. Returns [] when the index is empty or nothing clears the
   * relevance floor.
   *
   * @example
   * const results = await kb.query("capital city of France", { nResults: 3 });
   * console.log(results[0].answer); // "Paris"
   */
  async query(question: string | string[], options: QueryOptions = {}): Promise<QueryResult[]> {
    const startTime = Date.now();

    const nResults = options.nResults ?? this.defaults.nResults;
    const numRewordings = options.numRewordings ?? this.defaults.numRewordings;
    const minSimilarity = options.minSimilarity ?? this.defaults.minSimilarity;

    if (nResults <= 0) return [];

    const variants = await expandQuestion(question, numRewordings, this.reworder, logger);
    if (variants.length === 0) return [];

    logger.debug(`Querying ${variants.length} variant(s) for "${variants[0]?.substring(0, 50)}"`);

    const candidateLists = await Promise.all(
      variants.map((variant) => this.searchVariant(variant, nResults, options.metadataFilter))
    );

    const merged = mergeCandidates(candidateLists, this.index.metric);
    const results = rankResults(merged, nResults, minSimilarity);

    logger.info(
      `Retrieved ${results.length} result(s) from ${merged.length} record(s) in ${Date.now() - startTime}ms`
    );
    return results;
  }

  /**
   * Nearest entries for one variant, covering at least `nResults` distinct
   * records unless the index holds fewer.
   */
  private async searchVariant(
    variant: string,
    nResults: number,
    filter: MetadataFilter | undefined
  ): Promise<IndexMatch[]> {
    const vector = await this.embeddings.embed(variant);

    let k = nResults * CANDIDATE_MULTIPLIER;
    let matches = await this.index.query(vector, { k, filter });

    while (matches.length === k && countRecords(matches) < nResults) {
      logger.debug(`${k} candidates cover only ${countRecords(matches)} record(s), widening search`);
      k *= 2;
      matches = await this.index.query(vector, { k, filter });
    }

    return matches;
  }

  /**
   * Replace the answer of a record on every one of its indexed variants.
   *
   * The record is found by id, or by the exact text of one of its variants.
   * Near matches never count.
   *
   * @throws NotFoundError when nothing matches
   * @throws AmbiguousQuestionError when the text belongs to several records
   */
  async updateAnswer(ref: RecordRef, newAnswer: AnswerValue, options: UpdateAnswerOptions = {}): Promise<QARecord> {
    const recordId = await this.resolveRecordId(ref);

    const entries = await this.index.list({ recordId });
    if (entries.length === 0) {
      throw new NotFoundError('QA record', recordId);
    }

    const answer = normalizeAnswer(newAnswer);
    const updated: IndexEntry[] = [];

    for (const entry of entries) {
      const next: IndexEntry = {
        ...entry,
        answer,
        metadata: options.metadata ? { ...options.metadata } : entry.metadata,
      };
      await this.index.upsert(next);
      updated.push(next);
    }

    logger.info(`Updated answer of record ${recordId} on ${updated.length} variant(s)`);

    const record = toRecord(updated);
    if (!record) {
      throw new NotFoundError('QA record', recordId);
    }
    return record;
  }

  private async resolveRecordId(ref: RecordRef): Promise<string> {
    if ('id' in ref) return ref.id;

    const text = ref.question.trim();
    const recordIds = [
      ...new Set((await this.index.list()).filter((e) => e.text === text).map((e) => e.recordId)),
    ];

    const [recordId] = recordIds;
    if (recordId === undefined) {
      throw new NotFoundError('QA record for question', text);
    }
    if (recordIds.length > 1) {
      throw new AmbiguousQuestionError(text, recordIds);
    }
    return recordId;
  }

  async getRecord(id: string): Promise<QARecord | null> {
    return toRecord(await this.index.list({ recordId: id }));
  }

  /**
   * All records, optionally filtered by metadata, in index order.
   */
  async getRecords(filter?: MetadataFilter): Promise<QARecord[]> {
    const records: QARecord[] = [];
    for (const entries of groupByRecord(await this.index.list({ filter })).values()) {
      const record = toRecord(entries);
      if (record) records.push(record);
    }
    return records;
  }

  /**
   * Every indexed question text, rewordings included.
   */
  async getAllQuestions(): Promise<string[]> {
    return (await this.index.list()).map((e) => e.text);
  }

  /**
   * Remove a record and all of its variants from the index.
   */
  async deleteQA(id: string): Promise<void> {
    const entries = await this.index.list({ recordId: id });
    if (entries.length === 0) {
      throw new NotFoundError('QA record', id);
    }
    await this.index.delete(entries.map((e) => e.id));
    logger.info(`Deleted record ${id}`);
  }

  /**
   * Number of records (not index entries).
   */
  async count(): Promise<number> {
    return groupByRecord(await this.index.list()).size;
  }

  async clear(): Promise<void> {
    await this.index.clear();
  }

  /**
   * Generate question-answer pairs from a passage and add each of them.
   * A generation failure adds nothing and returns [].
   */
  async ingestText(text: string, options: IngestTextOptions = {}): Promise<AddQAResult[]> {
    if (!this.qaPairs) {
      throw new ConfigError(['qaPairs: no QA pair generator configured']);
    }

    let pairs: QAPair[];
    try {
      pairs = await this.qaPairs.generate(text);
    } catch (error) {
      logger.warn(`QA pair generation failed, nothing ingested: ${errorMessage(error)}`);
      return [];
    }

    const added: AddQAResult[] = [];
    for (const pair of pairs) {
      added.push(
        await this.addQA(pair.q, pair.a, {
          metadata: options.metadata,
          numRewordings: options.numRewordings,
        })
      );
    }

    logger.info(`Ingested ${added.length} QA pair(s)`);
    return added;
  }
}
