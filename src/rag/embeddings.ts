// OpenAI embeddings
/**
 * Embeddings Module
 *
 * Converts question text into vector embeddings. Two phrasings of the same
 * question ("What is the capital of France?" / "Which city is France's
 * capital?") land close together in vector space, which is what lets the
 * knowledge base answer a question it has never seen verbatim.
 *
 * The retrieval core only depends on the `EmbeddingGateway` interface, so any
 * provider (or a deterministic fake in tests) can stand behind it.
 */

import OpenAI from 'openai';
import { createModuleLogger } from '../utils/logger.js';
import { EmbeddingError, errorMessage } from '../utils/errors.js';

const logger = createModuleLogger('embeddings');

/**
 * Maps text to a fixed-length vector.
 */
export interface EmbeddingGateway {
  embed(text: string): Promise<number[]>;
}

// text-embedding-3-small: Good balance of quality and cost
const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model?: string;
}

/**
 * Embedding gateway backed by the OpenAI embeddings API.
 * Provider failures and blank input surface as EmbeddingError; nothing is
 * retried here.
 */
export class OpenAIEmbeddingGateway implements EmbeddingGateway {
  private readonly model: string;
  private readonly openai: OpenAI;

  constructor(options: OpenAIEmbeddingOptions) {
    this.openai = new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
  }

  /**
   * Create an embedding for a single text string.
   *
   * @example
   * const embedding = await gateway.embed("What is the capital of France?");
   * console.log(embedding.length); // 1536 with text-embedding-3-small
   */
  async embed(text: string): Promise<number[]> {
    const processed = preprocessText(text);
    if (processed.length === 0) {
      logger.warn('Attempted to embed empty text');
      throw new EmbeddingError('Cannot embed empty text');
    }

    try {
      const response = await this.openai.embeddings.create({
        model: this.model,
        input: processed,
      });

      const first = response.data[0];
      if (!first) {
        throw new Error('response contained no embedding');
      }
      logger.debug(`Created embedding for text (${processed.length} chars)`);

      return first.embedding;
    } catch (error) {
      logger.error(`Failed to create embedding: ${errorMessage(error)}`);
      throw new EmbeddingError(`Embedding failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Calculate cosine similarity between two vectors.
 *
 * 1.0 means identical direction, 0.0 unrelated, -1.0 opposite. A zero
 * vector has no direction and scores 0 against everything.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vectors must have the same length (${a.length} vs ${b.length})`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);

  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

/**
 * Euclidean (L2) distance between two vectors.
 */
export function euclideanDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vectors must have the same length (${a.length} vs ${b.length})`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/**
 * Normalize question text before embedding: collapse whitespace and trim.
 */
export function preprocessText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
