/**
 * RAG Module Index
 *
 * QUICK START:
 * ------------
 *
 *    ```typescript
 *    import { KnowledgeBase, SimpleVectorStore, OpenAIEmbeddingGateway } from './rag';
 *
 *    const kb = new KnowledgeBase({
 *      embeddings: new OpenAIEmbeddingGateway({ apiKey }),
 *      index: new SimpleVectorStore({ persistPath: './data/qa_kb.vectors.json' }),
 *    });
 *
 *    await kb.addQA('What is the capital of France?', 'Paris');
 *    const results = await kb.query('capital city of France');
 *    ```
 */

// Embeddings - Convert text to vectors
export {
  OpenAIEmbeddingGateway,
  cosineSimilarity,
  euclideanDistance,
  preprocessText,
  type EmbeddingGateway,
  type OpenAIEmbeddingOptions,
} from './embeddings.js';

// Vector Store - Store and search vectors
export {
  SimpleVectorStore,
  matchesFilter,
  type DistanceMetric,
  type IndexEntry,
  type IndexEntryInput,
  type IndexListOptions,
  type IndexMatch,
  type IndexQueryOptions,
  type Metadata,
  type MetadataFilter,
  type MetadataValue,
  type SimpleVectorStoreOptions,
  type VectorIndex,
} from './vectorstore.js';

// Generators - Rewordings and QA pairs
export {
  OpenAIRewordingGenerator,
  parseRewordings,
  type OpenAIRewordingOptions,
  type RewordingGenerator,
} from './rewording.js';
export {
  OpenAIQAPairGenerator,
  parseQAPairs,
  type OpenAIQAPairOptions,
  type QAPair,
  type QAPairGenerator,
} from './qa-pairs.js';

// Retriever - Merge and rank
export {
  buildContextString,
  expandQuestion,
  mergeCandidates,
  rankResults,
  toSimilarity,
  type QueryResult,
} from './retriever.js';

// Knowledge base
export {
  DEFAULT_RETRIEVAL,
  KnowledgeBase,
  noRewordings,
  type AddQAOptions,
  type AddQAResult,
  type AnswerValue,
  type IngestTextOptions,
  type KnowledgeBaseOptions,
  type QARecord,
  type QueryOptions,
  type RecordRef,
  type RetrievalDefaults,
  type UpdateAnswerOptions,
} from './knowledge-base.js';
