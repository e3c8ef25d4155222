/**
 * qa-knowledge-base
 *
 * A question-answer knowledge base with reworded semantic retrieval, plus a
 * question tree that suggests which open question to answer next.
 *
 * `createKnowledgeBase` and `createQuestionAnswerSystem` wire the OpenAI and
 * file-backed collaborators from configuration. Build a `KnowledgeBase` by
 * hand to use other collaborators.
 */

import { join } from 'path';
import { loadConfig, requireOpenAIKey, type Config } from './config/index.js';
import { OpenAIEmbeddingGateway } from './rag/embeddings.js';
import { KnowledgeBase } from './rag/knowledge-base.js';
import { OpenAIQAPairGenerator } from './rag/qa-pairs.js';
import { OpenAIRewordingGenerator } from './rag/rewording.js';
import { SimpleVectorStore } from './rag/vectorstore.js';
import { QuestionAnswerSystem } from './system/qa-system.js';
import { TreeRepository } from './tree/database.js';
import { QuestionTree } from './tree/question-tree.js';
import { createModuleLogger, setLogLevel } from './utils/logger.js';

const logger = createModuleLogger('main');

export function vectorStorePath(config: Config): string {
  return join(config.store.dbDir, `${config.store.collectionName}.vectors.json`);
}

export function treeDatabasePath(config: Config): string {
  return join(config.store.dbDir, `${config.store.collectionName}.db`);
}

/**
 * Knowledge base backed by OpenAI models and a JSON vector store under
 * `store.dbDir`.
 *
 * @throws ConfigError when OPENAI_API_KEY is missing
 */
export async function createKnowledgeBase(config: Config = loadConfig()): Promise<KnowledgeBase> {
  setLogLevel(config.app.logLevel);
  const apiKey = requireOpenAIKey(config);

  const index = new SimpleVectorStore({
    persistPath: vectorStorePath(config),
    metric: config.store.metric,
  });
  await index.initialize();

  const kb = new KnowledgeBase({
    embeddings: new OpenAIEmbeddingGateway({ apiKey, model: config.openai.embeddingModel }),
    index,
    reworder: new OpenAIRewordingGenerator({ apiKey, model: config.openai.rewordingModel }),
    qaPairs: new OpenAIQAPairGenerator({ apiKey, model: config.openai.qaPairsModel }),
    defaults: config.retrieval,
  });

  logger.info(`Knowledge base "${config.store.collectionName}" ready (${await kb.count()} records)`);
  return kb;
}

/**
 * Knowledge base plus a question tree persisted in SQLite next to it.
 */
export async function createQuestionAnswerSystem(config: Config = loadConfig()): Promise<QuestionAnswerSystem> {
  const kb = await createKnowledgeBase(config);
  const repository = new TreeRepository(treeDatabasePath(config));
  const tree = QuestionTree.fromNodes(repository.loadAll());

  logger.info(`Question tree loaded (${tree.size} questions)`);
  return new QuestionAnswerSystem({ kb, tree, repository });
}

export { loadConfig, type Config } from './config/index.js';
export * from './rag/index.js';
export * from './tree/index.js';
export { QuestionAnswerSystem, treeRecordId, type QuestionAnswerSystemOptions } from './system/qa-system.js';
export * from './utils/errors.js';
export { createModuleLogger, setLogLevel, type LogLevel } from './utils/logger.js';
