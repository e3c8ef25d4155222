/**
 * Question-Answer System
 *
 * Couples the question tree with the knowledge base. Every tree question is
 * also indexed in the knowledge base (unanswered until a human answers it),
 * so answers given through the tree become retrievable by semantic search.
 *
 * A tree node with id N is stored in the knowledge base as record "tree-N",
 * with metadata { treeId: N, fromTree: true }.
 *
 * Each write touches the tree, the knowledge base and (when configured) the
 * tree database. A failing step undoes the steps before it, so a rejected
 * call leaves all three as they were.
 */

import { createModuleLogger } from '../utils/logger.js';
import { DuplicateRecordError, errorMessage } from '../utils/errors.js';
import type { KnowledgeBase, QARecord, QueryOptions } from '../rag/knowledge-base.js';
import type { QueryResult } from '../rag/retriever.js';
import type { Metadata } from '../rag/vectorstore.js';
import type { TreeRepository } from '../tree/database.js';
import type { AddQuestionOptions, QuestionTree, TreeNode } from '../tree/question-tree.js';
import { rankUnansweredQuestions, suggestNextQuestion, type RankedQuestion } from '../tree/suggestion.js';

const logger = createModuleLogger('qa-system');

export function treeRecordId(nodeId: number): string {
  return `tree-${nodeId}`;
}

export interface QuestionAnswerSystemOptions {
  kb: KnowledgeBase;
  tree: QuestionTree;

  // Write-through persistence for the tree; omit to keep it in memory
  repository?: TreeRepository;
}

export class QuestionAnswerSystem {
  readonly kb: KnowledgeBase;
  readonly tree: QuestionTree;
  private readonly repository: TreeRepository | undefined;

  constructor(options: QuestionAnswerSystemOptions) {
    this.kb = options.kb;
    this.tree = options.tree;
    this.repository = options.repository;
  }

  /**
   * Add a question to the tree and index it, unanswered, in the knowledge base.
   *
   * @throws InvalidParentError when `parentId` does not exist
   * @throws ValidationError on empty text or a non-finite priority
   */
  async addQuestion(question: string, parentId: number | null = null, options: AddQuestionOptions = {}): Promise<number> {
    const id = this.tree.addQuestion(question, parentId, options);
    const node = this.tree.requireNode(id);
    const recordId = treeRecordId(id);

    try {
      await this.kb.addQA(node.question, null, { id: recordId, metadata: this.kbMetadata(node) });
      this.repository?.insert(node);
    } catch (error) {
      this.tree.retractQuestion(id);
      // A duplicate means the record predates this call; leave it alone
      if (!(error instanceof DuplicateRecordError)) {
        await this.discardRecord(recordId);
      }
      throw error;
    }

    logger.info(`Added question ${id}${parentId === null ? ' as a root' : ` under ${parentId}`}`);
    return id;
  }

  /**
   * Answer a tree question and publish the answer to the knowledge base.
   *
   * @throws NotFoundError when `id` does not exist
   */
  async answerQuestion(id: number, answer: string): Promise<TreeNode> {
    const current = this.tree.requireNode(id);
    const recordId = treeRecordId(id);
    const previous = await this.kb.getRecord(recordId);

    try {
      await this.publishAnswer(current, answer, previous);
      this.repository?.update({ ...current, answer });
    } catch (error) {
      await this.restoreRecord(recordId, previous);
      throw error;
    }

    const node = this.tree.answerQuestion(id, answer);
    logger.info(`Answered question ${id}`);
    return node;
  }

  /**
   * @throws NotFoundError when `id` does not exist
   * @throws ValidationError on a non-finite priority
   */
  setPriority(id: number, priority: number): TreeNode {
    const previous = this.tree.requireNode(id).priority;
    const node = this.tree.setPriority(id, priority);

    try {
      this.repository?.update(node);
    } catch (error) {
      this.tree.setPriority(id, previous);
      throw error;
    }
    return node;
  }

  getUnansweredQuestions(): TreeNode[] {
    return this.tree.getUnansweredQuestions();
  }

  getAnsweredQuestions(): TreeNode[] {
    return this.tree.getAnsweredQuestions();
  }

  suggestNextQuestion(): RankedQuestion | null {
    return suggestNextQuestion(this.tree);
  }

  getHighPriorityQuestions(limit = 5): RankedQuestion[] {
    return rankUnansweredQuestions(this.tree, limit);
  }

  query(question: string | string[], options: QueryOptions = {}): Promise<QueryResult[]> {
    return this.kb.query(question, options);
  }

  /**
   * Copy answers found in the knowledge base onto tree questions that are
   * still unanswered. Returns the ids of the questions that changed.
   */
  async syncKBToTree(): Promise<number[]> {
    const synced: number[] = [];

    for (const record of await this.kb.getRecords({ fromTree: true })) {
      const treeId = record.metadata.treeId;
      if (typeof treeId !== 'number' || !this.tree.has(treeId)) {
        logger.warn(`Knowledge base record ${record.id} points at unknown question ${String(treeId)}`);
        continue;
      }

      if (record.answer !== null && !this.tree.isAnswered(treeId)) {
        this.repository?.update({ ...this.tree.requireNode(treeId), answer: record.answer });
        this.tree.answerQuestion(treeId, record.answer);
        synced.push(treeId);
      }
    }

    logger.info(`Synced ${synced.length} answer(s) from knowledge base to tree`);
    return synced;
  }

  /**
   * Push every tree answer into the knowledge base, re-indexing questions the
   * knowledge base does not know yet. Returns the ids that were written.
   */
  async syncTreeToKB(): Promise<number[]> {
    const synced: number[] = [];

    for (const node of this.tree.getAnsweredQuestions()) {
      if (node.answer === null) continue;
      await this.publishAnswer(node, node.answer, await this.kb.getRecord(treeRecordId(node.id)));
      synced.push(node.id);
    }

    logger.info(`Synced ${synced.length} answer(s) from tree to knowledge base`);
    return synced;
  }

  /**
   * Release the tree database. The system must not be used afterwards.
   */
  close(): void {
    this.repository?.close();
  }

  private kbMetadata(node: TreeNode): Metadata {
    return { ...node.metadata, treeId: node.id, fromTree: true };
  }

  /**
   * Write an answer to the node's record, re-indexing the question when the
   * knowledge base has no record for it.
   */
  private async publishAnswer(node: TreeNode, answer: string, existing: QARecord | null): Promise<void> {
    const recordId = treeRecordId(node.id);
    if (existing) {
      await this.kb.updateAnswer({ id: recordId }, answer);
    } else {
      await this.kb.addQA(node.question, answer, { id: recordId, metadata: this.kbMetadata(node) });
    }
  }

  /**
   * Put a record back the way `previous` describes it; null means it did not
   * exist. Failures are logged so the error that triggered the undo is the
   * one the caller sees.
   */
  private async restoreRecord(recordId: string, previous: QARecord | null): Promise<void> {
    if (!previous) {
      await this.discardRecord(recordId);
      return;
    }
    try {
      await this.kb.updateAnswer({ id: recordId }, previous.answer);
    } catch (error) {
      logger.error(`Could not restore knowledge base record ${recordId}: ${errorMessage(error)}`);
    }
  }

  private async discardRecord(recordId: string): Promise<void> {
    try {
      if (await this.kb.getRecord(recordId)) {
        await this.kb.deleteQA(recordId);
      }
    } catch (error) {
      logger.error(`Could not remove knowledge base record ${recordId}: ${errorMessage(error)}`);
    }
  }
}
