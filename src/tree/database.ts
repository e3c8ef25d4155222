import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { createModuleLogger } from '../utils/logger.js';
import type { Metadata } from '../rag/vectorstore.js';
import type { TreeNodeData } from './question-tree.js';

const logger = createModuleLogger('tree-database');

interface QuestionNodeRow {
  id: number;
  question: string;
  answer: string | null;
  parent_id: number | null;
  priority: number;
  metadata: string | null;
}

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

function parseMetadata(raw: string | null): Metadata {
  if (!raw) return {};
  return MetadataSchema.parse(JSON.parse(raw));
}

function fromRow(row: QuestionNodeRow): TreeNodeData {
  return {
    id: row.id,
    question: row.question,
    answer: row.answer,
    metadata: parseMetadata(row.metadata),
    parentId: row.parent_id,
    priority: row.priority,
  };
}

/**
 * SQLite persistence for the question tree.
 * Pass ':memory:' for a throwaway database.
 */
export class TreeRepository {
  private readonly db: Database.Database;

  constructor(databasePath: string) {
    if (databasePath !== ':memory:') {
      const dbDir = dirname(databasePath);
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(databasePath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS question_nodes (
        id INTEGER PRIMARY KEY,
        question TEXT NOT NULL,
        answer TEXT,
        parent_id INTEGER REFERENCES question_nodes(id),
        priority REAL NOT NULL DEFAULT 0,
        metadata TEXT,
        created_at INTEGER NOT NULL DEFAULT (unixepoch()),
        answered_at INTEGER
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_question_nodes_parent ON question_nodes(parent_id);
    `);

    logger.debug('Question tree schema initialized');
  }

  insert(node: TreeNodeData): void {
    this.db.prepare(`
      INSERT INTO question_nodes (id, question, answer, parent_id, priority, metadata)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(node.id, node.question, node.answer, node.parentId, node.priority, JSON.stringify(node.metadata));
  }

  /**
   * Write back the mutable fields of a node: answer, priority and metadata.
   */
  update(node: TreeNodeData): void {
    this.db.prepare(`
      UPDATE question_nodes
      SET answer = ?,
          priority = ?,
          metadata = ?,
          answered_at = CASE WHEN ? IS NULL THEN NULL ELSE COALESCE(answered_at, unixepoch()) END
      WHERE id = ?
    `).run(node.answer, node.priority, JSON.stringify(node.metadata), node.answer, node.id);
  }

  /**
   * Every stored node, in id order.
   */
  loadAll(): TreeNodeData[] {
    const rows = this.db.prepare<[], QuestionNodeRow>(`
      SELECT id, question, answer, parent_id, priority, metadata
      FROM question_nodes
      ORDER BY id
    `).all();

    logger.info(`Loaded ${rows.length} question(s) from disk`);
    return rows.map(fromRow);
  }

  close(): void {
    this.db.close();
  }
}
