/**
 * Question Tree
 *
 * A forest of questions. Nodes live in an arena keyed by id; parent and child
 * links are ids, never object references, so the whole forest serializes as a
 * flat list of nodes.
 *
 * The structure only grows: questions are added under an existing parent (or
 * as a new root) and answered. Nothing is moved, and the only removal is
 * `retractQuestion`, which undoes an add that has no children yet. Every node
 * keeps the parent it was created with and the forest can never contain a
 * cycle.
 */

import { InvalidParentError, NotFoundError, ValidationError } from '../utils/errors.js';
import type { Metadata } from '../rag/vectorstore.js';

export const DEFAULT_PRIORITY = 0;

/**
 * Stored form of a node. `answered` is derived, so it is not stored.
 */
export interface TreeNodeData {
  id: number;
  question: string;
  answer: string | null;
  metadata: Metadata;
  parentId: number | null;
  priority: number;
}

/**
 * Snapshot of a node as handed out to callers.
 */
export interface TreeNode extends TreeNodeData {
  children: number[];
  answered: boolean;
}

export interface AddQuestionOptions {
  metadata?: Metadata;
  priority?: number;
}

interface ArenaNode extends TreeNodeData {
  children: number[];
}

function assertFinitePriority(priority: number): void {
  if (!Number.isFinite(priority)) {
    throw new ValidationError(`Priority must be a finite number, got ${priority}`);
  }
}

export class QuestionTree {
  private readonly nodes = new Map<number, ArenaNode>();
  private readonly roots: number[] = [];
  private nextId = 1;

  /**
   * Rebuild a forest from stored nodes. Children are attached in id order,
   * which is their insertion order.
   *
   * @throws InvalidParentError when a node references a parent that is not
   *   in the list or was created after it
   * @throws ValidationError on a duplicate id or a non-finite priority
   */
  static fromNodes(data: TreeNodeData[]): QuestionTree {
    const tree = new QuestionTree();
    for (const node of [...data].sort((a, b) => a.id - b.id)) {
      tree.insert({ ...node, metadata: { ...node.metadata } });
    }
    return tree;
  }

  get size(): number {
    return this.nodes.size;
  }

  /**
   * Add an unanswered question, under `parentId` or as a new root.
   *
   * @returns the new node's id
   * @throws InvalidParentError when `parentId` does not exist
   * @throws ValidationError on empty text or a non-finite priority
   */
  addQuestion(question: string, parentId: number | null = null, options: AddQuestionOptions = {}): number {
    const text = question.trim();
    if (text.length === 0) {
      throw new ValidationError('Question text must not be empty');
    }

    return this.insert({
      id: this.nextId,
      question: text,
      answer: null,
      metadata: { ...options.metadata },
      parentId,
      priority: options.priority ?? DEFAULT_PRIORITY,
    });
  }

  private insert(data: TreeNodeData): number {
    if (this.nodes.has(data.id)) {
      throw new ValidationError(`Duplicate question id: ${data.id}`);
    }
    assertFinitePriority(data.priority);

    let parent: ArenaNode | undefined;
    if (data.parentId !== null) {
      parent = this.nodes.get(data.parentId);
      if (!parent) {
        throw new InvalidParentError(data.parentId);
      }
    }

    this.nodes.set(data.id, { ...data, children: [] });
    if (parent) {
      parent.children.push(data.id);
    } else {
      this.roots.push(data.id);
    }

    this.nextId = Math.max(this.nextId, data.id + 1);
    return data.id;
  }

  /**
   * Undo `addQuestion` for a node nothing hangs off yet. Retracting the
   * newest node frees its id for the next add.
   *
   * @throws NotFoundError when `id` does not exist
   * @throws ValidationError when the node has children
   */
  retractQuestion(id: number): void {
    const node = this.arenaNode(id);
    if (node.children.length > 0) {
      throw new ValidationError(`Question ${id} has children and cannot be retracted`);
    }

    const siblings = node.parentId === null ? this.roots : this.arenaNode(node.parentId).children;
    siblings.splice(siblings.indexOf(id), 1);
    this.nodes.delete(id);

    if (id === this.nextId - 1) {
      this.nextId = id;
    }
  }

  private arenaNode(id: number): ArenaNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new NotFoundError('Question', id);
    }
    return node;
  }

  /**
   * Set (or overwrite) the answer of a question.
   *
   * @throws NotFoundError when `id` does not exist
   */
  answerQuestion(id: number, answer: string): TreeNode {
    const node = this.arenaNode(id);
    node.answer = answer;
    return snapshot(node);
  }

  /**
   * @throws NotFoundError when `id` does not exist
   */
  setPriority(id: number, priority: number): TreeNode {
    assertFinitePriority(priority);
    const node = this.arenaNode(id);
    node.priority = priority;
    return snapshot(node);
  }

  /**
   * @throws NotFoundError when `id` does not exist
   */
  requireNode(id: number): TreeNode {
    return snapshot(this.arenaNode(id));
  }

  getNode(id: number): TreeNode | null {
    const node = this.nodes.get(id);
    return node ? snapshot(node) : null;
  }

  has(id: number): boolean {
    return this.nodes.has(id);
  }

  isAnswered(id: number): boolean {
    return this.arenaNode(id).answer !== null;
  }

  getRoots(): TreeNode[] {
    return this.roots.map((id) => snapshot(this.arenaNode(id)));
  }

  getChildren(id: number): TreeNode[] {
    return this.arenaNode(id).children.map((childId) => snapshot(this.arenaNode(childId)));
  }

  /**
   * Number of edges between the node and its root (roots have depth 0).
   */
  depthOf(id: number): number {
    return this.ancestorsOf(id).length;
  }

  /**
   * Ids from the parent up to the root.
   */
  ancestorsOf(id: number): number[] {
    const ancestors: number[] = [];
    let current = this.arenaNode(id).parentId;
    while (current !== null) {
      ancestors.push(current);
      current = this.arenaNode(current).parentId;
    }
    return ancestors;
  }

  /**
   * Every node, breadth-first from the roots. Roots come in insertion order,
   * children in insertion order.
   */
  traverse(): TreeNode[] {
    const order: TreeNode[] = [];
    const queue = [...this.roots];

    for (let i = 0; i < queue.length; i++) {
      const node = this.arenaNode(queue[i]);
      order.push(snapshot(node));
      queue.push(...node.children);
    }

    return order;
  }

  getUnansweredQuestions(): TreeNode[] {
    return this.traverse().filter((node) => !node.answered);
  }

  getAnsweredQuestions(): TreeNode[] {
    return this.traverse().filter((node) => node.answered);
  }

  /**
   * Serialized forest: every node keyed by id.
   */
  toJSON(): { nodes: Record<string, TreeNodeData> } {
    const nodes: Record<string, TreeNodeData> = {};
    for (const node of this.nodes.values()) {
      nodes[String(node.id)] = toData(node);
    }
    return { nodes };
  }

  toNodes(): TreeNodeData[] {
    return [...this.nodes.values()].map(toData);
  }
}

function toData(node: ArenaNode): TreeNodeData {
  return {
    id: node.id,
    question: node.question,
    answer: node.answer,
    metadata: { ...node.metadata },
    parentId: node.parentId,
    priority: node.priority,
  };
}

function snapshot(node: ArenaNode): TreeNode {
  return {
    ...toData(node),
    children: [...node.children],
    answered: node.answer !== null,
  };
}
