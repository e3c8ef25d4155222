/**
 * Suggestion Engine
 *
 * Picks the unanswered question to put in front of a human next:
 *   1. higher priority first
 *   2. then shallower depth, so broad questions come before their details
 *   3. then earlier insertion (smaller id)
 *
 * A pure function of the tree: the same tree always yields the same question.
 */

import type { QuestionTree, TreeNode } from './question-tree.js';

export interface RankedQuestion extends TreeNode {
  depth: number;
}

function compareQuestions(a: RankedQuestion, b: RankedQuestion): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  if (a.depth !== b.depth) return a.depth - b.depth;
  return a.id - b.id;
}

/**
 * Unanswered questions in suggestion order.
 */
export function rankUnansweredQuestions(tree: QuestionTree, limit?: number): RankedQuestion[] {
  const ranked = tree
    .getUnansweredQuestions()
    .map((node) => ({ ...node, depth: tree.depthOf(node.id) }))
    .sort(compareQuestions);

  return limit === undefined ? ranked : ranked.slice(0, Math.max(0, limit));
}

/**
 * The next question to answer, or null when every question is answered.
 */
export function suggestNextQuestion(tree: QuestionTree): RankedQuestion | null {
  return rankUnansweredQuestions(tree, 1)[0] ?? null;
}
