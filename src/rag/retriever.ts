// Semantic retrieval
/**
 * Retriever Module
 *
 * The ranking half of the retrieval core. A query is asked in several
 * phrasings, each phrasing hits the index separately, and the hits are folded
 * back into one list with one slot per question-answer record.
 *
 * EXAMPLE FLOW:
 * -------------
 * User: "capital city of France"
 *   ↓
 * Variants: ["capital city of France", "Which city is France's capital?"]
 *   ↓
 * One index query per variant → 2 candidate lists
 *   ↓
 * Same record found by both → keep its best similarity only
 *   ↓
 * [{ answer: "Paris", similarity: 0.91 }, ...]
 */

import type { Logger } from 'winston';
import { errorMessage } from '../utils/errors.js';
import type { RewordingGenerator } from './rewording.js';
import type { DistanceMetric, IndexMatch, Metadata } from './vectorstore.js';

/**
 * A ranked answer to a query.
 */
export interface QueryResult {
  // Logical record id
  id: string;

  // The indexed variant text that matched best
  question: string;

  answer: string | null;
  similarity: number;
  metadata: Metadata;
  indexedAt: string;

  // Insertion sequence of the matched entry; orders records added earlier first
  seq: number;
}

/**
 * Turn an index distance into a similarity where higher is better.
 * cosine: 1 - distance (self-match = 1). l2: exp(-distance) (self-match = 1).
 */
export function toSimilarity(distance: number, metric: DistanceMetric): number {
  return metric === 'cosine' ? 1 - distance : Math.exp(-distance);
}

/**
 * Expand a question into the variants to index or search, original first.
 * Blank text expands to nothing.
 *
 * An array is taken as ready-made variants. A string gets up to
 * `numRewordings` generated rewordings; a generator failure is logged and
 * leaves just the original.
 */
export async function expandQuestion(
  question: string | string[],
  numRewordings: number,
  generator: RewordingGenerator,
  logger: Logger
): Promise<string[]> {
  if (Array.isArray(question)) {
    return dedupeVariants(question);
  }

  const original = question.trim();
  if (original.length === 0) {
    return [];
  }
  if (numRewordings <= 0) {
    return [original];
  }

  try {
    const rewordings = await generator.reword(original, numRewordings);
    return dedupeVariants([original, ...rewordings.slice(0, numRewordings)]);
  } catch (error) {
    logger.warn(`Rewording failed, continuing with the original question only: ${errorMessage(error)}`);
    return [original];
  }
}

function dedupeVariants(variants: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const variant of variants) {
    const trimmed = variant.trim();
    if (trimmed.length === 0 || seen.has(trimmed)) continue;
    seen.add(trimmed);
    result.push(trimmed);
  }
  return result;
}

/**
 * Pool the hits of every variant query and collapse them per record,
 * keeping the single best similarity seen for each record.
 */
export function mergeCandidates(candidateLists: IndexMatch[][], metric: DistanceMetric): QueryResult[] {
  const best = new Map<string, QueryResult>();

  for (const candidates of candidateLists) {
    for (const match of candidates) {
      const similarity = toSimilarity(match.distance, metric);
      const current = best.get(match.recordId);

      if (!current || similarity > current.similarity) {
        best.set(match.recordId, {
          id: match.recordId,
          question: match.text,
          answer: match.answer,
          similarity,
          metadata: { ...match.metadata },
          indexedAt: match.indexedAt,
          seq: match.seq,
        });
      }
    }
  }

  return [...best.values()];
}

/**
 * Drop results under the relevance floor, sort by similarity descending and
 * keep the top `nResults`. Ties go to the record that was added first.
 */
export function rankResults(results: QueryResult[], nResults: number, minSimilarity: number): QueryResult[] {
  return results
    .filter((r) => r.similarity >= minSimilarity)
    .sort((a, b) => b.similarity - a.similarity || a.seq - b.seq)
    .slice(0, Math.max(0, nResults));
}

/**
 * Build a context block for an LLM prompt from query results.
 *
 * @example
 * buildContextString(results);
 * // "## Relevant Knowledge Base Entries
 * //
 * // 1. Q: What is the capital of France?
 * //    A: Paris (similarity 0.91)
 * // ..."
 */
export function buildContextString(results: QueryResult[]): string {
  const answered = results.filter((r) => r.answer !== null);
  if (answered.length === 0) {
    return '';
  }

  const header = '## Relevant Knowledge Base Entries\n\n';

  const entries = answered
    .map((r, i) => `${i + 1}. Q: ${r.question}\n   A: ${r.answer} (similarity ${r.similarity.toFixed(2)})`)
    .join('\n');

  const footer = '\n\n---\nUse these answers where they fit the question; say so when none of them do.';

  return header + entries + footer;
}
