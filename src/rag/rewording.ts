/**
 * Rewording Module
 *
 * Generates alternative phrasings of a question to widen retrieval recall.
 * Indexing "Which city is France's capital?" next to "What is the capital of
 * France?" lets a later query match either phrasing.
 */

import OpenAI from 'openai';
import { createModuleLogger } from '../utils/logger.js';
import { GenerationError, errorMessage } from '../utils/errors.js';
import { buildRewordingPrompt } from './prompts.js';

const logger = createModuleLogger('rewording');

/**
 * Produces up to `n` rewordings of a question. May return fewer.
 * Throws GenerationError when the underlying model fails.
 */
export interface RewordingGenerator {
  reword(question: string, n: number): Promise<string[]>;
}

/**
 * Extract rewordings from a model reply: one per line, list markers stripped,
 * blanks, duplicates and copies of the original dropped, capped at `n`.
 */
export function parseRewordings(content: string, question: string, n: number): string[] {
  const seen = new Set<string>([question.trim().toLowerCase()]);
  const rewordings: string[] = [];

  for (const line of content.split('\n')) {
    const cleaned = line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').trim();
    if (cleaned.length === 0) continue;

    const key = cleaned.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);

    rewordings.push(cleaned);
    if (rewordings.length >= n) break;
  }

  return rewordings;
}

export interface OpenAIRewordingOptions {
  apiKey: string;
  model?: string;
}

export class OpenAIRewordingGenerator implements RewordingGenerator {
  private readonly openai: OpenAI;
  private readonly model: string;

  constructor(options: OpenAIRewordingOptions) {
    this.openai = new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? 'gpt-4o-mini';
  }

  async reword(question: string, n: number): Promise<string[]> {
    if (n <= 0) return [];

    let content: string | null;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: buildRewordingPrompt(question, n) }],
      });
      content = response.choices[0]?.message.content ?? null;
    } catch (error) {
      throw new GenerationError(`Rewording request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!content) {
      throw new GenerationError('Rewording response was empty');
    }

    const rewordings = parseRewordings(content, question, n);
    rewordings.forEach((r, i) => logger.debug(`Reworded question ${i + 1}: ${r}`));
    return rewordings;
  }
}
