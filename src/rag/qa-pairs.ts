/**
 * QA Pair Generation
 *
 * Asks a model to read a passage and produce question-answer pairs that the
 * passage answers. The pairs are then indexed like any hand-written pair.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { createModuleLogger } from '../utils/logger.js';
import { GenerationError, errorMessage } from '../utils/errors.js';
import { QA_PAIRS_SYSTEM_PROMPT, buildQAPairsUserPrompt } from './prompts.js';

const logger = createModuleLogger('qa-pairs');

export interface QAPair {
  q: string;
  a: string;
}

export interface QAPairGenerator {
  generate(text: string): Promise<QAPair[]>;
}

const QAPairSchema = z.object({
  q: z.string().min(1),
  a: z.string().min(1),
});

/**
 * Parse a JSON-mode reply into QA pairs.
 *
 * JSON mode always returns an object, so the pairs normally sit under its
 * first key (`{"pairs": [...]}`). A bare array is accepted too, and an object
 * whose first value is not a list is read as a single pair.
 *
 * @throws GenerationError on invalid JSON or a malformed pair
 */
export function parseQAPairs(content: string): QAPair[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new GenerationError(`QA pair response is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  let items: unknown[];
  if (Array.isArray(data)) {
    items = data;
  } else if (typeof data === 'object' && data !== null) {
    const first = Object.values(data)[0];
    if (Array.isArray(first)) {
      items = first;
    } else {
      logger.warn('QA pair response does not contain a list');
      items = [data];
    }
  } else {
    throw new GenerationError('QA pair response is not a JSON object');
  }

  const parsed = z.array(QAPairSchema).safeParse(items);
  if (!parsed.success) {
    throw new GenerationError(`Invalid QA pair format: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}

export interface OpenAIQAPairOptions {
  apiKey: string;
  model?: string;
}

export class OpenAIQAPairGenerator implements QAPairGenerator {
  private readonly openai: OpenAI;
  private readonly model: string;

  constructor(options: OpenAIQAPairOptions) {
    this.openai = new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? 'gpt-4o-mini';
  }

  async generate(text: string): Promise<QAPair[]> {
    let content: string | null;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: QA_PAIRS_SYSTEM_PROMPT },
          { role: 'user', content: buildQAPairsUserPrompt(text) },
        ],
        response_format: { type: 'json_object' },
      });
      content = response.choices[0]?.message.content ?? null;
    } catch (error) {
      throw new GenerationError(`QA pair request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!content) {
      throw new GenerationError('QA pair response was empty');
    }

    const pairs = parseQAPairs(content);
    logger.info(`Generated ${pairs.length} QA pairs from ${text.length} chars of text`);
    return pairs;
  }
}
