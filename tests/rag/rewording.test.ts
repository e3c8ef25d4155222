import { describe, it, expect } from 'vitest';
import { OpenAIRewordingGenerator, parseRewordings } from '../../src/rag/rewording.js';
import { buildRewordingPrompt } from '../../src/rag/prompts.js';

describe('parseRewordings', () => {
  const question = 'How tall is Mount Everest?';

  it('reads one rewording per line', () => {
    const content = 'What is the height of Mount Everest?\nHow high does Mount Everest rise?\n';

    expect(parseRewordings(content, question, 5)).toEqual([
      'What is the height of Mount Everest?',
      'How high does Mount Everest rise?',
    ]);
  });

  it('strips list markers and blank lines', () => {
    const content = '1. First version?\n\n2) Second version?\n- Third version?\n  * Fourth version?\n• Fifth version?';

    expect(parseRewordings(content, question, 10)).toEqual([
      'First version?',
      'Second version?',
      'Third version?',
      'Fourth version?',
      'Fifth version?',
    ]);
  });

  it('drops copies of the question and repeated lines, ignoring case', () => {
    const content = 'how tall is mount everest?\nWhat is its height?\nWHAT IS ITS HEIGHT?\nHow high is it?';

    expect(parseRewordings(content, question, 5)).toEqual(['What is its height?', 'How high is it?']);
  });

  it('stops at n rewordings', () => {
    expect(parseRewordings('a?\nb?\nc?', question, 2)).toEqual(['a?', 'b?']);
  });
});

describe('buildRewordingPrompt', () => {
  it('asks for the requested number of versions of the question', () => {
    const prompt = buildRewordingPrompt('Who wrote Hamlet?', 3);

    expect(prompt.startsWith('Write 3 different ways of asking the question below.')).toBe(true);
    expect(prompt.endsWith('Question: Who wrote Hamlet?\nRewritten:')).toBe(true);
  });
});

describe('OpenAIRewordingGenerator', () => {
  it('returns no rewordings without calling the model when none are requested', async () => {
    const generator = new OpenAIRewordingGenerator({ apiKey: 'test-key' });

    expect(await generator.reword('Who wrote Hamlet?', 0)).toEqual([]);
  });
});
