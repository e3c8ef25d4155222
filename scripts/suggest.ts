/**
 * Show the open questions of the question tree, best candidate first
 * Run with: npx tsx scripts/suggest.ts [limit]
 */

import 'dotenv/config';
import { createQuestionAnswerSystem } from '../src/index.js';

async function main() {
  const limit = Number.parseInt(process.argv[2] ?? '5', 10);
  const system = await createQuestionAnswerSystem();

  try {
    const next = system.getHighPriorityQuestions(limit);
    if (next.length === 0) {
      console.log('Every question has been answered.');
      return;
    }

    next.forEach((q, i) => {
      console.log(`${i + 1}. [#${q.id} priority ${q.priority}, depth ${q.depth}] ${q.question}`);
    });
  } finally {
    system.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
