/**
 * Query the knowledge base from the command line
 * Run with: npx tsx scripts/ask.ts "What is the capital of France?" [numRewordings]
 */

import 'dotenv/config';
import { createKnowledgeBase } from '../src/index.js';

async function main() {
  const [question, rewordings] = process.argv.slice(2);
  if (!question) {
    console.error('Usage: tsx scripts/ask.ts "<question>" [numRewordings]');
    process.exitCode = 1;
    return;
  }

  const kb = await createKnowledgeBase();
  const results = await kb.query(question, {
    numRewordings: rewordings ? Number.parseInt(rewordings, 10) : undefined,
  });

  if (results.length === 0) {
    console.log('No matching answers.');
    return;
  }

  results.forEach((r, i) => {
    console.log(`${i + 1}. ${r.question}`);
    console.log(`   → ${r.answer ?? '(unanswered)'} (similarity: ${r.similarity.toFixed(3)})`);
  });
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
