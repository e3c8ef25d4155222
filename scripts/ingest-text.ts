/**
 * Generate QA pairs from a text file and add them to the knowledge base
 * Run with: npx tsx scripts/ingest-text.ts notes.txt [source-label]
 */

import 'dotenv/config';
import { readFileSync } from 'fs';
import { createKnowledgeBase } from '../src/index.js';

async function main() {
  const [file, source] = process.argv.slice(2);
  if (!file) {
    console.error('Usage: tsx scripts/ingest-text.ts <file> [source-label]');
    process.exitCode = 1;
    return;
  }

  const kb = await createKnowledgeBase();
  const added = await kb.ingestText(readFileSync(file, 'utf-8'), {
    metadata: { source: source ?? file },
  });

  console.log(`Added ${added.length} QA pairs:`);
  for (const { questions } of added) {
    console.log(`- ${questions[0]}`);
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
