/**
 * Drop the configured vector collection after confirmation
 *
 * Usage: npm run clean-db [-- --yes]
 */

import dotenv from 'dotenv';
import { createInterface } from 'readline/promises';
import { loadConfig } from '../config';
import { createIndex } from '../app';
import { closePool } from '../db/pg-client';

dotenv.config();

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase() === 'y';
  } finally {
    rl.close();
  }
}

async function main() {
  const config = loadConfig();
  const { index } = createIndex(config);

  console.log('-'.repeat(50));
  console.log('🧹 Database Cleaning Utility');
  console.log('-'.repeat(50));

  try {
    // Raises when the database is unreachable
    const state = await index.inspect();
    if (!state.exists) {
      console.log(`✅ Collection '${index.collection}' does not exist. Nothing to clean.`);
      return;
    }

    console.log(`⚠️  You are about to permanently delete the collection '${index.collection}'`);
    console.log(`   (${state.totalDocuments} documents from ${state.sources.join(', ') || 'no sources'})`);

    const skipPrompt = process.argv.includes('--yes');
    if (!skipPrompt && !(await confirm('   Are you sure you want to continue? (y/n): '))) {
      console.log('\n🚫 Operation cancelled by user.');
      return;
    }

    await index.drop();
    console.log('✅ Database cleaned successfully!');
  } finally {
    await closePool();
  }
}

main().catch((error) => {
  console.error('❌ An unexpected error occurred:', error instanceof Error ? error.message : error);
  process.exit(1);
});
