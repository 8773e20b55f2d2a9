#!/usr/bin/env tsx
/**
 * Grade every line of a requirements file
 */
import * as fs from 'fs';
import { analyzeBatch, initialize, STATUS_LABELS, toExportRow } from '../src/engines/index.js';
import { renderRows } from '../src/tools/export.js';
import { collectStatements } from '../src/tools/batch.js';
import { logger } from '../src/utils/logger.js';

const [filePath, ...flags] = process.argv.slice(2);

if (!filePath) {
  console.error('Usage: npx tsx scripts/analyze-file.ts <file> [--csv]');
  process.exit(1);
}

async function main(file: string): Promise<void> {
  // Results go to stdout, logs stay out of the way
  logger.useStderr();

  const handle = await initialize();
  const statements = collectStatements({ content: fs.readFileSync(file, 'utf-8') });
  const verdicts = analyzeBatch(handle, statements);

  if (flags.includes('--csv')) {
    process.stdout.write(renderRows(verdicts.map(toExportRow), 'csv'));
    return;
  }

  for (const warning of handle.warnings) {
    console.log(`⚠️  ${warning}`);
  }

  for (const verdict of verdicts) {
    console.log(`\n[${STATUS_LABELS[verdict.status]}] ${verdict.text}`);
    for (const reason of verdict.reasons) {
      console.log(`   - ${reason.message}`);
    }
  }

  const unclear = verdicts.filter((v) => v.status !== 'Clear').length;
  console.log('\n' + '─'.repeat(70));
  console.log(`\n${verdicts.length} requirements, ${unclear} need work\n`);
}

main(filePath).catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
