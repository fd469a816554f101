#!/usr/bin/env node

import { readFileSync } from 'fs';
import { Command } from 'commander';

import { setupGenerateCommand } from './commands/generate.js';
import { logger } from './utils/logger.js';

/**
 * lockvendor - turns a Cargo.lock into a reproducible offline source manifest.
 */

function getVersion(): string {
  // Same relative location from src/ and dist/
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('lockvendor')
  .description('Generate an offline source manifest and vendor configuration from a Cargo.lock')
  .version(getVersion());

setupGenerateCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason: String(reason) });
  console.error('❌ An unexpected error occurred. Run with --debug for details.');
  process.exit(1);
});

export async function run(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv);
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('lockvendor')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', error);
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
