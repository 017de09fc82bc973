#!/usr/bin/env tsx
import { config as loadDotenv } from 'dotenv';
import { createProgram, reportError } from './program';
import type { GlobalOptions } from './commands/generate';

// Load .env before configuration resolves API keys
loadDotenv();

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    process.exit(reportError(e, program.opts<GlobalOptions>()));
  }
}

main();
