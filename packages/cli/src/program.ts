import fs from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { AppError, ConfigError, UsageError } from '@synthloop/shared';
import {
  registerGenerateCommand,
  type GenerateDependencies,
  type GlobalOptions,
} from './commands/generate';

export const name = '@synthloop/cli';

const PackageJsonSchema = z.object({ version: z.string() });

export function readVersion(): string {
  const raw: unknown = JSON.parse(
    fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8'),
  );
  return PackageJsonSchema.parse(raw).version;
}

export function createProgram(deps: GenerateDependencies = {}): Command {
  const program = new Command();

  program
    .name('synthloop')
    .description('Generate code from a task, test it and repair it until the tests pass')
    .version(readVersion())
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerGenerateCommand(program, deps);

  return program;
}

/**
 * Prints an error the way the selected output mode expects and returns the exit code:
 * 2 for errors the user can correct, 1 otherwise.
 */
export function reportError(e: unknown, opts: GlobalOptions): number {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
  } else {
    // Human-readable output
    console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (opts.verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }

  return e instanceof ConfigError || e instanceof UsageError ? 2 : 1;
}
