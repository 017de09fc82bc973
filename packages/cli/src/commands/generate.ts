import path from 'path';
import { fileURLToPath } from 'url';
import { Command, InvalidArgumentError } from 'commander';
import {
  ConfigLoader,
  createDefaultRegistry,
  createPipeline,
  readExampleBank,
  type ConfigOverrides,
  type GenerationResult,
  type ProviderRegistry,
} from '@synthloop/core';
import {
  ConsoleLogger,
  JsonlLogger,
  ProviderSettingsSchema,
  SandboxConfigSchema,
  type Logger,
} from '@synthloop/shared';
import { OutputRenderer, ProgressRenderer } from '../output/renderer';

export const DEFAULT_TASK = 'A JavaScript function to get the nth Fibonacci number';

/** Bank shipped with the CLI, used when `--examples` is not given */
export const DEFAULT_EXAMPLES_PATH = fileURLToPath(
  new URL('../../assets/example-bank.json', import.meta.url),
);

const PROVIDER_TYPES = ProviderSettingsSchema.shape.type.removeDefault().options;
const SANDBOX_MODES = SandboxConfigSchema.shape.mode.removeDefault().options;

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

export interface GenerateCommandOptions {
  task: string;
  examples?: string;
  provider?: (typeof PROVIDER_TYPES)[number];
  model?: string;
  maxRepairs?: number;
  sandbox?: (typeof SANDBOX_MODES)[number];
  logFile?: string;
}

/** Seams for tests; the CLI entry passes none */
export interface GenerateDependencies {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  registry?: ProviderRegistry;
}

function parseChoice<T extends string>(choices: readonly T[]) {
  return (value: string): T => {
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
      throw new InvalidArgumentError(`Allowed choices are ${choices.join(', ')}.`);
    }
    return match;
  };
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export function buildConfigFlags(options: GenerateCommandOptions): ConfigOverrides {
  return {
    provider: { type: options.provider, model: options.model },
    pipeline: { maxRepairAttempts: options.maxRepairs },
    sandbox: { mode: options.sandbox },
  };
}

export async function runGenerate(
  options: GenerateCommandOptions,
  globalOpts: GlobalOptions,
  deps: GenerateDependencies = {},
): Promise<GenerationResult> {
  const cwd = deps.cwd ?? process.cwd();
  const isJson = !!globalOpts.json;

  const config = ConfigLoader.load({
    configPath: globalOpts.config,
    flags: buildConfigFlags(options),
    cwd,
    env: deps.env,
    homeDir: deps.homeDir,
  });

  const examplesPath = options.examples
    ? path.resolve(cwd, options.examples)
    : DEFAULT_EXAMPLES_PATH;
  const examples = readExampleBank(examplesPath);

  // stdout carries only the result document in JSON mode
  const consoleLogger = new ConsoleLogger(!!globalOpts.verbose, {}, isJson ? 'stderr' : 'stdout');
  const logger: Logger = options.logFile
    ? new JsonlLogger(path.resolve(cwd, options.logFile), consoleLogger)
    : consoleLogger;

  const pipeline = createPipeline(config, {
    examples,
    logger,
    eventBus: new ProgressRenderer(isJson),
    registry: deps.registry ?? createDefaultRegistry(deps.env),
  });

  return pipeline.generate(options.task);
}

export function registerGenerateCommand(program: Command, deps: GenerateDependencies = {}) {
  program
    .command('generate', { isDefault: true })
    .description('Generate code for a task, test it and repair it until the tests pass')
    .option('--task <text>', 'Task to implement, in natural language', DEFAULT_TASK)
    .option('--examples <path>', 'Example bank used to prime the stages (.json, .yaml, .yml)')
    .option(
      '--provider <type>',
      `Provider override: ${PROVIDER_TYPES.join(', ')}`,
      parseChoice(PROVIDER_TYPES),
    )
    .option('--model <id>', 'Model override')
    .option('--max-repairs <n>', 'Upper bound on repair attempts', parseCount)
    .option(
      '--sandbox <mode>',
      `Sandbox mode: ${SANDBOX_MODES.join(', ')}`,
      parseChoice(SANDBOX_MODES),
    )
    .option('--log-file <path>', 'Append redacted JSONL events to this file')
    .action(async (options: GenerateCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      if (globalOpts.verbose) renderer.log(`Generating code for: "${options.task}"`);

      const result = await runGenerate(options, globalOpts, deps);
      renderer.render(result);
    });
}
