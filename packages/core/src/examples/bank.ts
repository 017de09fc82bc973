import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, PrimingError } from '@synthloop/shared';

/**
 * One worked example: a task with its signature, reference code and three tests.
 * Extra string fields (e.g. `old_code`, `fixed_code`) are kept so a bank can also
 * demonstrate repairs.
 */
export const ExampleSchema = z
  .object({
    task: z.string().min(1),
    code_signature: z.string().min(1),
    code: z.string().min(1),
    test_1: z.string().min(1),
    test_2: z.string().min(1),
    edge_case_test_1: z.string().min(1),
  })
  .catchall(z.string());

export type Example = z.infer<typeof ExampleSchema>;

export function parseExampleBank(raw: unknown): Example[] {
  if (!Array.isArray(raw)) {
    throw new PrimingError('Example bank must be an array of examples');
  }
  if (raw.length === 0) {
    throw new PrimingError('Example bank is empty; at least one example is needed to prime the stages');
  }

  return raw.map((entry: unknown, index) => {
    const result = ExampleSchema.safeParse(entry);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
      throw new PrimingError(`Example ${index} is invalid:\n${issues}`, {
        details: { index },
      });
    }
    return result.data;
  });
}

/**
 * Loads an example bank from a JSON or YAML file.
 */
export function readExampleBank(filePath: string): Example[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Example bank not found: ${filePath}`);
  }
  const content = fs.readFileSync(filePath, 'utf8');
  const ext = path.extname(filePath).toLowerCase();

  let raw: unknown;
  try {
    raw = ext === '.yaml' || ext === '.yml' ? yaml.load(content) : JSON.parse(content);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PrimingError(`Error parsing example bank: ${filePath}\n${reason}`, { cause: error });
  }
  return parseExampleBank(raw);
}
