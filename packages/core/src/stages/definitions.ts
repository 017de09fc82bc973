export type StageName = 'signature' | 'code' | 'tests' | 'repair';

export interface FieldSpec<K extends string> {
  name: K;
  description: string;
}

/**
 * Declares what a stage reads and writes. All four stages share one
 * implementation and differ only by these declarations.
 */
export interface StageDefinition<I extends string, O extends string> {
  readonly name: StageName;
  readonly instructions: string;
  readonly inputs: readonly FieldSpec<I>[];
  readonly outputs: readonly FieldSpec<O>[];
}

export const TEST_NAMES = ['test_1', 'test_2', 'edge_case_test_1'] as const;
export type TestName = (typeof TEST_NAMES)[number];

const TASK: FieldSpec<'task'> = {
  name: 'task',
  description: 'What the code must do, in natural language',
};

const CODE_SIGNATURE: FieldSpec<'code_signature'> = {
  name: 'code_signature',
  description: 'The function (or class with its methods) declaration the code must implement',
};

export const signatureDefinition: StageDefinition<'task', 'code_signature'> = {
  name: 'signature',
  instructions: 'Given the task, write the signature of the JavaScript code that solves it.',
  inputs: [TASK],
  outputs: [CODE_SIGNATURE],
};

export const codeDefinition: StageDefinition<'task' | 'code_signature', 'code'> = {
  name: 'code',
  instructions:
    'Given the task and the code signature, write the complete JavaScript implementation. ' +
    'Plain script code only: no imports, no exports, no surrounding prose.',
  inputs: [TASK, CODE_SIGNATURE],
  outputs: [{ name: 'code', description: 'JavaScript source implementing the signature' }],
};

export const testsDefinition: StageDefinition<'task' | 'code_signature', TestName> = {
  name: 'tests',
  instructions:
    'Given the task and the code signature, write three independent unit tests. ' +
    'Each test is JavaScript statements that call the code and check results with ' +
    'the global `assert` module (e.g. `assert.strictEqual(actual, expected)`).',
  inputs: [TASK, CODE_SIGNATURE],
  outputs: [
    { name: 'test_1', description: 'A test of typical behaviour' },
    { name: 'test_2', description: 'A second test of typical behaviour' },
    { name: 'edge_case_test_1', description: 'A test of an edge case' },
  ],
};

export const repairDefinition: StageDefinition<
  'task' | 'old_code' | 'failed_test' | 'error_message',
  'fixed_code'
> = {
  name: 'repair',
  instructions:
    'The code below failed. Using the failing test and its error message, ' +
    'rewrite the whole JavaScript code so that it fulfils the task.',
  inputs: [
    TASK,
    { name: 'old_code', description: 'The current code' },
    {
      name: 'failed_test',
      description: 'Source of the test that failed, or "main code" if the code itself failed to run',
    },
    { name: 'error_message', description: 'The error raised, as "<ErrorName>: <message>"' },
  ],
  outputs: [{ name: 'fixed_code', description: 'The complete corrected JavaScript code' }],
};
