import type { ChatMessage } from '@synthloop/shared';
import type { FieldSpec, StageDefinition } from './definitions';
import type { Fields } from './fields';
import type { Demo } from './prime';

export const REASONING_FIELD = 'reasoning';

function describeFields(fields: readonly FieldSpec<string>[]): string {
  return fields.map((f) => `- ${f.name}: ${f.description}`).join('\n');
}

function renderFields<K extends string>(values: Fields<K>, fields: readonly FieldSpec<K>[]): string {
  const ordered: Record<string, string> = {};
  for (const field of fields) {
    ordered[field.name] = values[field.name];
  }
  return JSON.stringify(ordered, null, 2);
}

export function renderSystemPrompt<I extends string, O extends string>(
  definition: StageDefinition<I, O>,
): string {
  const keys = [REASONING_FIELD, ...definition.outputs.map((f) => f.name)]
    .map((k) => `"${k}"`)
    .join(', ');

  return [
    definition.instructions,
    '',
    'Input fields:',
    describeFields(definition.inputs),
    '',
    'Output fields:',
    `- ${REASONING_FIELD}: Think step by step about how to produce the outputs`,
    describeFields(definition.outputs),
    '',
    `Reply with a single JSON object with the keys ${keys}. Every value must be a string.`,
  ].join('\n');
}

/**
 * Builds the chat for one stage call: instructions, demonstrations as
 * user/assistant turns, then the new inputs.
 */
export function renderStagePrompt<I extends string, O extends string>(
  definition: StageDefinition<I, O>,
  demos: readonly Demo<I, O>[],
  inputs: Fields<I>,
): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: renderSystemPrompt(definition) }];

  for (const demo of demos) {
    messages.push({ role: 'user', content: renderFields(demo.inputs, definition.inputs) });
    messages.push({ role: 'assistant', content: renderFields(demo.outputs, definition.outputs) });
  }

  messages.push({ role: 'user', content: renderFields(inputs, definition.inputs) });
  return messages;
}
