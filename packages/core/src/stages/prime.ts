import { PrimingError, type PrimingConfig } from '@synthloop/shared';
import type { Example } from '../examples/bank';
import type { StageDefinition } from './definitions';
import { hasStringFields, pickFields, type Fields } from './fields';

/** A worked example restricted to one stage's fields */
export interface Demo<I extends string, O extends string> {
  inputs: Fields<I>;
  outputs: Fields<O>;
}

/**
 * Selects the few-shot demonstrations for a stage.
 *
 * Examples lacking any of the stage's fields are skipped, so a stage whose
 * fields the bank never demonstrates (typically `repair`) runs zero-shot.
 * The result depends only on the arguments.
 */
export function primeStage<I extends string, O extends string>(
  definition: StageDefinition<I, O>,
  examples: readonly Example[],
  options: PrimingConfig,
): Demo<I, O>[] {
  if (examples.length === 0) {
    throw new PrimingError(`Cannot prime stage "${definition.name}": the example bank is empty`);
  }

  const inputNames = definition.inputs.map((f) => f.name);
  const outputNames = definition.outputs.map((f) => f.name);
  const demos: Demo<I, O>[] = [];

  for (const example of examples) {
    if (demos.length >= options.maxDemos) break;
    if (!hasStringFields(example, inputNames) || !hasStringFields(example, outputNames)) continue;
    demos.push({
      inputs: pickFields(example, inputNames),
      outputs: pickFields(example, outputNames),
    });
  }

  return demos;
}
