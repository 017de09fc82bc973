/**
 * A named piece of source executed by the sandbox.
 * The name shows up in stack traces.
 */
export interface SourceUnit {
  name: string;
  source: string;
}

/**
 * Units run in order within one global scope, so later units see the
 * bindings declared by earlier ones. `assert` and `console` are predefined.
 */
export interface SandboxProgram {
  units: SourceUnit[];
}

export type ExecutionOutcome =
  | { status: 'success' }
  | {
      status: 'failure';
      /** `<ErrorName>: <message>` of the first thrown value */
      error: string;
    };

export interface ExecutionSandbox {
  /** Identifier of the isolation strategy, e.g. `process` */
  readonly mode: string;
  run(program: SandboxProgram): Promise<ExecutionOutcome>;
}
