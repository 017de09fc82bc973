/**
 * Base interface for all pipeline events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the generation run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a generation run starts.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    /** The task description for this run */
    task: string;
  };
}

/** Emitted once per run when the code signature has been synthesized */
export interface SignatureGenerated extends BaseEvent {
  type: 'SignatureGenerated';
  payload: {
    codeSignature: string;
  };
}

/** Emitted when the initial candidate implementation has been synthesized */
export interface CodeGenerated extends BaseEvent {
  type: 'CodeGenerated';
  payload: {
    code: string;
  };
}

/** Emitted once per run when the frozen test cases have been synthesized */
export interface TestsGenerated extends BaseEvent {
  type: 'TestsGenerated';
  payload: {
    tests: Array<{ name: string; source: string }>;
  };
}

/** Emitted after the sandbox ran the candidate code or one test against it */
export interface ExecutionFinished extends BaseEvent {
  type: 'ExecutionFinished';
  payload: {
    /** `main code` or the test name */
    artifact: string;
    /** Repair iteration the execution belongs to (0 before any repair) */
    iteration: number;
    success: boolean;
    error?: string;
    durationMs: number;
  };
}

/**
 * Emitted when a failure is routed to the repair stage.
 */
export interface RepairAttempted extends BaseEvent {
  type: 'RepairAttempted';
  payload: {
    iteration: number;
    /** `main code` or the failing test's source text */
    failedArtifact: string;
    errorMessage: string;
  };
}

/** Emitted when the repair stage produced a replacement candidate */
export interface CodeRepaired extends BaseEvent {
  type: 'CodeRepaired';
  payload: {
    iteration: number;
    code: string;
  };
}

/** Emitted when a generation run ends */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    status: 'success' | 'failure';
    repairIterations: number;
    durationMs: number;
    summary?: string;
  };
}

/** Emitted when a request to an LLM provider starts */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

/** Emitted when a request to an LLM provider finishes (successfully or not) */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    error?: string;
    retries: number;
  };
}

/**
 * Discriminated union of all pipeline events.
 */
export type PipelineEvent =
  | RunStarted
  | SignatureGenerated
  | CodeGenerated
  | TestsGenerated
  | ExecutionFinished
  | RepairAttempted
  | CodeRepaired
  | RunFinished
  | ProviderRequestStarted
  | ProviderRequestFinished;

/**
 * Interface for publishing pipeline events.
 * Implementations can render progress, write to logs, etc.
 */
export interface EventBus {
  /**
   * Emit an event to all registered listeners.
   * @param event - The event to emit
   */
  emit(event: PipelineEvent): Promise<void> | void;
}
