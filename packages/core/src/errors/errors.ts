/**
 * Error types for the taskpool core.
 *
 * Every error carries a stable `code` so callers (and the CLI's JSON output)
 * can branch on it without matching messages.
 */

/**
 * Base class for all taskpool-specific errors.
 */
export class TaskpoolError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "TaskpoolError";
    Object.setPrototypeOf(this, TaskpoolError.prototype);
  }
}

/**
 * Thrown by the factory when a description's `type` is outside the registry.
 */
export class UnknownTaskTypeError extends TaskpoolError {
  public readonly taskType: string;

  constructor(taskType: string) {
    super(`UnknownTaskType: ${taskType}`, "UNKNOWN_TASK_TYPE");
    this.name = "UnknownTaskTypeError";
    this.taskType = taskType;
    Object.setPrototypeOf(this, UnknownTaskTypeError.prototype);
  }
}

/**
 * A fault raised inside a task's work step. Never thrown out of `Task.run()`:
 * it is recorded on the task, which then ends `Failed`.
 */
export class TaskExecutionFault extends TaskpoolError {
  public readonly taskId: number;
  public readonly originalError: unknown;

  constructor(taskId: number, reason: string, originalError?: unknown) {
    super(`TaskExecutionFault: task ${taskId}: ${reason}`, "TASK_EXECUTION_FAULT");
    this.name = "TaskExecutionFault";
    this.taskId = taskId;
    this.originalError = originalError;
    Object.setPrototypeOf(this, TaskExecutionFault.prototype);
  }

  /**
   * Wraps whatever a work step threw.
   */
  static fromUnknown(taskId: number, error: unknown): TaskExecutionFault {
    if (error instanceof TaskExecutionFault) {
      return error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new TaskExecutionFault(taskId, reason, error);
  }
}

/**
 * Fault in the dispatch machinery itself. The only error `runAll()` rejects with.
 */
export class OrchestrationError extends TaskpoolError {
  public readonly causes: unknown[];

  constructor(message: string, causes: unknown[] = []) {
    super(`OrchestrationError: ${message}`, "ORCHESTRATION_ERROR");
    this.name = "OrchestrationError";
    this.causes = causes;
    Object.setPrototypeOf(this, OrchestrationError.prototype);
  }
}

/**
 * A status change outside `Pending → Running → (Completed | Failed)`.
 */
export class InvalidStatusTransitionError extends TaskpoolError {
  public readonly from: string;
  public readonly to: string;

  constructor(from: string, to: string) {
    super(`InvalidStatusTransition: ${from} → ${to}`, "INVALID_STATUS_TRANSITION");
    this.name = "InvalidStatusTransitionError";
    this.from = from;
    this.to = to;
    Object.setPrototypeOf(this, InvalidStatusTransitionError.prototype);
  }
}

/**
 * A single field-level validation failure.
 */
export type ValidationErrorDetail = {
  field: string;
  message: string;
  value: unknown;
};

/**
 * Error for detailed AJV validation failures with multiple field errors.
 */
export class DetailedValidationError extends TaskpoolError {
  constructor(
    subject: string,
    public readonly errors: ValidationErrorDetail[]
  ) {
    const errorSummary = errors
      .map(err => `${err.field}: ${err.message}`)
      .join(', ');

    super(
      `${subject} validation failed: ${errorSummary}`,
      "DETAILED_VALIDATION_ERROR"
    );
    this.name = "DetailedValidationError";
    Object.setPrototypeOf(this, DetailedValidationError.prototype);
  }
}

/**
 * Invalid scheduler or pool configuration.
 */
export class ConfigurationError extends TaskpoolError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
