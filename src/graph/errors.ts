import type { TaskGraphErrorType, ValidationError } from "./types.js";

/** Error thrown by the task graph for structural failures and precondition violations. */
export class TaskGraphError extends Error {
  readonly type: TaskGraphErrorType;
  readonly context: Record<string, unknown>;

  constructor(
    type: TaskGraphErrorType,
    message: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "TaskGraphError";
    this.type = type;
    this.context = context;
  }

  static from(error: ValidationError): TaskGraphError {
    return new TaskGraphError(error.type, error.message, error.context);
  }
}
