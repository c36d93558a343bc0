/** A single unit of work and its prerequisite edges. */
export interface Task {
  /** Unique identifier within a graph. Dependency edges refer to tasks by this. */
  id: string;
  /** Human-readable title. */
  title: string;
  /** Set by the executor once the task has finished. The graph never writes it. */
  completed: boolean;
  /** IDs of tasks that must be completed before this one can start. Treated as a set. */
  depends: string[];
  /** Legacy batch number. Only read by the parallel-group layer. */
  parallelGroup?: number;
}

/** Parsed tasks file. */
export interface TasksDocument {
  tasks: Task[];
}

/** An incomplete task together with the dependency IDs still holding it back. */
export interface BlockedTask {
  task: Task;
  /** Dependencies that are missing or not yet completed, in `depends` order. */
  unsatisfied: string[];
}

export type TaskGraphErrorType =
  | "duplicate_id"
  | "dangling_dep"
  | "cycle"
  | "not_validated";

/** Structural validation failure. */
export interface ValidationError {
  type: Exclude<TaskGraphErrorType, "not_validated">;
  message: string;
  /** Contextual data; varies by error type. */
  context: Record<string, unknown>;
}

/** Progress summary consumed by the scheduler and the reporter. */
export interface GraphProgress {
  total: number;
  completed: number;
  remaining: number;
  ready: number;
  blocked: number;
  isComplete: boolean;
}
