import { TaskGraphError } from "./errors.js";
import {
  findBlocked,
  findCompleted,
  findIncomplete,
  findReady,
  findTask,
  summarize,
} from "./query.js";
import type { BlockedTask, GraphProgress, Task } from "./types.js";
import { eliminate, findValidationError } from "./validator.js";

/** Fingerprint of everything except completion flags. */
function structureOf(tasks: readonly Task[]): string {
  return JSON.stringify(tasks.map((t) => [t.id, t.depends]));
}

/**
 * An ordered task list plus its validation and query algorithms.
 *
 * Queries require a prior successful `validate()`. After validation the only
 * permitted mutation is flipping `completed` on a task record; any change to
 * IDs, dependency lists or the list itself makes queries throw until
 * `validate()` is called again.
 */
export class TaskGraph {
  readonly tasks: Task[];
  private validatedStructure: string | null = null;

  constructor(tasks: Task[]) {
    this.tasks = tasks;
  }

  /**
   * Uniqueness, then referential integrity, then acyclicity. Throws a
   * `TaskGraphError` describing the first failure.
   */
  validate(): void {
    this.validatedStructure = null;
    const error = findValidationError(this.tasks);
    if (error) throw TaskGraphError.from(error);
    this.validatedStructure = structureOf(this.tasks);
  }

  /** True if the graph validated and has not changed shape since. */
  get isValidated(): boolean {
    return (
      this.validatedStructure !== null &&
      this.validatedStructure === structureOf(this.tasks)
    );
  }

  getTaskById(id: string): Task | undefined {
    this.assertValidated();
    return findTask(this.tasks, id);
  }

  getReadyTasks(): Task[] {
    this.assertValidated();
    return findReady(this.tasks);
  }

  getBlockedTasks(): BlockedTask[] {
    this.assertValidated();
    return findBlocked(this.tasks);
  }

  /**
   * All tasks, dependencies before dependents, regardless of completion.
   * Runs the same structural checks as `validate()`, so it does not need one first.
   */
  topologicalOrder(): Task[] {
    const error = findValidationError(this.tasks);
    if (error) throw TaskGraphError.from(error);
    return eliminate(this.tasks).order;
  }

  totalTasks(): number {
    return this.tasks.length;
  }

  completedTasks(): number {
    return this.completedTaskList().length;
  }

  remainingTasks(): number {
    return this.incompleteTasks().length;
  }

  incompleteTasks(): Task[] {
    return findIncomplete(this.tasks);
  }

  completedTaskList(): Task[] {
    return findCompleted(this.tasks);
  }

  progress(): GraphProgress {
    this.assertValidated();
    return summarize(this.tasks);
  }

  private assertValidated(): void {
    if (this.validatedStructure === null) {
      throw new TaskGraphError(
        "not_validated",
        "Task graph has not been validated; call validate() first",
      );
    }
    if (this.validatedStructure !== structureOf(this.tasks)) {
      throw new TaskGraphError(
        "not_validated",
        "Task graph changed structurally since validation; call validate() again",
      );
    }
  }
}
