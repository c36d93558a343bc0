import type { BlockedTask, GraphProgress, Task } from "./types.js";

// ── Helpers ──────────────────────────────────────────────────────────

/** Set of IDs of completed tasks. */
function completedIds(tasks: readonly Task[]): Set<string> {
  const ids = new Set<string>();
  for (const task of tasks) {
    if (task.completed) ids.add(task.id);
  }
  return ids;
}

/** Dependencies of a task that are missing or incomplete, deduplicated, in `depends` order. */
function unsatisfiedDeps(task: Task, done: Set<string>): string[] {
  const result: string[] = [];
  for (const dep of new Set(task.depends)) {
    if (!done.has(dep)) result.push(dep);
  }
  return result;
}

// ── Query Functions ──────────────────────────────────────────────────

/** Linear lookup by exact ID. */
export function findTask(tasks: readonly Task[], id: string): Task | undefined {
  return tasks.find((t) => t.id === id);
}

/**
 * Returns tasks that are ready to start:
 * - not completed
 * - every dependency exists and is completed
 *
 * Insertion order is preserved.
 */
export function findReady(tasks: readonly Task[]): Task[] {
  const done = completedIds(tasks);
  return tasks.filter(
    (t) => !t.completed && unsatisfiedDeps(t, done).length === 0,
  );
}

/**
 * Returns incomplete tasks with at least one dependency that is missing or
 * not completed, each paired with those dependency IDs.
 */
export function findBlocked(tasks: readonly Task[]): BlockedTask[] {
  const done = completedIds(tasks);
  const result: BlockedTask[] = [];

  for (const task of tasks) {
    if (task.completed) continue;
    const unsatisfied = unsatisfiedDeps(task, done);
    if (unsatisfied.length > 0) {
      result.push({ task, unsatisfied });
    }
  }

  return result;
}

export function findIncomplete(tasks: readonly Task[]): Task[] {
  return tasks.filter((t) => !t.completed);
}

export function findCompleted(tasks: readonly Task[]): Task[] {
  return tasks.filter((t) => t.completed);
}

/** Count summary. `isComplete` is true for an empty list. */
export function summarize(tasks: readonly Task[]): GraphProgress {
  const completed = findCompleted(tasks).length;
  return {
    total: tasks.length,
    completed,
    remaining: tasks.length - completed,
    ready: findReady(tasks).length,
    blocked: findBlocked(tasks).length,
    isComplete: completed === tasks.length,
  };
}
