import type { Task, ValidationError } from "./types.js";

/** Result of a Kahn elimination pass over the dependency graph. */
export interface Elimination {
  /** Tasks in removal order. */
  order: Task[];
  /** Tasks never reaching in-degree zero (on or downstream of a cycle), in insertion order. */
  remaining: Task[];
}

/**
 * Run all structural checks on a task list, cheapest first.
 * Returns the first failure found, null if the list is well-formed.
 */
export function findValidationError(tasks: readonly Task[]): ValidationError | null {
  const duplicate = findDuplicateId(tasks);
  if (duplicate !== null) {
    return {
      type: "duplicate_id",
      message: `Duplicate task ID: "${duplicate}"`,
      context: { id: duplicate },
    };
  }

  const dangling = findDanglingEdge(tasks);
  if (dangling) {
    return {
      type: "dangling_dep",
      message: `task "${dangling.from}" depends on non-existent task "${dangling.to}"`,
      context: dangling,
    };
  }

  return detectCycle(tasks);
}

/** First ID that repeats, in collection order. */
export function findDuplicateId(tasks: readonly Task[]): string | null {
  const seen = new Set<string>();
  for (const task of tasks) {
    if (seen.has(task.id)) return task.id;
    seen.add(task.id);
  }
  return null;
}

/** First dependency edge pointing at an ID that isn't in the list. */
export function findDanglingEdge(
  tasks: readonly Task[],
): { from: string; to: string } | null {
  const ids = new Set(tasks.map((t) => t.id));
  for (const task of tasks) {
    for (const dep of task.depends) {
      if (!ids.has(dep)) return { from: task.id, to: dep };
    }
  }
  return null;
}

/**
 * Kahn-based cycle check. Names every task that could not be eliminated:
 * cycle members and the tasks downstream of them.
 */
export function detectCycle(tasks: readonly Task[]): ValidationError | null {
  const { remaining } = eliminate(tasks);
  if (remaining.length === 0) return null;

  const ids = remaining.map((t) => t.id);
  return {
    type: "cycle",
    message: `Circular dependency detected; tasks that cannot be scheduled: ${ids.join(", ")}`,
    context: { tasks: ids },
  };
}

/**
 * Kahn elimination. Edges run from each dependency to its dependents; repeated
 * entries in a `depends` list count once. Zero in-degree tasks are processed
 * FIFO, seeded in insertion order, so the removal order is stable for a given input.
 *
 * Expects unique IDs. Edges to unknown IDs are ignored.
 */
export function eliminate(tasks: readonly Task[]): Elimination {
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  const byId = new Map<string, Task>();

  for (const task of tasks) {
    byId.set(task.id, task);
    inDegree.set(task.id, 0);
    dependents.set(task.id, []);
  }

  for (const task of tasks) {
    for (const dep of new Set(task.depends)) {
      const edges = dependents.get(dep);
      if (!edges) continue;
      edges.push(task.id);
      inDegree.set(task.id, (inDegree.get(task.id) ?? 0) + 1);
    }
  }

  const queue: string[] = [];
  for (const task of tasks) {
    if (inDegree.get(task.id) === 0) queue.push(task.id);
  }

  const order: Task[] = [];
  for (let head = 0; head < queue.length; head++) {
    const id = queue[head];
    const task = byId.get(id);
    if (task) order.push(task);

    for (const next of dependents.get(id) ?? []) {
      const degree = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, degree);
      if (degree === 0) queue.push(next);
    }
  }

  const removed = new Set(queue);
  const remaining = tasks.filter((t) => !removed.has(t.id));
  return { order, remaining };
}
