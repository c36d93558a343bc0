import type { Task } from "./types.js";

/** Tasks tagged with the given parallel group, insertion order. */
export function tasksByGroup(tasks: readonly Task[], group: number): Task[] {
  return tasks.filter((t) => t.parallelGroup === group);
}

export function incompleteTasksByGroup(tasks: readonly Task[], group: number): Task[] {
  return tasks.filter((t) => !t.completed && t.parallelGroup === group);
}

/** Lowest group number that still has incomplete tasks. */
export function nextParallelGroup(tasks: readonly Task[]): number | undefined {
  let next: number | undefined;
  for (const task of tasks) {
    if (task.completed || task.parallelGroup === undefined) continue;
    if (next === undefined || task.parallelGroup < next) next = task.parallelGroup;
  }
  return next;
}

/**
 * Compile parallel-group tags into explicit dependencies. Every task in group
 * `g` gains a dependency on each task of the nearest lower group present.
 * Untagged tasks and existing `depends` entries are left as they are.
 *
 * Returns new task records; the input is not modified.
 */
export function compileParallelGroups(tasks: readonly Task[]): Task[] {
  const groups = [...new Set(
    tasks.flatMap((t) => (t.parallelGroup === undefined ? [] : [t.parallelGroup])),
  )].sort((a, b) => a - b);

  const previous = new Map<number, string[]>();
  for (let i = 1; i < groups.length; i++) {
    previous.set(groups[i], tasksByGroup(tasks, groups[i - 1]).map((t) => t.id));
  }

  return tasks.map((task) => {
    const generated =
      task.parallelGroup === undefined ? [] : previous.get(task.parallelGroup) ?? [];
    const depends = [...task.depends];
    for (const id of generated) {
      if (!depends.includes(id)) depends.push(id);
    }
    return { ...task, depends };
  });
}
