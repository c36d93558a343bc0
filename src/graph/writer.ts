import { writeFile, rename, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { randomUUID } from "node:crypto";
import { stringify as yamlStringify } from "yaml";
import type { TaskGraph } from "./graph.js";
import { buildTaskGraph, readTasksDocument } from "./reader.js";
import type { Task } from "./types.js";

// ---------------------------------------------------------------------------
// Atomic write helper
// ---------------------------------------------------------------------------

async function atomicWrite(targetPath: string, content: string): Promise<void> {
  const temp = `${targetPath}.${randomUUID()}.tmp`;
  await writeFile(temp, content, "utf-8");
  await rename(temp, targetPath);
}

/** Task as written to disk: no empty `depends`, no absent group. */
function serializeTask(task: Task): Record<string, unknown> {
  const out: Record<string, unknown> = {
    id: task.id,
    title: task.title,
    completed: task.completed,
  };
  if (task.depends.length > 0) {
    out.depends = task.depends;
  }
  if (task.parallelGroup !== undefined) {
    out.parallelGroup = task.parallelGroup;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Serialize tasks to YAML and write atomically. */
export async function writeTasksFile(
  path: string,
  tasks: readonly Task[],
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await atomicWrite(path, yamlStringify({ tasks: tasks.map(serializeTask) }));
}

/**
 * Atomic read-modify-write of one task's completion flag. The file keeps its
 * parallel-group tags; the returned graph has them compiled and is validated.
 * Read, parse and validation failures surface as `TasksFileError`; nothing is
 * written unless the updated file validates.
 */
export async function updateTaskCompletion(
  path: string,
  taskId: string,
  completed: boolean,
): Promise<TaskGraph> {
  const doc = await readTasksDocument(path);

  const task = doc.tasks.find((t) => t.id === taskId);
  if (!task) {
    throw new Error(`Task not found in ${path}: ${taskId}`);
  }
  task.completed = completed;

  const graph = buildTaskGraph(path, doc);

  await writeTasksFile(path, doc.tasks);
  return graph;
}
