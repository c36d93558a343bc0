import { readFile } from "node:fs/promises";
import { parse as yamlParse } from "yaml";
import { TaskGraph } from "./graph.js";
import { compileParallelGroups } from "./groups.js";
import { tasksDocumentSchema } from "./schemas.js";
import type { TasksDocument } from "./types.js";

export type TasksFileStage = "read" | "parse" | "validate";

/** Loading a tasks file failed. `stage` tells which step; the underlying error is the `cause`. */
export class TasksFileError extends Error {
  readonly stage: TasksFileStage;
  readonly path: string;

  constructor(stage: TasksFileStage, path: string, message: string, cause: unknown) {
    super(message, { cause });
    this.name = "TasksFileError";
    this.stage = stage;
    this.path = path;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Parse YAML text and check it against the tasks schema. Throws on either failure. */
export function parseTasksDocument(content: string): TasksDocument {
  const data: unknown = yamlParse(content);
  return tasksDocumentSchema.parse(data);
}

/** Read and parse a tasks file as written, parallel-group tags uncompiled. */
export async function readTasksDocument(path: string): Promise<TasksDocument> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new TasksFileError(
      "read",
      path,
      `Failed to read tasks file: ${path}: ${errorMessage(err)}`,
      err,
    );
  }

  try {
    return parseTasksDocument(raw);
  } catch (err) {
    throw new TasksFileError(
      "parse",
      path,
      `Failed to parse tasks file: ${path}: ${errorMessage(err)}`,
      err,
    );
  }
}

/** Compile parallel groups and validate, reporting failures against `path`. */
export function buildTaskGraph(path: string, doc: TasksDocument): TaskGraph {
  const graph = new TaskGraph(compileParallelGroups(doc.tasks));
  try {
    graph.validate();
  } catch (err) {
    throw new TasksFileError(
      "validate",
      path,
      `Validation failed for tasks file ${path}: ${errorMessage(err)}`,
      err,
    );
  }
  return graph;
}

/**
 * Load a tasks file, compile parallel groups into dependencies and validate
 * the result. Only a validated graph is returned.
 */
export async function loadTasksFile(path: string): Promise<TaskGraph> {
  return buildTaskGraph(path, await readTasksDocument(path));
}
