import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { ZodError } from "zod";
import {
  taskgraphConfigSchema,
  type AgentConfig,
  type ProjectConfig,
  type TaskgraphConfig,
} from "./schema.js";

export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ConfigError";
  }
}

/** `$XDG_CONFIG_HOME/taskgraph/config.json`, falling back to `~/.config`. */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(base, "taskgraph", "config.json");
}

function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}

export async function loadConfig(
  path: string = defaultConfigPath(),
): Promise<TaskgraphConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Failed to read config file: ${path}`, err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Failed to parse config file: ${path}`, err);
  }

  const result = taskgraphConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Config validation failed: ${formatIssues(result.error)}`,
      result.error,
    );
  }
  return result.data;
}

export function findProject(
  config: TaskgraphConfig,
  name: string,
): ProjectConfig | undefined {
  return config.projects.find((p) => p.name === name);
}

/** Absolute path of a project's tasks file. */
export function resolveTasksPath(project: ProjectConfig): string {
  return resolve(project.repoPath, project.tasksFile);
}

export function effectiveMaxIterations(
  project: ProjectConfig,
  agent: AgentConfig,
): number {
  return project.overrides?.maxIterations ?? agent.maxIterations;
}

export function effectiveAutoPr(project: ProjectConfig, agent: AgentConfig): boolean {
  return project.overrides?.autoPr ?? agent.autoPr;
}

export function effectiveDraftPr(project: ProjectConfig, agent: AgentConfig): boolean {
  return project.overrides?.draftPr ?? agent.draftPr;
}
