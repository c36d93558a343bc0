#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  defaultConfigPath,
  effectiveAutoPr,
  effectiveDraftPr,
  effectiveMaxIterations,
  findProject,
  loadConfig,
  resolveTasksPath,
} from "./config/loader.js";
import { loadTasksFile, TasksFileError } from "./graph/reader.js";
import { updateTaskCompletion } from "./graph/writer.js";
import {
  formatBlockedList,
  formatOrder,
  formatReadyList,
  formatStatusReport,
  formatValidationFailure,
} from "./reporter/human.js";
import { formatJsonReport } from "./reporter/json.js";

const __filename_cli = fileURLToPath(import.meta.url);
const __dirname_cli = dirname(__filename_cli);
const cliPkgVersion = (
  JSON.parse(readFileSync(join(__dirname_cli, "..", "package.json"), "utf-8")) as {
    version: string;
  }
).version;

interface TargetOptions {
  project?: string;
  config?: string;
  json?: boolean;
}

/** Tasks file from the positional argument, or from a configured project. */
async function resolveTarget(file: string | undefined, opts: TargetOptions): Promise<string> {
  if (file) return file;
  if (!opts.project) {
    throw new Error("Provide a tasks file or --project <name>");
  }
  const config = await loadConfig(opts.config ?? defaultConfigPath());
  const project = findProject(config, opts.project);
  if (!project) {
    const names = config.projects.map((p) => p.name).join(", ");
    throw new Error(`Project "${opts.project}" not found. Configured projects: ${names}`);
  }
  return resolveTasksPath(project);
}

function fail(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exit(1);
}

function withTargetOptions(command: Command): Command {
  return command
    .option("--project <name>", "Read the tasks file of a configured project")
    .option("--config <path>", "Config file path (default: $XDG_CONFIG_HOME/taskgraph/config.json)")
    .option("--json", "Output structured JSON instead of human-readable text");
}

const program = new Command();

program
  .name("taskgraph")
  .description("Dependency-aware task list queries")
  .version(cliPkgVersion);

withTargetOptions(
  program
    .command("validate")
    .argument("[file]", "Path to a tasks YAML file")
    .description("Check IDs, dependency references and cycles"),
).action(async (file: string | undefined, opts: TargetOptions) => {
  let path: string;
  try {
    path = await resolveTarget(file, opts);
  } catch (err) {
    fail(err);
  }

  try {
    const graph = await loadTasksFile(path);
    if (opts.json) {
      console.log(formatJsonReport({ valid: true, path, tasks: graph.totalTasks() }));
    } else {
      console.log(`${path}: ${graph.totalTasks()} tasks, valid`);
    }
  } catch (err) {
    if (err instanceof TasksFileError && err.stage === "validate") {
      const cause = err.cause instanceof Error ? err.cause.message : err.message;
      if (opts.json) {
        console.log(formatJsonReport({ valid: false, path, error: cause }));
      } else {
        console.error(formatValidationFailure(path, cause));
      }
      process.exit(1);
    }
    fail(err);
  }
});

withTargetOptions(
  program
    .command("ready")
    .argument("[file]", "Path to a tasks YAML file")
    .description("List tasks whose dependencies are all complete"),
).action(async (file: string | undefined, opts: TargetOptions) => {
  try {
    const graph = await loadTasksFile(await resolveTarget(file, opts));
    const ready = graph.getReadyTasks();
    console.log(opts.json ? formatJsonReport(ready) : formatReadyList(ready));
  } catch (err) {
    fail(err);
  }
});

withTargetOptions(
  program
    .command("blocked")
    .argument("[file]", "Path to a tasks YAML file")
    .description("List incomplete tasks and the dependencies they wait on"),
).action(async (file: string | undefined, opts: TargetOptions) => {
  try {
    const graph = await loadTasksFile(await resolveTarget(file, opts));
    const blocked = graph.getBlockedTasks();
    if (opts.json) {
      console.log(
        formatJsonReport(blocked.map(({ task, unsatisfied }) => ({ id: task.id, unsatisfied }))),
      );
    } else {
      console.log(formatBlockedList(blocked));
    }
  } catch (err) {
    fail(err);
  }
});

withTargetOptions(
  program
    .command("order")
    .argument("[file]", "Path to a tasks YAML file")
    .description("Print every task in dependency order"),
).action(async (file: string | undefined, opts: TargetOptions) => {
  try {
    const graph = await loadTasksFile(await resolveTarget(file, opts));
    const order = graph.topologicalOrder();
    console.log(opts.json ? formatJsonReport(order.map((t) => t.id)) : formatOrder(order));
  } catch (err) {
    fail(err);
  }
});

withTargetOptions(
  program
    .command("status")
    .argument("[file]", "Path to a tasks YAML file")
    .description("Show progress, ready and blocked tasks"),
).action(async (file: string | undefined, opts: TargetOptions) => {
  try {
    const path = await resolveTarget(file, opts);
    const graph = await loadTasksFile(path);
    const progress = graph.progress();
    if (opts.json) {
      console.log(formatJsonReport(progress));
    } else {
      console.log(
        formatStatusReport(
          opts.project ?? path,
          progress,
          graph.getReadyTasks(),
          graph.getBlockedTasks(),
        ),
      );
    }
  } catch (err) {
    fail(err);
  }
});

withTargetOptions(
  program
    .command("complete")
    .argument("<id>", "Task ID")
    .argument("[file]", "Path to a tasks YAML file")
    .option("--undo", "Mark the task incomplete instead")
    .description("Set a task's completion flag in the tasks file"),
).action(async (id: string, file: string | undefined, opts: TargetOptions & { undo?: boolean }) => {
  try {
    const path = await resolveTarget(file, opts);
    const graph = await updateTaskCompletion(path, id, !opts.undo);
    const ready = graph.getReadyTasks();
    if (opts.json) {
      console.log(formatJsonReport({ id, completed: !opts.undo, ready: ready.map((t) => t.id) }));
    } else {
      console.log(`${id}: ${opts.undo ? "marked incomplete" : "marked complete"}`);
      console.log(`Now ready: ${ready.length > 0 ? ready.map((t) => t.id).join(", ") : "none"}`);
    }
  } catch (err) {
    fail(err);
  }
});

program
  .command("projects")
  .description("List configured projects with effective agent settings")
  .option("--config <path>", "Config file path (default: $XDG_CONFIG_HOME/taskgraph/config.json)")
  .option("--json", "Output structured JSON instead of human-readable text")
  .action(async (opts: { config?: string; json?: boolean }) => {
    try {
      const config = await loadConfig(opts.config ?? defaultConfigPath());
      const rows = config.projects.map((project) => ({
        name: project.name,
        tasksFile: resolveTasksPath(project),
        baseBranch: project.baseBranch,
        maxParallel: project.maxParallel,
        maxIterations: effectiveMaxIterations(project, config.agent),
        autoPr: effectiveAutoPr(project, config.agent),
        draftPr: effectiveDraftPr(project, config.agent),
      }));
      if (opts.json) {
        console.log(formatJsonReport(rows));
        return;
      }
      for (const row of rows) {
        console.log(`- ${row.name} (${row.baseBranch}): ${row.tasksFile}`);
        console.log(
          `  parallel ${row.maxParallel}, iterations ${row.maxIterations}, auto PR ${row.autoPr ? "on" : "off"}${row.draftPr ? " (draft)" : ""}`,
        );
      }
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync(process.argv);
