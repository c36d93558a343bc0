import type { BlockedTask, GraphProgress, Task } from "../graph/types.js";

function formatTask(task: Task): string {
  const icon = task.completed ? "[x]" : "[ ]";
  return `- ${icon} ${task.id}: ${task.title}`;
}

export function formatStatusReport(
  name: string,
  progress: GraphProgress,
  ready: Task[],
  blocked: BlockedTask[],
): string {
  const lines: string[] = [];

  lines.push(`## ${name}`);
  lines.push(`**Status:** ${progress.isComplete ? "COMPLETE" : "IN PROGRESS"}`);
  lines.push(`**Progress:** ${progress.completed}/${progress.total} tasks complete`);
  lines.push(`**Ready:** ${progress.ready} | **Blocked:** ${progress.blocked}`);
  lines.push("");

  if (ready.length > 0) {
    lines.push("### Ready");
    lines.push(formatReadyList(ready));
    lines.push("");
  }

  if (blocked.length > 0) {
    lines.push("### Blocked");
    lines.push(formatBlockedList(blocked));
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

export function formatReadyList(tasks: Task[]): string {
  if (tasks.length === 0) return "No tasks ready.";
  return tasks.map(formatTask).join("\n");
}

export function formatBlockedList(blocked: BlockedTask[]): string {
  if (blocked.length === 0) return "No tasks blocked.";
  return blocked
    .map(({ task, unsatisfied }) => `${formatTask(task)} (waiting on ${unsatisfied.join(", ")})`)
    .join("\n");
}

/** Numbered execution order. */
export function formatOrder(tasks: Task[]): string {
  return tasks
    .map((task, i) => `${i + 1}. ${task.id}${task.completed ? " (done)" : ""}`)
    .join("\n");
}

export function formatValidationFailure(path: string, message: string): string {
  return [`## Validation Report`, `**File:** ${path}`, `**Status:** FAILED`, "", `- ${message}`].join("\n");
}
