import { describe, it, expect } from "vitest";
import {
  findTask,
  findReady,
  findBlocked,
  findIncomplete,
  findCompleted,
  summarize,
} from "../../src/graph/query.js";
import type { Task } from "../../src/graph/types.js";

// ── Helpers ──────────────────────────────────────────────────────────

function makeTask(id: string, partial?: Partial<Task>): Task {
  return {
    id,
    title: `Task ${id}`,
    completed: false,
    depends: [],
    ...partial,
  };
}

// ── Tests ────────────────────────────────────────────────────────────

describe("findTask", () => {
  it("returns the matching record or undefined", () => {
    const tasks = [makeTask("a"), makeTask("b")];
    expect(findTask(tasks, "b")).toBe(tasks[1]);
    expect(findTask(tasks, "c")).toBeUndefined();
  });
});

describe("findReady", () => {
  it("excludes a task whose dependency does not exist", () => {
    expect(findReady([makeTask("b", { depends: ["x"] })])).toEqual([]);
  });

  it("includes tasks with no dependencies and tasks whose dependencies are complete", () => {
    const tasks = [
      makeTask("a", { completed: true }),
      makeTask("b", { depends: ["a"] }),
      makeTask("c"),
      makeTask("d", { depends: ["c"] }),
    ];
    expect(findReady(tasks).map((t) => t.id)).toEqual(["b", "c"]);
  });
});

describe("findBlocked", () => {
  it("counts a missing dependency as unsatisfied", () => {
    const b = makeTask("b", { depends: ["x"] });
    expect(findBlocked([b])).toEqual([{ task: b, unsatisfied: ["x"] }]);
  });

  it("lists missing and incomplete dependencies together in depends order", () => {
    const tasks = [
      makeTask("a"),
      makeTask("done", { completed: true }),
      makeTask("c", { depends: ["ghost", "done", "a", "ghost"] }),
    ];
    expect(findBlocked(tasks)).toEqual([{ task: tasks[2], unsatisfied: ["ghost", "a"] }]);
  });

  it("skips completed tasks even when their dependencies are unmet", () => {
    expect(findBlocked([makeTask("a", { completed: true, depends: ["x"] })])).toEqual([]);
  });
});

describe("findIncomplete / findCompleted", () => {
  it("split the list by completion in insertion order", () => {
    const tasks = [
      makeTask("a", { completed: true }),
      makeTask("b"),
      makeTask("c", { completed: true }),
    ];
    expect(findIncomplete(tasks).map((t) => t.id)).toEqual(["b"]);
    expect(findCompleted(tasks).map((t) => t.id)).toEqual(["a", "c"]);
  });
});

describe("summarize", () => {
  it("treats an empty list as complete", () => {
    expect(summarize([])).toEqual({
      total: 0,
      completed: 0,
      remaining: 0,
      ready: 0,
      blocked: 0,
      isComplete: true,
    });
  });
});
