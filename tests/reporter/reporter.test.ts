import { describe, it, expect } from "vitest";
import {
  formatStatusReport,
  formatReadyList,
  formatBlockedList,
  formatOrder,
  formatValidationFailure,
} from "../../src/reporter/human.js";
import { formatJsonReport } from "../../src/reporter/json.js";
import type { GraphProgress, Task } from "../../src/graph/types.js";

function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: "build",
    title: "Build the bundle",
    completed: false,
    depends: [],
    ...overrides,
  };
}

function makeProgress(overrides: Partial<GraphProgress> = {}): GraphProgress {
  return {
    total: 3,
    completed: 1,
    remaining: 2,
    ready: 1,
    blocked: 1,
    isComplete: false,
    ...overrides,
  };
}

describe("formatReadyList", () => {
  it("lists tasks with unchecked boxes", () => {
    const tasks = [makeTask(), makeTask({ id: "lint", title: "Lint sources" })];
    expect(formatReadyList(tasks)).toBe("- [ ] build: Build the bundle\n- [ ] lint: Lint sources");
  });

  it("says so when nothing is ready", () => {
    expect(formatReadyList([])).toBe("No tasks ready.");
  });
});

describe("formatBlockedList", () => {
  it("names the dependencies each task waits on", () => {
    const blocked = [
      { task: makeTask({ id: "deploy", title: "Deploy", depends: ["build", "test"] }), unsatisfied: ["build", "test"] },
    ];
    expect(formatBlockedList(blocked)).toBe("- [ ] deploy: Deploy (waiting on build, test)");
  });

  it("says so when nothing is blocked", () => {
    expect(formatBlockedList([])).toBe("No tasks blocked.");
  });
});

describe("formatOrder", () => {
  it("numbers tasks and marks completed ones", () => {
    const tasks = [makeTask({ id: "install", completed: true }), makeTask()];
    expect(formatOrder(tasks)).toBe("1. install (done)\n2. build");
  });
});

describe("formatStatusReport", () => {
  it("renders progress, ready and blocked sections", () => {
    const report = formatStatusReport(
      "web",
      makeProgress(),
      [makeTask()],
      [{ task: makeTask({ id: "deploy", title: "Deploy" }), unsatisfied: ["build"] }],
    );

    expect(report).toBe(
      [
        "## web",
        "**Status:** IN PROGRESS",
        "**Progress:** 1/3 tasks complete",
        "**Ready:** 1 | **Blocked:** 1",
        "",
        "### Ready",
        "- [ ] build: Build the bundle",
        "",
        "### Blocked",
        "- [ ] deploy: Deploy (waiting on build)",
      ].join("\n"),
    );
  });

  it("omits empty sections for a finished graph", () => {
    const report = formatStatusReport(
      "web",
      makeProgress({ completed: 3, remaining: 0, ready: 0, blocked: 0, isComplete: true }),
      [],
      [],
    );

    expect(report).toBe(
      [
        "## web",
        "**Status:** COMPLETE",
        "**Progress:** 3/3 tasks complete",
        "**Ready:** 0 | **Blocked:** 0",
      ].join("\n"),
    );
  });
});

describe("formatValidationFailure", () => {
  it("includes the file and the message", () => {
    expect(formatValidationFailure("tasks.yaml", 'Duplicate task ID: "a"')).toBe(
      '## Validation Report\n**File:** tasks.yaml\n**Status:** FAILED\n\n- Duplicate task ID: "a"',
    );
  });
});

describe("formatJsonReport", () => {
  it("pretty-prints with two-space indentation", () => {
    expect(formatJsonReport({ valid: true })).toBe('{\n  "valid": true\n}');
  });
});
