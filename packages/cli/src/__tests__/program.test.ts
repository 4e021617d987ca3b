/**
 * End-to-end tests for the taskline program, driven in process against a
 * temporary home directory.
 *
 * @module cli/__tests__/program.test
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { type Config, ConfigSchema, Logger } from "@taskline/core";
import { Chalk } from "chalk";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";

import { EXIT_CODES } from "../commands/exit-codes.js";
import { type CliContext, createCliContext } from "../context.js";
import { run } from "../program.js";

interface Harness {
  context: CliContext;
  stdout: string[];
  stderr: string[];
  confirm: Mock<(message: string) => Promise<boolean>>;
  logger: Logger;
}

let homeDir: string;
let taskFile: string;

function createHarness(display: Record<string, unknown> = {}): Harness {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const confirm = vi.fn<(message: string) => Promise<boolean>>().mockResolvedValue(true);
  const logger = new Logger();
  const config: Config = ConfigSchema.parse({ display: { icons: "ascii", ...display } });

  const context = createCliContext({
    config,
    logger,
    homeDir,
    output: {
      stdout: (text) => {
        stdout.push(text);
      },
      stderr: (text) => {
        stderr.push(text);
      },
    },
    chalk: new Chalk({ level: 0 }),
    confirm,
  });

  return { context, stdout, stderr, confirm, logger };
}

function outputLines(chunks: string[]): string[] {
  return chunks.join("").trimEnd().split("\n");
}

async function readTaskFile(): Promise<unknown> {
  return JSON.parse(await fs.readFile(taskFile, "utf-8"));
}

beforeEach(async () => {
  homeDir = await fs.mkdtemp(path.join(os.tmpdir(), "taskline-cli-"));
  taskFile = path.join(homeDir, ".taskline", "tasks.json");
});

afterEach(async () => {
  await fs.rm(homeDir, { recursive: true, force: true });
});

describe("add", () => {
  it("adds a task, confirms it and prints the table", async () => {
    const { context, stdout } = createHarness();

    const code = await run(["add", "buy", "milk"], context);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(outputLines(stdout)).toEqual([
      "Added task 1: buy milk",
      "┌────┬─────────────┬──────────┐",
      "│ ID │ Description │ Status   │",
      "├────┼─────────────┼──────────┤",
      "│  1 │ buy milk    │ [ ] open │",
      "└────┴─────────────┴──────────┘",
    ]);
    expect(await fs.readFile(taskFile, "utf-8")).toBe(
      '[\n  {\n    "id": 1,\n    "description": "buy milk",\n    "done": false\n  }\n]\n'
    );
  });

  it("hands out increasing ids", async () => {
    const { context } = createHarness();

    await run(["add", "first"], context);
    await run(["add", "second"], context);
    await run(["add", "third"], context);

    expect(await readTaskFile()).toEqual([
      { id: 1, description: "first", done: false },
      { id: 2, description: "second", done: false },
      { id: 3, description: "third", done: false },
    ]);
  });

  it("rejects a blank description without creating the file", async () => {
    const { context, stderr } = createHarness();

    const code = await run(["add", "   "], context);

    expect(code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(stderr.join("")).toBe("error: Task description cannot be empty\n");
    await expect(fs.access(taskFile)).rejects.toThrow();
  });
});

describe("list", () => {
  it("runs by default and prints only the header for no tasks", async () => {
    const { context, stdout } = createHarness();

    const code = await run([], context);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(outputLines(stdout)).toEqual([
      "┌────┬─────────────┬────────┐",
      "│ ID │ Description │ Status │",
      "└────┴─────────────┴────────┘",
    ]);
  });

  it("hides done tasks with --pending", async () => {
    const { context, stdout } = createHarness();
    await run(["add", "buy", "milk"], context);
    await run(["add", "call", "mom"], context);
    await run(["done", "1"], context);
    stdout.length = 0;

    await run(["ls", "--pending"], context);

    const lines = outputLines(stdout);
    expect(lines).toContain("│  2 │ call mom    │ [ ] open │");
    expect(lines.some((line) => line.includes("buy milk"))).toBe(false);
  });

  it("honours display.hideDone unless --all is given", async () => {
    const { context, stdout } = createHarness({ hideDone: true });
    await run(["add", "buy", "milk"], context);
    await run(["done", "1"], context);
    stdout.length = 0;

    await run(["list"], context);
    expect(stdout.join("")).not.toContain("buy milk");

    stdout.length = 0;
    await run(["list", "--all"], context);
    expect(outputLines(stdout)).toContain("│  1 │ buy milk    │ [x] done │");
  });

  it("prints JSON with --json", async () => {
    const { context, stdout } = createHarness();
    await run(["add", "buy", "milk"], context);
    stdout.length = 0;

    await run(["list", "--json"], context);

    expect(JSON.parse(stdout.join(""))).toEqual([{ id: 1, description: "buy milk", done: false }]);
  });
});

describe("done and undone", () => {
  it("marks a task done and is idempotent", async () => {
    const { context, stdout } = createHarness();
    await run(["add", "buy", "milk"], context);
    stdout.length = 0;

    expect(await run(["done", "1"], context)).toBe(EXIT_CODES.SUCCESS);
    expect(outputLines(stdout)[0]).toBe("Marked task 1 as done");

    stdout.length = 0;
    expect(await run(["done", "1"], context)).toBe(EXIT_CODES.SUCCESS);
    expect(outputLines(stdout)[0]).toBe("Task 1 is already done");
    expect(await readTaskFile()).toEqual([{ id: 1, description: "buy milk", done: true }]);
  });

  it("reopens a task", async () => {
    const { context, stdout } = createHarness();
    await run(["add", "buy", "milk"], context);
    await run(["done", "1"], context);
    stdout.length = 0;

    await run(["undone", "1"], context);

    expect(outputLines(stdout)[0]).toBe("Marked task 1 as not done");
    expect(await readTaskFile()).toEqual([{ id: 1, description: "buy milk", done: false }]);
  });

  it("exits with NOT_FOUND for an unknown id", async () => {
    const { context, stderr } = createHarness();

    const code = await run(["done", "99"], context);

    expect(code).toBe(EXIT_CODES.NOT_FOUND);
    expect(stderr.join("")).toBe("error: Task 99 not found\n");
  });

  it("rejects a malformed id as a usage error", async () => {
    const { context, stderr } = createHarness();

    const code = await run(["done", "abc"], context);

    expect(code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(stderr.join("")).toContain('Invalid task id "abc": expected a positive integer');
  });
});

describe("edit", () => {
  it("replaces the description", async () => {
    const { context, stdout } = createHarness();
    await run(["add", "buy", "milk"], context);
    stdout.length = 0;

    await run(["edit", "1", "buy", "oat", "milk"], context);

    expect(outputLines(stdout)[0]).toBe("Updated task 1: buy oat milk");
    expect(await readTaskFile()).toEqual([{ id: 1, description: "buy oat milk", done: false }]);
  });
});

describe("remove", () => {
  it("removes a task, after which done reports it missing", async () => {
    const { context, stdout, stderr } = createHarness();
    await run(["add", "buy", "milk"], context);
    await run(["add", "call", "mom"], context);
    stdout.length = 0;

    expect(await run(["rm", "1"], context)).toBe(EXIT_CODES.SUCCESS);
    expect(outputLines(stdout)[0]).toBe("Removed task 1: buy milk");
    expect(await readTaskFile()).toEqual([{ id: 2, description: "call mom", done: false }]);

    expect(await run(["done", "1"], context)).toBe(EXIT_CODES.NOT_FOUND);
    expect(stderr.join("")).toBe("error: Task 1 not found\n");
  });

  it("accepts the delete alias", async () => {
    const { context } = createHarness();
    await run(["add", "buy", "milk"], context);

    expect(await run(["delete", "1"], context)).toBe(EXIT_CODES.SUCCESS);
    expect(await readTaskFile()).toEqual([]);
  });
});

describe("swap", () => {
  it("exchanges the contents of two tasks", async () => {
    const { context, stdout } = createHarness();
    await run(["add", "first"], context);
    await run(["add", "second"], context);
    await run(["done", "2"], context);
    stdout.length = 0;

    await run(["swap", "1", "2"], context);

    expect(outputLines(stdout)[0]).toBe("Swapped tasks 1 and 2");
    expect(await readTaskFile()).toEqual([
      { id: 1, description: "second", done: true },
      { id: 2, description: "first", done: false },
    ]);
  });
});

describe("reset", () => {
  it("clears the list once confirmed", async () => {
    const { context, stdout, confirm } = createHarness();
    await run(["add", "first"], context);
    await run(["add", "second"], context);
    stdout.length = 0;

    const code = await run(["reset"], context);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(confirm).toHaveBeenCalledWith("Permanently remove 2 tasks?");
    expect(outputLines(stdout)[0]).toBe("Removed 2 tasks");
    expect(await readTaskFile()).toEqual([]);
  });

  it("keeps the tasks when the user declines", async () => {
    const { context, stdout, confirm } = createHarness();
    await run(["add", "first"], context);
    confirm.mockResolvedValueOnce(false);
    stdout.length = 0;

    await run(["reset"], context);

    expect(stdout.join("")).toBe("Aborted, no tasks were removed\n");
    expect(await readTaskFile()).toEqual([{ id: 1, description: "first", done: false }]);
  });

  it("skips the prompt with --force", async () => {
    const { context, confirm } = createHarness();
    await run(["add", "first"], context);

    await run(["reset", "--force"], context);

    expect(confirm).not.toHaveBeenCalled();
    expect(await readTaskFile()).toEqual([]);
  });

  it("has nothing to do for an empty list", async () => {
    const { context, stdout, confirm } = createHarness();

    await run(["reset"], context);

    expect(confirm).not.toHaveBeenCalled();
    expect(stdout.join("")).toBe("No tasks to remove\n");
  });

  it("exits with INTERRUPTED when the prompt is cancelled", async () => {
    const { context, confirm } = createHarness();
    await run(["add", "first"], context);
    const cancelled = new Error("User force closed the prompt");
    cancelled.name = "ExitPromptError";
    confirm.mockRejectedValueOnce(cancelled);

    expect(await run(["reset"], context)).toBe(EXIT_CODES.INTERRUPTED);
    expect(await readTaskFile()).toEqual([{ id: 1, description: "first", done: false }]);
  });
});

describe("info", () => {
  it("prints the file location and counts", async () => {
    const { context, stdout } = createHarness();
    await run(["add", "first"], context);
    await run(["add", "second"], context);
    await run(["done", "1"], context);
    stdout.length = 0;

    await run(["info"], context);

    expect(outputLines(stdout)).toEqual([
      `File:      ${taskFile}`,
      "Done:      1",
      "Remaining: 1",
      "Total:     2",
    ]);
  });
});

describe("errors and global options", () => {
  it("exits with STORAGE_ERROR for a corrupted task file", async () => {
    await fs.mkdir(path.dirname(taskFile), { recursive: true });
    await fs.writeFile(taskFile, "{not json", "utf-8");
    const { context, stderr } = createHarness();

    const code = await run(["list"], context);

    expect(code).toBe(EXIT_CODES.STORAGE_ERROR);
    expect(stderr.join("")).toMatch(/^error: Task file .+ is not valid JSON: /);
  });

  it("exits with USAGE_ERROR for an unknown option", async () => {
    const { context, stderr } = createHarness();

    const code = await run(["list", "--nope"], context);

    expect(code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(stderr.join("")).toContain("unknown option '--nope'");
  });

  it("exits with USAGE_ERROR for an unknown command", async () => {
    const { context } = createHarness();

    expect(await run(["frobnicate"], context)).toBe(EXIT_CODES.USAGE_ERROR);
  });

  it("prints the version and exits successfully", async () => {
    const { context, stdout } = createHarness();

    const code = await run(["--version"], context);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(stdout.join("")).toBe("0.0.0-dev\n");
  });

  it("prints help and exits successfully", async () => {
    const { context, stdout } = createHarness();

    const code = await run(["--help"], context);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(stdout.join("")).toContain("Usage: taskline");
  });

  it("raises the log level with --verbose", async () => {
    const { context, logger } = createHarness();

    await run(["--verbose", "list"], context);

    expect(logger.getLevel()).toBe("debug");
  });
});
