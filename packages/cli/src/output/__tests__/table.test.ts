import type { Task } from "@taskline/core";
import { asciiIcons, unicodeIcons } from "@taskline/shared";
import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";
import { renderTaskSummary, renderTaskTable } from "../table.js";

const chalk = new Chalk({ level: 0 });

function lines(output: string): string[] {
  return output.trimEnd().split("\n");
}

describe("renderTaskTable", () => {
  it("renders a single open task", () => {
    const tasks: Task[] = [{ id: 1, description: "buy milk", done: false }];

    expect(lines(renderTaskTable(tasks, { chalk, icons: asciiIcons }))).toEqual([
      "┌────┬─────────────┬──────────┐",
      "│ ID │ Description │ Status   │",
      "├────┼─────────────┼──────────┤",
      "│  1 │ buy milk    │ [ ] open │",
      "└────┴─────────────┴──────────┘",
    ]);
  });

  it("renders only the header for an empty list", () => {
    expect(lines(renderTaskTable([], { chalk, icons: asciiIcons }))).toEqual([
      "┌────┬─────────────┬────────┐",
      "│ ID │ Description │ Status │",
      "└────┴─────────────┴────────┘",
    ]);
  });

  it("marks done tasks and draws no line between rows", () => {
    const tasks: Task[] = [
      { id: 1, description: "buy milk", done: true },
      { id: 12, description: "call mom", done: false },
    ];

    expect(lines(renderTaskTable(tasks, { chalk, icons: asciiIcons }))).toEqual([
      "┌────┬─────────────┬──────────┐",
      "│ ID │ Description │ Status   │",
      "├────┼─────────────┼──────────┤",
      "│  1 │ buy milk    │ [x] done │",
      "│ 12 │ call mom    │ [ ] open │",
      "└────┴─────────────┴──────────┘",
    ]);
  });

  it("uses the configured icon set", () => {
    const tasks: Task[] = [{ id: 1, description: "buy milk", done: true }];

    const output = renderTaskTable(tasks, { chalk, icons: unicodeIcons });

    expect(output).toContain("✓ done");
  });

  it("uses the requested border template", () => {
    const tasks: Task[] = [{ id: 1, description: "buy milk", done: false }];

    const output = lines(renderTaskTable(tasks, { chalk, icons: asciiIcons, border: "ramac" }));

    expect(output[0]).toBe("+----+-------------+----------+");
    expect(output[3]).toBe("|  1 | buy milk    | [ ] open |");
  });

  it("wraps long descriptions at word boundaries", () => {
    const tasks: Task[] = [{ id: 1, description: "alpha beta gamma delta", done: false }];

    const output = lines(renderTaskTable(tasks, { chalk, icons: asciiIcons, maxWidth: 12 }));

    expect(output).toContain("│  1 │ alpha beta   │ [ ] open │");
    expect(output).toContain("│    │ gamma delta  │          │");
  });

  it("replaces tabs in descriptions", () => {
    const tasks: Task[] = [{ id: 1, description: "a\tb", done: false }];

    const output = lines(renderTaskTable(tasks, { chalk, icons: asciiIcons }));

    expect(output[3]).toBe("│  1 │ a  b        │ [ ] open │");
  });

  it("styles done descriptions when colours are on", () => {
    const tasks: Task[] = [{ id: 1, description: "buy milk", done: true }];
    const colored = new Chalk({ level: 1 });

    const output = renderTaskTable(tasks, { chalk: colored, icons: asciiIcons });

    // strikethrough, dim and green SGR codes
    expect(output).toContain("\u001B[9m");
    expect(output).toContain("\u001B[2m");
    expect(output).toContain("\u001B[32m");
  });
});

describe("renderTaskSummary", () => {
  it("lists the file and the counts", () => {
    const output = renderTaskSummary(
      { total: 3, done: 1, remaining: 2 },
      "/home/test/.taskline/tasks.json",
      chalk
    );

    expect(output).toBe(
      [
        "File:      /home/test/.taskline/tasks.json",
        "Done:      1",
        "Remaining: 2",
        "Total:     3",
        "",
      ].join("\n")
    );
  });
});
