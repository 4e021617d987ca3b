/**
 * Task table rendering
 *
 * @module cli/output/table
 */

import type { BorderStyle, Task, TaskSummary } from "@taskline/core";
import type { IconSet } from "@taskline/shared";
import type { ChalkInstance } from "chalk";
import stringWidth from "string-width";
import { type ColumnUserConfig, getBorderCharacters, type TableUserConfig, table } from "table";

export interface TaskTableOptions {
  /** Styling instance; pass one with `level: 0` for plain output */
  chalk: ChalkInstance;
  icons: IconSet;
  /** Border template (default: "norc") */
  border?: BorderStyle;
  /** Descriptions wider than this many columns wrap at word boundaries (default: 60) */
  maxWidth?: number;
}

const HEADERS = ["ID", "Description", "Status"] as const;

const DEFAULT_MAX_WIDTH = 60;

// `table` rejects cells holding control characters other than newlines and ANSI escapes
// biome-ignore lint/suspicious/noControlCharactersInRegex: stripping them is the point
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001A\u001C-\u001F\u007F]/g;

function sanitize(text: string): string {
  return text.replace(/\t/g, "  ").replace(CONTROL_CHARS, "");
}

function formatStatus(task: Task, chalk: ChalkInstance, icons: IconSet): string {
  return task.done ? chalk.green(`${icons.done} done`) : chalk.yellow(`${icons.pending} open`);
}

function formatDescription(task: Task, chalk: ChalkInstance): string {
  const description = sanitize(task.description);
  return task.done ? chalk.dim.strikethrough(description) : description;
}

/**
 * Render tasks as a bordered table with ID, Description and Status columns.
 *
 * An empty list still renders the header row.
 */
export function renderTaskTable(tasks: readonly Task[], options: TaskTableOptions): string {
  const { chalk, icons } = options;
  // Never narrower than the column header
  const maxWidth = Math.max(options.maxWidth ?? DEFAULT_MAX_WIDTH, HEADERS[1].length);

  const rows = tasks.map((task) => [
    String(task.id),
    formatDescription(task, chalk),
    formatStatus(task, chalk, icons),
  ]);

  const widest = Math.max(0, ...tasks.map((task) => stringWidth(sanitize(task.description))));

  const columns: Record<number, ColumnUserConfig> = { 0: { alignment: "right" } };
  if (widest > maxWidth) {
    columns[1] = { width: maxWidth, wrapWord: true };
  }

  const config: TableUserConfig = {
    border: getBorderCharacters(options.border ?? "norc"),
    columns,
    drawHorizontalLine: (lineIndex, rowCount) =>
      lineIndex === 0 || lineIndex === 1 || lineIndex === rowCount,
  };

  return table([HEADERS.map((header) => chalk.bold(header)), ...rows], config);
}

/**
 * Render the `info` summary: where the tasks live and how many are done.
 */
export function renderTaskSummary(
  summary: TaskSummary,
  filePath: string,
  chalk: ChalkInstance
): string {
  const lines = [
    `${chalk.bold("File:")}      ${filePath}`,
    `${chalk.bold("Done:")}      ${chalk.green(String(summary.done))}`,
    `${chalk.bold("Remaining:")} ${chalk.yellow(String(summary.remaining))}`,
    `${chalk.bold("Total:")}     ${summary.total}`,
  ];
  return `${lines.join("\n")}\n`;
}
