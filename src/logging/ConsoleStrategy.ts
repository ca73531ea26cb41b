import chalk from "chalk";
import { LevelName, LogEntry, LogStrategy } from "./LogStrategy";

const LEVEL_COLORS: Record<LevelName, chalk.Chalk> = {
  DEBUG: chalk.green,
  INFO: chalk.blue,
  WARN: chalk.yellow,
  ERROR: chalk.red,
};

function formatTimestamp(timestamp: string): string {
  const date = new Date(timestamp);
  return Number.isNaN(date.getTime()) ? "Invalid Date" : date.toISOString();
}

function formatPayload(payload: unknown, indent: string): string {
  if (typeof payload !== "object" || payload === null) {
    return `${indent}${String(payload)}`;
  }

  return Object.entries(payload)
    .map(([key, value]: [string, unknown]) =>
      typeof value === "object" && value !== null
        ? `${indent}${key}:\n${formatPayload(value, indent + "  ")}`
        : `${indent}${key}: ${String(value)}`
    )
    .join("\n");
}

export class ConsoleStrategy extends LogStrategy {
  format(entry: LogEntry): string {
    const color = LEVEL_COLORS[entry.level];
    const header = color(
      `[${entry.level}] ${formatTimestamp(entry.timestamp)} [${entry.sender}] - ${entry.message}`
    );

    return entry.payload === undefined
      ? header
      : `${header}\n${formatPayload(entry.payload, "  ")}`;
  }

  async write(entry: LogEntry): Promise<void> {
    console.log(this.format(entry));
  }
}
