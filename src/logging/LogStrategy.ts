export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LevelName = keyof typeof LogLevel;

export const LEVEL_NAMES: Record<LogLevel, LevelName> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

/**
 * One queued log line. `payload` has already been passed through
 * {@link clampPayload} when it reaches a strategy.
 */
export interface LogEntry {
  id: string;
  timestamp: string;
  level: LevelName;
  sender: string;
  message: string;
  payload?: unknown;
}

const MAX_STRING_LENGTH = 5000;
const MAX_DEPTH = 10;

/**
 * Bounds a payload before it is queued: long strings are cut, deep nesting
 * is replaced with a marker and errors keep only name, message and stack.
 */
export function clampPayload(value: unknown, depth: number = 0): unknown {
  if (depth > MAX_DEPTH) return "[Object depth limit exceeded]";

  if (typeof value === "string") {
    return value.length > MAX_STRING_LENGTH
      ? value.substring(0, MAX_STRING_LENGTH) + "..."
      : value;
  }
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) {
    return {
      name: value.name,
      message: clampPayload(value.message),
      stack: clampPayload(value.stack),
    };
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => clampPayload(item, depth + 1));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, prop]) => [
        key,
        clampPayload(prop, depth + 1),
      ])
    );
  }
  return value;
}

export abstract class LogStrategy {
  abstract write(entry: LogEntry): Promise<void>;
}
