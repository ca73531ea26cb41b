import { v4 as uuidv4 } from "uuid";
import { IQueueStrategy } from "../interfaces";
import { InMemoryQueueStrategy } from "../core/InMemoryQueueStrategy";
import { ConsoleStrategy } from "./ConsoleStrategy";
import {
  LEVEL_NAMES,
  LogEntry,
  LogLevel,
  LogStrategy,
  clampPayload,
} from "./LogStrategy";

/**
 * @fileoverview Queue-backed logging shared by every class of the package.
 * Entries are enqueued synchronously and written by the active
 * {@link LogStrategy} from a background timer.
 */

const PROCESSING_INTERVAL_MS = 100;

/**
 * Wraps a synchronous method so that its arguments and result are logged at
 * DEBUG, and any thrown error is logged at ERROR and rethrown.
 */
function logMethod() {
  return function <T extends Loggable, A extends unknown[], R>(
    _target: T,
    propertyKey: string,
    descriptor: TypedPropertyDescriptor<(this: T, ...args: A) => R>
  ) {
    const originalMethod = descriptor.value;
    if (!originalMethod) return descriptor;

    descriptor.value = function (this: T, ...args: A): R {
      const sender = this.constructor.name;
      try {
        const result = originalMethod.apply(this, args);
        Loggable.log(LogLevel.DEBUG, sender, `${propertyKey} returned`, {
          args,
          result,
        });
        return result;
      } catch (error: unknown) {
        Loggable.log(LogLevel.ERROR, sender, `${propertyKey} threw`, {
          args,
          error: error instanceof LoggableError ? error.toJSON() : error,
        });
        throw error;
      }
    };
    return descriptor;
  };
}

export class LoggableError extends Error {
  public readonly payload: unknown;

  constructor(message: string, payload?: unknown) {
    super(message);
    this.name = "LoggableError";
    this.payload = payload;
    Object.setPrototypeOf(this, LoggableError.prototype);
  }

  public toJSON() {
    return {
      name: this.name,
      message: this.message,
      payload: this.payload,
    };
  }
}

/**
 * Abstract base class for objects that can log messages.
 */
export abstract class Loggable {
  private static strategy: LogStrategy = new ConsoleStrategy();
  private static readonly queue: IQueueStrategy<LogEntry> =
    new InMemoryQueueStrategy<LogEntry>();
  private static level: LogLevel = LogLevel.INFO;
  private static processing: Promise<void> | null = null;
  private static timer: NodeJS.Timeout | null = null;

  protected constructor() {
    if (!Loggable.timer) {
      Loggable.startProcessing();
    }
  }

  public static setLogStrategy(strategy: LogStrategy): void {
    Loggable.strategy = strategy;
  }

  public static setLogLevel(level: LogLevel): void {
    Loggable.level = level;
  }

  public static getLogLevel(): LogLevel {
    return Loggable.level;
  }

  public static shouldLog(level: LogLevel): boolean {
    return level >= Loggable.level;
  }

  /**
   * Queues an entry if `level` passes the current threshold. The payload is
   * clamped here, so later changes to the caller's objects do not show up in
   * the written line.
   */
  public static log(
    level: LogLevel,
    sender: string,
    message: string,
    payload?: unknown
  ): void {
    if (!Loggable.shouldLog(level)) return;

    Loggable.queue.enqueue({
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      sender,
      message,
      payload: payload === undefined ? undefined : clampPayload(payload),
    });
  }

  protected debug(message: string, payload?: unknown): void {
    Loggable.log(LogLevel.DEBUG, this.constructor.name, message, payload);
  }

  protected info(message: string, payload?: unknown): void {
    Loggable.log(LogLevel.INFO, this.constructor.name, message, payload);
  }

  private static async processQueue(): Promise<void> {
    let entry = Loggable.queue.dequeue();
    while (entry) {
      try {
        await Loggable.strategy.write(entry);
      } catch (error: unknown) {
        console.error("Failed to write log entry:", error);
      }
      entry = Loggable.queue.dequeue();
    }
  }

  /**
   * Resolves once every queued entry has been handed to the strategy.
   */
  public static async flush(): Promise<void> {
    while (Loggable.processing || !Loggable.queue.isEmpty()) {
      if (!Loggable.processing) {
        Loggable.processing = Loggable.processQueue().finally(() => {
          Loggable.processing = null;
        });
      }
      await Loggable.processing;
    }
  }

  private static startProcessing(): void {
    Loggable.timer = setInterval(() => {
      if (!Loggable.processing) {
        Loggable.flush().catch((error: unknown) => {
          console.error("Failed to drain log queue:", error);
        });
      }
    }, PROCESSING_INTERVAL_MS);
    Loggable.timer.unref();
  }

  /**
   * Stops the background timer and writes whatever is still queued.
   */
  public static async shutdown(): Promise<void> {
    if (Loggable.timer) {
      clearInterval(Loggable.timer);
      Loggable.timer = null;
    }
    await Loggable.flush();
  }
}

export { logMethod };
