import { LogLevel, LoggableError } from "./logging";

export interface RegistryConfig {
  databaseUrl: string;
  logLevel: LogLevel;
  /** Declared for callers; no operation retries. */
  maxRetries: number;
  /** Seconds. Declared for callers; no operation times out. */
  defaultTimeout: number;
}

export const DEFAULT_CONFIG: Readonly<RegistryConfig> = Object.freeze({
  databaseUrl: "sqlite:///users.db",
  logLevel: LogLevel.INFO,
  maxRetries: 3,
  defaultTimeout: 30,
});

export function createConfig(
  overrides: Partial<RegistryConfig> = {}
): RegistryConfig {
  const config: RegistryConfig = { ...DEFAULT_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }
  return config;
}

const LOG_LEVELS = new Map<string, LogLevel>([
  ["debug", LogLevel.DEBUG],
  ["info", LogLevel.INFO],
  ["warn", LogLevel.WARN],
  ["error", LogLevel.ERROR],
]);

export function parseLogLevel(name: string): LogLevel {
  const level = LOG_LEVELS.get(name.trim().toLowerCase());
  if (level === undefined) {
    throw new LoggableError(`Unknown log level: ${name}`, {
      accepted: [...LOG_LEVELS.keys()],
    });
  }
  return level;
}
