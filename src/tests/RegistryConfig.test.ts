import { DEFAULT_CONFIG, createConfig, parseLogLevel } from "../RegistryConfig";
import { LogLevel, LoggableError } from "../logging";

describe("createConfig", () => {
  test("returns the defaults when called without overrides", () => {
    expect(createConfig()).toEqual({
      databaseUrl: "sqlite:///users.db",
      logLevel: LogLevel.INFO,
      maxRetries: 3,
      defaultTimeout: 30,
    });
  });

  test("applies overrides over the defaults", () => {
    const config = createConfig({
      databaseUrl: "memory://test",
      logLevel: LogLevel.DEBUG,
    });

    expect(config.databaseUrl).toBe("memory://test");
    expect(config.logLevel).toBe(LogLevel.DEBUG);
    expect(config.maxRetries).toBe(3);
  });

  test("ignores overrides that are explicitly undefined", () => {
    expect(createConfig({ databaseUrl: undefined }).databaseUrl).toBe(
      "sqlite:///users.db"
    );
  });

  test("never mutates the defaults", () => {
    createConfig({ maxRetries: 7 });
    expect(DEFAULT_CONFIG.maxRetries).toBe(3);
  });
});

describe("parseLogLevel", () => {
  test("accepts level names case-insensitively", () => {
    expect(parseLogLevel("WARN")).toBe(LogLevel.WARN);
    expect(parseLogLevel(" debug ")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel("Error")).toBe(LogLevel.ERROR);
  });

  test("throws a LoggableError for unknown names", () => {
    expect(() => parseLogLevel("verbose")).toThrow(LoggableError);
    expect(() => parseLogLevel("verbose")).toThrow(
      "Unknown log level: verbose"
    );
  });
});
