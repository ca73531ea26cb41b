import { Loggable } from "./logging";
import { InMemoryUserRegistry } from "./minimal/InMemoryUserRegistry";
import { RegistryConfig, createConfig } from "./RegistryConfig";

export const STARTUP_BANNER = "User management system started";

export function main(
  config: RegistryConfig = createConfig()
): InMemoryUserRegistry {
  Loggable.setLogLevel(config.logLevel);
  const registry = new InMemoryUserRegistry(config.databaseUrl);
  console.log(STARTUP_BANNER);
  return registry;
}

if (require.main === module) {
  main();
  Loggable.shutdown().catch((error: unknown) => {
    console.error("Failed to flush logs on exit:", error);
    process.exitCode = 1;
  });
}
