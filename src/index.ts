export * from "./interfaces";
export * from "./core";
export * from "./logging";
export * from "./utils";
export * from "./minimal/InMemoryUserRegistry";
export * from "./RegistryConfig";
export { main, STARTUP_BANNER } from "./main";
