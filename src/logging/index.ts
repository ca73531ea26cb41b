export * from "./LogStrategy";
export * from "./ConsoleStrategy";
export * from "./Loggable";
