export * from "./InMemoryQueueStrategy";
