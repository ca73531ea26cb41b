import { LogEntry, LogStrategy } from "../logging";

export class MemoryLogStrategy extends LogStrategy {
  public entries: LogEntry[] = [];

  async write(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
  }

  clear(): void {
    this.entries = [];
  }
}
