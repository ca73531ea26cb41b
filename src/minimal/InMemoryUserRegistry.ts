import { IUserRegistry, UserRecord } from "../interfaces";
import { Loggable, logMethod } from "../logging";

export type Clock = () => Date;

interface StoredUser {
  email: string;
  createdAtMs: number;
}

export class InMemoryUserRegistry extends Loggable implements IUserRegistry {
  private users: Map<string, StoredUser> = new Map();
  private readonly clock: Clock;

  /**
   * @param connectionTarget - kept for callers that inspect it; the registry
   * never connects anywhere.
   * @param clock - source of `createdAt` for new records.
   */
  constructor(
    public readonly connectionTarget: string,
    clock: Clock = () => new Date()
  ) {
    super();
    this.clock = clock;
  }

  get size(): number {
    return this.users.size;
  }

  @logMethod()
  createUser(username: string, email: string): boolean {
    if (!username) {
      this.debug("Rejected user with empty username");
      return false;
    }

    if (this.users.has(username)) {
      this.debug(`User ${username} already exists`);
      return false;
    }

    this.users.set(username, { email, createdAtMs: this.clock().getTime() });
    this.info(`Created user ${username}`);
    return true;
  }

  // Each call builds a new record, so callers cannot reach the stored state.
  getUser(username: string): UserRecord | undefined {
    const stored = this.users.get(username);
    if (!stored) return undefined;

    return Object.freeze({
      email: stored.email,
      createdAt: new Date(stored.createdAtMs),
    });
  }

  // Not called by createUser: emails are stored as given.
  protected isValidEmail(email: string): boolean {
    return email.includes("@") && email.includes(".");
  }
}
