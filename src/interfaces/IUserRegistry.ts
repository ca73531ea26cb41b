export interface UserRecord {
  readonly email: string;
  readonly createdAt: Date;
}

export interface IUserRegistry {
  /** Returns false, without touching the registry, when the name is taken. */
  createUser(username: string, email: string): boolean;
  getUser(username: string): UserRecord | undefined;
}
