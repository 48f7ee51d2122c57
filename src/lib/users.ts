import { randomUUID } from "node:crypto";
import debug from "debug";

/**
 * Maps external user identifiers (auth subject, username, chat handle) to the
 * internal ids tasks are stored under. Same external id, same internal id,
 * for the lifetime of the process.
 */
export class UserDirectory {
  private users = new Map<string, string>();
  private readonly generateId: () => string;
  private debug = debug("tasks-agent:UserDirectory");

  constructor(options: { generateId?: () => string } = {}) {
    this.generateId = options.generateId ?? randomUUID;
  }

  getOrCreate(externalId: string): string {
    const existing = this.users.get(externalId);
    if (existing) {
      return existing;
    }

    const id = this.generateId();
    this.users.set(externalId, id);
    this.debug("Created internal id %s for external id %s", id, externalId);
    return id;
  }

  get(externalId: string): string | undefined {
    return this.users.get(externalId);
  }
}
