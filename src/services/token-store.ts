import { existsSync, readFileSync, writeFileSync } from "fs";
import { storedTokenSchema } from "../types/schemas";
import type { StoredToken } from "../types";

/**
 * Persistence for the single OAuth token record. The token manager is the
 * only owner; a locking implementation can replace the file one here.
 */
export interface TokenStore {
  read(): StoredToken | null;
  write(token: StoredToken): void;
}

export class TokenFile implements TokenStore {
  constructor(private readonly path: string) {}

  read(): StoredToken | null {
    if (!existsSync(this.path)) return null;

    let data: unknown;
    try {
      data = JSON.parse(readFileSync(this.path, "utf8"));
    } catch (e) {
      console.warn(`Ignoring unreadable token file ${this.path}:`, e);
      return null;
    }

    const parsed = storedTokenSchema.safeParse(data);
    if (!parsed.success) {
      console.warn(`Ignoring malformed token file ${this.path}`);
      return null;
    }
    return parsed.data;
  }

  write(token: StoredToken) {
    writeFileSync(this.path, JSON.stringify(token));
  }
}
