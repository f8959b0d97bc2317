import { eq } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { config } from "../db/schema";

/** Key/value settings persisted in the local SQLite database. */
export class ConfigStore {
  constructor(private readonly db: AppDatabase) {}

  async getConfig(key: string): Promise<string | null> {
    const result = await this.db
      .select()
      .from(config)
      .where(eq(config.key, key));
    return result[0]?.value ?? null;
  }

  async setConfig(key: string, value: string) {
    await this.db
      .insert(config)
      .values({ key, value })
      .onConflictDoUpdate({ target: config.key, set: { value } });
  }

  async getJsonConfig(key: string): Promise<unknown> {
    const val = await this.getConfig(key);
    if (!val) return null;
    try {
      return JSON.parse(val);
    } catch (e) {
      console.error(`Failed to parse JSON for config key "${key}":`, e);
      return null;
    }
  }

  async setJsonConfig(key: string, value: unknown) {
    await this.setConfig(key, JSON.stringify(value));
  }
}
