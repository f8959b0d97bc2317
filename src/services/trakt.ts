import { TraktError } from "../errors";
import { removeResponseSchema } from "../types/schemas";
import type { HistoryEntry, HistoryType } from "../types";
import { parseHistory } from "./history";
import type { TokenManager } from "./token-manager";

// Large enough for a whole history in a single page.
export const HISTORY_PAGE_LIMIT = 100000;

export interface RemovalResult {
  notFound: number[];
}

/** The part of the Trakt API the duplicate cleaner depends on. */
export interface HistoryApi {
  getHistory(type: HistoryType): Promise<HistoryEntry[]>;
  removeHistory(ids: number[]): Promise<RemovalResult>;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class TraktClient implements HistoryApi {
  constructor(
    private readonly tokens: TokenManager,
    private readonly username: string,
  ) {}

  async getHistory(type: HistoryType): Promise<HistoryEntry[]> {
    console.log(`Fetching ${type} history...`);

    const endpoint = `/users/${encodeURIComponent(this.username)}/history/${type}?page=1&limit=${HISTORY_PAGE_LIMIT}&extended=full`;
    const res = await this.tokens.request(endpoint);
    if (!res.ok) {
      const text = await res.text();
      throw new TraktError(
        `API Request failed: ${res.status} ${text}`.trim(),
        res.status,
        endpoint,
      );
    }

    const { entries, malformed } = parseHistory(await res.json(), type);
    for (const error of malformed) {
      console.warn(error.message);
    }
    console.log(`Fetched ${entries.length} ${type}.`);
    return entries;
  }

  async removeHistory(ids: number[]): Promise<RemovalResult> {
    if (ids.length === 0) return { notFound: [] };

    const endpoint = "/sync/history/remove";
    const res = await this.tokens.request(endpoint, {
      method: "POST",
      body: { ids },
    });
    const text = await res.text();
    if (!res.ok) {
      throw new TraktError(
        `API Request failed: ${res.status} ${text}`.trim(),
        res.status,
        endpoint,
      );
    }

    // The removal already happened; an odd body only loses the not-found list.
    const parsed = removeResponseSchema.safeParse(parseJson(text) ?? {});
    return {
      notFound: parsed.success ? (parsed.data.not_found?.ids ?? []) : [],
    };
  }
}
