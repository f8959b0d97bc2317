/**
 * Shared types for trakt-dedupe
 */

export type {
  TokenResponse,
  StoredToken,
  DeviceCode,
  TraktHistoryItem,
  RemoveResponse,
} from "./schemas";

export type HistoryType = "movies" | "episodes";

export const HISTORY_TYPES: readonly HistoryType[] = ["movies", "episodes"];

export interface Credentials {
  client_id: string;
  client_secret: string;
  username: string;
}

export interface Settings {
  clientId: string;
  clientSecret: string;
  username: string;
  keepPerDay: boolean;
  tokenFile: string;
  apiUrl: string;
}

export interface MediaReference {
  traktId: number;
  title: string | null;
}

export interface ShowReference {
  traktId: number | null;
  title: string | null;
}

/** One watch event, normalized from the API payload. */
export interface HistoryEntry {
  id: number;
  watchedAt: string;
  progress: number | null;
  media: MediaReference;
  show: ShowReference | null;
}

export interface FindDuplicatesOptions {
  keepPerDay: boolean;
}

export interface DuplicateGroup {
  key: string;
  keeper: HistoryEntry;
  duplicates: HistoryEntry[];
}

export interface MarkedEntry {
  id: number;
  title: string;
  watchedAt: string;
}

export interface TypeReport {
  type: HistoryType;
  uniqueItems: number;
  duplicates: MarkedEntry[];
  removed: boolean;
  error: string | null;
}

export function isHistoryType(value: unknown): value is HistoryType {
  return value === "movies" || value === "episodes";
}

export function entryTypeFor(type: HistoryType): "movie" | "episode" {
  return type === "movies" ? "movie" : "episode";
}

/**
 * Display title for an entry: the movie title, or the episode title prefixed
 * with the show title when the show is known.
 */
export function getEntryTitle(entry: HistoryEntry): string {
  const title = entry.media.title;
  const showTitle = entry.show?.title;
  if (showTitle) {
    return title ? `${showTitle} - ${title}` : showTitle;
  }
  return title ?? "Unknown";
}
