import type {
  DuplicateGroup,
  FindDuplicatesOptions,
  HistoryEntry,
} from "../types";

/** Order by watched_at, then by entry id so equal timestamps never tie. */
export function compareEntries(a: HistoryEntry, b: HistoryEntry): number {
  const diff = Date.parse(a.watchedAt) - Date.parse(b.watchedAt);
  return diff !== 0 ? diff : a.id - b.id;
}

/** UTC calendar day (YYYY-MM-DD) of a play. */
export function watchedDay(entry: HistoryEntry): string {
  return new Date(entry.watchedAt).toISOString().slice(0, 10);
}

export function groupKey(entry: HistoryEntry, keepPerDay: boolean): string {
  const traktId = `${entry.media.traktId}`;
  return keepPerDay ? `${traktId}:${watchedDay(entry)}` : traktId;
}

/**
 * Partition entries by media (and by day when keepPerDay is set). Each group
 * is sorted with compareEntries; groups come in order of their first play.
 */
export function groupEntries(
  entries: HistoryEntry[],
  options: FindDuplicatesOptions,
): Map<string, HistoryEntry[]> {
  const groups = new Map<string, HistoryEntry[]>();
  for (const entry of [...entries].sort(compareEntries)) {
    const key = groupKey(entry, options.keepPerDay);
    const group = groups.get(key);
    if (group) {
      group.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  }
  return groups;
}

/**
 * The entry to keep: the first fully watched play (progress >= 100) if there
 * is one, otherwise the most recent play.
 */
export function selectKeeper(group: HistoryEntry[]): HistoryEntry {
  const sorted = [...group].sort(compareEntries);
  const completed = sorted.find((entry) => (entry.progress ?? 0) >= 100);
  const latest = sorted[sorted.length - 1];
  if (!latest) {
    throw new Error("Cannot select a keeper from an empty group");
  }
  return completed ?? latest;
}

/**
 * Find duplicate watch entries in Trakt history.
 *
 * When keepPerDay is false: one entry is kept per item (movie/episode).
 * When keepPerDay is true: one entry is kept per item per day.
 */
export function findDuplicates(
  entries: HistoryEntry[],
  options: FindDuplicatesOptions,
): DuplicateGroup[] {
  const result: DuplicateGroup[] = [];
  for (const [key, group] of groupEntries(entries, options)) {
    if (group.length < 2) continue;
    const keeper = selectKeeper(group);
    result.push({
      key,
      keeper,
      duplicates: group.filter((entry) => entry !== keeper),
    });
  }
  return result;
}

export function countUniqueItems(entries: HistoryEntry[]): number {
  return new Set(entries.map((entry) => entry.media.traktId)).size;
}
