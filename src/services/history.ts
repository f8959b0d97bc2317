import { MalformedEntryError, TraktError } from "../errors";
import { historyItemSchema } from "../types/schemas";
import { entryTypeFor, type HistoryEntry, type HistoryType } from "../types";

export interface ParsedHistory {
  entries: HistoryEntry[];
  malformed: MalformedEntryError[];
}

function rawEntryId(raw: unknown): number | undefined {
  if (typeof raw === "object" && raw !== null && "id" in raw) {
    return typeof raw.id === "number" ? raw.id : undefined;
  }
  return undefined;
}

/**
 * Validate a history response into typed entries. Items without a usable
 * media identifier are reported in `malformed` and left out of `entries`.
 */
export function parseHistory(data: unknown, type: HistoryType): ParsedHistory {
  if (!Array.isArray(data)) {
    throw new TraktError(`Expected a list of ${type} history items`);
  }

  const entryType = entryTypeFor(type);
  const entries: HistoryEntry[] = [];
  const malformed: MalformedEntryError[] = [];

  data.forEach((raw: unknown, index) => {
    const id = rawEntryId(raw);
    const label = id === undefined ? `at index ${index}` : `${id}`;

    const parsed = historyItemSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join(".")}: ${issue.message}` : "";
      malformed.push(
        new MalformedEntryError(
          `Malformed ${entryType} history entry ${label} (${detail})`,
          index,
          id,
        ),
      );
      return;
    }

    const item = parsed.data;
    const media = item[entryType];
    if (!media) {
      malformed.push(
        new MalformedEntryError(
          `Malformed ${entryType} history entry ${label} (no ${entryType})`,
          index,
          id,
        ),
      );
      return;
    }

    entries.push({
      id: item.id,
      watchedAt: item.watched_at,
      progress: item.progress ?? null,
      media: { traktId: media.ids.trakt, title: media.title ?? null },
      show:
        entryType === "episode" && item.show
          ? {
              traktId: item.show.ids?.trakt ?? null,
              title: item.show.title ?? null,
            }
          : null,
    });
  });

  return { entries, malformed };
}
