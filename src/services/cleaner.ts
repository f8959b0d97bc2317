import { errorMessage, isFatalError } from "../errors";
import {
  getEntryTitle,
  type DuplicateGroup,
  type FindDuplicatesOptions,
  type HistoryEntry,
  type HistoryType,
  type MarkedEntry,
  type TypeReport,
} from "../types";
import { countUniqueItems, findDuplicates } from "../utils";
import type { HistoryApi } from "./trakt";

export interface ScanResult {
  type: HistoryType;
  uniqueItems: number;
  groups: DuplicateGroup[];
  duplicates: MarkedEntry[];
  error: string | null;
}

export interface RunOptions {
  /** Report what would be removed without calling the removal endpoint. */
  dryRun?: boolean;
  /** Asked once, before anything is removed. */
  confirm?: (scans: ScanResult[], total: number) => Promise<boolean>;
}

function toMarkedEntry(entry: HistoryEntry): MarkedEntry {
  return {
    id: entry.id,
    title: getEntryTitle(entry),
    watchedAt: entry.watchedAt,
  };
}

function toReport(scan: ScanResult): TypeReport {
  return {
    type: scan.type,
    uniqueItems: scan.uniqueItems,
    duplicates: scan.duplicates,
    removed: false,
    error: scan.error,
  };
}

function failedScan(type: HistoryType, error: string): ScanResult {
  return { type, uniqueItems: 0, groups: [], duplicates: [], error };
}

/**
 * Fetches history per media type, keeps one entry per duplicate group and
 * removes the rest. A failure for one type never stops the other; only
 * configuration and authentication errors end the run.
 */
export class DuplicateCleaner {
  constructor(
    private readonly api: HistoryApi,
    private readonly options: FindDuplicatesOptions,
  ) {}

  async scan(type: HistoryType): Promise<ScanResult> {
    let entries: HistoryEntry[];
    try {
      entries = await this.api.getHistory(type);
    } catch (e) {
      if (isFatalError(e)) throw e;
      console.error(`Failed to fetch ${type} history:`, errorMessage(e));
      return failedScan(type, `Failed to fetch history: ${errorMessage(e)}`);
    }

    if (entries.length === 0) {
      console.error(`No ${type} history returned.`);
      return failedScan(type, "No history returned");
    }

    const groups = findDuplicates(entries, this.options);
    return {
      type,
      uniqueItems: countUniqueItems(entries),
      groups,
      duplicates: groups.flatMap((group) =>
        group.duplicates.map(toMarkedEntry),
      ),
      error: null,
    };
  }

  /**
   * Submit every duplicate of one type in a single removal call. The attempt
   * is final: failures are reported, not retried.
   */
  async remove(scan: ScanResult): Promise<TypeReport> {
    const report = toReport(scan);
    if (scan.error || scan.duplicates.length === 0) return report;

    const ids = scan.duplicates.map((entry) => entry.id);
    try {
      const result = await this.api.removeHistory(ids);
      if (result.notFound.length > 0) {
        console.warn(
          `Trakt did not find ${result.notFound.length} ${scan.type} entries: ${result.notFound.join(", ")}`,
        );
      }
      return { ...report, removed: true };
    } catch (e) {
      if (isFatalError(e)) throw e;
      console.error(`Failed to remove ${scan.type} duplicates:`, errorMessage(e));
      return {
        ...report,
        error: `Failed to remove duplicates: ${errorMessage(e)}`,
      };
    }
  }

  async run(
    types: readonly HistoryType[],
    options: RunOptions = {},
  ): Promise<TypeReport[]> {
    const scans: ScanResult[] = [];
    for (const type of types) {
      scans.push(await this.scan(type));
    }

    const total = scans.reduce((sum, scan) => sum + scan.duplicates.length, 0);
    if (options.dryRun || total === 0) return scans.map(toReport);

    if (options.confirm && !(await options.confirm(scans, total))) {
      console.log("Nothing removed.");
      return scans.map(toReport);
    }

    const reports: TypeReport[] = [];
    for (const scan of scans) {
      reports.push(await this.remove(scan));
    }
    return reports;
  }
}
