import type { HistoryType, MarkedEntry, TypeReport } from "../types";

const MAX_TITLE_LINE = 50;

function noun(type: HistoryType, count: number) {
  return count === 1 ? type.slice(0, -1) : type;
}

function capitalize(value: string) {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function titleLine(titles: string[]) {
  const text = [...new Set(titles)].join(", ");
  const line = `  ${text}`;
  return text.length > MAX_TITLE_LINE
    ? `${line.slice(0, MAX_TITLE_LINE)}...`
    : line;
}

/** One `[watched_at] title (id)` line per duplicate. */
export function formatDuplicateList(
  reports: { duplicates: MarkedEntry[] }[],
): string[] {
  return reports.flatMap((report) =>
    report.duplicates.map(
      (entry) => `[${entry.watchedAt}] ${entry.title} (${entry.id})`,
    ),
  );
}

export function formatSummary(reports: TypeReport[]): string[] {
  const lines: string[] = [];
  const removed = reports.filter(
    (report) => report.removed && report.duplicates.length > 0,
  );
  const found = reports.reduce(
    (sum, report) => sum + report.duplicates.length,
    0,
  );

  if (removed.length > 0) {
    const total = removed.reduce(
      (sum, report) => sum + report.duplicates.length,
      0,
    );
    const counts = removed
      .map((r) => `${r.duplicates.length} ${noun(r.type, r.duplicates.length)}`)
      .join(" and ");
    lines.push(`Removed ${counts} duplicate${total > 1 ? "s" : ""}:`);
    for (const report of removed) {
      if (removed.length > 1) lines.push(`${capitalize(report.type)}:`);
      lines.push(titleLine(report.duplicates.map((entry) => entry.title)));
    }
  } else if (found === 0) {
    const counts = reports
      .filter((report) => !report.error)
      .map((report) => `${report.uniqueItems} ${report.type}`);
    if (counts.length > 0) {
      lines.push(`No duplicates in ${counts.join(" and ")}.`);
    }
  } else {
    lines.push(
      `Found ${found} duplicate${found === 1 ? "" : "s"}; nothing was removed.`,
    );
  }

  for (const report of reports) {
    if (report.error) lines.push(`${report.type}: ${report.error}`);
  }
  return lines;
}
