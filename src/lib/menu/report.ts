import { addCalendarDays, formatDayLabel } from "@/lib/utils/date";
import type { DateReport, SearchOptions, SearchReport } from "@/types/menu";

const BANNER = "=".repeat(65);
const DATE_RULE = "-".repeat(40);

export function formatSearchHeader({ keyword, startDate, days }: SearchOptions): string[] {
  return [
    `Searching UW Food Services menus for "${keyword}"...`,
    `  Date range: ${startDate} to ${addCalendarDays(startDate, days - 1)}`,
    `  (${days} days)`,
    "",
  ];
}

/**
 * One line per date while the search runs
 * @example "  Checking Sunday, October 18, 2026... no matches (42 items scanned)"
 */
export function formatProgressLine(report: DateReport): string {
  const prefix = `  Checking ${formatDayLabel(report.date)}...`;
  if (!report.fetchOk) {
    return `${prefix} [error: ${report.error ?? "unknown error"}]`;
  }
  if (report.matches.length > 0) {
    return `${prefix} found ${report.matches.length} match(es)!`;
  }
  return `${prefix} no matches (${report.scanned} items scanned)`;
}

export function formatSearchReport(report: SearchReport): string[] {
  const lines: string[] = [""];

  if (report.matches.length === 0) {
    lines.push(
      BANNER,
      `  No "${report.keyword}" found in the next ${report.days} days.`,
      BANNER,
      "",
      "  Tip: Try a broader search, e.g.:",
      '    npm run find-menu -- --keyword "beef"',
      '    npm run find-menu -- --keyword "burger"',
      "    npm run find-menu -- --days 30"
    );
    return lines;
  }

  lines.push(
    BANNER,
    `  RESULTS: Found "${report.keyword}" on ${report.totalMatches} menu(s)!`,
    BANNER
  );

  // matches are already in date order; print a heading whenever the date changes
  let currentDate: string | null = null;
  for (const { date, entry } of report.matches) {
    if (date !== currentDate) {
      currentDate = date;
      lines.push("", `  ${formatDayLabel(date)}`, `  ${DATE_RULE}`);
    }
    lines.push(
      `    Location : ${entry.location}`,
      `    Station  : ${entry.station}`,
      `    Item     : ${entry.item}`,
      ""
    );
  }

  return lines;
}
