import { fetchMenuPage, parseMenuPage } from "@/lib/api/dailyMenu";
import { addCalendarDays, listDates } from "@/lib/utils/date";
import type {
  DateReport,
  FetchResult,
  MatchRecord,
  MenuEntry,
  SearchOptions,
  SearchReport,
} from "@/types/menu";

export interface SearchDeps {
  fetchPage?: (date: string) => Promise<FetchResult>;
  parsePage?: (html: string) => MenuEntry[];
  /** Called once per date, in order, as soon as that date is done */
  onDate?: (report: DateReport) => void;
}

/** Case-insensitive substring match on the item name; "" matches everything */
export function matchesKeyword(entry: MenuEntry, keyword: string): boolean {
  return entry.item.toLowerCase().includes(keyword.toLowerCase());
}

export function filterEntries(entries: MenuEntry[], keyword: string): MenuEntry[] {
  return entries.filter((entry) => matchesKeyword(entry, keyword));
}

/**
 * Build the report for one date from its fetch result
 */
export function buildDateReport(
  date: string,
  result: FetchResult,
  keyword: string,
  parsePage: (html: string) => MenuEntry[] = parseMenuPage
): DateReport {
  if (!result.ok) {
    return { date, entries: [], fetchOk: false, error: result.failure.cause, scanned: 0, matches: [] };
  }
  const entries = parsePage(result.html);
  return {
    date,
    entries,
    fetchOk: true,
    error: null,
    scanned: entries.length,
    matches: filterEntries(entries, keyword),
  };
}

/**
 * Search every date in the range, one request at a time
 */
export async function searchMenus(
  { keyword, startDate, days }: SearchOptions,
  { fetchPage = (date) => fetchMenuPage(date), parsePage = parseMenuPage, onDate }: SearchDeps = {}
): Promise<SearchReport> {
  const report: SearchReport = {
    keyword,
    startDate,
    endDate: addCalendarDays(startDate, days - 1),
    days,
    dates: [],
    matches: [],
    totalMatches: 0,
    matchingDates: 0,
  };

  for (const date of listDates(startDate, days)) {
    const result = await fetchPage(date);
    const dateReport = buildDateReport(date, result, keyword, parsePage);

    report.dates.push(dateReport);
    for (const entry of dateReport.matches) {
      const record: MatchRecord = { date, entry };
      report.matches.push(record);
    }
    report.totalMatches += dateReport.matches.length;
    if (dateReport.matches.length > 0) report.matchingDates++;

    onDate?.(dateReport);
  }

  return report;
}
