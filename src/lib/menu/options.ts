import { formatDate, parseCalendarDate } from "@/lib/utils/date";
import { hasFlag, parseFlag } from "@/lib/utils/cli";
import type { SearchOptions } from "@/types/menu";

export const DEFAULT_KEYWORD = "steak";
export const DEFAULT_DAYS = 14;
export const MAX_DAYS = 366;

export const FLAGS = {
  keyword: ["--keyword", "-k"],
  days: ["--days", "-d"],
  start: ["--start", "-s"],
  json: ["--json"],
  help: ["--help", "-h"],
} as const;

export const USAGE = [
  "Find when and where a dish is served at UW Food Services.",
  "",
  "Usage: npm run find-menu -- [options]",
  "",
  `  -k, --keyword <text>   Menu item keyword to search for (default: "${DEFAULT_KEYWORD}")`,
  `  -d, --days <n>         Number of days to search ahead, 1-${MAX_DAYS} (default: ${DEFAULT_DAYS})`,
  "  -s, --start <date>     Start date in YYYY-MM-DD format (default: today)",
  "      --json             Print the report as JSON",
  "  -h, --help             Show this help",
].join("\n");

/** Invalid command-line input; raised before any request is made */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

function requireValue(args: string[], flag: readonly string[]): string | undefined {
  const value = parseFlag(args, flag);
  if (value === undefined && hasFlag(args, flag)) {
    throw new ConfigurationError(`Invalid or missing value for ${flag[0]}.`);
  }
  return value;
}

/**
 * Validate CLI arguments into search options
 * @param today used when --start is omitted
 */
export function parseSearchOptions(args: string[], today: Date = new Date()): SearchOptions {
  const keyword = requireValue(args, FLAGS.keyword) ?? DEFAULT_KEYWORD;

  const daysRaw = requireValue(args, FLAGS.days);
  let days = DEFAULT_DAYS;
  if (daysRaw !== undefined) {
    const parsed = /^\d+$/.test(daysRaw) ? parseInt(daysRaw, 10) : NaN;
    if (!(parsed >= 1 && parsed <= MAX_DAYS)) {
      throw new ConfigurationError(`Invalid number of days '${daysRaw}'. Use a whole number from 1 to ${MAX_DAYS}.`);
    }
    days = parsed;
  }

  const startRaw = requireValue(args, FLAGS.start);
  let startDate = formatDate(today);
  if (startRaw !== undefined) {
    const parsed = parseCalendarDate(startRaw);
    if (!parsed) {
      throw new ConfigurationError(`Invalid date format '${startRaw}'. Use YYYY-MM-DD.`);
    }
    startDate = formatDate(parsed);
  }

  return { keyword, startDate, days };
}
