import { addDays, format, isValid, parse } from "date-fns";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Interpret a YYYY-MM-DD string as a local calendar date
 * @returns Date, or null for malformed / impossible dates ("2026-02-30")
 */
export function parseCalendarDate(value: string): Date | null {
  if (!ISO_DATE.test(value)) return null;
  const d = parse(value, "yyyy-MM-dd", new Date());
  return isValid(d) ? d : null;
}

function toDate(date: Date | string): Date {
  if (typeof date !== "string") return date;
  const d = parseCalendarDate(date);
  if (!d) throw new RangeError(`Invalid calendar date: ${date}`);
  return d;
}

/**
 * Format as YYYY-MM-DD
 */
export function formatDate(date: Date | string): string {
  return format(toDate(date), "yyyy-MM-dd");
}

/**
 * Long label used in console output
 * @example formatDayLabel("2026-10-18") // "Sunday, October 18, 2026"
 */
export function formatDayLabel(date: Date | string): string {
  return format(toDate(date), "EEEE, MMMM dd, yyyy");
}

export function addCalendarDays(date: string, days: number): string {
  return formatDate(addDays(toDate(date), days));
}

/**
 * `days` consecutive dates starting at `startDate` (inclusive)
 * @example listDates("2026-10-18", 3) // ["2026-10-18", "2026-10-19", "2026-10-20"]
 */
export function listDates(startDate: string, days: number): string[] {
  const start = toDate(startDate);
  const dates: string[] = [];
  for (let i = 0; i < days; i++) {
    dates.push(formatDate(addDays(start, i)));
  }
  return dates;
}
