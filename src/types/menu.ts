/** One servable item at a station of a location (Food Services daily menu) */
export interface MenuEntry {
  readonly location: string; // "The Market", "Mudie's - Village 1"
  readonly station: string;  // "The Carvery Dinner"
  readonly item: string;     // "Steak Night"
}

export interface FetchFailure {
  date: string;  // YYYY-MM-DD
  cause: string; // "HTTP 503", "timed out after 15000ms"
}

export type FetchResult =
  | { ok: true; html: string }
  | { ok: false; failure: FetchFailure };

/** Outcome of one date in the range */
export interface DateResult {
  date: string; // YYYY-MM-DD
  entries: MenuEntry[];
  fetchOk: boolean;
  error: string | null;
}

export interface DateReport extends DateResult {
  scanned: number;
  matches: MenuEntry[];
}

export interface MatchRecord {
  date: string;
  entry: MenuEntry;
}

export interface SearchOptions {
  keyword: string;
  startDate: string; // YYYY-MM-DD
  days: number;      // >= 1
}

export interface SearchReport {
  keyword: string;
  startDate: string;
  endDate: string;
  days: number;
  dates: DateReport[];
  matches: MatchRecord[];
  totalMatches: number;
  matchingDates: number;
}
