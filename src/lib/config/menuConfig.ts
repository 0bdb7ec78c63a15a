// ============================================================
// Daily menu fetch settings
// Overridable via MENU_BASE_URL / MENU_FETCH_TIMEOUT_MS / MENU_USER_AGENT
// ============================================================

export interface MenuFetchConfig {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
}

export const DEFAULT_BASE_URL =
  "https://uwaterloo.ca/food-services-information/locations-and-hours/daily-menu";
export const DEFAULT_TIMEOUT_MS = 15_000;
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

/** Query parameter the Drupal view uses for the menu date */
export const DATE_QUERY_PARAM = "field_uw_fs_dm_date_value[value][date]";

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw === "") return DEFAULT_TIMEOUT_MS;
  const parsed = parseInt(raw, 10);
  if (isNaN(parsed) || parsed <= 0) {
    console.warn(`[config] MENU_FETCH_TIMEOUT_MS="${raw}" is not a positive integer, using ${DEFAULT_TIMEOUT_MS}`);
    return DEFAULT_TIMEOUT_MS;
  }
  return parsed;
}

/** Read settings from the environment, falling back to defaults */
export function getMenuFetchConfig(env: NodeJS.ProcessEnv = process.env): MenuFetchConfig {
  return {
    baseUrl: env.MENU_BASE_URL || DEFAULT_BASE_URL,
    timeoutMs: parseTimeout(env.MENU_FETCH_TIMEOUT_MS),
    userAgent: env.MENU_USER_AGENT || DEFAULT_USER_AGENT,
  };
}
