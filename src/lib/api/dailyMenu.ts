/**
 * UW Food Services daily menu scraper
 *
 * URL: https://uwaterloo.ca/food-services-information/locations-and-hours/daily-menu
 *      ?field_uw_fs_dm_date_value[value][date]=YYYY-MM-DD
 * - HTTP 200 → parse with cheerio
 * - anything else → FetchFailure (the date counts as zero items)
 *
 * Page layout the parser relies on:
 *   div.entity-paragraphs-item       one block per location/station
 *     li.dm-location                 location name (only on the first block of a location)
 *     li.dm-menu-type                station label
 *     ul.dm-menus > li.dm-menu-item  item rows (name in <a> when linked)
 * Blocks missing a piece are skipped, so a markup change degrades to fewer
 * entries rather than a crash.
 */

import * as cheerio from "cheerio";
import { DATE_QUERY_PARAM, getMenuFetchConfig, type MenuFetchConfig } from "@/lib/config/menuConfig";
import type { FetchResult, MenuEntry } from "@/types/menu";

const SELECTORS = {
  block: "div.entity-paragraphs-item",
  location: "li.dm-location",
  station: "li.dm-menu-type",
  itemList: "ul.dm-menus",
  item: "li.dm-menu-item",
  /** nested in unlinked rows; not part of the name */
  itemMetadata: "img, svg, [class*='calorie'], [class*='diet'], [class*='icon'], [class*='allergen']",
} as const;

export function buildMenuUrl(date: string, baseUrl: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set(DATE_QUERY_PARAM, date);
  return url.toString();
}

/**
 * Fetch the raw menu page for one date
 * @param date YYYY-MM-DD
 */
export async function fetchMenuPage(
  date: string,
  config: MenuFetchConfig = getMenuFetchConfig()
): Promise<FetchResult> {
  const url = buildMenuUrl(date, config.baseUrl);

  let timedOut = false;
  const controller = new AbortController();
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  try {
    const res = await fetch(url, {
      headers: { "User-Agent": config.userAgent, Accept: "text/html" },
      signal: controller.signal,
    });

    if (!res.ok) {
      console.error(`[dailyMenu] HTTP ${res.status} for ${date}`);
      return { ok: false, failure: { date, cause: `HTTP ${res.status}` } };
    }

    const html = await res.text();
    return { ok: true, html };
  } catch (err) {
    const cause = timedOut
      ? `timed out after ${config.timeoutMs}ms`
      : err instanceof Error
        ? err.message
        : String(err);
    console.error(`[dailyMenu] Error fetching menu for ${date}: ${cause}`);
    return { ok: false, failure: { date, cause } };
  } finally {
    clearTimeout(timer);
  }
}

/** Collapse whitespace and unify typographic apostrophes ("Mudie’s" → "Mudie's") */
export function normalizeName(text: string): string {
  return text
    .replace(/[‘’ʼ′]/g, "'")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Parse the daily menu page into entries, in document order
 */
export function parseMenuPage(html: string): MenuEntry[] {
  const $ = cheerio.load(html);
  const entries: MenuEntry[] = [];
  const seen = new Set<string>();
  let currentLocation: string | null = null;

  $(SELECTORS.block).each((_, block) => {
    const $block = $(block);

    const locationEl = $block.find(SELECTORS.location).first();
    if (locationEl.length) {
      currentLocation = normalizeName(locationEl.text()) || currentLocation;
    }
    if (!currentLocation) return;
    const location = currentLocation;

    const stationEl = $block.find(SELECTORS.station).first();
    if (!stationEl.length) return;
    const station = normalizeName(stationEl.text());
    if (!station) return;

    const itemList = $block.find(SELECTORS.itemList).first();
    if (!itemList.length) return;

    itemList.find(SELECTORS.item).each((_, row) => {
      const $row = $(row);
      const link = $row.find("a").first();
      const raw = link.length ? link.text() : $row.clone().find(SELECTORS.itemMetadata).remove().end().text();
      const item = normalizeName(raw);
      if (!item) return;

      // nested blocks repeat their children's rows
      const key = `${location}\u0000${station}\u0000${item}`;
      if (seen.has(key)) return;
      seen.add(key);

      entries.push({ location, station, item });
    });
  });

  return entries;
}
