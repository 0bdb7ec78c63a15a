#!/usr/bin/env npx tsx
// ============================================================
// UW Food Services menu finder
//
// Checks the daily menu for each date in the range and lists the
// locations and stations serving items that contain the keyword.
//
// Usage:
//   npx tsx scripts/find-menu.ts                       # "steak", next 14 days
//   npx tsx scripts/find-menu.ts --keyword burger      # other keyword
//   npx tsx scripts/find-menu.ts --days 30             # longer range
//   npx tsx scripts/find-menu.ts --start 2026-11-02    # from a given date
//   npx tsx scripts/find-menu.ts --json                # machine-readable report
//   npm run find-menu -- -k beef -d 7
// ============================================================

import dotenv from "dotenv";
dotenv.config({ path: ".env.local" });

import { getArgs, hasFlag } from "@/lib/utils/cli";
import { getMenuFetchConfig } from "@/lib/config/menuConfig";
import { fetchMenuPage } from "@/lib/api/dailyMenu";
import { ConfigurationError, FLAGS, USAGE, parseSearchOptions } from "@/lib/menu/options";
import { formatProgressLine, formatSearchHeader, formatSearchReport } from "@/lib/menu/report";
import { searchMenus } from "@/lib/menu/search";
import type { SearchOptions } from "@/types/menu";

// ── Args ──────────────────────────────────────────────────

function readOptions(args: string[]): SearchOptions {
  try {
    return parseSearchOptions(args);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

// ── Main ──────────────────────────────────────────────────

async function main() {
  const args = getArgs();
  if (hasFlag(args, FLAGS.help)) {
    console.log(USAGE);
    return;
  }

  const options = readOptions(args);
  const json = hasFlag(args, FLAGS.json);
  const config = getMenuFetchConfig();

  if (!json) {
    formatSearchHeader(options).forEach((line) => console.log(line));
  }

  const report = await searchMenus(options, {
    fetchPage: (date) => fetchMenuPage(date, config),
    onDate: json ? undefined : (dateReport) => console.log(formatProgressLine(dateReport)),
  });

  if (json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }
  formatSearchReport(report).forEach((line) => console.log(line));
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
