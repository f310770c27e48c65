/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for TwitchTuner.
 */

/* Debug messages carry a colon-separated category such as "pipeline:stderr". TWITCHTUNER_DEBUG (or --debug, which means "*") selects which categories are written:
 *
 *   *                       Every category.
 *   recording               The category and everything below it (recording:retention).
 *   -pipeline:stderr        Removes the category and everything below it, even under "*".
 *
 * Entries are comma-separated, so TWITCHTUNER_DEBUG=*,-pipeline:stderr logs everything except child process stderr.
 */

/**
 * A known debug category. Listed by --help and checked against TWITCHTUNER_DEBUG at startup.
 */
export interface DebugCategory {

  readonly category: string;
  readonly description: string;
}

export const DEBUG_CATEGORIES: readonly DebugCategory[] = [

  { category: "channels", description: "Snapshot swaps, subscription file parsing." },
  { category: "channels:twitch", description: "Helix token refresh and API requests." },
  { category: "pipeline", description: "Stage launch, exit codes, teardown escalation." },
  { category: "pipeline:stderr", description: "Extractor and ffmpeg stderr output." },
  { category: "recording", description: "Reconciliation ticks, recorder start and stop." },
  { category: "recording:retention", description: "Retention sweeps, deleted files and directories." },
  { category: "streaming:cache", description: "Stream URL cache hits, misses, and invalidations." },
  { category: "streaming:mpegts", description: "Viewer connect and disconnect, copy loop outcomes." },
  { category: "timing:startup", description: "Time from request to pipeline launch and first byte." }
];

/**
 * A parsed TWITCHTUNER_DEBUG value.
 */
export interface DebugPattern {

  readonly excludes: readonly string[];
  readonly includes: readonly string[];
  readonly wildcard: boolean;
}

const EMPTY_PATTERN: DebugPattern = { excludes: [], includes: [], wildcard: false };

let activePattern = EMPTY_PATTERN;

// True when prefix names the category itself or one of its ancestors.
function covers(prefix: string, category: string): boolean {

  return (category === prefix) || category.startsWith(prefix + ":");
}

/**
 * Parses a comma-separated category list. Blank entries and duplicates are dropped.
 * @param pattern - The list, e.g. "recording,-pipeline:stderr".
 * @returns The parsed pattern.
 */
export function parseDebugPattern(pattern: string): DebugPattern {

  const excludes = new Set<string>();
  const includes = new Set<string>();
  let wildcard = false;

  for(const entry of pattern.split(",").map((part) => part.trim())) {

    if(entry === "*") {

      wildcard = true;
    } else if(entry.startsWith("-") && (entry.length > 1)) {

      excludes.add(entry.substring(1));
    } else if(entry && (entry !== "-")) {

      includes.add(entry);
    }
  }

  return { excludes: [...excludes], includes: [...includes], wildcard };
}

/**
 * Replaces the active filter.
 * @param pattern - Comma-separated category list. An empty string turns debug output off.
 */
export function initDebugFilter(pattern: string): void {

  activePattern = parseDebugPattern(pattern);
}

/**
 * @returns True if at least one category can pass the active filter. LOG.debug checks this before anything else.
 */
export function isAnyDebugEnabled(): boolean {

  return activePattern.wildcard || (activePattern.includes.length > 0);
}

/**
 * @param category - A debug category, e.g. "channels:twitch".
 * @returns True if messages in the category are written.
 */
export function isCategoryEnabled(category: string): boolean {

  if(activePattern.excludes.some((prefix) => covers(prefix, category))) {

    return false;
  }

  return activePattern.wildcard || activePattern.includes.some((prefix) => covers(prefix, category));
}

/**
 * @returns The active filter written back out, wildcard first, then exclusions, then inclusions. Empty when debug output is off.
 */
export function getCurrentPattern(): string {

  return [ ...(activePattern.wildcard ? ["*"] : []), ...activePattern.excludes.map((entry) => "-" + entry), ...activePattern.includes ].join(",");
}

/**
 * Lists the names in the active filter that select no known category, usually a typo in TWITCHTUNER_DEBUG.
 * @returns The unmatched names, in the order they were given.
 */
export function unknownDebugCategories(): string[] {

  return [ ...activePattern.includes, ...activePattern.excludes ].filter((name) => !DEBUG_CATEGORIES.some((entry) => covers(name, entry.category)));
}

/**
 * Starts a stopwatch for timing:startup messages.
 * @returns A function that returns the milliseconds elapsed since the stopwatch was started.
 */
export function startTimer(): () => number {

  const start = performance.now();

  return (): number => Math.round(performance.now() - start);
}
