/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for pagepulse.
 */

/* pagepulse has four flat debug categories, one per layer of a run. PAGEPULSE_DEBUG takes a comma-separated list read left to right:
 *
 *   - "*" turns on every category.
 *   - "category" turns on one category.
 *   - "-category" turns a category off again, and "-*" turns everything off.
 *
 * Later entries override earlier ones, so "*,-config" is everything except configuration messages. Names outside DEBUG_CATEGORIES are returned to the caller
 * so that a typo is reported instead of silently producing no output.
 */

/**
 * The debug categories pagepulse logs under.
 */
export type DebugCategoryName = "browser" | "check" | "config" | "notify";

/**
 * Metadata for a debug category. Used by the --list-env output to describe the available categories.
 */
export interface DebugCategory {

  readonly category: DebugCategoryName;
  readonly description: string;
}

/**
 * Every debug category with its description, sorted alphabetically.
 */
export const DEBUG_CATEGORIES: readonly DebugCategory[] = [

  { category: "browser", description: "Browser lifecycle: executable lookup, launch, navigation, close." },
  { category: "check", description: "Check attempts: marker search results, attempt timing." },
  { category: "config", description: "Configuration loading: file location, ignored values, env overrides." },
  { category: "notify", description: "Alert delivery: transport setup, SMTP responses." }
];

let enabledCategories: ReadonlySet<DebugCategoryName> = new Set();

/**
 * Replaces the debug filter with the categories selected by a pattern.
 * @param pattern - Comma-separated list of categories (e.g., "browser,notify" or "*,-config"). An empty pattern disables debug output.
 * @returns The entries that name no known category, in the order given.
 */
export function initDebugFilter(pattern: string): string[] {

  const selected = new Set<DebugCategoryName>();
  const unknown: string[] = [];

  for(const entry of pattern.split(",").map((part) => part.trim()).filter((part) => part.length > 0)) {

    const excluded = entry.startsWith("-");
    const name = excluded ? entry.substring(1) : entry;
    const matches = DEBUG_CATEGORIES.map((known) => known.category).filter((category) => (name === "*") || (category === name));

    if(matches.length === 0) {

      unknown.push(entry);

      continue;
    }

    for(const category of matches) {

      if(excluded) {

        selected.delete(category);
      } else {

        selected.add(category);
      }
    }
  }

  enabledCategories = selected;

  return unknown;
}

/**
 * Checks whether debug output is on for a category.
 * @param category - The category to check.
 * @returns True if debug messages in this category should be logged.
 */
export function isCategoryEnabled(category: DebugCategoryName): boolean {

  return enabledCategories.has(category);
}

/**
 * Returns whether any debug category is on.
 * @returns True if at least one category is enabled.
 */
export function isAnyDebugEnabled(): boolean {

  return enabledCategories.size > 0;
}

/**
 * Creates a lightweight elapsed-time closure using performance.now(). Call the returned function to get the elapsed milliseconds since creation.
 * @returns A closure that returns elapsed milliseconds as a number.
 */
export function startTimer(): () => number {

  const start = performance.now();

  return (): number => Math.round(performance.now() - start);
}
