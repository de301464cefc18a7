/**
 * Store adapter for CLI
 * Opens an SDK store with the built-in text filters the user asked for
 */

import { openStore } from "@flatpages/sdk";
import type { Filter, FilterRegistry, Store } from "@flatpages/sdk";
import type { StoreSettings } from "./env.js";

/**
 * Filters available through --filter
 */
export const BUILTIN_FILTERS: FilterRegistry = {
  upper: (value) => value.toUpperCase(),
  lower: (value) => value.toLowerCase(),
  trim: (value) => value.trim(),
};

export const BUILTIN_FILTER_NAMES: readonly string[] = Object.keys(BUILTIN_FILTERS);

/**
 * CLI store settings
 */
export interface CliStoreOptions extends StoreSettings {
  /** Names of built-in filters to enable */
  filters?: readonly string[];
}

/**
 * Pick the enabled built-in filters
 */
export function selectFilters(names: readonly string[] = []): FilterRegistry {
  const selected: Record<string, Filter> = {};
  for (const name of names) {
    const filter = BUILTIN_FILTERS[name];
    if (filter) {
      selected[name] = filter;
    }
  }
  return selected;
}

/**
 * Open a store for a CLI invocation
 */
export function openCliStore(options: CliStoreOptions): Store {
  return openStore({
    root: options.root,
    backend: options.backend,
    fileExtension: options.fileExtension,
    pathDelimiter: options.pathDelimiter,
    filters: selectFilters(options.filters),
  });
}
