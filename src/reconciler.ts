// CHANGE: Partition the repository inventory into scanned and unscanned entries.
// WHY: Both audit modes reduce to "is this repository's key known to the registry".

import { EmptyInventoryError } from "./errors.js";
import { ComparisonResult, InventoryItem, RegistryItem } from "./types.js";

/**
 * Split `inventory` by whether each entry's key appears in `registryKeys`.
 *
 * Order follows `inventory`; every entry lands in exactly one side.
 *
 * @param keyOf - Extracts the comparison key of an inventory entry.
 */
export function reconcile<T>(
  inventory: readonly T[],
  registryKeys: Iterable<string>,
  keyOf: (item: T) => string
): ComparisonResult<T> {
  const known = new Set(registryKeys);
  const matches: T[] = [];
  const nonMatches: T[] = [];
  for (const item of inventory) {
    if (known.has(keyOf(item))) {
      matches.push(item);
    } else {
      nonMatches.push(item);
    }
  }
  return { matches, nonMatches };
}

/**
 * Match repositories to registered projects by exact name.
 */
export function reconcileByName(
  inventory: readonly InventoryItem[],
  registry: readonly RegistryItem[]
): ComparisonResult<InventoryItem> {
  return reconcile(
    inventory,
    registry.map(project => project.name),
    item => item.name
  );
}

/**
 * Match repository names against the registry's repository tag values.
 */
export function reconcileByTag(inventory: readonly string[], taggedNames: readonly string[]): ComparisonResult<string> {
  return reconcile(inventory, taggedNames, name => name);
}

/**
 * Percentage of the inventory that has a registry counterpart.
 *
 * @throws EmptyInventoryError when `total` is 0.
 */
export function coveragePercentage(matched: number, total: number): number {
  if (total <= 0) {
    throw new EmptyInventoryError();
  }
  return (matched / total) * 100;
}

export function formatCoverage(matched: number, total: number): string {
  const percentage = coveragePercentage(matched, total);
  return `Coverage: ${percentage.toFixed(2)}% (${matched}/${total} repositories matched)`;
}
