/**
 * Plain-text rendering of catalogs for display.
 */

import type { CatalogEntry, Filter } from "./schema.js";

/**
 * One line per entry:
 *   Display name 'Mouse genes (GRCm39)' corresponds to 'mmusculus_gene_ensembl'
 */
export function formatCatalog(entries: readonly CatalogEntry[]): string {
  return entries
    .map((entry) => `Display name '${entry.displayName}' corresponds to '${entry.name}'`)
    .join("\n");
}

/**
 * What a filter does and, optionally, its pre-defined values.
 */
export function describeFilter(filter: Filter, includeOptions = true): string {
  const lines = [
    `Filter's display name is '${filter.displayName}' and its internal name is '${filter.name}'`,
    `Filter's operator is '${filter.qualifier}' and its type is '${filter.type}'`,
  ];
  if (includeOptions && filter.options.length > 0) {
    lines.push("It has sub options:");
    for (const option of filter.options) {
      lines.push(`  ${option.value}\t${option.displayName}`);
    }
  }
  return lines.join("\n");
}
