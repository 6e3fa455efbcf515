/**
 * Fuzzy catalog resolution.
 *
 * A single matcher (normalized substring over internal and display name)
 * backs two policies:
 *
 *   strictResolve      exactly one match or an error. Used for databases,
 *                      datasets and anything else that must be unique.
 *   bestEffortResolve  first match in catalog order, or undefined. Used for
 *                      attribute, filter and homology species names, where
 *                      a miss drops the item instead of failing the call.
 *
 * Matching is permissive, and callers narrow progressively:
 * "mouse" matches every mouse-like dataset, "mmusculus" just one.
 */

import { normalize } from "./normalize.js";
import { NotFoundError, AmbiguousSelectionError, type ResolutionContext } from "./errors.js";
import type { CatalogEntry } from "./schema.js";

function matcher(query: string): (entry: CatalogEntry) => boolean {
  const needle = normalize(query);
  return (entry) =>
    normalize(entry.name).includes(needle) || normalize(entry.displayName).includes(needle);
}

/**
 * All entries whose normalized name or display name contains the
 * normalized query, in catalog order.
 */
export function resolve<T extends CatalogEntry>(query: string, catalog: readonly T[]): T[] {
  return catalog.filter(matcher(query));
}

/**
 * Reduce a match list to its single entry.
 *
 * @throws NotFoundError when there are no matches
 * @throws AmbiguousSelectionError when there is more than one
 */
export function disambiguate<T extends CatalogEntry>(
  matches: readonly T[],
  context: ResolutionContext
): T {
  const [first] = matches;
  if (first === undefined) {
    throw new NotFoundError(context);
  }
  if (matches.length > 1) {
    throw new AmbiguousSelectionError(context, matches);
  }
  return first;
}

export function strictResolve<T extends CatalogEntry>(
  query: string,
  catalog: readonly T[],
  kind: string
): T {
  return disambiguate(resolve(query, catalog), { kind, query });
}

export function bestEffortResolve<T extends CatalogEntry>(
  query: string,
  catalog: readonly T[]
): T | undefined {
  return catalog.find(matcher(query));
}
