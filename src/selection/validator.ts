/**
 * Selection validation.
 *
 * Requested attribute and filter names are matched best-effort against the
 * dataset's catalogs. A name that matches nothing is dropped rather than
 * failing the whole fetch; a name that matches several entries takes the
 * first in catalog order. Filter values are then checked against the
 * filter's kind, and a value of the wrong shape is an error.
 */

import { bestEffortResolve } from "../catalog/resolver.js";
import type { Attribute, Filter, FilterKind } from "../catalog/schema.js";
import type { FilterClause } from "../query/schema.js";
import { silentLogger, type Logger } from "../logging/index.js";

/**
 * Values callers may pass for a filter.
 *
 * Boolean filters take true/false, or the words "true"/"included"/"only" and
 * "false"/"excluded" in any case.
 * List filters take one string or number, or a non-empty array of them.
 */
export type FilterValue = boolean | string | number | readonly (string | number)[];

export class InvalidFilterValueError extends Error {
  public readonly filter: string;
  public readonly kind: FilterKind;
  public readonly value: unknown;

  constructor(filter: string, kind: FilterKind, value: unknown) {
    const expected =
      kind === "boolean"
        ? 'true, false, "included", "only" or "excluded"'
        : "a string, a number, or a non-empty array of them";
    super(`Invalid value ${describeValue(value)} for ${kind} filter '${filter}': expected ${expected}`);
    this.name = "InvalidFilterValueError";
    this.filter = filter;
    this.kind = kind;
    this.value = value;
  }
}

function describeValue(value: unknown): string {
  if (typeof value === "string") {
    return `"${value}"`;
  }
  if (Array.isArray(value)) {
    return `[${value.map(describeValue).join(", ")}]`;
  }
  if (value !== null && typeof value === "object") {
    return "object";
  }
  return String(value);
}

// ═══════════════════════════════════════════════════════════════════════════
// ATTRIBUTES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The dataset's default selection: attributes it marks as default, or its
 * first attribute when it marks none.
 */
export function defaultAttributes(catalog: readonly Attribute[]): string[] {
  const defaults = catalog.filter((attribute) => attribute.isDefault).map((a) => a.name);
  if (defaults.length > 0) {
    return defaults;
  }
  const [first] = catalog;
  return first === undefined ? [] : [first.name];
}

/**
 * Resolve requested attribute names (internal or display) to internal
 * names, keeping request order.
 *
 * Unknown names are dropped and repeats collapse to their first position.
 * An empty request, or one where nothing resolves, yields the defaults.
 */
export function validateAttributes(
  requested: readonly string[],
  catalog: readonly Attribute[],
  logger: Logger = silentLogger
): string[] {
  if (requested.length === 0) {
    return defaultAttributes(catalog);
  }

  const resolved: string[] = [];
  for (const name of requested) {
    const match = bestEffortResolve(name, catalog);
    if (match === undefined) {
      logger.debug("Dropping unknown attribute", { attribute: name });
      continue;
    }
    if (!resolved.includes(match.name)) {
      resolved.push(match.name);
    }
  }

  if (resolved.length === 0) {
    logger.warn("No requested attribute matched; using the default selection", {
      requested: requested.join(", "),
    });
    return defaultAttributes(catalog);
  }
  return resolved;
}

// ═══════════════════════════════════════════════════════════════════════════
// FILTERS
// ═══════════════════════════════════════════════════════════════════════════

const INCLUDED = new Set(["true", "included", "only"]);
const EXCLUDED = new Set(["false", "excluded"]);

function listItem(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim() !== "") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

/**
 * Type a value against a filter's kind.
 *
 * @throws InvalidFilterValueError when the value's shape does not fit
 */
export function toFilterClause(filter: Filter, value: unknown): FilterClause {
  if (filter.kind === "boolean") {
    const word = typeof value === "string" ? value.trim().toLowerCase() : undefined;
    if (value === true || (word !== undefined && INCLUDED.has(word))) {
      return { kind: "boolean", name: filter.name, excluded: false };
    }
    if (value === false || (word !== undefined && EXCLUDED.has(word))) {
      return { kind: "boolean", name: filter.name, excluded: true };
    }
    throw new InvalidFilterValueError(filter.name, filter.kind, value);
  }

  const items: unknown[] = Array.isArray(value) ? value : [value];
  const values = items.map(listItem);
  if (values.length === 0 || values.some((item) => item === undefined)) {
    throw new InvalidFilterValueError(filter.name, filter.kind, value);
  }
  return { kind: "list", name: filter.name, values: values.filter((v): v is string => v !== undefined) };
}

/**
 * Resolve requested filters (keyed by internal or display name) to typed
 * clauses, in request order.
 *
 * Unknown keys are dropped. When two keys resolve to the same filter the
 * first one wins.
 *
 * @throws InvalidFilterValueError for a value that does not fit its filter
 */
export function validateFilters(
  requested: Readonly<Record<string, unknown>>,
  catalog: readonly Filter[],
  logger: Logger = silentLogger
): FilterClause[] {
  const clauses: FilterClause[] = [];
  for (const [key, value] of Object.entries(requested)) {
    const filter = bestEffortResolve(key, catalog);
    if (filter === undefined) {
      logger.debug("Dropping unknown filter", { filter: key });
      continue;
    }
    if (clauses.some((clause) => clause.name === filter.name)) {
      logger.debug("Ignoring repeated filter", { filter: key, resolved: filter.name });
      continue;
    }
    clauses.push(toFilterClause(filter, value));
  }
  return clauses;
}
