/**
 * Query builder.
 *
 * Pure translation from a ResolvedQuery to the service's query document.
 * Callers are expected to route names through resolution first, so
 * structural problems here are programming errors, not user errors.
 */

import {
  DATASET_CONFIG_VERSION,
  QUERY_FORMATTER,
  type FilterClause,
  type QueryDocument,
  type ResolvedQuery,
  type WireFilterClause,
} from "./schema.js";

/**
 * A query that cannot be expressed (blank dataset, no attributes,
 * repeated names). Fatal; retrying will not help.
 */
export class QueryContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QueryContractError";
  }
}

function firstDuplicate(names: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      return name;
    }
    seen.add(name);
  }
  return undefined;
}

function copyClause(clause: FilterClause): WireFilterClause {
  return clause.kind === "boolean"
    ? { kind: "boolean", name: clause.name, excluded: clause.excluded }
    : { kind: "list", name: clause.name, values: [...clause.values] };
}

/**
 * Build the query document for a resolved query.
 * Attribute order is kept exactly; it is the output column order.
 *
 * @throws QueryContractError on structurally invalid input
 */
export function buildQuery(resolved: ResolvedQuery): QueryDocument {
  if (resolved.dataset.trim() === "") {
    throw new QueryContractError("Query has no dataset");
  }
  if (resolved.virtualSchema.trim() === "") {
    throw new QueryContractError("Query has no virtual schema");
  }
  if (resolved.attributes.length === 0) {
    throw new QueryContractError(`Query on '${resolved.dataset}' selects no attributes`);
  }

  const repeatedAttribute = firstDuplicate(resolved.attributes);
  if (repeatedAttribute !== undefined) {
    throw new QueryContractError(`Attribute '${repeatedAttribute}' is selected twice`);
  }

  const repeatedFilter = firstDuplicate(resolved.filters.map((clause) => clause.name));
  if (repeatedFilter !== undefined) {
    throw new QueryContractError(`Filter '${repeatedFilter}' is given twice`);
  }

  for (const clause of resolved.filters) {
    if (clause.kind === "list" && clause.values.length === 0) {
      throw new QueryContractError(`Filter '${clause.name}' has no values`);
    }
  }

  return {
    virtualSchemaName: resolved.virtualSchema,
    formatter: QUERY_FORMATTER,
    header: true,
    uniqueRows: resolved.uniqueRows,
    datasetConfigVersion: DATASET_CONFIG_VERSION,
    dataset: {
      name: resolved.dataset,
      interface: "default",
      attributes: [...resolved.attributes],
      filters: resolved.filters.map(copyClause),
    },
  };
}
