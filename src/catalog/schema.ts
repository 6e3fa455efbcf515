/**
 * Catalog model.
 *
 * Every catalog the service publishes (databases, datasets, attributes,
 * filters, homology species) is a list of entries pairing a unique
 * internal name with a human-facing display name. Display names need not
 * be unique.
 */

import { z } from "zod";

export interface CatalogEntry {
  /** Internal identifier, unique within its catalog */
  readonly name: string;
  /** Human-readable label */
  readonly displayName: string;
}

/**
 * A top-level data source, one `MartURLLocation` of the registry.
 */
export interface Database extends CatalogEntry {
  readonly host: string;
  readonly path: string;
  readonly port: number | undefined;
  readonly virtualSchema: string;
  readonly visible: boolean;
}

/**
 * One species or collection inside a database.
 */
export interface Dataset extends CatalogEntry {
  /** Internal name of the owning database */
  readonly database: string;
}

/**
 * A selectable output column of a dataset.
 */
export interface Attribute extends CatalogEntry {
  readonly description: string;
  /** Internal name of the attribute page this attribute sits on */
  readonly page: string;
  /** Part of the dataset's default selection */
  readonly isDefault: boolean;
}

/**
 * Shape of values a filter accepts.
 *
 * "boolean" filters include or exclude rows having the property;
 * "list" filters take one or more values.
 */
export const FilterKind = z.enum(["boolean", "list"]);
export type FilterKind = z.infer<typeof FilterKind>;

export interface FilterOption {
  readonly name: string;
  readonly displayName: string;
  readonly value: string;
}

/**
 * A row constraint a dataset supports.
 */
export interface Filter extends CatalogEntry {
  readonly description: string;
  /** Raw filter type as published (boolean, list, text, id_list, ...) */
  readonly type: string;
  /** Comparison operator, e.g. "=" or ">=" */
  readonly qualifier: string;
  readonly kind: FilterKind;
  /** Pre-defined values, empty when the filter takes free input */
  readonly options: readonly FilterOption[];
}

/**
 * Filter kind for a raw published filter type.
 */
export function filterKindOf(type: string): FilterKind {
  return type.trim().toLowerCase() === "boolean" ? "boolean" : "list";
}

/**
 * A species that a dataset has homology data towards.
 * `name` is the species token used in attribute names (e.g. "hsapiens").
 */
export type HomologySpecies = CatalogEntry;

/**
 * Catalog kinds a catalog source can be asked for, with the entry type of
 * each. `datasets` are scoped to a database; `attributes`, `filters` and
 * `species` to a dataset.
 */
export interface CatalogEntryByKind {
  databases: Database;
  datasets: Dataset;
  attributes: Attribute;
  filters: Filter;
  species: HomologySpecies;
}

export type CatalogKind = keyof CatalogEntryByKind;

/**
 * Source of catalogs.
 * Failures (TransportError, ServiceError) propagate to the caller unchanged.
 */
export interface CatalogSource {
  fetchCatalog<K extends CatalogKind>(
    kind: K,
    scope?: string
  ): Promise<CatalogEntryByKind[K][]>;
}
