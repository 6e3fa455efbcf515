/**
 * Catalog model, matching and loading.
 */

export {
  FilterKind,
  filterKindOf,
  type CatalogEntry,
  type Database,
  type Dataset,
  type Attribute,
  type Filter,
  type FilterOption,
  type HomologySpecies,
  type CatalogKind,
  type CatalogEntryByKind,
  type CatalogSource,
} from "./schema.js";
export { normalize } from "./normalize.js";
export { resolve, disambiguate, strictResolve, bestEffortResolve } from "./resolver.js";
export { NotFoundError, AmbiguousSelectionError, type ResolutionContext } from "./errors.js";
export {
  parseRegistry,
  parseDatasets,
  parseConfiguration,
  type DatasetConfiguration,
} from "./parsers.js";
export { MartCatalogFetcher, CONFIGURATION_ERROR_MARKER } from "./fetcher.js";
export { formatCatalog, describeFilter } from "./format.js";
