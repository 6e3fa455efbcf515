export {
  QueryDocumentSchema,
  QUERY_FORMATTER,
  DATASET_CONFIG_VERSION,
  type FilterClause,
  type ResolvedQuery,
  type QueryDocument,
  type WireFilterClause,
} from "./schema.js";
export { buildQuery, QueryContractError } from "./builder.js";
export { serializeQuery, parseQueryDocument } from "./serialization.js";
