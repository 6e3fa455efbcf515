export { TransportError, ServiceError } from "./errors.js";
export { MartHttpClient, type FetchLike, type MartHttpClientOptions } from "./client.js";
export { parseCsv, toRecords, type TabularResult } from "./csv.js";
export { MartQueryExecutor, QUERY_ERROR_MARKER, type QueryExecutor } from "./executor.js";
