/**
 * mart-resolver: fuzzy name resolution and query construction for
 * BioMart-style services.
 *
 * @example
 *   const mart = createMartService();
 *   const table = await mart.fetchData({
 *     databaseName: "ensembl mart ensembl",
 *     speciesName: "mmusculus",
 *     attributes: ["ensembl_gene_id", "Chromosome/scaffold name"],
 *     filters: { chromosome_name: ["1", "2"], transcript_tsl: false },
 *     homSpecies: ["human"],
 *     homQuery: ["ensembl_gene", "orthology_type"],
 *   });
 */

export * from "./catalog/index.js";
export * from "./selection/index.js";
export * from "./homology/index.js";
export * from "./query/index.js";
export * from "./transport/index.js";
export * from "./mart/index.js";
export {
  config,
  validateConfig,
  ConfigError,
  loadConnectionConfig,
  martServiceUrl,
  ConnectionConfigError,
  DEFAULT_MART_CONNECTION,
  MartConnectionSchema,
  type AppConfig,
  type MartConnection,
  type MartConnectionOverrides,
  type ConnectionConfigIssue,
} from "./config/index.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./logging/index.js";
