/**
 * Wiring of a MartService against a live endpoint.
 */

import { config, loadConnectionConfig, type MartConnectionOverrides } from "../config/index.js";
import { createLogger, isLogLevel, type Logger } from "../logging/index.js";
import { MartCatalogFetcher } from "../catalog/fetcher.js";
import { MartHttpClient, type FetchLike } from "../transport/client.js";
import { MartQueryExecutor } from "../transport/executor.js";
import { MartService } from "./service.js";

export interface CreateMartServiceOptions {
  /** Overrides for the MART_* environment settings */
  connection?: MartConnectionOverrides;
  logger?: Logger;
  fetch?: FetchLike;
}

function defaultLogger(): Logger {
  return createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    console: config.logConsole,
    file: config.logFile,
  });
}

/**
 * @throws ConnectionConfigError when the merged connection settings are invalid
 */
export function createMartService(options: CreateMartServiceOptions = {}): MartService {
  const connection = loadConnectionConfig(config.connection, options.connection ?? {});
  const logger = options.logger ?? defaultLogger();
  const client = new MartHttpClient(connection, { fetch: options.fetch, logger });

  return new MartService({
    catalogs: () => new MartCatalogFetcher(client),
    executor: new MartQueryExecutor(client, logger),
    virtualSchema: connection.virtualSchema,
    logger,
  });
}
