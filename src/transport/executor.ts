/**
 * Result materializer: runs a query document against the service and
 * decodes the response.
 */

import { performance } from "node:perf_hooks";
import { serializeQuery, type QueryDocument } from "../query/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { parseCsv, type TabularResult } from "./csv.js";
import { ServiceError } from "./errors.js";
import type { MartHttpClient } from "./client.js";

/** Marker the service puts in the body of a rejected query */
export const QUERY_ERROR_MARKER = "Query ERROR";

export interface QueryExecutor {
  /**
   * @throws TransportError when the service cannot be reached
   * @throws ServiceError when the service rejects the query
   */
  execute(document: QueryDocument): Promise<TabularResult>;
}

export class MartQueryExecutor implements QueryExecutor {
  private readonly client: MartHttpClient;
  private readonly logger: Logger;

  constructor(client: MartHttpClient, logger: Logger = silentLogger) {
    this.client = client;
    this.logger = logger;
  }

  async execute(document: QueryDocument): Promise<TabularResult> {
    const xml = serializeQuery(document);
    this.logger.debug("Query document", { xml });

    const started = performance.now();
    const body = await this.client.get({ query: xml });
    const seconds = (performance.now() - started) / 1000;

    if (body.includes(QUERY_ERROR_MARKER)) {
      throw new ServiceError(
        `Service rejected the query on '${document.dataset.name}'`,
        body
      );
    }

    const result = parseCsv(body);
    this.logger.info("Dataset fetched", {
      dataset: document.dataset.name,
      seconds: Number(seconds.toFixed(2)),
      rows: result.rows.length,
    });
    return result;
  }
}
