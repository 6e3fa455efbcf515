/**
 * HTTP access to a martservice endpoint.
 *
 * Every request is a GET against the endpoint URL with its parameters in
 * the query string. Network failures, timeouts and non-2xx statuses become
 * TransportError. There is no retry.
 */

import { martServiceUrl, type MartConnection } from "../config/connection/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { TransportError } from "./errors.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface MartHttpClientOptions {
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  logger?: Logger;
}

export class MartHttpClient {
  private readonly connection: Readonly<MartConnection>;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(connection: Readonly<MartConnection>, options: MartHttpClientOptions = {}) {
    this.connection = connection;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  get url(): string {
    return martServiceUrl(this.connection);
  }

  get virtualSchema(): string {
    return this.connection.virtualSchema;
  }

  /**
   * GET the endpoint with the given parameters and return the body text.
   *
   * @throws TransportError
   */
  async get(params: Record<string, string>): Promise<string> {
    const url = `${this.url}?${new URLSearchParams(params).toString()}`;
    this.logger.debug("GET martservice", { params: Object.keys(params).join(",") });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        signal: AbortSignal.timeout(this.connection.timeoutMs),
      });
    } catch (err) {
      const reason =
        err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")
          ? `timed out after ${this.connection.timeoutMs} ms`
          : err instanceof Error
            ? err.message
            : String(err);
      throw new TransportError(`Request to ${this.url} failed: ${reason}`, { cause: err });
    }

    if (!response.ok) {
      throw new TransportError(
        `Request to ${this.url} failed: ${response.status} ${response.statusText}`,
        { status: response.status }
      );
    }

    try {
      return await response.text();
    } catch (err) {
      throw new TransportError(`Reading response from ${this.url} failed`, { cause: err });
    }
  }
}
