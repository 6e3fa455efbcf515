/**
 * Shared fixtures and in-process stand-ins for the service.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import {
  parseConfiguration,
  parseDatasets,
  parseRegistry,
  type DatasetConfiguration,
} from "../catalog/parsers.js";
import type {
  CatalogEntryByKind,
  CatalogKind,
  CatalogSource,
  Database,
  Dataset,
} from "../catalog/schema.js";
import { describeHomology, homologySpecies } from "../homology/expander.js";
import type { QueryDocument } from "../query/schema.js";
import type { TabularResult } from "../transport/csv.js";
import { ServiceError } from "../transport/errors.js";
import type { QueryExecutor } from "../transport/executor.js";
import type { FetchLike } from "../transport/client.js";
import type { LogContext, Logger, LogLevel } from "../logging/index.js";

const FIXTURE_DIR = join(dirname(fileURLToPath(import.meta.url)), "fixtures");

export function readFixture(name: string): string {
  return readFileSync(join(FIXTURE_DIR, name), "utf8");
}

export const REGISTRY_XML = readFixture("registry.xml");
export const DATASETS_TSV = readFixture("datasets.tsv");
export const TETRA_CONFIGURATION_XML = readFixture("amexicanus-configuration.xml");

export const GENES_DATABASE = "ENSEMBL_MART_ENSEMBL";
export const TETRA_DATASET = "amexicanus_gene_ensembl";

// ═══════════════════════════════════════════════════════════════════════════
// CATALOG SOURCE
// ═══════════════════════════════════════════════════════════════════════════

export interface InMemoryCatalogs {
  databases: Database[];
  /** Datasets keyed by database internal name */
  datasets: Record<string, Dataset[]>;
  /** Configurations keyed by dataset internal name */
  configurations: Record<string, DatasetConfiguration>;
}

type Loaders = {
  [K in CatalogKind]: (scope: string | undefined) => CatalogEntryByKind[K][];
};

/**
 * Catalog source over fixed catalogs. Records every request as
 * "kind" or "kind:scope". Unknown scopes fail like the service does.
 */
export class InMemoryCatalogSource implements CatalogSource {
  readonly requests: string[] = [];
  private readonly loaders: Loaders;

  constructor(catalogs: InMemoryCatalogs) {
    const configuration = (scope: string | undefined): DatasetConfiguration => {
      const found = scope === undefined ? undefined : catalogs.configurations[scope];
      if (found === undefined) {
        throw new ServiceError(`No configuration for dataset '${scope}'`, "");
      }
      return found;
    };

    this.loaders = {
      databases: () => catalogs.databases,
      datasets: (scope) => {
        const found = scope === undefined ? undefined : catalogs.datasets[scope];
        if (found === undefined) {
          throw new ServiceError(`No datasets for database '${scope}'`, "");
        }
        return found;
      },
      attributes: (scope) => configuration(scope).attributes,
      filters: (scope) => configuration(scope).filters,
      species: (scope) => homologySpecies(describeHomology(configuration(scope).attributes)),
    };
  }

  async fetchCatalog<K extends CatalogKind>(
    kind: K,
    scope?: string
  ): Promise<CatalogEntryByKind[K][]> {
    this.requests.push(scope === undefined ? kind : `${kind}:${scope}`);
    return this.loaders[kind](scope);
  }
}

/**
 * Catalogs parsed from the fixture files: the genes database with its
 * datasets, and the Mexican tetra configuration.
 */
export function fixtureCatalogs(): InMemoryCatalogs {
  return {
    databases: parseRegistry(REGISTRY_XML),
    datasets: { [GENES_DATABASE]: parseDatasets(DATASETS_TSV, GENES_DATABASE) },
    configurations: { [TETRA_DATASET]: parseConfiguration(TETRA_CONFIGURATION_XML) },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// QUERY EXECUTOR
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Executor that records documents and answers with a fixed table.
 */
export class RecordingExecutor implements QueryExecutor {
  readonly documents: QueryDocument[] = [];
  private readonly result: TabularResult;

  constructor(result: TabularResult = { columns: [], rows: [] }) {
    this.result = result;
  }

  async execute(document: QueryDocument): Promise<TabularResult> {
    this.documents.push(document);
    return this.result;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FETCH
// ═══════════════════════════════════════════════════════════════════════════

export interface StubFetch {
  fetch: FetchLike;
  /** Query parameters of every request, in order */
  calls: URLSearchParams[];
  urls: string[];
}

/**
 * A fetch that answers from `route` without touching the network.
 */
export function stubFetch(route: (params: URLSearchParams) => Response): StubFetch {
  const calls: URLSearchParams[] = [];
  const urls: string[] = [];
  return {
    calls,
    urls,
    fetch: async (input) => {
      urls.push(input);
      const params = new URL(input).searchParams;
      calls.push(params);
      return route(params);
    },
  };
}

/**
 * Routes for the fixture service: registry, genes datasets and the tetra
 * configuration; anything else gets the service's configuration error.
 */
export function fixtureRoute(params: URLSearchParams): Response {
  switch (params.get("type")) {
    case "registry":
      return new Response(REGISTRY_XML);
    case "datasets":
      return new Response(params.get("mart") === GENES_DATABASE ? DATASETS_TSV : "");
    case "configuration":
      return new Response(
        params.get("dataset") === TETRA_DATASET
          ? TETRA_CONFIGURATION_XML
          : "Problem retrieving configuration for requested dataset"
      );
    default:
      return new Response("Not found", { status: 404, statusText: "Not Found" });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════════════════

export interface RecordedEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
}

/**
 * Logger that keeps its entries, children included, in one list.
 */
export function recordingLogger(
  entries: RecordedEntry[] = [],
  bound: LogContext = {}
): Logger & { entries: RecordedEntry[] } {
  const log =
    (level: LogLevel) =>
    (message: string, context: LogContext = {}): void => {
      entries.push({ level, message, context: { ...bound, ...context } });
    };
  return {
    entries,
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
    child: (context) => recordingLogger(entries, { ...bound, ...context }),
  };
}
