/**
 * Public operations.
 *
 * Each operation is one top-level call: it gets its own catalog source
 * from the factory, so catalogs are fetched fresh and nothing is shared
 * between concurrent calls. Resolution policy:
 *
 *   database, dataset, explained filter   strict (NotFound / Ambiguous)
 *   attributes, filters, homology species best effort (misses dropped)
 */

import { resolve, strictResolve } from "../catalog/resolver.js";
import type {
  Attribute,
  CatalogSource,
  Database,
  Dataset,
  Filter,
} from "../catalog/schema.js";
import { describeHomology, expandHomology, type HomologyAttribute } from "../homology/expander.js";
import { generateCallId, silentLogger, type Logger } from "../logging/index.js";
import { buildQuery, type ResolvedQuery } from "../query/index.js";
import { validateAttributes, validateFilters } from "../selection/validator.js";
import type { QueryExecutor } from "../transport/executor.js";
import type { TabularResult } from "../transport/csv.js";
import {
  parseDatasetReference,
  parseFetchDataRequest,
  type DatasetReference,
  type FetchDataRequest,
  type ParsedDatasetReference,
  type ParsedFetchDataRequest,
} from "./request.js";

export interface MartServiceOptions {
  /** Called once per top-level call */
  catalogs: () => CatalogSource;
  executor: QueryExecutor;
  /** Virtual schema for datasets named directly */
  virtualSchema?: string;
  logger?: Logger;
}

interface CallContext {
  catalogs: CatalogSource;
  log: Logger;
}

interface LocatedDataset {
  name: string;
  virtualSchema: string;
}

export class MartService {
  private readonly catalogs: () => CatalogSource;
  private readonly executor: QueryExecutor;
  private readonly virtualSchema: string;
  private readonly logger: Logger;

  constructor(options: MartServiceOptions) {
    this.catalogs = options.catalogs;
    this.executor = options.executor;
    this.virtualSchema = options.virtualSchema ?? "default";
    this.logger = options.logger ?? silentLogger;
  }

  async listDatabases(): Promise<Database[]> {
    const { catalogs } = this.begin("listDatabases");
    return catalogs.fetchCatalog("databases");
  }

  /**
   * Datasets of a database matching a species name. The database must
   * resolve uniquely; any number of datasets, including none, is a valid
   * answer.
   */
  async findDataset(databaseName: string, species: string): Promise<Dataset[]> {
    const call = this.begin("findDataset");
    const database = await this.resolveDatabase(databaseName, call);
    const datasets = resolve(species, await call.catalogs.fetchCatalog("datasets", database.name));
    call.log.info("Datasets found", {
      database: database.name,
      species,
      matches: datasets.length,
    });
    return datasets;
  }

  async getAttributes(reference: DatasetReference): Promise<Attribute[]> {
    const call = this.begin("getAttributes");
    const dataset = await this.locateDataset(parseDatasetReference(reference), call);
    return call.catalogs.fetchCatalog("attributes", dataset.name);
  }

  async getFilters(reference: DatasetReference): Promise<Filter[]> {
    const call = this.begin("getFilters");
    const dataset = await this.locateDataset(parseDatasetReference(reference), call);
    return call.catalogs.fetchCatalog("filters", dataset.name);
  }

  /**
   * Homology attributes of a dataset with their species and field parts.
   */
  async getHomology(reference: DatasetReference): Promise<HomologyAttribute[]> {
    const call = this.begin("getHomology");
    const dataset = await this.locateDataset(parseDatasetReference(reference), call);
    return describeHomology(await call.catalogs.fetchCatalog("attributes", dataset.name));
  }

  /**
   * The one filter of a dataset matching `filterName`.
   */
  async explainFilter(reference: DatasetReference, filterName: string): Promise<Filter> {
    const call = this.begin("explainFilter");
    const dataset = await this.locateDataset(parseDatasetReference(reference), call);
    const filters = await call.catalogs.fetchCatalog("filters", dataset.name);
    return strictResolve(filterName, filters, "filter");
  }

  /**
   * Resolve a request into the query that `fetchData` would run.
   */
  async planQuery(request: FetchDataRequest): Promise<ResolvedQuery> {
    const call = this.begin("planQuery");
    return this.plan(parseFetchDataRequest(request), call);
  }

  async fetchData(request: FetchDataRequest): Promise<TabularResult> {
    const call = this.begin("fetchData");
    const resolved = await this.plan(parseFetchDataRequest(request), call);
    const result = await this.executor.execute(buildQuery(resolved));
    call.log.info("Fetched rows", {
      dataset: resolved.dataset,
      columns: result.columns.length,
      rows: result.rows.length,
    });
    return result;
  }

  private begin(operation: string): CallContext {
    return {
      catalogs: this.catalogs(),
      log: this.logger.child({ call: generateCallId(), op: operation }),
    };
  }

  private async resolveDatabase(databaseName: string, call: CallContext): Promise<Database> {
    const databases = await call.catalogs.fetchCatalog("databases");
    const database = strictResolve(databaseName, databases, "database");
    call.log.debug("Resolved database", { query: databaseName, database: database.name });
    return database;
  }

  private async locateDataset(
    reference: ParsedDatasetReference,
    call: CallContext
  ): Promise<LocatedDataset> {
    if (reference.by === "dataset") {
      return { name: reference.datasetName, virtualSchema: this.virtualSchema };
    }

    const database = await this.resolveDatabase(reference.databaseName, call);
    const datasets = await call.catalogs.fetchCatalog("datasets", database.name);
    const dataset = strictResolve(reference.speciesName, datasets, "dataset");
    call.log.debug("Resolved dataset", { query: reference.speciesName, dataset: dataset.name });
    return { name: dataset.name, virtualSchema: database.virtualSchema };
  }

  private async plan(request: ParsedFetchDataRequest, call: CallContext): Promise<ResolvedQuery> {
    const dataset = await this.locateDataset(request.reference, call);
    const catalog = await call.catalogs.fetchCatalog("attributes", dataset.name);

    const attributes = validateAttributes(request.attributes, catalog, call.log);
    const homology = expandHomology(
      describeHomology(catalog),
      request.homSpecies,
      request.homQuery,
      call.log
    ).filter((name) => !attributes.includes(name));

    const filters =
      Object.keys(request.filters).length > 0
        ? validateFilters(
            request.filters,
            await call.catalogs.fetchCatalog("filters", dataset.name),
            call.log
          )
        : [];

    call.log.info("Resolved query", {
      dataset: dataset.name,
      attributes: attributes.length,
      homology: homology.length,
      filters: filters.length,
    });

    return {
      dataset: dataset.name,
      virtualSchema: dataset.virtualSchema,
      attributes: [...attributes, ...homology],
      filters,
      uniqueRows: request.uniqueRows,
    };
  }
}
