/**
 * Catalog source backed by a martservice endpoint.
 *
 * A fetcher keeps the configuration of each dataset it has loaded, so
 * attributes, filters and homology species of one dataset cost one
 * request. Create one per top-level call: nothing is meant to outlive it.
 */

import type { MartHttpClient } from "../transport/client.js";
import { ServiceError } from "../transport/errors.js";
import { describeHomology, homologySpecies } from "../homology/expander.js";
import {
  parseConfiguration,
  parseDatasets,
  parseRegistry,
  type DatasetConfiguration,
} from "./parsers.js";
import type { CatalogEntryByKind, CatalogKind, CatalogSource } from "./schema.js";

/** Marker the service puts in the body when a dataset has no configuration */
export const CONFIGURATION_ERROR_MARKER = "Problem retrieving configuration";

type CatalogLoaders = {
  [K in CatalogKind]: (scope: string | undefined) => Promise<CatalogEntryByKind[K][]>;
};

function requireScope(kind: CatalogKind, scope: string | undefined): string {
  if (scope === undefined || scope.trim() === "") {
    throw new TypeError(`Catalog '${kind}' needs a scope`);
  }
  return scope;
}

export class MartCatalogFetcher implements CatalogSource {
  private readonly client: MartHttpClient;
  private readonly configurations = new Map<string, Promise<DatasetConfiguration>>();
  private readonly loaders: CatalogLoaders;

  constructor(client: MartHttpClient) {
    this.client = client;
    this.loaders = {
      databases: async () => parseRegistry(await this.client.get({ type: "registry" })),
      datasets: async (scope) => {
        const database = requireScope("datasets", scope);
        return parseDatasets(await this.client.get({ type: "datasets", mart: database }), database);
      },
      attributes: async (scope) =>
        (await this.configuration(requireScope("attributes", scope))).attributes,
      filters: async (scope) =>
        (await this.configuration(requireScope("filters", scope))).filters,
      species: async (scope) => {
        const { attributes } = await this.configuration(requireScope("species", scope));
        return homologySpecies(describeHomology(attributes));
      },
    };
  }

  fetchCatalog<K extends CatalogKind>(kind: K, scope?: string): Promise<CatalogEntryByKind[K][]> {
    return this.loaders[kind](scope);
  }

  private configuration(dataset: string): Promise<DatasetConfiguration> {
    let pending = this.configurations.get(dataset);
    if (pending === undefined) {
      pending = this.loadConfiguration(dataset);
      this.configurations.set(dataset, pending);
    }
    return pending;
  }

  private async loadConfiguration(dataset: string): Promise<DatasetConfiguration> {
    const body = await this.client.get({
      type: "configuration",
      dataset,
      virtualSchema: this.client.virtualSchema,
    });
    if (body.includes(CONFIGURATION_ERROR_MARKER)) {
      throw new ServiceError(`No configuration for dataset '${dataset}'`, body);
    }
    return parseConfiguration(body);
  }
}
