#!/usr/bin/env node
/**
 * Command-line access to a martservice endpoint.
 *
 * Usage:
 *   npm run mart -- databases
 *   npm run mart -- datasets --database "ensembl genes" --species mouse
 *   npm run mart -- attributes --dataset mmusculus_gene_ensembl
 *   npm run mart -- filters --database "ensembl genes" --species "mexican tetra"
 *   npm run mart -- homology --dataset amexicanus_gene_ensembl
 *   npm run mart -- explain-filter --dataset mmusculus_gene_ensembl --filter chromosome
 *   npm run mart -- fetch --dataset mmusculus_gene_ensembl \
 *       --attribute "gene name" --filter chromosome_name=1,2 \
 *       --hom-species human --hom-field orthology_type
 *
 * Connection settings come from MART_* variables, overridden by --host,
 * --path, --port, --virtual-schema and --timeout.
 *
 * Exit codes:
 *   0 - Success
 *   1 - The call failed (resolution, validation, transport or service error)
 *   2 - Usage error
 */

import { parseArgs } from "node:util";
import Papa from "papaparse";

import { formatCatalog, describeFilter } from "../catalog/format.js";
import { AmbiguousSelectionError } from "../catalog/errors.js";
import {
  ConfigError,
  ConnectionConfigError,
  validateConfig,
  type MartConnectionOverrides,
} from "../config/index.js";
import { createMartService } from "../mart/factory.js";
import {
  SelectionRequestError,
  type DatasetReference,
  type FetchDataRequest,
} from "../mart/request.js";
import type { MartService } from "../mart/service.js";
import type { FilterValue } from "../selection/validator.js";
import { toRecords, type TabularResult } from "../transport/csv.js";

// ============================================================
// Types
// ============================================================

export type CliCommand =
  | { name: "databases" }
  | { name: "datasets"; database: string; species: string }
  | { name: "attributes" | "filters" | "homology"; reference: DatasetReference }
  | { name: "explain-filter"; reference: DatasetReference; filter: string }
  | { name: "fetch"; request: FetchDataRequest };

export interface CliInvocation {
  command: CliCommand;
  json: boolean;
  connection: MartConnectionOverrides;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const USAGE = `
Usage: mart <command> [options]

Commands:
  databases                        List databases
  datasets                         Datasets of --database matching --species
  attributes                       Attributes of a dataset
  filters                          Filters of a dataset
  homology                         Homology attributes of a dataset
  explain-filter                   Describe the filter matching --filter
  fetch                            Run a query and print CSV

Dataset options:
  --dataset <name>                 Internal dataset name
  --database <name>                Database name or label (with --species)
  --species <name>                 Species name or label (with --database)

Fetch options:
  --attribute <name>               Output column (repeatable; defaults when omitted)
  --filter <name>=<value>[,...]    Filter value (repeatable); boolean filters
                                   take true, included or only, and false or excluded
  --hom-species <name>             Species for homology columns (repeatable)
  --hom-field <field>              Homology field (repeatable)
  --all-rows                       Keep duplicate rows

Connection options:
  --host <url>                     Scheme and host name only (MART_HOST)
  --path <path>                    Endpoint path (MART_PATH)
  --port <n>                       Port (MART_PORT)
  --virtual-schema <name>          Virtual schema (MART_VIRTUAL_SCHEMA)
  --timeout <ms>                   Per-request timeout, default 300000 (MART_TIMEOUT_MS)

Other options:
  --json                           Output JSON
  -h, --help                       Show this help message
`;

// ============================================================
// CLI Parsing
// ============================================================

/**
 * Read `name=value` filter arguments. Commas separate list values; a value
 * without commas stays a single string.
 *
 * @throws CliUsageError when an argument has no name or no "="
 */
export function parseFilterArgs(args: readonly string[]): Record<string, FilterValue> {
  const filters: Record<string, FilterValue> = {};
  for (const arg of args) {
    const separator = arg.indexOf("=");
    const name = separator > 0 ? arg.slice(0, separator).trim() : "";
    if (name === "") {
      throw new CliUsageError(`Filter '${arg}' must look like name=value`);
    }
    const value = arg.slice(separator + 1);
    filters[name] = value.includes(",") ? value.split(",").map((v) => v.trim()) : value;
  }
  return filters;
}

function parseNumberOption(value: string | undefined, option: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value)) {
    throw new CliUsageError(`--${option} must be a number, got: ${value}`);
  }
  return parseInt(value, 10);
}

function requireOption(value: string | undefined, option: string, command: string): string {
  if (value === undefined || value.trim() === "") {
    throw new CliUsageError(`${command} needs --${option}`);
  }
  return value;
}

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      dataset: { type: "string" },
      database: { type: "string" },
      species: { type: "string" },
      filter: { type: "string", multiple: true },
      attribute: { type: "string", multiple: true },
      "hom-species": { type: "string", multiple: true },
      "hom-field": { type: "string", multiple: true },
      "all-rows": { type: "boolean" },
      host: { type: "string" },
      path: { type: "string" },
      port: { type: "string" },
      "virtual-schema": { type: "string" },
      timeout: { type: "string" },
      json: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}

/**
 * Parse command-line arguments (without the node and script entries).
 * Returns undefined when help was asked for.
 *
 * @throws CliUsageError
 */
export function parseCommandLine(argv: readonly string[]): CliInvocation | undefined {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }

  const { values, positionals } = parsed;
  if (values.help === true) {
    return undefined;
  }

  const [name, ...extra] = positionals;
  if (name === undefined) {
    throw new CliUsageError("Missing command");
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${extra.join(" ")}`);
  }

  const reference: DatasetReference = {
    datasetName: values.dataset,
    databaseName: values.database,
    speciesName: values.species,
  };

  let command: CliCommand;
  switch (name) {
    case "databases":
      command = { name };
      break;
    case "datasets":
      command = {
        name,
        database: requireOption(values.database, "database", name),
        species: requireOption(values.species, "species", name),
      };
      break;
    case "attributes":
    case "filters":
    case "homology":
      command = { name, reference };
      break;
    case "explain-filter": {
      const filters = values.filter ?? [];
      if (filters.length > 1) {
        throw new CliUsageError(`${name} takes one --filter`);
      }
      command = { name, reference, filter: requireOption(filters[0], "filter", name) };
      break;
    }
    case "fetch":
      command = {
        name,
        request: {
          ...reference,
          attributes: values.attribute ?? [],
          filters: parseFilterArgs(values.filter ?? []),
          homSpecies: values["hom-species"] ?? [],
          homQuery: values["hom-field"] ?? [],
          uniqueRows: values["all-rows"] !== true,
        },
      };
      break;
    default:
      throw new CliUsageError(`Unknown command '${name}'`);
  }

  return {
    command,
    json: values.json === true,
    connection: {
      host: values.host,
      path: values.path,
      port: parseNumberOption(values.port, "port"),
      virtualSchema: values["virtual-schema"],
      timeoutMs: parseNumberOption(values.timeout, "timeout"),
    },
  };
}

// ============================================================
// Running
// ============================================================

/**
 * Rows as CSV, header first.
 */
export function formatResult(result: TabularResult): string {
  return Papa.unparse(
    { fields: [...result.columns], data: result.rows.map((row) => [...row]) },
    { newline: "\n" }
  );
}

/**
 * Run one command and return what to print.
 */
export async function runCommand(
  command: CliCommand,
  service: MartService,
  json = false
): Promise<string> {
  const render = (value: unknown, text: () => string): string =>
    json ? JSON.stringify(value, null, 2) : text();

  switch (command.name) {
    case "databases": {
      const databases = await service.listDatabases();
      return render(databases, () => formatCatalog(databases));
    }
    case "datasets": {
      const datasets = await service.findDataset(command.database, command.species);
      return render(datasets, () => formatCatalog(datasets));
    }
    case "attributes": {
      const attributes = await service.getAttributes(command.reference);
      return render(attributes, () => formatCatalog(attributes));
    }
    case "filters": {
      const filters = await service.getFilters(command.reference);
      return render(filters, () => formatCatalog(filters));
    }
    case "homology": {
      const homology = await service.getHomology(command.reference);
      return render(homology, () =>
        homology.map((h) => `${h.speciesDisplayName}\t${h.field}\t${h.name}`).join("\n")
      );
    }
    case "explain-filter": {
      const filter = await service.explainFilter(command.reference, command.filter);
      return render(filter, () => describeFilter(filter));
    }
    case "fetch": {
      const result = await service.fetchData(command.request);
      return render(toRecords(result), () => formatResult(result));
    }
  }
}

/**
 * Message for a failed call; candidate and issue lists included.
 */
export function describeError(err: unknown): string {
  if (
    err instanceof AmbiguousSelectionError ||
    err instanceof SelectionRequestError ||
    err instanceof ConnectionConfigError
  ) {
    return err.format();
  }
  if (err instanceof ConfigError) {
    return `${err.message} Check your environment or .env file.`;
  }
  return err instanceof Error ? err.message : String(err);
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  let invocation: CliInvocation | undefined;
  try {
    invocation = parseCommandLine(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    console.error(USAGE);
    process.exit(2);
  }

  if (invocation === undefined) {
    console.log(USAGE);
    process.exit(0);
  }

  validateConfig();
  const service = createMartService({ connection: invocation.connection });
  console.log(await runCommand(invocation.command, service, invocation.json));
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("mart.ts") ||
   process.argv[1].endsWith("mart.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    console.error(`Error: ${describeError(err)}`);
    process.exit(1);
  });
}
