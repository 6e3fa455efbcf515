/**
 * Caller input for the public operations, validated before any request is
 * sent.
 *
 * A dataset is named either directly by its internal name, or by a
 * database and species pair that is resolved against the service's
 * catalogs.
 */

import { z, type ZodIssue } from "zod";
import type { FilterValue } from "../selection/validator.js";

export interface DatasetReference {
  /** Internal dataset name, e.g. "mmusculus_gene_ensembl"; used as is */
  datasetName?: string;
  /** Database name or label, e.g. "ensembl mart ensembl" */
  databaseName?: string;
  /** Species name or label within the database, e.g. "mouse genes" */
  speciesName?: string;
}

export interface FetchDataRequest extends DatasetReference {
  /** Attribute names or labels; the dataset's defaults when empty */
  attributes?: readonly string[];
  /** Filter values keyed by filter name or label */
  filters?: Readonly<Record<string, FilterValue>>;
  /** Species to add homology columns for */
  homSpecies?: readonly string[];
  /** Homology fields, e.g. "ensembl_gene", "orthology_type" */
  homQuery?: readonly string[];
  /** Drop duplicate rows; defaults to true */
  uniqueRows?: boolean;
}

export type ParsedDatasetReference =
  | { readonly by: "dataset"; readonly datasetName: string }
  | { readonly by: "species"; readonly databaseName: string; readonly speciesName: string };

export interface ParsedFetchDataRequest {
  readonly reference: ParsedDatasetReference;
  readonly attributes: readonly string[];
  /** Values are checked against filter kinds during validation */
  readonly filters: Readonly<Record<string, unknown>>;
  readonly homSpecies: readonly string[];
  readonly homQuery: readonly string[];
  readonly uniqueRows: boolean;
}

export class SelectionRequestError extends Error {
  public readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[]) {
    super(message);
    this.name = "SelectionRequestError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(request)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

const Name = z.string().trim().min(1);

const DatasetReferenceSchema = z.object({
  datasetName: Name.optional(),
  databaseName: Name.optional(),
  speciesName: Name.optional(),
});

const FetchDataRequestSchema = DatasetReferenceSchema.extend({
  attributes: z.array(z.string()).default([]),
  filters: z.record(z.string(), z.unknown()).default({}),
  homSpecies: z.array(z.string()).default([]),
  homQuery: z.array(z.string()).default([]),
  uniqueRows: z.boolean().default(true),
});

type ReferenceFields = z.infer<typeof DatasetReferenceSchema>;

const REFERENCE_MESSAGE =
  "Pass either a dataset name, or a database name together with a species name";

function toReference(fields: ReferenceFields): ParsedDatasetReference | undefined {
  if (fields.datasetName !== undefined) {
    return { by: "dataset", datasetName: fields.datasetName };
  }
  if (fields.databaseName !== undefined && fields.speciesName !== undefined) {
    return { by: "species", databaseName: fields.databaseName, speciesName: fields.speciesName };
  }
  return undefined;
}

function referenceIssue(): ZodIssue {
  return { code: "custom", path: [], message: REFERENCE_MESSAGE };
}

/**
 * @throws SelectionRequestError
 */
export function parseDatasetReference(input: DatasetReference): ParsedDatasetReference {
  const result = DatasetReferenceSchema.safeParse(input);
  if (!result.success) {
    throw new SelectionRequestError("Invalid dataset reference", result.error.issues);
  }
  const reference = toReference(result.data);
  if (reference === undefined) {
    throw new SelectionRequestError("Invalid dataset reference", [referenceIssue()]);
  }
  return reference;
}

/**
 * @throws SelectionRequestError
 */
export function parseFetchDataRequest(input: FetchDataRequest): ParsedFetchDataRequest {
  const result = FetchDataRequestSchema.safeParse(input);
  if (!result.success) {
    throw new SelectionRequestError("Invalid fetch request", result.error.issues);
  }
  const reference = toReference(result.data);
  if (reference === undefined) {
    throw new SelectionRequestError("Invalid fetch request", [referenceIssue()]);
  }
  return {
    reference,
    attributes: result.data.attributes,
    filters: result.data.filters,
    homSpecies: result.data.homSpecies,
    homQuery: result.data.homQuery,
    uniqueRows: result.data.uniqueRows,
  };
}
