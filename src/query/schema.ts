/**
 * Query model.
 *
 * A ResolvedQuery holds only internal names that resolution has already
 * checked against the dataset's catalogs. The QueryDocument is its wire
 * form, one-to-one with the XML the service accepts.
 */

import { z } from "zod";

/**
 * One filter constraint, typed by the filter's kind.
 */
export type FilterClause =
  | {
      readonly kind: "boolean";
      readonly name: string;
      /** true keeps only rows without the property */
      readonly excluded: boolean;
    }
  | {
      readonly kind: "list";
      readonly name: string;
      readonly values: readonly string[];
    };

export interface ResolvedQuery {
  readonly dataset: string;
  readonly virtualSchema: string;
  /** Output columns, in output order */
  readonly attributes: readonly string[];
  readonly filters: readonly FilterClause[];
  /** Ask the service to drop duplicate rows */
  readonly uniqueRows: boolean;
}

export const QUERY_FORMATTER = "CSV";
export const DATASET_CONFIG_VERSION = "0.6";

const FilterClauseSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("boolean"), name: z.string().min(1), excluded: z.boolean() }),
  z.object({ kind: z.literal("list"), name: z.string().min(1), values: z.array(z.string()) }),
]);

export const QueryDocumentSchema = z.object({
  virtualSchemaName: z.string().min(1),
  formatter: z.literal(QUERY_FORMATTER),
  header: z.boolean(),
  uniqueRows: z.boolean(),
  datasetConfigVersion: z.string(),
  dataset: z.object({
    name: z.string().min(1),
    interface: z.string().min(1),
    attributes: z.array(z.string().min(1)).min(1),
    filters: z.array(FilterClauseSchema),
  }),
});

export type QueryDocument = z.infer<typeof QueryDocumentSchema>;
export type WireFilterClause = z.infer<typeof FilterClauseSchema>;
