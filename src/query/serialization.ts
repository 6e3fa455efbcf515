/**
 * XML wire form of query documents.
 *
 *   <!DOCTYPE Query>
 *   <Query virtualSchemaName="default" formatter="CSV" header="1"
 *          uniqueRows="1" datasetConfigVersion="0.6">
 *     <Dataset name="mmusculus_gene_ensembl" interface="default">
 *       <Filter name="chromosome_name" value="1,2"/>
 *       <Filter name="transcript_tsl" excluded="1"/>
 *       <Attribute name="ensembl_gene_id"/>
 *     </Dataset>
 *   </Query>
 *
 * List filter values are joined with commas, so a value containing a comma
 * does not survive a round trip. Surrounding spaces and attribute order do.
 */

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { QueryContractError } from "./builder.js";
import { QueryDocumentSchema, type QueryDocument, type WireFilterClause } from "./schema.js";

const XML_PROLOG = '<?xml version="1.0" encoding="UTF-8"?>\n<!DOCTYPE Query>\n';

const REPEATED_TAGS = new Set(["Filter", "Attribute"]);

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  format: true,
  indentBy: "  ",
  suppressEmptyNode: true,
});

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseAttributeValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  isArray: (tagName: string) => REPEATED_TAGS.has(tagName),
});

function flag(value: boolean): string {
  return value ? "1" : "0";
}

function filterNode(clause: WireFilterClause): Record<string, string> {
  return clause.kind === "boolean"
    ? { "@_name": clause.name, "@_excluded": flag(clause.excluded) }
    : { "@_name": clause.name, "@_value": clause.values.join(",") };
}

/**
 * Serialize a query document to the XML the service expects.
 */
export function serializeQuery(document: QueryDocument): string {
  const dataset: Record<string, unknown> = {
    "@_name": document.dataset.name,
    "@_interface": document.dataset.interface,
  };
  if (document.dataset.filters.length > 0) {
    dataset.Filter = document.dataset.filters.map(filterNode);
  }
  dataset.Attribute = document.dataset.attributes.map((name) => ({ "@_name": name }));

  const body = builder.build({
    Query: {
      "@_virtualSchemaName": document.virtualSchemaName,
      "@_formatter": document.formatter,
      "@_header": flag(document.header),
      "@_uniqueRows": flag(document.uniqueRows),
      "@_datasetConfigVersion": document.datasetConfigVersion,
      Dataset: dataset,
    },
  });

  return XML_PROLOG + String(body).trim() + "\n";
}

const RawQuerySchema = z.object({
  Query: z.object({
    "@_virtualSchemaName": z.string(),
    "@_formatter": z.string(),
    "@_header": z.string().default("0"),
    "@_uniqueRows": z.string().default("0"),
    "@_datasetConfigVersion": z.string().default(""),
    Dataset: z.object({
      "@_name": z.string(),
      "@_interface": z.string().default("default"),
      Attribute: z.array(z.object({ "@_name": z.string() })).default([]),
      Filter: z
        .array(
          z.object({
            "@_name": z.string(),
            "@_value": z.string().optional(),
            "@_excluded": z.string().optional(),
          })
        )
        .default([]),
    }),
  }),
});

/**
 * Read a query document back from its XML form.
 *
 * @throws QueryContractError when the XML is not a valid query document
 */
export function parseQueryDocument(xml: string): QueryDocument {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new QueryContractError(`Query XML is malformed: ${valid.err.msg}`);
  }

  const raw = RawQuerySchema.safeParse(parser.parse(xml));
  if (!raw.success) {
    const errors = raw.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new QueryContractError(`Query XML has an unexpected shape: ${errors}`);
  }

  const query = raw.data.Query;
  const filters = query.Dataset.Filter.map((node): WireFilterClause =>
    node["@_excluded"] !== undefined
      ? { kind: "boolean", name: node["@_name"], excluded: node["@_excluded"] === "1" }
      : { kind: "list", name: node["@_name"], values: (node["@_value"] ?? "").split(",") }
  );

  const result = QueryDocumentSchema.safeParse({
    virtualSchemaName: query["@_virtualSchemaName"],
    formatter: query["@_formatter"],
    header: query["@_header"] === "1",
    uniqueRows: query["@_uniqueRows"] === "1",
    datasetConfigVersion: query["@_datasetConfigVersion"],
    dataset: {
      name: query.Dataset["@_name"],
      interface: query.Dataset["@_interface"],
      attributes: query.Dataset.Attribute.map((node) => node["@_name"]),
      filters,
    },
  });
  if (!result.success) {
    const errors = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new QueryContractError(`Invalid query document: ${errors}`);
  }
  return result.data;
}
