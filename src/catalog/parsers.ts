/**
 * Parsers for the catalog listings a BioMart-style service publishes:
 *
 *   type=registry       XML, one MartURLLocation per database
 *   type=datasets       tab-separated, name and display name in columns 2-3
 *   type=configuration  XML dataset configuration holding attribute pages
 *                       and filter descriptions
 *
 * Entries without an internal name are skipped. Repeated internal names
 * keep their first occurrence, so every catalog has unique names.
 */

import Papa from "papaparse";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { ServiceError } from "../transport/errors.js";
import {
  filterKindOf,
  type Attribute,
  type Database,
  type Dataset,
  type Filter,
  type FilterOption,
} from "./schema.js";

// ═══════════════════════════════════════════════════════════════════════════
// ORDERED XML TREE
// ═══════════════════════════════════════════════════════════════════════════

export interface XmlElement {
  tag: string;
  attributes: Record<string, string>;
  children: XmlElement[];
}

const OrderedNodeSchema = z.record(z.string(), z.unknown());
const XmlAttributesSchema = z.record(z.string(), z.string());

const xmlParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

function toElements(nodes: unknown): XmlElement[] {
  const parsed = z.array(OrderedNodeSchema).safeParse(nodes);
  if (!parsed.success) {
    return [];
  }

  const elements: XmlElement[] = [];
  for (const node of parsed.data) {
    const tag = Object.keys(node).find((key) => key !== ":@" && key !== "#text");
    if (tag === undefined) {
      continue;
    }
    const attributes = XmlAttributesSchema.safeParse(node[":@"] ?? {});
    elements.push({
      tag,
      attributes: attributes.success ? attributes.data : {},
      children: toElements(node[tag]),
    });
  }
  return elements;
}

/**
 * Parse an XML document into elements, keeping document order.
 *
 * @throws ServiceError when the text is not well-formed XML
 */
export function parseXml(text: string, what: string): XmlElement[] {
  const valid = XMLValidator.validate(text);
  if (valid !== true) {
    throw new ServiceError(
      `Malformed ${what} XML at line ${valid.err.line}: ${valid.err.msg}`,
      text
    );
  }
  return toElements(xmlParser.parse(text));
}

/**
 * Every element named `tag` below `elements`, depth first in document order.
 */
export function descendants(elements: readonly XmlElement[], tag: string): XmlElement[] {
  const found: XmlElement[] = [];
  for (const element of elements) {
    if (element.tag === tag) {
      found.push(element);
    }
    found.push(...descendants(element.children, tag));
  }
  return found;
}

function uniqueByName<T extends { name: string }>(entries: T[]): T[] {
  const seen = new Set<string>();
  return entries.filter((entry) => {
    if (seen.has(entry.name)) {
      return false;
    }
    seen.add(entry.name);
    return true;
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

const MartUrlLocationSchema = z.object({
  name: z.string().min(1),
  displayName: z.string().optional(),
  host: z.string().default(""),
  path: z.string().default(""),
  port: z
    .string()
    .optional()
    .transform((val) => (val !== undefined && /^\d+$/.test(val) ? Number(val) : undefined)),
  serverVirtualSchema: z.string().min(1).default("default"),
  visible: z.string().default("1"),
});

export function parseRegistry(xml: string): Database[] {
  const locations = descendants(parseXml(xml, "registry"), "MartURLLocation");
  const databases: Database[] = [];

  for (const location of locations) {
    const result = MartUrlLocationSchema.safeParse(location.attributes);
    if (!result.success) {
      continue;
    }
    const attrs = result.data;
    databases.push({
      name: attrs.name,
      displayName: attrs.displayName ?? attrs.name,
      host: attrs.host,
      path: attrs.path,
      port: attrs.port,
      virtualSchema: attrs.serverVirtualSchema,
      visible: attrs.visible !== "0",
    });
  }

  return uniqueByName(databases);
}

// ═══════════════════════════════════════════════════════════════════════════
// DATASETS
// ═══════════════════════════════════════════════════════════════════════════

export function parseDatasets(tsv: string, database: string): Dataset[] {
  const result = Papa.parse<string[]>(tsv, {
    delimiter: "\t",
    skipEmptyLines: "greedy",
  });

  const datasets: Dataset[] = [];
  for (const row of result.data) {
    const name = row[1]?.trim();
    if (!name) {
      continue;
    }
    datasets.push({
      name,
      displayName: row[2]?.trim() || name,
      database,
    });
  }

  return uniqueByName(datasets);
}

// ═══════════════════════════════════════════════════════════════════════════
// DATASET CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const DescriptionSchema = z.object({
  internalName: z.string().min(1),
  displayName: z.string().default(""),
  description: z.string().default(""),
});

const AttributeDescriptionSchema = DescriptionSchema.extend({
  default: z.string().optional(),
});

const FilterDescriptionSchema = DescriptionSchema.extend({
  type: z.string().default(""),
  qualifier: z.string().default(""),
});

const OptionSchema = z.object({
  internalName: z.string().min(1),
  displayName: z.string().default(""),
  value: z.string().optional(),
});

export interface DatasetConfiguration {
  attributes: Attribute[];
  filters: Filter[];
}

function parseOptions(filter: XmlElement): FilterOption[] {
  const options: FilterOption[] = [];
  for (const child of filter.children) {
    if (child.tag !== "Option") {
      continue;
    }
    const result = OptionSchema.safeParse(child.attributes);
    if (result.success) {
      options.push({
        name: result.data.internalName,
        displayName: result.data.displayName,
        value: result.data.value ?? result.data.internalName,
      });
    }
  }
  return options;
}

/**
 * Attributes and filters of one dataset.
 *
 * Only attributes flagged `default="true"` on the first attribute page form
 * the default selection.
 */
export function parseConfiguration(xml: string): DatasetConfiguration {
  const root = parseXml(xml, "dataset configuration");

  const attributes: Attribute[] = [];
  descendants(root, "AttributePage").forEach((page, pageIndex) => {
    const pageName = page.attributes.internalName ?? "";
    for (const node of descendants(page.children, "AttributeDescription")) {
      const result = AttributeDescriptionSchema.safeParse(node.attributes);
      if (!result.success) {
        continue;
      }
      attributes.push({
        name: result.data.internalName,
        displayName: result.data.displayName,
        description: result.data.description,
        page: pageName,
        isDefault: pageIndex === 0 && result.data.default === "true",
      });
    }
  });

  const filters: Filter[] = [];
  for (const node of descendants(root, "FilterDescription")) {
    const result = FilterDescriptionSchema.safeParse(node.attributes);
    if (!result.success) {
      continue;
    }
    filters.push({
      name: result.data.internalName,
      displayName: result.data.displayName,
      description: result.data.description,
      type: result.data.type,
      qualifier: result.data.qualifier,
      kind: filterKindOf(result.data.type),
      options: parseOptions(node),
    });
  }

  return { attributes: uniqueByName(attributes), filters: uniqueByName(filters) };
}
