/**
 * Homology (orthology) columns.
 *
 * Gene datasets expose cross-species data as ordinary attributes named
 * `<species token>_homolog_<field>`, e.g. `hsapiens_homolog_ensembl_gene`
 * ("Human gene stable ID") or `mmusculus_homolog_orthology_type`. The
 * species catalog for homology is whatever species those attributes name.
 */

import { normalize } from "../catalog/normalize.js";
import { bestEffortResolve } from "../catalog/resolver.js";
import type { Attribute, HomologySpecies } from "../catalog/schema.js";
import { silentLogger, type Logger } from "../logging/index.js";

const HOMOLOGY_ATTRIBUTE = /^([^_]+)_homolog_(.+)$/;

/** Field whose display name carries the species label */
const SPECIES_LABEL_FIELD = "ensembl_gene";
const SPECIES_LABEL_SUFFIX = /\s*gene stable id\s*$/i;

export interface HomologyAttribute {
  /** Attribute internal name */
  readonly name: string;
  readonly displayName: string;
  /** Species token, e.g. "hsapiens" */
  readonly species: string;
  /** Species label, e.g. "Human" */
  readonly speciesDisplayName: string;
  /** Field part of the name, e.g. "orthology_type" */
  readonly field: string;
  /** Display name without the species label */
  readonly fieldDisplayName: string;
}

export function homologyAttributeName(species: string, field: string): string {
  return `${species}_homolog_${field}`;
}

/**
 * Homology attributes of a dataset, in catalog order.
 */
export function describeHomology(attributes: readonly Attribute[]): HomologyAttribute[] {
  const parsed = attributes.flatMap((attribute) => {
    const match = HOMOLOGY_ATTRIBUTE.exec(attribute.name);
    return match?.[1] !== undefined && match[2] !== undefined
      ? [{ attribute, species: match[1], field: match[2] }]
      : [];
  });

  const labels = new Map<string, string>();
  for (const { attribute, species, field } of parsed) {
    if (field === SPECIES_LABEL_FIELD && !labels.has(species)) {
      const label = attribute.displayName.replace(SPECIES_LABEL_SUFFIX, "").trim();
      if (label !== "") {
        labels.set(species, label);
      }
    }
  }

  return parsed.map(({ attribute, species, field }) => {
    const speciesDisplayName = labels.get(species) ?? species;
    const fieldDisplayName = attribute.displayName.startsWith(speciesDisplayName)
      ? attribute.displayName.slice(speciesDisplayName.length).trim()
      : attribute.displayName.trim();
    return {
      name: attribute.name,
      displayName: attribute.displayName,
      species,
      speciesDisplayName,
      field,
      fieldDisplayName: fieldDisplayName || field,
    };
  });
}

/**
 * Species a dataset has homology data towards, in first-seen order.
 */
export function homologySpecies(homology: readonly HomologyAttribute[]): HomologySpecies[] {
  const species = new Map<string, HomologySpecies>();
  for (const entry of homology) {
    if (!species.has(entry.species)) {
      species.set(entry.species, { name: entry.species, displayName: entry.speciesDisplayName });
    }
  }
  return [...species.values()];
}

/**
 * Attribute names for the cross product of species and homology fields.
 *
 * Species names resolve best-effort: the first catalog match wins and an
 * unknown species is dropped. Fields match the dataset's field names
 * ignoring case and space/underscore differences; a field the dataset
 * lacks for a species is dropped. Output is species-major, field-minor,
 * with each attribute once.
 */
export function expandHomology(
  homology: readonly HomologyAttribute[],
  homSpecies: readonly string[],
  homQuery: readonly string[],
  logger: Logger = silentLogger
): string[] {
  if (homSpecies.length === 0 || homQuery.length === 0) {
    return [];
  }

  const catalog = homologySpecies(homology);
  const tokens: string[] = [];
  for (const query of homSpecies) {
    const match = bestEffortResolve(query, catalog);
    if (match === undefined) {
      logger.debug("Dropping unknown homology species", { species: query });
      continue;
    }
    if (!tokens.includes(match.name)) {
      tokens.push(match.name);
    }
  }

  const available = new Set(homology.map((entry) => entry.name));
  const names: string[] = [];
  for (const token of tokens) {
    const fields = homology.filter((entry) => entry.species === token);
    for (const field of homQuery) {
      const known = fields.find((entry) => normalize(entry.field) === normalize(field));
      const name = homologyAttributeName(token, known?.field ?? field);
      if (!available.has(name)) {
        logger.debug("Dropping unknown homology field", { species: token, field });
        continue;
      }
      if (!names.includes(name)) {
        names.push(name);
      }
    }
  }
  return names;
}
