/**
 * Homology attribute tests.
 *
 * Run with: node --import tsx src/homology/expander.test.ts
 *
 * Tests cover:
 *   1. Recognizing homology attributes and their species labels
 *   2. Deriving the homology species catalog
 *   3. Expanding species × fields into attribute names
 */

import { strict as assert } from "node:assert";

import {
  describeHomology,
  expandHomology,
  homologyAttributeName,
  homologySpecies,
} from "./expander.js";
import { parseConfiguration } from "../catalog/parsers.js";
import type { Attribute } from "../catalog/schema.js";
import { TETRA_CONFIGURATION_XML, recordingLogger } from "../testing/fixtures.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function attribute(name: string, displayName: string): Attribute {
  return { name, displayName, description: "", page: "homologs", isDefault: false };
}

const homology = describeHomology(parseConfiguration(TETRA_CONFIGURATION_XML).attributes);

// ═══════════════════════════════════════════════════════════════════════════
// DESCRIBE
// ═══════════════════════════════════════════════════════════════════════════

section("Homology attributes");

test("only species_homolog_field names count", () => {
  assert.equal(homology.length, 10);
  assert.ok(homology.every((entry) => entry.name.includes("_homolog_")));
});

test("species label comes from the gene stable ID column", () => {
  assert.deepEqual(homology[0], {
    name: "hsapiens_homolog_ensembl_gene",
    displayName: "Human gene stable ID",
    species: "hsapiens",
    speciesDisplayName: "Human",
    field: "ensembl_gene",
    fieldDisplayName: "gene stable ID",
  });
});

test("display names not led by the label are kept whole", () => {
  const percId = homology.find((entry) => entry.name === "hsapiens_homolog_perc_id");
  assert.equal(percId?.fieldDisplayName, "%id. target Human gene identical to query gene");
  assert.equal(percId?.field, "perc_id");
});

test("species without a gene stable ID column are labelled by token", () => {
  const [entry] = describeHomology([attribute("ggallus_homolog_orthology_type", "Chicken homology type")]);
  assert.equal(entry?.speciesDisplayName, "ggallus");
  assert.equal(entry?.fieldDisplayName, "Chicken homology type");
});

test("attribute names are built from species and field", () => {
  assert.equal(homologyAttributeName("drerio", "orthology_type"), "drerio_homolog_orthology_type");
});

section("Homology species");

test("species in first-seen order", () => {
  assert.deepEqual(homologySpecies(homology), [
    { name: "hsapiens", displayName: "Human" },
    { name: "mmusculus", displayName: "Mouse" },
    { name: "drerio", displayName: "Zebrafish" },
  ]);
});

test("no homology attributes means no species", () => {
  assert.deepEqual(homologySpecies(describeHomology([attribute("ensembl_gene_id", "Gene stable ID")])), []);
});

// ═══════════════════════════════════════════════════════════════════════════
// EXPAND
// ═══════════════════════════════════════════════════════════════════════════

section("Expansion");

test("cross product is species-major", () => {
  assert.deepEqual(
    expandHomology(homology, ["human", "mmusculus"], ["ensembl_gene", "orthology_type"]),
    [
      "hsapiens_homolog_ensembl_gene",
      "hsapiens_homolog_orthology_type",
      "mmusculus_homolog_ensembl_gene",
      "mmusculus_homolog_orthology_type",
    ]
  );
});

test("species resolving to the same token expand once", () => {
  assert.deepEqual(expandHomology(homology, ["Mouse", "mmusculus"], ["orthology_type"]), [
    "mmusculus_homolog_orthology_type",
  ]);
});

test("fields match ignoring case and separators", () => {
  assert.deepEqual(expandHomology(homology, ["zebrafish"], ["Orthology Type"]), [
    "drerio_homolog_orthology_type",
  ]);
});

test("unknown species and missing fields are dropped", () => {
  const logger = recordingLogger();
  assert.deepEqual(
    expandHomology(homology, ["platypus", "human", "zebrafish"], ["perc_id"], logger),
    ["hsapiens_homolog_perc_id"]
  );
  assert.deepEqual(
    logger.entries.map((e) => e.message),
    ["Dropping unknown homology species", "Dropping unknown homology field"]
  );
});

test("no species or no fields expands to nothing", () => {
  assert.deepEqual(expandHomology(homology, [], ["ensembl_gene"]), []);
  assert.deepEqual(expandHomology(homology, ["human"], []), []);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\nResults: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
