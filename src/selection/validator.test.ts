/**
 * Selection validation tests.
 *
 * Run with: node --import tsx src/selection/validator.test.ts
 *
 * Tests cover:
 *   1. Default attribute selection
 *   2. Attribute resolution (drop unknown, collapse repeats, fall back)
 *   3. Filter value typing per kind
 *   4. Filter resolution (drop unknown, first key wins)
 */

import { strict as assert } from "node:assert";

import {
  defaultAttributes,
  validateAttributes,
  validateFilters,
  toFilterClause,
  InvalidFilterValueError,
} from "./validator.js";
import { parseConfiguration } from "../catalog/parsers.js";
import type { Attribute, Filter } from "../catalog/schema.js";
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

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const { attributes, filters } = parseConfiguration(TETRA_CONFIGURATION_XML);

function findFilter(name: string): Filter {
  const filter = filters.find((f) => f.name === name);
  if (filter === undefined) {
    throw new Error(`Fixture has no filter '${name}'`);
  }
  return filter;
}

const chromosome = findFilter("chromosome_name");
const tsl = findFilter("transcript_tsl");

// ═══════════════════════════════════════════════════════════════════════════
// ATTRIBUTES
// ═══════════════════════════════════════════════════════════════════════════

section("Default attributes");

test("flagged defaults in catalog order", () => {
  assert.deepEqual(defaultAttributes(attributes), ["ensembl_gene_id", "ensembl_transcript_id"]);
});

test("first attribute when none is flagged", () => {
  const unflagged: Attribute[] = [
    { name: "gene_id", displayName: "Gene", description: "", page: "p", isDefault: false },
    { name: "symbol", displayName: "Symbol", description: "", page: "p", isDefault: false },
  ];
  assert.deepEqual(defaultAttributes(unflagged), ["gene_id"]);
});

test("empty catalog has no defaults", () => {
  assert.deepEqual(defaultAttributes([]), []);
});

section("Attribute resolution");

test("internal and display names resolve in request order", () => {
  assert.deepEqual(
    validateAttributes(["Gene name", "chromosome_name", "gene description"], attributes),
    ["external_gene_name", "chromosome_name", "description"]
  );
});

test("unknown names are dropped and repeats collapse", () => {
  assert.deepEqual(
    validateAttributes(["Gene name", "no_such_column", "external_gene_name"], attributes),
    ["external_gene_name"]
  );
});

test("empty request yields the defaults", () => {
  assert.deepEqual(validateAttributes([], attributes), ["ensembl_gene_id", "ensembl_transcript_id"]);
});

test("nothing resolving yields the defaults with a warning", () => {
  const logger = recordingLogger();
  assert.deepEqual(
    validateAttributes(["no_such_column"], attributes, logger),
    ["ensembl_gene_id", "ensembl_transcript_id"]
  );
  assert.deepEqual(
    logger.entries.filter((e) => e.level === "warn").map((e) => e.message),
    ["No requested attribute matched; using the default selection"]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// FILTER VALUES
// ═══════════════════════════════════════════════════════════════════════════

section("Filter values");

test("boolean filters take true and the include words", () => {
  for (const value of [true, "true", "TRUE", "included", "only", " Only "]) {
    assert.deepEqual(toFilterClause(tsl, value), {
      kind: "boolean",
      name: "transcript_tsl",
      excluded: false,
    });
  }
});

test("boolean filters take false and excluded", () => {
  for (const value of [false, "false", "False", "excluded", "EXCLUDED"]) {
    assert.deepEqual(toFilterClause(tsl, value), {
      kind: "boolean",
      name: "transcript_tsl",
      excluded: true,
    });
  }
});

test("other values for a boolean filter are rejected", () => {
  assert.throws(
    () => toFilterClause(tsl, "maybe"),
    (err: unknown) =>
      err instanceof InvalidFilterValueError &&
      err.message ===
        `Invalid value "maybe" for boolean filter 'transcript_tsl': expected true, false, "included", "only" or "excluded"`
  );
  assert.throws(() => toFilterClause(tsl, 1), InvalidFilterValueError);
});

test("list filters take one value or several", () => {
  assert.deepEqual(toFilterClause(chromosome, "MT"), {
    kind: "list",
    name: "chromosome_name",
    values: ["MT"],
  });
  assert.deepEqual(toFilterClause(chromosome, ["1", 2]), {
    kind: "list",
    name: "chromosome_name",
    values: ["1", "2"],
  });
});

test("list filters reject empty and non-scalar values", () => {
  for (const value of [[], "", "  ", ["1", ""], true, Number.NaN, { value: "1" }]) {
    assert.throws(() => toFilterClause(chromosome, value), InvalidFilterValueError);
  }
});

test("error message shows the rejected list", () => {
  assert.throws(
    () => toFilterClause(chromosome, ["1", ""]),
    (err: unknown) =>
      err instanceof InvalidFilterValueError &&
      err.kind === "list" &&
      err.message ===
        `Invalid value ["1", ""] for list filter 'chromosome_name': expected a string, a number, or a non-empty array of them`
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// FILTER RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════

section("Filter resolution");

test("keys resolve by internal or display name, in request order", () => {
  assert.deepEqual(
    validateFilters(
      { "Transcript Support Level": "only", chromosome_name: ["1", "2"], no_such_filter: 1 },
      filters
    ),
    [
      { kind: "boolean", name: "transcript_tsl", excluded: false },
      { kind: "list", name: "chromosome_name", values: ["1", "2"] },
    ]
  );
});

test("first key wins when two keys reach one filter", () => {
  assert.deepEqual(
    validateFilters({ chromosome_name: "1", "Chromosome/scaffold name": "2" }, filters),
    [{ kind: "list", name: "chromosome_name", values: ["1"] }]
  );
});

test("empty request has no clauses", () => {
  assert.deepEqual(validateFilters({}, filters), []);
});

test("a bad value for a known filter fails the whole request", () => {
  assert.throws(() => validateFilters({ transcript_tsl: "sometimes" }, filters), InvalidFilterValueError);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\nResults: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
