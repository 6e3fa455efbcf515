/**
 * Resolution errors.
 *
 * Raised wherever exactly one catalog entry is required (a database, a
 * dataset, a filter to explain). They are never recovered by guessing.
 */

import type { CatalogEntry } from "./schema.js";

/**
 * What is being resolved, for messages.
 */
export interface ResolutionContext {
  /** Catalog kind in the singular, e.g. "database" */
  kind: string;
  /** The caller's input */
  query: string;
}

export class NotFoundError extends Error {
  public readonly kind: string;
  public readonly query: string;

  constructor(context: ResolutionContext) {
    super(`No ${context.kind} matches '${context.query}'`);
    this.name = "NotFoundError";
    this.kind = context.kind;
    this.query = context.query;
  }
}

function ambiguitySummary(context: ResolutionContext, candidates: readonly CatalogEntry[]): string {
  return `'${context.query}' matches ${candidates.length} ${context.kind} entries; narrow the query`;
}

function describeCandidate(candidate: CatalogEntry): string {
  return `${candidate.displayName} (${candidate.name})`;
}

export class AmbiguousSelectionError extends Error {
  public readonly kind: string;
  public readonly query: string;
  public readonly candidates: readonly CatalogEntry[];

  constructor(context: ResolutionContext, candidates: readonly CatalogEntry[]) {
    super(
      `${ambiguitySummary(context, candidates)}: ` +
        candidates.map((candidate) => describeCandidate(candidate)).join(", ")
    );
    this.name = "AmbiguousSelectionError";
    this.kind = context.kind;
    this.query = context.query;
    this.candidates = candidates;
  }

  /**
   * Summary followed by one line per candidate.
   */
  format(): string {
    const lines = [`${ambiguitySummary(this, this.candidates)}:`];
    for (const candidate of this.candidates) {
      lines.push(`  - ${describeCandidate(candidate)}`);
    }
    return lines.join("\n");
  }
}
