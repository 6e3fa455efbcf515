/**
 * Canonical form used when comparing names.
 *
 * Lower-cases and maps every space and underscore to a single space, so
 * "Ensembl Genes", "ensembl_genes" and "ENSEMBL GENES" compare equal.
 */
export function normalize(value: string): string {
  return value.toLowerCase().replace(/[ _]/g, " ");
}
