/**
 * Default connection to the public Ensembl BioMart.
 */

import type { MartConnection } from "./schema.js";

export const DEFAULT_MART_CONNECTION: MartConnection = {
  host: "http://www.ensembl.org",
  path: "/biomart/martservice",
  port: 80,
  virtualSchema: "default",
  timeoutMs: 300_000,
};
