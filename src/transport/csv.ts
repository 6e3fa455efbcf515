/**
 * Decoding of query results.
 */

import Papa from "papaparse";
import { ServiceError } from "./errors.js";

/**
 * Rows of a query result. The first CSV line supplies `columns`; every row
 * has one cell per column, in column order.
 */
export interface TabularResult {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly string[])[];
}

/**
 * Parse CSV text whose first line holds the column headers.
 * An empty body is an empty result.
 *
 * @throws ServiceError when the text is not valid CSV
 */
export function parseCsv(text: string): TabularResult {
  if (text.trim() === "") {
    return { columns: [], rows: [] };
  }

  const result = Papa.parse<string[]>(text.trim(), {
    delimiter: ",",
    skipEmptyLines: true,
  });

  const fatal = result.errors.find((error) => error.type === "Quotes");
  if (fatal !== undefined) {
    throw new ServiceError(`Malformed CSV result at row ${fatal.row}: ${fatal.message}`, text);
  }

  const [columns = [], ...rows] = result.data;
  return { columns, rows };
}

/**
 * Rows as objects keyed by column name. A repeated column name keeps the
 * value of its last column.
 */
export function toRecords(result: TabularResult): Record<string, string>[] {
  return result.rows.map((row) =>
    Object.fromEntries(result.columns.map((column, index) => [column, row[index] ?? ""]))
  );
}
