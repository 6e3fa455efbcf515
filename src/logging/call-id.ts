/**
 * Call identifiers.
 * Each top-level service call gets one so its log lines can be correlated.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique call ID.
 * Format: time prefix + random suffix (e.g., "142501-a1b2c3")
 */
export function generateCallId(): string {
  const timePart = new Date().toISOString().slice(11, 19).replace(/:/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${timePart}-${randomPart}`;
}
