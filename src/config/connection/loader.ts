/**
 * Connection configuration loader.
 *
 * Layers overrides onto the defaults, validates the result and freezes it.
 * Validation fails fast with every issue collected in one error.
 */

import type { ZodIssue } from "zod";
import { MartConnectionSchema, type MartConnection } from "./schema.js";
import { DEFAULT_MART_CONNECTION } from "./defaults.js";

/**
 * Structured validation error for connection settings.
 */
export class ConnectionConfigError extends Error {
  public readonly issues: ConnectionConfigIssue[];

  constructor(message: string, issues: ConnectionConfigIssue[]) {
    super(message);
    this.name = "ConnectionConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Mart connection settings are invalid:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface ConnectionConfigIssue {
  path: (string | number)[];
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConnectionConfigIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path,
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Drop keys whose value is undefined so they do not shadow defaults.
 */
function definedEntries(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined)
  );
}

/**
 * Validate and load connection settings.
 *
 * @param layers - Raw settings, later layers winning; missing or undefined
 *   keys fall through to earlier layers and then to the defaults
 * @throws ConnectionConfigError if validation fails
 */
export function loadConnectionConfig(
  ...layers: Record<string, unknown>[]
): Readonly<MartConnection> {
  const merged = layers.reduce<Record<string, unknown>>(
    (acc, layer) => ({ ...acc, ...definedEntries(layer) }),
    { ...DEFAULT_MART_CONNECTION }
  );
  const result = MartConnectionSchema.safeParse(merged);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ConnectionConfigError(
      `Invalid mart connection: ${issues.length} validation error(s)`,
      issues
    );
  }

  return Object.freeze(result.data);
}

/**
 * Base URL of the martservice endpoint, including the port.
 */
export function martServiceUrl(connection: MartConnection): string {
  const url = new URL(connection.path, connection.host);
  url.port = String(connection.port);
  return url.toString();
}
