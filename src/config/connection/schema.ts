/**
 * Connection settings for a BioMart-style service.
 */

import { z } from "zod";

/** True when the URL carries nothing past the host name; unparsable input passes. */
function isBareOrigin(val: string): boolean {
  let url: URL;
  try {
    url = new URL(val);
  } catch {
    return true;
  }
  return url.port === "" && (url.pathname === "" || url.pathname === "/") && url.search === "" && url.hash === "";
}

export const MartConnectionSchema = z
  .object({
    /** Scheme and host name, e.g. "http://www.ensembl.org" */
    host: z
      .string()
      .url("host must be an absolute URL such as http://www.ensembl.org")
      .refine((val) => /^https?:\/\//.test(val), "host must use http or https")
      .refine(
        isBareOrigin,
        "host must hold only the scheme and host name; set the port with --port or MART_PORT and the path with --path or MART_PATH"
      ),

    /** Path of the martservice endpoint */
    path: z.string().startsWith("/", "path must start with '/'"),

    port: z.number().int().min(1).max(65535),

    /** Virtual schema sent with every query */
    virtualSchema: z.string().min(1),

    /** Per-request timeout in milliseconds */
    timeoutMs: z.number().int().positive(),
  })
  .strict();

export type MartConnection = z.infer<typeof MartConnectionSchema>;

/**
 * Partial settings accepted as overrides on top of the defaults.
 */
export type MartConnectionOverrides = Partial<MartConnection>;
