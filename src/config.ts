/**
 * Runtime configuration from environment variables.
 *
 *   NETBIND_Z0      default S-parameter reference impedance in ohms (50)
 *   NETBIND_DEBUG   "1" or "true" to log dataset warnings and load timings
 */

import { z } from "zod";

const ConfigSchema = z.object({
  NETBIND_Z0: z.coerce.number().positive().default(50),
  NETBIND_DEBUG: z
    .string()
    .optional()
    .transform((value) => value === "1" || value?.toLowerCase() === "true"),
});

export interface Config {
  defaultZ0: number;
  debug: boolean;
}

/**
 * Read configuration from an environment. Invalid values throw with the
 * offending variable named.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const parsed = ConfigSchema.safeParse({
    NETBIND_Z0: env.NETBIND_Z0 === "" ? undefined : env.NETBIND_Z0,
    NETBIND_DEBUG: env.NETBIND_DEBUG,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return {
    defaultZ0: parsed.data.NETBIND_Z0,
    debug: parsed.data.NETBIND_DEBUG,
  };
};

let cached: Config | undefined;

/** Process-wide configuration, read once. */
export const getConfig = (): Config => {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
};
