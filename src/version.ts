/**
 * Version information for the netbind server.
 */

import { createRequire } from "node:module";
import { z } from "zod";

const PackageSchema = z.object({ version: z.string() });

/** Current version of the server. */
export const VERSION = (() => {
  // Sources run from src/, builds from dist/src/
  const require = createRequire(import.meta.url);
  for (const candidate of ["../package.json", "../../package.json"]) {
    try {
      const parsed = PackageSchema.safeParse(require(candidate));
      if (parsed.success) {
        return parsed.data.version;
      }
    } catch {
      continue;
    }
  }
  return "0.0.0-dev";
})();

/** Name reported to MCP clients and in --help. */
export const SERVER_NAME = "netbind";
