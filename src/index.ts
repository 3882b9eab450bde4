#!/usr/bin/env node

/**
 * netbind MCP Server Entry Point
 *
 * Run with: npx tsx src/index.ts
 * Or after build: node dist/src/index.js
 *
 * CLI flags:
 *   --version, -v    Print version and exit
 *   --help, -h       Show help
 */

import { printHelp, printVersion } from "./cli/commands.js";
import { runServer } from "./server.js";

const main = async (): Promise<void> => {
  const args = process.argv.slice(2);

  if (args.includes("--version") || args.includes("-v")) {
    printVersion();
    return;
  }

  if (args.includes("--help") || args.includes("-h")) {
    printHelp();
    return;
  }

  await runServer();
};

main().catch((error: unknown) => {
  console.error("Server error:", error);
  process.exit(1);
});
