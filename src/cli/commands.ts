/**
 * CLI command handlers for --version and --help.
 */

import { SERVER_NAME, VERSION } from "../version.js";

/**
 * Print version information.
 */
export const printVersion = (): void => {
  console.log(`${SERVER_NAME} v${VERSION}`);
};

/**
 * Print help message.
 */
export const printHelp = (): void => {
  console.log(
    `
${SERVER_NAME} v${VERSION}

MCP server that resolves circuit descriptions into electrical nodes, parses
Qucs solver datasets and answers pin-level voltage and current queries.

USAGE:
  ${SERVER_NAME} [OPTIONS]

Without options the server speaks MCP over stdio.

OPTIONS:
  --version, -v    Print version and exit
  --help, -h       Show this help message

ENVIRONMENT:
  NETBIND_Z0=50       Default S-parameter reference impedance in ohms
  NETBIND_DEBUG=1     Log dataset warnings and load timings to stderr
`.trim(),
  );
};
