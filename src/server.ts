/**
 * Netbind MCP Server
 *
 * Model Context Protocol server for resolving circuit nets and querying
 * Qucs solver datasets by component pin.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { SERVER_NAME, VERSION } from "./version.js";
import {
  getTypedResult,
  getVector,
  queryCurrent,
  queryPinVoltage,
  querySParameter,
  queryVoltageAcross,
  resolveNodes,
  summarizeDatasetFile,
} from "./service.js";

// =============================================================================
// Server Instructions
// =============================================================================

const SERVER_INSTRUCTIONS = `
# Netbind MCP Server

This server binds the raw output of the Qucs circuit solver back to the
circuit it was produced from, so results can be read per component pin.

## Inputs

- Circuit description: JSON file with \`components\` (name, kind, parameters)
  and \`connections\` (pairs of \`NAME.terminal\` pin references)
- Dataset: raw text output of the solver (\`<Qucs Dataset ...>\` blocks)

## Workflow Guidance

1. Use \`resolve_nodes\` to see which node every pin landed on (ground is node 0)
2. Use \`summarize_dataset\` to check the run status and list available vectors
3. Use \`query_pin_voltage\`, \`query_voltage_across\` and \`query_current\` for pin-level values
4. Use \`get_typed_result\` for a whole analysis, or \`get_vector\` for one raw vector

## Tool Usage Tips

- Pin references use NAME.terminal (e.g., R1.n2, V1.nplus); a bare NAME means the first terminal
- Two-terminal parts use n1/n2, sources and probes nplus/nminus, diodes anode/cathode
- \`analysis\` is one of dc, ac, transient (and sparameter for \`get_typed_result\`)
- AC values are complex numbers as { re, im }; DC values are plain numbers
- Only sources and current probes report branch currents
- All file paths should be absolute paths

## Error Handling

Results with an \`error\` field indicate a problem:
- Vector or node not found: the message lists what is available
- Dataset could not be parsed: check \`summarize_dataset\` for solver errors
- Invalid circuit description: the message names the offending field
`.trim();

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Format a result as MCP tool response content.
 */
const formatResult = (
  result: unknown,
): { content: { type: "text"; text: string }[] } => ({
  content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
});

const circuitPath = z.string().describe("Absolute path to circuit description JSON file");
const datasetPath = z.string().describe("Absolute path to raw solver output file");
const nodalAnalysis = z
  .enum(["dc", "ac", "transient"])
  .describe("Analysis to read the values from");
const referenceImpedance = z
  .number()
  .positive()
  .optional()
  .describe("Reference impedance in ohms (default from NETBIND_Z0, else 50)");

// =============================================================================
// Server Setup
// =============================================================================

/**
 * Create and configure the MCP server.
 */
export const createServer = (): McpServer => {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  // -------------------------------------------------------------------------
  // Tool: resolve_nodes
  // -------------------------------------------------------------------------
  server.registerTool(
    "resolve_nodes",
    {
      description:
        "Resolve a circuit description into electrical nodes: node id per pin and the pins of every net",
      inputSchema: {
        circuit: circuitPath,
      },
    },
    async ({ circuit }) => {
      const result = await resolveNodes(circuit);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: summarize_dataset
  // -------------------------------------------------------------------------
  server.registerTool(
    "summarize_dataset",
    {
      description:
        "Parse solver output and report status, errors, warnings and the available vectors",
      inputSchema: {
        dataset: datasetPath,
      },
    },
    async ({ dataset }) => {
      const result = await summarizeDatasetFile(dataset);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: get_vector
  // -------------------------------------------------------------------------
  server.registerTool(
    "get_vector",
    {
      description: "Get the values of one dataset vector",
      inputSchema: {
        dataset: datasetPath,
        name: z.string().describe("Vector name (e.g., acfrequency, _net1.v)"),
        form: z
          .enum(["complex", "real", "imag"])
          .optional()
          .describe("Value form (default: complex)"),
      },
    },
    async ({ dataset, name, form }) => {
      const result = await getVector(dataset, name, form);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: get_typed_result
  // -------------------------------------------------------------------------
  server.registerTool(
    "get_typed_result",
    {
      description:
        "Get all node voltages and branch currents of an analysis, or the S-parameter matrix",
      inputSchema: {
        dataset: datasetPath,
        analysis: z
          .enum(["dc", "ac", "transient", "sparameter"])
          .describe("Analysis kind"),
        z0: referenceImpedance,
      },
    },
    async ({ dataset, analysis, z0 }) => {
      const result = await getTypedResult(dataset, analysis, z0);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: query_pin_voltage
  // -------------------------------------------------------------------------
  server.registerTool(
    "query_pin_voltage",
    {
      description: "Get the voltage at a component pin",
      inputSchema: {
        circuit: circuitPath,
        dataset: datasetPath,
        analysis: nodalAnalysis,
        pin: z.string().describe("Pin in NAME.terminal format (e.g., R1.n2)"),
      },
    },
    async ({ circuit, dataset, analysis, pin }) => {
      const result = await queryPinVoltage(circuit, dataset, analysis, pin);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: query_voltage_across
  // -------------------------------------------------------------------------
  server.registerTool(
    "query_voltage_across",
    {
      description: "Get the voltage between two terminals of a component, V(a) - V(b)",
      inputSchema: {
        circuit: circuitPath,
        dataset: datasetPath,
        analysis: nodalAnalysis,
        component: z.string().describe("Component name"),
        terminal_a: z.string().describe("Positive terminal (e.g., n1)"),
        terminal_b: z.string().describe("Negative terminal (e.g., n2)"),
      },
    },
    async ({ circuit, dataset, analysis, component, terminal_a, terminal_b }) => {
      const result = await queryVoltageAcross(
        circuit,
        dataset,
        analysis,
        component,
        terminal_a,
        terminal_b,
      );
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: query_current
  // -------------------------------------------------------------------------
  server.registerTool(
    "query_current",
    {
      description:
        "Get the branch current of a source or current probe, or the current entering one of its pins",
      inputSchema: {
        circuit: circuitPath,
        dataset: datasetPath,
        analysis: nodalAnalysis,
        component: z.string().describe("Component name"),
        terminal: z
          .string()
          .optional()
          .describe("Pin to measure the entering current at (first or second terminal)"),
      },
    },
    async ({ circuit, dataset, analysis, component, terminal }) => {
      const result = await queryCurrent(circuit, dataset, analysis, component, terminal);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: query_s_parameter
  // -------------------------------------------------------------------------
  server.registerTool(
    "query_s_parameter",
    {
      description: "Get S[i,j] over frequency (ports are 1-based)",
      inputSchema: {
        dataset: datasetPath,
        i: z.number().int().positive().describe("Output port"),
        j: z.number().int().positive().describe("Input port"),
        z0: referenceImpedance,
      },
    },
    async ({ dataset, i, j, z0 }) => {
      const result = await querySParameter(dataset, i, j, z0);
      return formatResult(result);
    },
  );

  return server;
};

/**
 * Run the MCP server with stdio transport.
 */
export const runServer = async (): Promise<void> => {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
};
