/**
 * Result shapes returned by the service layer and the MCP tools
 */

import type { Complex } from "./complex.js";
import type { SimulationStatus } from "./dataset/types.js";
import type { NodalValue } from "./results/binder.js";
import type {
  AnalysisKind,
  NodalAnalysis,
  NodalResult,
} from "./results/typed-results.js";

/**
 * Error result structure
 */
export interface ErrorResult {
  error: string;
}

/**
 * Type guard to check if result is an error
 */
export const isErrorResult = (result: unknown): result is ErrorResult =>
  typeof result === "object" &&
  result !== null &&
  "error" in result &&
  typeof result.error === "string";

/**
 * Convert a caught error into an error result.
 */
export const toErrorResult = (error: unknown): ErrorResult => ({
  error: error instanceof Error ? error.message : "Unknown error occurred",
});

// =============================================================================
// Circuits
// =============================================================================

export interface NetEntry {
  node: number;
  name: string;
  /** Pins as `NAME.terminal`, in component order. */
  pins: string[];
}

/**
 * Node assignment of a circuit description.
 */
export interface ResolveNodesResult {
  node_count: number;
  /** `NAME.terminal` → node id. */
  pins: Record<string, number>;
  nets: NetEntry[];
}

// =============================================================================
// Datasets
// =============================================================================

export interface VectorInfo {
  name: string;
  independent: boolean;
  length: number;
  dependencies?: string[];
}

export interface DatasetSummaryResult {
  status: SimulationStatus;
  version: string;
  errors: string[];
  warnings: string[];
  vectors: VectorInfo[];
}

export type VectorForm = "complex" | "real" | "imag";

export interface VectorResult {
  name: string;
  form: VectorForm;
  length: number;
  values: Complex[] | number[];
}

/**
 * S-parameter result with the matrix as a plain object, for JSON output.
 */
export interface SParameterPayload {
  kind: "sparameter";
  frequencies: readonly number[];
  num_ports: number;
  z0: number;
  s_matrix: Record<string, readonly Complex[]>;
}

export type TypedResultPayload = NodalResult | SParameterPayload;

// =============================================================================
// Pin queries
// =============================================================================

export interface PinVoltageResult {
  pin: string;
  analysis: NodalAnalysis;
  node: number;
  node_name: string;
  voltage: NodalValue;
}

export interface VoltageAcrossResult {
  component: string;
  terminal_a: string;
  terminal_b: string;
  analysis: NodalAnalysis;
  voltage: NodalValue;
}

export interface CurrentResult {
  component: string;
  /** Present when the current into a specific pin was asked for. */
  terminal?: string;
  analysis: NodalAnalysis;
  current: NodalValue;
}

export interface SParameterQueryResult {
  parameter: string;
  num_ports: number;
  z0: number;
  frequencies: readonly number[];
  values: readonly Complex[];
}

export type { AnalysisKind, NodalAnalysis };
