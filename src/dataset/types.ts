/**
 * Dataset types for parsed solver output.
 */

import type { Complex } from "../complex.js";

/**
 * Outcome of a solver run as seen through its output.
 * - success: dataset parsed, no error lines
 * - error: the solver printed error lines (vectors may still be present)
 * - parse_error: output empty or no dataset recognised
 * - not_run: placeholder before a run
 */
export type SimulationStatus = "success" | "error" | "parse_error" | "not_run";

export interface DataVector {
  readonly name: string;
  readonly values: readonly Complex[];
  /** Names of the independent vectors this one is swept over. */
  readonly dependencies: readonly string[];
  readonly isIndependent: boolean;
}

export interface Dataset {
  readonly status: SimulationStatus;
  readonly version: string;
  readonly independent: ReadonlyMap<string, DataVector>;
  readonly dependent: ReadonlyMap<string, DataVector>;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly rawOutput: string;
}
