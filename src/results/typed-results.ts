/**
 * Typed Results
 *
 * Analysis-shaped views over a parsed dataset. Vector naming follows the
 * solver output:
 *
 *   dc          _net1.V, V1.I          (operating point, first value)
 *   ac          _net1.v, V1.i          swept over acfrequency
 *   transient   _net1.Vt, V1.It        swept over time
 *   sparameter  S[1,1], S[2,1], ...    swept over frequency
 *
 * Views are rebuilt from the dataset on every call.
 */

import { zeros, type Complex } from "../complex.js";
import { getConfig } from "../config.js";
import type { CircuitComponent } from "../circuit/terminals.js";
import type { DataVector, Dataset } from "../dataset/types.js";
import { VectorNotFoundError } from "../errors.js";

export type AnalysisKind = "dc" | "ac" | "transient" | "sparameter";

/** Analyses whose results carry node voltages and branch currents. */
export type NodalAnalysis = Exclude<AnalysisKind, "sparameter">;

export const ANALYSIS_KINDS: readonly AnalysisKind[] = [
  "dc",
  "ac",
  "transient",
  "sparameter",
];

export interface DCResult {
  readonly kind: "dc";
  /** Node or probe name → volts. */
  readonly voltages: Readonly<Record<string, number>>;
  /** Component name → amperes. */
  readonly currents: Readonly<Record<string, number>>;
}

export interface ACResult {
  readonly kind: "ac";
  readonly frequencies: readonly number[];
  readonly voltages: Readonly<Record<string, readonly Complex[]>>;
  readonly currents: Readonly<Record<string, readonly Complex[]>>;
}

export interface TransientResult {
  readonly kind: "transient";
  readonly time: readonly number[];
  readonly voltages: Readonly<Record<string, readonly number[]>>;
  readonly currents: Readonly<Record<string, readonly number[]>>;
}

export interface SParameterResult {
  readonly kind: "sparameter";
  readonly frequencies: readonly number[];
  readonly numPorts: number;
  /** Reference impedance in ohms. */
  readonly z0: number;
  /** Every `S[i,j]` for i, j in 1..numPorts; missing pairs hold zeros. */
  readonly sMatrix: ReadonlyMap<string, readonly Complex[]>;
}

export type NodalResult = DCResult | ACResult | TransientResult;
export type TypedResult = NodalResult | SParameterResult;

export interface MultiAnalysisResult {
  dc?: DCResult;
  ac?: ACResult;
  transient?: TransientResult;
  sparameter?: SParameterResult;
}

export interface SParameterOptions {
  /** Reference impedance; defaults to the configured NETBIND_Z0. */
  z0?: number;
}

const S_PARAMETER = /^S\[(\d+),(\d+)\]$/;

/** Axis names, in lookup order, per swept analysis. */
const SWEEP_AXES = {
  ac: ["acfrequency", "frequency"],
  transient: ["time"],
  sparameter: ["frequency", "acfrequency"],
} as const;

const SUFFIXES = {
  dc: { voltage: ".V", current: ".I" },
  ac: { voltage: ".v", current: ".i" },
  transient: { voltage: ".Vt", current: ".It" },
} as const;

export const sParameterName = (i: number, j: number): string => `S[${i},${j}]`;

// =============================================================================
// Helpers
// =============================================================================

const allVectors = (dataset: Dataset): DataVector[] => [
  ...dataset.independent.values(),
  ...dataset.dependent.values(),
];

/**
 * Vectors whose name ends with `suffix`, keyed by the name without it.
 */
const collectBySuffix = (
  dataset: Dataset,
  suffix: string,
): Array<[string, DataVector]> =>
  allVectors(dataset)
    .filter((vector) => vector.name.length > suffix.length && vector.name.endsWith(suffix))
    .map((vector) => [vector.name.slice(0, -suffix.length), vector]);

const sweepAxis = (dataset: Dataset, names: readonly string[]): number[] => {
  for (const name of names) {
    const vector = dataset.independent.get(name) ?? dataset.dependent.get(name);
    if (vector) {
      return vector.values.map((value) => value.re);
    }
  }
  return [];
};

const copyComplex = (vector: DataVector): Complex[] =>
  vector.values.map((value) => ({ re: value.re, im: value.im }));

const realParts = (vector: DataVector): number[] =>
  vector.values.map((value) => value.re);

// =============================================================================
// Extraction
// =============================================================================

/**
 * DC operating point: first value of every `.V` and `.I` vector.
 */
export const extractDcResult = (dataset: Dataset): DCResult => {
  const voltages: Record<string, number> = {};
  const currents: Record<string, number> = {};

  for (const [key, vector] of collectBySuffix(dataset, SUFFIXES.dc.voltage)) {
    if (vector.values.length > 0) {
      voltages[key] = vector.values[0].re;
    }
  }
  for (const [key, vector] of collectBySuffix(dataset, SUFFIXES.dc.current)) {
    if (vector.values.length > 0) {
      currents[key] = vector.values[0].re;
    }
  }

  return { kind: "dc", voltages, currents };
};

export const extractAcResult = (dataset: Dataset): ACResult => {
  const voltages: Record<string, Complex[]> = {};
  const currents: Record<string, Complex[]> = {};

  for (const [key, vector] of collectBySuffix(dataset, SUFFIXES.ac.voltage)) {
    voltages[key] = copyComplex(vector);
  }
  for (const [key, vector] of collectBySuffix(dataset, SUFFIXES.ac.current)) {
    currents[key] = copyComplex(vector);
  }

  return {
    kind: "ac",
    frequencies: sweepAxis(dataset, SWEEP_AXES.ac),
    voltages,
    currents,
  };
};

export const extractTransientResult = (dataset: Dataset): TransientResult => {
  const voltages: Record<string, number[]> = {};
  const currents: Record<string, number[]> = {};

  for (const [key, vector] of collectBySuffix(dataset, SUFFIXES.transient.voltage)) {
    voltages[key] = realParts(vector);
  }
  for (const [key, vector] of collectBySuffix(dataset, SUFFIXES.transient.current)) {
    currents[key] = realParts(vector);
  }

  return {
    kind: "transient",
    time: sweepAxis(dataset, SWEEP_AXES.transient),
    voltages,
    currents,
  };
};

/**
 * S-parameter matrix. Port pairs the solver did not report (e.g. between two
 * disconnected sub-networks) are filled with zero vectors of sweep length.
 */
export const extractSParameterResult = (
  dataset: Dataset,
  options: SParameterOptions = {},
): SParameterResult => {
  const found = new Map<string, Complex[]>();
  let numPorts = 0;
  let longest = 0;

  for (const vector of allVectors(dataset)) {
    const match = S_PARAMETER.exec(vector.name);
    if (!match) continue;
    const i = Number.parseInt(match[1], 10);
    const j = Number.parseInt(match[2], 10);
    if (i < 1 || j < 1) continue;
    numPorts = Math.max(numPorts, i, j);
    longest = Math.max(longest, vector.values.length);
    found.set(sParameterName(i, j), copyComplex(vector));
  }

  const frequencies = sweepAxis(dataset, SWEEP_AXES.sparameter);
  const sweepLength = frequencies.length > 0 ? frequencies.length : longest;

  const sMatrix = new Map<string, Complex[]>();
  for (let i = 1; i <= numPorts; i++) {
    for (let j = 1; j <= numPorts; j++) {
      const name = sParameterName(i, j);
      sMatrix.set(name, found.get(name) ?? zeros(sweepLength));
    }
  }

  return {
    kind: "sparameter",
    frequencies,
    numPorts,
    z0: options.z0 ?? getConfig().defaultZ0,
    sMatrix,
  };
};

/**
 * Build the typed view for one analysis kind.
 */
export function typedResult(dataset: Dataset, kind: "dc"): DCResult;
export function typedResult(dataset: Dataset, kind: "ac"): ACResult;
export function typedResult(dataset: Dataset, kind: "transient"): TransientResult;
export function typedResult(
  dataset: Dataset,
  kind: "sparameter",
  options?: SParameterOptions,
): SParameterResult;
export function typedResult(dataset: Dataset, kind: NodalAnalysis): NodalResult;
export function typedResult(
  dataset: Dataset,
  kind: AnalysisKind,
  options?: SParameterOptions,
): TypedResult;
export function typedResult(
  dataset: Dataset,
  kind: AnalysisKind,
  options: SParameterOptions = {},
): TypedResult {
  switch (kind) {
    case "dc":
      return extractDcResult(dataset);
    case "ac":
      return extractAcResult(dataset);
    case "transient":
      return extractTransientResult(dataset);
    case "sparameter":
      return extractSParameterResult(dataset, options);
  }
}

/**
 * Every analysis whose vectors are present in the dataset.
 */
export const extractAllResults = (
  dataset: Dataset,
  options: SParameterOptions = {},
): MultiAnalysisResult => {
  const names = allVectors(dataset).map((vector) => vector.name);
  const has = (predicate: (name: string) => boolean): boolean => names.some(predicate);
  const result: MultiAnalysisResult = {};

  if (
    has(
      (name) =>
        name.length > 2 &&
        (name.endsWith(SUFFIXES.dc.voltage) || name.endsWith(SUFFIXES.dc.current)),
    )
  ) {
    result.dc = extractDcResult(dataset);
  }
  if (has((name) => name === "acfrequency")) {
    result.ac = extractAcResult(dataset);
  }
  if (has((name) => name === "time")) {
    result.transient = extractTransientResult(dataset);
  }
  if (has((name) => S_PARAMETER.test(name))) {
    result.sparameter = extractSParameterResult(dataset, options);
  }

  return result;
};

// =============================================================================
// Accessors
// =============================================================================

export const getFrequency = (result: ACResult | SParameterResult): readonly number[] =>
  result.frequencies;

export const getTime = (result: TransientResult): readonly number[] => result.time;

/** [rows, columns] of the S-matrix. */
export const getSMatrixSize = (result: SParameterResult): [number, number] => [
  result.numPorts,
  result.numPorts,
];

/**
 * S[i,j] over frequency (1-based ports). In-range pairs are always present.
 */
export const getSParameter = (
  result: SParameterResult,
  i: number,
  j: number,
): readonly Complex[] => {
  const name = sParameterName(i, j);
  const inRange =
    Number.isInteger(i) && Number.isInteger(j) && i >= 1 && j >= 1 && i <= result.numPorts && j <= result.numPorts;
  const values = inRange ? result.sMatrix.get(name) : undefined;
  if (!values) {
    throw new VectorNotFoundError(name, Array.from(result.sMatrix.keys()), "S-parameter");
  }
  return values;
};

export function getNodeVoltage(result: DCResult, node: string): number;
export function getNodeVoltage(result: ACResult, node: string): readonly Complex[];
export function getNodeVoltage(result: TransientResult, node: string): readonly number[];
export function getNodeVoltage(
  result: NodalResult,
  node: string,
): number | readonly Complex[] | readonly number[];
/**
 * Voltage of a node or voltage probe by solver name (`_net1`, `VP1`).
 */
export function getNodeVoltage(
  result: NodalResult,
  node: string,
): number | readonly Complex[] | readonly number[] {
  const value = result.voltages[node];
  if (value === undefined) {
    throw new VectorNotFoundError(node, Object.keys(result.voltages).sort(), "Node");
  }
  return value;
}

export function getComponentCurrent(result: DCResult, name: string): number;
export function getComponentCurrent(result: ACResult, name: string): readonly Complex[];
export function getComponentCurrent(
  result: TransientResult,
  name: string,
): readonly number[];
export function getComponentCurrent(
  result: NodalResult,
  name: string,
): number | readonly Complex[] | readonly number[];
/**
 * Branch current reported for a component (sources and current probes).
 * Positive current flows internally from the first terminal to the second.
 */
export function getComponentCurrent(
  result: NodalResult,
  name: string,
): number | readonly Complex[] | readonly number[] {
  const value = result.currents[name];
  if (value === undefined) {
    throw new VectorNotFoundError(name, Object.keys(result.currents).sort(), "Current of component");
  }
  return value;
}

const probeName = (probe: CircuitComponent | string): string =>
  typeof probe === "string" ? probe : probe.name;

export function probeVoltage(result: DCResult, probe: CircuitComponent | string): number;
export function probeVoltage(
  result: ACResult,
  probe: CircuitComponent | string,
): readonly Complex[];
export function probeVoltage(
  result: TransientResult,
  probe: CircuitComponent | string,
): readonly number[];
export function probeVoltage(
  result: NodalResult,
  probe: CircuitComponent | string,
): number | readonly Complex[] | readonly number[];
/** Reading of a voltage probe. */
export function probeVoltage(
  result: NodalResult,
  probe: CircuitComponent | string,
): number | readonly Complex[] | readonly number[] {
  const name = probeName(probe);
  const value = result.voltages[name];
  if (value === undefined) {
    throw new VectorNotFoundError(name, Object.keys(result.voltages).sort(), "Voltage probe");
  }
  return value;
}

export function probeCurrent(result: DCResult, probe: CircuitComponent | string): number;
export function probeCurrent(
  result: ACResult,
  probe: CircuitComponent | string,
): readonly Complex[];
export function probeCurrent(
  result: TransientResult,
  probe: CircuitComponent | string,
): readonly number[];
export function probeCurrent(
  result: NodalResult,
  probe: CircuitComponent | string,
): number | readonly Complex[] | readonly number[];
/** Reading of a current probe. */
export function probeCurrent(
  result: NodalResult,
  probe: CircuitComponent | string,
): number | readonly Complex[] | readonly number[] {
  const name = probeName(probe);
  const value = result.currents[name];
  if (value === undefined) {
    throw new VectorNotFoundError(name, Object.keys(result.currents).sort(), "Current probe");
  }
  return value;
}
