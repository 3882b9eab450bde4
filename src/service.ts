/**
 * Netbind Service
 *
 * Query methods over circuit description files and solver datasets using
 * absolute paths. Every method returns a result object or an ErrorResult;
 * library errors never escape.
 */

import * as fs from "fs";
import path from "path";
import { formatPin } from "./circuit/terminals.js";
import {
  getComponent,
  loadCircuitFile,
  resolvePinRef,
  type BuiltCircuit,
} from "./circuit/description.js";
import { nodeName } from "./circuit/circuit.js";
import { getConfig } from "./config.js";
import {
  getComplexVector,
  getImagVector,
  getRealVector,
  listVectors,
  parseDatasetFile,
  type Dataset,
} from "./dataset/index.js";
import {
  bindResult,
  currentIntoPin,
  currentThrough,
  getSParameter,
  typedResult,
  voltageAcross,
  voltageAtPin,
  type AnalysisKind,
  type NodalAnalysis,
  type TypedResult,
} from "./results/index.js";
import {
  isErrorResult,
  toErrorResult,
  type CurrentResult,
  type DatasetSummaryResult,
  type ErrorResult,
  type PinVoltageResult,
  type ResolveNodesResult,
  type SParameterQueryResult,
  type TypedResultPayload,
  type VectorForm,
  type VectorInfo,
  type VectorResult,
  type VoltageAcrossResult,
} from "./types.js";

// =============================================================================
// Path Normalization
// =============================================================================

/**
 * Normalize a file path to use native separators.
 *
 * On Windows, path.normalize() converts / to \
 * On Unix, backslashes are converted to / by hand since path.normalize()
 * leaves them alone (agents often send Windows-style paths regardless of
 * platform).
 */
export const normalizePath = (inputPath: string): string => {
  if (process.platform === "win32") {
    return path.normalize(inputPath);
  }
  return path.normalize(inputPath.replace(/\\/g, "/"));
};

// =============================================================================
// Logging
// =============================================================================

const debug = (message: string): void => {
  if (getConfig().debug) {
    console.error(`[netbind] ${message}`);
  }
};

// =============================================================================
// Loading
// =============================================================================

/**
 * Load, validate and resolve a circuit description file.
 */
export const loadCircuit = async (
  circuitPath: string,
): Promise<BuiltCircuit | ErrorResult> => {
  const normalizedPath = normalizePath(circuitPath);
  if (!fs.existsSync(normalizedPath)) {
    return { error: `Circuit file not found: ${normalizedPath}` };
  }

  try {
    const started = performance.now();
    const built = await loadCircuitFile(normalizedPath);
    debug(
      `loaded circuit ${normalizedPath} in ${(performance.now() - started).toFixed(1)} ms (${built.components.size} components)`,
    );
    return built;
  } catch (error) {
    return toErrorResult(error);
  }
};

/**
 * Read and parse a raw solver output file. The dataset is returned whatever
 * its status; callers decide whether a failed run is usable.
 */
export const loadDataset = async (
  datasetPath: string,
): Promise<Dataset | ErrorResult> => {
  const normalizedPath = normalizePath(datasetPath);
  if (!fs.existsSync(normalizedPath)) {
    return { error: `Dataset file not found: ${normalizedPath}` };
  }

  try {
    const started = performance.now();
    const dataset = await parseDatasetFile(normalizedPath);
    debug(
      `parsed dataset ${normalizedPath} in ${(performance.now() - started).toFixed(1)} ms: ${dataset.status}, ${listVectors(dataset).length} vectors`,
    );
    for (const warning of dataset.warnings) {
      debug(`dataset warning: ${warning}`);
    }
    return dataset;
  } catch (error) {
    return toErrorResult(error);
  }
};

/**
 * Load a dataset that must contain vectors.
 */
const loadUsableDataset = async (
  datasetPath: string,
): Promise<Dataset | ErrorResult> => {
  const dataset = await loadDataset(datasetPath);
  if (isErrorResult(dataset)) {
    return dataset;
  }
  if (dataset.status === "parse_error") {
    return { error: `Dataset could not be parsed: ${dataset.errors.join("; ")}` };
  }
  return dataset;
};

/**
 * Load the circuit and the dataset of a pin query.
 */
const loadInputs = async (
  circuitPath: string,
  datasetPath: string,
): Promise<{ built: BuiltCircuit; dataset: Dataset } | ErrorResult> => {
  const [built, dataset] = await Promise.all([
    loadCircuit(circuitPath),
    loadUsableDataset(datasetPath),
  ]);
  if (isErrorResult(built)) return built;
  if (isErrorResult(dataset)) return dataset;
  return { built, dataset };
};

// =============================================================================
// Serialization
// =============================================================================

/**
 * JSON-friendly form of a typed result.
 */
export const toPayload = (result: TypedResult): TypedResultPayload => {
  if (result.kind !== "sparameter") {
    return result;
  }
  return {
    kind: "sparameter",
    frequencies: result.frequencies,
    num_ports: result.numPorts,
    z0: result.z0,
    s_matrix: Object.fromEntries(result.sMatrix),
  };
};

// =============================================================================
// Circuit Queries
// =============================================================================

/**
 * Node id of every pin in a circuit description, plus the nets.
 */
export const resolveNodes = async (
  circuitPath: string,
): Promise<ResolveNodesResult | ErrorResult> => {
  const built = await loadCircuit(circuitPath);
  if (isErrorResult(built)) return built;

  const { circuit } = built;
  const nodeCount = circuit.resolveNodes();
  const pins: Record<string, number> = {};
  for (const component of circuit.components) {
    for (const terminal of circuit.terminalsOf(component)) {
      const node = circuit.nodeOf(component, terminal);
      if (node !== undefined) {
        pins[formatPin({ component, terminal })] = node;
      }
    }
  }

  return {
    node_count: nodeCount,
    pins,
    nets: circuit.nets().map((net) => ({
      node: net.node,
      name: net.name,
      pins: net.pins.map(formatPin),
    })),
  };
};

// =============================================================================
// Dataset Queries
// =============================================================================

/**
 * Status, diagnostics and vector list of a dataset file.
 */
export const summarizeDatasetFile = async (
  datasetPath: string,
): Promise<DatasetSummaryResult | ErrorResult> => {
  const dataset = await loadDataset(datasetPath);
  if (isErrorResult(dataset)) return dataset;

  const vectors: VectorInfo[] = [];
  for (const vector of [...dataset.independent.values(), ...dataset.dependent.values()]) {
    const info: VectorInfo = {
      name: vector.name,
      independent: vector.isIndependent,
      length: vector.values.length,
    };
    if (vector.dependencies.length > 0) {
      info.dependencies = [...vector.dependencies];
    }
    vectors.push(info);
  }

  return {
    status: dataset.status,
    version: dataset.version,
    errors: [...dataset.errors],
    warnings: [...dataset.warnings],
    vectors,
  };
};

/**
 * Values of one vector as complex numbers or their real or imaginary parts.
 */
export const getVector = async (
  datasetPath: string,
  name: string,
  form: VectorForm = "complex",
): Promise<VectorResult | ErrorResult> => {
  const dataset = await loadUsableDataset(datasetPath);
  if (isErrorResult(dataset)) return dataset;

  try {
    const values =
      form === "real"
        ? getRealVector(dataset, name)
        : form === "imag"
          ? getImagVector(dataset, name)
          : getComplexVector(dataset, name);
    return { name, form, length: values.length, values };
  } catch (error) {
    return toErrorResult(error);
  }
};

/**
 * Typed result of one analysis.
 */
export const getTypedResult = async (
  datasetPath: string,
  analysis: AnalysisKind,
  z0?: number,
): Promise<TypedResultPayload | ErrorResult> => {
  const dataset = await loadUsableDataset(datasetPath);
  if (isErrorResult(dataset)) return dataset;

  try {
    return toPayload(typedResult(dataset, analysis, { z0 }));
  } catch (error) {
    return toErrorResult(error);
  }
};

/**
 * S[i,j] over frequency.
 */
export const querySParameter = async (
  datasetPath: string,
  i: number,
  j: number,
  z0?: number,
): Promise<SParameterQueryResult | ErrorResult> => {
  const dataset = await loadUsableDataset(datasetPath);
  if (isErrorResult(dataset)) return dataset;

  try {
    const result = typedResult(dataset, "sparameter", { z0 });
    return {
      parameter: `S[${i},${j}]`,
      num_ports: result.numPorts,
      z0: result.z0,
      frequencies: result.frequencies,
      values: getSParameter(result, i, j),
    };
  } catch (error) {
    return toErrorResult(error);
  }
};

// =============================================================================
// Pin Queries
// =============================================================================

/**
 * Voltage at a pin given as `NAME.terminal` (bare `NAME` = first terminal).
 */
export const queryPinVoltage = async (
  circuitPath: string,
  datasetPath: string,
  analysis: NodalAnalysis,
  pinRef: string,
): Promise<PinVoltageResult | ErrorResult> => {
  const inputs = await loadInputs(circuitPath, datasetPath);
  if (isErrorResult(inputs)) return inputs;

  try {
    const { built, dataset } = inputs;
    const p = resolvePinRef(built, pinRef);
    const bound = bindResult(built.circuit, typedResult(dataset, analysis));
    const voltage = voltageAtPin(bound, p.component, p.terminal);
    const node = built.circuit.nodeOf(p.component, p.terminal);
    if (node === undefined) {
      return { error: `Pin ${formatPin(p)} has no node` };
    }
    return {
      pin: formatPin(p),
      analysis,
      node,
      node_name: nodeName(node),
      voltage,
    };
  } catch (error) {
    return toErrorResult(error);
  }
};

/**
 * V(terminalA) - V(terminalB) of one component.
 */
export const queryVoltageAcross = async (
  circuitPath: string,
  datasetPath: string,
  analysis: NodalAnalysis,
  componentName: string,
  terminalA: string,
  terminalB: string,
): Promise<VoltageAcrossResult | ErrorResult> => {
  const inputs = await loadInputs(circuitPath, datasetPath);
  if (isErrorResult(inputs)) return inputs;

  try {
    const { built, dataset } = inputs;
    const component = getComponent(built, componentName);
    const bound = bindResult(built.circuit, typedResult(dataset, analysis));
    return {
      component: componentName,
      terminal_a: terminalA,
      terminal_b: terminalB,
      analysis,
      voltage: voltageAcross(bound, component, terminalA, terminalB),
    };
  } catch (error) {
    return toErrorResult(error);
  }
};

/**
 * Branch current of a component, or the current into one of its pins.
 */
export const queryCurrent = async (
  circuitPath: string,
  datasetPath: string,
  analysis: NodalAnalysis,
  componentName: string,
  terminal?: string,
): Promise<CurrentResult | ErrorResult> => {
  const inputs = await loadInputs(circuitPath, datasetPath);
  if (isErrorResult(inputs)) return inputs;

  try {
    const { built, dataset } = inputs;
    const component = getComponent(built, componentName);
    const bound = bindResult(built.circuit, typedResult(dataset, analysis));
    if (terminal === undefined) {
      return {
        component: componentName,
        analysis,
        current: currentThrough(bound, component),
      };
    }
    return {
      component: componentName,
      terminal,
      analysis,
      current: currentIntoPin(bound, component, terminal),
    };
  } catch (error) {
    return toErrorResult(error);
  }
};
