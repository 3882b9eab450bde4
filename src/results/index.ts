/**
 * Typed analysis results and pin-level binding.
 */

export {
  ANALYSIS_KINDS,
  extractAcResult,
  extractAllResults,
  extractDcResult,
  extractSParameterResult,
  extractTransientResult,
  getComponentCurrent,
  getFrequency,
  getNodeVoltage,
  getSMatrixSize,
  getSParameter,
  getTime,
  probeCurrent,
  probeVoltage,
  sParameterName,
  typedResult,
} from "./typed-results.js";
export type {
  ACResult,
  AnalysisKind,
  DCResult,
  MultiAnalysisResult,
  NodalAnalysis,
  NodalResult,
  SParameterOptions,
  SParameterResult,
  TransientResult,
  TypedResult,
} from "./typed-results.js";
export {
  bindResult,
  componentPower,
  currentIntoPin,
  currentThrough,
  voltageAcross,
  voltageAtPin,
  voltageBetween,
} from "./binder.js";
export type { BoundResult, NodalValue } from "./binder.js";
