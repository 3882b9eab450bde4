/**
 * Solver dataset parsing and access.
 */

export {
  parseDataset,
  parseDatasetFile,
  notRunDataset,
  EMPTY_OUTPUT_ERROR,
  NO_DATASET_ERROR,
} from "./dataset-parser.js";
export { parseValue, InvalidValueError } from "./value-parser.js";
export {
  getComplexVector,
  getImagVector,
  getRealVector,
  getVector,
  hasErrors,
  hasVector,
  listVectors,
  summarizeDataset,
} from "./accessors.js";
export type { DataVector, Dataset, SimulationStatus } from "./types.js";
