/**
 * Read access to parsed datasets.
 */

import type { Complex } from "../complex.js";
import { VectorNotFoundError } from "../errors.js";
import type { DataVector, Dataset } from "./types.js";

/**
 * All vector names: independent vectors first, then dependent, each in the
 * order they appeared in the output.
 */
export const listVectors = (dataset: Dataset): string[] => [
  ...dataset.independent.keys(),
  ...dataset.dependent.keys(),
];

export const hasVector = (dataset: Dataset, name: string): boolean =>
  dataset.independent.has(name) || dataset.dependent.has(name);

/**
 * Look up a vector in either map.
 */
export const getVector = (dataset: Dataset, name: string): DataVector => {
  const vector = dataset.independent.get(name) ?? dataset.dependent.get(name);
  if (!vector) {
    throw new VectorNotFoundError(name, listVectors(dataset).sort());
  }
  return vector;
};

export const getComplexVector = (dataset: Dataset, name: string): Complex[] =>
  getVector(dataset, name).values.map((value) => ({ re: value.re, im: value.im }));

export const getRealVector = (dataset: Dataset, name: string): number[] =>
  getVector(dataset, name).values.map((value) => value.re);

export const getImagVector = (dataset: Dataset, name: string): number[] =>
  getVector(dataset, name).values.map((value) => value.im);

/**
 * True when the run failed or printed any error line.
 */
export const hasErrors = (dataset: Dataset): boolean =>
  dataset.status !== "success" || dataset.errors.length > 0;

/**
 * Plain-text report of a dataset's status, diagnostics and vectors.
 */
export const summarizeDataset = (dataset: Dataset): string => {
  const lines: string[] = [
    "Dataset Summary",
    "=".repeat(40),
    `Status: ${dataset.status}`,
    `Version: ${dataset.version || "(none)"}`,
  ];

  if (dataset.errors.length > 0) {
    lines.push("", "Errors:", ...dataset.errors.map((error) => `  x ${error}`));
  }

  if (dataset.warnings.length > 0) {
    lines.push("", "Warnings:", ...dataset.warnings.map((warning) => `  ! ${warning}`));
  }

  lines.push("", `Independent Variables (${dataset.independent.size}):`);
  for (const vector of dataset.independent.values()) {
    lines.push(`  - ${vector.name}: ${vector.values.length} points`);
  }

  lines.push("", `Dependent Variables (${dataset.dependent.size}):`);
  for (const vector of dataset.dependent.values()) {
    const deps =
      vector.dependencies.length > 0 ? ` [deps: ${vector.dependencies.join(", ")}]` : "";
    lines.push(`  - ${vector.name}: ${vector.values.length} points${deps}`);
  }

  return lines.join("\n");
};
