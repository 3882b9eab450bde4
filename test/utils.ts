/**
 * Test utilities for fixture datasets and golden reference testing.
 */

import { readFileSync } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { Complex } from "../src/complex.js";
import type { Dataset, SimulationStatus } from "../src/dataset/index.js";
import { ANALYSIS_KINDS, extractAllResults } from "../src/results/index.js";
import { toPayload } from "../src/service.js";
import type { AnalysisKind, TypedResultPayload } from "../src/types.js";

const TEST_DIR = path.dirname(new URL(import.meta.url).pathname);
const FIXTURES_DIR = path.join(TEST_DIR, "fixtures");
const DATASET_FIXTURES_DIR = path.join(FIXTURES_DIR, "datasets");
const GOLDEN_DIR = path.join(TEST_DIR, "golden");

/** Reference impedance used for every golden S-parameter result. */
export const GOLDEN_Z0 = 50;

export interface Fixture {
  name: string;
  path: string;
}

/**
 * Absolute path of a fixture file, e.g. `datasets/ac_divider.dat`.
 */
export const fixturePath = (relative: string): string => path.join(FIXTURES_DIR, relative);

/**
 * Raw solver output of a dataset fixture, read synchronously so unit tests
 * can use it at collection time.
 */
export const readDatasetFixture = (fileName: string): string =>
  readFileSync(path.join(DATASET_FIXTURES_DIR, fileName), "utf-8");

/**
 * List all dataset fixtures (`*.dat`).
 * Returns an empty array if no fixtures exist.
 */
export const listDatasetFixtures = async (): Promise<Fixture[]> => {
  try {
    const entries = await fs.readdir(DATASET_FIXTURES_DIR, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && path.extname(entry.name) === ".dat")
      .map((entry) => ({
        name: path.basename(entry.name, ".dat"),
        path: path.join(DATASET_FIXTURES_DIR, entry.name),
      }));
  } catch {
    return [];
  }
};

export interface GoldenVector {
  name: string;
  independent: boolean;
  dependencies: string[];
  values: Complex[];
}

/**
 * What a golden file records about one parsed fixture.
 */
export interface GoldenDataset {
  status: SimulationStatus;
  version: string;
  errors: string[];
  warnings: string[];
  vectors: GoldenVector[];
  results: Partial<Record<AnalysisKind, TypedResultPayload>>;
}

/**
 * Plain-JSON form of a dataset and every typed result it yields.
 */
export const toGolden = (dataset: Dataset): GoldenDataset => {
  const vectors = [...dataset.independent.values(), ...dataset.dependent.values()].map(
    (vector) => ({
      name: vector.name,
      independent: vector.isIndependent,
      dependencies: [...vector.dependencies],
      values: vector.values.map((value) => ({ re: value.re, im: value.im })),
    }),
  );

  const all = extractAllResults(dataset, { z0: GOLDEN_Z0 });
  const results: GoldenDataset["results"] = {};
  for (const kind of ANALYSIS_KINDS) {
    const result = all[kind];
    if (result) {
      results[kind] = toPayload(result);
    }
  }

  return {
    status: dataset.status,
    version: dataset.version,
    errors: [...dataset.errors],
    warnings: [...dataset.warnings],
    vectors,
    results,
  };
};

/**
 * Load golden output JSON for a fixture.
 * Returns null if the golden file doesn't exist.
 */
export const loadGolden = async (name: string): Promise<unknown> => {
  const goldenPath = path.join(GOLDEN_DIR, `${name}.json`);

  try {
    const content = await fs.readFile(goldenPath, "utf-8");
    return JSON.parse(content);
  } catch {
    return null;
  }
};

/**
 * Save golden output JSON for a fixture.
 */
export const saveGolden = async (name: string, data: GoldenDataset): Promise<void> => {
  await fs.mkdir(GOLDEN_DIR, { recursive: true });

  const goldenPath = path.join(GOLDEN_DIR, `${name}.json`);
  await fs.writeFile(goldenPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
};
