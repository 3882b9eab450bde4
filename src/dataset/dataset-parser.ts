/**
 * Parser for Qucs dataset output
 *
 * <Qucs Dataset VERSION>
 * <indep NAME COUNT>
 *   value per line
 * </indep>
 * <dep NAME DEP1 DEP2 ...>
 *   value per line
 * </dep>
 *
 * Error and warning lines printed by the solver may be interleaved with the
 * blocks. Parsing never throws; problems are reported on the dataset.
 */

import { readFile } from "fs/promises";
import type { Complex } from "../complex.js";
import type { DataVector, Dataset, SimulationStatus } from "./types.js";
import { parseValue } from "./value-parser.js";

const VERSION_HEADER = /<Qucs Dataset ([^>]+)>/;
const INDEP_START = /^<indep\s+(\S+)\s+(\d+)>$/;
const DEP_START = /^<dep\s+([^\s>]+)(.*)>$/;

export const EMPTY_OUTPUT_ERROR = "Empty output received";
export const NO_DATASET_ERROR = "No valid dataset found in output";

const isErrorLine = (lower: string): boolean =>
  lower.startsWith("error") || lower.startsWith("fatal") || lower.includes("error:");

const isWarningLine = (lower: string): boolean =>
  lower.startsWith("warning") || lower.includes("warning:");

interface OpenBlock {
  name: string;
  independent: boolean;
  expected: number;
  dependencies: string[];
  values: Complex[];
}

/**
 * Dataset for a run that has not happened yet.
 */
export const notRunDataset = (): Dataset => ({
  status: "not_run",
  version: "",
  independent: new Map(),
  dependent: new Map(),
  errors: [],
  warnings: [],
  rawOutput: "",
});

/**
 * Read a solver output file and parse it.
 */
export const parseDatasetFile = async (filePath: string): Promise<Dataset> => {
  const content = await readFile(filePath, "utf-8");
  return parseDataset(content);
};

/**
 * Parse raw solver output (pure function for testing).
 */
export const parseDataset = (raw: string): Dataset => {
  const independent = new Map<string, DataVector>();
  const dependent = new Map<string, DataVector>();
  const errors: string[] = [];
  const warnings: string[] = [];

  if (raw.trim() === "") {
    return {
      status: "parse_error",
      version: "",
      independent,
      dependent,
      errors: [EMPTY_OUTPUT_ERROR],
      warnings,
      rawOutput: raw,
    };
  }

  let status: SimulationStatus = "success";
  let version = "";
  let block: OpenBlock | null = null;

  const commit = (open: OpenBlock): void => {
    const target = open.independent ? independent : dependent;
    const other = open.independent ? dependent : independent;
    if (target.has(open.name) || other.has(open.name)) {
      warnings.push(`Vector '${open.name}' redefined`);
      other.delete(open.name);
    }
    target.set(open.name, {
      name: open.name,
      values: open.values,
      dependencies: open.dependencies,
      isIndependent: open.independent,
    });
    if (open.independent && open.values.length !== open.expected) {
      warnings.push(
        `Vector '${open.name}' has ${open.values.length} values, expected ${open.expected}`,
      );
    }
  };

  const closeUnterminated = (): void => {
    if (block !== null) {
      warnings.push(`Vector '${block.name}' was not closed`);
      commit(block);
      block = null;
    }
  };

  const lines = raw.split(/\r?\n/);

  for (const [index, line] of lines.entries()) {
    const lineNumber = index + 1;
    const stripped = line.trim();
    if (stripped === "") continue;

    const versionMatch = VERSION_HEADER.exec(stripped);
    if (versionMatch) {
      version = versionMatch[1].trim();
      continue;
    }

    if (block === null) {
      const lower = stripped.toLowerCase();
      if (isErrorLine(lower)) {
        errors.push(stripped);
        status = "error";
        continue;
      }
      if (isWarningLine(lower)) {
        warnings.push(stripped);
        continue;
      }
    }

    const indepMatch = INDEP_START.exec(stripped);
    if (indepMatch) {
      closeUnterminated();
      block = {
        name: indepMatch[1],
        independent: true,
        expected: Number.parseInt(indepMatch[2], 10),
        dependencies: [],
        values: [],
      };
      continue;
    }

    const depMatch = DEP_START.exec(stripped);
    if (depMatch) {
      closeUnterminated();
      const deps = depMatch[2].trim();
      block = {
        name: depMatch[1],
        independent: false,
        expected: -1,
        dependencies: deps === "" ? [] : deps.split(/\s+/),
        values: [],
      };
      continue;
    }

    if (stripped === "</indep>" || stripped === "</dep>") {
      const closesIndependent = stripped === "</indep>";
      if (block !== null && block.independent === closesIndependent) {
        commit(block);
        block = null;
      } else {
        warnings.push(`Unexpected ${stripped} at line ${lineNumber}`);
      }
      continue;
    }

    if (block === null) continue;

    if (stripped.startsWith("<")) {
      warnings.push(`Unexpected tag at line ${lineNumber}: '${stripped}'`);
      continue;
    }

    try {
      block.values.push(parseValue(stripped));
    } catch {
      // A solver that dies mid-vector prints its error inside the block
      if (isErrorLine(stripped.toLowerCase())) {
        errors.push(stripped);
        status = "error";
      } else {
        warnings.push(`Failed to parse value at line ${lineNumber}: '${stripped}'`);
      }
    }
  }

  closeUnterminated();

  if (version === "" && independent.size === 0 && dependent.size === 0) {
    if (errors.length === 0) {
      errors.push(NO_DATASET_ERROR);
    }
    status = "parse_error";
  }

  return {
    status,
    version,
    independent,
    dependent,
    errors,
    warnings,
    rawOutput: raw,
  };
};
