/**
 * Dataset Accessor Unit Tests
 */

import { describe, it, expect } from "vitest";
import { VectorNotFoundError } from "../errors.js";
import {
  getComplexVector,
  getImagVector,
  getRealVector,
  getVector,
  hasErrors,
  hasVector,
  listVectors,
  summarizeDataset,
} from "./accessors.js";
import { notRunDataset, parseDataset } from "./dataset-parser.js";

const AC_SWEEP = `<Qucs Dataset 0.0.19>
<indep acfrequency 3>
  +1.0e+03
  +1.0e+04
  +1.0e+05
</indep>
<dep V1 acfrequency>
  +1.0e+00+j0.0e+00
  +5.0e-01-j5.0e-01
  +1.0e-01-j3.0e-01
</dep>
`;

describe("listVectors", () => {
  it("should list independent vectors before dependent ones", () => {
    const dataset = parseDataset(`<Qucs Dataset 0.0.19>
<dep b.v acfrequency>
  +1.0e+00
</dep>
<indep acfrequency 1>
  +1.0e+03
</indep>
<dep a.v acfrequency>
  +2.0e+00
</dep>
`);
    expect(listVectors(dataset)).toEqual(["acfrequency", "b.v", "a.v"]);
  });
});

describe("vector access", () => {
  const dataset = parseDataset(AC_SWEEP);

  it("should find vectors in either map", () => {
    expect(hasVector(dataset, "acfrequency")).toBe(true);
    expect(hasVector(dataset, "V1")).toBe(true);
    expect(hasVector(dataset, "V2")).toBe(false);
    expect(getVector(dataset, "V1").values).toHaveLength(3);
  });

  it("should split complex vectors into parts", () => {
    expect(getRealVector(dataset, "V1")).toEqual([1, 0.5, 0.1]);
    expect(getImagVector(dataset, "V1")).toEqual([0, -0.5, -0.3]);
    expect(getComplexVector(dataset, "V1")[2]).toEqual({ re: 0.1, im: -0.3 });
  });

  it("should return copies of the stored values", () => {
    const values = getComplexVector(dataset, "V1");
    values[0].re = 99;
    expect(getRealVector(dataset, "V1")[0]).toBe(1);
  });

  it("should list the available names when a vector is missing", () => {
    expect(() => getRealVector(dataset, "V2")).toThrow(VectorNotFoundError);
    expect(() => getRealVector(dataset, "V2")).toThrow(
      "Vector 'V2' not found. Available: V1, acfrequency",
    );
  });

  it("should say when a dataset has no vectors at all", () => {
    expect(() => getVector(notRunDataset(), "V1")).toThrow(
      "Vector 'V1' not found. Available: (none)",
    );
  });
});

describe("hasErrors", () => {
  it("should be false for a clean run", () => {
    expect(hasErrors(parseDataset(AC_SWEEP))).toBe(false);
  });

  it("should be true for error lines, parse errors and runs that never happened", () => {
    expect(hasErrors(parseDataset(`error: singular matrix\n${AC_SWEEP}`))).toBe(true);
    expect(hasErrors(parseDataset(""))).toBe(true);
    expect(hasErrors(notRunDataset())).toBe(true);
  });
});

describe("summarizeDataset", () => {
  it("should report status, version and vectors", () => {
    expect(summarizeDataset(parseDataset(AC_SWEEP))).toBe(
      [
        "Dataset Summary",
        "========================================",
        "Status: success",
        "Version: 0.0.19",
        "",
        "Independent Variables (1):",
        "  - acfrequency: 3 points",
        "",
        "Dependent Variables (1):",
        "  - V1: 3 points [deps: acfrequency]",
      ].join("\n"),
    );
  });

  it("should include errors and warnings", () => {
    const summary = summarizeDataset(parseDataset(""));
    expect(summary.split("\n").slice(2, 7)).toEqual([
      "Status: parse_error",
      "Version: (none)",
      "",
      "Errors:",
      "  x Empty output received",
    ]);
  });
});
