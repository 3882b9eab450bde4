/**
 * Dataset Parser Unit Tests
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { getComplexVector } from "./accessors.js";
import {
  EMPTY_OUTPUT_ERROR,
  NO_DATASET_ERROR,
  notRunDataset,
  parseDataset,
  parseDatasetFile,
} from "./dataset-parser.js";

const AC_SWEEP = `<Qucs Dataset 0.0.19>
<indep acfrequency 3>
  +1.00000000000000e+03
  +1.00000000000000e+04
  +1.00000000000000e+05
</indep>
<dep V1 acfrequency>
  +1.0e+00+j0.0e+00
  +5.0e-01-j5.0e-01
  +1.0e-01-j3.0e-01
</dep>
`;

describe("parseDataset", () => {
  it("should parse an AC sweep", () => {
    const dataset = parseDataset(AC_SWEEP);

    expect(dataset.status).toBe("success");
    expect(dataset.version).toBe("0.0.19");
    expect(dataset.errors).toEqual([]);
    expect(dataset.warnings).toEqual([]);
    expect(dataset.independent.get("acfrequency")?.values.map((v) => v.re)).toEqual([
      1000, 10000, 100000,
    ]);
    expect(dataset.dependent.get("V1")?.dependencies).toEqual(["acfrequency"]);
    expect(dataset.dependent.get("V1")?.isIndependent).toBe(false);
    expect(getComplexVector(dataset, "V1")[1]).toEqual({ re: 0.5, im: -0.5 });
    expect(dataset.rawOutput).toBe(AC_SWEEP);
  });

  it("should accept CRLF line endings", () => {
    const dataset = parseDataset(AC_SWEEP.replace(/\n/g, "\r\n"));
    expect(dataset.status).toBe("success");
    expect(dataset.dependent.get("V1")?.values).toHaveLength(3);
  });

  it("should report empty output", () => {
    for (const raw of ["", "   \n\t\n"]) {
      const dataset = parseDataset(raw);
      expect(dataset.status).toBe("parse_error");
      expect(dataset.errors).toEqual([EMPTY_OUTPUT_ERROR]);
      expect(dataset.independent.size).toBe(0);
      expect(dataset.dependent.size).toBe(0);
    }
  });

  it("should report output without a dataset", () => {
    const dataset = parseDataset("checking netlist\ndone\n");
    expect(dataset.status).toBe("parse_error");
    expect(dataset.errors).toEqual([NO_DATASET_ERROR]);
  });

  it("should keep solver errors when no dataset was written", () => {
    const dataset = parseDataset("fatal: netlist has no ground\n");
    expect(dataset.status).toBe("parse_error");
    expect(dataset.errors).toEqual(["fatal: netlist has no ground"]);
  });

  it("should collect error and warning lines and keep parsing", () => {
    const dataset = parseDataset(`WARNING: node _net3 is floating
<Qucs Dataset 0.0.19>
checker error: R9 has no value
<indep time 2>
  +0.0e+00
  +1.0e-09
</indep>
`);
    expect(dataset.status).toBe("error");
    expect(dataset.errors).toEqual(["checker error: R9 has no value"]);
    expect(dataset.warnings).toEqual(["WARNING: node _net3 is floating"]);
    expect(dataset.independent.get("time")?.values).toHaveLength(2);
  });

  it("should warn on a count mismatch and keep the values read", () => {
    const dataset = parseDataset(`<Qucs Dataset 0.0.19>
<indep time 3>
  +0.0e+00
  +1.0e-09
</indep>
`);
    expect(dataset.status).toBe("success");
    expect(dataset.warnings).toEqual(["Vector 'time' has 2 values, expected 3"]);
    expect(dataset.independent.get("time")?.values).toHaveLength(2);
  });

  it("should warn on unparsable values with their line number", () => {
    const dataset = parseDataset(`<Qucs Dataset 0.0.19>
<indep time 2>
  +0.0e+00
  garbage
</indep>
`);
    expect(dataset.warnings).toEqual([
      "Failed to parse value at line 4: 'garbage'",
      "Vector 'time' has 1 values, expected 2",
    ]);
  });

  it("should keep an unclosed block with a warning", () => {
    const dataset = parseDataset(`<Qucs Dataset 0.0.19>
<dep out.Vt time>
  +1.0e+00
  +2.0e+00
`);
    expect(dataset.warnings).toEqual(["Vector 'out.Vt' was not closed"]);
    expect(dataset.dependent.get("out.Vt")?.values.map((v) => v.re)).toEqual([1, 2]);
  });

  it("should check the count of an unclosed independent block", () => {
    const dataset = parseDataset(`<Qucs Dataset 0.0.19>
<indep t 5>
1.0
2.0
`);
    expect(dataset.warnings).toEqual([
      "Vector 't' was not closed",
      "Vector 't' has 2 values, expected 5",
    ]);
    expect(dataset.independent.get("t")?.values).toHaveLength(2);
  });

  it("should record an error printed inside a block", () => {
    const dataset = parseDataset(`<Qucs Dataset 0.0.19>
<dep V1>
1.0
ERROR: singular matrix
</dep>
`);
    expect(dataset.status).toBe("error");
    expect(dataset.errors).toEqual(["ERROR: singular matrix"]);
    expect(dataset.warnings).toEqual([]);
    expect(dataset.dependent.get("V1")?.values).toEqual([{ re: 1, im: 0 }]);
  });

  it("should warn on unknown tags inside a block", () => {
    const dataset = parseDataset(`<Qucs Dataset 0.0.19>
<dep V1>
1.0
<garbage
2.0
</dep>
`);
    expect(dataset.warnings).toEqual(["Unexpected tag at line 4: '<garbage'"]);
    expect(dataset.dependent.get("V1")?.values.map((v) => v.re)).toEqual([1, 2]);
  });

  it("should close an open block when the next one starts", () => {
    const dataset = parseDataset(`<Qucs Dataset 0.0.19>
<indep time 1>
  +0.0e+00
<dep a.Vt time>
  +3.0e+00
</dep>
`);
    expect(dataset.warnings).toEqual(["Vector 'time' was not closed"]);
    expect(dataset.independent.get("time")?.values).toHaveLength(1);
    expect(dataset.dependent.get("a.Vt")?.values).toHaveLength(1);
  });

  it("should replace redefined vectors with a warning", () => {
    const dataset = parseDataset(`<Qucs Dataset 0.0.19>
<indep x 1>
  +1.0e+00
</indep>
<dep x>
  +2.0e+00
</dep>
`);
    expect(dataset.warnings).toEqual(["Vector 'x' redefined"]);
    expect(dataset.independent.has("x")).toBe(false);
    expect(dataset.dependent.get("x")?.values).toEqual([{ re: 2, im: 0 }]);
    expect(dataset.dependent.get("x")?.dependencies).toEqual([]);
  });

  it("should warn on a closing tag without a matching block", () => {
    const dataset = parseDataset(`<Qucs Dataset 0.0.19>
</dep>
<indep time 1>
  +0.0e+00
</dep>
</indep>
`);
    expect(dataset.warnings).toEqual([
      "Unexpected </dep> at line 2",
      "Unexpected </dep> at line 5",
    ]);
    expect(dataset.independent.get("time")?.values).toHaveLength(1);
  });

  it("should treat a version header alone as a valid empty dataset", () => {
    const dataset = parseDataset("<Qucs Dataset 0.0.19>\n");
    expect(dataset.status).toBe("success");
    expect(dataset.errors).toEqual([]);
  });
});

describe("notRunDataset", () => {
  it("should have the not_run status and no vectors", () => {
    const dataset = notRunDataset();
    expect(dataset.status).toBe("not_run");
    expect(dataset.independent.size + dataset.dependent.size).toBe(0);
  });
});

describe("parseDatasetFile", () => {
  it("should read and parse a file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "netbind-dataset-"));
    try {
      const file = path.join(dir, "ac.dat");
      await fs.writeFile(file, AC_SWEEP);
      const dataset = await parseDatasetFile(file);
      expect(dataset.version).toBe("0.0.19");
      expect(dataset.dependent.has("V1")).toBe(true);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
