/**
 * Golden reference tests for the dataset parser and typed results.
 *
 * These tests compare parsed fixture datasets against committed golden JSON
 * files, enabling regression detection without mocks.
 *
 * To add a new test fixture:
 * 1. Add raw solver output to test/fixtures/datasets/{name}.dat
 * 2. Run `npm test` - the test will fail with "missing golden output"
 * 3. Generate golden output: npx tsx scripts/gen-golden.ts <name>
 * 4. Review and commit test/golden/{name}.json
 */

import { describe, it, expect } from "vitest";
import { parseDatasetFile } from "../../src/dataset/index.js";
import { listDatasetFixtures, loadGolden, toGolden } from "../utils.js";

describe("Golden Reference Tests", () => {
  it("should find the committed dataset fixtures", async () => {
    const fixtures = await listDatasetFixtures();
    expect(fixtures.map((fixture) => fixture.name).sort()).toEqual([
      "ac_divider",
      "dc_divider",
      "empty",
      "failed_run",
      "sparameter_three_port",
      "transient_divider",
    ]);
  });
});

describe("Dataset Golden Output", async () => {
  const fixtures = await listDatasetFixtures();

  for (const fixture of fixtures) {
    describe(fixture.name, () => {
      it("should match golden output", async () => {
        const golden = await loadGolden(fixture.name);

        if (golden === null) {
          throw new Error(
            `Missing golden output for ${fixture.name}. ` +
              `Generate it with: npx tsx scripts/gen-golden.ts ${fixture.name}`,
          );
        }

        const actual = toGolden(await parseDatasetFile(fixture.path));

        expect(actual).toEqual(golden);
      });
    });
  }
});
