#!/usr/bin/env npx tsx
import { parseDatasetFile } from "../src/dataset/index.js";
import { fixturePath, saveGolden, toGolden } from "../test/utils.js";

const [name] = process.argv.slice(2);

if (!name) {
  console.error("Usage: npx tsx scripts/gen-golden.ts <fixture-name>");
  process.exit(1);
}

const datasetPath = fixturePath(`datasets/${name}.dat`);
console.log("Parsing:", datasetPath);
const golden = toGolden(await parseDatasetFile(datasetPath));
console.log("Status:", golden.status);
console.log("Vectors:", golden.vectors.length);
console.log("Results:", Object.keys(golden.results).join(", ") || "(none)");
await saveGolden(name, golden);
console.log("Saved:", `test/golden/${name}.json`);
