import "dotenv/config";
import { join } from "path";
import { loadConfig } from "./config.js";
import { coverageReport } from "./utils/coverage.js";
import { readFacultyCsv } from "./utils/emitter.js";

const file = process.argv[2] ?? join(loadConfig().outdir, "faculty.csv");

try {
  console.log(JSON.stringify(coverageReport(readFacultyCsv(file)), null, 2));
} catch (err) {
  console.error(err);
  process.exit(1);
}
