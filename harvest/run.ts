#!/usr/bin/env node
import "dotenv/config";
import { buffaloCse } from "./adapters/buffalo.cse.faculty.js";
import type { SchoolAdapter } from "./adapter.types.js";

const adapters: Record<string, SchoolAdapter> = {
  [buffaloCse.id]: buffaloCse,
};

const target = process.argv[2];
const outfile = process.argv[3];
const adapter = target ? adapters[target] : undefined;
if (!adapter) {
  console.error(`Usage: npm run ingest -- <${Object.keys(adapters).join("|")}> [output.csv]`);
  process.exit(1);
}
adapter.ingest({ outfile }).then(() => {
  console.log(`${adapter.id} done`);
}).catch(err => {
  console.error(err);
  process.exit(1);
});
