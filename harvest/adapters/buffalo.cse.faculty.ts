import "dotenv/config";
import { join } from "path";
import { loadConfig } from "../config.js";
import type { HarvestConfig } from "../config.js";
import { createHtmlClient } from "../utils/httpHtml.js";
import { createFileLogger } from "../utils/logger.js";
import { FacultyScraper } from "./faculty.scraper.js";
import type { FacultyDirectoryConfig, FacultySelectors, SchoolAdapter } from "../adapter.types.js";

export const BUFFALO_CSE_SELECTORS: FacultySelectors = {
  person: ".profileinfo-teaser",
  name: "div.profileinfo-teaser-name",
  titleLink: "a.title",
  subjectsBlock: "div.text.parbase.section",
  interestBlock: "div.profileinfo-interest.title",
};

export function buffaloCseConfig(cfg: HarvestConfig): FacultyDirectoryConfig {
  return {
    id: "buffalo-cse",
    directoryUrl: cfg.directoryUrl,
    profileBase: cfg.profileBase,
    selectors: BUFFALO_CSE_SELECTORS,
    concurrency: cfg.concurrency,
  };
}

export async function ingestBuffaloCse(opts?: { outfile?: string }) {
  const cfg = loadConfig();
  const client = createHtmlClient({ timeoutMs: cfg.timeoutMs, userAgent: cfg.userAgent });
  const scraper = new FacultyScraper(buffaloCseConfig(cfg), { client, logger: createFileLogger(cfg.logFile) });

  try {
    const records = await scraper.scrape();
    const out = opts?.outfile ?? join(cfg.outdir, "faculty.csv");
    await scraper.export(records, out);
    console.log(`Faculty ingest complete (${records.length}) -> ${out}`);
  } finally {
    client.close();
  }
}

export const buffaloCse: SchoolAdapter = {
  id: "buffalo-cse",
  ingest: ingestBuffaloCse,
};
