import pLimit from "p-limit";
import { parseDirectory } from "./faculty.directory.js";
import { extractResearch, extractSubjects } from "./faculty.profile.js";
import { cleanRecords, createDrafts, mergeEnrichment } from "./faculty.clean.js";
import { HarvestError, NetworkError, ParseError } from "../errors.js";
import { emitCsv } from "../utils/emitter.js";
import type { HtmlClient } from "../utils/httpHtml.js";
import type { Logger } from "../utils/logger.js";
import type {
  DirectoryListing,
  Enrichment,
  FacultyDirectoryConfig,
  FacultyRecord,
  FacultySelectors,
  FacultyStub,
} from "../adapter.types.js";

export type ScraperDeps = {
  client: HtmlClient;
  logger: Logger;
};

type EnrichmentField = keyof Enrichment;

type EnrichmentResult = {
  index: number;
  field: EnrichmentField;
  topics: string[] | null;
};

const EXTRACTORS: Record<EnrichmentField, (html: string, selectors: FacultySelectors) => string[]> = {
  subjects: extractSubjects,
  research: extractResearch,
};

/**
 * Directory page -> stubs -> profile enrichment -> cleaned records.
 *
 * Any failure on the directory page rejects `scrape()`. A profile page that
 * fails to load or parse is logged and leaves that member's subjects or
 * research empty.
 */
export class FacultyScraper {
  constructor(
    private readonly cfg: FacultyDirectoryConfig,
    private readonly deps: ScraperDeps,
  ) {}

  async scrape(): Promise<FacultyRecord[]> {
    const listing = await this.readDirectory();
    if (listing.mismatch) console.warn(`WARN ${this.cfg.id}: ${listing.mismatch.message}`);

    const drafts = createDrafts(listing.stubs);
    const enrichment = await this.enrich(listing.stubs);
    return cleanRecords(mergeEnrichment(drafts, enrichment));
  }

  export(records: readonly FacultyRecord[], file: string): Promise<void> {
    return emitCsv(file, records);
  }

  private async readDirectory(): Promise<DirectoryListing> {
    const url = this.cfg.directoryUrl;
    try {
      const html = await this.deps.client.getText(url);
      try {
        return parseDirectory(html, this.cfg.selectors, this.cfg.profileBase);
      } catch (e) {
        if (e instanceof ParseError && e.url === null) throw new ParseError(e.message, { url, cause: e });
        throw e;
      }
    } catch (e) {
      if (e instanceof HarvestError) {
        this.deps.logger.error({ url, error: e.name }, `directory scrape failed: ${e.message}`);
      }
      throw e;
    }
  }

  private async enrich(stubs: readonly FacultyStub[]): Promise<Map<number, Enrichment>> {
    const limit = pLimit(this.cfg.concurrency);
    const tasks = stubs.flatMap((stub, index) =>
      (["subjects", "research"] as const).map(field =>
        limit(() => this.extract(index, field, stub.profileUrl)),
      ),
    );

    // Results carry their origin index; completion order does not matter.
    const byIndex = new Map<number, Enrichment>();
    for (const r of await Promise.all(tasks)) {
      const entry = byIndex.get(r.index) ?? { subjects: null, research: null };
      entry[r.field] = r.topics;
      byIndex.set(r.index, entry);
    }
    return byIndex;
  }

  private async extract(index: number, field: EnrichmentField, url: string): Promise<EnrichmentResult> {
    try {
      const html = await this.deps.client.getText(url);
      return { index, field, topics: EXTRACTORS[field](html, this.cfg.selectors) };
    } catch (e) {
      if (!(e instanceof NetworkError || e instanceof ParseError)) throw e;
      this.deps.logger.error({ url, error: e.name }, `${field} extraction failed: ${e.message}`);
      return { index, field, topics: null };
    }
  }
}
