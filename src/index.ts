import { loadConfig, type AppConfig } from "./config.js";
import { getLogger, type Logger } from "./util/logger.js";
import { SamGovClient } from "./client/samGov.js";
import { FeedClient, type FeedCategory } from "./client/feeds.js";
import { probeDirectory } from "./client/directory.js";
import { readManualEntries } from "./client/manual.js";
import { normalize, type RawRecord } from "./transform/mapOpportunity.js";
import { mergeKeywords } from "./transform/match.js";
import {
  SOURCE_CATEGORIES,
  type Opportunity,
  type Relevance,
  type SourceCategory,
} from "./transform/schema.js";
import { SeenStore } from "./state/seenStore.js";
import { sortForDisplay } from "./report/renderHtml.js";
import { writeHtml } from "./storage/writeHtml.js";
import { CSV_FILE_NAME, writeCsv } from "./storage/writeCsv.js";
import { writeJson } from "./storage/writeJson.js";

export interface RunOptions {
  configPath?: string;
  /** already-loaded configuration; skips reading `configPath` */
  config?: AppConfig;
  outDir?: string;
  statePath?: string;
  manualPath?: string;
  /** directory reachability probes; default true */
  probe?: boolean;
  verbose?: boolean;
  now?: () => Date;
}

export interface SourceSummary {
  count: number;
  new: number;
}

export interface RunResult {
  total: number;
  sources: Record<SourceCategory, SourceSummary>;
  relevance: Record<Relevance, number>;
  outputs: { html: string; csv: string; json: string };
  durationMs: number;
}

/**
 * Run one adapter; a throw is logged and yields no records for that source.
 */
async function fromSource(
  category: SourceCategory,
  logger: Logger,
  fetchRecords: () => Promise<RawRecord[]>
): Promise<RawRecord[]> {
  try {
    const records = await fetchRecords();
    logger.info({ source: category, raw: records.length }, "Fetched source");
    return records;
  } catch (error) {
    logger.error(
      { source: category, error: error instanceof Error ? error.message : String(error) },
      "Source failed; continuing without it"
    );
    return [];
  }
}

async function collectRecords(
  config: AppConfig,
  options: RunOptions,
  now: Date,
  logger: Logger
): Promise<Record<SourceCategory, RawRecord[]>> {
  const sam = await fromSource("sam_gov", logger, async () => {
    const client = new SamGovClient(config.sam, logger, {
      timeoutMs: config.requestTimeoutMs,
      now: () => now,
    });
    const records = await client.fetchAll();
    return records.map((record): RawRecord => ({ kind: "sam_gov", record }));
  });

  const feedKeywords = mergeKeywords(
    config.matching.directKeywords,
    config.matching.serviceKeywords,
    config.matching.privateSectorKeywords
  );
  const fetchFeeds = (category: FeedCategory): Promise<RawRecord[]> =>
    fromSource(category, logger, async () => {
      const urls = config.feeds[category];
      if (urls.length === 0) return [];
      const client = new FeedClient(
        {
          category,
          keywords: feedKeywords,
          excludeKeywords: config.matching.excludeKeywords,
          delayMs: config.feeds.delayMs,
          timeoutMs: config.requestTimeoutMs,
        },
        logger
      );
      const items = await client.fetchAll(urls);
      return items.map((item): RawRecord => ({ kind: "feed", category, item }));
    });
  const indeed = await fetchFeeds("indeed");
  const craigslist = await fetchFeeds("craigslist");

  const directory = await fromSource("directory", logger, async () => {
    const probed = await probeDirectory(
      config.directory,
      { timeoutMs: config.requestTimeoutMs, probe: options.probe },
      logger
    );
    return probed.map(({ entry, status }): RawRecord => ({ kind: "directory", entry, status }));
  });

  const manual = await fromSource("manual", logger, async () => {
    const entries = await readManualEntries(
      options.manualPath || "manual_opportunities.json",
      logger
    );
    return entries.map((entry): RawRecord => ({ kind: "manual", entry }));
  });

  return { sam_gov: sam, indeed, craigslist, directory, manual };
}

/**
 * One full run: fetch every source, normalize, flag novelty, write the report
 * and exports, then persist the seen ids. The seen state is committed only
 * after every output has been written, so a failed run can be retried without
 * losing "new" flags.
 */
export async function run(options: RunOptions = {}): Promise<RunResult> {
  const startTime = Date.now();
  const logger = getLogger(options.verbose ?? false);

  try {
    const config = options.config ?? loadConfig(options.configPath);
    const runTime = options.now ? options.now() : new Date();
    const outDir = options.outDir || "docs";
    const statePath = options.statePath || "seen_opportunities.json";

    const store = await SeenStore.load(statePath);
    logger.info({ statePath, lastRun: store.lastRun }, "Loaded seen state");

    const raw = await collectRecords(config, options, runTime, logger);

    const sources: Record<SourceCategory, SourceSummary> = {
      sam_gov: { count: 0, new: 0 },
      indeed: { count: 0, new: 0 },
      craigslist: { count: 0, new: 0 },
      directory: { count: 0, new: 0 },
      manual: { count: 0, new: 0 },
    };
    const all: Opportunity[] = [];
    for (const category of SOURCE_CATEGORIES) {
      const normalized = normalize(raw[category], config.matching, logger);
      const flagged = store.mark(category, normalized);
      sources[category] = {
        count: flagged.length,
        new: flagged.filter((o) => o.isNew).length,
      };
      all.push(...flagged);
      logger.info({ source: category, ...sources[category] }, "Processed source");
    }

    const sorted = sortForDisplay(all);
    const html = await writeHtml(
      sorted,
      outDir,
      {
        generatedAt: runTime,
        regionName: config.matching.regionName,
        portalSearchUrl: config.portalSearchUrl,
        csvFileName: CSV_FILE_NAME,
      },
      logger
    );
    const csv = await writeCsv(sorted, outDir, logger);
    const json = await writeJson(sorted, outDir, logger);

    await store.commit(runTime);
    logger.info({ statePath }, "Updated seen state");

    const relevance: Record<Relevance, number> = { high: 0, medium: 0, low: 0 };
    for (const opp of sorted) relevance[opp.relevance]++;

    const result: RunResult = {
      total: sorted.length,
      sources,
      relevance,
      outputs: { html, csv, json },
      durationMs: Date.now() - startTime,
    };

    logger.info(result, "Run completed successfully");
    return result;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, "Run failed");
    throw error;
  }
}

export { loadConfig, parseConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export type { Opportunity } from "./transform/schema.js";
