import { fetch } from "undici";
import Parser from "rss-parser";
import * as cheerio from "cheerio";
import type { Logger } from "../util/logger.js";
import { Pacer } from "../util/pacer.js";
import { containsExcluded, matchKeywords } from "../transform/match.js";

export type FeedCategory = "indeed" | "craigslist";

export interface FeedItem {
  title: string;
  link: string;
  description: string;
  pubDate: string;
  author: string;
  feedUrl: string;
}

export interface FeedClientOptions {
  category: FeedCategory;
  keywords: string[];
  excludeKeywords: string[];
  delayMs: number;
  timeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const USER_AGENT = "Mozilla/5.0 (compatible; TransportOpportunityTracker/1.0)";

/**
 * Strip markup from an HTML fragment and collapse whitespace.
 */
export function stripMarkup(html: string | undefined): string {
  if (!html) return "";
  const text = cheerio.load(html).root().text();
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Some feeds redirect to a web page when throttled; only parse bodies that
 * look like RSS or Atom.
 */
export function looksLikeFeed(body: string): boolean {
  const head = body.trimStart().slice(0, 512).toLowerCase();
  return head.startsWith("<?xml") || head.includes("<rss") || head.includes("<feed");
}

/**
 * Fetches syndicated job feeds, keeping only items that match at least one
 * keyword and no exclude keyword. Items are deduplicated by link per run.
 */
export class FeedClient {
  private readonly options: FeedClientOptions;
  private readonly logger: Logger;
  private readonly parser = new Parser<Record<string, unknown>, Record<string, unknown>>();
  private readonly pacer: Pacer;

  constructor(options: FeedClientOptions, logger: Logger) {
    this.options = options;
    this.logger = logger.child({ feed: options.category });
    this.pacer = new Pacer({
      minIntervalMs: options.delayMs,
      logger: this.logger,
      sleep: options.sleep,
    });
  }

  async fetchFeed(url: string): Promise<FeedItem[]> {
    await this.pacer.wait();

    const res = await fetch(url, {
      headers: {
        "User-Agent": USER_AGENT,
        Accept: "application/rss+xml, application/xml, text/xml, */*",
      },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!res.ok) {
      throw new Error(`HTTP ${res.status}: ${res.statusText}`);
    }

    const body = await res.text();
    const contentType = res.headers.get("content-type") ?? "";
    if (!looksLikeFeed(body)) {
      throw new Error(`Response is not a feed (content-type: ${contentType || "unknown"})`);
    }

    const feed = await this.parser.parseString(body);
    return (feed.items ?? []).map((item) => ({
      title: (item.title ?? "").trim(),
      link: (item.link ?? "").trim(),
      description: stripMarkup(item.content ?? item.contentSnippet ?? item.summary),
      pubDate: item.isoDate ?? item.pubDate ?? "",
      author: (item.creator ?? "").trim(),
      feedUrl: url,
    }));
  }

  async fetchAll(urls: readonly string[]): Promise<FeedItem[]> {
    const seenLinks = new Set<string>();
    const kept: FeedItem[] = [];

    for (const url of urls) {
      let items: FeedItem[];
      try {
        items = await this.fetchFeed(url);
      } catch (error) {
        this.logger.warn(
          { url, error: error instanceof Error ? error.message : String(error) },
          "Skipping feed"
        );
        continue;
      }

      let matched = 0;
      for (const item of items) {
        if (!item.link || seenLinks.has(item.link)) continue;

        const text = `${item.title} ${item.description}`;
        if (containsExcluded(text, this.options.excludeKeywords)) continue;
        if (matchKeywords(text, this.options.keywords).length === 0) continue;

        seenLinks.add(item.link);
        kept.push(item);
        matched++;
      }

      this.logger.debug({ url, items: items.length, matched }, "Parsed feed");
    }

    this.logger.info({ feeds: urls.length, kept: kept.length }, "Fetched feeds");
    return kept;
  }
}
