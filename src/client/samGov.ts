import { fetch } from "undici";
import type { Logger } from "../util/logger.js";
import type { SamSettings } from "../config.js";
import { Pacer } from "../util/pacer.js";
import { daysBefore, toUsDate } from "../util/time.js";
import {
  SamSearchResponse,
  decodeSamOpportunity,
  type SamOpportunity,
} from "../transform/samRecord.js";

export interface SamGovQuery {
  naicsCode: string;
  offset: number;
  limit: number;
  postedFrom: string; // MM/DD/YYYY
  postedTo: string; // MM/DD/YYYY
}

export interface SamGovClientOptions {
  timeoutMs: number;
  minIntervalMs?: number;
  now?: () => Date;
}

const USER_AGENT = "TransportOpportunityTracker/1.0";

export class SamGovClient {
  private readonly settings: SamSettings;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly pacer: Pacer;
  private readonly now: () => Date;

  constructor(settings: SamSettings, logger: Logger, options: SamGovClientOptions) {
    this.settings = settings;
    this.logger = logger;
    this.timeoutMs = options.timeoutMs;
    this.pacer = new Pacer({ minIntervalMs: options.minIntervalMs ?? 250, logger });
    this.now = options.now ?? (() => new Date());
  }

  get enabled(): boolean {
    return Boolean(this.settings.apiKey);
  }

  /**
   * Build the search URL. States are repeated `state=` parameters.
   */
  buildUrl(query: SamGovQuery): string {
    const params = new URLSearchParams({
      api_key: this.settings.apiKey ?? "",
      postedFrom: query.postedFrom,
      postedTo: query.postedTo,
      ncode: query.naicsCode,
      limit: String(query.limit),
      offset: String(query.offset),
      ptype: "o,p,k",
    });
    for (const state of this.settings.states) {
      params.append("state", state);
    }
    return `${this.settings.baseUrl}?${params.toString()}`;
  }

  /**
   * Fetch a single page of results.
   */
  async fetchPage(query: SamGovQuery): Promise<SamSearchResponse> {
    await this.pacer.wait();

    const url = this.buildUrl(query);
    this.logger.debug(
      { naicsCode: query.naicsCode, offset: query.offset },
      "Fetching SAM.gov page"
    );

    const res = await fetch(url, {
      headers: { "User-Agent": USER_AGENT, Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      throw new Error(`HTTP ${res.status}: ${res.statusText}`);
    }

    const text = await res.text();
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new Error(
        `Failed to parse JSON response: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return SamSearchResponse.parse(parsed);
  }

  /**
   * Fetch every page for every configured NAICS code, deduplicated by noticeId.
   * A missing API key disables the source; a failed page ends that code's
   * pagination and keeps what was fetched so far.
   */
  async fetchAll(): Promise<SamOpportunity[]> {
    if (!this.enabled) {
      this.logger.warn("No SAM.gov API key configured; skipping SAM.gov fetch");
      return [];
    }

    const now = this.now();
    const postedFrom = toUsDate(daysBefore(now, this.settings.daysBack));
    const postedTo = toUsDate(now);
    const limit = this.settings.pageSize;

    const seenIds = new Set<string>();
    const results: SamOpportunity[] = [];

    for (const naicsCode of this.settings.naicsCodes) {
      let offset = 0;

      for (let page = 0; page < this.settings.maxPages; page++) {
        let response: SamSearchResponse;
        try {
          response = await this.fetchPage({ naicsCode, offset, limit, postedFrom, postedTo });
        } catch (error) {
          this.logger.error(
            { naicsCode, offset, error: error instanceof Error ? error.message : String(error) },
            "SAM.gov request failed"
          );
          break;
        }

        const hits = response.opportunitiesData;
        if (hits.length === 0) break;

        for (const hit of hits) {
          const opp = decodeSamOpportunity(hit);
          if (opp.noticeId && !seenIds.has(opp.noticeId)) {
            seenIds.add(opp.noticeId);
            results.push(opp);
          }
        }

        offset += limit;
        if (offset >= response.totalRecords) break;
      }

      this.logger.info(
        { naicsCode, uniqueSoFar: results.length },
        "Fetched SAM.gov NAICS code"
      );
    }

    return results;
  }
}
