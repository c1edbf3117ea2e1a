import { config } from "dotenv";
import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { DirectoryEntry } from "./transform/schema.js";
import type { MatchSettings } from "./transform/mapOpportunity.js";

// Load .env from the working directory
config({ path: path.join(process.cwd(), ".env") });

const keywordList = z.array(z.string().min(1)).default([]);
const urlList = z.array(z.string().url()).default([]);

/**
 * On-disk configuration file (snake_case keys).
 */
export const ConfigFile = z.object({
  sam_api_key: z.string().default(""),
  sam_api_base_url: z
    .string()
    .url()
    .default("https://api.sam.gov/opportunities/v2/search"),
  region_name: z.string().min(1).default("Massachusetts"),
  states: z.array(z.string().length(2)).min(1).default(["MA"]),
  search_days_back: z.number().int().positive().default(365),
  naics_codes: z.array(z.string().min(1)).default([]),
  sam_page_size: z.number().int().min(1).max(1000).default(25),
  sam_max_pages: z.number().int().positive().default(40),
  direct_transport_keywords: keywordList,
  service_type_keywords: keywordList,
  private_sector_keywords: keywordList,
  exclude_keywords: keywordList,
  auto_high_value: z.number().positive().default(500000),
  indeed_rss_feeds: urlList,
  craigslist_rss_feeds: urlList,
  feed_delay_ms: z.number().int().nonnegative().default(2000),
  request_timeout_ms: z.number().int().positive().default(30000),
  directory: z.array(DirectoryEntry).default([]),
  portal_search_url: z.string().url().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFile>;

export interface SamSettings {
  apiKey?: string;
  baseUrl: string;
  states: string[];
  naicsCodes: string[];
  daysBack: number;
  pageSize: number;
  maxPages: number;
}

export interface AppConfig {
  sam: SamSettings;
  matching: MatchSettings;
  feeds: {
    indeed: string[];
    craigslist: string[];
    delayMs: number;
  };
  directory: DirectoryEntry[];
  requestTimeoutMs: number;
  portalSearchUrl?: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate a parsed configuration object and map it to AppConfig.
 * `SAM_API_KEY` in the environment takes precedence over the file's key.
 */
export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const result = ConfigFile.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  const file = result.data;
  const apiKey = env.SAM_API_KEY || file.sam_api_key;

  return {
    sam: {
      apiKey: apiKey || undefined,
      baseUrl: file.sam_api_base_url,
      states: file.states,
      naicsCodes: file.naics_codes,
      daysBack: file.search_days_back,
      pageSize: file.sam_page_size,
      maxPages: file.sam_max_pages,
    },
    matching: {
      directKeywords: file.direct_transport_keywords,
      serviceKeywords: file.service_type_keywords,
      privateSectorKeywords: file.private_sector_keywords,
      excludeKeywords: file.exclude_keywords,
      highValueThreshold: file.auto_high_value,
      regionName: file.region_name,
    },
    feeds: {
      indeed: file.indeed_rss_feeds,
      craigslist: file.craigslist_rss_feeds,
      delayMs: file.feed_delay_ms,
    },
    directory: file.directory,
    requestTimeoutMs: file.request_timeout_ms,
    portalSearchUrl: file.portal_search_url,
  };
}

/**
 * Load and validate configuration from a JSON file.
 * Fails fast if the file is missing or invalid.
 */
export function loadConfig(configPath?: string): AppConfig {
  const filePath = path.resolve(configPath || process.env.TRACKER_CONFIG || "config.json");

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read configuration file ${filePath}: ${message}`);
  }

  return parseConfig(raw);
}
