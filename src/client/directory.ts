import { fetch } from "undici";
import type { Logger } from "../util/logger.js";
import type { DirectoryEntry } from "../transform/schema.js";

export type DirectoryStatus = "active" | "unverified";

export interface ProbedEntry {
  entry: DirectoryEntry;
  status: DirectoryStatus;
}

export interface ProbeOptions {
  timeoutMs: number;
  /** when false, entries are emitted as unverified without a request */
  probe?: boolean;
}

/**
 * HEAD the entry's URL. Any response below 400 is active; an error status,
 * timeout or network failure is unverified.
 */
export async function probeUrl(
  url: string,
  timeoutMs: number,
  logger: Logger
): Promise<DirectoryStatus> {
  try {
    const res = await fetch(url, {
      method: "HEAD",
      redirect: "follow",
      headers: { "User-Agent": "TransportOpportunityTracker/1.0" },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (res.status < 400) return "active";
    logger.debug({ url, status: res.status }, "Directory probe returned error status");
    return "unverified";
  } catch (error) {
    logger.debug(
      { url, error: error instanceof Error ? error.message : String(error) },
      "Directory probe failed"
    );
    return "unverified";
  }
}

export async function probeDirectory(
  entries: readonly DirectoryEntry[],
  options: ProbeOptions,
  logger: Logger
): Promise<ProbedEntry[]> {
  const results: ProbedEntry[] = [];
  for (const entry of entries) {
    const status =
      options.probe === false
        ? "unverified"
        : await probeUrl(entry.url, options.timeoutMs, logger);
    results.push({ entry, status });
  }

  const active = results.filter((r) => r.status === "active").length;
  logger.info({ entries: results.length, active }, "Checked directory entries");
  return results;
}
