import { readFile } from "node:fs/promises";
import { ManualEntry } from "../transform/schema.js";
import type { Logger } from "../util/logger.js";

/**
 * Read curated entries from a JSON array file. A missing or unreadable file
 * yields an empty list; invalid entries are skipped individually.
 */
export async function readManualEntries(
  filePath: string,
  logger: Logger
): Promise<ManualEntry[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, "utf-8"));
  } catch (error) {
    logger.warn(
      { filePath, error: error instanceof Error ? error.message : String(error) },
      "Could not load manual entries"
    );
    return [];
  }

  if (!Array.isArray(parsed)) {
    logger.warn({ filePath }, "Manual entries file is not a JSON array");
    return [];
  }

  const entries: ManualEntry[] = [];
  parsed.forEach((raw: unknown, index) => {
    const result = ManualEntry.safeParse(raw);
    if (result.success) {
      entries.push(result.data);
    } else {
      logger.warn({ index, error: result.error.message }, "Skipping invalid manual entry");
    }
  });

  logger.info({ count: entries.length }, "Loaded manual entries");
  return entries;
}
