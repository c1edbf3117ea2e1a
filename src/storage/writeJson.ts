import type { Opportunity } from "../transform/schema.js";
import type { Logger } from "../util/logger.js";
import { writeOutputFile } from "./outputFile.js";

export const JSON_FILE_NAME = "opportunities.json";

export function renderJson(opportunities: readonly Opportunity[]): string {
  return `${JSON.stringify(opportunities, null, 2)}\n`;
}

/** Machine-readable copy of the report, same records and order. */
export function writeJson(
  opportunities: readonly Opportunity[],
  outDir: string,
  logger: Logger
): Promise<string> {
  return writeOutputFile(outDir, JSON_FILE_NAME, renderJson(opportunities), logger, opportunities.length);
}
