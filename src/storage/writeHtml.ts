import { renderReport, type RenderOptions } from "../report/renderHtml.js";
import type { Opportunity } from "../transform/schema.js";
import type { Logger } from "../util/logger.js";
import { writeOutputFile } from "./outputFile.js";

export const HTML_FILE_NAME = "index.html";

export function writeHtml(
  opportunities: readonly Opportunity[],
  outDir: string,
  options: RenderOptions,
  logger: Logger
): Promise<string> {
  return writeOutputFile(
    outDir,
    HTML_FILE_NAME,
    renderReport(opportunities, options),
    logger,
    opportunities.length
  );
}
