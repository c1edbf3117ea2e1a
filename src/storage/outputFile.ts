import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../util/logger.js";

/**
 * Write one report artifact into `outDir`, creating the directory as needed.
 * Returns the written path.
 */
export async function writeOutputFile(
  outDir: string,
  fileName: string,
  contents: string,
  logger: Logger,
  count: number
): Promise<string> {
  await mkdir(outDir, { recursive: true });

  const filePath = path.join(outDir, fileName);
  await writeFile(filePath, contents, "utf-8");

  logger.info({ filePath, count }, "Wrote output file");
  return filePath;
}
