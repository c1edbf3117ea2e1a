import { createHash } from "node:crypto";

/**
 * Deterministic identifier for records without a native ID,
 * e.g. `stableId("indeed", link)` -> "indeed-3f2a...".
 */
export function stableId(prefix: string, naturalKey: string): string {
  const digest = createHash("sha256").update(naturalKey.trim()).digest("hex");
  return `${prefix}-${digest.slice(0, 16)}`;
}
