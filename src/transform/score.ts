import type { Relevance } from "./schema.js";

function toAmount(value: unknown): number {
  const n = typeof value === "number" ? value : Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

/**
 * high: any direct keyword, or award at/above the threshold (either suffices)
 * medium: any service-type keyword
 * low: otherwise
 */
export function scoreRelevance(
  matchedDirect: readonly string[],
  matchedService: readonly string[],
  awardAmount: unknown,
  highValueThreshold: number
): Relevance {
  if (matchedDirect.length > 0) return "high";
  if (toAmount(awardAmount) >= highValueThreshold) return "high";
  if (matchedService.length > 0) return "medium";
  return "low";
}
