import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Opportunity } from "../transform/schema.js";

/**
 * Persisted format: one array of ids per source category plus `last_run`.
 *   { "sam_gov": ["..."], "manual": ["..."], "last_run": "2025-01-15T00:00:00.000Z" }
 */
const SeenFile = z
  .object({ last_run: z.string().nullable().optional() })
  .catchall(z.array(z.string()));

export interface SeenState {
  categories: Record<string, string[]>;
  lastRun: string | null;
}

/**
 * Flag each opportunity as new when its id is not in `seenIds`.
 * Returns new objects; neither input is mutated.
 */
export function markNew<T extends Pick<Opportunity, "id" | "isNew">>(
  opportunities: readonly T[],
  seenIds: ReadonlySet<string>
): T[] {
  return opportunities.map((opp) => ({ ...opp, isNew: !seenIds.has(opp.id) }));
}

/**
 * Previously seen ids per category. Sets only grow: `commit` unions the ids
 * staged by `mark` into them and writes the file atomically. Callers commit
 * only after the run's outputs have been written.
 */
export class SeenStore {
  private readonly filePath: string;
  private readonly seen = new Map<string, Set<string>>();
  private readonly staged = new Map<string, Set<string>>();
  private lastRunValue: string | null;

  private constructor(filePath: string, state: SeenState) {
    this.filePath = filePath;
    this.lastRunValue = state.lastRun;
    for (const [category, ids] of Object.entries(state.categories)) {
      this.seen.set(category, new Set(ids));
    }
  }

  /**
   * Load state from disk. A missing file is an empty state; an unreadable or
   * malformed one throws, since resetting it would re-flag everything as new.
   */
  static async load(filePath: string): Promise<SeenStore> {
    let text: string;
    try {
      text = await readFile(filePath, "utf-8");
    } catch (error) {
      if (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        error.code === "ENOENT"
      ) {
        return new SeenStore(filePath, { categories: {}, lastRun: null });
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new Error(
        `Seen state ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const result = SeenFile.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Seen state ${filePath} is malformed: ${result.error.message}`);
    }

    const { last_run: lastRun, ...categories } = result.data;
    return new SeenStore(filePath, { categories, lastRun: lastRun ?? null });
  }

  get lastRun(): string | null {
    return this.lastRunValue;
  }

  seenIds(category: string): ReadonlySet<string> {
    return this.seen.get(category) ?? new Set<string>();
  }

  /**
   * Flag opportunities against the category's committed ids and stage their
   * ids for the next commit.
   */
  mark<T extends Pick<Opportunity, "id" | "isNew">>(category: string, opportunities: readonly T[]): T[] {
    const flagged = markNew(opportunities, this.seenIds(category));
    const staged = this.staged.get(category) ?? new Set<string>();
    for (const opp of opportunities) staged.add(opp.id);
    this.staged.set(category, staged);
    return flagged;
  }

  snapshot(): SeenState {
    const categories: Record<string, string[]> = {};
    for (const [category, ids] of this.seen) {
      categories[category] = [...ids].sort();
    }
    return { categories, lastRun: this.lastRunValue };
  }

  /**
   * Union staged ids into the seen sets and persist. On write failure the
   * in-memory sets are left as they were.
   */
  async commit(runTime: Date = new Date()): Promise<void> {
    const next = new Map<string, Set<string>>();
    for (const [category, ids] of this.seen) next.set(category, new Set(ids));
    for (const [category, ids] of this.staged) {
      const merged = next.get(category) ?? new Set<string>();
      for (const id of ids) merged.add(id);
      next.set(category, merged);
    }

    const lastRun = runTime.toISOString();
    const data: Record<string, string[] | string> = {};
    for (const [category, ids] of next) data[category] = [...ids].sort();
    data.last_run = lastRun;

    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmpPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
    await rename(tmpPath, this.filePath);

    this.seen.clear();
    for (const [category, ids] of next) this.seen.set(category, ids);
    this.staged.clear();
    this.lastRunValue = lastRun;
  }
}
