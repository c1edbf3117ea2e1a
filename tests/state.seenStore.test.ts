import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { SeenStore, markNew } from "../src/state/seenStore.js";
import { makeOpportunity } from "./fixtures/opportunities.js";

describe("markNew", () => {
  it("flags ids not in the seen set without mutating the input", () => {
    const input = [makeOpportunity({ id: "a" }), makeOpportunity({ id: "b" })];
    const flagged = markNew(input, new Set(["a"]));
    expect(flagged.map((o) => o.isNew)).toEqual([false, true]);
    expect(input.map((o) => o.isNew)).toEqual([false, false]);
  });

  it("gives the same flags when run twice with the same seen set", () => {
    const input = [makeOpportunity({ id: "a" }), makeOpportunity({ id: "b" })];
    const seen = new Set(["b"]);
    expect(markNew(markNew(input, seen), seen)).toEqual(markNew(input, seen));
  });
});

describe("SeenStore", () => {
  let dir: string;
  let statePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "seen-store-"));
    statePath = path.join(dir, "seen_opportunities.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the state file does not exist", async () => {
    const store = await SeenStore.load(statePath);
    expect(store.lastRun).toBeNull();
    expect(store.snapshot()).toEqual({ categories: {}, lastRun: null });
  });

  it("does not write anything until commit", async () => {
    const store = await SeenStore.load(statePath);
    const flagged = store.mark("sam_gov", [makeOpportunity({ id: "a" })]);
    expect(flagged[0].isNew).toBe(true);
    expect(existsSync(statePath)).toBe(false);
    expect(store.seenIds("sam_gov").size).toBe(0);
  });

  it("persists the union of seen ids with the run time", async () => {
    await writeFile(statePath, JSON.stringify({ sam_gov: ["z"], last_run: null }), "utf-8");
    const store = await SeenStore.load(statePath);
    store.mark("sam_gov", [makeOpportunity({ id: "b" }), makeOpportunity({ id: "a" })]);
    store.mark("manual", [makeOpportunity({ id: "m" })]);
    await store.commit(new Date("2025-01-15T12:00:00Z"));

    const written: unknown = JSON.parse(await readFile(statePath, "utf-8"));
    expect(written).toEqual({
      sam_gov: ["a", "b", "z"],
      manual: ["m"],
      last_run: "2025-01-15T12:00:00.000Z",
    });
    expect(store.lastRun).toBe("2025-01-15T12:00:00.000Z");
    expect(existsSync(`${statePath}.${process.pid}.tmp`)).toBe(false);
  });

  it("reports previously committed ids as not new on the next run", async () => {
    const first = await SeenStore.load(statePath);
    first.mark("sam_gov", [makeOpportunity({ id: "a" })]);
    await first.commit(new Date("2025-01-15T12:00:00Z"));

    const second = await SeenStore.load(statePath);
    const flagged = second.mark("sam_gov", [makeOpportunity({ id: "a" }), makeOpportunity({ id: "c" })]);
    expect(flagged.map((o) => [o.id, o.isNew])).toEqual([
      ["a", false],
      ["c", true],
    ]);
    expect(second.lastRun).toBe("2025-01-15T12:00:00.000Z");
  });

  it("tracks each category separately", async () => {
    const store = await SeenStore.load(statePath);
    store.mark("sam_gov", [makeOpportunity({ id: "shared" })]);
    await store.commit();
    expect(store.mark("manual", [makeOpportunity({ id: "shared" })])[0].isNew).toBe(true);
    expect(store.mark("sam_gov", [makeOpportunity({ id: "shared" })])[0].isNew).toBe(false);
  });

  it("refuses a state file that is not JSON", async () => {
    await writeFile(statePath, "{ not json", "utf-8");
    await expect(SeenStore.load(statePath)).rejects.toThrow(/is not valid JSON/);
  });

  it("refuses a state file with the wrong shape", async () => {
    await writeFile(statePath, JSON.stringify({ sam_gov: "abc" }), "utf-8");
    await expect(SeenStore.load(statePath)).rejects.toThrow(/is malformed/);
  });

  it("leaves memory untouched when the write fails", async () => {
    const nested = path.join(dir, "nested");
    const store = await SeenStore.load(path.join(nested, "state.json"));
    store.mark("sam_gov", [makeOpportunity({ id: "a" })]);
    await writeFile(nested, "", "utf-8");
    await expect(store.commit()).rejects.toThrow();
    expect(store.seenIds("sam_gov").size).toBe(0);
    expect(store.lastRun).toBeNull();
  });
});
