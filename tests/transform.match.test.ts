import { containsExcluded, matchKeywords, mergeKeywords } from "../src/transform/match.js";

describe("matchKeywords", () => {
  it("returns keywords found case-insensitively, in list order", () => {
    const result = matchKeywords("Wheelchair van and NEMT trips", ["nemt", "fleet", "wheelchair"]);
    expect(result).toEqual(["nemt", "wheelchair"]);
  });

  it("returns each keyword at most once", () => {
    expect(matchKeywords("courier courier courier", ["courier", "courier"])).toEqual(["courier"]);
  });

  it("keeps the keyword as configured, not as found", () => {
    expect(matchKeywords("non-emergency medical transportation", ["NEMT", "Medical Transportation"])).toEqual([
      "Medical Transportation",
    ]);
  });

  it("returns nothing for empty text or an empty list", () => {
    expect(matchKeywords("", ["nemt"])).toEqual([]);
    expect(matchKeywords(undefined, ["nemt"])).toEqual([]);
    expect(matchKeywords("nemt", [])).toEqual([]);
  });
});

describe("containsExcluded", () => {
  it("is true when any exclude term appears", () => {
    expect(containsExcluded("Janitorial and shuttle services", ["JANITORIAL"])).toBe(true);
  });

  it("is false when no term appears", () => {
    expect(containsExcluded("Shuttle services", ["janitorial", "snow removal"])).toBe(false);
  });

  it("is false for empty text or an empty list", () => {
    expect(containsExcluded("", ["janitorial"])).toBe(false);
    expect(containsExcluded(null, ["janitorial"])).toBe(false);
    expect(containsExcluded("janitorial", [])).toBe(false);
  });
});

describe("mergeKeywords", () => {
  it("concatenates lists and drops later duplicates", () => {
    expect(mergeKeywords(["nemt", "fleet"], ["fleet", "driver"], ["nemt"])).toEqual([
      "nemt",
      "fleet",
      "driver",
    ]);
  });
});
