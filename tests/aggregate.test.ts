import { describe, expect, it } from "vitest";
import { Canonicalizer, NormalizeResult } from "../src/countries/canonicalizer";
import { InvariantViolationError } from "../src/errors";
import { aggregate, reportCodes } from "../src/pipeline/aggregate";
import { ParseStatus, RawSourceResult } from "../src/sources/types";

const canonicalizer = new Canonicalizer();
const fixedNow = () => "2026-03-01T12:00:00Z";

function result(
  sourceName: string,
  rawTokens: string[],
  parseStatus: ParseStatus = "success",
  errorDetail?: string
): RawSourceResult {
  return {
    sourceName,
    sourceUrl: `https://${sourceName.toLowerCase()}.test/`,
    fetchedAt: "2026-03-01T11:59:00Z",
    contentFingerprint: "fp",
    rawTokens,
    parseStatus,
    errorDetail
  };
}

describe("aggregate", () => {
  it("merges tokens from several sources into one entry per code", () => {
    const report = aggregate(
      [
        result("A", ["United States", "Russia", "Atlantis"]),
        result("B", ["USA", "russian federation", "US"])
      ],
      canonicalizer,
      { now: fixedNow }
    );

    expect(report.timestamp).toBe("2026-03-01T12:00:00Z");
    expect(report.totalCodes).toBe(2);
    expect(report.countries).toEqual([
      { code: "RU", displayName: "Russia", sources: ["A", "B"], rawTokens: ["Russia", "russian federation"] },
      { code: "US", displayName: "United States", sources: ["A", "B"], rawTokens: ["United States", "USA", "US"] }
    ]);
    expect(report.perSourceStats.A).toEqual({
      url: "https://a.test/",
      fetchedAt: "2026-03-01T11:59:00Z",
      status: "success",
      rawCount: 3,
      matchedCount: 2,
      discardedCount: 1,
      unmatchedTokens: ["Atlantis"],
      error: null
    });
    expect(report.perSourceStats.B.matchedCount).toBe(3);
    expect(report.errors).toEqual([]);
  });

  it("lists a source once per entry even when it names a country twice", () => {
    const report = aggregate([result("A", ["Burma", "Myanmar"])], canonicalizer, { now: fixedNow });

    expect(report.countries).toEqual([
      { code: "MM", displayName: "Myanmar", sources: ["A"], rawTokens: ["Burma", "Myanmar"] }
    ]);
  });

  it("does not depend on the order results arrive in", () => {
    const first = result("Index", ["Iran", "Cuba"]);
    const second = result("Sanctions", ["Cuba", "Syria"]);

    const forward = aggregate([first, second], canonicalizer, { now: fixedNow });
    const backward = aggregate([second, first], canonicalizer, { now: fixedNow });

    expect(backward).toEqual(forward);
    expect(reportCodes(forward)).toEqual(["CU", "IR", "SY"]);
    expect(forward.countries[0].sources).toEqual(["Index", "Sanctions"]);
  });

  it("records one error line for every source that did not succeed", () => {
    const report = aggregate(
      [
        result("Broken", [], "error", "boom"),
        result("Stale", ["Cuba"], "fallback"),
        result("Quiet", [], "no_data"),
        result("Odd", [], "success", "partial read")
      ],
      canonicalizer,
      { now: fixedNow }
    );

    expect(report.errors).toEqual(["Broken: error: boom", "Odd: error: partial read", "Quiet: no_data", "Stale: fallback"]);
    expect(report.perSourceStats.Odd.status).toBe("error");
    expect(report.perSourceStats.Broken.error).toBe("boom");
    expect(reportCodes(report)).toEqual(["CU"]);
  });

  it("produces an empty report from no results", () => {
    expect(aggregate([], canonicalizer, { now: fixedNow })).toEqual({
      timestamp: "2026-03-01T12:00:00Z",
      totalCodes: 0,
      countries: [],
      perSourceStats: {},
      errors: []
    });
  });

  it("treats a code outside the catalog as a broken invariant", () => {
    class LyingCanonicalizer extends Canonicalizer {
      normalize(): NormalizeResult {
        return { found: true, code: "ZZ" };
      }
    }

    expect(() => aggregate([result("A", ["Anything"])], new LyingCanonicalizer())).toThrow(InvariantViolationError);
  });
});
