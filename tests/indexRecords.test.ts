import { describe, expect, it } from "vitest";
import {
  compileRule,
  extractIndexRecords,
  IndexRecord,
  InclusionRuleSchema,
  toIndexRecord
} from "../src/sources/indexRecords";

function record(partial: Partial<IndexRecord>): IndexRecord {
  return { country: "X", score: null, status: null, confirmedCount: null, anomalyCount: null, ...partial };
}

describe("index records", () => {
  it("reads publisher-specific field names", () => {
    expect(toIndexRecord({ en_country: "Eritrea", global_score: "83,5", situation: "Very serious" })).toEqual({
      country: "Eritrea",
      score: 83.5,
      status: "Very serious",
      confirmedCount: null,
      anomalyCount: null
    });
    expect(toIndexRecord({ probe_cc: "IR", confirmed_count: 40, anomaly_count: 450 })).toEqual({
      country: "IR",
      score: null,
      status: null,
      confirmedCount: 40,
      anomalyCount: 450
    });
  });

  it("finds rows in a bare array or under wrapper keys", () => {
    expect(extractIndexRecords([{ country: "A" }, 3, null])).toHaveLength(1);
    expect(extractIndexRecords({ data: [{ country: "A" }], rankings: [{ name: "B" }] })?.map((r) => r.country)).toEqual([
      "A",
      "B"
    ]);
    expect(extractIndexRecords({ meta: {} })).toBeNull();
    expect(extractIndexRecords("text")).toBeNull();
    expect(extractIndexRecords(undefined)).toBeNull();
  });
});

describe("inclusion rules", () => {
  it("compares scores and never matches a missing score", () => {
    const below = compileRule({ kind: "score_below", threshold: 40 });
    expect(below(record({ score: 39.9 }))).toBe(true);
    expect(below(record({ score: 40 }))).toBe(false);
    expect(below(record({ score: null }))).toBe(false);

    const atLeast = compileRule({ kind: "score_at_least", threshold: 55 });
    expect(atLeast(record({ score: 55 }))).toBe(true);
    expect(atLeast(record({ score: 54 }))).toBe(false);
  });

  it("tests status membership exactly or by substring", () => {
    const exact = compileRule(InclusionRuleSchema.parse({ kind: "status_in", values: ["Not Free", "NF"] }));
    expect(exact(record({ status: " not free " }))).toBe(true);
    expect(exact(record({ status: "nf" }))).toBe(true);
    expect(exact(record({ status: "partly free" }))).toBe(false);
    expect(exact(record({ status: null }))).toBe(false);

    const contains = compileRule(
      InclusionRuleSchema.parse({ kind: "status_in", values: ["very serious"], match: "contains" })
    );
    expect(contains(record({ status: "Very serious situation" }))).toBe(true);
  });

  it("combines rules with any_of", () => {
    const rule = InclusionRuleSchema.parse({
      kind: "any_of",
      rules: [
        { kind: "count_at_least", field: "confirmedCount", min: 100 },
        { kind: "count_at_least", field: "anomalyCount", min: 200 }
      ]
    });
    const predicate = compileRule(rule);
    expect(predicate(record({ confirmedCount: 100 }))).toBe(true);
    expect(predicate(record({ confirmedCount: 3, anomalyCount: 200 }))).toBe(true);
    expect(predicate(record({ confirmedCount: 99, anomalyCount: 199 }))).toBe(false);
  });

  it("rejects unknown rule kinds", () => {
    expect(InclusionRuleSchema.safeParse({ kind: "score_above", threshold: 1 }).success).toBe(false);
  });
});
