import { z } from "zod";

/** One row of a structured index, whatever the publisher called its fields. */
export interface IndexRecord {
  country: string | null;
  score: number | null;
  status: string | null;
  confirmedCount: number | null;
  anomalyCount: number | null;
}

export type CountField = "confirmedCount" | "anomalyCount";

const ScoreBelowSchema = z.object({ kind: z.literal("score_below"), threshold: z.number() });
const ScoreAtLeastSchema = z.object({ kind: z.literal("score_at_least"), threshold: z.number() });
const StatusInSchema = z.object({
  kind: z.literal("status_in"),
  values: z.array(z.string().min(1)).min(1),
  match: z.enum(["exact", "contains"]).default("exact")
});
const CountAtLeastSchema = z.object({
  kind: z.literal("count_at_least"),
  field: z.enum(["confirmedCount", "anomalyCount"]),
  min: z.number().int().nonnegative()
});

type LeafRule =
  | z.infer<typeof ScoreBelowSchema>
  | z.infer<typeof ScoreAtLeastSchema>
  | z.infer<typeof StatusInSchema>
  | z.infer<typeof CountAtLeastSchema>;

export type InclusionRule = LeafRule | { kind: "any_of"; rules: InclusionRule[] };

type InclusionRuleInput =
  | z.input<typeof ScoreBelowSchema>
  | z.input<typeof ScoreAtLeastSchema>
  | z.input<typeof StatusInSchema>
  | z.input<typeof CountAtLeastSchema>
  | { kind: "any_of"; rules: InclusionRuleInput[] };

export const InclusionRuleSchema: z.ZodType<InclusionRule, z.ZodTypeDef, InclusionRuleInput> = z.lazy(() =>
  z.union([
    ScoreBelowSchema,
    ScoreAtLeastSchema,
    StatusInSchema,
    CountAtLeastSchema,
    z.object({ kind: z.literal("any_of"), rules: z.array(InclusionRuleSchema).min(1) })
  ])
);

export type RecordPredicate = (record: IndexRecord) => boolean;

/** Compiles a rule into one deterministic predicate. Missing fields never match. */
export function compileRule(rule: InclusionRule): RecordPredicate {
  switch (rule.kind) {
    case "score_below":
      return (record) => record.score !== null && record.score < rule.threshold;
    case "score_at_least":
      return (record) => record.score !== null && record.score >= rule.threshold;
    case "status_in": {
      const values = rule.values.map((value) => value.trim().toLowerCase());
      return (record) => {
        if (record.status === null) return false;
        const status = record.status.trim().toLowerCase();
        return rule.match === "contains"
          ? values.some((value) => status.includes(value))
          : values.includes(status);
      };
    }
    case "count_at_least":
      return (record) => {
        const count = record[rule.field];
        return count !== null && count >= rule.min;
      };
    case "any_of": {
      const predicates = rule.rules.map(compileRule);
      return (record) => predicates.some((predicate) => predicate(record));
    }
  }
}

const COUNTRY_KEYS = ["country", "name", "country_name", "en_country", "probe_cc", "country_code", "alpha_2"];
const SCORE_KEYS = ["score", "total", "global_score", "index"];
const STATUS_KEYS = ["status", "zone", "category", "situation"];
const RECORD_ARRAY_KEYS = ["countries", "data", "results", "rankings"];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstString(record: Record<string, unknown>, keys: string[]): string | null {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return null;
}

function firstNumber(record: Record<string, unknown>, keys: string[]): number | null {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "number" && Number.isFinite(value)) return value;
    if (typeof value === "string" && value.trim()) {
      const parsed = Number(value.replace(",", "."));
      if (Number.isFinite(parsed)) return parsed;
    }
  }
  return null;
}

export function toIndexRecord(raw: Record<string, unknown>): IndexRecord {
  return {
    country: firstString(raw, COUNTRY_KEYS),
    score: firstNumber(raw, SCORE_KEYS),
    status: firstString(raw, STATUS_KEYS),
    confirmedCount: firstNumber(raw, ["confirmed_count"]),
    anomalyCount: firstNumber(raw, ["anomaly_count"])
  };
}

/**
 * Pulls index rows out of a parsed JSON document: either a top-level array or
 * arrays under the usual wrapper keys. Returns null when the document has no
 * such shape.
 */
export function extractIndexRecords(document: unknown): IndexRecord[] | null {
  const arrays: unknown[][] = [];
  if (Array.isArray(document)) {
    arrays.push(document);
  } else if (isPlainObject(document)) {
    for (const key of RECORD_ARRAY_KEYS) {
      const value = document[key];
      if (Array.isArray(value)) arrays.push(value);
    }
  }
  if (!arrays.length) return null;

  return arrays.flatMap((items) => items.filter(isPlainObject).map(toIndexRecord));
}

export function parseJsonDocument(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return undefined;
  }
}
