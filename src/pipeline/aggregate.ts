import { Canonicalizer } from "../countries/canonicalizer";
import { InvariantViolationError } from "../errors";
import { ParseStatus, RawSourceResult } from "../sources/types";
import { nowUtcIsoSeconds } from "../utils/time";

export interface CountryEntry {
  code: string;
  displayName: string;
  sources: string[];
  rawTokens: string[];
}

export interface SourceStats {
  url: string;
  fetchedAt: string;
  status: ParseStatus;
  rawCount: number;
  matchedCount: number;
  discardedCount: number;
  unmatchedTokens: string[];
  error: string | null;
}

export interface AggregationReport {
  timestamp: string;
  totalCodes: number;
  countries: CountryEntry[];
  perSourceStats: Record<string, SourceStats>;
  errors: string[];
}

export interface AggregateOptions {
  now?: () => string;
}

function errorLine(sourceName: string, status: ParseStatus, detail: string | undefined): string {
  return detail ? `${sourceName}: ${status}: ${detail}` : `${sourceName}: ${status}`;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Folds per-source results into one entry per canonical code. Tokens the
 * canonicalizer does not know are counted and listed per source, never
 * guessed. Results are folded in source-name order so the report does not
 * depend on the order fetches finished in.
 */
export function aggregate(
  results: readonly RawSourceResult[],
  canonicalizer: Canonicalizer,
  options: AggregateOptions = {}
): AggregationReport {
  const entries = new Map<string, CountryEntry>();
  const perSourceStats: Record<string, SourceStats> = {};
  const errors: string[] = [];

  const ordered = [...results].sort((a, b) => compareText(a.sourceName, b.sourceName));

  for (const result of ordered) {
    let matched = 0;
    const unmatched: string[] = [];

    for (const raw of result.rawTokens) {
      const normalized = canonicalizer.normalize(raw);
      if (!normalized.found) {
        unmatched.push(raw);
        continue;
      }
      if (!canonicalizer.isValidCode(normalized.code)) {
        throw new InvariantViolationError(
          `Canonicalizer mapped "${raw}" to ${normalized.code}, which is not a catalog code`
        );
      }
      matched++;

      const entry = entries.get(normalized.code);
      if (entry) {
        if (!entry.sources.includes(result.sourceName)) {
          entry.sources.push(result.sourceName);
        }
        entry.rawTokens.push(raw);
      } else {
        entries.set(normalized.code, {
          code: normalized.code,
          displayName: canonicalizer.displayName(normalized.code),
          sources: [result.sourceName],
          rawTokens: [raw]
        });
      }
    }

    const status: ParseStatus = result.errorDetail ? "error" : result.parseStatus;
    perSourceStats[result.sourceName] = {
      url: result.sourceUrl,
      fetchedAt: result.fetchedAt,
      status,
      rawCount: result.rawTokens.length,
      matchedCount: matched,
      discardedCount: unmatched.length,
      unmatchedTokens: unmatched,
      error: result.errorDetail ?? null
    };

    if (status !== "success") {
      errors.push(errorLine(result.sourceName, status, result.errorDetail));
    }
  }

  const countries = Array.from(entries.values()).sort((a, b) => compareText(a.code, b.code));

  return {
    timestamp: (options.now ?? nowUtcIsoSeconds)(),
    totalCodes: countries.length,
    countries,
    perSourceStats,
    errors
  };
}

export function reportCodes(report: AggregationReport): string[] {
  return report.countries.map((country) => country.code);
}
