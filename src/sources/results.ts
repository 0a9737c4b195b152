import { nowUtcIsoSeconds } from "../utils/time";
import { fingerprintTokens } from "../utils/hash";
import { freezeResult, ParseStatus, RawSourceResult } from "./types";

export interface SourceIdentity {
  name: string;
  url: string;
}

export function parsedResult(
  source: SourceIdentity,
  fetched: { url: string; fingerprint: string },
  tokens: string[],
  status: Extract<ParseStatus, "success" | "no_data">
): RawSourceResult {
  return freezeResult({
    sourceName: source.name,
    sourceUrl: fetched.url,
    fetchedAt: nowUtcIsoSeconds(),
    contentFingerprint: fetched.fingerprint,
    rawTokens: tokens,
    parseStatus: status
  });
}

/**
 * Last-known-good list standing in for a source that could not be read. When
 * there is nothing to stand in with, the result is an error with no tokens.
 */
export function fallbackResult(
  source: SourceIdentity,
  fallback: readonly string[],
  reason: string
): RawSourceResult {
  if (!fallback.length) {
    return errorResult(source, `${reason}; no fallback list configured`);
  }
  return freezeResult({
    sourceName: source.name,
    sourceUrl: source.url,
    fetchedAt: nowUtcIsoSeconds(),
    contentFingerprint: fingerprintTokens(fallback),
    rawTokens: [...fallback],
    parseStatus: "fallback"
  });
}

export function errorResult(source: SourceIdentity, detail: string): RawSourceResult {
  return freezeResult({
    sourceName: source.name,
    sourceUrl: source.url,
    fetchedAt: nowUtcIsoSeconds(),
    contentFingerprint: fingerprintTokens([]),
    rawTokens: [],
    parseStatus: "error",
    errorDetail: detail
  });
}
