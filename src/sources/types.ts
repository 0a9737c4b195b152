export type ParseStatus = "success" | "fallback" | "no_data" | "error";

export interface RawSourceResult {
  readonly sourceName: string;
  readonly sourceUrl: string;
  readonly fetchedAt: string;
  readonly contentFingerprint: string;
  readonly rawTokens: readonly string[];
  readonly parseStatus: ParseStatus;
  readonly errorDetail?: string;
}

export interface SourceAdapter {
  name(): string;
  sourceUrl(): string;
  /**
   * Resolves with a result for every managed outcome, fallback and error
   * statuses included. Rejects only on unexpected failures.
   */
  scrape(signal: AbortSignal): Promise<RawSourceResult>;
}

export function freezeResult(result: RawSourceResult): RawSourceResult {
  return Object.freeze({ ...result, rawTokens: Object.freeze([...result.rawTokens]) });
}
