import { Logger, silentLogger } from "../log/logger";
import { SourceFetcher } from "./fetcher";
import { compileRule, extractIndexRecords, InclusionRule, parseJsonDocument, RecordPredicate } from "./indexRecords";
import { errorResult, fallbackResult, parsedResult, SourceIdentity } from "./results";
import { TextScanner } from "./textScan";
import { RawSourceResult, SourceAdapter } from "./types";

export interface IndexAdapterConfig {
  name: string;
  url: string;
  candidateUrls: readonly string[];
  rule: InclusionRule;
  fallback: readonly string[];
  fallbackOnEmpty: boolean;
}

export interface AdapterDeps {
  fetcher: SourceFetcher;
  textScanner: TextScanner;
  logger?: Logger;
}

/**
 * Press-freedom and censorship indices published as scored tables. Rows of
 * the JSON form are kept when the configured rule holds. A payload with no
 * rows to judge (an HTML page, an unexpected JSON shape) is scanned as free
 * text instead.
 */
export class IndexAdapter implements SourceAdapter {
  private readonly predicate: RecordPredicate;
  private readonly logger: Logger;

  constructor(
    private readonly config: IndexAdapterConfig,
    private readonly deps: AdapterDeps
  ) {
    this.predicate = compileRule(config.rule);
    this.logger = deps.logger ?? silentLogger;
  }

  name(): string {
    return this.config.name;
  }

  sourceUrl(): string {
    return this.config.url;
  }

  private identity(): SourceIdentity {
    return { name: this.config.name, url: this.config.url };
  }

  async scrape(signal: AbortSignal): Promise<RawSourceResult> {
    const fetched = await this.deps.fetcher.fetchFirst(this.config.candidateUrls, signal);
    if (!fetched.ok) {
      if (signal.aborted) {
        return errorResult(this.identity(), "aborted before any location answered");
      }
      this.logger.warn(`${this.config.name}: all locations failed, using fallback (${fetched.failures.join("; ")})`);
      return fallbackResult(this.identity(), this.config.fallback, "all locations failed");
    }

    const { payload } = fetched;
    const content = payload.body.toString("utf8");

    const structured = this.extractStructured(content);
    if (structured !== null) {
      return structured.length
        ? parsedResult(this.identity(), payload, structured, "success")
        : parsedResult(this.identity(), payload, [], "no_data");
    }

    const scanned = this.deps.textScanner.scan(content);
    if (scanned.length) {
      this.logger.debug(`${this.config.name}: no structured rows, free-text scan found ${scanned.length}`);
      return parsedResult(this.identity(), payload, scanned, "success");
    }

    if (this.config.fallbackOnEmpty) {
      return fallbackResult(this.identity(), this.config.fallback, `no countries found at ${payload.url}`);
    }
    return parsedResult(this.identity(), payload, [], "no_data");
  }

  /** Countries kept by the rule, or null when the payload has no index rows to judge. */
  extractStructured(content: string): string[] | null {
    const records = extractIndexRecords(parseJsonDocument(content));
    if (!records || !records.length) return null;
    const countries: string[] = [];
    for (const record of records) {
      if (record.country !== null && this.predicate(record)) {
        countries.push(record.country);
      }
    }
    return countries;
  }
}
