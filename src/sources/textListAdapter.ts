import { Logger, silentLogger } from "../log/logger";
import { AdapterDeps } from "./indexAdapter";
import { errorResult, fallbackResult, parsedResult, SourceIdentity } from "./results";
import { RawSourceResult, SourceAdapter } from "./types";

export interface TextListAdapterConfig {
  name: string;
  url: string;
  candidateUrls: readonly string[];
  fallback: readonly string[];
  fallbackOnEmpty: boolean;
}

/** Sanctions and grey lists: pages naming countries in prose, scanned as text. */
export class TextListAdapter implements SourceAdapter {
  private readonly logger: Logger;

  constructor(
    private readonly config: TextListAdapterConfig,
    private readonly deps: AdapterDeps
  ) {
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
    const countries = this.deps.textScanner.scan(payload.body.toString("utf8"));
    if (countries.length) {
      return parsedResult(this.identity(), payload, countries, "success");
    }
    if (this.config.fallbackOnEmpty) {
      this.logger.debug(`${this.config.name}: no countries in ${payload.url}, using fallback`);
      return fallbackResult(this.identity(), this.config.fallback, `no countries found at ${payload.url}`);
    }
    return parsedResult(this.identity(), payload, [], "no_data");
  }
}
