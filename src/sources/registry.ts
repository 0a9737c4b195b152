import { SourceRegistryConfig, SourceConfig } from "../config/sourceRegistry";
import { Logger } from "../log/logger";
import { defaultTextScanNames } from "../countries/catalog";
import { HttpFetch, SourceFetcher } from "./fetcher";
import { AdapterDeps, IndexAdapter } from "./indexAdapter";
import { TextListAdapter } from "./textListAdapter";
import { createTextScanner } from "./textScan";
import { SourceAdapter } from "./types";

/**
 * Adapters keyed by name. Registering a second adapter under an existing name
 * replaces the first.
 */
export class SourceRegistry {
  private readonly adapters = new Map<string, SourceAdapter>();

  register(adapter: SourceAdapter): void {
    this.adapters.set(adapter.name(), adapter);
  }

  get(name: string): SourceAdapter | undefined {
    return this.adapters.get(name);
  }

  all(): SourceAdapter[] {
    return Array.from(this.adapters.values());
  }

  names(): string[] {
    return Array.from(this.adapters.keys());
  }

  select(names: readonly string[]): { adapters: SourceAdapter[]; unknown: string[] } {
    const adapters: SourceAdapter[] = [];
    const unknown: string[] = [];
    for (const name of names) {
      const adapter = this.adapters.get(name);
      if (adapter) adapters.push(adapter);
      else unknown.push(name);
    }
    return { adapters, unknown };
  }
}

export interface BuildRegistryOptions {
  http?: HttpFetch;
  requestTimeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  textScanNames?: readonly string[];
  logger?: Logger;
}

export function createAdapter(source: SourceConfig, deps: AdapterDeps): SourceAdapter {
  const common = {
    name: source.name,
    url: source.url,
    candidateUrls: Object.freeze([...(source.candidate_urls ?? [source.url])]),
    fallback: Object.freeze([...source.fallback]),
    fallbackOnEmpty: source.fallback_on_empty
  };
  switch (source.kind) {
    case "index":
      return new IndexAdapter({ ...common, rule: source.rule }, deps);
    case "text_list":
      return new TextListAdapter(common, deps);
  }
}

export function buildRegistry(config: SourceRegistryConfig, options: BuildRegistryOptions = {}): SourceRegistry {
  const deps: AdapterDeps = {
    fetcher: new SourceFetcher({
      http: options.http,
      userAgent: config.user_agent,
      requestTimeoutMs: options.requestTimeoutMs,
      retries: options.retries,
      retryDelayMs: options.retryDelayMs,
      logger: options.logger
    }),
    textScanner: createTextScanner(options.textScanNames ?? defaultTextScanNames()),
    logger: options.logger
  };

  const registry = new SourceRegistry();
  for (const source of config.sources) {
    registry.register(createAdapter(source, deps));
  }
  return registry;
}
