import path from "path";
import { loadRegistryConfig } from "../config/registry";
import { createConsoleLogger, Logger } from "../log/logger";

export interface SourcesOptions {
  registryPath: string;
}

export async function runListSources(options: SourcesOptions, logger: Logger = createConsoleLogger()): Promise<string[]> {
  const config = await loadRegistryConfig(path.resolve(options.registryPath));
  for (const source of config.sources) {
    logger.info(`${source.name} [${source.kind}] ${source.url}`);
  }
  return config.sources.map((source) => source.name);
}
