import path from "path";
import { promises as fs } from "fs";
import { resolveControllerSettings } from "../config/env";
import { ApplyError } from "../errors";
import { configureRegionBlocking, ConfigureResult } from "../device/configure";
import { ControllerRegionBlockingClient } from "../device/controllerClient";
import { RegionBlockingPort, TrafficDirection } from "../device/regionBlocking";
import { SerialRegionBlocking } from "../device/serial";
import { parseBlocklistText } from "../io/blocklistText";
import { createConsoleLogger, Logger } from "../log/logger";
import { HttpFetch, SourceFetcher } from "../sources/fetcher";
import { writeJson } from "../utils/fs";

export interface ConfigureCommandOptions {
  inputPath: string;
  inputUrl?: string;
  dryRun: boolean;
  enabled: boolean;
  outputPath?: string;
  host?: string;
  site?: string;
  blockAction: string;
  trafficDirection: TrafficDirection;
  verbose: boolean;
}

export interface ConfigureCommandDeps {
  port?: RegionBlockingPort;
  http?: HttpFetch;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export async function loadDesiredCodes(
  inputPath: string,
  inputUrl: string | undefined,
  http?: HttpFetch
): Promise<string[]> {
  if (inputUrl) {
    const fetcher = new SourceFetcher({ http, retries: 0 });
    const payload = await fetcher.fetch(inputUrl, new AbortController().signal);
    return parseBlocklistText(payload.body.toString("utf8"));
  }
  return parseBlocklistText(await fs.readFile(path.resolve(inputPath), "utf8"));
}

export function printResult(result: ConfigureResult, logger: Logger): void {
  logger.info(`\n${"=".repeat(40)}\nCONFIGURATION RESULT\n${"=".repeat(40)}`);
  logger.info(result.dry_run ? "Mode: DRY RUN (no changes applied)" : "Mode: APPLY");
  logger.info(`Changed: ${result.changed}`);
  if (result.changed) {
    logger.info(`Added: ${result.added_codes.length} codes`);
    logger.info(`Removed: ${result.removed_codes.length} codes`);
  }
  if (!result.dry_run && result.changed) {
    logger.info(`Verified: ${result.verified}`);
  }
  if (result.error) {
    logger.info(`Error: ${result.error}`);
  }
}

export async function runConfigure(
  options: ConfigureCommandOptions,
  deps: ConfigureCommandDeps = {}
): Promise<ConfigureResult> {
  const logger = deps.logger ?? createConsoleLogger({ verbose: options.verbose });

  const codes = await loadDesiredCodes(options.inputPath, options.inputUrl, deps.http);
  if (!codes.length) {
    throw new Error("no country codes loaded");
  }
  logger.info(`Loaded ${codes.length} country codes to apply`);
  logger.debug(`Codes: ${codes.join(", ")}`);
  if (options.dryRun) {
    logger.info("\n[DRY RUN MODE - No changes will be applied]");
  }

  const port =
    deps.port ??
    new ControllerRegionBlockingClient(
      resolveControllerSettings(deps.env ?? process.env, { host: options.host, site: options.site })
    );

  const result = await configureRegionBlocking(new SerialRegionBlocking(port), codes, {
    enabled: options.enabled,
    dryRun: options.dryRun,
    blockAction: options.blockAction,
    trafficDirection: options.trafficDirection,
    logger
  });

  printResult(result, logger);

  if (options.outputPath) {
    await writeJson(path.resolve(options.outputPath), result);
    logger.info(`\nResult saved to ${options.outputPath}`);
  }

  if (result.error) {
    throw new ApplyError(result.error);
  }
  return result;
}
