import path from "path";
import { promises as fs } from "fs";
import { loadRegistryConfig } from "../config/registry";
import { Canonicalizer } from "../countries/canonicalizer";
import { Logger, createConsoleLogger } from "../log/logger";
import { aggregate, AggregationReport, reportCodes } from "../pipeline/aggregate";
import { runFetchDetailed } from "../pipeline/orchestrator";
import { reconcile } from "../reconcile/reconcile";
import { buildRegistry } from "../sources/registry";
import { HttpFetch } from "../sources/fetcher";
import { parseBlocklistText, DEFAULT_BLOCKLIST_META } from "../io/blocklistText";
import { writeAggregationArtifacts } from "../io/reportDocument";
import { buildRunManifest, manifestSources, writeRunManifest } from "../io/runManifest";
import { RunManifestChanges } from "../types/runManifest";
import { pathExists } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";

export interface AggregateOptions {
  registryPath: string;
  outputTxt: string;
  outputJson: string;
  /** Source names to run; all registered sources when empty. */
  sources: string[];
  workers: number;
  deadlineMs: number;
  requestTimeoutMs: number;
  previousPath?: string;
  verbose: boolean;
}

export interface AggregateDeps {
  http?: HttpFetch;
  logger?: Logger;
  retryDelayMs?: number;
}

const RULE = "=".repeat(40);

export function printSummary(report: AggregationReport, logger: Logger): void {
  logger.info(`\n${RULE}\nAGGREGATION SUMMARY\n${RULE}`);
  logger.info(`Total unique country codes: ${report.totalCodes}\n`);

  logger.info("Source statistics:");
  for (const [name, stats] of Object.entries(report.perSourceStats)) {
    logger.info(
      `  - ${name}: ${stats.rawCount} raw -> ${stats.matchedCount} matched, ${stats.discardedCount} discarded (${stats.status})`
    );
  }

  const bySourceCount = new Map<number, string[]>();
  for (const country of report.countries) {
    const codes = bySourceCount.get(country.sources.length) ?? [];
    codes.push(country.code);
    bySourceCount.set(country.sources.length, codes);
  }
  logger.info("\nCountries by source count:");
  for (const count of Array.from(bySourceCount.keys()).sort((a, b) => b - a)) {
    logger.info(`  ${count} sources: ${(bySourceCount.get(count) ?? []).join(", ")}`);
  }

  if (report.errors.length) {
    logger.info("\nWarnings/Errors:");
    for (const line of report.errors) logger.info(`  - ${line}`);
  }
}

async function diffAgainstPrevious(
  previousPath: string,
  codes: string[],
  logger: Logger
): Promise<RunManifestChanges | null> {
  if (!(await pathExists(previousPath))) {
    logger.info(`No previous list at ${previousPath}; skipping change report`);
    return null;
  }
  const previous = parseBlocklistText(await fs.readFile(previousPath, "utf8"));
  const reconciliation = reconcile(previous, codes, true, true);
  if (reconciliation.changed) {
    logger.info(`\nChanges since previous list: +${reconciliation.added.length} -${reconciliation.removed.length}`);
    if (reconciliation.added.length) logger.info(`  Added: ${reconciliation.added.join(", ")}`);
    if (reconciliation.removed.length) logger.info(`  Removed: ${reconciliation.removed.join(", ")}`);
  } else {
    logger.info("\nNo changes since previous list");
  }
  return {
    previous_path: previousPath,
    added: [...reconciliation.added],
    removed: [...reconciliation.removed],
    changed: reconciliation.changed
  };
}

export async function runAggregate(options: AggregateOptions, deps: AggregateDeps = {}): Promise<AggregationReport> {
  const logger = deps.logger ?? createConsoleLogger({ verbose: options.verbose });
  const registryPath = path.resolve(options.registryPath);
  const outputTxt = path.resolve(options.outputTxt);
  const outputJson = path.resolve(options.outputJson);
  const startedAt = nowUtcIsoSeconds();

  // Fails fast on a broken catalog before any network traffic.
  const canonicalizer = new Canonicalizer();
  const config = await loadRegistryConfig(registryPath);
  const registry = buildRegistry(config, {
    http: deps.http,
    requestTimeoutMs: options.requestTimeoutMs,
    retryDelayMs: deps.retryDelayMs,
    logger
  });

  const selection = registry.select(options.sources.length ? options.sources : registry.names());
  for (const name of selection.unknown) {
    logger.warn(`Unknown source: ${name}`);
  }

  logger.info("Country Blocklist Aggregator");
  logger.info(RULE);
  logger.info(`Using ${selection.adapters.length} sources\n`);

  const outcome = await runFetchDetailed(selection.adapters, {
    concurrency: options.workers,
    deadlineMs: options.deadlineMs,
    logger
  });

  const report = aggregate(outcome.results, canonicalizer);
  for (const [name, stats] of Object.entries(report.perSourceStats)) {
    for (const token of stats.unmatchedTokens) {
      logger.debug(`[SKIP] ${name}: could not normalize "${token}"`);
    }
  }
  printSummary(report, logger);

  const codes = reportCodes(report);
  const changes = options.previousPath
    ? await diffAgainstPrevious(path.resolve(options.previousPath), codes, logger)
    : null;

  await writeAggregationArtifacts(
    report,
    { ...DEFAULT_BLOCKLIST_META, lastModified: report.timestamp },
    { txtPath: outputTxt, jsonPath: outputJson }
  );

  const manifestPath = await writeRunManifest(
    buildRunManifest({
      registryPath,
      outputTxt,
      outputJson,
      startedAt,
      endedAt: nowUtcIsoSeconds(),
      totalCodes: report.totalCodes,
      sources: manifestSources(outcome, selection.unknown),
      changes
    })
  );

  logger.info(`\nOutput written to:\n  - ${outputTxt}\n  - ${outputJson}\n  - ${manifestPath}`);
  return report;
}
