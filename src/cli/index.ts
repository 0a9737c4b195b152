#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { Command } from "commander";
import pkg from "../../package.json";
import { runAggregate } from "../commands/aggregate";
import { runConfigure } from "../commands/configure";
import { runListSources } from "../commands/sources";
import { defaultRegistryPath } from "../config/registry";
import { projectRoot } from "../io/paths";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.BLOCKLIST_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return n;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const defaultEnvPath = path.join(projectRoot(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const AggregateCliSchema = z.object({
  registry: z.string(),
  outputTxt: z.string(),
  outputJson: z.string(),
  sources: z.array(z.string()),
  workers: z.number().int().positive(),
  timeout: z.number().int().positive(),
  requestTimeout: z.number().int().positive(),
  previous: z.string().optional(),
  verbose: z.boolean()
});

const ConfigureCliSchema = z.object({
  input: z.string(),
  inputUrl: z.string().url().optional(),
  dryRun: z.boolean(),
  enable: z.boolean(),
  output: z.string().optional(),
  host: z.string().url().optional(),
  site: z.string().optional(),
  blockAction: z.string(),
  direction: z.enum(["both", "inbound", "outbound"]),
  verbose: z.boolean()
});

const SourcesCliSchema = z.object({ registry: z.string() });

const program = new Command();

program
  .name("blocklist")
  .description("Country block list aggregator and region blocking reconciler")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides BLOCKLIST_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("aggregate")
  .description("Fetch every source, normalize and merge into one country list")
  .option("--registry <path>", "Path to sources.json", defaultRegistryPath())
  .option("--output-txt <path>", "Output text file (one code per line)", "data/out/blocked_countries.txt")
  .option("--output-json <path>", "Output JSON file with provenance", "data/out/blocked_countries.json")
  .option("--sources <names>", "Comma-separated source names (default: all)", splitList, [])
  .option("--workers <n>", "Number of concurrent workers", parsePositiveInt, 4)
  .option("--timeout <seconds>", "Deadline for the whole fetch stage", parsePositiveInt, 60)
  .option("--request-timeout <seconds>", "Timeout for each request", parsePositiveInt, 20)
  .option("--previous <path>", "Previous text list to report changes against")
  .option("--verbose", "Enable verbose output", false)
  .action(async (raw: unknown) => {
    const opts = AggregateCliSchema.parse(raw);
    await runAggregate({
      registryPath: opts.registry,
      outputTxt: opts.outputTxt,
      outputJson: opts.outputJson,
      sources: opts.sources,
      workers: opts.workers,
      deadlineMs: opts.timeout * 1000,
      requestTimeoutMs: opts.requestTimeout * 1000,
      previousPath: opts.previous,
      verbose: opts.verbose
    });
  });

program
  .command("configure")
  .description("Apply a country list to the controller's region blocking setting")
  .option("--input <path>", "Input file with country codes", "data/out/blocked_countries.txt")
  .option("--input-url <url>", "URL to fetch country codes from (overrides --input)")
  .option("--dry-run", "Show what would change without applying", false)
  .option("--no-enable", "Disable region blocking instead of enabling it")
  .option("--output <path>", "Write the result to a JSON file")
  .option("--host <url>", "Controller URL (overrides UNIFI_HOST)")
  .option("--site <name>", "Controller site (overrides UNIFI_SITE)")
  .option("--block-action <action>", "Block action written to the setting", "block")
  .option("--direction <direction>", "Traffic direction: both, inbound or outbound", "both")
  .option("--verbose", "Enable verbose output", false)
  .action(async (raw: unknown) => {
    const opts = ConfigureCliSchema.parse(raw);
    await runConfigure({
      inputPath: opts.input,
      inputUrl: opts.inputUrl,
      dryRun: opts.dryRun,
      enabled: opts.enable,
      outputPath: opts.output,
      host: opts.host,
      site: opts.site,
      blockAction: opts.blockAction,
      trafficDirection: opts.direction,
      verbose: opts.verbose
    });
  });

program
  .command("sources")
  .description("List configured sources")
  .option("--registry <path>", "Path to sources.json", defaultRegistryPath())
  .action(async (raw: unknown) => {
    const opts = SourcesCliSchema.parse(raw);
    await runListSources({ registryPath: opts.registry });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
