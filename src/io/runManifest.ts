import { ErrorRecord } from "../errors";
import { runManifestPath } from "./paths";
import { writeJson } from "../utils/fs";
import { RunManifest, RunManifestChanges, RunManifestSource } from "../types/runManifest";
import { FetchRunOutcome } from "../pipeline/orchestrator";

export interface RunManifestParams {
  registryPath: string;
  outputTxt: string;
  outputJson: string;
  startedAt: string;
  endedAt: string;
  totalCodes: number;
  sources: RunManifestSource[];
  changes: RunManifestChanges | null;
}

export function buildRunManifest(params: RunManifestParams): RunManifest {
  return {
    schema_version: "1.0",
    registry_path: params.registryPath,
    output_txt: params.outputTxt,
    output_json: params.outputJson,
    started_at: params.startedAt,
    ended_at: params.endedAt,
    total_codes: params.totalCodes,
    sources: params.sources,
    changes: params.changes
  };
}

export function manifestSources(outcome: FetchRunOutcome, unknownSources: readonly string[]): RunManifestSource[] {
  const sources: RunManifestSource[] = outcome.results.map((result) => ({
    source_name: result.sourceName,
    status: result.parseStatus,
    url: result.sourceUrl,
    fetched_at: result.fetchedAt,
    content_hash_sha256: result.contentFingerprint,
    raw_count: result.rawTokens.length,
    error: result.errorDetail ? { message: result.errorDetail } : null
  }));

  for (const failure of outcome.failed) {
    sources.push(emptySource(failure.sourceName, "failed", failure.error));
  }
  for (const name of outcome.abandoned) {
    sources.push(emptySource(name, "abandoned", { message: "abandoned at fetch deadline" }));
  }
  for (const name of unknownSources) {
    sources.push(emptySource(name, "unknown_source", { message: "no adapter registered under this name" }));
  }

  return sources.sort((a, b) => a.source_name.localeCompare(b.source_name));
}

function emptySource(name: string, status: RunManifestSource["status"], error: ErrorRecord): RunManifestSource {
  return {
    source_name: name,
    status,
    url: null,
    fetched_at: null,
    content_hash_sha256: null,
    raw_count: 0,
    error
  };
}

export async function writeRunManifest(manifest: RunManifest): Promise<string> {
  const filePath = runManifestPath(manifest.output_txt);
  await writeJson(filePath, manifest);
  return filePath;
}
