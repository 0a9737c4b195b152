import { ErrorRecord } from "../errors";
import { ParseStatus } from "../sources/types";

export type RunManifestSourceStatus = ParseStatus | "failed" | "abandoned" | "unknown_source";

export interface RunManifestSource {
  source_name: string;
  status: RunManifestSourceStatus;
  url: string | null;
  fetched_at: string | null;
  content_hash_sha256: string | null;
  raw_count: number;
  error: ErrorRecord | null;
}

export interface RunManifestChanges {
  previous_path: string;
  added: string[];
  removed: string[];
  changed: boolean;
}

export interface RunManifest {
  schema_version: "1.0";
  registry_path: string;
  output_txt: string;
  output_json: string;
  started_at: string;
  ended_at: string;
  total_codes: number;
  sources: RunManifestSource[];
  changes: RunManifestChanges | null;
}
