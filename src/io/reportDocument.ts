import { AggregationReport, reportCodes } from "../pipeline/aggregate";
import { ParseStatus } from "../sources/types";
import { writeJson, writeText } from "../utils/fs";
import { assertMatchesContract } from "../validation/jsonSchema";
import { BlocklistMeta, renderBlocklistText } from "./blocklistText";

export interface ReportCountry {
  alpha2: string;
  name: string;
  sources: string[];
  raw_tokens: string[];
}

export interface ReportSourceStats {
  url: string;
  fetched_at: string;
  parse_status: ParseStatus;
  raw_count: number;
  matched_count: number;
  discarded_count: number;
  unmatched_tokens: string[];
  error: string | null;
}

export interface ReportDocument {
  name: string;
  version: string;
  description: string;
  last_modified: string;
  timestamp: string;
  total_codes: number;
  countries: ReportCountry[];
  source_stats: Record<string, ReportSourceStats>;
  errors: string[];
}

export function buildReportDocument(report: AggregationReport, meta: BlocklistMeta): ReportDocument {
  const sourceStats: Record<string, ReportSourceStats> = {};
  for (const [name, stats] of Object.entries(report.perSourceStats)) {
    sourceStats[name] = {
      url: stats.url,
      fetched_at: stats.fetchedAt,
      parse_status: stats.status,
      raw_count: stats.rawCount,
      matched_count: stats.matchedCount,
      discarded_count: stats.discardedCount,
      unmatched_tokens: [...stats.unmatchedTokens],
      error: stats.error
    };
  }

  return {
    name: meta.name,
    version: meta.version,
    description: meta.description,
    last_modified: meta.lastModified,
    timestamp: report.timestamp,
    total_codes: report.totalCodes,
    countries: report.countries.map((country) => ({
      alpha2: country.code,
      name: country.displayName,
      sources: [...country.sources],
      raw_tokens: [...country.rawTokens]
    })),
    source_stats: sourceStats,
    errors: [...report.errors]
  };
}

export async function validateReportDocument(document: ReportDocument): Promise<void> {
  await assertMatchesContract("aggregation_report", document, "Aggregation report");
}

export interface ArtifactPaths {
  txtPath: string;
  jsonPath: string;
}

export async function writeAggregationArtifacts(
  report: AggregationReport,
  meta: BlocklistMeta,
  paths: ArtifactPaths
): Promise<ReportDocument> {
  const document = buildReportDocument(report, meta);
  await validateReportDocument(document);
  await writeText(paths.txtPath, renderBlocklistText(reportCodes(report), meta));
  await writeJson(paths.jsonPath, document);
  return document;
}
