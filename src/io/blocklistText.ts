export interface BlocklistMeta {
  name: string;
  version: string;
  description: string;
  lastModified: string;
}

export const DEFAULT_BLOCKLIST_META: Omit<BlocklistMeta, "lastModified"> = {
  name: "Region Blocking Country List",
  version: "1.0.0",
  description:
    "Aggregated list of countries subject to sanctions, export controls, or censorship concerns, " +
    "collected from multiple public sources. Intended for a gateway's region blocking (GeoIP filtering) setting."
};

export function renderBlocklistText(codes: readonly string[], meta: BlocklistMeta): string {
  const lines = [
    `# ${meta.name}`,
    `# Version: ${meta.version}`,
    `# Last Modified: ${meta.lastModified}`,
    "#",
    ...meta.description.split("\n").map((line) => `# ${line}`),
    "#",
    "# Country codes (ISO 3166-1 alpha-2)",
    "#",
    ...codes
  ];
  return lines.join("\n") + "\n";
}

const CODE_LINE = /^[A-Za-z]{2}$/;

/**
 * One code per line. Comments, blank lines and anything that is not exactly
 * two letters once trimmed are skipped. Duplicates keep their first place.
 */
export function parseBlocklistText(content: string): string[] {
  const codes: string[] = [];
  const seen = new Set<string>();
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!CODE_LINE.test(line)) continue;
    const code = line.toUpperCase();
    if (seen.has(code)) continue;
    seen.add(code);
    codes.push(code);
  }
  return codes;
}
