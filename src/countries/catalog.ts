import { z } from "zod";
import catalogJson from "../../data/countries.json";
import textScanJson from "../../data/text-scan-names.json";

const CatalogEntrySchema = z.object({
  code: z.string(),
  names: z.array(z.string().min(1))
});

export const CountryCatalogSchema = z.array(CatalogEntrySchema);

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

export interface CanonicalCountry {
  readonly code: string;
  readonly displayName: string;
}

/** ISO 3166-1 alpha-2 codes with every spelling the sources are known to use. */
export function defaultCatalog(): CatalogEntry[] {
  return CountryCatalogSchema.parse(catalogJson);
}

/**
 * Names searched for in free text. Narrower than the catalog: bare codes and
 * short abbreviations ("US", "UK") would match ordinary words.
 */
export function defaultTextScanNames(): string[] {
  return z.array(z.string().min(1)).parse(textScanJson);
}
