import { InvariantViolationError } from "../errors";
import { CanonicalCountry, CatalogEntry, defaultCatalog } from "./catalog";

export type NormalizeResult =
  | { found: true; code: string }
  | { found: false; code: null };

const CODE_PATTERN = /^[A-Z]{2}$/;

/**
 * Reduces a token to its lookup key: diacritics stripped, letters lowercased,
 * everything but letters and whitespace dropped, whitespace collapsed.
 */
export function normalizeKey(token: string): string {
  const decomposed = token.normalize("NFKD").replace(/\p{M}/gu, "");
  const lettersOnly = decomposed.replace(/[^\p{L}\s]/gu, "").toLowerCase();
  return lettersOnly.replace(/\s+/g, " ").trim();
}

export class Canonicalizer {
  private readonly aliasToCode = new Map<string, string>();
  private readonly codeToCountry = new Map<string, CanonicalCountry>();

  constructor(catalog: CatalogEntry[] = defaultCatalog()) {
    for (const entry of catalog) {
      if (!CODE_PATTERN.test(entry.code)) {
        throw new InvariantViolationError(`Catalog code is not two uppercase letters: "${entry.code}"`);
      }
      if (this.codeToCountry.has(entry.code)) {
        throw new InvariantViolationError(`Catalog code listed twice: ${entry.code}`);
      }
      const [displayName] = entry.names;
      if (!displayName) {
        throw new InvariantViolationError(`Catalog code ${entry.code} has no names`);
      }
      this.codeToCountry.set(entry.code, Object.freeze({ code: entry.code, displayName }));
    }

    for (const entry of catalog) {
      for (const alias of [...entry.names, entry.code]) {
        this.addAlias(alias, entry.code);
      }
    }
  }

  private addAlias(alias: string, code: string): void {
    const key = normalizeKey(alias);
    if (!key) {
      throw new InvariantViolationError(`Alias "${alias}" for ${code} normalizes to an empty key`);
    }
    const existing = this.aliasToCode.get(key);
    if (existing && existing !== code) {
      throw new InvariantViolationError(
        `Alias "${alias}" is ambiguous: maps to both ${existing} and ${code}`
      );
    }
    this.aliasToCode.set(key, code);
  }

  normalize(token: string): NormalizeResult {
    const code = this.aliasToCode.get(normalizeKey(token));
    if (code) return { found: true, code };

    const upper = token.trim().toUpperCase();
    if (CODE_PATTERN.test(upper) && this.codeToCountry.has(upper)) {
      return { found: true, code: upper };
    }
    return { found: false, code: null };
  }

  displayName(code: string): string {
    const upper = code.toUpperCase();
    return this.codeToCountry.get(upper)?.displayName ?? upper;
  }

  isValidCode(code: string): boolean {
    return this.codeToCountry.has(code.toUpperCase());
  }

  allCodes(): string[] {
    return Array.from(this.codeToCountry.keys()).sort();
  }

  countries(): CanonicalCountry[] {
    return this.allCodes().map((code) => this.displayCountry(code));
  }

  private displayCountry(code: string): CanonicalCountry {
    const country = this.codeToCountry.get(code);
    if (!country) {
      throw new InvariantViolationError(`Unknown catalog code ${code}`);
    }
    return country;
  }
}
