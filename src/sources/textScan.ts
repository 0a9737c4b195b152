import { escapeRegExp } from "../utils/text";
import { extractVisibleText, looksLikeHtml } from "../text/htmlText";

export interface TextScanner {
  scan(content: string): string[];
}

/**
 * Finds country names in free text. Each vocabulary name is reported at most
 * once, in vocabulary order, spelled as the vocabulary spells it. Overlapping
 * names ("Guinea" inside "Equatorial Guinea") are each reported.
 */
export function createTextScanner(vocabulary: readonly string[]): TextScanner {
  const patterns = dedupeCaseInsensitive(vocabulary).map((name) => ({
    name,
    pattern: new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(name)}(?![\\p{L}\\p{N}])`, "iu")
  }));

  return {
    scan(content: string): string[] {
      const text = looksLikeHtml(content) ? extractVisibleText(content) : content;
      return patterns.filter(({ pattern }) => pattern.test(text)).map(({ name }) => name);
    }
  };
}

function dedupeCaseInsensitive(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const name of names) {
    const key = name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(name);
  }
  return unique;
}
