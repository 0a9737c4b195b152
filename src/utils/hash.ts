import { createHash } from "crypto";

export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/** Digest of a token list, one token per line, for results that have no payload. */
export function fingerprintTokens(tokens: readonly string[]): string {
  return sha256(tokens.join("\n"));
}
