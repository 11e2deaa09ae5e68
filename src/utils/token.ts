// src/utils/token.ts
import { createHash } from "crypto";
import { performance } from "perf_hooks";

/** Label used by the key-value token shape: `request_id=<digest>`. */
export const KVP_LABEL = "request_id";

export type TokenFormat = "plain" | "kvp";

/** Request-derived entropy a token is hashed from. */
export type TokenSource = {
  url: string;
  remoteAddress: string;
  instant: number;
};

/**
 * MD5 hex digest of url + remote address + instant.
 * Deterministic for the same inputs; the sub-millisecond instant is what makes
 * two tokens for the same client and URL differ.
 */
export function generateToken(source: TokenSource, format: TokenFormat = "plain"): string {
  const digest = createHash("md5")
    .update(`${source.url}${source.remoteAddress}${source.instant}`)
    .digest("hex");
  return format === "kvp" ? `${KVP_LABEL}=${digest}` : digest;
}

/** Epoch milliseconds with a sub-millisecond fraction. */
export function wallClock(): number {
  return performance.timeOrigin + performance.now();
}
