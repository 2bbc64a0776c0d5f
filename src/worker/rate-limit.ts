import { RateLimitInfo } from "../types/execution";
import { ResetTimeOptions, estimateResetTime } from "./reset-time";

/**
 * Phrases the agent prints when it refuses work because of a usage limit.
 * Whole phrases only; single keywords such as "limit" match too much.
 */
export const DEFAULT_RATE_LIMIT_PATTERNS: readonly string[] = [
  "usage limit reached",
  "rate limit exceeded",
  "rate limit reached",
  "too many requests",
  "quota exceeded",
  "limit will reset at",
  "5-hour limit reached",
  "you've hit your limit",
];

export interface RateLimitOptions extends ResetTimeOptions {
  /**
   * Replaces DEFAULT_RATE_LIMIT_PATTERNS
   */
  patterns?: readonly string[];
}

export function findRateLimitLine(
  output: string,
  patterns: readonly string[] = DEFAULT_RATE_LIMIT_PATTERNS
): string | null {
  const needles = patterns.map((p) => p.trim().toLowerCase()).filter(Boolean);

  for (const line of output.split(/\r?\n/)) {
    const haystack = line.toLowerCase();
    if (needles.some((needle) => haystack.includes(needle))) {
      return line.trim();
    }
  }

  return null;
}

export function classify(
  output: string,
  now: Date,
  options: RateLimitOptions = {}
): RateLimitInfo {
  const line = findRateLimitLine(output, options.patterns);

  if (line === null) {
    return { detected: false, rawMessage: "", detectedAt: now };
  }

  return {
    detected: true,
    rawMessage: line,
    detectedAt: now,
    estimatedResetAt: estimateResetTime(now, output, options),
  };
}
