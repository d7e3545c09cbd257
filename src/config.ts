// CHANGE: Centralise scan configuration with environment overrides.
// WHY: Scan root, file size ceiling and read concurrency are tunable without code changes.

import * as dotenv from "dotenv";

dotenv.config();

export function positiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Scan settings used when the CLI does not override them.
 *
 * Invariant: `MAX_FILE_BYTES` and `CONCURRENCY` are positive.
 */
export const SCAN = {
  ROOT: process.env.CRLF_ROOT ?? ".",
  MAX_FILE_BYTES: positiveInt(process.env.CRLF_MAX_FILE_BYTES, 10 * 1024 * 1024),
  CONCURRENCY: positiveInt(process.env.CRLF_CONCURRENCY, 4)
} as const;

/**
 * File rewrite settings.
 */
export const WRITE = {
  TEMP_SUFFIX: ".crlf-tmp"
} as const;
