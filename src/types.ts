// CHANGE: Define strongly typed models for line-ending detection and file scanning.
// WHY: Variant tags, counters and per-file results are shared by the core, the scanner and the CLI.

/**
 * Line-ending variants that own a fixed terminator sequence and can be conversion targets.
 */
export type TerminatorVariant = "lf" | "crlf" | "cr";

/**
 * Classification of a buffer's line endings.
 *
 * `mixed` means two or more terminator kinds were seen; `none` means no terminator at all.
 */
export type LineEndingVariant = TerminatorVariant | "mixed" | "none";

/**
 * Result of a single detection pass.
 *
 * @property variant - Classification derived from the counters.
 * @property lfCount - Lone LF occurrences.
 * @property crlfCount - CR LF pairs; a pair never counts towards `lfCount` or `crCount`.
 * @property crCount - Lone CR occurrences.
 *
 * Invariant: `variant === "mixed"` iff more than one counter is positive,
 * `variant === "none"` iff all counters are zero, otherwise it names the positive counter.
 */
export interface LineEndingInfo {
  readonly variant: LineEndingVariant;
  readonly lfCount: number;
  readonly crlfCount: number;
  readonly crCount: number;
}

/**
 * Detection outcome for one file selected by a glob pattern.
 *
 * @property path - Root-relative path with `/` separators.
 * @property pattern - First pattern that selected the file.
 */
export interface FileReport {
  readonly path: string;
  readonly pattern: string;
  readonly info: LineEndingInfo;
}

/**
 * Conversion outcome for one file.
 *
 * @property before - Detection result of the original content.
 * @property changed - Whether converted bytes differ from the original.
 * @property written - Whether the file was overwritten (false for unchanged files and dry runs).
 */
export interface ConversionReport {
  readonly path: string;
  readonly pattern: string;
  readonly before: LineEndingInfo;
  readonly changed: boolean;
  readonly written: boolean;
}

/**
 * A file that could not be processed; the batch continues without it.
 */
export interface FileFailure {
  readonly path: string;
  readonly reason: string;
}

/**
 * Settings shared by check and convert scans.
 *
 * Invariant: `maxFileBytes` and `concurrency` are positive.
 */
export interface ScanOptions {
  readonly root: string;
  readonly patterns: readonly string[];
  readonly maxFileBytes: number;
  readonly concurrency: number;
}

export interface CheckOptions extends ScanOptions {
  /** Leave out files whose variant equals this one. */
  readonly exclude?: LineEndingVariant;
}

export interface ConvertOptions extends ScanOptions {
  readonly target: TerminatorVariant;
  readonly dryRun: boolean;
}

/**
 * Results of a scan, in file enumeration order.
 */
export interface ScanResult<T> {
  readonly reports: readonly T[];
  readonly failures: readonly FileFailure[];
  readonly scanned: number;
}
