// CHANGE: Render per-file report lines and batch summaries.
// WHY: Report lines keep the fixed-width column layout of the line-ending report.

import { variantToString } from "./line-endings.js";
import type { ConversionReport, FileReport, LineEndingVariant, TerminatorVariant } from "./types.js";

const VARIANTS: readonly LineEndingVariant[] = ["lf", "crlf", "cr", "mixed", "none"];

/**
 * Format one file as `LF: n | CRLF: n | CR: n | variant | path`.
 */
export function formatReportLine(report: FileReport): string {
  const { info } = report;
  return [
    `LF: ${String(info.lfCount).padEnd(3)}`,
    `CRLF: ${String(info.crlfCount).padEnd(3)}`,
    `CR: ${String(info.crCount).padEnd(3)}`,
    variantToString(info.variant).padEnd(6),
    report.path
  ].join(" | ");
}

export function formatConversionLine(report: ConversionReport, target: TerminatorVariant, dryRun: boolean): string {
  return `${dryRun ? "Would convert" : "Converted"} ${report.path} to ${variantToString(target)}`;
}

/**
 * Count reports per variant, listing every variant even when zero.
 */
export function countVariants(reports: readonly FileReport[]): Record<LineEndingVariant, number> {
  const counts: Record<LineEndingVariant, number> = { lf: 0, crlf: 0, cr: 0, mixed: 0, none: 0 };
  for (const report of reports) {
    counts[report.info.variant] += 1;
  }
  return counts;
}

export function formatCheckSummary(reports: readonly FileReport[], scanned: number): string {
  const counts = countVariants(reports);
  const breakdown = VARIANTS.map(variant => `${variant}=${counts[variant]}`).join(" ");
  return `Checked ${scanned} files, reported ${reports.length}: ${breakdown}`;
}
