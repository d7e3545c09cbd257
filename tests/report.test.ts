// CHANGE: Check report line layout and summary counts.
// WHY: Report lines keep fixed-width count and variant columns.

import { describe, expect, it } from "vitest";
import { countVariants, formatCheckSummary, formatConversionLine, formatReportLine } from "../src/report.js";
import type { ConversionReport, FileReport } from "../src/types.js";

const reports: FileReport[] = [
  { path: "a.txt", pattern: "*.txt", info: { variant: "lf", lfCount: 2, crlfCount: 0, crCount: 0 } },
  { path: "src/b.ts", pattern: "**/*.ts", info: { variant: "mixed", lfCount: 12, crlfCount: 1040, crCount: 3 } },
  { path: "c.txt", pattern: "*.txt", info: { variant: "lf", lfCount: 1, crlfCount: 0, crCount: 0 } }
];

describe("formatReportLine", () => {
  it("pads counts to three characters and the variant to six", () => {
    expect(formatReportLine(reports[0])).toBe("LF: 2   | CRLF: 0   | CR: 0   | lf     | a.txt");
  });

  it("lets wide counts overflow their column", () => {
    expect(formatReportLine(reports[1])).toBe("LF: 12  | CRLF: 1040 | CR: 3   | mixed  | src/b.ts");
  });
});

describe("formatConversionLine", () => {
  const report: ConversionReport = {
    path: "a.txt",
    pattern: "*.txt",
    before: reports[0].info,
    changed: true,
    written: true
  };

  it("names the target variant", () => {
    expect(formatConversionLine(report, "crlf", false)).toBe("Converted a.txt to crlf");
    expect(formatConversionLine(report, "cr", true)).toBe("Would convert a.txt to cr");
  });
});

describe("summaries", () => {
  it("counts every variant", () => {
    expect(countVariants(reports)).toStrictEqual({ lf: 2, crlf: 0, cr: 0, mixed: 1, none: 0 });
  });

  it("formats the check summary", () => {
    expect(formatCheckSummary(reports, 5)).toBe("Checked 5 files, reported 3: lf=2 crlf=0 cr=0 mixed=1 none=0");
  });
});
