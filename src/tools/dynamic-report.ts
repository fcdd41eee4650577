import type { PatchRecord, TestResult } from "../types.js";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatReportDate(date: Date): string {
  return `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function statusLine(result: TestResult): string {
  if (result.status === "pass") {
    return `[+] ${result.test} ... PASS`;
  }

  if (result.status === "skipped") {
    return `[!] ${result.test} ... SKIPPED`;
  }

  return `[-] ${result.test} ... FAIL`;
}

/**
 * Full audit report of a dynamic test run. Every detail line is kept; the
 * user-facing copy is derived from this text by the pipeline.
 */
export function buildDynamicReport(input: { date: Date; patches: PatchRecord[]; results: TestResult[] }): string {
  const lines: string[] = ["# Dynamic Analysis Report", `Date: ${formatReportDate(input.date)}`, "", "== TEST EXECUTION =="];

  for (const result of input.results) {
    lines.push(statusLine(result));
    for (const detailLine of result.detail.split(/\r?\n/)) {
      if (detailLine) {
        lines.push(` ${detailLine}`);
      }
    }
  }

  const applied = input.patches.filter((patch) => patch.status === "success").length;
  const passed = input.results.filter((result) => result.status === "pass").length;
  const failed = input.results.filter((result) => result.status === "fail").length;

  lines.push(
    "",
    "== SUMMARY ==",
    `Patches applied: ${String(applied)}/${String(input.patches.length)}`,
    `Bugs fixed: ${String(passed)}`,
    `Remaining issues: ${String(input.results.length - passed)}`,
    `New issues: ${String(failed)}`
  );

  return lines.join("\n");
}
