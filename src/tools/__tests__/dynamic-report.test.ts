import assert from "node:assert/strict";
import test from "node:test";
import { buildDynamicReport, formatReportDate } from "../dynamic-report.js";

test("formatReportDate renders the local calendar date", () => {
  assert.equal(formatReportDate(new Date(2024, 0, 5, 23, 59, 0)), "2024-01-05");
});

test("buildDynamicReport lists each check with its detail and a summary", () => {
  const report = buildDynamicReport({
    date: new Date(2024, 0, 5),
    patches: [
      { name: "patch_1.diff", status: "success", detail: "applied cleanly" },
      { name: "patch_2.diff", status: "failed", detail: "error: corrupt patch" }
    ],
    results: [
      { test: "compile_main", status: "pass", detail: "" },
      { test: "pytest_suite", status: "fail", detail: "E assert 1 == 2\n\nFAILED tests/test_a.py" },
      { test: "custom", status: "skipped", detail: "not configured" }
    ]
  });

  assert.equal(
    report,
    [
      "# Dynamic Analysis Report",
      "Date: 2024-01-05",
      "",
      "== TEST EXECUTION ==",
      "[+] compile_main ... PASS",
      "[-] pytest_suite ... FAIL",
      " E assert 1 == 2",
      " FAILED tests/test_a.py",
      "[!] custom ... SKIPPED",
      " not configured",
      "",
      "== SUMMARY ==",
      "Patches applied: 1/2",
      "Bugs fixed: 1",
      "Remaining issues: 2",
      "New issues: 1"
    ].join("\n")
  );
});

test("buildDynamicReport handles an empty run", () => {
  const report = buildDynamicReport({ date: new Date(2024, 0, 5), patches: [], results: [] });

  assert.equal(
    report,
    "# Dynamic Analysis Report\nDate: 2024-01-05\n\n== TEST EXECUTION ==\n\n== SUMMARY ==\nPatches applied: 0/0\nBugs fixed: 0\nRemaining issues: 0\nNew issues: 0"
  );
});
