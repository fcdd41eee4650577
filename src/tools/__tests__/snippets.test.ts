import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import path from "node:path";
import test from "node:test";
import { createTempRoot, removeTempRoot } from "../../__tests__/helpers/workspace-fixtures.js";
import { extractIssueSnippets, findIssueReferences } from "../snippets.js";

const twelveLines = `${Array.from({ length: 12 }, (_, index) => `l${String(index + 1)}`).join("\n")}\n`;

test("findIssueReferences picks file:line pairs for the requested language", () => {
  const report = [
    "pkg/calc.py:7:4: E0602 undefined variable",
    "src/main.cpp:12:5: warning: unused variable",
    "tests/test_calc.py:30: AssertionError"
  ].join("\n");

  assert.deepEqual(findIssueReferences(report, "py"), [
    { file: "pkg/calc.py", line: 7 },
    { file: "tests/test_calc.py", line: 30 }
  ]);
  assert.deepEqual(findIssueReferences(report, "cpp"), [{ file: "src/main.cpp", line: 12 }]);
});

test("extractIssueSnippets quotes five lines around each issue inside the repo", async () => {
  const root = await createTempRoot("mendworks-snippets-");

  try {
    await fs.mkdir(path.join(root, "pkg"));
    await fs.writeFile(path.join(root, "pkg", "calc.py"), twelveLines);

    const report = [
      "pkg/calc.py:7: E0602 undefined name",
      "repo/pkg/calc.py:2: W0612 unused variable",
      "missing.py:3: error",
      "../etc/passwd.py:1: outside"
    ].join("\n");

    const snippets = await extractIssueSnippets(report, root, "py");

    assert.equal(
      snippets,
      [
        "--- pkg/calc.py:7 ---\nl3\nl4\nl5\nl6\nl7\nl8\nl9\nl10\nl11\nl12\n",
        "--- repo/pkg/calc.py:2 ---\nl1\nl2\nl3\nl4\nl5\nl6\nl7\n"
      ].join("\n\n")
    );
  } finally {
    await removeTempRoot(root);
  }
});

test("extractIssueSnippets stops after twenty references", async () => {
  const root = await createTempRoot("mendworks-snippets-");

  try {
    await fs.writeFile(path.join(root, "a.py"), "x = 1\n");
    const report = Array.from({ length: 25 }, () => "a.py:1: E1").join("\n");

    const snippets = await extractIssueSnippets(report, root, "py");

    assert.equal(snippets.split("--- a.py:1 ---").length - 1, 20);
    assert.equal(await extractIssueSnippets("nothing to see", root, "py"), "");
  } finally {
    await removeTempRoot(root);
  }
});
