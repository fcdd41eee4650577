import assert from "node:assert/strict";
import test from "node:test";
import { createTempRoot, createWorkspaceFixture, removeTempRoot } from "../../__tests__/helpers/workspace-fixtures.js";
import { stageContextFor } from "../../pipeline/stages.js";
import { PythonStaticAnalyzer } from "../static-analyzers.js";

test("PythonStaticAnalyzer reports each tool that cannot start instead of failing", async () => {
  const root = await createTempRoot("mendworks-static-");

  try {
    const workspace = await createWorkspaceFixture({ root, id: "demo_20240105_090307", language: "py", files: { "main.py": "" } });
    const analyzer = new PythonStaticAnalyzer({ pythonBin: "mendworks-missing-python", timeoutMs: 10_000 });

    const line = "[Error] spawn mendworks-missing-python ENOENT";
    assert.equal(await analyzer.analyze(stageContextFor(workspace)), [line, line, line].join("\n"));
  } finally {
    await removeTempRoot(root);
  }
});
