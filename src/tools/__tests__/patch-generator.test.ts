import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import path from "node:path";
import test from "node:test";
import { createTempRoot, createWorkspaceFixture, removeTempRoot } from "../../__tests__/helpers/workspace-fixtures.js";
import { stageContextFor, type PatchGenerationInput } from "../../pipeline/stages.js";
import { CommandPatchGenerator } from "../patch-generator.js";

const nodeCommand = JSON.stringify(process.execPath);

async function withInput(run: (input: PatchGenerationInput) => Promise<void>): Promise<void> {
  const root = await createTempRoot("mendworks-generator-");

  try {
    const workspace = await createWorkspaceFixture({ root, id: "demo_20240105_090307", language: "py", files: { "main.py": "" } });
    const context = stageContextFor(workspace);
    await run({ context, report: "main.py:1: E1", snippets: "--- main.py:1 ---\n", outputDir: context.patchesDir, iteration: 0 });
  } finally {
    await removeTempRoot(root);
  }
}

test("without a command the generator only writes its inputs", async () => {
  await withInput(async (input) => {
    const generator = new CommandPatchGenerator({ timeoutMs: 10_000 });

    assert.deepEqual(await generator.generate(input), []);
    assert.equal(await fs.readFile(path.join(input.outputDir, "analysis_report.txt"), "utf8"), "main.py:1: E1");
    assert.equal(await fs.readFile(path.join(input.outputDir, "issue_snippets.txt"), "utf8"), "--- main.py:1 ---\n");
  });
});

test("the generator command receives the patch directory and its patches are returned", async () => {
  await withInput(async (input) => {
    const script = "require('fs').writeFileSync(require('path').join(process.env.MENDWORKS_PATCH_DIR, 'patch_1.diff'), process.env.MENDWORKS_LANGUAGE)";
    const generator = new CommandPatchGenerator({ command: `${nodeCommand} -e "${script}"`, timeoutMs: 10_000 });

    assert.deepEqual(await generator.generate(input), ["patch_1.diff"]);
    assert.equal(await fs.readFile(path.join(input.outputDir, "patch_1.diff"), "utf8"), "py");
  });
});

test("a failing generator command raises its first output line", async () => {
  await withInput(async (input) => {
    const generator = new CommandPatchGenerator({
      command: `${nodeCommand} -e "console.error('model offline'); process.exitCode = 3"`,
      timeoutMs: 10_000
    });

    await assert.rejects(() => generator.generate(input), { message: "Patch generator failed: model offline" });
  });
});
