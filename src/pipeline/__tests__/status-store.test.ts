import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import path from "node:path";
import test from "node:test";
import { WorkspaceNotFoundError } from "../../lib/errors.js";
import type { PipelineResult } from "../../types.js";
import { createTempRoot, removeTempRoot } from "../../__tests__/helpers/workspace-fixtures.js";
import { StatusStore } from "../status-store.js";

const sampleResult: PipelineResult = {
  workspace: "demo_20240105_090307",
  language: "py",
  static: "no issues",
  dynamic_raw: "# Dynamic Analysis Report\nPatches applied: 0/0",
  dynamic: "# Dynamic Analysis Report",
  auto_fix_reports: { success: true, iterations: [] }
};

async function withStore(run: (store: StatusStore, workspaceDir: string) => Promise<void>): Promise<void> {
  const root = await createTempRoot("mendworks-status-");
  const workspaceDir = path.join(root, "demo_20240105_090307");
  await fs.mkdir(workspaceDir);

  try {
    await run(new StatusStore(root), workspaceDir);
  } finally {
    await removeTempRoot(root);
  }
}

test("read reports processing until a terminal status is persisted", async () => {
  await withStore(async (store) => {
    assert.deepEqual(await store.read("demo_20240105_090307"), { status: "processing" });
  });
});

test("persist writes the result document and the done marker", async () => {
  await withStore(async (store, workspaceDir) => {
    await store.persist("demo_20240105_090307", { status: "done", result: sampleResult });

    assert.deepEqual(await store.read("demo_20240105_090307"), { status: "done", result: sampleResult });
    assert.equal(await fs.readFile(path.join(workspaceDir, "status.txt"), "utf8"), "done");
    assert.equal(
      await fs.readFile(path.join(workspaceDir, "result.json"), "utf8"),
      `${JSON.stringify(sampleResult, null, 2)}\n`
    );
    assert.deepEqual((await fs.readdir(workspaceDir)).sort(), ["result.json", "status.txt"]);
  });
});

test("persist refuses a second terminal status", async () => {
  await withStore(async (store) => {
    await store.persist("demo_20240105_090307", { status: "error", error: "git missing" });

    await assert.rejects(
      () => store.persist("demo_20240105_090307", { status: "done", result: sampleResult }),
      /already persisted/
    );
    assert.deepEqual(await store.read("demo_20240105_090307"), { status: "error", error: "git missing" });
  });
});

test("read falls back to a generic message when the error document is missing", async () => {
  await withStore(async (store, workspaceDir) => {
    await fs.writeFile(path.join(workspaceDir, "status.txt"), "error\n");

    assert.deepEqual(await store.read("demo_20240105_090307"), { status: "error", error: "Pipeline failed." });
  });
});

test("read returns unknown markers verbatim", async () => {
  await withStore(async (store, workspaceDir) => {
    await fs.writeFile(path.join(workspaceDir, "status.txt"), "queued");

    assert.deepEqual(await store.read("demo_20240105_090307"), { status: "other", label: "queued" });
  });
});

test("unknown and malformed workspace ids are not found", async () => {
  await withStore(async (store) => {
    await assert.rejects(() => store.read("missing_20240105_090307"), WorkspaceNotFoundError);
    await assert.rejects(() => store.read("../outside"), WorkspaceNotFoundError);
    await assert.rejects(
      () => store.persist("missing_20240105_090307", { status: "error", error: "x" }),
      WorkspaceNotFoundError
    );
  });
});
