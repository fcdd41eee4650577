import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import JSZip from "jszip";
import { IngestError, type IngestErrorCode } from "../../lib/errors.js";
import { ArchiveIngestor, isUnsafeMemberName } from "../archive-ingestor.js";
import { classifyLanguage } from "../language.js";

const fixedNow = () => new Date(2024, 0, 5, 9, 3, 7);

async function buildZip(files: Record<string, string>): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(files)) {
    zip.file(name, content, { createFolders: false });
  }
  return zip.generateAsync({ type: "uint8array" });
}

async function withIngestor(
  run: (ingestor: ArchiveIngestor, roots: { workspacesRoot: string; tempRoot: string }) => Promise<void>,
  limits: { maxEntries?: number; maxUncompressedBytes?: number } = {}
): Promise<void> {
  const base = await fs.mkdtemp(path.join(os.tmpdir(), "mendworks-ingest-"));
  const workspacesRoot = path.join(base, "workspaces");
  const tempRoot = path.join(base, "tmp");
  await fs.mkdir(workspacesRoot);
  await fs.mkdir(tempRoot);

  try {
    await run(new ArchiveIngestor({ workspacesRoot, tempRoot, now: fixedNow, ...limits }), { workspacesRoot, tempRoot });
  } finally {
    await fs.rm(base, { recursive: true, force: true });
  }
}

function isIngestError(code: IngestErrorCode): (error: unknown) => boolean {
  return (error) => error instanceof IngestError && error.code === code;
}

test("isUnsafeMemberName rejects absolute, drive-letter and parent paths", () => {
  const root = "/tmp/extract";

  assert.equal(isUnsafeMemberName("pkg/main.py", root), false);
  assert.equal(isUnsafeMemberName("pkg/", root), false);
  assert.equal(isUnsafeMemberName("/etc/passwd", root), true);
  assert.equal(isUnsafeMemberName("C:/Windows/win.ini", root), true);
  assert.equal(isUnsafeMemberName("../evil.py", root), true);
  assert.equal(isUnsafeMemberName("pkg\\..\\..\\evil.py", root), true);
  assert.equal(isUnsafeMemberName("", root), true);
});

test("classifyLanguage uses the hint only when both languages are present", () => {
  assert.equal(classifyLanguage({ py: ["a.py"], cpp: [] }, "cpp"), "py");
  assert.equal(classifyLanguage({ py: [], cpp: ["a.cpp"] }), "cpp");
  assert.equal(classifyLanguage({ py: ["a.py"], cpp: ["a.cpp"] }, "cpp"), "cpp");
  assert.throws(() => classifyLanguage({ py: ["a.py"], cpp: ["a.cpp"] }), isIngestError("AmbiguousLanguage"));
  assert.throws(() => classifyLanguage({ py: [], cpp: [] }), isIngestError("NoRecognizedSource"));
});

test("ingest extracts a Python archive into snapshot and working copy", async () => {
  await withIngestor(async (ingestor, { workspacesRoot, tempRoot }) => {
    const bytes = await buildZip({
      "app/main.py": "print('hi')\n",
      "app/util.py": "X = 1\n",
      "README.md": "# demo\n"
    });

    const workspace = await ingestor.ingest(bytes, "demo.zip");
    const workspaceDir = path.join(workspacesRoot, "demo_20240105_090307");

    assert.equal(workspace.id, "demo_20240105_090307");
    assert.equal(workspace.language, "py");
    assert.equal(workspace.status, "processing");
    assert.equal(workspace.workspaceDir, workspaceDir);
    assert.equal(workspace.workingCopyDir, path.join(workspaceDir, "python_repo"));
    assert.deepEqual(workspace.sourceFiles, { py: ["app/main.py", "app/util.py"], cpp: [] });
    assert.equal(await fs.readFile(path.join(workspaceDir, "uploaded_source", "app", "main.py"), "utf8"), "print('hi')\n");
    assert.equal(await fs.readFile(path.join(workspaceDir, "python_repo", "README.md"), "utf8"), "# demo\n");
    assert.deepEqual(await fs.readdir(tempRoot), []);
  });
});

test("ingest extracts explicit directory members and the files under them", async () => {
  await withIngestor(async (ingestor, { workspacesRoot }) => {
    const zip = new JSZip();
    zip.folder("pkg");
    zip.folder("pkg/empty");
    zip.file("pkg/core.py", "VALUE = 2\n");
    const bytes = await zip.generateAsync({ type: "uint8array" });

    const workspace = await ingestor.ingest(bytes, "nested.zip");
    const snapshotDir = path.join(workspacesRoot, "nested_20240105_090307", "uploaded_source");

    assert.deepEqual(workspace.sourceFiles, { py: ["pkg/core.py"], cpp: [] });
    assert.equal(await fs.readFile(path.join(snapshotDir, "pkg", "core.py"), "utf8"), "VALUE = 2\n");
    assert.equal((await fs.stat(path.join(snapshotDir, "pkg", "empty"))).isDirectory(), true);
    assert.equal(await fs.readFile(path.join(workspace.workingCopyDir, "pkg", "core.py"), "utf8"), "VALUE = 2\n");
  });
});

test("ingest places C++ projects under cpp_project/puzzle-2", async () => {
  await withIngestor(async (ingestor, { workspacesRoot }) => {
    const workspace = await ingestor.ingest(await buildZip({ "main.cpp": "int main() { return 0; }\n" }), "solver.zip");

    assert.equal(workspace.language, "cpp");
    assert.equal(
      await fs.readFile(path.join(workspacesRoot, "solver_20240105_090307", "cpp_project", "puzzle-2", "main.cpp"), "utf8"),
      "int main() { return 0; }\n"
    );
  });
});

test("ingest honours file_type for mixed archives and rejects them without it", async () => {
  await withIngestor(async (ingestor, { workspacesRoot }) => {
    const bytes = await buildZip({ "a.py": "", "b.cpp": "" });

    await assert.rejects(() => ingestor.ingest(bytes, "mixed.zip"), isIngestError("AmbiguousLanguage"));
    assert.deepEqual(await fs.readdir(workspacesRoot), []);

    const workspace = await ingestor.ingest(bytes, "mixed.zip", "cpp");
    assert.equal(workspace.language, "cpp");
    assert.deepEqual(workspace.sourceFiles, { py: ["a.py"], cpp: ["b.cpp"] });
  });
});

test("ingest rejects archives without Python or C++ sources", async () => {
  await withIngestor(async (ingestor, { workspacesRoot }) => {
    const bytes = await buildZip({ "notes.txt": "nothing" });

    await assert.rejects(() => ingestor.ingest(bytes, "notes.zip"), isIngestError("NoRecognizedSource"));
    assert.deepEqual(await fs.readdir(workspacesRoot), []);
  });
});

test("ingest rejects bytes that are not a zip archive", async () => {
  await withIngestor(async (ingestor) => {
    await assert.rejects(
      () => ingestor.ingest(new TextEncoder().encode("plain text"), "fake.zip"),
      (error: unknown) =>
        error instanceof IngestError &&
        error.code === "InvalidArchive" &&
        error.message === "The uploaded file is not a valid ZIP file."
    );
  });
});

test("ingest refuses path traversal before writing anything", async () => {
  await withIngestor(async (ingestor, { workspacesRoot, tempRoot }) => {
    const bytes = await buildZip({ "main.py": "ok\n", "../evil.py": "pwned\n" });

    await assert.rejects(() => ingestor.ingest(bytes, "evil.zip"), isIngestError("PathTraversal"));
    assert.deepEqual(await fs.readdir(workspacesRoot), []);
    assert.deepEqual(await fs.readdir(tempRoot), []);
    await assert.rejects(() => fs.access(path.join(path.dirname(workspacesRoot), "evil.py")));
  });
});

test("ingest enforces the member count limit", async () => {
  await withIngestor(
    async (ingestor) => {
      const bytes = await buildZip({ "a.py": "", "b.py": "", "c.py": "" });

      await assert.rejects(
        () => ingestor.ingest(bytes, "many.zip"),
        (error: unknown) =>
          error instanceof IngestError &&
          error.code === "ArchiveTooLarge" &&
          error.message === "Unsafe archive: 3 members exceed the limit of 2."
      );
    },
    { maxEntries: 2 }
  );
});

test("ingest enforces the uncompressed size budget", async () => {
  await withIngestor(
    async (ingestor, { workspacesRoot }) => {
      const bytes = await buildZip({ "big.py": "x".repeat(64) });

      await assert.rejects(
        () => ingestor.ingest(bytes, "big.zip"),
        (error: unknown) =>
          error instanceof IngestError &&
          error.code === "ArchiveTooLarge" &&
          error.message === "Unsafe archive: uncompressed size exceeds the limit of 32 bytes."
      );
      assert.deepEqual(await fs.readdir(workspacesRoot), []);
    },
    { maxUncompressedBytes: 32 }
  );
});
