import { promises as fs } from "node:fs";
import path from "node:path";
import { CompareError } from "../lib/errors.js";
import { pathExists, safeResolvePath, toPosixPath } from "../lib/fs-utils.js";
import { runCommand } from "../lib/process-runner.js";
import type { WorkspaceDescriptor } from "../types.js";

export const DEFAULT_COMPARE_TIMEOUT_MS = 60_000;

function resolveSide(rootDir: string, relativePath: string): string {
  try {
    return safeResolvePath(rootDir, relativePath);
  } catch {
    throw new CompareError(`Unsafe file path: ${relativePath}`);
  }
}

/**
 * Unified diff of one source file between the pristine snapshot and the
 * working copy. Defaults to the first source file of the workspace language.
 */
export async function comparePatch(
  workspace: WorkspaceDescriptor,
  filePath?: string,
  timeoutMs = DEFAULT_COMPARE_TIMEOUT_MS
): Promise<string> {
  const relativePath = filePath?.trim() || workspace.sourceFiles[workspace.language][0];
  if (!relativePath) {
    throw new CompareError("No source files recorded for this workspace.");
  }

  const originalFile = resolveSide(workspace.snapshotDir, relativePath);
  const patchedFile = resolveSide(workspace.workingCopyDir, relativePath);

  if (!(await pathExists(originalFile))) {
    throw new CompareError(`Original file not found: ${relativePath}`);
  }
  if (!(await pathExists(patchedFile))) {
    throw new CompareError(`Patched file not found: ${relativePath}`);
  }

  const [original, patched] = await Promise.all([fs.readFile(originalFile), fs.readFile(patchedFile)]);
  if (original.equals(patched)) {
    return "";
  }

  const result = await runCommand({
    cwd: workspace.workspaceDir,
    command: "git",
    args: [
      "diff",
      "--no-index",
      "--no-color",
      "--",
      toPosixPath(path.relative(workspace.workspaceDir, originalFile)),
      toPosixPath(path.relative(workspace.workspaceDir, patchedFile))
    ],
    timeoutMs
  });

  if (result.timedOut) {
    throw new Error(`git diff exceeded ${String(timeoutMs)}ms.`);
  }

  // git diff --no-index exits 1 when the files differ
  if (result.exitCode !== 0 && result.exitCode !== 1) {
    throw new Error(`git diff failed: ${result.stderr.trim() || `exit code ${String(result.exitCode)}`}`);
  }

  return result.stdout;
}
